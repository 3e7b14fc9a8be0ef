import { describe, it, expect } from 'vitest';
import {
  abortDeployment,
  applyDeviceTransition,
  assignTargets,
  createDeployment,
  markFinished,
  validateDeployment,
} from './deployment.js';
import { emptyStats, getDeploymentStatus, isFinished, isNotPending, totalCount } from './stats.js';
import { validateConstructor } from './validator.js';
import type { DeploymentConstructor } from '../types/deployment.js';

const CREATED_AT = new Date('2026-03-01T10:00:00.000Z');
const FINISHED_AT = new Date('2026-03-02T10:00:00.000Z');
const FIXED_ID = '3f1c6a52-8d1e-4b55-9a0c-2b7f1e4d9c11';

function newDeployment(constructor: DeploymentConstructor = { name: 'r1', artifactName: 'app-v2', devices: ['d1', 'd2'] }) {
  return createDeployment(constructor, { now: () => CREATED_AT, generateId: () => FIXED_ID });
}

describe('createDeployment', () => {
  it('creates a pending deployment with zeroed counters', () => {
    const constructor = { name: 'r1', artifactName: 'app-v2', devices: ['d1', 'd2'] };
    const validation = validateConstructor(constructor);
    expect(validation.ok).toBe(true);

    const deployment = newDeployment(constructor);

    expect(deployment.id).toBe(FIXED_ID);
    expect(deployment.created).toEqual(CREATED_AT);
    expect(deployment.finished).toBeNull();
    expect(deployment.stats).toEqual(emptyStats());
    expect(deployment.deviceCount).toBe(0);
    expect(deployment.maxDevices).toBe(0);
    expect(deployment.type).toBe('software');
    expect(getDeploymentStatus(deployment)).toBe('pending');
  });

  it('generates a fresh UUID per deployment by default', () => {
    const first = createDeployment({ name: 'r1', artifactName: 'a', allDevices: true });
    const second = createDeployment({ name: 'r1', artifactName: 'a', allDevices: true });

    expect(first.id).not.toBe(second.id);
    expect(validateDeployment(first)).toEqual([]);
  });

  it('copies the device list instead of sharing it', () => {
    const devices = ['d1'];
    const deployment = newDeployment({ name: 'r1', artifactName: 'a', devices });
    devices.push('d2');

    expect(deployment.devices).toEqual(['d1']);
  });

  it('keeps a configuration payload only for configuration deployments', () => {
    const payload = new Uint8Array([1, 2, 3]);

    const software = createDeployment({ name: 'r1', artifactName: 'a', devices: ['d1'] }, { configuration: payload });
    const configuration = createDeployment(
      { name: 'r1', artifactName: 'a', devices: ['d1'] },
      { type: 'configuration', configuration: payload }
    );

    expect(software.configuration).toBeUndefined();
    expect(configuration.type).toBe('configuration');
    expect(configuration.configuration).toEqual(payload);
  });
});

describe('assignTargets', () => {
  it('sets the target count and puts every device in pending', () => {
    const deployment = assignTargets(newDeployment(), ['d1', 'd2', 'd1']);

    expect(deployment.deviceList).toEqual(['d1', 'd2']);
    expect(deployment.maxDevices).toBe(2);
    expect(deployment.deviceCount).toBe(2);
    expect(deployment.stats.pending).toBe(2);
    expect(totalCount(deployment.stats)).toBe(2);
  });
});

describe('device transitions', () => {
  it('finishes once every device reports a terminal outcome', () => {
    let deployment = assignTargets(newDeployment(), ['d1', 'd2']);

    deployment = applyDeviceTransition(deployment, 'pending', 'success').deployment;
    deployment = applyDeviceTransition(deployment, 'pending', 'failure').deployment;

    expect(isFinished(deployment)).toBe(true);
    expect(getDeploymentStatus(deployment)).toBe('finished');
  });

  it('is in progress while a device installs', () => {
    const deployment = applyDeviceTransition(assignTargets(newDeployment(), ['d1', 'd2']), 'pending', 'installing').deployment;

    expect(isNotPending(deployment)).toBe(true);
    expect(isFinished(deployment)).toBe(false);
    expect(getDeploymentStatus(deployment)).toBe('inprogress');
  });

  it('reports clamped decrements', () => {
    const result = applyDeviceTransition(assignTargets(newDeployment(), ['d1', 'd2']), 'downloading', 'installing');

    // Both devices are still counted as pending, so there is no room for another one
    expect(result.clamped).toBe(true);
    expect(result.dropped).toBe(true);
    expect(result.deployment.stats).toEqual({ ...emptyStats(), pending: 2 });
  });

  it('leaves the input deployment untouched', () => {
    const before = assignTargets(newDeployment(), ['d1']);

    applyDeviceTransition(before, 'pending', 'success');

    expect(before.stats.pending).toBe(1);
    expect(before.stats.success).toBe(0);
  });
});

describe('markFinished', () => {
  it('sets the finished timestamp once', () => {
    const finished = markFinished(newDeployment(), FINISHED_AT);
    const again = markFinished(finished, new Date('2026-04-01T00:00:00.000Z'));

    expect(finished.finished).toEqual(FINISHED_AT);
    expect(again.finished).toEqual(FINISHED_AT);
  });

  it('is the only way a deployment without targets finishes', () => {
    const deployment = newDeployment();
    expect(getDeploymentStatus(deployment)).toBe('pending');

    expect(getDeploymentStatus(markFinished(deployment, FINISHED_AT))).toBe('finished');
  });
});

describe('abortDeployment', () => {
  it('moves unfinished devices to aborted and finishes', () => {
    let deployment = assignTargets(newDeployment(), ['d1', 'd2', 'd3', 'd4']);
    deployment = applyDeviceTransition(deployment, 'pending', 'success').deployment;
    deployment = applyDeviceTransition(deployment, 'pending', 'downloading').deployment;
    deployment = applyDeviceTransition(deployment, 'pending', 'pause-before-reboot').deployment;

    const aborted = abortDeployment(deployment, FINISHED_AT);

    expect(aborted.stats).toEqual({ ...emptyStats(), success: 1, aborted: 3 });
    expect(aborted.finished).toEqual(FINISHED_AT);
    expect(totalCount(aborted.stats)).toBe(4);
    expect(getDeploymentStatus(aborted)).toBe('finished');
  });
});

describe('validateDeployment', () => {
  it('reports malformed entities', () => {
    const deployment = {
      ...newDeployment(),
      id: 'not-a-uuid',
      artifacts: [''],
      deviceList: ['d1', ''],
    };

    expect(validateDeployment(deployment)).toEqual([
      'id must be a UUID',
      'artifacts must not contain empty entries',
      'deviceList must not contain empty entries',
    ]);
  });
});
