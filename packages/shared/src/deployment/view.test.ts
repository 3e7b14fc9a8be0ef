import { describe, it, expect } from 'vitest';
import { toDeploymentStatsView, toDeploymentView } from './view.js';
import { applyDeviceTransition, assignTargets, createDeployment, markFinished } from './deployment.js';
import { emptyStats } from './stats.js';

const CREATED_AT = new Date('2026-03-01T10:00:00.000Z');

function deploymentFor(devices: string[]) {
  const deployment = createDeployment(
    { name: 'r1', artifactName: 'app-v2', devices, allDevices: false },
    { now: () => CREATED_AT, generateId: () => 'dep-1', artifacts: ['artifacts/app-v2'] }
  );
  return assignTargets(deployment, devices);
}

describe('toDeploymentView', () => {
  it('hides targeting inputs and raw counters', () => {
    const view = toDeploymentView(deploymentFor(['d1', 'd2']));

    expect(view).toEqual({
      id: 'dep-1',
      name: 'r1',
      artifactName: 'app-v2',
      created: '2026-03-01T10:00:00.000Z',
      status: 'pending',
      deviceCount: 2,
      maxDevices: 2,
      artifacts: ['artifacts/app-v2'],
      type: 'software',
    });
    expect(Object.keys(view)).not.toContain('devices');
    expect(Object.keys(view)).not.toContain('allDevices');
    expect(Object.keys(view)).not.toContain('deviceList');
  });

  it('derives the status from the counters', () => {
    const deployment = applyDeviceTransition(deploymentFor(['d1', 'd2']), 'pending', 'rebooting').deployment;

    expect(toDeploymentView(deployment).status).toBe('inprogress');
  });

  it('includes the finished timestamp', () => {
    const view = toDeploymentView(markFinished(deploymentFor(['d1']), new Date('2026-03-05T08:30:00.000Z')));

    expect(view.finished).toBe('2026-03-05T08:30:00.000Z');
    expect(view.status).toBe('finished');
  });

  it('reads records without a type as software deployments', () => {
    const { type: _type, ...untyped } = deploymentFor(['d1']);

    expect(toDeploymentView(untyped).type).toBe('software');
  });

  it('encodes the configuration payload as base64', () => {
    const deployment = createDeployment(
      { name: 'cfg', artifactName: 'cfg', devices: ['d1'] },
      { type: 'configuration', configuration: new TextEncoder().encode('{"a":1}') }
    );

    expect(toDeploymentView(deployment).configuration).toBe('eyJhIjoxfQ==');
  });
});

describe('toDeploymentStatsView', () => {
  it('returns a copy of the counters', () => {
    const deployment = deploymentFor(['d1', 'd2', 'd3']);
    const stats = toDeploymentStatsView(deployment);
    stats.pending = 0;

    expect(deployment.stats).toEqual({ ...emptyStats(), pending: 3 });
  });
});
