/**
 * Deployment operations: creation, device status reports, abort and finish.
 *
 * Every read-modify-write of a deployment runs under its mutex, so counter
 * updates for the same deployment are applied one at a time.
 */

import {
  abortDeployment,
  applyDeviceTransition,
  assertValidConstructor,
  assignTargets,
  createDeployment,
  isFinished,
  markFinished,
  type Deployment,
  type DeploymentConstructor,
  type DeploymentQuery,
  type DeploymentStats,
  type DeviceDeploymentStatus,
  toDeploymentStatsView,
} from '@rollout/shared';
import { ConflictError, NotFoundError, isNotFoundError } from '../lib/errors.js';
import { deploymentLogger } from '../lib/logger.js';
import { mutexManager } from '../lib/mutexManager.js';
import type { DeploymentPage, DeploymentRepository } from '../repositories/deploymentRepository.js';
import type { ObjectStorage } from '../storage/objectStorage.js';
import type { DeviceInventory } from './deviceInventory.js';

export interface DeploymentServiceDeps {
  repository: DeploymentRepository;
  inventory: DeviceInventory;
  storage: ObjectStorage;
  now?: () => Date;
}

/**
 * Object path of an uploaded artifact.
 * "." and ".." survive URI encoding but are not usable as object names, so their dots are escaped too.
 */
export function artifactPath(artifactName: string): string {
  const encoded = encodeURIComponent(artifactName);
  return `artifacts/${encoded === '.' || encoded === '..' ? encoded.replace(/\./g, '%2E') : encoded}`;
}

export class DeploymentService {
  private readonly repository: DeploymentRepository;
  private readonly inventory: DeviceInventory;
  private readonly storage: ObjectStorage;
  private readonly now: () => Date;

  constructor(deps: DeploymentServiceDeps) {
    this.repository = deps.repository;
    this.inventory = deps.inventory;
    this.storage = deps.storage;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Validate a definition, resolve its targets and store the new deployment.
   * Throws InvalidDefinitionError for definitions that can never be created.
   */
  async createDeployment(input: unknown): Promise<Deployment> {
    const constructor = assertValidConstructor(input);
    const artifacts = await this.resolveArtifacts(constructor.artifactName);
    const deployment = createDeployment(constructor, { artifacts, now: this.now });
    return this.store(deployment, await this.resolveTargets(constructor));
  }

  /**
   * Deploy an opaque configuration payload to a single device.
   */
  async createConfigurationDeployment(
    deviceId: string,
    name: string,
    configuration: Uint8Array
  ): Promise<Deployment> {
    const constructor = assertValidConstructor({ name, artifactName: name, devices: [deviceId] });
    const deployment = createDeployment(constructor, {
      type: 'configuration',
      configuration,
      now: this.now,
    });
    return this.store(deployment, [deviceId]);
  }

  async getDeployment(id: string): Promise<Deployment> {
    return this.repository.load(id);
  }

  async getStats(id: string): Promise<DeploymentStats> {
    return toDeploymentStatsView(await this.repository.load(id));
  }

  async listDeployments(query: DeploymentQuery): Promise<DeploymentPage> {
    return this.repository.query(query);
  }

  /**
   * Apply one reported device status transition.
   * Callers deliver each transition once; no deduplication happens here.
   */
  async reportDeviceStatus(
    id: string,
    deviceId: string,
    from: DeviceDeploymentStatus,
    to: DeviceDeploymentStatus
  ): Promise<Deployment> {
    return this.updateExclusively(id, async (deployment) => {
      if (!deployment.deviceList.includes(deviceId)) {
        throw new NotFoundError(`Device ${deviceId} is not part of deployment ${id}`);
      }
      if (deployment.finished) {
        throw new ConflictError(`Deployment ${id} is already finished`);
      }

      const result = applyDeviceTransition(deployment, from, to);
      if (result.clamped) {
        deploymentLogger.warn(
          { deploymentId: id, deviceId, from, to, dropped: result.dropped },
          'Device status counter already at zero, transition clamped'
        );
      }

      let next = result.deployment;
      if (isFinished(next)) {
        next = markFinished(next, this.now());
        deploymentLogger.info({ deploymentId: id }, 'Deployment finished');
      }

      await this.repository.update(next);
      return next;
    });
  }

  /**
   * Abort every device that has not finished yet and finish the deployment.
   */
  async abort(id: string): Promise<Deployment> {
    return this.updateExclusively(id, async (deployment) => {
      if (deployment.finished) {
        throw new ConflictError(`Deployment ${id} is already finished`);
      }

      const next = abortDeployment(deployment, this.now());
      await this.repository.update(next);
      deploymentLogger.info({ deploymentId: id, aborted: next.stats.aborted }, 'Deployment aborted');
      return next;
    });
  }

  /**
   * Explicitly finish a deployment. Finishing twice keeps the first timestamp.
   */
  async finish(id: string): Promise<Deployment> {
    return this.updateExclusively(id, async (deployment) => {
      if (deployment.finished) {
        return deployment;
      }

      const next = markFinished(deployment, this.now());
      await this.repository.update(next);
      deploymentLogger.info({ deploymentId: id }, 'Deployment finished explicitly');
      return next;
    });
  }

  /**
   * Load a deployment and run a read-modify-write on it under its mutex.
   * The mutex is dropped once the deployment turns out to be missing or finished,
   * so ids that will never change again hold no entry.
   */
  private async updateExclusively(
    id: string,
    fn: (deployment: Deployment) => Promise<Deployment>
  ): Promise<Deployment> {
    let settled = false;
    try {
      return await mutexManager.withDeploymentLock(id, async () => {
        let deployment: Deployment;
        try {
          deployment = await this.repository.load(id);
        } catch (error) {
          settled = isNotFoundError(error);
          throw error;
        }

        settled = deployment.finished !== null;
        const next = await fn(deployment);
        settled = next.finished !== null;
        return next;
      });
    } finally {
      if (settled) {
        mutexManager.cleanupDeploymentMutex(id);
      }
    }
  }

  private async store(deployment: Deployment, targets: string[]): Promise<Deployment> {
    const targeted = assignTargets(deployment, targets);
    if (targeted.maxDevices === 0) {
      deploymentLogger.warn(
        { deploymentId: targeted.id },
        'Deployment has no target devices and only finishes when finished explicitly'
      );
    }

    await this.repository.save(targeted);
    deploymentLogger.info(
      { deploymentId: targeted.id, name: targeted.name, type: targeted.type, devices: targeted.maxDevices },
      'Deployment created'
    );
    return targeted;
  }

  private async resolveTargets(constructor: DeploymentConstructor): Promise<string[]> {
    if (constructor.group) {
      return this.inventory.listGroupDevices(constructor.group);
    }
    if (constructor.allDevices) {
      return this.inventory.listAcceptedDevices();
    }
    return constructor.devices ?? [];
  }

  private async resolveArtifacts(artifactName: string): Promise<string[]> {
    const path = artifactPath(artifactName);
    try {
      await this.storage.statObject(path);
      return [path];
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
  }
}
