/**
 * Deployment entity construction and state changes.
 * Each operation returns a new Deployment; the input is left untouched.
 */

import { v4 as uuidv4, validate as isUuid } from 'uuid';
import {
  TERMINAL_DEVICE_STATUSES,
  DEVICE_DEPLOYMENT_STATUSES,
  type Deployment,
  type DeploymentConstructor,
  type DeploymentType,
  type DeviceDeploymentStatus,
} from '../types/deployment.js';
import { applyStatusTransition, emptyStats } from './stats.js';

export interface CreateDeploymentOptions {
  type?: DeploymentType;
  /** Only kept for configuration deployments */
  configuration?: Uint8Array;
  artifacts?: string[];
  now?: () => Date;
  generateId?: () => string;
}

export interface DeviceTransitionResult {
  deployment: Deployment;
  clamped: boolean;
  dropped: boolean;
}

/**
 * Create a pending deployment from an already validated constructor.
 * Targets are not resolved here; see assignTargets.
 */
export function createDeployment(
  constructor: DeploymentConstructor,
  options: CreateDeploymentOptions = {}
): Deployment {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? uuidv4;
  const type = options.type ?? 'software';

  return {
    id: generateId(),
    name: constructor.name,
    artifactName: constructor.artifactName,
    devices: [...(constructor.devices ?? [])],
    allDevices: constructor.allDevices === true,
    group: constructor.group ? constructor.group : undefined,
    created: now(),
    finished: null,
    artifacts: [...(options.artifacts ?? [])],
    stats: emptyStats(),
    deviceCount: 0,
    maxDevices: 0,
    deviceList: [],
    type,
    configuration: type === 'configuration' ? options.configuration : undefined,
  };
}

/**
 * Fix the resolved target set. Every targeted device starts out pending.
 */
export function assignTargets(deployment: Deployment, deviceIds: readonly string[]): Deployment {
  const deviceList = [...new Set(deviceIds)];
  return {
    ...deployment,
    deviceList,
    deviceCount: deviceList.length,
    maxDevices: deviceList.length,
    stats: { ...emptyStats(), pending: deviceList.length },
  };
}

export function applyDeviceTransition(
  deployment: Deployment,
  from: DeviceDeploymentStatus,
  to: DeviceDeploymentStatus
): DeviceTransitionResult {
  const { stats, clamped, dropped } = applyStatusTransition(deployment, from, to);
  return { deployment: { ...deployment, stats }, clamped, dropped };
}

/**
 * Set the finished timestamp. Once set it never changes.
 */
export function markFinished(deployment: Deployment, at: Date = new Date()): Deployment {
  if (deployment.finished) {
    return deployment;
  }
  return { ...deployment, finished: at };
}

/**
 * Abort every device that has not reached a terminal outcome and finish the deployment.
 */
export function abortDeployment(deployment: Deployment, at: Date = new Date()): Deployment {
  const stats = { ...deployment.stats };
  for (const status of DEVICE_DEPLOYMENT_STATUSES) {
    if (status === 'aborted' || TERMINAL_DEVICE_STATUSES.includes(status)) {
      continue;
    }
    stats.aborted += stats[status];
    stats[status] = 0;
  }
  return markFinished({ ...deployment, stats }, at);
}

/**
 * Entity level checks on a loaded or constructed deployment.
 * Returns the list of problems, empty when valid.
 */
export function validateDeployment(deployment: Deployment): string[] {
  const issues: string[] = [];

  if (!isUuid(deployment.id)) {
    issues.push('id must be a UUID');
  }
  if (Number.isNaN(deployment.created.getTime())) {
    issues.push('created is required');
  }
  if (deployment.artifacts.some((artifact) => artifact.length === 0)) {
    issues.push('artifacts must not contain empty entries');
  }
  if (deployment.deviceList.some((deviceId) => deviceId.length === 0)) {
    issues.push('deviceList must not contain empty entries');
  }

  return issues;
}
