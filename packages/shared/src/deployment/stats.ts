/**
 * Deployment status derivation from per-device counters.
 *
 * Every function here works on an immutable snapshot; applying a transition
 * returns a new counter map.
 */

import {
  ACTIVE_DEVICE_STATUSES,
  DEVICE_DEPLOYMENT_STATUSES,
  TERMINAL_DEVICE_STATUSES,
  type DeploymentStats,
  type DeploymentStatus,
  type DeviceDeploymentStatus,
} from '../types/deployment.js';

export interface StatusSnapshot {
  readonly stats: Readonly<DeploymentStats>;
  readonly maxDevices: number;
  readonly finished?: Date | null;
}

export interface TransitionResult {
  stats: DeploymentStats;
  /** The old status counter was already zero and stayed there */
  clamped: boolean;
  /** The new status was not counted because the total already reached maxDevices */
  dropped: boolean;
}

export function emptyStats(): DeploymentStats {
  return {
    downloading: 0,
    installing: 0,
    rebooting: 0,
    success: 0,
    'already-installed': 0,
    failure: 0,
    aborted: 0,
    'no-artifact': 0,
    decommissioned: 0,
    'pause-before-install': 0,
    'pause-before-commit': 0,
    'pause-before-reboot': 0,
    pending: 0,
  };
}

export function totalCount(stats: Readonly<DeploymentStats>): number {
  return DEVICE_DEPLOYMENT_STATUSES.reduce((sum, status) => sum + stats[status], 0);
}

function sumOf(stats: Readonly<DeploymentStats>, statuses: readonly DeviceDeploymentStatus[]): number {
  return statuses.reduce((sum, status) => sum + stats[status], 0);
}

export function isNotPending(snapshot: StatusSnapshot): boolean {
  return ACTIVE_DEVICE_STATUSES.some((status) => snapshot.stats[status] > 0);
}

/**
 * A deployment is finished once explicitly terminated, or once every targeted
 * device reached a terminal outcome. With no targets only explicit termination counts.
 */
export function isFinished(snapshot: StatusSnapshot): boolean {
  if (snapshot.finished) {
    return true;
  }
  return snapshot.maxDevices > 0 && sumOf(snapshot.stats, TERMINAL_DEVICE_STATUSES) >= snapshot.maxDevices;
}

// Finished takes precedence: a deployment can be both active and complete
export function getDeploymentStatus(snapshot: StatusSnapshot): DeploymentStatus {
  if (isFinished(snapshot)) {
    return 'finished';
  }
  if (isNotPending(snapshot)) {
    return 'inprogress';
  }
  return 'pending';
}

/**
 * Move one device from `from` to `to`.
 *
 * The old counter never drops below zero. When it was already zero the device
 * was not counted, so the new counter is only raised while the total stays
 * within maxDevices. No deduplication happens here.
 */
export function applyStatusTransition(
  snapshot: Pick<StatusSnapshot, 'stats' | 'maxDevices'>,
  from: DeviceDeploymentStatus,
  to: DeviceDeploymentStatus
): TransitionResult {
  const stats: DeploymentStats = { ...snapshot.stats };
  if (from === to) {
    return { stats, clamped: false, dropped: false };
  }

  const clamped = stats[from] === 0;
  if (!clamped) {
    stats[from] -= 1;
  }

  const dropped = clamped && totalCount(stats) >= snapshot.maxDevices;
  if (!dropped) {
    stats[to] += 1;
  }

  return { stats, clamped, dropped };
}
