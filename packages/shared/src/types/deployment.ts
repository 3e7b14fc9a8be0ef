export const DEVICE_DEPLOYMENT_STATUSES = [
  'downloading',
  'installing',
  'rebooting',
  'success',
  'already-installed',
  'failure',
  'aborted',
  'no-artifact',
  'decommissioned',
  'pause-before-install',
  'pause-before-commit',
  'pause-before-reboot',
  'pending',
] as const;

export type DeviceDeploymentStatus = (typeof DEVICE_DEPLOYMENT_STATUSES)[number];

export const DEPLOYMENT_STATUSES = ['pending', 'inprogress', 'finished'] as const;

export type DeploymentStatus = (typeof DEPLOYMENT_STATUSES)[number];

export const DEPLOYMENT_TYPES = ['software', 'configuration'] as const;

export type DeploymentType = (typeof DEPLOYMENT_TYPES)[number];

/**
 * Device statuses that move a deployment out of "pending".
 * Everything except pending itself and decommissioned.
 */
export const ACTIVE_DEVICE_STATUSES: readonly DeviceDeploymentStatus[] = [
  'downloading',
  'installing',
  'rebooting',
  'success',
  'already-installed',
  'failure',
  'aborted',
  'no-artifact',
  'pause-before-install',
  'pause-before-commit',
  'pause-before-reboot',
];

/** Device statuses a device never leaves on its own. */
export const TERMINAL_DEVICE_STATUSES: readonly DeviceDeploymentStatus[] = [
  'already-installed',
  'success',
  'failure',
  'no-artifact',
  'decommissioned',
  'aborted',
];

export function isDeviceDeploymentStatus(value: unknown): value is DeviceDeploymentStatus {
  return typeof value === 'string' && (DEVICE_DEPLOYMENT_STATUSES as readonly string[]).includes(value);
}

export function isDeploymentStatus(value: unknown): value is DeploymentStatus {
  return typeof value === 'string' && (DEPLOYMENT_STATUSES as readonly string[]).includes(value);
}

export function isDeploymentType(value: unknown): value is DeploymentType {
  return typeof value === 'string' && (DEPLOYMENT_TYPES as readonly string[]).includes(value);
}

/** Per-status device counters of a single deployment. */
export type DeploymentStats = Record<DeviceDeploymentStatus, number>;

/**
 * User supplied input for creating a deployment.
 * Exactly one targeting mode applies: explicit devices, all devices or a group.
 */
export interface DeploymentConstructor {
  name: string;
  artifactName: string;
  devices?: string[];
  allDevices?: boolean;
  group?: string;
}

export interface Deployment {
  readonly id: string;
  readonly name: string;
  readonly artifactName: string;
  // Targeting inputs, never exposed through the external view
  readonly devices: readonly string[];
  readonly allDevices: boolean;
  readonly group?: string;
  readonly created: Date;
  readonly finished: Date | null;
  readonly artifacts: readonly string[];
  readonly stats: Readonly<DeploymentStats>;
  readonly deviceCount: number;
  readonly maxDevices: number;
  readonly deviceList: readonly string[];
  // Records written before deployment types existed have no type
  readonly type?: DeploymentType;
  readonly configuration?: Uint8Array;
}

/** External representation of a deployment. */
export interface DeploymentView {
  id: string;
  name: string;
  artifactName: string;
  created: string;
  finished?: string;
  status: DeploymentStatus;
  deviceCount: number;
  maxDevices?: number;
  artifacts?: string[];
  type: DeploymentType;
  configuration?: string;
}

export const STATUS_QUERIES = ['any', 'pending', 'inprogress', 'finished', 'aborted'] as const;

export type StatusQuery = (typeof STATUS_QUERIES)[number];

export type SortDirection = 'asc' | 'desc';

/**
 * Deployment lookup filter handed to the persistence layer.
 */
export interface DeploymentQuery {
  /** Case-insensitive match against deployment name or artifact name */
  searchText?: string;
  type?: DeploymentType;
  /** "aborted" selects finished deployments with at least one aborted device */
  status: StatusQuery;
  limit: number;
  skip: number;
  /** Inclusive lower bound on creation time */
  createdAfter?: Date;
  /** Inclusive upper bound on creation time */
  createdBefore?: Date;
  /** Order by creation time */
  sort: SortDirection;
}
