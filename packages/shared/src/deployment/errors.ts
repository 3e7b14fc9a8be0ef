export type InvalidDefinitionReason =
  | 'no-devices'
  | 'devices-all-devices-conflict'
  | 'group-targeting-conflict'
  | 'invalid-field';

const REASON_MESSAGES: Record<InvalidDefinitionReason, string> = {
  'no-devices': 'Invalid deployment definition: provide a list of devices or set the allDevices flag',
  'devices-all-devices-conflict':
    'Invalid deployment definition: a list of devices was provided together with the allDevices flag',
  'group-targeting-conflict':
    'Invalid deployment definition: a group deployment must set neither a list of devices nor the allDevices flag',
  'invalid-field': 'Invalid deployment definition',
};

/**
 * A deployment definition that can never be created as given.
 * Terminal to the create operation; callers surface it unchanged.
 */
export class InvalidDefinitionError extends Error {
  readonly reason: InvalidDefinitionReason;
  readonly issues: string[];

  constructor(reason: InvalidDefinitionReason, issues: string[] = []) {
    const base = REASON_MESSAGES[reason];
    super(issues.length > 0 ? `${base}: ${issues.join('; ')}` : base);
    this.name = 'InvalidDefinitionError';
    this.reason = reason;
    this.issues = issues;
  }
}
