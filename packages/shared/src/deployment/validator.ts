/**
 * Deployment definition validation.
 * Pure functions: the input is never mutated and results are repeatable.
 */

import type { ZodIssue } from 'zod';
import { DeploymentConstructorSchema } from '../schemas/deployment.js';
import type { DeploymentConstructor } from '../types/deployment.js';
import { InvalidDefinitionError } from './errors.js';

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: InvalidDefinitionError };

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path} ${issue.message}` : issue.message;
}

/**
 * Check required fields and their shape only.
 * Used for constructors that are displayed or stored rather than created.
 */
export function validateStructure(input: unknown): ValidationOutcome<DeploymentConstructor> {
  const result = DeploymentConstructorSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      error: new InvalidDefinitionError('invalid-field', result.error.issues.map(formatIssue)),
    };
  }
  return { ok: true, value: result.data };
}

/**
 * Full creation-time validation: structure, then the targeting mode.
 *
 * Without a group exactly one of a non-empty device list or allDevices must be set.
 * With a group neither may be set.
 */
export function validateConstructor(input: unknown): ValidationOutcome<DeploymentConstructor> {
  const structural = validateStructure(input);
  if (!structural.ok) {
    return structural;
  }

  const constructor = structural.value;
  const hasDevices = (constructor.devices?.length ?? 0) > 0;
  const allDevices = constructor.allDevices === true;

  if (!constructor.group) {
    if (!hasDevices && !allDevices) {
      return { ok: false, error: new InvalidDefinitionError('no-devices') };
    }
    if (hasDevices && allDevices) {
      return { ok: false, error: new InvalidDefinitionError('devices-all-devices-conflict') };
    }
  } else if (hasDevices || allDevices) {
    return { ok: false, error: new InvalidDefinitionError('group-targeting-conflict') };
  }

  return structural;
}

/**
 * Same as validateConstructor but throws the InvalidDefinitionError.
 */
export function assertValidConstructor(input: unknown): DeploymentConstructor {
  const outcome = validateConstructor(input);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
