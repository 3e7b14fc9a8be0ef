/**
 * Errors raised by the persistence and storage collaborators.
 * Absent deployments and absent objects share NotFoundError so callers branch once.
 */

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export type StorageOp =
  | 'health-check'
  | 'put-object'
  | 'delete-object'
  | 'stat-object'
  | 'open-object'
  | 'get-request'
  | 'put-request'
  | 'delete-request';

export class StorageOpError extends Error {
  readonly op: StorageOp;

  constructor(op: StorageOp, message: string, cause?: unknown) {
    super(`${op}: ${message}`, { cause });
    this.name = 'StorageOpError';
    this.op = op;
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
