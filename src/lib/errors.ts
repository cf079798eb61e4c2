/**
 * Error taxonomy shared by the stores, the mutation coordinator and the API.
 *
 * Stores and the coordinator throw these; DashboardApi turns them into
 * result objects. Anything that is not a DashboardError is reported as
 * INTERNAL.
 */

export type DashboardErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'CONFLICT' | 'INTERNAL';

export type ErrorDetails = Record<string, unknown>;

export abstract class DashboardError extends Error {
  abstract readonly code: DashboardErrorCode;
  readonly details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ValidationError extends DashboardError {
  readonly code = 'VALIDATION';
}

export class NotFoundError extends DashboardError {
  readonly code = 'NOT_FOUND';
}

export class ConflictError extends DashboardError {
  readonly code = 'CONFLICT';
}

export class InternalError extends DashboardError {
  readonly code = 'INTERNAL';
}

export function isDashboardError(err: unknown): err is DashboardError {
  return err instanceof DashboardError;
}

/**
 * Wraps unknown failures (SQLite errors, a failed log write) so callers
 * only ever see the four codes above.
 */
export function toDashboardError(err: unknown, operation: string): DashboardError {
  if (isDashboardError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(`${operation} failed: ${message}`, undefined, { cause: err });
}
