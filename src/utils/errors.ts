/**
 * Error taxonomy for pipeline operations.
 *
 * Every failure the scheduler records carries a `kind`, which decides whether the
 * stage is retried (transient), failed outright (validation, integrity) or
 * reported back to the operator as a rejected request.
 */

export type ErrorKind =
  | 'transient'
  | 'validation'
  | 'integrity'
  | 'rejected'
  | 'conflict'
  | 'not_found'
  | 'stale'
  | 'configuration';

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientError extends PipelineError {
  readonly kind = 'transient';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export class ValidationError extends PipelineError {
  readonly kind = 'validation';
}

export class IntegrityError extends PipelineError {
  readonly kind = 'integrity';
}

export class TransitionRejectedError extends PipelineError {
  readonly kind = 'rejected';

  constructor(
    readonly itemId: string,
    readonly currentState: string,
    readonly operation: string,
    reason?: string,
  ) {
    super(reason ?? `Cannot ${operation} item ${itemId} in state ${currentState}`);
  }
}

export class ConflictError extends PipelineError {
  readonly kind = 'conflict';

  constructor(message: string, readonly existingId?: string) {
    super(message);
  }
}

export class NotFoundError extends PipelineError {
  readonly kind = 'not_found';
}

export class StaleItemError extends PipelineError {
  readonly kind = 'stale';

  constructor(readonly itemId: string, readonly expectedVersion: number) {
    super(`Item ${itemId} changed since version ${expectedVersion}`);
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'EPIPE',
  'EBUSY',
  'ERR_CANCELED',
]);

function readProperty(value: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/** Numeric HTTP status carried by an axios-style error, if any. */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const response = readProperty(error, 'response');
  if (typeof response !== 'object' || response === null) return undefined;
  const status = readProperty(response, 'status');
  return typeof status === 'number' ? status : undefined;
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code = readProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalise anything thrown by an external call into the taxonomy. Errors that
 * are already classified pass through; network faults, 5xx and 429 responses
 * become transient; other 4xx responses are validation failures.
 */
export function classifyError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;

  const status = httpStatusOf(error);
  if (status !== undefined) {
    if (status >= 500 || status === 429 || status === 408) {
      return new TransientError(`HTTP ${status}: ${errorMessage(error)}`, error);
    }
    if (status >= 400) {
      return new ValidationError(`HTTP ${status}: ${errorMessage(error)}`);
    }
  }

  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return new TransientError(`${code}: ${errorMessage(error)}`, error);
  }

  return new TransientError(errorMessage(error), error);
}
