export type ResourcePoolErrorCode = 'INVALID_VALUE' | 'OVER_RELEASE' | 'PRECISION_FAULT' | 'SCOPE_MISUSE';

export class ResourcePoolError extends Error {
  readonly code: ResourcePoolErrorCode;
  readonly details?: unknown;

  constructor(params: { code: ResourcePoolErrorCode; message: string; details?: unknown }) {
    super(params.message);
    this.name = 'ResourcePoolError';
    this.code = params.code;
    this.details = params.details;
  }
}

/** Negative initial value or bound, a value above its bound, or a non-positive amount. */
export class InvalidValueError extends ResourcePoolError {
  constructor(message: string, details?: unknown) {
    super({ code: 'INVALID_VALUE', message, details });
    this.name = 'InvalidValueError';
  }
}

/** A bounded pool was handed back more than it ever leased out. */
export class OverReleaseError extends ResourcePoolError {
  constructor(details?: unknown) {
    super({ code: 'OVER_RELEASE', message: 'released too many times', details });
    this.name = 'OverReleaseError';
  }
}

/**
 * Bound decrement arithmetic produced a negative deficit. The amount type
 * is not precise enough for bound accounting; switch to an exact one.
 */
export class PrecisionError extends ResourcePoolError {
  constructor(details?: unknown) {
    super({
      code: 'PRECISION_FAULT',
      message: 'bound decrement went negative, use an exact arithmetic (bigint or decimal) instead',
      details,
    });
    this.name = 'PrecisionError';
  }
}

export class ScopeUsageError extends ResourcePoolError {
  constructor(message: string) {
    super({ code: 'SCOPE_MISUSE', message });
    this.name = 'ScopeUsageError';
  }
}
