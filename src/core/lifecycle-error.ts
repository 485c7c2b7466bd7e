/**
 * LifecycleError: structured error class for the container core.
 *
 * Internal code paths throw LifecycleError to abort an operation with a
 * specific error code. Public entry points catch it and convert it to a
 * {@link LifecycleFailure} value, so callers never see a thrown error.
 */

import type { ErrorCodeValue, LifecycleFailure } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Private symbol used to brand LifecycleError instances so the guard works
 * across duplicated module instances.
 */
const LIFECYCLE_ERROR_BRAND = Symbol.for('agentdock.LifecycleError');

// ---------------------------------------------------------------------------
// LifecycleError class
// ---------------------------------------------------------------------------

export class LifecycleError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;

  /** @internal */
  readonly [LIFECYCLE_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string, retriable?: boolean) {
    super(message);
    this.name = 'LifecycleError';
    this.code = code;
    this.retriable = retriable ?? ERROR_RETRIABLE_DEFAULTS[code];
  }

  toFailure(): LifecycleFailure {
    return { code: this.code, message: this.message, retriable: this.retriable };
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

export function isLifecycleError(value: unknown): value is LifecycleError {
  if (value instanceof LifecycleError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    LIFECYCLE_ERROR_BRAND in value &&
    value[LIFECYCLE_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// Conversion helpers
// ---------------------------------------------------------------------------

/**
 * Convert any thrown value into a failure. Unknown errors are reported as
 * runtime operation failures carrying the original message.
 */
export function toFailure(err: unknown): LifecycleFailure {
  if (isLifecycleError(err)) {
    return err.toFailure();
  }
  return {
    code: ErrorCode.RUNTIME_OPERATION_FAILED,
    message: err instanceof Error ? err.message : String(err),
    retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.RUNTIME_OPERATION_FAILED],
  };
}

/** Build a failure value directly without throwing. */
export function failure(code: ErrorCodeValue, message: string): LifecycleFailure {
  return { code, message, retriable: ERROR_RETRIABLE_DEFAULTS[code] };
}
