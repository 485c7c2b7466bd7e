/**
 * Error taxonomy for agentdock.
 *
 * Every failure the container core reports carries one of these codes.
 * Codes are string constants so they survive JSON serialization and can
 * be compared without importing classes.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** Container runtime binary missing or unresponsive at startup. */
  RUNTIME_UNAVAILABLE: 'RUNTIME_UNAVAILABLE',
  /** No agent record with the given id. */
  AGENT_NOT_FOUND: 'AGENT_NOT_FOUND',
  /** Operation needs a container but the agent has none. */
  NO_CONTAINER_ATTACHED: 'NO_CONTAINER_ATTACHED',
  /** A runtime command exited non-zero, timed out, or produced bad output. */
  RUNTIME_OPERATION_FAILED: 'RUNTIME_OPERATION_FAILED',
  /** Container is running per persisted state but does not answer. */
  PROXY_UNREACHABLE: 'PROXY_UNREACHABLE',
  /** No free host port in the configured range. */
  PORT_EXHAUSTED: 'PORT_EXHAUSTED',
  /** Agent input failed schema validation. */
  INVALID_AGENT: 'INVALID_AGENT',
  /** A host filesystem operation (knowledge directory) failed. */
  STORAGE_FAILED: 'STORAGE_FAILED',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Failure payload
// ---------------------------------------------------------------------------

/** Failure value returned across the core's public boundary. */
export interface LifecycleFailure {
  code: ErrorCodeValue;
  message: string;
  retriable: boolean;
}

// ---------------------------------------------------------------------------
// Retriable defaults
// ---------------------------------------------------------------------------

/**
 * Whether a caller may reasonably retry the same operation.
 *
 * Runtime failures are retriable: a port collision or a transient engine
 * error clears on the next attempt. Missing records and missing runtimes
 * do not.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  RUNTIME_UNAVAILABLE: false,
  AGENT_NOT_FOUND: false,
  NO_CONTAINER_ATTACHED: false,
  RUNTIME_OPERATION_FAILED: true,
  PROXY_UNREACHABLE: true,
  PORT_EXHAUSTED: true,
  INVALID_AGENT: false,
  STORAGE_FAILED: false,
};
