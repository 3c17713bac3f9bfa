/**
 * Error codes shared by every data-faucet workspace.
 */
export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'SINK_DELIVERY_ERROR'
  | 'SINK_DELETE_ERROR'
  | 'SHUTDOWN_TIMEOUT'

/**
 * Base class for all errors raised by the generator runtime.
 */
export class DataFaucetError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Fatal configuration problem detected before any pipeline starts.
 */
export class ConfigError extends DataFaucetError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIG_ERROR', issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, options)
    this.issues = issues
  }
}

/**
 * Raised when a validated schema still fails to synthesize. Indicates a bug.
 */
export class SynthesisError extends DataFaucetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS_ERROR', message, options)
  }
}

/**
 * A sink rejected or failed to accept a whole batch.
 */
export class SinkDeliveryError extends DataFaucetError {
  readonly pipeline: string

  constructor(pipeline: string, message: string, options?: { cause?: unknown }) {
    super('SINK_DELIVERY_ERROR', message, options)
    this.pipeline = pipeline
  }
}

/**
 * A sink failed to delete an expired artifact.
 */
export class SinkDeleteError extends DataFaucetError {
  readonly location: string

  constructor(location: string, message: string, options?: { cause?: unknown }) {
    super('SINK_DELETE_ERROR', message, options)
    this.location = location
  }
}

/**
 * Some execution contexts did not confirm they stopped before the shutdown deadline.
 */
export class ShutdownTimeoutError extends DataFaucetError {
  readonly pending: string[]

  constructor(timeoutMs: number, pending: string[]) {
    super(
      'SHUTDOWN_TIMEOUT',
      `Shutdown timed out after ${timeoutMs}ms; abandoning: ${pending.join(', ')}`
    )
    this.pending = pending
  }
}

/**
 * Renders any thrown value as a single log-friendly string, following the cause chain.
 * @param error Value caught from a failed operation.
 * @returns Human readable description.
 */
export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error)
  }
  const cause = error.cause
  if (cause == null) {
    return error.message
  }
  return `${error.message} (cause: ${describeError(cause)})`
}
