export {
  ConfigError,
  DataFaucetError,
  ShutdownTimeoutError,
  SinkDeleteError,
  SinkDeliveryError,
  SynthesisError,
  describeError,
  type ErrorCode,
} from './errors'
export {
  createLogger,
  formatFields,
  parseLogLevel,
  silentLogger,
  type LogFields,
  type LogLevel,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './logger'
export {
  createAbortError,
  isAbortError,
  sleepUnlessAborted,
  systemClock,
  type Clock,
} from './clock'
export { ManualClock } from './manual-clock'
