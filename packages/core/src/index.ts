/**
 * @wayfarer/core
 *
 * Logging, typed errors and configuration shared by the engine packages.
 */

export {
  createLogger,
  createMemorySink,
  consoleSink,
  silentLogger,
  isLogThreshold,
  LOG_THRESHOLDS,
} from './logger.js';
export type {
  Logger,
  LoggerOptions,
  LogLevel,
  LogThreshold,
  LogContext,
  LogRecord,
  LogSink,
  MemorySink,
} from './logger.js';

export {
  EngineError,
  EngineConfigError,
  SubscriberFaultError,
  StateHookFaultError,
  SubsystemFaultError,
  describeError,
} from './errors.js';
export type { StateHook, SubsystemPhase } from './errors.js';

export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  parseEngineConfigText,
  extractEngineConfig,
  readEngineConfigFromEnv,
  loadEngineConfig,
} from './config.js';
export type { EngineConfig, EngineConfigSources } from './config.js';
