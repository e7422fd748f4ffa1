export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
