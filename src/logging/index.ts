/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Slack sink with webhook retry buffer (createSlackSink)
 * - Pure filter and format functions
 */

export { LOG_LEVELS, parseLogLevel, formatLogMessage, shouldLog, fmtReading } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink } from './slack';
export { NODE_TIMERS } from './slack/slack-sink';
export { createLogger, createSilentLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  LogLevelName,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  HttpPost,
  TimerAPI,
  TimerHandle,
  FilterContext,
  InitMessage
} from './types';
