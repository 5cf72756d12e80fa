/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks (console, Slack)
 * - Runtime level adjustment
 * - Async sink initialization
 */

import { LOG_LEVELS, formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   }
 * );
 *
 * logger.info('Poller started');      // Console only
 * logger.warning('TRIP on pump1');    // Console + Slack
 * ```
 */
export function createLogger(config: LoggerConfig, dependencies: LoggerDependencies): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage);
      } catch (err) {
        // Sink errors should not crash the logger
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  /**
   * Initialize all sinks that need it
   * @returns One message per initialized sink, in sink order
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];
    for (const entry of sinks) {
      if (entry.sink.initialize) {
        pending.push(entry.sink.initialize());
      }
    }
    return Promise.all(pending);
  }

  function close(): void {
    for (const entry of sinks) {
      if (entry.sink.close) {
        entry.sink.close();
      }
    }
  }

  return {
    log: log,
    debug: function(msg: string) { log(LOG_LEVELS.DEBUG, msg); },
    info: function(msg: string) { log(LOG_LEVELS.INFO, msg); },
    warning: function(msg: string) { log(LOG_LEVELS.WARNING, msg); },
    critical: function(msg: string) { log(LOG_LEVELS.CRITICAL, msg); },
    setLevel: function(newLevel: LogLevel) { currentLevel = newLevel; },
    getLevel: function() { return currentLevel; },
    initialize: initialize,
    close: close
  };
}

/**
 * Logger that discards everything; used by one-shot commands and tests
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: LOG_LEVELS.CRITICAL, demoteHours: 0 }, {
    timeSource: function() { return 0; },
    sinks: []
  });
}
