/**
 * Console output sink
 *
 * Writes every message straight to the console, optionally prefixed with
 * the local wall-clock time. WARNING and CRITICAL lines go to console.warn
 * so they land on stderr under Node.
 */

import { formatDisplayTimestamp } from '@utils/time';

import type { Clock } from '$types/common';
import type { LogSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @param clock - Time source for the line prefix
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { timestamps: true }, () => new Date());
 * consoleSink.write('ℹ️ [INFO]     Connected to 192.168.0.10');
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  clock: Clock
): LogSink {
  function write(formattedMessage: string): void {
    const line = config.timestamps
      ? formatDisplayTimestamp(clock()) + ' ' + formattedMessage
      : formattedMessage;

    if (formattedMessage.indexOf('[WARNING]') !== -1 || formattedMessage.indexOf('[CRITICAL]') !== -1) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
