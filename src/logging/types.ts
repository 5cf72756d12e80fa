/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, slack)
 * - Filter context
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

/**
 * Level names accepted in configuration files and environment variables
 */
export type LogLevelName = 'debug' | 'info' | 'warning' | 'critical';

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Initialize all sinks, resolving with one message per sink that needed it */
  initialize(): Promise<InitMessage[]>;
  /** Release sink timers so the process can exit */
  close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink */
  write(formattedMessage: string): void;
  /** Optional asynchronous setup */
  initialize?(): Promise<InitMessage>;
  /** Optional teardown of timers and buffers */
  close?(): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Prefix every line with the local time */
  timestamps: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Slack sink interface
 * Buffers messages and retries with exponential backoff
 */
export interface SlackSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): void;
  isInitialized(): boolean;
  /** Get current buffer size (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * Slack sink configuration
 */
export interface SlackSinkConfig {
  enabled: boolean;
  /** Incoming webhook URL; null when none is configured */
  webhookUrl: string | null;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (exponential: 1000 -> 2000 -> 4000...) */
  retryDelayMs: number;
  /** Maximum retry attempts before dropping message */
  maxRetries: number;
}

/**
 * Minimal HTTP POST used by the Slack sink; the global fetch satisfies it
 */
export type HttpPost = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; statusText: string }>;

/**
 * Handle to a scheduled one-shot timer
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * Timer abstraction for retry scheduling
 */
export interface TimerAPI {
  set(ms: number, callback: () => void): TimerHandle;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** System uptime in seconds */
  uptime: number;
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 */
export interface InitMessage {
  success: boolean;
  /** Human-readable status message */
  message: string;
}
