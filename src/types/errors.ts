/**
 * Global error types for the telemetry service
 * Fatal configuration errors and transport-level failures
 */

/**
 * A single field-level configuration problem
 */
export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the configuration file is missing, unreadable or invalid.
 * The service must not start after this error.
 */
export class ConfigurationError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error raised by a register transport. Never escapes the device client.
 */
export class TransportError extends Error {
  readonly address: string | null;

  constructor(message: string, address: string | null = null) {
    super(message);
    this.name = 'TransportError';
    this.address = address;
  }
}

/**
 * Error raised when the controller does not answer within the read timeout
 */
export class TransportTimeoutError extends TransportError {
  constructor(message: string, address: string | null = null) {
    super(message, address);
    this.name = 'TransportTimeoutError';
  }
}

/**
 * Render any thrown value as a log-friendly message
 * @param err - Caught value
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
