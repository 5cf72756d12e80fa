/**
 * Configuration validator
 *
 * Checks the raw configuration document once at startup and builds the
 * typed PlantConfig. Structural problems are errors and stop the service;
 * malformed tag addresses and values outside recommended ranges are
 * warnings.
 */

import { buildTagMap } from '@core/tag-map';
import { LOG_LEVELS } from '@logging/helpers';
import { isRecord } from '@utils/object';

import {
  addError,
  addWarning,
  booleanOr,
  levelOr,
  numberOr,
  stringOr,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNumberRange,
  validateString
} from './helpers';

import type { DeviceEndpoint } from '$types/common';
import type { ConfigOverrides, LiveFeedSettings, LoggingSettings } from '$types/config';
import type { ConfigValidationResult, ValidationIssue } from './types';

/**
 * Defaults for every optional setting
 */
export const CONFIG_DEFAULTS = {
  PLC_PORT: 102,
  PLC_RACK: 0,
  PLC_SLOT: 1,
  PLC_TIMEOUT_MS: 1500,
  POLL_INTERVAL_SEC: 2,
  DATABASE: 'logs.db',
  DEMOTE_HOURS: 0,
  SLACK_BUFFER_SIZE: 20,
  SLACK_RETRY_DELAY_MS: 1000,
  SLACK_MAX_RETRIES: 5,
  LIVE_HOST: '0.0.0.0',
  LIVE_PORT: 8765
} as const;

const TOP_LEVEL_KEYS = [
  'plc', 'poll_interval_seconds', 'max_connect_attempts', 'database',
  'home', 'pumps', 'chillers', 'logging', 'live'
];

function section(
  root: Record<string, unknown>,
  key: string,
  errors: ValidationIssue[]
): Record<string, unknown> {
  const value = root[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    addError(errors, key, `${key} must be an object`);
    return {};
  }
  return value;
}

function validateEndpoint(
  plc: Record<string, unknown>,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): DeviceEndpoint {
  if (plc.host === undefined) {
    addError(errors, 'plc.host', 'plc.host is required');
  }
  validateString(plc.host, 'plc.host', errors);
  validateIntegerRange(plc.port, 'plc.port', 1, 65535, errors, warnings);
  validateIntegerRange(plc.rack, 'plc.rack', 0, 7, errors, warnings);
  validateIntegerRange(plc.slot, 'plc.slot', 0, 31, errors, warnings);
  validateIntegerRange(plc.timeout_ms, 'plc.timeout_ms', 100, 60000, errors, warnings, 500, 5000);

  return {
    host: stringOr(plc.host, ''),
    port: numberOr(plc.port, CONFIG_DEFAULTS.PLC_PORT),
    rack: numberOr(plc.rack, CONFIG_DEFAULTS.PLC_RACK),
    slot: numberOr(plc.slot, CONFIG_DEFAULTS.PLC_SLOT),
    timeoutMs: numberOr(plc.timeout_ms, CONFIG_DEFAULTS.PLC_TIMEOUT_MS)
  };
}

function validateLogging(
  logging: Record<string, unknown>,
  overrides: ConfigOverrides,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): LoggingSettings {
  validateLogLevel(logging.level, 'logging.level', errors);
  validateNumberRange(logging.demote_hours, 'logging.demote_hours', 0, 8760, errors, warnings);
  validateBoolean(logging.timestamps, 'logging.timestamps', errors);

  if (overrides.logLevel !== undefined) {
    validateLogLevel(overrides.logLevel, 'LOG_LEVEL', errors);
  }

  let slack: Record<string, unknown> = {};
  if (logging.slack !== undefined && logging.slack !== null) {
    if (isRecord(logging.slack)) {
      slack = logging.slack;
    } else {
      addError(errors, 'logging.slack', 'logging.slack must be an object');
    }
  }
  validateBoolean(slack.enabled, 'logging.slack.enabled', errors);
  validateLogLevel(slack.min_level, 'logging.slack.min_level', errors);
  validateString(slack.webhook_url, 'logging.slack.webhook_url', errors);
  validateIntegerRange(slack.buffer_size, 'logging.slack.buffer_size', 1, 1000, errors, warnings);
  validateIntegerRange(slack.retry_delay_ms, 'logging.slack.retry_delay_ms', 100, 60000, errors, warnings);
  validateIntegerRange(slack.max_retries, 'logging.slack.max_retries', 1, 20, errors, warnings);

  const webhookUrl = overrides.slackWebhookUrl !== undefined && overrides.slackWebhookUrl.trim() !== ''
    ? overrides.slackWebhookUrl.trim()
    : stringOr(slack.webhook_url, '');
  const slackEnabled = booleanOr(slack.enabled, false);
  if (slackEnabled && webhookUrl === '') {
    addWarning(warnings, 'logging.slack.webhook_url', 'Slack is enabled but no webhook URL is set (SLACK_WEBHOOK_URL)');
  }

  return {
    level: levelOr(overrides.logLevel, levelOr(logging.level, LOG_LEVELS.INFO)),
    demoteHours: numberOr(logging.demote_hours, CONFIG_DEFAULTS.DEMOTE_HOURS),
    timestamps: booleanOr(logging.timestamps, true),
    slack: {
      enabled: slackEnabled,
      webhookUrl: webhookUrl === '' ? null : webhookUrl,
      minLevel: levelOr(slack.min_level, LOG_LEVELS.WARNING),
      bufferSize: numberOr(slack.buffer_size, CONFIG_DEFAULTS.SLACK_BUFFER_SIZE),
      retryDelayMs: numberOr(slack.retry_delay_ms, CONFIG_DEFAULTS.SLACK_RETRY_DELAY_MS),
      maxRetries: numberOr(slack.max_retries, CONFIG_DEFAULTS.SLACK_MAX_RETRIES)
    }
  };
}

function validateLive(
  live: Record<string, unknown>,
  present: boolean,
  overrides: ConfigOverrides,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): LiveFeedSettings {
  validateBoolean(live.enabled, 'live.enabled', errors);
  validateString(live.host, 'live.host', errors);
  validateIntegerRange(live.port, 'live.port', 1, 65535, errors, warnings);

  const settings: LiveFeedSettings = {
    enabled: present && booleanOr(live.enabled, true),
    host: stringOr(live.host, CONFIG_DEFAULTS.LIVE_HOST),
    port: numberOr(live.port, CONFIG_DEFAULTS.LIVE_PORT)
  };

  if (overrides.livePort !== undefined) {
    const port = /^\d+$/.test(overrides.livePort.trim()) ? parseInt(overrides.livePort, 10) : NaN;
    validateIntegerRange(port, 'LIVE_FEED_PORT', 1, 65535, errors, warnings);
    if (Number.isInteger(port) && port >= 1 && port <= 65535) {
      settings.enabled = true;
      settings.port = port;
    }
  }

  return settings;
}

/**
 * Validate a configuration document
 *
 * @param raw - Parsed JSON document
 * @param overrides - Values taken from the environment; they win over the document
 * @returns Validation result; config is set only when there are no errors
 *
 * @example
 * ```typescript
 * const result = validateConfig(JSON.parse(text), { database: process.env.PLANT_DB });
 * if (!result.valid) {
 *   throw new ConfigurationError('Invalid configuration', result.errors);
 * }
 * ```
 */
export function validateConfig(raw: unknown, overrides: ConfigOverrides = {}): ConfigValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  if (!isRecord(raw)) {
    addError(errors, '(root)', 'Configuration must be a JSON object');
    return { valid: false, errors: errors, warnings: warnings, config: null };
  }

  for (const key of Object.keys(raw)) {
    if (TOP_LEVEL_KEYS.indexOf(key) === -1) {
      addWarning(warnings, key, `${key} is not a known setting and is ignored`);
    }
  }

  if (raw.plc === undefined) {
    addError(errors, 'plc', 'plc is required');
  }
  const endpoint = validateEndpoint(section(raw, 'plc', errors), errors, warnings);

  validateIntegerRange(raw.poll_interval_seconds, 'poll_interval_seconds', 1, 3600, errors, warnings, 1, 60);
  if (raw.max_connect_attempts !== null) {
    validateIntegerRange(raw.max_connect_attempts, 'max_connect_attempts', 1, 1000000, errors, warnings);
  }
  validateString(raw.database, 'database', errors);

  const built = buildTagMap(endpoint, { home: raw.home, pumps: raw.pumps, chillers: raw.chillers });
  errors.push(...built.errors);
  warnings.push(...built.warnings);
  if (built.tagMap.pumps.length === 0) {
    addWarning(warnings, 'pumps', 'No pumps configured; no samples or events will be recorded');
  }

  const logging = validateLogging(section(raw, 'logging', errors), overrides, errors, warnings);
  const live = validateLive(
    section(raw, 'live', errors),
    raw.live !== undefined && raw.live !== null,
    overrides,
    errors,
    warnings
  );

  if (errors.length > 0) {
    return { valid: false, errors: errors, warnings: warnings, config: null };
  }

  const database = overrides.database !== undefined && overrides.database.trim() !== ''
    ? overrides.database.trim()
    : stringOr(raw.database, CONFIG_DEFAULTS.DATABASE);

  return {
    valid: true,
    errors: errors,
    warnings: warnings,
    config: {
      tags: built.tagMap,
      pollIntervalSec: numberOr(raw.poll_interval_seconds, CONFIG_DEFAULTS.POLL_INTERVAL_SEC),
      maxConnectAttempts: typeof raw.max_connect_attempts === 'number' ? raw.max_connect_attempts : null,
      databasePath: database,
      logging: logging,
      live: live
    }
  };
}
