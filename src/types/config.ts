/**
 * Validated configuration types
 * Produced once at startup by validateConfig and never mutated
 */

import type { TagMap } from '@core/tag-map/types';
import type { LogLevel } from '@logging/types';

export interface SlackSettings {
  enabled: boolean;
  webhookUrl: string | null;
  /** Lowest level forwarded to Slack */
  minLevel: LogLevel;
  bufferSize: number;
  retryDelayMs: number;
  maxRetries: number;
}

export interface LoggingSettings {
  level: LogLevel;
  /** Hours after which INFO is suppressed (0 disables) */
  demoteHours: number;
  /** Prefix console lines with the local time */
  timestamps: boolean;
  slack: SlackSettings;
}

export interface LiveFeedSettings {
  enabled: boolean;
  host: string;
  port: number;
}

export interface PlantConfig {
  /** Endpoint and every configured signal */
  tags: TagMap;
  pollIntervalSec: number;
  /** null retries forever */
  maxConnectAttempts: number | null;
  databasePath: string;
  logging: LoggingSettings;
  live: LiveFeedSettings;
}

/**
 * Environment values that override the configuration document
 */
export interface ConfigOverrides {
  database?: string;
  logLevel?: string;
  slackWebhookUrl?: string;
  livePort?: string;
}
