/**
 * Configuration loading
 *
 * Reads the JSON configuration document, applies environment overrides
 * and validates the result once. Anything wrong here is fatal: the
 * service must not start on a configuration it cannot trust.
 */

import * as fs from 'fs';
import * as path from 'path';

import * as dotenv from 'dotenv';

import { ConfigurationError, describeError } from '$types/errors';
import { validateConfig } from '@validation';

import type { ConfigOverrides } from '$types/config';
import type { LoadedConfig, ReadTextFile } from './types';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_ENV_PATH = '.env';

/**
 * Load `.env` into the process environment
 *
 * A missing file is not an error; variables already set in the
 * environment take precedence.
 *
 * @param envPath - Path of the dotenv file
 * @returns True when a file was loaded
 */
export function loadEnvironment(envPath: string = DEFAULT_ENV_PATH): boolean {
  if (!fs.existsSync(envPath)) {
    return false;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigurationError('Cannot load ' + envPath + ': ' + result.error.message);
  }
  return true;
}

/**
 * Pick the configuration path: command line, then PLANT_CONFIG, then default
 */
export function resolveConfigPath(cliPath: string | undefined, env: NodeJS.ProcessEnv): string {
  if (cliPath) return cliPath;
  if (env.PLANT_CONFIG) return env.PLANT_CONFIG;
  return DEFAULT_CONFIG_PATH;
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Environment variables that override the document
 * Empty variables count as unset.
 */
export function readOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    database: present(env.PLANT_DB),
    logLevel: present(env.LOG_LEVEL),
    slackWebhookUrl: present(env.SLACK_WEBHOOK_URL),
    livePort: present(env.LIVE_FEED_PORT)
  };
}

function readUtf8(filePath: string): string {
  return fs.readFileSync(filePath, 'utf8');
}

/**
 * Read, parse and validate the configuration
 *
 * @param configPath - JSON document path
 * @param env - Environment holding the overrides
 * @param readFile - File reader
 * @returns Validated configuration and its warnings
 * @throws ConfigurationError when the file is missing, unreadable, not JSON or invalid
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
  readFile: ReadTextFile = readUtf8
): LoadedConfig {
  const source = path.resolve(configPath);

  let text: string;
  try {
    text = readFile(source);
  } catch (err) {
    throw new ConfigurationError('Cannot read configuration ' + source + ': ' + describeError(err));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError('Configuration ' + source + ' is not valid JSON: ' + describeError(err));
  }

  const validation = validateConfig(raw, readOverrides(env));
  if (!validation.valid || validation.config === null) {
    throw new ConfigurationError(
      'Configuration ' + source + ' is invalid (' + validation.errors.length + ' errors)',
      validation.errors
    );
  }

  return { source: source, config: validation.config, warnings: validation.warnings };
}
