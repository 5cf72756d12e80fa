/**
 * Boot type definitions
 */

import type { Clock } from '$types/common';
import type { PlantConfig } from '$types/config';
import type { RegisterTransport } from '@hardware/s7';
import type { ConsoleAPI, HttpPost, Logger, TimerAPI } from '@logging';
import type { PersistenceStore } from '@persistence';
import type { Poller } from '@system/poller';
import type { PlantApi } from '@system/api';
import type { StateStore } from '@system/state';
import type { ValidationIssue } from '@validation';

export type ReadTextFile = (filePath: string) => string;

export interface LoadedConfig {
  /** Absolute path the document was read from */
  source: string;
  config: PlantConfig;
  warnings: ValidationIssue[];
}

/**
 * Process-level collaborators, replaced in tests
 */
export interface RuntimeDependencies {
  consoleApi: ConsoleAPI;
  post: HttpPost;
  timers: TimerAPI;
  clock: Clock;
  /** Defaults to an S7 transport on the configured endpoint */
  transport?: RegisterTransport;
}

/**
 * Everything the run command needs, wired together
 */
export interface Service {
  config: PlantConfig;
  logger: Logger;
  store: StateStore;
  persistence: PersistenceStore;
  poller: Poller;
  api: PlantApi;
  /** Close the logger and the database */
  close(): void;
}
