/**
 * Poller type definitions
 */

import type { Clock } from '$types/common';
import type { TagMap } from '@core/tag-map';
import type { DeviceClient } from '@hardware/device-client';
import type { Logger } from '@logging';
import type { PersistenceStore } from '@persistence';
import type { DeviceUpdate, HomeFields, StateStore } from '@system/state';

export type PollerState = 'DISCONNECTED' | 'CONNECTED';

/**
 * What one iteration of the loop did
 * - cycle: a full cycle was published and recorded
 * - connect-failed: still DISCONNECTED
 * - fault: the link dropped mid-cycle; reads taken before it were published
 * - gave-up: maxConnectAttempts consecutive connect failures
 */
export type StepOutcome = 'cycle' | 'connect-failed' | 'fault' | 'gave-up';

export interface PollerStats {
  cyclesCompleted: number;
  connectFailures: number;
  connectionFaults: number;
  persistenceFailures: number;
  eventsEmitted: number;
  /** Storage timestamp of the last published cycle */
  lastCycleAt: string | null;
}

export interface PollerConfig {
  pollIntervalSec: number;
  /** Consecutive failed connects before run() gives up; null retries forever */
  maxConnectAttempts: number | null;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollerDependencies {
  tagMap: TagMap;
  client: DeviceClient;
  store: StateStore;
  persistence: Pick<PersistenceStore, 'appendSample' | 'appendEvent'>;
  logger: Logger;
  clock: Clock;
  sleep: SleepFn;
}

/**
 * Readings of one cycle before they reach the state store
 */
export interface CycleReadings {
  home: HomeFields;
  pumps: DeviceUpdate[];
  chillers: DeviceUpdate[];
  /** Pumps whose every read ran before a connection failure */
  completePumps: string[];
}

/**
 * Reads tags for one cycle, stopping at the first connection failure
 */
export interface CycleReader {
  real(block: number, offset: number, signal: string): Promise<number | undefined>;
  bool(block: number, byte: number, bit: number, signal: string): Promise<boolean | undefined>;
  /** Message of the connection failure that ended the cycle, if any */
  fault(): string | null;
}

export interface Poller {
  /** Loop until the signal aborts or connecting is given up */
  run(signal: AbortSignal): Promise<void>;
  /** One connect attempt or one cycle, without sleeping */
  step(): Promise<StepOutcome>;
  state(): PollerState;
  stats(): PollerStats;
}
