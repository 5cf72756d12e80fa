/**
 * Poller
 *
 * Fixed-interval acquisition loop with a DISCONNECTED/CONNECTED state
 * machine. The poller is the only writer: it publishes each cycle to the
 * state store, then records samples and trip events. A cycle cut short by
 * a connection fault still publishes the reads taken before it.
 */

import { createTripTracker } from '@core/edge-detector';
import { fmtReading } from '@logging';
import { findDevice } from '@system/state';
import { formatDisplayTimestamp, formatStorageTimestamp } from '@utils/time';

import { createCycleReader, initialStats, readCycle } from './helpers';

import type { AppendResult } from '@persistence';
import type { CycleReadings, Poller, PollerConfig, PollerDependencies, PollerState, StepOutcome } from './types';

/**
 * Create the poller
 *
 * @param config - Interval and connect-attempt limit
 * @param deps - Collaborators, all injected
 *
 * @example
 * ```typescript
 * const poller = createPoller({ pollIntervalSec: 2, maxConnectAttempts: null }, {
 *   tagMap, client, store, persistence, logger,
 *   clock: function() { return new Date(); },
 *   sleep: sleep
 * });
 * const controller = new AbortController();
 * await poller.run(controller.signal);
 * ```
 */
export function createPoller(config: PollerConfig, deps: PollerDependencies): Poller {
  const tagMap = deps.tagMap;
  const client = deps.client;
  const logger = deps.logger;
  const intervalMs = config.pollIntervalSec * 1000;
  const tracker = createTripTracker(tagMap.pumps.map(function(pump) { return pump.id; }));
  const stats = initialStats();

  let state: PollerState = 'DISCONNECTED';
  let connectStreak = 0;

  function counted(result: AppendResult): void {
    if (!result.ok) {
      stats.persistenceFailures++;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // RECORDING
  // ═══════════════════════════════════════════════════════════════

  /**
   * Append one sample per fully read pump from the published snapshot,
   * then check the raw trip reading for a rising edge
   */
  function record(readings: CycleReadings, timestamp: string): void {
    const snapshot = deps.store.snapshot();

    for (const update of readings.pumps) {
      if (!readings.completePumps.includes(update.id)) continue;
      const device = findDevice(snapshot, 'pump', update.id);
      if (device === null) continue;

      counted(deps.persistence.appendSample({
        timestamp: timestamp,
        deviceId: device.id,
        pressure: device.pressure,
        speed: device.speed,
        ready: device.ready,
        running: device.running,
        trip: device.trip
      }));

      const trip = update.fields.trip === undefined ? null : update.fields.trip;
      if (tracker.observe(device.id, trip)) {
        stats.eventsEmitted++;
        counted(deps.persistence.appendEvent({
          timestamp: timestamp,
          deviceId: device.id,
          event: 'TRIP',
          pressure: device.pressure,
          speed: device.speed
        }));
        logger.warning('TRIP: ' + device.label + ' (' + device.id + ') pressure=' +
          fmtReading(device.pressure, '') + ', speed=' + fmtReading(device.speed, ''));
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // STATES
  // ═══════════════════════════════════════════════════════════════

  async function cycle(): Promise<StepOutcome> {
    const reader = createCycleReader(client, logger);
    const readings = await readCycle(tagMap, reader);

    const at = deps.clock();
    const timestamp = formatStorageTimestamp(at);
    deps.store.applyCycle({
      ts: formatDisplayTimestamp(at),
      home: readings.home,
      pumps: readings.pumps,
      chillers: readings.chillers
    });

    const fault = reader.fault();
    if (fault !== null) {
      deps.store.markReadError();
      record(readings, timestamp);
      await client.disconnect();
      state = 'DISCONNECTED';
      stats.connectionFaults++;
      logger.warning('Connection lost during poll cycle: ' + fault);
      return 'fault';
    }

    record(readings, timestamp);

    stats.cyclesCompleted++;
    stats.lastCycleAt = timestamp;
    return 'cycle';
  }

  async function connect(): Promise<StepOutcome> {
    const result = await client.connect();
    if (!result.ok) {
      stats.connectFailures++;
      connectStreak++;
      if (connectStreak === 1) {
        logger.warning('Cannot connect to ' + tagMap.endpoint.host + ': ' + result.message);
      } else {
        logger.debug('Connect attempt ' + connectStreak + ' failed: ' + result.message);
      }
      if (config.maxConnectAttempts !== null && connectStreak >= config.maxConnectAttempts) {
        logger.critical('Giving up after ' + connectStreak + ' failed connection attempts');
        return 'gave-up';
      }
      return 'connect-failed';
    }

    if (connectStreak > 0) {
      logger.info('Connected to ' + tagMap.endpoint.host + ' after ' + connectStreak + ' failed attempts');
    } else {
      logger.info('Connected to ' + tagMap.endpoint.host);
    }
    connectStreak = 0;
    state = 'CONNECTED';
    return cycle();
  }

  function step(): Promise<StepOutcome> {
    return state === 'CONNECTED' ? cycle() : connect();
  }

  async function run(signal: AbortSignal): Promise<void> {
    logger.info('Polling every ' + config.pollIntervalSec + 's');
    try {
      while (!signal.aborted) {
        const outcome = await step();
        if (outcome === 'gave-up' || signal.aborted) {
          break;
        }
        await deps.sleep(intervalMs, signal);
      }
    } finally {
      await client.disconnect();
      state = 'DISCONNECTED';
      logger.info('Poller stopped after ' + stats.cyclesCompleted + ' cycles');
    }
  }

  return {
    run: run,
    step: step,
    state: function() { return state; },
    stats: function() { return { ...stats }; }
  };
}
