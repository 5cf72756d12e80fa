/**
 * Poller helper functions
 */

import type { BoolTagRef, RealTagRef, TagMap } from '@core/tag-map';
import type { DeviceClient, ReadResult } from '@hardware/device-client';
import type { Logger } from '@logging';
import type { DeviceFields, DeviceUpdate } from '@system/state';
import type { CycleReader, CycleReadings, PollerStats } from './types';

export function initialStats(): PollerStats {
  return {
    cyclesCompleted: 0,
    connectFailures: 0,
    connectionFaults: 0,
    persistenceFailures: 0,
    eventsEmitted: 0,
    lastCycleAt: null
  };
}

/**
 * Create a reader for one cycle
 *
 * Per-tag failures are logged at DEBUG and give no value. The first
 * connection failure is recorded and every later read returns no value
 * without touching the client.
 *
 * @param client - Device client
 * @param logger - Receives per-tag failures
 */
export function createCycleReader(client: DeviceClient, logger: Logger): CycleReader {
  let fault: string | null = null;

  function settle<T>(signal: string, result: ReadResult<T>): T | undefined {
    if (result.ok) {
      return result.value;
    }
    if (result.kind === 'connection') {
      fault = result.message;
    } else {
      logger.debug('Read of ' + signal + ' failed (' + result.kind + '): ' + result.message);
    }
    return undefined;
  }

  return {
    real: async function(block, offset, signal) {
      if (fault !== null) return undefined;
      return settle(signal, await client.readReal(block, offset));
    },
    bool: async function(block, byte, bit, signal) {
      if (fault !== null) return undefined;
      return settle(signal, await client.readBool(block, byte, bit));
    },
    fault: function() { return fault; }
  };
}

function readReal(reader: CycleReader, ref: RealTagRef | undefined): Promise<number | undefined> {
  if (ref === undefined || ref.kind === 'malformed') {
    return Promise.resolve(undefined);
  }
  return reader.real(ref.block, ref.offset, ref.signal);
}

function readBool(reader: CycleReader, ref: BoolTagRef | undefined): Promise<boolean | undefined> {
  if (ref === undefined || ref.kind === 'malformed') {
    return Promise.resolve(undefined);
  }
  return reader.bool(ref.block, ref.byte, ref.bit, ref.signal);
}

/**
 * Read every configured tag: home, then pumps and chillers in order
 *
 * Reads run one after another on the single connection. Missing and
 * malformed tags give no value. After a connection failure the remaining
 * reads give no value and later pumps are not listed as complete.
 */
export async function readCycle(tagMap: TagMap, reader: CycleReader): Promise<CycleReadings> {
  const home = {
    kwh: await readReal(reader, tagMap.home.kwh),
    level: await readReal(reader, tagMap.home.level),
    temp: await readReal(reader, tagMap.home.temp),
    alarm: await readBool(reader, tagMap.home.alarm)
  };

  const pumps: DeviceUpdate[] = [];
  const completePumps: string[] = [];
  for (const pump of tagMap.pumps) {
    const fields: DeviceFields = {
      ready: await readBool(reader, pump.tags.ready),
      running: await readBool(reader, pump.tags.running),
      trip: await readBool(reader, pump.tags.trip),
      pressure: await readReal(reader, pump.tags.pressure),
      speed: await readReal(reader, pump.tags.speed)
    };
    pumps.push({ id: pump.id, fields: fields });
    if (reader.fault() === null) {
      completePumps.push(pump.id);
    }
  }

  const chillers: DeviceUpdate[] = [];
  for (const chiller of tagMap.chillers) {
    const fields: DeviceFields = {
      ready: await readBool(reader, chiller.tags.ready),
      running: await readBool(reader, chiller.tags.running),
      trip: await readBool(reader, chiller.tags.trip)
    };
    chillers.push({ id: chiller.id, fields: fields });
  }

  return { home: home, pumps: pumps, chillers: chillers, completePumps: completePumps };
}
