/**
 * Unit tests for the poller
 */

import { buildTagMap } from '@core/tag-map';
import { LOG_LEVELS, createLogger } from '@logging';
import { createSqliteStore, openDatabase } from '@persistence';
import { createStateStore, initialHomeState } from '@system/state';
import { formatDisplayTimestamp } from '@utils/time';

import { createPoller } from './poller';

import type { DeviceEndpoint } from '$types/common';
import type { TagMap } from '@core/tag-map';
import type { ConnectResult, DeviceClient, ReadFailure, ReadResult } from '@hardware/device-client';
import type { Logger } from '@logging';
import type { PersistenceStore } from '@persistence';
import type { StateStore } from '@system/state';
import type { Poller, PollerDependencies, SleepFn } from './types';

const ENDPOINT: DeviceEndpoint = { host: '192.168.0.10', port: 102, rack: 0, slot: 1, timeoutMs: 1500 };
const EVERYTHING: [string, string] = ['2000-01-01 00:00:00', '2100-01-01 00:00:00'];

const PLANT = {
  home: {
    ALL_PUMPS_KWH: { db: 1, offset: 0 },
    ALARM: { db: 1, byte: 12, bit: 0 }
  },
  pumps: {
    pump1: {
      label: 'Pump 1',
      db: 10,
      ready: { byte: 0, bit: 0 },
      running: { byte: 0, bit: 1 },
      trip: { byte: 0, bit: 2 },
      pressure: { offset: 2 },
      speed: { offset: 6 }
    }
  },
  chillers: {
    chiller1: { db: 20, ready: { byte: 0, bit: 0 } }
  }
};

/**
 * Scripted device client keyed by "real:block:offset" and "bit:block:byte:bit"
 */
class FakeClient implements DeviceClient {
  connected = false;
  connectFailure: string | null = null;
  values = new Map<string, number | boolean>();
  failures = new Map<string, ReadFailure>();
  reads: string[] = [];
  disconnects = 0;

  async connect(): Promise<ConnectResult> {
    if (this.connectFailure !== null) {
      return { ok: false, message: this.connectFailure };
    }
    this.connected = true;
    return { ok: true };
  }

  async readReal(block: number, offset: number): Promise<ReadResult<number>> {
    const key = 'real:' + block + ':' + offset;
    const value = this.lookup(key);
    if (!value.ok) return value;
    return typeof value.value === 'number' ? { ok: true, value: value.value } : this.missing(key);
  }

  async readBool(block: number, byte: number, bit: number): Promise<ReadResult<boolean>> {
    const key = 'bit:' + block + ':' + byte + ':' + bit;
    const value = this.lookup(key);
    if (!value.ok) return value;
    return typeof value.value === 'boolean' ? { ok: true, value: value.value } : this.missing(key);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.disconnects++;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private lookup(key: string): ReadResult<number | boolean | undefined> {
    this.reads.push(key);
    const failure = this.failures.get(key);
    if (failure !== undefined) {
      if (failure.kind === 'connection') this.connected = false;
      return failure;
    }
    return { ok: true, value: this.values.get(key) };
  }

  private missing(key: string): ReadFailure {
    return { ok: false, kind: 'read', message: 'No value returned for ' + key };
  }
}

function healthyValues(client: FakeClient): void {
  client.values.set('real:1:0', 1234.567);
  client.values.set('bit:1:12:0', false);
  client.values.set('bit:10:0:0', true);
  client.values.set('bit:10:0:1', true);
  client.values.set('bit:10:0:2', false);
  client.values.set('real:10:2', 5.234);
  client.values.set('real:10:6', 42.5);
  client.values.set('bit:20:0:0', true);
}

describe('createPoller', () => {
  let tagMap: TagMap;
  let client: FakeClient;
  let store: StateStore;
  let persistence: PersistenceStore;
  let lines: string[];
  let logger: Logger;
  let now: Date;
  let sleeps: number[];
  let sleep: SleepFn;

  function deps(overrides: Partial<PollerDependencies> = {}): PollerDependencies {
    return {
      tagMap: tagMap,
      client: client,
      store: store,
      persistence: persistence,
      logger: logger,
      clock: function() { return now; },
      sleep: sleep,
      ...overrides
    };
  }

  function poller(maxConnectAttempts: number | null = null, overrides: Partial<PollerDependencies> = {}): Poller {
    return createPoller({ pollIntervalSec: 2, maxConnectAttempts: maxConnectAttempts }, deps(overrides));
  }

  function tick(): void {
    now = new Date(now.getTime() + 2000);
  }

  beforeEach(() => {
    tagMap = buildTagMap(ENDPOINT, PLANT).tagMap;
    client = new FakeClient();
    healthyValues(client);
    lines = [];
    logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, {
      timeSource: function() { return 0; },
      sinks: [{ sink: { write: function(line: string) { lines.push(line); } }, minLevel: LOG_LEVELS.INFO }]
    });
    store = createStateStore(tagMap, logger);
    persistence = createSqliteStore(openDatabase(':memory:'), logger);
    now = new Date('2024-01-01T10:00:00Z');
    sleeps = [];
    sleep = async function(ms) { sleeps.push(ms); };
  });

  afterEach(() => {
    persistence.close();
  });

  describe('when the device is unreachable', () => {
    beforeEach(() => {
      client.connectFailure = 'Connection to 192.168.0.10 refused: ECONNREFUSED';
    });

    it('should stay disconnected and retry every interval without recording', async () => {
      const p = poller(3);

      await p.run(new AbortController().signal);

      expect(p.state()).toBe('DISCONNECTED');
      expect(sleeps).toEqual([2000, 2000]);
      expect(p.stats().connectFailures).toBe(3);
      expect(store.snapshot().home).toEqual(initialHomeState());
      expect(persistence.querySamples('all', EVERYTHING[0], EVERYTHING[1])).toEqual([]);
      expect(client.reads).toEqual([]);
    });

    it('should warn once per outage and go critical when giving up', async () => {
      await poller(3).run(new AbortController().signal);

      expect(lines).toContain('⚠️ [WARNING]  Cannot connect to 192.168.0.10: Connection to 192.168.0.10 refused: ECONNREFUSED');
      expect(lines.filter(function(line) { return line.includes('Cannot connect'); })).toHaveLength(1);
      expect(lines).toContain('🚨 [CRITICAL] Giving up after 3 failed connection attempts');
    });

    it('should retry until aborted when attempts are unlimited', async () => {
      const controller = new AbortController();
      const p = poller(null, {
        sleep: async function(ms) {
          sleeps.push(ms);
          if (sleeps.length === 2) controller.abort();
        }
      });

      await p.run(controller.signal);

      expect(p.stats().connectFailures).toBe(2);
      expect(client.disconnects).toBe(1);
    });
  });

  describe('when connected', () => {
    it('should read a full cycle right after connecting', async () => {
      const p = poller();

      expect(await p.step()).toBe('cycle');
      expect(p.state()).toBe('CONNECTED');
      expect(client.reads).toEqual([
        'real:1:0',
        'bit:1:12:0',
        'bit:10:0:0',
        'bit:10:0:1',
        'bit:10:0:2',
        'real:10:2',
        'real:10:6',
        'bit:20:0:0'
      ]);
    });

    it('should publish the cycle and write one sample per pump', async () => {
      const p = poller();
      const ts = formatDisplayTimestamp(now);

      await p.step();

      const snapshot = store.snapshot();
      expect(snapshot.home).toEqual({ kwh: '1234.57', level: '--', temp: '--', alarm: false, ts: ts });
      expect(snapshot.pumps[0]).toEqual(expect.objectContaining({ ready: true, running: true, trip: false, pressure: 5.23, speed: 42.5, ts: ts }));
      expect(snapshot.chillers[0]).toEqual(expect.objectContaining({ ready: true, pressure: null, ts: ts }));
      expect(persistence.querySamples('all', EVERYTHING[0], EVERYTHING[1])).toEqual([
        { timestamp: '2024-01-01 10:00:00', deviceId: 'pump1', pressure: 5.23, speed: 42.5, ready: true, running: true, trip: false }
      ]);
      expect(p.stats()).toEqual(expect.objectContaining({ cyclesCompleted: 1, lastCycleAt: '2024-01-01 10:00:00' }));
    });

    it('should write exactly one event for a trip that stays engaged', async () => {
      const p = poller();

      await p.step();
      tick();
      client.values.set('bit:10:0:2', true);
      await p.step();
      tick();
      await p.step();

      expect(persistence.queryEvents('all', EVERYTHING[0], EVERYTHING[1])).toEqual([
        { timestamp: '2024-01-01 10:00:02', deviceId: 'pump1', event: 'TRIP', pressure: 5.23, speed: 42.5 }
      ]);
      expect(persistence.querySamples('pump1', EVERYTHING[0], EVERYTHING[1]).map(function(s) { return s.trip; }))
        .toEqual([false, true, true]);
      expect(p.stats().eventsEmitted).toBe(1);
      expect(lines).toContain('⚠️ [WARNING]  TRIP: Pump 1 (pump1) pressure=5.23, speed=42.50');
    });

    it('should not report a trip that is already engaged at the first reading', async () => {
      const p = poller();
      client.values.set('bit:10:0:2', true);

      await p.step();
      tick();
      client.values.set('bit:10:0:2', false);
      await p.step();
      tick();
      client.values.set('bit:10:0:2', true);
      await p.step();

      const events = persistence.queryEvents('all', EVERYTHING[0], EVERYTHING[1]);
      expect(events.map(function(e) { return e.timestamp; })).toEqual(['2024-01-01 10:00:04']);
    });

    it('should compare across a failed trip read', async () => {
      const p = poller();

      await p.step();
      tick();
      client.failures.set('bit:10:0:2', { ok: false, kind: 'read', message: 'Read of DB10,X0.2 timed out after 1500ms' });
      await p.step();
      tick();
      client.failures.clear();
      client.values.set('bit:10:0:2', true);
      await p.step();

      const events = persistence.queryEvents('all', EVERYTHING[0], EVERYTHING[1]);
      expect(events.map(function(e) { return e.timestamp; })).toEqual(['2024-01-01 10:00:04']);
    });

    it('should carry the last pressure over a failed read into state and sample', async () => {
      const p = poller();

      await p.step();
      tick();
      client.failures.set('real:10:2', { ok: false, kind: 'read', message: 'Bad quality reading DB10,REAL2' });
      client.values.set('bit:10:0:1', false);
      expect(await p.step()).toBe('cycle');

      expect(store.snapshot().pumps[0]).toEqual(expect.objectContaining({ running: false, pressure: 5.23 }));
      const samples = persistence.querySamples('pump1', EVERYTHING[0], EVERYTHING[1]);
      expect(samples[1]).toEqual({
        timestamp: '2024-01-01 10:00:02',
        deviceId: 'pump1',
        pressure: 5.23,
        speed: 42.5,
        ready: true,
        running: false,
        trip: false
      });
      expect(p.state()).toBe('CONNECTED');
    });

    it('should publish the reads taken before the connection drops', async () => {
      const p = poller();
      await p.step();
      const before = store.snapshot();
      tick();
      client.reads = [];
      client.values.set('real:1:0', 1300);
      client.values.set('bit:10:0:1', false);
      client.failures.set('bit:10:0:2', { ok: false, kind: 'connection', message: 'Connection reset' });

      expect(await p.step()).toBe('fault');

      expect(client.reads).toEqual(['real:1:0', 'bit:1:12:0', 'bit:10:0:0', 'bit:10:0:1', 'bit:10:0:2']);
      const after = store.snapshot();
      expect(after.home).toEqual({ ...before.home, kwh: '1300.00', ts: 'read error' });
      expect(after.pumps[0]).toEqual({ ...before.pumps[0], running: false, ts: formatDisplayTimestamp(now) });
      expect(after.chillers).toEqual(before.chillers);
      expect(persistence.querySamples('all', EVERYTHING[0], EVERYTHING[1])).toHaveLength(1);
      expect(p.state()).toBe('DISCONNECTED');
      expect(client.disconnects).toBe(1);
      expect(p.stats().connectionFaults).toBe(1);
      expect(p.stats().cyclesCompleted).toBe(1);
      expect(lines).toContain('⚠️ [WARNING]  Connection lost during poll cycle: Connection reset');
    });

    it('should record pumps read in full before the connection drops', async () => {
      tagMap = buildTagMap(ENDPOINT, {
        ...PLANT,
        pumps: { ...PLANT.pumps, pump2: { label: 'Pump 2', db: 11, ready: { byte: 0, bit: 0 } } }
      }).tagMap;
      store = createStateStore(tagMap, logger);
      client.values.set('bit:11:0:0', true);
      const p = poller();
      await p.step();
      tick();
      client.values.set('real:10:2', 7.77);
      client.values.set('bit:10:0:2', true);
      client.failures.set('bit:11:0:0', { ok: false, kind: 'connection', message: 'Connection reset' });

      expect(await p.step()).toBe('fault');

      expect(store.snapshot().pumps[0].pressure).toBe(7.77);
      expect(store.snapshot().home.ts).toBe('read error');
      const samples = persistence.querySamples('pump1', EVERYTHING[0], EVERYTHING[1]);
      expect(samples).toHaveLength(2);
      expect(samples[1]).toEqual({
        timestamp: '2024-01-01 10:00:02',
        deviceId: 'pump1',
        pressure: 7.77,
        speed: 42.5,
        ready: true,
        running: true,
        trip: true
      });
      expect(persistence.querySamples('pump2', EVERYTHING[0], EVERYTHING[1])).toHaveLength(1);
      expect(persistence.queryEvents('all', EVERYTHING[0], EVERYTHING[1])).toEqual([
        { timestamp: '2024-01-01 10:00:02', deviceId: 'pump1', event: 'TRIP', pressure: 7.77, speed: 42.5 }
      ]);
    });

    it('should reconnect and resume after a fault', async () => {
      const p = poller();
      await p.step();
      client.failures.set('real:1:0', { ok: false, kind: 'connection', message: 'Connection reset' });
      await p.step();
      client.failures.clear();
      tick();
      tick();

      expect(await p.step()).toBe('cycle');
      expect(store.snapshot().home.ts).toBe(formatDisplayTimestamp(now));
      expect(persistence.querySamples('all', EVERYTHING[0], EVERYTHING[1])).toHaveLength(2);
    });

    it('should count persistence failures and keep polling', async () => {
      const appendSample = vi.fn<PersistenceStore['appendSample']>().mockReturnValue({ ok: false, message: 'disk I/O error' });
      const appendEvent = vi.fn<PersistenceStore['appendEvent']>().mockReturnValue({ ok: true, id: 1 });
      const p = poller(null, { persistence: { appendSample: appendSample, appendEvent: appendEvent } });

      expect(await p.step()).toBe('cycle');
      expect(await p.step()).toBe('cycle');

      expect(appendSample).toHaveBeenCalledTimes(2);
      expect(p.stats().persistenceFailures).toBe(2);
      expect(p.stats().cyclesCompleted).toBe(2);
    });

    it('should never read a malformed tag', async () => {
      tagMap = buildTagMap(ENDPOINT, {
        pumps: { pump1: { db: 10, pressure: { offset: 'abc' }, speed: { offset: 6 } } }
      }).tagMap;
      store = createStateStore(tagMap, logger);
      const p = poller();

      await p.step();

      expect(client.reads).toEqual(['real:10:6']);
      expect(persistence.querySamples('pump1', EVERYTHING[0], EVERYTHING[1])[0].pressure).toBeNull();
    });

    it('should stop between cycles when aborted and disconnect', async () => {
      const controller = new AbortController();
      const p = poller(null, {
        sleep: async function(ms) {
          sleeps.push(ms);
          controller.abort();
        }
      });

      await p.run(controller.signal);

      expect(p.stats().cyclesCompleted).toBe(1);
      expect(sleeps).toEqual([2000]);
      expect(p.state()).toBe('DISCONNECTED');
      expect(client.disconnects).toBe(1);
    });
  });
});
