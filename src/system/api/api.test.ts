/**
 * Unit tests for the plant API
 */

import { buildTagMap } from '@core/tag-map';
import { createReportService } from '@features/reports';
import { createSilentLogger } from '@logging';
import { createSqliteStore, openDatabase } from '@persistence';
import { createStateStore } from '@system/state';

import { createPlantApi } from './api';

import type { PersistenceStore } from '@persistence';
import type { StateStore } from '@system/state';
import type { PlantApi } from './types';

const ENDPOINT = { host: '192.168.0.10', port: 102, rack: 0, slot: 1, timeoutMs: 1500 };

describe('createPlantApi', () => {
  let store: StateStore;
  let persistence: PersistenceStore;
  let api: PlantApi;

  beforeEach(() => {
    const tagMap = buildTagMap(ENDPOINT, {
      pumps: {
        pump1: { label: 'Pump 1', db: 10, trip: { byte: 0, bit: 2, color: '#FF0000' } },
        pump2: { db: 11 }
      },
      chillers: { chiller1: { label: 'Chiller', db: 20 } }
    }).tagMap;
    store = createStateStore(tagMap, createSilentLogger());
    persistence = createSqliteStore(openDatabase(':memory:'), createSilentLogger());
    api = createPlantApi(tagMap, store, createReportService(persistence, function() { return new Date('2024-01-02T00:00:00Z'); }));
  });

  afterEach(() => {
    persistence.close();
  });

  it('should list devices in configuration order', () => {
    expect(api.listDeviceIds('pump')).toEqual(['pump1', 'pump2']);
    expect(api.listDeviceIds('chiller')).toEqual(['chiller1']);
    expect(api.listDevices('pump')[0]).toEqual({
      id: 'pump1',
      label: 'Pump 1',
      colors: { ready: null, running: null, trip: '#FF0000' }
    });
  });

  it('should return the latest device state or null', () => {
    store.applyDeviceUpdate('pump', 'pump2', { pressure: 3.456 }, '01/01/2024 10:00:00');

    expect(api.getDeviceSnapshot('pump', 'pump2')).toEqual(expect.objectContaining({ label: 'pump2', pressure: 3.46 }));
    expect(api.getDeviceSnapshot('pump', 'pump9')).toBeNull();
    expect(api.getDeviceSnapshot('chiller', 'pump1')).toBeNull();
  });

  it('should return the home snapshot held at call time', () => {
    const before = api.getHomeSnapshot();
    store.applyHomeUpdate({ temp: 21.04 }, '01/01/2024 10:00:00');

    expect(before.temp).toBe('--');
    expect(api.getHomeSnapshot().temp).toBe('21.0');
  });

  it('should notify subscribers of each publish', () => {
    const versions: number[] = [];
    const unsubscribe = api.subscribe(function(snapshot) { versions.push(snapshot.version); });

    store.markReadError();
    unsubscribe();
    store.markReadError();

    expect(versions).toEqual([1]);
  });

  it('should pass report requests through', () => {
    persistence.appendSample({
      timestamp: '2024-01-01 08:00:00',
      deviceId: 'pump1',
      pressure: 1,
      speed: 2,
      ready: true,
      running: false,
      trip: false
    });

    expect(api.runReport('pump1', '2024-01-01', '2024-01-01').status).toBe('ok');
    expect(api.runReport('pump2', '2024-01-01', '2024-01-01').status).toBe('empty');
    expect(api.exportCsv('all', 'yesterday', '2024-01-01').status).toBe('invalid-range');
  });
});
