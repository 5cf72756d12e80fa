/**
 * S7 register transport
 * The only module that talks to the nodes7 driver
 */

import NodeS7 from 'nodes7';

import { TransportError, describeError } from '$types/errors';

import { ISO_CONNECTED, bitAddress, realAddress, withTimeout } from './helpers';

import type { DeviceEndpoint } from '$types/common';
import type { RegisterTransport, S7Driver, S7DriverFactory } from './types';

/**
 * Default driver factory; nodes7 logs to stdout unless silenced
 */
export function createNodeS7Driver(): S7Driver {
  return new NodeS7({ silent: true });
}

/**
 * Create a transport bound to one controller endpoint
 *
 * Items are read one at a time so a bad address cannot spoil the values of
 * its neighbours in an optimized multi-item request.
 *
 * @param endpoint - Controller address and timeouts
 * @param createDriver - Driver factory, replaced in tests
 * @returns Register transport
 *
 * @example
 * ```typescript
 * const transport = createS7Transport({ host: '192.168.0.10', port: 102, rack: 0, slot: 1, timeoutMs: 1500 });
 * await transport.connect();
 * const pressure = await transport.readReal(10, 2);
 * ```
 */
export function createS7Transport(
  endpoint: DeviceEndpoint,
  createDriver: S7DriverFactory = createNodeS7Driver
): RegisterTransport {
  let driver: S7Driver | null = null;

  function isConnected(): boolean {
    return driver !== null && driver.isoConnectionState === ISO_CONNECTED;
  }

  function initiate(target: S7Driver): Promise<void> {
    return new Promise<void>(function(resolve, reject) {
      target.initiateConnection({
        host: endpoint.host,
        port: endpoint.port,
        rack: endpoint.rack,
        slot: endpoint.slot,
        timeout: endpoint.timeoutMs
      }, function(err) {
        if (err === undefined || err === null) {
          resolve();
        } else {
          reject(new TransportError('Connection to ' + endpoint.host + ' refused: ' + describeError(err)));
        }
      });
    });
  }

  async function connect(): Promise<void> {
    if (isConnected()) {
      return;
    }

    if (driver !== null) {
      driver.dropConnection();
    }
    const next = createDriver();
    driver = next;
    try {
      await withTimeout(initiate(next), endpoint.timeoutMs, 'Connection to ' + endpoint.host);
    } catch (err) {
      driver = null;
      next.dropConnection();
      throw err instanceof TransportError ? err : new TransportError(describeError(err));
    }
  }

  async function readItem(address: string): Promise<unknown> {
    const current = driver;
    if (current === null || current.isoConnectionState !== ISO_CONNECTED) {
      throw new TransportError('Not connected', address);
    }

    current.removeItems();
    current.addItems(address);

    const values = await withTimeout(
      new Promise<Record<string, NodeS7.ItemValue>>(function(resolve, reject) {
        current.readAllItems(function(anythingBad, result) {
          if (anythingBad) {
            reject(new TransportError('Bad quality reading ' + address, address));
          } else {
            resolve(result);
          }
        });
      }),
      endpoint.timeoutMs,
      'Read of ' + address,
      address
    );

    if (!(address in values)) {
      throw new TransportError('No value returned for ' + address, address);
    }
    return values[address];
  }

  function disconnect(): Promise<void> {
    const current = driver;
    driver = null;
    if (current === null) {
      return Promise.resolve();
    }

    return new Promise<void>(function(resolve) {
      const timer = setTimeout(resolve, endpoint.timeoutMs);
      current.dropConnection(function() {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  return {
    connect: connect,
    readReal: function(block, offset) { return readItem(realAddress(block, offset)); },
    readBit: function(block, byte, bit) { return readItem(bitAddress(block, byte, bit)); },
    isConnected: isConnected,
    disconnect: disconnect
  };
}
