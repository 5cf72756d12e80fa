/**
 * Live feed
 *
 * Pushes every published plant snapshot to WebSocket clients as JSON.
 * New clients receive the current snapshot on connect.
 */

import { WebSocketServer } from 'ws';

import { describeError } from '$types/errors';

import { SOCKET_OPEN, buildLiveMessage } from './helpers';

import type { LiveFeedSettings } from '$types/config';
import type { Logger } from '@logging';
import type { PlantSnapshot } from '@system/state';
import type { LiveFeed, LiveFeedServer, LiveServerFactory, LiveSocket, SnapshotSource } from './types';

/**
 * Create the client registry and subscribe it to a snapshot source
 *
 * @param source - Snapshot source
 * @param logger - Receives send failures
 */
export function createLiveFeed(source: SnapshotSource, logger: Logger): LiveFeed {
  const clients = new Set<LiveSocket>();

  function send(socket: LiveSocket, frame: string): boolean {
    if (socket.readyState !== SOCKET_OPEN) {
      return false;
    }
    try {
      socket.send(frame);
      return true;
    } catch (err) {
      logger.debug('Live feed send failed: ' + describeError(err));
      clients.delete(socket);
      return false;
    }
  }

  function broadcast(snapshot: PlantSnapshot): number {
    const frame = buildLiveMessage(snapshot);
    let delivered = 0;
    for (const socket of Array.from(clients)) {
      if (send(socket, frame)) delivered++;
    }
    return delivered;
  }

  const unsubscribe = source.subscribe(broadcast);

  return {
    attach: function(socket) {
      clients.add(socket);
      send(socket, buildLiveMessage(source.snapshot()));
    },
    detach: function(socket) { clients.delete(socket); },
    broadcast: broadcast,
    clientCount: function() { return clients.size; },
    close: function() {
      unsubscribe();
      clients.clear();
    }
  };
}

/**
 * Default server factory
 */
export function createWebSocketServer(settings: LiveFeedSettings): WebSocketServer {
  return new WebSocketServer({ host: settings.host, port: settings.port });
}

/**
 * Start the WebSocket server
 *
 * A bind failure rejects and releases the feed. Errors after that are
 * logged and the feed keeps serving.
 *
 * @param settings - Bind address and port
 * @param source - Snapshot source
 * @param logger - Logger
 * @param createServer - Server factory, replaced in tests
 * @returns Server handle once listening
 */
export function startLiveFeed(
  settings: LiveFeedSettings,
  source: SnapshotSource,
  logger: Logger,
  createServer: LiveServerFactory = createWebSocketServer
): Promise<LiveFeedServer> {
  const feed = createLiveFeed(source, logger);
  const server = createServer(settings);

  server.on('connection', function(socket) {
    feed.attach(socket);
    logger.debug('Live feed client connected (' + feed.clientCount() + ' open)');
    socket.on('close', function() { feed.detach(socket); });
    socket.on('error', function(err) {
      logger.debug('Live feed client error: ' + err.message);
      feed.detach(socket);
    });
  });

  function port(): number {
    const address = server.address();
    return typeof address === 'object' && address !== null ? address.port : settings.port;
  }

  function close(): Promise<void> {
    feed.close();
    for (const client of server.clients) {
      client.terminate();
    }
    return new Promise<void>(function(resolve, reject) {
      server.close(function(err) {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return new Promise<LiveFeedServer>(function(resolve, reject) {
    function onStartupError(err: Error): void {
      feed.close();
      reject(err);
    }
    server.once('error', onStartupError);
    server.once('listening', function() {
      server.off('error', onStartupError);
      server.on('error', function(err) { logger.warning('Live feed server error: ' + err.message); });
      logger.info('Live feed listening on ' + settings.host + ':' + port());
      resolve({ feed: feed, port: port, close: close });
    });
  });
}
