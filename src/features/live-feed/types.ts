/**
 * Live feed type definitions
 */

import type { WebSocketServer } from 'ws';

import type { LiveFeedSettings } from '$types/config';
import type { PlantSnapshot, SnapshotListener } from '@system/state';

/**
 * JSON frame pushed to every client
 */
export interface LiveMessage {
  type: 'snapshot';
  snapshot: PlantSnapshot;
}

/**
 * The part of a ws socket the feed writes to
 */
export interface LiveSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * Where snapshots come from; the state store or the plant API
 */
export interface SnapshotSource {
  snapshot(): PlantSnapshot;
  subscribe(listener: SnapshotListener): () => void;
}

/**
 * Client registry and broadcaster, independent of the network server
 */
export interface LiveFeed {
  /** Register a client and send it the current snapshot */
  attach(socket: LiveSocket): void;
  detach(socket: LiveSocket): void;
  broadcast(snapshot: PlantSnapshot): number;
  clientCount(): number;
  /** Stop following the source */
  close(): void;
}

export interface LiveFeedServer {
  feed: LiveFeed;
  /** Port the server is bound to */
  port(): number;
  close(): Promise<void>;
}

export type LiveServerFactory = (settings: LiveFeedSettings) => WebSocketServer;
