export { createLiveFeed, startLiveFeed } from './live-feed';
export { SOCKET_OPEN, buildLiveMessage } from './helpers';
export type { LiveMessage, LiveSocket, SnapshotSource, LiveFeed, LiveFeedServer, LiveServerFactory } from './types';
