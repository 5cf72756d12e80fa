export { detectTripEdge, createTripTracker } from './edge-detector';
export type { PrevTripState, TripTracker } from './types';
