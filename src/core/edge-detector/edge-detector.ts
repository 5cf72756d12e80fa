/**
 * Trip edge detection
 */

import type { PrevTripState, TripTracker } from './types';

/**
 * Rising-edge test on the trip bit
 *
 * @param previous - Last observed value, or null before the first observation
 * @param current - This cycle's reading, or null when the read failed
 * @returns True only for false followed by true
 */
export function detectTripEdge(previous: boolean | null, current: boolean | null): boolean {
  return previous === false && current === true;
}

/**
 * Create the per-pump trip tracker
 *
 * Every id starts without an observation. The first successful reading
 * only sets the baseline, so a pump already tripped when the service
 * starts is not reported as a new trip.
 *
 * @param deviceIds - Pump ids in configuration order
 */
export function createTripTracker(deviceIds: readonly string[]): TripTracker {
  const prev = new Map<string, boolean | null>();
  for (const id of deviceIds) {
    prev.set(id, null);
  }

  function observe(deviceId: string, current: boolean | null): boolean {
    if (!prev.has(deviceId) || current === null) {
      return false;
    }
    const previous = prev.get(deviceId);
    const edge = detectTripEdge(previous === undefined ? null : previous, current);
    prev.set(deviceId, current);
    return edge;
  }

  return {
    observe: observe,
    previous: function(deviceId) { return prev.get(deviceId); },
    state: function(): PrevTripState { return new Map(prev); }
  };
}
