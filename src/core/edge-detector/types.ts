/**
 * Edge detector type definitions
 */

/**
 * Last observed trip per pump; null until the first successful read
 */
export type PrevTripState = ReadonlyMap<string, boolean | null>;

/**
 * Holds PrevTripState for the poller
 */
export interface TripTracker {
  /**
   * Compare a new trip reading with the stored one
   *
   * A null reading (failed read) never triggers and leaves the stored value
   * as it was. Unknown ids never trigger.
   *
   * @returns True on a false to true transition
   */
  observe(deviceId: string, current: boolean | null): boolean;
  /** Stored value, or undefined for an unknown id */
  previous(deviceId: string): boolean | null | undefined;
  /** Copy of the whole map */
  state(): PrevTripState;
}
