/**
 * Live feed helper functions
 */

import type { PlantSnapshot } from '@system/state';
import type { LiveMessage } from './types';

/**
 * ws readyState of an open socket
 */
export const SOCKET_OPEN = 1;

export function buildLiveMessage(snapshot: PlantSnapshot): string {
  const message: LiveMessage = { type: 'snapshot', snapshot: snapshot };
  return JSON.stringify(message);
}
