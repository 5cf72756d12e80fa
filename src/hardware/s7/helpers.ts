/**
 * S7 transport helper functions
 */

import { TransportTimeoutError } from '$types/errors';

/**
 * nodes7 isoConnectionState once the PDU size has been negotiated
 */
export const ISO_CONNECTED = 4;

/**
 * Build the nodes7 item address of a REAL inside a data block
 * @param block - Data block number
 * @param offset - Byte offset of the float
 * @returns Address such as "DB10,REAL4"
 */
export function realAddress(block: number, offset: number): string {
  return 'DB' + block + ',REAL' + offset;
}

/**
 * Build the nodes7 item address of a single bit inside a data block
 * @param block - Data block number
 * @param byte - Byte offset
 * @param bit - Bit index within the byte (0-7)
 * @returns Address such as "DB10,X0.1"
 */
export function bitAddress(block: number, byte: number, bit: number): string {
  return 'DB' + block + ',X' + byte + '.' + bit;
}

/**
 * Race a promise against a timer
 *
 * The timer is cleared as soon as the promise settles, so nothing is left
 * pending on the event loop.
 *
 * @param pending - Operation to wait for
 * @param ms - Timeout in milliseconds
 * @param what - Operation description used in the timeout message
 * @param address - Item address, when the operation is a read
 */
export function withTimeout<T>(
  pending: Promise<T>,
  ms: number,
  what: string,
  address: string | null = null
): Promise<T> {
  return new Promise<T>(function(resolve, reject) {
    const timer = setTimeout(function() {
      reject(new TransportTimeoutError(what + ' timed out after ' + ms + 'ms', address));
    }, ms);

    pending.then(function(value) {
      clearTimeout(timer);
      resolve(value);
    }, function(err: unknown) {
      clearTimeout(timer);
      reject(err);
    });
  });
}
