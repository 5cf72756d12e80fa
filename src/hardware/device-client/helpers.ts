/**
 * Device client helper functions
 */

import type { ReadFailure, ReadFailureKind, ReadResult } from './types';

export const MAX_BLOCK = 65535;
export const MAX_BYTE_OFFSET = 65535;
export const MAX_BIT = 7;

function isIntegerInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Check register address parts before any I/O
 * @param block - Data block number (1-65535)
 * @param byte - Byte offset (0-65535)
 * @param bit - Bit index (0-7), omitted for REAL reads
 * @returns Problem description, or null when the address is usable
 */
export function validateAddress(block: number, byte: number, bit?: number): string | null {
  if (!isIntegerInRange(block, 1, MAX_BLOCK)) {
    return 'Invalid data block ' + block;
  }
  if (!isIntegerInRange(byte, 0, MAX_BYTE_OFFSET)) {
    return 'Invalid byte offset ' + byte;
  }
  if (bit !== undefined && !isIntegerInRange(bit, 0, MAX_BIT)) {
    return 'Invalid bit index ' + bit;
  }
  return null;
}

/**
 * Build a failed read result
 */
export function readFailure(kind: ReadFailureKind, message: string): ReadFailure {
  return { ok: false, kind: kind, message: message };
}

/**
 * Decode a raw REAL value from the transport
 * @param raw - Value as returned by the driver
 * @param address - Address for the failure message
 */
export function decodeReal(raw: unknown, address: string): ReadResult<number> {
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    return readFailure('decode', 'Expected a finite REAL at ' + address + ', got ' + String(raw));
  }
  return { ok: true, value: raw };
}

/**
 * Decode a raw bit value from the transport
 * @param raw - Value as returned by the driver
 * @param address - Address for the failure message
 */
export function decodeBool(raw: unknown, address: string): ReadResult<boolean> {
  if (typeof raw !== 'boolean') {
    return readFailure('decode', 'Expected a bit at ' + address + ', got ' + String(raw));
  }
  return { ok: true, value: raw };
}
