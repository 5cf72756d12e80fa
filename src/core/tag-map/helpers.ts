/**
 * Tag map helper functions
 * Turn raw configuration entries into tag references
 */

import { parseAddressInt } from '@utils/number';
import { isRecord } from '@utils/object';

import type { BoolTagRef, MalformedTag, RealTagRef } from './types';

/**
 * Configuration keys of the plant-wide signals
 */
export const HOME_TAG_KEYS = {
  kwh: 'ALL_PUMPS_KWH',
  level: 'TANK_WATER_LEVEL',
  temp: 'TANK_TEMPERATURE',
  alarm: 'ALARM'
} as const;

function describeValue(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (typeof value === 'string') return '"' + value + '"';
  return String(value);
}

function malformed(signal: string, reason: string): MalformedTag {
  return { kind: 'malformed', signal: signal, reason: reason };
}

function notAnAddress(part: string, value: unknown): string {
  return part + ' must be a non-negative integer (got ' + describeValue(value) + ')';
}

/**
 * Parse a REAL tag entry
 *
 * A tag's own db wins over the group's db.
 *
 * @param signal - Dotted configuration path of the tag
 * @param raw - Entry such as { "offset": 2 } or { "db": 1, "offset": 0 }
 * @param groupBlock - The enclosing group's db, if any
 * @returns Real tag, or a malformed tag describing the first bad part
 */
export function parseRealTag(signal: string, raw: unknown, groupBlock: unknown): RealTagRef {
  if (!isRecord(raw)) {
    return malformed(signal, 'must be an object with an offset');
  }

  const blockRaw = raw.db !== undefined ? raw.db : groupBlock;
  const block = parseAddressInt(blockRaw);
  if (block === null) {
    return malformed(signal, notAnAddress('db', blockRaw));
  }
  const offset = parseAddressInt(raw.offset);
  if (offset === null) {
    return malformed(signal, notAnAddress('offset', raw.offset));
  }

  return { kind: 'real', signal: signal, block: block, offset: offset };
}

/**
 * Parse a bit tag entry
 * @param signal - Dotted configuration path of the tag
 * @param raw - Entry such as { "byte": 0, "bit": 2, "color": "#FF0000" }
 * @param groupBlock - The enclosing group's db, if any
 * @returns Bool tag, or a malformed tag describing the first bad part
 */
export function parseBoolTag(signal: string, raw: unknown, groupBlock: unknown): BoolTagRef {
  if (!isRecord(raw)) {
    return malformed(signal, 'must be an object with byte and bit');
  }

  const blockRaw = raw.db !== undefined ? raw.db : groupBlock;
  const block = parseAddressInt(blockRaw);
  if (block === null) {
    return malformed(signal, notAnAddress('db', blockRaw));
  }
  const byte = parseAddressInt(raw.byte);
  if (byte === null) {
    return malformed(signal, notAnAddress('byte', raw.byte));
  }
  const bit = parseAddressInt(raw.bit);
  if (bit === null) {
    return malformed(signal, notAnAddress('bit', raw.bit));
  }
  if (bit > 7) {
    return malformed(signal, 'bit must be between 0 and 7 (got ' + bit + ')');
  }

  return { kind: 'bool', signal: signal, block: block, byte: byte, bit: bit };
}
