/**
 * Tag map type definitions
 */

import type { DeviceEndpoint } from '$types/common';
import type { ValidationIssue } from '@validation/types';

// ═══════════════════════════════════════════════════════════════
// TAG REFERENCES
// ═══════════════════════════════════════════════════════════════

/**
 * 4-byte IEEE-754 big-endian float inside a data block
 */
export interface RealTag {
  readonly kind: 'real';
  /** Dotted configuration path, e.g. "pumps.pump1.pressure" */
  readonly signal: string;
  readonly block: number;
  readonly offset: number;
}

/**
 * Single bit inside a data block
 */
export interface BoolTag {
  readonly kind: 'bool';
  readonly signal: string;
  readonly block: number;
  readonly byte: number;
  readonly bit: number;
}

/**
 * Configured tag whose address could not be parsed; never read
 */
export interface MalformedTag {
  readonly kind: 'malformed';
  readonly signal: string;
  readonly reason: string;
}

export type RealTagRef = RealTag | MalformedTag;
export type BoolTagRef = BoolTag | MalformedTag;
export type TagRef = RealTag | BoolTag | MalformedTag;

// ═══════════════════════════════════════════════════════════════
// SIGNAL GROUPS
// ═══════════════════════════════════════════════════════════════

/**
 * Plant-wide signals; absent members are not configured
 */
export interface HomeTags {
  readonly kwh?: RealTagRef;
  readonly level?: RealTagRef;
  readonly temp?: RealTagRef;
  readonly alarm?: BoolTagRef;
}

export interface StatusTags {
  readonly ready?: BoolTagRef;
  readonly running?: BoolTagRef;
  readonly trip?: BoolTagRef;
}

export interface PumpTags extends StatusTags {
  readonly pressure?: RealTagRef;
  readonly speed?: RealTagRef;
}

/**
 * Display colours of the status lamps, passed through to consumers
 */
export interface StatusColors {
  readonly ready: string | null;
  readonly running: string | null;
  readonly trip: string | null;
}

export interface PumpDefinition {
  readonly id: string;
  readonly label: string;
  readonly colors: StatusColors;
  readonly tags: PumpTags;
}

export interface ChillerDefinition {
  readonly id: string;
  readonly label: string;
  readonly colors: StatusColors;
  readonly tags: StatusTags;
}

/**
 * Every signal the poller reads, built once at startup and frozen
 */
export interface TagMap {
  readonly endpoint: DeviceEndpoint;
  readonly home: HomeTags;
  /** Configuration order, ids unique */
  readonly pumps: readonly PumpDefinition[];
  readonly chillers: readonly ChillerDefinition[];
}

// ═══════════════════════════════════════════════════════════════
// BUILD TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Tag groups as found in the configuration document
 */
export interface RawTagGroups {
  home?: unknown;
  pumps?: unknown;
  chillers?: unknown;
}

export interface TagMapBuildResult {
  tagMap: TagMap;
  /** Structural problems; the configuration must be rejected */
  errors: ValidationIssue[];
  /** Malformed tags and duplicates; the service still starts */
  warnings: ValidationIssue[];
}
