/**
 * Tag map construction
 *
 * Builds the frozen description of every signal from the configuration
 * document's home, pumps and chillers groups. Missing groups and missing
 * tags are simply absent from the map; tags with unusable addresses become
 * malformed tags and are reported once as warnings.
 */

import { ALL_DEVICES } from '$types/common';
import { deepFreeze, isRecord } from '@utils/object';
import { addError, addWarning } from '@validation/helpers';

import { HOME_TAG_KEYS, parseBoolTag, parseRealTag } from './helpers';

import type { DeviceEndpoint } from '$types/common';
import type { ValidationIssue } from '@validation/types';
import type {
  BoolTagRef,
  ChillerDefinition,
  HomeTags,
  PumpDefinition,
  RawTagGroups,
  RealTagRef,
  StatusColors,
  TagMap,
  TagMapBuildResult,
  TagRef
} from './types';

const STATUS_KEYS = ['ready', 'running', 'trip'] as const;

interface Issues {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

function reportMalformed<T extends TagRef>(tag: T, issues: Issues): T {
  if (tag.kind === 'malformed') {
    addWarning(issues.warnings, tag.signal, tag.signal + ' ' + tag.reason + '; the tag will not be read');
  }
  return tag;
}

function realTag(signal: string, raw: unknown, groupBlock: unknown, issues: Issues): RealTagRef | undefined {
  if (raw === undefined) return undefined;
  return reportMalformed(parseRealTag(signal, raw, groupBlock), issues);
}

function boolTag(signal: string, raw: unknown, groupBlock: unknown, issues: Issues): BoolTagRef | undefined {
  if (raw === undefined) return undefined;
  return reportMalformed(parseBoolTag(signal, raw, groupBlock), issues);
}

function buildHome(group: unknown, issues: Issues): HomeTags {
  if (group === undefined || group === null) {
    return {};
  }
  if (!isRecord(group)) {
    addError(issues.errors, 'home', 'home must be an object of tags');
    return {};
  }

  const known: string[] = ['db', ...Object.values(HOME_TAG_KEYS)];
  for (const key of Object.keys(group)) {
    if (known.indexOf(key) === -1) {
      addWarning(issues.warnings, 'home.' + key, 'home.' + key + ' is not a known home tag and is ignored');
    }
  }

  return {
    kwh: realTag('home.' + HOME_TAG_KEYS.kwh, group[HOME_TAG_KEYS.kwh], group.db, issues),
    level: realTag('home.' + HOME_TAG_KEYS.level, group[HOME_TAG_KEYS.level], group.db, issues),
    temp: realTag('home.' + HOME_TAG_KEYS.temp, group[HOME_TAG_KEYS.temp], group.db, issues),
    alarm: boolTag('home.' + HOME_TAG_KEYS.alarm, group[HOME_TAG_KEYS.alarm], group.db, issues)
  };
}

/**
 * Device entries of a group in configuration order, ids trimmed and unique
 */
function deviceEntries(field: string, group: unknown, issues: Issues): Array<[string, Record<string, unknown>]> {
  if (group === undefined || group === null) {
    return [];
  }
  if (!isRecord(group)) {
    addError(issues.errors, field, field + ' must be an object keyed by device id');
    return [];
  }

  const seen = new Set<string>();
  const entries: Array<[string, Record<string, unknown>]> = [];
  for (const [rawId, entry] of Object.entries(group)) {
    const id = rawId.trim();
    const path = field + '.' + id;
    if (id === '') {
      addError(issues.errors, field, field + ' contains an empty device id');
      continue;
    }
    if (id === ALL_DEVICES) {
      addError(issues.errors, path, '"' + ALL_DEVICES + '" is reserved and cannot be a device id');
      continue;
    }
    if (seen.has(id)) {
      addWarning(issues.warnings, path, path + ' is a duplicate; the first entry is kept');
      continue;
    }
    if (!isRecord(entry)) {
      addError(issues.errors, path, path + ' must be an object');
      continue;
    }
    seen.add(id);
    entries.push([id, entry]);
  }
  return entries;
}

function readLabel(value: unknown, id: string, path: string, issues: Issues): string {
  if (value === undefined) return id;
  if (typeof value !== 'string' || value.trim() === '') {
    addError(issues.errors, path + '.label', path + '.label must be a non-empty string');
    return id;
  }
  return value.trim();
}

function readColors(entry: Record<string, unknown>, path: string, issues: Issues): StatusColors {
  const result: Record<typeof STATUS_KEYS[number], string | null> = { ready: null, running: null, trip: null };
  for (const key of STATUS_KEYS) {
    const tag = entry[key];
    if (!isRecord(tag) || tag.color === undefined) continue;
    if (typeof tag.color === 'string') {
      result[key] = tag.color;
    } else {
      addWarning(issues.warnings, path + '.' + key + '.color', path + '.' + key + '.color must be a string');
    }
  }
  return result;
}

function buildPump(id: string, entry: Record<string, unknown>, issues: Issues): PumpDefinition {
  const path = 'pumps.' + id;
  return {
    id: id,
    label: readLabel(entry.label, id, path, issues),
    colors: readColors(entry, path, issues),
    tags: {
      ready: boolTag(path + '.ready', entry.ready, entry.db, issues),
      running: boolTag(path + '.running', entry.running, entry.db, issues),
      trip: boolTag(path + '.trip', entry.trip, entry.db, issues),
      pressure: realTag(path + '.pressure', entry.pressure, entry.db, issues),
      speed: realTag(path + '.speed', entry.speed, entry.db, issues)
    }
  };
}

function buildChiller(id: string, entry: Record<string, unknown>, issues: Issues): ChillerDefinition {
  const path = 'chillers.' + id;
  return {
    id: id,
    label: readLabel(entry.label, id, path, issues),
    colors: readColors(entry, path, issues),
    tags: {
      ready: boolTag(path + '.ready', entry.ready, entry.db, issues),
      running: boolTag(path + '.running', entry.running, entry.db, issues),
      trip: boolTag(path + '.trip', entry.trip, entry.db, issues)
    }
  };
}

/**
 * Build the tag map
 *
 * @param endpoint - Controller every tag is read from
 * @param groups - home, pumps and chillers sections of the configuration
 * @returns Frozen tag map plus structural errors and tag warnings
 *
 * @example
 * ```typescript
 * const { tagMap, errors, warnings } = buildTagMap(endpoint, {
 *   pumps: { pump1: { db: 10, trip: { byte: 0, bit: 2 }, pressure: { offset: 2 } } }
 * });
 * ```
 */
export function buildTagMap(endpoint: DeviceEndpoint, groups: RawTagGroups): TagMapBuildResult {
  const issues: Issues = { errors: [], warnings: [] };

  const tagMap: TagMap = {
    endpoint: { ...endpoint },
    home: buildHome(groups.home, issues),
    pumps: deviceEntries('pumps', groups.pumps, issues).map(function(item) {
      return buildPump(item[0], item[1], issues);
    }),
    chillers: deviceEntries('chillers', groups.chillers, issues).map(function(item) {
      return buildChiller(item[0], item[1], issues);
    })
  };

  return {
    tagMap: deepFreeze(tagMap),
    errors: issues.errors,
    warnings: issues.warnings
  };
}

/**
 * Every configured tag in read order: home, pumps, chillers
 * @param tagMap - Tag map to walk
 */
export function listTags(tagMap: TagMap): TagRef[] {
  const tags: Array<TagRef | undefined> = [
    tagMap.home.kwh, tagMap.home.level, tagMap.home.temp, tagMap.home.alarm
  ];
  for (const pump of tagMap.pumps) {
    tags.push(pump.tags.ready, pump.tags.running, pump.tags.trip, pump.tags.pressure, pump.tags.speed);
  }
  for (const chiller of tagMap.chillers) {
    tags.push(chiller.tags.ready, chiller.tags.running, chiller.tags.trip);
  }
  return tags.filter(function(tag): tag is TagRef { return tag !== undefined; });
}
