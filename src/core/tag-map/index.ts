export { buildTagMap, listTags } from './tag-map';
export { HOME_TAG_KEYS, parseRealTag, parseBoolTag } from './helpers';
export type {
  RealTag,
  BoolTag,
  MalformedTag,
  RealTagRef,
  BoolTagRef,
  TagRef,
  HomeTags,
  StatusTags,
  PumpTags,
  StatusColors,
  PumpDefinition,
  ChillerDefinition,
  TagMap,
  RawTagGroups,
  TagMapBuildResult
} from './types';
