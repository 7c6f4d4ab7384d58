/**
 * Sidecar module - pairing JSON sidecars with media files and reading their
 * capture time and location
 */

export {
  matchMediaFile,
  parseSidecarName,
  isMediaFile,
  listFiles,
  MEDIA_EXTENSIONS,
  MATCH_FAILURE_REASONS,
  type DirectoryLister,
  type MatchResult,
  type MatchStrategy,
  type SidecarName
} from './matcher.js';

export { resolveTimestamp, parseTimeValue, TIMESTAMP_CANDIDATES, DATE_LAYOUTS } from './timestamp.js';

export { resolveGeo } from './geo.js';

export { readSidecar } from './reader.js';
