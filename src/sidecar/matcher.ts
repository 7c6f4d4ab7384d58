/**
 * Sidecar → media file matching
 *
 * Export archives name each sidecar after its media file
 * (`IMG_0001.jpg.json`), but the media file itself is often renamed on
 * export: duplicate counters get appended (`IMG_0001.jpg(1).jpg`) and long
 * names are truncated. Three strategies of decreasing precision are tried
 * against the sidecar's directory and the first acceptable hit wins:
 *
 * 1. exact      - `IMG_0001.jpg`
 * 2. trailing   - `IMG_0001.jpg*`
 * 3. prefix     - `IMG_0001*` (name up to its first dot)
 */

import { readdir } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';

export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.mp4',
  '.mov',
  '.heic',
  '.webp'
]);

/** Some exporters insert this (possibly truncated) marker before `.json` */
const SUPPLEMENTAL_MARKER = 'supplemental-metadata';

const JSON_SUFFIX = /\.json$/i;
const LAST_SEGMENT = /^(.+)(\.[^.]+)$/;

export const MATCH_FAILURE_REASONS = {
  unrecognized: 'filename format not recognized',
  noMedia: 'no media file found'
} as const;

export interface SidecarName {
  baseName: string;
  /** The media file's extension, case preserved */
  extension: string;
  supplementalSuffix?: string;
  /** `baseName + extension` */
  mediaName: string;
}

export type MatchStrategy = 'exact' | 'trailing' | 'prefix';

export type MatchResult =
  | { matched: true; mediaPath: string; strategy: MatchStrategy; sidecar: SidecarName }
  | { matched: false; reason: string };

/** Lists the plain file names in a directory */
export type DirectoryLister = (directory: string) => Promise<string[]>;

export const listFiles: DirectoryLister = async directory => {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries.filter(entry => entry.isFile()).map(entry => entry.name);
};

function isSupplementalMarker(segment: string): boolean {
  const marker = segment.slice(1).toLowerCase();
  return marker.length > 0 && SUPPLEMENTAL_MARKER.startsWith(marker);
}

/**
 * Split a sidecar file name into `(baseName)(extension)(supplementalSuffix).json`.
 * Returns null when the name has no media extension before `.json`.
 */
export function parseSidecarName(fileName: string): SidecarName | null {
  if (!JSON_SUFFIX.test(fileName)) {
    return null;
  }

  let stem = fileName.replace(JSON_SUFFIX, '');
  let supplementalSuffix: string | undefined;

  const tail = LAST_SEGMENT.exec(stem);
  if (tail && isSupplementalMarker(tail[2]) && LAST_SEGMENT.test(tail[1])) {
    supplementalSuffix = tail[2];
    stem = tail[1];
  }

  const parts = LAST_SEGMENT.exec(stem);
  if (!parts) {
    return null;
  }

  const [, baseName, extension] = parts;
  return {
    baseName,
    extension,
    supplementalSuffix,
    mediaName: `${baseName}${extension}`
  };
}

export function isMediaFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return MEDIA_EXTENSIONS.has(extname(lower)) && !lower.endsWith('.json');
}

function strategiesFor(mediaName: string): Array<[MatchStrategy, (name: string) => boolean]> {
  const strategies: Array<[MatchStrategy, (name: string) => boolean]> = [
    ['exact', name => name === mediaName],
    ['trailing', name => name.startsWith(mediaName)]
  ];

  const prefix = mediaName.split('.')[0];
  if (prefix.length > 0) {
    strategies.push(['prefix', name => name.startsWith(prefix)]);
  }

  return strategies;
}

/**
 * Locate the media file paired with `sidecarPath` in the same directory.
 */
export async function matchMediaFile(
  sidecarPath: string,
  listDirectory: DirectoryLister = listFiles
): Promise<MatchResult> {
  const sidecar = parseSidecarName(basename(sidecarPath));
  if (!sidecar) {
    return { matched: false, reason: MATCH_FAILURE_REASONS.unrecognized };
  }

  const directory = dirname(sidecarPath);
  const names = (await listDirectory(directory)).sort();

  for (const [strategy, accepts] of strategiesFor(sidecar.mediaName)) {
    const hit = names.find(name => accepts(name) && isMediaFile(name));
    if (hit !== undefined) {
      return { matched: true, mediaPath: join(directory, hit), strategy, sidecar };
    }
  }

  return { matched: false, reason: MATCH_FAILURE_REASONS.noMedia };
}
