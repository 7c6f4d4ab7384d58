/**
 * exiftool command-line construction
 *
 * Tags are passed as `-Tag=value` assignments followed by the target path.
 * The process is spawned without a shell, so values are never quoted.
 */

import { DateTime, FixedOffsetZone } from 'luxon';
import { extname } from 'node:path';

import type { GeoPoint } from '../types/index.js';

export const GLOBAL_FLAGS: readonly string[] = [
  '-m',
  '-charset',
  'filename=utf8',
  '-overwrite_original'
];

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(['.mp4', '.mov', '.avi', '.wmv']);

export const VIDEO_DATE_TAGS: readonly string[] = [
  'CreateDate',
  'ModifyDate',
  'TrackCreateDate',
  'TrackModifyDate',
  'MediaCreateDate',
  'MediaModifyDate'
];

export const IMAGE_DATE_TAGS: readonly string[] = ['DateTimeOriginal', 'CreateDate'];

export const FILE_DATE_TAGS: readonly string[] = ['FileCreateDate', 'FileModifyDate'];

const TOOL_TIMESTAMP_FORMAT = 'yyyy:MM:dd HH:mm:ssZZZ';

export interface ToolArgumentsInput {
  filePath: string;
  epochSeconds: number;
  offsetMinutes: number;
  geo?: GeoPoint | null;
}

/**
 * Render UTC epoch seconds in the display offset, e.g. `2021:01:01 08:00:00+0800`.
 */
export function formatToolTimestamp(epochSeconds: number, offsetMinutes: number): string {
  return DateTime.fromSeconds(epochSeconds, {
    zone: FixedOffsetZone.instance(offsetMinutes)
  }).toFormat(TOOL_TIMESTAMP_FORMAT);
}

export function dateTagsFor(filePath: string): string[] {
  const extension = extname(filePath).toLowerCase();
  const tags = VIDEO_EXTENSIONS.has(extension) ? VIDEO_DATE_TAGS : IMAGE_DATE_TAGS;
  return [...tags, ...FILE_DATE_TAGS];
}

/**
 * XMP takes signed decimals; EXIF takes a magnitude plus a hemisphere ref.
 * GIF has no EXIF block, so it only gets the XMP pair.
 */
export function gpsArguments(point: GeoPoint, extension: string): string[] {
  const { latitude, longitude } = point;
  const args = [`-XMP:GPSLatitude=${latitude}`, `-XMP:GPSLongitude=${longitude}`];

  if (extension.toLowerCase() !== '.gif') {
    args.push(
      `-GPSLatitude=${Math.abs(latitude)}`,
      `-GPSLatitudeRef=${latitude >= 0 ? 'N' : 'S'}`,
      `-GPSLongitude=${Math.abs(longitude)}`,
      `-GPSLongitudeRef=${longitude >= 0 ? 'E' : 'W'}`
    );
  }

  return args;
}

export function buildToolArguments(input: ToolArgumentsInput): string[] {
  const timestamp = formatToolTimestamp(input.epochSeconds, input.offsetMinutes);
  const args = [...GLOBAL_FLAGS, ...dateTagsFor(input.filePath).map(tag => `-${tag}=${timestamp}`)];

  if (input.geo) {
    args.push(...gpsArguments(input.geo, extname(input.filePath)));
  }

  args.push(input.filePath);
  return args;
}
