import { DateTime } from 'luxon';
import { z } from 'zod';

import type { Logger } from '../lib/logger.js';
import type { ResolvedTimestamp, TimestampField } from '../types/index.js';

export interface TimestampCandidate {
  field: TimestampField;
  path: readonly [string, string];
}

/** Candidate fields, highest priority first */
export const TIMESTAMP_CANDIDATES: readonly TimestampCandidate[] = [
  { field: 'photoTakenTime.timestamp', path: ['photoTakenTime', 'timestamp'] },
  { field: 'creationTime.timestamp', path: ['creationTime', 'timestamp'] },
  { field: 'creationTime.formatted', path: ['creationTime', 'formatted'] },
  { field: 'modificationTime.formatted', path: ['modificationTime', 'formatted'] }
];

/**
 * Formatted-date layouts, tried in order. All are read as UTC.
 */
export const DATE_LAYOUTS = [
  'yyyy:MM:dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss'Z'",
  "MMM d, yyyy, h:mm:ss a 'UTC'"
] as const;

const TimeValueSchema = z.union([z.number(), z.string()]);

const DIGITS = /^\d+$/;

export type ParseResult = { ok: true; epochSeconds: number } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(record: unknown, [outer, inner]: readonly [string, string]): unknown {
  if (!isRecord(record)) {
    return undefined;
  }
  const group = record[outer];
  return isRecord(group) ? group[inner] : undefined;
}

function fromEpoch(epochSeconds: number): ParseResult {
  if (!Number.isFinite(epochSeconds) || epochSeconds <= 0) {
    return { ok: false, reason: `epoch value ${epochSeconds} is not a usable time` };
  }
  if (!DateTime.fromSeconds(epochSeconds, { zone: 'utc' }).isValid) {
    return { ok: false, reason: `epoch value ${epochSeconds} is out of range` };
  }
  return { ok: true, epochSeconds: Math.trunc(epochSeconds) };
}

function fromFormatted(value: string): ParseResult {
  // newer exports put a narrow no-break space before AM/PM
  const normalized = value.replace(/[\u00A0\u202F]/g, ' ').trim();

  for (const layout of DATE_LAYOUTS) {
    const parsed = DateTime.fromFormat(normalized, layout, { zone: 'utc', locale: 'en-US' });
    if (parsed.isValid) {
      return fromEpoch(Math.floor(parsed.toSeconds()));
    }
  }

  return { ok: false, reason: `"${value}" matches no known date layout` };
}

/**
 * Interpret a single sidecar time value: numbers and digit strings are epoch
 * seconds, anything else goes through the known date layouts.
 */
export function parseTimeValue(value: unknown): ParseResult {
  const parsed = TimeValueSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: `unsupported value type ${typeof value}` };
  }

  const raw = parsed.data;
  if (typeof raw === 'number') {
    return fromEpoch(raw);
  }

  const trimmed = raw.trim();
  if (DIGITS.test(trimmed)) {
    return fromEpoch(Number.parseInt(trimmed, 10));
  }

  return fromFormatted(trimmed);
}

/**
 * Pick the authoritative capture time from a parsed sidecar.
 *
 * Fields are tried in `TIMESTAMP_CANDIDATES` order; the first one that parses
 * wins and later fields are never consulted. Returns null when none parse.
 */
export function resolveTimestamp(record: unknown, logger?: Logger): ResolvedTimestamp | null {
  for (const candidate of TIMESTAMP_CANDIDATES) {
    const value = readPath(record, candidate.path);
    if (value === undefined || value === null || value === '') {
      continue;
    }

    const result = parseTimeValue(value);
    if (result.ok) {
      logger?.debug({ field: candidate.field, epochSeconds: result.epochSeconds }, 'Resolved timestamp');
      return { epochSeconds: result.epochSeconds, field: candidate.field };
    }

    logger?.warn({ field: candidate.field, reason: result.reason }, 'Skipping unparseable time field');
  }

  return null;
}
