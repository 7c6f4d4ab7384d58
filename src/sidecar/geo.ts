import { z } from 'zod';

import type { Logger } from '../lib/logger.js';
import type { GeoPoint } from '../types/index.js';

const GeoDataSchema = z.object({
  latitude: z.coerce.number(),
  longitude: z.coerce.number()
});

const NULL_ISLAND_EPSILON = 1e-6;

/**
 * Read `geoData` from a sidecar. Exporters write 0/0 when a photo has no
 * location, so that point counts as absent.
 */
export function resolveGeo(record: unknown, logger?: Logger): GeoPoint | null {
  if (typeof record !== 'object' || record === null || !('geoData' in record)) {
    return null;
  }

  const parsed = GeoDataSchema.safeParse(record.geoData);
  if (!parsed.success) {
    logger?.debug({ issues: parsed.error.issues.length }, 'Ignoring malformed geoData');
    return null;
  }

  const { latitude, longitude } = parsed.data;

  if (Math.abs(latitude) < NULL_ISLAND_EPSILON && Math.abs(longitude) < NULL_ISLAND_EPSILON) {
    return null;
  }

  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    logger?.warn({ latitude, longitude }, 'Ignoring out-of-range coordinates');
    return null;
  }

  return { latitude, longitude };
}
