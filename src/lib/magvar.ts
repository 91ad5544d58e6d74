import { getDate, getMonth, getYear } from 'date-fns';
import { z } from 'zod';
import { NOAA_GEOMAG_URL } from '@/config';
import { errorMessage } from '@/lib/errors';
import { getJson } from '@/lib/http';
import type { Logger } from '@/lib/logger';
import { normHeading } from '@/lib/math';
import type { MagVarSource } from '@/types';

/**
 * Per-briefing context. Records where the magnetic variation used for the
 * runway heading came from, so the briefing can say how far to trust it.
 */
export class BriefingSession {
  magVarSource: MagVarSource = 'UNKNOWN';
  magneticVariation: number | null = null;

  record(variation: number, source: MagVarSource): number {
    this.magneticVariation = variation;
    this.magVarSource = source;
    return variation;
  }
}

const geomagSchema = z.object({
  result: z.array(z.object({ declination: z.number() })).min(1),
});

export interface MagVarOptions {
  apiKey: string | null;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  logger?: Logger;
  date?: Date;
}

/**
 * Linear fit of 2025 declination across the contiguous US, with a latitude
 * term; accurate to a few degrees at best.
 */
export function regionalApproximation(lat: number, lon: number): number {
  let v: number;
  if (lon > -75) v = -18 + (lon + 75) * 0.6;
  else if (lon > -95) v = -8 + (lon + 95) * 0.3;
  else if (lon > -115) v = 2 + (lon + 115) * 0.4;
  else v = 12 + (lon + 130) * 0.3;

  v += (lat - 40) * 0.2;
  return Math.max(-25, Math.min(20, v));
}

/**
 * Declination in degrees (+E / -W) from the NOAA World Magnetic Model
 * service, falling back to the regional approximation. The session records
 * which one was used.
 */
export async function magneticVariation(
  lat: number,
  lon: number,
  session: BriefingSession,
  opts: MagVarOptions,
): Promise<number> {
  const log = opts.logger;

  if (opts.apiKey) {
    const d = opts.date ?? new Date();
    const params = new URLSearchParams({
      lat1: String(lat),
      lon1: String(lon),
      model: 'WMM',
      startYear: String(getYear(d)),
      startMonth: String(getMonth(d) + 1),
      startDay: String(getDate(d)),
      resultFormat: 'json',
      key: opts.apiKey,
    });
    try {
      const data = geomagSchema.parse(await getJson('NOAA geomag', `${NOAA_GEOMAG_URL}?${params}`, opts));
      const declination = data.result[0].declination;
      log?.info(`WMM declination ${declination.toFixed(2)} at ${lat.toFixed(3)}, ${lon.toFixed(3)}`);
      return session.record(declination, 'NOAA_WMM');
    } catch (e) {
      log?.warn(`NOAA geomag unavailable, using regional approximation: ${errorMessage(e)}`);
    }
  } else {
    log?.warn('NOAA_GEOMAG_KEY not set, using regional approximation');
  }

  return session.record(regionalApproximation(lat, lon), 'REGIONAL_APPROX');
}

/** Variation entered by the pilot from a chart or calculator. */
export function manualVariation(session: BriefingSession, variation: number): number {
  return session.record(variation, 'MANUAL_INPUT');
}

/** magnetic = true - variation, whole degrees in [0, 360). */
export function trueToMagnetic(trueHeading: number, variation: number): number {
  return Math.trunc(normHeading(trueHeading - variation)) % 360;
}
