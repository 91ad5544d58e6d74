import { z } from 'zod';
import { OURAIRPORTS_AIRPORTS_CSV, OURAIRPORTS_RUNWAYS_CSV } from '@/config';
import { parseCsv } from '@/lib/csv';
import { AirportNotFoundError, RunwayNotFoundError } from '@/lib/errors';
import { getText } from '@/lib/http';
import type { Logger } from '@/lib/logger';
import { type BriefingSession, magneticVariation, trueToMagnetic } from '@/lib/magvar';
import type { AirportData } from '@/types';

/** "3" -> "03", "3L" -> "03L", "RW27" -> "27". */
export function normalizeRunway(input: string): string {
  const rwy = input.toUpperCase().replace('RUNWAY', '').replace('RW', '').trim();
  if (/^\d[LCR]?$/.test(rwy)) return `0${rwy}`;
  return rwy;
}

const airportRowSchema = z.object({
  id: z.string().min(1),
  ident: z.string(),
  name: z.string(),
  elevation_ft: z.coerce.number().finite(),
  latitude_deg: z.coerce.number().finite(),
  longitude_deg: z.coerce.number().finite(),
});

const runwayRowSchema = z.object({
  airport_ref: z.string(),
  le_ident: z.string(),
  he_ident: z.string(),
  length_ft: z.string(),
  surface: z.string(),
  le_heading_degT: z.string(),
  he_heading_degT: z.string(),
});

export interface AirportLookupOptions {
  session: BriefingSession;
  geomagKey: string | null;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  logger?: Logger;
  date?: Date;
}

export function findAirport(csv: string, icao: string): z.infer<typeof airportRowSchema> {
  const row = parseCsv(csv).find(r => r.ident === icao);
  const parsed = row ? airportRowSchema.safeParse(row) : null;
  if (!parsed?.success) throw new AirportNotFoundError(icao);
  return parsed.data;
}

export interface RunwayRecord {
  lengthFt: number;
  trueHeading: number;
  surface: string;
}

export function findRunway(csv: string, airportId: string, icao: string, runway: string): RunwayRecord {
  const want = normalizeRunway(runway);

  for (const rec of parseCsv(csv)) {
    if (rec.airport_ref !== airportId) continue;
    const r = runwayRowSchema.safeParse(rec);
    if (!r.success) continue;

    const { le_ident, he_ident } = r.data;
    const end = le_ident.toUpperCase() === want ? 'le' : he_ident.toUpperCase() === want ? 'he' : null;
    if (!end) continue;

    const lengthFt = Math.trunc(parseFloat(r.data.length_ft));
    const trueHeading = Math.trunc(parseFloat(end === 'le' ? r.data.le_heading_degT : r.data.he_heading_degT));
    if (!(lengthFt > 0) || !Number.isFinite(trueHeading)) continue;

    const surface = r.data.surface.trim();
    return {
      lengthFt,
      trueHeading,
      surface: !surface || surface.toLowerCase() === 'unknown' ? 'Asphalt' : surface,
    };
  }
  throw new RunwayNotFoundError(icao, want);
}

/**
 * Airport and runway from the OurAirports data files. Runway headings there
 * are true; the returned heading is magnetic, using the session's variation.
 */
export async function lookupAirport(icao: string, runway: string, opts: AirportLookupOptions): Promise<AirportData> {
  const [airportsCsv, runwaysCsv] = await Promise.all([
    getText('OurAirports', OURAIRPORTS_AIRPORTS_CSV, opts),
    getText('OurAirports', OURAIRPORTS_RUNWAYS_CSV, opts),
  ]);

  const airport = findAirport(airportsCsv, icao);
  const rwy = findRunway(runwaysCsv, airport.id, icao, runway);

  const variation = await magneticVariation(airport.latitude_deg, airport.longitude_deg, opts.session, {
    apiKey: opts.geomagKey,
    timeoutMs: opts.timeoutMs,
    retries: opts.retries,
    retryDelayMs: opts.retryDelayMs,
    logger: opts.logger,
    date: opts.date,
  });
  const runwayHeading = trueToMagnetic(rwy.trueHeading, variation);
  opts.logger?.info(`${icao} ${normalizeRunway(runway)}: ${rwy.lengthFt} ft, ${rwy.trueHeading}°T -> ${runwayHeading}°M`);

  return {
    icao,
    name: airport.name,
    elevationFt: Math.trunc(airport.elevation_ft),
    latitude: airport.latitude_deg,
    longitude: airport.longitude_deg,
    runway: normalizeRunway(runway),
    runwayLengthFt: rwy.lengthFt,
    runwayTrueHeading: rwy.trueHeading,
    runwayHeading,
    surface: rwy.surface,
    magneticVariation: variation,
    magVarSource: opts.session.magVarSource,
    source: 'OurAirports',
  };
}
