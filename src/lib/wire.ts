import { z } from 'zod';
import type { AirportData, WeatherSnapshot } from '@/types';

// Shapes the UI accepts back from the edge handlers

export const weatherSnapshotSchema: z.ZodType<WeatherSnapshot> = z.object({
  station: z.string(),
  source: z.enum(['awc-json', 'noaa-txt', 'manual']),
  observedAt: z.string().nullable(),
  ageMinutes: z.number().nullable(),
  windDir: z.union([z.number(), z.literal('VRB')]),
  windSpeedKt: z.number(),
  windGustKt: z.number().nullable(),
  tempC: z.number(),
  altimeterInHg: z.number(),
  rawAltimeter: z.number(),
  altimeterUnits: z.enum(['hPa', 'inHg']),
  raw: z.string().nullable(),
});

export const airportDataSchema: z.ZodType<AirportData> = z.object({
  icao: z.string(),
  name: z.string(),
  elevationFt: z.number(),
  latitude: z.number(),
  longitude: z.number(),
  runway: z.string(),
  runwayLengthFt: z.number(),
  runwayTrueHeading: z.number(),
  runwayHeading: z.number(),
  surface: z.string(),
  magneticVariation: z.number(),
  magVarSource: z.enum(['NOAA_WMM', 'MANUAL_INPUT', 'REGIONAL_APPROX', 'UNKNOWN']),
  source: z.string(),
});

const errorBodySchema = z.object({ error: z.string() });

/** GET a JSON endpoint and validate the body; handler errors surface as their message. */
export async function fetchValidated<T>(url: string, schema: z.ZodType<T>): Promise<T> {
  const r = await fetch(url, { headers: { accept: 'application/json' } });
  const body: unknown = await r.json().catch(() => null);
  if (!r.ok) {
    const err = errorBodySchema.safeParse(body);
    throw new Error(err.success ? err.data.error : `HTTP ${r.status}`);
  }
  return schema.parse(body);
}
