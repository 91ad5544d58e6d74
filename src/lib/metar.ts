import { differenceInMinutes, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { AWC_METAR_URL, HPA_TO_INHG, METAR_MAX_AGE_MINUTES, NOAA_METAR_TXT_URL } from '@/config';
import { StaleWeatherError, WeatherUnavailableError, errorMessage } from '@/lib/errors';
import { getJson, getText } from '@/lib/http';
import type { Logger } from '@/lib/logger';
import { roundTo } from '@/lib/math';
import type { WeatherSnapshot, WindDirection } from '@/types';

export const icaoSchema = z
  .string()
  .trim()
  .transform(s => s.toUpperCase())
  .pipe(z.string().regex(/^[A-Z0-9]{4}$/, 'Provide a 4-letter ICAO code'));

/* ------------------------------ raw text ------------------------------ */

// First TT/DD group, e.g. "13/07" or "M02/M05"
export function extractTempC(raw: string): number | null {
  const m = raw.match(/(?:^|\s)(M?\d{1,2})\/(M?\d{1,2})(?=\s|$)/);
  if (!m) return null;
  const t = m[1];
  return t.startsWith('M') ? -parseInt(t.slice(1), 10) || 0 : parseInt(t, 10);
}

export interface RawFields {
  windDir: WindDirection | null;
  windSpeedKt: number | null;
  windGustKt: number | null;
  tempC: number | null;
  rawAltimeter: number | null;
}

export function parseFromRaw(raw: string): RawFields {
  // "02008KT", "VRB04KT", "22012G20KT"
  const wind = raw.match(/\b(\d{3}|VRB)(\d{2,3})(?:G(\d{2,3}))?KT\b/);
  // "Q1027" (hPa) or "A2992" (inHg * 100)
  const q = raw.match(/\bQ(\d{4})\b/);
  const a = raw.match(/\bA(\d{4})\b/);

  return {
    windDir: wind ? (wind[1] === 'VRB' ? 'VRB' : parseInt(wind[1], 10)) : null,
    windSpeedKt: wind ? parseInt(wind[2], 10) : null,
    windGustKt: wind?.[3] ? parseInt(wind[3], 10) : null,
    tempC: extractTempC(raw),
    rawAltimeter: q ? parseInt(q[1], 10) : a ? parseInt(a[1], 10) / 100 : null,
  };
}

/* ----------------------------- altimeter ------------------------------ */

/** Values above 100 are hPa and get converted; anything else is already inHg. */
export function normalizeAltimeter(raw: number): Pick<WeatherSnapshot, 'altimeterInHg' | 'rawAltimeter' | 'altimeterUnits'> {
  return raw > 100
    ? { altimeterInHg: roundTo(raw * HPA_TO_INHG, 2), rawAltimeter: raw, altimeterUnits: 'hPa' }
    : { altimeterInHg: roundTo(raw, 2), rawAltimeter: raw, altimeterUnits: 'inHg' };
}

/* ------------------------------- sources ------------------------------ */

const num = z.preprocess(v => (v === '' || v == null ? undefined : v), z.coerce.number().finite().optional());

const awcItemSchema = z.object({
  icaoId: z.string().optional(),
  reportTime: z.string().optional(),
  obsTime: z.number().optional(),
  temp: num,
  altim: num,
  wdir: z.union([z.literal('VRB'), num]).optional(),
  wspd: num,
  wgst: num,
  rawOb: z.string().optional(),
});

export type AwcItem = z.infer<typeof awcItemSchema>;

interface Assembled {
  station: string;
  source: WeatherSnapshot['source'];
  observedAt: Date | null;
  raw: string | null;
  fields: RawFields;
}

function assemble(a: Assembled, now: Date): WeatherSnapshot {
  const { fields } = a;
  const missing = [
    fields.tempC == null && 'temperature',
    fields.rawAltimeter == null && 'altimeter',
    fields.windSpeedKt == null && 'wind',
    fields.windDir == null && (fields.windSpeedKt ?? 0) > 0 && 'wind direction',
  ].filter(Boolean);
  if (fields.tempC == null || fields.rawAltimeter == null || fields.windSpeedKt == null || missing.length > 0) {
    throw new WeatherUnavailableError(a.station, `report lacks ${missing.join(', ')}`);
  }

  return {
    station: a.station,
    source: a.source,
    observedAt: a.observedAt ? a.observedAt.toISOString() : null,
    ageMinutes: a.observedAt ? differenceInMinutes(now, a.observedAt) : null,
    windDir: fields.windDir ?? 0, // calm
    windSpeedKt: fields.windSpeedKt,
    windGustKt: fields.windGustKt,
    tempC: fields.tempC,
    ...normalizeAltimeter(fields.rawAltimeter),
    raw: a.raw,
  };
}

/** AWC JSON item -> snapshot; gaps are filled from the raw report. */
export function normalizeAwc(station: string, item: AwcItem, now: Date = new Date()): WeatherSnapshot {
  let observedAt: Date | null = null;
  if (item.reportTime) {
    // AWC sends "2025-09-22 10:20:00" as well as full ISO strings
    const d = parseISO(item.reportTime.replace(' ', 'T').replace(/(T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/, '$1Z'));
    observedAt = isValid(d) ? d : null;
  } else if (item.obsTime != null) {
    observedAt = new Date(item.obsTime * 1000);
  }

  const fromRaw = item.rawOb ? parseFromRaw(item.rawOb) : null;
  const wdir = item.wdir ?? null;

  return assemble({
    station: item.icaoId ?? station,
    source: 'awc-json',
    observedAt,
    raw: item.rawOb ?? null,
    fields: {
      windDir: wdir ?? fromRaw?.windDir ?? null,
      windSpeedKt: item.wspd ?? fromRaw?.windSpeedKt ?? null,
      windGustKt: item.wgst ?? fromRaw?.windGustKt ?? null,
      tempC: item.temp ?? fromRaw?.tempC ?? null,
      rawAltimeter: item.altim ?? fromRaw?.rawAltimeter ?? null,
    },
  }, now);
}

/** NOAA station file: a "YYYY/MM/DD HH:MM" line, then the report. */
export function parseNoaaText(station: string, text: string, now: Date = new Date()): WeatherSnapshot {
  const lines = text.trim().split(/\r?\n/).map(s => s.trim()).filter(Boolean);
  const raw = lines[lines.length - 1] || '';
  if (!raw) throw new WeatherUnavailableError(station, 'empty NOAA report');

  const t = lines[0]?.match(/\b(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2})\b/);
  const observedAt = t
    ? new Date(Date.UTC(Number(t[1]), Number(t[2]) - 1, Number(t[3]), Number(t[4]), Number(t[5])))
    : null;

  return assemble({
    station: raw.match(/^[A-Z0-9]{4}\b/)?.[0] ?? station,
    source: 'noaa-txt',
    observedAt,
    raw,
    fields: parseFromRaw(raw),
  }, now);
}

/** Pilot-entered weather; never stale. */
export function manualWeather(
  station: string,
  values: { windDir: WindDirection; windSpeedKt: number; windGustKt?: number | null; tempC: number; altimeterInHg: number },
): WeatherSnapshot {
  return {
    station,
    source: 'manual',
    observedAt: null,
    ageMinutes: 0,
    windDir: values.windDir,
    windSpeedKt: values.windSpeedKt,
    windGustKt: values.windGustKt ?? null,
    tempC: values.tempC,
    ...normalizeAltimeter(values.altimeterInHg),
    raw: null,
  };
}

export function assertFresh(w: WeatherSnapshot, maxAgeMinutes: number = METAR_MAX_AGE_MINUTES): WeatherSnapshot {
  if (w.ageMinutes != null && w.ageMinutes > maxAgeMinutes) {
    throw new StaleWeatherError(w.station, w.ageMinutes, maxAgeMinutes);
  }
  return w;
}

/* ------------------------------- client ------------------------------- */

export interface WeatherOptions {
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  logger?: Logger;
  now?: Date;
  maxAgeMinutes?: number;
}

async function fetchAwc(icao: string, opts: WeatherOptions): Promise<WeatherSnapshot> {
  const url = `${AWC_METAR_URL}?ids=${encodeURIComponent(icao)}&format=json&taf=false`;
  const data = await getJson('AWC', url, opts);
  const items = z.array(awcItemSchema).safeParse(Array.isArray(data) ? data : [data]);
  if (!items.success) throw new WeatherUnavailableError(icao, 'unexpected AWC response');
  const first = items.data[0];
  if (!first) throw new WeatherUnavailableError(icao, 'no AWC report');
  return normalizeAwc(icao, first, opts.now);
}

async function fetchNoaa(icao: string, opts: WeatherOptions): Promise<WeatherSnapshot> {
  const txt = await getText('NOAA', `${NOAA_METAR_TXT_URL}/${icao}.TXT`, opts);
  return parseNoaaText(icao, txt, opts.now);
}

/**
 * Current METAR for a station: AWC JSON, then the NOAA text file. A report
 * older than the age limit is rejected whichever source it came from.
 */
export async function fetchWeather(icao: string, opts: WeatherOptions): Promise<WeatherSnapshot> {
  const max = opts.maxAgeMinutes ?? METAR_MAX_AGE_MINUTES;
  let awcError: unknown;
  try {
    return assertFresh(await fetchAwc(icao, opts), max);
  } catch (e) {
    awcError = e;
    opts.logger?.warn(`AWC METAR for ${icao} failed, trying NOAA: ${errorMessage(e)}`);
  }

  try {
    return assertFresh(await fetchNoaa(icao, opts), max);
  } catch (e) {
    if (e instanceof StaleWeatherError) throw e;
    if (awcError instanceof StaleWeatherError) throw awcError;
    throw new WeatherUnavailableError(icao, `AWC: ${errorMessage(awcError)}; NOAA: ${errorMessage(e)}`);
  }
}
