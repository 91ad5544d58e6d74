import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

export const METAR_MAX_AGE_MINUTES = 70;

export const PRESSURE_ALTITUDE_ROUND_FT = 10;
export const DENSITY_ALTITUDE_ROUND_FT = 50;

export const STANDARD_ALTIMETER_INHG = 29.92;
export const HPA_TO_INHG = 0.02953;

export const MAX_DEMONSTRATED_CROSSWIND_KT = 21;
export const STRONG_WIND_KT = 20;
export const SIGNIFICANT_CROSSWIND_KT = 10;

export const GO_MARGIN_FT = 500;
export const MAX_GROSS_WEIGHT_LB = 3600;

export const AWC_METAR_URL = 'https://aviationweather.gov/api/data/metar';
export const NOAA_METAR_TXT_URL = 'https://tgftp.nws.noaa.gov/data/observations/metar/stations';
export const OURAIRPORTS_AIRPORTS_CSV = 'https://davidmegginson.github.io/ourairports-data/airports.csv';
export const OURAIRPORTS_RUNWAYS_CSV = 'https://davidmegginson.github.io/ourairports-data/runways.csv';
export const NOAA_GEOMAG_URL = 'https://www.ngdc.noaa.gov/geomag-web/calculators/calculateDeclination';

export const USER_AGENT = 'SR22T-Runway-Brief/edge';
export const RETRY_DELAY_MS = 1000;

export const logLevels = ['full', 'critical', 'silent'] as const;
export type LogLevelName = (typeof logLevels)[number];

const serverEnvSchema = z.object({
  APP_LOG: z.enum(logLevels).default('critical'),
  NOAA_GEOMAG_KEY: z.string().min(1).optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
});

export interface ServerConfig {
  logLevel: LogLevelName;
  geomagKey: string | null;
  timeoutMs: number;
  retries: number;
}

/** Reads the edge handlers' settings from an environment map. */
export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  const result = serverEnvSchema.safeParse({
    APP_LOG: env.APP_LOG?.toLowerCase() || undefined,
    NOAA_GEOMAG_KEY: env.NOAA_GEOMAG_KEY || undefined,
    HTTP_TIMEOUT_MS: env.HTTP_TIMEOUT_MS || undefined,
    HTTP_RETRIES: env.HTTP_RETRIES || undefined,
  });
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  const parsed = result.data;
  return {
    logLevel: parsed.APP_LOG,
    geomagKey: parsed.NOAA_GEOMAG_KEY ?? null,
    timeoutMs: parsed.HTTP_TIMEOUT_MS,
    retries: parsed.HTTP_RETRIES,
  };
}
