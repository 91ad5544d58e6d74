import { loadServerConfig } from '@/config';
import { createLogger } from '@/lib/logger';
import { fetchWeather, icaoSchema } from '@/lib/metar';
import { errorResponse, json } from '@/lib/respond';

export const config = { runtime: 'edge' };

/* ------------------------------ handler ----------------------------- */
// GET /api/metar?icao=XXXX -> WeatherSnapshot
export default async function handler(req: Request): Promise<Response> {
  let log = createLogger('metar');

  try {
    const cfg = loadServerConfig(process.env);
    log = createLogger('metar', cfg.logLevel);
    const icao = icaoSchema.parse(new URL(req.url).searchParams.get('icao') ?? '');
    const weather = await fetchWeather(icao, { timeoutMs: cfg.timeoutMs, retries: cfg.retries, logger: log });
    log.debug(`${icao} from ${weather.source}, ${weather.ageMinutes ?? '?'} min old`);
    return json(weather);
  } catch (e) {
    return errorResponse(e, log);
  }
}
