import { z } from 'zod';
import { loadServerConfig } from '@/config';
import { lookupAirport } from '@/lib/airports';
import { createLogger } from '@/lib/logger';
import { BriefingSession } from '@/lib/magvar';
import { icaoSchema } from '@/lib/metar';
import { errorResponse, json } from '@/lib/respond';

export const config = { runtime: 'edge' };

const querySchema = z.object({
  icao: icaoSchema,
  runway: z.string().trim().min(1, 'Provide ?runway=NN').max(12),
});

// GET /api/airport?icao=XXXX&runway=NN -> AirportData (magnetic runway heading)
export default async function handler(req: Request): Promise<Response> {
  let log = createLogger('airport');

  try {
    const cfg = loadServerConfig(process.env);
    log = createLogger('airport', cfg.logLevel);
    const params = new URL(req.url).searchParams;
    const q = querySchema.parse({ icao: params.get('icao') ?? '', runway: params.get('runway') ?? '' });
    const airport = await lookupAirport(q.icao, q.runway, {
      session: new BriefingSession(),
      geomagKey: cfg.geomagKey,
      timeoutMs: cfg.timeoutMs,
      retries: cfg.retries,
      logger: log,
    });
    return json(airport);
  } catch (e) {
    return errorResponse(e, log);
  }
}
