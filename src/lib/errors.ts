export type BriefingErrorCode =
  | 'OUT_OF_RANGE'
  | 'MALFORMED_TABLE'
  | 'WEATHER_UNAVAILABLE'
  | 'STALE_WEATHER'
  | 'AIRPORT_NOT_FOUND'
  | 'RUNWAY_NOT_FOUND'
  | 'UPSTREAM'
  | 'CONFIG';

export class BriefingError extends Error {
  constructor(
    public readonly code: BriefingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'BriefingError';
  }
}

export type Axis = 'pressure_altitude' | 'temperature';

/** Query falls outside the span a table actually covers. */
export class OutOfRangeError extends BriefingError {
  constructor(
    public readonly tableId: string,
    public readonly axis: Axis,
    public readonly value: number,
    public readonly min: number,
    public readonly max: number,
  ) {
    const unit = axis === 'pressure_altitude' ? 'ft' : '°C';
    super(
      'OUT_OF_RANGE',
      `${axis === 'pressure_altitude' ? 'Pressure altitude' : 'Temperature'} ${value} ${unit} outside ${tableId} data range ${min}..${max} ${unit}`,
    );
    this.name = 'OutOfRangeError';
  }
}

export class MalformedTableError extends BriefingError {
  constructor(public readonly tableId: string, detail: string) {
    super('MALFORMED_TABLE', `Malformed table ${tableId}: ${detail}`);
    this.name = 'MalformedTableError';
  }
}

export class WeatherUnavailableError extends BriefingError {
  constructor(public readonly station: string, detail: string) {
    super('WEATHER_UNAVAILABLE', `METAR for ${station} unavailable: ${detail}`);
    this.name = 'WeatherUnavailableError';
  }
}

export class StaleWeatherError extends BriefingError {
  constructor(
    public readonly station: string,
    public readonly ageMinutes: number,
    public readonly maxAgeMinutes: number,
  ) {
    super('STALE_WEATHER', `METAR for ${station} is ${ageMinutes} min old (limit ${maxAgeMinutes} min)`);
    this.name = 'StaleWeatherError';
  }
}

export class AirportNotFoundError extends BriefingError {
  constructor(public readonly icao: string) {
    super('AIRPORT_NOT_FOUND', `Airport ${icao} not found`);
    this.name = 'AirportNotFoundError';
  }
}

export class RunwayNotFoundError extends BriefingError {
  constructor(public readonly icao: string, public readonly runway: string) {
    super('RUNWAY_NOT_FOUND', `Runway ${runway} not found at ${icao}`);
    this.name = 'RunwayNotFoundError';
  }
}

export class UpstreamError extends BriefingError {
  constructor(public readonly service: string, public readonly status: number | null, detail?: string) {
    super('UPSTREAM', `${service} ${status == null ? 'request failed' : `HTTP ${status}`}${detail ? `: ${detail}` : ''}`);
    this.name = 'UpstreamError';
  }
}

export class ConfigError extends BriefingError {
  constructor(detail: string) {
    super('CONFIG', `Invalid server configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
