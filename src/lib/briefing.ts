import { celsiusToFahrenheit } from '@/lib/atmosphere';
import { calculatePerformance } from '@/lib/perf';
import type {
  AirportData,
  ClimbAtSpeed,
  DepartureProcedure,
  Operation,
  PerformanceSummary,
  ProcedureCompliance,
  WeatherSnapshot,
  WindComponents,
} from '@/types';

export interface BriefingInput {
  airport: AirportData;
  weather: WeatherSnapshot;
  performance: PerformanceSummary;
  generatedAt?: Date;
}

const signed = (n: number) => (n > 0 ? `+${n}` : `${n}`);

const SOURCE_LABEL: Record<WeatherSnapshot['source'], string> = {
  'awc-json': 'AWC METAR',
  'noaa-txt': 'NOAA METAR',
  manual: 'Manual weather',
};

export function formatWind(w: Pick<WeatherSnapshot, 'windDir' | 'windSpeedKt' | 'windGustKt'>): string {
  const dir = w.windDir === 'VRB' ? 'VRB' : `${String(w.windDir).padStart(3, '0')}°`;
  const gust = w.windGustKt != null && w.windGustKt > w.windSpeedKt ? ` G${w.windGustKt}` : '';
  return `${dir}/${w.windSpeedKt} kt${gust}`;
}

export function describeComponents(c: WindComponents): string {
  const along = c.isTailwind ? `${Math.abs(c.headwindKt)} kt tailwind` : `${c.headwindKt} kt headwind`;
  if (c.crosswindDirection === 'none') return `${along}, no crosswind`;
  return `${along}, ${c.crosswindKt} kt ${c.crosswindDirection} crosswind`;
}

function climbLines(label: string, c: ClimbAtSpeed): string[] {
  const out = [`- ${label}: ${c.tasKt} KTAS, ${c.groundSpeedKt} kt GS`];
  if (c.gradient.status === 'ok') {
    out.push(`  - Gradient: ${c.gradient.gradientFtPerNm} ft/NM (${c.gradient.climbRateFpm} ft/min)`);
  } else {
    out.push(`  - Gradient data: Not available (${c.gradient.reason})`);
  }
  return out;
}

function procedureLines(p: DepartureProcedure, c: ProcedureCompliance): string[] {
  const out = ['**Departure Procedure Climb**'];
  if (p.initialAltitudeFt != null) out.push(`- **${p.name} Initial Altitude**: ${p.initialAltitudeFt} ft MSL`);

  switch (c.status) {
    case 'compliant':
      if (c.speed === 120) {
        out.push(`- **${p.name} Requirement**: ${p.requiredGradientFtPerNm} ft/NM (✅ COMPLIANT at 120 KIAS)`);
        out.push(`- **120 KIAS Margin**: ${c.marginFtPerNm} ft/NM above requirement`);
      } else {
        out.push(`- **${p.name} Requirement**: ${p.requiredGradientFtPerNm} ft/NM (✅ COMPLIANT at 91 KIAS ONLY)`);
        out.push('- **⚠️ AGGRESSIVE CLIMB REQUIRED**: Must use 91 KIAS to meet the requirement');
        out.push(`- **91 KIAS Margin**: ${c.marginFtPerNm} ft/NM above requirement`);
      }
      break;
    case 'non_compliant':
      out.push(`- **${p.name} Requirement**: ${p.requiredGradientFtPerNm} ft/NM (❌ NON-COMPLIANT)`);
      if (c.deficit120 != null) out.push(`- **120 KIAS Deficit**: ${c.deficit120} ft/NM below requirement`);
      if (c.deficit91 != null) out.push(`- **91 KIAS Deficit**: ${c.deficit91} ft/NM below requirement`);
      break;
    case 'unknown':
      out.push(`- **${p.name} Requirement**: ${p.requiredGradientFtPerNm} ft/NM`);
      out.push(`- **⚠️ Manual Check Required**: ${c.reason}`);
      break;
  }
  return out;
}

/** Markdown briefing, one section per phase, decision after the numbers. */
export function formatBriefing({ airport, weather, performance: r, generatedAt = new Date() }: BriefingInput): string {
  const L: string[] = [];
  const push = (...lines: string[]) => L.push(...lines);

  push(`# SR22T ${r.operation.toUpperCase()} BRIEFING`, '');
  push(`Generated: ${generatedAt.toISOString().slice(11, 16)} UTC`);
  push(`Data source: ${SOURCE_LABEL[weather.source]} + ${airport.source}`, '');

  push('## Airport & Runway');
  push(`- **Airport**: ${airport.icao} ${airport.name}`);
  push(`- **Runway**: ${airport.runway} (${airport.runwayLengthFt} ft, ${r.surface.surface})`);
  push(`- **Elevation**: ${airport.elevationFt} ft MSL`);
  push(`- **Heading**: ${airport.runwayHeading}° (Magnetic)`);
  if (airport.magVarSource !== 'UNKNOWN') {
    push(`- **Magnetic variation**: ${signed(Number(airport.magneticVariation.toFixed(1)))}° (${airport.magVarSource})`);
  }
  if (airport.magVarSource === 'REGIONAL_APPROX') {
    push('  - ⚠️ Regional approximation (±3-5°) - verify runway heading against the chart');
  }
  if (r.surface.warning) push(`- ⚠️ ${r.surface.warning}`);
  push('');

  const daDelta = r.densityAltitudeFt - r.pressureAltitudeFt;
  push('## Weather');
  push(`- **Temperature**: ${weather.tempC}°C (${Math.trunc(celsiusToFahrenheit(weather.tempC))}°F)`);
  push(
    weather.altimeterUnits === 'hPa'
      ? `- **Altimeter**: ${weather.altimeterInHg} inHg (${weather.rawAltimeter} hPa)`
      : `- **Altimeter**: ${weather.altimeterInHg} inHg`,
  );
  if (weather.observedAt) {
    push(`- **Observed**: ${weather.observedAt.slice(0, 16).replace('T', ' ')}Z (${weather.ageMinutes ?? '?'} min ago)`);
  }
  push(`- **Pressure altitude**: ${r.pressureAltitudeFt} ft (ISA ${r.isaTempC}°C)`);
  push(`- **Density altitude**: ${r.densityAltitudeFt} ft (${signed(daDelta)} vs PA) - ${r.densityAltitudeImpact}`);
  push(`- **Wind**: ${formatWind(weather)}`);
  push(`  - ${describeComponents(r.wind)}`);
  if (r.wind.isTailwind && Math.abs(r.wind.headwindKt) > 5) {
    push(`  - ⚠️ **TAILWIND WARNING**: ${Math.abs(r.wind.headwindKt)} kt tailwind component`);
  }
  for (const a of r.wind.advisories) push(`  - ⚠️ ${a}`);
  push('');

  if (r.operation === 'departure') {
    push('## Performance (3600 lb)');
    push('**Takeoff Performance**');
    push(`- Ground roll: ${r.takeoff.ground_roll_ft} ft`);
    push(`- Over 50 ft obstacle: ${r.takeoff.total_distance_ft} ft`);
    push(`- Runway available: ${r.margin.availableFt} ft`);
    push(`- **Margin**: ${r.margin.marginFt} ft (${r.margin.category}, ${r.margin.percentage}%)`, '');

    push('**Climb Performance**');
    push(...climbLines('91 KIAS', r.climb.takeoff91), ...climbLines('120 KIAS', r.climb.enroute120), '');

    if (r.procedure) push(...procedureLines(r.procedure.procedure, r.procedure.compliance), '');

    push('**V-speeds (Takeoff)**');
    push(`- **Vr (Rotate)**: ${r.vSpeeds.vrKias} KIAS`);
    push(`- ${r.vSpeeds.takeoffNote}`, '');

    push('## CAPS (Cirrus Airframe Parachute System)');
    push(`- **Minimum deployment**: ${r.caps.minimumMsl} ft MSL (${r.caps.minimumAgl} ft AGL)`);
    push(`- **Recommended deployment**: ${r.caps.recommendedMsl} ft MSL (${r.caps.recommendedAgl} ft AGL)`);
    push(`- **Pattern altitude**: ${r.caps.patternAltitudeMsl} ft MSL (CAPS available)`);
    push(`- **Density altitude impact**: ${r.caps.densityAltitudeImpact}`);
    if (r.caps.departure) {
      push('- **Departure considerations**:');
      for (const p of r.caps.departure.brief) push(`  - ${p}`);
    }
    push('');
  } else {
    push('## Performance (3600 lb)');
    push('**Landing Performance**');
    push(`- Ground roll: ${r.landing.ground_roll_ft} ft`);
    push(`- Total distance: ${r.landing.total_distance_ft} ft`);
    push(`- Runway available: ${r.margin.availableFt} ft`);
    push(`- **Margin**: ${r.margin.marginFt} ft (${r.margin.category}, ${r.margin.percentage}%)`, '');

    push('**Go-Around Climb Performance**');
    push(...climbLines('120 KIAS', r.goAround));
    push('- **Note**: Performance for missed approach or go-around maneuver', '');
  }

  push(`## Decision: **${r.decision}**`);
  push(r.decision === 'GO' ? '✅ All margins adequate for safe operation' : `❌ ${r.reasons.join(', ')}`);
  push('');

  if (r.operation === 'arrival') {
    const v = r.vSpeeds;
    push('**V-speeds (Approach & Landing)**');
    push(...v.speedControl.map(s => `- ${s}`));
    if (v.usePartialFlapsForCrosswind) {
      push(`- **⚠️ Crosswind Config**: 50% flaps recommended (${v.crosswindKt} kt crosswind)`);
    }
    push(`- **Weight**: ${v.weightNote}`, '');
  }

  if (r.operation === 'departure' && r.decision === 'GO') {
    push('## Takeoff Emergency Brief');
    push(...r.phases.phases.map(p => `- **${p.title}**: ${p.brief}`), '');
    push(...r.caps.emergencyBrief.map(p => `- ${p}`), '');
  }

  const ground = r.operation === 'departure' ? r.takeoff.ground_roll_ft : r.landing.ground_roll_ft;
  push('## Calculation Details');
  push(`**${r.operation === 'departure' ? 'Takeoff' : 'Landing'} Ground Roll Calculation:**`);
  push(`- Pressure altitude: ${r.pressureAltitudeFt} ft`);
  push(`- Temperature: ${weather.tempC}°C`);
  push('- Interpolated from POH performance tables');
  push(`- Result: ${ground} ft ground roll`, '');
  push('---', '');

  return L.join('\n');
}

export interface BriefingRequest {
  operation: Operation;
  airport: AirportData;
  weather: WeatherSnapshot;
  procedure?: DepartureProcedure | null;
  weightLb?: number;
  generatedAt?: Date;
}

/** Performance for the airport and weather, and the briefing built from it. */
export function generateBriefing(req: BriefingRequest): { performance: PerformanceSummary; markdown: string } {
  const performance = calculatePerformance({
    operation: req.operation,
    fieldElevationFt: req.airport.elevationFt,
    altimeterInHg: req.weather.altimeterInHg,
    oatC: req.weather.tempC,
    runwayHeading: req.airport.runwayHeading,
    runwayLengthFt: req.airport.runwayLengthFt,
    surface: req.airport.surface,
    windDir: req.weather.windDir,
    windSpeedKt: req.weather.windSpeedKt,
    windGustKt: req.weather.windGustKt,
    weightLb: req.weightLb,
    procedure: req.procedure,
  });
  return {
    performance,
    markdown: formatBriefing({ airport: req.airport, weather: req.weather, performance, generatedAt: req.generatedAt }),
  };
}
