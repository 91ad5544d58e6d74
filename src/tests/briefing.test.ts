import { describe, expect, it } from 'vitest';
import { describeComponents, formatWind, generateBriefing } from '@/lib/briefing';
import { manualWeather } from '@/lib/metar';
import { windComponents } from '@/lib/wind';
import type { AirportData, WeatherSnapshot } from '@/types';

const airport: AirportData = {
  icao: 'KTST',
  name: 'Test Field',
  elevationFt: 0,
  latitude: 42.3,
  longitude: -71,
  runway: '09',
  runwayLengthFt: 5000,
  runwayTrueHeading: 75,
  runwayHeading: 90,
  surface: 'Asphalt',
  magneticVariation: -14.6,
  magVarSource: 'REGIONAL_APPROX',
  source: 'OurAirports',
};

const calm: WeatherSnapshot = manualWeather('KTST', { windDir: 90, windSpeedKt: 10, tempC: 15, altimeterInHg: 29.92 });
const generatedAt = new Date('2025-09-22T10:32:00Z');

function lines(...args: Parameters<typeof generateBriefing>) {
  return generateBriefing(...args).markdown.split('\n');
}

describe('formatWind', () => {
  it('pads the direction and shows gusts above the mean wind', () => {
    expect(formatWind({ windDir: 50, windSpeedKt: 15, windGustKt: 25 })).toBe('050°/15 kt G25');
    expect(formatWind({ windDir: 250, windSpeedKt: 15, windGustKt: 15 })).toBe('250°/15 kt');
    expect(formatWind({ windDir: 'VRB', windSpeedKt: 4, windGustKt: null })).toBe('VRB/4 kt');
  });
});

describe('describeComponents', () => {
  it('names the side of the crosswind', () => {
    expect(describeComponents(windComponents(90, 90, 10))).toBe('10 kt headwind, no crosswind');
    expect(describeComponents(windComponents(90, 180, 20))).toBe('0 kt headwind, 20 kt right crosswind');
    expect(describeComponents(windComponents(90, 270, 10))).toBe('10 kt tailwind, no crosswind');
  });
});

describe('generateBriefing', () => {
  it('briefs a sea-level departure', () => {
    const { performance, markdown } = generateBriefing({ operation: 'departure', airport, weather: calm, generatedAt });
    expect(performance.decision).toBe('GO');

    const L = markdown.split('\n');
    expect(L[0]).toBe('# SR22T DEPARTURE BRIEFING');
    expect(L).toContain('Generated: 10:32 UTC');
    expect(L).toContain('Data source: Manual weather + OurAirports');
    expect(L).toContain('- **Runway**: 09 (5000 ft, Asphalt)');
    expect(L).toContain('- **Heading**: 90° (Magnetic)');
    expect(L).toContain('- **Magnetic variation**: -14.6° (REGIONAL_APPROX)');
    expect(L).toContain('  - ⚠️ Regional approximation (±3-5°) - verify runway heading against the chart');
    expect(L).toContain('- **Temperature**: 15°C (59°F)');
    expect(L).toContain('- **Altimeter**: 29.92 inHg');
    expect(L).toContain('- **Pressure altitude**: 0 ft (ISA 15°C)');
    expect(L).toContain('- **Density altitude**: 0 ft (0 vs PA) - Excellent performance');
    expect(L).toContain('- **Wind**: 090°/10 kt');
    expect(L).toContain('  - 10 kt headwind, no crosswind');
    expect(L).toContain('- Ground roll: 1500 ft');
    expect(L).toContain('- Over 50 ft obstacle: 2100 ft');
    expect(L).toContain('- **Margin**: 2900 ft (EXCELLENT, 138%)');
    expect(L).toContain('- 91 KIAS: 91 KTAS, 81 kt GS');
    expect(L).toContain('  - Gradient: 780 ft/NM (1053 ft/min)');
    expect(L).toContain('- 120 KIAS: 120 KTAS, 110 kt GS');
    expect(L).toContain('  - Gradient: 600 ft/NM (1100 ft/min)');
    expect(L).toContain('- **Vr (Rotate)**: 80 KIAS');
    expect(L).toContain('- **Minimum deployment**: 600 ft MSL (600 ft AGL)');
    expect(L).toContain('  - Reached in about 0.5 min at 91 KIAS');
    expect(L).toContain('## Decision: **GO**');
    expect(L).toContain('✅ All margins adequate for safe operation');
    expect(L).toContain(
      '- **Phase 1 - Before Rotation (0 to ~1260 ft)**: Any emergency before ~1260 ft down the runway: abort the takeoff and stop on the remaining 3740 ft (excellent stopping distance)',
    );
    expect(L).toContain('- **Phase 3 - Intermediate Altitude (600 to 2000 ft MSL)**: Engine failure between 600 and 2000 ft AGL: immediate CAPS deployment, pull the red handle without hesitation');
    expect(L).toContain('- Emergency procedure: CAPS - PULL - COMMUNICATE - PREPARE');
    expect(L).toContain('- Result: 1500 ft ground roll');
    expect(L.some(l => l.startsWith('- **Observed**'))).toBe(false);
    expect(markdown.endsWith('---\n')).toBe(true);
  });

  it('puts the decision after the performance numbers', () => {
    const L = lines({ operation: 'departure', airport, weather: calm, generatedAt });
    expect(L.indexOf('## Decision: **GO**')).toBeGreaterThan(L.indexOf('**Climb Performance**'));
    expect(L.indexOf('## Takeoff Emergency Brief')).toBeGreaterThan(L.indexOf('## Decision: **GO**'));
  });

  it('lists the reasons for NO-GO and drops the emergency brief', () => {
    const L = lines({ operation: 'departure', airport: { ...airport, runwayLengthFt: 2500 }, weather: calm, generatedAt });
    expect(L).toContain('## Decision: **NO-GO**');
    expect(L).toContain('❌ Insufficient runway margin');
    expect(L).not.toContain('## Takeoff Emergency Brief');
  });

  it('reports procedure compliance', () => {
    const L = lines({
      operation: 'departure',
      airport,
      weather: calm,
      generatedAt,
      procedure: { name: 'PLAINS3', requiredGradientFtPerNm: 700, initialAltitudeFt: 4000 },
    });
    expect(L).toContain('- **PLAINS3 Initial Altitude**: 4000 ft MSL');
    expect(L).toContain('- **PLAINS3 Requirement**: 700 ft/NM (✅ COMPLIANT at 91 KIAS ONLY)');
    expect(L).toContain('- **91 KIAS Margin**: 80 ft/NM above requirement');
  });

  it('warns about tailwind', () => {
    const weather = { ...calm, windDir: 270 };
    const L = lines({ operation: 'departure', airport, weather, generatedAt });
    expect(L).toContain('  - 10 kt tailwind, no crosswind');
    expect(L).toContain('  - ⚠️ **TAILWIND WARNING**: 10 kt tailwind component');
  });

  it('shows the observation time and hPa setting of a fetched report', () => {
    const weather: WeatherSnapshot = {
      ...manualWeather('KTST', { windDir: 90, windSpeedKt: 10, tempC: 15, altimeterInHg: 1013 }),
      source: 'awc-json',
      observedAt: '2025-09-22T10:20:00.000Z',
      ageMinutes: 12,
    };
    const L = lines({ operation: 'departure', airport, weather, generatedAt });
    expect(L).toContain('Data source: AWC METAR + OurAirports');
    expect(L).toContain('- **Altimeter**: 29.91 inHg (1013 hPa)');
    expect(L).toContain('- **Observed**: 2025-09-22 10:20Z (12 min ago)');
  });

  it('briefs an arrival with landing distance and approach speeds', () => {
    const L = lines({ operation: 'arrival', airport, weather: calm, generatedAt });
    expect(L[0]).toBe('# SR22T ARRIVAL BRIEFING');
    expect(L).toContain('- Total distance: 2550 ft');
    expect(L).toContain('- **Margin**: 2450 ft (EXCELLENT, 96%)');
    expect(L).toContain('- 120 KIAS: 120 KTAS, 110 kt GS');
    expect(L).toContain('- Stabilized Final: 82.5 KIAS (Full flaps - normal configuration)');
    expect(L).toContain('- **Weight**: At max gross weight (3600 lb)');
    expect(L).toContain('**Landing Ground Roll Calculation:**');
    expect(L).not.toContain('## CAPS (Cirrus Airframe Parachute System)');
  });

  it('flags a soft runway surface', () => {
    const L = lines({ operation: 'departure', airport: { ...airport, surface: 'Turf' }, weather: calm, generatedAt });
    expect(L).toContain('- ⚠️ Soft field (Turf) - standard performance not applicable');
  });
});
