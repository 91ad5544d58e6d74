import { describe, expect, it } from 'vitest';
import { capsInfo, takeoffPhases } from '@/lib/caps';
import { OutOfRangeError } from '@/lib/errors';
import {
  type CalcInput,
  calculatePerformance,
  climbPerformance,
  procedureCompliance,
  runwayMargin,
  surfaceSuitability,
  vSpeeds,
} from '@/lib/perf';
import { SR22T } from '@/lib/tables';
import type { ClimbAtSpeed, ClimbPerformance } from '@/types';

const seaLevel: CalcInput = {
  operation: 'departure',
  fieldElevationFt: 0,
  altimeterInHg: 29.92,
  oatC: 15,
  runwayHeading: 90,
  runwayLengthFt: 5000,
  surface: 'Asphalt',
  windDir: 90,
  windSpeedKt: 10,
  windGustKt: null,
};

function climbAt(iasKias: number, gradient: number | null): ClimbAtSpeed {
  return {
    iasKias,
    tasKt: iasKias,
    groundSpeedKt: iasKias,
    gradient: gradient == null
      ? { status: 'unavailable', reason: 'out of data' }
      : { status: 'ok', gradientFtPerNm: gradient, climbRateFpm: gradient },
  };
}

const climb = (g91: number | null, g120: number | null): ClimbPerformance => ({
  takeoff91: climbAt(91, g91),
  enroute120: climbAt(120, g120),
});

describe('climbPerformance', () => {
  it('corrects TAS for density altitude and applies headwind', () => {
    const c = climbPerformance(1000, 13, 1000, 0);
    expect(c.takeoff91).toEqual({
      iasKias: 91,
      tasKt: 92.8,
      groundSpeedKt: 92.8,
      gradient: { status: 'ok', gradientFtPerNm: 770, climbRateFpm: 1191 },
    });
    expect(c.enroute120.tasKt).toBe(122.4);
    expect(c.enroute120.gradient).toEqual({ status: 'ok', gradientFtPerNm: 580, climbRateFpm: 1183 });
  });

  it('subtracts headwind from TAS for ground speed', () => {
    const c = climbPerformance(0, 15, 0, 10);
    expect(c.takeoff91.groundSpeedKt).toBe(81);
    expect(c.enroute120.groundSpeedKt).toBe(110);
  });

  it('reports a gradient outside the data as unavailable, never zero', () => {
    const c = climbPerformance(0, -30, 0, 0);
    expect(c.takeoff91.gradient).toEqual({
      status: 'unavailable',
      reason: 'Temperature -30 °C outside takeoff_climb_gradient_91 data range -20..50 °C',
    });
    expect(c.enroute120.gradient).toEqual({ status: 'ok', gradientFtPerNm: 860, climbRateFpm: 1720 });
  });
});

describe('vSpeeds', () => {
  const data = SR22T.vSpeeds;

  it('uses full flaps with no correction in steady wind', () => {
    const v = vSpeeds(data, 5, 10, null);
    expect(v.vrKias).toBe(80);
    expect(v.flapConfig).toBe('full_flaps');
    expect(v.finalApproachKias).toBe(82.5);
    expect(v.thresholdCrossingKias).toBe(79);
    expect(v.touchdownTargetKias).toBe(67);
    expect(v.gustCorrectionKt).toBe(0);
    expect(v.weightNote).toBe('At max gross weight (3600 lb)');
  });

  it('adds half the gust factor to final and half of that to threshold', () => {
    const v = vSpeeds(data, 5, 10, 20);
    expect(v.gustCorrectionKt).toBe(5);
    expect(v.finalApproachKias).toBe(87.5);
    expect(v.thresholdCrossingKias).toBe(81);
    expect(v.touchdownTargetKias).toBe(67);
    expect(v.speedControl[3]).toBe('Gust Correction: +5 kt added for 10 kt gust factor');
  });

  it('switches to 50% flaps above 15 kt crosswind', () => {
    expect(vSpeeds(data, 15, 20, null).flapConfig).toBe('full_flaps');
    const v = vSpeeds(data, 16, 20, null);
    expect(v.flapConfig).toBe('partial_flaps_50');
    expect(v.usePartialFlapsForCrosswind).toBe(true);
    expect(v.finalApproachKias).toBe(87.5);
    expect(v.touchdownTargetKias).toBe(72);
  });

  it('notes lighter weights', () => {
    expect(vSpeeds(data, 0, 0, null, 3400).weightNote).toBe('At 3400 lb (consider reducing speeds)');
  });
});

describe('runwayMargin', () => {
  it('categorises by margin as a share of the distance required', () => {
    expect(runwayMargin(8000, 3000)).toEqual({
      availableFt: 8000, requiredFt: 3000, marginFt: 5000, category: 'EXCELLENT', percentage: 166,
    });
    expect(runwayMargin(3000, 2400)).toMatchObject({ category: 'GOOD', percentage: 25 });
    expect(runwayMargin(2650, 2400)).toMatchObject({ category: 'ADEQUATE', percentage: 10 });
    expect(runwayMargin(2500, 2400)).toMatchObject({ category: 'MARGINAL', percentage: 4 });
    expect(runwayMargin(2000, 2400)).toMatchObject({ category: 'INSUFFICIENT', marginFt: -400, percentage: -16 });
  });

  it('cannot categorise without a required distance', () => {
    expect(runwayMargin(3000, 0)).toMatchObject({ category: 'UNKNOWN', percentage: 0 });
  });
});

describe('surfaceSuitability', () => {
  it('accepts hard surfaces', () => {
    expect(surfaceSuitability('ASP')).toEqual({
      surface: 'ASP', suitableForStandardPerformance: true, requiresPilotEvaluation: false, warning: null,
    });
    expect(surfaceSuitability('').surface).toBe('Assumed hard surface');
  });

  it('rejects soft fields for standard performance', () => {
    const s = surfaceSuitability('Turf');
    expect(s.suitableForStandardPerformance).toBe(false);
    expect(s.warning).toBe('Soft field (Turf) - standard performance not applicable');
  });

  it('asks for verification of unknown surfaces', () => {
    expect(surfaceSuitability('Mats')).toEqual({
      surface: 'Mats',
      suitableForStandardPerformance: true,
      requiresPilotEvaluation: true,
      warning: 'Unknown surface type (Mats) - verify suitability',
    });
  });
});

describe('procedureCompliance', () => {
  it('prefers 120 KIAS', () => {
    expect(procedureCompliance(500, climb(780, 600))).toEqual({ status: 'compliant', speed: 120, marginFtPerNm: 100 });
  });

  it('falls back to 91 KIAS', () => {
    expect(procedureCompliance(700, climb(780, 600))).toEqual({ status: 'compliant', speed: 91, marginFtPerNm: 80 });
  });

  it('reports the deficit at both speeds', () => {
    expect(procedureCompliance(900, climb(780, 600))).toEqual({ status: 'non_compliant', deficit91: 120, deficit120: 300 });
  });

  it('is unknown without gradient data', () => {
    expect(procedureCompliance(500, climb(null, null)).status).toBe('unknown');
    expect(procedureCompliance(700, climb(null, 600))).toEqual({ status: 'non_compliant', deficit91: null, deficit120: 100 });
  });
});

describe('capsInfo', () => {
  it('offsets deployment altitudes from field elevation', () => {
    const c = capsInfo(5434, 7400, null);
    expect(c.minimumMsl).toBe(6034);
    expect(c.recommendedMsl).toBe(6434);
    expect(c.patternAltitudeMsl).toBe(6434);
    expect(c.densityAltitudeImpact).toBe('Reduced climb performance - CAPS altitude reached later');
    expect(c.departure).toBeNull();
  });

  it('times the climb to CAPS altitude from the 91 KIAS climb rate', () => {
    const c = capsInfo(0, 0, { iasKias: 91, tasKt: 91, groundSpeedKt: 90, gradient: { status: 'ok', gradientFtPerNm: 800, climbRateFpm: 1000 } });
    expect(c.densityAltitudeImpact).toBe('Standard');
    expect(c.departure).toEqual({
      availableAltitudeMsl: 500,
      timeToAvailableMin: 0.5,
      distanceToAvailableNm: 0.8,
      brief: [
        'CAPS available at 500 ft MSL (500 ft AGL)',
        'Reached in about 0.5 min at 91 KIAS',
        'Distance from runway: 0.8 NM',
      ],
    });
  });

  it('leaves the time open when the climb rate is unknown', () => {
    const c = capsInfo(0, 0, climbAt(91, null));
    expect(c.departure?.timeToAvailableMin).toBeNull();
    expect(c.departure?.distanceToAvailableNm).toBeNull();
  });
});

describe('takeoffPhases', () => {
  const caps = capsInfo(5434, 7400, null);
  const takeoff = { ground_roll_ft: 2000, total_distance_ft: 3125 };

  it('sets the abort point and phase ceilings from the field', () => {
    const p = takeoffPhases({ elevationFt: 5434, runwayLengthFt: 12000 }, takeoff, runwayMargin(12000, 3125), caps);
    expect(p.abortDecisionFt).toBe(1875);
    expect(p.remainingRunwayFt).toBe(10125);
    expect(p.stoppingAssessment).toBe('excellent');
    expect(p.rotationCeilingMsl).toBe(6034);
    expect(p.capsCeilingMsl).toBe(7434);
    expect(p.phases.map(x => x.title)).toEqual([
      'Phase 1 - Before Rotation (0 to ~1875 ft)',
      'Phase 2 - After Rotation (to 6034 ft MSL)',
      'Phase 3 - Intermediate Altitude (6034 to 7434 ft MSL)',
      'Phase 4 - Above 7434 ft MSL',
    ]);
    expect(p.phases[0].brief).toBe(
      'Any emergency before ~1875 ft down the runway: abort the takeoff and stop on the remaining 10125 ft (excellent stopping distance)',
    );
  });

  it('grades stopping distance by runway margin', () => {
    const field = { elevationFt: 5434, runwayLengthFt: 3125 };
    expect(takeoffPhases(field, takeoff, runwayMargin(4126, 3125), caps).stoppingAssessment).toBe('excellent');
    expect(takeoffPhases(field, takeoff, runwayMargin(4125, 3125), caps).stoppingAssessment).toBe('adequate');
    expect(takeoffPhases(field, takeoff, runwayMargin(3625, 3125), caps).stoppingAssessment).toBe('marginal');
  });
});

describe('calculatePerformance', () => {
  it('briefs a sea-level departure as GO', () => {
    const r = calculatePerformance(seaLevel);
    expect(r.operation).toBe('departure');
    if (r.operation !== 'departure') return;
    expect(r.pressureAltitudeFt).toBe(0);
    expect(r.densityAltitudeFt).toBe(0);
    expect(r.takeoff).toEqual({ ground_roll_ft: 1500, total_distance_ft: 2100 });
    expect(r.margin).toMatchObject({ marginFt: 2900, category: 'EXCELLENT', percentage: 138 });
    expect(r.wind.headwindKt).toBe(10);
    expect(r.climb.takeoff91.gradient).toEqual({ status: 'ok', gradientFtPerNm: 780, climbRateFpm: 1053 });
    expect(r.procedure).toBeNull();
    expect(r.decision).toBe('GO');
    expect(r.reasons).toEqual([]);
  });

  it('calls NO-GO on a short runway', () => {
    const r = calculatePerformance({ ...seaLevel, runwayLengthFt: 2500 });
    expect(r.decision).toBe('NO-GO');
    expect(r.reasons).toEqual(['Insufficient runway margin']);
  });

  it('calls NO-GO when the procedure gradient cannot be met', () => {
    const procedure = { name: 'PLAINS3', requiredGradientFtPerNm: 900, initialAltitudeFt: null };
    const r = calculatePerformance({ ...seaLevel, procedure });
    expect(r.reasons).toEqual(['Cannot meet PLAINS3 climb requirement']);

    const ok = calculatePerformance({ ...seaLevel, procedure: { ...procedure, requiredGradientFtPerNm: 700 } });
    expect(ok.decision).toBe('GO');
    if (ok.operation === 'departure') {
      expect(ok.procedure?.compliance).toEqual({ status: 'compliant', speed: 91, marginFtPerNm: 80 });
    }
  });

  it('briefs an arrival with landing distance and go-around climb', () => {
    const r = calculatePerformance({ ...seaLevel, operation: 'arrival' });
    expect(r.operation).toBe('arrival');
    if (r.operation !== 'arrival') return;
    expect(r.landing).toEqual({ ground_roll_ft: 1200, total_distance_ft: 2550 });
    expect(r.margin).toMatchObject({ marginFt: 2450, category: 'EXCELLENT', percentage: 96 });
    expect(r.goAround.iasKias).toBe(120);
    expect(r.goAround.groundSpeedKt).toBe(110);
  });

  it('propagates out-of-range distances', () => {
    expect(() => calculatePerformance({ ...seaLevel, oatC: -10 })).toThrow(OutOfRangeError);
    expect(() => calculatePerformance({ ...seaLevel, fieldElevationFt: 11000 })).toThrow(OutOfRangeError);
  });
});
