// src/lib/perf.ts
import { GO_MARGIN_FT, MAX_GROSS_WEIGHT_LB } from '@/config';
import { capsInfo, takeoffPhases } from '@/lib/caps';
import { densityAltitude, densityAltitudeImpact, isaTemperature, pressureAltitude } from '@/lib/atmosphere';
import { OutOfRangeError } from '@/lib/errors';
import { fields, interpolate, scalar } from '@/lib/interpolate';
import { roundHalfAway, roundTo } from '@/lib/math';
import { SR22T, type AircraftPerformanceData } from '@/lib/tables';
import { windComponents } from '@/lib/wind';
import type {
  ClimbAtSpeed,
  ClimbPerformance,
  ClimbRegime,
  ClimbTable,
  DepartureProcedure,
  DistanceCell,
  MarginCategory,
  Operation,
  PerformanceSummary,
  ProcedureCompliance,
  RunwayMargin,
  SurfaceAssessment,
  VSpeedData,
  VSpeeds,
  WindDirection,
} from '@/types';

const distance = fields('ground_roll_ft', 'total_distance_ft');

/* ---------------------------- table lookups ---------------------------- */

export function takeoffDistance(pa: number, oatC: number, data: AircraftPerformanceData = SR22T): DistanceCell {
  return interpolate(data.takeoffDistance, pa, oatC, distance);
}

export function landingDistance(pa: number, oatC: number, data: AircraftPerformanceData = SR22T): DistanceCell {
  return interpolate(data.landingDistance, pa, oatC, distance);
}

/** Climb gradient in ft/NM, rounded to the table's 10 ft/NM. */
export function climbGradient(
  pa: number,
  oatC: number,
  regime: ClimbRegime,
  data: AircraftPerformanceData = SR22T,
): number {
  return interpolate(data.climb[regime], pa, oatC, scalar);
}

/* -------------------------------- climb -------------------------------- */

function climbAtSpeed(table: ClimbTable, pa: number, oatC: number, densityAltitudeFt: number, headwindKt: number): ClimbAtSpeed {
  const ias = table.climbSpeedKias;
  // 2% TAS increase per 1000 ft of density altitude
  const tasKt = roundTo(ias * (1 + 0.02 * (densityAltitudeFt / 1000)), 1);
  const groundSpeedKt = roundTo(tasKt - headwindKt, 1);

  let gradient: ClimbAtSpeed['gradient'];
  try {
    const g = interpolate(table, pa, oatC, scalar);
    gradient = { status: 'ok', gradientFtPerNm: g, climbRateFpm: roundHalfAway((g * groundSpeedKt) / 60) };
  } catch (e) {
    if (!(e instanceof OutOfRangeError)) throw e;
    gradient = { status: 'unavailable', reason: e.message };
  }

  return { iasKias: ias, tasKt, groundSpeedKt, gradient };
}

/** TAS, ground speed and gradient at 91 KIAS (takeoff) and 120 KIAS (enroute). */
export function climbPerformance(
  pa: number,
  oatC: number,
  densityAltitudeFt: number,
  headwindKt: number,
  data: AircraftPerformanceData = SR22T,
): ClimbPerformance {
  return {
    takeoff91: climbAtSpeed(data.climb.takeoff_91, pa, oatC, densityAltitudeFt, headwindKt),
    enroute120: climbAtSpeed(data.climb.enroute_120, pa, oatC, densityAltitudeFt, headwindKt),
  };
}

/* ------------------------------- V-speeds ------------------------------ */

export function vSpeeds(
  data: VSpeedData,
  crosswindKt: number,
  windSpeedKt: number,
  windGustKt: number | null,
  weightLb: number = MAX_GROSS_WEIGHT_LB,
): VSpeeds {
  const corrections = data.wind_corrections;
  const gustFactor = windGustKt != null && windGustKt > windSpeedKt ? windGustKt - windSpeedKt : 0;
  const gustCorrectionKt = Math.floor(gustFactor * corrections.gust_factor_multiplier);

  const usePartialFlapsForCrosswind = crosswindKt > corrections.crosswind_partial_flaps_threshold;
  const flapConfig = usePartialFlapsForCrosswind ? 'partial_flaps_50' : 'full_flaps';
  const configRecommendation = usePartialFlapsForCrosswind
    ? '50% flaps recommended for crosswind control'
    : 'Full flaps - normal configuration';
  const approach = data.approach_speeds[flapConfig];

  const finalApproachKias = approach.final_approach_base_kias + gustCorrectionKt;
  const thresholdCrossingKias = approach.threshold_crossing_kias + Math.floor(gustCorrectionKt / 2);
  const touchdownTargetKias = approach.touchdown_target_kias;

  const speedControl = [
    `Stabilized Final: ${finalApproachKias} KIAS (${configRecommendation})`,
    `Threshold Crossing: ${thresholdCrossingKias} KIAS (begin power reduction)`,
    `Touchdown Target: ${touchdownTargetKias} KIAS (just above stall)`,
  ];
  if (gustCorrectionKt > 0) {
    speedControl.push(`Gust Correction: +${gustCorrectionKt} kt added for ${gustFactor} kt gust factor`);
  }

  return {
    vrKias: data.vr_kias,
    takeoffNote: `Rotate at ${data.vr_kias} KIAS regardless of conditions`,
    finalApproachKias,
    thresholdCrossingKias,
    touchdownTargetKias,
    flapConfig,
    configNote: approach.config_notes,
    gustCorrectionKt,
    usePartialFlapsForCrosswind,
    crosswindKt,
    weightNote: weightLb >= MAX_GROSS_WEIGHT_LB
      ? `At max gross weight (${MAX_GROSS_WEIGHT_LB} lb)`
      : `At ${weightLb} lb (consider reducing speeds)`,
    speedControl,
  };
}

/* ------------------------- margins and surfaces ------------------------ */

export function runwayMargin(availableFt: number, requiredFt: number): RunwayMargin {
  const marginFt = availableFt - requiredFt;
  if (requiredFt === 0) {
    return { availableFt, requiredFt, marginFt, category: 'UNKNOWN', percentage: 0 };
  }
  const pct = (marginFt / requiredFt) * 100;
  let category: MarginCategory;
  if (pct >= 50) category = 'EXCELLENT';
  else if (pct >= 25) category = 'GOOD';
  else if (pct >= 10) category = 'ADEQUATE';
  else if (pct >= 0) category = 'MARGINAL';
  else category = 'INSUFFICIENT';
  return { availableFt, requiredFt, marginFt, category, percentage: Math.trunc(pct) || 0 };
}

const HARD_SURFACES = ['asphalt', 'concrete', 'paved', 'sealed', 'asp', 'con', 'bitumen', 'tarmac', 'hard'];
const SOFT_SURFACES = ['grass', 'turf', 'dirt', 'gravel', 'soil', 'sand', 'earth', 'sod', 'clay', 'unpaved', 'natural', 'soft'];

/** POH figures assume a hard surface; soft fields need pilot evaluation. */
export function surfaceSuitability(surface: string): SurfaceAssessment {
  const s = surface.trim().toLowerCase();

  if (SOFT_SURFACES.some(t => s.includes(t))) {
    return {
      surface,
      suitableForStandardPerformance: false,
      requiresPilotEvaluation: true,
      warning: `Soft field (${surface}) - standard performance not applicable`,
    };
  }
  if (!s || HARD_SURFACES.some(t => s.includes(t))) {
    return {
      surface: surface || 'Assumed hard surface',
      suitableForStandardPerformance: true,
      requiresPilotEvaluation: false,
      warning: null,
    };
  }
  return {
    surface,
    suitableForStandardPerformance: true,
    requiresPilotEvaluation: true,
    warning: `Unknown surface type (${surface}) - verify suitability`,
  };
}

/* ------------------------ departure procedures ------------------------- */

/** 120 KIAS is preferred; 91 KIAS only when 120 cannot make the gradient. */
export function procedureCompliance(requiredFtPerNm: number, climb: ClimbPerformance): ProcedureCompliance {
  const g120 = climb.enroute120.gradient.status === 'ok' ? climb.enroute120.gradient.gradientFtPerNm : null;
  const g91 = climb.takeoff91.gradient.status === 'ok' ? climb.takeoff91.gradient.gradientFtPerNm : null;

  if (g120 == null && g91 == null) {
    return { status: 'unknown', reason: 'Climb gradient data not available for these conditions' };
  }
  if (g120 != null && g120 >= requiredFtPerNm) {
    return { status: 'compliant', speed: 120, marginFtPerNm: g120 - requiredFtPerNm };
  }
  if (g91 != null && g91 >= requiredFtPerNm) {
    return { status: 'compliant', speed: 91, marginFtPerNm: g91 - requiredFtPerNm };
  }
  return {
    status: 'non_compliant',
    deficit91: g91 == null ? null : requiredFtPerNm - g91,
    deficit120: g120 == null ? null : requiredFtPerNm - g120,
  };
}

/* ------------------------------- summary ------------------------------- */

export interface CalcInput {
  operation: Operation;
  fieldElevationFt: number;
  altimeterInHg: number;
  oatC: number;
  runwayHeading: number;   // magnetic
  runwayLengthFt: number;
  surface: string;
  windDir: WindDirection;  // magnetic
  windSpeedKt: number;
  windGustKt: number | null;
  weightLb?: number;
  procedure?: DepartureProcedure | null;
}

/**
 * Everything the briefing needs for one operation. Table lookups that fall
 * outside the POH data throw OutOfRangeError; only the climb gradients are
 * reported as unavailable instead, since the distances decide GO / NO-GO.
 */
export function calculatePerformance(input: CalcInput, data: AircraftPerformanceData = SR22T): PerformanceSummary {
  const pa = pressureAltitude(input.fieldElevationFt, input.altimeterInHg);
  const isaTempC = isaTemperature(pa);
  const da = densityAltitude(pa, input.oatC);
  const wind = windComponents(input.runwayHeading, input.windDir, input.windSpeedKt);
  const speeds = vSpeeds(data.vSpeeds, wind.crosswindKt, input.windSpeedKt, input.windGustKt, input.weightLb);

  const base = {
    pressureAltitudeFt: pa,
    isaTempC,
    densityAltitudeFt: da,
    densityAltitudeImpact: densityAltitudeImpact(da),
    wind,
    vSpeeds: speeds,
    surface: surfaceSuitability(input.surface),
  };
  const reasons: string[] = [];

  if (input.operation === 'departure') {
    const takeoff = takeoffDistance(pa, input.oatC, data);
    const margin = runwayMargin(input.runwayLengthFt, takeoff.total_distance_ft);
    const climb = climbPerformance(pa, input.oatC, da, wind.headwindKt, data);
    const procedure = input.procedure
      ? { procedure: input.procedure, compliance: procedureCompliance(input.procedure.requiredGradientFtPerNm, climb) }
      : null;

    if (margin.marginFt <= GO_MARGIN_FT) reasons.push('Insufficient runway margin');
    if (procedure?.compliance.status === 'non_compliant') {
      reasons.push(`Cannot meet ${procedure.procedure.name} climb requirement`);
    }

    const caps = capsInfo(input.fieldElevationFt, da, climb.takeoff91);
    const field = { elevationFt: input.fieldElevationFt, runwayLengthFt: input.runwayLengthFt };

    return {
      ...base,
      operation: 'departure',
      takeoff,
      margin,
      climb,
      procedure,
      caps,
      phases: takeoffPhases(field, takeoff, margin, caps),
      decision: reasons.length === 0 ? 'GO' : 'NO-GO',
      reasons,
    };
  }

  const landing = landingDistance(pa, input.oatC, data);
  const margin = runwayMargin(input.runwayLengthFt, landing.total_distance_ft);
  if (margin.marginFt <= GO_MARGIN_FT) reasons.push('Insufficient runway margin');

  return {
    ...base,
    operation: 'arrival',
    landing,
    margin,
    goAround: climbPerformance(pa, input.oatC, da, wind.headwindKt, data).enroute120,
    decision: reasons.length === 0 ? 'GO' : 'NO-GO',
    reasons,
  };
}
