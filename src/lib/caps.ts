import { roundTo } from '@/lib/math';
import type { AirportData, CapsInfo, ClimbAtSpeed, DistanceCell, RunwayMargin, StoppingAssessment, TakeoffPhases } from '@/types';

export const CAPS_MINIMUM_AGL_FT = 600;
export const CAPS_RECOMMENDED_AGL_FT = 1000;
export const CAPS_DEPARTURE_AGL_FT = 500;
export const PATTERN_AGL_FT = 1000;
export const CAPS_IMMEDIATE_CEILING_AGL_FT = 2000;
export const ABORT_DECISION_FRACTION = 0.6;

/**
 * Parachute deployment altitudes for the field, plus how soon after takeoff
 * the departure climb reaches a usable deployment height.
 */
export function capsInfo(fieldElevationFt: number, densityAltitudeFt: number, climb91: ClimbAtSpeed | null): CapsInfo {
  const minimumMsl = fieldElevationFt + CAPS_MINIMUM_AGL_FT;
  const recommendedMsl = fieldElevationFt + CAPS_RECOMMENDED_AGL_FT;
  const patternAltitudeMsl = fieldElevationFt + PATTERN_AGL_FT;
  const densityAltitudeImpact = densityAltitudeFt <= 5000
    ? 'Standard'
    : 'Reduced climb performance - CAPS altitude reached later';

  const emergencyBrief = [
    `CAPS minimum deployment: ${minimumMsl} ft MSL (${CAPS_MINIMUM_AGL_FT} ft AGL - POH limit)`,
    `CAPS recommended deployment: ${recommendedMsl} ft MSL (${CAPS_RECOMMENDED_AGL_FT} ft AGL)`,
    `Pattern altitude CAPS available: ${patternAltitudeMsl} ft MSL`,
    'Emergency procedure: CAPS - PULL - COMMUNICATE - PREPARE',
    `Below ${CAPS_MINIMUM_AGL_FT} ft AGL: Fly the airplane - CAPS deployment not recommended (POH limit)`,
  ];

  let departure: CapsInfo['departure'] = null;
  if (climb91) {
    const availableAltitudeMsl = fieldElevationFt + CAPS_DEPARTURE_AGL_FT;
    const g = climb91.gradient;
    const rate = g.status === 'ok' ? g.climbRateFpm : 0;
    const timeToAvailableMin = rate > 0 ? roundTo(CAPS_DEPARTURE_AGL_FT / rate, 1) : null;
    const distanceToAvailableNm = timeToAvailableMin != null && climb91.groundSpeedKt > 0
      ? roundTo((climb91.groundSpeedKt / 60) * timeToAvailableMin, 1)
      : null;

    const brief = [`CAPS available at ${availableAltitudeMsl} ft MSL (${CAPS_DEPARTURE_AGL_FT} ft AGL)`];
    if (timeToAvailableMin != null) {
      brief.push(`Reached in about ${timeToAvailableMin} min at ${climb91.iasKias} KIAS`);
    } else {
      brief.push('Climb rate unavailable - time to CAPS altitude unknown');
    }
    if (distanceToAvailableNm != null) brief.push(`Distance from runway: ${distanceToAvailableNm} NM`);

    departure = { availableAltitudeMsl, timeToAvailableMin, distanceToAvailableNm, brief };
  }

  return {
    minimumAgl: CAPS_MINIMUM_AGL_FT,
    minimumMsl,
    recommendedAgl: CAPS_RECOMMENDED_AGL_FT,
    recommendedMsl,
    patternAltitudeMsl,
    densityAltitudeImpact,
    emergencyBrief,
    departure,
  };
}

function stoppingAssessment(marginFt: number): StoppingAssessment {
  if (marginFt > 1000) return 'excellent';
  if (marginFt > 500) return 'adequate';
  return 'marginal';
}

/**
 * Engine-failure plan in four gates: abort on the runway, turn to land after
 * rotation, pull CAPS up to 2000 ft AGL, troubleshoot above that.
 */
export function takeoffPhases(
  field: Pick<AirportData, 'elevationFt' | 'runwayLengthFt'>,
  takeoff: DistanceCell,
  margin: RunwayMargin,
  caps: CapsInfo,
): TakeoffPhases {
  const abortDecisionFt = Math.trunc(takeoff.total_distance_ft * ABORT_DECISION_FRACTION);
  const remainingRunwayFt = field.runwayLengthFt - abortDecisionFt;
  const assessment = stoppingAssessment(margin.marginFt);
  const rotationCeilingMsl = caps.minimumMsl;
  const capsCeilingMsl = field.elevationFt + CAPS_IMMEDIATE_CEILING_AGL_FT;

  const phases = [
    {
      title: `Phase 1 - Before Rotation (0 to ~${abortDecisionFt} ft)`,
      brief: `Any emergency before ~${abortDecisionFt} ft down the runway: abort the takeoff and stop on the remaining ${remainingRunwayFt} ft (${assessment} stopping distance)`,
    },
    {
      title: `Phase 2 - After Rotation (to ${rotationCeilingMsl} ft MSL)`,
      brief: `Committed to takeoff. Engine failure below ${rotationCeilingMsl} ft MSL (${caps.minimumAgl} ft AGL): turn up to 30° left or right to the best landing area`,
    },
    {
      title: `Phase 3 - Intermediate Altitude (${rotationCeilingMsl} to ${capsCeilingMsl} ft MSL)`,
      brief: `Engine failure between ${caps.minimumAgl} and ${CAPS_IMMEDIATE_CEILING_AGL_FT} ft AGL: immediate CAPS deployment, pull the red handle without hesitation`,
    },
    {
      title: `Phase 4 - Above ${capsCeilingMsl} ft MSL`,
      brief: 'Time for troubleshooting procedures before considering CAPS deployment',
    },
  ];

  return { abortDecisionFt, remainingRunwayFt, stoppingAssessment: assessment, rotationCeilingMsl, capsCeilingMsl, phases };
}
