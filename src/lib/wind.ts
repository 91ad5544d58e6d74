import {
  MAX_DEMONSTRATED_CROSSWIND_KT,
  SIGNIFICANT_CROSSWIND_KT,
  STRONG_WIND_KT,
} from '@/config';
import { normDeg, roundHalfAway } from '@/lib/math';
import type { WindComponents, WindDirection } from '@/types';

/**
 * Head/cross components of a wind on a runway, both referenced to magnetic.
 * Positive headwind is a headwind, negative a tailwind; the crosswind is a
 * magnitude with its side reported separately.
 *
 * Variable wind gets no headwind credit and counts in full as crosswind.
 */
export function windComponents(runwayHeading: number, windDir: WindDirection, windSpeedKt: number): WindComponents {
  const advisories: string[] = [];

  if (windDir === 'VRB') {
    const crosswindKt = roundHalfAway(windSpeedKt);
    const exceeds = windSpeedKt > MAX_DEMONSTRATED_CROSSWIND_KT;
    if (exceeds) {
      advisories.push(`Variable wind ${crosswindKt} kt may exceed ${MAX_DEMONSTRATED_CROSSWIND_KT} kt max demonstrated crosswind`);
    }
    return {
      headwindKt: 0,
      crosswindKt,
      crosswindDirection: crosswindKt === 0 ? 'none' : 'variable',
      isTailwind: false,
      crosswindExceedsLimit: exceeds,
      advisories,
    };
  }

  const angle = normDeg(windDir - runwayHeading) * Math.PI / 180;
  const head = windSpeedKt * Math.cos(angle);
  const cross = windSpeedKt * Math.sin(angle);
  const absCross = Math.abs(cross);

  const headwindKt = roundHalfAway(head);
  const crosswindKt = roundHalfAway(absCross);
  const exceeds = absCross > MAX_DEMONSTRATED_CROSSWIND_KT;

  if (exceeds) {
    advisories.push(`Crosswind ${crosswindKt} kt exceeds ${MAX_DEMONSTRATED_CROSSWIND_KT} kt max demonstrated`);
  }
  if (windSpeedKt >= STRONG_WIND_KT) {
    advisories.push(`Strong wind (${windSpeedKt} kt) - verify magnetic runway heading`);
  } else if (absCross >= SIGNIFICANT_CROSSWIND_KT) {
    advisories.push(`Significant crosswind (${crosswindKt} kt) - verify magnetic runway heading`);
  }

  return {
    headwindKt,
    crosswindKt,
    crosswindDirection: crosswindKt === 0 ? 'none' : cross > 0 ? 'right' : 'left',
    isTailwind: headwindKt < 0,
    crosswindExceedsLimit: exceeds,
    advisories,
  };
}
