import {
  DENSITY_ALTITUDE_ROUND_FT,
  PRESSURE_ALTITUDE_ROUND_FT,
  STANDARD_ALTIMETER_INHG,
} from '@/config';
import { roundTo, roundToUnit } from '@/lib/math';

/** PA = elevation + (29.92 - altimeter) * 1000, nearest 10 ft. */
export function pressureAltitude(fieldElevationFt: number, altimeterInHg: number): number {
  const pa = fieldElevationFt + (STANDARD_ALTIMETER_INHG - altimeterInHg) * 1000;
  return roundToUnit(pa, PRESSURE_ALTITUDE_ROUND_FT);
}

/** ISA temperature (°C, one decimal) with the 2 °C / 1000 ft lapse rate. */
export function isaTemperature(pressureAltitudeFt: number): number {
  return roundTo(15 - 2 * (pressureAltitudeFt / 1000), 1);
}

/** DA = PA + 120 * (OAT - ISA), nearest 50 ft. */
export function densityAltitude(pressureAltitudeFt: number, oatC: number): number {
  const da = pressureAltitudeFt + 120 * (oatC - isaTemperature(pressureAltitudeFt));
  return roundToUnit(da, DENSITY_ALTITUDE_ROUND_FT);
}

export function densityAltitudeImpact(densityAltitudeFt: number): string {
  if (densityAltitudeFt < 2000) return 'Excellent performance';
  if (densityAltitudeFt < 5000) return 'Good performance, minor reduction';
  if (densityAltitudeFt < 8000) return 'Noticeable performance reduction';
  if (densityAltitudeFt < 10000) return 'Significant performance reduction - caution advised';
  return 'Severe performance degradation - high risk';
}

export function celsiusToFahrenheit(c: number): number {
  return c * 9 / 5 + 32;
}
