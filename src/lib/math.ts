export function lerp(a: number, b: number, t: number) {
  return a + (b - a) * t;
}

/** Round half away from zero; never returns -0. */
export function roundHalfAway(x: number): number {
  const n = Math.round(Math.abs(x));
  if (n === 0) return 0;
  return x < 0 ? -n : n;
}

/** Nearest multiple of `unit` (10 ft, 50 ft, ...), half away from zero. */
export function roundToUnit(x: number, unit: number): number {
  return roundHalfAway(x / unit) * unit;
}

export function roundTo(x: number, decimals: number): number {
  const f = 10 ** decimals;
  return roundHalfAway(x * f) / f;
}

/** Normalises an angle difference to [-180, 180]. */
export function normDeg(delta: number): number {
  return ((delta + 180) % 360 + 360) % 360 - 180;
}

/** Normalises a heading to [0, 360). */
export function normHeading(deg: number): number {
  return ((deg % 360) + 360) % 360;
}
