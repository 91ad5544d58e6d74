import { OutOfRangeError } from '@/lib/errors';
import { lerp, roundToUnit } from '@/lib/math';
import type { PerformanceTable, TableRow } from '@/types';

/**
 * How a table cell becomes an interpolated value: which part of the cell is
 * read, how two values blend, and how the result is rounded.
 */
export interface ValueKind<C, V> {
  pick(cell: C): V;
  lerp(a: V, b: V, t: number): V;
  round(v: V, unit: number): V;
}

/** Cells are bare numbers (climb gradients). */
export const scalar: ValueKind<number, number> = {
  pick: cell => cell,
  lerp,
  round: roundToUnit,
};

/** Cells are records; each named field is interpolated and rounded on its own. */
export function fields<K extends string>(first: K, ...rest: K[]): ValueKind<Record<K, number>, Record<K, number>> {
  const names: readonly K[] = [first, ...rest];
  const build = (f: (k: K) => number): Record<K, number> => {
    const out: Partial<Record<K, number>> = {};
    for (const k of names) out[k] = f(k);
    if (!isComplete(out, names)) throw new Error(`fields ${names.join(', ')} incomplete`);
    return out;
  };
  return {
    pick: cell => build(k => cell[k]),
    lerp: (a, b, t) => build(k => lerp(a[k], b[k], t)),
    round: (v, unit) => build(k => roundToUnit(v[k], unit)),
  };
}

function isComplete<K extends string>(
  partial: Partial<Record<K, number>>,
  names: readonly K[],
): partial is Record<K, number> {
  return names.every(k => typeof partial[k] === 'number');
}

interface Bracket<T> {
  low: T;
  high: T;
  fraction: number;
}

/**
 * Brackets q on an ascending axis. Endpoints and exact samples collapse to a
 * single item; anything strictly outside [min, max] (or NaN) is an error.
 */
function bracket<T>(
  items: readonly T[],
  axisOf: (item: T) => number,
  q: number,
  outOfRange: (min: number, max: number) => Error,
): Bracket<T> {
  const first = items[0];
  const last = items[items.length - 1];
  const min = axisOf(first);
  const max = axisOf(last);

  if (!(q >= min && q <= max)) throw outOfRange(min, max);
  if (q === min) return { low: first, high: first, fraction: 0 };
  if (q === max) return { low: last, high: last, fraction: 0 };

  let i = 0;
  while (i + 2 < items.length && q > axisOf(items[i + 1])) i++;

  const low = items[i];
  const high = items[i + 1];
  const a = axisOf(low);
  const b = axisOf(high);
  if (q === a) return { low, high: low, fraction: 0 };
  if (q === b) return { low: high, high, fraction: 0 };
  return { low, high, fraction: (q - a) / (b - a) };
}

function valueInRow<C, V>(tableId: string, row: TableRow<C>, temperature: number, kind: ValueKind<C, V>): V {
  const b = bracket(
    row.samples,
    s => s.tempC,
    temperature,
    (min, max) => new OutOfRangeError(tableId, 'temperature', temperature, min, max),
  );
  const low = kind.pick(b.low.value);
  if (b.low === b.high) return low;
  return kind.lerp(low, kind.pick(b.high.value), b.fraction);
}

/**
 * Bilinear lookup: temperature within each bracketing altitude row first,
 * then altitude between the two row results. Rounded once, at the end, to the
 * table's rounding unit.
 *
 * @throws OutOfRangeError when the altitude lies outside the table or the
 *   temperature lies outside either bracketing row.
 */
export function interpolate<C, V>(
  table: PerformanceTable<C>,
  pressureAltitude: number,
  temperature: number,
  kind: ValueKind<C, V>,
): V {
  const b = bracket(
    table.rows,
    r => r.pressureAltitudeFt,
    pressureAltitude,
    (min, max) => new OutOfRangeError(table.id, 'pressure_altitude', pressureAltitude, min, max),
  );

  const low = valueInRow(table.id, b.low, temperature, kind);
  const value = b.low === b.high
    ? low
    : kind.lerp(low, valueInRow(table.id, b.high, temperature, kind), b.fraction);

  return kind.round(value, table.roundingUnit);
}
