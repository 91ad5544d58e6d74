import { z } from 'zod';
import perfData from '@/data/sr22t_performance.json';
import { isaTemperature } from '@/lib/atmosphere';
import { MalformedTableError } from '@/lib/errors';
import type {
  ClimbRegime,
  ClimbTable,
  DistanceCell,
  PerformanceTable,
  TableRow,
  TableSample,
  TemperatureLabel,
  VSpeedData,
} from '@/types';

/* ------------------------------ schema ------------------------------ */

const distanceCellSchema = z.object({
  ground_roll_ft: z.number().nonnegative(),
  total_distance_ft: z.number().nonnegative(),
});

function tableSchema<T extends z.ZodTypeAny>(cell: T) {
  return z.object({
    title: z.string(),
    rounding_unit: z.number().positive(),
    conditions: z
      .array(
        z.object({
          pressure_altitude_ft: z.number().int(),
          performance: z.record(z.string(), cell),
        }),
      )
      .min(1),
  });
}

const distanceTableSchema = tableSchema(distanceCellSchema);
const climbTableSchema = tableSchema(z.number()).extend({
  climb_speed_kias: z.number().positive(),
});

const approachSchema = z.object({
  final_approach_base_kias: z.number(),
  threshold_crossing_kias: z.number(),
  touchdown_target_kias: z.number(),
  config_notes: z.string(),
});

const vSpeedSchema = z.object({
  vr_kias: z.number(),
  approach_speeds: z.object({
    full_flaps: approachSchema,
    partial_flaps_50: approachSchema,
    no_flaps: approachSchema,
  }),
  wind_corrections: z.object({
    gust_factor_multiplier: z.number(),
    crosswind_partial_flaps_threshold: z.number(),
    weight_correction_per_100lb: z.number(),
  }),
});

const dataSchema = z.object({
  schema_version: z.string(),
  aircraft: z.string(),
  weight_lb: z.number(),
  data_source: z.string(),
  notes: z.string(),
  v_speeds: vSpeedSchema,
  tables: z.object({
    takeoff_distance: distanceTableSchema,
    landing_distance: distanceTableSchema,
    takeoff_climb_gradient_91: climbTableSchema,
    enroute_climb_gradient_120: climbTableSchema,
  }),
});

export type RawTable<V> = {
  title: string;
  rounding_unit: number;
  conditions: { pressure_altitude_ft: number; performance: Record<string, V> }[];
};

/* --------------------------- label parsing -------------------------- */

const FIXED_LABEL = /^temp_(minus)?(\d+)c(?:_ft_per_nm)?$/;
const ISA_LABEL = /^temp_isa(?:_ft_per_nm)?$/;

/** "temp_20c" -> fixed 20, "temp_minus20c" -> fixed -20, "temp_isa" -> isa. */
export function parseTemperatureLabel(key: string): TemperatureLabel | null {
  if (ISA_LABEL.test(key)) return { kind: 'isa' };
  const m = key.match(FIXED_LABEL);
  if (!m) return null;
  const magnitude = parseInt(m[2], 10);
  return { kind: 'fixed', celsius: m[1] ? -magnitude : magnitude };
}

/** Numeric temperature of a label at a given row altitude. */
export function resolveTemperature(label: TemperatureLabel, pressureAltitudeFt: number): number {
  return label.kind === 'isa' ? isaTemperature(pressureAltitudeFt) : label.celsius;
}

/* ---------------------------- table build --------------------------- */

export function buildTable<V>(id: string, raw: RawTable<V>): PerformanceTable<V> {
  if (raw.conditions.length === 0) throw new MalformedTableError(id, 'no conditions');

  const sorted = [...raw.conditions].sort((a, b) => a.pressure_altitude_ft - b.pressure_altitude_ft);
  let labelSet: string | null = null;

  const rows: TableRow<V>[] = sorted.map((cond, i) => {
    const pa = cond.pressure_altitude_ft;
    if (i > 0 && sorted[i - 1].pressure_altitude_ft === pa) {
      throw new MalformedTableError(id, `duplicate pressure altitude ${pa} ft`);
    }

    const entries = Object.entries(cond.performance);
    if (entries.length === 0) throw new MalformedTableError(id, `no temperatures at ${pa} ft`);

    const samples: TableSample<V>[] = entries.map(([key, value]) => {
      const label = parseTemperatureLabel(key);
      if (!label) throw new MalformedTableError(id, `unparsable temperature label "${key}" at ${pa} ft`);
      return { key, tempC: resolveTemperature(label, pa), value };
    });
    samples.sort((a, b) => a.tempC - b.tempC);

    for (let j = 1; j < samples.length; j++) {
      if (samples[j].tempC === samples[j - 1].tempC) {
        throw new MalformedTableError(
          id,
          `labels ${samples[j - 1].key} and ${samples[j].key} both resolve to ${samples[j].tempC} °C at ${pa} ft`,
        );
      }
    }

    const keys = samples.map(s => s.key).sort().join(',');
    if (labelSet === null) labelSet = keys;
    else if (keys !== labelSet) {
      throw new MalformedTableError(id, `temperature labels at ${pa} ft differ from the first row`);
    }

    return Object.freeze({ pressureAltitudeFt: pa, samples: Object.freeze(samples) });
  });

  return Object.freeze({
    id,
    title: raw.title,
    roundingUnit: raw.rounding_unit,
    rows: Object.freeze(rows),
  });
}

/* ------------------------------ dataset ----------------------------- */

export interface AircraftPerformanceData {
  aircraft: string;
  weightLb: number;
  dataSource: string;
  notes: string;
  vSpeeds: VSpeedData;
  takeoffDistance: PerformanceTable<DistanceCell>;
  landingDistance: PerformanceTable<DistanceCell>;
  climb: Record<ClimbRegime, ClimbTable>;
}

export function loadPerformanceData(input: unknown): AircraftPerformanceData {
  const parsed = dataSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedTableError('performance_data', `${issue.path.join('.')}: ${issue.message}`);
  }
  const { tables } = parsed.data;
  const climb = (id: string, raw: z.infer<typeof climbTableSchema>): ClimbTable => ({
    ...buildTable(id, raw),
    climbSpeedKias: raw.climb_speed_kias,
  });

  return Object.freeze({
    aircraft: parsed.data.aircraft,
    weightLb: parsed.data.weight_lb,
    dataSource: parsed.data.data_source,
    notes: parsed.data.notes,
    vSpeeds: parsed.data.v_speeds,
    takeoffDistance: buildTable('takeoff_distance', tables.takeoff_distance),
    landingDistance: buildTable('landing_distance', tables.landing_distance),
    climb: Object.freeze({
      takeoff_91: climb('takeoff_climb_gradient_91', tables.takeoff_climb_gradient_91),
      enroute_120: climb('enroute_climb_gradient_120', tables.enroute_climb_gradient_120),
    }),
  });
}

export const SR22T: AircraftPerformanceData = loadPerformanceData(perfData);
