export type Operation = 'departure' | 'arrival';

/* ------------------------------ tables ------------------------------ */

export interface DistanceCell {
  ground_roll_ft: number;
  total_distance_ft: number;
}

export type TemperatureLabel =
  | { kind: 'fixed'; celsius: number }
  | { kind: 'isa' };

export interface TableSample<V> {
  key: string;        // label as written in the POH data, e.g. "temp_minus20c"
  tempC: number;      // isa resolved against the row's pressure altitude
  value: V;
}

export interface TableRow<V> {
  pressureAltitudeFt: number;
  samples: readonly TableSample<V>[]; // ascending by tempC
}

export interface PerformanceTable<V> {
  id: string;
  title: string;
  roundingUnit: number;
  rows: readonly TableRow<V>[];       // ascending by pressure altitude
}

export interface ClimbTable extends PerformanceTable<number> {
  climbSpeedKias: number;
}

export type ClimbRegime = 'takeoff_91' | 'enroute_120';

/* ----------------------------- V-speeds ----------------------------- */

export type FlapConfig = 'full_flaps' | 'partial_flaps_50' | 'no_flaps';

export interface ApproachSpeeds {
  final_approach_base_kias: number;
  threshold_crossing_kias: number;
  touchdown_target_kias: number;
  config_notes: string;
}

export interface VSpeedData {
  vr_kias: number;
  approach_speeds: Record<FlapConfig, ApproachSpeeds>;
  wind_corrections: {
    gust_factor_multiplier: number;
    crosswind_partial_flaps_threshold: number;
    weight_correction_per_100lb: number;
  };
}

export interface VSpeeds {
  vrKias: number;
  takeoffNote: string;
  finalApproachKias: number;
  thresholdCrossingKias: number;
  touchdownTargetKias: number;
  flapConfig: FlapConfig;
  configNote: string;
  gustCorrectionKt: number;
  usePartialFlapsForCrosswind: boolean;
  crosswindKt: number;
  weightNote: string;
  speedControl: string[];
}

/* ------------------------------ inputs ------------------------------ */

export type WindDirection = number | 'VRB';

export interface WeatherSnapshot {
  station: string;
  source: 'awc-json' | 'noaa-txt' | 'manual';
  observedAt: string | null;  // ISO-8601
  ageMinutes: number | null;
  windDir: WindDirection;
  windSpeedKt: number;
  windGustKt: number | null;
  tempC: number;
  altimeterInHg: number;
  rawAltimeter: number;
  altimeterUnits: 'hPa' | 'inHg';
  raw: string | null;
}

export type MagVarSource = 'NOAA_WMM' | 'MANUAL_INPUT' | 'REGIONAL_APPROX' | 'UNKNOWN';

export interface AirportData {
  icao: string;
  name: string;
  elevationFt: number;
  latitude: number;
  longitude: number;
  runway: string;
  runwayLengthFt: number;
  runwayTrueHeading: number;
  runwayHeading: number;       // magnetic
  surface: string;
  magneticVariation: number;   // +E / -W
  magVarSource: MagVarSource;
  source: string;
}

/* ----------------------------- results ------------------------------ */

export interface WindComponents {
  headwindKt: number;          // + headwind, - tailwind
  crosswindKt: number;         // magnitude
  crosswindDirection: 'left' | 'right' | 'none' | 'variable';
  isTailwind: boolean;
  crosswindExceedsLimit: boolean;
  advisories: string[];
}

export type GradientResult =
  | { status: 'ok'; gradientFtPerNm: number; climbRateFpm: number }
  | { status: 'unavailable'; reason: string };

export interface ClimbAtSpeed {
  iasKias: number;
  tasKt: number;
  groundSpeedKt: number;
  gradient: GradientResult;
}

export interface ClimbPerformance {
  takeoff91: ClimbAtSpeed;
  enroute120: ClimbAtSpeed;
}

export type MarginCategory = 'EXCELLENT' | 'GOOD' | 'ADEQUATE' | 'MARGINAL' | 'INSUFFICIENT' | 'UNKNOWN';

export interface RunwayMargin {
  availableFt: number;
  requiredFt: number;
  marginFt: number;
  category: MarginCategory;
  percentage: number;
}

export interface SurfaceAssessment {
  surface: string;
  suitableForStandardPerformance: boolean;
  requiresPilotEvaluation: boolean;
  warning: string | null;
}

export type ProcedureCompliance =
  | { status: 'compliant'; speed: 91 | 120; marginFtPerNm: number }
  | { status: 'non_compliant'; deficit91: number | null; deficit120: number | null }
  | { status: 'unknown'; reason: string };

export interface DepartureProcedure {
  name: string;
  requiredGradientFtPerNm: number;
  initialAltitudeFt: number | null;
}

export interface CapsInfo {
  minimumAgl: number;
  minimumMsl: number;
  recommendedAgl: number;
  recommendedMsl: number;
  patternAltitudeMsl: number;
  densityAltitudeImpact: string;
  emergencyBrief: string[];
  departure: {
    availableAltitudeMsl: number;
    timeToAvailableMin: number | null;
    distanceToAvailableNm: number | null;
    brief: string[];
  } | null;
}

export type StoppingAssessment = 'excellent' | 'adequate' | 'marginal';

export interface TakeoffPhases {
  abortDecisionFt: number;
  remainingRunwayFt: number;
  stoppingAssessment: StoppingAssessment;
  rotationCeilingMsl: number;  // top of the turn-to-land phase
  capsCeilingMsl: number;      // top of the immediate-CAPS phase
  phases: { title: string; brief: string }[];
}

interface PerformanceBase {
  pressureAltitudeFt: number;
  isaTempC: number;
  densityAltitudeFt: number;
  densityAltitudeImpact: string;
  wind: WindComponents;
  vSpeeds: VSpeeds;
  surface: SurfaceAssessment;
  decision: 'GO' | 'NO-GO';
  reasons: string[];
}

export interface DeparturePerformance extends PerformanceBase {
  operation: 'departure';
  takeoff: DistanceCell;
  margin: RunwayMargin;
  climb: ClimbPerformance;
  procedure: { procedure: DepartureProcedure; compliance: ProcedureCompliance } | null;
  caps: CapsInfo;
  phases: TakeoffPhases;
}

export interface ArrivalPerformance extends PerformanceBase {
  operation: 'arrival';
  landing: DistanceCell;
  margin: RunwayMargin;
  goAround: ClimbAtSpeed;
}

export type PerformanceSummary = DeparturePerformance | ArrivalPerformance;
