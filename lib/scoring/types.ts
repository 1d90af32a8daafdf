export type MetricKind =
  | "hrv_sdnn"
  | "resting_hr"
  | "walking_hr"
  | "respiratory_rate"
  | "oxygen_saturation"
  | "sleep_asleep_min"
  | "sleep_in_bed_min"
  | "sleep_deep_min"
  | "sleep_rem_min"
  | "sleep_bedtime"
  | "sleep_waketime"
  | "sleep_hr";

export type ScoreKind = "recovery" | "sleep";

export type DayReducer = "mean" | "sum" | "first" | "last";
export type BaselineAggregate = "mean" | "circular";

export interface MetricSpec {
  unit: string;
  dayReducer: DayReducer;
  aggregate: BaselineAggregate;
}

export interface BiometricSample {
  metricKind: MetricKind;
  timestamp: string;
  value: number;
}

export type BaselineStatus = "available" | "insufficient";

export interface Baseline {
  metricKind: MetricKind;
  asOf: string;
  windowDays: number;
  status: BaselineStatus;
  aggregate: number | null;
  sampleCount: number;
  daysCovered: number;
  computedAt: string;
}

export type RecoveryComponentName = "hrv" | "resting_hr" | "sleep_quality" | "stress";
export type SleepComponentName = "duration" | "deep_sleep" | "rem_sleep" | "efficiency" | "consistency";
export type ComponentName = RecoveryComponentName | SleepComponentName;

export interface ScoreComponent {
  name: ComponentName;
  weight: number;
  normalizedValue: number;
  contribution: number;
  rawInputs: Record<string, number | null>;
  complete: boolean;
  description: string;
}

export interface CompositeScore {
  scoreKind: ScoreKind;
  dayKey: string;
  overall: number;
  components: ScoreComponent[];
  computedAt: string;
  dataComplete: boolean;
}

export interface ScoreKey {
  dayKey: string;
  scoreKind: ScoreKind;
}

export type FreshnessStatus = "silent" | "recentlyUpdated" | "waitingForData" | "computing";

export type BaselineMap = Partial<Record<MetricKind, Baseline>>;
export type DayValues = Partial<Record<MetricKind, number>>;
