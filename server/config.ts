import { validateGrowthCurve, type GrowthCurveConfig } from "../lib/scoring/growth-curve";

export type StorageMode = "pg" | "memory";

export interface EngineConfig {
  port: number;
  databaseUrl: string | undefined;
  apiKey: string | undefined;
  storage: StorageMode;
  timezone: string;
  baselineWindowDays: number;
  baselineMinCoverageDays: number;
  cacheCapacity: number;
  recomputeConcurrency: number;
  growthCurve: GrowthCurveConfig;
  durableWriteAttempts: number;
  durableWriteBaseDelayMs: number;
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    console.warn(`[config] ${key}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }
  return n;
}

function int(env: Env, key: string, fallback: number, min: number): number {
  const n = Math.floor(num(env, key, fallback));
  if (n < min) {
    console.warn(`[config] ${key}=${n} is below ${min}, using ${fallback}`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const windowDays = int(env, "BASELINE_WINDOW_DAYS", 14, 1);
  const storage: StorageMode = env.STORAGE === "memory" || !env.DATABASE_URL ? "memory" : "pg";

  const growthCurve: GrowthCurveConfig = {
    anchorScore: 75,
    upperGain: num(env, "GROWTH_UPPER_GAIN", 5),
    lowerGain: num(env, "GROWTH_LOWER_GAIN", 2),
  };
  const curveErrors = validateGrowthCurve(growthCurve);
  if (curveErrors.length > 0) {
    throw new Error(`Invalid growth curve configuration: ${curveErrors.join("; ")}`);
  }

  const minCoverage = int(env, "BASELINE_MIN_COVERAGE_DAYS", Math.ceil(windowDays / 2), 1);

  return {
    port: int(env, "PORT", 5000, 1),
    databaseUrl: env.DATABASE_URL,
    apiKey: env.API_KEY,
    storage,
    timezone: env.SCORE_TIMEZONE || "UTC",
    baselineWindowDays: windowDays,
    baselineMinCoverageDays: Math.min(minCoverage, windowDays),
    cacheCapacity: int(env, "CACHE_CAPACITY", 100, 1),
    recomputeConcurrency: int(env, "RECOMPUTE_CONCURRENCY", 4, 1),
    growthCurve,
    durableWriteAttempts: int(env, "DURABLE_WRITE_ATTEMPTS", 5, 1),
    durableWriteBaseDelayMs: int(env, "DURABLE_WRITE_BASE_DELAY_MS", 200, 0),
  };
}
