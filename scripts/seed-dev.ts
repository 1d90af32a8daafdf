import { addDays, toDayKey } from "../lib/day-key";
import type { BiometricSample } from "../lib/scoring/types";
import { pool, initDb } from "../server/db";
import { PgSampleStore } from "../server/samples/pg-sample-store";

const SEED_DAYS = 60;
const TIMEZONE = process.env.SCORE_TIMEZONE || "UTC";

function rand(min: number, max: number, decimals = 1): number {
  const v = min + Math.random() * (max - min);
  const p = Math.pow(10, decimals);
  return Math.round(v * p) / p;
}

function randInt(min: number, max: number): number {
  return Math.floor(min + Math.random() * (max - min + 1));
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function at(day: string, clockMin: number): string {
  const hh = String(Math.floor(clockMin / 60)).padStart(2, "0");
  const mm = String(clockMin % 60).padStart(2, "0");
  return `${day}T${hh}:${mm}:00.000Z`;
}

function seedDays(): BiometricSample[] {
  const today = toDayKey(new Date(), TIMEZONE);
  const samples: BiometricSample[] = [];
  let hrv = randInt(35, 55);
  let rhr = randInt(54, 62);

  for (let i = SEED_DAYS; i >= 0; i--) {
    const day = addDays(today, -i);
    hrv = clamp(hrv + randInt(-5, 5), 20, 90);
    rhr = clamp(rhr + randInt(-2, 2), 45, 75);

    const bedtime = (1380 + randInt(-45, 60) + 1440) % 1440;
    const inBed = randInt(390, 500);
    const asleep = Math.round(inBed * rand(0.84, 0.95, 2));
    const deep = Math.round(asleep * rand(0.13, 0.22, 2));
    const rem = Math.round(asleep * rand(0.18, 0.26, 2));
    const waketime = (bedtime + inBed) % 1440;
    const wakeTs = at(day, Math.min(waketime, 1439));

    samples.push(
      { metricKind: "sleep_in_bed_min", timestamp: wakeTs, value: inBed },
      { metricKind: "sleep_asleep_min", timestamp: wakeTs, value: asleep },
      { metricKind: "sleep_deep_min", timestamp: wakeTs, value: deep },
      { metricKind: "sleep_rem_min", timestamp: wakeTs, value: rem },
      { metricKind: "sleep_bedtime", timestamp: wakeTs, value: bedtime },
      { metricKind: "sleep_waketime", timestamp: wakeTs, value: waketime },
      { metricKind: "sleep_hr", timestamp: wakeTs, value: clamp(rhr - randInt(3, 9), 38, 70) },
    );

    for (const minute of [420, 780, 1140]) {
      samples.push(
        { metricKind: "hrv_sdnn", timestamp: at(day, minute), value: clamp(hrv + randInt(-6, 6), 10, 120) },
        { metricKind: "walking_hr", timestamp: at(day, minute + 5), value: randInt(88, 108) },
      );
    }
    samples.push(
      { metricKind: "resting_hr", timestamp: at(day, 600), value: rhr },
      { metricKind: "respiratory_rate", timestamp: at(day, 300), value: rand(13.5, 16.5, 1) },
      { metricKind: "oxygen_saturation", timestamp: at(day, 310), value: rand(95, 99, 1) },
    );
  }
  return samples;
}

async function clearSeed() {
  console.log("Clearing seeded data...");
  const start = addDays(toDayKey(new Date(), TIMEZONE), -SEED_DAYS);
  await pool.query(`DELETE FROM biometric_sample WHERE user_id = $1 AND day_key >= $2::date`, ["local_default", start]);
  await pool.query(`DELETE FROM score_cache WHERE user_id = $1 AND day_key >= $2::date`, ["local_default", start]);
  console.log("Cleared.");
}

async function seed() {
  console.log(`Seeding ${SEED_DAYS + 1} days of samples...`);
  const store = new PgSampleStore(TIMEZONE);
  const inserted = await store.insertBatch(seedDays());
  console.log(`Inserted ${inserted.length} samples.`);
  console.log("Run 'npm run seed -- --clear' to remove seeded data.");
}

async function main() {
  try {
    await initDb();
    if (process.argv.includes("--clear")) {
      await clearSeed();
    } else {
      await seed();
    }
  } catch (err) {
    console.error("Seed error:", err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("Seed error:", err);
  process.exitCode = 1;
});
