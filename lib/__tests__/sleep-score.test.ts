import { computeSleepScore } from "../scoring/sleep-score";
import {
  bedtimeConsistencyPoints,
  deepSleepPoints,
  durationPoints,
  efficiencyPoints,
  remPoints,
  wakeConsistencyPoints,
} from "../scoring/sleep-points";
import type { Baseline, MetricKind } from "../scoring/types";

const COMPUTED_AT = "2024-03-15T12:00:00.000Z";

function available(metricKind: MetricKind, aggregate: number): Baseline {
  return {
    metricKind,
    asOf: "2024-03-15",
    windowDays: 14,
    status: "available",
    aggregate,
    sampleCount: 14,
    daysCovered: 14,
    computedAt: COMPUTED_AT,
  };
}

function insufficient(metricKind: MetricKind): Baseline {
  return { ...available(metricKind, 0), status: "insufficient", aggregate: null, daysCovered: 3, sampleCount: 3 };
}

describe("sleep point tables", () => {
  it("duration: >8h earns 30, then stepped thresholds", () => {
    expect(durationPoints(481)).toBe(30);
    expect(durationPoints(480)).toBe(29);
    expect(durationPoints(415)).toBe(24);
    expect(durationPoints(300)).toBe(5);
    expect(durationPoints(299)).toBe(0);
  });

  it("deep sleep thresholds", () => {
    expect(deepSleepPoints(105)).toBe(25);
    expect(deepSleepPoints(80)).toBe(18);
    expect(deepSleepPoints(45)).toBe(8);
    expect(deepSleepPoints(44)).toBe(0);
  });

  it("REM under an hour is pro rata up to 5", () => {
    expect(remPoints(120)).toBe(20);
    expect(remPoints(60)).toBe(10);
    expect(remPoints(59)).toBe(4);
    expect(remPoints(30)).toBe(2);
  });

  it("efficiency thresholds", () => {
    expect(efficiencyPoints(95)).toBe(15);
    expect(efficiencyPoints(92.5)).toBe(12);
    expect(efficiencyPoints(90)).toBe(10);
    expect(efficiencyPoints(84.9)).toBe(0);
  });

  it("bedtime consistency: full marks when early, −1 per 10 min late", () => {
    expect(bedtimeConsistencyPoints(1300, 1320)).toBe(10);
    expect(bedtimeConsistencyPoints(1335, 1320)).toBe(8);
    expect(bedtimeConsistencyPoints(10, 1420)).toBe(7);
    expect(bedtimeConsistencyPoints(120, 1320)).toBe(0);
  });

  it("wake consistency penalizes both directions", () => {
    expect(wakeConsistencyPoints(400, 420)).toBe(8);
    expect(wakeConsistencyPoints(440, 420)).toBe(8);
  });
});

describe("computeSleepScore", () => {
  test("short late night: 4h asleep, 60% efficiency, 02:00 vs usual 22:00 → 3", () => {
    const score = computeSleepScore(
      "2024-03-15",
      { sleep_asleep_min: 240, sleep_in_bed_min: 400, sleep_deep_min: 30, sleep_rem_min: 40, sleep_bedtime: 120 },
      { sleep_bedtime: available("sleep_bedtime", 1320) },
      COMPUTED_AT,
    );

    expect(score.components.map((c) => c.name)).toEqual(["duration", "deep_sleep", "rem_sleep", "efficiency", "consistency"]);
    expect(score.components.map((c) => c.normalizedValue)).toEqual([0, 0, 15, 0, 0]);
    expect(score.overall).toBe(3);
    expect(score.dataComplete).toBe(true);
    expect(score.components[2].description).toBe("REM sleep 0h 40m. 3/20 points");
    expect(score.components[4].description).toBe("Bedtime 02:00 vs usual 22:00. 0/10 points");
  });

  test("full marks on every component → 100", () => {
    const score = computeSleepScore(
      "2024-03-15",
      { sleep_asleep_min: 490, sleep_in_bed_min: 500, sleep_deep_min: 110, sleep_rem_min: 125, sleep_bedtime: 1300 },
      { sleep_bedtime: available("sleep_bedtime", 1320) },
      COMPUTED_AT,
    );
    expect(score.components.every((c) => c.normalizedValue === 100)).toBe(true);
    expect(score.overall).toBe(100);
  });

  test("weights the normalized values: 400 min asleep → duration 22/30", () => {
    const score = computeSleepScore(
      "2024-03-15",
      { sleep_asleep_min: 400, sleep_in_bed_min: 500, sleep_deep_min: 60, sleep_rem_min: 90, sleep_bedtime: 1320 },
      { sleep_bedtime: available("sleep_bedtime", 1320) },
      COMPUTED_AT,
    );
    const [duration, deep, rem, efficiency, consistency] = score.components;
    expect(duration.normalizedValue).toBeCloseTo(73.333, 3);
    expect(deep.normalizedValue).toBe(56);
    expect(rem.normalizedValue).toBe(80);
    expect(efficiency.normalizedValue).toBe(0);
    expect(consistency.normalizedValue).toBe(100);
    // 22 + 14 + 16 + 0 + 10
    expect(score.overall).toBe(62);
  });

  test("no data at all: every component incomplete, overall 0", () => {
    const score = computeSleepScore("2024-03-15", {}, {}, COMPUTED_AT);
    expect(score.overall).toBe(0);
    expect(score.dataComplete).toBe(false);
    expect(score.components.every((c) => !c.complete && c.contribution === 0)).toBe(true);
    expect(score.components[0].description).toBe("MissingSample: no sleep duration recorded for this day");
    expect(score.components[3].description).toBe("MissingSample: no sleep duration recorded for this day");
  });

  test("bedtime without enough history contributes 0 and is flagged", () => {
    const score = computeSleepScore(
      "2024-03-15",
      { sleep_asleep_min: 490, sleep_in_bed_min: 500, sleep_deep_min: 110, sleep_rem_min: 125, sleep_bedtime: 1300 },
      { sleep_bedtime: insufficient("sleep_bedtime") },
      COMPUTED_AT,
    );
    const consistency = score.components[4];
    expect(consistency.complete).toBe(false);
    expect(consistency.description).toBe("InsufficientBaseline: not enough bedtime history yet");
    expect(score.overall).toBe(90);
    expect(score.dataComplete).toBe(false);
  });

  test("time in bed of 0 leaves efficiency incomplete", () => {
    const score = computeSleepScore("2024-03-15", { sleep_asleep_min: 0, sleep_in_bed_min: 0 }, {}, COMPUTED_AT);
    expect(score.components[3].complete).toBe(false);
    expect(score.components[3].description).toBe("time in bed must be positive");
  });
});
