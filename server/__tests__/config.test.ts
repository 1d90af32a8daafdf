import { loadConfig } from "../config";
import { RetriesExhausted, backoffDelay, withBackoff } from "../retry";

describe("loadConfig", () => {
  it("defaults to in-memory storage without DATABASE_URL", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      port: 5000,
      storage: "memory",
      timezone: "UTC",
      baselineWindowDays: 14,
      baselineMinCoverageDays: 7,
      cacheCapacity: 100,
      recomputeConcurrency: 4,
      durableWriteAttempts: 5,
      durableWriteBaseDelayMs: 200,
    });
    expect(config.growthCurve).toEqual({ anchorScore: 75, upperGain: 5, lowerGain: 2 });
  });

  it("uses postgres when DATABASE_URL is set, unless STORAGE=memory", () => {
    expect(loadConfig({ DATABASE_URL: "postgres://localhost/scores" }).storage).toBe("pg");
    expect(loadConfig({ DATABASE_URL: "postgres://localhost/scores", STORAGE: "memory" }).storage).toBe("memory");
  });

  it("derives coverage from the window", () => {
    const config = loadConfig({ BASELINE_WINDOW_DAYS: "9" });
    expect(config.baselineMinCoverageDays).toBe(5);
  });

  it("warns and falls back on unparseable numbers", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
    expect(loadConfig({ PORT: "http" }).port).toBe(5000);
    expect(warn).toHaveBeenCalledWith('[config] PORT="http" is not a number, using 5000');
    warn.mockRestore();
  });

  it("rejects a growth curve that cannot fall below the anchor", () => {
    expect(() => loadConfig({ GROWTH_LOWER_GAIN: "0" })).toThrow(
      "Invalid growth curve configuration: lowerGain must be positive, got 0",
    );
  });
});

describe("withBackoff", () => {
  it("doubles the delay up to the cap", () => {
    const opts = { attempts: 5, baseDelayMs: 200, maxDelayMs: 1000 };
    expect([0, 1, 2, 3].map((n) => backoffDelay(n, opts))).toEqual([200, 400, 800, 1000]);
  });

  it("retries until success", async () => {
    let calls = 0;
    const result = await withBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new Error("not yet");
        return "done";
      },
      { attempts: 5, baseDelayMs: 0, maxDelayMs: 0 },
    );
    expect(result).toBe("done");
    expect(calls).toBe(3);
  });

  it("gives up with the last error attached", async () => {
    const failing = withBackoff(
      async () => {
        throw new Error("down");
      },
      { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    );
    await expect(failing).rejects.toBeInstanceOf(RetriesExhausted);
    await expect(failing).rejects.toMatchObject({ attempts: 2, lastError: new Error("down") });
  });
});
