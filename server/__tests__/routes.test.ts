import express from "express";
import type { Server } from "node:http";
import { MemoryScoreRepository } from "../cache/score-repository";
import { createEngine, type Engine } from "../engine";
import { registerRoutes } from "../routes";
import { MemorySampleStore } from "../samples/sample-store";
import { TODAY, daily, fixedNow, testConfig } from "./fakes";

const AUTH = { Authorization: "Bearer test-secret" };

describe("HTTP routes", () => {
  let engine: Engine;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    engine = createEngine(testConfig(), {
      samples: new MemorySampleStore("UTC"),
      repository: new MemoryScoreRepository(),
      now: fixedNow,
    });
    engine.coordinator.start();

    const app = express();
    app.use(express.json());
    server = await registerRoutes(app, engine.service, { apiKey: "test-secret" });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address == null || typeof address === "string") throw new Error("server did not bind a port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await engine.close();
    jest.restoreAllMocks();
  });

  function postSamples(samples: unknown) {
    return fetch(`${base}/api/samples`, {
      method: "POST",
      headers: { ...AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({ samples }),
    });
  }

  it("rejects requests without the bearer key", async () => {
    const res = await fetch(`${base}/api/diagnostics/cache`);
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ ok: false, error: "Unauthorized" });
  });

  it("validates posted samples", async () => {
    const res = await postSamples([{ metricKind: "bogus", timestamp: "2024-03-15T07:00:00Z", value: 1 }]);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, errors: ['samples[0].metricKind: unknown metric "bogus"'] });
  });

  it("ingests samples and serves the resulting score", async () => {
    const res = await postSamples([...daily("hrv_sdnn", 40, "2024-03-01", 14), ...daily("hrv_sdnn", 45, TODAY, 1)]);
    expect(await res.json()).toEqual({ ok: true, received: 15, inserted: 15 });
    await engine.coordinator.settled();

    const current = await fetch(`${base}/api/scores/recovery/current?day=${TODAY}`, { headers: AUTH });
    expect(await current.json()).toMatchObject({
      ok: true,
      score: { overall: 43, dataComplete: false },
      stale: false,
      directive: "Recovery needs attention. Focus on rest, nutrition, and stress management.",
      freshness: { status: "waitingForData" },
    });

    const history = await fetch(`${base}/api/scores/recovery/history?days=2`, { headers: AUTH });
    expect(await history.json()).toMatchObject({ ok: true, scores: [{ dayKey: "2024-03-15" }, { dayKey: "2024-03-14" }] });

    const baseline = await fetch(`${base}/api/baselines/hrv_sdnn?asOf=${TODAY}`, { headers: AUTH });
    expect(await baseline.json()).toMatchObject({ baseline: { status: "available", aggregate: 40, daysCovered: 14 } });
  });

  it("imports a CSV upload", async () => {
    const form = new FormData();
    const csv = "metricKind,timestamp,value\nresting_hr,2024-03-15T07:00:00Z,58\nresting_hr,2024-03-14T07:00:00Z,60\n";
    form.append("file", new Blob([csv], { type: "text/csv" }), "samples.csv");
    const res = await fetch(`${base}/api/samples/import`, { method: "POST", headers: AUTH, body: form });
    expect(await res.json()).toEqual({ ok: true, received: 2, inserted: 2 });
  });

  it("rejects unknown kinds and malformed days", async () => {
    const kind = await fetch(`${base}/api/scores/mood/current`, { headers: AUTH });
    expect(kind.status).toBe(400);
    expect(await kind.json()).toEqual({ ok: false, errors: ['unknown score kind "mood"'] });

    const day = await fetch(`${base}/api/scores/sleep/freshness?day=yesterday`, { headers: AUTH });
    expect(day.status).toBe(400);

    const days = await fetch(`${base}/api/scores/sleep/history?days=0`, { headers: AUTH });
    expect(await days.json()).toEqual({ ok: false, errors: ["days: expected an integer 1-365"] });
  });

  it("reports cache diagnostics", async () => {
    const res = await fetch(`${base}/api/diagnostics/cache`, { headers: AUTH });
    expect(await res.json()).toMatchObject({
      ok: true,
      cache: { capacity: 100, size: 0, durableFailures: 0 },
      coordinator: { pending: 0, failures: 0 },
    });
  });
});
