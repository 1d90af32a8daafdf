import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import multer from "multer";
import { isValidDayKey } from "../lib/day-key";
import { isMetricKind, isScoreKind } from "../lib/scoring/metrics";
import { recoveryDirective } from "../lib/scoring/directive";
import { errorMessage } from "./errors";
import type { ScoreService } from "./score-service";
import { parseSampleCsv } from "./samples/csv-import";
import { validateSampleBatch } from "./validation";

const MAX_HISTORY_DAYS = 365;
const DEFAULT_HISTORY_DAYS = 14;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 20 * 1024 * 1024 } });

export interface RouteOptions {
  apiKey: string | undefined;
}

function requireAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return res.status(500).json({ ok: false, error: "Server missing API_KEY" });
    }
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== apiKey) {
      return res.status(401).json({ ok: false, error: "Unauthorized" });
    }
    next();
  };
}

function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" ? v : undefined;
}

export async function registerRoutes(app: Express, service: ScoreService, options: RouteOptions): Promise<Server> {
  app.use("/api", requireAuth(options.apiKey));

  app.post("/api/samples", async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const raw = body != null && typeof body === "object" ? Reflect.get(body, "samples") : undefined;
      const result = validateSampleBatch(raw);
      if (!result.ok) {
        return res.status(400).json({ ok: false, errors: result.errors });
      }
      const ingested = await service.ingest(result.samples);
      res.json({ ok: true, ...ingested });
    } catch (err: unknown) {
      console.error("[routes] sample ingest error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.post("/api/samples/import", upload.single("file"), async (req: Request, res: Response) => {
    try {
      if (!req.file) {
        return res.status(400).json({ ok: false, errors: ["No file uploaded"] });
      }
      const result = parseSampleCsv(req.file.buffer.toString("utf8"));
      if (!result.ok) {
        return res.status(400).json({ ok: false, errors: result.errors });
      }
      const ingested = await service.ingest(result.samples);
      console.log(`[routes] imported ${ingested.inserted}/${ingested.received} samples from ${req.file.originalname}`);
      res.json({ ok: true, ...ingested });
    } catch (err: unknown) {
      console.error("[routes] sample import error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/api/scores/:kind/current", async (req: Request, res: Response) => {
    try {
      const kind = req.params.kind;
      if (!isScoreKind(kind)) {
        return res.status(400).json({ ok: false, errors: [`unknown score kind "${kind}"`] });
      }
      const day = queryString(req, "day") ?? service.today();
      if (!isValidDayKey(day)) {
        return res.status(400).json({ ok: false, errors: [`day: expected YYYY-MM-DD, got "${day}"`] });
      }
      const entry = await service.currentScore(kind, day);
      const freshness = await service.freshnessStatus(kind, day);
      res.json({
        ok: true,
        score: entry?.value ?? null,
        stale: entry?.stale ?? false,
        directive: entry && kind === "recovery" ? recoveryDirective(entry.value) : null,
        freshness,
      });
    } catch (err: unknown) {
      console.error("[routes] current score error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/api/scores/:kind/history", async (req: Request, res: Response) => {
    try {
      const kind = req.params.kind;
      if (!isScoreKind(kind)) {
        return res.status(400).json({ ok: false, errors: [`unknown score kind "${kind}"`] });
      }
      const rawDays = queryString(req, "days");
      const days = rawDays == null ? DEFAULT_HISTORY_DAYS : Number(rawDays);
      if (!Number.isInteger(days) || days < 1 || days > MAX_HISTORY_DAYS) {
        return res.status(400).json({ ok: false, errors: [`days: expected an integer 1-${MAX_HISTORY_DAYS}`] });
      }
      const scores = await service.history(kind, days);
      res.json({ ok: true, scores });
    } catch (err: unknown) {
      console.error("[routes] score history error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/api/scores/:kind/freshness", async (req: Request, res: Response) => {
    try {
      const kind = req.params.kind;
      if (!isScoreKind(kind)) {
        return res.status(400).json({ ok: false, errors: [`unknown score kind "${kind}"`] });
      }
      const day = queryString(req, "day") ?? service.today();
      if (!isValidDayKey(day)) {
        return res.status(400).json({ ok: false, errors: [`day: expected YYYY-MM-DD, got "${day}"`] });
      }
      res.json({ ok: true, ...(await service.freshnessStatus(kind, day)) });
    } catch (err: unknown) {
      console.error("[routes] freshness error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/api/baselines/:metric", async (req: Request, res: Response) => {
    try {
      const metric = req.params.metric;
      if (!isMetricKind(metric)) {
        return res.status(400).json({ ok: false, errors: [`unknown metric "${metric}"`] });
      }
      const asOf = queryString(req, "asOf") ?? service.today();
      if (!isValidDayKey(asOf)) {
        return res.status(400).json({ ok: false, errors: [`asOf: expected YYYY-MM-DD, got "${asOf}"`] });
      }
      res.json({ ok: true, baseline: await service.baseline(metric, asOf) });
    } catch (err: unknown) {
      console.error("[routes] baseline error:", err);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/api/diagnostics/cache", (_req: Request, res: Response) => {
    res.json({ ok: true, ...service.diagnostics() });
  });

  const httpServer = createServer(app);
  return httpServer;
}
