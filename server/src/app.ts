import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import { defaultRunSettings, RunSettingsOverridesSchema, type RunSettingsOverrides } from "./settings.js";
import { prepareRun, verifyOnly } from "./invoke.js";
import { CacheStore, type CacheInfo } from "./pipeline/cache_store.js";
import { FetchedDocumentListSchema, type FetchedDocument } from "./pipeline/schemas.js";
import {
  errorMessage,
  isSafeArtifactName,
  outputRootAbs,
  resolveArtifactPathAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs
} from "./pipeline/utils.js";

type ArtifactFolder = "root" | "intermediate" | "final";

const AnswersSchema = z.array(z.string().max(2000)).max(10);

const CreateRunBodySchema = z
  .object({
    topic: z.string().trim().max(500).optional(),
    runId: z.string().trim().min(1).max(120).refine(isSafeArtifactName, "runId must be a safe file name").optional(),
    settings: RunSettingsOverridesSchema.optional(),
    answers: AnswersSchema.optional()
  })
  .strict();

const ClarifyBodySchema = z
  .object({
    answers: AnswersSchema
  })
  .strict();

const ResumeBodySchema = z
  .object({
    settings: RunSettingsOverridesSchema.optional()
  })
  .strict();

function normalizeSettings(settings: RunSettingsOverrides | undefined): RunSettingsOverrides | undefined {
  if (!settings) return undefined;
  const s: RunSettingsOverrides = {};
  if (typeof settings.workers === "number") s.workers = settings.workers;
  if (settings.depth) s.depth = settings.depth;
  if (typeof settings.budget === "number") s.budget = settings.budget;
  if (settings.lang) s.lang = settings.lang;
  return Object.keys(s).length > 0 ? s : undefined;
}

export type AppOptions = {
  /** Fetch cache shared with the pipeline; defaults to one under `DEEPCITE_CACHE_DIR`. */
  cache?: CacheStore<FetchedDocument[]>;
};

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  const cache = options.cache ?? new CacheStore(FetchedDocumentListSchema);

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      outputDir: outputRootAbs(),
      cacheDir: cache.dir(),
      defaults: defaultRunSettings()
    });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { topic, runId, answers } = parsed.data;
    if (runId && executor.isRunning(runId)) {
      res.status(409).json({ error: "run is currently running; cancel it first" });
      return;
    }

    const prepared = await prepareRun(runs, { topic, runId, answers, overrides: normalizeSettings(parsed.data.settings) });
    if (prepared.kind === "needs_clarification") {
      res.status(202).json({ runId: prepared.runId, status: "needs_clarification", questions: prepared.questions });
      return;
    }

    res.json({ runId: prepared.runId });
    executor.enqueue(prepared.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/clarify", async (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    if (run.status !== "needs_clarification") {
      res.status(409).json({ error: "run is not waiting for clarification" });
      return;
    }

    const parsed = ClarifyBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const prepared = await prepareRun(runs, { runId: run.runId, answers: parsed.data.answers, overrides: run.settings });
    if (prepared.kind === "needs_clarification") {
      res.status(202).json({ runId: prepared.runId, status: "needs_clarification", questions: prepared.questions });
      return;
    }

    res.json({ runId: prepared.runId, topic: prepared.topic });
    executor.enqueue(prepared.runId);
  });

  app.post("/api/runs/:runId/resume", async (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    if (executor.isRunning(runId) || executor.isQueued(runId)) {
      res.status(409).json({ error: "run is already queued or running" });
      return;
    }

    const parsed = ResumeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    await runs.reopenRun(runId, { settings: normalizeSettings(parsed.data.settings) });
    res.json({ runId });
    executor.enqueue(runId);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.post("/api/runs/:runId/verify", async (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    if (executor.isRunning(runId)) {
      res.status(409).json({ error: "run is currently running" });
      return;
    }

    try {
      const result = await verifyOnly(runs, runId);
      if (!result.verdict) {
        res.status(404).json({ error: result.error ?? "report not found", exitCode: result.exitCode });
        return;
      }
      res.json({ runId, outcome: result.outcome, exitCode: result.exitCode, verdict: result.verdict });
    } catch (err) {
      runs.error(runId, `verify failed: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get("/api/runs/:runId/stage-log", async (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(await runs.readStageLog(runId));
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getInternal(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const dir = runOutputDirAbs(runId);

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(dir, false);
    void archive.finalize();
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const scanDirs: Array<{ dir: string; folder: ArtifactFolder }> = [
      { dir: runOutputDirAbs(runId), folder: "root" },
      { dir: runIntermediateDirAbs(runId), folder: "intermediate" },
      { dir: runFinalDirAbs(runId), folder: "final" }
    ];
    const byName = new Map<string, { name: string; size: number; mtimeMs: number; folder: ArtifactFolder }>();

    for (const scan of scanDirs) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile()) continue;
        const p = path.join(scan.dir, ent.name);
        const st = await fs.stat(p).catch(() => null);
        if (!st) continue;

        const next = { name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder };
        const prev = byName.get(ent.name);
        if (!prev || next.mtimeMs >= prev.mtimeMs) byName.set(ent.name, next);
      }
    }

    const infos = [...byName.values()].sort((a, b) => b.mtimeMs - a.mtimeMs);
    res.json(infos);
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    try {
      const data = await fs.readFile(filePath);
      const lower = name.toLowerCase();
      if (lower.endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else if (lower.endsWith(".jsonl")) res.setHeader("Content-Type", "application/x-ndjson; charset=utf-8");
      else if (lower.endsWith(".md")) res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  app.get("/api/cache", async (_req, res) => {
    const keys = await cache.listKeys();
    const entries: Array<CacheInfo & { corrupt: boolean }> = [];
    for (const key of keys) {
      if (!isSafeArtifactName(key)) continue;
      const info = await cache.info(key);
      entries.push(info ? { ...info, corrupt: false } : { key, cachedAt: "", entryCount: null, corrupt: true });
    }
    res.json({ dir: cache.dir(), entries });
  });

  app.delete("/api/cache/:key", async (req, res) => {
    const key = req.params.key;
    if (!isSafeArtifactName(key)) {
      res.status(400).json({ error: "invalid cache key" });
      return;
    }
    const removed = await cache.delete(key);
    if (!removed) {
      res.status(404).json({ error: "cache entry not found" });
      return;
    }
    res.json({ ok: true });
  });

  return app;
}
