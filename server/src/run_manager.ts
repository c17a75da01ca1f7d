import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import {
  appendJsonLine,
  dirExists,
  ensureDir,
  isSafeArtifactName,
  nowIso,
  outputRootAbs,
  RUN_STATUS_FILENAME,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  slug,
  stageLogPathAbs,
  tryReadJsonFile,
  tryReadTextFile,
  writeJsonFile
} from "./pipeline/utils.js";
import type { RunSettings, RunSettingsOverrides } from "./settings.js";
import type { RunOutcome } from "./outcome.js";

export const STAGE_ORDER = ["intake", "plan", "harvest", "fetch", "extract", "verify", "write", "audit", "cache"] as const;

export type Stage = (typeof STAGE_ORDER)[number];

export type StageRecord = {
  name: Stage;
  status: "queued" | "running" | "done" | "error";
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  artifacts: string[];
};

export type StageLogStatus = "started" | "completed" | "failed";

export type StageLogRecord = {
  timestamp: string;
  runId: string;
  stage: Stage;
  status: StageLogStatus;
  details: Record<string, unknown>;
};

const StageLogRecordSchema = z.object({
  timestamp: z.string(),
  runId: z.string(),
  stage: z.enum(STAGE_ORDER),
  status: z.enum(["started", "completed", "failed"]),
  details: z.record(z.unknown())
});

export type RunStatus = {
  runId: string;
  topic: string;
  /** Overrides requested by the caller; the pipeline layers them over defaults and persisted plan values. */
  settings?: RunSettingsOverrides;
  /** Settings the latest execution actually ran with. */
  effectiveSettings?: RunSettings;
  status: "queued" | "running" | RunOutcome;
  startedAt: string;
  finishedAt?: string;
  currentStage: Stage | null;
  attempts: number;
  steps: Record<Stage, StageRecord>;
  outputFolder: string;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "topic" | "status" | "startedAt" | "finishedAt">;

const RUN_ID_SLUG_MAX = 40;
const RUN_ID_SUFFIX_LEN = 4;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const byte of bytes) {
    out += RUN_ID_SUFFIX_ALPHABET[byte % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD-HHMMSS` in local time, the same shape operators see in folder listings. */
export function runIdTimestamp(at: Date): string {
  const date = `${at.getFullYear()}${pad2(at.getMonth() + 1)}${pad2(at.getDate())}`;
  const time = `${pad2(at.getHours())}${pad2(at.getMinutes())}${pad2(at.getSeconds())}`;
  return `${date}-${time}`;
}

export function deriveRunId(topic: string, at: Date = new Date()): string {
  const topicSlug = slug(topic).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
  return `${topicSlug}-${runIdTimestamp(at)}`;
}

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status !== "queued" && status !== "running";
}

function freshStages(): Record<Stage, StageRecord> {
  const steps = {} as Record<Stage, StageRecord>;
  for (const name of STAGE_ORDER) {
    steps[name] = { name, status: "queued", artifacts: [] };
  }
  return steps;
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stage of STAGE_ORDER) {
    const record = recoveredSteps[stage];
    if (!record) continue;
    if (record.status === "running") {
      recoveredSteps[stage] = {
        ...record,
        status: "error",
        error: record.error ?? "Recovered after restart while run was active.",
        finishedAt: record.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    steps: recoveredSteps
  };
}

function quietEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Node treats "error" events specially: if nobody is listening, it throws.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runId = ent.name;
      const data = await tryReadJsonFile<RunStatus>(path.join(runOutputDirAbs(runId), RUN_STATUS_FILENAME));
      if (!data || data.runId !== runId) continue;
      const recovered = recoverStaleLoadedRun(data);
      if (recovered !== data) {
        await writeJsonFile(path.join(runOutputDirAbs(runId), RUN_STATUS_FILENAME), recovered);
      }
      this.runs.set(runId, { ...recovered, emitter: quietEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, topic: r.topic, status: r.status, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  getInternal(runId: string): RunInternal | null {
    return this.runs.get(runId) ?? null;
  }

  async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    return await dirExists(runOutputDirAbs(runId));
  }

  private async nextRunId(topic: string): Promise<string> {
    const base = deriveRunId(topic);
    if (!(await this.runIdExists(base))) return base;
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${base}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  /**
   * Registers a run. A caller-supplied `runId` that already exists (in memory or
   * on disk) is reopened: its stage records are reset, its artifacts stay put.
   */
  async createRun(topic: string, settings?: RunSettingsOverrides, options?: { runId?: string }): Promise<RunStatus> {
    const requested = options?.runId?.trim();
    if (requested && !isSafeArtifactName(requested)) {
      throw new RangeError(`Invalid runId: ${requested}`);
    }
    const runId = requested || (await this.nextRunId(topic));
    const previous = this.runs.get(runId);

    const run: RunInternal = {
      runId,
      topic,
      settings,
      status: "queued",
      startedAt: nowIso(),
      currentStage: null,
      attempts: previous?.attempts ?? 0,
      steps: freshStages(),
      outputFolder: path.join("output", runId),
      emitter: previous?.emitter ?? quietEmitter()
    };

    await ensureDir(runOutputDirAbs(runId));
    await ensureDir(runIntermediateDirAbs(runId));
    await ensureDir(runFinalDirAbs(runId));
    await this.persist(run);

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  /** Puts an existing run back in the queue for a full re-execution. */
  async reopenRun(runId: string, patch?: { topic?: string; settings?: RunSettingsOverrides }): Promise<RunStatus | null> {
    const r = this.runs.get(runId);
    if (!r) return null;
    if (patch?.topic) r.topic = patch.topic;
    if (patch?.settings) r.settings = { ...r.settings, ...patch.settings };
    r.status = "queued";
    r.currentStage = null;
    r.steps = freshStages();
    delete r.finishedAt;
    await this.persist(r);
    return this.snapshot(r);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Partial<RunStatus>): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (status === "running") r.attempts += 1;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.topic) r.topic = patch.topic;
    if (patch?.settings) r.settings = patch.settings;
    if (patch?.effectiveSettings) r.effectiveSettings = patch.effectiveSettings;
    await this.persist(r);
  }

  async setEffectiveSettings(runId: string, settings: RunSettings): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.effectiveSettings = settings;
    await this.persist(r);
  }

  async startStage(runId: string, stage: Stage): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[stage];
    s.status = "running";
    s.startedAt = nowIso();
    delete s.error;
    r.currentStage = stage;
    await this.persist(r);
    await this.appendStageLog(runId, stage, "started", {});
    r.emitter.emit("stage_started", { stage, at: s.startedAt });
  }

  /** Records a stage that returned; `success` is the stage's own verdict. */
  async completeStage(runId: string, stage: Stage, success: boolean, details: Record<string, unknown> = {}): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[stage];
    s.status = success ? "done" : "error";
    s.finishedAt = nowIso();
    if (!success) s.error = "stage reported failure";
    await this.persist(r);
    await this.appendStageLog(runId, stage, "completed", { success, ...details });
    r.emitter.emit("stage_finished", { stage, at: s.finishedAt, ok: success });
  }

  /** Records a stage that threw. */
  async failStage(runId: string, stage: Stage, error: string, details: Record<string, unknown> = {}): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[stage];
    s.status = "error";
    s.finishedAt = nowIso();
    s.error = error;
    await this.persist(r);
    await this.appendStageLog(runId, stage, "failed", { error, ...details });
    r.emitter.emit("stage_finished", { stage, at: s.finishedAt, ok: false });
    r.emitter.emit("error", { stage, message: error, at: s.finishedAt });
  }

  async addArtifact(runId: string, stage: Stage, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[stage];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { stage, name, at: nowIso() });
  }

  async readStageLog(runId: string): Promise<StageLogRecord[]> {
    const text = await tryReadTextFile(stageLogPathAbs(runId));
    if (!text) return [];
    const out: StageLogRecord[] = [];
    for (const line of text.split("\n")) {
      if (line.trim().length === 0) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        // A torn final line from a crashed process is skipped; earlier records stay readable.
        continue;
      }
      const parsed = StageLogRecordSchema.safeParse(raw);
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }

  log(runId: string, message: string, stage?: Stage): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, stage, at: nowIso() });
  }

  error(runId: string, message: string, stage?: Stage): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, stage, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: string, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const eventTypes = ["stage_started", "stage_finished", "artifact_written", "log", "error"] as const;
    const handlers = eventTypes.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) r.emitter.off(type, handler);
    };
  }

  private async appendStageLog(
    runId: string,
    stage: Stage,
    status: StageLogStatus,
    details: Record<string, unknown>
  ): Promise<void> {
    const record: StageLogRecord = { timestamp: nowIso(), runId, stage, status, details };
    await appendJsonLine(stageLogPathAbs(runId), record);
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return pub;
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), RUN_STATUS_FILENAME), this.snapshot(run));
  }
}
