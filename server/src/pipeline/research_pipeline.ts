import { RunManager, STAGE_ORDER, type Stage } from "../run_manager.js";
import { resolveRunSettings, type ResearchDepth, type RunSettings, type RunSettingsOverrides } from "../settings.js";
import { outcomeForVerdict } from "../outcome.js";
import { CacheStore } from "./cache_store.js";
import { CitationRegistry } from "./citations.js";
import { renderReport, renderVerificationSummary } from "./report.js";
import {
  ClarificationRecordSchema,
  FetchedDocumentListSchema,
  PlanRecordSchema,
  SourceSchema,
  type AuditVerdict,
  type ClarificationRecord,
  type ExtractedRecord,
  type FetchedDocument,
  type Paragraph,
  type Plan,
  type PlanRecord,
  type Source
} from "./schemas.js";
import {
  ARTIFACT_NAMES,
  artifactAbsPath,
  errorMessage,
  nowIso,
  slug,
  tryReadJsonFile,
  writeJsonFile,
  writeJsonLinesFile,
  writeTextFile
} from "./utils.js";
import { verifyParagraphLog, verifyRunArtifacts } from "./verifier.js";
import { WorkerPool, WorkerTaskFault } from "./worker_pool.js";

export type HarvestSourcesFn = (topic: string, plan: Plan, budget: number) => Source[] | Promise<Source[]>;
export type FetchContentFn = (source: Source) => FetchedDocument | Promise<FetchedDocument>;
export type ExtractRecordFn = (doc: FetchedDocument, depth: ResearchDepth) => ExtractedRecord | Promise<ExtractedRecord>;

export type ResearchRun = {
  runId: string;
  topic: string;
  stage: Stage | null;
  settings: RunSettings;
  plan: Plan | null;
  clarification: ClarificationRecord | null;
  sources: Source[];
  documents: FetchedDocument[];
  records: ExtractedRecord[];
  paragraphs: Paragraph[];
  citations: CitationRegistry;
  verdict: AuditVerdict | null;
};

export type RunInput = {
  runId: string;
  topic: string;
  overrides?: RunSettingsOverrides;
  clarification?: ClarificationRecord;
};

export type PipelineOptions = {
  signal: AbortSignal;
  cache?: CacheStore<FetchedDocument[]>;
  harvestSources?: HarvestSourcesFn;
  fetchContent?: FetchContentFn;
  extractRecord?: ExtractRecordFn;
};

export class StageFault extends Error {
  readonly stage: Stage;
  constructor(stage: Stage, cause: unknown) {
    super(`Stage ${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StageFault";
    this.stage = stage;
  }
}

const KEY_POINTS_BY_DEPTH: Record<ResearchDepth, number> = {
  brief: 1,
  medium: 2,
  deep: 3
};

export function offlineHarvestSources(topic: string, _plan: Plan, budget: number): Source[] {
  const base = slug(topic);
  return Array.from({ length: budget }, (_unused, i) => ({
    url: `https://example.com/${base}/source-${i + 1}`,
    title: `Source ${i + 1}: ${topic}`,
    relevance: Math.max(0, Number((0.9 - 0.1 * i).toFixed(2)))
  }));
}

export function offlineFetchContent(source: Source): FetchedDocument {
  return {
    url: source.url,
    title: source.title,
    content: [
      `${source.title} summarizes current findings.`,
      `The material was collected from ${source.url} for review.`,
      "Further detail follows in the full text."
    ].join(" "),
    fetchedAt: nowIso()
  };
}

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function offlineExtractRecord(doc: FetchedDocument, depth: ResearchDepth): ExtractedRecord {
  const all = sentences(doc.content);
  return {
    url: doc.url,
    title: doc.title,
    keyPoints: all.slice(0, KEY_POINTS_BY_DEPTH[depth]),
    quotes: all.slice(0, 1)
  };
}

async function readPlanRecord(runId: string): Promise<PlanRecord | null> {
  const raw = await tryReadJsonFile<unknown>(artifactAbsPath(runId, ARTIFACT_NAMES.plan));
  const parsed = PlanRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export async function readClarificationRecord(runId: string): Promise<ClarificationRecord | null> {
  const raw = await tryReadJsonFile<unknown>(artifactAbsPath(runId, ARTIFACT_NAMES.clarification));
  const parsed = ClarificationRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function faultDetails(err: unknown): Record<string, unknown> {
  if (!(err instanceof WorkerTaskFault)) return {};
  const source = SourceSchema.safeParse(err.item);
  return source.success ? { index: err.index, url: source.data.url } : { index: err.index };
}

/**
 * Runs every stage in order for one run id. A stage that throws or returns
 * false aborts with a `StageFault`, except a failed audit: the run comes back
 * with `verdict.passed === false` and the cache stage is skipped.
 */
export async function runResearchPipeline(input: RunInput, runs: RunManager, options: PipelineOptions): Promise<ResearchRun> {
  const { runId } = input;
  const { signal } = options;
  const harvestSources = options.harvestSources ?? offlineHarvestSources;
  const fetchContent = options.fetchContent ?? offlineFetchContent;
  const extractRecord = options.extractRecord ?? offlineExtractRecord;
  const cache =
    options.cache ??
    new CacheStore(FetchedDocumentListSchema, {
      onCorrupt: (key, reason) => runs.log(runId, `Cache entry ${key} ignored (${reason})`, "fetch")
    });

  const persistedPlan = await readPlanRecord(runId);
  const settings = resolveRunSettings(input.overrides, persistedPlan);
  await runs.setEffectiveSettings(runId, settings);

  const run: ResearchRun = {
    runId,
    topic: input.topic,
    stage: null,
    settings,
    plan: null,
    clarification: input.clarification ?? (await readClarificationRecord(runId)),
    sources: [],
    documents: [],
    records: [],
    paragraphs: [],
    citations: new CitationRegistry(),
    verdict: null
  };

  const pool = new WorkerPool(settings.workers);
  // Citation id for records[i].
  let recordCids: string[] = [];

  async function writeJsonArtifact(stage: Stage, name: string, obj: unknown): Promise<void> {
    await writeJsonFile(artifactAbsPath(runId, name), obj);
    await runs.addArtifact(runId, stage, name);
  }

  async function writeTextArtifact(stage: Stage, name: string, text: string): Promise<void> {
    await writeTextFile(artifactAbsPath(runId, name), text);
    await runs.addArtifact(runId, stage, name);
  }

  async function intake(): Promise<boolean> {
    if (run.clarification) {
      await writeJsonArtifact("intake", ARTIFACT_NAMES.clarification, run.clarification);
    }
    runs.log(runId, `Topic: ${run.topic}`, "intake");
    return true;
  }

  async function plan(): Promise<boolean> {
    run.plan = {
      queries: [run.topic],
      sourceCategories: ["web", "academic"],
      estimatedSourceCount: settings.budget * 5,
      depth: settings.depth
    };
    const record: PlanRecord = { ...settings, plan: run.plan };
    await writeJsonArtifact("plan", ARTIFACT_NAMES.plan, record);
    return true;
  }

  async function harvest(): Promise<boolean> {
    if (!run.plan) throw new Error("No plan available");
    const produced = await harvestSources(run.topic, run.plan, settings.budget);
    run.sources = produced.slice(0, settings.budget);
    runs.log(runId, `Harvested ${run.sources.length}/${settings.budget} sources`, "harvest");
    return run.sources.length === settings.budget;
  }

  async function fetch(): Promise<boolean> {
    const cached = await cache.get(runId);
    if (cached !== null) {
      runs.log(runId, `Cache hit for ${runId} (${cached.length} documents)`, "fetch");
      run.documents = cached;
      return true;
    }
    run.documents = await pool.run((source) => fetchContent(source), run.sources);
    await cache.put(runId, run.documents);
    runs.log(runId, `Fetched ${run.documents.length} documents with ${pool.maxWorkers} workers`, "fetch");
    return true;
  }

  async function extract(): Promise<boolean> {
    run.citations.reset();
    run.records = [];
    recordCids = [];
    for (const doc of run.documents) {
      const record = await extractRecord(doc, settings.depth);
      const citation = run.citations.add({
        url: record.url,
        title: record.title,
        locator: record.url,
        quote: record.quotes[0],
        fetchedAt: doc.fetchedAt
      });
      run.records.push(record);
      recordCids.push(citation.cid);
    }
    return true;
  }

  async function verify(): Promise<boolean> {
    run.paragraphs = [];
    run.records.forEach((record, i) => {
      const first = record.keyPoints[0];
      const cid = recordCids[i];
      if (first === undefined || first.trim().length === 0 || cid === undefined) return;
      run.paragraphs.push({ text: first, citeIds: [cid] });
    });
    await writeJsonLinesFile(artifactAbsPath(runId, ARTIFACT_NAMES.paragraphs), run.paragraphs);
    await runs.addArtifact(runId, "verify", ARTIFACT_NAMES.paragraphs);

    const provisional = verifyParagraphLog(run.paragraphs.map((p) => JSON.stringify(p)));
    await writeJsonArtifact("verify", ARTIFACT_NAMES.verifySnapshot, {
      stage: "verify",
      status: "completed",
      paragraphsCount: run.paragraphs.length,
      verified: provisional.passed,
      errors: provisional.errors
    });
    return true;
  }

  async function write(): Promise<boolean> {
    await writeTextArtifact("write", ARTIFACT_NAMES.report, renderReport(run.topic, run.paragraphs));
    await writeJsonArtifact("write", ARTIFACT_NAMES.citations, run.citations.toJSON());
    return true;
  }

  async function audit(): Promise<boolean> {
    const verdict = await verifyRunArtifacts(runId);
    run.verdict = verdict;
    await writeJsonArtifact("audit", ARTIFACT_NAMES.verification, verdict);
    await writeTextArtifact("audit", ARTIFACT_NAMES.verificationSummary, renderVerificationSummary(runId, verdict));
    return verdict.passed;
  }

  async function confirmCache(): Promise<boolean> {
    const present = await cache.has(runId);
    runs.log(runId, `Cache key ${runId} ${present ? "present" : "missing"}`, "cache");
    return true;
  }

  function executeStage(stage: Stage): Promise<boolean> {
    switch (stage) {
      case "intake":
        return intake();
      case "plan":
        return plan();
      case "harvest":
        return harvest();
      case "fetch":
        return fetch();
      case "extract":
        return extract();
      case "verify":
        return verify();
      case "write":
        return write();
      case "audit":
        return audit();
      case "cache":
        return confirmCache();
      default: {
        const unreachable: never = stage;
        throw new Error(`Unknown stage: ${String(unreachable)}`);
      }
    }
  }

  async function runStage(stage: Stage): Promise<boolean> {
    if (signal.aborted) throw new Error("Cancelled");

    run.stage = stage;
    await runs.startStage(runId, stage);
    let ok: boolean;
    try {
      ok = await executeStage(stage);
    } catch (err) {
      await runs.failStage(runId, stage, errorMessage(err), faultDetails(err));
      throw new StageFault(stage, err);
    }
    await runs.completeStage(runId, stage, ok);
    return ok;
  }

  runs.log(runId, `Pipeline start (workers=${settings.workers}, depth=${settings.depth}, budget=${settings.budget})`);

  for (const stage of STAGE_ORDER) {
    if (await runStage(stage)) continue;
    if (stage === "audit") {
      runs.error(runId, "Verification failed; report kept for review", stage);
      return run;
    }
    runs.error(runId, `Stage ${stage} reported failure`, stage);
    throw new StageFault(stage, new Error("stage reported failure"));
  }

  return run;
}

export type ResearchDeps = Omit<PipelineOptions, "signal"> & {
  runs?: RunManager;
  runId?: string;
  clarification?: ClarificationRecord;
  signal?: AbortSignal;
};

/** Executes an already registered run and records its outcome on it. */
export async function executeRun(runs: RunManager, input: RunInput, deps: Omit<ResearchDeps, "runs" | "runId"> = {}): Promise<ResearchRun> {
  const { clarification, signal, ...collaborators } = deps;
  await runs.setRunStatus(input.runId, "running");
  try {
    const run = await runResearchPipeline({ ...input, clarification: input.clarification ?? clarification }, runs, {
      ...collaborators,
      signal: signal ?? new AbortController().signal
    });
    await runs.setRunStatus(input.runId, outcomeForVerdict(run.verdict), { finishedAt: nowIso() });
    return run;
  } catch (err) {
    await runs.setRunStatus(input.runId, "error", { finishedAt: nowIso() });
    throw err;
  }
}

/** Registers a run and executes it to completion. */
export async function runResearch(topic: string, overrides?: RunSettingsOverrides, deps: ResearchDeps = {}): Promise<ResearchRun> {
  const { runs = new RunManager(), runId, ...rest } = deps;
  const created = await runs.createRun(topic, overrides, { runId });
  return executeRun(runs, { runId: created.runId, topic, overrides }, rest);
}
