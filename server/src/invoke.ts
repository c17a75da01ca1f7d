import { RunManager } from "./run_manager.js";
import type { RunSettingsOverrides } from "./settings.js";
import { EXIT_CODES, exitCodeForOutcome, outcomeForVerdict, type RunOutcome } from "./outcome.js";
import { applyAnswers, needsClarification, pendingClarification } from "./pipeline/clarify.js";
import { executeRun, readClarificationRecord, type ResearchDeps } from "./pipeline/research_pipeline.js";
import { renderVerificationSummary } from "./pipeline/report.js";
import type { AuditVerdict, ClarificationRecord } from "./pipeline/schemas.js";
import { ARTIFACT_NAMES, artifactAbsPath, errorMessage, nowIso, writeJsonFile, writeTextFile } from "./pipeline/utils.js";
import { MissingReportError, verifyRunArtifacts } from "./pipeline/verifier.js";

export type InvokeRequest = {
  topic?: string;
  runId?: string;
  answers?: string[];
  overrides?: RunSettingsOverrides;
  verifyOnly?: boolean;
};

export type InvokeResult = {
  outcome: RunOutcome;
  exitCode: number;
  runId: string | null;
  questions?: string[];
  verdict?: AuditVerdict;
  error?: string;
};

export type PreparedRun =
  | { kind: "needs_clarification"; runId: string; questions: string[] }
  | { kind: "ready"; runId: string; topic: string; clarification: ClarificationRecord | null };

async function persistClarification(runs: RunManager, runId: string, record: ClarificationRecord): Promise<void> {
  await writeJsonFile(artifactAbsPath(runId, ARTIFACT_NAMES.clarification), record);
  await runs.addArtifact(runId, "intake", ARTIFACT_NAMES.clarification);
}

/**
 * Registers (or reopens) the run and applies the clarification gate. A run that
 * still needs answers is parked with status `needs_clarification`.
 */
export async function prepareRun(runs: RunManager, request: Omit<InvokeRequest, "verifyOnly">): Promise<PreparedRun> {
  const requestedId = request.runId?.trim() || undefined;
  const existing = requestedId ? await readClarificationRecord(requestedId) : null;
  const knownTopic = requestedId ? runs.getRun(requestedId)?.topic : undefined;
  const topic = request.topic?.trim() || existing?.originalTopic || knownTopic || "";
  const answers = request.answers ?? [];

  const created = await runs.createRun(topic, request.overrides, { runId: requestedId });
  const runId = created.runId;

  if (answers.length > 0) {
    const base = existing && existing.originalTopic === topic ? existing : pendingClarification(topic);
    const applied = applyAnswers(base, answers);
    await persistClarification(runs, runId, applied.record);
    if (applied.topic === null) {
      await runs.setRunStatus(runId, "needs_clarification", { finishedAt: nowIso() });
      return { kind: "needs_clarification", runId, questions: applied.record.questions };
    }
    await runs.setRunStatus(runId, "queued", { topic: applied.topic });
    return { kind: "ready", runId, topic: applied.topic, clarification: applied.record };
  }

  if (topic.length === 0 || needsClarification(topic)) {
    const record = pendingClarification(topic);
    await persistClarification(runs, runId, record);
    await runs.setRunStatus(runId, "needs_clarification", { finishedAt: nowIso() });
    return { kind: "needs_clarification", runId, questions: record.questions };
  }

  return { kind: "ready", runId, topic, clarification: null };
}

/** Re-verifies a finished run from its persisted report and paragraph log. */
export async function verifyOnly(runs: RunManager, runId: string): Promise<InvokeResult> {
  let verdict: AuditVerdict;
  try {
    verdict = await verifyRunArtifacts(runId);
  } catch (err) {
    if (err instanceof MissingReportError) {
      return { outcome: "error", exitCode: EXIT_CODES.error, runId, error: err.message };
    }
    throw err;
  }

  await writeJsonFile(artifactAbsPath(runId, ARTIFACT_NAMES.verification), verdict);
  await writeTextFile(artifactAbsPath(runId, ARTIFACT_NAMES.verificationSummary), renderVerificationSummary(runId, verdict));

  const outcome = outcomeForVerdict(verdict);
  await runs.setRunStatus(runId, outcome, { finishedAt: nowIso() });
  return { outcome, exitCode: exitCodeForOutcome(outcome), runId, verdict };
}

/**
 * Single entry point for scripted use: clarification, a full run, or a
 * verify-only pass, reduced to an outcome and its exit code.
 */
export async function invokeRun(request: InvokeRequest, deps: Omit<ResearchDeps, "runId"> = {}): Promise<InvokeResult> {
  const { runs = new RunManager(), ...rest } = deps;

  if (request.verifyOnly) {
    const runId = request.runId?.trim();
    if (!runId) {
      return { outcome: "error", exitCode: EXIT_CODES.error, runId: null, error: "verify-only requires a run id" };
    }
    return verifyOnly(runs, runId);
  }

  let prepared: PreparedRun;
  try {
    prepared = await prepareRun(runs, request);
  } catch (err) {
    return { outcome: "error", exitCode: EXIT_CODES.error, runId: request.runId ?? null, error: errorMessage(err) };
  }

  if (prepared.kind === "needs_clarification") {
    return {
      outcome: "needs_clarification",
      exitCode: EXIT_CODES.needs_clarification,
      runId: prepared.runId,
      questions: prepared.questions
    };
  }

  try {
    const run = await executeRun(
      runs,
      {
        runId: prepared.runId,
        topic: prepared.topic,
        overrides: request.overrides,
        clarification: prepared.clarification ?? undefined
      },
      rest
    );
    const outcome = outcomeForVerdict(run.verdict);
    return { outcome, exitCode: exitCodeForOutcome(outcome), runId: run.runId, verdict: run.verdict ?? undefined };
  } catch (err) {
    return { outcome: "error", exitCode: EXIT_CODES.error, runId: prepared.runId, error: errorMessage(err) };
  }
}
