import fs from "node:fs/promises";
import type { RunManager } from "./run_manager.js";
import type { RunSettingsOverrides } from "./settings.js";
import { outcomeForVerdict } from "./outcome.js";
import type { AuditVerdict } from "./pipeline/schemas.js";
import { artifactAbsPath, errorMessage, nowIso } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (
  input: { runId: string; topic: string; overrides?: RunSettingsOverrides },
  runs: RunManager,
  options: PipelineOptions
) => Promise<{ verdict: AuditVerdict | null }>;

export const CANCELLED_MARKER = "CANCELLED.txt";

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  isQueued(runId: string): boolean {
    return this.queue.includes(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status === "running") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      void this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() }).catch((err: unknown) => {
        console.error(`[deepcite] failed to persist cancellation for ${runId}: ${errorMessage(err)}`);
      });
      return true;
    }

    return false;
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.running.size > 0 || this.queue.length > 0) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) break;
      // Claim the slot before start() awaits anything.
      const controller = new AbortController();
      this.running.set(next, controller);
      void this.start(next, controller);
    }
  }

  private async start(runId: string, controller: AbortController): Promise<void> {
    try {
      const run = this.runs.getRun(runId);
      if (!run) return;

      await this.runs.setRunStatus(runId, "running");
      try {
        const result = await this.pipeline({ runId: run.runId, topic: run.topic, overrides: run.settings }, this.runs, {
          signal: controller.signal
        });
        const outcome = outcomeForVerdict(result.verdict);
        if (outcome === "verification_failed") this.runs.error(runId, "Verification failed");
        await this.runs.setRunStatus(runId, outcome, { finishedAt: nowIso() });
      } catch (err) {
        const aborted = controller.signal.aborted;
        const msg = aborted ? "Cancelled" : errorMessage(err);
        this.runs.error(runId, msg);
        await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });

        // Persist a cancellation marker for operators browsing the run folder.
        if (aborted) {
          await fs.writeFile(artifactAbsPath(runId, CANCELLED_MARKER), `Cancelled at ${nowIso()}\n`).catch((markerErr: unknown) => {
            this.runs.log(runId, `Could not write ${CANCELLED_MARKER}: ${errorMessage(markerErr)}`);
          });
        }
      }
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
