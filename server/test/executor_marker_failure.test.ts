import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import type { FetchContentFn } from "../src/pipeline/research_pipeline.js";

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

async function waitFor(fn: () => boolean, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

let tmpOut: string | null = null;

beforeEach(async () => {
  vi.resetModules();
  // Only the cancellation marker hits a full disk; run artifacts still land.
  vi.doMock("node:fs/promises", async (importOriginal) => {
    const actual = await importOriginal<typeof import("node:fs/promises")>();
    const patched = {
      ...actual,
      writeFile: vi.fn<typeof actual.writeFile>(async (file, data, options) => {
        if (String(file).endsWith("CANCELLED.txt")) throw new Error("disk full");
        return actual.writeFile(file, data, options);
      })
    };
    return { ...patched, default: patched };
  });

  const fs = await import("node:fs/promises");
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "deepcite-cancel-"));
  process.env.DEEPCITE_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  delete process.env.DEEPCITE_OUTPUT_DIR;
  const fs = await import("node:fs/promises");
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;

  vi.doUnmock("node:fs/promises");
  vi.resetModules();
});

describe("cancelling a research run mid-fetch", () => {
  it("stops before extract and logs the marker write failure", async () => {
    const fs = await import("node:fs/promises");
    const { RunManager } = await import("../src/run_manager.js");
    const { RunExecutor } = await import("../src/executor.js");
    const { offlineFetchContent, runResearchPipeline } = await import("../src/pipeline/research_pipeline.js");
    const { artifactAbsPath } = await import("../src/pipeline/utils.js");

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let fetchesStarted = 0;
    const fetchContent: FetchContentFn = async (source) => {
      fetchesStarted += 1;
      await gate;
      return offlineFetchContent(source);
    };

    const runs = new RunManager();
    await runs.createRun("grid storage", { budget: 2 }, { runId: "cancel-me" });
    const logs: string[] = [];
    const errors: string[] = [];
    runs.subscribe("cancel-me", (type, payload) => {
      if (typeof payload !== "object" || payload === null || !("message" in payload)) return;
      if (type === "log") logs.push(String(payload.message));
      if (type === "error") errors.push(String(payload.message));
    });

    const exec = new RunExecutor(runs, async (input, manager, options) => {
      const run = await runResearchPipeline(input, manager, { ...options, fetchContent });
      return { verdict: run.verdict };
    });
    exec.enqueue("cancel-me");
    await waitFor(() => fetchesStarted === 2);

    expect(exec.cancel("cancel-me")).toBe(true);
    release();
    await exec.idle();

    expect(runs.getRun("cancel-me")?.status).toBe("error");
    expect(errors).toEqual(["Cancelled"]);
    expect(logs).toContain("Could not write CANCELLED.txt: disk full");

    const log = await runs.readStageLog("cancel-me");
    expect(log.map((r) => `${r.stage}:${r.status}`)).toEqual([
      "intake:started",
      "intake:completed",
      "plan:started",
      "plan:completed",
      "harvest:started",
      "harvest:completed",
      "fetch:started",
      "fetch:completed"
    ]);

    await expect(fs.stat(artifactAbsPath("cancel-me", "plan.json"))).resolves.toBeTruthy();
    await expect(fs.stat(artifactAbsPath("cancel-me", "report.md"))).rejects.toThrow();
    await expect(fs.stat(artifactAbsPath("cancel-me", "CANCELLED.txt"))).rejects.toThrow();
  });
});
