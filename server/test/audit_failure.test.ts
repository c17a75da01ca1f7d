import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Paragraph } from "../src/pipeline/schemas.js";

// The writer drops the citation group of the last paragraph so the audit has something to catch.
vi.mock("../src/pipeline/report.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/pipeline/report.js")>();
  return {
    ...actual,
    renderReport: (topic: string, paragraphs: readonly Paragraph[]) =>
      actual.renderReport(
        topic,
        paragraphs.map((p, i) => (i === paragraphs.length - 1 ? { ...p, citeIds: [] } : p))
      )
  };
});

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "deepcite-audit-"));
  process.env.DEEPCITE_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  delete process.env.DEEPCITE_OUTPUT_DIR;
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

describe("failed audit", () => {
  it("returns the run with a failing verdict and skips the cache stage", async () => {
    const { RunManager } = await import("../src/run_manager.js");
    const { runResearch } = await import("../src/pipeline/research_pipeline.js");
    const { artifactAbsPath } = await import("../src/pipeline/utils.js");

    const runs = new RunManager();
    const run = await runResearch("tidal power output", { budget: 2 }, { runs, runId: "audit" });

    expect(run.verdict).toMatchObject({
      passed: false,
      reportPassed: false,
      paragraphLogPassed: true,
      paragraphsWithoutCitation: [2],
      paragraphWithoutCitationCount: 1
    });

    const status = runs.getRun("audit");
    expect(status?.status).toBe("verification_failed");
    expect(status?.steps.audit.status).toBe("error");
    expect(status?.steps.cache.status).toBe("queued");

    const log = await runs.readStageLog("audit");
    expect(log.some((r) => r.stage === "cache")).toBe(false);

    const report = await fs.readFile(artifactAbsPath("audit", "report.md"), "utf8");
    expect(report.trimEnd().split("\n\n").at(-1)).toBe("Source 2: tidal power output summarizes current findings.");
    const verdict: unknown = JSON.parse(await fs.readFile(artifactAbsPath("audit", "verification.json"), "utf8"));
    expect(verdict).toMatchObject({ passed: false });
  });

  it("maps to the verification_failed exit code", async () => {
    const { RunManager } = await import("../src/run_manager.js");
    const { invokeRun } = await import("../src/invoke.js");

    const result = await invokeRun({ topic: "tidal power output in coastal grids", runId: "audit-exit", overrides: { budget: 2 } }, { runs: new RunManager() });

    expect(result.outcome).toBe("verification_failed");
    expect(result.exitCode).toBe(3);
    expect(result.verdict?.passed).toBe(false);
  });
});
