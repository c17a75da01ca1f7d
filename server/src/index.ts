import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PipelineFn } from "./executor.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { runResearchPipeline } = await import("./pipeline/research_pipeline.js");
const { maxConcurrentRunsFromEnv, portFromEnv } = await import("./settings.js");

const runs = new RunManager();
await runs.initFromDisk();

// Each run opens the shared cache directory itself so corrupt entries land in that run's log.
const pipeline: PipelineFn = async (input, runs, options) => {
  const run = await runResearchPipeline(input, runs, options);
  return { verdict: run.verdict };
};

const executor = new RunExecutor(runs, pipeline, { concurrency: maxConcurrentRunsFromEnv() });
const app = createApp(runs, executor);

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
});
