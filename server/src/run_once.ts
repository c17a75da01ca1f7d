import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { InvokeRequest } from "./invoke.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { invokeRequestFromEnv } = await import("./invoke_env.js");
const { invokeRun } = await import("./invoke.js");
const { EXIT_CODES } = await import("./outcome.js");
const { errorMessage } = await import("./pipeline/utils.js");

let request: InvokeRequest;
try {
  request = invokeRequestFromEnv(process.env);
} catch (err) {
  console.error(errorMessage(err));
  process.exit(EXIT_CODES.error);
}

const result = await invokeRun(request);

console.log(`run ${result.runId ?? "(none)"}: ${result.outcome}`);
if (result.questions) {
  for (const question of result.questions) console.log(`  ? ${question}`);
}
if (result.verdict) {
  console.log(`  paragraphs=${result.verdict.totalParagraphs} uncited=${result.verdict.paragraphWithoutCitationCount} passed=${result.verdict.passed}`);
}
if (result.error) console.error(`  error: ${result.error}`);

process.exitCode = result.exitCode;
