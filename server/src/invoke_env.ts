import { z } from "zod";
import { RunSettingsOverridesSchema } from "./settings.js";
import type { InvokeRequest } from "./invoke.js";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function integer(value: string | undefined): number | undefined {
  const raw = text(value);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

export class InvalidInvocationError extends Error {
  constructor(readonly issues: z.inferFlattenedErrors<typeof RunSettingsOverridesSchema>) {
    super(`Invalid run settings: ${JSON.stringify(issues.fieldErrors)}`);
    this.name = "InvalidInvocationError";
  }
}

/**
 * Builds an invocation from `DEEPCITE_*` variables. `DEEPCITE_ANSWERS` holds
 * clarification answers separated by `|`.
 */
export function invokeRequestFromEnv(env: NodeJS.ProcessEnv): InvokeRequest {
  const parsed = RunSettingsOverridesSchema.safeParse({
    workers: integer(env.DEEPCITE_WORKERS),
    depth: text(env.DEEPCITE_DEPTH)?.toLowerCase(),
    budget: integer(env.DEEPCITE_BUDGET),
    lang: text(env.DEEPCITE_LANG)
  });
  if (!parsed.success) throw new InvalidInvocationError(parsed.error.flatten());

  const answers = (env.DEEPCITE_ANSWERS ?? "")
    .split("|")
    .map((a) => a.trim())
    .filter((a) => a.length > 0);

  return {
    topic: text(env.DEEPCITE_TOPIC),
    runId: text(env.DEEPCITE_RUN_ID),
    answers: answers.length > 0 ? answers : undefined,
    overrides: parsed.data,
    verifyOnly: TRUTHY.has((env.DEEPCITE_VERIFY_ONLY ?? "").trim().toLowerCase())
  };
}
