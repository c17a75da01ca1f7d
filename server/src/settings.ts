import { z } from "zod";

export const RESEARCH_DEPTHS = ["brief", "medium", "deep"] as const;
export type ResearchDepth = (typeof RESEARCH_DEPTHS)[number];

export const WORKERS_MIN = 1;
export const WORKERS_MAX = 64;
export const BUDGET_MIN = 1;
// Citation ids run from C001 to C999 and every source gets one.
export const BUDGET_MAX = 999;

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  workers: 5,
  depth: "medium",
  budget: 10,
  lang: "en"
};

export const ResearchDepthSchema = z.enum(RESEARCH_DEPTHS);

export const RunSettingsSchema = z
  .object({
    workers: z.number().int().min(WORKERS_MIN).max(WORKERS_MAX),
    depth: ResearchDepthSchema,
    budget: z.number().int().min(BUDGET_MIN).max(BUDGET_MAX),
    lang: z.string().trim().min(2).max(16)
  })
  .strict();

export const RunSettingsOverridesSchema = RunSettingsSchema.partial();

export type RunSettings = {
  workers: number;
  depth: ResearchDepth;
  budget: number;
  lang: string;
};

export type RunSettingsOverrides = Partial<RunSettings>;

function intFromEnv(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  if (!raw || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

export function defaultRunSettings(): RunSettings {
  const depth = ResearchDepthSchema.safeParse(process.env.DEEPCITE_DEFAULT_DEPTH?.trim().toLowerCase());
  const lang = process.env.DEEPCITE_DEFAULT_LANG?.trim();

  return {
    workers: intFromEnv("DEEPCITE_DEFAULT_WORKERS", DEFAULT_RUN_SETTINGS.workers, WORKERS_MIN, WORKERS_MAX),
    depth: depth.success ? depth.data : DEFAULT_RUN_SETTINGS.depth,
    budget: intFromEnv("DEEPCITE_DEFAULT_BUDGET", DEFAULT_RUN_SETTINGS.budget, BUDGET_MIN, BUDGET_MAX),
    lang: lang && lang.length >= 2 ? lang : DEFAULT_RUN_SETTINGS.lang
  };
}

/** Drops keys whose value is undefined so spreading never clobbers a lower layer. */
export function compactOverrides(overrides: RunSettingsOverrides | undefined): RunSettingsOverrides {
  const out: RunSettingsOverrides = {};
  if (!overrides) return out;
  if (overrides.workers !== undefined) out.workers = overrides.workers;
  if (overrides.depth !== undefined) out.depth = overrides.depth;
  if (overrides.budget !== undefined) out.budget = overrides.budget;
  if (overrides.lang !== undefined) out.lang = overrides.lang;
  return out;
}

/**
 * Layers settings: configured defaults, then values persisted by an earlier
 * run with the same id, then explicit caller overrides. The result is validated
 * so a bad override surfaces as a zod error before any stage runs.
 */
export function resolveRunSettings(
  overrides: RunSettingsOverrides | undefined,
  persisted?: RunSettingsOverrides | null
): RunSettings {
  const merged = {
    ...defaultRunSettings(),
    ...compactOverrides(persisted ?? undefined),
    ...compactOverrides(overrides)
  };
  return RunSettingsSchema.parse(merged);
}

export function maxConcurrentRunsFromEnv(): number {
  return intFromEnv("MAX_CONCURRENT_RUNS", 1, 1, 32);
}

export function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}
