import { afterEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  BUDGET_MAX,
  compactOverrides,
  DEFAULT_RUN_SETTINGS,
  defaultRunSettings,
  maxConcurrentRunsFromEnv,
  portFromEnv,
  resolveRunSettings
} from "../src/settings.js";

const ENV_KEYS = [
  "DEEPCITE_DEFAULT_WORKERS",
  "DEEPCITE_DEFAULT_DEPTH",
  "DEEPCITE_DEFAULT_BUDGET",
  "DEEPCITE_DEFAULT_LANG",
  "MAX_CONCURRENT_RUNS",
  "PORT"
];

describe("settings", () => {
  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
  });

  it("uses built-in defaults when nothing is configured", () => {
    expect(defaultRunSettings()).toEqual({ workers: 5, depth: "medium", budget: 10, lang: "en" });
    expect(resolveRunSettings(undefined)).toEqual(DEFAULT_RUN_SETTINGS);
  });

  it("reads defaults from the environment and clamps them", () => {
    process.env.DEEPCITE_DEFAULT_WORKERS = "500";
    process.env.DEEPCITE_DEFAULT_DEPTH = " DEEP ";
    process.env.DEEPCITE_DEFAULT_BUDGET = "0";
    process.env.DEEPCITE_DEFAULT_LANG = "de";
    expect(defaultRunSettings()).toEqual({ workers: 64, depth: "deep", budget: 1, lang: "de" });
  });

  it("ignores unusable environment values", () => {
    process.env.DEEPCITE_DEFAULT_WORKERS = "lots";
    process.env.DEEPCITE_DEFAULT_DEPTH = "exhaustive";
    process.env.DEEPCITE_DEFAULT_BUDGET = "2.5";
    process.env.DEEPCITE_DEFAULT_LANG = "x";
    expect(defaultRunSettings()).toEqual(DEFAULT_RUN_SETTINGS);
  });

  it("layers defaults, persisted values, then overrides", () => {
    const settings = resolveRunSettings({ workers: 2 }, { workers: 8, depth: "brief", budget: 4 });
    expect(settings).toEqual({ workers: 2, depth: "brief", budget: 4, lang: "en" });
  });

  it("does not let undefined override keys clobber lower layers", () => {
    expect(compactOverrides({ workers: undefined, depth: "deep" })).toEqual({ depth: "deep" });
    expect(resolveRunSettings({ budget: undefined }, { budget: 7 }).budget).toBe(7);
  });

  it("rejects out-of-range overrides", () => {
    expect(() => resolveRunSettings({ budget: BUDGET_MAX + 1 })).toThrow(ZodError);
    expect(() => resolveRunSettings({ workers: 0 })).toThrow(ZodError);
  });

  it("reads server limits from the environment", () => {
    expect(maxConcurrentRunsFromEnv()).toBe(1);
    expect(portFromEnv()).toBe(5050);
    process.env.MAX_CONCURRENT_RUNS = "4";
    process.env.PORT = "8080";
    expect(maxConcurrentRunsFromEnv()).toBe(4);
    expect(portFromEnv()).toBe(8080);
    process.env.PORT = "nope";
    expect(portFromEnv()).toBe(5050);
  });
});
