export const RUN_OUTCOMES = ["done", "error", "needs_clarification", "verification_failed"] as const;

export type RunOutcome = (typeof RUN_OUTCOMES)[number];

// Callers (shell wrappers, schedulers) branch on these, so they must stay distinct.
export const EXIT_CODES: Record<RunOutcome, number> = {
  done: 0,
  error: 1,
  needs_clarification: 2,
  verification_failed: 3
};

export function exitCodeForOutcome(outcome: RunOutcome): number {
  return EXIT_CODES[outcome];
}

export function isRunOutcome(status: string): status is RunOutcome {
  return RUN_OUTCOMES.some((outcome) => outcome === status);
}

/** Outcome of a pipeline that returned: anything short of a passing audit is a verification failure. */
export function outcomeForVerdict(verdict: { passed: boolean } | null): RunOutcome {
  return verdict?.passed ? "done" : "verification_failed";
}
