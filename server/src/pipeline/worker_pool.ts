import pLimit from "p-limit";
import { errorMessage } from "./utils.js";
import { WORKERS_MAX, WORKERS_MIN } from "../settings.js";

export type TaskFn<T, R> = (item: T, index: number) => R | Promise<R>;

export class WorkerTaskFault extends Error {
  readonly index: number;
  readonly item: unknown;
  constructor(index: number, item: unknown, cause: unknown) {
    super(`Worker task ${index} failed: ${errorMessage(cause)}`, { cause });
    this.name = "WorkerTaskFault";
    this.index = index;
    this.item = item;
  }
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Bounded fan-out executor. One instance per run; the bound holds across
 * every dispatch on the pool, so overlapping `run` calls share its slots.
 * `maxWorkers` may change between dispatches but not during one.
 *
 * Failure policy is fail-fast: after the first task error nothing new is
 * started for that dispatch, tasks already running are allowed to settle,
 * and the dispatch rejects with a `WorkerTaskFault` naming the first
 * failing item.
 */
export class WorkerPool {
  private limit: number;
  private limiter: Limit;
  private active = 0;

  constructor(maxWorkers = 5) {
    this.limit = WorkerPool.checkedLimit(maxWorkers);
    this.limiter = pLimit(this.limit);
  }

  get maxWorkers(): number {
    return this.limit;
  }

  /** Tasks currently executing across all dispatches on this pool. */
  get activeTasks(): number {
    return this.active;
  }

  setMaxWorkers(maxWorkers: number): void {
    this.limit = WorkerPool.checkedLimit(maxWorkers);
    this.limiter = pLimit(this.limit);
  }

  /** `results[i]` is the value for `items[i]`, whatever order tasks finish in. */
  async run<T, R>(fn: TaskFn<T, R>, items: readonly T[]): Promise<R[]> {
    const slots: Array<{ value: R } | undefined> = new Array(items.length);
    await this.dispatch(fn, items, (index, value) => {
      slots[index] = { value };
    });
    return items.map((_item, index) => {
      const slot = slots[index];
      if (!slot) throw new Error(`Worker pool lost result for task ${index}`);
      return slot.value;
    });
  }

  /** Results in completion order, for callers that do not need alignment. */
  async mapUnordered<T, R>(fn: TaskFn<T, R>, items: readonly T[]): Promise<R[]> {
    const results: R[] = [];
    await this.dispatch(fn, items, (_index, value) => results.push(value));
    return results;
  }

  private async dispatch<T, R>(fn: TaskFn<T, R>, items: readonly T[], onResult: (index: number, value: R) => void): Promise<void> {
    const limiter = this.limiter;
    const state: { failure: WorkerTaskFault | null } = { failure: null };

    const execute = async (item: T, index: number): Promise<void> => {
      // Queued behind a failure of this dispatch: never started.
      if (state.failure) return;
      this.active += 1;
      try {
        onResult(index, await fn(item, index));
      } catch (err) {
        state.failure ??= new WorkerTaskFault(index, item, err);
      } finally {
        this.active -= 1;
      }
    };

    await Promise.all(items.map((item, index) => limiter(() => execute(item, index))));
    if (state.failure) throw state.failure;
  }

  private static checkedLimit(maxWorkers: number): number {
    if (!Number.isInteger(maxWorkers) || maxWorkers < WORKERS_MIN || maxWorkers > WORKERS_MAX) {
      throw new RangeError(`maxWorkers must be an integer in [${WORKERS_MIN}, ${WORKERS_MAX}], got ${maxWorkers}`);
    }
    return maxWorkers;
  }
}
