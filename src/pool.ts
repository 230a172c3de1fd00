import os from "node:os";
import { errorMessage, InvalidWorkerCountError } from "./errors.js";
import { convertTask, failureResult } from "./worker.js";
import type { ConvertOptions } from "./worker.js";
import type { ConversionResult, ConversionTask } from "./types.js";

export type ConvertFn = (task: ConversionTask, options: ConvertOptions) => Promise<ConversionResult>;

export interface PoolOptions {
  workerCount?: number;
  convert?: ConvertFn;
  /** Forwarded to every conversion. */
  convertOptions?: Omit<ConvertOptions, "signal">;
  /** Called as each result lands, in completion order. */
  onResult?: (result: ConversionResult, completed: number, total: number) => void;
  signal?: AbortSignal;
}

export function defaultWorkerCount(): number {
  return os.availableParallelism();
}

/**
 * Run every task with at most `workerCount` conversions in flight. Each
 * worker pulls the next unstarted task; results are stored by task index so
 * the returned array lines up with `tasks` whatever the completion order.
 */
export async function runPool(tasks: readonly ConversionTask[], options: PoolOptions = {}): Promise<ConversionResult[]> {
  const workerCount = options.workerCount ?? defaultWorkerCount();
  if (!Number.isInteger(workerCount) || workerCount <= 0) {
    throw new InvalidWorkerCountError(workerCount);
  }

  const convert = options.convert ?? convertTask;
  const { signal, onResult } = options;
  const results = new Array<ConversionResult | undefined>(tasks.length).fill(undefined);
  let cursor = 0;
  let completed = 0;

  const settle = (index: number, result: ConversionResult): void => {
    results[index] = result;
    completed++;
    if (onResult) {
      try {
        onResult(result, completed, tasks.length);
      } catch (err) {
        console.warn(`Warning: progress callback failed: ${errorMessage(err)}`);
      }
    }
  };

  const worker = async (): Promise<void> => {
    while (cursor < tasks.length) {
      const index = cursor++;
      const task = tasks[index];
      const start = performance.now();

      if (signal?.aborted) {
        settle(index, failureResult(task, 0, 0, { kind: "cancelled", message: "Conversion cancelled" }));
        continue;
      }

      try {
        settle(index, await convert(task, { ...options.convertOptions, signal }));
      } catch (err) {
        settle(
          index,
          failureResult(task, 0, (performance.now() - start) / 1000, {
            kind: "worker-crash",
            message: `Worker failed: ${errorMessage(err)}`,
          }),
        );
      }
    }
  };

  const lanes = Math.min(workerCount, tasks.length);
  await Promise.all(Array.from({ length: lanes }, () => worker()));

  return results.map(
    (result, index) =>
      result ??
      failureResult(tasks[index], 0, 0, { kind: "worker-crash", message: "No result was recorded for this task" }),
  );
}
