import { encoderSettings } from "./config.js";
import type { BatchConfig } from "./config.js";
import { assertInputRoot, discoverTasks } from "./discover.js";
import type { EncoderRunner } from "./encoder.js";
import { locateEncoder } from "./locator.js";
import type { LocateOptions, LocatedEncoder } from "./locator.js";
import { runPool } from "./pool.js";
import type { PoolOptions } from "./pool.js";
import { summarize } from "./reporter.js";
import { elapsedSince } from "./worker.js";
import type { ConversionResult, ConversionTask, RunSummary } from "./types.js";

export interface RunDependencies {
  locate?: (options: LocateOptions) => Promise<LocatedEncoder>;
  /** Passed to the locator; the encoder may live next to the running script. */
  scriptDir?: string;
  env?: NodeJS.ProcessEnv;
  runner?: EncoderRunner;
  convert?: PoolOptions["convert"];
  onEncoder?: (encoder: LocatedEncoder) => void;
  onTasks?: (tasks: readonly ConversionTask[]) => void;
  onResult?: PoolOptions["onResult"];
  signal?: AbortSignal;
}

export type RunOutcome =
  | {
      status: "no-files";
      encoder: LocatedEncoder;
      inputRoot: string;
    }
  | {
      status: "completed";
      encoder: LocatedEncoder;
      tasks: ConversionTask[];
      results: ConversionResult[];
      summary: RunSummary;
    };

/**
 * One batch run: check the input root, find the encoder, discover tasks, run
 * them through the pool and reduce the results. Setup problems throw a
 * BatchError before any task starts; per-file problems end up in the summary.
 */
export async function runBatch(config: BatchConfig, deps: RunDependencies = {}): Promise<RunOutcome> {
  await assertInputRoot(config.inputRoot);

  const locate = deps.locate ?? locateEncoder;
  const encoder = await locate({ override: config.encoderOverride, scriptDir: deps.scriptDir, env: deps.env });
  deps.onEncoder?.(encoder);

  const tasks = await discoverTasks(config.inputRoot, config.outputRoot, config.extensions, {
    encoderPath: encoder.path,
    settings: encoderSettings(config),
    timeoutMs: config.timeoutMs,
  });

  if (tasks.length === 0) {
    return { status: "no-files", encoder, inputRoot: config.inputRoot };
  }
  deps.onTasks?.(tasks);

  const start = performance.now();
  const results = await runPool(tasks, {
    workerCount: config.workerCount,
    convert: deps.convert,
    convertOptions: { runner: deps.runner },
    onResult: deps.onResult,
    signal: deps.signal,
  });

  return {
    status: "completed",
    encoder,
    tasks,
    results,
    summary: summarize(results, elapsedSince(start)),
  };
}
