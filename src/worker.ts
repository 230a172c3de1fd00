import fs from "node:fs/promises";
import { buildEncoderArgs, execFileRunner } from "./encoder.js";
import type { EncoderRunOutcome, EncoderRunner } from "./encoder.js";
import { errorMessage } from "./errors.js";
import type {
  ConversionError,
  ConversionFailure,
  ConversionResult,
  ConversionSuccess,
  ConversionTask,
} from "./types.js";

/** Ratio recorded on failures; far above anything an encoder produces. */
export const FAILED_RATIO = 999;

export interface ConvertOptions {
  runner?: EncoderRunner;
  signal?: AbortSignal;
}

export function elapsedSince(start: number): number {
  return (performance.now() - start) / 1000;
}

export function failureResult(
  task: ConversionTask,
  inputSizeBytes: number,
  elapsedSeconds: number,
  error: ConversionError,
): ConversionFailure {
  const result: ConversionFailure = {
    ok: false,
    inputPath: task.inputPath,
    outputPath: task.outputPath,
    inputSizeBytes,
    outputSizeBytes: 0,
    elapsedSeconds,
    ratio: FAILED_RATIO,
    bytesSaved: inputSizeBytes > 0 ? -inputSizeBytes : 0,
    error,
  };
  return Object.freeze(result);
}

function describeExit(outcome: EncoderRunOutcome, timeoutMs: number | undefined): ConversionError {
  const captured = { stdout: outcome.stdout, stderr: outcome.stderr };

  if (outcome.aborted) {
    return { kind: "cancelled", message: "Conversion cancelled", signal: outcome.signal, ...captured };
  }
  if (outcome.timedOut) {
    return { kind: "timeout", message: `Encoder timed out after ${timeoutMs}ms`, signal: outcome.signal, ...captured };
  }

  if (outcome.overflowed) {
    return {
      kind: "encoder-exit",
      message: "Encoder was stopped: its output exceeded the capture limit",
      exitCode: outcome.exitCode,
      signal: outcome.signal,
      ...captured,
    };
  }

  const status = outcome.exitCode !== null ? `code ${outcome.exitCode}` : `signal ${outcome.signal ?? "unknown"}`;
  const detail = outcome.stderr.trim();
  return {
    kind: "encoder-exit",
    message: detail ? `Encoder exited with ${status}: ${detail}` : `Encoder exited with ${status}`,
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    ...captured,
  };
}

/**
 * Convert one task. Every failure is captured in the returned result; this
 * function does not reject.
 */
export async function convertTask(task: ConversionTask, options: ConvertOptions = {}): Promise<ConversionResult> {
  const runner = options.runner ?? execFileRunner;
  const start = performance.now();
  const fail = (inputSize: number, error: ConversionError) =>
    failureResult(task, inputSize, elapsedSince(start), error);

  let inputSize: number;
  try {
    inputSize = (await fs.stat(task.inputPath)).size;
  } catch (err) {
    return fail(0, { kind: "input-unreadable", message: `Cannot read input: ${errorMessage(err)}` });
  }

  if (inputSize === 0) {
    return fail(0, { kind: "input-empty", message: "Input file is empty" });
  }

  if (options.signal?.aborted) {
    return fail(inputSize, { kind: "cancelled", message: "Conversion cancelled" });
  }

  let outcome: EncoderRunOutcome;
  try {
    outcome = await runner(task.encoderPath, buildEncoderArgs(task), {
      timeoutMs: task.timeoutMs,
      signal: options.signal,
    });
  } catch (err) {
    return fail(inputSize, { kind: "encoder-spawn", message: `Cannot start encoder: ${errorMessage(err)}` });
  }

  if (outcome.exitCode !== 0) {
    return fail(inputSize, describeExit(outcome, task.timeoutMs));
  }

  let outputSize: number;
  try {
    outputSize = (await fs.stat(task.outputPath)).size;
  } catch (err) {
    return fail(inputSize, {
      kind: "output-missing",
      message: `Encoder reported success but output is unreadable: ${errorMessage(err)}`,
      exitCode: 0,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
    });
  }

  if (outputSize === 0) {
    return fail(inputSize, { kind: "output-empty", message: "Generated file is empty", exitCode: 0 });
  }

  const result: ConversionSuccess = {
    ok: true,
    inputPath: task.inputPath,
    outputPath: task.outputPath,
    inputSizeBytes: inputSize,
    outputSizeBytes: outputSize,
    elapsedSeconds: elapsedSince(start),
    ratio: outputSize / inputSize,
    bytesSaved: inputSize - outputSize,
  };
  return Object.freeze(result);
}
