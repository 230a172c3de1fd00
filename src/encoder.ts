import { execFile } from "node:child_process";
import type { ConversionTask } from "./types.js";

export interface EncoderRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Cap on captured stdout or stderr; the encoder is killed past it. */
  maxBufferBytes?: number;
}

export interface EncoderRunOutcome {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Killed for writing more output than the runner captures. */
  overflowed: boolean;
}

/**
 * Runs the encoder to completion. Resolves for every exit, including
 * non-zero ones; rejects only when the process could not be started.
 */
export type EncoderRunner = (
  encoderPath: string,
  args: readonly string[],
  options: EncoderRunOptions,
) => Promise<EncoderRunOutcome>;

const MAX_CAPTURED_OUTPUT = 16 * 1024 * 1024;

export function buildEncoderArgs(task: ConversionTask): string[] {
  const { settings } = task;
  const args = [
    "-b", String(settings.bitDepth),
    "-o", task.outputPath,
    "-c", settings.colorSpace,
    "-f", settings.chromaFormat,
    "-m", String(settings.compressionLevel),
    "-e", settings.codec,
  ];

  if (settings.quantizer !== undefined) {
    args.push("-q", String(settings.quantizer));
  }
  if (settings.lossless) {
    args.push("-lossless");
  }

  // Input goes last
  args.push(task.inputPath);
  return args;
}

export const execFileRunner: EncoderRunner = (encoderPath, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      encoderPath,
      [...args],
      {
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
        maxBuffer: options.maxBufferBytes ?? MAX_CAPTURED_OUTPUT,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ exitCode: 0, signal: null, stdout, stderr, timedOut: false, aborted: false, overflowed: false });
          return;
        }

        if (options.signal?.aborted) {
          resolve({
            exitCode: null,
            signal: error.signal ?? null,
            stdout,
            stderr,
            timedOut: false,
            aborted: true,
            overflowed: false,
          });
          return;
        }

        if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          resolve({
            exitCode: null,
            signal: error.signal ?? null,
            stdout,
            stderr,
            timedOut: false,
            aborted: false,
            overflowed: true,
          });
          return;
        }

        if (typeof error.code === "number") {
          resolve({ exitCode: error.code, signal: null, stdout, stderr, timedOut: false, aborted: false, overflowed: false });
          return;
        }

        if (error.signal) {
          resolve({
            exitCode: null,
            signal: error.signal,
            stdout,
            stderr,
            timedOut: error.killed === true && options.timeoutMs !== undefined,
            aborted: false,
            overflowed: false,
          });
          return;
        }

        reject(error);
      },
    );
  });
