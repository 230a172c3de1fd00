import path from "node:path";
import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { ConversionResult, FailedFile, RunSummary } from "./types.js";

export function palette(color: boolean): ChalkInstance {
  return color ? chalk : new Chalk({ level: 0 });
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let size = bytes;
  let unit = 0;

  while (Math.abs(size) >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function formatProgress(result: ConversionResult, completed: number, total: number, c: ChalkInstance): string {
  const counter = c.gray(`[${completed}/${total}]`);
  const name = path.basename(result.inputPath);

  if (!result.ok) {
    return `${counter} ${c.red(`Failed: ${name} (${formatSeconds(result.elapsedSeconds)}) ${result.error.message}`)}`;
  }

  const sizes = `${(result.inputSizeBytes / 1024).toFixed(1)}→${(result.outputSizeBytes / 1024).toFixed(1)} KB`;
  return (
    `${counter} Converted ${name} → ${path.basename(result.outputPath)} ` +
    `(${sizes}, ${formatPercent(result.ratio)}) in ${formatSeconds(result.elapsedSeconds)}`
  );
}

function formatFailures(failures: readonly FailedFile[], c: ChalkInstance): string[] {
  if (failures.length === 0) return [];
  return ["", c.red("Failed conversions:"), ...failures.map((f) => c.red(`  - ${f.file}: ${f.error.message}`))];
}

export function formatSummary(summary: RunSummary, outputRoot: string, c: ChalkInstance): string[] {
  if (summary.kind === "no-successes") {
    return [
      c.red("No files converted successfully."),
      `Processed   : ${summary.total} files (0 success, ${summary.failed} failed)`,
      `Total time  : ${formatSeconds(summary.elapsedSeconds)}`,
      ...formatFailures(summary.failures, c),
    ];
  }

  return [
    c.cyan.bold("Conversion complete!"),
    "",
    c.green(`Processed   : ${summary.total} files (${summary.succeeded} success, ${summary.failed} failed)`),
    c.green(
      `Total time  : ${formatSeconds(summary.elapsedSeconds)} (${summary.filesPerSecond.toFixed(1)} files/sec)`,
    ),
    "",
    c.cyanBright("Size summary:"),
    `   Original → ${formatBytes(summary.totalInputBytes)}`,
    `   BPG      → ${formatBytes(summary.totalOutputBytes)}`,
    `   Saved    → ${c.greenBright(
      `${formatBytes(summary.totalBytesSaved)} (${formatPercent(summary.savedFraction)} smaller)`,
    )}`,
    "",
    c.blueBright(`Avg ratio   : ${formatPercent(summary.averageRatio)}`),
    c.greenBright(`Best        : ${formatPercent(summary.best.ratio)} ← ${path.basename(summary.best.inputPath)}`),
    c.magentaBright(`Worst       : ${formatPercent(summary.worst.ratio)} ← ${path.basename(summary.worst.inputPath)}`),
    c.greenBright(
      `Most saved  : ${formatBytes(summary.mostSaved.bytesSaved)} ← ${path.basename(summary.mostSaved.inputPath)}`,
    ),
    ...formatFailures(summary.failures, c),
    "",
    c.cyan.bold(`Output → ${outputRoot}`),
  ];
}
