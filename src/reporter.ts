import type { ConversionResult, ConversionSuccess, FailedFile, RunSummary } from "./types.js";

/** Ratios at or above this are treated as failed conversions. */
export const RATIO_PLAUSIBILITY_LIMIT = 10;

export function isSuccessful(result: ConversionResult): boolean {
  return result.ok && result.outputSizeBytes > 0 && result.ratio < RATIO_PLAUSIBILITY_LIMIT;
}

function pick(
  items: readonly ConversionSuccess[],
  better: (candidate: ConversionSuccess, current: ConversionSuccess) => boolean,
): ConversionSuccess {
  return items.reduce((current, candidate) => (better(candidate, current) ? candidate : current));
}

export function summarize(results: readonly ConversionResult[], elapsedSeconds: number): RunSummary {
  const successful: ConversionSuccess[] = [];
  const failures: FailedFile[] = [];
  for (const result of results) {
    if (result.ok && isSuccessful(result)) {
      successful.push(result);
      continue;
    }
    failures.push({
      file: result.inputPath,
      error: result.ok
        ? { kind: "implausible-ratio", message: `Implausible compression ratio ${result.ratio}` }
        : result.error,
    });
  }

  if (successful.length === 0) {
    return {
      kind: "no-successes",
      total: results.length,
      failed: failures.length,
      failures,
      elapsedSeconds,
    };
  }

  const totalInputBytes = successful.reduce((acc, r) => acc + r.inputSizeBytes, 0);
  const totalOutputBytes = successful.reduce((acc, r) => acc + r.outputSizeBytes, 0);
  const totalBytesSaved = totalInputBytes - totalOutputBytes;
  const averageRatio = successful.reduce((acc, r) => acc + r.ratio, 0) / successful.length;

  return {
    kind: "converted",
    total: results.length,
    succeeded: successful.length,
    failed: results.length - successful.length,
    failures,
    totalInputBytes,
    totalOutputBytes,
    totalBytesSaved,
    savedFraction: totalBytesSaved / totalInputBytes,
    averageRatio,
    best: pick(successful, (c, cur) => c.ratio < cur.ratio),
    worst: pick(successful, (c, cur) => c.ratio > cur.ratio),
    mostSaved: pick(successful, (c, cur) => c.bytesSaved > cur.bytesSaved),
    elapsedSeconds,
    filesPerSecond: elapsedSeconds > 0 ? successful.length / elapsedSeconds : 0,
  };
}
