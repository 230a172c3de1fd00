import { describe, it, expect } from "vitest";
import { formatBytes, formatPercent, formatProgress, formatSummary, palette } from "../format.js";
import { summarize } from "../reporter.js";
import type { ConversionSuccess } from "../types.js";
import { failureResult } from "../worker.js";
import { makeTask } from "./helpers.js";

const plain = palette(false);

function success(name: string, inputSize: number, outputSize: number): ConversionSuccess {
  return {
    ok: true,
    inputPath: `/in/${name}`,
    outputPath: `/out/${name.replace(/\.\w+$/, ".bpg")}`,
    inputSizeBytes: inputSize,
    outputSizeBytes: outputSize,
    elapsedSeconds: 0.5,
    ratio: outputSize / inputSize,
    bytesSaved: inputSize - outputSize,
  };
}

describe("formatBytes", () => {
  it("picks the largest unit below 1024", () => {
    expect(formatBytes(0)).toBe("0.00 B");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.00 MB");
    expect(formatBytes(-2048)).toBe("-2.00 KB");
  });
});

describe("formatPercent", () => {
  it("shows one decimal", () => {
    expect(formatPercent(0.5)).toBe("50.0%");
    expect(formatPercent(0.1234)).toBe("12.3%");
  });
});

describe("formatProgress", () => {
  it("describes a converted file", () => {
    expect(formatProgress(success("a.png", 10240, 5120), 1, 2, plain)).toBe(
      "[1/2] Converted a.png → a.bpg (10.0→5.0 KB, 50.0%) in 0.50s",
    );
  });

  it("describes a failed file", () => {
    const failed = failureResult(makeTask("bpgenc", "/in/c.png", "/out/c.bpg"), 100, 0.25, {
      kind: "encoder-exit",
      message: "Encoder exited with code 1",
    });
    expect(formatProgress(failed, 2, 2, plain)).toBe("[2/2] Failed: c.png (0.25s) Encoder exited with code 1");
  });
});

describe("formatSummary", () => {
  it("lays out a successful run", () => {
    const summary = summarize([success("a.png", 10240, 5120), success("b.jpg", 20480, 10240)], 2);

    expect(formatSummary(summary, "/out", plain)).toEqual([
      "Conversion complete!",
      "",
      "Processed   : 2 files (2 success, 0 failed)",
      "Total time  : 2.00s (1.0 files/sec)",
      "",
      "Size summary:",
      "   Original → 30.00 KB",
      "   BPG      → 15.00 KB",
      "   Saved    → 15.00 KB (50.0% smaller)",
      "",
      "Avg ratio   : 50.0%",
      "Best        : 50.0% ← a.png",
      "Worst       : 50.0% ← a.png",
      "Most saved  : 10.00 KB ← b.jpg",
      "",
      "Output → /out",
    ]);
  });

  it("lists failures when nothing converted", () => {
    const failed = failureResult(makeTask("bpgenc", "/in/c.png", "/out/c.bpg"), 100, 0.25, {
      kind: "encoder-exit",
      message: "Encoder exited with code 1",
    });

    expect(formatSummary(summarize([failed], 0.5), "/out", plain)).toEqual([
      "No files converted successfully.",
      "Processed   : 1 files (0 success, 1 failed)",
      "Total time  : 0.50s",
      "",
      "Failed conversions:",
      "  - /in/c.png: Encoder exited with code 1",
    ]);
  });
});
