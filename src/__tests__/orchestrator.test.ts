import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { createConfig } from "../config.js";
import type { BatchConfigInput } from "../config.js";
import { EncoderNotFoundError, InputNotFoundError } from "../errors.js";
import { locateEncoder } from "../locator.js";
import { runBatch } from "../orchestrator.js";
import type { ConvertFn } from "../pool.js";
import { RATIO_PLAUSIBILITY_LIMIT } from "../reporter.js";
import { cleanup, createSizedFile, createTestImage, tmpDir, writeFakeEncoder } from "./helpers.js";
import type { FakeEncoder } from "./helpers.js";

describe("runBatch", () => {
  let workDir: string;
  let inputRoot: string;
  let outputRoot: string;
  let emptyDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    inputRoot = path.join(workDir, "in");
    outputRoot = path.join(workDir, "out");
    emptyDir = path.join(workDir, "empty");
    await fs.mkdir(inputRoot, { recursive: true });
    await fs.mkdir(emptyDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  async function configWith(behavior: FakeEncoder, overrides: BatchConfigInput = {}) {
    const encoder = await writeFakeEncoder(path.join(workDir, "bin"), behavior);
    return createConfig({ inputRoot, outputRoot, workerCount: 2, encoderOverride: encoder, ...overrides }, {});
  }

  it("converts every file and summarizes the run", async () => {
    await createSizedFile(path.join(inputRoot, "a.png"), 10240);
    await createSizedFile(path.join(inputRoot, "b.jpg"), 20480);
    const onResult = vi.fn();

    const outcome = await runBatch(await configWith("halve"), { onResult });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.encoder.source).toBe("override");
    expect(outcome.results).toHaveLength(2);
    expect(outcome.results.every((r) => r.ok)).toBe(true);
    expect(onResult).toHaveBeenCalledTimes(2);

    const { summary } = outcome;
    if (summary.kind !== "converted") throw new Error("expected conversions");
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.averageRatio).toBe(0.5);
    expect(summary.totalBytesSaved).toBe(15360);
    expect((await fs.stat(path.join(outputRoot, "a.bpg"))).size).toBe(5120);
    expect((await fs.stat(path.join(outputRoot, "b.bpg"))).size).toBe(10240);
  });

  it("contains an encoder failure in the summary", async () => {
    await createTestImage(path.join(inputRoot, "c.png"));

    const outcome = await runBatch(await configWith("fail"));

    if (outcome.status !== "completed") throw new Error("expected a completed run");
    expect(outcome.results).toHaveLength(1);
    const [result] = outcome.results;
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Encoder exited with code 3: bpgenc: unsupported image");
    expect(result.ratio).toBeGreaterThanOrEqual(RATIO_PLAUSIBILITY_LIMIT);
    expect(outcome.summary.kind).toBe("no-successes");
    expect(outcome.summary.failed).toBe(1);
    expect(outcome.summary.failures.map((f) => f.file)).toEqual([path.join(inputRoot, "c.png")]);
  });

  it("stops early when no files match", async () => {
    await createSizedFile(path.join(inputRoot, "notes.txt"), 10);
    const convert = vi.fn<ConvertFn>();

    const outcome = await runBatch(await configWith("halve"), { convert });

    expect(outcome.status).toBe("no-files");
    expect(convert).not.toHaveBeenCalled();
  });

  it("fails on a missing input root before looking for the encoder", async () => {
    const locate = vi.fn(locateEncoder);
    const config = await configWith("halve", { inputRoot: path.join(workDir, "missing") });

    await expect(runBatch(config, { locate })).rejects.toBeInstanceOf(InputNotFoundError);
    expect(locate).not.toHaveBeenCalled();
  });

  it("fails when the encoder cannot be found", async () => {
    await createSizedFile(path.join(inputRoot, "a.png"), 100);
    const config = createConfig({ inputRoot, outputRoot, encoderOverride: path.join(workDir, "nope") }, {});

    await expect(runBatch(config, { scriptDir: emptyDir, env: { PATH: emptyDir } })).rejects.toBeInstanceOf(
      EncoderNotFoundError,
    );
    expect(await fs.readdir(workDir)).not.toContain("out");
  });

  it("keeps results aligned with discovered tasks", async () => {
    for (const name of ["e.png", "d/c.jpg", "b.jpeg", "a/z.png"]) {
      await createTestImage(path.join(inputRoot, name), name.endsWith(".png") ? "png" : "jpeg");
    }

    const outcome = await runBatch(await configWith("halve", { workerCount: 3 }));

    if (outcome.status !== "completed") throw new Error("expected a completed run");
    expect(outcome.results.map((r) => r.inputPath)).toEqual(outcome.tasks.map((t) => t.inputPath));
    expect(outcome.results.map((r) => r.outputPath)).toEqual([
      path.join(outputRoot, "a", "z.bpg"),
      path.join(outputRoot, "b.bpg"),
      path.join(outputRoot, "d", "c.bpg"),
      path.join(outputRoot, "e.bpg"),
    ]);
  });
});
