import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";
import { createConfig, encoderSettings } from "../config.js";
import type { ConversionTask, EncoderSettings } from "../types.js";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `bpgbatch-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function createTestImage(
  filePath: string,
  format: "png" | "jpeg" = "png",
  width = 16,
  height = 16,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const background = format === "png" ? { r: 70, g: 130, b: 180 } : { r: 255, g: 100, b: 100 };
  await sharp({
    create: { width, height, channels: 3, background },
  })
    .toFormat(format)
    .toFile(filePath);
}

/** Write `size` filler bytes; the fake encoders never decode their input. */
export async function createSizedFile(filePath: string, size: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, Buffer.alloc(size, 0x2a));
}

const SCRIPTS = {
  // Writes the first half of the input to the -o path.
  halve: `#!/bin/sh
out=""
while [ "$#" -gt 1 ]; do
  case "$1" in
    -o) out="$2"; shift 2 ;;
    *) shift ;;
  esac
done
size=$(wc -c < "$1")
head -c $((size / 2)) "$1" > "$out"
`,
  fail: `#!/bin/sh
echo "bpgenc: unsupported image" >&2
exit 3
`,
  silent: `#!/bin/sh
exit 0
`,
  slow: `#!/bin/sh
exec sleep 5
`,
  // Floods stdout, then hangs around so the runner has to kill it.
  chatty: `#!/bin/sh
head -c 65536 /dev/zero
exec sleep 5
`,
};

export type FakeEncoder = keyof typeof SCRIPTS;

/** Drop an executable stand-in for bpgenc into `dir` and return its path. */
export async function writeFakeEncoder(dir: string, behavior: FakeEncoder, name = "bpgenc"): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const encoderPath = path.join(dir, name);
  await fs.writeFile(encoderPath, SCRIPTS[behavior], { mode: 0o755 });
  return encoderPath;
}

export async function exists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export const SETTINGS: Readonly<EncoderSettings> = encoderSettings(createConfig({}, {}));

export function makeTask(encoderPath: string, inputPath: string, outputPath: string): ConversionTask {
  return { encoderPath, inputPath, outputPath, settings: SETTINGS };
}
