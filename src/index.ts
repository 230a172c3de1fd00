#!/usr/bin/env node

import path from "node:path";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import { parseArgs } from "./args.js";
import { createConfig, ENCODER_ENV_VAR } from "./config.js";
import { BatchError, errorMessage, UsageError } from "./errors.js";
import { formatProgress, formatSummary, palette } from "./format.js";
import { runBatch } from "./orchestrator.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
bpgbatch v${VERSION} — Convert PNG/JPEG trees to BPG with bpgenc

Usage:
  bpgbatch [options] [inputDir]

Options:
  -i, --input <dir>        Input folder, scanned recursively (default: .)
  -o, --output <dir>       Output folder, mirrors the input tree (default: <input>/bpg)
      --codec <name>       x265 (default, faster) or jctvc (slower, higher quality)
  -b, --bit-depth <n>      Bit depth 8-12 (default: 10)
  -j, --workers <n>        Parallel encoders (default: number of CPUs)
  -c, --color-space <cs>   ycbcr, rgb, ycgco, ycbcr_bt709, ycbcr_bt2020 (default: ycbcr)
  -f, --chroma <fmt>       420, 422, 444, 400 (default: 444)
  -m, --level <n>          Compression level 1-9 (default: 9)
  -q, --quantizer <n>      Quantizer 0-51 (default: encoder's own)
      --lossless           Lossless encoding
      --encoder <path>     Path to bpgenc (or set ${ENCODER_ENV_VAR})
      --timeout <seconds>  Kill an encoder that runs longer than this
      --no-color           Plain output
  -h, --help               Show this help message
  -v, --version            Show version number

The encoder is looked up as: --encoder / ${ENCODER_ENV_VAR}, then PATH, then next to this script.
`.trim();

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  const c = palette(parsed.color);
  const config = createConfig({
    inputRoot: parsed.input,
    outputRoot: parsed.output,
    codec: parsed.codec,
    bitDepth: parsed.bitDepth,
    workerCount: parsed.workers,
    colorSpace: parsed.colorSpace,
    chromaFormat: parsed.chromaFormat,
    compressionLevel: parsed.compressionLevel,
    quantizer: parsed.quantizer,
    lossless: parsed.lossless,
    encoderOverride: parsed.encoder,
    timeoutMs: parsed.timeoutSeconds !== undefined ? Math.round(parsed.timeoutSeconds * 1000) : undefined,
  });

  const kinds = config.extensions.map((e) => e.slice(1).toUpperCase()).join("/");
  console.log(c.cyan.bold(`BPG Batch Encoder • ${config.codec.toUpperCase()} • ${config.bitDepth}-bit • ${kinds}`));
  console.log();

  const controller = new AbortController();
  const onSigint = (): void => {
    console.warn(c.yellow("\nCancelling: stopping running encoders..."));
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const outcome = await runBatch(config, {
      scriptDir: path.dirname(fileURLToPath(import.meta.url)),
      signal: controller.signal,
      onEncoder: (encoder) => {
        console.log(c.cyanBright(`Using encoder (${encoder.source}): ${encoder.path}`));
        console.log(c.cyanBright(`Scanning ${kinds} recursively in ${config.inputRoot}...`));
      },
      onTasks: (tasks) => {
        console.log(c.cyanBright(`Queued ${tasks.length} files → Starting with ${config.workerCount} workers...`));
        console.log();
      },
      onResult: (result, completed, total) => {
        console.log(formatProgress(result, completed, total, c));
      },
    });

    if (outcome.status === "no-files") {
      console.log(c.yellow(`No ${kinds} files found.`));
      return;
    }

    console.log();
    for (const line of formatSummary(outcome.summary, config.outputRoot, c)) {
      console.log(line);
    }

    if (controller.signal.aborted) {
      process.exitCode = 130;
    }
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

main().catch((err) => {
  console.error("Error:", errorMessage(err));
  if (err instanceof UsageError) {
    console.error("Run bpgbatch --help for usage");
  }
  process.exit(err instanceof BatchError ? err.exitCode : 1);
});
