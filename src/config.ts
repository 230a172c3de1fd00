import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError, InvalidWorkerCountError } from "./errors.js";
import type { EncoderSettings } from "./types.js";

export const ENCODER_ENV_VAR = "BPGENC_PATH";
export const OUTPUT_EXTENSION = ".bpg";
export const DEFAULT_EXTENSIONS = [".png", ".jpg", ".jpeg"];
/** Output folder created inside the input root when none is given. */
export const DEFAULT_OUTPUT_DIR = "bpg";

const BatchConfigSchema = z
  .object({
    inputRoot: z.string().min(1).default(".").transform((p) => path.resolve(p)),
    outputRoot: z
      .string()
      .min(1)
      .transform((p) => path.resolve(p))
      .optional(),
    bitDepth: z.number().int().min(8).max(12).default(10),
    codec: z.enum(["x265", "jctvc"]).default("x265"),
    colorSpace: z.enum(["ycbcr", "rgb", "ycgco", "ycbcr_bt709", "ycbcr_bt2020"]).default("ycbcr"),
    chromaFormat: z.enum(["420", "422", "444", "400"]).default("444"),
    compressionLevel: z.number().int().min(1).max(9).default(9),
    quantizer: z.number().int().min(0).max(51).optional(),
    lossless: z.boolean().default(false),
    workerCount: z.number().int().positive().default(() => os.availableParallelism()),
    encoderOverride: z.string().min(1).optional(),
    extensions: z
      .array(z.string().regex(/^\.[A-Za-z0-9]+$/, "extensions look like .png"))
      .min(1)
      .default(DEFAULT_EXTENSIONS)
      .transform((exts) => exts.map((e) => e.toLowerCase()))
      .refine((exts) => !exts.includes(OUTPUT_EXTENSION), `${OUTPUT_EXTENSION} cannot be an input extension`),
    timeoutMs: z.number().int().positive().optional(),
  })
  .transform((config) => ({
    ...config,
    outputRoot: config.outputRoot ?? path.join(config.inputRoot, DEFAULT_OUTPUT_DIR),
  }));

export type BatchConfigInput = z.input<typeof BatchConfigSchema>;
type ParsedConfig = z.output<typeof BatchConfigSchema>;
export type BatchConfig = Readonly<Omit<ParsedConfig, "extensions">> & {
  readonly extensions: readonly string[];
};

/**
 * Build the run configuration once at startup. Explicit values win over the
 * environment, which wins over the defaults. The result is frozen and passed
 * down; nothing downstream reads process state.
 */
export function createConfig(
  overrides: BatchConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): BatchConfig {
  const { workerCount } = overrides;
  if (workerCount !== undefined && (!Number.isInteger(workerCount) || workerCount <= 0)) {
    throw new InvalidWorkerCountError(workerCount);
  }

  const envEncoder = env[ENCODER_ENV_VAR];
  const parsed = BatchConfigSchema.safeParse({
    ...overrides,
    encoderOverride: overrides.encoderOverride ?? (envEncoder ? envEncoder : undefined),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return Object.freeze({ ...parsed.data, extensions: Object.freeze([...parsed.data.extensions]) });
}

export function encoderSettings(config: BatchConfig): Readonly<EncoderSettings> {
  return Object.freeze({
    bitDepth: config.bitDepth,
    codec: config.codec,
    colorSpace: config.colorSpace,
    chromaFormat: config.chromaFormat,
    compressionLevel: config.compressionLevel,
    quantizer: config.quantizer,
    lossless: config.lossless,
  });
}
