import path from "node:path";
import fs from "node:fs/promises";
import which from "which";
import { EncoderNotFoundError } from "./errors.js";

export type EncoderSource = "override" | "path" | "script-dir";

export interface LocatedEncoder {
  path: string;
  source: EncoderSource;
}

export interface LocateOptions {
  /** Explicit encoder path (CLI flag or BPGENC_PATH). */
  override?: string;
  /** Directory of the running script; the encoder may sit next to it. */
  scriptDir?: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

export function encoderFileName(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "bpgenc.exe" : "bpgenc";
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve the encoder: manual override, then PATH, then the script's own
 * directory. First hit wins.
 */
export async function locateEncoder(options: LocateOptions = {}): Promise<LocatedEncoder> {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const name = encoderFileName(platform);
  const searched: string[] = [];

  if (options.override) {
    const overridePath = path.resolve(options.override);
    if (await isFile(overridePath)) {
      return { path: overridePath, source: "override" };
    }
    searched.push(`${overridePath} (override, missing)`);
  }

  // which() reads process.env.PATH when given an empty path
  const searchPath = env.PATH ?? env.Path ?? "";
  if (searchPath) {
    const onPath = await which(name, { path: searchPath, pathExt: env.PATHEXT, nothrow: true });
    if (onPath) {
      return { path: onPath, source: "path" };
    }
  }
  searched.push("PATH");

  if (options.scriptDir) {
    const candidate = path.join(options.scriptDir, name);
    if (await isFile(candidate)) {
      return { path: candidate, source: "script-dir" };
    }
    searched.push(options.scriptDir);
  }

  throw new EncoderNotFoundError(name, searched);
}
