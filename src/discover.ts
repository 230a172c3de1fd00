import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import { OUTPUT_EXTENSION } from "./config.js";
import { errorMessage, InputNotFoundError, OutputCollisionError } from "./errors.js";
import type { ConversionTask } from "./types.js";

/** Fields every task of a run shares. */
export type TaskTemplate = Pick<ConversionTask, "encoderPath" | "settings" | "timeoutMs">;

export function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(filePath).toLowerCase());
}

export function mirroredOutputPath(inputRoot: string, outputRoot: string, inputPath: string): string {
  const rel = path.relative(inputRoot, inputPath);
  const { dir, name } = path.parse(rel);
  return path.join(outputRoot, dir, `${name}${OUTPUT_EXTENSION}`);
}

export async function assertInputRoot(inputRoot: string): Promise<void> {
  const stat = await fs.stat(inputRoot).catch((err: NodeJS.ErrnoException) => {
    if (err.code === "ENOENT") {
      throw new InputNotFoundError(inputRoot);
    }
    throw err;
  });
  if (!stat.isDirectory()) {
    throw new InputNotFoundError(inputRoot, "is not a directory");
  }
}

/** Output paths that differ only in case name the same file on these platforms. */
export function collisionKey(outputPath: string, platform: NodeJS.Platform = process.platform): string {
  return platform === "darwin" || platform === "win32" ? outputPath.toLowerCase() : outputPath;
}

/**
 * Paths, relative to `root`, of every file or symlink below it. A subdirectory that
 * cannot be listed is skipped with a warning; the root itself must be readable.
 */
async function listFiles(root: string, rel = ""): Promise<string[]> {
  const dir = path.join(root, rel);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (rel === "") throw err;
    console.warn(`Warning: skipping unreadable folder ${dir}: ${errorMessage(err)}`);
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    const entryRel = path.join(rel, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, entryRel)));
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      // Broken links stay in; the worker reports them as unreadable input
      files.push(entryRel);
    }
  }
  return files;
}

/**
 * Walk `inputRoot` and build one task per matching file, mirroring its
 * relative directory under `outputRoot`. Output directories are created here
 * so that every task can be dispatched as-is. Tasks come back sorted by
 * relative path.
 */
export async function discoverTasks(
  inputRoot: string,
  outputRoot: string,
  extensions: readonly string[],
  template: TaskTemplate,
  platform: NodeJS.Platform = process.platform,
): Promise<ConversionTask[]> {
  const root = path.resolve(inputRoot);
  const outRoot = path.resolve(outputRoot);
  await assertInputRoot(root);

  const entries = await listFiles(root);
  const candidates = entries.filter((entry) => hasExtension(entry, extensions)).sort();

  const tasks: ConversionTask[] = [];
  const claimed = new Map<string, string>();
  const outputDirs = new Set<string>();

  for (const entry of candidates) {
    const inputPath = path.join(root, entry);
    const outputPath = mirroredOutputPath(root, outRoot, inputPath);
    const key = collisionKey(outputPath, platform);
    const previous = claimed.get(key);
    if (previous !== undefined) {
      throw new OutputCollisionError(outputPath, previous, inputPath);
    }
    claimed.set(key, inputPath);
    outputDirs.add(path.dirname(outputPath));

    tasks.push(Object.freeze({ ...template, inputPath, outputPath }));
  }

  for (const dir of outputDirs) {
    await fs.mkdir(dir, { recursive: true });
  }

  return tasks;
}
