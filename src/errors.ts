/**
 * Setup-tier failures. Each one stops the run before any task is dispatched;
 * the CLI prints the message and exits with `exitCode`.
 */
export class BatchError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 2) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends BatchError {
  constructor(message: string) {
    super(message, 1);
  }
}

export class ConfigError extends BatchError {
  constructor(message: string) {
    super(message, 1);
  }
}

export class InvalidWorkerCountError extends ConfigError {
  readonly workerCount: number;

  constructor(workerCount: number) {
    super(`Invalid worker count: ${workerCount} (must be a positive integer)`);
    this.workerCount = workerCount;
  }
}

export class InputNotFoundError extends BatchError {
  readonly inputRoot: string;

  constructor(inputRoot: string, reason = "not found") {
    super(`Input folder ${reason}: ${inputRoot}`);
    this.inputRoot = inputRoot;
  }
}

export class EncoderNotFoundError extends BatchError {
  readonly encoderName: string;
  readonly searched: string[];

  constructor(encoderName: string, searched: string[]) {
    const where = searched.length > 0 ? `\nSearched:\n${searched.map((s) => `  - ${s}`).join("\n")}` : "";
    super(`'${encoderName}' not found. Put it on PATH, next to this script, or pass --encoder.${where}`);
    this.encoderName = encoderName;
    this.searched = searched;
  }
}

export class OutputCollisionError extends BatchError {
  readonly outputPath: string;
  readonly inputs: [string, string];

  constructor(outputPath: string, first: string, second: string) {
    super(`Output collision: ${first} and ${second} would both be written to ${outputPath}`);
    this.outputPath = outputPath;
    this.inputs = [first, second];
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
