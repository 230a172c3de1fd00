import { UsageError } from "./errors.js";
import type { ChromaFormat, Codec, ColorSpace, ParsedArgs } from "./types.js";

const CODECS: readonly Codec[] = ["x265", "jctvc"];
const COLOR_SPACES: readonly ColorSpace[] = ["ycbcr", "rgb", "ycgco", "ycbcr_bt709", "ycbcr_bt2020"];
const CHROMA_FORMATS: readonly ChromaFormat[] = ["420", "422", "444", "400"];

function oneOf<T extends string>(flag: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new UsageError(`invalid ${flag} value: ${value} (choose from ${choices.join(", ")})`);
  }
  return match;
}

function integer(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`invalid ${flag} value: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    lossless: false,
    color: true,
    help: false,
    version: false,
  };

  const valueOf = (flag: string, index: number): string => {
    const next = args[index];
    if (next === undefined) {
      throw new UsageError(`${flag} requires an argument`);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    switch (arg) {
      case "-i":
      case "--input":
        result.input = valueOf(arg, ++i);
        break;
      case "-o":
      case "--output":
        result.output = valueOf(arg, ++i);
        break;
      case "--codec":
        result.codec = oneOf(arg, valueOf(arg, ++i), CODECS);
        break;
      case "-b":
      case "--bit-depth":
        result.bitDepth = integer(arg, valueOf(arg, ++i));
        break;
      case "-j":
      case "--workers":
        result.workers = integer(arg, valueOf(arg, ++i));
        break;
      case "-c":
      case "--color-space":
        result.colorSpace = oneOf(arg, valueOf(arg, ++i), COLOR_SPACES);
        break;
      case "-f":
      case "--chroma":
        result.chromaFormat = oneOf(arg, valueOf(arg, ++i), CHROMA_FORMATS);
        break;
      case "-m":
      case "--level":
        result.compressionLevel = integer(arg, valueOf(arg, ++i));
        break;
      case "-q":
      case "--quantizer":
        result.quantizer = integer(arg, valueOf(arg, ++i));
        break;
      case "--lossless":
        result.lossless = true;
        break;
      case "--encoder":
        result.encoder = valueOf(arg, ++i);
        break;
      case "--timeout": {
        const raw = valueOf(arg, ++i);
        const seconds = Number(raw);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new UsageError(`invalid ${arg} value: ${raw}`);
        }
        result.timeoutSeconds = seconds;
        break;
      }
      case "--no-color":
        result.color = false;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown option: ${arg}`);
        }
        if (result.input !== undefined) {
          throw new UsageError(`unexpected argument: ${arg}`);
        }
        // A bare argument is the input folder
        result.input = arg;
    }
  }

  return result;
}
