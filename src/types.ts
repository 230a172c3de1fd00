export type Codec = "x265" | "jctvc";

export type ColorSpace = "ycbcr" | "rgb" | "ycgco" | "ycbcr_bt709" | "ycbcr_bt2020";

export type ChromaFormat = "420" | "422" | "444" | "400";

export interface EncoderSettings {
  bitDepth: number;
  codec: Codec;
  colorSpace: ColorSpace;
  chromaFormat: ChromaFormat;
  compressionLevel: number;
  quantizer?: number;
  lossless: boolean;
}

export interface ConversionTask {
  readonly encoderPath: string;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly settings: Readonly<EncoderSettings>;
  /** Kill the encoder after this many milliseconds. */
  readonly timeoutMs?: number;
}

export type ConversionErrorKind =
  | "input-unreadable"
  | "input-empty"
  | "encoder-spawn"
  | "encoder-exit"
  | "timeout"
  | "cancelled"
  | "output-missing"
  | "output-empty"
  | "implausible-ratio"
  | "worker-crash";

export interface ConversionError {
  kind: ConversionErrorKind;
  message: string;
  exitCode?: number | null;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

interface ConversionResultBase {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly inputSizeBytes: number;
  readonly elapsedSeconds: number;
}

export interface ConversionSuccess extends ConversionResultBase {
  readonly ok: true;
  readonly outputSizeBytes: number;
  readonly ratio: number;
  readonly bytesSaved: number;
}

export interface ConversionFailure extends ConversionResultBase {
  readonly ok: false;
  readonly outputSizeBytes: 0;
  /** Always FAILED_RATIO, kept so a failure never reads as a plausible ratio. */
  readonly ratio: number;
  readonly bytesSaved: number;
  readonly error: ConversionError;
}

export type ConversionResult = ConversionSuccess | ConversionFailure;

export interface FailedFile {
  file: string;
  error: ConversionError;
}

export interface ConvertedRunSummary {
  kind: "converted";
  total: number;
  succeeded: number;
  failed: number;
  failures: FailedFile[];
  totalInputBytes: number;
  totalOutputBytes: number;
  totalBytesSaved: number;
  /** totalBytesSaved / totalInputBytes */
  savedFraction: number;
  averageRatio: number;
  best: ConversionSuccess;
  worst: ConversionSuccess;
  mostSaved: ConversionSuccess;
  elapsedSeconds: number;
  filesPerSecond: number;
}

export interface EmptyRunSummary {
  kind: "no-successes";
  total: number;
  failed: number;
  failures: FailedFile[];
  elapsedSeconds: number;
}

export type RunSummary = ConvertedRunSummary | EmptyRunSummary;

export interface ParsedArgs {
  input?: string;
  output?: string;
  codec?: Codec;
  bitDepth?: number;
  workers?: number;
  colorSpace?: ColorSpace;
  chromaFormat?: ChromaFormat;
  compressionLevel?: number;
  quantizer?: number;
  lossless: boolean;
  encoder?: string;
  timeoutSeconds?: number;
  color: boolean;
  help: boolean;
  version: boolean;
}
