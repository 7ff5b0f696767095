export const FILE_STATUSES = [
  "PENDING",
  "SELECTED",
  "QUEUED",
  "SANITIZING",
  "CONVERTING",
  "SUCCESS",
  "FAILED",
] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

// SELECTED is only ever derived for display; records never store it.
export type StoredStatus = Exclude<FileStatus, "SELECTED">;

export interface FileEntry {
  index: number;
  path: string;
  name: string;
  ext: string;
}

export interface StatusRecord {
  status: StoredStatus;
  targetPath?: string;
  message: string;
  infoStr: string;
  sizeBefore?: number;
  sizeAfter?: number;
}

export interface EncodeOptions {
  quality: number;
  effort: number;
  deleteOriginal: boolean;
}

export interface ConversionTask {
  readonly index: number;
  readonly inputPath: string;
  readonly targetPath: string;
  readonly sanitize: boolean;
  readonly options: Readonly<EncodeOptions>;
}

export type StatusUpdate =
  | { index: number; status: "SANITIZING" | "CONVERTING" }
  | { index: number; status: "SUCCESS"; sizeBefore: number; sizeAfter: number }
  | { index: number; status: "FAILED"; message: string };

export interface BatchSession {
  totalSelected: number;
  successCount: number;
  failedCount: number;
  bytesBefore: number;
  bytesAfter: number;
  startTime: number;
  active: boolean;
}

export interface BatchCompletion {
  processed: number;
  elapsedMs: number;
  summary: string;
  failed: number[];
}

export interface OutputPolicy {
  /** null writes each output next to its source file. */
  outputDir: string | null;
  recursive: boolean;
  scanRoot: string;
}

export interface Toolchain {
  encoder: string | null;
  sanitizer: string | null;
}

export interface ProcessResult {
  /** null when the process could not be spawned at all. */
  code: number | null;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessResult>;

export interface Dialogs {
  confirm(question: string): Promise<boolean>;
  /** Resolves null when the user cancels. */
  promptText(label: string, initialValue: string): Promise<string | null>;
}

export type NoticeLevel = "info" | "success" | "warning" | "error";

export type Notify = (message: string, level?: NoticeLevel) => void;

export interface ParsedArgs {
  directory: string;
  quality: number;
  effort: number;
  outputDir?: string;
  recursive: boolean;
  deleteOriginals: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
}
