import fs from "node:fs";
import path from "node:path";

export const DEBUG_LOG_FILE = "jxlpress-debug.txt";

export interface DebugLogOptions {
  enabled?: boolean;
  now?: () => Date;
  onFailure?: (err: unknown) => void;
}

/**
 * Append-only debug trace. Writes nothing while disabled; the first failed
 * write turns it off for good (until re-enabled) and reports through
 * `onFailure`.
 */
export class DebugLog {
  readonly filePath: string;
  enabled: boolean;
  onFailure?: (err: unknown) => void;
  private readonly now: () => Date;

  constructor(filePath: string = path.resolve(DEBUG_LOG_FILE), options: DebugLogOptions = {}) {
    this.filePath = filePath;
    this.enabled = options.enabled ?? false;
    this.onFailure = options.onFailure;
    this.now = options.now ?? (() => new Date());
  }

  write(message: string): void {
    if (!this.enabled) return;

    try {
      if (!fs.existsSync(this.filePath)) {
        const header = `jxlpress Debug Log\n\nSession started: ${this.now().toISOString()}\n\n`;
        fs.writeFileSync(this.filePath, header, "utf8");
      }
      fs.appendFileSync(this.filePath, `[${this.now().toISOString()}] ${message}\n`, "utf8");
    } catch (err) {
      this.enabled = false;
      this.onFailure?.(err);
    }
  }
}
