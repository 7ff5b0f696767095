import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { StatusChannel, TaskQueue } from "./channel.js";
import type { DebugLog } from "./logger.js";
import { runProcess } from "./tools.js";
import { errorMessage, fileSize, isJpegFile, lastLine, pathExists } from "./utils.js";
import type { ConversionTask, ProcessResult, ProcessRunner, StatusUpdate, Toolchain } from "./types.js";

export const PULL_TIMEOUT_MS = 1000;

export interface WorkerOptions {
  tools: Toolchain;
  log: DebugLog;
  run?: ProcessRunner;
  pullTimeoutMs?: number;
  tempDir?: string;
}

/**
 * Single consumer of the task queue. Runs one external process at a time and
 * reports every transition through the status channel; it never touches the
 * status records itself.
 */
export class ConversionWorker {
  private readonly queue: TaskQueue<ConversionTask>;
  private readonly channel: StatusChannel<StatusUpdate>;
  private readonly tools: Toolchain;
  private readonly log: DebugLog;
  private readonly run: ProcessRunner;
  private readonly pullTimeoutMs: number;
  private readonly tempDir: string;
  private loop: Promise<void> | undefined;
  private stopping = false;

  constructor(queue: TaskQueue<ConversionTask>, channel: StatusChannel<StatusUpdate>, options: WorkerOptions) {
    this.queue = queue;
    this.channel = channel;
    this.tools = options.tools;
    this.log = options.log;
    this.run = options.run ?? runProcess;
    this.pullTimeoutMs = options.pullTimeoutMs ?? PULL_TIMEOUT_MS;
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  get running(): boolean {
    return this.loop !== undefined;
  }

  /** Starts the consumer loop unless it is already running. */
  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.loop = this.consume().finally(() => {
      this.loop = undefined;
    });
  }

  /**
   * Stops after the in-flight task, discarding anything still queued.
   * Resolves true if the loop exited within `timeoutMs`.
   */
  async stop(timeoutMs: number): Promise<boolean> {
    this.stopping = true;
    const dropped = this.queue.clear();
    if (dropped > 0) this.log.write(`Discarded ${dropped} queued tasks on shutdown`);
    this.queue.release();

    const loop = this.loop;
    if (!loop) return true;
    return Promise.race([loop.then(() => true), delay(timeoutMs, false, { ref: false })]);
  }

  private async consume(): Promise<void> {
    while (!this.stopping) {
      const task = await this.queue.pull(this.pullTimeoutMs);
      if (!task) continue;
      await this.processTask(task);
    }
  }

  private emit(update: StatusUpdate): void {
    this.channel.push(update);
  }

  /** Emits exactly one SUCCESS or FAILED for the task and never rejects. */
  async processTask(task: ConversionTask): Promise<void> {
    const { index, inputPath, targetPath } = task;
    this.log.write(`Pulled task #${index}: ${path.basename(inputPath)} -> ${path.basename(targetPath)} (sanitize=${task.sanitize})`);

    let tempPath: string | undefined;
    let settled = false;
    const settle = (update: StatusUpdate) => {
      settled = true;
      this.emit(update);
    };

    try {
      let source = inputPath;

      if (task.sanitize) {
        this.emit({ index, status: "SANITIZING" });
        if (!this.tools.sanitizer) {
          settle({ index, status: "FAILED", message: "ImageMagick not found" });
          return;
        }

        tempPath = this.sanitizedTempPath(task);
        const result = await this.run(this.tools.sanitizer, [inputPath, "-strip", tempPath]);
        this.log.write(`Sanitize result: code=${result.code}, stderr=${result.stderr.trim()}`);

        if (result.code !== 0 || (await fileSize(tempPath)) === 0) {
          settle({ index, status: "FAILED", message: "Sanitize failed" });
          return;
        }
        source = tempPath;
      }

      this.emit({ index, status: "CONVERTING" });
      const result = await this.encode(task, source);

      if (result.code === 0 && (await pathExists(targetPath))) {
        await copyFileMetadata(inputPath, targetPath);
        const [before, after] = await Promise.all([fs.stat(inputPath), fs.stat(targetPath)]);
        settle({ index, status: "SUCCESS", sizeBefore: before.size, sizeAfter: after.size });

        if (task.options.deleteOriginal) {
          await fs.unlink(inputPath).catch((err: unknown) => {
            this.log.write(`Could not delete original ${inputPath}: ${errorMessage(err)}`);
          });
        }
        return;
      }

      await fs.rm(targetPath, { force: true });
      settle({ index, status: "FAILED", message: lastLine(result.stderr) ?? "cjxl error" });
    } catch (err) {
      this.log.write(`WORKER CRASH on #${index}: ${errorMessage(err)}`);
      if (!settled) {
        await this.discard(targetPath);
        const name = err instanceof Error ? err.name : typeof err;
        settle({ index, status: "FAILED", message: `Worker crash: ${name}` });
      }
    } finally {
      if (tempPath) await this.discard(tempPath);
    }
  }

  private async discard(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true }).catch((err: unknown) => {
      this.log.write(`Could not remove ${filePath}: ${errorMessage(err)}`);
    });
  }

  private async encode(task: ConversionTask, source: string): Promise<ProcessResult> {
    const encoder = this.tools.encoder;
    if (!encoder) {
      return { code: null, stderr: "cjxl command not found in PATH." };
    }

    const base = [source, task.targetPath, "--effort", String(task.options.effort)];
    const quality = String(task.options.quality);

    if (isJpegFile(task.inputPath) && !task.sanitize) {
      const lossless = [...base, "--lossless_jpeg", "1", "--quiet"];
      this.log.write(`Executing lossless: ${encoder} ${lossless.join(" ")}`);
      const result = await this.run(encoder, lossless);
      this.log.write(`Lossless result: code=${result.code}, stderr=${result.stderr.trim()}`);
      if (result.code === 0) return result;

      this.log.write("Lossless failed, falling back to quality.");
      const lossy = [...base, "-q", quality, "--quiet"];
      this.log.write(`Executing quality: ${encoder} ${lossy.join(" ")}`);
      const fallback = await this.run(encoder, lossy);
      this.log.write(`Quality result: code=${fallback.code}, stderr=${fallback.stderr.trim()}`);
      return fallback;
    }

    const lossy = [...base, "--lossless_jpeg", "0", "-q", quality, "--quiet"];
    this.log.write(`Executing quality (non-JPEG/sanitized): ${encoder} ${lossy.join(" ")}`);
    const result = await this.run(encoder, lossy);
    this.log.write(`Quality result: code=${result.code}, stderr=${result.stderr.trim()}`);
    return result;
  }

  private sanitizedTempPath(task: ConversionTask): string {
    const stem = path.parse(task.inputPath).name;
    const suffix = crypto.randomBytes(4).toString("hex");
    return path.join(this.tempDir, `jxlpress-sanitized-${task.index}-${suffix}-${stem}.png`);
  }
}

/** Carries timestamps and permission bits over to the output. */
async function copyFileMetadata(from: string, to: string): Promise<void> {
  const stat = await fs.stat(from);
  await fs.chmod(to, stat.mode & 0o7777);
  await fs.utimes(to, stat.atime, stat.mtime);
}
