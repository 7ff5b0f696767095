import path from "node:path";
import type { StatusAggregator } from "./aggregator.js";
import type { StatusChannel, TaskQueue } from "./channel.js";
import type { ConverterSettings } from "./config.js";
import type { FileInventory } from "./inventory.js";
import type { DebugLog } from "./logger.js";
import { DirectoryCreationError, resolveTargetPath } from "./pathing.js";
import type { Selection } from "./selection.js";
import { errorMessage, formatSeconds } from "./utils.js";
import type { ConversionWorker } from "./worker.js";
import type {
  BatchCompletion,
  ConversionTask,
  Dialogs,
  EncodeOptions,
  FileEntry,
  Notify,
  OutputPolicy,
  StatusUpdate,
  Toolchain,
} from "./types.js";

export const SHUTDOWN_TIMEOUT_MS = 5000;

export interface BuildFailure {
  index: number;
  message: string;
}

export interface BuildResult {
  tasks: ConversionTask[];
  failures: BuildFailure[];
}

/**
 * One task per index, in the order given. Target paths are reserved as they
 * are handed out so no two tasks of the build share one. An index whose
 * output directory cannot be created becomes a failure instead of a task.
 */
export async function buildTasks(
  entries: readonly FileEntry[],
  indices: readonly number[],
  policy: OutputPolicy,
  options: EncodeOptions,
  sanitize: boolean,
): Promise<BuildResult> {
  const reserved = new Set<string>();
  const tasks: ConversionTask[] = [];
  const failures: BuildFailure[] = [];

  for (const index of indices) {
    const entry = entries[index];
    if (!entry) continue;

    try {
      const targetPath = await resolveTargetPath(entry.path, policy, reserved);
      reserved.add(targetPath);
      tasks.push({ index, inputPath: entry.path, targetPath, sanitize, options: { ...options } });
    } catch (err) {
      if (!(err instanceof DirectoryCreationError)) throw err;
      failures.push({ index, message: err.message });
    }
  }

  return { tasks, failures };
}

export interface SessionDeps {
  inventory: FileInventory;
  selection: Selection;
  aggregator: StatusAggregator;
  queue: TaskQueue<ConversionTask>;
  channel: StatusChannel<StatusUpdate>;
  worker: ConversionWorker;
  tools: Toolchain;
  settings: ConverterSettings;
  dialogs: Dialogs;
  log: DebugLog;
  notify: Notify;
}

export class SessionController {
  private readonly deps: SessionDeps;
  private starting = false;

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  get converting(): boolean {
    return this.starting || this.deps.aggregator.active;
  }

  private policy(): OutputPolicy {
    const { inventory, settings } = this.deps;
    return { outputDir: settings.outputDir, recursive: inventory.recursive, scanRoot: inventory.root };
  }

  /** Resolves true when tasks were queued. */
  async startBatch(isSanitizeRetry = false): Promise<boolean> {
    const { inventory, selection, tools, settings, dialogs, notify } = this.deps;

    if (this.converting) {
      notify("A conversion is already in progress.", "warning");
      return false;
    }
    if (selection.size === 0) {
      notify("No files selected to convert.", "warning");
      return false;
    }
    if (!tools.encoder) {
      notify("cjxl command not found in PATH.", "error");
      return false;
    }

    let indices = selection.sorted().filter((index) => inventory.record(index) !== undefined);
    let alreadyDone = 0;
    if (!isSanitizeRetry) {
      const pending = indices.filter((index) => inventory.record(index)?.status !== "SUCCESS");
      alreadyDone = indices.length - pending.length;
      indices = pending;
    }
    if (indices.length === 0) {
      notify("Selected files are already converted.", "warning");
      return false;
    }

    this.starting = true;
    try {
      if (settings.deleteOriginals && !isSanitizeRetry) {
        const proceed = await dialogs.confirm("Delete originals is ON. Proceed? (y/n)");
        if (!proceed) {
          notify("Conversion cancelled.");
          return false;
        }
      }
      await this.enqueue(indices, isSanitizeRetry);
    } finally {
      this.starting = false;
    }

    if (alreadyDone > 0) {
      notify(`Skipped ${alreadyDone} already converted files.`);
    }
    return true;
  }

  private async enqueue(indices: number[], sanitize: boolean): Promise<void> {
    const { inventory, aggregator, queue, worker, settings, log } = this.deps;

    log.write("--- Preparing new conversion session ---");
    const options: EncodeOptions = {
      quality: settings.quality,
      effort: settings.effort,
      deleteOriginal: settings.deleteOriginals,
    };
    const { tasks, failures } = await buildTasks(inventory.entries, indices, this.policy(), options, sanitize);

    if (sanitize) {
      aggregator.reopen(indices);
    } else {
      aggregator.begin(indices.length);
    }

    for (const task of tasks) {
      aggregator.requeue(task.index);
      const record = inventory.record(task.index);
      if (record) {
        record.status = "QUEUED";
        record.targetPath = task.targetPath;
        record.message = "";
        record.infoStr = "";
      }
      queue.push(task);
      log.write(`  - Queued task: ${path.basename(task.inputPath)} -> ${path.basename(task.targetPath)}`);
    }

    for (const failure of failures) {
      aggregator.requeue(failure.index);
      aggregator.record({ index: failure.index, status: "FAILED", message: failure.message });
      log.write(`  - Not queued #${failure.index}: ${failure.message}`);
    }

    log.write(`--- Starting worker with ${tasks.length} tasks ---`);
    worker.start();
  }

  /** Runs once per finished batch; offers the sanitize-and-retry pass. */
  async onBatchFinished(completion: BatchCompletion): Promise<void> {
    const { aggregator, selection, tools, dialogs, notify } = this.deps;

    notify(`Finished ${completion.processed} files in ${formatSeconds(completion.elapsedMs)}.`, "success");

    const failed = aggregator.failedIndices;
    if (failed.length === 0) return;

    if (!tools.sanitizer) {
      notify("Some files failed. Install ImageMagick to enable sanitize/retry.", "warning");
      return;
    }

    const retry = await dialogs.confirm(`${failed.length} files failed. Sanitize & retry them now? (y/n)`);
    if (!retry) return;

    notify("Re-queueing failed files for sanitized conversion...");
    selection.replace(failed);
    await this.startBatch(true);
  }

  /** Drains worker updates; runs the completion workflow when a batch just finished. */
  async tick(): Promise<BatchCompletion | null> {
    const { aggregator, channel } = this.deps;
    const completion = aggregator.drain(channel);
    if (completion) {
      await this.onBatchFinished(completion);
    }
    return completion;
  }

  /** Rescans the source directory. Refused while a batch is running. */
  async reload(): Promise<boolean> {
    const { inventory, selection, aggregator, settings, notify } = this.deps;

    if (this.converting) {
      notify("Cannot reload while a conversion is in progress.", "warning");
      return false;
    }

    selection.reset();
    aggregator.reset();
    try {
      await inventory.load(settings.recursive);
      return true;
    } catch (err) {
      notify(`Error loading files: ${errorMessage(err)}`, "error");
      return false;
    }
  }

  shutdown(timeoutMs: number = SHUTDOWN_TIMEOUT_MS): Promise<boolean> {
    return this.deps.worker.stop(timeoutMs);
  }
}
