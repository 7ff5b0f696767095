import type { StatusChannel } from "./channel.js";
import type { FileInventory } from "./inventory.js";
import { formatBytes, formatPercent, formatSeconds } from "./utils.js";
import type { BatchCompletion, BatchSession, StatusRecord, StatusUpdate } from "./types.js";

export function describeUpdate(update: StatusUpdate): string {
  switch (update.status) {
    case "SUCCESS": {
      const { sizeBefore, sizeAfter } = update;
      if (!sizeBefore || !sizeAfter) return "";
      const savings = sizeBefore - sizeAfter;
      return `${formatBytes(savings)} saved (${formatPercent(savings, sizeBefore)})`;
    }
    case "FAILED":
      return update.message || "Unknown Error";
    default:
      return "";
  }
}

export function summarize(session: BatchSession, elapsedMs: number): string {
  const processed = session.successCount + session.failedCount;
  const time = formatSeconds(elapsedMs);
  if (session.bytesBefore > 0) {
    const savings = session.bytesBefore - session.bytesAfter;
    return `Finished: ${processed} files | Total Saved: ${formatBytes(savings)} (${formatPercent(savings, session.bytesBefore)}) | Time: ${time}`;
  }
  return `Finished: ${processed} files | Time: ${time}`;
}

/**
 * Folds worker updates into the status records and the running batch
 * counters. Only ever called from the UI loop.
 */
export class StatusAggregator {
  session: BatchSession | null = null;
  private readonly inventory: FileInventory;
  private readonly now: () => number;
  // index -> sequence number of the batch that recorded the failure
  private failures = new Map<number, number>();
  private batchSeq = 0;
  private completion: BatchCompletion | null = null;

  constructor(inventory: FileInventory, now: () => number = Date.now) {
    this.inventory = inventory;
    this.now = now;
  }

  get failedIndices(): number[] {
    return [...this.failures.keys()].sort((a, b) => a - b);
  }

  get active(): boolean {
    return this.session?.active ?? false;
  }

  get lastSummary(): string {
    return this.completion?.summary ?? "";
  }

  /** Opens a fresh session. Failures older than the previous batch are forgotten. */
  begin(totalSelected: number): BatchSession {
    this.batchSeq++;
    for (const [index, seq] of this.failures) {
      if (seq < this.batchSeq - 1) this.failures.delete(index);
    }

    this.completion = null;
    this.session = {
      totalSelected,
      successCount: 0,
      failedCount: 0,
      bytesBefore: 0,
      bytesAfter: 0,
      startTime: this.now(),
      active: true,
    };
    return this.session;
  }

  /**
   * Reopens the finished session for a retry: indices that failed in this
   * batch stop counting as failed, failures carried over from the previous
   * batch join the total, so the counters add up again once they resolve.
   * Must run before the indices are requeued.
   */
  reopen(retried: readonly number[]): BatchSession | null {
    const session = this.session;
    if (!session) return null;
    for (const index of retried) {
      if (this.failures.get(index) === this.batchSeq && session.failedCount > 0) {
        session.failedCount--;
      } else {
        session.totalSelected++;
      }
    }
    session.active = true;
    this.completion = null;
    return session;
  }

  /** Removes an index from the failed set when it is queued again. */
  requeue(index: number): void {
    this.failures.delete(index);
  }

  record(update: StatusUpdate): void {
    const record = this.inventory.record(update.index);
    if (!record) return;

    this.apply(record, update);

    const session = this.session;
    if (update.status === "SUCCESS") {
      if (session) {
        session.successCount++;
        if (update.sizeBefore && update.sizeAfter) {
          session.bytesBefore += update.sizeBefore;
          session.bytesAfter += update.sizeAfter;
        }
      }
    } else if (update.status === "FAILED") {
      if (session) session.failedCount++;
      this.failures.set(update.index, this.batchSeq);
    }
  }

  private apply(record: StatusRecord, update: StatusUpdate): void {
    record.status = update.status;
    if (update.status === "SUCCESS") {
      record.sizeBefore = update.sizeBefore;
      record.sizeAfter = update.sizeAfter;
      record.message = "";
    } else if (update.status === "FAILED") {
      record.message = update.message;
    }
    record.infoStr = describeUpdate(update);
  }

  /**
   * Applies everything pending on the channel. Returns the completion of the
   * active batch the first time its counters add up, null otherwise.
   */
  drain(channel: StatusChannel<StatusUpdate>): BatchCompletion | null {
    for (const update of channel.drain()) {
      this.record(update);
    }
    return this.checkCompletion();
  }

  private checkCompletion(): BatchCompletion | null {
    const session = this.session;
    if (!session?.active) return null;

    const processed = session.successCount + session.failedCount;
    if (processed < session.totalSelected) return null;

    session.active = false;
    const elapsedMs = this.now() - session.startTime;
    this.completion = {
      processed,
      elapsedMs,
      summary: summarize(session, elapsedMs),
      failed: this.failedIndices,
    };
    return this.completion;
  }

  clearSummary(): void {
    this.completion = null;
  }

  /** Forgets everything; used when the inventory is reloaded. */
  reset(): void {
    this.session = null;
    this.completion = null;
    this.failures.clear();
  }
}
