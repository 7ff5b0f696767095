import type { FileEntry, FileStatus, StatusRecord } from "./types.js";

export class Selection {
  private indices = new Set<number>();
  showOnlyFailed = false;

  has(index: number): boolean {
    return this.indices.has(index);
  }

  toggle(index: number): void {
    if (this.indices.has(index)) {
      this.indices.delete(index);
    } else {
      this.indices.add(index);
    }
  }

  selectAll(entries: readonly FileEntry[]): void {
    this.indices = new Set(entries.map((entry) => entry.index));
  }

  replace(indices: Iterable<number>): void {
    this.indices = new Set(indices);
  }

  clear(): void {
    this.indices.clear();
  }

  reset(): void {
    this.clear();
    this.showOnlyFailed = false;
  }

  /** Ascending index order, the order batches are built in. */
  sorted(): number[] {
    return [...this.indices].sort((a, b) => a - b);
  }

  get size(): number {
    return this.indices.size;
  }
}

export function visibleEntries(
  entries: readonly FileEntry[],
  selection: Selection,
  failedIndices: readonly number[],
): FileEntry[] {
  if (!selection.showOnlyFailed) return [...entries];
  return failedIndices
    .map((index) => entries[index])
    .filter((entry): entry is FileEntry => entry !== undefined);
}

export function displayStatus(record: StatusRecord | undefined, selected: boolean): FileStatus {
  if (!record) return "FAILED";
  if (record.status === "PENDING" && selected) return "SELECTED";
  return record.status;
}
