import path from "node:path";
import fs from "node:fs/promises";
import { isImageFile } from "./utils.js";
import type { FileEntry, StatusRecord } from "./types.js";

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareEntries(a: string, b: string): number {
  const byName = compareStrings(path.basename(a).toLowerCase(), path.basename(b).toLowerCase());
  return byName !== 0 ? byName : compareStrings(a, b);
}

/**
 * Lists supported images under `rootDir`, ordered by file name
 * (case-insensitive). Row indices in the UI depend on this order.
 */
export async function scanDirectory(rootDir: string, recursive: boolean): Promise<FileEntry[]> {
  const root = path.resolve(rootDir);
  const entries = recursive
    ? await fs.readdir(root, { recursive: true })
    : await fs.readdir(root);

  const candidates = entries
    .filter((entry) => isImageFile(entry))
    .map((entry) => path.join(root, entry));

  const files: string[] = [];
  for (const candidate of candidates) {
    const stat = await fs.stat(candidate).catch(() => undefined);
    if (stat?.isFile()) files.push(candidate);
  }

  return files.sort(compareEntries).map((filePath, index) => ({
    index,
    path: filePath,
    name: path.basename(filePath),
    ext: path.extname(filePath).toLowerCase(),
  }));
}

export function pendingRecord(): StatusRecord {
  return { status: "PENDING", message: "", infoStr: "" };
}

export class FileInventory {
  entries: FileEntry[] = [];
  records = new Map<number, StatusRecord>();
  root: string;
  recursive = false;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Replaces the working set. On a scan failure the inventory is left empty
   * and the error is rethrown for the caller to report.
   */
  async load(recursive: boolean): Promise<FileEntry[]> {
    this.recursive = recursive;
    this.entries = [];
    this.records = new Map();

    const entries = await scanDirectory(this.root, recursive);
    this.entries = entries;
    for (const entry of entries) {
      this.records.set(entry.index, pendingRecord());
    }
    return entries;
  }

  entry(index: number): FileEntry | undefined {
    return this.entries[index];
  }

  record(index: number): StatusRecord | undefined {
    return this.records.get(index);
  }

  get size(): number {
    return this.entries.length;
  }
}
