import path from "node:path";
import fs from "node:fs/promises";

const INPUT_FORMATS = ["jpg", "jpeg", "png", "gif", "apng", "tiff", "tif"];
const JPEG_FORMATS = ["jpg", "jpeg"];

function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase().slice(1);
}

export function isImageFile(filePath: string): boolean {
  return INPUT_FORMATS.includes(extensionOf(filePath));
}

export function isJpegFile(filePath: string): boolean {
  return JPEG_FORMATS.includes(extensionOf(filePath));
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0B";

  const units = ["", "K", "M", "G", "T"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(1)}${units[unit]}B`;
}

export function formatPercent(part: number, whole: number): string {
  const pct = whole > 0 ? (part / whole) * 100 : 0;
  return `${pct.toFixed(1)}%`;
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** mm:ss, wrapping at an hour. */
export function formatClock(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const mm = Math.floor((seconds % 3600) / 60);
  const ss = seconds % 60;
  return `${String(mm).padStart(2, "0")}:${String(ss).padStart(2, "0")}`;
}

export function lastLine(text: string): string | undefined {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function pathExists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : 0;
  } catch {
    return 0;
  }
}
