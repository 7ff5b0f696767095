import os from "node:os";
import path from "node:path";

export interface ConverterSettings {
  quality: number;
  effort: number;
  recursive: boolean;
  deleteOriginals: boolean;
  /** null writes outputs next to their sources. */
  outputDir: string | null;
  debug: boolean;
}

export const QUALITY_RANGE = { min: 1, max: 100 } as const;
export const EFFORT_RANGE = { min: 1, max: 9 } as const;

export function defaultSettings(cwd: string = process.cwd()): ConverterSettings {
  return {
    quality: 90,
    effort: 7,
    recursive: false,
    deleteOriginals: false,
    outputDir: path.join(cwd, "converted"),
    debug: false,
  };
}

export function clamp(value: number, range: { min: number; max: number }): number {
  return Math.max(range.min, Math.min(value, range.max));
}

function parseBounded(text: string, range: { min: number; max: number }): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = parseInt(trimmed, 10);
  return value >= range.min && value <= range.max ? value : null;
}

export function parseQuality(text: string): number | null {
  return parseBounded(text, QUALITY_RANGE);
}

export function parseEffort(text: string): number | null {
  return parseBounded(text, EFFORT_RANGE);
}

/** Blank input means "same as source". A leading `~` is the home directory. */
export function resolveOutputDir(text: string, cwd: string = process.cwd()): string | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const expanded =
    trimmed === "~" || trimmed.startsWith("~/") || trimmed.startsWith("~\\")
      ? path.join(os.homedir(), trimmed.slice(1))
      : trimmed;
  return path.resolve(cwd, expanded);
}
