import path from "node:path";
import fs from "node:fs/promises";
import { errorMessage, pathExists } from "./utils.js";
import type { OutputPolicy } from "./types.js";

export const OUTPUT_EXTENSION = ".jxl";

export class DirectoryCreationError extends Error {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(`Cannot create output directory ${directory}: ${errorMessage(cause)}`, { cause });
    this.name = "DirectoryCreationError";
    this.directory = directory;
  }
}

export function resolveTargetDir(inputPath: string, policy: OutputPolicy): string {
  const sourceDir = path.dirname(inputPath);
  if (policy.outputDir === null) {
    return sourceDir;
  }

  if (policy.recursive) {
    const relDir = path.relative(policy.scanRoot, sourceDir);
    // Inputs outside the scan root are not mirrored.
    if (!relDir.startsWith("..") && !path.isAbsolute(relDir)) {
      return path.join(policy.outputDir, relDir);
    }
  }

  return policy.outputDir;
}

/**
 * Picks `<stem>.jxl` in the target directory, or the first `<stem>-N.jxl`
 * that is neither reserved by the current batch build nor present on disk.
 * Creates the target directory as a side effect.
 */
export async function resolveTargetPath(
  inputPath: string,
  policy: OutputPolicy,
  reserved: ReadonlySet<string>,
): Promise<string> {
  const targetDir = resolveTargetDir(inputPath, policy);

  try {
    await fs.mkdir(targetDir, { recursive: true });
  } catch (err) {
    throw new DirectoryCreationError(targetDir, err);
  }

  const stem = path.parse(inputPath).name;
  let candidate = path.join(targetDir, `${stem}${OUTPUT_EXTENSION}`);
  let counter = 1;

  while (reserved.has(candidate) || (await pathExists(candidate))) {
    candidate = path.join(targetDir, `${stem}-${counter}${OUTPUT_EXTENSION}`);
    counter++;
  }

  return candidate;
}
