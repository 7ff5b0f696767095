import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ProcessResult, ProcessRunner } from "../types.js";

export function tmpDir(label = "test"): string {
  return path.join(os.tmpdir(), `jxlpress-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

/** Writes `size` bytes of filler, creating parent directories. */
export async function writeBytes(filePath: string, size: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, Buffer.alloc(size, 1));
}

export async function exists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/** In-process stand-in for the encoder and sanitizer binaries. */
export function fakeRunner(handler: (call: RecordedCall) => ProcessResult | Promise<ProcessResult>): {
  run: ProcessRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const run: ProcessRunner = async (command, args) => {
    const call = { command, args: [...args] };
    calls.push(call);
    return handler(call);
  };
  return { run, calls };
}

export const ok: ProcessResult = { code: 0, stderr: "" };

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
