import { spawn } from "node:child_process";
import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { ProcessResult, Toolchain } from "./types.js";

export const ENCODER_BINARY = "cjxl";
export const SANITIZER_BINARIES = ["magick", "convert"];

/** Runs a command to completion, capturing stderr. Never rejects. */
export function runProcess(command: string, args: string[]): Promise<ProcessResult> {
  return new Promise((resolve) => {
    let stderr = "";
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const proc = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

    proc.stderr.setEncoding("utf8");
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    proc.on("error", (err) => finish({ code: null, stderr: err.message }));
    proc.on("close", (code) => finish({ code, stderr }));
  });
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return false;
    await fs.access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks a binary up on PATH the way a shell would. */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const extensions =
    process.platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").map((ext) => ext.toLowerCase())]
      : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

export async function locateToolchain(env: NodeJS.ProcessEnv = process.env): Promise<Toolchain> {
  const encoder = await findExecutable(ENCODER_BINARY, env);

  let sanitizer: string | null = null;
  for (const name of SANITIZER_BINARIES) {
    sanitizer = await findExecutable(name, env);
    if (sanitizer) break;
  }

  return { encoder, sanitizer };
}
