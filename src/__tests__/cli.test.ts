import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import { cleanup, tmpDir } from "./helpers.js";

const exec = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

interface ExecFailure {
  code: number;
  stderr: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null && "code" in err && "stderr" in err;
}

async function runFailing(args: string[]): Promise<ExecFailure> {
  try {
    await exec(TSX, [CLI, ...args]);
  } catch (err: unknown) {
    if (isExecFailure(err)) return err;
    throw err;
  }
  return expect.fail("should have exited with an error");
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir("cli");
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(TSX, [CLI, "--help"]);
    expect(stdout).toContain("jxlpress");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--quality");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(TSX, [CLI, "--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("exits with error on a missing directory", async () => {
    const missing = path.join(workDir, "nope");
    const error = await runFailing([missing]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain(`Error: Directory not found at '${missing}'`);
  });

  it("exits with error on unknown flag", async () => {
    const error = await runFailing(["--badopt"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("unknown option: --badopt");
  });

  it("exits with error on a second directory", async () => {
    const error = await runFailing([workDir, workDir]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("unexpected argument");
  });

  it("needs an interactive terminal", async () => {
    const error = await runFailing([workDir]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("jxlpress needs an interactive terminal");
  });
});
