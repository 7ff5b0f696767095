#!/usr/bin/env node

import fs from "node:fs/promises";
import path from "node:path";
import { createRequire } from "node:module";
import { clamp, defaultSettings, EFFORT_RANGE, QUALITY_RANGE, resolveOutputDir } from "./config.js";
import { locateToolchain } from "./tools.js";
import { ConverterApp } from "./ui/app.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
jxlpress v${VERSION} — Batch-convert images to JPEG XL from an interactive terminal UI

Usage:
  jxlpress [directory]                Browse images in directory (default: .)
  jxlpress -r <dir>                   Include subdirectories
  jxlpress -o same <dir>              Write outputs next to their sources
  jxlpress -q 80 -e 9 <dir>           Start with custom quality and effort

Options:
  -q, --quality <n>       Lossy quality 1-100 (default: 90)
  -e, --effort <n>        Encoder effort 1-9 (default: 7)
  -o, --output <dir>      Output directory, or "same" (default: ./converted)
  -r, --recursive         Scan subdirectories recursively
  -d, --delete-originals  Delete source files after a successful conversion
      --debug             Write a debug log to jxlpress-debug.txt
  -h, --help              Show this help message
  -v, --version           Show version number

Requires cjxl (libjxl-tools) on PATH. ImageMagick (magick or convert) enables
sanitize & retry for files the encoder rejects.

Supported formats: jpg, jpeg, png, gif, apng, tiff, tif
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run jxlpress --help for usage");
  process.exit(1);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    directory: ".",
    quality: 90,
    effort: 7,
    recursive: false,
    deleteOriginals: false,
    debug: false,
    help: false,
    version: false,
  };
  let directorySet = false;

  const numeric = (flag: string, value: string | undefined): number => {
    if (value === undefined) fail(`${flag} requires a numeric argument`);
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) fail(`invalid ${flag} value: ${value}`);
    return parsed;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-r" || arg === "--recursive") {
      result.recursive = true;
      continue;
    }

    if (arg === "-d" || arg === "--delete-originals") {
      result.deleteOriginals = true;
      continue;
    }

    if (arg === "--debug") {
      result.debug = true;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      result.quality = clamp(numeric("--quality", args[++i]), QUALITY_RANGE);
      continue;
    }

    if (arg === "-e" || arg === "--effort") {
      result.effort = clamp(numeric("--effort", args[++i]), EFFORT_RANGE);
      continue;
    }

    if (arg === "-o" || arg === "--output") {
      const next = args[++i];
      if (next === undefined) fail("--output requires a directory argument");
      result.outputDir = next;
      continue;
    }

    if (arg.startsWith("-")) {
      fail(`unknown option: ${arg}`);
    }

    if (directorySet) {
      fail(`unexpected argument: ${arg}`);
    }
    result.directory = arg;
    directorySet = true;
  }

  return result;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (!(await isDirectory(parsed.directory))) {
    console.error(`Error: Directory not found at '${parsed.directory}'`);
    process.exit(1);
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    console.error("Error: jxlpress needs an interactive terminal");
    process.exit(1);
  }

  const tools = await locateToolchain();
  if (!tools.encoder) {
    console.warn("Warning: 'cjxl' command not found in your PATH.");
    console.warn("Install libjxl-tools (Debian/Ubuntu: sudo apt install libjxl-tools). Conversions are disabled.");
  }

  const settings = defaultSettings();
  settings.quality = parsed.quality;
  settings.effort = parsed.effort;
  settings.recursive = parsed.recursive;
  settings.deleteOriginals = parsed.deleteOriginals;
  settings.debug = parsed.debug;
  if (parsed.outputDir !== undefined) {
    settings.outputDir = parsed.outputDir === "same" ? null : resolveOutputDir(parsed.outputDir);
  }

  const app = new ConverterApp({ root: path.resolve(parsed.directory), settings, tools });
  await app.run();
  process.exit(0);
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
