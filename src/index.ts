#!/usr/bin/env node

import { createRequire } from "node:module";
import fs from "node:fs/promises";
import { DEFAULT_QUALITY, ImageOptimizer } from "./optimizer.js";
import { formatReport } from "./report.js";
import { errorMessage } from "./utils.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const DEFAULT_DEST = "images_optimized";
const USAGE_EXIT = 2;

const HELP = `
imgshrink v${VERSION} — Optimize images for the web without changing format

Usage:
  imgshrink --src <dir>                   Optimize into ./${DEFAULT_DEST}
  imgshrink --src <dir> --dest <dir>      Optimize into a mirrored output tree
  imgshrink --src <dir> --inplace         Overwrite the original files
  imgshrink --src <dir> --dry-run         Only report the potential savings

Options:
  --src <dir>         Source images folder, scanned recursively (required)
  --dest <dir>        Destination folder (default: ${DEFAULT_DEST})
  --inplace           Overwrite original files (cannot be combined with --dest)
  --quality <n>       JPEG/WEBP quality 1-100 (default: ${DEFAULT_QUALITY})
  --dry-run           Encode to a temporary file, measure it, then discard it
  -h, --help          Show this help message
  -v, --version       Show version number

Supported formats: jpg, jpeg, png, webp, gif
`.trim();

function usageError(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run imgshrink --help for usage");
  process.exit(USAGE_EXIT);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    inPlace: false,
    quality: DEFAULT_QUALITY,
    dryRun: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const raw = args[i];
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const value = (): string => {
      const next = inline ?? args[++i];
      if (next === undefined) {
        usageError(`${arg} requires an argument`);
      }
      return next;
    };

    switch (arg) {
      case "-h":
      case "--help":
        result.help = true;
        return result;
      case "-v":
      case "--version":
        result.version = true;
        return result;
      case "--src":
        result.src = value();
        break;
      case "--dest":
        result.dest = value();
        break;
      case "--inplace":
        result.inPlace = true;
        break;
      case "--dry-run":
        result.dryRun = true;
        break;
      case "--quality": {
        const next = value();
        if (!/^[+-]?\d+$/.test(next.trim())) {
          usageError(`invalid quality value: ${next}`);
        }
        // Out-of-range values are left for the encoder to reject.
        result.quality = parseInt(next, 10);
        break;
      }
      default:
        usageError(arg.startsWith("-") ? `unknown option: ${arg}` : `unexpected argument: ${arg}`);
    }
  }

  return result;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw e;
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

  if (parsed.src === undefined) {
    usageError("--src is required");
  }

  if (!(await isDirectory(parsed.src))) {
    console.error(`Error: source folder not found: ${parsed.src}`);
    process.exit(USAGE_EXIT);
  }

  if (parsed.inPlace && parsed.dest !== undefined) {
    console.error("Error: cannot use --inplace and --dest together");
    process.exit(USAGE_EXIT);
  }

  const destRoot = parsed.dest ?? (parsed.inPlace ? parsed.src : DEFAULT_DEST);

  const optimizer = new ImageOptimizer({
    quality: parsed.quality,
    inPlace: parsed.inPlace,
    dryRun: parsed.dryRun,
  });
  const summary = await optimizer.run(parsed.src, destRoot);

  formatReport(summary).forEach((line) => console.log(line));
}

main().catch((err) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
