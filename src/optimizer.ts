import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import os from "node:os";
import type { Dirent } from "node:fs";
import { ENCODERS, classifyFormat } from "./encoders.js";
import { addResult, createSummary } from "./report.js";
import { errorMessage, isImageFile } from "./utils.js";
import type { FileResult, FileStatus, OptimizeTask, OptimizerConfig, RunSummary } from "./types.js";

export const DEFAULT_QUALITY = 85;

function errorStatus(err: unknown): FileStatus {
  return `error: ${errorMessage(err)}`;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function scratchName(ext: string): string {
  return `.imgshrink-${crypto.randomBytes(8).toString("hex")}${ext}`;
}

export class ImageOptimizer {
  config: OptimizerConfig;

  constructor(config: Partial<OptimizerConfig> = {}) {
    this.config = {
      quality: config.quality ?? DEFAULT_QUALITY,
      inPlace: config.inPlace ?? false,
      dryRun: config.dryRun ?? false,
    };

    // A file rewritten in place must be read again from disk, not from cache.
    sharp.cache(false);
  }

  async run(srcRoot: string, destRoot: string): Promise<RunSummary> {
    if (!this.config.inPlace && !this.config.dryRun) {
      await fs.mkdir(destRoot, { recursive: true });
    }

    const tasks = await this.collectTasks(srcRoot, destRoot);
    const summary = createSummary();

    for (let i = 0; i < tasks.length; i++) {
      addResult(summary, await this.processTask(tasks[i]));
      this.reportProgress(i + 1, tasks.length);
    }

    if (tasks.length > 0 && process.stderr.isTTY) {
      process.stderr.write("\n");
    }

    return summary;
  }

  /**
   * Lists every supported image under `srcRoot`, depth first with each
   * directory's entries in lexicographic order. The whole list is built
   * before anything is written, so a destination nested inside the source
   * never feeds this run's output back into it.
   */
  async collectTasks(srcRoot: string, destRoot: string): Promise<OptimizeTask[]> {
    const tasks: OptimizeTask[] = [];
    const entries = await fs.readdir(srcRoot, { withFileTypes: true });
    await this.collectDirectoryTasks(srcRoot, entries, srcRoot, destRoot, tasks);
    return tasks;
  }

  private async collectDirectoryTasks(
    dir: string,
    entries: Dirent[],
    srcRoot: string,
    destRoot: string,
    tasks: OptimizeTask[],
  ): Promise<void> {
    entries.sort(byName);

    for (const entry of entries) {
      const source = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        const children = await this.readSubdirectory(source);
        if (children) {
          await this.collectDirectoryTasks(source, children, srcRoot, destRoot, tasks);
        }
        continue;
      }

      if (!isImageFile(entry.name) || !(await this.isRegularFile(entry, source))) {
        continue;
      }

      const destination = this.config.inPlace ? source : path.join(destRoot, path.relative(srcRoot, source));
      tasks.push({ source, destination });
    }
  }

  private async readSubdirectory(dir: string): Promise<Dirent[] | undefined> {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      console.warn(`Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  // Dangling links, link loops and the like are not regular files.
  private async isRegularFile(entry: Dirent, fullPath: string): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;

    return fs
      .stat(fullPath)
      .then((stat) => stat.isFile())
      .catch(() => false);
  }

  async processTask(task: OptimizeTask): Promise<FileResult> {
    const { source, destination } = task;

    if (!this.config.inPlace && path.resolve(source) === path.resolve(destination)) {
      return { source, destination, status: "skipped", originalSize: 0, newSize: 0 };
    }

    if (!this.config.dryRun) {
      return this.optimizeFile(source, destination);
    }

    const scratch = path.join(os.tmpdir(), scratchName(path.extname(destination)));
    try {
      const result = await this.optimizeFile(source, scratch);
      return { ...result, destination };
    } finally {
      await fs.rm(scratch, { force: true });
    }
  }

  /**
   * Re-encodes `source` into `destination` keeping its format, or copies it
   * verbatim when the decoded format is not one this tool re-encodes.
   * Failures are returned as an `error:` status, never thrown.
   */
  async optimizeFile(source: string, destination: string): Promise<FileResult> {
    let originalSize = 0;
    let tempOutput: string | undefined;

    try {
      originalSize = (await fs.stat(source)).size;

      const pipeline = sharp(source, {
        animated: true,
        limitInputPixels: 268402689, // 16384 x 16384
      });
      const metadata = await pipeline.metadata();
      const format = classifyFormat(metadata.format);

      await fs.mkdir(path.dirname(destination), { recursive: true });
      await this.assertNotSymlink(destination);

      if (format === "other") {
        if (path.resolve(source) !== path.resolve(destination)) {
          await fs.copyFile(source, destination);
        }
        const copiedSize = (await fs.stat(destination)).size;
        return { source, destination, status: "copied", originalSize, newSize: copiedSize };
      }

      tempOutput = path.join(path.dirname(destination), scratchName(path.extname(destination)));
      await ENCODERS[format](pipeline, metadata, this.config.quality).toFile(tempOutput);
      await fs.rename(tempOutput, destination);
      tempOutput = undefined;

      const newSize = (await fs.stat(destination)).size;
      return { source, destination, status: "optimized", originalSize, newSize };
    } catch (err) {
      if (tempOutput) {
        const leftover = tempOutput;
        await fs.rm(leftover, { force: true }).catch((cleanupErr: unknown) => {
          console.warn(`Warning: could not remove ${leftover}: ${errorMessage(cleanupErr)}`);
        });
      }

      return { source, destination, status: errorStatus(err), originalSize, newSize: 0 };
    }
  }

  private async assertNotSymlink(destination: string): Promise<void> {
    try {
      const stat = await fs.lstat(destination);
      if (stat.isSymbolicLink()) {
        throw new Error("destination is a symbolic link, refusing to overwrite");
      }
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code !== "ENOENT") throw e;
    }
  }

  private reportProgress(done: number, total: number): void {
    if (!process.stderr.isTTY) return;
    const progress = ((done / total) * 100).toFixed(1);
    process.stderr.write(`\rProgress: ${progress}% (${done}/${total})`);
  }
}
