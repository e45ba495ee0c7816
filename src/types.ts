export type FileStatus = "optimized" | "copied" | "skipped" | `error: ${string}`;

export interface FileResult {
  readonly source: string;
  readonly destination: string;
  readonly status: FileStatus;
  readonly originalSize: number;
  readonly newSize: number;
}

export interface RunSummary {
  totalOriginal: number;
  totalNew: number;
  results: FileResult[];
}

export interface OptimizerConfig {
  quality: number;
  inPlace: boolean;
  dryRun: boolean;
}

export interface OptimizeTask {
  source: string;
  destination: string;
}

export interface ParsedArgs {
  src?: string;
  dest?: string;
  inPlace: boolean;
  quality: number;
  dryRun: boolean;
  help: boolean;
  version: boolean;
}
