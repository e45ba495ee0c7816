import { percentSaved, toKilobytes } from "./utils.js";
import type { FileResult, RunSummary } from "./types.js";

export function createSummary(): RunSummary {
  return { totalOriginal: 0, totalNew: 0, results: [] };
}

export function isError(result: FileResult): boolean {
  return result.status.startsWith("error");
}

/**
 * Appends a result in traversal order. Only files that produced output
 * count towards the totals.
 */
export function addResult(summary: RunSummary, result: FileResult): void {
  summary.results.push(result);
  if (result.status === "optimized" || result.status === "copied") {
    summary.totalOriginal += result.originalSize;
    summary.totalNew += result.newSize;
  }
}

export function formatResult(result: FileResult): string {
  if (isError(result)) {
    return `ERR: ${result.source} -> ${result.status}`;
  }
  if (result.originalSize && result.newSize) {
    return `${result.source} -> ${result.destination}: ${toKilobytes(result.originalSize)}KB -> ${toKilobytes(result.newSize)}KB`;
  }
  return `${result.source} -> ${result.destination}: ${result.status}`;
}

export function savings(summary: RunSummary): { saved: number; percent: number } {
  const saved = summary.totalOriginal - summary.totalNew;
  return { saved, percent: percentSaved(summary.totalOriginal, saved) };
}

export function formatTotals(summary: RunSummary): string {
  const { saved, percent } = savings(summary);
  return `Total: ${toKilobytes(summary.totalOriginal)}KB -> ${toKilobytes(summary.totalNew)}KB, saved ${toKilobytes(saved)}KB (${percent.toFixed(1)}%)`;
}

export function formatReport(summary: RunSummary): string[] {
  return [...summary.results.map(formatResult), "---", formatTotals(summary)];
}
