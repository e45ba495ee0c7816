import { describe, it, expect } from "vitest";
import { addResult, createSummary, formatReport, formatResult, savings } from "../report.js";
import type { FileResult } from "../types.js";

function result(overrides: Partial<FileResult>): FileResult {
  return {
    source: "images/a.png",
    destination: "out/a.png",
    status: "optimized",
    originalSize: 0,
    newSize: 0,
    ...overrides,
  };
}

describe("formatResult", () => {
  it("prints kilobyte sizes for written files", () => {
    const line = formatResult(result({ originalSize: 10 * 1024 + 1000, newSize: 6 * 1024 + 5 }));
    expect(line).toBe("images/a.png -> out/a.png: 10KB -> 6KB");
  });

  it("prints errors with the source only", () => {
    const line = formatResult(result({ status: "error: Input file is missing", originalSize: 2048 }));
    expect(line).toBe("ERR: images/a.png -> error: Input file is missing");
  });

  it("falls back to the status when a size is unknown", () => {
    expect(formatResult(result({ status: "skipped" }))).toBe("images/a.png -> out/a.png: skipped");
    expect(formatResult(result({ status: "copied", originalSize: 100 }))).toBe("images/a.png -> out/a.png: copied");
  });
});

describe("summary", () => {
  it("reports the totals of a mirrored run", () => {
    const summary = createSummary();
    addResult(summary, result({ originalSize: 10 * 1024, newSize: 6 * 1024 }));
    addResult(
      summary,
      result({ source: "images/sub/b.jpg", destination: "out/sub/b.jpg", originalSize: 20 * 1024, newSize: 18 * 1024 }),
    );

    expect(formatReport(summary)).toEqual([
      "images/a.png -> out/a.png: 10KB -> 6KB",
      "images/sub/b.jpg -> out/sub/b.jpg: 20KB -> 18KB",
      "---",
      "Total: 30KB -> 24KB, saved 6KB (20.0%)",
    ]);
  });

  it("reports zero for an empty run", () => {
    expect(formatReport(createSummary())).toEqual(["---", "Total: 0KB -> 0KB, saved 0KB (0.0%)"]);
  });

  it("leaves errored and skipped files out of the totals", () => {
    const summary = createSummary();
    addResult(summary, result({ status: "error: boom", originalSize: 4096 }));
    addResult(summary, result({ status: "skipped" }));
    addResult(summary, result({ status: "copied", originalSize: 3072, newSize: 3072 }));

    expect(summary.results).toHaveLength(3);
    expect(summary.totalOriginal).toBe(3072);
    expect(summary.totalNew).toBe(3072);
    expect(savings(summary)).toEqual({ saved: 0, percent: 0 });
  });

  it("floors a net growth to a negative kilobyte figure", () => {
    const summary = createSummary();
    addResult(summary, result({ originalSize: 1000, newSize: 1010 }));

    expect(formatReport(summary)[2]).toBe("Total: 0KB -> 0KB, saved -1KB (-1.0%)");
  });
});
