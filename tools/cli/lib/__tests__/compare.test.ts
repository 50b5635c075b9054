import { describe, expect, it } from "vitest";
import { bestConcurrency, compareToBaseline } from "../bench/compare.js";
import type { BenchmarkResult } from "../bench/runner.js";

function run(
  label: string,
  concurrency: number,
  uploadMs: number | null,
): BenchmarkResult {
  return {
    label,
    provider: label,
    container: "test-bucket",
    files: 20,
    bytes: 20_971_520,
    iterations: 1,
    concurrency,
    upload:
      uploadMs === null
        ? null
        : {
            meanMs: uploadMs,
            minMs: uploadMs,
            maxMs: uploadMs,
            stdDevMs: 0,
            mbps: 0,
            filesPerSecond: 0,
          },
    download: null,
    speedup: null,
    improvementPct: null,
    errors: [],
  };
}

describe("compareToBaseline", () => {
  it("measures every level against the same target's sequential run", () => {
    const compared = compareToBaseline([
      run("s3", 1, 8000),
      run("s3", 5, 2000),
      run("s3", 50, 1000),
      run("gcs", 1, 4000),
      run("gcs", 10, 5000),
    ]);

    expect(
      compared.map((r) => [r.label, r.concurrency, r.speedup, r.improvementPct]),
    ).toEqual([
      ["s3", 1, 1, 0],
      ["s3", 5, 4, 75],
      ["s3", 50, 8, 87.5],
      ["gcs", 1, 1, 0],
      ["gcs", 10, 0.8, -25],
    ]);
  });

  it("leaves speedups empty without a baseline or an upload", () => {
    const compared = compareToBaseline([
      run("azure", 10, 3000),
      run("s3", 1, null),
      run("s3", 20, 1000),
      run("gcs", 1, 1000),
      run("gcs", 5, null),
    ]);

    expect(compared.map((r) => r.speedup)).toEqual([null, null, null, 1, null]);
    expect(compared.map((r) => r.improvementPct)).toEqual([
      null,
      null,
      null,
      0,
      null,
    ]);
  });

  it("does not modify its input", () => {
    const input = [run("s3", 1, 1000), run("s3", 2, 500)];

    compareToBaseline(input);

    expect(input[1]?.speedup).toBeNull();
  });
});

describe("bestConcurrency", () => {
  it("picks the fastest upload per target", () => {
    const best = bestConcurrency([
      run("s3", 1, 8000),
      run("s3", 20, 900),
      run("s3", 50, 1000),
      run("gcs", 1, null),
      run("gcs", 5, 3000),
      run("azure", 1, null),
    ]);

    expect(best.map((r) => [r.label, r.concurrency])).toEqual([
      ["s3", 20],
      ["gcs", 5],
    ]);
  });
});
