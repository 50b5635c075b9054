import { describe, expect, it } from "vitest";
import {
  filesPerSecond,
  formatBytes,
  formatDuration,
  parseSize,
  throughputMBps,
} from "../utils.js";

describe("formatBytes", () => {
  it("uses binary units", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(500)).toBe("500 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
    expect(formatBytes(5 * 1024 ** 3, 2)).toBe("5.00 GB");
  });
});

describe("formatDuration", () => {
  it("picks a unit by magnitude", () => {
    expect(formatDuration(850)).toBe("850ms");
    expect(formatDuration(12_500)).toBe("12.50s");
    expect(formatDuration(95_000)).toBe("1m 35s");
  });
});

describe("throughput", () => {
  it("computes MB/s and files/s", () => {
    expect(throughputMBps(10 * 1024 * 1024, 2000)).toBe(5);
    expect(filesPerSecond(100, 4000)).toBe(25);
  });

  it("returns 0 for a zero duration", () => {
    expect(throughputMBps(1024, 0)).toBe(0);
    expect(filesPerSecond(3, 0)).toBe(0);
  });
});

describe("parseSize", () => {
  it("parses plain and suffixed sizes", () => {
    expect(parseSize("512")).toBe(512);
    expect(parseSize("64KB")).toBe(65536);
    expect(parseSize("1.5mb")).toBe(1572864);
    expect(parseSize("2 GB")).toBe(2147483648);
  });

  it("rejects garbage", () => {
    expect(() => parseSize("lots")).toThrow("Invalid size: lots");
  });
});
