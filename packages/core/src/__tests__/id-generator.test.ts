import { describe, expect, it } from "vitest";
import {
  generateBatchId,
  generateContainerName,
  isValidBatchId,
  isValidContainerName,
} from "../id-generator.js";

describe("generateBatchId", () => {
  it("produces valid, distinct ids", () => {
    const a = generateBatchId();
    const b = generateBatchId();

    expect(isValidBatchId(a)).toBe(true);
    expect(a).not.toBe(b);
  });
});

describe("generateContainerName", () => {
  it("appends a lowercase suffix to the prefix", () => {
    const name = generateContainerName("bench");

    expect(name).toMatch(/^bench-[a-z0-9]{10}$/);
    expect(isValidContainerName(name)).toBe(true);
  });

  it("cleans up prefixes that are not valid bucket names", () => {
    const name = generateContainerName("My_Bench--Run-");

    expect(name).toMatch(/^my-bench-run-[a-z0-9]{10}$/);
  });

  it("stays within 63 characters", () => {
    const name = generateContainerName("x".repeat(100));

    expect(name).toHaveLength(63);
    expect(isValidContainerName(name)).toBe(true);
  });
});

describe("isValidContainerName", () => {
  it("rejects uppercase, double hyphens and short names", () => {
    expect(isValidContainerName("Bucket")).toBe(false);
    expect(isValidContainerName("a--b")).toBe(false);
    expect(isValidContainerName("ab")).toBe(false);
    expect(isValidContainerName("test-bucket")).toBe(true);
  });
});
