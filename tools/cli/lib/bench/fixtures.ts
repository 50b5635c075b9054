/**
 * Generated local files for benchmarks
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TestFiles {
  /** Directory holding the files */
  dir: string;
  /** Absolute file paths, in name order */
  files: string[];
  /** Size of each file in bytes */
  fileSize: number;
  /** Sum of all file sizes */
  totalBytes: number;
}

/**
 * Name of the i-th generated file (test_file_000.txt, test_file_001.txt, ...)
 */
export function testFileName(index: number): string {
  return `test_file_${String(index).padStart(3, "0")}.txt`;
}

/**
 * Write `count` files of `fileSize` bytes into a fresh temp directory
 */
export async function createTestFiles(
  count: number,
  fileSize: number,
  parentDir: string = tmpdir(),
): Promise<TestFiles> {
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`File count must be a positive integer, got ${count}`);
  }
  if (!Number.isInteger(fileSize) || fileSize < 0) {
    throw new Error(`File size must be a non-negative integer, got ${fileSize}`);
  }

  const dir = await mkdtemp(join(parentDir, "cloudbulk-bench-"));
  const content = Buffer.alloc(fileSize, "A");
  const files: string[] = [];

  for (let i = 0; i < count; i++) {
    const file = join(dir, testFileName(i));
    await writeFile(file, content);
    files.push(file);
  }

  return { dir, files, fileSize, totalBytes: fileSize * count };
}

export async function removeTestFiles(testFiles: TestFiles): Promise<void> {
  await rm(testFiles.dir, { recursive: true, force: true });
}
