/**
 * Local filesystem enumeration for directory uploads
 */

import { mkdir, readdir, stat } from "node:fs/promises";
import { dirname, join } from "node:path";
import { TransferError } from "./errors.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Recursively list regular files under a directory
 *
 * @param dir - Directory to walk
 * @returns Paths relative to dir, '/' separated, sorted
 * @throws TransferError if dir does not exist or is not a directory
 */
export async function listLocalFiles(dir: string): Promise<string[]> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new TransferError(`Not a directory: ${dir}`);
    }
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new TransferError(`Local directory not found: ${dir}`, error);
    }
    throw error;
  }

  const files: string[] = [];
  await collectFiles(dir, "", files);
  return files.sort();
}

/**
 * Recursively collect file paths relative to the walk root
 */
async function collectFiles(
  basePath: string,
  relativePath: string,
  files: string[],
): Promise<void> {
  const entries = await readdir(basePath, { withFileTypes: true });

  for (const entry of entries) {
    const entryRelativePath = relativePath
      ? `${relativePath}/${entry.name}`
      : entry.name;
    const entryFullPath = join(basePath, entry.name);

    if (entry.isDirectory()) {
      await collectFiles(entryFullPath, entryRelativePath, files);
    } else if (entry.isFile()) {
      files.push(entryRelativePath);
    }
  }
}

/**
 * Create the parent directory of a file path if needed
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
}
