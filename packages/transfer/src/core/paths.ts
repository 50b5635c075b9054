/**
 * Path utilities for mapping local files to storage keys and back
 *
 * Storage keys always use '/' separators and never start with '/':
 * - 'my_storage_dir/first_subdir/f1'
 * - 'reports/2024/q1.csv'
 */

import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { InvalidTransferPathError } from "./errors.js";

/**
 * Normalize a storage path into a key
 *
 * @param path - Raw storage path (may use '\\' or carry leading/trailing '/')
 * @returns Normalized key
 * @throws InvalidTransferPathError if the result is empty or contains '..'
 *
 * @example
 * normalizeStoragePath('/my_storage_dir//first_subdir\\f1')
 * // => 'my_storage_dir/first_subdir/f1'
 */
export function normalizeStoragePath(path: string): string {
  const segments = path
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");

  if (segments.length === 0) {
    throw new InvalidTransferPathError(path, "Storage path is empty");
  }
  if (segments.includes("..")) {
    throw new InvalidTransferPathError(
      path,
      "Storage path must not contain '..' segments",
    );
  }

  return segments.join("/");
}

/**
 * Join storage path parts, skipping empty ones
 *
 * @example
 * joinStoragePath('my_storage_dir', 'first_subdir/f1')
 * // => 'my_storage_dir/first_subdir/f1'
 *
 * joinStoragePath('', 'f2')
 * // => 'f2'
 */
export function joinStoragePath(...parts: string[]): string {
  return normalizeStoragePath(parts.filter((part) => part !== "").join("/"));
}

/**
 * Build the listing prefix for a storage "directory"
 *
 * @returns '' for the container root, otherwise the directory with a trailing '/'
 *
 * @example
 * storagePrefix('my_storage_dir')
 * // => 'my_storage_dir/'
 */
export function storagePrefix(storageDir: string): string {
  const trimmed = storageDir.replace(/\\/g, "/").replace(/^[/.]+$/, "");
  if (trimmed === "") return "";
  return `${normalizeStoragePath(trimmed)}/`;
}

/**
 * Convert an OS-relative path into a '/' separated one
 */
export function toPosixPath(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

/**
 * Map a listed key back to a path under a local directory
 *
 * @param localDir - Destination directory
 * @param storageDir - Storage directory the key was listed from
 * @param key - Full object key
 * @returns Absolute local path
 * @throws InvalidTransferPathError if the key is outside storageDir or would
 *   land outside localDir
 *
 * @example
 * localPathForKey('/tmp/out', 'my_storage_dir', 'my_storage_dir/a/f1')
 * // => '/tmp/out/a/f1'
 */
export function localPathForKey(
  localDir: string,
  storageDir: string,
  key: string,
): string {
  const prefix = storagePrefix(storageDir);
  if (!key.startsWith(prefix)) {
    throw new InvalidTransferPathError(
      key,
      `Key ${key} is not under storage directory ${storageDir}`,
    );
  }

  const relativeKey = normalizeStoragePath(key.slice(prefix.length));
  const root = resolve(localDir);
  const target = resolve(join(root, ...relativeKey.split("/")));

  const rel = relative(root, target);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    throw new InvalidTransferPathError(
      key,
      "Key resolves outside the destination directory",
    );
  }

  return target;
}

/**
 * Check whether a key is a "folder marker" (zero-byte object ending in '/')
 */
export function isFolderMarker(key: string): boolean {
  return key.endsWith("/");
}

/**
 * Last segment of a storage key or local path
 */
export function baseName(path: string): string {
  const segments = path.replace(/\\/g, "/").split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "";
}
