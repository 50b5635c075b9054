/**
 * Parsing of explicit transfer pairs given on the command line
 *
 * put takes `local=remote`, get takes `remote=local`. The first '=' splits
 * the pair, so keys may contain '=' but local paths given to put may not.
 */

import type { StorageTransferPath } from "@cloudbulk/transfer";

export type PairDirection = "upload" | "download";

/**
 * Parse one pair
 *
 * @throws Error when the pair has no '=' or an empty side
 */
export function parsePair(pair: string, direction: PairDirection): StorageTransferPath {
  const separator = pair.indexOf("=");
  const left = separator === -1 ? "" : pair.slice(0, separator).trim();
  const right = separator === -1 ? "" : pair.slice(separator + 1).trim();

  if (!left || !right) {
    const expected = direction === "upload" ? "local=remote" : "remote=local";
    throw new Error(`Invalid pair "${pair}": expected ${expected}`);
  }

  return direction === "upload"
    ? { localPath: left, storagePath: right }
    : { storagePath: left, localPath: right };
}

export function parsePairs(
  pairs: string[],
  direction: PairDirection,
): StorageTransferPath[] {
  return pairs.map((pair) => parsePair(pair, direction));
}
