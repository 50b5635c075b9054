/**
 * Cleanup policy for benchmark data
 *
 * Decides what a benchmark run removes once it is done: the buckets it
 * created, the objects it uploaded, and the local files it generated.
 */

export interface CleanupPolicy {
  /** Master switch; false keeps everything */
  enabled: boolean;
  /** Keep uploaded objects (and therefore their buckets) */
  keepTestData: boolean;
  /** Keep buckets, but empty them */
  keepBuckets: boolean;
  /** Keep generated local files */
  keepLocalFiles: boolean;
}

export type CleanupTarget = "buckets" | "data" | "local_files";

export const DEFAULT_CLEANUP_POLICY: CleanupPolicy = {
  enabled: true,
  keepTestData: false,
  keepBuckets: false,
  keepLocalFiles: false,
};

/**
 * Whether the given kind of artifact should be removed
 */
export function shouldCleanup(
  policy: CleanupPolicy,
  target: CleanupTarget,
): boolean {
  if (!policy.enabled) return false;

  switch (target) {
    case "buckets":
      return !(policy.keepBuckets || policy.keepTestData);
    case "data":
      return !policy.keepTestData;
    case "local_files":
      return !policy.keepLocalFiles;
  }
}

/**
 * One-line description of what the policy keeps
 */
export function getCleanupMessage(policy: CleanupPolicy): string {
  if (!policy.enabled) {
    return "Cleanup disabled: keeping buckets, data and local files";
  }

  const kept: string[] = [];
  if (!shouldCleanup(policy, "buckets")) kept.push("buckets");
  if (!shouldCleanup(policy, "data")) kept.push("data");
  if (!shouldCleanup(policy, "local_files")) kept.push("local files");

  if (kept.length === 0) {
    return "Cleaning up buckets, data and local files";
  }
  return `Keeping ${kept.join(" and ")}`;
}

/**
 * Apply the command-line cleanup flags over a policy
 *
 * Only the first flag that is set applies, in the order no-cleanup,
 * keep-data, keep-buckets, keep-files.
 */
export function applyCleanupFlags(
  policy: CleanupPolicy,
  flags: {
    cleanup?: boolean;
    keepData?: boolean;
    keepBuckets?: boolean;
    keepFiles?: boolean;
  },
): CleanupPolicy {
  if (flags.cleanup === false) {
    return { ...policy, enabled: false };
  }
  if (flags.keepData) {
    return { ...policy, keepTestData: true, keepBuckets: true };
  }
  if (flags.keepBuckets) {
    return { ...policy, keepBuckets: true };
  }
  if (flags.keepFiles) {
    return { ...policy, keepLocalFiles: true };
  }
  return policy;
}
