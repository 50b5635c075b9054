import { customAlphabet } from "nanoid";

// Clean alphabet without underscores, hyphens, or similar characters
const CLEAN_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

// Bucket and container names must be lowercase on every provider
const CONTAINER_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

// Standard length for ids
const STANDARD_LENGTH = 15;

// Suffix length for generated container names
const CONTAINER_SUFFIX_LENGTH = 10;

export const generateCleanId = customAlphabet(CLEAN_ALPHABET, STANDARD_LENGTH);

const generateContainerSuffix = customAlphabet(
  CONTAINER_ALPHABET,
  CONTAINER_SUFFIX_LENGTH,
);

/**
 * Id stamped on every log record of one bulk run
 */
export const generateBatchId = () => `batch-${generateCleanId()}`;

/**
 * Unique bucket/container name for throwaway benchmark data
 *
 * Valid for S3, GCS and Azure: lowercase letters, digits and single hyphens,
 * 3 to 63 characters.
 */
export const generateContainerName = (prefix = "cloudbulk-bench") => {
  const cleanPrefix = prefix
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 63 - CONTAINER_SUFFIX_LENGTH - 1);
  const suffix = generateContainerSuffix();
  return cleanPrefix ? `${cleanPrefix}-${suffix}` : suffix;
};

/**
 * Type guards for ID validation
 */
export const isValidBatchId = (id: string): boolean =>
  /^batch-[A-Za-z0-9]{15}$/.test(id);

export const isValidContainerName = (name: string): boolean =>
  /^[a-z0-9](?:[a-z0-9]|-(?!-))*[a-z0-9]$/.test(name) &&
  name.length >= 3 &&
  name.length <= 63;
