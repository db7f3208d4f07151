/**
 * Fingerprint constants
 */

/** Histogram key for files whose name carries no extension */
export const NO_EXTENSION = "<noext>";

/** Digest length in bytes (BLAKE3 truncated to 128 bits) */
export const DIGEST_SIZE = 16;

/**
 * Signature family prefixes.
 *
 * Each family hashes a different input shape, so the prefix keeps a
 * read directory, an unreadable one and an unexplored one apart even
 * before the digest is compared.
 */
export const SIGNATURE_PREFIX = {
  DIRECTORY: "d:",
  ERROR: "e:",
  UNEXPLORED: "u:",
} as const;

/** Section tags written into the hashed byte stream */
export const SECTION_TAG = {
  FILES: "files",
  DIRS: "dirs",
  ERROR: "error",
  UNEXPLORED: "unexplored",
} as const;

/** Largest value a u32 field can carry */
export const MAX_U32 = 0xffffffff;
