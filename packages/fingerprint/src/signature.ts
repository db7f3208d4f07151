/**
 * Structural signatures
 *
 * A directory's signature is a BLAKE3-128 digest over:
 *
 *   "files" u32(n) { field(ext) u32(count) }*n     ext sorted
 *   "dirs"  u32(m) { field(childSignature) }*m     signatures sorted
 *
 * Sorting both lists makes the result independent of the order entries
 * were read in. The digest only approximates "looks the same": file names
 * are not part of it, so directories with equal extension histograms and
 * equal child shapes collapse together even when their names differ.
 * That coarseness is what the display collapsing relies on.
 */

import { blake3 } from "@noble/hashes/blake3";
import { DIGEST_SIZE, SECTION_TAG, SIGNATURE_PREFIX } from "./constants.ts";
import { bytesToHex, compareUtf8, concatBytes, encodeCount, encodeField } from "./encoding.ts";
import type { ExtensionHistogram, Signature } from "./types.ts";

function digest(parts: Uint8Array[]): string {
  return bytesToHex(blake3(concatBytes(...parts), { dkLen: DIGEST_SIZE }));
}

/**
 * Compute the signature of a successfully read directory.
 *
 * @param extensionCounts - histogram over every file found in the
 *   directory, including files later hidden by a display limit
 * @param childSignatures - final signatures of the immediate subdirectories
 */
export function computeSignature(
  extensionCounts: ExtensionHistogram,
  childSignatures: readonly Signature[]
): Signature {
  const parts: Uint8Array[] = [];

  const exts = Array.from(extensionCounts.keys()).sort(compareUtf8);
  parts.push(encodeField(SECTION_TAG.FILES), encodeCount(exts.length));
  for (const ext of exts) {
    parts.push(encodeField(ext), encodeCount(extensionCounts.get(ext) ?? 0));
  }

  const sorted = [...childSignatures].sort(compareUtf8);
  parts.push(encodeField(SECTION_TAG.DIRS), encodeCount(sorted.length));
  for (const sig of sorted) {
    parts.push(encodeField(sig));
  }

  return SIGNATURE_PREFIX.DIRECTORY + digest(parts);
}

/**
 * Signature for a directory that could not be read.
 *
 * Keyed on path and error kind, so an unreadable directory never matches
 * an empty one, nor another unreadable directory elsewhere.
 */
export function computeErrorSignature(path: string, errorKind: string): Signature {
  return (
    SIGNATURE_PREFIX.ERROR +
    digest([encodeField(SECTION_TAG.ERROR), encodeField(errorKind), encodeField(path)])
  );
}

/**
 * Signature for a directory recorded but not read (depth limit reached)
 */
export function computeUnexploredSignature(path: string): Signature {
  return (
    SIGNATURE_PREFIX.UNEXPLORED + digest([encodeField(SECTION_TAG.UNEXPLORED), encodeField(path)])
  );
}
