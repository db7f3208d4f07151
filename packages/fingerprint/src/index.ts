/**
 * @dirshape/fingerprint
 *
 * Order-independent structural signatures for directory contents.
 *
 * @example
 * ```ts
 * import { computeSignature, histogramOf } from "@dirshape/fingerprint";
 *
 * const leaf = computeSignature(histogramOf(["main.go"]), []);
 * const parent = computeSignature(histogramOf([]), [leaf, leaf]);
 * ```
 */

export { DIGEST_SIZE, NO_EXTENSION, SIGNATURE_PREFIX } from "./constants.ts";
export {
  bytesToHex,
  compareUtf8,
  concatBytes,
  encodeCount,
  encodeField,
} from "./encoding.ts";
export {
  addToHistogram,
  createExtensionHistogram,
  histogramOf,
  normalizeExtension,
} from "./extension.ts";
export {
  computeErrorSignature,
  computeSignature,
  computeUnexploredSignature,
} from "./signature.ts";
export type { ExtensionHistogram, Signature } from "./types.ts";
