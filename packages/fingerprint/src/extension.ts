/**
 * Extension histogram
 *
 * Only the extension of a file name feeds the fingerprint; names
 * themselves are dropped. Two directories holding `a.go` and `b.go`
 * respectively count as the same shape.
 */

import { NO_EXTENSION } from "./constants.ts";
import type { ExtensionHistogram } from "./types.ts";

/**
 * Normalize a file name to its histogram key.
 *
 * The extension runs from the last dot to the end of the name, so a
 * dotfile is its own extension (`.gitignore`) and only dotless names fall
 * back to the sentinel.
 */
export function normalizeExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? NO_EXTENSION : fileName.slice(dot).toLowerCase();
}

export function createExtensionHistogram(): Map<string, number> {
  return new Map<string, number>();
}

/**
 * Record one file in a running histogram
 */
export function addToHistogram(histogram: Map<string, number>, fileName: string): void {
  const ext = normalizeExtension(fileName);
  histogram.set(ext, (histogram.get(ext) ?? 0) + 1);
}

/**
 * Build a histogram from a complete list of file names
 */
export function histogramOf(fileNames: Iterable<string>): ExtensionHistogram {
  const histogram = createExtensionHistogram();
  for (const name of fileNames) {
    addToHistogram(histogram, name);
  }
  return histogram;
}
