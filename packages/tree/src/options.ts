/**
 * Walk option validation
 *
 * Unset and zero bounds both mean "unlimited" and become Infinity
 * internally, so the walker compares numbers without special cases.
 */

import { WalkError } from "./errors.ts";
import type { AsyncWalkOptions, WalkOptions } from "./types.ts";

export const DEFAULT_CONCURRENCY = 8;

export type ResolvedLimits = {
  maxFiles: number;
  maxDepth: number;
};

function invalid(message: string): WalkError {
  return new WalkError("INVALID_OPTIONS", "", message);
}

function toBound(value: number | undefined): number {
  return value === undefined || value === 0 ? Number.POSITIVE_INFINITY : value;
}

export function resolveLimits(options: WalkOptions): ResolvedLimits {
  const { maxFilesPerDir, maxDepth } = options;

  if (maxFilesPerDir !== undefined && !(Number.isInteger(maxFilesPerDir) && maxFilesPerDir >= 0)) {
    throw invalid(`maxFilesPerDir must be a non-negative integer, got ${maxFilesPerDir}`);
  }
  if (maxDepth !== undefined && !(Number.isInteger(maxDepth) && maxDepth >= 0)) {
    throw invalid(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  return {
    maxFiles: toBound(maxFilesPerDir),
    maxDepth: toBound(maxDepth),
  };
}

export function resolveConcurrency(options: AsyncWalkOptions): number {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!(Number.isInteger(concurrency) && concurrency >= 1)) {
    throw invalid(`concurrency must be a positive integer, got ${concurrency}`);
  }
  return concurrency;
}
