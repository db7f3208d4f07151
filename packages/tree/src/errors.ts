/**
 * Walk errors
 *
 * Root failures abort the walk and are thrown as WalkError. Failures
 * below the root are captured as NodeError values on the affected node.
 */

import type { NodeError, NodeErrorKind } from "./types.ts";

export type WalkErrorCode =
  | "ROOT_NOT_FOUND"
  | "ROOT_UNREADABLE"
  | "ROOT_NOT_A_DIRECTORY"
  | "INVALID_OPTIONS"
  | "ABORTED";

export class WalkError extends Error {
  readonly code: WalkErrorCode;
  readonly path: string;
  /** True when the root failure was a permission error */
  readonly permissionDenied: boolean;

  constructor(code: WalkErrorCode, path: string, message: string, permissionDenied = false) {
    super(message);
    this.name = "WalkError";
    this.code = code;
    this.path = path;
    this.permissionDenied = permissionDenied;
  }
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const trimmed = error.message.trim();
    return trimmed === "" ? "error" : trimmed;
  }
  return String(error);
}

/**
 * Map a thrown read failure to a NodeError.
 *
 * EACCES/EPERM → permission-denied, ENOENT/ENOTDIR → not-found, anything
 * else → other.
 */
export function categorizeError(error: unknown): NodeError {
  const code = errorCode(error);
  let kind: NodeErrorKind = "other";
  if (code !== undefined && PERMISSION_CODES.has(code)) {
    kind = "permission-denied";
  } else if (code !== undefined && NOT_FOUND_CODES.has(code)) {
    kind = "not-found";
  }

  const result: NodeError = { kind, message: errorMessage(error) };
  if (code !== undefined) {
    result.code = code;
  }
  return result;
}

/**
 * Build the WalkError for a failed root stat
 */
export function rootStatError(path: string, error: unknown): WalkError {
  const nodeError = categorizeError(error);
  if (nodeError.kind === "not-found") {
    return new WalkError("ROOT_NOT_FOUND", path, `${path}: no such file or directory`);
  }
  return rootReadError(path, error);
}

/**
 * Build the WalkError for a failed root read
 */
export function rootReadError(path: string, error: unknown): WalkError {
  const nodeError = categorizeError(error);
  if (nodeError.kind === "permission-denied") {
    return new WalkError("ROOT_UNREADABLE", path, `${path}: permission denied`, true);
  }
  if (nodeError.kind === "not-found") {
    return new WalkError("ROOT_NOT_FOUND", path, `${path}: no such file or directory`);
  }
  return new WalkError("ROOT_UNREADABLE", path, `Cannot read ${path}: ${nodeError.message}`);
}

export function isPermissionError(error: NodeError | undefined): boolean {
  return error?.kind === "permission-denied";
}
