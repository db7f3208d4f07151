/**
 * In-memory directory reader
 *
 * Useful for testing and for walking trees that do not live on disk.
 *
 * @example
 * ```ts
 * const reader = createMemoryReader({
 *   root: {
 *     "main.go": "",
 *     locked: memoryFault("EACCES"),
 *   },
 * });
 * walk("/root", {}, reader);
 * ```
 */

import { posix } from "node:path";
import type { AsyncDirectoryReader, DirEntry, DirectoryReader } from "../types.ts";

/** Error codes a faulted directory can raise */
export type MemoryFaultCode = "EACCES" | "EPERM" | "ENOENT" | "EIO";

/** A directory whose read fails with `code` */
export class MemoryFault {
  constructor(readonly code: MemoryFaultCode) {}
}

/** Directory contents: a string is a file, a nested object a directory */
export type MemoryDirectory = {
  [name: string]: MemoryEntry;
};

export type MemoryEntry = string | MemoryDirectory | MemoryFault;

const ERROR_TEXT: Record<string, string> = {
  EACCES: "permission denied",
  EPERM: "operation not permitted",
  ENOENT: "no such file or directory",
  ENOTDIR: "not a directory",
  EIO: "i/o error",
};

export function memoryFault(code: MemoryFaultCode): MemoryFault {
  return new MemoryFault(code);
}

function fsError(code: string, syscall: string, path: string): Error {
  return Object.assign(new Error(`${code}: ${ERROR_TEXT[code] ?? "error"}, ${syscall} '${path}'`), {
    code,
    syscall,
    path,
  });
}

function isDirectoryEntry(entry: MemoryEntry): boolean {
  return typeof entry !== "string";
}

/**
 * Create a synchronous reader over an in-memory tree.
 *
 * `files` is the content of `/`; paths are POSIX and resolved against `/`.
 */
export const createMemoryReader = (files: MemoryDirectory): DirectoryReader => {
  const lookup = (path: string, syscall: string): MemoryEntry => {
    let current: MemoryEntry = files;
    for (const segment of path.split("/").filter(Boolean)) {
      if (current instanceof MemoryFault) {
        throw fsError(current.code, syscall, path);
      }
      if (typeof current === "string") {
        throw fsError("ENOTDIR", syscall, path);
      }
      const next: MemoryEntry | undefined = current[segment];
      if (next === undefined) {
        throw fsError("ENOENT", syscall, path);
      }
      current = next;
    }
    return current;
  };

  return {
    stat: (path) => ({ isDirectory: isDirectoryEntry(lookup(path, "stat")) }),
    readDir: (path): DirEntry[] => {
      const entry = lookup(path, "scandir");
      if (entry instanceof MemoryFault) {
        throw fsError(entry.code, "scandir", path);
      }
      if (typeof entry === "string") {
        throw fsError("ENOTDIR", "scandir", path);
      }
      return Object.entries(entry).map(([name, child]) => ({
        name,
        isDirectory: isDirectoryEntry(child),
      }));
    },
    join: posix.join,
    resolve: (path) => posix.resolve("/", path),
  };
};

/**
 * Wrap a synchronous reader as an asynchronous one
 */
export const toAsyncReader = (reader: DirectoryReader): AsyncDirectoryReader => ({
  stat: async (path) => reader.stat(path),
  readDir: async (path) => reader.readDir(path),
  join: reader.join,
  resolve: reader.resolve,
});
