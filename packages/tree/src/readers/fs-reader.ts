/**
 * File system directory readers
 *
 * Entries are typed from the directory listing itself (no per-entry
 * stat), so a symbolic link is listed as a file even when it points at a
 * directory, and is never followed.
 */

import { readdirSync, statSync } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { AsyncDirectoryReader, DirectoryReader } from "../types.ts";

/**
 * Create a synchronous reader backed by node:fs
 */
export const createFsReader = (): DirectoryReader => ({
  stat: (path) => ({ isDirectory: statSync(path).isDirectory() }),
  readDir: (path) =>
    readdirSync(path, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    })),
  join,
  resolve: (path) => resolve(path),
});

/**
 * Create an asynchronous reader backed by node:fs/promises
 */
export const createFsReaderAsync = (): AsyncDirectoryReader => ({
  stat: async (path) => ({ isDirectory: (await stat(path)).isDirectory() }),
  readDir: async (path) => {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    }));
  },
  join,
  resolve: (path) => resolve(path),
});
