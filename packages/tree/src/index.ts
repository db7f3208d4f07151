/**
 * @dirshape/tree
 *
 * Truncation-aware directory walker and identical-sibling grouping.
 *
 * @example
 * ```ts
 * import { groupIdentical, walk } from "@dirshape/tree";
 *
 * const root = walk("./build", { maxFilesPerDir: 5, maxDepth: 3 });
 * for (const group of groupIdentical(root.children)) {
 *   console.log(group.members.length, group.members[0]?.name);
 * }
 * ```
 */

export {
  categorizeError,
  isPermissionError,
  WalkError,
  type WalkErrorCode,
} from "./errors.ts";
export { groupIdentical } from "./group.ts";
export { DEFAULT_CONCURRENCY } from "./options.ts";
export { createFsReader, createFsReaderAsync } from "./readers/fs-reader.ts";
export {
  createMemoryReader,
  type MemoryDirectory,
  type MemoryEntry,
  MemoryFault,
  type MemoryFaultCode,
  memoryFault,
  toAsyncReader,
} from "./readers/memory-reader.ts";
export { toPlainTree, type PlainTree } from "./plain.ts";
export type {
  AsyncDirectoryReader,
  AsyncWalkOptions,
  DirEntry,
  DirectoryNode,
  DirectoryReader,
  DirGroup,
  FileEntry,
  NodeError,
  NodeErrorKind,
  PathStat,
  WalkOptions,
} from "./types.ts";
export { walk } from "./walker.ts";
export { walkAsync } from "./walker-async.ts";
