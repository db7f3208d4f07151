/**
 * Display items
 *
 * Flattens one directory level into the lines a renderer draws, in order:
 * identical groups (first K members, then a collapse marker), retained
 * files, then a hidden-files summary. The sequence is produced lazily;
 * `isLast` is resolved by looking one item ahead.
 */

import { type DirectoryNode, type FileEntry, groupIdentical } from "@dirshape/tree";

export type DisplayItem =
  | { kind: "dir"; dir: DirectoryNode; isLast: boolean }
  | { kind: "collapsed"; count: number; isLast: boolean }
  | { kind: "file"; file: FileEntry; isLast: boolean }
  | {
      kind: "hidden-files";
      hidden: number;
      shown: number;
      immediateDirCount: number;
      immediateFileCount: number;
      isLast: boolean;
    };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type PendingItem = DistributiveOmit<DisplayItem, "isLast">;

export type DisplayOptions = {
  /**
   * Members of one identical group to show before collapsing the rest.
   * 0 or unset: all.
   */
  maxDirsPerGroup?: number;
};

export function resolveMaxDirs(options: DisplayOptions): number {
  const { maxDirsPerGroup } = options;
  if (maxDirsPerGroup === undefined || maxDirsPerGroup === 0) {
    return Number.POSITIVE_INFINITY;
  }
  if (!(Number.isInteger(maxDirsPerGroup) && maxDirsPerGroup >= 0)) {
    throw new RangeError(`maxDirsPerGroup must be a non-negative integer, got ${maxDirsPerGroup}`);
  }
  return maxDirsPerGroup;
}

function* pendingItems(dir: DirectoryNode, maxDirs: number): Generator<PendingItem> {
  for (const group of groupIdentical(dir.children)) {
    const shown = Math.min(group.members.length, maxDirs);
    for (const member of group.members.slice(0, shown)) {
      yield { kind: "dir", dir: member };
    }
    if (group.members.length > shown) {
      yield { kind: "collapsed", count: group.members.length - shown };
    }
  }

  for (const file of dir.files) {
    yield { kind: "file", file };
  }

  if (dir.hiddenFileCount > 0) {
    yield {
      kind: "hidden-files",
      hidden: dir.hiddenFileCount,
      shown: dir.files.length,
      immediateDirCount: dir.immediateDirCount,
      immediateFileCount: dir.immediateFileCount,
    };
  }
}

/**
 * Lazily yield the display items of one directory level
 */
export function* displayItems(
  dir: DirectoryNode,
  options: DisplayOptions = {}
): Generator<DisplayItem> {
  let previous: PendingItem | undefined;
  for (const item of pendingItems(dir, resolveMaxDirs(options))) {
    if (previous) {
      yield { ...previous, isLast: false };
    }
    previous = item;
  }
  if (previous) {
    yield { ...previous, isLast: true };
  }
}
