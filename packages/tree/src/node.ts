/**
 * Node construction
 *
 * Shared by the sync and async walkers. A node is only created once its
 * subtree is complete, so `signature` and the totals are final from the
 * moment the object exists.
 */

import {
  addToHistogram,
  compareUtf8,
  computeErrorSignature,
  computeSignature,
  computeUnexploredSignature,
  createExtensionHistogram,
} from "@dirshape/fingerprint";
import type { DirEntry, DirectoryNode, NodeError } from "./types.ts";

/** Where a directory sits in the walk */
export type NodeLocation = {
  name: string;
  path: string;
  depth: number;
};

/**
 * Sort entries by name (UTF-8 byte order), without mutating input
 */
export function sortEntries(entries: readonly DirEntry[]): DirEntry[] {
  return [...entries].sort((a, b) => compareUtf8(a.name, b.name));
}

function emptyNode(location: NodeLocation) {
  return {
    name: location.name,
    path: location.path,
    depth: location.depth,
    children: [],
    files: [],
    hiddenFileCount: 0,
    immediateDirCount: 0,
    immediateFileCount: 0,
    totalDirCount: 0,
    totalFileCount: 0,
  };
}

/**
 * Directory recorded but never read because the depth limit was reached
 */
export function createUnexploredNode(location: NodeLocation): DirectoryNode {
  return {
    ...emptyNode(location),
    signature: computeUnexploredSignature(location.path),
    unexplored: true,
  };
}

/**
 * Directory whose read failed
 */
export function createErrorNode(location: NodeLocation, error: NodeError): DirectoryNode {
  return {
    ...emptyNode(location),
    signature: computeErrorSignature(location.path, error.kind),
    error,
  };
}

/**
 * Assemble a read directory from its finished children and its file names.
 *
 * @param fileNames - every file found, in display order
 * @param maxFiles - files retained for display (Infinity for all)
 */
export function createDirectoryNode(
  location: NodeLocation,
  children: DirectoryNode[],
  fileNames: readonly string[],
  maxFiles: number
): DirectoryNode {
  const histogram = createExtensionHistogram();
  for (const fileName of fileNames) {
    addToHistogram(histogram, fileName);
  }

  const files = fileNames.slice(0, maxFiles).map((name) => ({ name }));

  let totalDirCount = children.length;
  let totalFileCount = fileNames.length;
  for (const child of children) {
    totalDirCount += child.totalDirCount;
    totalFileCount += child.totalFileCount;
  }

  return {
    name: location.name,
    path: location.path,
    depth: location.depth,
    children,
    files,
    hiddenFileCount: fileNames.length - files.length,
    immediateDirCount: children.length,
    immediateFileCount: fileNames.length,
    totalDirCount,
    totalFileCount,
    signature: computeSignature(
      histogram,
      children.map((child) => child.signature)
    ),
  };
}
