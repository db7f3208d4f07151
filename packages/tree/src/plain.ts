/**
 * Plain-object view of a walked tree, for JSON / YAML output
 */

import type { DirectoryNode, NodeErrorKind } from "./types.ts";

export type PlainTree = {
  name: string;
  signature: string;
  dirs: number;
  files: number;
  totalDirs: number;
  totalFiles: number;
  shownFiles: string[];
  hiddenFiles: number;
  unexplored?: true;
  error?: { kind: NodeErrorKind; message: string };
  children: PlainTree[];
};

export function toPlainTree(node: DirectoryNode): PlainTree {
  const plain: PlainTree = {
    name: node.name,
    signature: node.signature,
    dirs: node.immediateDirCount,
    files: node.immediateFileCount,
    totalDirs: node.totalDirCount,
    totalFiles: node.totalFileCount,
    shownFiles: node.files.map((file) => file.name),
    hiddenFiles: node.hiddenFileCount,
    children: node.children.map(toPlainTree),
  };
  if (node.unexplored) {
    plain.unexplored = true;
  }
  if (node.error) {
    plain.error = { kind: node.error.kind, message: node.error.message };
  }
  return plain;
}
