/**
 * Identical-sibling grouping
 *
 * Partitions sibling directories by signature. Groups come out in the
 * order their signature was first seen; members keep sibling order. The
 * partition is always complete: how many members to show is the
 * renderer's decision.
 */

import type { DirectoryNode, DirGroup } from "./types.ts";

function fallbackSignature(dir: DirectoryNode): string {
  return `name:${dir.name}:depth:${dir.depth}`;
}

export function groupIdentical(siblings: readonly DirectoryNode[]): DirGroup[] {
  const groups = new Map<string, DirGroup>();

  for (const dir of siblings) {
    const signature = dir.signature === "" ? fallbackSignature(dir) : dir.signature;
    let group = groups.get(signature);
    if (!group) {
      group = { signature, members: [] };
      groups.set(signature, group);
    }
    group.members.push(dir);
  }

  // Map iteration follows insertion order, i.e. first occurrence
  return Array.from(groups.values());
}
