/**
 * Tree walker — synchronous, depth-first, post-order.
 *
 * Each directory is listed, sorted by name, and its subdirectories are
 * walked before the directory's own node is built, so child signatures
 * are final when the parent's signature is computed.
 */

import { basename } from "node:path";
import { categorizeError, rootReadError, rootStatError, WalkError } from "./errors.ts";
import {
  createDirectoryNode,
  createErrorNode,
  createUnexploredNode,
  type NodeLocation,
  sortEntries,
} from "./node.ts";
import { type ResolvedLimits, resolveLimits } from "./options.ts";
import { createFsReader } from "./readers/fs-reader.ts";
import type { DirEntry, DirectoryNode, DirectoryReader, PathStat, WalkOptions } from "./types.ts";

type WalkContext = {
  reader: DirectoryReader;
  limits: ResolvedLimits;
  onDirectory?: (node: DirectoryNode) => void;
};

function finish(ctx: WalkContext, node: DirectoryNode): DirectoryNode {
  ctx.onDirectory?.(node);
  return node;
}

function buildDirectory(
  ctx: WalkContext,
  location: NodeLocation,
  entries: DirEntry[]
): DirectoryNode {
  const children: DirectoryNode[] = [];
  const fileNames: string[] = [];
  const childDepth = location.depth + 1;

  for (const entry of sortEntries(entries)) {
    if (!entry.isDirectory) {
      fileNames.push(entry.name);
      continue;
    }

    const child: NodeLocation = {
      name: entry.name,
      path: ctx.reader.join(location.path, entry.name),
      depth: childDepth,
    };
    if (childDepth >= ctx.limits.maxDepth) {
      children.push(finish(ctx, createUnexploredNode(child)));
    } else {
      children.push(walkDirectory(ctx, child));
    }
  }

  return finish(ctx, createDirectoryNode(location, children, fileNames, ctx.limits.maxFiles));
}

function walkDirectory(ctx: WalkContext, location: NodeLocation): DirectoryNode {
  let entries: DirEntry[];
  try {
    entries = ctx.reader.readDir(location.path);
  } catch (error) {
    return finish(ctx, createErrorNode(location, categorizeError(error)));
  }
  return buildDirectory(ctx, location, entries);
}

/**
 * Walk the directory at `rootPath`.
 *
 * @throws WalkError when the options are invalid, or when the root is
 *   missing, unreadable, or not a directory. Failures below the root are
 *   recorded on the affected node instead.
 */
export function walk(
  rootPath: string,
  options: WalkOptions = {},
  reader: DirectoryReader = createFsReader()
): DirectoryNode {
  const limits = resolveLimits(options);
  const path = reader.resolve(rootPath);

  let stat: PathStat;
  try {
    stat = reader.stat(path);
  } catch (error) {
    throw rootStatError(rootPath, error);
  }
  if (!stat.isDirectory) {
    throw new WalkError("ROOT_NOT_A_DIRECTORY", rootPath, `${rootPath} is not a directory`);
  }

  let entries: DirEntry[];
  try {
    entries = reader.readDir(path);
  } catch (error) {
    throw rootReadError(rootPath, error);
  }

  const ctx: WalkContext = { reader, limits, onDirectory: options.onDirectory };
  return buildDirectory(ctx, { name: basename(path) || path, path, depth: 0 }, entries);
}
