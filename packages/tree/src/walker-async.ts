/**
 * Tree walker — asynchronous.
 *
 * Same tree as walk(), but sibling subdirectories are read concurrently.
 * Only the directory reads go through the limiter; the recursion itself
 * never holds a slot, so nested walks cannot starve each other. Siblings
 * are joined with Promise.all (which keeps their order) before the parent
 * node and its signature are built.
 */

import { basename } from "node:path";
import pLimit, { type LimitFunction } from "p-limit";
import { categorizeError, rootReadError, rootStatError, WalkError } from "./errors.ts";
import {
  createDirectoryNode,
  createErrorNode,
  createUnexploredNode,
  type NodeLocation,
  sortEntries,
} from "./node.ts";
import { type ResolvedLimits, resolveConcurrency, resolveLimits } from "./options.ts";
import { createFsReaderAsync } from "./readers/fs-reader.ts";
import type {
  AsyncDirectoryReader,
  AsyncWalkOptions,
  DirEntry,
  DirectoryNode,
  PathStat,
} from "./types.ts";

type AsyncWalkContext = {
  reader: AsyncDirectoryReader;
  limits: ResolvedLimits;
  limit: LimitFunction;
  signal?: AbortSignal;
  onDirectory?: (node: DirectoryNode) => void;
};

function checkAborted(ctx: AsyncWalkContext, path: string): void {
  if (ctx.signal?.aborted) {
    throw new WalkError("ABORTED", path, "Walk aborted");
  }
}

function finish(ctx: AsyncWalkContext, node: DirectoryNode): DirectoryNode {
  ctx.onDirectory?.(node);
  return node;
}

async function buildDirectory(
  ctx: AsyncWalkContext,
  location: NodeLocation,
  entries: DirEntry[]
): Promise<DirectoryNode> {
  const pending: Array<Promise<DirectoryNode>> = [];
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
      pending.push(Promise.resolve(finish(ctx, createUnexploredNode(child))));
    } else {
      pending.push(walkDirectory(ctx, child));
    }
  }

  const children = await Promise.all(pending);
  return finish(ctx, createDirectoryNode(location, children, fileNames, ctx.limits.maxFiles));
}

async function walkDirectory(ctx: AsyncWalkContext, location: NodeLocation): Promise<DirectoryNode> {
  checkAborted(ctx, location.path);

  let entries: DirEntry[];
  try {
    entries = await ctx.limit(() => ctx.reader.readDir(location.path));
  } catch (error) {
    return finish(ctx, createErrorNode(location, categorizeError(error)));
  }
  return buildDirectory(ctx, location, entries);
}

/**
 * Walk the directory at `rootPath` with concurrent sibling reads.
 *
 * @throws WalkError as walk() does, plus `ABORTED` when `signal` fires
 *   between directory visits.
 */
export async function walkAsync(
  rootPath: string,
  options: AsyncWalkOptions = {},
  reader: AsyncDirectoryReader = createFsReaderAsync()
): Promise<DirectoryNode> {
  const limits = resolveLimits(options);
  const limit = pLimit(resolveConcurrency(options));
  const path = reader.resolve(rootPath);

  let stat: PathStat;
  try {
    stat = await reader.stat(path);
  } catch (error) {
    throw rootStatError(rootPath, error);
  }
  if (!stat.isDirectory) {
    throw new WalkError("ROOT_NOT_A_DIRECTORY", rootPath, `${rootPath} is not a directory`);
  }

  const ctx: AsyncWalkContext = {
    reader,
    limits,
    limit,
    signal: options.signal,
    onDirectory: options.onDirectory,
  };
  checkAborted(ctx, path);

  let entries: DirEntry[];
  try {
    entries = await limit(() => reader.readDir(path));
  } catch (error) {
    throw rootReadError(rootPath, error);
  }

  return buildDirectory(ctx, { name: basename(path) || path, path, depth: 0 }, entries);
}
