/**
 * @dirshape/tree — Types
 *
 * Directory tree model produced by the walker and consumed by grouping
 * and rendering.
 */

import type { Signature } from "@dirshape/fingerprint";

// ============================================================================
// Tree Node Types
// ============================================================================

/** A file retained for display */
export type FileEntry = {
  name: string;
};

/** Category of a directory read failure */
export type NodeErrorKind = "permission-denied" | "not-found" | "other";

/** Read failure recorded on the node where it happened */
export type NodeError = {
  kind: NodeErrorKind;
  /** OS error code when one was reported (EACCES, ENOENT, ...) */
  code?: string;
  message: string;
};

/** One directory level */
export type DirectoryNode = {
  /** Basename used for display */
  readonly name: string;
  /** Resolved path, for re-reading and error context */
  readonly path: string;
  /** 0 at the root */
  readonly depth: number;
  /** Subdirectories, sorted by name */
  readonly children: readonly DirectoryNode[];
  /** Files retained for display, sorted by name */
  readonly files: readonly FileEntry[];
  /** Files found but not retained because of the file limit */
  readonly hiddenFileCount: number;
  readonly immediateDirCount: number;
  /** Includes hidden files */
  readonly immediateFileCount: number;
  /** Directories below this one (not counting itself) */
  readonly totalDirCount: number;
  readonly totalFileCount: number;
  readonly signature: Signature;
  /** Set when the directory could not be read */
  readonly error?: NodeError;
  /** When true, the directory was recorded but not read (depth limit) */
  readonly unexplored?: true;
};

/** Sibling directories sharing one signature, in sibling order */
export type DirGroup = {
  signature: Signature;
  members: DirectoryNode[];
};

// ============================================================================
// Walk Options
// ============================================================================

/** Options for walk() / walkAsync() */
export type WalkOptions = {
  /**
   * Max files retained per directory. Files past the bound are counted in
   * `hiddenFileCount`. 0 or unset: unbounded.
   */
  maxFilesPerDir?: number;
  /**
   * Max depth. Directories at depth < maxDepth are read; their
   * subdirectories at depth maxDepth are recorded as unexplored.
   * 0 or unset: unbounded.
   */
  maxDepth?: number;
  /** Called once per finished directory, children before parents */
  onDirectory?: (node: DirectoryNode) => void;
};

/** Extra options for walkAsync() */
export type AsyncWalkOptions = WalkOptions & {
  /** Max directory reads in flight. Default: 8 */
  concurrency?: number;
  /** Checked between directory visits */
  signal?: AbortSignal;
};

// ============================================================================
// Directory Reader (port)
// ============================================================================

/** One entry returned by a directory read */
export type DirEntry = {
  name: string;
  isDirectory: boolean;
};

/** Result of a stat on the root path */
export type PathStat = {
  isDirectory: boolean;
};

/**
 * Directory read primitive.
 *
 * Failures are thrown as-is; the walker categorizes them with
 * `categorizeError`. Entry order is not significant.
 */
export type DirectoryReader = {
  stat: (path: string) => PathStat;
  readDir: (path: string) => DirEntry[];
  join: (parent: string, name: string) => string;
  /** Normalize the root path the caller passed in */
  resolve: (path: string) => string;
};

/** Asynchronous variant of DirectoryReader */
export type AsyncDirectoryReader = {
  stat: (path: string) => Promise<PathStat>;
  readDir: (path: string) => Promise<DirEntry[]>;
  join: (parent: string, name: string) => string;
  resolve: (path: string) => string;
};
