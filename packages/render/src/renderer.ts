/**
 * Text renderer
 *
 * root/
 * ├── pkg/
 * │   ├── a/
 * │   │   └── f.go
 * │   └── ... (1 identical dirs)
 * └── scripts/
 *     ├── x.sh
 *     └── ... [0 directories, 3 files, showing first 1]
 * [5 directories, 5 files]
 */

import { normalize, sep } from "node:path";
import type { DirectoryNode } from "@dirshape/tree";
import { type DisplayOptions, displayItems } from "./items.ts";
import { createPalette, type Palette } from "./palette.ts";

export type RenderOptions = DisplayOptions & {
  /** false disables color; default follows the terminal */
  color?: boolean;
};

const BRANCH = "├── ";
const LAST_BRANCH = "└── ";
const PIPE = "│   ";
const SPACE = "    ";

function errorLabel(dir: DirectoryNode, palette: Palette): string {
  if (!dir.error) {
    return "";
  }
  if (dir.error.kind === "permission-denied") {
    return palette.summary("[Permission denied]");
  }
  return palette.error(`[${dir.error.message}]`);
}

function* childLines(
  dir: DirectoryNode,
  prefix: string,
  options: DisplayOptions,
  palette: Palette
): Generator<string> {
  for (const item of displayItems(dir, options)) {
    const connector = item.isLast ? LAST_BRANCH : BRANCH;

    switch (item.kind) {
      case "dir": {
        const child = item.dir;
        if (child.error) {
          yield `${prefix}${connector}${palette.dir(child.name)} ${errorLabel(child, palette)}`;
        } else {
          yield `${prefix}${connector}${palette.dir(child.name)}/`;
          yield* childLines(child, prefix + (item.isLast ? SPACE : PIPE), options, palette);
        }
        break;
      }
      case "collapsed":
        yield `${prefix}${connector}${palette.summary(`... (${item.count} identical dirs)`)}`;
        break;
      case "file":
        yield `${prefix}${connector}${palette.file(item.file.name)}`;
        break;
      case "hidden-files":
        yield `${prefix}${connector}${palette.summary(
          `... [${item.immediateDirCount} directories, ${item.immediateFileCount} files, showing first ${item.shown}]`
        )}`;
        break;
    }
  }
}

/**
 * Lazily yield the lines of a rendered tree, stats line included
 */
export function* renderLines(
  rootLabel: string,
  dir: DirectoryNode,
  options: RenderOptions = {}
): Generator<string> {
  const palette = createPalette(options.color);
  yield palette.dir(rootLabel);
  yield* childLines(dir, "", options, palette);
  yield palette.stats(`[${dir.totalDirCount + 1} directories, ${dir.totalFileCount} files]`);
}

/**
 * Render a tree to a newline-terminated string
 */
export function renderTree(
  rootLabel: string,
  dir: DirectoryNode,
  options: RenderOptions = {}
): string {
  return `${Array.from(renderLines(rootLabel, dir, options)).join("\n")}\n`;
}

/**
 * Label shown for the root: "." stays as is, anything else is normalized
 * and ends with a path separator.
 */
export function formatRootLabel(input: string): string {
  if (input === "") {
    return ".";
  }

  let cleaned = normalize(input);
  while (cleaned.length > 1 && cleaned.endsWith(sep)) {
    cleaned = cleaned.slice(0, -1);
  }
  if (cleaned === ".") {
    return cleaned;
  }
  if (input.endsWith(sep)) {
    return input;
  }
  return cleaned + sep;
}
