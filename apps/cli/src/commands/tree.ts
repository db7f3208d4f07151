import { formatRootLabel, renderTree } from "@dirshape/render";
import { type DirectoryReader, toPlainTree, walk } from "@dirshape/tree";
import type { Command } from "commander";
import { loadConfig } from "../lib/config";
import { parseTreeOptions, type TreeFlags } from "../lib/options";
import { createFormatter } from "../lib/output";

export function registerTreeCommand(program: Command, reader?: DirectoryReader): void {
  program
    .argument("[path]", "directory to print", ".")
    .option("-f, --files <n>", "maximum files to display per directory (0 for unlimited, default 5)")
    .option(
      "-d, --dirs <n>",
      "maximum identical directories to expand per group (0 for unlimited, default 1)"
    )
    .option("-L, --level <n>", "maximum recursion depth (0 for unlimited, default 0)")
    .option("--no-color", "disable colored output")
    .action((target: string) => {
      const opts = program.opts<TreeFlags & { format?: string; quiet?: boolean; verbose?: boolean }>();
      const formatter = createFormatter(opts);
      if (formatter.format === "table") {
        throw new Error("Format table is not supported for tree output");
      }

      const config = loadConfig();
      const options = parseTreeOptions(opts, config);
      formatter.debug(
        `Limits: files=${options.walk.maxFilesPerDir ?? "unlimited"} ` +
          `dirs=${options.maxDirsPerGroup ?? "unlimited"} ` +
          `level=${options.walk.maxDepth ?? "unlimited"}`
      );

      let unreadable = 0;
      const root = walk(
        target,
        {
          ...options.walk,
          onDirectory: (node) => {
            if (node.error) {
              unreadable++;
              formatter.debug(`Cannot read ${node.path}: ${node.error.message}`);
            } else if (!node.unexplored) {
              formatter.debug(`Read ${node.path}`);
            }
          },
        },
        reader
      );

      formatter.output(toPlainTree(root), () =>
        renderTree(formatRootLabel(target), root, {
          maxDirsPerGroup: options.maxDirsPerGroup,
          color: options.color,
        }).trimEnd()
      );

      if (unreadable > 0) {
        formatter.warn(
          `${unreadable} ${unreadable === 1 ? "directory" : "directories"} could not be read`
        );
      }
    });
}
