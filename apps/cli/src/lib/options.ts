import type { WalkOptions } from "@dirshape/tree";
import { z } from "zod";
import type { Config } from "./config";

/** Raw flag values as commander hands them over */
export type TreeFlags = {
  files?: string;
  dirs?: string;
  level?: string;
  color?: boolean;
};

export type TreeOptions = {
  walk: WalkOptions;
  maxDirsPerGroup?: number;
  /** false forces plain output; undefined lets the terminal decide */
  color?: false;
};

// Blank input is rejected before coercion, which would read it as 0
const limitFlag = (flag: string) =>
  z
    .string()
    .trim()
    .min(1, `${flag} must be a number`)
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${flag} must be a number` })
        .int(`${flag} must be an integer`)
        .min(0, `${flag} must be >= 0`)
    );

const TreeFlagsSchema = z.object({
  files: limitFlag("--files").optional(),
  dirs: limitFlag("--dirs").optional(),
  level: limitFlag("--level").optional(),
});

/** 0 on the command line means "no bound" */
function bound(value: number): number | undefined {
  return value === 0 ? undefined : value;
}

/**
 * Validate flag values and merge them over the configured defaults.
 *
 * @throws Error naming the first invalid flag, e.g. "--files must be >= 0"
 */
export function parseTreeOptions(flags: TreeFlags, config: Config): TreeOptions {
  const parsed = TreeFlagsSchema.safeParse({
    files: flags.files,
    dirs: flags.dirs,
    level: flags.level,
  });
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? "Invalid options");
  }

  const files = parsed.data.files ?? config.files;
  const dirs = parsed.data.dirs ?? config.dirs;
  const level = parsed.data.level ?? config.level;

  const options: TreeOptions = {
    walk: {
      maxFilesPerDir: bound(files),
      maxDepth: bound(level),
    },
    maxDirsPerGroup: bound(dirs),
  };
  if (flags.color === false || !config.color) {
    options.color = false;
  }
  return options;
}
