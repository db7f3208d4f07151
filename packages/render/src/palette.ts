/**
 * Color palette
 *
 * `color: false` forces plain output; otherwise chalk's own terminal
 * detection decides (NO_COLOR, FORCE_COLOR, TTY).
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";

export type Palette = {
  dir: ChalkInstance;
  file: ChalkInstance;
  summary: ChalkInstance;
  stats: ChalkInstance;
  error: ChalkInstance;
};

export function createPalette(color?: boolean): Palette {
  const c = color === false ? new Chalk({ level: 0 }) : chalk;
  return {
    dir: c.blue.bold,
    file: c.white,
    summary: c.dim,
    stats: c.green.bold,
    error: c.red.bold,
  };
}
