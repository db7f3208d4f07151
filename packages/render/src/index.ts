/**
 * @dirshape/render
 *
 * Turns a walked tree into display items and text lines.
 */

export { type DisplayItem, type DisplayOptions, displayItems } from "./items.ts";
export { createPalette, type Palette } from "./palette.ts";
export { formatRootLabel, type RenderOptions, renderLines, renderTree } from "./renderer.ts";
