import type { LineNode, WordColumn, WordsNode } from "@glossa/shared-types";
import type { GlossConfig } from "./config.js";
import { cellContent } from "./tagger.js";

export interface FormatOptions {
  /** Element name for the block, e.g. "div" or "li" */
  tagName?: string;
  /** Input index of the first analysis line; row r is numbered offset + r */
  offset?: number;
}

/** Classes shared by every paragraph of line `index` */
export function lineClasses(index: number, config: GlossConfig): string[] {
  return [config.classes.line, `${config.classes.lineNumPrefix}${index}`];
}

/**
 * Build the aligned block: one column node per column, one paragraph per
 * analysis line inside it. Every column is kept, blank ones included.
 */
export function formatColumns(
  columns: readonly (readonly string[])[],
  config: GlossConfig,
  options: FormatOptions = {}
): WordsNode {
  const { tagName = "div", offset = 0 } = options;

  const words = columns.map((column): WordColumn => {
    const lines = column.map((cell, row): LineNode => ({
      kind: "line",
      index: offset + row,
      role: "analysis",
      hidden: false,
      classes: lineClasses(offset + row, config),
      content: cellContent(cell, config),
    }));

    const classes = [config.classes.word];
    if (!config.spacing && column.every(cell => cell.trim() === "")) {
      classes.push(config.classes.spacer);
    }
    return { classes, lines };
  });

  return { kind: "words", tagName, classes: [config.classes.words], offset, columns: words };
}
