/**
 * Abbreviation tagger.
 * Finds morphological gloss codes inside a cell ("3SG", "NOM", "NPL") and
 * annotates each with its expanded meaning from the abbreviation table.
 */
import type { AbbreviationTable, InlineSegment } from "@glossa/shared-types";
import type { GlossConfig } from "./config.js";

/**
 * A person digit 0–4 on its own or directly before a capital ("3" in "3SG"),
 * or an optional N followed by capitals up to a word boundary ("PL", "NSG").
 * A capital run is only tried from its first letter; a run that fails there
 * fails from every later letter too.
 */
export const ABBREVIATION_PATTERN = /(\b[0-4])(?=[A-Z]|\b)|(?<![A-Z])(N?[A-Z]+\b)/;

// ─── Resolution rules ────────────────────────────────────────────────────────

export interface AbbreviationRule {
  ruleId: string;
  /** Description for `key`, or undefined to defer to the next rule */
  resolve(key: string, table: Readonly<AbbreviationTable>): string | undefined;
}

function lookup(table: Readonly<AbbreviationTable>, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/** Tried in order; the first description found wins. */
export const ABBREVIATION_RULES: readonly AbbreviationRule[] = [
  {
    // Codes that merely start with N ("NEG", "NOM") are real entries first
    ruleId: "exact",
    resolve: (key, table) => lookup(table, key),
  },
  {
    // N + known code reads as its negation: NPL → "non-plural"
    ruleId: "negated",
    resolve: (key, table) => {
      if (!key.startsWith("N") || key.length < 2) return undefined;
      const plain = lookup(table, key.slice(1));
      return plain === undefined ? undefined : `non-${plain}`;
    },
  },
];

export function describeAbbreviation(key: string, table: Readonly<AbbreviationTable>): string | undefined {
  for (const rule of ABBREVIATION_RULES) {
    const description = rule.resolve(key, table);
    if (description !== undefined) return description;
  }
  return undefined;
}

// ─── Tagging ─────────────────────────────────────────────────────────────────

/**
 * Split `text` into literal and abbreviation segments. Every match is
 * wrapped, with a title only when one of the rules resolves it.
 */
export function tag(text: string, config: Pick<GlossConfig, "abbreviations" | "classes">): InlineSegment[] {
  const segments: InlineSegment[] = [];
  let cursor = 0;
  const pattern = new RegExp(ABBREVIATION_PATTERN.source, "g");

  for (const match of text.matchAll(pattern)) {
    const key = match[0];
    const start = match.index ?? cursor;
    if (start > cursor) segments.push({ kind: "text", text: text.slice(cursor, start) });

    const title = describeAbbreviation(key, config.abbreviations);
    segments.push({
      kind: "abbr",
      text: key,
      className: config.classes.abbr,
      ...(title !== undefined ? { title } : {}),
    });
    cursor = start + key.length;
  }

  if (cursor < text.length) segments.push({ kind: "text", text: text.slice(cursor) });
  return segments;
}

/** A cell's content: tagged when auto-tagging is on and the cell has text, literal otherwise */
export function cellContent(cell: string, config: GlossConfig): InlineSegment[] {
  if (config.autoTag && cell.trim() !== "") return tag(cell, config);
  return [{ kind: "text", text: cell }];
}
