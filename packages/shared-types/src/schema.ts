/**
 * Glossa Document Schema v1.0
 *
 * The structured output of the gloss transform. Every renderer (HTML,
 * JSON over the API, anything a caller writes) reads this tree; nothing
 * in it carries layout or styling beyond class names.
 */

// ─── Configuration tables ────────────────────────────────────────────────────

/** Class names keyed by the semantic role they mark */
export interface GlossClasses {
  /** Added to a container once its gloss has been rendered */
  glossed: string;
  /** Added to a container when `spacing` is off */
  noSpace: string;
  /** The aligned block */
  words: string;
  /** One aligned column */
  word: string;
  /** A column whose cells are all blank (only when `spacing` is off) */
  spacer: string;
  abbr: string;
  line: string;
  /** Prefix of the per-line class; the absolute line index is appended */
  lineNumPrefix: string;
  original: string;
  freeTranslation: string;
  /** Reserved for callers that keep a line out of alignment */
  noAlign: string;
  hidden: string;
}

/** Abbreviation code (case-sensitive, e.g. "NOM", "3") → expanded gloss term */
export type AbbreviationTable = Record<string, string>;

// ─── Lines ───────────────────────────────────────────────────────────────────

export type LineRole = "original" | "analysis" | "free";

export interface TextSegment {
  kind: "text";
  text: string;
}

export interface AbbrSegment {
  kind: "abbr";
  /** The abbreviation exactly as it appeared in the cell */
  text: string;
  className: string;
  /** Absent when the table has no entry for the code */
  title?: string;
}

export type InlineSegment = TextSegment | AbbrSegment;

export interface LineNode {
  kind: "line";
  /** 0-based index of the line in the input block */
  index: number;
  role: LineRole;
  /** True for the raw copies of analysis lines kept under the aligned block */
  hidden: boolean;
  classes: string[];
  content: InlineSegment[];
}

// ─── Aligned block ───────────────────────────────────────────────────────────

export interface WordColumn {
  classes: string[];
  /** One line per analysis line, in input order */
  lines: LineNode[];
}

export interface WordsNode {
  kind: "words";
  /** Element name a markup renderer should use, e.g. "div" or "li" */
  tagName: string;
  classes: string[];
  /** Input index of the first analysis line */
  offset: number;
  columns: WordColumn[];
}

// ─── Document ────────────────────────────────────────────────────────────────

export type GlossNode = LineNode | WordsNode;

export interface GlossDocument {
  nodes: GlossNode[];
}
