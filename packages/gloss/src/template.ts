/**
 * Template-tag adapter.
 *
 * Expands `{% gloss first_line_orig: true %} … {% endgloss %}` blocks in a
 * template document into rendered gloss markup. Options in the opening tag
 * are `key: value` pairs; "true"/"false" become booleans.
 */
import type { GlossConfig, GlossOptions } from "./config.js";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { glossBlock } from "./block.js";
import { escapeHtml, renderHtml } from "./html.js";

export type TemplateErrorCode = "UNTERMINATED_TAG" | "UNEXPECTED_END_TAG" | "INVALID_OPTION";

export class GlossTemplateError extends Error {
  readonly code: TemplateErrorCode;

  constructor(code: TemplateErrorCode, message: string) {
    super(message);
    this.name = "GlossTemplateError";
    this.code = code;
  }
}

export type TagOptionValue = string | boolean;

// ─── Option parsing ──────────────────────────────────────────────────────────

export function parseTagOptions(markup: string): Record<string, TagOptionValue> {
  const options: Record<string, TagOptionValue> = {};
  for (const [, key, value] of markup.matchAll(/(\w+)\s*:\s*(\w+)/g)) {
    if (key === undefined || value === undefined) continue;
    const lower = value.toLowerCase();
    options[key] = lower === "true" ? true : lower === "false" ? false : value;
  }
  return options;
}

const BOOLEAN_TAG_OPTIONS = {
  last_line_free: "lastLineFree",
  first_line_orig: "firstLineOrig",
  spacing: "spacing",
  auto_tag: "autoTag",
} as const;

type BooleanTagOption = keyof typeof BOOLEAN_TAG_OPTIONS;

function isBooleanTagOption(key: string): key is BooleanTagOption {
  return Object.hasOwn(BOOLEAN_TAG_OPTIONS, key);
}

/** Map tag options onto GlossOptions. Unknown keys are ignored. */
export function tagOptionsToGlossOptions(raw: Record<string, TagOptionValue>): GlossOptions {
  const options: GlossOptions = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isBooleanTagOption(key)) {
      if (typeof value !== "boolean") {
        throw new GlossTemplateError("INVALID_OPTION", `Option "${key}" expects true or false, got "${value}".`);
      }
      options[BOOLEAN_TAG_OPTIONS[key]] = value;
    } else if (key === "selector") {
      options.selector = String(value);
    }
  }
  return options;
}

// ─── Rendering ───────────────────────────────────────────────────────────────

function containerClasses(config: GlossConfig): string {
  const classes = ["gloss", config.classes.glossed];
  if (!config.spacing) classes.push(config.classes.noSpace);
  return classes.join(" ");
}

/** Render one tag body and wrap it in its container */
export function renderGlossTag(content: string, markup = "", base: GlossConfig = DEFAULT_CONFIG): string {
  const config = resolveConfig(tagOptionsToGlossOptions(parseTagOptions(markup)), base);
  const body = renderHtml(glossBlock(content.trim(), config));
  return `<div class="${escapeHtml(containerClasses(config))}">\n${body}</div>`;
}

const GLOSS_TAG = /\{%-?\s*gloss\b(.*?)-?%\}([\s\S]*?)\{%-?\s*endgloss\s*-?%\}/g;
const OPEN_TAG = /\{%-?\s*gloss\b/;
const END_TAG = /\{%-?\s*endgloss\s*-?%\}/;

/**
 * Replace every gloss tag in `source` with its rendering. Text outside the
 * tags is returned unchanged.
 */
export function expandGlossTags(source: string, base: GlossConfig = DEFAULT_CONFIG): string {
  let output = "";
  let cursor = 0;

  for (const match of source.matchAll(GLOSS_TAG)) {
    const start = match.index ?? cursor;
    output += checkOutsideText(source.slice(cursor, start), cursor);
    output += renderGlossTag(match[2] ?? "", match[1] ?? "", base);
    cursor = start + match[0].length;
  }

  output += checkOutsideText(source.slice(cursor), cursor);
  return output;
}

function checkOutsideText(text: string, offset: number): string {
  const open = OPEN_TAG.exec(text);
  if (open) {
    throw new GlossTemplateError("UNTERMINATED_TAG", `gloss tag at offset ${offset + open.index} has no matching endgloss.`);
  }
  const end = END_TAG.exec(text);
  if (end) {
    throw new GlossTemplateError("UNEXPECTED_END_TAG", `endgloss at offset ${offset + end.index} has no opening gloss tag.`);
  }
  return text;
}
