/**
 * Gloss configuration: built-in defaults, the option schema, and the
 * deep merge that turns caller options into a frozen GlossConfig.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AbbreviationTable, GlossClasses } from "@glossa/shared-types";

// ─── Schemas ─────────────────────────────────────────────────────────────────

const ClassesSchema = z.object({
  glossed: z.string(),
  noSpace: z.string(),
  words: z.string(),
  word: z.string(),
  spacer: z.string(),
  abbr: z.string(),
  line: z.string(),
  lineNumPrefix: z.string(),
  original: z.string(),
  freeTranslation: z.string(),
  noAlign: z.string(),
  hidden: z.string(),
}).strict();

const AbbreviationTableSchema = z.record(z.string());

export const GlossConfigSchema = z.object({
  /** Which host elements a caller should treat as glosses; unused by the transform */
  selector: z.string(),
  lastLineFree: z.boolean(),
  firstLineOrig: z.boolean(),
  spacing: z.boolean(),
  autoTag: z.boolean(),
  lexer: z.instanceof(RegExp),
  classes: ClassesSchema,
  abbreviations: AbbreviationTableSchema,
}).strict();

export type GlossConfig = Readonly<z.infer<typeof GlossConfigSchema>>;

/** Everything a caller may override. Nested tables merge per key. */
export const GlossOptionsSchema = GlossConfigSchema.extend({
  classes: ClassesSchema.partial(),
}).partial();

export type GlossOptions = z.infer<typeof GlossOptionsSchema>;

export class GlossConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid gloss configuration: ${issues.join("; ")}`);
    this.name = "GlossConfigError";
    this.issues = issues;
  }
}

// ─── Defaults ────────────────────────────────────────────────────────────────

function loadDefaultAbbreviations(): AbbreviationTable {
  const raw = readFileSync(new URL("./data/abbreviations.json", import.meta.url), "utf8");
  return Object.freeze(AbbreviationTableSchema.parse(JSON.parse(raw)));
}

/** Standard Leipzig glossing abbreviations */
export const DEFAULT_ABBREVIATIONS: Readonly<AbbreviationTable> = loadDefaultAbbreviations();

export const DEFAULT_CLASSES: Readonly<GlossClasses> = Object.freeze({
  glossed: "gloss--glossed",
  noSpace: "gloss--no-space",
  words: "gloss__words",
  word: "gloss__word",
  spacer: "gloss__word--spacer",
  abbr: "gloss__abbr",
  line: "gloss__line",
  lineNumPrefix: "gloss__line--",
  original: "gloss__line--original",
  freeTranslation: "gloss__line--free",
  noAlign: "gloss__line--no-align",
  hidden: "gloss__line--hidden",
});

/** A token is a {…} group (spaces allowed inside) or a run of non-whitespace */
export const DEFAULT_LEXER = /\{([^}]*)\}|(\S+)/g;

export const DEFAULT_CONFIG: GlossConfig = Object.freeze({
  selector: "[data-gloss]",
  lastLineFree: true,
  firstLineOrig: false,
  spacing: true,
  autoTag: true,
  lexer: DEFAULT_LEXER,
  classes: DEFAULT_CLASSES,
  abbreviations: DEFAULT_ABBREVIATIONS,
});

// ─── Merge ───────────────────────────────────────────────────────────────────

export type ConfigValue = string | boolean | RegExp | ConfigRecord | undefined;

export interface ConfigRecord {
  readonly [key: string]: ConfigValue;
}

function isRecord(value: ConfigValue): value is ConfigRecord {
  return typeof value === "object" && value !== null && !(value instanceof RegExp);
}

/**
 * Merge `override` onto `base`. Override wins at the leaves; records present
 * on both sides are merged key by key; undefined leaves are skipped.
 * Neither input is modified.
 */
export function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: Record<string, ConfigValue> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) && current !== undefined && isRecord(current)
      ? deepMerge(current, value)
      : value;
  }
  return result;
}

/**
 * Build the configuration for one invocation. Throws GlossConfigError when
 * the merged record does not describe a valid configuration.
 */
export function resolveConfig(options: GlossOptions = {}, base: GlossConfig = DEFAULT_CONFIG): GlossConfig {
  const parsed = GlossConfigSchema.safeParse(deepMerge(base, options));
  if (!parsed.success) {
    throw new GlossConfigError(
      parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  const config = parsed.data;
  return Object.freeze({
    ...config,
    classes: Object.freeze(config.classes),
    abbreviations: Object.freeze(config.abbreviations),
  });
}

/** Same defaults, but with `table` standing in for the whole abbreviation table */
export function withAbbreviations(table: AbbreviationTable, base: GlossConfig = DEFAULT_CONFIG): GlossConfig {
  return Object.freeze({ ...base, abbreviations: Object.freeze({ ...table }) });
}
