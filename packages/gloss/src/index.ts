/**
 * @glossa/gloss — Public API surface
 * Tokenizer, aligner, abbreviation tagger, column renderer, block
 * orchestrator, HTML serializer and the template-tag adapter.
 */
export {
  DEFAULT_CONFIG, DEFAULT_CLASSES, DEFAULT_ABBREVIATIONS, DEFAULT_LEXER,
  GlossConfigSchema, GlossOptionsSchema, GlossConfigError,
  deepMerge, resolveConfig, withAbbreviations,
} from "./config.js";
export type { GlossConfig, GlossOptions, ConfigRecord, ConfigValue } from "./config.js";
export { lex } from "./lexer.js";
export { align } from "./align.js";
export { ABBREVIATION_PATTERN, ABBREVIATION_RULES, describeAbbreviation, tag, cellContent } from "./tagger.js";
export type { AbbreviationRule } from "./tagger.js";
export { formatColumns, lineClasses } from "./format.js";
export type { FormatOptions } from "./format.js";
export { splitLines, classifyLines, glossBlock, renderGlossBlock } from "./block.js";
export { escapeHtml, renderInline, renderNode, renderHtml } from "./html.js";
export {
  GlossTemplateError, parseTagOptions, tagOptionsToGlossOptions, renderGlossTag, expandGlossTags,
} from "./template.js";
export type { TemplateErrorCode, TagOptionValue } from "./template.js";
