/**
 * @glossa/shared-types — Public API surface
 */
export type {
  GlossClasses, AbbreviationTable,
  LineRole, TextSegment, AbbrSegment, InlineSegment, LineNode,
  WordColumn, WordsNode, GlossNode, GlossDocument,
} from "./schema.js";
