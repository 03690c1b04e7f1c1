/**
 * Block orchestration: classify the lines of one gloss, align the analysis
 * lines, and put the aligned block back among the verbatim lines.
 */
import type { GlossDocument, GlossNode, LineNode, LineRole } from "@glossa/shared-types";
import type { GlossConfig, GlossOptions } from "./config.js";
import { resolveConfig } from "./config.js";
import { lex } from "./lexer.js";
import { align } from "./align.js";
import { formatColumns, lineClasses } from "./format.js";
import { renderHtml } from "./html.js";

/** Split on "\n", dropping one trailing "\r" per line. A final newline adds no line. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n").map(line => line.endsWith("\r") ? line.slice(0, -1) : line);
  if (text.endsWith("\n")) lines.pop();
  return lines;
}

/** Role of every line, decided by position alone */
export function classifyLines(count: number, config: Pick<GlossConfig, "firstLineOrig" | "lastLineFree">): LineRole[] {
  const roles: LineRole[] = [];
  for (let i = 0; i < count; i++) {
    if (config.firstLineOrig && i === 0) roles.push("original");
    else if (config.lastLineFree && count >= 2 && i === count - 1) roles.push("free");
    else roles.push("analysis");
  }
  return roles;
}

function verbatimLine(text: string, index: number, role: LineRole, config: GlossConfig): LineNode {
  const classes = lineClasses(index, config);
  if (role === "original") classes.push(config.classes.original);
  else if (role === "free") classes.push(config.classes.freeTranslation);
  else classes.push(config.classes.hidden);

  return {
    kind: "line",
    index,
    role,
    hidden: role === "analysis",
    classes,
    content: [{ kind: "text", text }],
  };
}

/**
 * Transform one gloss block into a document.
 *
 * Blank input gives an empty document. Without analysis lines every line
 * is emitted as a plain role-classed paragraph. Otherwise the aligned
 * block is inserted before the first analysis line, and every analysis
 * line is still emitted, hidden.
 */
export function glossBlock(text: string, config: GlossConfig): GlossDocument {
  if (text.trim() === "") return { nodes: [] };

  const lines = splitLines(text);
  const roles = classifyLines(lines.length, config);
  const analysisIndices = roles.flatMap((role, i) => role === "analysis" ? [i] : []);
  const firstAnalysis = analysisIndices[0];

  const nodes: GlossNode[] = [];
  lines.forEach((line, i) => {
    const role = roles[i] ?? "analysis";
    if (i === firstAnalysis) {
      const columns = align(analysisIndices.map(j => lex(lines[j] ?? "", config.lexer)));
      nodes.push(formatColumns(columns, config, { offset: firstAnalysis }));
    }
    nodes.push(verbatimLine(line, i, role, config));
  });

  return { nodes };
}

/** Resolve options, transform, and serialize to HTML in one call */
export function renderGlossBlock(text: string, options: GlossOptions = {}): string {
  return renderHtml(glossBlock(text, resolveConfig(options)));
}
