/**
 * HTML serializer for gloss documents.
 */
import type { GlossDocument, GlossNode, InlineSegment, LineNode, WordsNode } from "@glossa/shared-types";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

export function renderInline(segments: readonly InlineSegment[]): string {
  return segments.map(segment => {
    if (segment.kind === "text") return escapeHtml(segment.text);
    const title = segment.title !== undefined ? ` title="${escapeHtml(segment.title)}"` : "";
    return `<abbr class="${escapeHtml(segment.className)}"${title}>${escapeHtml(segment.text)}</abbr>`;
  }).join("");
}

function renderLine(line: LineNode, indent = ""): string {
  return `${indent}<p class="${escapeHtml(line.classes.join(" "))}">${renderInline(line.content)}</p>\n`;
}

function renderWords(block: WordsNode): string {
  let html = `<${block.tagName} class="${escapeHtml(block.classes.join(" "))}">\n`;
  for (const column of block.columns) {
    html += `  <div class="${escapeHtml(column.classes.join(" "))}">\n`;
    for (const line of column.lines) html += renderLine(line, "  ");
    html += "  </div>\n";
  }
  html += `</${block.tagName}>\n`;
  return html;
}

export function renderNode(node: GlossNode): string {
  return node.kind === "line" ? renderLine(node) : renderWords(node);
}

/** One element per node, each terminated by a newline */
export function renderHtml(document: GlossDocument): string {
  return document.nodes.map(renderNode).join("");
}
