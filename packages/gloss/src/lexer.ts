import { DEFAULT_LEXER } from "./config.js";

/**
 * Split one analysis line into tokens.
 *
 * Each match of `lexer` yields its first non-empty capture group, or the
 * whole match when the pattern has no groups. With the default lexer that
 * is the inside of a {…} group or a run of non-whitespace, so
 * `"{a b} c"` → `["a b", "c"]`. Empty matches (`"{}"`) yield nothing.
 */
export function lex(line: string, lexer: RegExp = DEFAULT_LEXER): string[] {
  if (line.trim() === "") return [];

  const pattern = new RegExp(lexer.source, lexer.flags.includes("g") ? lexer.flags : `${lexer.flags}g`);
  const tokens: string[] = [];

  for (const match of line.matchAll(pattern)) {
    const token = match.length > 1
      ? match.slice(1).find(group => group !== undefined && group !== "")
      : match[0];
    if (token) tokens.push(token);
  }
  return tokens;
}
