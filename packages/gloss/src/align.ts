/**
 * Transpose per-line token lists into columns.
 *
 * Column i holds token i of every line, in line order, with "" where a line
 * is shorter. The column count is the length of the longest line.
 */
export function align(tokensPerLine: readonly (readonly string[])[]): string[][] {
  const width = tokensPerLine.reduce((max, tokens) => Math.max(max, tokens.length), 0);
  const columns: string[][] = [];
  for (let i = 0; i < width; i++) {
    columns.push(tokensPerLine.map(tokens => tokens[i] ?? ""));
  }
  return columns;
}
