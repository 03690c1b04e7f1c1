/**
 * Gloss transform tests
 * Self-contained test runner — no external test framework dependencies.
 */
import {
  DEFAULT_CONFIG, GlossConfigError, resolveConfig, withAbbreviations, deepMerge,
  lex, align, tag, describeAbbreviation, formatColumns, ABBREVIATION_PATTERN,
  splitLines, classifyLines, glossBlock, renderGlossBlock,
  escapeHtml, renderInline, renderHtml,
} from "../index.js";
import type { GlossOptions } from "../index.js";
import type { LineNode, WordsNode } from "@glossa/shared-types";

// ─── Mini test runner ─────────────────────────────────────────────────────────

let passed = 0; let failed = 0;
const failures: string[] = [];

function test(name: string, fn: () => void): void {
  try { fn(); passed++; console.log(`  ✓ ${name}`); }
  catch (e: unknown) {
    failed++;
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`  ✗ ${name}\n    ${msg}`);
    failures.push(`${name}: ${msg}`);
  }
}

function eq<T>(actual: T, expected: T, msg?: string): void {
  if (actual !== expected) throw new Error(msg ?? `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
}

function ok(val: unknown, msg?: string): void {
  if (!val) throw new Error(msg ?? `Expected truthy, got ${JSON.stringify(val)}`);
}

function deepEq<T>(actual: T, expected: T, msg?: string): void {
  if (JSON.stringify(actual) !== JSON.stringify(expected))
    throw new Error(msg ?? `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
}

function throws(fn: () => void, check: (e: unknown) => boolean, msg: string): void {
  try { fn(); } catch (e: unknown) {
    if (check(e)) return;
    throw new Error(`${msg}: wrong error ${String(e)}`);
  }
  throw new Error(`${msg}: nothing thrown`);
}

function wordsNode(nodes: ReturnType<typeof glossBlock>["nodes"]): WordsNode {
  const found = nodes.find((n): n is WordsNode => n.kind === "words");
  if (!found) throw new Error("No aligned block in document");
  return found;
}

function lineNodes(nodes: ReturnType<typeof glossBlock>["nodes"]): LineNode[] {
  return nodes.filter((n): n is LineNode => n.kind === "line");
}

const ORIG_AND_FREE = resolveConfig({ firstLineOrig: true, lastLineFree: true });

// ─── Tokenizer ────────────────────────────────────────────────────────────────

console.log("\n── Tokenizer ──");

test("empty and whitespace-only lines yield no tokens", () => {
  deepEq(lex(""), []);
  deepEq(lex("   \t "), []);
});

test("brace group is one token with its interior spaces", () => {
  deepEq(lex("{a b} c"), ["a b", "c"]);
});

test("groups and bare runs mix left to right", () => {
  deepEq(lex("x {y z}w  v"), ["x", "y z", "w", "v"]);
});

test("empty brace group is discarded", () => {
  deepEq(lex("{} a"), ["a"]);
});

test("unbalanced brace degrades to bare runs", () => {
  deepEq(lex("{a b"), ["{a", "b"]);
});

test("a brace group ends at its first closing brace", () => {
  deepEq(lex("{a}b} c"), ["a", "b}", "c"]);
});

test("custom lexer without groups yields whole matches", () => {
  deepEq(lex("a-b c", /[^\s-]+/), ["a", "b", "c"]);
});

// ─── Aligner ──────────────────────────────────────────────────────────────────

console.log("\n── Aligner ──");

test("no lines and all-empty lines give zero columns", () => {
  deepEq(align([]), []);
  deepEq(align([[], []]), []);
});

test("ragged lines are zero-filled in line order", () => {
  deepEq(align([["a", "b", "c"], ["d"], ["e", "f"]]), [["a", "d", "e"], ["b", "", "f"], ["c", "", ""]]);
});

test("column count equals the longest line", () => {
  eq(align([["a"], ["b", "c", "d", "e"], []]).length, 4);
});

// ─── Abbreviation tagger ──────────────────────────────────────────────────────

console.log("\n── Abbreviation tagger ──");

test("text without codes serializes to its escaped self", () => {
  const text = "dog & <cat>";
  deepEq(tag(text, DEFAULT_CONFIG), [{ kind: "text", text }]);
  eq(renderInline(tag(text, DEFAULT_CONFIG)), escapeHtml(text));
});

test("3PL tags the digit and the code separately", () => {
  deepEq(tag("3PL", DEFAULT_CONFIG), [
    { kind: "abbr", text: "3", className: "gloss__abbr", title: "third person" },
    { kind: "abbr", text: "PL", className: "gloss__abbr", title: "plural" },
  ]);
});

test("NPL reads as non-plural", () => {
  deepEq(tag("NPL", DEFAULT_CONFIG), [
    { kind: "abbr", text: "NPL", className: "gloss__abbr", title: "non-plural" },
  ]);
});

test("codes that start with N resolve verbatim first", () => {
  eq(describeAbbreviation("NEG", DEFAULT_CONFIG.abbreviations), "negation / negative");
  eq(describeAbbreviation("NOM", DEFAULT_CONFIG.abbreviations), "nominative");
  eq(describeAbbreviation("N", DEFAULT_CONFIG.abbreviations), "neuter");
  eq(describeAbbreviation("NSG", DEFAULT_CONFIG.abbreviations), "non-singular");
});

test("unknown codes are wrapped without a title", () => {
  deepEq(tag("NXYZ", DEFAULT_CONFIG), [{ kind: "abbr", text: "NXYZ", className: "gloss__abbr" }]);
  deepEq(tag("0", DEFAULT_CONFIG), [{ kind: "abbr", text: "0", className: "gloss__abbr" }]);
});

test("codes inside a morpheme keep the surrounding text", () => {
  deepEq(tag("see.3SG", DEFAULT_CONFIG), [
    { kind: "text", text: "see." },
    { kind: "abbr", text: "3", className: "gloss__abbr", title: "third person" },
    { kind: "abbr", text: "SG", className: "gloss__abbr", title: "singular" },
  ]);
});

test("digits inside a number are not person markers", () => {
  deepEq(tag("13", DEFAULT_CONFIG), [{ kind: "text", text: "13" }]);
});

test("capital runs after lowercase letters are still tagged", () => {
  deepEq(tag("xyDET", DEFAULT_CONFIG), [
    { kind: "text", text: "xy" },
    { kind: "abbr", text: "DET", className: "gloss__abbr", title: "determiner" },
  ]);
  deepEq(tag("ABCd", DEFAULT_CONFIG), [{ kind: "text", text: "ABCd" }]);
});

test("using the exported pattern does not affect later tagging", () => {
  ok(ABBREVIATION_PATTERN.test("xx.ACC.PL"));
  ABBREVIATION_PATTERN.exec("yy.NOM");
  deepEq(tag("a.PL", DEFAULT_CONFIG), [
    { kind: "text", text: "a." },
    { kind: "abbr", text: "PL", className: "gloss__abbr", title: "plural" },
  ]);
});

test("a long unbounded capital run is scanned in linear time", () => {
  const text = `${"A".repeat(200_000)}a`;
  const start = Date.now();
  const segments = tag(text, DEFAULT_CONFIG);
  const elapsed = Date.now() - start;
  deepEq(segments, [{ kind: "text", text }]);
  ok(elapsed < 1000, `Took ${elapsed}ms`);
});

test("empty abbreviation table still wraps every match", () => {
  deepEq(tag("3PL", withAbbreviations({})), [
    { kind: "abbr", text: "3", className: "gloss__abbr" },
    { kind: "abbr", text: "PL", className: "gloss__abbr" },
  ]);
});

test("abbr markup carries the escaped title", () => {
  eq(
    renderInline(tag("dog.NOM", DEFAULT_CONFIG)),
    `dog.<abbr class="gloss__abbr" title="nominative">NOM</abbr>`
  );
});

// ─── Configuration ────────────────────────────────────────────────────────────

console.log("\n── Configuration ──");

test("defaults match the documented flags", () => {
  eq(DEFAULT_CONFIG.lastLineFree, true);
  eq(DEFAULT_CONFIG.firstLineOrig, false);
  eq(DEFAULT_CONFIG.spacing, true);
  eq(DEFAULT_CONFIG.autoTag, true);
  eq(DEFAULT_CONFIG.selector, "[data-gloss]");
});

test("class overrides merge per key", () => {
  const config = resolveConfig({ classes: { abbr: "abbr-x" } });
  eq(config.classes.abbr, "abbr-x");
  eq(config.classes.word, "gloss__word");
});

test("abbreviation overrides extend the default table", () => {
  const config = resolveConfig({ abbreviations: { EVID: "evidential", PL: "many" } });
  eq(config.abbreviations["EVID"], "evidential");
  eq(config.abbreviations["PL"], "many");
  eq(config.abbreviations["SG"], "singular");
  eq(DEFAULT_CONFIG.abbreviations["PL"], "plural", "defaults must not change");
});

test("resolved config is frozen", () => {
  const config = resolveConfig({ spacing: false });
  ok(Object.isFrozen(config));
  ok(Object.isFrozen(config.classes));
  ok(Object.isFrozen(config.abbreviations));
});

test("deepMerge skips undefined leaves and replaces scalars", () => {
  deepEq(deepMerge({ a: "1", b: { c: "2", d: "3" } }, { a: undefined, b: { d: "4" } }), { a: "1", b: { c: "2", d: "4" } });
  deepEq(deepMerge({ a: { b: "1" } }, { a: "flat" }), { a: "flat" });
});

test("invalid option values raise GlossConfigError", () => {
  const untyped: GlossOptions = JSON.parse(`{"spacing":"no"}`);
  throws(
    () => resolveConfig(untyped),
    e => e instanceof GlossConfigError && e.issues.length === 1 && e.issues[0]?.startsWith("spacing:") === true,
    "spacing must be boolean"
  );
});

test("a null table raises GlossConfigError", () => {
  const untyped: GlossOptions = JSON.parse(`{"classes":null}`);
  throws(
    () => resolveConfig(untyped),
    e => e instanceof GlossConfigError && e.issues[0]?.startsWith("classes:") === true,
    "classes must be an object"
  );
});

// ─── Column renderer ──────────────────────────────────────────────────────────

console.log("\n── Column renderer ──");

test("line classes are numbered from the offset", () => {
  const block = formatColumns([["a", "b"]], DEFAULT_CONFIG, { offset: 2, tagName: "li" });
  eq(block.tagName, "li");
  deepEq(block.columns[0]?.lines.map(l => l.classes), [
    ["gloss__line", "gloss__line--2"],
    ["gloss__line", "gloss__line--3"],
  ]);
});

test("blank columns get the spacer class only without spacing", () => {
  const columns = [[" ", " "], ["b", "c"]];
  const spaced = formatColumns(columns, DEFAULT_CONFIG);
  deepEq(spaced.columns.map(c => c.classes), [["gloss__word"], ["gloss__word"]]);

  const tight = formatColumns(columns, resolveConfig({ spacing: false }));
  deepEq(tight.columns.map(c => c.classes), [["gloss__word", "gloss__word--spacer"], ["gloss__word"]]);
});

test("auto-tag off leaves cells literal", () => {
  const block = formatColumns([["PL"]], resolveConfig({ autoTag: false }));
  deepEq(block.columns[0]?.lines[0]?.content, [{ kind: "text", text: "PL" }]);
});

// ─── Block orchestrator ───────────────────────────────────────────────────────

console.log("\n── Block orchestrator ──");

test("splitLines drops terminators only", () => {
  deepEq(splitLines("a\r\n b \n"), ["a", " b "]);
  deepEq(splitLines("a\n\nb"), ["a", "", "b"]);
  deepEq(splitLines(""), []);
});

test("roles are positional", () => {
  deepEq(classifyLines(1, { firstLineOrig: false, lastLineFree: true }), ["analysis"]);
  deepEq(classifyLines(1, { firstLineOrig: true, lastLineFree: true }), ["original"]);
  deepEq(classifyLines(3, { firstLineOrig: true, lastLineFree: true }), ["original", "analysis", "free"]);
  deepEq(classifyLines(3, { firstLineOrig: false, lastLineFree: false }), ["analysis", "analysis", "analysis"]);
});

test("empty and whitespace-only input give an empty document", () => {
  eq(glossBlock("", DEFAULT_CONFIG).nodes.length, 0);
  eq(glossBlock("  \n ", DEFAULT_CONFIG).nodes.length, 0);
});

test("original, analysis and free lines render end to end", () => {
  const doc = glossBlock(
    "the dog sees the cat\nDET dog.NOM see.3SG DET cat.ACC\nthe dog sees the cat",
    ORIG_AND_FREE
  );
  deepEq(doc.nodes.map(n => n.kind), ["line", "words", "line", "line"]);

  const block = wordsNode(doc.nodes);
  eq(block.offset, 1);
  eq(block.columns.length, 5);
  ok(block.columns.every(c => c.lines.length === 1));

  const titles = block.columns.flatMap(c => c.lines.flatMap(l => l.content))
    .flatMap(s => s.kind === "abbr" ? [`${s.text}=${s.title ?? ""}`] : []);
  deepEq(titles, [
    "DET=determiner", "NOM=nominative", "3=third person", "SG=singular", "DET=determiner", "ACC=accusative",
  ]);

  const lines = lineNodes(doc.nodes);
  deepEq(lines.map(l => l.classes.join(" ")), [
    "gloss__line gloss__line--0 gloss__line--original",
    "gloss__line gloss__line--1 gloss__line--hidden",
    "gloss__line gloss__line--2 gloss__line--free",
  ]);
  deepEq(lines.map(l => l.hidden), [false, true, false]);
  deepEq(lines[1]?.content, [{ kind: "text", text: "DET dog.NOM see.3SG DET cat.ACC" }]);
});

test("two lines with original and free produce no aligned block", () => {
  const doc = glossBlock("orig\nfree", ORIG_AND_FREE);
  eq(renderHtml(doc),
    `<p class="gloss__line gloss__line--0 gloss__line--original">orig</p>\n` +
    `<p class="gloss__line gloss__line--1 gloss__line--free">free</p>\n`);
});

test("ragged analysis lines share one block", () => {
  const doc = glossBlock("a b c\nd\nfree", DEFAULT_CONFIG);
  const block = wordsNode(doc.nodes);
  eq(block.offset, 0);
  deepEq(block.columns.map(c => c.lines.map(l => l.index)), [[0, 1], [0, 1], [0, 1]]);
  deepEq(block.columns[2]?.lines[1]?.content, [{ kind: "text", text: "" }]);
});

test("a blank analysis line still yields an empty block", () => {
  const doc = glossBlock("orig\n   \nfree", ORIG_AND_FREE);
  deepEq(doc.nodes.map(n => n.kind), ["line", "words", "line", "line"]);
  eq(wordsNode(doc.nodes).columns.length, 0);
});

test("full HTML for a single analysis line", () => {
  eq(renderGlossBlock("a-1SG\nx"),
    `<div class="gloss__words">\n` +
    `  <div class="gloss__word">\n` +
    `  <p class="gloss__line gloss__line--0">a-<abbr class="gloss__abbr" title="first person">1</abbr>` +
    `<abbr class="gloss__abbr" title="singular">SG</abbr></p>\n` +
    `  </div>\n` +
    `</div>\n` +
    `<p class="gloss__line gloss__line--0 gloss__line--hidden">a-1SG</p>\n` +
    `<p class="gloss__line gloss__line--1 gloss__line--free">x</p>\n`);
});

test("verbatim lines are escaped", () => {
  eq(renderGlossBlock("<b> & 'q'", { firstLineOrig: true }),
    `<p class="gloss__line gloss__line--0 gloss__line--original">&lt;b&gt; &amp; &#39;q&#39;</p>\n`);
});

test("same input twice gives the same document", () => {
  const text = "a.PL b\nc d.NSG\nfree";
  eq(JSON.stringify(glossBlock(text, DEFAULT_CONFIG)), JSON.stringify(glossBlock(text, DEFAULT_CONFIG)));
});

// ─── Results ──────────────────────────────────────────────────────────────────

console.log(`\n${"═".repeat(50)}`);
console.log(`Gloss Tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  console.error("\nFailed tests:");
  failures.forEach(f => console.error(`  ✗ ${f}`));
  throw new Error("Tests failed");
}
