/**
 * Lightweight SQL sanity checks.
 *
 * No SQL is executed and no dialect grammar is applied. The checks catch
 * the mistakes that make a snippet unusable as written (empty text,
 * unbalanced brackets or quotes, nothing but comments) and pull out the
 * three-part table references so callers can compare catalogs.
 */

export type SqlCheckResult = { ok: true } | { ok: false; reason: string };

export type SqlTokenKind =
  | "word"
  | "quoted_identifier"
  | "string"
  | "number"
  | "operator"
  | "punctuation"
  | "other";

export interface SqlToken {
  kind: SqlTokenKind;
  text: string;
}

// Order matters: comments and literals before operators.
const TOKEN_RE = new RegExp(
  [
    String.raw`(?<ws>\s+)`,
    String.raw`(?<comment>--[^\n]*|\/\*[\s\S]*?(?:\*\/|$))`,
    String.raw`(?<string>'(?:[^'\\]|\\[\s\S]|'')*(?:'|$)|"(?:[^"\\]|\\[\s\S])*(?:"|$))`,
    String.raw`(?<quoted>` + "`[^`]*(?:`|$))",
    String.raw`(?<number>\d+(?:\.\d+)?(?:[eE][-+]?\d+)?)`,
    String.raw`(?<word>[A-Za-z_][\w$]*)`,
    String.raw`(?<operator><=|>=|<>|!=|\|\||::|[-+*/%=<>|&^~])`,
    String.raw`(?<punct>[(),.;:\[\]{}])`,
    String.raw`(?<other>[\s\S])`,
  ].join("|"),
  "g",
);

/** Tokenize SQL text; whitespace and comments are dropped. */
export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  for (const m of sql.matchAll(TOKEN_RE)) {
    const g = m.groups ?? {};
    if (g.ws !== undefined || g.comment !== undefined) continue;
    const text = m[0];
    if (g.string !== undefined) tokens.push({ kind: "string", text });
    else if (g.quoted !== undefined) tokens.push({ kind: "quoted_identifier", text });
    else if (g.number !== undefined) tokens.push({ kind: "number", text });
    else if (g.word !== undefined) tokens.push({ kind: "word", text });
    else if (g.operator !== undefined) tokens.push({ kind: "operator", text });
    else if (g.punct !== undefined) tokens.push({ kind: "punctuation", text });
    else tokens.push({ kind: "other", text });
  }
  return tokens;
}

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Judge whether `sql` is plausibly well-formed.
 *
 * Bracket counting is over the raw text, so a "(" inside a string literal
 * still counts. Escaped quotes (`\'`) are excluded from the quote count.
 */
export function checkSqlSanity(sql: string): SqlCheckResult {
  if (!sql.trim()) {
    return { ok: false, reason: "Empty SQL query" };
  }
  if (countOf(sql, "(") !== countOf(sql, ")")) {
    return { ok: false, reason: "Unbalanced parentheses" };
  }
  if ((countOf(sql, "'") - countOf(sql, "\\'")) % 2 !== 0) {
    return { ok: false, reason: "Unbalanced single quotes" };
  }
  if (tokenizeSql(sql).length === 0) {
    return { ok: false, reason: "SQL contains no tokens (only comments?)" };
  }
  return { ok: true };
}

// A dotted chain of names, each bare or backtick-quoted.
const NAME_PART = "(?:`[^`]+`|[A-Za-z_]\\w*)";
const NAME_CHAIN_RE = new RegExp(`${NAME_PART}(?:\\.${NAME_PART})*`, "g");

/**
 * Three-part `catalog.schema.table` references in `sql`, backticks
 * stripped, in order of first appearance. Quoting may cover the whole name
 * or each part. Four-part column references yield their table prefix.
 */
export function extractTableReferences(sql: string): string[] {
  const seen = new Set<string>();
  for (const match of sql.matchAll(NAME_CHAIN_RE)) {
    const parts = match[0].replace(/`/g, "").split(".");
    if (parts.length < 3 || parts.slice(0, 3).some((p) => p.length === 0)) continue;
    seen.add(parts.slice(0, 3).join("."));
  }
  return [...seen];
}
