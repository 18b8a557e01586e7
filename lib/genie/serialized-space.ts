/**
 * Serialized space codec.
 *
 * Encodes a `GenieSpaceConfig` into the v2 document the Genie API stores,
 * and decodes such a document back into a best-effort configuration.
 *
 * The mapping is lossy both ways:
 *   - example query descriptions have no slot in the document;
 *   - description, purpose and table descriptions survive only inside the
 *     folded text instruction, which decodes as one instruction;
 *   - title and description of a decoded space come from the space record,
 *     not the document.
 *
 * Canonical order: every id-keyed array is sorted by `id`, data source
 * tables by `identifier`. Encoding the same configuration twice produces
 * the same document up to freshly generated ids.
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod/v4";
import { ConfigValidationError } from "@/lib/errors";
import type {
  ExampleQuestionSql,
  JoinSpec,
  SampleQuestion,
  SerializedInstructions,
  SerializedSpace,
  SqlSnippetFilter,
  SqlSnippetMeasure,
  SqlSnippets,
} from "./types";
import {
  tableIdentifier,
  type GenieSpaceConfig,
  type JoinSpecification,
  type SqlMeasure,
  type SqlSnippetsConfig,
} from "./space-config";

/** 32 lowercase hex chars, no hyphens. */
export function generateId(): string {
  return uuidv4().replace(/-/g, "");
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

/** Last dotted segment, backticks stripped. */
function tableAlias(fqn: string): string {
  const clean = fqn.replace(/`/g, "");
  return clean.split(".").pop() ?? clean;
}

function toLines(text: string): string[] {
  return text.split("\n").map((line) => `${line}\n`);
}

// ---------------------------------------------------------------------------
// Canonical ordering
// ---------------------------------------------------------------------------

function sortByKey(arr: unknown, key: "id" | "identifier", normaliseIds: boolean): void {
  if (!Array.isArray(arr)) return;
  const keyOf = (item: unknown): string => {
    const v = child(item, key);
    return typeof v === "string" ? v : "";
  };
  if (normaliseIds) {
    for (const item of arr) {
      if (isRecord(item) && typeof item.id === "string") {
        item.id = item.id.replace(/-/g, "").toLowerCase();
      }
    }
  }
  arr.sort((a, b) => compareText(keyOf(a), keyOf(b)));
}

/**
 * Sort every id-keyed array of a serialized space in place.
 * Unknown sections are left untouched.
 */
export function canonicalizeInPlace(doc: unknown): void {
  sortByKey(child(child(doc, "data_sources"), "tables"), "identifier", false);
  sortByKey(child(child(doc, "data_sources"), "metric_views"), "identifier", false);
  sortByKey(child(child(doc, "config"), "sample_questions"), "id", true);

  const instructions = child(doc, "instructions");
  for (const key of ["text_instructions", "join_specs", "example_question_sqls"]) {
    sortByKey(child(instructions, key), "id", true);
  }
  const snippets = child(instructions, "sql_snippets");
  for (const key of ["measures", "expressions", "filters"]) {
    sortByKey(child(snippets, key), "id", true);
  }
  sortByKey(child(child(doc, "benchmarks"), "questions"), "id", true);
}

/**
 * Canonicalize a serialized space JSON string before it is sent.
 * Text that is not JSON is rejected here rather than by the platform.
 */
export function canonicalizeSerializedJson(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(
      `serialized_space is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  canonicalizeInPlace(parsed);
  return JSON.stringify(parsed);
}

/** Anything that looks like a v2 wire document rather than a configuration. */
export function isSerializedSpace(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && value.version === 2 && "data_sources" in value;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

function buildTextInstructionContent(config: GenieSpaceConfig): string[] {
  const lines: string[] = [];

  lines.push("BUSINESS CONTEXT:\n");
  lines.push(...toLines(config.description));
  lines.push(`Purpose: ${config.purpose}\n`);
  lines.push("\n");

  lines.push("INSTRUCTIONS:\n");
  config.instructions.forEach((instr, i) => {
    const [first = "", ...rest] = instr.content.split("\n");
    const priority = instr.priority !== undefined ? ` [Priority: ${instr.priority}]` : "";
    lines.push(`${i + 1}. ${first}${priority}\n`);
    for (const line of rest) lines.push(`   ${line}\n`);
  });
  lines.push("\n");

  if (config.tables.length > 0) {
    lines.push("DATA SOURCES:\n");
    for (const t of config.tables) {
      lines.push(t.description ? `- ${tableIdentifier(t)} - ${t.description}\n` : `- ${tableIdentifier(t)}\n`);
    }
    lines.push("\n");
  }

  return lines;
}

function encodeJoin(join: JoinSpecification): JoinSpec {
  const joinType = join.join_type.toUpperCase();
  const leftAlias = tableAlias(join.left_table);
  let rightAlias = tableAlias(join.right_table);
  if (rightAlias === leftAlias) rightAlias = `${rightAlias}_2`;

  const instruction = [join.description, join.instruction].filter(
    (s): s is string => typeof s === "string" && s.length > 0,
  );

  return {
    id: generateId(),
    left: { identifier: join.left_table, alias: leftAlias },
    right: { identifier: join.right_table, alias: rightAlias },
    sql: [joinType === "INNER" ? join.join_condition : `${joinType} JOIN: ${join.join_condition}`],
    ...(instruction.length > 0 ? { instruction } : {}),
  };
}

function encodeMeasure(m: SqlMeasure): SqlSnippetMeasure {
  return {
    id: generateId(),
    alias: m.alias,
    sql: [m.sql],
    display_name: m.display_name ?? m.alias,
    ...(m.synonyms && m.synonyms.length > 0 ? { synonyms: m.synonyms } : {}),
    ...(m.instruction ? { instruction: [m.instruction] } : {}),
  };
}

function encodeSnippets(snippets: SqlSnippetsConfig | undefined): SqlSnippets | undefined {
  if (!snippets) return undefined;
  const out: SqlSnippets = {};
  if (snippets.measures.length > 0) out.measures = snippets.measures.map(encodeMeasure);
  if (snippets.expressions.length > 0) out.expressions = snippets.expressions.map(encodeMeasure);
  if (snippets.filters.length > 0) {
    out.filters = snippets.filters.map(
      (f): SqlSnippetFilter => ({
        id: generateId(),
        sql: [f.sql],
        display_name: f.display_name,
        ...(f.synonyms && f.synonyms.length > 0 ? { synonyms: f.synonyms } : {}),
      }),
    );
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/** Example questions first, then benchmarks; repeated text is kept once. */
function buildSampleQuestions(config: GenieSpaceConfig): SampleQuestion[] {
  const seen = new Set<string>();
  const out: SampleQuestion[] = [];
  const texts = [
    ...config.example_sql_queries.map((e) => e.question),
    ...config.benchmark_questions.map((b) => b.question),
  ];
  for (const text of texts) {
    if (seen.has(text)) continue;
    seen.add(text);
    out.push({ id: generateId(), question: [text] });
  }
  return out;
}

/**
 * Encode a validated configuration into a v2 serialized space.
 *
 * `instructions` is present only when at least one of its sections is
 * non-empty; `config` only when there is at least one sample question.
 */
export function encodeSpaceConfig(config: GenieSpaceConfig): SerializedSpace {
  const doc: SerializedSpace = {
    version: 2,
    data_sources: {
      tables: config.tables.map((t) => ({ identifier: tableIdentifier(t) })),
    },
  };

  const sampleQuestions = buildSampleQuestions(config);
  if (sampleQuestions.length > 0) {
    doc.config = { sample_questions: sampleQuestions };
  }

  const instructions: SerializedInstructions = {};

  if (config.instructions.length > 0) {
    instructions.text_instructions = [
      { id: generateId(), content: buildTextInstructionContent(config) },
    ];
  }

  if (config.join_specifications.length > 0) {
    instructions.join_specs = config.join_specifications.map(encodeJoin);
  }

  const snippets = encodeSnippets(config.sql_snippets);
  if (snippets) instructions.sql_snippets = snippets;

  if (config.example_sql_queries.length > 0) {
    instructions.example_question_sqls = config.example_sql_queries.map(
      (e): ExampleQuestionSql => ({
        id: generateId(),
        question: [e.question],
        sql: [e.sql_query],
      }),
    );
  }

  if (Object.keys(instructions).length > 0) {
    doc.instructions = instructions;
  }

  canonicalizeInPlace(doc);
  return doc;
}

/** Fields of the configuration that the encoded document will not carry. */
export function describeEncodingLoss(config: GenieSpaceConfig): string[] {
  const notes: string[] = [];
  config.example_sql_queries.forEach((e, i) => {
    if (e.description) {
      notes.push(
        `Example query #${i + 1} has a description, which the serialized space format does not store; it will be dropped`,
      );
    }
  });
  if (config.instructions.length === 0) {
    notes.push(
      "No instructions: purpose and table descriptions are only stored inside the text instruction and will be dropped",
    );
  }
  return notes;
}

// ---------------------------------------------------------------------------
// Extend
// ---------------------------------------------------------------------------

export interface SpaceAdditions {
  /** catalog.schema.table identifiers. */
  tables: string[];
  instructions: string[];
}

function recordAt(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parent[key];
  if (isRecord(value)) return value;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function arrayAt(parent: Record<string, unknown>, key: string): unknown[] {
  const value = parent[key];
  if (Array.isArray(value)) return value;
  const created: unknown[] = [];
  parent[key] = created;
  return created;
}

/**
 * Add tables and instructions to a stored serialized space without
 * decoding it, so nothing the configuration model cannot express is lost.
 * Tables already present are skipped. Instructions are appended to the
 * first text instruction, separated by a blank line.
 */
export function extendSerializedSpace(raw: string, additions: SpaceAdditions) {
  const doc: unknown = JSON.parse(canonicalizeSerializedJson(raw));
  if (!isSerializedSpace(doc)) {
    throw new ConfigValidationError("Input is not a valid serialized space");
  }

  const tables = arrayAt(recordAt(doc, "data_sources"), "tables");
  const present = new Set(tables.map((t) => child(t, "identifier")));
  const tablesAdded: string[] = [];
  for (const fqn of additions.tables) {
    if (present.has(fqn)) continue;
    present.add(fqn);
    tables.push({ identifier: fqn });
    tablesAdded.push(fqn);
  }

  if (additions.instructions.length > 0) {
    const texts = arrayAt(recordAt(doc, "instructions"), "text_instructions");
    let target = texts.find(isRecord);
    if (!target) {
      target = { id: generateId(), content: [] };
      texts.push(target);
    }
    const content = arrayAt(target, "content");
    for (const text of additions.instructions) {
      if (content.length > 0) content.push("\n");
      content.push(...toLines(text));
    }
  }

  canonicalizeInPlace(doc);
  return {
    serializedSpace: JSON.stringify(doc),
    tablesAdded,
    instructionsAdded: additions.instructions.length,
  };
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

// Decoding is best-effort: a malformed entry is dropped, never the document.

/** String lines; a bare string counts as one line and anything else as none. */
const TextLines = z.unknown().transform((value): string[] => {
  if (typeof value === "string") return [value];
  return Array.isArray(value) ? value.filter((line): line is string => typeof line === "string") : [];
});

/** The elements of an array that match `item`; non-arrays decode as empty. */
function listOf<T extends z.ZodType>(item: T) {
  return z.unknown().transform((value): z.output<T>[] =>
    Array.isArray(value)
      ? value.flatMap((element) => {
          const parsed = item.safeParse(element);
          return parsed.success ? [parsed.data] : [];
        })
      : [],
  );
}

const Identified = z.object({ identifier: z.string() });

const WireSnippetSchema = z.object({
  alias: z.string().optional(),
  sql: TextLines,
  display_name: z.string().optional(),
  synonyms: z.array(z.string()).optional().catch(undefined),
  instruction: TextLines,
});

const WireSpaceSchema = z.object({
  version: z.number().optional(),
  data_sources: z.object({ tables: listOf(Identified) }).optional(),
  config: z.object({ sample_questions: listOf(z.object({ question: TextLines })) }).optional(),
  instructions: z
    .object({
      text_instructions: listOf(z.object({ content: TextLines })),
      join_specs: listOf(
        z.object({
          left: Identified.optional(),
          right: Identified.optional(),
          sql: TextLines,
          instruction: TextLines,
        }),
      ),
      sql_snippets: z
        .object({
          measures: listOf(WireSnippetSchema),
          expressions: listOf(WireSnippetSchema),
          filters: listOf(WireSnippetSchema),
        })
        .optional(),
      example_question_sqls: listOf(z.object({ question: TextLines, sql: TextLines })),
    })
    .optional(),
});

type WireSnippet = z.output<typeof WireSnippetSchema>;

const JOIN_PREFIX_RE = /^(INNER|LEFT|RIGHT|FULL|CROSS) JOIN: ([\s\S]*)$/i;

export interface DecodeMetadata {
  title?: string;
  description?: string;
}

export const IMPORTED_DEFAULTS = {
  space_name: "Imported Space",
  description: "Imported from Databricks",
  purpose: "Configuration imported from existing Genie space",
} as const;

function decodeSnippet(s: WireSnippet): SqlMeasure | undefined {
  if (!s.alias) return undefined;
  return {
    alias: s.alias,
    sql: s.sql[0] ?? "",
    display_name: s.display_name ?? s.alias,
    ...(s.synonyms && s.synonyms.length > 0 ? { synonyms: s.synonyms } : {}),
    ...(s.instruction[0] ? { instruction: s.instruction[0] } : {}),
  };
}

/**
 * Decode a serialized space (JSON text or parsed object) into a configuration.
 *
 * Only tables with three-part identifiers are kept. Sample questions become
 * benchmark questions. Sections that are missing decode as empty lists.
 * Throws `ConfigValidationError` when the input is not a wire document.
 */
export function decodeSerializedSpace(
  input: unknown,
  meta: DecodeMetadata = {},
): GenieSpaceConfig {
  let raw: unknown = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw new ConfigValidationError(
        `Serialized space is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const parsed = WireSpaceSchema.safeParse(raw);
  if (!parsed.success || !isRecord(raw)) {
    const issues = parsed.success
      ? ["expected an object"]
      : parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigValidationError("Input is not a valid serialized space", issues);
  }
  const doc = parsed.data;
  const instr = doc.instructions;

  const tables = (doc.data_sources?.tables ?? []).flatMap((t) => {
    const parts = t.identifier.replace(/`/g, "").split(".");
    if (parts.length !== 3 || parts.some((p) => p.length === 0)) return [];
    const [catalog_name, schema_name, table_name] = parts;
    return [{ catalog_name, schema_name, table_name }];
  });

  const benchmark_questions = (doc.config?.sample_questions ?? []).flatMap((q) => {
    const text = q.question[0]?.trim();
    return text ? [{ question: text }] : [];
  });

  const instructions = (instr?.text_instructions ?? []).flatMap((t) => {
    const content = t.content.join("").trim();
    return content ? [{ content }] : [];
  });

  const join_specifications = (instr?.join_specs ?? []).flatMap((j) => {
    const sql = j.sql[0]?.trim();
    if (!j.left?.identifier || !j.right?.identifier || !sql) return [];
    const match = JOIN_PREFIX_RE.exec(sql);
    const join: JoinSpecification = {
      left_table: j.left.identifier,
      right_table: j.right.identifier,
      join_type: match ? match[1].toUpperCase() : "INNER",
      join_condition: match ? match[2].trim() : sql,
    };
    if (j.instruction.length >= 2) {
      join.description = j.instruction[0];
      join.instruction = j.instruction.slice(1).join("\n");
    } else if (j.instruction.length === 1) {
      join.instruction = j.instruction[0];
    }
    return join.join_condition ? [join] : [];
  });

  const example_sql_queries = (instr?.example_question_sqls ?? []).flatMap((e) => {
    const question = e.question[0]?.trim();
    return question ? [{ question, sql_query: e.sql[0] ?? "" }] : [];
  });

  let sql_snippets: SqlSnippetsConfig | undefined;
  if (instr?.sql_snippets) {
    const s = instr.sql_snippets;
    sql_snippets = {
      measures: s.measures.flatMap((m) => decodeSnippet(m) ?? []),
      expressions: s.expressions.flatMap((m) => decodeSnippet(m) ?? []),
      filters: s.filters.map((f) => ({
        sql: f.sql[0] ?? "",
        display_name: f.display_name ?? f.sql[0] ?? "filter",
        ...(f.synonyms && f.synonyms.length > 0 ? { synonyms: f.synonyms } : {}),
      })),
    };
  }

  return {
    space_name: meta.title || IMPORTED_DEFAULTS.space_name,
    description: meta.description || IMPORTED_DEFAULTS.description,
    purpose: IMPORTED_DEFAULTS.purpose,
    tables,
    join_specifications,
    instructions,
    example_sql_queries,
    benchmark_questions,
    ...(sql_snippets ? { sql_snippets } : {}),
    enable_data_sampling: false,
  };
}
