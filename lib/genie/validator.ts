/**
 * Configuration validator.
 *
 * Scores a Genie space configuration from 0 to 100 in four stages:
 *   1. schema     (failure here stops everything with score 0)
 *   2. completeness
 *   3. embedded SQL sanity
 *   4. instruction quality
 *
 * Each stage starts from 100 and deducts per finding. The reported score is
 * the lowest stage score, never below 0. Findings are split into errors
 * (the configuration is not valid) and warnings (it is valid but weak).
 */

import { decodeSerializedSpace, isSerializedSpace } from "./serialized-space";
import { parseSpaceConfig, tableIdentifier, type GenieSpaceConfig } from "./space-config";
import { checkSqlSanity, extractTableReferences } from "./sql-check";

export interface ValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  score: number;
}

export interface ValidateOptions {
  /** Run the embedded SQL stage (default true). */
  validateSql?: boolean;
  /** Warn about tables and SQL references outside this catalog. */
  catalogName?: string;
}

interface StageResult {
  errors: string[];
  warnings: string[];
  score: number;
}

// ---------------------------------------------------------------------------
// Deductions
// ---------------------------------------------------------------------------

export const DEDUCTIONS = {
  noTables: 40,
  noInstructions: 10,
  noExamples: 10,
  shortName: 5,
  shortDescription: 5,
  duplicateAlias: 5,
  invalidExampleSql: 15,
  invalidSnippetSql: 5,
  vagueInstruction: 5,
  shortInstruction: 3,
  instructionWithoutCode: 3,
} as const;

const MIN_NAME_LENGTH = 5;
const MIN_DESCRIPTION_LENGTH = 20;
const MIN_INSTRUCTION_WORDS = 10;

/** Matched as case-insensitive substrings. */
export const VAGUE_TERMS = ["appropriate", "relevant", "good", "properly", "as needed"] as const;

function stage(): StageResult {
  return { errors: [], warnings: [], score: 100 };
}

// ---------------------------------------------------------------------------
// Stage 2: completeness
// ---------------------------------------------------------------------------

export function checkCompleteness(config: GenieSpaceConfig, catalogName?: string): StageResult {
  const r = stage();

  if (config.tables.length === 0) {
    r.errors.push("No tables specified - at least one table is required");
    r.score -= DEDUCTIONS.noTables;
  }
  if (config.instructions.length === 0) {
    r.warnings.push("No instructions provided - consider adding guidance");
    r.score -= DEDUCTIONS.noInstructions;
  }
  if (config.example_sql_queries.length === 0) {
    r.warnings.push("No example SQL queries - consider adding examples");
    r.score -= DEDUCTIONS.noExamples;
  }
  if (config.space_name.length < MIN_NAME_LENGTH) {
    r.warnings.push("Space name is very short - use descriptive names");
    r.score -= DEDUCTIONS.shortName;
  }
  if (config.description.length < MIN_DESCRIPTION_LENGTH) {
    r.warnings.push("Description is very short - provide more context");
    r.score -= DEDUCTIONS.shortDescription;
  }

  const snippets = config.sql_snippets;
  if (snippets) {
    for (const [kind, items] of [
      ["measure", snippets.measures],
      ["expression", snippets.expressions],
    ] as const) {
      const seen = new Set<string>();
      for (const item of items) {
        if (seen.has(item.alias)) {
          r.warnings.push(`Duplicate ${kind} alias '${item.alias}'`);
          r.score -= DEDUCTIONS.duplicateAlias;
        }
        seen.add(item.alias);
      }
    }
  }

  const known = new Set(config.tables.map(tableIdentifier));
  config.join_specifications.forEach((j, i) => {
    for (const side of [j.left_table, j.right_table]) {
      if (!known.has(side.replace(/`/g, ""))) {
        r.warnings.push(`Join #${i + 1} references table '${side}' that is not in tables`);
      }
    }
  });

  config.example_sql_queries.forEach((e, i) => {
    if (e.description) {
      r.warnings.push(
        `Example query #${i + 1} description will be dropped (not stored by the serialized space format)`,
      );
    }
  });

  if (catalogName) {
    for (const t of config.tables) {
      if (t.catalog_name !== catalogName) {
        r.warnings.push(`Table '${tableIdentifier(t)}' is not in catalog '${catalogName}'`);
      }
    }
  }

  return r;
}

// ---------------------------------------------------------------------------
// Stage 3: embedded SQL
// ---------------------------------------------------------------------------

export function checkEmbeddedSql(config: GenieSpaceConfig, catalogName?: string): StageResult {
  const r = stage();
  const referenced = new Set<string>();

  const check = (sql: string, label: string, deduction: number) => {
    const result = checkSqlSanity(sql);
    if (!result.ok) {
      r.errors.push(`${label} has invalid SQL: ${result.reason}`);
      r.score -= deduction;
      return;
    }
    for (const fqn of extractTableReferences(sql)) referenced.add(fqn);
  };

  config.example_sql_queries.forEach((e, i) =>
    check(e.sql_query, `Example query #${i + 1}`, DEDUCTIONS.invalidExampleSql),
  );

  const snippets = config.sql_snippets;
  if (snippets) {
    snippets.filters.forEach((f, i) => check(f.sql, `Filter #${i + 1}`, DEDUCTIONS.invalidSnippetSql));
    for (const e of snippets.expressions) {
      check(e.sql, `Expression '${e.alias}'`, DEDUCTIONS.invalidSnippetSql);
    }
    for (const m of snippets.measures) {
      check(m.sql, `Measure '${m.alias}'`, DEDUCTIONS.invalidSnippetSql);
    }
  }

  if (catalogName) {
    for (const fqn of referenced) {
      const catalog = fqn.split(".")[0];
      if (catalog !== catalogName) {
        r.warnings.push(`SQL references '${fqn}' outside catalog '${catalogName}'`);
      }
    }
  }

  return r;
}

// ---------------------------------------------------------------------------
// Stage 4: instruction quality
// ---------------------------------------------------------------------------

export function checkInstructionQuality(config: GenieSpaceConfig): StageResult {
  const r = stage();

  config.instructions.forEach((instr, i) => {
    const label = `Instruction #${i + 1}`;
    const lower = instr.content.toLowerCase();

    const vague = VAGUE_TERMS.filter((term) => lower.includes(term));
    if (vague.length > 0) {
      r.warnings.push(`${label} uses vague terms (${vague.join(", ")}) - be specific`);
      r.score -= DEDUCTIONS.vagueInstruction;
    }

    const words = instr.content.trim().split(/\s+/).filter(Boolean).length;
    if (words < MIN_INSTRUCTION_WORDS) {
      r.warnings.push(`${label} is very short (${words} words) - add detail`);
      r.score -= DEDUCTIONS.shortInstruction;
    }

    if (!instr.content.includes("`")) {
      r.warnings.push(`${label} has no code example - reference columns or SQL in backticks`);
      r.score -= DEDUCTIONS.instructionWithoutCode;
    }
  });

  return r;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function failed(error: string): ValidationReport {
  return { valid: false, errors: [error], warnings: [], score: 0 };
}

/**
 * Validate a configuration document.
 *
 * Accepts a parsed object or JSON text. A serialized space (wire document)
 * is decoded first and validated as the configuration it implies.
 */
export function validateSpaceConfig(document: unknown, options: ValidateOptions = {}): ValidationReport {
  const { validateSql = true, catalogName } = options;
  const preamble: string[] = [];

  let raw = document;
  if (typeof raw === "string") {
    try {
      raw = JSON.parse(raw);
    } catch (err) {
      return failed(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (isSerializedSpace(raw)) {
    try {
      raw = decodeSerializedSpace(raw);
    } catch (err) {
      return failed(`Schema validation failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    preamble.push("Input is a serialized space; validated the configuration decoded from it");
  }

  // Stage 1
  const parsed = parseSpaceConfig(raw);
  if (!parsed.success) {
    return failed(`Schema validation failed: ${parsed.issues.join("; ")}`);
  }
  const config = parsed.config;

  const stages = [
    checkCompleteness(config, catalogName),
    ...(validateSql ? [checkEmbeddedSql(config, catalogName)] : []),
    checkInstructionQuality(config),
  ];

  const errors = stages.flatMap((s) => s.errors);
  const warnings = [...preamble, ...stages.flatMap((s) => s.warnings)];
  const score = Math.max(0, Math.min(...stages.map((s) => s.score)));

  return { valid: errors.length === 0, errors, warnings, score };
}
