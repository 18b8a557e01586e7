/**
 * User-facing Genie space configuration.
 *
 * This is what callers author (directly, from a template, or through the
 * generator). It is never the system of record: it is encoded into a
 * serialized space before it reaches the platform, and a decoded serialized
 * space only approximates the configuration that produced it.
 */

import { z } from "zod/v4";

export const JOIN_TYPES = ["INNER", "LEFT", "RIGHT", "FULL", "CROSS"] as const;
export type JoinType = (typeof JOIN_TYPES)[number];

const JOIN_TYPE_RE = new RegExp(`^(${JOIN_TYPES.join("|")})$`, "i");

export const SpaceTableSchema = z.object({
  catalog_name: z.string().min(1).describe("Unity Catalog catalog"),
  schema_name: z.string().min(1).describe("Schema within the catalog"),
  table_name: z.string().min(1).describe("Table or view name"),
  description: z.string().optional(),
});

export const JoinSpecificationSchema = z.object({
  left_table: z.string().min(1).describe("Fully qualified name: catalog.schema.table"),
  right_table: z.string().min(1).describe("Fully qualified name: catalog.schema.table"),
  join_type: z
    .string()
    .regex(JOIN_TYPE_RE, `join_type must be one of ${JOIN_TYPES.join(", ")}`)
    .default("INNER"),
  join_condition: z.string().min(1),
  description: z.string().optional(),
  instruction: z.string().optional(),
});

export const InstructionSchema = z.object({
  content: z.string().min(1),
  priority: z.number().int().min(1).optional().describe("1 = highest"),
});

// SQL text is only checked for shape here; the validator's SQL stage judges it.
export const ExampleSqlQuerySchema = z.object({
  question: z.string().min(1),
  sql_query: z.string(),
  description: z.string().optional().describe("Not stored by the serialized space format"),
});

export const BenchmarkQuestionSchema = z.object({
  question: z.string().min(1),
});

export const SqlMeasureSchema = z.object({
  alias: z.string().min(1),
  sql: z.string(),
  display_name: z.string().optional(),
  synonyms: z.array(z.string()).optional(),
  instruction: z.string().optional(),
});

export const SqlExpressionSchema = SqlMeasureSchema;

export const SqlFilterSchema = z.object({
  sql: z.string(),
  display_name: z.string().min(1),
  synonyms: z.array(z.string()).optional(),
});

export const SqlSnippetsSchema = z.object({
  measures: z.array(SqlMeasureSchema).default([]),
  expressions: z.array(SqlExpressionSchema).default([]),
  filters: z.array(SqlFilterSchema).default([]),
});

export const GenieSpaceConfigSchema = z.object({
  space_name: z.string().min(1),
  description: z.string().min(1),
  purpose: z.string().min(1),
  tables: z.array(SpaceTableSchema),
  join_specifications: z.array(JoinSpecificationSchema).default([]),
  instructions: z.array(InstructionSchema).default([]),
  example_sql_queries: z.array(ExampleSqlQuerySchema).default([]),
  benchmark_questions: z.array(BenchmarkQuestionSchema).default([]),
  sql_snippets: SqlSnippetsSchema.optional(),
  warehouse_id: z.string().optional(),
  enable_data_sampling: z.boolean().default(false),
});

export type SpaceTable = z.output<typeof SpaceTableSchema>;
export type JoinSpecification = z.output<typeof JoinSpecificationSchema>;
export type Instruction = z.output<typeof InstructionSchema>;
export type ExampleSqlQuery = z.output<typeof ExampleSqlQuerySchema>;
export type SqlMeasure = z.output<typeof SqlMeasureSchema>;
export type SqlFilter = z.output<typeof SqlFilterSchema>;
export type SqlSnippetsConfig = z.output<typeof SqlSnippetsSchema>;
export type GenieSpaceConfig = z.output<typeof GenieSpaceConfigSchema>;
export type GenieSpaceConfigInput = z.input<typeof GenieSpaceConfigSchema>;

export type ParseConfigResult =
  | { success: true; config: GenieSpaceConfig }
  | { success: false; issues: string[] };

/** Schema-check a raw document, applying defaults for the optional lists. */
export function parseSpaceConfig(raw: unknown): ParseConfigResult {
  const parsed = GenieSpaceConfigSchema.safeParse(raw);
  if (parsed.success) return { success: true, config: parsed.data };
  return {
    success: false,
    issues: parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    ),
  };
}

/** `catalog.schema.table` identity key of a table. */
export function tableIdentifier(table: Pick<SpaceTable, "catalog_name" | "schema_name" | "table_name">): string {
  return `${table.catalog_name}.${table.schema_name}.${table.table_name}`;
}

export function countSnippets(config: Pick<GenieSpaceConfig, "sql_snippets">): number {
  const s = config.sql_snippets;
  if (!s) return 0;
  return s.measures.length + s.expressions.length + s.filters.length;
}
