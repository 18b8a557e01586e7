/**
 * Configuration schema document for assistants.
 *
 * JSON Schema of the configuration (input side, so defaulted fields are
 * optional) plus best practices, the scoring rubric, an example configuration
 * and workflow notes. Static: no remote calls.
 */

import { z } from "zod/v4";
import { BEST_PRACTICES } from "./prompts";
import { GenieSpaceConfigSchema, type GenieSpaceConfigInput } from "./space-config";
import { DEDUCTIONS, VAGUE_TERMS } from "./validator";

export const EXAMPLE_CONFIG: GenieSpaceConfigInput = {
  space_name: "Sales Orders Analytics",
  description: "Natural language analytics over order transactions and customers",
  purpose: "Let the sales team answer revenue and order volume questions without writing SQL",
  tables: [
    { catalog_name: "main", schema_name: "sales", table_name: "orders", description: "One row per order" },
    { catalog_name: "main", schema_name: "sales", table_name: "customers", description: "Customer master data" },
  ],
  join_specifications: [
    {
      left_table: "main.sales.orders",
      right_table: "main.sales.customers",
      join_type: "LEFT",
      join_condition: "orders.customer_id = customers.customer_id",
      description: "Each order belongs to at most one customer",
    },
  ],
  instructions: [
    {
      content: "## Revenue\nCompute revenue as `CAST(SUM(amount) AS DECIMAL(38,2))` over `main.sales.orders` and exclude rows where `status = 'CANCELLED'`.",
      priority: 1,
    },
  ],
  example_sql_queries: [
    {
      question: "What was total revenue last month?",
      sql_query:
        "SELECT CAST(SUM(amount) AS DECIMAL(38,2)) AS revenue FROM main.sales.orders WHERE order_date >= DATE_TRUNC('MONTH', CURRENT_DATE - INTERVAL 1 MONTH) AND order_date < DATE_TRUNC('MONTH', CURRENT_DATE)",
    },
  ],
  sql_snippets: {
    measures: [
      {
        alias: "total_revenue",
        sql: "CAST(SUM(orders.amount) AS DECIMAL(38,2))",
        display_name: "Total Revenue",
        synonyms: ["revenue", "sales"],
      },
    ],
  },
  benchmark_questions: [{ question: "How many orders were placed yesterday?" }],
};

export function getConfigSchema(): Record<string, unknown> {
  const jsonSchema = z.toJSONSchema(GenieSpaceConfigSchema, { io: "input", unrepresentable: "any" });

  return {
    ...jsonSchema,
    best_practices: BEST_PRACTICES,
    validation_rules: {
      required_fields: ["space_name", "description", "purpose", "tables (at least 1 table)"],
      recommended_fields: {
        instructions: "Highly recommended for score >80. Guidance on how to query the data.",
        example_sql_queries: "Highly recommended for score >80. Example queries for common questions.",
        sql_snippets: "Optional. Reusable filters, expressions, and measures.",
        join_specifications: "Required when using multiple tables. Defines how tables relate.",
        benchmark_questions: "Optional. Used for testing the space quality.",
      },
      scoring: {
        method: "Each stage starts at 100; the reported score is the lowest stage score, floored at 0.",
        completeness: {
          no_tables: -DEDUCTIONS.noTables,
          no_instructions: -DEDUCTIONS.noInstructions,
          no_example_sql_queries: -DEDUCTIONS.noExamples,
          space_name_under_5_chars: -DEDUCTIONS.shortName,
          description_under_20_chars: -DEDUCTIONS.shortDescription,
          duplicate_snippet_alias: -DEDUCTIONS.duplicateAlias,
        },
        embedded_sql: {
          invalid_example_query: -DEDUCTIONS.invalidExampleSql,
          invalid_filter_expression_or_measure: -DEDUCTIONS.invalidSnippetSql,
        },
        instruction_quality: {
          vague_terms: VAGUE_TERMS,
          uses_vague_term: -DEDUCTIONS.vagueInstruction,
          under_10_words: -DEDUCTIONS.shortInstruction,
          no_backtick_reference: -DEDUCTIONS.instructionWithoutCode,
        },
      },
      quality_bands: {
        "90-100": "Excellent - Complete config with instructions, examples, and snippets",
        "80-89": "Good - Has instructions and examples, may be missing snippets",
        "70-79": "Acceptable - Basic config with tables and minimal guidance",
        "60-69": "Needs improvement - Missing key fields or insufficient detail",
        "0-59": "Poor - Incomplete or invalid configuration",
      },
    },
    example: EXAMPLE_CONFIG,
    usage_notes: {
      workflow: [
        "1. Get this schema using get_config_schema",
        "2. Optionally get a template using get_config_template",
        "3. Write the config from the schema and the user's requirements",
        "4. Validate it using validate_config",
        "5. Create the space using create_space",
      ],
      tips: [
        "Use specific column names in instructions (e.g., `event_date`, `user_id`)",
        "Set instruction priorities (1=highest) for critical guidance",
        "Use fully qualified table names in join_specifications: catalog.schema.table",
        "join_type is stored as a '{TYPE} JOIN: ' prefix of the join condition; INNER has no prefix",
        "example_sql_queries[].description is not stored by the space and is dropped on create",
      ],
    },
  };
}
