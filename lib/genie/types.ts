/**
 * TypeScript types for the Genie serialized space (v2 wire format).
 *
 * This is the document the Genie Spaces REST API stores as
 * `serialized_space`. Every identified element carries a 32-char lowercase
 * hex `id`; arrays are sorted by that id (data source tables by
 * `identifier`) before the document is sent.
 */

// ---------------------------------------------------------------------------
// Serialized Space (v2 format)
// ---------------------------------------------------------------------------

export interface SerializedSpace {
  version: 2;
  data_sources: SerializedDataSources;
  config?: SerializedSpaceConfig;
  instructions?: SerializedInstructions;
}

export interface SerializedDataSources {
  tables: DataSourceTable[];
}

export interface DataSourceTable {
  identifier: string; // catalog.schema.table
}

export interface SerializedSpaceConfig {
  sample_questions: SampleQuestion[];
}

export interface SampleQuestion {
  id: string;
  question: string[];
}

export interface SerializedInstructions {
  text_instructions?: TextInstruction[];
  join_specs?: JoinSpec[];
  sql_snippets?: SqlSnippets;
  example_question_sqls?: ExampleQuestionSql[];
}

/** Content is one entry per line, each ending in "\n". */
export interface TextInstruction {
  id: string;
  content: string[];
}

export interface JoinSide {
  identifier: string;
  alias: string;
}

export interface JoinSpec {
  id: string;
  left: JoinSide;
  right: JoinSide;
  /** First entry is the join condition, prefixed with "{TYPE} JOIN: " for non-INNER joins. */
  sql: string[];
  instruction?: string[];
}

export interface SqlSnippets {
  measures?: SqlSnippetMeasure[];
  expressions?: SqlSnippetExpression[];
  filters?: SqlSnippetFilter[];
}

export interface SqlSnippetMeasure {
  id: string;
  alias: string;
  sql: string[];
  display_name: string;
  synonyms?: string[];
  instruction?: string[];
}

export type SqlSnippetExpression = SqlSnippetMeasure;

export interface SqlSnippetFilter {
  id: string;
  sql: string[];
  display_name: string;
  synonyms?: string[];
}

export interface ExampleQuestionSql {
  id: string;
  question: string[];
  sql: string[];
}
