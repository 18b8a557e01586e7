/**
 * Unity Catalog table metadata.
 *
 * API: GET /api/2.1/unity-catalog/tables?catalog_name=..&schema_name=..
 * The list response carries column definitions, so one paged listing is
 * enough to describe every table in a schema.
 */

import { z } from "zod/v4";
import type { DatabricksClient } from "./client";
import { TIMEOUTS } from "./fetch-with-timeout";

const ColumnSchema = z.object({
  name: z.string(),
  type_text: z.string().optional(),
  type_name: z.string().optional(),
  comment: z.string().optional(),
  position: z.number().optional(),
});

const TableSchema = z.object({
  name: z.string(),
  catalog_name: z.string(),
  schema_name: z.string(),
  table_type: z.string().optional(),
  comment: z.string().optional(),
  owner: z.string().optional(),
  columns: z.array(ColumnSchema).nullish().transform((v) => v ?? []),
});

const TableListSchema = z.object({
  tables: z.array(TableSchema).nullish().transform((v) => v ?? []),
  next_page_token: z.string().optional(),
});

export type UcTable = z.output<typeof TableSchema>;

export interface TableMetadata {
  catalog_name: string;
  schema_name: string;
  table_name: string;
  table_type?: string;
  comment?: string;
  owner?: string;
  columns: Array<{ name: string; type: string; comment?: string }>;
}

export async function listTables(
  client: DatabricksClient,
  catalogName: string,
  schemaName: string,
  maxPages = 10,
): Promise<UcTable[]> {
  const tables: UcTable[] = [];
  let pageToken: string | undefined;

  for (let page = 0; page < maxPages; page++) {
    const data = await client.request(TableListSchema, {
      operation: "Unity Catalog list tables",
      method: "GET",
      path: "/api/2.1/unity-catalog/tables",
      query: {
        catalog_name: catalogName,
        schema_name: schemaName,
        max_results: 200,
        page_token: pageToken,
      },
      timeoutMs: TIMEOUTS.CATALOG,
      retry: true,
    });
    tables.push(...data.tables);
    pageToken = data.next_page_token;
    if (!pageToken) break;
  }

  return tables;
}

export function toTableMetadata(t: UcTable): TableMetadata {
  const columns = [...t.columns]
    .sort((a, b) => (a.position ?? 0) - (b.position ?? 0))
    .map((c) => ({
      name: c.name,
      type: c.type_text ?? c.type_name ?? "UNKNOWN",
      ...(c.comment ? { comment: c.comment } : {}),
    }));
  return {
    catalog_name: t.catalog_name,
    schema_name: t.schema_name,
    table_name: t.name,
    ...(t.table_type ? { table_type: t.table_type } : {}),
    ...(t.comment ? { comment: t.comment } : {}),
    ...(t.owner ? { owner: t.owner } : {}),
    columns,
  };
}

/**
 * Tables of a schema, optionally restricted to `tableNames`
 * (case-insensitive). Unknown names are ignored.
 */
export async function extractTableMetadata(
  client: DatabricksClient,
  catalogName: string,
  schemaName: string,
  tableNames?: string[],
): Promise<TableMetadata[]> {
  const wanted = tableNames && tableNames.length > 0 ? new Set(tableNames.map((n) => n.toLowerCase())) : null;
  const tables = await listTables(client, catalogName, schemaName);
  return tables.filter((t) => !wanted || wanted.has(t.name.toLowerCase())).map(toTableMetadata);
}
