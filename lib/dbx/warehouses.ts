/**
 * SQL warehouse discovery.
 *
 * API: GET /api/2.0/sql/warehouses
 * Genie spaces run on Pro or serverless warehouses, both reported as
 * `warehouse_type: "PRO"`; classic warehouses are never offered.
 */

import { z } from "zod/v4";
import type { DatabricksClient } from "./client";

const WarehouseSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  state: z.string().default("UNKNOWN"),
  cluster_size: z.string().default(""),
  warehouse_type: z.string().optional(),
});

const WarehouseListSchema = z.object({
  warehouses: z.array(WarehouseSchema).nullish().transform((v) => v ?? []),
});

export type Warehouse = z.output<typeof WarehouseSchema>;

export type WarehousePurpose = "development" | "production";

const PREFERRED_SIZES: Record<WarehousePurpose, readonly string[]> = {
  development: ["2X-Small", "X-Small", "Small"],
  production: ["Large", "Medium"],
};

const GONE_STATES = new Set(["DELETING", "DELETED"]);

/** Pro and serverless warehouses that still exist, in listing order. */
export async function listGenieWarehouses(client: DatabricksClient): Promise<Warehouse[]> {
  const data = await client.request(WarehouseListSchema, {
    operation: "SQL list warehouses",
    method: "GET",
    path: "/api/2.0/sql/warehouses",
    retry: true,
  });
  return data.warehouses.filter((w) => w.warehouse_type === "PRO" && !GONE_STATES.has(w.state));
}

/**
 * Pick a warehouse: running ones first, so the space does not wait on a
 * cold start, then the first preferred size for the purpose, then the
 * first candidate.
 */
export function recommendWarehouse(
  warehouses: Warehouse[],
  purpose: WarehousePurpose = "development",
): Warehouse | undefined {
  const running = warehouses.filter((w) => w.state === "RUNNING");
  const candidates = running.length > 0 ? running : warehouses;

  for (const size of PREFERRED_SIZES[purpose]) {
    const match = candidates.find((w) => w.cluster_size.toLowerCase() === size.toLowerCase());
    if (match) return match;
  }
  return candidates[0];
}

export async function discoverWarehouse(
  client: DatabricksClient,
  purpose: WarehousePurpose = "development",
): Promise<Warehouse | undefined> {
  return recommendWarehouse(await listGenieWarehouses(client), purpose);
}
