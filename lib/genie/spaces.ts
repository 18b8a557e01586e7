/**
 * Space operations: create, list, get, update and delete Genie spaces.
 *
 * Callers pass either a configuration (object or JSON text) or a ready
 * serialized space. Configurations are schema-checked and encoded here;
 * serialized spaces are only canonicalized.
 */

import type { DatabricksClient } from "@/lib/dbx/client";
import {
  createGenieSpace,
  formatTimestamp,
  getGenieSpace,
  listGenieSpaces,
  trashGenieSpace,
  updateGenieSpace,
  type GenieSpaceResponse,
} from "@/lib/dbx/genie";
import { discoverWarehouse } from "@/lib/dbx/warehouses";
import { ConfigValidationError, DatabricksApiError, SpaceNotFoundError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";
import {
  canonicalizeInPlace,
  decodeSerializedSpace,
  describeEncodingLoss,
  encodeSpaceConfig,
  isSerializedSpace,
} from "./serialized-space";
import { parseSpaceConfig, type GenieSpaceConfig } from "./space-config";

// ---------------------------------------------------------------------------
// Input resolution
// ---------------------------------------------------------------------------

export interface ResolvedSpaceDocument {
  serializedSpace: string;
  /** Present when the caller passed a configuration. */
  config?: GenieSpaceConfig;
  warnings: string[];
}

/**
 * Turn a configuration or serialized space into the JSON text the API
 * takes. Throws `ConfigValidationError` for anything unusable.
 */
export function resolveSpaceDocument(input: unknown): ResolvedSpaceDocument {
  let raw = input;
  if (typeof raw === "string") {
    try {
      raw = JSON.parse(raw);
    } catch (err) {
      throw new ConfigValidationError(`Invalid JSON: ${errorMessage(err)}`);
    }
  }

  if (isSerializedSpace(raw)) {
    const tables = decodeSerializedSpace(raw).tables;
    if (tables.length === 0) {
      throw new ConfigValidationError("Serialized space has no tables with catalog.schema.table identifiers");
    }
    const copy = structuredClone(raw);
    canonicalizeInPlace(copy);
    return { serializedSpace: JSON.stringify(copy), warnings: [] };
  }

  const parsed = parseSpaceConfig(raw);
  if (!parsed.success) {
    throw new ConfigValidationError("Configuration failed schema validation", parsed.issues);
  }
  if (parsed.config.tables.length === 0) {
    throw new ConfigValidationError("Configuration must include at least one table");
  }

  return {
    serializedSpace: JSON.stringify(encodeSpaceConfig(parsed.config)),
    config: parsed.config,
    warnings: describeEncodingLoss(parsed.config),
  };
}

function summarize(space: GenieSpaceResponse) {
  return {
    space_id: space.space_id,
    title: space.title,
    description: space.description ?? "",
    warehouse_id: space.warehouse_id ?? "",
  };
}

/** 404s from space endpoints become `SpaceNotFoundError` naming the space. */
async function forSpace<T>(spaceId: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof DatabricksApiError && err.statusCode === 404) {
      throw new SpaceNotFoundError(`Genie space '${spaceId}' not found`);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export interface CreateSpaceInput {
  config: unknown;
  warehouseId?: string;
  title?: string;
  description?: string;
  parentPath?: string;
}

export async function createSpace(
  client: DatabricksClient,
  input: CreateSpaceInput,
  defaultWarehouseId?: string,
) {
  const doc = resolveSpaceDocument(input.config);

  const title = input.title ?? doc.config?.space_name;
  if (!title) {
    throw new ConfigValidationError("title is required when passing a serialized space");
  }
  const description = input.description ?? doc.config?.description;

  let warehouseId = input.warehouseId || doc.config?.warehouse_id || defaultWarehouseId;
  let autoSelected: { id: string; name: string; state: string } | undefined;
  if (!warehouseId) {
    const found = await discoverWarehouse(client);
    if (!found) {
      throw new ConfigValidationError(
        "No SQL warehouse available: pass warehouse_id, set it in the config, or set DATABRICKS_WAREHOUSE_ID",
      );
    }
    logger.info("SQL warehouse selected automatically", { warehouseId: found.id, state: found.state });
    autoSelected = { id: found.id, name: found.name, state: found.state };
    warehouseId = found.id;
  }

  const space = await createGenieSpace(client, {
    title,
    description,
    serializedSpace: doc.serializedSpace,
    warehouseId,
    parentPath: input.parentPath,
  });
  logger.info("Genie space created", { spaceId: space.space_id, title });

  return {
    ...summarize(space),
    title: space.title || title,
    description: space.description ?? description ?? "",
    warehouse_id: space.warehouse_id ?? warehouseId,
    ...(space.owner_user_id !== undefined ? { owner_id: String(space.owner_user_id) } : {}),
    ...(space.created_timestamp !== undefined ? { created_at: formatTimestamp(space.created_timestamp) } : {}),
    ...(autoSelected ? { auto_selected_warehouse: autoSelected } : {}),
    ...(doc.warnings.length > 0 ? { warnings: doc.warnings } : {}),
  };
}

/** Every space visible to the caller, following page tokens up to `maxPages`. */
export async function listAllSpaces(client: DatabricksClient, maxPages = 20): Promise<GenieSpaceResponse[]> {
  const spaces: GenieSpaceResponse[] = [];
  let pageToken: string | undefined;
  for (let page = 0; page < maxPages; page++) {
    const data = await listGenieSpaces(client, 100, pageToken);
    spaces.push(...data.spaces);
    pageToken = data.next_page_token;
    if (!pageToken) break;
  }
  return spaces;
}

export async function listSpaces(client: DatabricksClient, pageSize = 100, pageToken?: string) {
  const page = await listGenieSpaces(client, pageSize, pageToken);
  return {
    spaces: page.spaces.map(summarize),
    ...(page.next_page_token ? { next_page_token: page.next_page_token } : {}),
  };
}

/**
 * Fetch a space. With `includeConfig` the stored serialized space is
 * returned raw and decoded; a document that cannot be decoded is still
 * returned raw.
 */
export async function getSpace(client: DatabricksClient, spaceId: string, includeConfig = false) {
  const space = await forSpace(spaceId, () => getGenieSpace(client, spaceId, includeConfig));

  let decoded: GenieSpaceConfig | undefined;
  if (includeConfig && space.serialized_space) {
    try {
      decoded = decodeSerializedSpace(space.serialized_space, {
        title: space.title,
        description: space.description,
      });
    } catch (err) {
      logger.warn("Stored serialized space could not be decoded", { spaceId, error: errorMessage(err) });
    }
  }

  return {
    ...summarize(space),
    ...(space.owner_user_id !== undefined ? { owner_id: String(space.owner_user_id) } : {}),
    ...(space.created_timestamp !== undefined ? { created_at: formatTimestamp(space.created_timestamp) } : {}),
    ...(space.last_updated_timestamp !== undefined
      ? { updated_at: formatTimestamp(space.last_updated_timestamp) }
      : {}),
    ...(includeConfig && space.serialized_space ? { serialized_space: space.serialized_space } : {}),
    ...(decoded ? { decoded_config: decoded } : {}),
  };
}

export interface UpdateSpaceInput {
  config?: unknown;
  title?: string;
  description?: string;
  warehouseId?: string;
}

export async function updateSpace(client: DatabricksClient, spaceId: string, input: UpdateSpaceInput) {
  const doc = input.config !== undefined ? resolveSpaceDocument(input.config) : undefined;

  if (!doc && input.title === undefined && input.description === undefined && input.warehouseId === undefined) {
    throw new ConfigValidationError("Nothing to update: pass config, title, description or warehouse_id");
  }

  const space = await forSpace(spaceId, () =>
    updateGenieSpace(client, spaceId, {
      title: input.title,
      description: input.description,
      serializedSpace: doc?.serializedSpace,
      warehouseId: input.warehouseId,
    }),
  );
  logger.info("Genie space updated", { spaceId, config: doc !== undefined });

  return {
    ...summarize(space),
    ...(space.last_updated_timestamp !== undefined
      ? { updated_at: formatTimestamp(space.last_updated_timestamp) }
      : {}),
    ...(doc && doc.warnings.length > 0 ? { warnings: doc.warnings } : {}),
  };
}

/** Soft delete: the space moves to the workspace trash. */
export async function deleteSpace(client: DatabricksClient, spaceId: string) {
  await forSpace(spaceId, () => trashGenieSpace(client, spaceId));
  logger.info("Genie space trashed", { spaceId });
  return { status: "success" as const, message: `Space ${spaceId} moved to trash` };
}
