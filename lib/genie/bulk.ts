/**
 * Batch edits over several spaces.
 *
 * Both operations default to a dry run that reports what would change.
 * One space failing never stops the batch; each outcome is reported.
 */

import type { DatabricksClient } from "@/lib/dbx/client";
import { ConfigValidationError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";
import { extendSerializedSpace } from "./serialized-space";
import { deleteSpace, getSpace, listAllSpaces, updateSpace } from "./spaces";

export interface BulkOutcome {
  space_id: string;
  title: string;
  success: boolean;
  error?: string;
  tables_added?: string[];
  instructions_added?: number;
}

function report(operation: "update" | "delete", dryRun: boolean, results: BulkOutcome[]) {
  const succeeded = results.filter((r) => r.success).length;
  return { operation, dry_run: dryRun, results, succeeded, failed: results.length - succeeded };
}

function failure(spaceId: string, err: unknown, title = ""): BulkOutcome {
  return { space_id: spaceId, title, success: false, error: errorMessage(err) };
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

export interface BulkUpdateInput {
  spaceIds: string[];
  addInstructions?: string[];
  /** catalog.schema.table identifiers. */
  addTables?: string[];
  dryRun?: boolean;
}

function checkTableNames(tables: string[]): void {
  const bad = tables.filter((t) => {
    const parts = t.split(".");
    return parts.length !== 3 || parts.some((p) => p.trim().length === 0);
  });
  if (bad.length > 0) {
    throw new ConfigValidationError("Tables must be catalog.schema.table identifiers", bad);
  }
}

export async function bulkUpdateSpaces(client: DatabricksClient, input: BulkUpdateInput) {
  const dryRun = input.dryRun ?? true;
  const instructions = (input.addInstructions ?? []).map((i) => i.trim()).filter(Boolean);
  const tables = (input.addTables ?? []).map((t) => t.trim()).filter(Boolean);
  if (input.spaceIds.length === 0) {
    throw new ConfigValidationError("Pass at least one space_id to update");
  }
  if (instructions.length === 0 && tables.length === 0) {
    throw new ConfigValidationError("Nothing to add: pass add_instructions or add_tables");
  }
  checkTableNames(tables);

  const results: BulkOutcome[] = [];
  for (const spaceId of input.spaceIds) {
    let title = "";
    try {
      const space = await getSpace(client, spaceId, true);
      title = space.title;
      if (!space.serialized_space) {
        results.push({ space_id: spaceId, title, success: false, error: "No stored configuration" });
        continue;
      }
      const extended = extendSerializedSpace(space.serialized_space, { tables, instructions });
      if (!dryRun) {
        await updateSpace(client, spaceId, { config: extended.serializedSpace });
      }
      results.push({
        space_id: spaceId,
        title,
        success: true,
        tables_added: extended.tablesAdded,
        instructions_added: extended.instructionsAdded,
      });
    } catch (err) {
      logger.warn("Bulk update failed for space", { spaceId, error: errorMessage(err) });
      results.push(failure(spaceId, err, title));
    }
  }
  return report("update", dryRun, results);
}

// ---------------------------------------------------------------------------
// Delete
// ---------------------------------------------------------------------------

/**
 * A pattern with `*` or `?` is a whole-title glob; anything else is a
 * regular expression anchored at the start of the title. Both ignore case.
 */
export function titlePattern(pattern: string): RegExp {
  if (pattern.includes("*") || pattern.includes("?")) {
    const body = pattern
      .replace(/[.+^${}()|[\]\\]/g, "\\$&")
      .replace(/\*/g, ".*")
      .replace(/\?/g, ".");
    return new RegExp(`^${body}$`, "i");
  }
  try {
    return new RegExp(`^(?:${pattern})`, "i");
  } catch (err) {
    throw new ConfigValidationError(`Invalid pattern: ${errorMessage(err)}`);
  }
}

export interface BulkDeleteInput {
  spaceIds?: string[];
  pattern?: string;
  dryRun?: boolean;
}

export async function bulkDeleteSpaces(client: DatabricksClient, input: BulkDeleteInput) {
  const dryRun = input.dryRun ?? true;
  const ids = input.spaceIds ?? [];
  if (ids.length === 0 && !input.pattern) {
    throw new ConfigValidationError("Pass space_ids or a title pattern to delete");
  }

  let targets: Array<{ spaceId: string; title?: string }>;
  if (ids.length > 0) {
    targets = ids.map((spaceId) => ({ spaceId }));
  } else {
    const re = titlePattern(input.pattern ?? "");
    targets = (await listAllSpaces(client))
      .filter((s) => re.test(s.title))
      .map((s) => ({ spaceId: s.space_id, title: s.title }));
  }

  const results: BulkOutcome[] = [];
  for (const target of targets) {
    let title = target.title ?? "";
    try {
      if (target.title === undefined) {
        title = (await getSpace(client, target.spaceId)).title;
      }
      if (!dryRun) {
        await deleteSpace(client, target.spaceId);
      }
      results.push({ space_id: target.spaceId, title, success: true });
    } catch (err) {
      logger.warn("Bulk delete failed for space", { spaceId: target.spaceId, error: errorMessage(err) });
      results.push(failure(target.spaceId, err, title));
    }
  }
  return report("delete", dryRun, results);
}
