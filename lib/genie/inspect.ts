/**
 * Read-only views over existing spaces: health, export, diff and search.
 *
 * Everything here works from the decoded configuration of a stored space,
 * so it sees what the serialized space format keeps and nothing more.
 */

import type { DatabricksClient } from "@/lib/dbx/client";
import { ConfigValidationError, GenieApiError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";
import { systemClock, type Clock } from "./clock";
import type { ConversationOrchestrator } from "./conversation";
import { tableIdentifier, type GenieSpaceConfig } from "./space-config";
import { getSpace, listAllSpaces } from "./spaces";
import { validateSpaceConfig } from "./validator";

const DAY_MS = 86_400_000;
const ACTIVITY_WINDOW_DAYS = 30;

async function loadConfig(client: DatabricksClient, spaceId: string) {
  const space = await getSpace(client, spaceId, true);
  if (!space.decoded_config) {
    throw new GenieApiError(`Space '${spaceId}' has no readable configuration`);
  }
  return { space, config: space.decoded_config };
}

// ---------------------------------------------------------------------------
// Summary counts
// ---------------------------------------------------------------------------

export interface ConfigCounts {
  tables: number;
  instructions: number;
  example_sql_queries: number;
  measures: number;
  expressions: number;
  filters: number;
  join_specifications: number;
}

export function countConfig(config: GenieSpaceConfig): ConfigCounts {
  return {
    tables: config.tables.length,
    instructions: config.instructions.length,
    example_sql_queries: config.example_sql_queries.length,
    measures: config.sql_snippets?.measures.length ?? 0,
    expressions: config.sql_snippets?.expressions.length ?? 0,
    filters: config.sql_snippets?.filters.length ?? 0,
    join_specifications: config.join_specifications.length,
  };
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface SpaceActivity {
  /** Conversations started inside the activity window. */
  conversationCount: number;
  /** Epoch ms of the latest conversation activity. */
  lastActivity?: number;
}

export interface HealthScore {
  score: number;
  config_score: number;
  activity_score: number;
  recommendations: string[];
}

function scoreConfig(config: GenieSpaceConfig): { score: number; recommendations: string[] } {
  let score = 100;
  const recommendations: string[] = [];
  const counts = countConfig(config);

  if (counts.tables === 0) {
    score -= 40;
    recommendations.push("Add at least one table to the space");
  } else if (counts.tables > 10) {
    score -= 10;
    recommendations.push("Consider splitting into several spaces (more than 10 tables)");
  }

  if (counts.instructions === 0) {
    score -= 20;
    recommendations.push("Add instructions to guide Genie");
  } else if (counts.instructions < 5) {
    score -= 10;
    recommendations.push(`Add more instructions (current: ${counts.instructions}, recommended: 5+)`);
  }

  if (counts.example_sql_queries < 3) {
    score -= 15;
    recommendations.push(`Add example queries (current: ${counts.example_sql_queries}, recommended: 5+)`);
  }

  if (counts.measures === 0 && counts.expressions === 0) {
    score -= 15;
    recommendations.push("Add SQL measures or expressions for common metrics");
  }

  if (counts.tables > 1 && counts.join_specifications === 0) {
    score -= 10;
    recommendations.push("Define joins between the tables");
  }

  return { score: Math.max(0, score), recommendations };
}

function scoreActivity(activity: SpaceActivity, now: number): { score: number; recommendations: string[] } {
  let score = 100;
  const recommendations: string[] = [];

  if (activity.conversationCount === 0) {
    score -= 40;
    recommendations.push(`No conversations in the last ${ACTIVITY_WINDOW_DAYS} days`);
  } else if (activity.conversationCount < 5) {
    score -= 20;
    recommendations.push(
      `Low activity (${activity.conversationCount} conversations in ${ACTIVITY_WINDOW_DAYS} days)`,
    );
  }

  if (activity.lastActivity !== undefined) {
    const days = Math.floor((now - activity.lastActivity) / DAY_MS);
    if (days > 30) {
      score -= 30;
      recommendations.push(`Inactive for ${days} days`);
    } else if (days > 7) {
      score -= 10;
      recommendations.push(`Last active ${days} days ago`);
    }
  }

  return { score: Math.max(0, score), recommendations };
}

/** Configuration quality weighs 60%, activity 40%. */
export function scoreSpaceHealth(config: GenieSpaceConfig, activity: SpaceActivity, now: number): HealthScore {
  const cfg = scoreConfig(config);
  const act = scoreActivity(activity, now);
  return {
    score: Math.floor((cfg.score * 60) / 100) + Math.floor((act.score * 40) / 100),
    config_score: cfg.score,
    activity_score: act.score,
    recommendations: [...cfg.recommendations, ...act.recommendations],
  };
}

export interface InspectDeps {
  client: DatabricksClient;
  conversations: Pick<ConversationOrchestrator, "listConversations">;
  clock?: Clock;
}

/** Activity that cannot be read counts as none. */
async function readActivity(deps: InspectDeps, spaceId: string, now: number): Promise<SpaceActivity> {
  try {
    const page = await deps.conversations.listConversations(spaceId, 100);
    const since = now - ACTIVITY_WINDOW_DAYS * DAY_MS;
    let conversationCount = 0;
    let lastActivity: number | undefined;
    for (const c of page.conversations) {
      const created = c.created_at ? Date.parse(c.created_at) : NaN;
      const updated = c.updated_at ? Date.parse(c.updated_at) : NaN;
      if (Number.isFinite(created) && created >= since) conversationCount++;
      for (const t of [created, updated]) {
        if (Number.isFinite(t) && (lastActivity === undefined || t > lastActivity)) lastActivity = t;
      }
    }
    return { conversationCount, lastActivity };
  } catch (err) {
    logger.warn("Conversation activity unavailable", { spaceId, error: errorMessage(err) });
    return { conversationCount: 0 };
  }
}

export async function spaceHealth(deps: InspectDeps, spaceId: string) {
  const now = (deps.clock ?? systemClock).now();
  const { space, config } = await loadConfig(deps.client, spaceId);
  const activity = await readActivity(deps, spaceId, now);
  const health = scoreSpaceHealth(config, activity, now);
  const validation = validateSpaceConfig(config);

  return {
    space_id: space.space_id,
    title: space.title,
    ...health,
    conversation_count: activity.conversationCount,
    ...(activity.lastActivity !== undefined ? { last_activity: new Date(activity.lastActivity).toISOString() } : {}),
    counts: countConfig(config),
    validation: { score: validation.score, errors: validation.errors, warnings: validation.warnings },
  };
}

// ---------------------------------------------------------------------------
// Export and diff
// ---------------------------------------------------------------------------

export async function exportSpace(client: DatabricksClient, spaceId: string) {
  const { space, config } = await loadConfig(client, spaceId);
  return { space_id: space.space_id, title: space.title, counts: countConfig(config), config };
}

export interface CountDiff {
  first: number;
  second: number;
  difference: number;
}

function diffCounts(a: ConfigCounts, b: ConfigCounts): Record<keyof ConfigCounts, CountDiff> {
  const diff = (key: keyof ConfigCounts): CountDiff => ({ first: a[key], second: b[key], difference: b[key] - a[key] });
  return {
    tables: diff("tables"),
    instructions: diff("instructions"),
    example_sql_queries: diff("example_sql_queries"),
    measures: diff("measures"),
    expressions: diff("expressions"),
    filters: diff("filters"),
    join_specifications: diff("join_specifications"),
  };
}

export async function diffSpaces(client: DatabricksClient, firstId: string, secondId: string) {
  const [first, second] = await Promise.all([loadConfig(client, firstId), loadConfig(client, secondId)]);
  const counts = diffCounts(countConfig(first.config), countConfig(second.config));
  const tablesA = new Set(first.config.tables.map(tableIdentifier));
  const tablesB = new Set(second.config.tables.map(tableIdentifier));

  return {
    first: { space_id: first.space.space_id, title: first.space.title },
    second: { space_id: second.space.space_id, title: second.space.title },
    counts,
    tables_only_in_first: [...tablesA].filter((t) => !tablesB.has(t)).sort(),
    tables_only_in_second: [...tablesB].filter((t) => !tablesA.has(t)).sort(),
  };
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

export interface FindSpacesQuery {
  /** Matched case-insensitively as substrings of catalog.schema.table. */
  tables?: string[];
  /** Matched case-insensitively against title, description and instructions. */
  keywords?: string[];
}

/**
 * Spaces matching any table or keyword. Spaces whose configuration cannot
 * be read are skipped and logged.
 */
export async function findSpaces(client: DatabricksClient, query: FindSpacesQuery) {
  const tables = (query.tables ?? []).map((t) => t.trim()).filter(Boolean);
  const keywords = (query.keywords ?? []).map((k) => k.trim()).filter(Boolean);
  if (tables.length === 0 && keywords.length === 0) {
    throw new ConfigValidationError("Pass at least one table or keyword to search for");
  }

  const matches: Array<{ space_id: string; title: string; matches: string[] }> = [];
  for (const summary of await listAllSpaces(client)) {
    let config: GenieSpaceConfig;
    try {
      config = (await loadConfig(client, summary.space_id)).config;
    } catch (err) {
      logger.warn("Skipping space in search", { spaceId: summary.space_id, error: errorMessage(err) });
      continue;
    }

    const reasons: string[] = [];
    const identifiers = config.tables.map((t) => tableIdentifier(t).toLowerCase());
    const table = tables.find((t) => identifiers.some((id) => id.includes(t.toLowerCase())));
    if (table) reasons.push(`Contains table matching '${table}'`);

    const text = [summary.title, config.description, ...config.instructions.map((i) => i.content)]
      .join(" ")
      .toLowerCase();
    const keyword = keywords.find((k) => text.includes(k.toLowerCase()));
    if (keyword) reasons.push(`Contains keyword '${keyword}'`);

    if (reasons.length > 0) matches.push({ space_id: summary.space_id, title: summary.title, matches: reasons });
  }

  return { tables, keywords, matches };
}
