/**
 * Input table suggestions across warehouse schemas.
 *
 * A table is suggested when its name contains one of the usual event
 * stream names, or the name of one of the most frequent events recorded
 * in a tracks-like table of the same schema.
 */

import { z } from "zod";
import { CollaboratorError } from "./errors.js";
import type { WarehouseService } from "./types.js";
import { splitTableName } from "./warehouse.js";

export const EVENT_STREAM_TABLES: readonly string[] = ["tracks", "pages", "identifies", "screens"];

/** Most frequent events looked up per tracks-like table. */
export const TOP_EVENT_COUNT = 20;

export const InputTableSuggestionsParamsSchema = z.object({
  schemas: z.array(z.string().trim().min(1)).min(1).max(50),
});

export interface InputTableSuggestions {
  schemas: string[];
  /** Schema-qualified table names, sorted, without duplicates. */
  suggestions: string[];
  warnings: string[];
}

const EventRowSchema = z.object({ event: z.string().min(1) });

function matching(tables: readonly string[], candidates: readonly string[]): string[] {
  const found: string[] = [];
  for (const candidate of candidates) {
    const needle = candidate.toLowerCase();
    for (const qualified of tables) {
      if (splitTableName(qualified).table.toLowerCase().includes(needle)) {
        found.push(qualified);
      }
    }
  }
  return found;
}

async function topEvents(warehouse: WarehouseService, table: string): Promise<string[]> {
  const result = await warehouse.executeQuery(
    `SELECT event, COUNT(*) AS n FROM ${table} GROUP BY event ORDER BY 2 DESC LIMIT ${TOP_EVENT_COUNT}`,
    TOP_EVENT_COUNT,
  );
  const events: string[] = [];
  for (const row of result.rows) {
    const parsed = EventRowSchema.safeParse(row);
    if (parsed.success) {
      events.push(parsed.data.event);
    }
  }
  return events;
}

export async function suggestInputTables(
  warehouse: WarehouseService,
  schemas: readonly string[],
): Promise<InputTableSuggestions> {
  const suggestions = new Set<string>();
  const warnings: string[] = [];

  for (const schema of schemas) {
    const tables = await warehouse.listTables(schema);
    for (const table of matching(tables, EVENT_STREAM_TABLES)) {
      suggestions.add(table);
    }

    for (const tracks of matching(tables, ["tracks"])) {
      let events: string[];
      try {
        events = await topEvents(warehouse, tracks);
      } catch (err: unknown) {
        if (!(err instanceof CollaboratorError) || err.kind !== "query") {
          throw err;
        }
        warnings.push(`Could not read events from ${tracks}: ${err.message}`);
        continue;
      }
      for (const table of matching(tables, events)) {
        suggestions.add(table);
      }
    }
  }

  return { schemas: [...schemas], suggestions: [...suggestions].sort(), warnings };
}
