/**
 * Eligible-user filter evaluation for propensity models.
 *
 * Every candidate is a SQL condition over a label table. A candidate
 * qualifies when its positive rate lies within the configured bounds and
 * it keeps enough distinct entities. Among qualifying candidates the one
 * with the highest recall wins; a larger segment breaks ties.
 */

import { z } from "zod";
import { CollaboratorError } from "./errors.js";
import type { WarehouseService } from "./types.js";

const QUALIFIED_NAME_RE = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)*$/;
const COLUMN_RE = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export const EligibleUserFiltersParamsSchema = z
  .object({
    filterSqls: z.array(z.string().trim().min(1).max(4000)).min(1).max(50),
    labelTable: z.string().trim().regex(QUALIFIED_NAME_RE, "Must be a table name, optionally schema-qualified"),
    labelColumn: z.string().trim().regex(COLUMN_RE, "Must be a column name"),
    entityColumn: z.string().trim().regex(COLUMN_RE, "Must be a column name"),
    minPositiveRate: z.number().min(0).max(1).default(0.1),
    maxPositiveRate: z.number().min(0).max(1).default(0.9),
    minEligibleRows: z.number().int().min(0).default(5000),
  })
  .refine((p) => p.minPositiveRate <= p.maxPositiveRate, {
    message: "minPositiveRate must not exceed maxPositiveRate",
    path: ["minPositiveRate"],
  });

export type EligibleUserFiltersParams = z.infer<typeof EligibleUserFiltersParamsSchema>;

export interface FilterMetrics {
  filterSql: string;
  eligibleRows: number;
  positiveLabelRows: number;
  negativeLabelRows: number;
  /** Rounded to three decimals. */
  positiveRate: number;
  /** Share of all positive entities the filter keeps, rounded to three decimals. */
  recall: number;
}

export interface FilterEvaluation extends FilterMetrics {
  qualified: boolean;
  rejectReason: string | null;
}

export interface EligibleUserFiltersResult {
  bestFilter: string | null;
  bestMetrics: FilterMetrics | null;
  totalPositiveRows: number;
  evaluations: FilterEvaluation[];
}

const CountRowSchema = z.object({ n: z.coerce.number() });

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

async function countDistinct(
  warehouse: WarehouseService,
  params: EligibleUserFiltersParams,
  where: string,
): Promise<number> {
  const sql = `SELECT COUNT(DISTINCT ${params.entityColumn}) AS n FROM ${params.labelTable} WHERE ${where}`;
  const result = await warehouse.executeQuery(sql, 1);
  const row = CountRowSchema.safeParse(result.rows[0]);
  if (!row.success) {
    throw new CollaboratorError(
      "Count query did not return a number",
      "warehouse",
      "invalid_response",
      { sql },
    );
  }
  return row.data.n;
}

function rejectReason(
  params: EligibleUserFiltersParams,
  positiveRate: number,
  eligibleRows: number,
): string | null {
  if (positiveRate < params.minPositiveRate) {
    return `positive rate ${round3(positiveRate)} is below ${params.minPositiveRate}`;
  }
  if (positiveRate > params.maxPositiveRate) {
    return `positive rate ${round3(positiveRate)} is above ${params.maxPositiveRate}`;
  }
  if (eligibleRows < params.minEligibleRows) {
    return `only ${eligibleRows} eligible rows, ${params.minEligibleRows} required`;
  }
  return null;
}

export async function evaluateEligibleUserFilters(
  warehouse: WarehouseService,
  params: EligibleUserFiltersParams,
): Promise<EligibleUserFiltersResult> {
  const positive = `${params.labelColumn} = 1`;
  const totalPositiveRows = await countDistinct(warehouse, params, positive);

  const evaluations: FilterEvaluation[] = [];
  let best: { metrics: FilterMetrics; recall: number } | null = null;

  for (const filterSql of params.filterSqls) {
    const eligibleRows = await countDistinct(warehouse, params, `(${filterSql})`);
    const positiveLabelRows = await countDistinct(warehouse, params, `${positive} AND (${filterSql})`);
    const positiveRate = eligibleRows === 0 ? 0 : positiveLabelRows / eligibleRows;
    const recall = totalPositiveRows === 0 ? 0 : positiveLabelRows / totalPositiveRows;

    const metrics: FilterMetrics = {
      filterSql,
      eligibleRows,
      positiveLabelRows,
      negativeLabelRows: eligibleRows - positiveLabelRows,
      positiveRate: round3(positiveRate),
      recall: round3(recall),
    };
    const reason = rejectReason(params, positiveRate, eligibleRows);
    evaluations.push({ ...metrics, qualified: reason === null, rejectReason: reason });

    if (reason !== null) {
      continue;
    }
    if (
      best === null ||
      recall > best.recall ||
      (recall === best.recall && eligibleRows > best.metrics.eligibleRows)
    ) {
      best = { metrics, recall };
    }
  }

  return {
    bestFilter: best?.metrics.filterSql ?? null,
    bestMetrics: best?.metrics ?? null,
    totalPositiveRows,
    evaluations,
  };
}
