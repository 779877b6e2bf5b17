// api/src/analysis/summary.ts
// Plain (snake_case) form of AnalysisSummary, shared with the narrative agents and HTTP callers

import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { AnalysisSummary } from "./types.js";

export const directionSchema = z.enum(["favorable", "unfavorable", "neutral"]);

export const summaryJsonSchema = z.object({
  metadata: z.object({
    description: z.string(),
    row_count: z.number().int().nonnegative(),
    materiality_abs: z.number().nonnegative(),
    materiality_pct: z.number().nonnegative(),
  }),
  aggregate: z.array(
    z.object({
      group: z.string(),
      budget_total: z.number(),
      actual_total: z.number(),
      variance_total: z.number(),
      variance_pct_total: z.number().nullable(),
    })
  ),
  line_items: z.array(
    z.object({
      group: z.string(),
      item: z.string(),
      period: z.string().nullable(),
      budget: z.number(),
      actual: z.number(),
      variance: z.number(),
      variance_pct: z.number().nullable(),
      direction: directionSchema,
      material: z.boolean(),
      drivers: z.array(z.string()).min(1),
    })
  ),
});

export type SummaryJson = z.infer<typeof summaryJsonSchema>;
export type AggregateJson = SummaryJson["aggregate"][number];
export type LineItemJson = SummaryJson["line_items"][number];

export function toSummaryJson(summary: AnalysisSummary): SummaryJson {
  const { metadata } = summary;
  return {
    metadata: {
      description: metadata.description,
      row_count: metadata.rowCount,
      materiality_abs: metadata.materialityAbs,
      materiality_pct: metadata.materialityPct,
    },
    aggregate: summary.aggregate.map((a) => ({
      group: a.group,
      budget_total: a.budgetTotal,
      actual_total: a.actualTotal,
      variance_total: a.varianceTotal,
      variance_pct_total: a.variancePctTotal,
    })),
    line_items: summary.lineItems.map((li) => ({
      group: li.group,
      item: li.item,
      period: li.period,
      budget: li.budget,
      actual: li.actual,
      variance: li.variance,
      variance_pct: li.variancePct,
      direction: li.direction,
      material: li.material,
      drivers: [...li.drivers],
    })),
  };
}

/** Validate an untrusted value (request body, file contents) as a serialized summary. */
export function parseSummaryJson(value: unknown): SummaryJson {
  return summaryJsonSchema.parse(value);
}

export function writeSummaryFile(path: string, summary: AnalysisSummary): void {
  writeFileSync(path, JSON.stringify(toSummaryJson(summary), null, 2) + "\n", "utf8");
}

export function readSummaryFile(path: string): SummaryJson {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseSummaryJson(parsed);
}
