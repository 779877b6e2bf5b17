// api/src/analysis/overview.ts
// Dashboard-facing numbers derived from a serialized summary (no rendering here)

import type { LineItemJson, SummaryJson } from "./summary.js";

export type GroupProfileEntry = {
  group: string;
  variance_total: number;
  variance_m: number; // millions
  budget_total: number;
  actual_total: number;
  label: "Unfavorable" | "Favorable";
};

export type Overview = {
  kpis: {
    row_count: number;
    material_count: number;
    group_count: number;
    materiality_abs: number;
    materiality_pct: number;
  };
  group_profile: GroupProfileEntry[];
  top_material: LineItemJson[];
};

export type OverviewOptions = {
  topGroups?: number;
  topMaterial?: number;
};

export function buildOverview(s: SummaryJson, opts: OverviewOptions = {}): Overview {
  const topGroups = opts.topGroups ?? 15;
  const topMaterial = opts.topMaterial ?? 25;

  const material = s.line_items.filter((li) => li.material);
  const groups = new Set(s.aggregate.map((a) => a.group));

  const group_profile = [...s.aggregate]
    .sort((a, b) => Math.abs(b.variance_total) - Math.abs(a.variance_total))
    .slice(0, topGroups)
    .map((a) => ({
      group: a.group,
      variance_total: a.variance_total,
      variance_m: a.variance_total / 1_000_000,
      budget_total: a.budget_total,
      actual_total: a.actual_total,
      label: a.variance_total > 0 ? ("Unfavorable" as const) : ("Favorable" as const),
    }));

  const top_material = [...material]
    .sort((a, b) => Math.abs(b.variance) - Math.abs(a.variance))
    .slice(0, topMaterial);

  return {
    kpis: {
      row_count: s.metadata.row_count,
      material_count: material.length,
      group_count: groups.size,
      materiality_abs: s.metadata.materiality_abs,
      materiality_pct: s.metadata.materiality_pct,
    },
    group_profile,
    top_material,
  };
}
