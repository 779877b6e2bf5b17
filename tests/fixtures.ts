// tests/fixtures.ts
import { resolveAnalysisConfig, runVarianceAnalysis } from "../api/src/analysis/varianceAnalyzer.js";
import { toSummaryJson, type SummaryJson } from "../api/src/analysis/summary.js";
import type { AnalysisConfig, RawRow } from "../api/src/analysis/types.js";

export const sampleRows: RawRow[] = [
  { group: "A", item: "x1", budget: 1000, actual: 1200 },
  { group: "A", item: "x2", budget: 500, actual: 400 },
  { group: "B", item: "y1", budget: 0, actual: 50 },
];

export const sampleConfig: AnalysisConfig = resolveAnalysisConfig({
  groupCol: "group",
  itemCol: "item",
  budgetCol: "budget",
  actualCol: "actual",
  periodCol: null,
  materialityThresholdAbs: 100,
  materialityThresholdPct: 0.1,
});

export function sampleSummaryJson(): SummaryJson {
  return toSummaryJson(runVarianceAnalysis(sampleRows, sampleConfig));
}
