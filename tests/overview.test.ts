import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { buildOverview } from "../api/src/analysis/overview.js";
import { summaryToWorkbook } from "../api/src/analysis/exportXlsx.js";
import { sampleSummaryJson } from "./fixtures.js";

describe("buildOverview", () => {
  it("counts KPIs and ranks groups and material items by absolute variance", () => {
    const o = buildOverview(sampleSummaryJson());

    expect(o.kpis).toEqual({
      row_count: 3,
      material_count: 2,
      group_count: 2,
      materiality_abs: 100,
      materiality_pct: 0.1,
    });
    expect(o.group_profile.map((g) => [g.group, g.variance_total, g.label])).toEqual([
      ["A", 100, "Unfavorable"],
      ["B", 50, "Unfavorable"],
    ]);
    expect(o.group_profile[0].variance_m).toBeCloseTo(0.0001, 10);
    expect(o.top_material.map((li) => li.item)).toEqual(["x1", "x2"]);
  });

  it("truncates to the requested sizes", () => {
    const o = buildOverview(sampleSummaryJson(), { topGroups: 1, topMaterial: 1 });
    expect(o.group_profile.map((g) => g.group)).toEqual(["A"]);
    expect(o.top_material.map((li) => li.item)).toEqual(["x1"]);
  });
});

describe("summaryToWorkbook", () => {
  it("writes summary, aggregate and line item sheets", () => {
    const wb = XLSX.read(summaryToWorkbook(sampleSummaryJson()), { type: "buffer" });
    expect(wb.SheetNames).toEqual(["Summary", "Aggregate", "Line items"]);

    const agg = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets["Aggregate"]);
    expect(agg).toHaveLength(2);
    expect(agg[0].group).toBe("A");
    expect(agg[0].budget_total).toBe(1500);
    expect(agg[1].group).toBe("B");
    expect(agg[1].variance_total).toBe(50);

    const lines = XLSX.utils.sheet_to_json<Record<string, unknown>>(wb.Sheets["Line items"]);
    expect(lines.map((l) => l.drivers)).toEqual(["overspend", "underspend", "baseline"]);
  });
});
