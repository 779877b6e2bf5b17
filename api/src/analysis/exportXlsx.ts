// api/src/analysis/exportXlsx.ts
// Server-side Excel export of a variance summary using xlsx

import * as XLSX from "xlsx";
import type { SummaryJson } from "./summary.js";

/**
 * Build an .xlsx workbook with Summary, Aggregate and Line items sheets.
 * Absent percentages become empty cells.
 */
export function summaryToWorkbook(s: SummaryJson): Buffer {
  const workbook = XLSX.utils.book_new();

  const meta = XLSX.utils.json_to_sheet([
    { key: "description", value: s.metadata.description },
    { key: "row_count", value: s.metadata.row_count },
    { key: "materiality_abs", value: s.metadata.materiality_abs },
    { key: "materiality_pct", value: s.metadata.materiality_pct },
  ]);
  XLSX.utils.book_append_sheet(workbook, meta, "Summary");

  const aggregate = XLSX.utils.json_to_sheet(s.aggregate, {
    header: ["group", "budget_total", "actual_total", "variance_total", "variance_pct_total"],
  });
  XLSX.utils.book_append_sheet(workbook, aggregate, "Aggregate");

  const lines = XLSX.utils.json_to_sheet(
    s.line_items.map((li) => ({ ...li, drivers: li.drivers.join(", ") })),
    {
      header: [
        "group",
        "item",
        "period",
        "budget",
        "actual",
        "variance",
        "variance_pct",
        "direction",
        "material",
        "drivers",
      ],
    }
  );
  XLSX.utils.book_append_sheet(workbook, lines, "Line items");

  const out: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return out;
}
