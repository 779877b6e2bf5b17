// api/src/analysis/varianceAnalyzer.ts
// Budget vs actual variance pipeline: validate -> variances -> materiality/drivers -> aggregate

import {
  ConfigurationError,
  type AggregateVariance,
  type AnalysisConfig,
  type AnalysisSummary,
  type Direction,
  type Driver,
  type LineItemVariance,
  type RawRow,
  type TableInput,
} from "./types.js";

export const ANALYSIS_DESCRIPTION = "Budget vs Actual variance analysis";

// Absolute tolerance for "is this zero" checks on derived floats
export const ZERO_TOLERANCE = 1e-8;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  groupCol: "department",
  itemCol: "account",
  budgetCol: "budget",
  actualCol: "actual",
  periodCol: "period",
  materialityThresholdAbs: 10_000,
  materialityThresholdPct: 0.05,
};

export function isNearZero(x: number): boolean {
  return Math.abs(x) <= ZERO_TOLERANCE;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigurationError on empty column names or bad thresholds.
 */
export function resolveAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  const cfg: AnalysisConfig = {
    groupCol: overrides.groupCol ?? d.groupCol,
    itemCol: overrides.itemCol ?? d.itemCol,
    budgetCol: overrides.budgetCol ?? d.budgetCol,
    actualCol: overrides.actualCol ?? d.actualCol,
    periodCol: overrides.periodCol === undefined ? d.periodCol : overrides.periodCol,
    materialityThresholdAbs: overrides.materialityThresholdAbs ?? d.materialityThresholdAbs,
    materialityThresholdPct: overrides.materialityThresholdPct ?? d.materialityThresholdPct,
  };

  const columns: Array<[string, string]> = [
    ["groupCol", cfg.groupCol],
    ["itemCol", cfg.itemCol],
    ["budgetCol", cfg.budgetCol],
    ["actualCol", cfg.actualCol],
  ];
  const blank = columns.filter(([, col]) => !col.trim()).map(([key]) => key);
  if (blank.length > 0) {
    throw new ConfigurationError(`Column bindings must not be empty: ${blank.join(", ")}`);
  }
  if (cfg.periodCol !== null && !cfg.periodCol.trim()) {
    throw new ConfigurationError("periodCol must be a column name or null");
  }

  for (const key of ["materialityThresholdAbs", "materialityThresholdPct"] as const) {
    const v = cfg[key];
    if (!Number.isFinite(v) || v < 0) {
      throw new ConfigurationError(`${key} must be a non-negative number, got ${v}`);
    }
  }

  return Object.freeze(cfg);
}

const AMOUNT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
// Commas only as thousands separators: 1,234,567.89
const GROUPED_RE = /^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d*)?$/;

/**
 * Coerce a cell to a finite number.
 * Strings may carry a currency symbol, thousands commas, or accounting
 * parentheses for negatives. Anything else returns null.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  let s = value.trim();
  let negative = false;
  const paren = s.match(/^\((.*)\)$/);
  if (paren) {
    negative = true;
    s = paren[1].trim();
    if (/^[+-]/.test(s)) return null;
  }

  s = s.replace(/^([+-]?)[$€£]\s*/, "$1");
  if (s.includes(",")) {
    if (!GROUPED_RE.test(s)) return null;
    s = s.replace(/,/g, "");
  }
  if (!AMOUNT_RE.test(s)) return null;

  const n = Number(s);
  if (!Number.isFinite(n)) return null;
  return negative ? -n : n;
}

function label(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

function schemaOf(table: TableInput): { columns: Set<string>; rows: readonly RawRow[] } {
  if ("columns" in table) {
    return { columns: new Set(table.columns), rows: table.rows };
  }
  const columns = new Set<string>();
  for (const row of table) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return { columns, rows: table };
}

// ---------- steps ----------

type PreparedRow = {
  group: string;
  item: string;
  period: string | null;
  budget: number;
  actual: number;
};

function validateAndPrepare(table: TableInput, cfg: AnalysisConfig): PreparedRow[] {
  const { columns, rows } = schemaOf(table);

  const required = [cfg.groupCol, cfg.itemCol, cfg.budgetCol, cfg.actualCol];
  const missing = required.filter((col, i) => !columns.has(col) && required.indexOf(col) === i);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required columns: ${missing.join(", ")}`, missing);
  }

  const periodCol = cfg.periodCol !== null && columns.has(cfg.periodCol) ? cfg.periodCol : null;

  const prepared: PreparedRow[] = [];
  for (const row of rows) {
    const budget = parseAmount(row[cfg.budgetCol]);
    const actual = parseAmount(row[cfg.actualCol]);
    if (budget === null || actual === null) continue; // unparseable: drop, don't guess

    const rawPeriod = periodCol === null ? null : row[periodCol];
    prepared.push({
      group: label(row[cfg.groupCol]),
      item: label(row[cfg.itemCol]),
      period: rawPeriod === null || rawPeriod === undefined || rawPeriod === "" ? null : String(rawPeriod),
      budget,
      actual,
    });
  }
  return prepared;
}

export function classifyDirection(variance: number): Direction {
  if (isNearZero(variance)) return "neutral";
  return variance > 0 ? "unfavorable" : "favorable";
}

export function driversFor(material: boolean, direction: Direction): Driver[] {
  if (material && direction === "unfavorable") return ["overspend"];
  if (material && direction === "favorable") return ["underspend"];
  // material + neutral also lands here
  return ["baseline"];
}

export function ratioOrNull(numerator: number, denominator: number): number | null {
  return isNearZero(denominator) ? null : numerator / denominator;
}

function toLineItem(row: PreparedRow, cfg: AnalysisConfig): LineItemVariance {
  const variance = row.actual - row.budget;
  // exact zero only; tolerance applies to summed group budgets
  const variancePct = row.budget === 0 ? null : variance / row.budget;
  const direction = classifyDirection(variance);

  const materialAbs = Math.abs(variance) >= cfg.materialityThresholdAbs;
  const materialPct = variancePct !== null && Math.abs(variancePct) >= cfg.materialityThresholdPct;
  const material = materialAbs || materialPct;

  return Object.freeze({
    ...row,
    variance,
    variancePct,
    direction,
    material,
    drivers: Object.freeze(driversFor(material, direction)),
  });
}

function aggregateByGroup(lines: readonly LineItemVariance[]): AggregateVariance[] {
  // Map keeps first-seen group order
  const totals = new Map<string, { budget: number; actual: number }>();
  for (const li of lines) {
    const t = totals.get(li.group);
    if (t) {
      t.budget += li.budget;
      t.actual += li.actual;
    } else {
      totals.set(li.group, { budget: li.budget, actual: li.actual });
    }
  }

  return Array.from(totals, ([group, t]) => {
    const varianceTotal = t.actual - t.budget;
    return Object.freeze({
      group,
      budgetTotal: t.budget,
      actualTotal: t.actual,
      varianceTotal,
      variancePctTotal: ratioOrNull(varianceTotal, t.budget),
    });
  });
}

/**
 * Run the full analysis over one table. Pure: no I/O, no shared state.
 * Only schema problems throw; bad rows are dropped.
 */
export function runVarianceAnalysis(table: TableInput, config: AnalysisConfig): AnalysisSummary {
  const prepared = validateAndPrepare(table, config);
  const lineItems = Object.freeze(prepared.map((row) => toLineItem(row, config)));
  const aggregate = Object.freeze(aggregateByGroup(lineItems));

  return Object.freeze({
    metadata: Object.freeze({
      description: ANALYSIS_DESCRIPTION,
      rowCount: lineItems.length,
      materialityAbs: config.materialityThresholdAbs,
      materialityPct: config.materialityThresholdPct,
    }),
    aggregate,
    lineItems,
  });
}

export type VarianceAnalyzer = {
  readonly config: AnalysisConfig;
  run(table: TableInput): AnalysisSummary;
};

export function createVarianceAnalyzer(overrides: Partial<AnalysisConfig> = {}): VarianceAnalyzer {
  const config = resolveAnalysisConfig(overrides);
  return {
    config,
    run: (table) => runVarianceAnalysis(table, config),
  };
}
