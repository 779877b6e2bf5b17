// api/src/analysis/types.ts

export type Direction = "favorable" | "unfavorable" | "neutral";

export type Driver = "overspend" | "underspend" | "baseline";

export type AnalysisConfig = {
  readonly groupCol: string;
  readonly itemCol: string;
  readonly budgetCol: string;
  readonly actualCol: string;
  readonly periodCol: string | null; // null = no period column
  readonly materialityThresholdAbs: number;
  readonly materialityThresholdPct: number; // fraction, 0.05 = 5%
};

export type RawRow = Readonly<Record<string, unknown>>;

/**
 * Rows alone (schema = union of their keys), or rows with an explicit
 * schema such as a CSV header.
 */
export type TableInput =
  | readonly RawRow[]
  | { readonly columns: readonly string[]; readonly rows: readonly RawRow[] };

export type LineItemVariance = {
  readonly group: string;
  readonly item: string;
  readonly period: string | null;
  readonly budget: number;
  readonly actual: number;
  readonly variance: number;
  readonly variancePct: number | null; // null when budget is zero
  readonly direction: Direction;
  readonly material: boolean;
  readonly drivers: readonly Driver[];
};

export type AggregateVariance = {
  readonly group: string;
  readonly budgetTotal: number;
  readonly actualTotal: number;
  readonly varianceTotal: number;
  readonly variancePctTotal: number | null;
};

export type AnalysisMetadata = {
  readonly description: string;
  readonly rowCount: number;
  readonly materialityAbs: number;
  readonly materialityPct: number;
};

export type AnalysisSummary = {
  readonly metadata: AnalysisMetadata;
  readonly aggregate: readonly AggregateVariance[];
  readonly lineItems: readonly LineItemVariance[];
};

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}
