// api/src/routes.ts
import { Router, type Response } from "express";
import { z, ZodError } from "zod";
import { parseCsvTable } from "./analysis/csvTable.js";
import { summaryToWorkbook } from "./analysis/exportXlsx.js";
import { buildOverview } from "./analysis/overview.js";
import { parseSummaryJson, toSummaryJson, type SummaryJson } from "./analysis/summary.js";
import { ConfigurationError, type AnalysisConfig, type TableInput } from "./analysis/types.js";
import { createVarianceAnalyzer, resolveAnalysisConfig } from "./analysis/varianceAnalyzer.js";
import type { ChatClient } from "./llm/azureChat.js";
import { explainVariance } from "./narrative/explanation.js";
import { forecastVariance } from "./narrative/forecast.js";

export type RouteDeps = {
  chat: ChatClient | null;
  analysisDefaults: Partial<AnalysisConfig>;
  maxFocusItems: number;
};

// Option names as callers send them (snake_case)
const configBodySchema = z
  .object({
    group_col: z.string().optional(),
    item_col: z.string().optional(),
    budget_col: z.string().optional(),
    actual_col: z.string().optional(),
    period_col: z.string().nullable().optional(),
    materiality_threshold_abs: z.number().optional(),
    materiality_threshold_pct: z.number().optional(),
  })
  .default({});

const tableBodySchema = z
  .object({
    rows: z.array(z.record(z.unknown())).optional(),
    columns: z.array(z.string()).optional(),
    csv: z.string().optional(),
    config: configBodySchema,
    useLlm: z.boolean().optional(),
  })
  .refine((b) => (b.rows === undefined) !== (b.csv === undefined), {
    message: "Provide exactly one of rows or csv",
  })
  .refine((b) => b.csv === undefined || b.columns === undefined, {
    message: "columns cannot be combined with csv; the CSV header defines the columns",
    path: ["columns"],
  });

type TableBody = z.infer<typeof tableBodySchema>;

const summaryBodySchema = z.object({
  summary: z.unknown(),
  useLlm: z.boolean().optional(),
  maxFocusItems: z.number().int().nonnegative().optional(),
});

function tableFrom(body: TableBody): TableInput {
  if (body.csv !== undefined) return parseCsvTable(body.csv);
  const rows = body.rows ?? [];
  return body.columns ? { columns: body.columns, rows } : rows;
}

function configFrom(body: TableBody, defaults: Partial<AnalysisConfig>): Partial<AnalysisConfig> {
  const c = body.config;
  return {
    groupCol: c.group_col ?? defaults.groupCol,
    itemCol: c.item_col ?? defaults.itemCol,
    budgetCol: c.budget_col ?? defaults.budgetCol,
    actualCol: c.actual_col ?? defaults.actualCol,
    periodCol: c.period_col === undefined ? defaults.periodCol : c.period_col,
    materialityThresholdAbs: c.materiality_threshold_abs ?? defaults.materialityThresholdAbs,
    materialityThresholdPct: c.materiality_threshold_pct ?? defaults.materialityThresholdPct,
  };
}

function sendError(res: Response, tag: string, err: unknown) {
  if (err instanceof ConfigurationError) {
    return res.status(400).json({ ok: false, error: err.message, missing: err.missing });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ ok: false, error: "Invalid request body", issues: err.issues });
  }
  console.error(`[${tag}] error:`, err);
  return res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
}

export function buildRoutes(deps: RouteDeps): Router {
  const routes = Router();
  // Bad server-wide defaults fail here, at startup, not on the first request
  const defaults = resolveAnalysisConfig(deps.analysisDefaults);

  const analyze = (raw: unknown): { body: TableBody; summary: SummaryJson } => {
    const body = tableBodySchema.parse(raw);
    const analyzer = createVarianceAnalyzer(configFrom(body, defaults));
    const summary = toSummaryJson(analyzer.run(tableFrom(body)));
    console.log(`[analysis] rows=${summary.metadata.row_count} groups=${summary.aggregate.length}`);
    return { body, summary };
  };

  routes.post("/analysis", (req, res) => {
    try {
      const { summary } = analyze(req.body);
      res.json({ ok: true, summary });
    } catch (e) {
      sendError(res, "analysis", e);
    }
  });

  routes.post("/analysis/overview", (req, res) => {
    try {
      const { summary } = analyze(req.body);
      res.json({ ok: true, overview: buildOverview(summary) });
    } catch (e) {
      sendError(res, "analysis/overview", e);
    }
  });

  routes.post("/analysis/export", (req, res) => {
    try {
      const { summary } = analyze(req.body);
      const buf = summaryToWorkbook(summary);
      res.setHeader("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
      res.setHeader("Content-Disposition", 'attachment; filename="variance-summary.xlsx"');
      res.send(buf);
    } catch (e) {
      sendError(res, "analysis/export", e);
    }
  });

  routes.post("/explanation", async (req, res) => {
    try {
      const body = summaryBodySchema.parse(req.body);
      const summary = parseSummaryJson(body.summary);
      const result = await explainVariance(summary, { useLlm: body.useLlm }, deps.chat);
      res.json({ ok: true, result });
    } catch (e) {
      sendError(res, "explanation", e);
    }
  });

  routes.post("/forecast", async (req, res) => {
    try {
      const body = summaryBodySchema.parse(req.body);
      const summary = parseSummaryJson(body.summary);
      const result = await forecastVariance(
        summary,
        { useLlm: body.useLlm, maxFocusItems: body.maxFocusItems ?? deps.maxFocusItems },
        deps.chat
      );
      res.json({ ok: true, result });
    } catch (e) {
      sendError(res, "forecast", e);
    }
  });

  // Analysis + overview + explanation + forecast in one call
  routes.post("/report", async (req, res) => {
    try {
      const { body, summary } = analyze(req.body);
      const useLlm = body.useLlm ?? false;
      const [explanation, forecast] = await Promise.all([
        explainVariance(summary, { useLlm }, deps.chat),
        forecastVariance(summary, { useLlm, maxFocusItems: deps.maxFocusItems }, deps.chat),
      ]);
      res.json({ ok: true, summary, overview: buildOverview(summary), explanation, forecast });
    } catch (e) {
      sendError(res, "report", e);
    }
  });

  return routes;
}
