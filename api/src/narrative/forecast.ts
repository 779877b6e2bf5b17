// api/src/narrative/forecast.ts
// Forward-looking guidance from the same serialized summary the explanation uses

import { isNearZero } from "../analysis/varianceAnalyzer.js";
import type { AggregateJson, SummaryJson } from "../analysis/summary.js";
import type { ChatClient } from "../llm/azureChat.js";
import { fmtAmount, generateWithFallback, splitBullets } from "./strategy.js";

export type ForecastMode = "llm_forecast" | "rule_based_forecast";

export type ForecastConfig = {
  useLlm: boolean;
  maxFocusItems: number;
  maxOutputTokens: number;
  temperature: number;
  currencySymbol: string;
};

export type ForecastResult = {
  mode: ForecastMode;
  narrative: string;
  focus_areas: string[];
};

export const DEFAULT_FORECAST_CONFIG: ForecastConfig = {
  useLlm: true,
  maxFocusItems: 6,
  maxOutputTokens: 600,
  temperature: 0.4,
  currencySymbol: "€",
};

type Totals = {
  budget: number;
  actual: number;
  variance: number;
  variancePct: number | null;
};

function totalsOf(aggregate: readonly AggregateJson[]): Totals {
  const budget = aggregate.reduce((sum, a) => sum + a.budget_total, 0);
  const actual = aggregate.reduce((sum, a) => sum + a.actual_total, 0);
  const variance = actual - budget;
  return { budget, actual, variance, variancePct: isNearZero(budget) ? null : variance / budget };
}

/** Groups ranked by absolute variance, largest first. */
export function rankFocusGroups(aggregate: readonly AggregateJson[], max: number): AggregateJson[] {
  return [...aggregate]
    .sort((a, b) => Math.abs(b.variance_total) - Math.abs(a.variance_total))
    .slice(0, Math.max(0, max));
}

export function ruleBasedForecast(s: SummaryJson, cfg: ForecastConfig): ForecastResult {
  const cur = cfg.currencySymbol;
  const t = totalsOf(s.aggregate);

  const stance = isNearZero(t.variance) ? "on track" : t.variance > 0 ? "unfavourable" : "favourable";
  const relative =
    t.variancePct === null
      ? "a percentage relative to the total budget cannot be computed because the total budget is zero"
      : `which is about ${(t.variancePct * 100).toFixed(1)}% relative to the total budget`;

  const narrative =
    "Looking ahead based on the current run-rate, the organisation is " +
    `${stance} by approximately ${cur} ${fmtAmount(t.variance)}, ${relative}. ` +
    "Departments with the largest current variances are likely to create the most risk next period " +
    "and should be reviewed in more detail.";

  const focus_areas = rankFocusGroups(s.aggregate, cfg.maxFocusItems).map((a) => {
    const v = a.variance_total;
    const where = isNearZero(v) ? "on budget" : v > 0 ? "above budget" : "below budget";
    return (
      `${a.group}: currently about ${cur} ${fmtAmount(Math.abs(v))} ${where}. ` +
      "Prioritise a deep-dive review and consider tightening or reallocating budget next period."
    );
  });

  if (focus_areas.length === 0) {
    focus_areas.push(
      "Overall variance is small; maintain current controls but continue monitoring key departments."
    );
  }

  return { mode: "rule_based_forecast", narrative, focus_areas };
}

const SYSTEM_PROMPT =
  "You are a senior FP&A forecasting analyst. " +
  "Given current-period budget vs actual data, you must:\n" +
  "1) Write a short forward-looking narrative (2-3 sentences) " +
  "about risk and direction for the next period.\n" +
  "2) Provide 4-6 specific focus recommendations for finance leadership.\n" +
  "Use only the information given. Do NOT invent new numeric values.";

export function buildForecastPrompt(s: SummaryJson, cfg: ForecastConfig): string {
  const cur = cfg.currencySymbol;
  const t = totalsOf(s.aggregate);
  const groupBlock = s.aggregate
    .map(
      (a) =>
        `- ${a.group}: budget ${cur} ${fmtAmount(a.budget_total)}, ` +
        `actual ${cur} ${fmtAmount(a.actual_total)}, variance ${cur} ${fmtAmount(a.variance_total)}`
    )
    .join("\n");

  return [
    `Total budget this period: ${cur} ${fmtAmount(t.budget)}`,
    `Total actual spend this period: ${cur} ${fmtAmount(t.actual)}`,
    `Total variance (actual - budget): ${cur} ${fmtAmount(t.variance)}`,
    "",
    `Department-level summary:\n${groupBlock}`,
    "",
    "Now provide:",
    "A) A concise forward-looking narrative.",
    "B) A bulleted list of recommended focus areas for next period.",
  ].join("\n");
}

async function llmForecast(s: SummaryJson, chat: ChatClient, cfg: ForecastConfig): Promise<ForecastResult> {
  const content = await chat.complete({
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildForecastPrompt(s, cfg) },
    ],
    maxTokens: cfg.maxOutputTokens,
    temperature: cfg.temperature,
  });

  const split = splitBullets(content);
  const narrative =
    split.narrative ||
    "Based on the current variances, several departments are likely to continue driving overspend " +
      "risk next period unless corrective actions are taken.";
  const focus_areas =
    split.bullets.length > 0
      ? split.bullets
      : [
          "Review top overspending departments and agree concrete corrective actions.",
          "Reforecast next period's spend using updated run-rates and operational plans.",
        ];

  return {
    mode: "llm_forecast",
    narrative,
    focus_areas: focus_areas.slice(0, Math.max(0, cfg.maxFocusItems)),
  };
}

export async function forecastVariance(
  s: SummaryJson,
  config: Partial<ForecastConfig> = {},
  chat: ChatClient | null = null
): Promise<ForecastResult> {
  const d = DEFAULT_FORECAST_CONFIG;
  const cfg: ForecastConfig = {
    useLlm: config.useLlm ?? d.useLlm,
    maxFocusItems: config.maxFocusItems ?? d.maxFocusItems,
    maxOutputTokens: config.maxOutputTokens ?? d.maxOutputTokens,
    temperature: config.temperature ?? d.temperature,
    currencySymbol: config.currencySymbol ?? d.currencySymbol,
  };

  const remote = cfg.useLlm && chat ? (x: SummaryJson) => llmForecast(x, chat, cfg) : null;
  return generateWithFallback("forecast", s, remote, (x) => ruleBasedForecast(x, cfg));
}
