// api/src/narrative/explanation.ts
// Variance summary -> CFO-ready narrative + key points

import { readSummaryFile, type SummaryJson } from "../analysis/summary.js";
import type { ChatClient } from "../llm/azureChat.js";
import { fmtAmount, fmtPct, generateWithFallback, splitBullets } from "./strategy.js";

export type ExplanationMode = "llm" | "rule_based";

export type ExplanationConfig = {
  useLlm: boolean;
  maxOutputTokens: number;
  temperature: number;
};

export type ExplanationResult = {
  mode: ExplanationMode;
  narrative: string;
  bullet_points: string[];
};

export const DEFAULT_EXPLANATION_CONFIG: ExplanationConfig = {
  useLlm: false,
  maxOutputTokens: 700,
  temperature: 0.2,
};

const PROMPT_JSON_LIMIT = 12_000;

const SYSTEM_PROMPT =
  "You are a cautious FP&A analyst. " +
  "Write concise, accurate variance explanations. " +
  "Never fabricate financial figures.";

export function buildExplanationPrompt(s: SummaryJson): string {
  const summaryJson = JSON.stringify(s).slice(0, PROMPT_JSON_LIMIT);
  return [
    "You are a senior FP&A analyst.",
    "",
    "You are given structured budget vs actual variance analysis in JSON form.",
    "Your job is to:",
    "1. Write a clear 2-3 paragraph narrative suitable for a CFO.",
    "2. Then provide 3-6 bullet points with the key drivers and takeaways.",
    "3. Do NOT make up new numbers that are not implied by the JSON.",
    "",
    "Here is the JSON:",
    "",
    "```json",
    summaryJson,
    "```",
  ].join("\n");
}

/**
 * Narrative is every non-bullet line; when the model wrote no bullets,
 * the first four sentences stand in for them.
 */
export function splitNarrativeAndBullets(text: string): { narrative: string; bullets: string[] } {
  const { narrative, bullets } = splitBullets(text);
  if (bullets.length === 0 && narrative) {
    const sentences = narrative
      .split(".")
      .map((p) => p.trim())
      .filter(Boolean);
    return { narrative, bullets: sentences.slice(0, 4) };
  }
  return { narrative, bullets };
}

export function ruleBasedExplanation(s: SummaryJson): ExplanationResult {
  const { row_count, materiality_abs, materiality_pct } = s.metadata;

  const parts = [
    `Across ${fmtAmount(row_count)} line items, the system applied a materiality threshold of ` +
      `${fmtAmount(materiality_abs)} or ${fmtPct(materiality_pct)} to identify significant variances.`,
  ];

  const describe = (rows: SummaryJson["aggregate"]) =>
    rows
      .slice(0, 2)
      .map((a) => `${a.group} (≈ ${fmtAmount(a.variance_total)})`)
      .join(" and ");

  const unfav = s.aggregate
    .filter((a) => a.variance_total > 0)
    .sort((a, b) => b.variance_total - a.variance_total);
  const fav = s.aggregate
    .filter((a) => a.variance_total < 0)
    .sort((a, b) => a.variance_total - b.variance_total);

  if (unfav.length > 0) parts.push(`The largest unfavorable variances occurred in ${describe(unfav)}.`);
  if (fav.length > 0) parts.push(`Major favorable variances were seen in ${describe(fav)}.`);

  const bullets: string[] = [];
  const material = s.line_items.filter((li) => li.material);

  if (material.length > 0) {
    bullets.push(`${fmtAmount(material.length)} line items were marked as material.`);

    const counts = new Map<string, number>();
    for (const li of material) {
      for (const d of li.drivers) counts.set(d, (counts.get(d) ?? 0) + 1);
    }
    const top = [...counts].sort((a, b) => b[1] - a[1]).slice(0, 4);
    bullets.push(
      "Most common drivers among material items: " + top.map(([k, v]) => `${k} (${v})`).join(", ")
    );
  } else {
    bullets.push("No material line items were identified under the current thresholds.");
  }

  bullets.push("These structured insights can be used to support executive decision-making.");

  return { mode: "rule_based", narrative: parts.join(" "), bullet_points: bullets };
}

async function llmExplanation(
  s: SummaryJson,
  chat: ChatClient,
  cfg: ExplanationConfig
): Promise<ExplanationResult> {
  const content = await chat.complete({
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildExplanationPrompt(s) },
    ],
    maxTokens: cfg.maxOutputTokens,
    temperature: cfg.temperature,
  });

  const { narrative, bullets } = splitNarrativeAndBullets(content);
  return { mode: "llm", narrative, bullet_points: bullets };
}

export async function explainVariance(
  s: SummaryJson,
  config: Partial<ExplanationConfig> = {},
  chat: ChatClient | null = null
): Promise<ExplanationResult> {
  const d = DEFAULT_EXPLANATION_CONFIG;
  const cfg: ExplanationConfig = {
    useLlm: config.useLlm ?? d.useLlm,
    maxOutputTokens: config.maxOutputTokens ?? d.maxOutputTokens,
    temperature: config.temperature ?? d.temperature,
  };
  const remote = cfg.useLlm && chat ? (x: SummaryJson) => llmExplanation(x, chat, cfg) : null;
  if (cfg.useLlm && !chat) {
    console.log("[explanation] No chat model configured, using rule-based mode.");
  }
  return generateWithFallback("explanation", s, remote, ruleBasedExplanation);
}

export async function explainFromJsonFile(
  path: string,
  config: Partial<ExplanationConfig> = {},
  chat: ChatClient | null = null
): Promise<ExplanationResult> {
  return explainVariance(readSummaryFile(path), config, chat);
}
