// scripts/analyze_csv.ts
// Analyse a budget vs actual CSV from the command line:
//   tsx scripts/analyze_csv.ts <file.csv> [--out summary.json] [--group col] [--item col]
//     [--budget col] [--actual col] [--period col] [--abs 10000] [--pct 0.05] [--explain] [--forecast] [--llm]

import "../api/src/load-env.js";

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { parseCsvTable } from "../api/src/analysis/csvTable.js";
import { toSummaryJson, writeSummaryFile } from "../api/src/analysis/summary.js";
import { createVarianceAnalyzer } from "../api/src/analysis/varianceAnalyzer.js";
import { ENV } from "../api/src/env.js";
import { azureSettingsFromEnv, createAzureChatClient } from "../api/src/llm/azureChat.js";
import { explainFromJsonFile, explainVariance } from "../api/src/narrative/explanation.js";
import { forecastVariance } from "../api/src/narrative/forecast.js";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    out: { type: "string" },
    group: { type: "string" },
    item: { type: "string" },
    budget: { type: "string" },
    actual: { type: "string" },
    period: { type: "string" },
    abs: { type: "string" },
    pct: { type: "string" },
    explain: { type: "boolean", default: false },
    forecast: { type: "boolean", default: false },
    llm: { type: "boolean", default: false },
  },
});

const file = positionals[0];
if (!file) {
  console.error("Usage: tsx scripts/analyze_csv.ts <file.csv> [--out summary.json] [--explain] [--forecast] [--llm]");
  process.exit(1);
}

function numberArg(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    console.error(`--${name} must be a number, got ${raw}`);
    process.exit(1);
  }
  return n;
}

const analyzer = createVarianceAnalyzer({
  groupCol: values.group,
  itemCol: values.item,
  budgetCol: values.budget,
  actualCol: values.actual,
  periodCol: values.period,
  materialityThresholdAbs: numberArg("abs", values.abs) ?? ENV.ANALYSIS_MATERIALITY_ABS,
  materialityThresholdPct: numberArg("pct", values.pct) ?? ENV.ANALYSIS_MATERIALITY_PCT,
});

const summary = analyzer.run(parseCsvTable(readFileSync(file, "utf8")));
const json = toSummaryJson(summary);

console.log(
  `Analysed ${json.metadata.row_count} rows across ${json.aggregate.length} groups; ` +
    `${json.line_items.filter((li) => li.material).length} material line items.`
);

const azure = values.llm ? azureSettingsFromEnv(ENV) : null;
const chat = azure ? createAzureChatClient(azure) : null;

if (values.out) {
  writeSummaryFile(values.out, summary);
  console.log(`Summary written to ${values.out}`);
}

if (values.explain) {
  // Round-trip through the written file when there is one
  const result = values.out
    ? await explainFromJsonFile(values.out, { useLlm: values.llm }, chat)
    : await explainVariance(json, { useLlm: values.llm }, chat);
  console.log(`\nExplanation (${result.mode}):\n${result.narrative}`);
  for (const b of result.bullet_points) console.log(`  - ${b}`);
}

if (values.forecast) {
  const result = await forecastVariance(
    json,
    { useLlm: values.llm, maxFocusItems: ENV.FORECAST_MAX_FOCUS_ITEMS },
    chat
  );
  console.log(`\nForecast (${result.mode}):\n${result.narrative}`);
  for (const f of result.focus_areas) console.log(`  - ${f}`);
}
