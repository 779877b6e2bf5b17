// api/src/env.ts

function opt(name: string, fallback = "") {
  return process.env[name] || fallback;
}

function num(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${name} is not a number: ${raw}`);
  return n;
}

export const ENV = {
  // Server
  PORT: num("PORT", 8081),
  HOST: opt("HOST", "0.0.0.0"),
  JSON_LIMIT: opt("JSON_LIMIT", "5mb"),

  // Azure OpenAI (all optional; narrative endpoints fall back to templated text)
  AZURE_OPENAI_ENDPOINT: opt("AZURE_OPENAI_ENDPOINT"),
  AZURE_OPENAI_KEY: opt("AZURE_OPENAI_KEY"),
  AZURE_OPENAI_DEPLOYMENT: opt("AZURE_OPENAI_DEPLOYMENT"),
  AZURE_OPENAI_API_VERSION: opt("AZURE_OPENAI_API_VERSION", "2024-02-01"),
  AZURE_OPENAI_TIMEOUT_MS: num("AZURE_OPENAI_TIMEOUT_MS", 20_000),

  // Analysis defaults
  ANALYSIS_MATERIALITY_ABS: num("ANALYSIS_MATERIALITY_ABS", 10_000),
  ANALYSIS_MATERIALITY_PCT: num("ANALYSIS_MATERIALITY_PCT", 0.05),
  FORECAST_MAX_FOCUS_ITEMS: num("FORECAST_MAX_FOCUS_ITEMS", 6),
} as const;
