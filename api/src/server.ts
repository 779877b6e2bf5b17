// api/src/server.ts

// Must stay first: env.ts reads process.env at import time
import "./load-env.js";

import { ENV } from "./env.js";
import { createApp } from "./app.js";
import { azureSettingsFromEnv, createAzureChatClient } from "./llm/azureChat.js";

// Log environment at startup (safe, no secrets)
console.log("[env] PORT=", ENV.PORT);
console.log("[env] AZURE_OPENAI_ENDPOINT=", ENV.AZURE_OPENAI_ENDPOINT || "MISSING");
console.log("[env] AZURE_OPENAI_KEY=", ENV.AZURE_OPENAI_KEY ? "***SET***" : "MISSING");
console.log("[env] AZURE_OPENAI_DEPLOYMENT=", ENV.AZURE_OPENAI_DEPLOYMENT || "MISSING");

process.on("unhandledRejection", (reason) => {
  console.error("UNHANDLED REJECTION:", reason);
});
process.on("uncaughtException", (err) => {
  console.error("UNCAUGHT EXCEPTION:", err);
});

const azure = azureSettingsFromEnv(ENV);

let app: ReturnType<typeof createApp>;
try {
  app = createApp({
    chat: azure ? createAzureChatClient(azure) : null,
    analysisDefaults: {
      materialityThresholdAbs: ENV.ANALYSIS_MATERIALITY_ABS,
      materialityThresholdPct: ENV.ANALYSIS_MATERIALITY_PCT,
    },
    maxFocusItems: ENV.FORECAST_MAX_FOCUS_ITEMS,
    jsonLimit: ENV.JSON_LIMIT,
  });
} catch (e) {
  console.error("[env] invalid analysis defaults:", e instanceof Error ? e.message : e);
  process.exit(1);
}

app.listen(ENV.PORT, ENV.HOST, () => {
  console.log(`API listening on http://${ENV.HOST}:${ENV.PORT}`);
});
