// api/src/llm/azureChat.ts
// Minimal Azure OpenAI chat-completions client over fetch

import { z } from "zod";
import { ENV } from "../env.js";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ChatRequest = {
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
};

export type ChatClient = {
  complete(req: ChatRequest): Promise<string>;
};

export type AzureChatSettings = {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
};

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

/**
 * Settings from env, or null when endpoint, key or deployment is missing.
 */
export function azureSettingsFromEnv(env: typeof ENV = ENV): AzureChatSettings | null {
  const endpoint = env.AZURE_OPENAI_ENDPOINT.trim();
  const apiKey = env.AZURE_OPENAI_KEY.trim();
  const deployment = env.AZURE_OPENAI_DEPLOYMENT.trim();

  if (!endpoint || !apiKey || !deployment) {
    console.log(
      "[azureChat] Not configured:",
      `endpoint=${endpoint ? "SET" : "MISSING"}`,
      `key=${apiKey ? "***SET***" : "MISSING"}`,
      `deployment=${deployment || "MISSING"}`
    );
    return null;
  }

  return {
    endpoint,
    apiKey,
    deployment,
    apiVersion: env.AZURE_OPENAI_API_VERSION,
    timeoutMs: env.AZURE_OPENAI_TIMEOUT_MS,
  };
}

export function createAzureChatClient(
  settings: AzureChatSettings,
  fetchImpl: typeof fetch = fetch
): ChatClient {
  const base = settings.endpoint.replace(/\/+$/, "");
  const url =
    `${base}/openai/deployments/${encodeURIComponent(settings.deployment)}/chat/completions` +
    `?api-version=${encodeURIComponent(settings.apiVersion)}`;

  return {
    async complete(req: ChatRequest): Promise<string> {
      const resp = await fetchImpl(url, {
        method: "POST",
        headers: {
          "api-key": settings.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          messages: req.messages,
          max_tokens: req.maxTokens,
          temperature: req.temperature,
        }),
        signal: AbortSignal.timeout(settings.timeoutMs),
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw new Error(`Azure OpenAI error ${resp.status}: ${text.slice(0, 300)}`);
      }

      const parsed = completionSchema.safeParse(await resp.json());
      if (!parsed.success) {
        throw new Error("Azure OpenAI returned an unexpected response shape");
      }

      const content = parsed.data.choices[0].message.content?.trim();
      if (!content) throw new Error("Azure OpenAI returned an empty message");
      return content;
    },
  };
}
