import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { ChatClient, ChatRequest } from "../api/src/llm/azureChat.js";
import {
  buildExplanationPrompt,
  explainVariance,
  ruleBasedExplanation,
  splitNarrativeAndBullets,
} from "../api/src/narrative/explanation.js";
import { sampleSummaryJson } from "./fixtures.js";

function fakeChat(reply: string | Error): ChatClient & { calls: ChatRequest[] } {
  const calls: ChatRequest[] = [];
  return {
    calls,
    async complete(req) {
      calls.push(req);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

describe("ruleBasedExplanation", () => {
  it("describes thresholds, largest variances and drivers", () => {
    const r = ruleBasedExplanation(sampleSummaryJson());

    expect(r.mode).toBe("rule_based");
    expect(r.narrative).toBe(
      "Across 3 line items, the system applied a materiality threshold of 100 or 10.0% to identify significant variances. " +
        "The largest unfavorable variances occurred in A (≈ 100) and B (≈ 50)."
    );
    expect(r.bullet_points).toEqual([
      "2 line items were marked as material.",
      "Most common drivers among material items: overspend (1), underspend (1)",
      "These structured insights can be used to support executive decision-making.",
    ]);
  });

  it("mentions favorable groups and the no-material case", () => {
    const s = sampleSummaryJson();
    const r = ruleBasedExplanation({
      ...s,
      aggregate: [
        { group: "Ops", budget_total: 5000, actual_total: 2500, variance_total: -2500, variance_pct_total: -0.5 },
        { group: "IT", budget_total: 5000, actual_total: 4000, variance_total: -1000, variance_pct_total: -0.2 },
        { group: "HR", budget_total: 5000, actual_total: 1000, variance_total: -4000, variance_pct_total: -0.8 },
      ],
      line_items: s.line_items.map((li) => ({ ...li, material: false })),
    });

    expect(r.narrative.endsWith("Major favorable variances were seen in HR (≈ -4,000) and Ops (≈ -2,500).")).toBe(true);
    expect(r.bullet_points[0]).toBe("No material line items were identified under the current thresholds.");
  });
});

describe("splitNarrativeAndBullets", () => {
  it("separates bullet lines from narrative lines", () => {
    expect(splitNarrativeAndBullets("Spending rose.\n\n- Marketing overspent\n* Travel up\n• Rent flat")).toEqual({
      narrative: "Spending rose.",
      bullets: ["Marketing overspent", "Travel up", "Rent flat"],
    });
  });

  it("uses the first four sentences when there are no bullets", () => {
    expect(splitNarrativeAndBullets("One. Two. Three. Four. Five.").bullets).toEqual(["One", "Two", "Three", "Four"]);
  });
});

describe("explainVariance", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stays rule-based unless the caller asks for the model", async () => {
    const chat = fakeChat("should not be used");
    const r = await explainVariance(sampleSummaryJson(), {}, chat);
    expect(r.mode).toBe("rule_based");
    expect(chat.calls).toHaveLength(0);
  });

  it("uses the chat model when enabled", async () => {
    const chat = fakeChat("Costs ran ahead of plan.\n- A overspent on x1\n- A saved on x2");
    const r = await explainVariance(sampleSummaryJson(), { useLlm: true }, chat);

    expect(r).toEqual({
      mode: "llm",
      narrative: "Costs ran ahead of plan.",
      bullet_points: ["A overspent on x1", "A saved on x2"],
    });
    expect(chat.calls).toHaveLength(1);
    expect(chat.calls[0].maxTokens).toBe(700);
    expect(chat.calls[0].temperature).toBe(0.2);
    expect(chat.calls[0].messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("falls back to rule-based when the call fails", async () => {
    const r = await explainVariance(sampleSummaryJson(), { useLlm: true }, fakeChat(new Error("503")));
    expect(r.mode).toBe("rule_based");
    expect(r.bullet_points[0]).toBe("2 line items were marked as material.");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to rule-based when no model is configured", async () => {
    const r = await explainVariance(sampleSummaryJson(), { useLlm: true }, null);
    expect(r.mode).toBe("rule_based");
  });
});

describe("buildExplanationPrompt", () => {
  it("embeds the summary JSON, capped at 12000 characters", () => {
    const s = sampleSummaryJson();
    expect(buildExplanationPrompt(s)).toContain('"row_count":3');

    const big = {
      ...s,
      line_items: Array.from({ length: 500 }, (_, i) => ({ ...s.line_items[0], item: `item-${i}` })),
    };
    const prompt = buildExplanationPrompt(big);
    const json = prompt.slice(prompt.indexOf("```json\n") + 8, prompt.lastIndexOf("\n```"));
    expect(json).toHaveLength(12_000);
  });
});
