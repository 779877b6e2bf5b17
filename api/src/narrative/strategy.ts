// api/src/narrative/strategy.ts
// "Generate" with two implementations: remote (chat model) first, templated text on any failure

import type { SummaryJson } from "../analysis/summary.js";

export type RemoteGenerator<T> = (summary: SummaryJson) => Promise<T>;
export type TemplateGenerator<T> = (summary: SummaryJson) => T;

export async function generateWithFallback<T>(
  tag: string,
  summary: SummaryJson,
  remote: RemoteGenerator<T> | null,
  template: TemplateGenerator<T>
): Promise<T> {
  if (remote) {
    try {
      return await remote(summary);
    } catch (e) {
      console.warn(`[${tag}] LLM call failed, fallback to rule-based:`, e instanceof Error ? e.message : e);
    }
  }
  return template(summary);
}

export function fmtAmount(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

export function fmtPct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

const BULLET_RE = /^[-*•]/;

/**
 * Split model output into narrative lines and bullet lines.
 * Blank lines are dropped.
 */
export function splitBullets(text: string): { narrative: string; bullets: string[] } {
  const narrativeLines: string[] = [];
  const bullets: string[] = [];

  for (const line of text.trim().split(/\r?\n/)) {
    const s = line.trim();
    if (!s) continue;
    if (BULLET_RE.test(s)) {
      bullets.push(s.replace(/^[-*•\s]+/, "").trim());
    } else {
      narrativeLines.push(s);
    }
  }

  return { narrative: narrativeLines.join(" "), bullets };
}
