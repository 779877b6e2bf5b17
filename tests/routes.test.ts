import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as XLSX from "xlsx";
import { createApp } from "../api/src/app.js";
import { ConfigurationError } from "../api/src/analysis/types.js";
import type { ChatClient } from "../api/src/llm/azureChat.js";
import { sampleRows, sampleSummaryJson } from "./fixtures.js";

const sampleConfigBody = {
  group_col: "group",
  item_col: "item",
  period_col: null,
  materiality_threshold_abs: 100,
  materiality_threshold_pct: 0.1,
};

let server: Server | null = null;

async function start(chat: ChatClient | null = null): Promise<string> {
  const app = createApp({
    chat,
    analysisDefaults: {},
    maxFocusItems: 6,
    jsonLimit: "1mb",
    logRequests: false,
  });
  const srv = app.listen(0, "127.0.0.1");
  server = srv;
  await once(srv, "listening");
  const addr = srv.address();
  if (addr === null || typeof addr === "string") throw new Error("server has no port");
  return `http://127.0.0.1:${addr.port}/api`;
}

async function post(url: string, body: unknown) {
  const resp = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  return resp;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  if (server) {
    const closed = once(server, "close");
    server.closeAllConnections();
    server.close();
    await closed;
    server = null;
  }
});

describe("HTTP API", () => {
  it("refuses to build with invalid analysis defaults", () => {
    const build = (abs: number) =>
      createApp({
        chat: null,
        analysisDefaults: { materialityThresholdAbs: abs },
        maxFocusItems: 6,
        jsonLimit: "1mb",
        logRequests: false,
      });
    expect(() => build(-1)).toThrow(ConfigurationError);
    expect(() => build(Number.NaN)).toThrow("materialityThresholdAbs must be a non-negative number");
  });

  it("reports health", async () => {
    const base = await start();
    const resp = await fetch(`${base}/health`);
    expect(await resp.json()).toEqual({ ok: true, service: "budget-variance-api", llm: "disabled" });
  });

  it("POST /analysis returns the serialized summary", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis`, { rows: sampleRows, config: sampleConfigBody });

    expect(resp.status).toBe(200);
    expect(await resp.json()).toEqual({ ok: true, summary: sampleSummaryJson() });
  });

  it("POST /analysis reads CSV text with the default column names", async () => {
    const base = await start();
    const csv = "department,account,budget,actual\nOps,Rent,100,150\nOps,Travel,abc,10\n";
    const json = await (await post(`${base}/analysis`, { csv })).json();

    expect(json).toMatchObject({
      summary: {
        metadata: { row_count: 1 },
        line_items: [{ variance_pct: 0.5, drivers: ["overspend"] }],
      },
    });
  });

  it("returns 400 with the missing columns", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis`, {
      rows: [{ group: "A", item: "x", budget: 1 }],
      config: sampleConfigBody,
    });

    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({
      ok: false,
      error: "Missing required columns: actual",
      missing: ["actual"],
    });
  });

  it("returns 400 for a body with both rows and csv", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis`, { rows: sampleRows, csv: "a,b" });

    expect(resp.status).toBe(400);
    expect(await resp.json()).toMatchObject({ ok: false, error: "Invalid request body" });
  });

  it("returns 400 for a body with both csv and columns", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis`, {
      csv: "department,account,budget,actual\nOps,Rent,100,150\n",
      columns: ["department", "account", "budget", "actual"],
    });

    expect(resp.status).toBe(400);
    expect(await resp.json()).toMatchObject({ ok: false, error: "Invalid request body" });
  });

  it("returns 400 for a negative threshold", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis`, {
      rows: sampleRows,
      config: { ...sampleConfigBody, materiality_threshold_abs: -5 },
    });
    expect(resp.status).toBe(400);
  });

  it("POST /analysis/overview returns KPIs", async () => {
    const base = await start();
    const json = await (await post(`${base}/analysis/overview`, { rows: sampleRows, config: sampleConfigBody })).json();
    expect(json).toMatchObject({ overview: { kpis: { material_count: 2, group_count: 2 } } });
  });

  it("POST /analysis/export returns an xlsx workbook", async () => {
    const base = await start();
    const resp = await post(`${base}/analysis/export`, { rows: sampleRows, config: sampleConfigBody });

    expect(resp.status).toBe(200);
    expect(resp.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    const wb = XLSX.read(Buffer.from(await resp.arrayBuffer()), { type: "buffer" });
    expect(wb.SheetNames).toEqual(["Summary", "Aggregate", "Line items"]);
  });

  it("POST /explanation validates the summary", async () => {
    const base = await start();
    const resp = await post(`${base}/explanation`, { summary: { metadata: {} } });
    expect(resp.status).toBe(400);
  });

  it("POST /explanation falls back when the model fails", async () => {
    const failing: ChatClient = {
      complete: async () => {
        throw new Error("network down");
      },
    };
    const base = await start(failing);
    const json = await (await post(`${base}/explanation`, { summary: sampleSummaryJson(), useLlm: true })).json();

    expect(json).toMatchObject({ ok: true, result: { mode: "rule_based" } });
  });

  it("POST /forecast uses the model when one is configured", async () => {
    const chat: ChatClient = { complete: async () => "Next period looks tight.\n- Review A" };
    const base = await start(chat);
    const json = await (await post(`${base}/forecast`, { summary: sampleSummaryJson() })).json();

    expect(json).toEqual({
      ok: true,
      result: {
        mode: "llm_forecast",
        narrative: "Next period looks tight.",
        focus_areas: ["Review A"],
      },
    });
  });

  it("POST /forecast without a model is rule-based", async () => {
    const base = await start();
    const json = await (await post(`${base}/forecast`, { summary: sampleSummaryJson(), maxFocusItems: 1 })).json();

    expect(json).toMatchObject({
      result: {
        mode: "rule_based_forecast",
        focus_areas: [
          "A: currently about € 100 above budget. " +
            "Prioritise a deep-dive review and consider tightening or reallocating budget next period.",
        ],
      },
    });
  });

  it("POST /report bundles everything", async () => {
    const base = await start();
    const json = await (await post(`${base}/report`, { rows: sampleRows, config: sampleConfigBody })).json();

    expect(json).toMatchObject({
      ok: true,
      summary: { metadata: { row_count: 3 } },
      overview: { kpis: { material_count: 2 } },
      explanation: { mode: "rule_based" },
      forecast: { mode: "rule_based_forecast" },
    });
  });

  it("answers malformed JSON with a JSON error", async () => {
    const base = await start();
    const resp = await fetch(`${base}/analysis`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toMatchObject({ ok: false });
  });
});
