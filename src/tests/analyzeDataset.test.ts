import { describe, expect, it, vi } from "vitest";
import { analyzeDataset } from "../lib/analyzeDataset";
import { analyzeOptionsFromConfig, loadConfig } from "../lib/config";
import { parseTemplate } from "../lib/dashboard/template";
import type { Dataset, DatasetRow } from "../lib/profiling/types";
import type { TextRewriter } from "../lib/rewrite/types";

const DAY_MS = 86_400_000;
const categories = [
  "groceries",
  "travel",
  "dining",
  "fuel",
  "utilities",
  "health",
  "books",
  "games"
];

// rows spread over six months; the middle amount is 50x the median
const buildTransactions = (count = 60): Dataset => {
  const stepDays = Math.floor(180 / count);
  const rows: DatasetRow[] = [];
  for (let index = 0; index < count; index += 1) {
    rows.push({
      txn_date: new Date(Date.UTC(2024, 0, 1) + index * stepDays * DAY_MS).toISOString().slice(0, 10),
      amt: index === Math.floor(count / 2) ? 1237.5 : 20.25 + (index % 7) * 1.5,
      merchant_category: categories[index % categories.length]
    });
  }
  return { columns: ["txn_date", "amt", "merchant_category"], rows };
};

const template = parseTemplate({
  panels: [
    {
      id: "amount-over-time",
      required_roles: ["date", "amount"],
      chart_type: "line",
      aggregation: "group-by-time-bucket",
      title_template: "{amount} by {granularity} {date}"
    },
    {
      id: "average-by-account",
      required_roles: ["account"],
      chart_type: "bar",
      aggregation: "avg",
      title_template: "Average per {account}"
    }
  ]
});

const buildLogger = () => ({ info: vi.fn(), warn: vi.fn() });

describe("analyzeDataset", () => {
  it("maps, explains and charts a transaction ledger", async () => {
    const logger = buildLogger();

    const result = await analyzeDataset(buildTransactions(), { template, topK: 10, logger });

    expect(result.profiles.map((profile) => profile.inferredType)).toEqual([
      "datetime",
      "numeric",
      "categorical"
    ]);
    expect(result.mapping.date?.column).toBe("txn_date");
    expect(result.mapping.amount?.column).toBe("amt");
    expect(result.mapping.category?.column).toBe("merchant_category");
    Object.values(result.mapping).forEach((binding) => {
      expect(binding.confidence).toBeGreaterThanOrEqual(0.5);
    });

    expect(result.insights).toContainEqual(
      expect.objectContaining({ category: "outlier", subject: "amt" })
    );
    expect(result.insights).toContainEqual(
      expect.objectContaining({ category: "top-n", subject: "merchant_category" })
    );

    const [overTime, byAccount] = result.charts;
    expect(overTime).toMatchObject({
      status: "resolved",
      title: "amt by monthly txn_date",
      series: { kind: "time", granularity: "month" }
    });
    expect(byAccount).toMatchObject({ status: "skipped", missingRoles: ["account"] });

    expect(logger.info).toHaveBeenCalledWith("[analyze] done", {
      mappedRoles: 3,
      insights: result.insights.length,
      charts: 2,
      skippedCharts: 1
    });
  });

  it.each([10, 30])("handles the same ledger with %i rows", async (count) => {
    const result = await analyzeDataset(buildTransactions(count), {
      template,
      topK: 20,
      logger: buildLogger()
    });

    expect(result.mapping.date?.column).toBe("txn_date");
    expect(result.mapping.amount?.column).toBe("amt");
    expect(result.mapping.category?.column).toBe("merchant_category");
    expect(result.mapping.counterparty).toBeUndefined();
    expect(result.insights).toContainEqual(
      expect.objectContaining({ category: "outlier", subject: "amt" })
    );
    expect(result.insights).toContainEqual(
      expect.objectContaining({ category: "top-n", subject: "merchant_category" })
    );
    expect(result.charts[0]).toMatchObject({ status: "resolved", granularity: "month" });
    expect(result.charts[1]).toMatchObject({ status: "skipped", missingRoles: ["account"] });
  });

  it("ranks categories of a ledger with negative amounts", async () => {
    const dataset = buildTransactions();
    const negated: Dataset = {
      columns: dataset.columns,
      rows: dataset.rows.map((row) => ({ ...row, amt: -Number(row.amt) }))
    };

    const result = await analyzeDataset(negated, { template, topK: 10, logger: buildLogger() });

    expect(result.insights).toContainEqual(
      expect.objectContaining({ category: "top-n", subject: "merchant_category" })
    );
  });

  it("applies configured top-K and acceptance threshold", async () => {
    const strict = await analyzeDataset(
      buildTransactions(),
      analyzeOptionsFromConfig(loadConfig({ MAPPING_ACCEPT_THRESHOLD: "0.99" }), template, buildLogger())
    );
    const limited = await analyzeDataset(
      buildTransactions(),
      analyzeOptionsFromConfig(loadConfig({ INSIGHT_TOP_K: "1" }), template, buildLogger())
    );

    expect(Object.keys(strict.mapping)).toEqual(["category", "date"]);
    expect(Object.keys(limited.mapping)).toEqual(["amount", "category", "date"]);
    expect(limited.insights).toHaveLength(1);
  });

  it("keeps insight count, order and categories when every rewrite times out", async () => {
    const dataset = buildTransactions();
    const stalled: TextRewriter = { rewrite: () => new Promise<string>(() => undefined) };

    const baseline = await analyzeDataset(dataset, {
      template,
      topK: 10,
      rewrite: { enabled: false, rewriter: null, timeoutMs: 10 },
      logger: buildLogger()
    });
    const timedOut = await analyzeDataset(dataset, {
      template,
      topK: 10,
      rewrite: { enabled: true, rewriter: stalled, timeoutMs: 10 },
      logger: buildLogger()
    });

    expect(timedOut.insights.map((insight) => insight.category)).toEqual(
      baseline.insights.map((insight) => insight.category)
    );
    expect(timedOut.insights).toEqual(baseline.insights);
  });

  it("limits insights to top-k", async () => {
    const result = await analyzeDataset(buildTransactions(), {
      template,
      topK: 2,
      logger: buildLogger()
    });

    expect(result.insights).toHaveLength(2);
    expect(result.insights[0].priority).toBeGreaterThanOrEqual(result.insights[1].priority);
  });
});
