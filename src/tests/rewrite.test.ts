import { describe, expect, it, vi } from "vitest";
import { RewriteError, TimeoutError } from "../lib/errors";
import { refineInsights } from "../lib/insights/refineInsights";
import type { Insight } from "../lib/insights/types";
import { parseRewriteOutput } from "../lib/rewrite/output";
import type { TextRewriter } from "../lib/rewrite/types";
import { runWithTimeout } from "../lib/rewrite/withTimeout";

const insights: Insight[] = [
  {
    category: "outlier",
    subject: "amt",
    text: "amt has 1 outlier.",
    supportingMetric: 1,
    priority: 79,
    confidence: 0.95
  },
  {
    category: "top-n",
    subject: "merchant_category",
    text: "Top merchant_category by amt: travel (40.0%).",
    supportingMetric: 40,
    priority: 78,
    confidence: 0.95
  },
  {
    category: "distribution",
    subject: "amt",
    text: "amt: total 10.00.",
    supportingMetric: 10,
    priority: 30,
    confidence: 0.95
  }
];

const buildLogger = () => ({ info: vi.fn(), warn: vi.fn() });

const neverSettles = () => new Promise<string>(() => undefined);

describe("runWithTimeout", () => {
  it("resolves with the task result", async () => {
    await expect(runWithTimeout(async () => "done", 50)).resolves.toBe("done");
  });

  it("rejects with TimeoutError and aborts the signal", async () => {
    const signals: AbortSignal[] = [];

    await expect(
      runWithTimeout((signal) => {
        signals.push(signal);
        return neverSettles();
      }, 10)
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(signals[0].aborted).toBe(true);
  });
});

describe("parseRewriteOutput", () => {
  it("strips bullets and quotes", () => {
    expect(parseRewriteOutput("  - Revenue grew.  ")).toBe("Revenue grew.");
    expect(parseRewriteOutput("\"Sales rose.\"")).toBe("Sales rose.");
  });

  it("rejects empty and non-string output", () => {
    expect(() => parseRewriteOutput("   ")).toThrow(RewriteError);
    expect(() => parseRewriteOutput(42)).toThrow(RewriteError);
  });
});

describe("refineInsights", () => {
  it("returns the original text when rewriting is disabled", async () => {
    const rewriter: TextRewriter = { rewrite: vi.fn(async () => "unused") };

    const refined = await refineInsights(
      insights,
      { enabled: false, rewriter, timeoutMs: 50 },
      buildLogger()
    );

    expect(refined).toEqual(insights);
    expect(rewriter.rewrite).not.toHaveBeenCalled();
  });

  it("rewrites only the text", async () => {
    const rewriter: TextRewriter = {
      rewrite: async (text, context) => `[${context.category}] ${text}`
    };

    const refined = await refineInsights(insights, { enabled: true, rewriter, timeoutMs: 50 }, buildLogger());

    expect(refined.map((insight) => insight.text)).toEqual([
      "[outlier] amt has 1 outlier.",
      "[top-n] Top merchant_category by amt: travel (40.0%).",
      "[distribution] amt: total 10.00."
    ]);
    expect(refined.map(({ text: _text, ...rest }) => rest)).toEqual(
      insights.map(({ text: _text, ...rest }) => rest)
    );
  });

  it("keeps count, order and categories when every call times out", async () => {
    const logger = buildLogger();
    const rewriter: TextRewriter = { rewrite: neverSettles };

    const refined = await refineInsights(insights, { enabled: true, rewriter, timeoutMs: 10 }, logger);
    const baseline = await refineInsights(insights, { enabled: false, rewriter: null, timeoutMs: 10 }, logger);

    expect(refined.map((insight) => insight.category)).toEqual(
      baseline.map((insight) => insight.category)
    );
    expect(refined).toEqual(baseline);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith("[rewrite] fallback", {
      category: "outlier",
      subject: "amt",
      reason: "Timed out after 10ms"
    });
  });

  it("falls back per insight on errors and invalid output", async () => {
    const logger = buildLogger();
    const rewriter: TextRewriter = {
      rewrite: async (text, context) => {
        if (context.category === "outlier") {
          throw new Error("service unavailable");
        }
        if (context.category === "top-n") {
          return "   ";
        }
        return `Rewritten: ${text}`;
      }
    };

    const refined = await refineInsights(insights, { enabled: true, rewriter, timeoutMs: 50 }, logger);

    expect(refined.map((insight) => insight.text)).toEqual([
      "amt has 1 outlier.",
      "Top merchant_category by amt: travel (40.0%).",
      "Rewritten: amt: total 10.00."
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith("[rewrite] fallback", {
      category: "outlier",
      subject: "amt",
      reason: "service unavailable"
    });
  });

  it("warns once when enabled without a rewriter", async () => {
    const logger = buildLogger();

    const refined = await refineInsights(insights, { enabled: true, rewriter: null, timeoutMs: 50 }, logger);

    expect(refined).toEqual(insights);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
