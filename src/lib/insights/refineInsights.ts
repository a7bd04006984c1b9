import { describeError, defaultLogger, type Logger } from "../logging";
import { parseRewriteOutput } from "../rewrite/output";
import type { RewriteSettings, TextRewriter } from "../rewrite/types";
import { runWithTimeout } from "../rewrite/withTimeout";
import { generateInsights } from "./generateInsights";
import type { Insight, InsightInput } from "./types";

const rewriteOne = async (
  insight: Insight,
  rewriter: TextRewriter,
  timeoutMs: number,
  logger: Logger
): Promise<Insight> => {
  try {
    const rewritten = await runWithTimeout(
      (signal) =>
        rewriter.rewrite(
          insight.text,
          {
            category: insight.category,
            subject: insight.subject,
            supportingMetric: insight.supportingMetric
          },
          signal
        ),
      timeoutMs
    );
    return { ...insight, text: parseRewriteOutput(rewritten) };
  } catch (error) {
    logger.warn("[rewrite] fallback", {
      category: insight.category,
      subject: insight.subject,
      reason: describeError(error, "Rewrite failed")
    });
    return insight;
  }
};

/**
 * Rewords insight text through the configured rewriter. Only `text` can
 * change: every failure keeps the rule-generated wording, and count, order,
 * categories and priorities are preserved.
 */
export const refineInsights = async (
  insights: readonly Insight[],
  settings: RewriteSettings,
  logger: Logger = defaultLogger
): Promise<Insight[]> => {
  if (!settings.enabled) {
    return [...insights];
  }
  const rewriter = settings.rewriter;
  if (!rewriter) {
    logger.warn("[rewrite] enabled without a rewriter; keeping original text", {
      insights: insights.length
    });
    return [...insights];
  }
  return Promise.all(
    insights.map((insight) => rewriteOne(insight, rewriter, settings.timeoutMs, logger))
  );
};

export const generateRefinedInsights = async (
  input: InsightInput,
  settings: RewriteSettings,
  logger: Logger = defaultLogger
): Promise<Insight[]> => refineInsights(generateInsights(input), settings, logger);
