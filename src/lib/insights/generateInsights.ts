import { INSIGHT_RULES } from "./rules";
import type { Insight, InsightContext, InsightInput, InsightOptions } from "./types";

export const DEFAULT_INSIGHT_OPTIONS: InsightOptions = {
  nullRatioThreshold: 0.1,
  outlierMethod: "zscore",
  zScoreThreshold: 3,
  iqrMultiplier: 1.5,
  correlationThreshold: 0.5,
  topCategories: 3
};

const compareText = (a: string, b: string): number => (a === b ? 0 : a < b ? -1 : 1);

const compareInsights = (a: Insight, b: Insight): number =>
  b.priority - a.priority ||
  b.confidence - a.confidence ||
  compareText(a.category, b.category) ||
  compareText(a.subject, b.subject);

/**
 * Sorts by priority then confidence, keeps the first insight per
 * category + subject, and truncates to `topK`.
 */
export const rankInsights = (insights: readonly Insight[], topK: number): Insight[] => {
  const limit = Math.floor(topK);
  if (!(limit > 0)) {
    return [];
  }
  const seen = new Set<string>();
  const ranked: Insight[] = [];
  for (const insight of [...insights].sort(compareInsights)) {
    const key = `${insight.category}\u0000${insight.subject}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    ranked.push(insight);
    if (ranked.length === limit) {
      break;
    }
  }
  return ranked;
};

export const generateInsights = ({
  dataset,
  profiles,
  mapping,
  topK,
  options = {}
}: InsightInput): Insight[] => {
  const context: InsightContext = {
    dataset,
    profiles,
    mapping,
    options: { ...DEFAULT_INSIGHT_OPTIONS, ...options }
  };
  return rankInsights(
    INSIGHT_RULES.flatMap((rule) => rule(context)),
    topK
  );
};
