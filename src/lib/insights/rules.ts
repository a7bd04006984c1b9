import { aggregateByLabel, sortBucketsDescending } from "../aggregation/groupBy";
import {
  mean,
  median,
  pairValues,
  pearson,
  quantile,
  standardDeviation,
  sum
} from "../aggregation/stats";
import {
  GRANULARITY_LABELS,
  bucketByTime,
  granularityForColumn,
  type TimeBucket
} from "../aggregation/timeBuckets";
import { MEASURE_ROLES, type FieldMapping, type RoleBinding } from "../mapping/types";
import { readDateColumn, readNumericColumn, readTextColumn } from "../profiling/cells";
import { formatNumber, formatPercent, plural, round } from "./format";
import type {
  Insight,
  InsightCategory,
  InsightContext,
  InsightOptions,
  InsightRule
} from "./types";

const BASE_PRIORITY: Record<InsightCategory, number> = {
  trend: 80,
  outlier: 75,
  "top-n": 70,
  correlation: 60,
  "data-quality": 50,
  distribution: 30
};

const MAX_PRIORITY_BONUS = 20;

const createInsight = (
  category: InsightCategory,
  fields: Omit<Insight, "category" | "priority"> & { bonus: number }
): Insight => ({
  category,
  subject: fields.subject,
  text: fields.text,
  supportingMetric: fields.supportingMetric,
  priority: round(
    BASE_PRIORITY[category] + Math.min(MAX_PRIORITY_BONUS, Math.max(0, fields.bonus))
  ),
  confidence: round(fields.confidence, 4)
});

const mappedMeasures = (mapping: FieldMapping): RoleBinding[] =>
  MEASURE_ROLES.flatMap((role) => {
    const binding = mapping[role];
    return binding ? [binding] : [];
  });

const primaryMeasure = (mapping: FieldMapping): RoleBinding | null =>
  mappedMeasures(mapping)[0] ?? null;

const validNumbers = (values: readonly (number | null)[]): number[] =>
  values.filter((value): value is number => value !== null);

export const checkDataQuality: InsightRule = ({ profiles, options }) =>
  profiles
    .filter((profile) => profile.nullRatio > options.nullRatioThreshold)
    .map((profile) =>
      createInsight("data-quality", {
        subject: profile.name,
        text: `Column ${profile.name} has ${formatPercent(profile.nullRatio)} missing or unparseable values.`,
        supportingMetric: round(profile.nullRatio, 4),
        confidence: 1,
        bonus: profile.nullRatio * MAX_PRIORITY_BONUS
      })
    );

export type DirectionalRun = {
  direction: 1 | -1;
  startIndex: number;
  endIndex: number;
  // number of consecutive period-over-period changes in the same direction
  length: number;
  changePct: number;
};

/**
 * Longest run of same-direction changes between consecutive buckets. A flat
 * step or a zero previous bucket ends a run. Ties go to the larger absolute
 * change, then to the earlier run.
 */
export const findLongestRun = (buckets: readonly TimeBucket[]): DirectionalRun | null => {
  const runs: DirectionalRun[] = [];
  let runStart = -1;
  let runDirection: 1 | -1 = 1;

  const closeRun = (endIndex: number): DirectionalRun => {
    const start = buckets[runStart].value;
    const end = buckets[endIndex].value;
    return {
      direction: runDirection,
      startIndex: runStart,
      endIndex,
      length: endIndex - runStart,
      changePct: ((end - start) / Math.abs(start)) * 100
    };
  };

  for (let index = 1; index < buckets.length; index += 1) {
    const previous = buckets[index - 1].value;
    const current = buckets[index].value;
    const direction = previous === 0 || current === previous ? 0 : current > previous ? 1 : -1;
    if (runStart !== -1 && direction === runDirection) {
      continue;
    }
    if (runStart !== -1) {
      runs.push(closeRun(index - 1));
      runStart = -1;
    }
    if (direction !== 0) {
      runStart = index - 1;
      runDirection = direction;
    }
  }
  if (runStart !== -1) {
    runs.push(closeRun(buckets.length - 1));
  }

  return runs.reduce<DirectionalRun | null>((best, run) => {
    if (
      !best ||
      run.length > best.length ||
      (run.length === best.length && Math.abs(run.changePct) > Math.abs(best.changePct))
    ) {
      return run;
    }
    return best;
  }, null);
};

export const checkTrend: InsightRule = ({ dataset, profiles, mapping }) => {
  const date = mapping.date;
  const measure = primaryMeasure(mapping);
  if (!date || !measure) {
    return [];
  }
  const timestamps = readDateColumn(dataset, date.column);
  const granularity = granularityForColumn(
    profiles.find((profile) => profile.name === date.column),
    timestamps
  );
  const buckets = bucketByTime(timestamps, readNumericColumn(dataset, measure.column), granularity);
  const run = findLongestRun(buckets);
  if (!run) {
    return [];
  }

  const verb = run.direction > 0 ? "rose" : "fell";
  const from = buckets[run.startIndex].key;
  const to = buckets[run.endIndex].key;
  const change = Math.abs(run.changePct).toFixed(1);
  const text =
    run.length === 1
      ? `${measure.column} ${verb} ${change}% from ${from} to ${to} (${GRANULARITY_LABELS[granularity]} totals).`
      : `${measure.column} ${verb} for ${run.length} consecutive ${granularity}s, from ${from} to ${to} (${run.direction > 0 ? "+" : "-"}${change}% overall).`;

  return [
    createInsight("trend", {
      subject: measure.column,
      text,
      supportingMetric: round(run.changePct),
      confidence: Math.min(date.confidence, measure.confidence),
      bonus: run.length * 5
    })
  ];
};

export const checkTopCategories: InsightRule = ({ dataset, mapping, options }) => {
  const category = mapping.category;
  const measure = primaryMeasure(mapping);
  if (!category || !measure) {
    return [];
  }
  // shares of magnitude, so ledgers that book spending as negative amounts still rank
  const buckets = sortBucketsDescending(
    aggregateByLabel(
      readTextColumn(dataset, category.column),
      readNumericColumn(dataset, measure.column).map((value) =>
        value === null ? null : Math.abs(value)
      ),
      "sum"
    )
  );
  const total = sum(buckets.map((bucket) => bucket.value));
  if (buckets.length === 0 || total <= 0) {
    return [];
  }
  const top = buckets.slice(0, options.topCategories);
  const topShare = sum(top.map((bucket) => bucket.value)) / total;
  const listed = top
    .map((bucket) => `${bucket.label} (${formatPercent(bucket.value / total)})`)
    .join(", ");

  return [
    createInsight("top-n", {
      subject: category.column,
      text: `Top ${category.column} by ${measure.column}: ${listed}.`,
      supportingMetric: round(topShare * 100),
      confidence: Math.min(category.confidence, measure.confidence),
      bonus: topShare * MAX_PRIORITY_BONUS
    })
  ];
};

export type OutlierSummary = {
  method: "zscore" | "robust-zscore" | "iqr";
  count: number;
  extremeValue: number;
  // |z| of the extreme value, or its distance beyond the fence in IQR units plus the multiplier
  severity: number;
  zScore?: number;
};

// 0.6745 is the 0.75 quantile of the standard normal, so a modified z matches z for normal data
const MODIFIED_Z_FACTOR = 0.6745;

type OutlierOptions = Pick<InsightOptions, "outlierMethod" | "zScoreThreshold" | "iqrMultiplier">;

const detectByIqr = (values: readonly number[], options: OutlierOptions): OutlierSummary | null => {
  if (values.length < 4) {
    return null;
  }
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  const iqr = q3 - q1;
  if (iqr === 0) {
    return null;
  }
  const lower = q1 - options.iqrMultiplier * iqr;
  const upper = q3 + options.iqrMultiplier * iqr;
  const distance = (value: number) => (value < lower ? lower - value : value - upper);
  const flagged = values.filter((value) => value < lower || value > upper);
  if (flagged.length === 0) {
    return null;
  }
  const extremeValue = flagged.reduce((extreme, value) =>
    distance(value) > distance(extreme) ? value : extreme
  );
  return {
    method: "iqr",
    count: flagged.length,
    extremeValue,
    severity: options.iqrMultiplier + distance(extremeValue) / iqr
  };
};

const detectByScore = (
  values: readonly number[],
  method: "zscore" | "robust-zscore",
  scoreOf: (value: number) => number,
  threshold: number
): OutlierSummary | null => {
  const flagged = values.filter((value) => Math.abs(scoreOf(value)) >= threshold);
  if (flagged.length === 0) {
    return null;
  }
  const extremeValue = flagged.reduce((extreme, value) =>
    Math.abs(scoreOf(value)) > Math.abs(scoreOf(extreme)) ? value : extreme
  );
  return {
    method,
    count: flagged.length,
    extremeValue,
    severity: Math.abs(scoreOf(extremeValue)),
    zScore: scoreOf(extremeValue)
  };
};

/**
 * With the sample standard deviation no |z| can exceed (n - 1) / sqrt(n), so
 * samples too small to ever reach the threshold are scored with the median
 * absolute deviation instead.
 */
export const detectOutliers = (
  values: readonly number[],
  options: OutlierOptions
): OutlierSummary | null => {
  if (options.outlierMethod === "iqr") {
    return detectByIqr(values, options);
  }
  if (values.length < 3) {
    return null;
  }

  const reachable = (values.length - 1) / Math.sqrt(values.length) >= options.zScoreThreshold;
  if (!reachable) {
    const center = median(values);
    const mad = median(values.map((value) => Math.abs(value - center)));
    if (mad === 0) {
      return null;
    }
    return detectByScore(
      values,
      "robust-zscore",
      (value) => (MODIFIED_Z_FACTOR * (value - center)) / mad,
      options.zScoreThreshold
    );
  }

  const average = mean(values);
  const deviation = standardDeviation(values);
  if (deviation === 0) {
    return null;
  }
  return detectByScore(
    values,
    "zscore",
    (value) => (value - average) / deviation,
    options.zScoreThreshold
  );
};

const outlierRule = (summary: OutlierSummary, options: InsightOptions): string => {
  if (summary.method === "iqr") {
    return `outside ${options.iqrMultiplier}× the interquartile range`;
  }
  return summary.method === "robust-zscore"
    ? `(|modified z| ≥ ${options.zScoreThreshold})`
    : `(|z| ≥ ${options.zScoreThreshold})`;
};

export const checkOutliers: InsightRule = ({ dataset, mapping, options }) =>
  mappedMeasures(mapping).flatMap((measure) => {
    const summary = detectOutliers(validNumbers(readNumericColumn(dataset, measure.column)), options);
    if (!summary) {
      return [];
    }
    const label = summary.method === "robust-zscore" ? "modified z" : "z";
    const detail =
      summary.zScore === undefined ? "" : ` (${label} = ${summary.zScore.toFixed(2)})`;
    return [
      createInsight("outlier", {
        subject: measure.column,
        text: `${measure.column} has ${plural(summary.count, "outlier")} ${outlierRule(summary, options)}; the most extreme value is ${formatNumber(summary.extremeValue)}${detail}.`,
        supportingMetric: summary.count,
        confidence: measure.confidence,
        bonus: summary.severity
      })
    ];
  });

export const checkCorrelation: InsightRule = ({ dataset, mapping, options }) => {
  const amount = mapping.amount;
  const quantity = mapping.quantity;
  if (!amount || !quantity) {
    return [];
  }
  const { xs, ys } = pairValues(
    readNumericColumn(dataset, amount.column),
    readNumericColumn(dataset, quantity.column)
  );
  const r = pearson(xs, ys);
  if (r === null || Math.abs(r) <= options.correlationThreshold) {
    return [];
  }
  const strength = Math.abs(r) >= 0.8 ? "strongly" : "moderately";
  const direction = r > 0 ? "positively" : "negatively";
  return [
    createInsight("correlation", {
      subject: `${amount.column}~${quantity.column}`,
      text: `${amount.column} and ${quantity.column} are ${strength} ${direction} correlated (r = ${r.toFixed(2)}).`,
      supportingMetric: round(r, 4),
      confidence: Math.min(amount.confidence, quantity.confidence),
      bonus: Math.abs(r) * MAX_PRIORITY_BONUS
    })
  ];
};

export const checkDistribution: InsightRule = ({ dataset, mapping }) =>
  mappedMeasures(mapping).flatMap((measure) => {
    const values = validNumbers(readNumericColumn(dataset, measure.column));
    if (values.length === 0) {
      return [];
    }
    const total = sum(values);
    const min = values.reduce((lowest, value) => Math.min(lowest, value), values[0]);
    const max = values.reduce((highest, value) => Math.max(highest, value), values[0]);
    return [
      createInsight("distribution", {
        subject: measure.column,
        text: `${measure.column}: total ${formatNumber(total)}, average ${formatNumber(mean(values))}, range ${formatNumber(min)} to ${formatNumber(max)} across ${plural(values.length, "value")}.`,
        supportingMetric: round(total),
        confidence: measure.confidence,
        bonus: 0
      })
    ];
  });

export const INSIGHT_RULES: readonly InsightRule[] = [
  checkDataQuality,
  checkTrend,
  checkTopCategories,
  checkOutliers,
  checkCorrelation,
  checkDistribution
];
