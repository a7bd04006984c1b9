import type { ColumnProfile } from "../profiling/types";

export type TimeGranularity = "day" | "month" | "year";

export type TimeBucket = {
  key: string;
  value: number;
  count: number;
};

const DAY_MS = 86_400_000;
const DAILY_SPAN_DAYS = 90;
const MONTHLY_SPAN_DAYS = 730;

const keyLength: Record<TimeGranularity, number> = {
  day: 10,
  month: 7,
  year: 4
};

export const GRANULARITY_LABELS: Record<TimeGranularity, string> = {
  day: "daily",
  month: "monthly",
  year: "yearly"
};

export const chooseGranularity = (minTimestamp: number, maxTimestamp: number): TimeGranularity => {
  const spanDays = (maxTimestamp - minTimestamp) / DAY_MS;
  if (spanDays < DAILY_SPAN_DAYS) {
    return "day";
  }
  if (spanDays < MONTHLY_SPAN_DAYS) {
    return "month";
  }
  return "year";
};

/**
 * Granularity for a date column. Uses the profile's range when it has one so
 * that insights and dashboard panels bucket the same column identically.
 */
export const granularityForColumn = (
  profile: ColumnProfile | undefined,
  timestamps: readonly (number | null)[]
): TimeGranularity => {
  if (profile?.min !== undefined && profile.max !== undefined) {
    return chooseGranularity(profile.min, profile.max);
  }
  const valid = timestamps.filter((value): value is number => value !== null);
  if (valid.length === 0) {
    return "day";
  }
  return chooseGranularity(
    valid.reduce((min, value) => Math.min(min, value), valid[0]),
    valid.reduce((max, value) => Math.max(max, value), valid[0])
  );
};

export const bucketKey = (timestamp: number, granularity: TimeGranularity): string =>
  new Date(timestamp).toISOString().slice(0, keyLength[granularity]);

/**
 * Sums `values` per time bucket in chronological order. Without `values`, each
 * bucket's value is its row count. Rows with a missing timestamp or measure are
 * skipped; empty periods are not filled in.
 */
export const bucketByTime = (
  timestamps: readonly (number | null)[],
  values: readonly (number | null)[] | null,
  granularity: TimeGranularity
): TimeBucket[] => {
  const buckets = new Map<string, TimeBucket>();
  timestamps.forEach((timestamp, index) => {
    if (timestamp === null) {
      return;
    }
    const value = values ? values[index] ?? null : 1;
    if (value === null) {
      return;
    }
    const key = bucketKey(timestamp, granularity);
    const bucket = buckets.get(key) ?? { key, value: 0, count: 0 };
    bucket.value += value;
    bucket.count += 1;
    buckets.set(key, bucket);
  });
  return Array.from(buckets.values()).sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
};
