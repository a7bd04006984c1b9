import type { FieldMapping } from "../mapping/types";
import type { ColumnProfile, Dataset } from "../profiling/types";

export type InsightCategory =
  | "trend"
  | "distribution"
  | "outlier"
  | "top-n"
  | "data-quality"
  | "correlation";

export type Insight = Readonly<{
  category: InsightCategory;
  // column (or `a~b` column pair) the insight is about; dedup key with category
  subject: string;
  text: string;
  supportingMetric: number;
  priority: number;
  confidence: number;
}>;

export type OutlierMethod = "zscore" | "iqr";

export type InsightOptions = {
  nullRatioThreshold: number;
  outlierMethod: OutlierMethod;
  zScoreThreshold: number;
  iqrMultiplier: number;
  correlationThreshold: number;
  topCategories: number;
};

export type InsightInput = {
  dataset: Dataset;
  profiles: readonly ColumnProfile[];
  mapping: FieldMapping;
  topK: number;
  options?: Partial<InsightOptions>;
};

export type InsightContext = {
  dataset: Dataset;
  profiles: readonly ColumnProfile[];
  mapping: FieldMapping;
  options: InsightOptions;
};

export type InsightRule = (context: InsightContext) => Insight[];
