import type { CategoryBucket, LabelMatrix } from "../aggregation/groupBy";
import type { HistogramBin } from "../aggregation/histogram";
import type { TimeGranularity } from "../aggregation/timeBuckets";
import type { FieldMapping, SemanticRole } from "../mapping/types";
import type { ColumnProfile, Dataset } from "../profiling/types";

export type PanelAggregation =
  | "sum"
  | "count"
  | "avg"
  | "time-bucket"
  | "points"
  | "histogram"
  | "heatmap";

export type PanelSpec = {
  id: string;
  // role names as written in the template; unknown names can never be satisfied
  requiredRoles: string[];
  chartType: string;
  aggregation: PanelAggregation;
  titleTemplate: string;
  topN?: number;
  timeGranularity?: TimeGranularity;
  bins?: number;
};

export type DashboardTemplate = {
  panels: PanelSpec[];
};

export type ChartSeries =
  | { kind: "single"; label: string; value: number }
  | { kind: "categorical"; buckets: Pick<CategoryBucket, "label" | "value">[] }
  | {
      kind: "time";
      granularity: TimeGranularity;
      points: { bucket: string; value: number }[];
    }
  | { kind: "points"; points: { x: number; y: number }[] }
  | { kind: "histogram"; bins: HistogramBin[] }
  | ({ kind: "matrix" } & LabelMatrix);

export type ResolvedChart = {
  status: "resolved";
  id: string;
  chartType: string;
  title: string;
  aggregation: PanelAggregation;
  // set when the series is bucketed by time
  granularity?: TimeGranularity;
  series: ChartSeries;
  sourceColumns: Partial<Record<SemanticRole, string>>;
};

export type SkippedChart = {
  status: "skipped";
  id: string;
  chartType: string;
  title: string;
  missingRoles: string[];
};

export type ChartSpec = ResolvedChart | SkippedChart;

export type DashboardInput = {
  template: DashboardTemplate;
  mapping: FieldMapping;
  profiles: readonly ColumnProfile[];
  dataset: Dataset;
};
