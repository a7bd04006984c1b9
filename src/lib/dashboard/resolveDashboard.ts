import {
  aggregateByLabel,
  pivotByLabels,
  sortBucketsDescending,
  type GroupAggregation
} from "../aggregation/groupBy";
import { binValues } from "../aggregation/histogram";
import { mean, pairValues, sum } from "../aggregation/stats";
import {
  GRANULARITY_LABELS,
  bucketByTime,
  granularityForColumn,
  type TimeGranularity
} from "../aggregation/timeBuckets";
import {
  DIMENSION_ROLES,
  MEASURE_ROLES,
  SEMANTIC_ROLES,
  isSemanticRole,
  type FieldMapping,
  type SemanticRole
} from "../mapping/types";
import { readDateColumn, readNumericColumn, readTextColumn } from "../profiling/cells";
import type { ColumnProfile, Dataset } from "../profiling/types";
import type {
  ChartSeries,
  ChartSpec,
  DashboardInput,
  PanelSpec,
  ResolvedChart,
  SkippedChart
} from "./types";

const placeholderPattern = /\{([A-Za-z_-]+)(?:\.(role|column))?\}/g;

type RoleColumns = Partial<Record<SemanticRole, string>>;

const columnsFor = (mapping: FieldMapping, roles: readonly SemanticRole[]): RoleColumns => {
  const columns: RoleColumns = {};
  roles.forEach((role) => {
    const binding = mapping[role];
    if (binding) {
      columns[role] = binding.column;
    }
  });
  return columns;
};

/**
 * `{role}` and `{role.column}` become the bound column (or the role name when
 * unbound), `{role.role}` the role name, `{granularity}` the bucket label.
 * Anything else is left untouched.
 */
export const renderTitle = (
  template: string,
  columns: RoleColumns,
  granularity?: TimeGranularity
): string =>
  template.replace(placeholderPattern, (match: string, name: string, part?: string) => {
    if (name === "granularity" && part === undefined) {
      return granularity ? GRANULARITY_LABELS[granularity] : match;
    }
    if (!isSemanticRole(name)) {
      return match;
    }
    if (part === "role") {
      return name;
    }
    return columns[name] ?? name;
  });

export const findMissingRoles = (panel: PanelSpec, mapping: FieldMapping): string[] => {
  const missing: string[] = [];
  panel.requiredRoles.forEach((role) => {
    const bound = isSemanticRole(role) && mapping[role] !== undefined;
    if (!bound && !missing.includes(role)) {
      missing.push(role);
    }
  });
  return missing;
};

const singleValue = (
  dataset: Dataset,
  measure: string | undefined,
  aggregation: GroupAggregation
): ChartSeries => {
  if (!measure || aggregation === "count") {
    return { kind: "single", label: "rows", value: dataset.rows.length };
  }
  const values = readNumericColumn(dataset, measure).filter(
    (value): value is number => value !== null
  );
  return {
    kind: "single",
    label: measure,
    value: aggregation === "avg" ? mean(values) : sum(values)
  };
};

const groupedSeries = (
  dataset: Dataset,
  dimension: string,
  measure: string | undefined,
  aggregation: GroupAggregation,
  topN: number | undefined
): ChartSeries => {
  const effective: GroupAggregation = measure ? aggregation : "count";
  const values = measure ? readNumericColumn(dataset, measure) : null;
  // bar and pie slices show magnitudes; averages keep their sign
  const magnitudes =
    values && effective === "sum"
      ? values.map((value) => (value === null ? null : Math.abs(value)))
      : values;
  const buckets = sortBucketsDescending(
    aggregateByLabel(readTextColumn(dataset, dimension), magnitudes, effective)
  );
  return {
    kind: "categorical",
    buckets: (topN === undefined ? buckets : buckets.slice(0, topN)).map(({ label, value }) => ({
      label,
      value
    }))
  };
};

const timeSeries = (
  dataset: Dataset,
  profiles: readonly ColumnProfile[],
  dateColumn: string,
  measure: string | undefined,
  override: TimeGranularity | undefined
): Extract<ChartSeries, { kind: "time" }> => {
  const timestamps = readDateColumn(dataset, dateColumn);
  const granularity =
    override ??
    granularityForColumn(
      profiles.find((profile) => profile.name === dateColumn),
      timestamps
    );
  const buckets = bucketByTime(
    timestamps,
    measure ? readNumericColumn(dataset, measure) : null,
    granularity
  );
  return {
    kind: "time",
    granularity,
    points: buckets.map((bucket) => ({ bucket: bucket.key, value: bucket.value }))
  };
};

const pointSeries = (dataset: Dataset, x: string, y: string): ChartSeries => {
  const { xs, ys } = pairValues(readNumericColumn(dataset, x), readNumericColumn(dataset, y));
  return { kind: "points", points: xs.map((value, index) => ({ x: value, y: ys[index] })) };
};

const histogramSeries = (dataset: Dataset, measure: string, bins: number | undefined): ChartSeries => ({
  kind: "histogram",
  bins: binValues(
    readNumericColumn(dataset, measure).filter((value): value is number => value !== null),
    bins
  )
});

const matrixSeries = (
  dataset: Dataset,
  columnDimension: string,
  rowDimension: string,
  measure: string | undefined
): ChartSeries => ({
  kind: "matrix",
  ...pivotByLabels(
    readTextColumn(dataset, columnDimension),
    readTextColumn(dataset, rowDimension),
    measure ? readNumericColumn(dataset, measure) : null
  )
});

const buildSeries = (
  panel: PanelSpec,
  columns: RoleColumns,
  dataset: Dataset,
  profiles: readonly ColumnProfile[]
): ChartSeries => {
  const roles = SEMANTIC_ROLES.filter((role) => columns[role] !== undefined);
  const measures = MEASURE_ROLES.flatMap((role) => {
    const column = columns[role];
    return column ? [column] : [];
  });
  // dimension columns in template order
  const dimensions = panel.requiredRoles.flatMap((role) => {
    const column =
      isSemanticRole(role) && DIMENSION_ROLES.some((dimension) => dimension === role)
        ? columns[role]
        : undefined;
    return column ? [column] : [];
  });
  const dimension = dimensions[0];

  if (panel.aggregation === "time-bucket" && columns.date) {
    return timeSeries(dataset, profiles, columns.date, measures[0], panel.timeGranularity);
  }
  if (panel.aggregation === "points" && measures.length >= 2) {
    return pointSeries(dataset, measures[0], measures[1]);
  }
  if (panel.aggregation === "histogram" && measures.length >= 1) {
    return histogramSeries(dataset, measures[0], panel.bins);
  }
  if (panel.aggregation === "heatmap" && dimensions.length >= 2) {
    return matrixSeries(dataset, dimensions[0], dimensions[1], measures[0]);
  }

  // the shaped aggregations degrade to a sum when their roles are not required
  const aggregation: GroupAggregation =
    panel.aggregation === "count" || panel.aggregation === "avg" ? panel.aggregation : "sum";
  if (dimension) {
    return groupedSeries(dataset, dimension, measures[0], aggregation, panel.topN);
  }
  if (roles.length === 1 && columns.date) {
    return timeSeries(dataset, profiles, columns.date, undefined, panel.timeGranularity);
  }
  return singleValue(dataset, measures[0], aggregation);
};

const resolvePanel = (
  panel: PanelSpec,
  { mapping, profiles, dataset }: Omit<DashboardInput, "template">
): ChartSpec => {
  const titleColumns = columnsFor(mapping, SEMANTIC_ROLES);
  const missingRoles = findMissingRoles(panel, mapping);
  if (missingRoles.length > 0) {
    const skipped: SkippedChart = {
      status: "skipped",
      id: panel.id,
      chartType: panel.chartType,
      title: renderTitle(panel.titleTemplate, titleColumns),
      missingRoles
    };
    return skipped;
  }

  const sourceColumns = columnsFor(mapping, panel.requiredRoles.filter(isSemanticRole));
  const series = buildSeries(panel, sourceColumns, dataset, profiles);
  const resolved: ResolvedChart = {
    status: "resolved",
    id: panel.id,
    chartType: panel.chartType,
    title: renderTitle(
      panel.titleTemplate,
      titleColumns,
      series.kind === "time" ? series.granularity : undefined
    ),
    aggregation: panel.aggregation,
    ...(series.kind === "time" ? { granularity: series.granularity } : {}),
    series,
    sourceColumns
  };
  return resolved;
};

/**
 * Resolves every template panel in order. Panels whose required roles are not
 * all mapped come back as `skipped` naming exactly the missing roles.
 */
export const resolveDashboard = ({
  template,
  mapping,
  profiles,
  dataset
}: DashboardInput): ChartSpec[] =>
  template.panels.map((panel) => resolvePanel(panel, { mapping, profiles, dataset }));
