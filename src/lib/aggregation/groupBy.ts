export type CategoryBucket = {
  label: string;
  value: number;
  count: number;
};

export type GroupAggregation = "sum" | "count" | "avg";

/**
 * Aggregates `values` per label. Rows with a missing label are skipped, as are
 * rows with a missing measure unless the aggregation is `count`.
 */
export const aggregateByLabel = (
  labels: readonly (string | null)[],
  values: readonly (number | null)[] | null,
  aggregation: GroupAggregation
): CategoryBucket[] => {
  const groups = new Map<string, { total: number; count: number }>();
  labels.forEach((label, index) => {
    if (label === null) {
      return;
    }
    const value = values ? values[index] ?? null : null;
    if (aggregation !== "count" && value === null) {
      return;
    }
    const group = groups.get(label) ?? { total: 0, count: 0 };
    group.total += value ?? 0;
    group.count += 1;
    groups.set(label, group);
  });

  return Array.from(groups.entries()).map(([label, group]) => ({
    label,
    value:
      aggregation === "count"
        ? group.count
        : aggregation === "avg"
          ? group.total / group.count
          : group.total,
    count: group.count
  }));
};

export const sortBucketsDescending = (buckets: readonly CategoryBucket[]): CategoryBucket[] =>
  [...buckets].sort(
    (a, b) => b.value - a.value || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0)
  );

export type LabelMatrix = {
  columns: string[];
  rows: string[];
  // values[row][column]; combinations without rows are 0
  values: number[][];
};

const sortLabels = (labels: Iterable<string>): string[] =>
  Array.from(labels).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

/**
 * Pivot of two label columns summing `values`, or counting rows when no
 * values are given. Labels are sorted on both axes.
 */
export const pivotByLabels = (
  columnLabels: readonly (string | null)[],
  rowLabels: readonly (string | null)[],
  values: readonly (number | null)[] | null
): LabelMatrix => {
  const cells = new Map<string, Map<string, number>>();
  const columnSet = new Set<string>();
  columnLabels.forEach((column, index) => {
    const row = rowLabels[index] ?? null;
    if (column === null || row === null) {
      return;
    }
    const value = values ? values[index] ?? null : 1;
    if (value === null) {
      return;
    }
    columnSet.add(column);
    const rowCells = cells.get(row) ?? new Map<string, number>();
    rowCells.set(column, (rowCells.get(column) ?? 0) + value);
    cells.set(row, rowCells);
  });

  const columns = sortLabels(columnSet);
  const rows = sortLabels(cells.keys());
  return {
    columns,
    rows,
    values: rows.map((row) => columns.map((column) => cells.get(row)?.get(column) ?? 0))
  };
};
