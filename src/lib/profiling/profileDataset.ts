import {
  isNullCell,
  parseBooleanCell,
  parseDateCell,
  parseNumericCell,
  readCell,
  toLabel,
  toSampleText
} from "./cells";
import type { CellValue, ColumnProfile, Dataset, InferredType, ProfileOptions } from "./types";

export const DEFAULT_PROFILE_OPTIONS: ProfileOptions = {
  dateShare: 0.95,
  maxCategoricalRatio: 0.2,
  maxCategoricalCardinality: 50,
  identifierRatio: 0.95,
  maxSamples: 5
};

type ColumnParse = {
  inferredType: InferredType;
  // row-aligned: the parsed key of each valid cell, null when missing or unparseable
  keys: (string | number | null)[];
};

const summarizeNumbers = (values: number[]): { min?: number; max?: number; mean?: number } => {
  if (values.length === 0) {
    return {};
  }
  let min = values[0];
  let max = values[0];
  let sum = 0;
  values.forEach((value) => {
    if (value < min) {
      min = value;
    }
    if (value > max) {
      max = value;
    }
    sum += value;
  });
  return { min, max, mean: sum / values.length };
};

const classifyLabels = (
  labels: (string | null)[],
  presentCount: number,
  options: ProfileOptions
): InferredType => {
  const cardinality = new Set(labels.filter((label): label is string => label !== null)).size;
  if (
    cardinality <= options.maxCategoricalRatio * presentCount &&
    cardinality <= options.maxCategoricalCardinality
  ) {
    return "categorical";
  }
  if (cardinality >= options.identifierRatio * presentCount) {
    return "identifier";
  }
  return "text";
};

const parseColumn = (cells: CellValue[], options: ProfileOptions): ColumnParse => {
  const present = cells.map((cell) => !isNullCell(cell));
  const presentCount = present.filter(Boolean).length;

  if (presentCount === 0) {
    return { inferredType: "text", keys: cells.map(() => null) };
  }

  const dates = cells.map((cell, index) => (present[index] ? parseDateCell(cell) : null));
  const dateCount = dates.filter((value) => value !== null).length;
  if (dateCount / presentCount >= options.dateShare) {
    return { inferredType: "datetime", keys: dates };
  }

  const booleans = cells.map((cell, index) => (present[index] ? parseBooleanCell(cell) : null));
  if (booleans.filter((value) => value !== null).length === presentCount) {
    return {
      inferredType: "boolean",
      keys: booleans.map((value) => (value === null ? null : String(value)))
    };
  }

  const numbers = cells.map((cell, index) => (present[index] ? parseNumericCell(cell) : null));
  const parsedNumbers = numbers.filter((value): value is number => value !== null);
  if (parsedNumbers.length === presentCount) {
    return {
      inferredType: parsedNumbers.every((value) => Number.isInteger(value)) ? "integer" : "numeric",
      keys: numbers
    };
  }

  const labels = cells.map((cell, index) => (present[index] ? toLabel(cell) : null));
  return { inferredType: classifyLabels(labels, presentCount, options), keys: labels };
};

const profileColumn = (
  dataset: Dataset,
  name: string,
  options: ProfileOptions
): ColumnProfile => {
  const cells = dataset.rows.map((row) => readCell(row, name));
  const { inferredType, keys } = parseColumn(cells, options);

  const validKeys = keys.filter((key): key is string | number => key !== null);
  const validCount = validKeys.length;
  const totalRows = cells.length;

  const sampleValues: string[] = [];
  const seen = new Set<string>();
  for (let index = 0; index < cells.length && sampleValues.length < options.maxSamples; index += 1) {
    if (keys[index] === null) {
      continue;
    }
    const sample = toSampleText(cells[index]);
    if (sample && !seen.has(sample)) {
      seen.add(sample);
      sampleValues.push(sample);
    }
  }

  const hasNumericStats =
    inferredType === "numeric" || inferredType === "integer" || inferredType === "datetime";
  const stats = hasNumericStats
    ? summarizeNumbers(validKeys.filter((key): key is number => typeof key === "number"))
    : {};

  return {
    name,
    inferredType,
    nullRatio: totalRows === 0 ? 0 : (totalRows - validCount) / totalRows,
    cardinality: new Set(validKeys).size,
    validCount,
    ...stats,
    sampleValues
  };
};

/**
 * Builds one profile per dataset column, in the dataset's column order.
 * Malformed cells never throw; cells that do not parse as the inferred type
 * count toward `nullRatio`.
 */
export const profileDataset = (
  dataset: Dataset,
  options: Partial<ProfileOptions> = {}
): ColumnProfile[] => {
  const resolved: ProfileOptions = { ...DEFAULT_PROFILE_OPTIONS, ...options };
  return dataset.columns.map((column) => profileColumn(dataset, column, resolved));
};
