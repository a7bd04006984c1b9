export type CellValue = string | number | boolean | null;

export type DatasetRow = Record<string, CellValue>;

export type Dataset = {
  columns: string[];
  rows: DatasetRow[];
};

export type InferredType =
  | "numeric"
  | "integer"
  | "boolean"
  | "datetime"
  | "categorical"
  | "identifier"
  | "text";

export type ColumnProfile = Readonly<{
  name: string;
  inferredType: InferredType;
  nullRatio: number;
  cardinality: number;
  validCount: number;
  // numeric, integer and datetime only; datetime stats are epoch milliseconds
  min?: number;
  max?: number;
  mean?: number;
  sampleValues: readonly string[];
}>;

export type ProfileOptions = {
  dateShare: number;
  maxCategoricalRatio: number;
  maxCategoricalCardinality: number;
  identifierRatio: number;
  maxSamples: number;
};
