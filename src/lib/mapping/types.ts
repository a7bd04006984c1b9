import type { ColumnProfile } from "../profiling/types";

export const SEMANTIC_ROLES = [
  "account",
  "amount",
  "category",
  "counterparty",
  "date",
  "description",
  "quantity"
] as const;

export type SemanticRole = (typeof SEMANTIC_ROLES)[number];

export const MEASURE_ROLES = ["amount", "quantity"] as const satisfies readonly SemanticRole[];

export const DIMENSION_ROLES = [
  "category",
  "account",
  "counterparty",
  "description"
] as const satisfies readonly SemanticRole[];

export type MeasureRole = (typeof MEASURE_ROLES)[number];

export type DimensionRole = (typeof DIMENSION_ROLES)[number];

export type MatchReason = "exact-name" | "synonym" | "partial-name" | "type-shape";

export type ScoreContributions = {
  name: number;
  type: number;
  shape: number;
};

export type RoleBinding = Readonly<{
  column: string;
  confidence: number;
  matchedBy: MatchReason;
  contributions: ScoreContributions;
}>;

export type FieldMapping = Partial<Record<SemanticRole, RoleBinding>>;

export type RoleCandidate = {
  role: SemanticRole;
  column: string;
  score: number;
  matchedBy: MatchReason;
  contributions: ScoreContributions;
};

export type NameMatch = {
  score: number;
  reason: MatchReason | null;
};

export type RoleRule = {
  type: (profile: ColumnProfile) => number;
  shape: (profile: ColumnProfile) => number;
};

export type MappingOptions = {
  acceptThreshold: number;
  weights: ScoreContributions;
};

export const isSemanticRole = (value: string): value is SemanticRole =>
  SEMANTIC_ROLES.some((role) => role === value);
