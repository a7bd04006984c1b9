import { z } from "zod";
import rawSynonyms from "./roleSynonyms.json";
import type { ColumnProfile, InferredType } from "../profiling/types";
import type { NameMatch, RoleRule, ScoreContributions, SemanticRole } from "./types";

const MIN_PARTIAL_LENGTH = 4;

const synonymList = z.array(z.string().min(1).transform((value) => value.toLowerCase()));

const roleSynonymsSchema = z
  .object({
    account: synonymList,
    amount: synonymList,
    category: synonymList,
    counterparty: synonymList,
    date: synonymList,
    description: synonymList,
    quantity: synonymList
  })
  .strict();

export const ROLE_SYNONYMS: Record<SemanticRole, readonly string[]> =
  roleSynonymsSchema.parse(rawSynonyms);

const decimalOrCurrencyPattern = /\.\d+$|,\d{1,2}$|[$€£¥]/;
const codeLikePattern = /^(?=.*\d)[A-Za-z0-9][A-Za-z0-9-]{3,}$/;

export const tokenizeColumnName = (name: string): string[] =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

const singularize = (token: string): string => {
  if (token.length > 4 && token.endsWith("ies")) {
    return `${token.slice(0, -3)}y`;
  }
  if (token.length > 3 && token.endsWith("s") && !token.endsWith("ss")) {
    return token.slice(0, -1);
  }
  return token;
};

export const scoreName = (name: string, role: SemanticRole): NameMatch => {
  const tokens = tokenizeColumnName(name);
  if (tokens.length === 0) {
    return { score: 0, reason: null };
  }
  const joined = tokens.join("");
  const forms = new Set([joined, ...tokens, ...tokens.map(singularize)]);
  const synonyms = ROLE_SYNONYMS[role];

  if (forms.has(role)) {
    return { score: 1, reason: "exact-name" };
  }
  if (synonyms.some((synonym) => forms.has(synonym))) {
    return { score: 0.9, reason: "synonym" };
  }
  const partials = [role, ...synonyms].filter((term) => term.length >= MIN_PARTIAL_LENGTH);
  if (tokens.some((token) => partials.some((term) => token.includes(term)))) {
    return { score: 0.7, reason: "partial-name" };
  }
  return { score: 0, reason: null };
};

const shareOf = (values: readonly string[], pattern: RegExp): number =>
  values.length === 0 ? 0 : values.filter((value) => pattern.test(value)).length / values.length;

const averageLength = (values: readonly string[]): number =>
  values.length === 0
    ? 0
    : values.reduce((sum, value) => sum + value.length, 0) / values.length;

const typeTable = (scores: Partial<Record<InferredType, number>>) => (profile: ColumnProfile) =>
  scores[profile.inferredType] ?? 0;

const hasCategoryCardinality = (profile: ColumnProfile): boolean =>
  profile.cardinality >= 2 && profile.cardinality <= 50;

const categoryTypes = typeTable({ categorical: 1, boolean: 0.6, text: 0.3, integer: 0.2 });

/**
 * One pure rule per role. `type` returning 0 disqualifies the column for the
 * role regardless of its name.
 */
export const ROLE_RULES: Record<SemanticRole, RoleRule> = {
  account: {
    type: typeTable({ identifier: 0.8, categorical: 0.8, integer: 0.7, text: 0.5 }),
    shape: (profile) => shareOf(profile.sampleValues, codeLikePattern)
  },
  amount: {
    type: typeTable({ numeric: 1, integer: 0.8 }),
    shape: (profile) => shareOf(profile.sampleValues, decimalOrCurrencyPattern)
  },
  category: {
    // short datasets leave a handful of labels typed as text
    type: (profile) =>
      profile.inferredType === "text" && hasCategoryCardinality(profile)
        ? 0.8
        : categoryTypes(profile),
    shape: (profile) => (hasCategoryCardinality(profile) ? 1 : 0)
  },
  counterparty: {
    type: typeTable({ categorical: 0.8, text: 0.8, identifier: 0.5 }),
    shape: (profile) => (profile.cardinality >= 2 ? 1 : 0)
  },
  date: {
    type: typeTable({ datetime: 1 }),
    shape: (profile) => 1 - profile.nullRatio
  },
  description: {
    type: typeTable({ text: 1, identifier: 0.6, categorical: 0.5 }),
    shape: (profile) => Math.min(1, averageLength(profile.sampleValues) / 20)
  },
  quantity: {
    type: typeTable({ integer: 0.9, numeric: 0.6 }),
    shape: (profile) => (profile.min !== undefined && profile.min >= 0 ? 1 : 0)
  }
};

export const roundScore = (value: number): number => Math.round(value * 10_000) / 10_000;

export const combineContributions = (
  contributions: ScoreContributions,
  weights: ScoreContributions
): number =>
  roundScore(
    weights.name * contributions.name +
      weights.type * contributions.type +
      weights.shape * contributions.shape
  );
