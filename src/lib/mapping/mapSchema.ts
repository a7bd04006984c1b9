import type { ColumnProfile } from "../profiling/types";
import { ROLE_RULES, combineContributions, scoreName } from "./scoring";
import {
  SEMANTIC_ROLES,
  type FieldMapping,
  type MappingOptions,
  type RoleBinding,
  type RoleCandidate,
  type SemanticRole
} from "./types";

export const DEFAULT_MAPPING_OPTIONS: MappingOptions = {
  acceptThreshold: 0.5,
  weights: { name: 0.5, type: 0.35, shape: 0.15 }
};

const compareText = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

const compareCandidates = (a: RoleCandidate, b: RoleCandidate): number =>
  b.score - a.score || compareText(a.role, b.role) || compareText(a.column, b.column);

const scoreCandidate = (
  profile: ColumnProfile,
  role: SemanticRole,
  options: MappingOptions
): RoleCandidate | null => {
  const rule = ROLE_RULES[role];
  const type = rule.type(profile);
  if (type <= 0) {
    return null;
  }
  const nameMatch = scoreName(profile.name, role);
  const contributions = { name: nameMatch.score, type, shape: rule.shape(profile) };
  return {
    role,
    column: profile.name,
    score: combineContributions(contributions, options.weights),
    matchedBy: nameMatch.reason ?? "type-shape",
    contributions
  };
};

/**
 * Scores every role against every column. The result is sorted by score
 * descending, then role name, then column name, so equal scores always resolve
 * the same way.
 */
export const scoreRoleCandidates = (
  profiles: readonly ColumnProfile[],
  options: Partial<MappingOptions> = {}
): RoleCandidate[] => {
  const resolved: MappingOptions = { ...DEFAULT_MAPPING_OPTIONS, ...options };
  const candidates: RoleCandidate[] = [];
  SEMANTIC_ROLES.forEach((role) => {
    profiles.forEach((profile) => {
      const candidate = scoreCandidate(profile, role, resolved);
      if (candidate && candidate.score > 0) {
        candidates.push(candidate);
      }
    });
  });
  return candidates.sort(compareCandidates);
};

/**
 * Greedy maximum-weight assignment over the role × column score matrix. Roles
 * without a candidate at or above the acceptance threshold are left out of the
 * mapping; a column is never bound to two roles.
 */
export const mapSchema = (
  profiles: readonly ColumnProfile[],
  options: Partial<MappingOptions> = {}
): FieldMapping => {
  const resolved: MappingOptions = { ...DEFAULT_MAPPING_OPTIONS, ...options };
  const bindings = new Map<SemanticRole, RoleBinding>();
  const boundColumns = new Set<string>();

  scoreRoleCandidates(profiles, resolved)
    .filter((candidate) => candidate.score >= resolved.acceptThreshold)
    .forEach((candidate) => {
      if (bindings.has(candidate.role) || boundColumns.has(candidate.column)) {
        return;
      }
      bindings.set(candidate.role, {
        column: candidate.column,
        confidence: candidate.score,
        matchedBy: candidate.matchedBy,
        contributions: candidate.contributions
      });
      boundColumns.add(candidate.column);
    });

  const mapping: FieldMapping = {};
  SEMANTIC_ROLES.forEach((role) => {
    const binding = bindings.get(role);
    if (binding) {
      mapping[role] = binding;
    }
  });
  return mapping;
};

export const describeMapping = (mapping: FieldMapping): string[] =>
  SEMANTIC_ROLES.map((role) => {
    const binding = mapping[role];
    if (!binding) {
      return `${role}: unmapped`;
    }
    return `${role}: ${binding.column} (${binding.confidence.toFixed(2)}, ${binding.matchedBy})`;
  });
