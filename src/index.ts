export { analyzeDataset } from "./lib/analyzeDataset";
export type { AnalysisResult, AnalyzeOptions } from "./lib/analyzeDataset";
export {
  analyzeOptionsFromConfig,
  createRewriterFromConfig,
  loadConfig,
  rewriteSettingsFromConfig
} from "./lib/config";
export type { AppConfig } from "./lib/config";
export { loadDefaultTemplate, loadTemplate, parseTemplate } from "./lib/dashboard/template";
export { renderTitle, resolveDashboard } from "./lib/dashboard/resolveDashboard";
export type {
  ChartSeries,
  ChartSpec,
  DashboardTemplate,
  PanelAggregation,
  PanelSpec,
  ResolvedChart,
  SkippedChart
} from "./lib/dashboard/types";
export { ConfigError, RewriteError, TemplateError, TimeoutError } from "./lib/errors";
export { generateInsights, rankInsights } from "./lib/insights/generateInsights";
export { generateRefinedInsights, refineInsights } from "./lib/insights/refineInsights";
export type { Insight, InsightCategory, InsightOptions } from "./lib/insights/types";
export { describeMapping, mapSchema, scoreRoleCandidates } from "./lib/mapping/mapSchema";
export { SEMANTIC_ROLES } from "./lib/mapping/types";
export type { FieldMapping, RoleBinding, SemanticRole } from "./lib/mapping/types";
export { profileDataset } from "./lib/profiling/profileDataset";
export type { CellValue, ColumnProfile, Dataset, InferredType } from "./lib/profiling/types";
export { createOpenAIRewriter } from "./lib/rewrite/openaiRewriter";
export type { RewriteContext, RewriteSettings, TextRewriter } from "./lib/rewrite/types";
