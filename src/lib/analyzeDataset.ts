import { resolveDashboard } from "./dashboard/resolveDashboard";
import type { ChartSpec, DashboardTemplate } from "./dashboard/types";
import { generateInsights } from "./insights/generateInsights";
import { refineInsights } from "./insights/refineInsights";
import type { Insight, InsightOptions } from "./insights/types";
import { defaultLogger, type Logger } from "./logging";
import { mapSchema } from "./mapping/mapSchema";
import type { FieldMapping, MappingOptions } from "./mapping/types";
import { profileDataset } from "./profiling/profileDataset";
import type { ColumnProfile, Dataset, ProfileOptions } from "./profiling/types";
import type { RewriteSettings } from "./rewrite/types";

export type AnalyzeOptions = {
  template: DashboardTemplate;
  topK: number;
  rewrite?: RewriteSettings;
  profile?: Partial<ProfileOptions>;
  mapping?: Partial<MappingOptions>;
  insights?: Partial<InsightOptions>;
  logger?: Logger;
};

export type AnalysisResult = {
  profiles: ColumnProfile[];
  mapping: FieldMapping;
  insights: Insight[];
  charts: ChartSpec[];
};

export const analyzeDataset = async (
  dataset: Dataset,
  options: AnalyzeOptions
): Promise<AnalysisResult> => {
  const logger = options.logger ?? defaultLogger;
  logger.info("[analyze] start", {
    columns: dataset.columns.length,
    rows: dataset.rows.length,
    panels: options.template.panels.length
  });

  const profiles = profileDataset(dataset, options.profile);
  const mapping = mapSchema(profiles, options.mapping);
  const ranked = generateInsights({
    dataset,
    profiles,
    mapping,
    topK: options.topK,
    options: options.insights
  });
  const charts = resolveDashboard({ template: options.template, mapping, profiles, dataset });
  const insights = options.rewrite
    ? await refineInsights(ranked, options.rewrite, logger)
    : ranked;

  logger.info("[analyze] done", {
    mappedRoles: Object.keys(mapping).length,
    insights: insights.length,
    charts: charts.length,
    skippedCharts: charts.filter((chart) => chart.status === "skipped").length
  });

  return { profiles, mapping, insights, charts };
};
