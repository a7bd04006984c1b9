import { z } from "zod";
import type { AnalyzeOptions } from "./analyzeDataset";
import type { DashboardTemplate } from "./dashboard/types";
import { ConfigError } from "./errors";
import { defaultLogger, type Logger } from "./logging";
import { createOpenAIRewriter } from "./rewrite/openaiRewriter";
import type { RewriteSettings, TextRewriter } from "./rewrite/types";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  INSIGHT_TOP_K: z.coerce.number().int().positive().default(10),
  INSIGHT_REWRITE_ENABLED: booleanFlag.default("false"),
  INSIGHT_REWRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  INSIGHT_REWRITE_MODEL: z.string().min(1).default("gpt-4o-mini"),
  INSIGHT_REWRITE_BASE_URL: z.string().url().optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  MAPPING_ACCEPT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5)
});

export type AppConfig = {
  topK: number;
  mappingAcceptThreshold: number;
  rewrite: {
    enabled: boolean;
    timeoutMs: number;
    model: string;
    baseURL?: string;
    apiKey?: string;
  };
};

type Env = Record<string, string | undefined>;

// blank variables behave as unset
const dropBlank = (env: Env): Env =>
  Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    topK: values.INSIGHT_TOP_K,
    mappingAcceptThreshold: values.MAPPING_ACCEPT_THRESHOLD,
    rewrite: {
      enabled: values.INSIGHT_REWRITE_ENABLED,
      timeoutMs: values.INSIGHT_REWRITE_TIMEOUT_MS,
      model: values.INSIGHT_REWRITE_MODEL,
      baseURL: values.INSIGHT_REWRITE_BASE_URL,
      apiKey: values.OPENAI_API_KEY
    }
  };
};

export const createRewriterFromConfig = (
  config: AppConfig,
  logger: Logger = defaultLogger
): TextRewriter | null => {
  const { enabled, model, baseURL, apiKey } = config.rewrite;
  if (!enabled) {
    return null;
  }
  if (!apiKey) {
    logger.warn("[config] rewriting enabled without OPENAI_API_KEY; rewriting disabled");
    return null;
  }
  return createOpenAIRewriter({ apiKey, model, baseURL });
};

export const rewriteSettingsFromConfig = (
  config: AppConfig,
  logger: Logger = defaultLogger
): RewriteSettings => {
  const rewriter = createRewriterFromConfig(config, logger);
  return { enabled: rewriter !== null, rewriter, timeoutMs: config.rewrite.timeoutMs };
};

/**
 * Pipeline options from configuration: default top-K, the mapper's
 * acceptance threshold and the rewrite settings.
 */
export const analyzeOptionsFromConfig = (
  config: AppConfig,
  template: DashboardTemplate,
  logger: Logger = defaultLogger
): AnalyzeOptions => ({
  template,
  topK: config.topK,
  mapping: { acceptThreshold: config.mappingAcceptThreshold },
  rewrite: rewriteSettingsFromConfig(config, logger),
  logger
});
