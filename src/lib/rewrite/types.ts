import type { InsightCategory } from "../insights/types";

export type RewriteContext = {
  category: InsightCategory;
  subject: string;
  supportingMetric: number;
};

export type TextRewriter = {
  rewrite: (text: string, context: RewriteContext, signal?: AbortSignal) => Promise<string>;
};

export type RewriteSettings = {
  enabled: boolean;
  rewriter: TextRewriter | null;
  // applied to each insight separately, not to the batch
  timeoutMs: number;
};
