import { readFile } from "node:fs/promises";
import { z } from "zod";
import { TemplateError } from "../errors";
import type { DashboardTemplate, PanelAggregation, PanelSpec } from "./types";

const panelSchema = z
  .object({
    id: z.string().min(1).transform((value) => value.trim()),
    required_roles: z.array(z.string().min(1).transform((value) => value.trim())),
    chart_type: z.string().min(1),
    aggregation: z
      .enum([
        "sum",
        "count",
        "avg",
        "time-bucket",
        "group-by-time-bucket",
        "points",
        "histogram",
        "heatmap"
      ])
      .transform(
        (value): PanelAggregation => (value === "group-by-time-bucket" ? "time-bucket" : value)
      ),
    title_template: z.string(),
    top_n: z.number().int().positive().optional(),
    time_granularity: z.enum(["day", "month", "year"]).optional(),
    bins: z.number().int().positive().max(200).optional()
  })
  .strict();

const templateSchema = z
  .object({
    panels: z.array(panelSchema)
  })
  .superRefine((template, ctx) => {
    const seen = new Set<string>();
    template.panels.forEach((panel, index) => {
      if (seen.has(panel.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["panels", index, "id"],
          message: `Duplicate panel id: ${panel.id}`
        });
      }
      seen.add(panel.id);
    });
  });

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);

export const parseTemplate = (value: unknown): DashboardTemplate => {
  const parsed = templateSchema.safeParse(value);
  if (!parsed.success) {
    throw new TemplateError("Invalid dashboard template", formatIssues(parsed.error));
  }
  return {
    panels: parsed.data.panels.map(
      (panel): PanelSpec => ({
        id: panel.id,
        requiredRoles: panel.required_roles,
        chartType: panel.chart_type,
        aggregation: panel.aggregation,
        titleTemplate: panel.title_template,
        ...(panel.top_n === undefined ? {} : { topN: panel.top_n }),
        ...(panel.time_granularity === undefined ? {} : { timeGranularity: panel.time_granularity }),
        ...(panel.bins === undefined ? {} : { bins: panel.bins })
      })
    )
  };
};

export const loadTemplate = async (path: string | URL): Promise<DashboardTemplate> => {
  const raw = await readFile(path, "utf8");
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new TemplateError("Dashboard template is not valid JSON", [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  return parseTemplate(document);
};

export const DEFAULT_TEMPLATE_URL = new URL(
  "../../../templates/default-dashboard.json",
  import.meta.url
);

export const loadDefaultTemplate = async (): Promise<DashboardTemplate> =>
  loadTemplate(DEFAULT_TEMPLATE_URL);
