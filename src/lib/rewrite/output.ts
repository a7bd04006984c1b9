import { z } from "zod";
import { RewriteError } from "../errors";

const MAX_REWRITE_LENGTH = 600;

const rewriteOutputSchema = z
  .string()
  .transform((value) =>
    value
      .trim()
      .replace(/^[-*•]\s+/, "")
      .replace(/^"([\s\S]*)"$/, "$1")
      .trim()
  )
  .pipe(z.string().min(1).max(MAX_REWRITE_LENGTH));

export const parseRewriteOutput = (content: unknown): string => {
  const parsed = rewriteOutputSchema.safeParse(content);
  if (!parsed.success) {
    throw new RewriteError("Invalid model output", undefined, parsed.error.message);
  }
  return parsed.data;
};
