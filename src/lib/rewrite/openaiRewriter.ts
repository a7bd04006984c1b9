import OpenAI from "openai";
import { RewriteError } from "../errors";
import { parseRewriteOutput } from "./output";
import type { RewriteContext, TextRewriter } from "./types";

export type OpenAIRewriterConfig = {
  apiKey: string;
  model: string;
  // any OpenAI-compatible chat completions server, e.g. a local Ollama instance
  baseURL?: string;
  maxTokens?: number;
};

const SYSTEM_PROMPT = [
  "You are an analytics assistant rewording automatically generated data insights.",
  "Rewrite the given insight as one clear, business-ready sentence.",
  "Keep every number, column name and category label exactly as given. Do not add facts.",
  "Return only the rewritten sentence without quotes or markdown."
].join("\n");

const buildUserPrompt = (text: string, context: RewriteContext): string =>
  JSON.stringify({ insight: text, category: context.category, subject: context.subject });

export const createOpenAIRewriter = (config: OpenAIRewriterConfig): TextRewriter => {
  if (config.apiKey.trim() === "") {
    throw new RewriteError("Missing OPENAI_API_KEY");
  }
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    maxRetries: 0
  });

  return {
    rewrite: async (text, context, signal) => {
      const completion = await client.chat.completions.create(
        {
          model: config.model,
          temperature: 0.2,
          max_tokens: config.maxTokens ?? 200,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(text, context) }
          ]
        },
        { signal }
      );
      return parseRewriteOutput(completion.choices[0]?.message?.content);
    }
  };
};
