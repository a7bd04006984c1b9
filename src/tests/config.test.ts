import { describe, expect, it, vi } from "vitest";
import {
  analyzeOptionsFromConfig,
  createRewriterFromConfig,
  loadConfig,
  rewriteSettingsFromConfig
} from "../lib/config";
import { ConfigError } from "../lib/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      topK: 10,
      mappingAcceptThreshold: 0.5,
      rewrite: {
        enabled: false,
        timeoutMs: 5000,
        model: "gpt-4o-mini",
        baseURL: undefined,
        apiKey: undefined
      }
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      INSIGHT_TOP_K: "5",
      INSIGHT_REWRITE_ENABLED: "yes",
      INSIGHT_REWRITE_TIMEOUT_MS: "250",
      INSIGHT_REWRITE_MODEL: "  ",
      INSIGHT_REWRITE_BASE_URL: "http://localhost:11434/v1",
      OPENAI_API_KEY: "test-secret",
      MAPPING_ACCEPT_THRESHOLD: "0.6"
    });

    expect(config.topK).toBe(5);
    expect(config.mappingAcceptThreshold).toBe(0.6);
    expect(config.rewrite).toEqual({
      enabled: true,
      timeoutMs: 250,
      model: "gpt-4o-mini",
      baseURL: "http://localhost:11434/v1",
      apiKey: "test-secret"
    });
  });

  it("throws ConfigError on invalid values", () => {
    expect(() => loadConfig({ INSIGHT_TOP_K: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ INSIGHT_TOP_K: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ INSIGHT_REWRITE_ENABLED: "sometimes" })).toThrow(ConfigError);
    expect(() => loadConfig({ MAPPING_ACCEPT_THRESHOLD: "1.5" })).toThrow(ConfigError);
  });
});

describe("createRewriterFromConfig", () => {
  it("returns null when rewriting is disabled", () => {
    const logger = { info: vi.fn(), warn: vi.fn() };

    expect(createRewriterFromConfig(loadConfig({ OPENAI_API_KEY: "test-secret" }), logger)).toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("warns and returns null when the API key is missing", () => {
    const logger = { info: vi.fn(), warn: vi.fn() };

    const settings = rewriteSettingsFromConfig(loadConfig({ INSIGHT_REWRITE_ENABLED: "true" }), logger);

    expect(settings).toEqual({ enabled: false, rewriter: null, timeoutMs: 5000 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("builds a rewriter when enabled with a key", () => {
    const settings = rewriteSettingsFromConfig(
      loadConfig({ INSIGHT_REWRITE_ENABLED: "1", OPENAI_API_KEY: "test-secret" })
    );

    expect(settings.enabled).toBe(true);
    expect(typeof settings.rewriter?.rewrite).toBe("function");
  });
});

describe("analyzeOptionsFromConfig", () => {
  it("feeds top-K, the acceptance threshold and rewrite settings into the pipeline", () => {
    const logger = { info: vi.fn(), warn: vi.fn() };
    const template = { panels: [] };

    const options = analyzeOptionsFromConfig(
      loadConfig({ INSIGHT_TOP_K: "4", MAPPING_ACCEPT_THRESHOLD: "0.7", INSIGHT_REWRITE_TIMEOUT_MS: "900" }),
      template,
      logger
    );

    expect(options).toEqual({
      template,
      topK: 4,
      mapping: { acceptThreshold: 0.7 },
      rewrite: { enabled: false, rewriter: null, timeoutMs: 900 },
      logger
    });
  });
});
