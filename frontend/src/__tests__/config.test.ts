import { describe, expect, test } from "vitest";
import { DEFAULT_CLASSIFIER_BASE, DEFAULT_LLM_BASE, DEFAULT_LLM_MODEL, resolveConfig } from "../config";

describe("config", () => {
  test("falls back to defaults for an empty environment", () => {
    expect(resolveConfig({})).toEqual({
      llm: {
        baseUrl: DEFAULT_LLM_BASE,
        model: DEFAULT_LLM_MODEL,
        apiKey: "",
        timeoutMs: 30000,
        temperature: 0,
        maxTokens: 500,
      },
      classifier: { baseUrl: DEFAULT_CLASSIFIER_BASE, timeoutMs: 20000 },
      topK: 3,
    });
  });

  test("reads overrides and trims trailing slashes", () => {
    const config = resolveConfig({
      VITE_LLM_BASE: "http://llm.local/v1/",
      VITE_CLASSIFIER_BASE: "http://classifier.local//",
      VITE_GROQ_API_KEY: " test-key ",
      VITE_TOP_K: "5",
      VITE_CLASSIFIER_TIMEOUT_MS: "1500",
    });
    expect(config.llm.baseUrl).toBe("http://llm.local/v1");
    expect(config.llm.apiKey).toBe("test-key");
    expect(config.classifier).toEqual({ baseUrl: "http://classifier.local", timeoutMs: 1500 });
    expect(config.topK).toBe(5);
  });

  test("ignores values that do not parse", () => {
    const config = resolveConfig({ VITE_LLM_TIMEOUT_MS: "soon", VITE_TOP_K: "-2", VITE_LLM_MODEL: "   " });
    expect(config.llm.timeoutMs).toBe(30000);
    expect(config.topK).toBe(3);
    expect(config.llm.model).toBe(DEFAULT_LLM_MODEL);
  });
});
