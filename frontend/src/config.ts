import { z } from "zod";

export const DEFAULT_LLM_BASE = "https://api.groq.com/openai/v1";
export const DEFAULT_LLM_MODEL = "meta-llama/llama-4-scout-17b-16e-instruct";
export const DEFAULT_CLASSIFIER_BASE = "http://localhost:8000";

const text = (fallback: string) => z.string().trim().min(1).catch(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const EnvSchema = z.object({
  VITE_LLM_BASE: text(DEFAULT_LLM_BASE),
  VITE_LLM_MODEL: text(DEFAULT_LLM_MODEL),
  VITE_GROQ_API_KEY: z.string().trim().catch(""),
  VITE_LLM_TIMEOUT_MS: positiveInt(30_000),
  VITE_CLASSIFIER_BASE: text(DEFAULT_CLASSIFIER_BASE),
  VITE_CLASSIFIER_TIMEOUT_MS: positiveInt(20_000),
  VITE_TOP_K: positiveInt(3),
});

export type AppConfig = {
  llm: {
    baseUrl: string;
    model: string;
    apiKey: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
  };
  classifier: {
    baseUrl: string;
    timeoutMs: number;
  };
  topK: number;
};

const trimSlashes = (url: string) => url.replace(/\/+$/, "");

export function resolveConfig(env: Record<string, unknown>): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    llm: {
      baseUrl: trimSlashes(parsed.VITE_LLM_BASE),
      model: parsed.VITE_LLM_MODEL,
      apiKey: parsed.VITE_GROQ_API_KEY,
      timeoutMs: parsed.VITE_LLM_TIMEOUT_MS,
      temperature: 0,
      maxTokens: 500,
    },
    classifier: {
      baseUrl: trimSlashes(parsed.VITE_CLASSIFIER_BASE),
      timeoutMs: parsed.VITE_CLASSIFIER_TIMEOUT_MS,
    },
    topK: parsed.VITE_TOP_K,
  };
}
