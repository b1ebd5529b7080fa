import axios from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import type { AppConfig } from "../config";
import { CollaboratorError } from "../lib/errors";
import { toCollaboratorError } from "./http";

export interface LlmService {
  complete(systemInstruction: string, userPayload: string): Promise<string>;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      })
    )
    .min(1),
});

type ClientOptions = {
  adapter?: AxiosAdapter;
};

/** OpenAI-compatible chat completions client (Groq by default). */
export class GroqLlmService implements LlmService {
  private readonly http: AxiosInstance;

  constructor(private readonly config: AppConfig["llm"], { adapter }: ClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {},
      adapter,
    });
  }

  async complete(systemInstruction: string, userPayload: string): Promise<string> {
    let data: unknown;
    try {
      const res = await this.http.post("/chat/completions", {
        model: this.config.model,
        messages: [
          { role: "system", content: systemInstruction },
          { role: "user", content: userPayload },
        ],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      });
      data = res.data;
    } catch (err) {
      throw toCollaboratorError("llm", err);
    }

    const parsed = CompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError("llm", "The language model service returned an unexpected response.");
    }
    return parsed.data.choices[0].message.content ?? "";
  }
}
