import axios from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import rawConditions from "../data/conditions.json";
import type { AppConfig } from "../config";
import type { DecodedImage } from "../core/image";
import { CollaboratorError } from "../lib/errors";
import type { Prediction } from "../types";
import { toCollaboratorError } from "./http";

export interface SkinClassifier {
  predict(image: DecodedImage, topK: number): Promise<Prediction[]>;
}

const ConditionSchema = z.object({
  key: z.string().min(1),
  prompt: z.string().min(1),
  name: z.string().optional(),
  severity: z.string().optional(),
  characteristics: z.array(z.string()).optional(),
  recommendation: z.string().optional(),
});
export type Condition = z.infer<typeof ConditionSchema>;

export const CONDITION_CATALOG: Condition[] = z.array(ConditionSchema).min(1).parse(rawConditions);

const SimilarityResponseSchema = z.object({
  similarities: z.array(z.number()),
});

/** Softmax temperature applied to cosine similarities. */
export const TEMPERATURE = 0.07;

const DEFAULT_RECOMMENDATION = "Consider gentle skin care and seek in-person advice if concerned.";

function softmax(values: number[]): number[] {
  const max = Math.max(...values);
  const exps = values.map((v) => Math.exp(v - max));
  const total = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / total);
}

/**
 * Turns per-prompt similarities into the top-k ranked predictions. Ties keep
 * catalog order, so the result is deterministic for a fixed input.
 */
export function rankPredictions(
  similarities: number[],
  topK: number,
  catalog: Condition[] = CONDITION_CATALOG,
  temperature = TEMPERATURE
): Prediction[] {
  if (topK <= 0) return [];
  if (similarities.length !== catalog.length) {
    throw new CollaboratorError(
      "classifier",
      `Expected ${catalog.length} similarity scores, received ${similarities.length}.`
    );
  }

  const probs = softmax(similarities.map((s) => s / temperature));
  const order = probs.map((_, i) => i).sort((a, b) => probs[b] - probs[a]);
  const k = Math.min(topK, catalog.length);

  return order.slice(0, k).map((idx, i) => {
    const c = catalog[idx];
    return {
      rank: i + 1,
      confidence: probs[idx] * 100,
      raw_text: c.prompt,
      disease: c.name ?? c.key.charAt(0).toUpperCase() + c.key.slice(1),
      severity: c.severity ?? "Unknown",
      characteristics: c.characteristics ?? [],
      recommendation: c.recommendation ?? DEFAULT_RECOMMENDATION,
    };
  });
}

type ClientOptions = {
  adapter?: AxiosAdapter;
  catalog?: Condition[];
};

/**
 * Client for the embedding service that owns the vision-language model. The
 * service scores the image against each catalog prompt; ranking happens here.
 */
export class HttpSkinClassifier implements SkinClassifier {
  private readonly http: AxiosInstance;
  private readonly catalog: Condition[];

  constructor(config: AppConfig["classifier"], { adapter, catalog = CONDITION_CATALOG }: ClientOptions = {}) {
    this.http = axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs, adapter });
    this.catalog = catalog;
  }

  async predict(image: DecodedImage, topK: number): Promise<Prediction[]> {
    if (topK <= 0) return [];
    let data: unknown;
    try {
      const res = await this.http.post("/similarities", {
        image: image.dataUri,
        prompts: this.catalog.map((c) => c.prompt),
      });
      data = res.data;
    } catch (err) {
      throw toCollaboratorError("classifier", err);
    }

    const parsed = SimilarityResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollaboratorError("classifier", "The image classifier returned an unexpected response.");
    }
    return rankPredictions(parsed.data.similarities, topK, this.catalog);
  }
}
