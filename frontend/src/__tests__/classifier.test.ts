import { AxiosError } from "axios";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { describe, expect, test } from "vitest";
import { decodeImage } from "../core/image";
import { CollaboratorError } from "../lib/errors";
import { CONDITION_CATALOG, HttpSkinClassifier, rankPredictions } from "../services/classifier";
import { PNG_BYTES } from "../test/fakes";

const flat = (value: number) => CONDITION_CATALOG.map(() => value);
const config = { baseUrl: "http://classifier.test", timeoutMs: 1000 };

function respondWith(data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (cfg) => {
    seen.push(cfg);
    return { data, status: 200, statusText: "OK", headers: {}, config: cfg };
  };
}

function failWith(status: number): AxiosAdapter {
  return async (cfg) => {
    throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, cfg, null, {
      data: {},
      status,
      statusText: "Error",
      headers: {},
      config: cfg,
    });
  };
}

describe("rankPredictions", () => {
  test("equal scores keep catalog order with equal confidence", () => {
    const ranked = rankPredictions(flat(0.2), 3);
    expect(ranked.map((p) => p.rank)).toEqual([1, 2, 3]);
    expect(ranked.map((p) => p.disease)).toEqual([
      "Psoriasis-like appearance",
      "Eczema-like appearance",
      "Irregular dark spot",
    ]);
    for (const p of ranked) expect(p.confidence).toBeCloseTo(100 / 14, 6);
  });

  test("a stronger match ranks first with softmax confidence", () => {
    const scores = flat(0.2);
    scores[1] = 0.35;
    const [top, second] = rankPredictions(scores, 2);
    const e = Math.exp(0.15 / 0.07);
    expect(top.disease).toBe("Eczema-like appearance");
    expect(top.severity).toBe("Low to Medium");
    expect(top.confidence).toBeCloseTo((100 * e) / (13 + e), 6);
    expect(second.disease).toBe("Psoriasis-like appearance");
    expect(second.confidence).toBeCloseTo(100 / (13 + e), 6);
  });

  test("top-k is clamped to the catalog and zero yields nothing", () => {
    expect(rankPredictions(flat(0.1), 50)).toHaveLength(14);
    expect(rankPredictions(flat(0.1), 0)).toEqual([]);
  });

  test("score count must match the catalog", () => {
    expect(() => rankPredictions([0.1, 0.2], 3)).toThrow(CollaboratorError);
  });

  test("fills defaults for conditions without details", () => {
    const [p] = rankPredictions([0.3], 1, [{ key: "mystery", prompt: "an unusual lesion" }]);
    expect(p).toEqual({
      rank: 1,
      confidence: 100,
      raw_text: "an unusual lesion",
      disease: "Mystery",
      severity: "Unknown",
      characteristics: [],
      recommendation: "Consider gentle skin care and seek in-person advice if concerned.",
    });
  });
});

describe("HttpSkinClassifier", () => {
  test("posts the image with every catalog prompt and ranks the reply", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const scores = flat(0.2);
    scores[12] = 0.4;
    const classifier = new HttpSkinClassifier(config, { adapter: respondWith({ similarities: scores }, seen) });

    const predictions = await classifier.predict(decodeImage(PNG_BYTES), 1);

    expect(predictions).toHaveLength(1);
    expect(predictions[0].disease).toBe("Ring-like rash");
    expect(seen).toHaveLength(1);
    expect(seen[0].baseURL).toBe("http://classifier.test");
    expect(seen[0].url).toBe("/similarities");
    const body = JSON.parse(String(seen[0].data));
    expect(body.image).toBe("data:image/png;base64,iVBORw0KGgoA");
    expect(body.prompts).toEqual(CONDITION_CATALOG.map((c) => c.prompt));
  });

  test("rejects a malformed reply", async () => {
    const classifier = new HttpSkinClassifier(config, { adapter: respondWith({ scores: [] }) });
    await expect(classifier.predict(decodeImage(PNG_BYTES), 3)).rejects.toThrow(
      "The image classifier returned an unexpected response."
    );
  });

  test("maps server errors", async () => {
    const classifier = new HttpSkinClassifier(config, { adapter: failWith(500) });
    await expect(classifier.predict(decodeImage(PNG_BYTES), 3)).rejects.toThrow(
      "The image classifier had a server error (500)."
    );
  });
});
