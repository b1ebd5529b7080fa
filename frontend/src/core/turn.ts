import { appendMessage } from "./messageLog";
import type { AppendResult } from "./messageLog";
import { decodeImage as defaultDecodeImage } from "./image";
import type { DecodedImage } from "./image";
import {
  SYSTEM_PROMPT,
  buildPredictionPayload,
  buildUserPrompt,
  fallbackReply,
  sanitizeLlmOutput,
  serializePayload,
} from "./payload";
import { describeError } from "../lib/errors";
import { logDebug, logError, logWarn, preview } from "../lib/log";
import type { SkinClassifier } from "../services/classifier";
import type { LlmService } from "../services/llm";
import type { Consultation, Message, Prediction } from "../types";

export const DEFAULT_TOP_K = 3;
export const EMPTY_DESCRIPTION = "No description provided.";

export type TurnDependencies = {
  classifier: SkinClassifier;
  llm: LlmService;
  decodeImage?: (bytes: Uint8Array) => DecodedImage;
  topK?: number;
};

export type ReplySource = "model" | "fallback";

export type TurnReply = {
  text: string;
  source: ReplySource;
  predictions: Prediction[];
  imageUsed: boolean;
};

export type TurnResult = {
  consultation: Consultation;
  userMessage: Message;
  reply: Message;
  source: ReplySource;
  predictions: Prediction[];
};

/** The attachment rides on the user's own message, not a separate record. */
export function recordUserTurn(
  consultation: Consultation,
  text: string,
  imageBytes: Uint8Array | undefined,
  now: Date = new Date()
): AppendResult {
  return appendMessage(consultation, "user", text, { imageBytes, now });
}

function tryDecode(
  imageBytes: Uint8Array | undefined,
  decode: (bytes: Uint8Array) => DecodedImage
): DecodedImage | null {
  if (!imageBytes || imageBytes.length === 0) return null;
  try {
    return decode(imageBytes);
  } catch (err) {
    logWarn("[Image decode failed] continuing without image", describeError(err));
    return null;
  }
}

async function classify(deps: TurnDependencies, image: DecodedImage): Promise<Prediction[]> {
  try {
    return await deps.classifier.predict(image, deps.topK ?? DEFAULT_TOP_K);
  } catch (err) {
    logError("[Classifier error] continuing without predictions", err);
    return [];
  }
}

/**
 * Produces the assistant text for a consultation whose latest message is the
 * user's turn. Collaborator failures become a fallback reply; this never rejects
 * because of them.
 */
export async function generateReply(
  consultation: Consultation,
  text: string,
  imageBytes: Uint8Array | undefined,
  deps: TurnDependencies
): Promise<TurnReply> {
  const image = tryDecode(imageBytes, deps.decodeImage ?? defaultDecodeImage);

  let predictions: Prediction[] = [];
  let description = text;
  if (image) {
    description = text.trim() || EMPTY_DESCRIPTION;
    predictions = await classify(deps, image);
  }

  const payload = buildPredictionPayload(predictions, description, consultation);
  logDebug("[LLM input payload]", preview(serializePayload(payload)));

  const userPrompt = buildUserPrompt(payload);
  logDebug("[LLM request]", {
    system_prompt_length: SYSTEM_PROMPT.length,
    user_prompt_length: userPrompt.length,
  });

  try {
    const raw = await deps.llm.complete(SYSTEM_PROMPT, userPrompt);
    logDebug("[LLM response preview]", preview(raw));
    return { text: sanitizeLlmOutput(raw), source: "model", predictions, imageUsed: image !== null };
  } catch (err) {
    logError("[LLM error]", err);
    return {
      text: sanitizeLlmOutput(fallbackReply(describeError(err))),
      source: "fallback",
      predictions,
      imageUsed: image !== null,
    };
  }
}

/** One complete post-onboarding turn: user message in, assistant message out. */
export async function runTurn(
  consultation: Consultation,
  text: string,
  imageBytes: Uint8Array | undefined,
  deps: TurnDependencies,
  clock: () => Date = () => new Date()
): Promise<TurnResult> {
  const recorded = recordUserTurn(consultation, text, imageBytes, clock());
  const reply = await generateReply(recorded.consultation, text, imageBytes, deps);
  const answered = appendMessage(recorded.consultation, "assistant", reply.text, { now: clock() });
  return {
    consultation: answered.consultation,
    userMessage: recorded.message,
    reply: answered.message,
    source: reply.source,
    predictions: reply.predictions,
  };
}
