import { describe, expect, test } from "vitest";
import { appendMessage } from "../core/messageLog";
import {
  HISTORY_LIMIT,
  buildChatHistory,
  buildContextSummary,
  buildPredictionPayload,
  buildUserPrompt,
  fallbackReply,
  sanitizeLlmOutput,
  serializePayload,
} from "../core/payload";
import type { Consultation, HistoryEntry, Role } from "../types";
import { ECZEMA_PREDICTION, PNG_BYTES, onboardedConsultation, payloadOf } from "../test/fakes";

const now = new Date(2024, 4, 1, 11, 15);

function withMessages(entries: Array<[Role, string, Uint8Array?]>): Consultation {
  return entries.reduce(
    (c, [role, content, imageBytes]) => appendMessage(c, role, content, { imageBytes, now }).consultation,
    onboardedConsultation()
  );
}

const entry = (role: Role, content: string): HistoryEntry => ({
  role,
  content,
  type: "user_message",
  timestamp: "2024-05-01 11:15",
  has_image: false,
});

describe("payload", () => {
  test("history keeps only the most recent messages", () => {
    const c = withMessages(Array.from({ length: 14 }, (_, i): [Role, string] => ["user", `note ${i + 1}`]));
    const history = buildChatHistory(c);
    expect(history).toHaveLength(HISTORY_LIMIT);
    expect(history[0].content).toBe("note 3");
    expect(history[11].content).toBe("note 14");
  });

  test("history flags images without carrying bytes", () => {
    const c = withMessages([["user", "see photo", PNG_BYTES]]);
    expect(buildChatHistory(c)).toEqual([
      {
        role: "user",
        content: "see photo",
        type: "user_message",
        timestamp: "2024-05-01 11:15",
        has_image: true,
      },
    ]);
  });

  test("context summary uses the last two user lines and last assistant line", () => {
    const history = [
      entry("user", "a"),
      entry("assistant", "x"),
      entry("user", "b"),
      entry("user", "c"),
      entry("assistant", "y"),
    ];
    expect(buildContextSummary(history)).toBe("Recent user messages: b | c Last assistant message: y");
    expect(buildContextSummary([entry("assistant", "y")])).toBe("Last assistant message: y");
    expect(buildContextSummary([])).toBe("");
  });

  test("prediction payload repeats the description as the current question", () => {
    const c = withMessages([["user", "It itches at night"]]);
    const payload = buildPredictionPayload([ECZEMA_PREDICTION], "It itches at night", c);
    expect(payload.user_description).toBe("It itches at night");
    expect(payload.current_question).toBe("It itches at night");
    expect(payload.priority).toBe("Rank 1 = highest likelihood");
    expect(payload.predictions).toEqual([ECZEMA_PREDICTION]);
    expect(payload.context_summary).toBe("Recent user messages: It itches at night");
    expect(payload.patient).toEqual({ name: "Jordan", age: "34", skin_type: "Oily", problem_type: "Infection / Fungal" });
  });

  test("user prompt wraps the indented JSON payload", () => {
    const c = withMessages([["user", "see photo", PNG_BYTES]]);
    const payload = buildPredictionPayload([], "see photo", c);
    const prompt = buildUserPrompt(payload);
    expect(prompt.startsWith("Here is the structured analysis input:\n\n{\n  \"predictions\": []")).toBe(true);
    expect(prompt.endsWith("\n\nPlease generate the answer following the instructions.")).toBe(true);
    expect(payloadOf(prompt)).toEqual(JSON.parse(serializePayload(payload)));
    expect(prompt).not.toContain("imageBytes");
  });

  test("strips every asterisk and is idempotent", () => {
    expect(sanitizeLlmOutput("**Bold** and *it*")).toBe("Bold and it");
    for (const raw of ["plain", "***", "a*b**c", ""]) {
      const once = sanitizeLlmOutput(raw);
      expect(once).not.toContain("*");
      expect(sanitizeLlmOutput(once)).toBe(once);
    }
  });

  test("fallback reply names the failure", () => {
    expect(fallbackReply("boom")).toBe("⚠️ Sorry, I couldn't generate a response right now.\nError: boom");
  });
});
