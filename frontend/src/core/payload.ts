import type { Consultation, HistoryEntry, Prediction, PredictionPayload } from "../types";

export const HISTORY_LIMIT = 12;

export const SYSTEM_PROMPT = `
You are DermaCare AI, a friendly virtual dermatologist assistant.

You always receive a JSON payload with:
- predictions: list of objects from the image model, each with:
  - rank (1 = most likely)
  - confidence (0-100)
  - disease, severity, characteristics, recommendation
- user_description: the patient's latest text in their own words
- current_question: the specific question you must answer now
- chat_history: recent conversation with role + content + timestamp
- context_summary: short recap of recent discussion
- patient: { name, age, skin_type, problem_type }

YOUR APPROACH:

1. Use Context: Review chat_history and context_summary to understand what has been discussed. Don't repeat previous explanations.

2. Answer Only What's Asked:
   - If user asks for DETECTION/IDENTIFICATION -> Provide condition name, characteristics, and severity. DO NOT give treatment unless asked.
   - If user asks for TREATMENT/REMEDIES/CURE -> Provide specific care steps, products, and recommendations. DO NOT repeat detection details.
   - If user asks a FOLLOW-UP question -> Answer that specific question based on chat history.

3. When Predictions are Present (user uploaded an image):
   - Use the "disease" field from top prediction
   - NEVER mention confidence percentages
   - For detection queries: Name the condition + brief description + characteristics
   - For treatment queries: Give practical care steps and recommendations

4. When No Predictions (no image):
   - Use chat_history and user_description to provide relevant guidance
   - Answer based on conversation context

5. Treatment Guidelines (only when user asks):
   - Home care measures
   - Over-the-counter products (specific names when helpful)
   - When to see a dermatologist
   - Lifestyle and prevention tips

6. Strict Boundaries:
   - ONLY answer skin, dermatology, and skincare questions
   - If current_question is NOT skin-related, reply: "Sorry, I can only help with skin-related questions."
   - Do NOT provide medical diagnoses - this is appearance-based analysis only

STYLE:
- Be concise and precise - avoid lengthy explanations
- Natural, conversational tone
- Professional but friendly
- Match response length to question complexity
- End with: "How can I help you next?" or contextual closing like "Take care!" or "Feel free to ask more!"

IMPORTANT RULES:
- Never show confidence percentages
- Never repeat information already discussed in chat_history
- Detection requests = name + description only
- Treatment requests = remedies + care steps only
- Non-skin questions = politely decline
`;

/** Last messages of the thread with image payloads reduced to a flag. */
export function buildChatHistory(consultation: Consultation, limit = HISTORY_LIMIT): HistoryEntry[] {
  return consultation.messages.slice(-limit).map((m) => ({
    role: m.role,
    content: m.content,
    type: m.type,
    timestamp: m.timestamp,
    has_image: m.imageBytes !== undefined,
  }));
}

export function buildContextSummary(history: HistoryEntry[]): string {
  const userLines = history.filter((m) => m.role === "user").map((m) => m.content);
  const aiLines = history.filter((m) => m.role === "assistant").map((m) => m.content);

  const parts: string[] = [];
  const lastUser = userLines.slice(-2);
  const lastAi = aiLines.slice(-1);
  if (lastUser.length) parts.push(`Recent user messages: ${lastUser.join(" | ")}`);
  if (lastAi.length) parts.push(`Last assistant message: ${lastAi.join(" | ")}`);
  return parts.join(" ");
}

export function buildPredictionPayload(
  predictions: Prediction[],
  userDescription: string,
  consultation: Consultation
): PredictionPayload {
  const chatHistory = buildChatHistory(consultation);
  return {
    predictions,
    priority: "Rank 1 = highest likelihood",
    // Same text twice: the prompt frames one as what was said, the other as what to answer now.
    user_description: userDescription,
    current_question: userDescription,
    chat_history: chatHistory,
    context_summary: buildContextSummary(chatHistory),
    patient: {
      name: consultation.patientName,
      age: consultation.patientAge,
      skin_type: consultation.skinType,
      problem_type: consultation.problemType,
    },
  };
}

export function serializePayload(payload: PredictionPayload): string {
  return JSON.stringify(payload, null, 2);
}

export function buildUserPrompt(payload: PredictionPayload): string {
  return (
    "Here is the structured analysis input:\n\n" +
    serializePayload(payload) +
    "\n\nPlease generate the answer following the instructions."
  );
}

/** Emphasis markers never reach the chat. */
export function sanitizeLlmOutput(text: string): string {
  return text.replace(/\*/g, "");
}

export function fallbackReply(detail: string): string {
  return `⚠️ Sorry, I couldn't generate a response right now.\nError: ${detail}`;
}
