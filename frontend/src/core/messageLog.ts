import type { Consultation, Message, MessageType, Role } from "../types";

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:mm`; stored on the message, never recomputed. */
export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

function classifyUser(text: string): MessageType {
  const t = text.toLowerCase();
  if (t.includes("remedy") || t.includes("help") || t.includes("what should")) return "user_followup";
  if (t.endsWith("?")) return "user_question";
  if (t.includes("skin") || t.includes("issue") || t.includes("problem")) return "user_description";
  return "user_message";
}

function classifyAssistant(text: string): MessageType {
  const t = text.toLowerCase();
  if (["apply", "use", "avoid", "moistur", "cream"].some((w) => t.includes(w))) return "ai_remedy";
  if (["looks", "appears", "seems"].some((w) => t.includes(w))) return "ai_observation";
  return "ai_response";
}

export function classifyMessage(role: Role, content: string): MessageType {
  return role === "user" ? classifyUser(content) : classifyAssistant(content);
}

type AppendOptions = {
  imageBytes?: Uint8Array;
  now?: Date;
};

export type AppendResult = {
  consultation: Consultation;
  message: Message;
};

/**
 * Append-only: returns a new consultation with the message at the end and
 * `updatedAt` refreshed. Images are only ever kept on user messages.
 */
export function appendMessage(
  consultation: Consultation,
  role: Role,
  content: string,
  { imageBytes, now = new Date() }: AppendOptions = {}
): AppendResult {
  const message: Message = {
    id: `m_${consultation.id}_${consultation.messages.length + 1}`,
    role,
    content,
    type: classifyMessage(role, content),
    timestamp: formatTimestamp(now),
  };
  if (role === "user" && imageBytes && imageBytes.length > 0) {
    message.imageBytes = imageBytes;
  }
  return {
    consultation: { ...consultation, messages: [...consultation.messages, message], updatedAt: now },
    message,
  };
}

export function snapshot(consultation: Consultation): readonly Message[] {
  return consultation.messages;
}
