import React, { useMemo } from "react";
import { Bot, ImageOff, User } from "lucide-react";
import { decodeImage } from "../core/image";
import type { Message } from "../types";

type ChatMessageProps = {
  msg: Message;
};

function previewUri(bytes: Uint8Array | undefined): string | null | undefined {
  if (!bytes) return undefined;
  try {
    return decodeImage(bytes).dataUri;
  } catch {
    return null;
  }
}

export default function ChatMessage({ msg }: ChatMessageProps) {
  const isUser = msg.role === "user";
  // undefined: no attachment; null: attachment that is not a viewable image
  const imageUri = useMemo(() => previewUri(msg.imageBytes), [msg.imageBytes]);

  return (
    <div className={`flex items-start gap-3 ${isUser ? "flex-row-reverse" : ""}`} data-testid={`message-${msg.role}`}>
      <div className={`rounded-full p-2 ${isUser ? "bg-blue-600 text-white" : "bg-emerald-600 text-white"}`}>
        {isUser ? <User className="w-4 h-4" /> : <Bot className="w-4 h-4" />}
      </div>
      <div className="max-w-[78%] lg:max-w-[70%] space-y-2">
        <div
          className={`rounded-2xl px-4 py-3 border text-sm shadow-sm leading-relaxed whitespace-pre-wrap ${
            isUser
              ? "bg-blue-50 dark:bg-blue-950/30 border-blue-200 dark:border-blue-900"
              : "bg-white dark:bg-zinc-950 border-zinc-200 dark:border-zinc-800"
          }`}
        >
          <div className="text-xs font-semibold mb-1">{isUser ? "You" : "DermaCare AI"}</div>
          <div>{msg.content}</div>
          <div className="mt-2 text-[10px] text-zinc-400">{msg.timestamp}</div>
        </div>
        {imageUri && (
          <img src={imageUri} alt="Uploaded image" width={220} className="rounded-xl border border-zinc-200 dark:border-zinc-800" />
        )}
        {imageUri === null && (
          <div className="inline-flex items-center gap-1 text-xs text-zinc-500">
            <ImageOff className="w-3.5 h-3.5" /> Attachment could not be previewed
          </div>
        )}
      </div>
    </div>
  );
}
