import React, { useEffect, useRef } from "react";
import { Loader2, Stethoscope } from "lucide-react";
import ChatMessage from "./ChatMessage";
import ChoiceButtons from "./ChoiceButtons";
import Composer from "./Composer";
import type { Choice } from "../core/onboarding";
import type { Message } from "../types";

type ChatWindowProps = {
  title: string;
  messages: readonly Message[];
  choices: { heading: string; options: Choice[] } | null;
  onChoose: (value: string) => void;
  busy: boolean;
  busyLabel: string;
  onboarding: boolean;
  input: string;
  setInput: (v: string) => void;
  onSend: () => void;
  onKeyDown: (e: React.KeyboardEvent<HTMLTextAreaElement>) => void;
  pendingImageName: string | null;
  uploaderKey: string;
  onFilePicked: (file: File) => void;
  onClearImage: () => void;
};

export default function ChatWindow({
  title,
  messages,
  choices,
  onChoose,
  busy,
  busyLabel,
  onboarding,
  input,
  setInput,
  onSend,
  onKeyDown,
  pendingImageName,
  uploaderKey,
  onFilePicked,
  onClearImage,
}: ChatWindowProps) {
  const scrollRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    const el = scrollRef.current;
    if (!el) return;
    if (typeof el.scrollTo === "function") {
      el.scrollTo({ top: el.scrollHeight, behavior: "smooth" });
    } else {
      el.scrollTop = el.scrollHeight;
    }
  }, [messages.length]);

  return (
    <main className="relative flex flex-col min-h-0">
      <div className="flex items-center justify-center gap-2 px-5 py-3 border-b border-zinc-200 dark:border-zinc-800">
        <Stethoscope className="w-5 h-5 text-emerald-600" />
        <h1 className="font-semibold tracking-tight">DermaCare AI Consultation</h1>
        <span className="text-sm text-zinc-400">· {title}</span>
      </div>

      <div ref={scrollRef} className="flex-1 min-h-0 overflow-y-auto p-4 lg:p-6 space-y-4">
        {messages.map((m) => (
          <ChatMessage key={m.id} msg={m} />
        ))}
        {busy && (
          <div role="status" className="inline-flex items-center gap-2 text-sm text-zinc-500">
            <Loader2 className="w-4 h-4 animate-spin" /> {busyLabel}
          </div>
        )}
      </div>

      {choices && <ChoiceButtons heading={choices.heading} choices={choices.options} onChoose={onChoose} disabled={busy} />}

      <Composer
        input={input}
        onInputChange={setInput}
        onKeyDown={onKeyDown}
        onSend={onSend}
        placeholder={onboarding ? "Type your answer here..." : "Describe your skin concern or ask a question..."}
        allowImage={!onboarding}
        pendingImageName={pendingImageName}
        uploaderKey={uploaderKey}
        onFilePicked={onFilePicked}
        onClearImage={onClearImage}
        busy={busy}
      />
    </main>
  );
}
