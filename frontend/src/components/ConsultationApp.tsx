import React, { useEffect, useState } from "react";
import ConsultationList from "./ConsultationList";
import ChatWindow from "./ChatWindow";
import { choicesForStep, isOnboardingComplete } from "../core/onboarding";
import { readFileBytes } from "../core/image";
import { useAuth } from "../hooks/useAuth";
import { SessionProvider, useConsultationStore } from "../state/SessionContext";
import type { SessionDependencies } from "../state/consultationStore";
import { reportError } from "../state/toastStore";
import type { TurnInput, User } from "../types";

type PendingImage = { name: string; bytes: Uint8Array };

const CHOICE_HEADINGS: Record<number, string> = {
  4: "Choose your skin type:",
  5: "Choose the type of skin issue:",
};

function ConsultationView({ user, onLogout }: { user: User; onLogout: () => void }) {
  const consultations = useConsultationStore((s) => s.consultations);
  const activeIndex = useConsultationStore((s) => s.activeIndex);
  const busy = useConsultationStore((s) => s.busy);
  const create = useConsultationStore((s) => s.create);
  const switchTo = useConsultationStore((s) => s.switchTo);
  const rename = useConsultationStore((s) => s.rename);
  const prepareActive = useConsultationStore((s) => s.prepareActive);
  const submitTurn = useConsultationStore((s) => s.submitTurn);

  const [input, setInput] = useState("");
  const [pendingImage, setPendingImage] = useState<PendingImage | null>(null);
  const [uploaderRev, setUploaderRev] = useState(0);
  const [busyLabel, setBusyLabel] = useState("");

  // Auto-heal an empty session and send the greeting once per consultation.
  useEffect(() => {
    prepareActive();
  }, [activeIndex, prepareActive]);

  const active = activeIndex === null ? null : consultations[activeIndex] ?? null;
  const onboarding = active ? !isOnboardingComplete(active) : true;
  const options = active ? choicesForStep(active.onboardingStep) : null;
  const choices = active && options ? { heading: CHOICE_HEADINGS[active.onboardingStep], options } : null;

  async function send(turn: TurnInput) {
    const image = onboarding ? undefined : pendingImage?.bytes;
    setBusyLabel(image ? "Analyzing your skin image..." : "Thinking about your skin concern...");
    setInput("");
    if (!onboarding) {
      setPendingImage(null);
      setUploaderRev((r) => r + 1);
    }
    try {
      await submitTurn(turn, image);
    } catch (err) {
      reportError(err);
    }
  }

  function handleSend() {
    const text = input.trim();
    const imageOnly = !onboarding && pendingImage !== null;
    if ((!text && !imageOnly) || busy) return;
    void send({ text: onboarding ? input : text, source: "freetext" });
  }

  function onKeyDown(e: React.KeyboardEvent<HTMLTextAreaElement>) {
    if (e.key === "Enter" && !e.shiftKey) {
      e.preventDefault();
      handleSend();
    }
  }

  async function onFilePicked(file: File) {
    try {
      const bytes = await readFileBytes(file);
      setPendingImage({ name: file.name, bytes });
    } catch (err) {
      reportError(err);
    }
  }

  function guarded(action: () => void) {
    try {
      action();
    } catch (err) {
      reportError(err);
    }
  }

  return (
    <div className="h-screen w-full overflow-hidden bg-zinc-50 text-zinc-900 dark:bg-zinc-900 dark:text-zinc-50">
      <div className="h-full grid grid-cols-1 lg:grid-cols-[300px_minmax(0,1fr)]">
        <ConsultationList
          user={user}
          consultations={consultations}
          activeIndex={activeIndex}
          onOpen={(i) => guarded(() => switchTo(i))}
          onRename={(i, title) => guarded(() => rename(i, title))}
          onNew={() => guarded(() => create())}
          onLogout={onLogout}
        />
        <ChatWindow
          title={active?.title ?? ""}
          messages={active?.messages ?? []}
          choices={choices}
          onChoose={(value) => void send({ text: value, source: "button" })}
          busy={busy}
          busyLabel={busyLabel}
          onboarding={onboarding}
          input={input}
          setInput={setInput}
          onSend={handleSend}
          onKeyDown={onKeyDown}
          pendingImageName={pendingImage?.name ?? null}
          uploaderKey={`uploader_${uploaderRev}`}
          onFilePicked={(file) => void onFilePicked(file)}
          onClearImage={() => setPendingImage(null)}
        />
      </div>
    </div>
  );
}

type ConsultationAppProps = {
  deps: SessionDependencies;
};

export default function ConsultationApp({ deps }: ConsultationAppProps) {
  const { user, logout } = useAuth();
  if (!user) return null;
  return (
    <SessionProvider key={user.email} deps={deps}>
      <ConsultationView user={user} onLogout={logout} />
    </SessionProvider>
  );
}
