import React from "react";
import type { Choice } from "../core/onboarding";

type ChoiceButtonsProps = {
  heading: string;
  choices: Choice[];
  onChoose: (value: string) => void;
  disabled?: boolean;
};

export default function ChoiceButtons({ heading, choices, onChoose, disabled = false }: ChoiceButtonsProps) {
  return (
    <div className="mx-auto max-w-3xl px-4 lg:px-6 pb-2">
      <h3 className="text-sm font-semibold mb-2">{heading}</h3>
      <div className="grid grid-cols-3 gap-2">
        {choices.map((c) => (
          <button
            key={c.value}
            type="button"
            onClick={() => onChoose(c.value)}
            disabled={disabled}
            className="rounded-xl border border-zinc-200 dark:border-zinc-800 px-3 py-2 text-sm hover:bg-zinc-100 dark:hover:bg-zinc-800 disabled:opacity-40"
          >
            {c.label}
          </button>
        ))}
      </div>
    </div>
  );
}
