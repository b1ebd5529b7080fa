import { appendMessage } from "./messageLog";
import { ONBOARDING_COMPLETE } from "../types";
import type { Consultation, TurnInput } from "../types";

export type Choice = { label: string; value: string };

export const SKIN_TYPE_CHOICES: Choice[] = [
  { label: "Normal", value: "normal" },
  { label: "Oily", value: "oily" },
  { label: "Dry", value: "dry" },
];

export const PROBLEM_TYPE_CHOICES: Choice[] = [
  { label: "Acne / Pimples", value: "acne" },
  { label: "Rashes / Redness", value: "rash" },
  { label: "Pigmentation", value: "pigmentation" },
  { label: "Infection / Fungal", value: "infection" },
  { label: "Wound / Cut", value: "wound" },
  { label: "Other", value: "other" },
];

const SKIN_TYPES = new Set(SKIN_TYPE_CHOICES.map((c) => c.value));

const PROBLEM_TYPES = new Map<string, string>([
  ["acne", "Acne / Pimples"],
  ["pimples", "Acne / Pimples"],
  ["rash", "Rashes / Redness"],
  ["rashes", "Rashes / Redness"],
  ["pigmentation", "Pigmentation"],
  ["pigment", "Pigmentation"],
  ["infection", "Infection / Fungal"],
  ["fungal", "Infection / Fungal"],
  ["wound", "Wound / Cut"],
  ["other", "Other"],
]);

export const MIN_AGE = 1;
export const MAX_AGE = 110;

export const ONBOARDING_TEXT = {
  greeting: "Welcome! Before we begin, may I know your full name?",
  invalidName: "Please enter a valid full name.",
  askAge: (name: string) => `Nice to meet you, ${name}! 😊\n\nHow old are you?`,
  invalidAge: "Please enter a valid age (e.g., 25).",
  unrealisticAge: `Please enter a realistic age (e.g., between ${MIN_AGE} and ${MAX_AGE}).`,
  askSkinType: "Great! What is your skin type?",
  invalidSkinType: "Please choose your skin type using the buttons: Normal / Oily / Dry.",
  askProblemType: "Got it! What kind of skin issue are you facing?",
  invalidProblemType: "Please choose your problem type using the buttons.",
} as const;

export type OnboardingResult = {
  consultation: Consultation;
  stillOnboarding: boolean;
};

/** Buttons and free text both end up as plain text; the machine never sees the source. */
export function resolveTurnInput(input: TurnInput | null | undefined): string | null {
  return input?.text ?? null;
}

export function isOnboardingComplete(consultation: Consultation): boolean {
  return consultation.onboardingStep === ONBOARDING_COMPLETE;
}

export function needsGreeting(consultation: Consultation): boolean {
  return consultation.onboardingStep === 1 && consultation.messages.length === 0;
}

export function choicesForStep(step: Consultation["onboardingStep"]): Choice[] | null {
  if (step === 4) return SKIN_TYPE_CHOICES;
  if (step === 5) return PROBLEM_TYPE_CHOICES;
  return null;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function summary(c: Consultation): string {
  return (
    "Thank you! 😊 You're all set.\n\n" +
    "Summary:\n" +
    `- Name: ${c.patientName}\n` +
    `- Age: ${c.patientAge}\n` +
    `- Skin Type: ${c.skinType}\n` +
    `- Problem Type: ${c.problemType}\n\n` +
    "Now you can describe your issue in more detail or upload a clear picture " +
    "of the affected area so I can guide you better."
  );
}

/**
 * Advances the intake dialogue by one step. Every call appends exactly one
 * assistant message; invalid input re-prompts without changing the step.
 */
export function handleOnboarding(
  consultation: Consultation,
  userInput: string | null,
  now: Date = new Date()
): OnboardingResult {
  const reply = (c: Consultation, text: string, stillOnboarding = true): OnboardingResult => ({
    consultation: appendMessage(c, "assistant", text, { now }).consultation,
    stillOnboarding,
  });

  switch (consultation.onboardingStep) {
    case 1:
      return reply({ ...consultation, onboardingStep: 2 }, ONBOARDING_TEXT.greeting);

    case 2: {
      const name = userInput?.trim() ?? "";
      if (name.length < 2) return reply(consultation, ONBOARDING_TEXT.invalidName);
      return reply({ ...consultation, patientName: name, onboardingStep: 3 }, ONBOARDING_TEXT.askAge(name));
    }

    case 3: {
      if (!userInput || !/^[0-9]+$/.test(userInput)) return reply(consultation, ONBOARDING_TEXT.invalidAge);
      const age = Number.parseInt(userInput, 10);
      if (age < MIN_AGE || age > MAX_AGE) return reply(consultation, ONBOARDING_TEXT.unrealisticAge);
      return reply({ ...consultation, patientAge: String(age), onboardingStep: 4 }, ONBOARDING_TEXT.askSkinType);
    }

    case 4: {
      const value = userInput?.toLowerCase() ?? "";
      if (!SKIN_TYPES.has(value)) return reply(consultation, ONBOARDING_TEXT.invalidSkinType);
      return reply(
        { ...consultation, skinType: capitalize(value), onboardingStep: 5 },
        ONBOARDING_TEXT.askProblemType
      );
    }

    case 5: {
      const problemType = PROBLEM_TYPES.get(userInput?.toLowerCase() ?? "");
      if (!problemType) return reply(consultation, ONBOARDING_TEXT.invalidProblemType);
      const done: Consultation = { ...consultation, problemType, onboardingStep: ONBOARDING_COMPLETE };
      return reply(done, summary(done), false);
    }

    default:
      return { consultation, stillOnboarding: false };
  }
}
