import { describe, expect, test } from "vitest";
import {
  ONBOARDING_TEXT,
  PROBLEM_TYPE_CHOICES,
  SKIN_TYPE_CHOICES,
  choicesForStep,
  handleOnboarding,
  isOnboardingComplete,
  needsGreeting,
  resolveTurnInput,
} from "../core/onboarding";
import { newConsultation } from "../state/consultationStore";
import type { Consultation } from "../types";

const now = new Date(2024, 4, 1, 10, 0);
const fresh = () => newConsultation(1, now);

function atStep(step: Consultation["onboardingStep"], patch: Partial<Consultation> = {}): Consultation {
  return { ...fresh(), onboardingStep: step, ...patch };
}

const lastText = (c: Consultation) => c.messages[c.messages.length - 1]?.content;

describe("onboarding", () => {
  test("greets and asks for the name", () => {
    const c = fresh();
    expect(needsGreeting(c)).toBe(true);
    const { consultation, stillOnboarding } = handleOnboarding(c, null, now);
    expect(stillOnboarding).toBe(true);
    expect(consultation.onboardingStep).toBe(2);
    expect(consultation.messages).toHaveLength(1);
    expect(consultation.messages[0].role).toBe("assistant");
    expect(lastText(consultation)).toBe(ONBOARDING_TEXT.greeting);
    expect(needsGreeting(consultation)).toBe(false);
  });

  test("rejects a one-letter name then accepts a trimmed one", () => {
    const rejected = handleOnboarding(atStep(2), "J", now).consultation;
    expect(rejected.onboardingStep).toBe(2);
    expect(rejected.patientName).toBeNull();
    expect(lastText(rejected)).toBe(ONBOARDING_TEXT.invalidName);

    const accepted = handleOnboarding(rejected, "  Jordan  ", now).consultation;
    expect(accepted.onboardingStep).toBe(3);
    expect(accepted.patientName).toBe("Jordan");
    expect(lastText(accepted)).toBe("Nice to meet you, Jordan! 😊\n\nHow old are you?");
  });

  test("repeating an invalid name re-prompts identically", () => {
    const once = handleOnboarding(atStep(2), "J", now).consultation;
    const twice = handleOnboarding(once, "J", now).consultation;
    expect(twice.onboardingStep).toBe(2);
    expect(twice.messages.map((m) => m.content)).toEqual([ONBOARDING_TEXT.invalidName, ONBOARDING_TEXT.invalidName]);
  });

  test.each([
    ["200", ONBOARDING_TEXT.unrealisticAge],
    ["0", ONBOARDING_TEXT.unrealisticAge],
    ["abc", ONBOARDING_TEXT.invalidAge],
    ["", ONBOARDING_TEXT.invalidAge],
    [" 34", ONBOARDING_TEXT.invalidAge],
    ["-5", ONBOARDING_TEXT.invalidAge],
    ["3.5", ONBOARDING_TEXT.invalidAge],
  ])("age %j is rejected", (input, message) => {
    const c = handleOnboarding(atStep(3, { patientName: "Jordan" }), input, now).consultation;
    expect(c.onboardingStep).toBe(3);
    expect(c.patientAge).toBeNull();
    expect(lastText(c)).toBe(message);
  });

  test.each([
    ["34", "34"],
    ["034", "34"],
    ["1", "1"],
    ["110", "110"],
  ])("age %j is stored as %j", (input, stored) => {
    const c = handleOnboarding(atStep(3, { patientName: "Jordan" }), input, now).consultation;
    expect(c.onboardingStep).toBe(4);
    expect(c.patientAge).toBe(stored);
    expect(lastText(c)).toBe(ONBOARDING_TEXT.askSkinType);
  });

  test("skin type is case-insensitive and stored capitalized", () => {
    const c = handleOnboarding(atStep(4), "OILY", now).consultation;
    expect(c.onboardingStep).toBe(5);
    expect(c.skinType).toBe("Oily");
    expect(lastText(c)).toBe(ONBOARDING_TEXT.askProblemType);
  });

  test("unknown skin type re-prompts", () => {
    const c = handleOnboarding(atStep(4), "greasy", now).consultation;
    expect(c.onboardingStep).toBe(4);
    expect(c.skinType).toBeNull();
    expect(lastText(c)).toBe(ONBOARDING_TEXT.invalidSkinType);
  });

  test.each([
    ["acne", "Acne / Pimples"],
    ["Pimples", "Acne / Pimples"],
    ["rashes", "Rashes / Redness"],
    ["pigment", "Pigmentation"],
    ["fungal", "Infection / Fungal"],
    ["WOUND", "Wound / Cut"],
    ["other", "Other"],
  ])("problem type %j maps to %j", (input, label) => {
    expect(handleOnboarding(atStep(5), input, now).consultation.problemType).toBe(label);
  });

  test("unknown problem type re-prompts", () => {
    for (const input of ["itchy", "constructor", ""]) {
      const c = handleOnboarding(atStep(5), input, now).consultation;
      expect(c.onboardingStep).toBe(5);
      expect(lastText(c)).toBe(ONBOARDING_TEXT.invalidProblemType);
    }
  });

  test("completes with a summary of every field", () => {
    const before = atStep(5, { patientName: "Jordan", patientAge: "34", skinType: "Oily" });
    const { consultation, stillOnboarding } = handleOnboarding(before, "fungal", now);
    expect(stillOnboarding).toBe(false);
    expect(isOnboardingComplete(consultation)).toBe(true);
    expect(consultation.problemType).toBe("Infection / Fungal");
    expect(lastText(consultation)).toContain(
      "Summary:\n- Name: Jordan\n- Age: 34\n- Skin Type: Oily\n- Problem Type: Infection / Fungal\n\n"
    );
  });

  test("does nothing once complete", () => {
    const done = atStep(999);
    const result = handleOnboarding(done, "anything", now);
    expect(result.stillOnboarding).toBe(false);
    expect(result.consultation).toBe(done);
  });

  test("walks the steps in order with one reply per call", () => {
    let c = fresh();
    const steps: number[] = [c.onboardingStep];
    for (const input of [null, "Jordan", "34", "dry", "acne"]) {
      const before = c.messages.length;
      c = handleOnboarding(c, input, now).consultation;
      expect(c.messages.length).toBe(before + 1);
      steps.push(c.onboardingStep);
    }
    expect(steps).toEqual([1, 2, 3, 4, 5, 999]);
  });

  test("buttons and free text resolve to the same input", () => {
    expect(resolveTurnInput({ text: "oily", source: "button" })).toBe("oily");
    expect(resolveTurnInput({ text: "oily", source: "freetext" })).toBe("oily");
    expect(resolveTurnInput(null)).toBeNull();
  });

  test("offers choices only for skin and problem type", () => {
    expect(choicesForStep(4)).toBe(SKIN_TYPE_CHOICES);
    expect(choicesForStep(5)).toBe(PROBLEM_TYPE_CHOICES);
    expect(choicesForStep(2)).toBeNull();
    expect(choicesForStep(999)).toBeNull();
  });
});
