import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";
import { appendMessage } from "../core/messageLog";
import {
  handleOnboarding,
  isOnboardingComplete,
  needsGreeting,
  resolveTurnInput,
} from "../core/onboarding";
import { generateReply, recordUserTurn } from "../core/turn";
import type { TurnDependencies } from "../core/turn";
import { StoreBoundsError } from "../lib/errors";
import type { Consultation, Message, TurnInput } from "../types";

/** Persistence boundary; called after every mutation before control returns. */
export interface ConsultationRepository {
  save(consultation: Consultation): void;
}

export class InMemoryConsultationRepository implements ConsultationRepository {
  private readonly byId = new Map<number, Consultation>();

  save(consultation: Consultation) {
    this.byId.set(consultation.id, consultation);
  }

  get(id: number): Consultation | null {
    return this.byId.get(id) ?? null;
  }
}

export type SessionDependencies = TurnDependencies & {
  repository?: ConsultationRepository;
  clock?: () => Date;
};

type ConsultationState = {
  consultations: Consultation[];
  activeIndex: number | null;
  nextId: number;
  busy: boolean;
};

type ConsultationActions = {
  create: () => Consultation;
  switchTo: (index: number) => void;
  rename: (index: number, title: string) => void;
  active: () => Consultation | null;
  prepareActive: () => Consultation;
  submitOnboarding: (input: TurnInput) => boolean;
  sendMessage: (text: string, imageBytes?: Uint8Array) => Promise<Message>;
  submitTurn: (input: TurnInput, imageBytes?: Uint8Array) => Promise<void>;
};

export type ConsultationStore = ConsultationState & ConsultationActions;
export type ConsultationStoreApi = StoreApi<ConsultationStore>;

export function newConsultation(id: number, now: Date): Consultation {
  return {
    id,
    title: `Consultation ${id}`,
    createdAt: now,
    updatedAt: now,
    patientName: null,
    patientAge: null,
    skinType: null,
    problemType: null,
    onboardingStep: 1,
    messages: [],
  };
}

/**
 * One store per signed-in session: created at sign-in and dropped at sign-out,
 * so nothing about consultations lives in module scope.
 */
export function createConsultationStore(deps: SessionDependencies): ConsultationStoreApi {
  const repository = deps.repository ?? new InMemoryConsultationRepository();
  const clock = deps.clock ?? (() => new Date());

  return createStore<ConsultationStore>()((set, get) => {
    const commit = (c: Consultation) => {
      set((s) => ({ consultations: s.consultations.map((x) => (x.id === c.id ? c : x)) }));
      repository.save(c);
    };

    const checkBounds = (index: number) => {
      const size = get().consultations.length;
      if (!Number.isInteger(index) || index < 0 || index >= size) throw new StoreBoundsError(index, size);
    };

    const create = (): Consultation => {
      const c = newConsultation(get().nextId, clock());
      set((s) => ({
        consultations: [...s.consultations, c],
        activeIndex: s.consultations.length,
        nextId: s.nextId + 1,
      }));
      repository.save(c);
      return c;
    };

    const active = (): Consultation | null => {
      const { consultations, activeIndex } = get();
      if (activeIndex === null) return null;
      return consultations[activeIndex] ?? null;
    };

    const prepareActive = (): Consultation => {
      let c = active();
      if (!c) {
        if (get().consultations.length === 0) {
          c = create();
        } else {
          set({ activeIndex: 0 });
          c = get().consultations[0];
        }
      }
      if (needsGreeting(c)) {
        c = handleOnboarding(c, null, clock()).consultation;
        commit(c);
      }
      return c;
    };

    const submitOnboarding = (input: TurnInput): boolean => {
      const c = prepareActive();
      if (isOnboardingComplete(c)) return false;
      const text = resolveTurnInput(input);
      const answered = text === null ? c : appendMessage(c, "user", text, { now: clock() }).consultation;
      const result = handleOnboarding(answered, text, clock());
      commit(result.consultation);
      return result.stillOnboarding;
    };

    const sendMessage = async (text: string, imageBytes?: Uint8Array): Promise<Message> => {
      const c = prepareActive();
      if (!isOnboardingComplete(c)) {
        throw new Error("Finish the intake questions before chatting.");
      }
      const recorded = recordUserTurn(c, text, imageBytes, clock());
      commit(recorded.consultation);
      set({ busy: true });
      try {
        const reply = await generateReply(recorded.consultation, text, imageBytes, deps);
        // The user may have switched consultation meanwhile; answer the one that asked.
        const latest = get().consultations.find((x) => x.id === c.id) ?? recorded.consultation;
        const answered = appendMessage(latest, "assistant", reply.text, { now: clock() });
        commit(answered.consultation);
        return answered.message;
      } finally {
        set({ busy: false });
      }
    };

    return {
      consultations: [],
      activeIndex: null,
      nextId: 1,
      busy: false,
      create,
      switchTo: (index) => {
        checkBounds(index);
        set({ activeIndex: index });
      },
      rename: (index, title) => {
        checkBounds(index);
        commit({ ...get().consultations[index], title });
      },
      active,
      prepareActive,
      submitOnboarding,
      sendMessage,
      submitTurn: async (input, imageBytes) => {
        const c = prepareActive();
        if (!isOnboardingComplete(c)) {
          submitOnboarding(input);
          return;
        }
        const text = resolveTurnInput(input);
        if (text === null) return;
        await sendMessage(text, imageBytes);
      },
    };
  });
}
