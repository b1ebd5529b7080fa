export type User = {
  email: string;
  name: string;
};

export type Role = "user" | "assistant";

export type MessageType =
  | "user_followup"
  | "user_question"
  | "user_description"
  | "user_message"
  | "ai_remedy"
  | "ai_observation"
  | "ai_response";

export type Message = {
  id: string;
  role: Role;
  content: string;
  type: MessageType;
  timestamp: string;
  imageBytes?: Uint8Array;
};

export type OnboardingStep = 1 | 2 | 3 | 4 | 5 | 999;

export const ONBOARDING_COMPLETE = 999;

export type Consultation = {
  id: number;
  title: string;
  createdAt: Date;
  updatedAt: Date;
  patientName: string | null;
  patientAge: string | null;
  skinType: string | null;
  problemType: string | null;
  onboardingStep: OnboardingStep;
  messages: Message[];
};

export type TurnSource = "button" | "freetext";

export type TurnInput = {
  text: string | null;
  source: TurnSource;
};

// Wire shapes below are what the LLM collaborator reads, hence snake_case.
export type Prediction = {
  rank: number;
  confidence: number;
  raw_text: string;
  disease: string;
  severity: string;
  characteristics: string[];
  recommendation: string;
};

export type HistoryEntry = {
  role: Role;
  content: string;
  type: MessageType;
  timestamp: string;
  has_image: boolean;
};

export type PatientSummary = {
  name: string | null;
  age: string | null;
  skin_type: string | null;
  problem_type: string | null;
};

export type PredictionPayload = {
  predictions: Prediction[];
  priority: string;
  user_description: string;
  current_question: string;
  chat_history: HistoryEntry[];
  context_summary: string;
  patient: PatientSummary;
};
