import type { AppConfig } from "../config";
import type { SessionDependencies } from "../state/consultationStore";
import { HttpSkinClassifier } from "./classifier";
import { GroqLlmService } from "./llm";

export function createCollaborators(config: AppConfig): SessionDependencies {
  return {
    classifier: new HttpSkinClassifier(config.classifier),
    llm: new GroqLlmService(config.llm),
    topK: config.topK,
  };
}
