/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LLM_BASE?: string;
  readonly VITE_LLM_MODEL?: string;
  readonly VITE_GROQ_API_KEY?: string;
  readonly VITE_LLM_TIMEOUT_MS?: string;
  readonly VITE_CLASSIFIER_BASE?: string;
  readonly VITE_CLASSIFIER_TIMEOUT_MS?: string;
  readonly VITE_TOP_K?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
