import axios from "axios";
import { CollaboratorError, describeError } from "../lib/errors";
import type { CollaboratorName } from "../lib/errors";

const LABELS: Record<CollaboratorName, string> = {
  llm: "The language model service",
  classifier: "The image classifier",
};

export function toCollaboratorError(collaborator: CollaboratorName, error: unknown): CollaboratorError {
  if (error instanceof CollaboratorError) return error;
  const label = LABELS[collaborator];
  if (!axios.isAxiosError(error)) return new CollaboratorError(collaborator, describeError(error));

  const status = error.response?.status;
  const msg =
    status === 401 || status === 403
      ? `${label} rejected the credentials.`
      : status === 429
      ? `${label} is rate limiting requests. Please wait a moment and try again.`
      : status !== undefined && status >= 500
      ? `${label} had a server error (${status}).`
      : error.code === "ECONNABORTED" || error.code === "ETIMEDOUT"
      ? `${label} timed out.`
      : error.message || "Network error.";
  return new CollaboratorError(collaborator, msg, status);
}
