export type CollaboratorName = "llm" | "classifier";

export class CollaboratorError extends Error {
  readonly collaborator: CollaboratorName;
  readonly status?: number;

  constructor(collaborator: CollaboratorName, message: string, status?: number) {
    super(message);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.status = status;
  }
}

export class ImageDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageDecodeError";
  }
}

export class StoreBoundsError extends Error {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`Consultation ${index + 1} does not exist (there are ${size}).`);
    this.name = "StoreBoundsError";
    this.index = index;
    this.size = size;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === "string") return error;
  return "Unknown error";
}
