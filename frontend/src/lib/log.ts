const PREVIEW_LIMIT = 800;

const verbose = () => process.env.NODE_ENV !== "production";

export function preview(text: string, limit = PREVIEW_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)} ... (truncated)` : text;
}

export function logDebug(label: string, data?: unknown) {
  if (!verbose()) return;
  // eslint-disable-next-line no-console
  console.debug(label, data ?? "");
}

export function logWarn(label: string, data?: unknown) {
  if (!verbose()) return;
  // eslint-disable-next-line no-console
  console.warn(label, data ?? "");
}

export function logError(label: string, error: unknown) {
  // eslint-disable-next-line no-console
  console.error(label, error);
}
