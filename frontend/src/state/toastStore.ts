import { create } from "zustand";
import { CollaboratorError, describeError } from "../lib/errors";
import { logError } from "../lib/log";

type ToastType = "info" | "success" | "error";

export type Toast = {
  id: string;
  type: ToastType;
  message: string;
};

type ToastState = {
  toasts: Toast[];
  add: (toast: Omit<Toast, "id"> | string) => string;
  remove: (id: string) => void;
  clear: () => void;
};

let counter = 0;

export const useToastStore = create<ToastState>((set) => ({
  toasts: [],
  add: (toast) => {
    counter += 1;
    const id = `t_${Date.now()}_${counter}`;
    const payload: Toast = typeof toast === "string" ? { id, type: "info", message: toast } : { id, ...toast };
    set((s) => ({ toasts: [...s.toasts, payload] }));
    return id;
  },
  remove: (id) => set((s) => ({ toasts: s.toasts.filter((t) => t.id !== id) })),
  clear: () => set({ toasts: [] }),
}));

/** Non-fatal errors surface as a toast; the session carries on. */
export function reportError(error: unknown): string {
  const type: ToastType = error instanceof CollaboratorError ? "error" : "info";
  if (type === "error") logError("[Collaborator failure]", error);
  return useToastStore.getState().add({ type, message: describeError(error) });
}
