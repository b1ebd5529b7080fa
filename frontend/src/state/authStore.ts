import { create } from "zustand";
import { z } from "zod";
import type { User } from "../types";

export const AUTH_STORAGE_KEY = "dermacare.auth";

type AuthState = {
  user: User | null;
};

type AuthActions = {
  setUser: (u: User | null) => void;
  logout: () => void;
};

export type AuthStore = AuthState & AuthActions;

const UserSchema = z.object({ email: z.string(), name: z.string() });

// Sign-in lasts for the browser session only.
function loadUser(): User | null {
  try {
    const saved = sessionStorage.getItem(AUTH_STORAGE_KEY);
    if (!saved) return null;
    const parsed = UserSchema.safeParse(JSON.parse(saved));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export const useAuthStore = create<AuthStore>((set) => {
  const persist = (u: User | null) => {
    try {
      if (u) sessionStorage.setItem(AUTH_STORAGE_KEY, JSON.stringify(u));
      else sessionStorage.removeItem(AUTH_STORAGE_KEY);
    } catch {
      // storage unavailable (private mode); the in-memory user still applies
    }
  };

  return {
    user: loadUser(),
    setUser: (u) => set(() => (persist(u), { user: u })),
    logout: () => set(() => (persist(null), { user: null })),
  };
});
