import { useCallback } from "react";
import { useAuthStore } from "../state/authStore";
import { createDemoUser, verifyCredentials } from "../services/userDirectory";
import type { User } from "../types";

/**
 * Sign-in backed by the local user directory. Ending the sign-in also ends the
 * consultation session, since the session provider is keyed by the user.
 */
export function useAuth() {
  const { user, setUser, logout } = useAuthStore();

  const login = useCallback(
    (email: string, password: string): User | null => {
      const found = verifyCredentials(email.trim(), password);
      if (found) setUser(found);
      return found;
    },
    [setUser]
  );

  return {
    user,
    login,
    logout,
    createDemoUser,
  };
}
