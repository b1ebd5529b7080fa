import React from "react";
import { Navigate, useLocation } from "react-router-dom";
import { useAuthStore } from "../state/authStore";

export const LOGIN_PATH = "/login";
const HOME_PATH = "/";

export function loginUrl(returnTo: string): string {
  return `${LOGIN_PATH}?next=${encodeURIComponent(returnTo)}`;
}

/** Only in-app paths are honoured after sign-in; anything else goes home. */
export function resolveNext(raw: string | null): string {
  if (!raw || !raw.startsWith("/") || raw.startsWith("//") || raw.startsWith("/\\")) return HOME_PATH;
  if (raw === LOGIN_PATH || raw.startsWith(`${LOGIN_PATH}?`)) return HOME_PATH;
  return raw;
}

type Props = {
  children: React.ReactNode;
};

export function ProtectedRoute({ children }: Props) {
  const signedIn = useAuthStore((s) => s.user !== null);
  const { pathname, search } = useLocation();
  if (!signedIn) return <Navigate to={loginUrl(pathname + search)} replace />;
  return <>{children}</>;
}
