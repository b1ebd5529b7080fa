import React from "react";
import { describeError } from "./lib/errors";
import { logError } from "./lib/log";
import { AUTH_STORAGE_KEY } from "./state/authStore";

type State = { hasError: boolean; info?: string };

export default class ErrorBoundary extends React.Component<React.PropsWithChildren, State> {
  state: State = { hasError: false };

  static getDerivedStateFromError(error: unknown): State {
    return { hasError: true, info: describeError(error) };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    logError("UI ErrorBoundary caught:", { error, componentStack: errorInfo.componentStack });
  }

  render() {
    if (this.state.hasError) {
      return (
        <div style={{ padding: 16, color: "#e11d48", background: "#0b0b0b", minHeight: "100vh" }}>
          <h1 style={{ color: "#fff" }}>Something went wrong.</h1>
          <p style={{ color: "#ddd" }}>{this.state.info}</p>
          <div style={{ marginTop: 12 }}>
            <button
              onClick={() => {
                sessionStorage.removeItem(AUTH_STORAGE_KEY);
                window.location.reload();
              }}
              style={{ padding: "8px 12px", background: "#2563eb", color: "#fff", borderRadius: 8 }}
            >
              Sign out and reload
            </button>
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}
