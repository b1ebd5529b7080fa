import React, { useState } from "react";
import { LogIn, Stethoscope, UserPlus } from "lucide-react";
import { useAuth } from "../hooks/useAuth";
import { DEMO_USER } from "../services/userDirectory";
import type { User } from "../types";

type AuthScreenProps = {
  onAuth: (user: User) => void;
};

export default function AuthScreen({ onAuth }: AuthScreenProps) {
  const { login, createDemoUser } = useAuth();
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [error, setError] = useState("");
  const [notice, setNotice] = useState("");

  function submit() {
    setError("");
    const user = login(email, password);
    if (!user) {
      setError("Invalid email or password.");
      return;
    }
    onAuth(user);
  }

  function addDemoUser() {
    try {
      const demo = createDemoUser();
      setNotice(`Demo user created: ${demo.email} / ${DEMO_USER.password}`);
    } catch {
      setError("Could not create the demo user in this browser.");
    }
  }

  return (
    <div className="h-screen flex flex-col items-center justify-center bg-zinc-100 dark:bg-zinc-900">
      <div className="w-full max-w-sm rounded-xl bg-white dark:bg-zinc-950 p-6 shadow space-y-3">
        <h2 className="text-lg font-semibold mb-4 flex items-center gap-2">
          <Stethoscope className="w-5 h-5 text-emerald-600" /> DermaCare Login
        </h2>
        <input
          value={email}
          onChange={(e) => setEmail(e.target.value)}
          placeholder="Email"
          className="mb-2 w-full rounded-md border px-3 py-2"
        />
        <input
          type="password"
          value={password}
          onChange={(e) => setPassword(e.target.value)}
          onKeyDown={(e) => {
            if (e.key === "Enter") submit();
          }}
          placeholder="Password"
          className="mb-4 w-full rounded-md border px-3 py-2"
        />
        {error && <div className="text-red-500 text-sm mb-2 bg-red-100 dark:bg-red-900/20 p-2 rounded-md">{error}</div>}
        {notice && (
          <div className="text-emerald-700 text-sm mb-2 bg-emerald-50 dark:bg-emerald-900/20 p-2 rounded-md">{notice}</div>
        )}
        <button
          onClick={submit}
          className="w-full rounded-md bg-emerald-600 text-white py-2 flex items-center justify-center gap-2"
        >
          <LogIn className="w-4 h-4" /> Login
        </button>
        <div className="flex items-center gap-2 text-xs text-zinc-400">
          <span className="flex-1 border-t border-zinc-200 dark:border-zinc-800" />
          <span>or</span>
          <span className="flex-1 border-t border-zinc-200 dark:border-zinc-800" />
        </div>
        <button
          type="button"
          onClick={addDemoUser}
          className="w-full inline-flex items-center justify-center gap-2 rounded-md border border-zinc-200 dark:border-zinc-800 py-2 hover:bg-zinc-50 dark:hover:bg-zinc-900"
        >
          <UserPlus className="w-4 h-4" /> Create demo user
        </button>
      </div>
    </div>
  );
}
