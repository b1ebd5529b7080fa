import React from "react";
import { LogOut, MessageSquare, Plus } from "lucide-react";
import type { Consultation, User } from "../types";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const pad = (n: number) => String(n).padStart(2, "0");

export function formatStarted(d: Date): string {
  return `${MONTHS[d.getMonth()]} ${pad(d.getDate())}, ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

type ConsultationListProps = {
  user: User;
  consultations: Consultation[];
  activeIndex: number | null;
  onOpen: (index: number) => void;
  onRename: (index: number, title: string) => void;
  onNew: () => void;
  onLogout: () => void;
};

export default function ConsultationList({
  user,
  consultations,
  activeIndex,
  onOpen,
  onRename,
  onNew,
  onLogout,
}: ConsultationListProps) {
  return (
    <aside className="min-h-0 h-full border-r border-zinc-200 dark:border-zinc-800 bg-white dark:bg-zinc-950">
      <div className="h-full flex flex-col min-h-0">
        <div className="shrink-0 px-3 py-2 border-b border-zinc-200 dark:border-zinc-800 flex items-center gap-2">
          <div className="flex-1 text-sm font-semibold truncate">👤 Welcome, {user.name}</div>
          <button
            onClick={onLogout}
            className="inline-flex items-center gap-1 rounded-xl px-2 py-1 text-sm hover:bg-zinc-100 dark:hover:bg-zinc-800"
            aria-label="Logout"
          >
            <LogOut className="w-4 h-4" /> Logout
          </button>
        </div>

        <div className="px-3 pt-3 text-xs uppercase tracking-wide text-zinc-500">💬 Consultations</div>
        <div className="flex-1 min-h-0 overflow-y-auto overscroll-contain p-2 space-y-2">
          {consultations.length ? (
            consultations.map((c, i) => (
              <div
                key={c.id}
                className={`rounded-xl px-3 py-2 border border-zinc-200 dark:border-zinc-800 ${
                  activeIndex === i ? "bg-zinc-100 dark:bg-zinc-800" : ""
                }`}
              >
                <div className="flex items-center gap-2">
                  <MessageSquare className="w-4 h-4 shrink-0" />
                  <span className="flex-1 truncate font-medium">{c.title}</span>
                </div>
                <div className="text-xs text-zinc-400 mt-0.5">
                  Started: {formatStarted(c.createdAt)} • Messages: {c.messages.length}
                </div>
                <div className="mt-2 flex items-center gap-2">
                  <button
                    onClick={() => onOpen(i)}
                    className="rounded-lg px-2 py-1 text-xs border border-zinc-300 dark:border-zinc-700 hover:bg-zinc-100 dark:hover:bg-zinc-800"
                  >
                    Open #{c.id}
                  </button>
                  <input
                    value={c.title}
                    onChange={(e) => onRename(i, e.target.value)}
                    aria-label={`Rename consultation ${c.id}`}
                    className="flex-1 min-w-0 rounded-md border border-zinc-200 dark:border-zinc-800 bg-transparent px-2 py-1 text-xs"
                  />
                </div>
              </div>
            ))
          ) : (
            <div className="rounded-xl border border-dashed border-zinc-300 dark:border-zinc-700 p-4 text-xs text-zinc-500 text-center">
              No consultations yet.
            </div>
          )}
        </div>

        <div className="shrink-0 border-t border-zinc-200 dark:border-zinc-800 p-3">
          <button
            onClick={onNew}
            className="w-full inline-flex items-center justify-center gap-2 rounded-xl px-3 py-2 text-sm font-medium bg-zinc-900 text-white dark:bg-zinc-100 dark:text-zinc-900 hover:opacity-90"
          >
            <Plus className="w-4 h-4" /> Start New Consultation
          </button>
        </div>
      </div>
    </aside>
  );
}
