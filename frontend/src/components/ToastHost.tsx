import React, { useEffect } from "react";
import { AlertTriangle, CheckCircle2, Info, X } from "lucide-react";
import { useToastStore } from "../state/toastStore";
import type { Toast } from "../state/toastStore";

const typeStyles: Record<Toast["type"], string> = {
  info: "bg-zinc-900 text-white",
  success: "bg-emerald-600 text-white",
  error: "bg-red-600 text-white",
};

const typeIcons: Record<Toast["type"], React.ReactNode> = {
  info: <Info className="w-4 h-4 mt-0.5" />,
  success: <CheckCircle2 className="w-4 h-4 mt-0.5" />,
  error: <AlertTriangle className="w-4 h-4 mt-0.5" />,
};

const DISMISS_AFTER_MS = 4000;

export default function ToastHost() {
  const { toasts, remove } = useToastStore();

  useEffect(() => {
    const timers = toasts.map((t) => setTimeout(() => remove(t.id), DISMISS_AFTER_MS));
    return () => timers.forEach(clearTimeout);
  }, [toasts, remove]);

  return (
    <div aria-live="polite" className="fixed bottom-4 right-4 z-50 flex flex-col gap-2 max-w-sm">
      {toasts.map((t) => (
        <div key={t.id} role="alert" className={`flex items-start gap-3 rounded-lg px-4 py-3 shadow-lg ${typeStyles[t.type]}`}>
          {typeIcons[t.type]}
          <div className="flex-1 text-sm">{t.message}</div>
          <button aria-label="Close notification" className="p-1 hover:opacity-80" onClick={() => remove(t.id)}>
            <X className="w-4 h-4" />
          </button>
        </div>
      ))}
    </div>
  );
}
