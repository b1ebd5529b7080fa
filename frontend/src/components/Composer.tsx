import React from "react";
import { ImagePlus, Loader2, Send, X } from "lucide-react";

type ComposerProps = {
  input: string;
  onInputChange: (value: string) => void;
  onKeyDown: (e: React.KeyboardEvent<HTMLTextAreaElement>) => void;
  onSend: () => void;
  placeholder: string;
  allowImage: boolean;
  pendingImageName: string | null;
  uploaderKey: string;
  onFilePicked: (file: File) => void;
  onClearImage: () => void;
  busy: boolean;
};

export default function Composer({
  input,
  onInputChange,
  onKeyDown,
  onSend,
  placeholder,
  allowImage,
  pendingImageName,
  uploaderKey,
  onFilePicked,
  onClearImage,
  busy,
}: ComposerProps) {
  return (
    <div className="px-4 lg:px-6 py-3 bg-gradient-to-t from-zinc-50 via-zinc-50/90 to-transparent dark:from-zinc-900 dark:via-zinc-900/90">
      <div className="mx-auto max-w-3xl">
        {allowImage && pendingImageName && (
          <div className="mb-2 inline-flex items-center gap-2 rounded-lg bg-zinc-100 dark:bg-zinc-800 px-2 py-1 text-xs">
            <span>Attached: {pendingImageName}</span>
            <button type="button" onClick={onClearImage} aria-label="Remove attached image" className="p-0.5 hover:opacity-70">
              <X className="w-3 h-3" />
            </button>
          </div>
        )}
        <div className="rounded-2xl border border-zinc-200 dark:border-zinc-800 bg-white dark:bg-zinc-950 shadow-sm p-2">
          <div className="flex items-end gap-2">
            {allowImage && (
              <label
                className="shrink-0 inline-flex items-center justify-center rounded-xl p-2 hover:bg-zinc-100 dark:hover:bg-zinc-800 cursor-pointer focus-within:outline-none focus-within:ring-2 focus-within:ring-offset-2 focus-within:ring-zinc-400"
                title="Attach an image (optional)"
                aria-label="Attach an image"
              >
                <input
                  key={uploaderKey}
                  type="file"
                  accept="image/png,image/jpeg"
                  className="hidden"
                  onChange={(e) => {
                    const file = e.target.files?.[0];
                    if (file) onFilePicked(file);
                  }}
                  disabled={busy}
                />
                <ImagePlus className="w-5 h-5" />
              </label>
            )}

            <textarea
              value={input}
              onChange={(e) => onInputChange(e.target.value)}
              onKeyDown={onKeyDown}
              rows={1}
              placeholder={placeholder}
              className="flex-1 max-h-40 h-12 resize-none bg-transparent px-2 py-2 outline-none placeholder:text-zinc-400 text-sm"
            />

            <button
              onClick={onSend}
              className="shrink-0 inline-flex items-center gap-2 rounded-xl px-3 py-2 text-sm font-medium bg-zinc-900 text-white dark:bg-zinc-100 dark:text-zinc-900 hover:opacity-90 disabled:opacity-40 focus:outline-none focus:ring-2 focus:ring-offset-2 focus:ring-zinc-400"
              disabled={busy || (!input.trim() && !(allowImage && pendingImageName))}
              aria-label="Send"
            >
              {busy ? (
                <>
                  <Loader2 className="w-4 h-4 animate-spin" /> Working...
                </>
              ) : (
                <>
                  <Send className="w-4 h-4" /> Send
                </>
              )}
            </button>
          </div>
        </div>
      </div>
    </div>
  );
}
