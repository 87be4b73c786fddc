import { useEffect, useRef } from 'react';
import { useToastStore, type ToastKind } from '../../stores/toast';
import { announceToScreenReader } from '../../lib/accessibility';

const kindClasses: Record<ToastKind, string> = {
  success: 'border-l-green-500',
  error: 'border-l-red-500',
  info: 'border-l-accent-500',
};

const kindTitles: Record<ToastKind, string> = {
  success: 'Saved',
  error: 'Problem',
  info: 'Note',
};

export function Toaster() {
  const toasts = useToastStore((s) => s.toasts);
  const dismiss = useToastStore((s) => s.dismiss);
  const latest = toasts.at(-1);
  const announcedId = useRef(0);

  // Dismissing the newest toast exposes an older one; only new ids are read out
  useEffect(() => {
    if (latest && latest.id > announcedId.current) {
      announcedId.current = latest.id;
      announceToScreenReader(latest.message, latest.kind === 'error' ? 'assertive' : 'polite');
    }
  }, [latest]);

  if (toasts.length === 0) return null;

  return (
    <ul aria-label="Notifications" className="fixed bottom-4 right-4 z-50 w-80 space-y-2">
      {toasts.map((t) => (
        <li
          key={t.id}
          className={`card border-l-4 px-4 py-3 flex items-start justify-between gap-3 ${kindClasses[t.kind]}`}
        >
          <p className="text-sm text-surface-800">
            <span className="font-semibold">{kindTitles[t.kind]}:</span> {t.message}
          </p>
          <button
            type="button"
            onClick={() => dismiss(t.id)}
            aria-label="Dismiss notification"
            className="text-surface-400 hover:text-surface-700"
          >
            ×
          </button>
        </li>
      ))}
    </ul>
  );
}
