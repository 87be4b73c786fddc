import { create } from 'zustand';

export type ToastKind = 'success' | 'error' | 'info';

export interface Toast {
  id: number;
  kind: ToastKind;
  message: string;
}

// A class-wide action (reset, a burst of votes) should not bury the screen
export const MAX_VISIBLE_TOASTS = 3;

const DISMISS_AFTER_MS: Record<ToastKind, number> = {
  success: 3000,
  info: 3000,
  error: 6000,
};

interface ToastState {
  toasts: Toast[];
  push: (kind: ToastKind, message: string) => void;
  dismiss: (id: number) => void;
}

let nextToastId = 0;

export const useToastStore = create<ToastState>((set, get) => ({
  toasts: [],

  push: (kind, message) => {
    // Repeated failures (e.g. the results poll while offline) show once
    if (get().toasts.some((t) => t.kind === kind && t.message === message)) return;

    const id = ++nextToastId;
    set((state) => ({
      toasts: [...state.toasts, { id, kind, message }].slice(-MAX_VISIBLE_TOASTS),
    }));
    setTimeout(() => get().dismiss(id), DISMISS_AFTER_MS[kind]);
  },

  dismiss: (id) => set((state) => ({ toasts: state.toasts.filter((t) => t.id !== id) })),
}));

export const toast = {
  success: (message: string) => useToastStore.getState().push('success', message),
  error: (message: string) => useToastStore.getState().push('error', message),
  info: (message: string) => useToastStore.getState().push('info', message),
};
