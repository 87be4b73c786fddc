import { create } from 'zustand';
import { devtools, persist } from 'zustand/middleware';
import { nanoid } from 'nanoid';

interface VoterState {
  /** Display name shown next to submissions and in the participation list */
  name: string;
  /** Opaque id the backend keys votes by */
  token: string;
  setName: (name: string) => void;
  /** Fresh identity, e.g. when a group finishes and members vote individually */
  startNewSession: (name?: string) => void;
}

export function createVoterToken(): string {
  return nanoid();
}

export const useVoterStore = create<VoterState>()(
  devtools(
    persist(
      (set) => ({
        name: '',
        token: createVoterToken(),
        setName: (name) => set({ name }),
        startNewSession: (name) =>
          set((state) => ({ token: createVoterToken(), name: name ?? state.name })),
      }),
      {
        name: 'class-vote-voter',
        partialize: (state) => ({ name: state.name, token: state.token }),
      }
    ),
    { name: 'VoterStore' }
  )
);
