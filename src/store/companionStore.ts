import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { CompanionCollections } from '../domain/companion';

export type CompanionState = CompanionCollections & {
  /** Epoch ms of the last payload that decoded at least one collection. */
  lastSyncAtMs: number | null;
  /** Human-readable advisory from the transport (activation problems). */
  syncError: string | null;

  /**
   * Replace the given collections wholesale and mark the sync as fresh.
   */
  applySync: (collections: Partial<CompanionCollections>, syncedAtMs: number) => void;
  hydrate: (persisted: Partial<CompanionCollections> & { lastSyncAtMs?: number | null }) => void;
  setSyncError: (message: string | null) => void;
  reset: () => void;
};

export function createCompanionStore() {
  return createStore<CompanionState>()(
    subscribeWithSelector((set) => ({
      assignments: [],
      schedule: [],
      grades: [],
      lastSyncAtMs: null,
      syncError: null,

      applySync: (collections, syncedAtMs) =>
        set({
          ...collections,
          lastSyncAtMs: syncedAtMs,
          syncError: null,
        }),

      hydrate: ({ assignments, schedule, grades, lastSyncAtMs }) =>
        set((state) => ({
          assignments: assignments ?? state.assignments,
          schedule: schedule ?? state.schedule,
          grades: grades ?? state.grades,
          lastSyncAtMs: lastSyncAtMs ?? state.lastSyncAtMs,
        })),

      setSyncError: (message) => set({ syncError: message }),

      reset: () => set({ assignments: [], schedule: [], grades: [], lastSyncAtMs: null, syncError: null }),
    })),
  );
}

export type CompanionStore = ReturnType<typeof createCompanionStore>;
