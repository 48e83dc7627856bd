import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { DeepLinkDestination } from '../domain/deepLinks';

/**
 * One applied navigation request. `nonce` is unique per apply, so two taps on
 * the same destination are still two distinct events.
 */
export type NavigationEvent = {
  destination: DeepLinkDestination;
  nonce: string;
  receivedAtMs: number;
};

/**
 * Observed deep-link fields. Screens react to value changes, so list
 * destinations write a fresh token on every apply instead of a constant.
 */
export type NavigationTargets = {
  /** Assignment id, or a fresh token for the assignments list / dashboard schedule. */
  deepLinkAssignmentId: string | null;
  deepLinkGradeId: string | null;
  deepLinkCourseId: string | null;
  deepLinkQuizId: string | null;
  deepLinkToolsToken: string | null;
  deepLinkWellnessToken: string | null;
  deepLinkSharePlayToken: string | null;
  deepLinkRecommendationsToken: string | null;
};

export type NavigationState = NavigationTargets & {
  lastEvent: NavigationEvent | null;
  /**
   * Events not yet taken by `drainEvents`. Oldest entries fall off past
   * `MAX_QUEUED_NAVIGATION_EVENTS`.
   */
  events: NavigationEvent[];

  publish: (targets: Partial<NavigationTargets>, event: NavigationEvent) => void;
  drainEvents: () => NavigationEvent[];
  reset: () => void;
};

export const MAX_QUEUED_NAVIGATION_EVENTS = 20;

const initialTargets: NavigationTargets = {
  deepLinkAssignmentId: null,
  deepLinkGradeId: null,
  deepLinkCourseId: null,
  deepLinkQuizId: null,
  deepLinkToolsToken: null,
  deepLinkWellnessToken: null,
  deepLinkSharePlayToken: null,
  deepLinkRecommendationsToken: null,
};

export function createNavigationStore() {
  return createStore<NavigationState>()(
    subscribeWithSelector((set, get) => ({
      ...initialTargets,
      lastEvent: null,
      events: [],

      publish: (targets, event) =>
        set((state) => ({
          ...targets,
          lastEvent: event,
          events: [...state.events, event].slice(-MAX_QUEUED_NAVIGATION_EVENTS),
        })),

      drainEvents: () => {
        const events = get().events;
        if (events.length === 0) return [];
        set({ events: [] });
        return events;
      },

      reset: () => set({ ...initialTargets, lastEvent: null, events: [] }),
    })),
  );
}

export type NavigationStore = ReturnType<typeof createNavigationStore>;
