import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_DEEP_LINK_SCHEME, type DeepLinkDestination } from '../domain/deepLinks';
import type { NavigationStore, NavigationTargets } from '../store/navigationStore';
import { createDevLog } from '../utils/devLog';
import { parseDeepLinkUrl, parseSearchActivity, type SearchActivity } from './deepLinkParser';
import { PendingDeepLinkSlot } from './pendingDeepLink';

const devLog = createDevLog('[deepLinks]');

export type DeepLinkRouterOptions = {
  store: NavigationStore;
  scheme?: string;
  /**
   * Token source for list destinations. Must return a new value on every call.
   */
  createToken?: () => string;
  now?: () => number;
  pending?: PendingDeepLinkSlot;
};

/**
 * Maps a destination onto the observed navigation fields.
 */
export function navigationTargetsFor(
  destination: DeepLinkDestination,
  createToken: () => string,
): Partial<NavigationTargets> {
  switch (destination.kind) {
    case 'assignments':
      return { deepLinkAssignmentId: createToken() };
    case 'grades':
      return { deepLinkGradeId: createToken() };
    case 'schedule':
      // The schedule lives on the dashboard, which listens to the assignments field.
      return { deepLinkAssignmentId: createToken() };
    case 'course':
      return { deepLinkCourseId: destination.id };
    case 'assignment':
      return { deepLinkAssignmentId: destination.id };
    case 'quiz':
      return { deepLinkQuizId: destination.id };
    case 'tools':
      return { deepLinkToolsToken: createToken() };
    case 'wellness':
      return { deepLinkWellnessToken: createToken() };
    case 'sharePlay':
      return { deepLinkSharePlayToken: createToken() };
    case 'recommendations':
      return { deepLinkRecommendationsToken: createToken() };
  }
}

/**
 * Routes URLs and search activities into navigation state, holding one URL
 * aside while the user is signed out. Owned by the app controller.
 */
export class DeepLinkRouter {
  private readonly store: NavigationStore;
  private readonly scheme: string;
  private readonly createToken: () => string;
  private readonly now: () => number;
  private readonly pending: PendingDeepLinkSlot;
  private authenticated = false;

  constructor(options: DeepLinkRouterOptions) {
    this.store = options.store;
    this.scheme = options.scheme ?? DEFAULT_DEEP_LINK_SCHEME;
    this.createToken = options.createToken ?? uuidv4;
    this.now = options.now ?? Date.now;
    this.pending = options.pending ?? new PendingDeepLinkSlot();
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  setAuthenticated(authenticated: boolean): void {
    this.authenticated = authenticated;
  }

  get pendingUrl(): string | null {
    return this.pending.peek();
  }

  /**
   * Returns true when the URL was applied or deferred for sign-in, false when
   * it isn't one of ours (so another handler can try it).
   */
  handleUrl(url: string): boolean {
    const destination = parseDeepLinkUrl(url, this.scheme);
    if (!destination) return false;
    if (!this.authenticated) {
      this.pending.store(url);
      devLog('deferred until sign-in', { kind: destination.kind });
      return true;
    }
    this.applyDestination(destination);
    return true;
  }

  /**
   * Search activities can't be stored for replay, so they are dropped while
   * signed out and this returns false.
   */
  handleActivity(activity: SearchActivity): boolean {
    const destination = parseSearchActivity(activity);
    if (!destination) return false;
    if (!this.authenticated) {
      devLog('dropped search activity while signed out', { kind: destination.kind });
      return false;
    }
    this.applyDestination(destination);
    return true;
  }

  /**
   * Replays the deferred URL, if any. Call after a successful sign-in.
   */
  processPending(): boolean {
    const url = this.pending.consume();
    if (!url) return false;
    return this.handleUrl(url);
  }

  applyDestination(destination: DeepLinkDestination) {
    const event = {
      destination,
      nonce: this.createToken(),
      receivedAtMs: this.now(),
    };
    this.store.getState().publish(navigationTargetsFor(destination, this.createToken), event);
    return event;
  }
}
