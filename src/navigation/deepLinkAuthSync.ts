import type { AuthSessionState, AuthStateSource } from '../services/backend/auth';
import type { DeepLinkRouter } from './deepLinkRouter';

/**
 * Keep the router's auth gate in step with the backend session. A transition
 * to signed-in replays whatever link was deferred while signed out.
 *
 * Resolves once the current session has been read; the returned function stops
 * listening.
 */
export async function startDeepLinkAuthSync(router: DeepLinkRouter, auth: AuthStateSource): Promise<() => void> {
  let disposed = false;
  let changedSinceRead = false;

  const apply = (state: AuthSessionState) => {
    if (disposed) return;
    const wasSignedIn = router.isAuthenticated();
    router.setAuthenticated(state.signedIn);
    if (state.signedIn && !wasSignedIn) {
      router.processPending();
    }
  };

  const unsubscribe = auth.onChange((state) => {
    changedSinceRead = true;
    apply(state);
  });
  try {
    const current = await auth.getCurrentState();
    // A change event that landed while reading is newer than this snapshot.
    if (!changedSinceRead) apply(current);
  } catch (e) {
    // Stay signed out; the change listener still picks up a later sign-in.
    console.warn('Failed to read auth session for deep links', e);
  }

  return () => {
    disposed = true;
    unsubscribe();
  };
}
