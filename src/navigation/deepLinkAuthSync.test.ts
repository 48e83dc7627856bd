import type { AuthSessionState, AuthStateSource } from '../services/backend/auth';
import { createNavigationStore } from '../store/navigationStore';
import { startDeepLinkAuthSync } from './deepLinkAuthSync';
import { DeepLinkRouter } from './deepLinkRouter';

const COURSE_ID = '3f2b8c1e-4d5a-4b6c-9d7e-1a2b3c4d5e6f';

const signedOut: AuthSessionState = { signedIn: false, userId: null };
const signedIn: AuthSessionState = { signedIn: true, userId: 'user-1' };

function fakeAuth(initial: AuthSessionState) {
  const listeners = new Set<(state: AuthSessionState) => void>();
  const unsubscribe = jest.fn();
  const getCurrentState = jest.fn(async () => initial);
  const source: AuthStateSource = {
    getCurrentState,
    onChange: (listener) => {
      listeners.add(listener);
      return () => {
        unsubscribe();
        listeners.delete(listener);
      };
    },
  };
  return {
    source,
    unsubscribe,
    getCurrentState,
    emit: (state: AuthSessionState) => listeners.forEach((l) => l(state)),
  };
}

describe('startDeepLinkAuthSync', () => {
  it('replays the deferred link when the user signs in', async () => {
    const store = createNavigationStore();
    const router = new DeepLinkRouter({ store });
    const auth = fakeAuth(signedOut);

    await startDeepLinkAuthSync(router, auth.source);
    expect(router.isAuthenticated()).toBe(false);

    router.handleUrl(`app://course/${COURSE_ID}`);
    expect(store.getState().deepLinkCourseId).toBeNull();

    auth.emit(signedIn);
    expect(router.isAuthenticated()).toBe(true);
    expect(store.getState().deepLinkCourseId).toBe(COURSE_ID);
    expect(router.pendingUrl).toBeNull();
  });

  it('starts authenticated when a session already exists', async () => {
    const router = new DeepLinkRouter({ store: createNavigationStore() });
    await startDeepLinkAuthSync(router, fakeAuth(signedIn).source);
    expect(router.isAuthenticated()).toBe(true);
  });

  it('gates again after sign-out', async () => {
    const store = createNavigationStore();
    const router = new DeepLinkRouter({ store });
    const auth = fakeAuth(signedIn);
    await startDeepLinkAuthSync(router, auth.source);

    auth.emit(signedOut);
    expect(router.handleUrl('app://grades')).toBe(true);
    expect(router.pendingUrl).toBe('app://grades');
    expect(store.getState().deepLinkGradeId).toBeNull();
  });

  it('stays signed out when the session read fails', async () => {
    const router = new DeepLinkRouter({ store: createNavigationStore() });
    const auth = fakeAuth(signedIn);
    auth.getCurrentState.mockRejectedValueOnce(new Error('offline'));

    await startDeepLinkAuthSync(router, auth.source);
    expect(router.isAuthenticated()).toBe(false);
  });

  it('keeps a sign-out that arrives while the session is being read', async () => {
    const store = createNavigationStore();
    const router = new DeepLinkRouter({ store });
    const auth = fakeAuth(signedOut);
    let resolveRead: (state: AuthSessionState) => void = () => undefined;
    auth.getCurrentState.mockImplementationOnce(
      () =>
        new Promise<AuthSessionState>((resolve) => {
          resolveRead = resolve;
        }),
    );

    const started = startDeepLinkAuthSync(router, auth.source);
    auth.emit(signedOut);
    resolveRead(signedIn);
    await started;

    expect(router.isAuthenticated()).toBe(false);
    router.handleUrl('app://grades');
    expect(router.pendingUrl).toBe('app://grades');
    expect(store.getState().deepLinkGradeId).toBeNull();
  });

  it('stops listening once disposed', async () => {
    const store = createNavigationStore();
    const router = new DeepLinkRouter({ store });
    const auth = fakeAuth(signedOut);
    const stop = await startDeepLinkAuthSync(router, auth.source);
    router.handleUrl('app://tools');

    stop();
    auth.emit(signedIn);

    expect(auth.unsubscribe).toHaveBeenCalledTimes(1);
    expect(router.isAuthenticated()).toBe(false);
    expect(router.pendingUrl).toBe('app://tools');
  });
});
