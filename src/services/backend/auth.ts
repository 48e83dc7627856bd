import type { AuthChangeEvent, Session } from '@supabase/supabase-js';
import { resetSupabaseAuthStorage } from './supabaseClient';

export type AuthSessionState = {
  signedIn: boolean;
  userId: string | null;
};

/**
 * Where the deep-link gate learns whether the user is signed in.
 */
export interface AuthStateSource {
  getCurrentState(): Promise<AuthSessionState>;
  onChange(listener: (state: AuthSessionState) => void): () => void;
}

/**
 * The part of `SupabaseClient` the session helpers touch.
 */
export type SupabaseAuthClient = {
  auth: {
    getSession(): Promise<{ data: { session: Session | null }; error: { message?: string } | null }>;
    signOut(options: { scope: 'local' }): Promise<unknown>;
    onAuthStateChange(callback: (event: AuthChangeEvent, session: Session | null) => void): {
      data: { subscription: { unsubscribe(): void } };
    };
  };
};

function isInvalidRefreshTokenError(e: { message?: string } | null): boolean {
  const msg = (typeof e?.message === 'string' ? e.message : '').trim().toLowerCase();
  if (!msg) return false;
  return msg.includes('invalid refresh token') || (msg.includes('refresh token') && msg.includes('invalid'));
}

export function toAuthSessionState(session: Session | null): AuthSessionState {
  const userId = session?.user?.id ?? null;
  return { signedIn: Boolean(userId), userId };
}

export async function getSession(supabase: SupabaseAuthClient): Promise<Session | null> {
  const { data, error } = await supabase.auth.getSession();
  if (error && isInvalidRefreshTokenError(error)) {
    // Clear persisted auth state so we don't get stuck in a refresh loop.
    await resetSupabaseAuthStorage().catch(() => undefined);
    await supabase.auth.signOut({ scope: 'local' }).catch(() => undefined);
    return null;
  }
  return data.session ?? null;
}

export function createSupabaseAuthStateSource(supabase: SupabaseAuthClient): AuthStateSource {
  return {
    getCurrentState: async () => toAuthSessionState(await getSession(supabase)),
    onChange: (listener) => {
      const { data } = supabase.auth.onAuthStateChange((_event, session) => {
        listener(toAuthSessionState(session));
      });
      return () => data.subscription.unsubscribe();
    },
  };
}
