import { DeepLinkRouter } from './navigation/deepLinkRouter';
import { startDeepLinkAuthSync } from './navigation/deepLinkAuthSync';
import type { SearchActivity } from './navigation/deepLinkParser';
import { createSupabaseAuthStateSource, type AuthStateSource } from './services/backend/auth';
import { getSupabaseClient } from './services/backend/supabaseClient';
import { CompanionSyncService } from './services/companion/companionSync';
import type { CompanionSession } from './services/companion/companionTransport';
import { FileKeyValueStorage, type KeyValueStorage } from './services/storage/keyValueStorage';
import { createCompanionStore, type CompanionStore } from './store/companionStore';
import { createNavigationStore, type NavigationStore } from './store/navigationStore';
import { createDevLog } from './utils/devLog';
import { getCompanionStoragePath, getDeepLinkScheme, loadEnvFiles } from './utils/getEnv';

const devLog = createDevLog('[app]');

export type SchoolDayAppOptions = {
  storage?: KeyValueStorage;
  /**
   * Session source for the deep-link gate. Defaults to the Supabase client
   * built from env; pass null to run signed out with no backend.
   */
  auth?: AuthStateSource | null;
  /** Companion link to receive on. Omit on devices that don't receive. */
  companionSession?: CompanionSession | null;
  scheme?: string;
  now?: () => number;
};

/**
 * Root controller: owns the navigation and companion stores, the deep-link
 * router (and its pending slot), and the companion receiver.
 */
export class SchoolDayApp {
  readonly navigation: NavigationStore;
  readonly companion: CompanionStore;
  readonly router: DeepLinkRouter;
  readonly companionSync: CompanionSyncService | null;

  private readonly auth: AuthStateSource | null;
  private stopAuthSync: (() => void) | null = null;
  private started = false;

  constructor(params: {
    storage: KeyValueStorage;
    auth: AuthStateSource | null;
    companionSession: CompanionSession | null;
    scheme: string;
    now?: () => number;
  }) {
    this.navigation = createNavigationStore();
    this.companion = createCompanionStore();
    this.router = new DeepLinkRouter({ store: this.navigation, scheme: params.scheme, now: params.now });
    this.auth = params.auth;
    this.companionSync = params.companionSession
      ? new CompanionSyncService({
          session: params.companionSession,
          storage: params.storage,
          store: this.companion,
          now: params.now,
        })
      : null;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    if (this.auth) {
      this.stopAuthSync = await startDeepLinkAuthSync(this.router, this.auth);
    }
    await this.companionSync?.start();
    devLog('started', { auth: Boolean(this.auth), companion: Boolean(this.companionSync) });
  }

  stop(): void {
    this.stopAuthSync?.();
    this.stopAuthSync = null;
    this.companionSync?.stop();
    this.started = false;
  }

  openUrl(url: string): boolean {
    return this.router.handleUrl(url);
  }

  continueSearchActivity(activity: SearchActivity): boolean {
    return this.router.handleActivity(activity);
  }
}

export function createSchoolDayApp(options: SchoolDayAppOptions = {}): SchoolDayApp {
  loadEnvFiles();
  const storage = options.storage ?? new FileKeyValueStorage(getCompanionStoragePath());
  const auth =
    options.auth === undefined ? createSupabaseAuthStateSource(getSupabaseClient(storage)) : options.auth;
  return new SchoolDayApp({
    storage,
    auth,
    companionSession: options.companionSession ?? null,
    scheme: options.scheme ?? getDeepLinkScheme(),
    now: options.now,
  });
}
