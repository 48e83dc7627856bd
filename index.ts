export { createSchoolDayApp, SchoolDayApp, type SchoolDayAppOptions } from './src/app';

export * from './src/domain/deepLinks';
export * from './src/domain/companion';

export * from './src/navigation/deepLinkParser';
export { PendingDeepLinkSlot } from './src/navigation/pendingDeepLink';
export { DeepLinkRouter, navigationTargetsFor, type DeepLinkRouterOptions } from './src/navigation/deepLinkRouter';
export { startDeepLinkAuthSync } from './src/navigation/deepLinkAuthSync';

export * from './src/store/navigationStore';
export * from './src/store/companionStore';

export * from './src/services/companion/companionContext';
export * from './src/services/companion/companionTransport';
export { CompanionSyncService, COMPANION_STORAGE_KEYS } from './src/services/companion/companionSync';
export * from './src/services/companion/phoneCompanionSender';
export * from './src/services/spotlight/spotlight';
export * from './src/services/storage/keyValueStorage';
export {
  createSupabaseAuthStateSource,
  toAuthSessionState,
  type SupabaseAuthClient,
  type AuthSessionState,
  type AuthStateSource,
} from './src/services/backend/auth';
