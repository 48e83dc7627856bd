import type { CompanionStore } from '../../store/companionStore';
import type { KeyValueStorage } from '../storage/keyValueStorage';
import { createDevLog, describeError } from '../../utils/devLog';
import {
  companionCollectionSchemas,
  decodeCollection,
  decodeCompanionContext,
  encodeCollection,
  type CompanionContext,
} from './companionContext';
import type { CompanionActivationResult, CompanionSession } from './companionTransport';

const devLog = createDevLog('[companionSync]');

export const COMPANION_STORAGE_KEYS = {
  assignments: 'companion.assignments.v1',
  schedule: 'companion.schedule.v1',
  grades: 'companion.grades.v1',
  lastSync: 'companion.lastSync.v1',
} as const;

export type CompanionSyncServiceOptions = {
  session: CompanionSession;
  storage: KeyValueStorage;
  store: CompanionStore;
  now?: () => number;
};

/**
 * Companion-side receiver.
 *
 * Data flow:
 *   phone sender --[application context]--> CompanionSyncService --> store + storage
 *
 * Each payload key that decodes replaces its collection in full. The whole
 * current state is re-persisted after any successful payload so the device
 * can start offline with the last known data.
 */
export class CompanionSyncService {
  private readonly session: CompanionSession;
  private readonly storage: KeyValueStorage;
  private readonly store: CompanionStore;
  private readonly now: () => number;
  private unsubscribe: (() => void) | null = null;
  private persistChain: Promise<void> = Promise.resolve();

  constructor(options: CompanionSyncServiceOptions) {
    this.session = options.session;
    this.storage = options.storage;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  /**
   * Loads persisted data first, then activates the transport. Activation
   * problems are reported on `syncError` and never clear loaded data.
   */
  async start(): Promise<void> {
    if (this.unsubscribe) return;
    await this.loadFromStorage();

    if (!this.session.isSupported()) {
      this.store.getState().setSyncError('Companion link is not supported on this device');
      return;
    }

    this.unsubscribe = this.session.onApplicationContext((context) => {
      void this.receiveContext(context);
    });

    let result: CompanionActivationResult;
    try {
      result = await this.session.activate();
    } catch (e) {
      this.store.getState().setSyncError(`Activation failed: ${describeError(e)}`);
      return;
    }
    const { state, error } = result;
    if (error) {
      this.store.getState().setSyncError(`Activation failed: ${describeError(error)}`);
    }

    // Pick up any context delivered while the session was inactive.
    if (state === 'activated') {
      const pending = this.session.receivedApplicationContext;
      if (Object.keys(pending).length > 0) {
        await this.receiveContext(pending);
      }
    }
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Returns true when at least one collection decoded (and state was persisted).
   * Payloads with nothing decodable change nothing and are not reported.
   */
  async receiveContext(context: CompanionContext): Promise<boolean> {
    const { failedKeys, ...collections } = decodeCompanionContext(context);
    if (failedKeys.length > 0) {
      devLog('skipped undecodable keys', { keys: failedKeys });
    }

    const didUpdate =
      collections.assignments !== undefined || collections.schedule !== undefined || collections.grades !== undefined;
    if (!didUpdate) return false;

    this.store.getState().applySync(collections, this.now());
    await this.persist();
    return true;
  }

  async loadFromStorage(): Promise<void> {
    let entries: Array<[string, string | null]>;
    try {
      entries = await this.storage.multiGet([
        COMPANION_STORAGE_KEYS.assignments,
        COMPANION_STORAGE_KEYS.schedule,
        COMPANION_STORAGE_KEYS.grades,
        COMPANION_STORAGE_KEYS.lastSync,
      ]);
    } catch (e) {
      console.warn('Failed to load companion data', e);
      return;
    }
    const values = new Map(entries);

    const assignments = decodeCollection(
      companionCollectionSchemas.assignments,
      values.get(COMPANION_STORAGE_KEYS.assignments),
    );
    const schedule = decodeCollection(companionCollectionSchemas.schedule, values.get(COMPANION_STORAGE_KEYS.schedule));
    const grades = decodeCollection(companionCollectionSchemas.grades, values.get(COMPANION_STORAGE_KEYS.grades));
    const lastSyncSeconds = Number(values.get(COMPANION_STORAGE_KEYS.lastSync) ?? '');

    this.store.getState().hydrate({
      assignments: assignments ?? undefined,
      schedule: schedule ?? undefined,
      grades: grades ?? undefined,
      lastSyncAtMs: Number.isFinite(lastSyncSeconds) && lastSyncSeconds > 0 ? lastSyncSeconds * 1000 : null,
    });
  }

  /**
   * Writes are chained so the snapshot taken by the last write is the newest state.
   */
  private persist(): Promise<void> {
    this.persistChain = this.persistChain.then(() => this.saveToStorage());
    return this.persistChain;
  }

  private async saveToStorage(): Promise<void> {
    const { assignments, schedule, grades, lastSyncAtMs } = this.store.getState();
    const pairs: Array<[string, string]> = [
      [COMPANION_STORAGE_KEYS.assignments, encodeCollection(assignments)],
      [COMPANION_STORAGE_KEYS.schedule, encodeCollection(schedule)],
      [COMPANION_STORAGE_KEYS.grades, encodeCollection(grades)],
    ];
    if (lastSyncAtMs !== null) {
      pairs.push([COMPANION_STORAGE_KEYS.lastSync, String(lastSyncAtMs / 1000)]);
    }
    try {
      await this.storage.multiSet(pairs);
    } catch (e) {
      console.warn('Failed to persist companion data', e);
    }
  }
}
