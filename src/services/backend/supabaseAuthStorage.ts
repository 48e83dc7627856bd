import type { KeyValueStorage } from '../storage/keyValueStorage';

/**
 * Hybrid storage for Supabase Auth:
 * - Writes are mirrored into an in-memory Map immediately.
 * - Writes are also persisted to the app's key-value storage (async).
 *
 * An in-flight sign-in can finish from memory even when the disk write
 * hasn't landed yet.
 */
export class SupabaseAuthStorage {
  private memory = new Map<string, string>();

  constructor(private readonly storage: KeyValueStorage) {}

  async getItem(key: string): Promise<string | null> {
    if (this.memory.has(key)) return this.memory.get(key) ?? null;
    const v = await this.storage.getItem(key);
    if (typeof v === 'string') {
      this.memory.set(key, v);
      return v;
    }
    return null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.memory.set(key, value);
    try {
      await this.storage.setItem(key, value);
    } catch (e) {
      // Memory copy is enough to complete in-flight auth flows.
      console.warn('Failed to persist auth storage item', e);
    }
  }

  async removeItem(key: string): Promise<void> {
    this.memory.delete(key);
    try {
      await this.storage.removeItem(key);
    } catch (e) {
      console.warn('Failed to remove auth storage item', e);
    }
  }

  /**
   * Drop every cached auth key, e.g. after the refresh token is rejected.
   */
  async reset(): Promise<void> {
    const keys = Array.from(this.memory.keys());
    this.memory.clear();
    await Promise.all(keys.map((key) => this.storage.removeItem(key)));
  }
}
