/**
 * Holds at most one deep link that arrived before sign-in.
 *
 * A second link overwrites the first; only the most recent request is replayed.
 * There is no expiry, so a link stored hours ago still replays after sign-in.
 */
export class PendingDeepLinkSlot {
  private url: string | null = null;

  store(url: string): void {
    this.url = url;
  }

  /**
   * Returns the pending link and clears the slot.
   */
  consume(): string | null {
    const url = this.url;
    this.url = null;
    return url;
  }

  peek(): string | null {
    return this.url;
  }

  get hasPending(): boolean {
    return this.url !== null;
  }
}
