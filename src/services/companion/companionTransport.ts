import type { CompanionContext } from './companionContext';

export type CompanionActivationState = 'notActivated' | 'inactive' | 'activated';

export type CompanionActivationResult = {
  state: CompanionActivationState;
  error: Error | null;
};

export type CompanionContextListener = (context: CompanionContext) => void;

/**
 * Latest-value, store-and-forward link between the phone and its companion.
 * Only the most recent context is guaranteed to arrive; intermediate updates
 * may be coalesced away.
 */
export interface CompanionSession {
  isSupported(): boolean;
  activate(): Promise<CompanionActivationResult>;
  readonly activationState: CompanionActivationState;
  /** Last context delivered to this side, including ones received while inactive. */
  readonly receivedApplicationContext: CompanionContext;
  readonly isPaired: boolean;
  readonly isCompanionAppInstalled: boolean;
  /** Throws when the context can't be handed to the transport. */
  updateApplicationContext(context: CompanionContext): void;
  onApplicationContext(listener: CompanionContextListener): () => void;
}

export type InProcessSessionOptions = {
  supported?: boolean;
  activationError?: Error | null;
  paired?: boolean;
  companionAppInstalled?: boolean;
};

/**
 * One end of an in-process channel. Deliveries are queued as a microtask and
 * coalesced, so several updates in one tick reach the peer as the last one.
 */
export class InProcessCompanionSession implements CompanionSession {
  private state: CompanionActivationState = 'notActivated';
  private received: CompanionContext = {};
  private queued: CompanionContext | null = null;
  private readonly listeners = new Set<CompanionContextListener>();
  private peer: InProcessCompanionSession | null = null;

  constructor(private readonly options: InProcessSessionOptions = {}) {}

  connect(peer: InProcessCompanionSession): void {
    this.peer = peer;
  }

  isSupported(): boolean {
    return this.options.supported ?? true;
  }

  get activationState(): CompanionActivationState {
    return this.state;
  }

  get receivedApplicationContext(): CompanionContext {
    return this.received;
  }

  get isPaired(): boolean {
    return this.options.paired ?? this.peer !== null;
  }

  get isCompanionAppInstalled(): boolean {
    return this.options.companionAppInstalled ?? this.peer !== null;
  }

  async activate(): Promise<CompanionActivationResult> {
    const error = this.options.activationError ?? null;
    this.state = error ? 'inactive' : 'activated';
    return { state: this.state, error };
  }

  updateApplicationContext(context: CompanionContext): void {
    if (this.state !== 'activated') {
      throw new Error('Session is not activated');
    }
    if (!this.peer) {
      throw new Error('No paired companion');
    }
    this.peer.enqueue({ ...context });
  }

  onApplicationContext(listener: CompanionContextListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private enqueue(context: CompanionContext): void {
    this.received = context;
    const alreadyScheduled = this.queued !== null;
    this.queued = context;
    if (alreadyScheduled) return;
    queueMicrotask(() => {
      const latest = this.queued;
      this.queued = null;
      // Held until activation; the receiver reads `receivedApplicationContext` then.
      if (!latest || this.state !== 'activated') return;
      this.listeners.forEach((listener) => listener(latest));
    });
  }
}

export function createApplicationContextChannel(options?: {
  phone?: InProcessSessionOptions;
  companion?: InProcessSessionOptions;
}): { phone: InProcessCompanionSession; companion: InProcessCompanionSession } {
  const phone = new InProcessCompanionSession(options?.phone);
  const companion = new InProcessCompanionSession(options?.companion);
  phone.connect(companion);
  companion.connect(phone);
  return { phone, companion };
}
