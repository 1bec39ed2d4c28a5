import type { SessionStore } from './sessionStore.js';

interface SessionRecord {
  values: Map<string, unknown>;
  expiresAt: number;
}

/**
 * In-memory session store with sliding TTL and bounded sweeper.
 * Values are copied on the way in and out, like a serializing store would.
 */
export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly sweepIntervalMs: number = 60_000,
    private readonly sweepScanLimit: number = 100,
    private readonly sweepBudgetMs: number = 50
  ) {}

  /**
   * Read a value, refreshing the session TTL.
   * Returns undefined for unknown keys and expired sessions.
   */
  async get(sessionId: string, key: string): Promise<unknown> {
    const session = this.live(sessionId);
    if (!session) {
      return undefined;
    }

    this.refreshTtl(session);
    const value = session.values.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  /**
   * Write a value, creating the session if needed
   */
  async set(sessionId: string, key: string, value: unknown): Promise<void> {
    const copy = structuredClone(value);
    let session = this.live(sessionId);
    if (!session) {
      session = { values: new Map(), expiresAt: 0 };
      this.sessions.set(sessionId, session);
    }

    session.values.set(key, copy);
    this.refreshTtl(session);
  }

  async delete(sessionId: string, key: string): Promise<void> {
    const session = this.live(sessionId);
    if (session) {
      session.values.delete(key);
      this.refreshTtl(session);
    }
  }

  async destroy(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  /**
   * Lazy expiration check
   */
  private live(sessionId: string): SessionRecord | null {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }

    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      return null;
    }

    return session;
  }

  private isExpired(session: SessionRecord): boolean {
    return Date.now() > session.expiresAt;
  }

  private refreshTtl(session: SessionRecord): void {
    session.expiresAt = Date.now() + this.ttlMs;
  }

  /**
   * Bounded periodic sweeper for expired sessions
   * Scans up to sweepScanLimit entries or runs for up to sweepBudgetMs
   */
  private sweep(): void {
    const startTime = Date.now();
    let scanned = 0;

    for (const [id, session] of this.sessions.entries()) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
      }

      scanned++;
      if (scanned >= this.sweepScanLimit) {
        break;
      }

      if (Date.now() - startTime >= this.sweepBudgetMs) {
        break;
      }
    }
  }

  startSweeper(): void {
    if (this.sweepInterval) {
      return;
    }

    this.sweepInterval = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);

    // Don't keep process alive just for sweeper
    this.sweepInterval.unref();
  }

  stopSweeper(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  /**
   * Current session count (for testing/monitoring)
   */
  size(): number {
    return this.sessions.size;
  }

  /**
   * Drop all sessions (for testing)
   */
  clear(): void {
    this.sessions.clear();
  }
}
