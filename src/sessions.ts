import { randomUUID } from "node:crypto";
import type { Session } from "./types";

/**
 * Keyed store of conversational sessions. Injected into the chat service and
 * the HTTP transport so lifecycle and eviction can be configured and tested on
 * their own.
 */
export interface SessionStore {
  /** Create a session under a fresh id that collides with no live session. */
  create(): Session;
  /** Live session by id, or undefined (expired sessions count as unknown). */
  get(id: string): Session | undefined;
  /** Live session by id, creating an empty one under that id when unknown. */
  getOrCreate(id: string): Session;
  delete(id: string): boolean;
  readonly size: number;
}

export interface InMemorySessionStoreOptions {
  /** Idle time after which a session expires; 0 keeps sessions forever. */
  ttlMs?: number;
  /** Maximum live sessions; the least recently seen is evicted beyond it. 0 = unbounded. */
  maxSessions?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
  /** Id generator, injectable for tests. */
  generateId?: () => string;
}

/**
 * Process-memory session store. Nothing survives a restart. With the default
 * options memory grows with every session ever created.
 */
export class InMemorySessionStore implements SessionStore {
  // Map iteration order doubles as recency order: touched sessions are re-inserted.
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  public constructor(opts: InMemorySessionStoreOptions = {}) {
    this.ttlMs = Math.max(0, opts.ttlMs ?? 0);
    this.maxSessions = Math.max(0, opts.maxSessions ?? 0);
    this.now = opts.now ?? Date.now;
    this.generateId = opts.generateId ?? randomUUID;
  }

  public get size(): number {
    this.sweep();
    return this.sessions.size;
  }

  public create(): Session {
    let id = this.generateId();
    while (this.sessions.has(id)) id = this.generateId();
    return this.insert(id);
  }

  public get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      return undefined;
    }
    session.lastSeenAt = this.now();
    this.sessions.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  public getOrCreate(id: string): Session {
    return this.get(id) ?? this.insert(id);
  }

  public delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  private insert(id: string): Session {
    const now = this.now();
    const session: Session = { id, createdAt: now, lastSeenAt: now, history: [] };
    this.sweep();
    this.sessions.set(id, session);
    if (this.maxSessions > 0) {
      for (const oldest of this.sessions.keys()) {
        if (this.sessions.size <= this.maxSessions) break;
        this.sessions.delete(oldest);
      }
    }
    return session;
  }

  private isExpired(session: Session): boolean {
    return this.ttlMs > 0 && this.now() - session.lastSeenAt > this.ttlMs;
  }

  /** Drop expired sessions. Oldest-seen come first, so stop at the first live one. */
  private sweep(): void {
    if (this.ttlMs === 0) return;
    for (const [id, session] of this.sessions) {
      if (!this.isExpired(session)) break;
      this.sessions.delete(id);
    }
  }
}
