import { createSessionStore, KeyValueStore, SessionStoreOptions } from '../sessionStore';
import { Session } from '../models/SessionModels';

/**
 * Thin wrapper around the key-value store that provides strongly-typed helpers
 * to load, persist and destroy a user's dialogue session.  Keeps the
 * conversation service free of storage details.
 */
export class SessionManager {
  constructor(private readonly store: KeyValueStore<Session>) {}

  static create(options: SessionStoreOptions = {}): SessionManager {
    return new SessionManager(createSessionStore<Session>(options));
  }

  /** Retrieve the active session, or undefined when the user has none. */
  async get(userId: number): Promise<Session | undefined> {
    return this.store.get(userId.toString());
  }

  /** Persist full session object (overwrites previous value). */
  async set(session: Session): Promise<void> {
    await this.store.set(session.userId.toString(), session);
  }

  /** Destroy the session – on completion, cancel or restart. */
  async clear(userId: number): Promise<void> {
    await this.store.delete(userId.toString());
  }
}
