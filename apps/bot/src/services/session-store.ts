import {
  emptySession,
  mergePayload,
  type Session,
  type SessionPayload,
  type SessionState,
} from "../domain/session/index.js";
import { Mutex } from "../domain/utils/index.js";
import { log } from "../logger.js";

/**
 * In-memory FSM state per user. Lost on restart.
 */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();
  private readonly mutex = new Mutex();

  async get(userId: number): Promise<Session> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(userId);
      return session ? { state: session.state, payload: { ...session.payload } } : emptySession();
    });
  }

  async enter(userId: number, state: SessionState, payload: SessionPayload = {}): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.sessions.set(userId, { state, payload: { ...payload } });
    });
    log.session.debug({ userId, state }, "entered");
  }

  /** Update the payload and keep the current state */
  async merge(userId: number, patch: SessionPayload): Promise<void> {
    await this.mutex.runExclusive(() => {
      const current = this.sessions.get(userId) ?? emptySession();
      this.sessions.set(userId, { state: current.state, payload: mergePayload(current.payload, patch) });
    });
  }

  /** Returns whether there was anything to clear */
  async clear(userId: number): Promise<boolean> {
    return this.mutex.runExclusive(() => this.sessions.delete(userId));
  }

  async clearAll(): Promise<void> {
    await this.mutex.runExclusive(() => this.sessions.clear());
  }

  async size(): Promise<number> {
    return this.mutex.runExclusive(() => this.sessions.size);
  }
}
