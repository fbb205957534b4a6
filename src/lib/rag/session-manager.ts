/**
 * Session Manager
 *
 * In-memory conversation history keyed by session id. Each session keeps
 * at most `maxHistory` exchanges (2 × maxHistory messages); at most
 * `maxSessions` sessions are kept, evicting the least recently used.
 */

import { logger } from '@/lib/logger';
import { DEFAULT_MAX_HISTORY, DEFAULT_MAX_SESSIONS } from './config';

// =============================================================================
// Types
// =============================================================================

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

// =============================================================================
// Session Manager
// =============================================================================

export class SessionManager {
  private sessions = new Map<string, Message[]>();
  private locks = new Map<string, Promise<void>>();
  private sessionCounter = 0;
  private log = logger.child({ layer: 'session', service: 'SessionManager' });

  constructor(
    private readonly maxHistory: number = DEFAULT_MAX_HISTORY,
    private readonly maxSessions: number = DEFAULT_MAX_SESSIONS
  ) {}

  /**
   * Create an empty session and return its id (`session_1`, `session_2`, ...).
   */
  createSession(): string {
    this.sessionCounter += 1;
    const sessionId = `session_${this.sessionCounter}`;
    this.store(sessionId, []);
    this.log.debug({ sessionId }, 'Session created');
    return sessionId;
  }

  /**
   * Append a message, creating the session if needed.
   */
  addMessage(sessionId: string, role: MessageRole, content: string): void {
    this.append(sessionId, [{ role, content }]);
  }

  /**
   * Append a user/assistant pair, trimmed as one unit.
   */
  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.append(sessionId, [
      { role: 'user', content: userMessage },
      { role: 'assistant', content: assistantMessage },
    ]);
  }

  /**
   * History rendered as "User: ..." / "Assistant: ..." lines,
   * or null when there is none.
   */
  getConversationHistory(sessionId?: string | null): string | null {
    if (!sessionId) return null;
    const messages = this.sessions.get(sessionId);
    if (!messages) return null;
    this.store(sessionId, messages);
    if (messages.length === 0) return null;

    return messages
      .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');
  }

  getMessages(sessionId: string): Message[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Empty a session's history. The id stays valid.
   */
  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }

  /**
   * Run `task` after every earlier task for the same session has settled.
   * Tasks for different sessions are not ordered.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(sessionId, settled);

    try {
      return await run;
    } finally {
      if (this.locks.get(sessionId) === settled) {
        this.locks.delete(sessionId);
      }
    }
  }

  private append(sessionId: string, messages: Message[]): void {
    const history = this.sessions.get(sessionId) ?? [];
    history.push(...messages);

    const limit = this.maxHistory * 2;
    const trimmed = history.length > limit ? history.slice(history.length - limit) : history;
    this.store(sessionId, trimmed);
  }

  /**
   * Map order is recency order: re-inserting moves a session to the end.
   */
  private store(sessionId: string, messages: Message[]): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, messages);

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
      this.log.debug({ sessionId: oldest }, 'Session evicted');
    }
  }
}
