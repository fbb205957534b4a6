import { describe, it, expect, beforeEach } from 'vitest';
import { SessionManager } from '../session-manager';

describe('SessionManager', () => {
  let sessions: SessionManager;

  beforeEach(() => {
    sessions = new SessionManager();
  });

  it('should hand out sequential ids', () => {
    expect(sessions.createSession()).toBe('session_1');
    expect(sessions.createSession()).toBe('session_2');
    expect(sessions.hasSession('session_2')).toBe(true);
  });

  it('should render history as role-prefixed lines', () => {
    const id = sessions.createSession();
    sessions.addExchange(id, 'What is MCP?', 'A protocol.');

    expect(sessions.getConversationHistory(id)).toBe('User: What is MCP?\nAssistant: A protocol.');
  });

  it('should return null without history', () => {
    const id = sessions.createSession();

    expect(sessions.getConversationHistory(id)).toBeNull();
    expect(sessions.getConversationHistory('unknown')).toBeNull();
    expect(sessions.getConversationHistory(null)).toBeNull();
    expect(sessions.getConversationHistory('')).toBeNull();
  });

  it('should create sessions implicitly on append', () => {
    sessions.addMessage('custom', 'user', 'hello');

    expect(sessions.hasSession('custom')).toBe(true);
    expect(sessions.getMessages('custom')).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('should keep only the most recent exchanges', () => {
    const id = sessions.createSession();
    sessions.addExchange(id, 'q1', 'a1');
    sessions.addExchange(id, 'q2', 'a2');
    sessions.addExchange(id, 'q3', 'a3');

    expect(sessions.getConversationHistory(id)).toBe('User: q2\nAssistant: a2\nUser: q3\nAssistant: a3');
  });

  it('should honor a custom history size', () => {
    const small = new SessionManager(1);
    small.addExchange('s', 'q1', 'a1');
    small.addExchange('s', 'q2', 'a2');

    expect(small.getMessages('s')).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
    ]);
  });

  it('should clear history but keep the session', () => {
    const id = sessions.createSession();
    sessions.addExchange(id, 'q', 'a');

    sessions.clearSession(id);

    expect(sessions.hasSession(id)).toBe(true);
    expect(sessions.getConversationHistory(id)).toBeNull();
  });

  it('should evict the least recently used session past the cap', () => {
    const capped = new SessionManager(2, 2);
    const first = capped.createSession();
    const second = capped.createSession();
    capped.addExchange(first, 'Q1', 'A1');

    const third = capped.createSession();

    expect(capped.hasSession(first)).toBe(true);
    expect(capped.hasSession(second)).toBe(false);
    expect(capped.hasSession(third)).toBe(true);
  });

  it('should count a history read as use', () => {
    const capped = new SessionManager(2, 2);
    const first = capped.createSession();
    capped.createSession();

    capped.getConversationHistory(first);
    capped.createSession();

    expect(capped.hasSession(first)).toBe(true);
    expect(capped.hasSession('session_2')).toBe(false);
  });

  it('should not expose internal message arrays', () => {
    sessions.addMessage('s', 'user', 'hello');
    sessions.getMessages('s').push({ role: 'assistant', content: 'injected' });

    expect(sessions.getMessages('s')).toHaveLength(1);
  });

  describe('runExclusive', () => {
    it('should serialize tasks of one session', async () => {
      const order: string[] = [];
      let releaseFirst: () => void = () => undefined;
      const firstGate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = sessions.runExclusive('s', async () => {
        order.push('first:start');
        await firstGate;
        order.push('first:end');
        return 1;
      });
      const second = sessions.runExclusive('s', async () => {
        order.push('second');
        return 2;
      });

      await Promise.resolve();
      releaseFirst();

      expect(await Promise.all([first, second])).toEqual([1, 2]);
      expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not block other sessions', async () => {
      const order: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const slow = sessions.runExclusive('a', async () => {
        await gate;
        order.push('a');
      });
      await sessions.runExclusive('b', async () => {
        order.push('b');
      });
      release();
      await slow;

      expect(order).toEqual(['b', 'a']);
    });

    it('should keep the queue alive after a failure', async () => {
      const failing = sessions.runExclusive('s', async () => {
        throw new Error('first failed');
      });
      const next = sessions.runExclusive('s', async () => 'ok');

      await expect(failing).rejects.toThrow('first failed');
      expect(await next).toBe('ok');
    });
  });
});
