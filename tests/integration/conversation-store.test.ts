/**
 * ConversationStore Integration Tests
 *
 * Runs the store over a real in-memory SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConversationInvariantError } from '../../src/core/errors';
import { ConversationStore } from '../../src/core/session';
import type { AppDatabase } from '../../src/storage/db';
import { SessionRepository, SessionTurnRepository } from '../../src/storage/repositories';
import { cleanupTestDatabase, createTestDatabase } from '../setup';

describe('ConversationStore', () => {
  let db: AppDatabase;
  let store: ConversationStore;
  const sessionId = 'sess_store_test';

  beforeEach(async () => {
    db = createTestDatabase();
    store = new ConversationStore(new SessionTurnRepository(db));
    await new SessionRepository(db).create({ id: sessionId, userId: 1, courseId: 2, topicId: 5 });
  });

  afterEach(() => {
    cleanupTestDatabase({ db });
  });

  describe('append', () => {
    it('numbers turns from 1 in append order', async () => {
      const system = await store.append(sessionId, 'system', 'You are a tutor.');
      const user = await store.append(sessionId, 'user', 'Hi');
      const assistant = await store.append(sessionId, 'assistant', 'Hello!');

      expect([system.sequence, user.sequence, assistant.sequence]).toEqual([1, 2, 3]);
      expect(user.sessionId).toBe(sessionId);
      expect(user.id).toMatch(/^turn_/);
    });

    it('rejects a user turn before the system turn', async () => {
      await expect(store.append(sessionId, 'user', 'Hi')).rejects.toBeInstanceOf(
        ConversationInvariantError
      );
      expect(await store.countTurns(sessionId)).toBe(0);
    });

    it('rejects a second system turn', async () => {
      await store.append(sessionId, 'system', 'You are a tutor.');

      await expect(store.append(sessionId, 'system', 'Another prompt')).rejects.toBeInstanceOf(
        ConversationInvariantError
      );
      expect(await store.countTurns(sessionId, 'system')).toBe(1);
    });

    it('keeps sequences unique under concurrent appends', async () => {
      await store.append(sessionId, 'system', 'You are a tutor.');

      const appended = await Promise.all(
        ['a', 'b', 'c', 'd'].map((text) => store.append(sessionId, 'user', text))
      );

      expect(appended.map((turn) => turn.sequence).sort()).toEqual([2, 3, 4, 5]);
    });
  });

  describe('readForContext', () => {
    beforeEach(async () => {
      await store.append(sessionId, 'system', 'You are a tutor.');
      await store.append(sessionId, 'user', 'u1');
      await store.append(sessionId, 'assistant', 'a1');
      await store.append(sessionId, 'user', 'u2');
      await store.append(sessionId, 'assistant', 'a2');
    });

    it('returns the system turn plus the most recent turns, oldest first', async () => {
      const window = await store.readForContext(sessionId, 4);

      expect(window.map((turn) => turn.content)).toEqual(['You are a tutor.', 'a1', 'u2', 'a2']);
      expect(window.map((turn) => turn.sequence)).toEqual([1, 3, 4, 5]);
    });

    it('returns only the system turn for a window of one', async () => {
      const window = await store.readForContext(sessionId, 1);

      expect(window.map((turn) => turn.role)).toEqual(['system']);
    });

    it('returns everything when the window is larger than the history', async () => {
      const window = await store.readForContext(sessionId, 50);

      expect(window.map((turn) => turn.sequence)).toEqual([1, 2, 3, 4, 5]);
    });

    it('rejects a window below one', async () => {
      await expect(store.readForContext(sessionId, 0)).rejects.toBeInstanceOf(RangeError);
      await expect(store.readForContext(sessionId, 2.5)).rejects.toBeInstanceOf(RangeError);
    });
  });

  it('fails to build a window for a session without a system turn', async () => {
    await expect(store.readForContext(sessionId, 10)).rejects.toBeInstanceOf(
      ConversationInvariantError
    );
  });

  it('reads the full transcript in order', async () => {
    await store.append(sessionId, 'system', 'You are a tutor.');
    await store.append(sessionId, 'assistant', 'Welcome');
    await store.append(sessionId, 'user', 'Thanks');

    const all = await store.readAll(sessionId);

    expect(all.map((turn) => [turn.sequence, turn.role])).toEqual([
      [1, 'system'],
      [2, 'assistant'],
      [3, 'user'],
    ]);
    expect(await store.countTurns(sessionId, 'user')).toBe(1);
  });
});
