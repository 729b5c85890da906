/**
 * Conversation Store
 *
 * Append-only, ordered history of a tutoring session. Turns are never
 * edited or removed; the bounded view handed to the text generator is
 * computed at read time.
 *
 * Ordering rules enforced on append:
 * - the system turn is the first turn of a session and there is only one
 * - user and assistant turns require the system turn to exist
 *
 * Sequence numbers come from the database (see SessionTurnRepository.append),
 * so they stay monotonic even across processes sharing the same file.
 */

import { ConversationInvariantError } from '../errors';
import type { Turn, TurnRole } from '../models';
import type { SessionTurnRepository } from '../../storage/repositories';

/**
 * Generates a unique turn ID like 'turn_abc123...'.
 */
function generateTurnId(): string {
  return `turn_${crypto.randomUUID()}`;
}

export class ConversationStore {
  constructor(private readonly turns: SessionTurnRepository) {}

  /**
   * Appends a turn at the next sequence position.
   *
   * @throws ConversationInvariantError if the append would put a second
   *   system turn in the session, or a user/assistant turn before the
   *   system turn
   */
  async append(sessionId: string, role: TurnRole, content: string): Promise<Turn> {
    if (role === 'system') {
      const existing = await this.turns.count(sessionId);
      if (existing > 0) {
        throw new ConversationInvariantError(
          `Session '${sessionId}' already has turns; the system turn must come first`,
          { sessionId, existingTurns: existing }
        );
      }
    } else {
      const system = await this.turns.findSystemTurn(sessionId);
      if (!system) {
        throw new ConversationInvariantError(
          `Session '${sessionId}' has no system turn; cannot append a ${role} turn`,
          { sessionId, role }
        );
      }
    }

    return this.turns.append({
      id: generateTurnId(),
      sessionId,
      role,
      content,
    });
  }

  /**
   * The window sent to the text generator: the system turn followed by the
   * most recent `maxTurns - 1` user/assistant turns, oldest first.
   *
   * @param maxTurns - Integer >= 1; the system turn counts toward it
   * @throws RangeError if maxTurns is not a positive integer
   * @throws ConversationInvariantError if the session has no system turn
   */
  async readForContext(sessionId: string, maxTurns: number): Promise<Turn[]> {
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer, got ${maxTurns}`);
    }

    const system = await this.turns.findSystemTurn(sessionId);
    if (!system) {
      throw new ConversationInvariantError(`Session '${sessionId}' has no system turn`, {
        sessionId,
      });
    }

    const recent = await this.turns.findRecentConversation(sessionId, maxTurns - 1);
    return [system, ...recent];
  }

  /**
   * The full transcript in sequence order, system turn included.
   */
  async readAll(sessionId: string): Promise<Turn[]> {
    return this.turns.findBySession(sessionId);
  }

  /**
   * Number of turns in the session, optionally of one role.
   */
  async countTurns(sessionId: string, role?: TurnRole): Promise<number> {
    return this.turns.count(sessionId, role);
  }
}
