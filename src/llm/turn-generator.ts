/**
 * Anthropic Turn Generator
 *
 * Adapts a stored conversation to the Messages API and returns the tutor's
 * next reply. The stored system turn becomes the `system` parameter; the
 * remaining turns become the message list, which the API requires to start
 * with a user message and to alternate roles.
 */

import type { Turn } from '../core/models';
import type { TurnGenerator } from '../core/session/types';
import type { AnthropicClient } from './client';
import { LLMError, type LLMConfig, type LLMMessage } from './types';

/**
 * User message sent when the conversation has no learner input yet
 * (opening message) or starts with a tutor turn.
 */
export const KICKOFF_MESSAGE = 'Olá! Vamos começar.';

/**
 * The part of AnthropicClient the generator uses.
 */
export type CompletionClient = Pick<AnthropicClient, 'complete'>;

/**
 * Converts stored turns into an API request.
 *
 * - the first system turn is the system prompt; other system turns are ignored
 * - consecutive turns with the same role are joined with a blank line
 * - a kickoff user message is prepended when the first message is not a user one
 */
export function toLLMRequest(turns: readonly Turn[]): { system: string | undefined; messages: LLMMessage[] } {
  const system = turns.find((turn) => turn.role === 'system')?.content;
  const messages: LLMMessage[] = [];

  for (const turn of turns) {
    if (turn.role === 'system') {
      continue;
    }

    const previous = messages.at(-1);
    if (previous && previous.role === turn.role) {
      previous.content = `${previous.content}\n\n${turn.content}`;
    } else {
      messages.push({ role: turn.role, content: turn.content });
    }
  }

  if (messages.length === 0 || messages[0].role !== 'user') {
    messages.unshift({ role: 'user', content: KICKOFF_MESSAGE });
  }

  return { system, messages };
}

export class AnthropicTurnGenerator implements TurnGenerator {
  constructor(
    private readonly client: CompletionClient,
    private readonly config: LLMConfig = {}
  ) {}

  /**
   * @throws LLMError of type 'empty_response' when the model returns no text
   */
  async generate(turns: readonly Turn[], options: { signal?: AbortSignal } = {}): Promise<string> {
    const { system, messages } = toLLMRequest(turns);

    const response = await this.client.complete(
      { system, messages, signal: options.signal },
      this.config
    );

    const text = response.text.trim();
    if (text.length === 0) {
      throw new LLMError(
        `Model returned no text (stop reason: ${response.stopReason ?? 'unknown'})`,
        'empty_response'
      );
    }

    return text;
  }
}
