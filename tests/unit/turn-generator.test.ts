/**
 * Anthropic Turn Generator Tests
 *
 * The Anthropic client is replaced by a stub, so no request leaves the
 * process.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Turn, TurnRole } from '../../src/core/models';
import {
  AnthropicTurnGenerator,
  KICKOFF_MESSAGE,
  LLMError,
  isRetryableGenerationError,
  toLLMRequest,
  type LLMConfig,
  type LLMRequest,
  type LLMResponse,
} from '../../src/llm';

let sequence = 0;

function turn(role: TurnRole, content: string): Turn {
  sequence++;
  return {
    id: `turn_${sequence}`,
    sessionId: 'sess_test',
    role,
    content,
    sequence,
    createdAt: new Date('2026-03-01T10:00:00.000Z'),
  };
}

function stubClient(text: string) {
  return {
    complete: vi.fn(
      async (_request: LLMRequest, _config?: LLMConfig): Promise<LLMResponse> => ({
        text,
        usage: { inputTokens: 10, outputTokens: 5 },
        stopReason: 'end_turn',
      })
    ),
  };
}

describe('toLLMRequest', () => {
  it('uses the system turn as the system prompt and sends a kickoff for the opening', () => {
    expect(toLLMRequest([turn('system', 'You teach variables.')])).toEqual({
      system: 'You teach variables.',
      messages: [{ role: 'user', content: KICKOFF_MESSAGE }],
    });
  });

  it('prepends the kickoff when the window starts with the tutor', () => {
    const request = toLLMRequest([
      turn('system', 'S'),
      turn('assistant', 'Olá!'),
      turn('user', 'Oi'),
    ]);

    expect(request.messages).toEqual([
      { role: 'user', content: KICKOFF_MESSAGE },
      { role: 'assistant', content: 'Olá!' },
      { role: 'user', content: 'Oi' },
    ]);
  });

  it('keeps a window that already starts with the learner', () => {
    const request = toLLMRequest([turn('system', 'S'), turn('user', 'Oi'), turn('assistant', 'Olá!')]);

    expect(request.messages).toEqual([
      { role: 'user', content: 'Oi' },
      { role: 'assistant', content: 'Olá!' },
    ]);
  });

  it('merges consecutive turns of the same role', () => {
    const request = toLLMRequest([
      turn('system', 'S'),
      turn('user', 'first'),
      turn('user', 'second'),
      turn('assistant', 'reply'),
    ]);

    expect(request.messages).toEqual([
      { role: 'user', content: 'first\n\nsecond' },
      { role: 'assistant', content: 'reply' },
    ]);
  });

  it('has no system prompt without a system turn', () => {
    expect(toLLMRequest([]).system).toBeUndefined();
  });
});

describe('AnthropicTurnGenerator', () => {
  it('sends the converted request and returns the trimmed text', async () => {
    const client = stubClient('  Vamos começar!  ');
    const generator = new AnthropicTurnGenerator(client, { temperature: 0.5 });
    const controller = new AbortController();

    const text = await generator.generate([turn('system', 'S')], { signal: controller.signal });

    expect(text).toBe('Vamos começar!');
    expect(client.complete).toHaveBeenCalledWith(
      {
        system: 'S',
        messages: [{ role: 'user', content: KICKOFF_MESSAGE }],
        signal: controller.signal,
      },
      { temperature: 0.5 }
    );
  });

  it('rejects an empty reply with a retryable empty_response error', async () => {
    const generator = new AnthropicTurnGenerator(stubClient('   '));

    const error = await generator.generate([turn('system', 'S')]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ type: 'empty_response' });
    expect(isRetryableGenerationError(error)).toBe(true);
  });
});

describe('isRetryableGenerationError', () => {
  it('retries transient LLM errors only', () => {
    expect(isRetryableGenerationError(new LLMError('slow', 'timeout'))).toBe(true);
    expect(isRetryableGenerationError(new LLMError('busy', 'rate_limit'))).toBe(true);
    expect(isRetryableGenerationError(new LLMError('overloaded', 'server_error'))).toBe(true);
    expect(isRetryableGenerationError(new LLMError('bad key', 'authentication'))).toBe(false);
    expect(isRetryableGenerationError(new LLMError('bad', 'invalid_request'))).toBe(false);
    expect(isRetryableGenerationError(new Error('other'))).toBe(false);
  });
});
