/**
 * Anthropic Client Wrapper
 *
 * This module provides an abstraction layer over the Anthropic SDK.
 * It handles:
 * - API key configuration with clear error messages
 * - Non-streaming API calls with per-request system prompts
 * - Request cancellation through AbortSignal
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete({
 *   system: 'You are a patient tutor.',
 *   messages: [{ role: 'user', content: 'Hello!' }],
 * });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { LLMConfig, LLMRequest, LLMResponse } from './types';
import { LLMError } from './types';

// Default model to use for all requests
const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// Default maximum tokens for responses
const DEFAULT_MAX_TOKENS = 1024;

// Default temperature for response generation
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Options accepted by the client constructor.
 */
export interface AnthropicClientOptions extends LLMConfig {
  /** API key; required */
  apiKey: string | undefined;
}

/**
 * Wrapper class for the Anthropic API client.
 * Provides a simplified interface for making LLM calls with
 * proper error handling.
 */
export class AnthropicClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: Required<LLMConfig>;

  /**
   * Creates a new AnthropicClient instance.
   *
   * @throws LLMError if no API key is provided
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({
   *   apiKey: config.anthropic.apiKey,
   *   model: config.anthropic.model,
   *   maxTokens: 2048,
   * });
   * ```
   */
  constructor(options: AnthropicClientOptions) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    // Retries belong to the RetryExecutor's generation policy alone.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param request - System prompt, messages and optional abort signal
   * @param config - Optional configuration to override defaults for this request
   * @returns Promise resolving to the complete response with usage info
   * @throws LLMError on API errors
   */
  async complete(request: LLMRequest, config: LLMConfig = {}): Promise<LLMResponse> {
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create(
        {
          model: mergedConfig.model,
          max_tokens: mergedConfig.maxTokens,
          temperature: mergedConfig.temperature,
          system: request.system,
          messages: request.messages.map((msg) => ({
            role: msg.role,
            content: msg.content,
          })),
        },
        { signal: request.signal }
      );

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Merges provided config with defaults.
   */
  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text blocks of a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   * Maps Anthropic SDK error types to our simplified error types.
   */
  private handleError(error: unknown): LLMError {
    // Timeout must be checked before APIConnectionError since it extends it
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
      return new LLMError(error.message, 'authentication', error);
    }
    if (error instanceof RateLimitError) {
      return new LLMError(error.message, 'rate_limit', error);
    }
    if (error instanceof BadRequestError) {
      return new LLMError(error.message, 'invalid_request', error);
    }
    if (error instanceof InternalServerError) {
      return new LLMError(error.message, 'server_error', error);
    }
    if (error instanceof APIError) {
      // 529 overloaded and other upstream statuses
      const type = error.status !== undefined && error.status >= 500 ? 'server_error' : 'unknown';
      return new LLMError(error.message, type, error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error);
  }
}
