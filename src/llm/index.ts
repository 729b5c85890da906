/**
 * LLM Module - Barrel Export
 *
 * This module provides an abstraction layer over the Anthropic SDK for
 * making LLM API calls. It includes:
 * - AnthropicClient: Main client class for making API calls
 * - AnthropicTurnGenerator: produces tutor replies from stored turns
 * - Type definitions for messages, configs, and responses
 * - Custom error types and the retry predicate for generation
 * - The tutor prompt builder
 *
 * @example
 * ```typescript
 * import { AnthropicClient, AnthropicTurnGenerator, buildTutorPrompt } from './llm';
 *
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const generator = new AnthropicTurnGenerator(client);
 *
 * const reply = await generator.generate(turns);
 * ```
 */

// Re-export the main client class
export { AnthropicClient, type AnthropicClientOptions } from './client';

// Turn generation
export {
  AnthropicTurnGenerator,
  KICKOFF_MESSAGE,
  toLLMRequest,
  type CompletionClient,
} from './turn-generator';

// Re-export all types for external use
export type {
  LLMMessage,
  LLMConfig,
  LLMRequest,
  LLMResponse,
  LLMErrorType,
} from './types';

// Re-export the error class (needs to be a value export, not just type)
export { LLMError, isRetryableGenerationError } from './types';

// Prompt builder
export * from './prompts';
