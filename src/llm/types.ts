/**
 * LLM Types and Interfaces
 *
 * This file defines the TypeScript types for the LLM client wrapper.
 * These types provide a clean abstraction over the Anthropic SDK types,
 * so the rest of the application never imports the SDK directly.
 */

/**
 * Represents a single message in a conversation.
 * The system instruction travels separately (see `LLMRequest.system`).
 */
export interface LLMMessage {
  /** The role of who sent this message */
  role: 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Configuration options for LLM API calls.
 * All fields are optional and have sensible defaults.
 */
export interface LLMConfig {
  /**
   * The model to use for completions.
   * Defaults to 'claude-sonnet-4-5-20250929'.
   */
  model?: string;

  /**
   * Maximum number of tokens to generate in the response.
   * Defaults to 1024.
   */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Defaults to 0.7.
   */
  temperature?: number;
}

/**
 * A complete request: optional system instruction plus the message list.
 */
export interface LLMRequest {
  system?: string;
  messages: LLMMessage[];
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
}

/**
 * Result of a complete (non-streaming) API call.
 * Contains the response text and usage information.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /**
   * Token usage information for billing/tracking.
   * Null if usage data is not available.
   */
  usage: {
    /** Number of tokens in the input (prompt) */
    inputTokens: number;
    /** Number of tokens in the output (response) */
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating */
  stopReason: string | null;
}

/**
 * Error types that can occur when calling the LLM API.
 * These help distinguish between different failure modes.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'empty_response'   // The model returned no text
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 * Includes the error type for easier handling.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: unknown) {
    super(message, { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}

/**
 * Error types worth another attempt.
 */
const RETRYABLE_LLM_ERRORS: ReadonlySet<LLMErrorType> = new Set<LLMErrorType>([
  'rate_limit',
  'server_error',
  'network',
  'timeout',
  'empty_response',
]);

/**
 * Retry predicate for text generation.
 * Only transient `LLMError`s are retried; anything else fails immediately.
 */
export function isRetryableGenerationError(error: unknown): boolean {
  return error instanceof LLMError && RETRYABLE_LLM_ERRORS.has(error.type);
}
