/**
 * LLM Types and Interfaces
 *
 * These types keep application code independent of the Anthropic SDK types.
 * The evaluator and tutor depend only on `LLMCompletionClient`, so tests can
 * hand them an in-process fake instead of the real client.
 */

/**
 * Represents a single message in a conversation.
 */
export interface LLMMessage {
  /** The role of who sent this message */
  role: 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Per-request generation options. Fields left out fall back to the
 * client's defaults.
 */
export interface LLMConfig {
  /** Model identifier, e.g. 'claude-sonnet-4-5-20250929' */
  model?: string;

  /** Maximum number of tokens to generate in the response */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Scoring uses a low value, conversation a higher one.
   */
  temperature?: number;

  /**
   * Abort the request if no complete response has arrived after this many
   * milliseconds. Surfaces as an LLMError of type 'timeout'.
   */
  timeoutMs?: number;
}

/**
 * Result of a complete (non-streaming) API call.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /** Token usage information, or null if the provider did not report it */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating (provider-specific) */
  stopReason: string | null;
}

/**
 * The one operation the tutoring core needs from a model provider.
 */
export interface LLMCompletionClient {
  complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 * These help distinguish between different failure modes in logs.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Provider server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  readonly type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message, { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}
