/**
 * Anthropic Client
 *
 * The production LLMCompletionClient: one non-streaming Messages API call per
 * complete(), bounded by a per-request timeout, with SDK errors mapped onto
 * LLMError types.
 *
 * The SDK's own retries are turned off. The writing evaluator runs its own
 * attempt budget and the tutor makes a single attempt, so a second retry
 * layer here would multiply the calls.
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ timeoutMs: 20_000 });
 * const response = await client.complete(prompt, { temperature: 0.3, maxTokens: 800 });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages/messages';
import type { LLMMessage, LLMConfig, LLMResponse, LLMCompletionClient } from './types';
import { config as appConfig } from '../config';
import { LLMError, type LLMErrorType } from './types';

// Used when neither the constructor nor the call sets them
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;

/**
 * Options for constructing the client. Anything not given comes from the
 * application configuration.
 */
export interface AnthropicClientOptions extends LLMConfig {
  /** API key; defaults to ANTHROPIC_API_KEY */
  apiKey?: string;
}

export class AnthropicClient implements LLMCompletionClient {
  private readonly client: Anthropic;
  private readonly defaultConfig: Required<LLMConfig>;

  /**
   * @throws LLMError if no API key is configured
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({ maxTokens: 800, timeoutMs: 15_000 });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? appConfig.anthropic.apiKey;
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey, maxRetries: 0 });

    this.defaultConfig = {
      model: options.model ?? appConfig.anthropic.model,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      timeoutMs: options.timeoutMs ?? appConfig.anthropic.requestTimeoutMs,
    };
  }

  /**
   * @param config - Overrides the client defaults for this call only
   * @throws LLMError on any failure, including the timeout
   */
  async complete(
    messages: string | LLMMessage[],
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.toMessageParams(messages);
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create(
        {
          model: mergedConfig.model,
          max_tokens: mergedConfig.maxTokens,
          temperature: mergedConfig.temperature,
          messages: formattedMessages,
        },
        { timeout: mergedConfig.timeoutMs }
      );

      if (response.stop_reason === 'max_tokens') {
        console.warn(
          `[AnthropicClient] Reply cut off at ${mergedConfig.maxTokens} tokens; JSON replies may not parse`
        );
      }

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw toLLMError(error);
    }
  }

  /**
   * A bare string becomes a single user message.
   */
  private toMessageParams(input: string | LLMMessage[]): MessageParam[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input.map(({ role, content }) => ({ role, content }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
      timeoutMs: config.timeoutMs ?? this.defaultConfig.timeoutMs,
    };
  }

  /**
   * Concatenates the text blocks of a response, ignoring any other block types.
   */
  private extractText(
    content: Anthropic.Messages.ContentBlock[]
  ): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }
}

// ============================================================================
// Error mapping
// ============================================================================

const STATUS_ERROR_TYPES: ReadonlyArray<[new (...args: never[]) => APIError, LLMErrorType]> = [
  [AuthenticationError, 'authentication'],
  [RateLimitError, 'rate_limit'],
  [BadRequestError, 'invalid_request'],
  [InternalServerError, 'server_error'],
];

/**
 * Converts anything the SDK throws into an LLMError. The evaluator counts
 * every one of these as a transport failure; the type only feeds the logs
 * and the CLI's message for a bad key.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  // APIConnectionTimeoutError extends APIConnectionError, so it goes first
  if (error instanceof APIConnectionTimeoutError) {
    return new LLMError('Request to Anthropic API timed out', 'timeout', error);
  }
  if (error instanceof APIConnectionError) {
    return new LLMError('Failed to connect to Anthropic API', 'network', error);
  }
  if (error instanceof APIError) {
    const match = STATUS_ERROR_TYPES.find(([errorClass]) => error instanceof errorClass);
    return new LLMError(error.message, match ? match[1] : 'unknown', error);
  }

  if (error instanceof Error) {
    return new LLMError(error.message, 'unknown', error);
  }
  return new LLMError(String(error), 'unknown');
}
