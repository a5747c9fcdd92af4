/**
 * Writing Tutor
 *
 * Answers a student's free-form questions about writing. Unlike evaluation,
 * a conversational reply is attempted once: if it fails the student simply
 * asks again, so the tutor returns a friendly apology instead of retrying.
 */

import type { LLMCompletionClient } from '../../llm/types';
import { buildWritingTutorPrompt } from '../../llm/prompts';
import type { Turn, WritingContext } from '../models';
import { buildTranscript, type TranscriptOptions } from './transcript';

const CONVERSATION_TEMPERATURE = 0.7;
const CONVERSATION_MAX_TOKENS = 500;

export const TUTOR_APOLOGY =
  'Sorry, something went wrong while I was writing my answer. Please ask me again!';

export interface WritingTutorOptions {
  /** Time limit for the model call, in milliseconds */
  requestTimeoutMs?: number;
  /** Window and truncation for the transcript put in the prompt */
  transcript?: TranscriptOptions;
}

export class WritingTutor {
  private readonly llmClient: LLMCompletionClient;
  private readonly options: WritingTutorOptions;

  constructor(llmClient: LLMCompletionClient, options: WritingTutorOptions = {}) {
    this.llmClient = llmClient;
    this.options = options;
  }

  /**
   * Replies to the student's message in the light of the recent conversation.
   *
   * @param recentTurns - Turns before `message`; only the last few are used
   * @returns The trimmed reply, or TUTOR_APOLOGY if the call fails or the
   *   model returns nothing
   */
  async converse(
    message: string,
    context: WritingContext,
    recentTurns: readonly Turn[]
  ): Promise<string> {
    const prompt = buildWritingTutorPrompt({
      ...context,
      transcript: buildTranscript(recentTurns, this.options.transcript),
      studentMessage: message,
    });

    try {
      const response = await this.llmClient.complete(prompt, {
        temperature: CONVERSATION_TEMPERATURE,
        maxTokens: CONVERSATION_MAX_TOKENS,
        timeoutMs: this.options.requestTimeoutMs,
      });

      const reply = response.text.trim();
      if (!reply) {
        console.warn('[WritingTutor] Model returned an empty reply');
        return TUTOR_APOLOGY;
      }
      return reply;
    } catch (error) {
      console.error(
        '[WritingTutor] Conversation failed:',
        error instanceof Error ? error.message : error
      );
      return TUTOR_APOLOGY;
    }
  }
}
