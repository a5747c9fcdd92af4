/**
 * API Types
 *
 * Response envelopes and request body schemas for the writing tutor API.
 * Every endpoint answers with either
 *
 * ```json
 * { "success": true, "data": { ... } }
 * ```
 *
 * or
 *
 * ```json
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "..." } }
 * ```
 *
 * Request bodies are validated with the zod schemas below before they reach a
 * route handler (see middleware/validate.ts).
 */

import { z } from 'zod';
import type { Turn, WritingEvaluation } from '../core/models';
import type { ScoreBand } from '../core/scoring';
import type { SessionSnapshot, TutorMode } from '../core/session';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  data: T;
}

export interface ApiError {
  /**
   * Machine-readable code, e.g. 'NOT_FOUND', 'VALIDATION_ERROR', 'CONFLICT'
   */
  code: string;
  /** Human-readable message */
  message: string;
  /** Extra context such as per-field validation failures */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One failed field in a validation error response.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path to the field, e.g. 'settings.grade' */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/** Submissions and messages are capped to keep prompts bounded */
export const MAX_TEXT_LENGTH = 10_000;

const label = z.string().trim().min(1, 'Must not be empty').max(100);

/**
 * Writing settings. Any non-empty label is accepted; the option lists are
 * suggestions for pickers, not an allow-list.
 */
export const writingContextSchema = z.object({
  grade: label,
  subject: label,
  writingType: label,
});

export const settingsUpdateSchema = writingContextSchema
  .partial()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one setting must be provided',
  });

export type SettingsUpdateInput = z.infer<typeof settingsUpdateSchema>;

export const tutorModeSchema = z.enum(['evaluate', 'chat']);

/**
 * POST /api/evaluate
 *
 * Short text is allowed here; the evaluator answers it with the too-short
 * result rather than a validation error.
 */
export const evaluateRequestSchema = writingContextSchema.extend({
  text: z.string().max(MAX_TEXT_LENGTH),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;

/**
 * Earlier turns a stateless client sends along with a chat message.
 */
export const conversationTurnSchema = z.discriminatedUnion('role', [
  z.object({
    role: z.literal('student'),
    content: z.string().max(MAX_TEXT_LENGTH),
  }),
  z.object({
    role: z.literal('tutor'),
    content: z.string().max(MAX_TEXT_LENGTH),
    score: z.number().finite().optional(),
  }),
]);

/**
 * POST /api/converse
 */
export const converseRequestSchema = writingContextSchema.extend({
  message: z.string().trim().min(1, 'Message must not be empty').max(MAX_TEXT_LENGTH),
  turns: z.array(conversationTurnSchema).max(100).default([]),
});

export type ConverseRequest = z.infer<typeof converseRequestSchema>;

/**
 * POST /api/sessions
 */
export const createSessionSchema = z.object({
  mode: tutorModeSchema.optional(),
  settings: writingContextSchema.partial().optional(),
});

export type CreateSessionInput = z.infer<typeof createSessionSchema>;

/**
 * PUT /api/sessions/:id/mode
 */
export const setModeSchema = z.object({
  mode: tutorModeSchema,
});

/**
 * POST /api/sessions/:id/messages
 *
 * The text is stored as sent, indentation included; only a blank message is
 * rejected.
 */
export const submitMessageSchema = z.object({
  text: z
    .string()
    .max(MAX_TEXT_LENGTH)
    .refine((text) => text.trim().length > 0, 'Message must not be empty'),
});

// ============================================================================
// Response Payloads
// ============================================================================

/**
 * Turn as sent over the wire, with an ISO timestamp.
 */
export interface TurnPayload {
  id: string;
  role: Turn['role'];
  content: string;
  score?: number;
  createdAt: string;
}

export interface SessionPayload {
  id: string;
  mode: TutorMode;
  settings: SessionSnapshot['settings'];
  turns: TurnPayload[];
  isProcessing: boolean;
  createdAt: string;
  lastActivityAt: string;
}

export type EvaluationPayload = WritingEvaluation & { band: ScoreBand };

export interface SubmitMessagePayload {
  mode: TutorMode;
  studentTurn: TurnPayload;
  tutorTurn: TurnPayload;
  evaluation?: EvaluationPayload;
}

export interface ConversePayload {
  reply: string;
}
