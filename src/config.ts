/**
 * Centralized Configuration Module
 *
 * Loads configuration for the Writing Tutor from environment variables and
 * validates it with zod. Entry points load `.env` through dotenv before this
 * module is imported.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.anthropic.requestTimeoutMs);
 *
 *   // Throws ConfigValidationError if production requirements are not met
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Anthropic API configuration
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    /** Upper bound for a single model call; each retry attempt gets its own budget */
    requestTimeoutMs: z.number().int().positive().default(30_000),
  }),

  // In-memory tutoring sessions
  sessions: z.object({
    ttlMs: z.number().int().positive().default(2 * 60 * 60 * 1000),
    maxSessions: z.number().int().positive().default(1000),
  }),

  // Rate limiting configuration
  rateLimit: z.object({
    windowMs: z.number().int().positive().default(60000),
    maxRequests: z.number().int().positive().default(100),
    llmMaxRequests: z.number().int().positive().default(10),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Reads the raw configuration from an environment map. Missing values are left
 * undefined so the schema defaults apply; enum values are checked by the schema.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv) {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      model: env.ANTHROPIC_MODEL,
      requestTimeoutMs: parseIntOrUndefined(env.LLM_REQUEST_TIMEOUT_MS),
    },
    sessions: {
      ttlMs: parseIntOrUndefined(env.SESSION_TTL_MS),
      maxSessions: parseIntOrUndefined(env.SESSION_MAX_COUNT),
    },
    rateLimit: {
      windowMs: parseIntOrUndefined(env.RATE_LIMIT_WINDOW_MS),
      maxRequests: parseIntOrUndefined(env.RATE_LIMIT_MAX_REQUESTS),
      llmMaxRequests: parseIntOrUndefined(env.RATE_LIMIT_LLM_MAX_REQUESTS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
  };
}

/**
 * Parses a configuration from an environment map.
 *
 * @throws ZodError if a value has the wrong shape (e.g. an unknown NODE_ENV)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(loadFromEnvironment(env));
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates production requirements.
 *
 * In production ANTHROPIC_API_KEY is required, and ALLOWED_ORIGINS should be
 * set so the API is not left open to any origin.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(target: Config = config): void {
  if (target.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (!target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (target.cors.allowedOrigins.length === 0) {
    invalidVars.push({
      name: 'ALLOWED_ORIGINS',
      reason: 'At least one origin must be listed in production',
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    const fullMessage = [
      'CONFIGURATION ERROR',
      ...errorParts.map((part) => `  ${part}`),
      '  Please check your .env file or environment variables.',
      '  See .env.example for the available settings.',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * Parse and validate the configuration against the schema.
 * This runs once at module load time.
 */
const parseResult = configSchema.safeParse(loadFromEnvironment(process.env));

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = parseResult.data;

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

/**
 * Helper function to check if we're running in test mode.
 */
export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

export default config;
