/**
 * Configuration Tests
 *
 * loadConfig is fed explicit environment maps so the tests do not depend on
 * the machine's environment or a .env file.
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { ConfigValidationError, loadConfig, validateConfig } from '../../src/config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 3001, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.anthropic.requestTimeoutMs).toBe(30000);
    expect(config.sessions).toEqual({ ttlMs: 7200000, maxSessions: 1000 });
    expect(config.rateLimit).toEqual({ windowMs: 60000, maxRequests: 100, llmMaxRequests: 10 });
    expect(config.cors.allowedOrigins).toEqual([]);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '4000',
      NODE_ENV: 'production',
      ANTHROPIC_API_KEY: 'test-secret',
      ANTHROPIC_MODEL: 'test-model',
      LLM_REQUEST_TIMEOUT_MS: '15000',
      SESSION_MAX_COUNT: '5',
      ALLOWED_ORIGINS: 'https://tutor.example.com, https://admin.example.com,',
    });

    expect(config.server.port).toBe(4000);
    expect(config.server.nodeEnv).toBe('production');
    expect(config.anthropic).toEqual({
      apiKey: 'test-secret',
      model: 'test-model',
      requestTimeoutMs: 15000,
    });
    expect(config.sessions.maxSessions).toBe(5);
    expect(config.cors.allowedOrigins).toEqual([
      'https://tutor.example.com',
      'https://admin.example.com',
    ]);
  });

  it('falls back to the default for non-numeric values', () => {
    expect(loadConfig({ PORT: 'not-a-port' }).server.port).toBe(3001);
  });

  it('treats an empty API key as missing', () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: '' }).anthropic.apiKey).toBeUndefined();
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ZodError);
  });
});

describe('validateConfig', () => {
  it('accepts any development configuration', () => {
    expect(() => validateConfig(loadConfig({}))).not.toThrow();
  });

  it('requires an API key and allowed origins in production', () => {
    const config = loadConfig({ NODE_ENV: 'production' });

    let caught: unknown;
    try {
      validateConfig(config);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.missingVars).toEqual(['ANTHROPIC_API_KEY']);
      expect(caught.invalidVars.map((v) => v.name)).toEqual(['ALLOWED_ORIGINS']);
    }
  });

  it('passes a complete production configuration', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      ANTHROPIC_API_KEY: 'test-secret',
      ALLOWED_ORIGINS: 'https://tutor.example.com',
    });

    expect(() => validateConfig(config)).not.toThrow();
  });
});
