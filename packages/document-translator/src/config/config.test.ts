import { describe, expect, test } from 'vitest';

import { loadConfig } from './config';

describe('loadConfig', () => {
  test('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      success: true,
      data: {
        apiKeys: {
          google: undefined,
          anthropic: undefined,
          openai: undefined,
        },
        visionModel: 'google/gemini-2.0-flash',
        translationModel: 'anthropic/claude-3-5-sonnet-20241022',
        maxChunkSize: 2500,
        pageConcurrency: 3,
        apiTimeoutMs: 120000,
        maxAttempts: 3,
        retryBaseDelayMs: 1000,
        logLevel: 'info',
      },
    });
  });

  test('should read and coerce provided values', () => {
    const result = loadConfig({
      OPENAI_API_KEY: 'test-key',
      TRANSLATION_MODEL: 'openai/gpt-4o',
      MAX_CHUNK_SIZE: '1200',
      PAGE_CONCURRENCY: '5',
      RETRY_BASE_DELAY_MS: '0',
      LOG_LEVEL: 'debug',
      UNRELATED: 'ignored',
    });

    expect(result).toMatchObject({
      success: true,
      data: {
        apiKeys: { openai: 'test-key' },
        translationModel: 'openai/gpt-4o',
        maxChunkSize: 1200,
        pageConcurrency: 5,
        retryBaseDelayMs: 0,
        logLevel: 'debug',
      },
    });
  });

  test('should treat empty values as unset', () => {
    const result = loadConfig({ MAX_CHUNK_SIZE: '', ANTHROPIC_API_KEY: '' });

    expect(result).toMatchObject({
      success: true,
      data: { maxChunkSize: 2500, apiKeys: { anthropic: undefined } },
    });
  });

  test('should reject a model id without provider', () => {
    const result = loadConfig({ VISION_MODEL: 'gemini' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('CONFIG_ERROR');
    expect(result.error.message).toBe(
      'Invalid configuration: VISION_MODEL: Expected a "provider/model" id',
    );
  });

  test.each([
    ['PAGE_CONCURRENCY', 'zero'],
    ['PAGE_CONCURRENCY', '0'],
    ['MAX_CHUNK_SIZE', '10.5'],
    ['API_TIMEOUT_MS', '-1'],
    ['LOG_LEVEL', 'verbose'],
  ])('should reject %s=%s', (name, value) => {
    const result = loadConfig({ [name]: value });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('CONFIG_ERROR');
    expect(result.error.message.startsWith(`Invalid configuration: ${name}: `)).toBe(
      true,
    );
  });
});
