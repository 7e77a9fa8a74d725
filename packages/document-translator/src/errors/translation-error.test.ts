import { describe, expect, test } from 'vitest';

import { TranslationError } from './translation-error';

describe('TranslationError', () => {
  test('should carry code, name and cause', () => {
    const cause = new Error('socket hang up');
    const error = new TranslationError('PROVIDER_ERROR', 'Call failed', {
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TranslationError');
    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.message).toBe('Call failed');
    expect(error.cause).toBe(cause);
  });

  describe('getErrorMessage', () => {
    test('should read the message of an Error', () => {
      expect(TranslationError.getErrorMessage(new Error('boom'))).toBe('boom');
    });

    test('should stringify other values', () => {
      expect(TranslationError.getErrorMessage('plain')).toBe('plain');
      expect(TranslationError.getErrorMessage(42)).toBe('42');
    });
  });

  describe('fromError', () => {
    test('should wrap unknown errors with context', () => {
      const cause = new Error('rate limited');
      const error = TranslationError.fromError(
        'PROVIDER_ERROR',
        'Model call failed',
        cause,
      );

      expect(error.code).toBe('PROVIDER_ERROR');
      expect(error.message).toBe('Model call failed: rate limited');
      expect(error.cause).toBe(cause);
    });

    test('should pass a TranslationError through', () => {
      const original = new TranslationError('CONFIG_ERROR', 'No API key');

      expect(
        TranslationError.fromError('PROVIDER_ERROR', 'Model call failed', original),
      ).toBe(original);
    });
  });

  describe('isRetryable', () => {
    test('should retry provider and content errors only', () => {
      expect(
        TranslationError.isRetryable(new TranslationError('PROVIDER_ERROR', '')),
      ).toBe(true);
      expect(
        TranslationError.isRetryable(new TranslationError('CONTENT_ERROR', '')),
      ).toBe(true);
      expect(
        TranslationError.isRetryable(new TranslationError('CONFIG_ERROR', '')),
      ).toBe(false);
      expect(
        TranslationError.isRetryable(
          new TranslationError('TRANSLATION_ERROR', ''),
        ),
      ).toBe(false);
    });
  });
});
