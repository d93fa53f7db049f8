import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  IntegrityError,
  SourceUnavailableError,
  TemplateErrorCode,
  TemplateNotFoundError,
  TemplateProcessingError,
  extractErrorMessage,
  isTemplateForgeError,
} from '../src/errors.js';

describe('errors', () => {
  it('should give every error its code and class name', () => {
    const errors = [
      new SourceUnavailableError('down'),
      new IntegrityError('mismatch', 'sha256:aa', 'sha256:bb'),
      new TemplateNotFoundError('vue:basic'),
      new TemplateProcessingError('bad descriptor'),
      new ConfigurationError('bad config'),
    ];

    expect(errors.map(e => e.code)).toEqual([
      TemplateErrorCode.SOURCE_UNAVAILABLE,
      TemplateErrorCode.INTEGRITY_ERROR,
      TemplateErrorCode.TEMPLATE_NOT_FOUND,
      TemplateErrorCode.TEMPLATE_PROCESSING,
      TemplateErrorCode.CONFIGURATION,
    ]);
    expect(errors.map(e => e.name)).toEqual([
      'SourceUnavailableError',
      'IntegrityError',
      'TemplateNotFoundError',
      'TemplateProcessingError',
      'ConfigurationError',
    ]);
    expect(errors.every(isTemplateForgeError)).toBe(true);
  });

  it('should carry expected and actual digests on IntegrityError', () => {
    const error = new IntegrityError('mismatch', 'sha256:aa', 'sha256:bb', { origin: 'https://example.test/a.tgz' });

    expect(error.context).toEqual({ origin: 'https://example.test/a.tgz', expected: 'sha256:aa', actual: 'sha256:bb' });
  });

  it('should keep the cause without serializing it', () => {
    const cause = new Error('socket hang up');
    const error = new SourceUnavailableError('GET failed', { url: 'https://example.test' }, cause);

    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: 'SourceUnavailableError',
      code: 'SOURCE_UNAVAILABLE',
      message: 'GET failed',
      context: { url: 'https://example.test' },
    });
  });

  it('should not treat plain errors as template errors', () => {
    expect(isTemplateForgeError(new Error('x'))).toBe(false);
  });

  it('should extract messages from anything thrown', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('text')).toBe('text');
    expect(extractErrorMessage(42)).toBe('42');
  });
});
