import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DatasetError,
  OptimizationError,
  PromptLearningError,
  ProviderError,
  TokenLimitError,
  classifyProviderError,
  isTransientError,
  toProviderError,
} from '../errors.js';

describe('error hierarchy', () => {
  it('roots every error at PromptLearningError', () => {
    const errors = [
      new DatasetError('d'),
      new TokenLimitError('t'),
      new OptimizationError('o'),
      new ConfigurationError('c'),
      new ProviderError('p', { category: 'api_error' }),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(PromptLearningError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(errors.map((e) => e.name)).toEqual([
      'DatasetError',
      'TokenLimitError',
      'OptimizationError',
      'ConfigurationError',
      'ProviderError',
    ]);
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    expect(new OptimizationError('wrapped', { cause }).cause).toBe(cause);
  });
});

describe('classifyProviderError', () => {
  it('uses the HTTP status when there is one', () => {
    expect(classifyProviderError({ status: 429 })).toBe('rate_limited');
    expect(classifyProviderError({ status: 408 })).toBe('timeout');
    expect(classifyProviderError({ statusCode: 504 })).toBe('timeout');
    expect(classifyProviderError({ status: 500 })).toBe('api_error');
  });

  it('falls back to the error name and message', () => {
    const timeoutError = new Error('Request timed out.');
    timeoutError.name = 'APIConnectionTimeoutError';
    expect(classifyProviderError(timeoutError)).toBe('timeout');
    expect(classifyProviderError(new Error('Rate limit exceeded'))).toBe('rate_limited');
    expect(classifyProviderError(new Error('boom'))).toBe('api_error');
    expect(classifyProviderError('boom')).toBe('api_error');
  });
});

describe('toProviderError', () => {
  it('wraps raw errors with the model name', () => {
    const raw = new Error('boom');
    const error = toProviderError(raw, 'gpt-4o');

    expect(error.message).toBe('LLM call failed (gpt-4o): boom');
    expect(error.cause).toBe(raw);
    expect(error.retryable).toBe(false);
  });

  it('returns an existing ProviderError as is', () => {
    const existing = new ProviderError('already', { category: 'timeout' });
    expect(toProviderError(existing, 'gpt-4o')).toBe(existing);
  });
});

describe('isTransientError', () => {
  it('follows the category of provider errors', () => {
    expect(isTransientError(new ProviderError('t', { category: 'timeout' }))).toBe(true);
    expect(isTransientError(new ProviderError('r', { category: 'rate_limited' }))).toBe(true);
    expect(isTransientError(new ProviderError('a', { category: 'api_error' }))).toBe(false);
  });

  it('classifies raw errors from a custom model', () => {
    expect(isTransientError(Object.assign(new Error('slow down'), { status: 429 }))).toBe(true);
    expect(isTransientError(new Error('Request timed out'))).toBe(true);
    expect(isTransientError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(false);
    expect(isTransientError(new Error('boom'))).toBe(false);
  });

  it('never retries the library\'s own errors', () => {
    expect(isTransientError(new ConfigurationError('timeout'))).toBe(false);
    expect(isTransientError(new OptimizationError('rate limit'))).toBe(false);
  });
});
