import { describe, it, expect } from 'vitest';
import { ApproximateCounter, TiktokenCounter, encodingForModel } from '../token-counter.js';

describe('TiktokenCounter', () => {
  it('counts sub-word tokens', () => {
    const counter = new TiktokenCounter();
    expect(counter.encoding).toBe('cl100k_base');
    expect(counter.count('hello world')).toBe(2);
  });

  it('counts absent and empty values as zero', () => {
    const counter = new TiktokenCounter();
    expect(counter.count(null)).toBe(0);
    expect(counter.count(undefined)).toBe(0);
    expect(counter.count('')).toBe(0);
  });

  it('counts special-token markup as ordinary text', () => {
    const counter = new TiktokenCounter();
    expect(counter.count('see <|endoftext|> here')).toBeGreaterThan(1);
    expect(counter.countRows([{ output: '<|endoftext|>' }], ['output'])[0]).toBeGreaterThan(1);
  });

  it('picks the encoding from the model family', () => {
    expect(new TiktokenCounter({ model: 'gpt-4o' }).encoding).toBe('o200k_base');
    expect(new TiktokenCounter({ model: 'gpt-4' }).encoding).toBe('cl100k_base');
    expect(new TiktokenCounter({ model: 'gpt-4o', encoding: 'cl100k_base' }).encoding).toBe(
      'cl100k_base'
    );
  });
});

describe('encodingForModel', () => {
  it('matches whole family names only', () => {
    expect(encodingForModel('gpt-5-mini')).toBe('o200k_base');
    expect(encodingForModel('GPT-4o-2024-08-06')).toBe('o200k_base');
    expect(encodingForModel('gpt-4-turbo')).toBe('cl100k_base');
    expect(encodingForModel('claude-sonnet-4-5')).toBe('cl100k_base');
  });
});

describe('ApproximateCounter', () => {
  const counter = new ApproximateCounter();

  it('counts one token per four characters, rounded down', () => {
    expect(counter.count('abcdefghij')).toBe(2);
    expect(counter.count('abc')).toBe(0);
    expect(counter.count(12345678)).toBe(2);
    expect(counter.count(null)).toBe(0);
  });

  it('estimates the same as it counts', () => {
    expect(counter.estimate('abcdefghij')).toBe(2);
  });

  it('sums the named columns of each row, skipping missing ones', () => {
    const rows = [
      { a: 'abcd', b: null },
      { a: 'abcdabcd', b: 'abcd' },
    ];
    expect(counter.countRows(rows, ['a', 'b', 'c'])).toEqual([1, 3]);
  });

  it('rounds a row once, over all of its columns', () => {
    expect(counter.countRows([{ a: 'abc', b: 'def' }], ['a', 'b'])).toEqual([1]);
  });
});
