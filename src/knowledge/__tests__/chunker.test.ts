import { describe, it, expect } from 'vitest';
import { splitText } from '../chunker';

/* ============= splitText ============= */

describe('splitText', () => {
  it('returns a single trimmed chunk for short text', () => {
    expect(splitText('  hello world  ', { chunkSize: 1000, chunkOverlap: 200 })).toEqual([
      'hello world',
    ]);
  });

  it('returns no chunks for empty or blank text', () => {
    expect(splitText('', { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
    expect(splitText('   ', { chunkSize: 10, chunkOverlap: 2 })).toEqual([]);
  });

  it('overlaps consecutive chunks by whole words', () => {
    expect(splitText('aaa bbb ccc ddd', { chunkSize: 10, chunkOverlap: 5 })).toEqual([
      'aaa bbb',
      'bbb ccc',
      'ccc ddd',
    ]);
  });

  it('drops words longer than the overlap window', () => {
    expect(splitText('aaa bbb ccc ddd', { chunkSize: 7, chunkOverlap: 3 })).toEqual([
      'aaa bbb',
      'ccc',
      'ddd',
    ]);
  });

  it('prefers paragraph boundaries', () => {
    expect(splitText('para one\n\npara two', { chunkSize: 10, chunkOverlap: 0 })).toEqual([
      'para one',
      'para two',
    ]);
  });

  it('falls back to characters for unbroken text', () => {
    expect(splitText('abcdefghij', { chunkSize: 4, chunkOverlap: 0 })).toEqual([
      'abcd',
      'efgh',
      'ij',
    ]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitText('x', { chunkSize: 5, chunkOverlap: 5 })).toThrow(RangeError);
  });
});
