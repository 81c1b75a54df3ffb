import { describe, it, expect } from 'vitest';
import { flattenNumberedEntries } from '../src/numbered.js';

describe('flattenNumberedEntries', () => {
  it('orders numbered entries by numeric key and drops named siblings', () => {
    const value = { summary: { count: 3 }, '10': 'c', '2': 'b', '0': 'a' };
    expect(flattenNumberedEntries(value)).toEqual(['a', 'b', 'c']);
  });

  it('passes an array through', () => {
    expect(flattenNumberedEntries([1, 2])).toEqual([1, 2]);
  });

  it('returns an empty list for non-objects', () => {
    expect(flattenNumberedEntries(null)).toEqual([]);
    expect(flattenNumberedEntries('0')).toEqual([]);
    expect(flattenNumberedEntries({ session: {} })).toEqual([]);
  });
});
