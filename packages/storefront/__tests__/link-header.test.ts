import { describe, it, expect } from 'vitest';
import { extractNextCursor } from '../src/link-header.js';

describe('extractNextCursor', () => {
  it('returns null without a header', () => {
    expect(extractNextCursor(null)).toBeNull();
    expect(extractNextCursor(undefined)).toBeNull();
    expect(extractNextCursor('')).toBeNull();
  });

  it('reads the token from a single next directive', () => {
    const header = '<https://shop.example/products.json?limit=250&page_info=eyJsYXN0X2lkIjo2fQ>; rel="next"';
    expect(extractNextCursor(header)).toBe('eyJsYXN0X2lkIjo2fQ');
  });

  it('picks the next directive when previous comes first', () => {
    const header =
      '<https://shop.example/products.json?limit=250&page_info=PREV_CURSOR>; rel="previous", ' +
      '<https://shop.example/products.json?limit=250&page_info=NEXT_CURSOR>; rel="next"';
    expect(extractNextCursor(header)).toBe('NEXT_CURSOR');
  });

  it('returns null on the last page', () => {
    const header = '<https://shop.example/products.json?limit=250&page_info=PREV_CURSOR>; rel="previous"';
    expect(extractNextCursor(header)).toBeNull();
  });

  it('returns null when the next URL has no page_info', () => {
    expect(extractNextCursor('<https://shop.example/products.json?limit=250>; rel="next"')).toBeNull();
    expect(extractNextCursor('<https://shop.example/products.json?limit=250&page_info=>; rel="next"')).toBeNull();
  });

  it('trims a trailing fragment', () => {
    const header = '<https://shop.example/products.json?page_info=abc123#top>; rel="next"';
    expect(extractNextCursor(header)).toBe('abc123');
  });
});
