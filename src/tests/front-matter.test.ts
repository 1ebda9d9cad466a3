/**
 * Tests for extractFrontMatter — splitting, line offsets, validation.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { extractFrontMatter } from '../deck/frontMatter';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('extractFrontMatter', () => {
  it('leaves decks without front matter alone', () => {
    expect(extractFrontMatter('* A\n---\n')).toEqual({
      metadata: null,
      body: '* A\n---\n',
      lineOffset: 0,
    });
  });

  it('splits metadata from the body', () => {
    expect(
      extractFrontMatter('---\ntitle: T\ntags: [a, b]\ndate: 2024\n---\n* A\n'),
    ).toEqual({
      metadata: { title: 'T', tags: ['a', 'b'], date: '2024', authors: [] },
      body: '* A\n',
      lineOffset: 5,
    });
  });

  it('counts lines the same with CRLF endings', () => {
    const split = extractFrontMatter('---\r\ntitle: T\r\n---\r\n* A');
    expect(split.lineOffset).toBe(3);
    expect(split.body).toBe('* A');
    expect(split.metadata?.title).toBe('T');
  });

  it('accepts a block that ends the input', () => {
    expect(extractFrontMatter('---\ntitle: T\n---')).toMatchObject({
      body: '',
      lineOffset: 3,
    });
  });

  it('reads an empty block as empty metadata', () => {
    expect(extractFrontMatter('---\n\n---\n* A').metadata).toEqual({
      tags: [],
      authors: [],
    });
  });

  it('drops metadata of the wrong shape but keeps the body', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const split = extractFrontMatter('---\nauthors: 7\n---\n* A\n');
    expect(split.metadata).toBeNull();
    expect(split.body).toBe('* A\n');
    expect(split.lineOffset).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
