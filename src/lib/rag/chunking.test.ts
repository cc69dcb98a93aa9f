import { describe, it, expect } from 'vitest';
import { chunkText, cleanText, estimatePageNumber } from './chunking';
import { ErrorCode, RagError } from './errors';

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

describe('cleanText', () => {
  it('replaces unsafe characters and collapses whitespace', () => {
    expect(cleanText('Hello,   world! @home\n\tnew#line')).toBe('Hello, world! home new line');
  });

  it('keeps letters from other scripts and the allowed punctuation', () => {
    expect(cleanText('  café (naïve); ok? — yes: 1-2 ')).toBe('café (naïve); ok? yes: 1-2');
  });
});

describe('chunkText', () => {
  it('splits 1200 words into windows of 500 with 50 words of overlap', () => {
    const chunks = chunkText(words(1200), { chunkSize: 500, overlap: 50 });

    expect(chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2]);
    expect(chunks.map((c) => c.wordCount)).toEqual([500, 500, 300]);
    expect(chunks[1].content.startsWith('w450 ')).toBe(true);
    expect(chunks[2].content.startsWith('w900 ')).toBe(true);
    expect(chunks[2].content.endsWith(' w1199')).toBe(true);
  });

  it('uses 500/50 when no options are given', () => {
    const chunks = chunkText(words(1200));
    expect(chunks.map((c) => c.wordCount)).toEqual([500, 500, 300]);
  });

  it('produces the expected chunk count and word counts for every configuration', () => {
    for (let chunkSize = 1; chunkSize <= 6; chunkSize++) {
      for (let overlap = 0; overlap < chunkSize; overlap++) {
        for (let n = 1; n <= 20; n++) {
          const chunks = chunkText(words(n), { chunkSize, overlap });
          const step = chunkSize - overlap;

          expect(chunks).toHaveLength(Math.max(1, Math.ceil((n - overlap) / step)));
          chunks.slice(0, -1).forEach((chunk) => expect(chunk.wordCount).toBe(chunkSize));

          const last = chunks[chunks.length - 1];
          expect(last.wordCount).toBeGreaterThanOrEqual(1);
          expect(last.wordCount).toBeLessThanOrEqual(chunkSize);
          expect(last.content.endsWith(`w${n - 1}`)).toBe(true);
        }
      }
    }
  });

  it('covers the token sequence without gaps', () => {
    const tokens = words(23).split(' ');
    const chunks = chunkText(tokens.join(' '), { chunkSize: 5, overlap: 2 });

    chunks.forEach((chunk, i) => {
      expect(chunk.content).toBe(tokens.slice(i * 3, i * 3 + chunk.wordCount).join(' '));
    });
    const covered = new Set(chunks.flatMap((chunk) => chunk.content.split(' ')));
    expect(covered.size).toBe(tokens.length);
  });

  it('computes offsets into the normalized text', () => {
    const text = 'The  quick\nbrown fox, jumps* over the lazy dog!';
    const normalized = cleanText(text);
    const chunks = chunkText(text, { chunkSize: 3, overlap: 1 });

    expect(chunks.map((c) => [c.startChar, c.endChar])).toEqual([
      [0, 15],
      [10, 26],
      [21, 35],
      [32, 45],
    ]);
    chunks.forEach((chunk) => {
      expect(normalized.slice(chunk.startChar, chunk.endChar)).toBe(chunk.content);
      expect(chunk.endChar).toBeGreaterThan(chunk.startChar);
    });
  });

  it('returns no chunks for text without words', () => {
    expect(chunkText('')).toEqual([]);
    expect(chunkText('  @@@  ### \n')).toEqual([]);
  });

  it('returns a single chunk for short text', () => {
    expect(chunkText('alpha beta gamma')).toEqual([
      {
        chunkIndex: 0,
        content: 'alpha beta gamma',
        startChar: 0,
        endChar: 16,
        wordCount: 3,
        pageNumber: 1,
      },
    ]);
  });

  it.each([
    { chunkSize: 5, overlap: 5 },
    { chunkSize: 5, overlap: 8 },
    { chunkSize: 0, overlap: 0 },
    { chunkSize: 5, overlap: -1 },
    { chunkSize: 2.5, overlap: 0 },
  ])('rejects chunkSize=$chunkSize overlap=$overlap', (options) => {
    try {
      chunkText('some text here', options);
      expect.unreachable('chunkText should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RagError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIGURATION });
    }
  });

  it('interpolates page numbers from the chunk count', () => {
    const chunks = chunkText(words(120), { chunkSize: 10, overlap: 0 });
    expect(chunks.map((c) => c.pageNumber)).toEqual([1, 1, 1, 1, 1, 1, 2, 2, 2, 3, 3, 3]);
  });

  it('interpolates page numbers from a known page count', () => {
    const chunks = chunkText(words(40), { chunkSize: 10, overlap: 0, totalPages: 8 });
    expect(chunks.map((c) => c.pageNumber)).toEqual([1, 2, 4, 6]);
  });
});

describe('estimatePageNumber', () => {
  it('assumes three chunks per page when the page count is unknown', () => {
    expect(estimatePageNumber(0, 10)).toBe(1);
    expect(estimatePageNumber(9, 10)).toBe(2);
    expect(estimatePageNumber(4, 10, 0)).toBe(1);
  });

  it('uses the known page count', () => {
    expect(estimatePageNumber(5, 10, 20)).toBe(10);
  });

  it('never returns less than 1', () => {
    expect(estimatePageNumber(0, 0)).toBe(1);
    expect(estimatePageNumber(0, 5, 100)).toBe(1);
  });
});
