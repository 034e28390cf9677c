import { describe, it, expect } from '@jest/globals';
import { formatTimestamp, pageImageFilename, sanitizeFilename } from '@/shared/utils';

describe('sanitizeFilename', () => {
  it('drops punctuation and joins words with underscores', () => {
    expect(sanitizeFilename("Luna's  big\tday!")).toBe('Lunas_big_day');
  });

  it('keeps hyphens and non-latin letters', () => {
    expect(sanitizeFilename('João e o dragão-azul')).toBe('João_e_o_dragão-azul');
  });

  it('trims underscores and cuts to the maximum length', () => {
    expect(sanitizeFilename('  _hello world_  ')).toBe('hello_world');
    expect(sanitizeFilename('abcdefghij', 4)).toBe('abcd');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(sanitizeFilename('?!...')).toBe('');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 11, 31, 23, 5, 9))).toBe('20241231_230509');
  });
});

describe('pageImageFilename', () => {
  it('pads the page number to two digits', () => {
    expect(pageImageFilename(3)).toBe('page_03.png');
    expect(pageImageFilename(12, 'webp')).toBe('page_12.webp');
  });
});
