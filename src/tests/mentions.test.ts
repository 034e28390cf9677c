import { describe, it, expect } from '@jest/globals';
import { findMentions, formatCharacterDetails, NO_CHARACTERS_MENTIONED } from '@/services/mentions';
import type { Character } from '@/shared/types';

const luna: Character = { name: 'Luna', description: 'a curious girl' };
const max: Character = { name: 'Max', description: 'a friendly dog' };
const al: Character = { name: 'Al', description: 'an old owl' };

describe('findMentions', () => {
  it('matches names regardless of case', () => {
    expect(findMentions('luna ran home', [luna])).toEqual([luna]);
    expect(findMentions('LUNA RAN HOME', [luna])).toEqual([luna]);
  });

  it('keeps roster order, not text order', () => {
    expect(findMentions('Max chased Luna around the tree.', [luna, max])).toEqual([luna, max]);
  });

  it('counts a name inside another word', () => {
    expect(findMentions('Also, the sun was bright.', [al])).toEqual([al]);
  });

  it('returns nothing when no name occurs', () => {
    expect(findMentions('The wind blew softly.', [luna, max])).toEqual([]);
  });
});

describe('formatCharacterDetails', () => {
  it('lists name and description pairs', () => {
    expect(formatCharacterDetails([luna, max])).toBe('Luna (a curious girl), Max (a friendly dog)');
  });

  it('uses the explicit marker when nobody is mentioned', () => {
    expect(formatCharacterDetails([])).toBe(NO_CHARACTERS_MENTIONED);
  });
});
