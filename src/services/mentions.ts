import type { Character } from '@/shared/types.js';

export const NO_CHARACTERS_MENTIONED = 'None mentioned on this page.';

/**
 * Characters whose name occurs anywhere in the page text, ignoring case.
 * Plain substring matching: "Al" also matches "Also".
 */
export function findMentions(pageText: string, characters: readonly Character[]): Character[] {
  const haystack = pageText.toLowerCase();
  return characters.filter((c) => haystack.includes(c.name.toLowerCase()));
}

export function formatCharacterDetails(characters: readonly Character[]): string {
  if (characters.length === 0) {
    return NO_CHARACTERS_MENTIONED;
  }
  return characters.map((c) => `${c.name} (${c.description})`).join(', ');
}
