/**
 * Lower-cased words of free text, split on single spaces.
 * Empty fragments from repeated spaces are dropped.
 */
export function extractKeywords(texts: readonly string[]): string[] {
  const words: string[] = [];
  for (const text of texts) {
    for (const word of text.toLowerCase().split(' ')) {
      if (word.length > 0) words.push(word);
    }
  }
  return words;
}

/**
 * Case-insensitive substring scan. Plain containment: negations such as
 * "no betrayal" still match.
 */
export function containsAnyKeyword(
  text: string,
  keywords: readonly string[],
): boolean {
  const haystack = text.toLowerCase();
  return keywords.some((k) => haystack.includes(k.toLowerCase()));
}
