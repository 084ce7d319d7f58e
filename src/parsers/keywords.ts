/**
 * Keyword matching shared by the financial context detector and the
 * transaction type classifier.
 *
 * A keyword matches case-insensitively anywhere in the text, as long as it
 * starts a word: "rs" counts in "Rs. 500" but not in "hours.". Keywords that
 * begin with a symbol ("₹") match anywhere.
 */

export interface KeywordHit {
  keyword: string;
  start: number;
  end: number;
}

function startsWord(text: string, index: number): boolean {
  if (index === 0) return true;
  return !/[a-z0-9]/i.test(text.charAt(index - 1));
}

export function findKeyword(text: string, keyword: string): KeywordHit[] {
  const lower = text.toLowerCase();
  const needle = keyword.toLowerCase();
  const hits: KeywordHit[] = [];
  const anchored = /^[a-z0-9]/.test(needle);

  let index = lower.indexOf(needle);
  while (index !== -1) {
    if (!anchored || startsWord(lower, index)) {
      hits.push({ keyword, start: index, end: index + needle.length });
    }
    index = lower.indexOf(needle, index + 1);
  }

  return hits;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return findKeyword(text, keyword).length > 0;
}

export function findKeywords(text: string, keywords: readonly string[]): KeywordHit[] {
  return keywords
    .flatMap(keyword => findKeyword(text, keyword))
    .sort((a, b) => a.start - b.start);
}

export function matchedKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter(keyword => containsKeyword(text, keyword));
}

/**
 * Character gap between two spans; 0 when they touch or overlap.
 */
export function spanDistance(a: { start: number; end: number }, b: { start: number; end: number }): number {
  if (a.end <= b.start) return b.start - a.end;
  if (b.end <= a.start) return a.start - b.end;
  return 0;
}
