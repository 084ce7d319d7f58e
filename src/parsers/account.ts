/**
 * Account reference extraction.
 *
 * Senders write account numbers in many shapes: "A/c no. XX1234",
 * "account ending 5678", "**4321", or a bare run of digits. Masking is
 * preserved (normalized to lowercase x) so the stored reference still shows
 * which digits the bank hid.
 */

import { findKeyword, findKeywords, spanDistance } from './keywords';

export type AccountTier = 'context' | 'masked' | 'ending' | 'bare';

export interface AccountCandidate {
  value: string;
  start: number;
  end: number;
  tier: AccountTier;
}

// The token after a marker holds digits and mask characters only, joined by
// single spaces or hyphens ("XXXX 1234", "1234-5678"). Letters are left out
// so the capture stops before the next word.
const CONTEXT_PATTERN =
  /(?:\ba\/c|\bacct|\baccount|\bending)\.?\s*(?:no\.?|number)?\s*[:-]?\s*([x*0-9](?:[x*0-9]|[- ](?=[x*0-9])){2,19})(?![a-z0-9])/gi;

const MASKED_PATTERN = /(?<![a-z0-9])[x*]{2,}[-\s]?[0-9]{2,6}(?![0-9])/gi;

const ENDING_PATTERN = /\bending\s+([0-9]{4})\b/gi;

const BARE_DIGITS_PATTERN = /(?<![0-9])[0-9]{8,18}(?![0-9])/g;

const CARD_SHAPE_PATTERN = /(?<![0-9])[0-9]{4}[ -]?[0-9]{4}[ -]?[0-9]{4}[ -]?[0-9]{4}(?![0-9])/g;

const CARD_WINDOW = 30;
const PROXIMITY_WINDOW = 100;

export const ACCOUNT_KEYWORDS: readonly string[] = [
  'credited to',
  'debited from',
  'from account',
  'to account',
  'a/c',
  'account',
  'ac no',
  'account no',
  'account number',
  'acct',
];

/**
 * Canonical form of an account token: mask characters become "x", spaces
 * and hyphens are dropped. Returns null for anything too short to identify an
 * account or made of one repeated digit ("0000").
 */
export function normalizeAccount(raw: string): string | null {
  const value = raw.replace(/[xX*]/g, 'x').replace(/[\s-]/g, '');
  if (value.length < 4) return null;
  if (!/^[x0-9]+$/.test(value)) return null;
  if (/^([0-9])\1*$/.test(value)) return null;
  return value;
}

function collect(
  text: string,
  pattern: RegExp,
  tier: AccountTier,
  accept: (start: number, end: number) => boolean = () => true
): AccountCandidate[] {
  const candidates: AccountCandidate[] = [];

  for (const match of text.matchAll(pattern)) {
    if (match.index === undefined) continue;
    // The captured group, when present, always ends the match
    const token = match[1] ?? match[0];
    const start = match.index + match[0].length - token.length;
    const end = start + token.length;
    if (!accept(start, end)) continue;

    const value = normalizeAccount(token);
    if (value) candidates.push({ value, start, end, tier });
  }

  return candidates;
}

function spans(text: string, pattern: RegExp): Array<{ start: number; end: number }> {
  const result: Array<{ start: number; end: number }> = [];
  for (const match of text.matchAll(pattern)) {
    if (match.index === undefined) continue;
    result.push({ start: match.index, end: match.index + match[0].length });
  }
  return result;
}

function bareCandidates(text: string): AccountCandidate[] {
  const cardShapes = spans(text, CARD_SHAPE_PATTERN);
  const cardWords = findKeyword(text, 'card');

  return collect(text, BARE_DIGITS_PATTERN, 'bare', (start, end) => {
    const span = { start, end };
    if (cardShapes.some(card => start < card.end && card.start < end)) return false;
    return !cardWords.some(word => spanDistance(word, span) <= CARD_WINDOW);
  });
}

/**
 * Candidates of the first tier that produced any, in discovery order.
 */
export function findAccounts(text: string): AccountCandidate[] {
  if (!text.trim()) return [];

  const tiers: Array<() => AccountCandidate[]> = [
    () => collect(text, CONTEXT_PATTERN, 'context'),
    () => collect(text, MASKED_PATTERN, 'masked'),
    () => collect(text, ENDING_PATTERN, 'ending'),
    () => bareCandidates(text),
  ];

  for (const tier of tiers) {
    const candidates = tier();
    if (candidates.length > 0) return candidates;
  }
  return [];
}

export function extractAll(text: string): string[] {
  const seen = new Set<string>();
  for (const candidate of findAccounts(text)) {
    seen.add(candidate.value);
  }
  return [...seen];
}

export function hasAccount(text: string): boolean {
  return findAccounts(text).length > 0;
}

/**
 * Nearest candidate to an account keyword, within 100 characters. At equal
 * distance a candidate following the keyword wins over one preceding it, and
 * then the one found first. With no keyword nearby, masked references are
 * preferred.
 */
export function selectPrimaryAccount(candidates: AccountCandidate[], text: string): AccountCandidate | null {
  if (candidates.length === 0) return null;

  const hits = findKeywords(text, ACCOUNT_KEYWORDS);
  let best: { candidate: AccountCandidate; distance: number; after: boolean } | null = null;

  for (const candidate of candidates) {
    for (const hit of hits) {
      const distance = spanDistance(candidate, hit);
      if (distance > PROXIMITY_WINDOW) continue;

      const after = candidate.start >= hit.end;
      if (
        !best ||
        distance < best.distance ||
        (distance === best.distance && after && !best.after)
      ) {
        best = { candidate, distance, after };
      }
    }
  }

  if (best) return best.candidate;
  return candidates.find(candidate => candidate.value.includes('x')) ?? candidates[0];
}

export function extractPrimary(text: string): string | null {
  return selectPrimaryAccount(findAccounts(text), text)?.value ?? null;
}
