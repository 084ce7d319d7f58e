/**
 * Amount extraction for Indian bank and payment SMS.
 *
 * Three tiers are tried in order and the first one that yields anything wins:
 *   1. currency-qualified numbers ("Rs.1,500.00", "INR 250", "₹99", "500 rupees")
 *   2. spelled-out amounts ("Five Thousand Five Hundred", "Two Lakh")
 *   3. bare numbers between 1 and 100,000,000
 */

import { findKeywords, spanDistance } from './keywords';

export type AmountTier = 'currency' | 'words' | 'bare';

export interface AmountCandidate {
  value: number;
  start: number;
  end: number;
  tier: AmountTier;
}

const PREFIXED_AMOUNT_PATTERN = /(?:₹|\bRs\.?|\bINR|\brupees?)\s*([0-9][0-9,]*(?:\.[0-9]{1,2})?)/gi;

// Suffix form ("500 INR"); the number must start its own token
const SUFFIXED_AMOUNT_PATTERN = /(?<![\w.,])([0-9][0-9,]*(?:\.[0-9]{1,2})?)\s*(?:₹|Rs\b\.?|INR\b|rupees?\b)/gi;

const BARE_NUMBER_PATTERN = /\b[0-9][0-9,]*(?:\.[0-9]{1,2})?\b/g;

const CURRENCY_MARKERS = /₹|\bRs\.?|\bINR|\brupees?\b/gi;

const WORD_VALUES: Readonly<Record<string, number>> = {
  zero: 0, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9,
  ten: 10, eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16,
  seventeen: 17, eighteen: 18, nineteen: 19, twenty: 20, thirty: 30, forty: 40, fifty: 50,
  sixty: 60, seventy: 70, eighty: 80, ninety: 90,
  hundred: 100, thousand: 1000, lakh: 100000, lakhs: 100000, lac: 100000, lacs: 100000,
  crore: 10000000, crores: 10000000, million: 1000000, billion: 1000000000,
};

const NUMBER_WORD = `(?:${Object.keys(WORD_VALUES)
  .sort((a, b) => b.length - a.length)
  .join('|')})\\b`;

const WORD_AMOUNT_PATTERN = new RegExp(`\\b${NUMBER_WORD}(?:(?:\\s+and\\s+|[\\s-]+)${NUMBER_WORD})*`, 'gi');

export const ACTION_KEYWORDS: readonly string[] = [
  'debited',
  'credited',
  'paid',
  'received',
  'withdrawn',
  'deposited',
  'transferred',
];

const PROXIMITY_WINDOW = 100;
const MIN_BARE_AMOUNT = 1;
const MAX_BARE_AMOUNT = 100_000_000;

/**
 * Normalize an amount string such as "Rs. 1,50,000.00" or "500 INR" to a
 * number. Returns null if nothing numeric is left.
 */
export function normalizeAmount(raw: string): number | null {
  const cleaned = raw.replace(CURRENCY_MARKERS, '').replace(/[,\s]/g, '');
  if (!cleaned) return null;

  const value = Number(cleaned);
  if (!Number.isFinite(value)) return null;
  return Math.abs(value);
}

/**
 * Evaluate spelled-out number words. Small values accumulate, a multiplier
 * scales the running value, and multipliers of a thousand and up close a
 * scale group: "five thousand five hundred" = 5 * 1000 + 5 * 100.
 */
export function parseSpelledAmount(phrase: string): number | null {
  const words = phrase
    .toLowerCase()
    .split(/[\s-]+/)
    .filter(word => word && word !== 'and');

  let total = 0;
  let current = 0;
  let sawNumber = false;

  for (const word of words) {
    const value = WORD_VALUES[word];
    if (value === undefined) continue;
    sawNumber = true;

    if (value >= 100) {
      current = (current === 0 ? 1 : current) * value;
      if (value >= 1000) {
        total += current;
        current = 0;
      }
    } else {
      current += value;
    }
  }

  if (!sawNumber) return null;
  return total + current;
}

function currencyCandidates(text: string): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];

  for (const pattern of [PREFIXED_AMOUNT_PATTERN, SUFFIXED_AMOUNT_PATTERN]) {
    for (const match of text.matchAll(pattern)) {
      if (match.index === undefined) continue;
      const start = match.index;
      const end = start + match[0].length;
      // "Rs 500 INR" is one amount, not two
      if (candidates.some(c => start < c.end && c.start < end)) continue;

      const value = normalizeAmount(match[1]);
      if (value === null) continue;
      candidates.push({ value, start, end, tier: 'currency' });
    }
  }

  return candidates.sort((a, b) => a.start - b.start);
}

function wordCandidates(text: string): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];
  for (const match of text.matchAll(WORD_AMOUNT_PATTERN)) {
    if (match.index === undefined) continue;
    const value = parseSpelledAmount(match[0]);
    if (value === null || value <= 0) continue;
    candidates.push({ value, start: match.index, end: match.index + match[0].length, tier: 'words' });
  }
  return candidates;
}

function bareCandidates(text: string): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];
  for (const match of text.matchAll(BARE_NUMBER_PATTERN)) {
    if (match.index === undefined) continue;
    const value = normalizeAmount(match[0]);
    if (value === null || value < MIN_BARE_AMOUNT || value > MAX_BARE_AMOUNT) continue;
    candidates.push({ value, start: match.index, end: match.index + match[0].length, tier: 'bare' });
  }
  return candidates;
}

/**
 * All amounts of the highest-priority tier that matched, in reading order.
 */
export function findAmounts(text: string): AmountCandidate[] {
  if (!text.trim()) return [];

  const currency = currencyCandidates(text);
  if (currency.length > 0) return currency;

  const words = wordCandidates(text);
  if (words.length > 0) return words;

  return bareCandidates(text);
}

export function selectPrimaryAmount(candidates: AmountCandidate[], text: string): AmountCandidate | null {
  if (candidates.length === 0) return null;
  if (candidates.length === 1) return candidates[0];

  const hits = findKeywords(text, ACTION_KEYWORDS);
  let best: { candidate: AmountCandidate; distance: number } | null = null;

  for (const candidate of candidates) {
    for (const hit of hits) {
      const distance = spanDistance(candidate, hit);
      if (distance > PROXIMITY_WINDOW) continue;
      if (!best || distance < best.distance) {
        best = { candidate, distance };
      }
    }
  }

  return best ? best.candidate : candidates[0];
}

export function findPrimaryAmount(text: string): AmountCandidate | null {
  return selectPrimaryAmount(findAmounts(text), text);
}

export function extractPrimaryAmount(text: string): number | null {
  return findPrimaryAmount(text)?.value ?? null;
}
