import { TransactionType } from '../types';
import { findKeywords, KeywordHit, matchedKeywords, spanDistance } from './keywords';

export const DEBIT_KEYWORDS: readonly string[] = [
  'debited',
  'withdrawn',
  'transferred out',
  'paid',
  'deducted',
  'spent',
  'charged',
];

export const CREDIT_KEYWORDS: readonly string[] = [
  'credited',
  'received',
  'deposited',
  'transferred in',
  'added',
  'refunded',
];

/**
 * How a decision was reached. The last three only occur when both debit and
 * credit keywords are present.
 */
export type DecisionBasis =
  | 'empty'
  | 'no-keywords'
  | 'debit-only'
  | 'credit-only'
  | 'proximity'
  | 'match-count'
  | 'first-occurrence';

export interface TypeDecision {
  type: TransactionType;
  basis: DecisionBasis;
  debitMatches: string[];
  creditMatches: string[];
}

export interface ClassificationContext {
  /** Span of the primary amount in the same text. */
  amountSpan?: { start: number; end: number };
}

function nearestDistance(hits: KeywordHit[], span: { start: number; end: number }): number {
  return Math.min(...hits.map(hit => spanDistance(hit, span)));
}

/**
 * Decide between debit and credit. When both keyword sets fire, the tie is
 * broken by, in order: the keyword nearest to the primary amount, the set
 * with more distinct matches, and the earliest keyword in the text.
 */
export function decide(text: string, context: ClassificationContext = {}): TypeDecision {
  if (!text.trim()) {
    return { type: 'unknown', basis: 'empty', debitMatches: [], creditMatches: [] };
  }

  const debitMatches = matchedKeywords(text, DEBIT_KEYWORDS);
  const creditMatches = matchedKeywords(text, CREDIT_KEYWORDS);
  const result = (type: TransactionType, basis: DecisionBasis): TypeDecision => ({
    type,
    basis,
    debitMatches,
    creditMatches,
  });

  if (debitMatches.length === 0 && creditMatches.length === 0) return result('unknown', 'no-keywords');
  if (creditMatches.length === 0) return result('debit', 'debit-only');
  if (debitMatches.length === 0) return result('credit', 'credit-only');

  const debitHits = findKeywords(text, DEBIT_KEYWORDS);
  const creditHits = findKeywords(text, CREDIT_KEYWORDS);

  if (context.amountSpan) {
    const debitDistance = nearestDistance(debitHits, context.amountSpan);
    const creditDistance = nearestDistance(creditHits, context.amountSpan);
    if (debitDistance < creditDistance) return result('debit', 'proximity');
    if (creditDistance < debitDistance) return result('credit', 'proximity');
  }

  if (debitMatches.length > creditMatches.length) return result('debit', 'match-count');
  if (creditMatches.length > debitMatches.length) return result('credit', 'match-count');

  return debitHits[0].start <= creditHits[0].start
    ? result('debit', 'first-occurrence')
    : result('credit', 'first-occurrence');
}

export function classify(text: string, context: ClassificationContext = {}): TransactionType {
  return decide(text, context).type;
}

/**
 * Fraction of the chosen type's keyword set present in the text.
 */
export function confidenceFor(text: string, type: TransactionType): number {
  if (type === 'unknown' || !text.trim()) return 0;
  const keywords = type === 'debit' ? DEBIT_KEYWORDS : CREDIT_KEYWORDS;
  return matchedKeywords(text, keywords).length / keywords.length;
}
