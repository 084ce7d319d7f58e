import { containsKeyword, matchedKeywords } from './keywords';

export type KeywordCategory = 'credit' | 'debit' | 'amount' | 'account';

// The four sets are disjoint; a keyword belongs to exactly one category.
export const FINANCIAL_KEYWORDS: Readonly<Record<KeywordCategory, readonly string[]>> = {
  credit: ['credited', 'received', 'deposited', 'transferred in', 'added', 'refund', 'cashback'],
  debit: [
    'debited',
    'withdrawn',
    'withdrawal',
    'transferred out',
    'paid',
    'deducted',
    'spent',
    'charged',
    'purchase',
  ],
  amount: ['₹', 'rs', 'inr', 'rupee', 'amount', 'amt', 'balance'],
  account: ['a/c', 'account', 'acct', 'bank', 'card', 'upi', 'wallet', 'neft', 'imps', 'rtgs'],
};

const CATEGORIES: readonly KeywordCategory[] = ['credit', 'debit', 'amount', 'account'];

/**
 * Keyword heuristics deciding whether a text describes a money movement.
 */
export class FinancialContextDetector {
  constructor(private readonly keywords = FINANCIAL_KEYWORDS) {}

  isFinancial(text: string): boolean {
    if (!text.trim()) return false;
    return this.matchedCategories(text).length > 0;
  }

  /**
   * Fraction of keyword categories (credit, debit, amount, account) with at
   * least one hit.
   */
  score(text: string): number {
    if (!text.trim()) return 0;
    return Math.min(1, this.matchedCategories(text).length / CATEGORIES.length);
  }

  matchedCategories(text: string): KeywordCategory[] {
    if (!text.trim()) return [];
    return CATEGORIES.filter(category =>
      this.keywords[category].some(keyword => containsKeyword(text, keyword))
    );
  }

  matchedKeywords(text: string): string[] {
    if (!text.trim()) return [];
    return CATEGORIES.flatMap(category => matchedKeywords(text, this.keywords[category]));
  }
}
