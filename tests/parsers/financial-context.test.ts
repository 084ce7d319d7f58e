import { describe, it, expect } from 'vitest';
import { FinancialContextDetector } from '../../src/parsers/financial-context';

describe('FinancialContextDetector', () => {
  const detector = new FinancialContextDetector();

  it('detects a debit notification and scores the matched categories', () => {
    const text = 'Rs. 500 debited from A/c XX1234';

    expect(detector.isFinancial(text)).toBe(true);
    expect(detector.matchedCategories(text)).toEqual(['debit', 'amount', 'account']);
    expect(detector.score(text)).toBe(0.75);
  });

  it('scores 1 when all four categories match', () => {
    const text = 'Rs 250 paid; Rs 100 refund credited to bank a/c';

    expect(detector.matchedCategories(text)).toEqual(['credit', 'debit', 'amount', 'account']);
    expect(detector.score(text)).toBe(1);
  });

  it('rejects ordinary conversation', () => {
    expect(detector.isFinancial('See you at the cafe at 5')).toBe(false);
    expect(detector.score('See you at the cafe at 5')).toBe(0);
  });

  it('only matches keywords at the start of a word', () => {
    expect(detector.isFinancial('Meeting in 2 hours.')).toBe(false);
    expect(detector.matchedKeywords('Meeting in 2 hours.')).toEqual([]);
  });

  it('is case-insensitive', () => {
    expect(detector.matchedKeywords('AMOUNT CREDITED')).toEqual(['credited', 'amount']);
  });

  it('never treats empty or whitespace text as financial', () => {
    expect(detector.isFinancial('')).toBe(false);
    expect(detector.isFinancial('   \n\t')).toBe(false);
    expect(detector.score('   ')).toBe(0);
  });

  it('accepts custom keyword sets', () => {
    const custom = new FinancialContextDetector({
      credit: ['abono'],
      debit: ['cargo'],
      amount: ['rd$'],
      account: ['cuenta'],
    });

    expect(custom.isFinancial('Cargo de RD$ 300')).toBe(true);
    expect(custom.isFinancial('Rs 500 debited')).toBe(false);
  });
});
