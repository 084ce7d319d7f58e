import { describe, it, expect } from 'vitest';
import { classify, confidenceFor, decide } from '../../src/parsers/transaction-type';

describe('classify', () => {
  it('returns debit when only debit keywords match', () => {
    expect(classify('Rs 500 debited from a/c XX1234')).toBe('debit');
    expect(classify('Rs 100 transferred out of your account')).toBe('debit');
  });

  it('returns credit when only credit keywords match', () => {
    expect(classify('Rs 500 credited to a/c XX1234')).toBe('credit');
    expect(classify('Refunded Rs 40 for order 991')).toBe('credit');
  });

  it('returns unknown without keywords', () => {
    expect(classify('Your OTP is 4821')).toBe('unknown');
  });

  it('does not match keywords inside other words', () => {
    expect(classify('Prepaid recharge done')).toBe('unknown');
  });

  it('returns unknown for empty text', () => {
    expect(classify('')).toBe('unknown');
    expect(classify('   ')).toBe('unknown');
  });
});

describe('decide', () => {
  it('records the basis for single-sided matches', () => {
    expect(decide('Rs 500 debited')).toEqual({
      type: 'debit',
      basis: 'debit-only',
      debitMatches: ['debited'],
      creditMatches: [],
    });
    expect(decide('nothing here').basis).toBe('no-keywords');
    expect(decide('').basis).toBe('empty');
  });

  it('breaks a tie by proximity to the primary amount', () => {
    const text = 'Rs 500 paid to merchant and Rs 50 received as cashback';
    const decision = decide(text, { amountSpan: { start: 0, end: 6 } });

    expect(decision.type).toBe('debit');
    expect(decision.basis).toBe('proximity');
  });

  it('uses the other side when the amount sits next to it', () => {
    const text = 'Rs 500 paid to merchant and Rs 50 received as cashback';
    const decision = decide(text, { amountSpan: { start: 28, end: 33 } });

    expect(decision.type).toBe('credit');
    expect(decision.basis).toBe('proximity');
  });

  it('falls back to the number of distinct matches', () => {
    const decision = decide('Amount debited and deducted, later credited');

    expect(decision).toEqual({
      type: 'debit',
      basis: 'match-count',
      debitMatches: ['debited', 'deducted'],
      creditMatches: ['credited'],
    });
  });

  it('falls back to the earliest keyword on an even count', () => {
    expect(decide('credited and debited')).toMatchObject({ type: 'credit', basis: 'first-occurrence' });
    expect(decide('debited and credited')).toMatchObject({ type: 'debit', basis: 'first-occurrence' });
  });

  it('moves on to match count when both sides are equally near the amount', () => {
    const decision = decide('paid Rs 5 received and added', { amountSpan: { start: 5, end: 9 } });

    expect(decision.type).toBe('credit');
    expect(decision.basis).toBe('match-count');
  });
});

describe('confidenceFor', () => {
  it('is the fraction of the type keyword set present', () => {
    expect(confidenceFor('Rs 10 debited and paid', 'debit')).toBeCloseTo(2 / 7);
    expect(confidenceFor('Rs 10 credited', 'credit')).toBeCloseTo(1 / 6);
  });

  it('is 0 for unknown', () => {
    expect(confidenceFor('Rs 10 debited', 'unknown')).toBe(0);
  });
});
