import { ExtractedTransaction, Parser, RawMessage } from '../types';
import { AmountTier, findPrimaryAmount } from './amount';
import { extractPrimary } from './account';
import { resolveDate, resolveTime, ValueSource } from './datetime';
import { FinancialContextDetector } from './financial-context';
import { decide, TypeDecision } from './transaction-type';

export const CONFIDENCE_WEIGHTS = {
  amount: 0.4,
  type: 0.2,
  account: 0.15,
  date: 0.15,
  time: 0.1,
} as const;

export interface ExtractionDetails {
  financialScore: number;
  amountTier: AmountTier;
  typeDecision: TypeDecision;
  dateSource: ValueSource;
  timeSource: ValueSource;
}

export type AssemblyResult =
  | { status: 'extracted'; transaction: ExtractedTransaction; details: ExtractionDetails }
  | { status: 'rejected'; reason: 'empty' | 'not-financial' }
  | { status: 'unparsed'; reason: 'no-amount' };

export interface ConfidenceSignals {
  amount: boolean;
  definiteType: boolean;
  account: boolean;
  explicitDate: boolean;
  explicitTime: boolean;
}

/**
 * Weighted sum of the signals present, rounded to two decimals.
 */
export function computeConfidence(signals: ConfidenceSignals): number {
  let total = 0;
  if (signals.amount) total += CONFIDENCE_WEIGHTS.amount;
  if (signals.definiteType) total += CONFIDENCE_WEIGHTS.type;
  if (signals.account) total += CONFIDENCE_WEIGHTS.account;
  if (signals.explicitDate) total += CONFIDENCE_WEIGHTS.date;
  if (signals.explicitTime) total += CONFIDENCE_WEIGHTS.time;
  return Math.min(1, Math.round(total * 100) / 100);
}

/**
 * Turns one SMS into at most one transaction by running the detector and the
 * four extractors over its content. Works for any sender; there is no
 * per-bank template.
 */
export class TransactionAssembler implements Parser {
  readonly name = 'heuristic-sms';

  constructor(private readonly detector = new FinancialContextDetector()) {}

  financialScore(text: string): number {
    return this.detector.score(text);
  }

  canParse(message: RawMessage): boolean {
    return this.detector.isFinancial(message.content);
  }

  assemble(message: RawMessage): AssemblyResult {
    const text = message.content;
    if (!text.trim()) return { status: 'rejected', reason: 'empty' };
    if (!this.detector.isFinancial(text)) return { status: 'rejected', reason: 'not-financial' };

    const amount = findPrimaryAmount(text);
    if (!amount) return { status: 'unparsed', reason: 'no-amount' };

    const typeDecision = decide(text, { amountSpan: amount });
    const accountRef = extractPrimary(text);
    const date = resolveDate(text, message.receivedAt);
    const time = resolveTime(text, message.receivedAt);

    const confidence = computeConfidence({
      amount: true,
      definiteType: typeDecision.type !== 'unknown',
      account: accountRef !== null,
      explicitDate: date.source === 'text',
      explicitTime: time.source === 'text',
    });

    const transaction: ExtractedTransaction = {
      amount: amount.value,
      type: typeDecision.type,
      ...(accountRef !== null ? { accountRef } : {}),
      date: date.value,
      time: time.value,
      sourceText: text,
      senderId: message.sender,
      confidence,
    };

    return {
      status: 'extracted',
      transaction,
      details: {
        financialScore: this.detector.score(text),
        amountTier: amount.tier,
        typeDecision,
        dateSource: date.source,
        timeSource: time.source,
      },
    };
  }

  parse(message: RawMessage): ExtractedTransaction | null {
    const result = this.assemble(message);
    return result.status === 'extracted' ? result.transaction : null;
  }
}
