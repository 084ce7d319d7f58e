import { differenceInCalendarDays } from 'date-fns';
import { isValidCalendarDate } from '../parsers/datetime';
import { PersistedTransaction, ValidationResult } from '../types';

export interface ValidationLimits {
  maxAmount: number;
  /** Amounts below this are suspicious but accepted. */
  minAmountWarning: number;
  maxAgeDays: number;
  /** Warn when a date is this close to maxAgeDays. */
  ageWarningDays: number;
  minConfidenceWarning: number;
}

export const DEFAULT_VALIDATION_LIMITS: ValidationLimits = {
  maxAmount: 10_000_000,
  minAmountWarning: 1,
  maxAgeDays: 90,
  ageWarningDays: 5,
  minConfidenceWarning: 0.5,
};

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2}):(\d{2})$/;

// new Date(y, m, d) reads years 0-99 as 1900-1999
function localDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);
  return date;
}

/**
 * Business rules a record must pass before it is persisted. Problems with
 * the account reference are only warnings, so a good amount is never thrown
 * away over a badly masked account.
 */
export class TransactionValidator {
  constructor(
    private readonly limits: ValidationLimits = DEFAULT_VALIDATION_LIMITS,
    private readonly now: () => Date = () => new Date()
  ) {}

  validate(record: PersistedTransaction): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    this.checkAmount(record.amount, errors, warnings);
    this.checkDate(record.date, errors, warnings);
    this.checkTime(record.time, errors);

    if (record.accountRef !== undefined) {
      this.checkAccount(record.accountRef, warnings);
    }

    const required: Array<[string, string]> = [
      ['id', record.id],
      ['ownerId', record.ownerId],
      ['sourceText', record.sourceText],
      ['senderId', record.senderId],
    ];
    for (const [field, value] of required) {
      if (!value.trim()) errors.push(`${field} is required`);
    }

    if (!Number.isFinite(record.confidence) || record.confidence < 0 || record.confidence > 1) {
      errors.push(`Confidence ${record.confidence} is outside [0, 1]`);
    } else if (record.confidence < this.limits.minConfidenceWarning) {
      warnings.push(`Low confidence ${record.confidence}`);
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  private checkAmount(amount: number, errors: string[], warnings: string[]): void {
    if (!Number.isFinite(amount) || amount <= 0) {
      errors.push(`Amount must be greater than 0, got ${amount}`);
    } else if (amount > this.limits.maxAmount) {
      errors.push(`Amount ${amount} exceeds maximum of ${this.limits.maxAmount}`);
    } else if (amount < this.limits.minAmountWarning) {
      warnings.push(`Amount ${amount} is below ${this.limits.minAmountWarning}`);
    }
  }

  private checkDate(date: string, errors: string[], warnings: string[]): void {
    const match = DATE_PATTERN.exec(date);
    const [year, month, day] = match ? [Number(match[1]), Number(match[2]), Number(match[3])] : [0, 0, 0];
    if (!match || !isValidCalendarDate(year, month, day)) {
      errors.push(`Invalid date "${date}", expected YYYY-MM-DD`);
      return;
    }

    const age = differenceInCalendarDays(this.now(), localDate(year, month, day));
    if (age < 0) {
      errors.push(`Date ${date} is in the future`);
    } else if (age > this.limits.maxAgeDays) {
      errors.push(`Date ${date} is more than ${this.limits.maxAgeDays} days old`);
    } else if (age >= this.limits.maxAgeDays - this.limits.ageWarningDays) {
      warnings.push(`Date ${date} is close to the ${this.limits.maxAgeDays}-day limit`);
    }
  }

  private checkTime(time: string, errors: string[]): void {
    const match = TIME_PATTERN.exec(time);
    if (!match || Number(match[1]) > 23 || Number(match[2]) > 59 || Number(match[3]) > 59) {
      errors.push(`Invalid time "${time}", expected HH:MM:SS`);
    }
  }

  private checkAccount(accountRef: string, warnings: string[]): void {
    if (accountRef.length < 4 || accountRef.length > 20) {
      warnings.push(`Account reference "${accountRef}" should be 4-20 characters`);
    }
    if ((accountRef.match(/[0-9]/g) ?? []).length < 2) {
      warnings.push(`Account reference "${accountRef}" has fewer than 2 digits`);
    }
    if (/^([0-9])\1*$/.test(accountRef)) {
      warnings.push(`Account reference "${accountRef}" is a single repeated digit`);
    }
  }
}
