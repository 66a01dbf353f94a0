/**
 * Period token grammar.
 *
 * Every period, whoever produced it, passes through this fixed-width token
 * form before it reaches a result:
 *
 *   start: DDMMYYYY | LAST_<N>_<YEARS|MONTHS|DAYS> | SINCE_INCEPTION | UNRESOLVED
 *   end:   DDMMYYYY | REFERENCE_DATE | UNRESOLVED
 *
 * A token outside the grammar, or a date that does not exist, becomes UNRESOLVED.
 */

import { format, subDays, subMonths, subYears } from 'date-fns';
import { calendarDate } from '../extractors/dates';
import type { PeriodExpression } from '../extractors/dates';
import type { PeriodBound, PeriodRequirement, RelativeUnit } from '../types';

export const PERIOD_SENTINELS = {
  SINCE_INCEPTION: 'SINCE_INCEPTION',
  REFERENCE_DATE: 'REFERENCE_DATE',
  UNRESOLVED: 'UNRESOLVED',
} as const;

export interface PeriodTokens {
  start: string;
  end: string;
  source_text: string | null;
}

const DATE_TOKEN = /^(\d{2})(\d{2})(\d{4})$/;
const RELATIVE_TOKEN = /^LAST_([1-9]\d{0,2})_(YEARS|MONTHS|DAYS)$/;

const UNIT_TOKENS: Record<RelativeUnit, string> = {
  years: 'YEARS',
  months: 'MONTHS',
  days: 'DAYS',
};

const UNRESOLVED: PeriodBound = { kind: 'unresolved' };

export function toDateToken(date: Date): string {
  return format(date, 'ddMMyyyy');
}

export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

function parseDateToken(token: string): Date | null {
  const match = DATE_TOKEN.exec(token);
  if (!match) return null;
  const [, day, month, year] = match;
  if (day === undefined || month === undefined || year === undefined) return null;
  return calendarDate(parseInt(day, 10), parseInt(month, 10), parseInt(year, 10));
}

function parseUnitToken(token: string): RelativeUnit | null {
  switch (token) {
    case 'YEARS':
      return 'years';
    case 'MONTHS':
      return 'months';
    case 'DAYS':
      return 'days';
    default:
      return null;
  }
}

/**
 * Tokens for an extracted expression; null means nothing was found.
 */
export function expressionToTokens(expression: PeriodExpression | null): PeriodTokens {
  if (!expression) {
    return { start: PERIOD_SENTINELS.UNRESOLVED, end: PERIOD_SENTINELS.UNRESOLVED, source_text: null };
  }

  switch (expression.kind) {
    case 'range':
    case 'month_year':
    case 'date_pair':
      return {
        start: toDateToken(expression.start),
        end: toDateToken(expression.end),
        source_text: expression.source_text,
      };
    case 'relative':
      return {
        start: `LAST_${expression.amount}_${UNIT_TOKENS[expression.unit]}`,
        end: PERIOD_SENTINELS.REFERENCE_DATE,
        source_text: expression.source_text,
      };
    case 'since_inception':
      return {
        start: PERIOD_SENTINELS.SINCE_INCEPTION,
        end: PERIOD_SENTINELS.REFERENCE_DATE,
        source_text: expression.source_text,
      };
    case 'single_date':
      return expression.role === 'end'
        ? { start: PERIOD_SENTINELS.UNRESOLVED, end: toDateToken(expression.date), source_text: expression.source_text }
        : { start: toDateToken(expression.date), end: PERIOD_SENTINELS.REFERENCE_DATE, source_text: expression.source_text };
  }
}

export function parseStartToken(token: string): PeriodBound {
  if (token === PERIOD_SENTINELS.SINCE_INCEPTION) return { kind: 'since_inception' };
  if (token === PERIOD_SENTINELS.UNRESOLVED) return UNRESOLVED;

  const date = parseDateToken(token);
  if (date) return { kind: 'absolute', date: toIsoDate(date) };

  const relative = RELATIVE_TOKEN.exec(token);
  if (relative) {
    const [, amount, unitToken] = relative;
    const unit = unitToken === undefined ? null : parseUnitToken(unitToken);
    if (amount !== undefined && unit) {
      return { kind: 'relative', amount: parseInt(amount, 10), unit };
    }
  }

  return UNRESOLVED;
}

export function parseEndToken(token: string): PeriodBound {
  if (token === PERIOD_SENTINELS.REFERENCE_DATE) return { kind: 'reference_date' };
  const date = parseDateToken(token);
  return date ? { kind: 'absolute', date: toIsoDate(date) } : UNRESOLVED;
}

function subtract(date: Date, amount: number, unit: RelativeUnit): Date {
  switch (unit) {
    case 'years':
      return subYears(date, amount);
    case 'months':
      return subMonths(date, amount);
    case 'days':
      return subDays(date, amount);
  }
}

/**
 * Validate tokens and, when a reference date is known, resolve relative
 * starts and REFERENCE_DATE ends to absolute dates.
 */
export function tokensToRequirement(tokens: PeriodTokens, referenceDate: Date | null): PeriodRequirement {
  let start = parseStartToken(tokens.start);
  let end = parseEndToken(tokens.end);

  if (referenceDate) {
    if (start.kind === 'relative') {
      start = { kind: 'absolute', date: toIsoDate(subtract(referenceDate, start.amount, start.unit)) };
    }
    if (end.kind === 'reference_date') {
      end = { kind: 'absolute', date: toIsoDate(referenceDate) };
    }
  }

  // Inverted absolute bounds cannot be trusted either way round
  if (start.kind === 'absolute' && end.kind === 'absolute' && start.date > end.date) {
    start = UNRESOLVED;
    end = UNRESOLVED;
  }

  return { start, end, source_text: tokens.source_text };
}
