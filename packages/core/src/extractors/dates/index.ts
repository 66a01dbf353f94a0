/**
 * Date/Period Extractor
 *
 * Finds raw date and period expressions in free text. Nothing here resolves
 * relative periods; see periods/ for that.
 */

import { isValid, lastDayOfMonth, parse } from 'date-fns';
import {
  NUMERIC_DATE,
  PT_LONG_DATE,
  EN_LONG_DATE,
  EN_DAY_FIRST_DATE,
  MONTH_YEAR,
  NUMERIC_MONTH_YEAR,
  RELATIVE_LEADING,
  RELATIVE_TRAILING,
  SINCE_INCEPTION,
  RANGE_CONNECTOR,
  UNTIL_BEFORE,
  REFERENCE_PREFIX,
  monthNumber,
  parseCount,
  parseUnit,
  expandYear,
} from './patterns';
import type { RelativeUnit } from '../../types';

export interface DateMention {
  index: number;
  length: number;
  text: string;
  /** First day covered by the mention. */
  start: Date;
  /** Last day covered: the same day, or the month's last day for month-year mentions. */
  end: Date;
  granularity: 'day' | 'month';
}

export type PeriodExpression =
  | { kind: 'range'; start: Date; end: Date; source_text: string }
  | { kind: 'relative'; amount: number; unit: RelativeUnit; source_text: string }
  | { kind: 'since_inception'; source_text: string }
  | { kind: 'month_year'; start: Date; end: Date; source_text: string }
  | { kind: 'date_pair'; start: Date; end: Date; source_text: string }
  | { kind: 'single_date'; date: Date; role: 'start' | 'end'; source_text: string };

export interface ReferenceDateMention {
  date: Date;
  source_text: string;
  index: number;
}

const PARSE_BASE = new Date(2000, 0, 1);

/**
 * Build a calendar date, or null when the day does not exist (31/02).
 */
export function calendarDate(day: number, month: number, year: number): Date | null {
  const date = parse(`${day}/${month}/${year}`, 'd/M/yyyy', PARSE_BASE);
  return isValid(date) ? date : null;
}

function overlaps(mentions: readonly DateMention[], index: number, length: number): boolean {
  return mentions.some((m) => index < m.index + m.length && m.index < index + length);
}

type DayParts = (match: RegExpMatchArray) => { day?: string; month?: string; year?: string } | null;

const DAY_FORMS: Array<{ pattern: RegExp; parts: DayParts }> = [
  { pattern: PT_LONG_DATE, parts: (m) => ({ day: m[1], month: m[2], year: m[3] }) },
  { pattern: EN_LONG_DATE, parts: (m) => ({ month: m[1], day: m[2], year: m[3] }) },
  { pattern: EN_DAY_FIRST_DATE, parts: (m) => ({ day: m[1], month: m[2], year: m[3] }) },
  { pattern: NUMERIC_DATE, parts: (m) => ({ day: m[1], month: m[2], year: m[3] }) },
];

function monthOf(token: string): number | null {
  return /^\d+$/.test(token) ? parseInt(token, 10) : monthNumber(token);
}

/**
 * All date mentions in document order. Full dates win over the month-year
 * reading of the same characters.
 */
export function findDateMentions(text: string): DateMention[] {
  const mentions: DateMention[] = [];

  for (const { pattern, parts } of DAY_FORMS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      if (overlaps(mentions, index, match[0].length)) continue;
      const p = parts(match);
      if (!p?.day || !p.month || !p.year) continue;
      const month = monthOf(p.month);
      if (month === null) continue;
      const date = calendarDate(parseInt(p.day, 10), month, expandYear(p.year));
      if (!date) continue;
      mentions.push({ index, length: match[0].length, text: match[0], start: date, end: date, granularity: 'day' });
    }
  }

  for (const pattern of [MONTH_YEAR, NUMERIC_MONTH_YEAR]) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      const [, monthToken, yearToken] = match;
      if (monthToken === undefined || yearToken === undefined) continue;
      if (overlaps(mentions, index, match[0].length)) continue;
      const month = monthOf(monthToken);
      if (month === null) continue;
      const start = calendarDate(1, month, parseInt(yearToken, 10));
      if (!start) continue;
      mentions.push({
        index,
        length: match[0].length,
        text: match[0],
        start,
        end: lastDayOfMonth(start),
        granularity: 'month',
      });
    }
  }

  return mentions.sort((a, b) => a.index - b.index);
}

export function findRelativeExpression(
  text: string
): { amount: number; unit: RelativeUnit; source_text: string; index: number } | null {
  let best: { amount: number; unit: RelativeUnit; source_text: string; index: number } | null = null;
  for (const pattern of [RELATIVE_LEADING, RELATIVE_TRAILING]) {
    for (const match of text.matchAll(pattern)) {
      const [, countToken, unitToken] = match;
      if (countToken === undefined || unitToken === undefined) continue;
      const amount = parseCount(countToken);
      const unit = parseUnit(unitToken);
      const index = match.index ?? 0;
      if (amount === null || unit === null) continue;
      if (!best || index < best.index) {
        best = { amount, unit, source_text: match[0], index };
      }
      break;
    }
  }
  return best;
}

function lineBefore(text: string, index: number): string {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1;
  return text.slice(lineStart, index);
}

/**
 * The period expression a request most likely refers to, by priority:
 * range, relative, since inception, month-year, two dates, single date.
 */
export function extractPeriodExpression(text: string): PeriodExpression | null {
  const mentions = findDateMentions(text);

  for (let i = 0; i + 1 < mentions.length; i++) {
    const first = mentions[i];
    const second = mentions[i + 1];
    if (!first || !second) continue;
    const between = text.slice(first.index + first.length, second.index);
    if (RANGE_CONNECTOR.test(between)) {
      return {
        kind: 'range',
        start: first.start,
        end: second.end,
        source_text: text.slice(first.index, second.index + second.length),
      };
    }
  }

  const relative = findRelativeExpression(text);
  if (relative) {
    return { kind: 'relative', amount: relative.amount, unit: relative.unit, source_text: relative.source_text };
  }

  const inception = SINCE_INCEPTION.exec(text);
  if (inception) {
    return { kind: 'since_inception', source_text: inception[0] };
  }

  const monthYear = mentions.find((m) => m.granularity === 'month');
  if (monthYear) {
    return { kind: 'month_year', start: monthYear.start, end: monthYear.end, source_text: monthYear.text };
  }

  const days = mentions.filter((m) => m.granularity === 'day');
  const [firstDay, secondDay] = days;
  if (firstDay && secondDay) {
    const ordered = [firstDay, secondDay].sort((a, b) => a.start.getTime() - b.start.getTime());
    const [earlier, later] = ordered;
    if (earlier && later) {
      return {
        kind: 'date_pair',
        start: earlier.start,
        end: later.end,
        source_text: `${firstDay.text} … ${secondDay.text}`,
      };
    }
  }

  if (firstDay) {
    const role = UNTIL_BEFORE.test(lineBefore(text, firstDay.index)) ? 'end' : 'start';
    return { kind: 'single_date', date: firstDay.start, role, source_text: firstDay.text };
  }

  return null;
}

/**
 * The document's own date: the first long-form date that opens a line or
 * follows a comma or "dated", as in "São Paulo, 10 de março de 2024".
 */
export function detectReferenceDate(text: string): ReferenceDateMention | null {
  const candidates = findDateMentions(text).filter(
    (m) => m.granularity === 'day' && /\p{L}/u.test(m.text)
  );
  for (const mention of candidates) {
    if (REFERENCE_PREFIX.test(lineBefore(text, mention.index))) {
      return { date: mention.start, source_text: mention.text, index: mention.index };
    }
  }
  return null;
}
