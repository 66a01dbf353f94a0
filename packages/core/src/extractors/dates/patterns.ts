/**
 * Date and Period Patterns
 *
 * Portuguese and English date forms found in disclosure orders:
 * - numeric: 31/12/2022, 31-12-2022, 31.12.22
 * - long: "10 de março de 2024", "March 10, 2024", "10 March 2024"
 * - month-year: "dezembro de 2023", "December 2023", "12/2023"
 * - relative: "últimos 5 anos", "last two years", "12 meses anteriores"
 * - since inception: "desde a abertura da conta", "since account opening"
 */

import { foldText } from '../../text';
import type { RelativeUnit } from '../../types';

const MONTHS: Record<string, number> = {
  janeiro: 1, fevereiro: 2, marco: 3, abril: 4, maio: 5, junho: 6,
  julho: 7, agosto: 8, setembro: 9, outubro: 10, novembro: 11, dezembro: 12,
  january: 1, february: 2, march: 3, april: 4, may: 5, june: 6,
  july: 7, august: 8, september: 9, october: 10, november: 11, december: 12,
};

const NUMBER_WORDS: Record<string, number> = {
  um: 1, uma: 1, dois: 2, duas: 2, tres: 3, quatro: 4, cinco: 5,
  seis: 6, sete: 7, oito: 8, nove: 9, dez: 10,
  one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

const UNIT_WORDS: Record<string, RelativeUnit> = {
  ano: 'years', anos: 'years', year: 'years', years: 'years',
  mes: 'months', meses: 'months', month: 'months', months: 'months',
  dia: 'days', dias: 'days', day: 'days', days: 'days',
};

const B = '(?<![\\p{L}\\p{N}])';
const E = '(?![\\p{L}\\p{N}])';

const MONTH_NAME =
  '(janeiro|fevereiro|mar[çc]o|abril|maio|junho|julho|agosto|setembro|outubro|novembro|dezembro|' +
  'january|february|march|april|may|june|july|august|september|october|november|december)';

const NUMBER_TOKEN = '(\\d{1,3}|uma?|dois|duas|tr[êe]s|quatro|cinco|seis|sete|oito|nove|dez|one|two|three|four|five|six|seven|eight|nine|ten)';
const UNIT_TOKEN = '(anos?|meses|m[êe]s|dias?|years?|months?|days?)';

export const NUMERIC_DATE = new RegExp(`(?<![\\d/.-])(\\d{1,2})[/.-](\\d{1,2})[/.-](\\d{4}|\\d{2})(?![\\d/]|[.-]\\d)`, 'gu');

export const PT_LONG_DATE = new RegExp(`${B}(\\d{1,2})[º°]?[ \\t]+de[ \\t]+${MONTH_NAME}[ \\t]+de[ \\t]+(\\d{4})${E}`, 'giu');

export const EN_LONG_DATE = new RegExp(`${B}${MONTH_NAME}[ \\t]+(\\d{1,2})(?:st|nd|rd|th)?,?[ \\t]+(\\d{4})${E}`, 'giu');

export const EN_DAY_FIRST_DATE = new RegExp(`${B}(\\d{1,2})(?:st|nd|rd|th)?[ \\t]+${MONTH_NAME}[ \\t]+(\\d{4})${E}`, 'giu');

export const MONTH_YEAR = new RegExp(`${B}${MONTH_NAME}[ \\t]*(?:de[ \\t]+|of[ \\t]+|/[ \\t]*)?(\\d{4})${E}`, 'giu');

export const NUMERIC_MONTH_YEAR = new RegExp(`(?<![\\d/.-])(\\d{1,2})/(\\d{4})(?![\\d/])`, 'gu');

/** "last N units", "últimos N (extenso) units" */
export const RELATIVE_LEADING = new RegExp(
  `${B}(?:[úu]ltim[oa]s?|last|past|previous|preceding)[ \\t]+${NUMBER_TOKEN}(?:[ \\t]*\\([^)]{1,20}\\))?[ \\t]+${UNIT_TOKEN}${E}`,
  'giu'
);

/** "N units prior", "N anos anteriores" */
export const RELATIVE_TRAILING = new RegExp(
  `${B}${NUMBER_TOKEN}(?:[ \\t]*\\([^)]{1,20}\\))?[ \\t]+${UNIT_TOKEN}[ \\t]+(?:anteriores|prior|preceding|before)${E}`,
  'giu'
);

export const SINCE_INCEPTION = new RegExp(
  `${B}(?:desde[ \\t]+(?:a|o)[ \\t]+(?:abertura|in[íi]cio|constitui[çc][ãa]o)|` +
    `since[ \\t]+(?:the[ \\t]+)?(?:account[ \\t]+)?(?:opening|inception)|since[ \\t]+(?:the[ \\t]+)?account[ \\t]+was[ \\t]+opened|` +
    `from[ \\t]+(?:the[ \\t]+)?(?:account[ \\t]+)?(?:opening|inception))${E}`,
  'iu'
);

/** Text between two dates that makes them a range. */
export const RANGE_CONNECTOR = /^[ \t]*(?:a|à|ate|até|to|through|until|till|and|e|-|–)[ \t]*$/iu;

/** Words before a lone date that make it an end bound. */
export const UNTIL_BEFORE = /(?:at[ée]|until|till|up[ \t]+to|through|ending)[ \t]*$/iu;

/** Words before a long date that make it the document's own date. */
export const REFERENCE_PREFIX = /(?:,|(?<![\p{L}])(?:dated:?|date:|data:|em)|^)[ \t]*$/iu;

export function monthNumber(name: string): number | null {
  return MONTHS[foldText(name)] ?? null;
}

export function parseCount(token: string): number | null {
  if (/^\d+$/.test(token)) {
    const value = parseInt(token, 10);
    return value > 0 ? value : null;
  }
  return NUMBER_WORDS[foldText(token)] ?? null;
}

export function parseUnit(token: string): RelativeUnit | null {
  return UNIT_WORDS[foldText(token)] ?? null;
}

/** Two-digit years pivot at 30: 29 → 2029, 30 → 1930. */
export function expandYear(token: string): number {
  const year = parseInt(token, 10);
  if (token.length === 2) return year < 30 ? 2000 + year : 1900 + year;
  return year;
}
