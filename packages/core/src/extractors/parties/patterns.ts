/**
 * Party Extraction Patterns
 *
 * Identifier and name patterns for the parties targeted by an order.
 *
 * Identifiers are Brazilian taxpayer numbers, formatted or bare:
 * - personal (CPF): 123.456.789-09 or 12345678909
 * - corporate (CNPJ): 12.345.678/0001-95 or 12345678000195
 * Digits on either side disqualify a match, so process numbers and account
 * numbers are not read as identifiers.
 */

import { digitsOnly } from '../../text';
import type { TaxIdType } from '../../types';

export const PERSONAL_ID_SOURCE = '(?<!\\d)\\d{3}\\.?\\d{3}\\.?\\d{3}-?\\d{2}(?!\\d)';
export const CORPORATE_ID_SOURCE = '(?<!\\d)\\d{2}\\.?\\d{3}\\.?\\d{3}/?\\d{4}-?\\d{2}(?!\\d)';

export const PERSONAL_ID_PATTERN = new RegExp(PERSONAL_ID_SOURCE, 'g');
export const CORPORATE_ID_PATTERN = new RegExp(CORPORATE_ID_SOURCE, 'g');

/** Either identifier; corporate first so a CNPJ is never split into a CPF. */
export const TAX_ID_PATTERN = new RegExp(`${CORPORATE_ID_SOURCE}|${PERSONAL_ID_SOURCE}`, 'g');

/** CNJ unified process number: NNNNNNN-DD.AAAA.J.TR.OOOO */
export const PROCESS_NUMBER_PATTERN = /(?<!\d)\d{7}-\d{2}\.\d{4}\.\d\.\d{2}\.\d{4}(?!\d)/g;

/**
 * Labeled block of parties. The label line may carry the first party.
 * Examples: "INVESTIGADOS:", "Requeridos:", "Investigated parties:", "TARGETS:"
 */
export const PARTY_BLOCK_LABEL =
  /^[ \t]*(?:investigad[oa]s?|requerid[oa]s?|partes|envolvid[oa]s?|titulares|investigated[ \t]+part(?:y|ies)|targets?|defendants?|account[ \t]+holders?|parties)[ \t]*:[ \t]*/imu;

/** Single-party labels that introduce a name in free text. */
export const NAME_LABEL_WORDS =
  /^(?:investigad[oa]|requerid[oa]|nome|titular|sr\.?|sra\.?|mr\.?|mrs\.?|ms\.?|name|target|defendant|the|o|a)[ \t:]+/iu;

const NAME_WORD = "\\p{Lu}[\\p{L}'’.-]*";
const NAME_CONNECTOR = '(?:d[aeo]s?|e)';

/**
 * A run of capitalised words, optionally joined by Portuguese particles
 * ("da", "dos", "e"). Case-sensitive: never compile it with the `i` flag.
 * Words are separated by spaces or tabs only, so a name never crosses a line.
 */
export const NAME_CHAIN_SOURCE = `${NAME_WORD}(?:[ \\t]+(?:${NAME_CONNECTOR}[ \\t]+)?${NAME_WORD})+`;

/** Label between a name and its identifier: "CPF", "CNPJ nº", "tax id", "(" ... */
export const ID_LABEL_SOURCE =
  '[ \\t]*[,(\\-–]?[ \\t]*' +
  '(?:(?:CPF|cpf|CNPJ|cnpj|[Tt]ax[ \\t]+(?:ID|[Ii]d)(?:entification)?(?:[ \\t]+(?:[Nn]o\\.?|[Nn]umber))?|[Ii]nscri[çc][ãa]o)' +
  '[ \\t]*(?:[Nn][º°o]\\.?)?[ \\t]*:?[ \\t]*)?';

/** Name immediately followed by an identifier. */
export const NAME_THEN_ID_PATTERN = new RegExp(
  `(${NAME_CHAIN_SOURCE})${ID_LABEL_SOURCE}(${CORPORATE_ID_SOURCE}|${PERSONAL_ID_SOURCE})`,
  'gu'
);

/** Identifier immediately followed by a name: "CPF 123.456.789-09 - JOÃO DA SILVA". */
export const ID_THEN_NAME_PATTERN = new RegExp(
  `(${CORPORATE_ID_SOURCE}|${PERSONAL_ID_SOURCE})[ \\t]*[-–,:)][ \\t]*(${NAME_CHAIN_SOURCE})`,
  'gu'
);

/** "and others", "et al.", "entre outros", trailing ellipsis */
export const MORE_PARTIES_PATTERN =
  /(?<![\p{L}])(?:e[ \t]+outros|entre[ \t]+outros|dentre[ \t]+outros|e[ \t]+demais|et[ \t]+al\.?|and[ \t]+others|among[ \t]+others)(?![\p{L}])|\.\.\.|…/iu;

export const CORPORATE_SUFFIX =
  /(?<![\p{L}])(?:ltda|s\.?\/?a\.?|me|epp|eireli|inc\.?|llc|ltd\.?|corp\.?|corporation|company|co\.|comércio|comercio|ind[úu]stria|servi[çc]os|holding|empresa)(?![\p{L}])/iu;

export function classifyTaxId(raw: string): TaxIdType | null {
  const digits = digitsOnly(raw);
  if (digits.length === 11) return 'personal';
  if (digits.length === 14) return 'corporate';
  return null;
}
