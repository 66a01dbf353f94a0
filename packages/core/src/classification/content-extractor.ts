/**
 * Content Extractor
 *
 * Isolates the canonical order text from surrounding noise, and gathers the
 * minimal data needed to look an order up elsewhere when nothing can be isolated.
 */

import { digitsOnly, foldText, unique } from '../text';
import type { InputClassification, MinimalLookupInfo } from '../types';
import {
  PROCESS_NUMBER_PATTERN,
  PERSONAL_ID_PATTERN,
  CORPORATE_ID_PATTERN,
} from '../extractors/parties/patterns';
import { OCR_BLOCK, MARKER_PATTERNS } from './patterns';

export const CONTENT_NOT_FOUND = Symbol('CONTENT_NOT_FOUND');

export type ContentExtraction = string | typeof CONTENT_NOT_FOUND;

const LABELED_NAME =
  /(?:Investigad[oa]|Requerid[oa]|Nome|Name|Target|Defendant)[ \t]*:[ \t]*(\p{Lu}[\p{Lu}\p{Ll} '.-]{2,60}?)(?=[ \t]*(?:[,;(\n]|CPF|CNPJ|$))/gmu;

/**
 * Canonical order text, or CONTENT_NOT_FOUND.
 */
export function extractContent(text: string, classification: InputClassification): ContentExtraction {
  const delimited = Array.from(text.matchAll(OCR_BLOCK))
    .map((m) => (m[1] ?? '').trim())
    .filter((block) => block.length > 0);
  if (delimited.length > 0) {
    return delimited.join('\n\n');
  }

  if (classification.structural_type === 'complete_order') {
    return text;
  }

  if (classification.structural_type === 'email_thread') {
    const paragraphs = text
      .split(/\n[ \t]*\n/)
      .map((p) => p.trim())
      .filter((p) => p.length > 0 && MARKER_PATTERNS.order_markers.test(foldText(p)));
    if (paragraphs.length > 0) {
      return paragraphs.join('\n\n');
    }
  }

  return CONTENT_NOT_FOUND;
}

export function extractMinimalLookupInfo(text: string): MinimalLookupInfo {
  const processNumbers = unique(text.match(PROCESS_NUMBER_PATTERN) ?? []);
  const corporateIds = unique((text.match(CORPORATE_ID_PATTERN) ?? []).map(digitsOnly));
  const personalIds = unique((text.match(PERSONAL_ID_PATTERN) ?? []).map(digitsOnly));
  const names = unique(
    Array.from(text.matchAll(LABELED_NAME))
      .map((m) => (m[1] ?? '').trim())
      .filter((n) => n.length > 0)
  );

  return {
    process_numbers: processNumbers,
    personal_ids: personalIds,
    corporate_ids: corporateIds,
    names,
    can_lookup: processNumbers.length > 0 || personalIds.length > 0 || corporateIds.length > 0,
  };
}
