/**
 * Structural Classifier
 *
 * Deterministic marker scan. Confidence is the share of marker families
 * found; an input with no markers at all is indeterminate, never an error.
 */

import { logger } from '../logger';
import { foldText } from '../text';
import type { InputClassification, MarkerFamily, OrderClass, StructuralType } from '../types';
import { PROCESS_NUMBER_PATTERN, TAX_ID_PATTERN } from '../extractors/parties/patterns';
import { EMAIL_HEADER_LINE, MIN_EMAIL_HEADER_LINES, MARKER_PATTERNS } from './patterns';

export const MARKER_FAMILIES: readonly MarkerFamily[] = [
  'email_headers',
  'order_markers',
  'process_number',
  'tax_identifier',
  'reiteration',
  'supplement',
];

const PROCESS_NUMBER = new RegExp(PROCESS_NUMBER_PATTERN.source);
const TAX_ID = new RegExp(TAX_ID_PATTERN.source);
const OCR_DELIMITER = /<<OCR>>/;

function detect(family: MarkerFamily, raw: string, folded: string): boolean {
  switch (family) {
    case 'email_headers':
      return (folded.match(EMAIL_HEADER_LINE) ?? []).length >= MIN_EMAIL_HEADER_LINES;
    case 'process_number':
      return PROCESS_NUMBER.test(raw);
    case 'tax_identifier':
      return TAX_ID.test(raw);
    case 'order_markers':
    case 'reiteration':
    case 'supplement':
      return MARKER_PATTERNS[family].test(folded);
  }
}

function resolveOrderClass(matched: ReadonlySet<MarkerFamily>): OrderClass {
  if (matched.has('reiteration')) return 'reiteration';
  if (matched.has('supplement')) return 'supplement';
  if (matched.has('order_markers')) return 'first_request';
  return 'indeterminate';
}

function resolveStructuralType(matched: ReadonlySet<MarkerFamily>): StructuralType {
  if (matched.has('email_headers')) return 'email_thread';
  if (matched.has('order_markers')) return 'complete_order';
  if (matched.has('process_number') || matched.has('tax_identifier')) return 'fragment';
  return 'indeterminate';
}

export function classifyInput(text: string): InputClassification {
  const folded = foldText(text);
  const matched = MARKER_FAMILIES.filter((family) => detect(family, text, folded));
  const matchedSet = new Set(matched);

  const classification: InputClassification = {
    structural_type: resolveStructuralType(matchedSet),
    order_class: resolveOrderClass(matchedSet),
    has_order_markers: matchedSet.has('order_markers'),
    has_ocr_delimiters: OCR_DELIMITER.test(text),
    has_process_number: matchedSet.has('process_number'),
    has_identifiers: matchedSet.has('tax_identifier'),
    confidence: matched.length / MARKER_FAMILIES.length,
    matched_markers: matched,
  };

  logger.debug('Input classified', {
    structuralType: classification.structural_type,
    orderClass: classification.order_class,
    markers: matched,
  });

  return classification;
}
