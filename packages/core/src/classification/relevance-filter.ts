/**
 * Relevance Filter
 *
 * Splits an order into per-addressee blocks ("OFICIE-SE ao ...", "send an
 * official letter to ...") and decides whether any of it is meant for the
 * operating institution.
 *
 * Precedence:
 *   (a) every named institution is tax/telecom/police, under fiscal or telephone secrecy → not relevant
 *   (d) financial and non-financial addressees mixed, or mixed secrecy → relevant, medium
 *   (b) a block goes to the institution or a generic financial institution → relevant, high
 *   (c) one block with no addressee, under banking secrecy or none, about bank data → relevant, medium
 *   (e) anything else → not relevant, low
 */

import { logger } from '../logger';
import { escapeRegExp, foldText } from '../text';
import type { InstitutionType, MentionedInstitution, RelevanceDecision, SecrecyType } from '../types';
import {
  ADDRESS_TO_MARKER,
  INSTITUTION_PATTERNS,
  SECRECY_PATTERNS,
  BANKING_VOCABULARY,
} from './patterns';

export const RELEVANCE_CONFIDENCE = {
  exclusiveNonFinancial: 0.95,
  financialAddressee: 0.95,
  genericBanking: 0.85,
  mixed: 0.8,
  fallback: 0.7,
} as const;

export const BLOCK_SEPARATOR = '\n\n---\n\n';

const FINANCIAL_TYPES: ReadonlySet<InstitutionType> = new Set([
  'target_institution',
  'financial_institution',
  'central_bank',
]);
const NON_FINANCIAL_TYPES: ReadonlySet<InstitutionType> = new Set([
  'tax_authority',
  'telecom_operator',
  'police',
]);

const ADDRESSEE_END = /[,.;:\n]|(?<![\p{L}])(?:para|que|for|to[ \t]+provide|requesting|a[ \t]+fim)(?![\p{L}])/u;
const MAX_ADDRESSEE_LENGTH = 80;

export interface AddresseeBlock {
  addressee: string | null;
  /** Block text in the caller's original casing. */
  content: string;
  /** Folded block text. */
  folded: string;
}

interface ClassifiedBlock extends AddresseeBlock {
  institution: MentionedInstitution;
}

export interface SegmentedText {
  preamble: string;
  blocks: AddresseeBlock[];
}

/**
 * Split text at every address-to marker. Without markers the whole text is a
 * single block with no addressee.
 */
export function segmentAddressees(text: string): SegmentedText {
  // Folding composed Latin text keeps offsets; otherwise fall back to folded spans
  const composed = text.normalize('NFC');
  const folded = foldText(composed);
  const source = folded.length === composed.length ? composed : folded;
  const markers = Array.from(folded.matchAll(ADDRESS_TO_MARKER));

  if (markers.length === 0) {
    return { preamble: '', blocks: [{ addressee: null, content: composed, folded }] };
  }

  const firstIndex = markers[0]?.index ?? 0;
  const blocks = markers.map((marker, i) => {
    const start = marker.index ?? 0;
    const end = markers[i + 1]?.index ?? folded.length;
    const afterMarker = start + marker[0].length;

    const tail = folded.slice(afterMarker, end);
    const stop = ADDRESSEE_END.exec(tail);
    const addresseeLength = Math.min(stop ? stop.index : tail.length, MAX_ADDRESSEE_LENGTH);
    const addressee = source.slice(afterMarker, afterMarker + addresseeLength).trim();

    return {
      addressee: addressee.length > 0 ? addressee : null,
      content: source.slice(start, end).trim(),
      folded: folded.slice(start, end).trim(),
    };
  });

  return { preamble: source.slice(0, firstIndex).trim(), blocks };
}

function targetPattern(institutionName: string): RegExp | null {
  const name = foldText(institutionName).trim();
  if (!name) return null;
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(name).replace(/\s+/g, '\\s+')}(?![\\p{L}\\p{N}])`, 'u');
}

function institutionType(folded: string, target: RegExp | null): InstitutionType | null {
  if (target?.test(folded)) return 'target_institution';
  for (const { type, pattern } of INSTITUTION_PATTERNS) {
    if (pattern.test(folded)) return type;
  }
  return null;
}

function classifyBlock(block: AddresseeBlock, target: RegExp | null): ClassifiedBlock {
  if (block.addressee) {
    const type = institutionType(foldText(block.addressee), target);
    if (type) {
      return {
        ...block,
        institution: { type, name: block.addressee, excerpt: block.addressee, is_direct_addressee: true, confidence: 0.9 },
      };
    }
  }

  const type = institutionType(block.folded, target);
  return {
    ...block,
    institution: {
      type: type ?? 'indeterminate',
      name: block.addressee,
      excerpt: block.content.slice(0, 160),
      is_direct_addressee: false,
      confidence: type ? 0.6 : 0.3,
    },
  };
}

export function detectSecrecyType(text: string): SecrecyType {
  const folded = foldText(text);
  const banking = SECRECY_PATTERNS.banking.test(folded);
  const fiscal = SECRECY_PATTERNS.fiscal.test(folded);
  const telephone = SECRECY_PATTERNS.telephone.test(folded);
  const count = [banking, fiscal, telephone].filter(Boolean).length;

  if (count > 1) return 'mixed';
  if (banking) return 'banking';
  if (fiscal) return 'fiscal';
  if (telephone) return 'telephone';
  return 'indeterminate';
}

function isAddressed(block: ClassifiedBlock, types: ReadonlySet<InstitutionType>): boolean {
  return block.institution.is_direct_addressee && types.has(block.institution.type);
}

export function filterRelevance(text: string, institutionName: string): RelevanceDecision {
  const { preamble, blocks } = segmentAddressees(text);
  const target = targetPattern(institutionName);
  const classified = blocks.map((block) => classifyBlock(block, target));
  const secrecyType = detectSecrecyType(text);

  const financial = classified.filter((b) => isAddressed(b, FINANCIAL_TYPES));
  const nonFinancial = classified.filter((b) => isAddressed(b, NON_FINANCIAL_TYPES));
  const generic = classified.filter((b) => b.addressee === null);
  const institutions = classified.map((b) => b.institution);
  const hasMultipleAddressees = classified.length > 1;

  const decide = (is_relevant: boolean, reason: string, confidence: number): RelevanceDecision => {
    const isolate = is_relevant && hasMultipleAddressees && financial.length > 0;
    const relevantSpan = isolate
      ? [preamble, ...financial.map((b) => b.content)].filter((s) => s.length > 0).join(BLOCK_SEPARATOR)
      : null;
    logger.debug('Relevance decided', { is_relevant, reason, secrecyType, blocks: classified.length });
    return {
      is_relevant,
      reason,
      confidence,
      institutions,
      has_multiple_addressees: hasMultipleAddressees,
      secrecy_type: secrecyType,
      relevant_span: relevantSpan,
    };
  };

  const named = institutions.filter((i) => i.type !== 'indeterminate');
  if (
    named.every((i) => NON_FINANCIAL_TYPES.has(i.type)) &&
    (secrecyType === 'fiscal' || secrecyType === 'telephone')
  ) {
    return decide(false, `addressed only to non-financial institutions under ${secrecyType} secrecy`, RELEVANCE_CONFIDENCE.exclusiveNonFinancial);
  }

  if (financial.length > 0 && nonFinancial.length > 0) {
    return decide(true, 'mixed addressees; financial-institution blocks isolated', RELEVANCE_CONFIDENCE.mixed);
  }

  if (secrecyType === 'mixed' && (financial.length > 0 || generic.length > 0)) {
    return decide(true, 'mixed secrecy types including banking data', RELEVANCE_CONFIDENCE.mixed);
  }

  if (financial.length > 0) {
    const names = financial.some((b) => b.institution.type === 'target_institution')
      ? 'the institution'
      : 'a financial institution';
    return decide(true, `addressed to ${names}`, RELEVANCE_CONFIDENCE.financialAddressee);
  }

  const [only] = generic;
  if (
    classified.length === 1 &&
    only &&
    (secrecyType === 'banking' || (secrecyType === 'indeterminate' && BANKING_VOCABULARY.test(only.folded)))
  ) {
    return decide(true, 'single block without addressee requesting banking data', RELEVANCE_CONFIDENCE.genericBanking);
  }

  return decide(false, 'no financial-institution addressee found', RELEVANCE_CONFIDENCE.fallback);
}
