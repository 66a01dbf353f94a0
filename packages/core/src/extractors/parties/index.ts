/**
 * Party Extractor
 *
 * Two passes over the canonical order text:
 * 1. Structured block: a labeled list ("INVESTIGADOS:", "Targets:") parsed line by line.
 * 2. Free text: a capitalised name directly next to a personal or corporate identifier.
 *
 * Parties are keyed by identifier digits, or by normalized name when no
 * identifier was found, and merged on that key.
 */

import { logger } from '../../logger';
import { digitsOnly, normalizeKey } from '../../text';
import type { InvestigatedParty, PartyExtraction, PartyKind } from '../../types';
import {
  PARTY_BLOCK_LABEL,
  NAME_LABEL_WORDS,
  NAME_CHAIN_SOURCE,
  NAME_THEN_ID_PATTERN,
  ID_THEN_NAME_PATTERN,
  TAX_ID_PATTERN,
  MORE_PARTIES_PATTERN,
  CORPORATE_SUFFIX,
  classifyTaxId,
} from './patterns';

export const PARTY_CONFIDENCE = {
  structured: 0.95,
  freeText: 0.9,
  nameOnly: 0.6,
} as const;

const NAME_ONLY_LINE = new RegExp(`^${NAME_CHAIN_SOURCE}$`, 'u');
const TRAILING_ID_LABEL = /[ \t,(:\-–]+(?:CPF|CNPJ|tax[ \t]+id(?:entification)?(?:[ \t]+(?:no\.?|number))?|n[º°o]\.?)[ \t:]*$/iu;
const LINE_BULLET = /^[ \t]*(?:[-–•*·]+|\(?\d{1,3}[).]|\(?[a-z][).])[ \t]*/iu;

interface Candidate {
  name: string;
  taxId: string | null;
  confidence: number;
}

function cleanName(raw: string): string {
  let name = raw.replace(/\s+/g, ' ').trim();
  let previous = '';
  while (previous !== name) {
    previous = name;
    name = name.replace(NAME_LABEL_WORDS, '').replace(TRAILING_ID_LABEL, '').trim();
  }
  return name.replace(/^[\s,;:\-–()]+|[\s,;:\-–()]+$/gu, '').trim();
}

function partyKind(name: string, taxId: string | null): PartyKind {
  const type = taxId ? classifyTaxId(taxId) : null;
  if (type === 'corporate') return 'corporate';
  if (type === 'personal') return 'individual';
  return CORPORATE_SUFFIX.test(name) ? 'corporate' : 'individual';
}

function toParty(candidate: Candidate): InvestigatedParty {
  const taxId = candidate.taxId ? digitsOnly(candidate.taxId) : null;
  return {
    key: taxId ?? normalizeKey(candidate.name),
    name: candidate.name,
    tax_id: taxId,
    tax_id_type: taxId ? classifyTaxId(taxId) : null,
    party_kind: partyKind(candidate.name, taxId),
    identifier_missing: taxId === null,
    confidence: candidate.confidence,
  };
}

/**
 * Lines of the first labeled party block, up to a blank line or the first
 * line that is neither an identifier line nor a bare name.
 */
function structuredBlockLines(text: string): string[] {
  const label = PARTY_BLOCK_LABEL.exec(text);
  if (!label) return [];

  const rest = text.slice(label.index + label[0].length);
  const [firstLine = '', ...following] = rest.split('\n');
  const lines: string[] = [];

  if (firstLine.trim()) {
    lines.push(...firstLine.split(';'));
  }

  for (const line of following) {
    if (!line.trim()) {
      if (lines.length > 0) break;
      continue;
    }
    const stripped = line.replace(LINE_BULLET, '').trim();
    TAX_ID_PATTERN.lastIndex = 0;
    const hasId = TAX_ID_PATTERN.test(stripped);
    if (!hasId && !NAME_ONLY_LINE.test(cleanName(stripped))) break;
    lines.push(stripped);
  }

  return lines;
}

function parseBlockLine(line: string): Candidate | null {
  const stripped = line.replace(LINE_BULLET, '');
  const ids = stripped.match(TAX_ID_PATTERN);
  const taxId = ids?.[0] ?? null;
  const withoutId = taxId ? stripped.replace(taxId, ' ') : stripped;
  const name = cleanName(withoutId);
  if (!/\p{L}{2,}/u.test(name)) return null;

  return {
    name,
    taxId,
    confidence: taxId ? PARTY_CONFIDENCE.structured : PARTY_CONFIDENCE.nameOnly,
  };
}

function freeTextCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];

  for (const match of text.matchAll(NAME_THEN_ID_PATTERN)) {
    const [, rawName, taxId] = match;
    if (rawName === undefined || taxId === undefined) continue;
    const name = cleanName(rawName);
    if (name) candidates.push({ name, taxId, confidence: PARTY_CONFIDENCE.freeText });
  }

  for (const match of text.matchAll(ID_THEN_NAME_PATTERN)) {
    const [, taxId, rawName] = match;
    if (rawName === undefined || taxId === undefined) continue;
    const name = cleanName(rawName);
    if (name) candidates.push({ name, taxId, confidence: PARTY_CONFIDENCE.freeText });
  }

  return candidates;
}

/**
 * Merge parties by key. A name-only party whose normalized name equals that
 * of an identified party is folded into it.
 */
export function mergeParties(parties: readonly InvestigatedParty[]): InvestigatedParty[] {
  const byKey = new Map<string, InvestigatedParty>();

  for (const party of parties) {
    const existing = byKey.get(party.key);
    if (!existing) {
      byKey.set(party.key, party);
    } else if (party.confidence > existing.confidence) {
      byKey.set(party.key, { ...party, name: party.name || existing.name });
    }
  }

  const identifiedNames = new Set<string>();
  for (const party of byKey.values()) {
    if (party.tax_id) identifiedNames.add(normalizeKey(party.name));
  }

  return Array.from(byKey.values()).filter(
    (party) => party.tax_id !== null || !identifiedNames.has(party.key)
  );
}

export function extractParties(text: string): PartyExtraction {
  const structured = structuredBlockLines(text)
    .map(parseBlockLine)
    .filter((c): c is Candidate => c !== null);

  const candidates = [...structured, ...freeTextCandidates(text)];
  const parties = mergeParties(candidates.map(toParty));
  const morePartiesPossible = MORE_PARTIES_PATTERN.test(text);

  logger.debug('Parties extracted', {
    structured: structured.length,
    total: parties.length,
    morePartiesPossible,
  });

  return { parties, more_parties_possible: morePartiesPossible };
}
