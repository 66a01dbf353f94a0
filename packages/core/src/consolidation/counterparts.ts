/**
 * Transfer counterpart (origin/destination) detection.
 *
 * Flags orders that want both ends of every transfer disclosed: the
 * originating account, the beneficiary, their tax ids.
 */

import { clamp01, foldText, splitSentences } from '../text';
import type { CounterpartKind, CounterpartRequirement, SubsidyMatch } from '../types';

export const EVIDENCE_WEIGHT = 0.3;
export const INFERRED_COUNTERPART_DISCOUNT = 0.7;

// Matched against folded text
const COUNTERPART_PATTERNS: readonly RegExp[] = [
  /origem e destino|origin and destination|source and destination|de ?[/-] ?para|from ?\/ ?to/g,
  /conta(?:s)? de (?:origem|destino)|(?:originating|source|destination|receiving) accounts?/g,
  /(?<![\p{L}])(?:remetentes?|destinatarios?|beneficiarios?|favorecidos?|senders?|recipients?|beneficiar(?:y|ies)|payees?|remitters?|counterpart(?:y|ies))(?![\p{L}])/gu,
  /transferencias? (?:para|de|entre)|transfers? (?:to|from|between)/g,
  /identificacao d[oa]s? (?:remetentes?|destinatarios?|beneficiarios?)|identification of the (?:senders?|recipients?|beneficiar(?:y|ies))/g,
  /dados do (?:favorecido|recebedor)|(?:payee|recipient|beneficiary) details/g,
  /(?:cpf|cnpj|nome|razao social) do (?:destinatario|beneficiario|favorecido)|(?:tax id|name) of the (?:recipient|beneficiary|payee)/g,
];

const KIND_PATTERNS: ReadonlyArray<{ kind: CounterpartKind; pattern: RegExp }> = [
  { kind: 'account', pattern: /conta|account/ },
  { kind: 'beneficiary', pattern: /beneficiar|favorecid|destinatari|recipient|payee/ },
  { kind: 'tax_identification', pattern: /cpf|cnpj|tax id/ },
  { kind: 'sender', pattern: /remetente|sender|remitter/ },
];

const TRANSFER_KEYWORDS =
  /(?<![\p{L}])(?:transferencias?|ted|doc|pix|remessas?|pagamentos?|debitos?|creditos?|movimentac(?:ao|oes)|transfers?|wires?|payments?|debits?|credits?|remittances?|transactions?)(?![\p{L}])/u;

export interface CounterpartAnnotation {
  requirement: CounterpartRequirement | null;
  matches: SubsidyMatch[];
}

export function findCounterpartEvidence(text: string): string[] {
  const folded = foldText(text);
  const evidence = new Set<string>();
  for (const pattern of COUNTERPART_PATTERNS) {
    for (const found of folded.matchAll(pattern)) {
      evidence.add(found[0].trim());
    }
  }
  return Array.from(evidence);
}

function kindsOf(evidence: readonly string[]): CounterpartKind[] {
  return KIND_PATTERNS.filter(({ pattern }) => evidence.some((e) => pattern.test(e))).map((k) => k.kind);
}

function mentionsTransfer(match: SubsidyMatch): boolean {
  return TRANSFER_KEYWORDS.test(foldText(match.subsidy_name)) || TRANSFER_KEYWORDS.test(foldText(match.text_span));
}

/** True when evidence follows the request in the same sentence. */
function evidenceFollowsSpan(text: string, match: SubsidyMatch, evidence: readonly string[]): boolean {
  const span = foldText(match.text_span);
  if (!span) return false;
  return splitSentences(foldText(text)).some((sentence) => {
    const at = sentence.indexOf(span);
    if (at < 0) return false;
    const rest = sentence.slice(at + span.length);
    return evidence.some((e) => rest.includes(e));
  });
}

export function annotateCounterparts(text: string, matches: readonly SubsidyMatch[]): CounterpartAnnotation {
  const evidence = findCounterpartEvidence(text);
  if (evidence.length === 0) {
    return { requirement: null, matches: matches.map((m) => ({ ...m })) };
  }

  let indices = matches
    .map((match, index) => ({ match, index }))
    .filter(({ match }) => mentionsTransfer(match) || evidenceFollowsSpan(text, match, evidence))
    .map(({ index }) => index);

  let confidence = clamp01(EVIDENCE_WEIGHT * evidence.length);
  const appliesToAll = indices.length === 0;
  if (appliesToAll) {
    indices = matches.map((_, index) => index);
    confidence *= INFERRED_COUNTERPART_DISCOUNT;
  }

  const selected = new Set(indices);
  const annotated = matches.map((match, index) =>
    selected.has(index) ? { ...match, requires_counterpart: true } : { ...match }
  );

  return {
    requirement: {
      required: true,
      catalog_ids: Array.from(new Set(indices.map((i) => matches[i]?.catalog_id ?? ''))).filter(Boolean),
      evidence,
      kinds: kindsOf(evidence),
      applies_to_all: appliesToAll,
      confidence,
    },
    matches: annotated,
  };
}
