/**
 * Consolidator
 *
 * Merges lexical candidates with the Semantic Validator's verdicts into one
 * deduplicated match list. Pure: identical inputs always give an identical
 * output, so running it twice is a no-op.
 *
 * Per candidate:
 *   accepted verdict → kept, semantic fields attached, confidence = verdict confidence
 *   rejected verdict → dropped, alert
 *   no verdict       → kept as lexical-only, confidence = score × lexicalOnlyWeight, alert
 *   no validation    → kept when score ≥ acceptanceThreshold, confidence = score × lexicalOnlyWeight
 */

import type { CatalogSnapshot } from '../catalog/catalog';
import type { LexicalCandidate } from '../catalog/matcher';
import { clamp01, normalizeKey } from '../text';
import { UNCATALOGUED_ID } from '../types';
import type { SubsidyMatch } from '../types';
import type { SemanticNewItem, SemanticValidationResponse, SemanticVerdict } from '../validation/types';

export interface ConsolidationSettings {
  acceptanceThreshold: number;
  lexicalOnlyWeight: number;
}

export interface ConsolidationInput {
  candidates: readonly LexicalCandidate[];
  /** Validated response, or null when validation was skipped or failed. */
  validation: SemanticValidationResponse | null;
  catalog: CatalogSnapshot;
  settings: ConsolidationSettings;
}

export interface ConsolidationResult {
  matches: SubsidyMatch[];
  alerts: string[];
  unidentified_requests: string[];
}

function baseMatch(
  fields: Pick<SubsidyMatch, 'catalog_id' | 'subsidy_name' | 'source' | 'text_span' | 'score' | 'confidence'>
): SubsidyMatch {
  return {
    ...fields,
    uncatalogued: fields.catalog_id === UNCATALOGUED_ID,
    semantic_validated: false,
    semantic_confidence: null,
    evidence_text: null,
    justification: null,
    suggested_example: null,
    period_reference: null,
    period: null,
    circular_reference: null,
    requires_counterpart: false,
  };
}

function lexicalMatch(candidate: LexicalCandidate, settings: ConsolidationSettings): SubsidyMatch {
  return baseMatch({
    catalog_id: candidate.catalog_id,
    subsidy_name: candidate.subsidy_name,
    source: 'lexical',
    text_span: candidate.text_span,
    score: clamp01(candidate.score),
    confidence: clamp01(candidate.score * settings.lexicalOnlyWeight),
  });
}

function validatedMatch(candidate: LexicalCandidate, verdict: SemanticVerdict): SubsidyMatch {
  return {
    ...baseMatch({
      catalog_id: candidate.catalog_id,
      subsidy_name: candidate.subsidy_name,
      source: 'validated',
      text_span: candidate.text_span,
      score: clamp01(candidate.score),
      confidence: clamp01(verdict.confidence),
    }),
    semantic_validated: true,
    semantic_confidence: clamp01(verdict.confidence),
    evidence_text: verdict.evidence_text || null,
    justification: verdict.justification || null,
    suggested_example: verdict.suggested_example || null,
  };
}

function addedMatch(
  item: SemanticNewItem,
  catalogId: string,
  subsidyName: string,
  confidence: number
): SubsidyMatch {
  return {
    ...baseMatch({
      catalog_id: catalogId,
      subsidy_name: subsidyName,
      source: 'validator_added',
      text_span: item.request_text,
      score: 0,
      confidence: clamp01(confidence),
    }),
    semantic_validated: true,
    semantic_confidence: clamp01(confidence),
    evidence_text: item.evidence_text || null,
    justification: item.justification || null,
  };
}

/** Identity used for deduplication; uncatalogued requests are told apart by their text. */
function matchKey(match: SubsidyMatch): string {
  return match.uncatalogued ? `${UNCATALOGUED_ID}:${normalizeKey(match.text_span)}` : match.catalog_id;
}

/**
 * Keep one match per key: the higher confidence wins, the earlier one on a
 * tie, and first-seen order is preserved.
 */
export function dedupeMatches(matches: readonly SubsidyMatch[]): SubsidyMatch[] {
  const byKey = new Map<string, SubsidyMatch>();
  for (const match of matches) {
    const key = matchKey(match);
    const existing = byKey.get(key);
    if (!existing || match.confidence > existing.confidence) {
      byKey.set(key, match);
    }
  }
  return Array.from(byKey.values());
}

export function consolidate(input: ConsolidationInput): ConsolidationResult {
  const { candidates, validation, catalog, settings } = input;
  const alerts: string[] = [];
  const merged: SubsidyMatch[] = [];
  const unidentified: string[] = [];

  if (validation === null) {
    for (const candidate of candidates) {
      if (candidate.score >= settings.acceptanceThreshold) {
        merged.push(lexicalMatch(candidate, settings));
      }
    }
    return { matches: dedupeMatches(merged), alerts, unidentified_requests: unidentified };
  }

  const verdicts = new Map<string, SemanticVerdict>();
  for (const verdict of validation.validations) {
    if (!catalog.has(verdict.catalog_id)) {
      alerts.push(`Validator returned a verdict for unknown catalog id "${verdict.catalog_id}"; ignored`);
      continue;
    }
    if (!verdicts.has(verdict.catalog_id)) verdicts.set(verdict.catalog_id, verdict);
  }

  for (const candidate of candidates) {
    const verdict = verdicts.get(candidate.catalog_id);
    if (!verdict) {
      alerts.push(`No validator verdict for "${candidate.subsidy_name}"; kept as lexical-only match`);
      merged.push(lexicalMatch(candidate, settings));
    } else if (verdict.accepted) {
      merged.push(validatedMatch(candidate, verdict));
    } else {
      alerts.push(`Validator rejected "${candidate.subsidy_name}": ${verdict.justification}`);
    }
  }

  for (const item of validation.new_items) {
    const suggested = item.suggested_catalog_id ? catalog.get(item.suggested_catalog_id) : undefined;
    if (suggested) {
      merged.push(addedMatch(item, suggested.id, suggested.name, validation.overall_confidence));
      continue;
    }

    merged.push(addedMatch(item, UNCATALOGUED_ID, item.request_text, validation.overall_confidence));
    if (item.is_new && !unidentified.some((r) => normalizeKey(r) === normalizeKey(item.request_text))) {
      unidentified.push(item.request_text);
      alerts.push(`Request not covered by the catalog: "${item.request_text}"`);
    }
  }

  return { matches: dedupeMatches(merged), alerts, unidentified_requests: unidentified };
}
