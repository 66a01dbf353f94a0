/**
 * Matching stage: segmentation, lexical matching, semantic validation and
 * consolidation.
 *
 * The validator is called once. Any failure, whether the call throws or the
 * payload breaks the response contract, discards its output and falls back to
 * lexical-only matches; the orchestrator applies the confidence discount.
 */

import type { CatalogSnapshot } from '../catalog/catalog';
import { CatalogMatcher } from '../catalog/matcher';
import type { LexicalCandidate } from '../catalog/matcher';
import { segmentRequests } from '../catalog/segmentation';
import { consolidate } from '../consolidation/consolidator';
import type { PipelineSettings } from '../config';
import { MalformedValidatorResponseError, ValidatorUnavailableError } from '../errors';
import { logger } from '../logger';
import { validatorRequestsCounter } from '../metrics';
import { parseValidatorResponse } from '../schemas';
import type { CatalogEntry, SubsidyMatch, ValidatorStatus } from '../types';
import type {
  SemanticValidationRequest,
  SemanticValidationResponse,
  SemanticValidator,
} from '../validation/types';

export interface MatchingOutcome {
  matches: SubsidyMatch[];
  unidentified_requests: string[];
  validator_status: ValidatorStatus;
  alerts: string[];
}

export interface MatchingInput {
  text: string;
  catalog: CatalogSnapshot;
  matcher: CatalogMatcher;
  validator: SemanticValidator | null;
  settings: PipelineSettings;
}

export function buildValidationRequest(
  text: string,
  candidates: readonly LexicalCandidate[],
  unmatched: readonly string[],
  catalog: CatalogSnapshot,
  catalogLimit: number
): SemanticValidationRequest {
  const subset = new Map<string, CatalogEntry>();
  for (const candidate of candidates) {
    const entry = catalog.get(candidate.catalog_id);
    if (entry) subset.set(entry.id, entry);
  }
  for (const entry of catalog.entries.slice(0, catalogLimit)) {
    if (!subset.has(entry.id)) subset.set(entry.id, entry);
  }

  return {
    document_text: text,
    lexical_matches: candidates.map((c) => ({
      catalog_id: c.catalog_id,
      text_span: c.text_span,
      score: c.score,
    })),
    unmatched_fragments: [...unmatched],
    catalog_subset: Array.from(subset.values()),
  };
}

interface ValidationAttempt {
  status: ValidatorStatus;
  response: SemanticValidationResponse | null;
  alert: string | null;
}

async function runValidator(
  validator: SemanticValidator,
  request: SemanticValidationRequest
): Promise<ValidationAttempt> {
  try {
    const raw = await validator.validate(request);
    const response = parseValidatorResponse(raw);
    validatorRequestsCounter.inc({ outcome: 'accepted' });
    return { status: 'accepted', response, alert: null };
  } catch (error) {
    if (error instanceof MalformedValidatorResponseError) {
      validatorRequestsCounter.inc({ outcome: 'malformed' });
      logger.warn('Semantic validator response rejected', {
        validator: validator.name,
        violations: error.violations,
      });
      return {
        status: 'malformed',
        response: null,
        alert: 'Semantic validator returned a malformed response; lexical-only matches used',
      };
    }

    validatorRequestsCounter.inc({ outcome: 'unavailable' });
    const reason = error instanceof ValidatorUnavailableError ? error.message : 'unexpected validator failure';
    logger.error('Semantic validator unavailable', error, { validator: validator.name });
    return {
      status: 'unavailable',
      response: null,
      alert: `Semantic validator unavailable (${reason}); lexical-only matches used`,
    };
  }
}

export async function matchSubsidies(input: MatchingInput): Promise<MatchingOutcome> {
  const { text, catalog, matcher, validator, settings } = input;
  const alerts: string[] = [];

  const items = segmentRequests(text, settings.minFragmentLength);
  const itemMatches = matcher.matchItems(items, settings.recallThreshold);

  const candidates: LexicalCandidate[] = [];
  const unmatched: string[] = [];
  for (const { item, candidates: ranked } of itemMatches) {
    const [top] = ranked;
    if (top) candidates.push(top);
    else unmatched.push(item);
  }

  logger.debug('Lexical matching complete', {
    items: items.length,
    candidates: candidates.length,
    unmatched: unmatched.length,
  });

  let attempt: ValidationAttempt = { status: 'skipped', response: null, alert: null };
  if (validator) {
    attempt = await runValidator(
      validator,
      buildValidationRequest(text, candidates, unmatched, catalog, settings.validatorCatalogLimit)
    );
    if (attempt.alert) alerts.push(attempt.alert);
  }

  const consolidated = consolidate({
    candidates,
    validation: attempt.response,
    catalog,
    settings,
  });

  return {
    matches: consolidated.matches,
    unidentified_requests: consolidated.unidentified_requests,
    validator_status: attempt.status,
    alerts: [...alerts, ...consolidated.alerts],
  };
}
