/**
 * Warrant Orchestrator
 *
 * Sequences the pipeline as a state machine:
 *
 *   INIT → CLASSIFIED → FILTERED → CONTENT_EXTRACTED → ENTITIES_EXTRACTED
 *        → MATCHED → PERIODS_RESOLVED → ROUTED
 *
 * with early terminals REITERATION_HELD, NOT_RELEVANT and INSUFFICIENT_INFO.
 * Every run returns a result; an unexpected failure ends in ERROR.
 */

import { ulid } from 'ulid';
import type { CatalogSnapshot } from '../catalog/catalog';
import { CatalogMatcher } from '../catalog/matcher';
import { classifyInput } from '../classification/structural-classifier';
import { filterRelevance } from '../classification/relevance-filter';
import {
  CONTENT_NOT_FOUND,
  extractContent,
  extractMinimalLookupInfo,
} from '../classification/content-extractor';
import { annotateCirculars, circularReference } from '../consolidation/circulars';
import { annotateCounterparts } from '../consolidation/counterparts';
import { buildPipelineSettings } from '../config';
import type { PipelineSettings } from '../config';
import { getContext, runWithContextAsync } from '../context';
import { detectReferenceDate } from '../extractors/dates';
import { extractParties } from '../extractors/parties';
import { logger } from '../logger';
import { documentsProcessedCounter, stageDurationHistogram, subsidyMatchesCounter } from '../metrics';
import { resolvePeriods } from '../periods/fan-out';
import { toIsoDate } from '../periods/tokens';
import type { RoutingStatus, WarrantProcessingResult } from '../types';
import type { SemanticValidator } from '../validation/types';
import { matchSubsidies } from './matching';
import { aggregateConfidence, routeByConfidence } from './routing';

export const ORCHESTRATOR_STATES = {
  INIT: 'INIT',
  CLASSIFIED: 'CLASSIFIED',
  FILTERED: 'FILTERED',
  CONTENT_EXTRACTED: 'CONTENT_EXTRACTED',
  ENTITIES_EXTRACTED: 'ENTITIES_EXTRACTED',
  MATCHED: 'MATCHED',
  PERIODS_RESOLVED: 'PERIODS_RESOLVED',
  ROUTED: 'ROUTED',
  REITERATION_HELD: 'REITERATION_HELD',
  NOT_RELEVANT: 'NOT_RELEVANT',
  INSUFFICIENT_INFO: 'INSUFFICIENT_INFO',
  ERROR: 'ERROR',
} as const;

export type OrchestratorState = (typeof ORCHESTRATOR_STATES)[keyof typeof ORCHESTRATOR_STATES];

export const INSUFFICIENT_INFO_CONFIDENCE = 0.3;

export interface OrchestratorOptions {
  catalog: CatalogSnapshot;
  /** Omit to run lexical-only. */
  validator?: SemanticValidator | null;
  settings?: Partial<PipelineSettings>;
}

export interface ProcessOptions {
  /** Date the relative periods are counted back from; read from the document when omitted. */
  referenceDate?: Date | null;
  sessionId?: string;
  documentId?: string;
  correlationId?: string;
}

function emptyResult(sessionId: string): WarrantProcessingResult {
  return {
    session_id: sessionId,
    state: ORCHESTRATOR_STATES.INIT,
    state_history: [ORCHESTRATOR_STATES.INIT],
    classification: null,
    order_class: 'indeterminate',
    should_process: false,
    relevance: null,
    parties: [],
    matches: [],
    periods: [],
    circulars: [],
    counterpart_requirement: null,
    unidentified_requests: [],
    validator_status: 'skipped',
    reference_date: null,
    needs_external_lookup: false,
    lookup_data: null,
    overall_confidence: 0,
    alerts: [],
    routing_status: 'manual_analysis',
    error: null,
  };
}

/**
 * Mutable state of one run. Never shared between runs.
 */
class ProcessingRun {
  readonly result: WarrantProcessingResult;

  constructor(sessionId: string) {
    this.result = emptyResult(sessionId);
  }

  transition(state: OrchestratorState): void {
    this.result.state = state;
    this.result.state_history.push(state);
    logger.debug('State transition', { state });
  }

  alert(message: string): void {
    this.result.alerts.push(message);
    logger.warn('Processing alert', { alert: message });
  }

  finish(
    state: OrchestratorState,
    routing: RoutingStatus,
    fields: Partial<WarrantProcessingResult> = {}
  ): WarrantProcessingResult {
    Object.assign(this.result, fields);
    this.result.routing_status = routing;
    this.transition(state);
    documentsProcessedCounter.inc({ routing_status: routing });
    logger.info('Warrant processed', {
      state,
      routing_status: routing,
      overall_confidence: this.result.overall_confidence,
      parties: this.result.parties.length,
      matches: this.result.matches.length,
      alerts: this.result.alerts.length,
    });
    return this.result;
  }
}

async function timed<T>(stage: string, fn: () => T | Promise<T>): Promise<T> {
  const end = stageDurationHistogram.startTimer({ stage });
  try {
    return await fn();
  } finally {
    end();
  }
}

export class WarrantOrchestrator {
  readonly settings: PipelineSettings;
  private readonly catalog: CatalogSnapshot;
  private readonly matcher: CatalogMatcher;
  private readonly validator: SemanticValidator | null;

  constructor(options: OrchestratorOptions) {
    this.settings = buildPipelineSettings(options.settings);
    this.catalog = options.catalog;
    this.matcher = new CatalogMatcher(options.catalog);
    this.validator = options.validator ?? null;
  }

  async process(text: string, options: ProcessOptions = {}): Promise<WarrantProcessingResult> {
    const sessionId = options.sessionId ?? ulid();
    const correlationId = options.correlationId ?? getContext()?.correlationId ?? ulid();

    return runWithContextAsync(
      { correlationId, sessionId, documentId: options.documentId },
      async () => {
        const run = new ProcessingRun(sessionId);
        logger.info('Processing warrant', { length: text.length, validator: this.validator?.name ?? null });

        try {
          return await this.execute(run, text.normalize('NFC'), options);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Warrant processing failed', error, { state: run.result.state });
          run.result.alerts.push(`Processing failed in state ${run.result.state}: ${message}`);
          return run.finish(ORCHESTRATOR_STATES.ERROR, 'error', {
            should_process: false,
            overall_confidence: 0,
            error: message,
          });
        }
      }
    );
  }

  private async execute(
    run: ProcessingRun,
    text: string,
    options: ProcessOptions
  ): Promise<WarrantProcessingResult> {
    const { settings } = this;

    // Step 1: Structural classification
    const classification = await timed('classify', () => classifyInput(text));
    run.result.classification = classification;
    run.result.order_class = classification.order_class;
    run.transition(ORCHESTRATOR_STATES.CLASSIFIED);

    if (classification.order_class === 'reiteration') {
      run.alert('Reiteration of a previous order: held without reprocessing');
      return run.finish(ORCHESTRATOR_STATES.REITERATION_HELD, 'reiteration_held', {
        should_process: false,
        overall_confidence: classification.confidence,
      });
    }

    // Step 2: Relevance
    const relevance = await timed('relevance', () => filterRelevance(text, settings.institutionName));
    run.result.relevance = relevance;
    run.transition(ORCHESTRATOR_STATES.FILTERED);

    const named = relevance.institutions.filter((i) => i.type !== 'indeterminate');
    if (named.length > 0) {
      run.alert(`Institutions mentioned: ${named.map((i) => `${i.type}${i.name ? ` (${i.name})` : ''}`).join(', ')}`);
    }
    if (relevance.secrecy_type !== 'indeterminate') {
      run.alert(`Secrecy type: ${relevance.secrecy_type}`);
    }
    if (relevance.has_multiple_addressees && relevance.relevant_span !== null) {
      run.alert('Multiple addressees detected; only the financial-institution blocks are processed');
    }

    if (!relevance.is_relevant) {
      return run.finish(ORCHESTRATOR_STATES.NOT_RELEVANT, 'not_relevant', {
        should_process: false,
        overall_confidence: relevance.confidence,
      });
    }

    // Step 3: Content isolation
    const working = relevance.relevant_span ?? text;
    const extracted = await timed('content', () => extractContent(working, classification));
    let content: string;
    if (extracted === CONTENT_NOT_FOUND) {
      const lookup = extractMinimalLookupInfo(working);
      run.result.lookup_data = lookup;
      if (!lookup.can_lookup) {
        run.alert('Order content not found and no process number or identifier to look it up');
        return run.finish(ORCHESTRATOR_STATES.INSUFFICIENT_INFO, 'insufficient_info', {
          should_process: false,
          needs_external_lookup: true,
          overall_confidence: INSUFFICIENT_INFO_CONFIDENCE,
        });
      }
      run.alert('Order content could not be isolated; processing the whole text');
      content = working;
    } else {
      content = extracted;
    }
    run.transition(ORCHESTRATOR_STATES.CONTENT_EXTRACTED);

    // Step 4: Parties
    const extraction = await timed('parties', () => extractParties(content));
    run.result.parties = extraction.parties;
    if (extraction.parties.length === 0) {
      run.alert('No investigated party identified');
    }
    if (extraction.more_parties_possible) {
      run.alert('The order may name more parties than were extracted');
    }
    for (const party of extraction.parties.filter((p) => p.identifier_missing)) {
      run.alert(`Party "${party.name}" has no tax identifier`);
    }
    run.transition(ORCHESTRATOR_STATES.ENTITIES_EXTRACTED);

    // Step 5: Matching, validation, consolidation and annotations
    const matching = await timed('matching', () =>
      matchSubsidies({
        text: content,
        catalog: this.catalog,
        matcher: this.matcher,
        validator: this.validator,
        settings,
      })
    );
    matching.alerts.forEach((a) => run.alert(a));
    run.result.validator_status = matching.validator_status;
    run.result.unidentified_requests = matching.unidentified_requests;

    const withCirculars = annotateCirculars(content, matching.matches);
    for (const circular of withCirculars.circulars) {
      run.alert(
        `Regulatory circular ${circularReference(circular)} referenced` +
          (circular.applies_to_all ? ' (applies to all requests)' : '')
      );
    }
    const withCounterparts = annotateCounterparts(content, withCirculars.matches);
    if (withCounterparts.requirement) {
      run.alert(`Transfer counterpart (origin/destination) data requested: ${withCounterparts.requirement.evidence.join(', ')}`);
    }
    run.result.circulars = withCirculars.circulars;
    run.result.counterpart_requirement = withCounterparts.requirement;

    const matches = withCounterparts.matches;
    if (matches.length === 0) {
      run.alert('No catalog subsidy matched');
    }
    run.transition(ORCHESTRATOR_STATES.MATCHED);

    // Step 6: Periods
    let referenceDate = options.referenceDate ?? null;
    let referenceSpan: { index: number; length: number } | null = null;
    const detected = detectReferenceDate(content);
    if (detected) {
      referenceSpan = { index: detected.index, length: detected.source_text.length };
      referenceDate = referenceDate ?? detected.date;
    }
    run.result.reference_date = referenceDate ? toIsoDate(referenceDate) : null;

    const resolution = await timed('periods', () =>
      resolvePeriods(
        extraction.parties,
        matches,
        { text: content, catalog: this.catalog, referenceDate, referenceSpan },
        settings.periodConcurrency
      )
    );
    run.result.matches = matches.map((match, i) => {
      const period = resolution.matchPeriods[i] ?? null;
      return { ...match, period, period_reference: period?.source_text ?? null };
    });
    run.result.periods = resolution.periods;
    run.transition(ORCHESTRATOR_STATES.PERIODS_RESOLVED);

    // Step 7: Confidence and routing
    const overallConfidence = aggregateConfidence({
      classifierConfidence: classification.confidence,
      partyCount: extraction.parties.length,
      matches: run.result.matches,
      orderClass: classification.order_class,
      validatorStatus: matching.validator_status,
      validatorFailureDiscount: settings.validatorFailureDiscount,
    });
    if (classification.order_class === 'supplement') {
      run.alert('Supplement to a previous order');
    }
    for (const match of run.result.matches) {
      subsidyMatchesCounter.inc({ source: match.source });
    }

    return run.finish(ORCHESTRATOR_STATES.ROUTED, routeByConfidence(overallConfidence, settings), {
      should_process: true,
      overall_confidence: overallConfidence,
    });
  }
}

/**
 * One-off convenience wrapper; reuse a WarrantOrchestrator for many documents.
 */
export async function processWarrant(
  text: string,
  options: OrchestratorOptions & ProcessOptions
): Promise<WarrantProcessingResult> {
  const orchestrator = new WarrantOrchestrator(options);
  return orchestrator.process(text, options);
}
