/**
 * Core Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, buildPipelineSettings, type Config, type PipelineSettings } from './config';

// Errors
export {
  ERROR_CODES,
  WarrantTriageError,
  CatalogError,
  ValidatorUnavailableError,
  MalformedValidatorResponseError,
  InvalidInputError,
  toErrorEnvelope,
  statusForError,
  type ErrorCode,
  type ErrorEnvelope,
} from './errors';

// Types
export * from './types';

// Text helpers
export { foldText, normalizeKey, digitsOnly } from './text';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ProcessWarrantJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  documentsProcessedCounter,
  stageDurationHistogram,
  validatorRequestsCounter,
  subsidyMatchesCounter,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateValidatorResponse,
  validateCatalog,
  validateProcessingResult,
  parseValidatorResponse,
  schemas,
  type ValidationResult,
} from './schemas';

// Catalog
export { createCatalogSnapshot, type CatalogSnapshot, type CatalogEntryInput } from './catalog/catalog';
export {
  DEFAULT_FIELD_MAPPING,
  PORTUGUESE_FIELD_MAPPING,
  mapCatalogRecords,
  buildCatalog,
  loadCatalogFromFile,
  type CatalogFieldMapping,
} from './catalog/loader';
export { CatalogMatcher, charWbNgrams, type LexicalCandidate, type ItemMatch } from './catalog/matcher';
export { segmentRequests } from './catalog/segmentation';

// Classification
export { classifyInput, MARKER_FAMILIES } from './classification/structural-classifier';
export {
  filterRelevance,
  segmentAddressees,
  detectSecrecyType,
  RELEVANCE_CONFIDENCE,
  type AddresseeBlock,
} from './classification/relevance-filter';
export {
  extractContent,
  extractMinimalLookupInfo,
  CONTENT_NOT_FOUND,
  type ContentExtraction,
} from './classification/content-extractor';

// Extractors
export { extractParties, PARTY_CONFIDENCE } from './extractors/parties';
export {
  findDateMentions,
  extractPeriodExpression,
  detectReferenceDate,
  type DateMention,
  type PeriodExpression,
  type ReferenceDateMention,
} from './extractors/dates';

// Semantic validation
export type {
  SemanticValidator,
  SemanticValidationRequest,
  SemanticValidationResponse,
  SemanticVerdict,
  SemanticNewItem,
  LexicalMatchSummary,
} from './validation/types';
export {
  OpenAiSemanticValidator,
  createOpenAiChatClient,
  buildValidationPrompt,
  type ChatCompletionClient,
  type ChatCompletionRequest,
  type ChatCompletionReply,
  type OpenAiSemanticValidatorOptions,
} from './validation/openai-validator';
export { SEMANTIC_VALIDATION_TEMPLATE, SEMANTIC_VALIDATION_SCHEMA } from './templates/semantic-validation.template';
export { renderTemplate, type PromptTemplate } from './templates/types';

// Consolidation
export {
  consolidate,
  dedupeMatches,
  type ConsolidationInput,
  type ConsolidationResult,
  type ConsolidationSettings,
} from './consolidation/consolidator';
export { annotateCirculars, expandCircularYear, circularReference } from './consolidation/circulars';
export { annotateCounterparts, findCounterpartEvidence } from './consolidation/counterparts';

// Periods
export {
  PERIOD_SENTINELS,
  toDateToken,
  toIsoDate,
  expressionToTokens,
  parseStartToken,
  parseEndToken,
  tokensToRequirement,
  type PeriodTokens,
} from './periods/tokens';
export { resolvePeriod, findPeriodExpression, type PeriodContext } from './periods/resolver';
export { resolvePeriods, ANY_PARTY_KEY, type PeriodResolution } from './periods/fan-out';

// Orchestrator
export {
  WarrantOrchestrator,
  processWarrant,
  ORCHESTRATOR_STATES,
  INSUFFICIENT_INFO_CONFIDENCE,
  type OrchestratorState,
  type OrchestratorOptions,
  type ProcessOptions,
} from './orchestrator/orchestrator';
export { matchSubsidies, buildValidationRequest, type MatchingOutcome } from './orchestrator/matching';
export { aggregateConfidence, routeByConfidence, type ConfidenceInputs } from './orchestrator/routing';
export { processBatch, type BatchDocument } from './orchestrator/batch';
