/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Thresholds live here rather than in the stage code; callers may still
 * override any of them per orchestrator through buildPipelineSettings().
 */

import { InvalidInputError } from './errors';

export interface Config {
  // Institution
  institutionName: string;

  // Routing
  autoProcessThreshold: number;
  humanReviewThreshold: number;

  // Catalog matching
  recallThreshold: number;
  acceptanceThreshold: number;
  minFragmentLength: number;
  lexicalOnlyWeight: number;

  // Semantic validation
  validatorFailureDiscount: number;
  validatorCatalogLimit: number;

  // Parallelism
  periodConcurrency: number;
  batchConcurrency: number;

  // Catalog
  catalogPath: string;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // LLM
  llmModel: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;

  // Metrics
  metricsPort: number;
}

export const config: Config = {
  // Institution
  institutionName: process.env.INSTITUTION_NAME || 'Banco X',

  // Routing
  autoProcessThreshold: parseFloat(process.env.ROUTING_AUTO_PROCESS_THRESHOLD || '0.75'),
  humanReviewThreshold: parseFloat(process.env.ROUTING_HUMAN_REVIEW_THRESHOLD || '0.50'),

  // Catalog matching
  recallThreshold: parseFloat(process.env.MATCHER_RECALL_THRESHOLD || '0.20'),
  acceptanceThreshold: parseFloat(process.env.MATCHER_ACCEPTANCE_THRESHOLD || '0.50'),
  minFragmentLength: parseInt(process.env.MATCHER_MIN_FRAGMENT_LENGTH || '10', 10),
  lexicalOnlyWeight: parseFloat(process.env.LEXICAL_ONLY_WEIGHT || '0.7'),

  // Semantic validation
  validatorFailureDiscount: parseFloat(process.env.VALIDATOR_FAILURE_DISCOUNT || '0.8'),
  validatorCatalogLimit: parseInt(process.env.VALIDATOR_CATALOG_LIMIT || '50', 10),

  // Parallelism
  periodConcurrency: parseInt(process.env.PERIOD_RESOLVER_CONCURRENCY || '8', 10),
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || '4', 10),

  // Catalog
  catalogPath: process.env.CATALOG_PATH || 'data/subsidy-catalog.json',

  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '5', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '5000', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '10000', 10),

  // LLM
  llmModel: process.env.LLM_MODEL || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',

  // Metrics
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
};

/**
 * Thresholds and limits that flow through a single processing run.
 */
export interface PipelineSettings {
  institutionName: string;
  autoProcessThreshold: number;
  humanReviewThreshold: number;
  recallThreshold: number;
  acceptanceThreshold: number;
  minFragmentLength: number;
  lexicalOnlyWeight: number;
  validatorFailureDiscount: number;
  validatorCatalogLimit: number;
  periodConcurrency: number;
}

/**
 * Merge explicit overrides over the environment configuration.
 */
export function buildPipelineSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  const settings: PipelineSettings = {
    institutionName: overrides.institutionName ?? config.institutionName,
    autoProcessThreshold: overrides.autoProcessThreshold ?? config.autoProcessThreshold,
    humanReviewThreshold: overrides.humanReviewThreshold ?? config.humanReviewThreshold,
    recallThreshold: overrides.recallThreshold ?? config.recallThreshold,
    acceptanceThreshold: overrides.acceptanceThreshold ?? config.acceptanceThreshold,
    minFragmentLength: overrides.minFragmentLength ?? config.minFragmentLength,
    lexicalOnlyWeight: overrides.lexicalOnlyWeight ?? config.lexicalOnlyWeight,
    validatorFailureDiscount: overrides.validatorFailureDiscount ?? config.validatorFailureDiscount,
    validatorCatalogLimit: overrides.validatorCatalogLimit ?? config.validatorCatalogLimit,
    periodConcurrency: overrides.periodConcurrency ?? config.periodConcurrency,
  };

  if (settings.humanReviewThreshold > settings.autoProcessThreshold) {
    throw new InvalidInputError(
      `humanReviewThreshold (${settings.humanReviewThreshold}) must not exceed autoProcessThreshold (${settings.autoProcessThreshold})`
    );
  }
  if (settings.recallThreshold > settings.acceptanceThreshold) {
    throw new InvalidInputError(
      `recallThreshold (${settings.recallThreshold}) must not exceed acceptanceThreshold (${settings.acceptanceThreshold})`
    );
  }
  if (!Number.isInteger(settings.periodConcurrency) || settings.periodConcurrency < 1) {
    throw new InvalidInputError('periodConcurrency must be a positive integer');
  }

  return settings;
}
