/**
 * Warrant Worker
 *
 * Consumes the process_warrant queue, runs the orchestrator and returns the
 * processing result as the job's return value.
 */

import { Job } from 'bullmq';
import { parseISO } from 'date-fns';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  enableDefaultMetrics,
  serveMetrics,
  loadCatalogFromFile,
  WarrantOrchestrator,
  OpenAiSemanticValidator,
  createOpenAiChatClient,
  QUEUE_NAMES,
  jobDurationHistogram,
  type ProcessWarrantJob,
  type WarrantProcessingResult,
} from '@warrant-triage/core';

const catalog = loadCatalogFromFile(config.catalogPath);

const validator = config.openaiApiKey
  ? new OpenAiSemanticValidator(createOpenAiChatClient())
  : null;

if (!validator) {
  logger.warn('OPENAI_API_KEY not set; running lexical-only');
}

const orchestrator = new WarrantOrchestrator({ catalog, validator });

/**
 * Process process_warrant job
 */
async function processWarrantJob(
  job: Job<ProcessWarrantJob, WarrantProcessingResult>
): Promise<WarrantProcessingResult> {
  const { correlation_id, document_id, text, reference_date } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing process_warrant', {
      jobId: job.id,
      document_id,
      attempt: job.attemptsMade + 1,
    });

    const result = await orchestrator.process(text, {
      correlationId: correlation_id,
      documentId: document_id,
      referenceDate: reference_date ? parseISO(reference_date) : null,
    });

    const duration = (Date.now() - startTime) / 1000;
    jobDurationHistogram.observe(
      { queue: QUEUE_NAMES.PROCESS_WARRANT, status: result.routing_status === 'error' ? 'failed' : 'success' },
      duration
    );

    return result;
  });
}

// Expose /metrics for Prometheus
enableDefaultMetrics();
const metricsServer = serveMetrics(config.metricsPort);

const worker = createWorker<ProcessWarrantJob, WarrantProcessingResult>(
  QUEUE_NAMES.PROCESS_WARRANT,
  processWarrantJob
);

logger.info('Warrant worker started', { catalog_entries: catalog.size, validator: validator?.name ?? null });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
