/**
 * Intake API
 *
 * POST /warrants            - Process a warrant synchronously
 * POST /warrants/async      - Enqueue a warrant for the worker
 * GET  /warrants/jobs/:id   - Job state and result
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  enableDefaultMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  checkBackpressure,
  reportQueueMetrics,
  loadCatalogFromFile,
  WarrantOrchestrator,
  OpenAiSemanticValidator,
  createOpenAiChatClient,
  toErrorEnvelope,
  statusForError,
  QUEUE_NAMES,
  type ProcessWarrantJob,
  type WarrantProcessingResult,
  type ErrorEnvelope,
} from '@warrant-triage/core';
import { parseWarrantRequest, referenceDateOf, toJob } from './lib/requests';

const app = express();
const port = parseInt(process.env.PORT || '8080', 10);

const catalog = loadCatalogFromFile(config.catalogPath);
const orchestrator = new WarrantOrchestrator({
  catalog,
  validator: config.openaiApiKey ? new OpenAiSemanticValidator(createOpenAiChatClient()) : null,
});

const processWarrantQueue = createQueue<ProcessWarrantJob, WarrantProcessingResult>(
  QUEUE_NAMES.PROCESS_WARRANT
);

enableDefaultMetrics();

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : ulid();
}

function sendError(res: Response, error: unknown): void {
  const envelope: ErrorEnvelope = toErrorEnvelope(error, correlationIdOf(res));
  res.status(statusForError(error)).json(envelope);
}

// Middleware
app.use(express.json({ limit: '2mb' }));

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.header('x-correlation-id') || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const routePath: unknown = req.route?.path;
    const path = typeof routePath === 'string' ? routePath : req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    const metrics = await checkBackpressure(processWarrantQueue);

    res.json({
      status: 'healthy',
      service: 'intake-api',
      catalog_entries: catalog.size,
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'intake-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([{ name: QUEUE_NAMES.PROCESS_WARRANT, queue: processWarrantQueue }]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /warrants
 * Runs the pipeline in-request and returns the processing result
 */
app.post('/warrants', async (req: Request, res: Response) => {
  try {
    const request = parseWarrantRequest(req.body);
    const result = await orchestrator.process(request.text, {
      correlationId: correlationIdOf(res),
      documentId: request.document_id,
      referenceDate: referenceDateOf(request),
    });
    res.json(result);
  } catch (error) {
    logger.error('Warrant processing request failed', error);
    sendError(res, error);
  }
});

/**
 * POST /warrants/async
 * Enqueues the warrant; poll GET /warrants/jobs/:id for the result
 */
app.post('/warrants/async', async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  try {
    const request = parseWarrantRequest(req.body);

    // Check backpressure
    const backpressure = await checkBackpressure(processWarrantQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', {
        queue_depth: backpressure.depth,
      });

      const error: ErrorEnvelope = {
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: 'System is under heavy load. Please retry later.',
          correlation_id: correlationId,
        },
      };
      res.status(503).json(error);
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', {
        queue_depth: backpressure.depth,
      });
    }

    const job = await processWarrantQueue.add('process_warrant', toJob(request, correlationId), {
      jobId: `warrant_${request.document_id}`,
      attempts: config.maxJobAttempts,
      backoff: { type: 'exponential', delay: config.backoffBaseMs },
    });

    logger.info('Warrant enqueued', { document_id: request.document_id, jobId: job.id });

    res.status(202).json({
      job_id: job.id,
      document_id: request.document_id,
      correlation_id: correlationId,
    });
  } catch (error) {
    logger.error('Warrant enqueue failed', error);
    sendError(res, error);
  }
});

/**
 * GET /warrants/jobs/:id
 */
app.get('/warrants/jobs/:id', async (req: Request, res: Response) => {
  try {
    const job = await processWarrantQueue.getJob(req.params.id);

    if (!job) {
      const error: ErrorEnvelope = {
        error: {
          code: 'NOT_FOUND',
          message: `Job ${req.params.id} not found`,
          correlation_id: correlationIdOf(res),
        },
      };
      res.status(404).json(error);
      return;
    }

    const state = await job.getState();
    const result: WarrantProcessingResult | null = state === 'completed' ? job.returnvalue : null;
    res.json({
      job_id: job.id,
      state,
      attempts: job.attemptsMade,
      result,
      failed_reason: job.failedReason || null,
    });
  } catch (error) {
    logger.error('Job lookup failed', error);
    sendError(res, error);
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Intake API started', { port, catalog_entries: catalog.size });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await processWarrantQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
