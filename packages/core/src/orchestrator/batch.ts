/**
 * In-process batch processing over a bounded pool.
 */

import pLimit from 'p-limit';
import { config } from '../config';
import { InvalidInputError } from '../errors';
import { logger } from '../logger';
import type { WarrantProcessingResult } from '../types';
import type { ProcessOptions, WarrantOrchestrator } from './orchestrator';

export interface BatchDocument extends ProcessOptions {
  text: string;
}

/**
 * Process documents with at most `concurrency` in flight. Documents share
 * nothing but the orchestrator's read-only catalog; results come back in
 * input order.
 */
export async function processBatch(
  orchestrator: WarrantOrchestrator,
  documents: readonly BatchDocument[],
  concurrency: number = config.batchConcurrency
): Promise<WarrantProcessingResult[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError('batch concurrency must be a positive integer');
  }

  const limit = pLimit(concurrency);
  const startTime = Date.now();

  const results = await Promise.all(
    documents.map((document) => limit(() => orchestrator.process(document.text, document)))
  );

  logger.info('Batch processed', {
    documents: documents.length,
    concurrency,
    duration_ms: Date.now() - startTime,
  });

  return results;
}
