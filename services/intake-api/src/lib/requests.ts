/**
 * Request body parsing for the intake endpoints.
 */

import { isValid, parseISO } from 'date-fns';
import { ulid } from 'ulid';
import { InvalidInputError, type ProcessWarrantJob } from '@warrant-triage/core';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface WarrantRequest {
  document_id: string;
  text: string;
  reference_date: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseWarrantRequest(body: unknown): WarrantRequest {
  if (!isRecord(body)) {
    throw new InvalidInputError('request body must be a JSON object');
  }

  const { text, reference_date, document_id } = body;

  if (typeof text !== 'string' || text.trim().length === 0) {
    throw new InvalidInputError('text is required');
  }

  if (reference_date !== undefined && reference_date !== null) {
    if (typeof reference_date !== 'string' || !ISO_DATE.test(reference_date) || !isValid(parseISO(reference_date))) {
      throw new InvalidInputError('reference_date must be a YYYY-MM-DD date', { reference_date });
    }
  }

  if (document_id !== undefined && (typeof document_id !== 'string' || document_id.length === 0)) {
    throw new InvalidInputError('document_id must be a non-empty string');
  }

  return {
    document_id: typeof document_id === 'string' ? document_id : ulid(),
    text,
    reference_date: typeof reference_date === 'string' ? reference_date : null,
  };
}

export function referenceDateOf(request: Pick<WarrantRequest, 'reference_date'>): Date | null {
  return request.reference_date ? parseISO(request.reference_date) : null;
}

export function toJob(request: WarrantRequest, correlationId: string): ProcessWarrantJob {
  return {
    correlation_id: correlationId,
    document_id: request.document_id,
    text: request.text,
    ...(request.reference_date ? { reference_date: request.reference_date } : {}),
  };
}
