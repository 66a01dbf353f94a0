/**
 * Pipeline settings, error envelopes and contract validation.
 */

import {
  CatalogError,
  InvalidInputError,
  MalformedValidatorResponseError,
  ValidatorUnavailableError,
  buildPipelineSettings,
  parseValidatorResponse,
  statusForError,
  toErrorEnvelope,
  validateValidatorResponse,
} from '@warrant-triage/core';
import { acceptAll } from './helpers';

describe('buildPipelineSettings', () => {
  it('should fall back to the configured defaults', () => {
    expect(buildPipelineSettings()).toEqual({
      institutionName: 'Banco X',
      autoProcessThreshold: 0.75,
      humanReviewThreshold: 0.5,
      recallThreshold: 0.2,
      acceptanceThreshold: 0.5,
      minFragmentLength: 10,
      lexicalOnlyWeight: 0.7,
      validatorFailureDiscount: 0.8,
      validatorCatalogLimit: 50,
      periodConcurrency: 8,
    });
  });

  it('should apply overrides', () => {
    const settings = buildPipelineSettings({ institutionName: 'Other Bank SA', periodConcurrency: 2 });

    expect(settings.institutionName).toBe('Other Bank SA');
    expect(settings.periodConcurrency).toBe(2);
  });

  it('should reject inconsistent thresholds', () => {
    expect(() => buildPipelineSettings({ autoProcessThreshold: 0.4, humanReviewThreshold: 0.6 })).toThrow(
      InvalidInputError
    );
    expect(() => buildPipelineSettings({ recallThreshold: 0.6, acceptanceThreshold: 0.5 })).toThrow(
      'recallThreshold (0.6) must not exceed acceptanceThreshold (0.5)'
    );
  });

  it('should reject a concurrency that is not a positive integer', () => {
    expect(() => buildPipelineSettings({ periodConcurrency: 0 })).toThrow('periodConcurrency must be a positive integer');
    expect(() => buildPipelineSettings({ periodConcurrency: 1.5 })).toThrow(InvalidInputError);
  });
});

describe('error mapping', () => {
  it('should map error codes to HTTP statuses', () => {
    expect(statusForError(new InvalidInputError('bad'))).toBe(400);
    expect(statusForError(new CatalogError('broken'))).toBe(500);
    expect(statusForError(new ValidatorUnavailableError('down'))).toBe(502);
    expect(statusForError(new MalformedValidatorResponseError(['/: bad']))).toBe(502);
    expect(statusForError(new Error('boom'))).toBe(500);
  });

  it('should build an envelope for pipeline errors', () => {
    expect(toErrorEnvelope(new InvalidInputError('text is required'), 'corr-1')).toEqual({
      error: { code: 'INVALID_INPUT', message: 'text is required', correlation_id: 'corr-1' },
    });
  });

  it('should build an envelope for anything else', () => {
    expect(toErrorEnvelope(new Error('boom'), 'corr-2').error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'boom',
      correlation_id: 'corr-2',
    });
    expect(toErrorEnvelope('oops', 'corr-3').error.message).toBe('Unknown error');
  });

  it('should name the subclass and keep the violations', () => {
    const error = new MalformedValidatorResponseError(['/validations: must be array', '/: x', '/: y', '/: z']);

    expect(error.name).toBe('MalformedValidatorResponseError');
    expect(error.violations).toHaveLength(4);
    expect(error.message).toBe(
      'Semantic validator response violates the contract: /validations: must be array; /: x; /: y'
    );
  });
});

describe('validator response contract', () => {
  it('should accept a well-formed response', () => {
    const payload = acceptAll(['checking_account_statements'], 0.9);

    expect(validateValidatorResponse(payload)).toEqual({ valid: true });
    expect(parseValidatorResponse(payload)).toBe(payload);
  });

  it('should reject confidences outside the unit interval', () => {
    const payload = acceptAll(['checking_account_statements'], 1.5);

    expect(validateValidatorResponse(payload).valid).toBe(false);
    expect(() => parseValidatorResponse(payload)).toThrow(MalformedValidatorResponseError);
  });

  it('should reject a payload with missing fields', () => {
    const result = validateValidatorResponse({ validations: [] });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "/: must have required property 'new_items'",
      "/: must have required property 'overall_confidence'",
      "/: must have required property 'all_captured'",
    ]);
  });
});
