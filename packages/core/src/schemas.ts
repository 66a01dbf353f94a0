/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the catalog, semantic validator responses
 * and processing results. Schemas live in docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import { WarrantTriageError, ERROR_CODES, MalformedValidatorResponseError } from './errors';
import type { CatalogEntry, WarrantProcessingResult } from './types';
import type { SemanticValidationResponse } from './validation/types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const SCHEMA_FILES = {
  validatorResponse: 'semantic_validation_response.schema.json',
  catalog: 'subsidy_catalog.schema.json',
  processingResult: 'warrant_processing_result.schema.json',
} as const;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to core package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (isSchemaObject(parsed)) {
        return parsed;
      }
    }
  }

  // Missing schemas are fatal; validator output is never accepted unchecked
  throw new WarrantTriageError(ERROR_CODES.INTERNAL_ERROR, `Schema file not found: ${schemaName}`, {
    searched: possiblePaths,
  });
}

let validatorResponseValidator: ValidateFunction<SemanticValidationResponse> | null = null;
let catalogValidator: ValidateFunction<CatalogEntry[]> | null = null;
let processingResultValidator: ValidateFunction<WarrantProcessingResult> | null = null;

function getValidatorResponseValidator(): ValidateFunction<SemanticValidationResponse> {
  if (!validatorResponseValidator) {
    validatorResponseValidator = ajv.compile<SemanticValidationResponse>(
      loadSchema(SCHEMA_FILES.validatorResponse)
    );
  }
  return validatorResponseValidator;
}

function getCatalogValidator(): ValidateFunction<CatalogEntry[]> {
  if (!catalogValidator) {
    catalogValidator = ajv.compile<CatalogEntry[]>(loadSchema(SCHEMA_FILES.catalog));
  }
  return catalogValidator;
}

function getProcessingResultValidator(): ValidateFunction<WarrantProcessingResult> {
  if (!processingResultValidator) {
    processingResultValidator = ajv.compile<WarrantProcessingResult>(
      loadSchema(SCHEMA_FILES.processingResult)
    );
  }
  return processingResultValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function describeErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

function run(validate: ValidateFunction, data: unknown, label: string): ValidationResult {
  if (!validate(data)) {
    const errors = describeErrors(validate);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }
  return { valid: true };
}

/**
 * Validate a semantic validator response against semantic_validation_response.schema.json
 */
export function validateValidatorResponse(data: unknown): ValidationResult {
  return run(getValidatorResponseValidator(), data, 'SemanticValidationResponse');
}

/**
 * Validate mapped catalog entries against subsidy_catalog.schema.json
 */
export function validateCatalog(data: unknown): ValidationResult {
  return run(getCatalogValidator(), data, 'SubsidyCatalog');
}

/**
 * Validate a WarrantProcessingResult against warrant_processing_result.schema.json
 */
export function validateProcessingResult(data: unknown): ValidationResult {
  return run(getProcessingResultValidator(), data, 'WarrantProcessingResult');
}

/**
 * Narrow raw validator output to the response contract, or throw
 * MalformedValidatorResponseError listing the violations.
 */
export function parseValidatorResponse(data: unknown): SemanticValidationResponse {
  const validate = getValidatorResponseValidator();
  if (validate(data)) {
    return data;
  }
  throw new MalformedValidatorResponseError(describeErrors(validate));
}

// Re-export schemas for use in LLM prompts
export const schemas = {
  get validatorResponse(): object {
    return loadSchema(SCHEMA_FILES.validatorResponse);
  },
};
