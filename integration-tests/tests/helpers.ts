/**
 * Test Helpers
 *
 * Sample orders, the bundled catalog and in-process validator stand-ins.
 */

import * as path from 'path';
import {
  ValidatorUnavailableError,
  loadCatalogFromFile,
  type CatalogSnapshot,
  type SemanticValidationRequest,
  type SemanticValidationResponse,
  type SemanticValidator,
  type SubsidyMatch,
} from '@warrant-triage/core';

export const CATALOG_PATH = path.join(__dirname, '../../data/subsidy-catalog.json');

export function loadSampleCatalog(): CatalogSnapshot {
  return loadCatalogFromFile(CATALOG_PATH);
}

/** Complete English order addressed to the default institution. */
export const FIRST_REQUEST_ORDER = [
  'COURT ORDER',
  'Case no. 0001234-56.2024.8.26.0100',
  'Send an official letter to Banco X.',
  'Investigated parties:',
  'JOHN ALBERT SMITH, CPF 123.456.789-09',
  'ACME TRADING LTDA, CNPJ 12.345.678/0001-95',
  '',
  'I hereby request checking-account statements for the last 2 years.',
].join('\n');

export const REITERATION_ORDER =
  'REITERO o ofício nº 4521/2024, não atendido até a presente data, referente aos extratos de JOÃO DA SILVA, CPF 123.456.789-09.';

export const TAX_AUTHORITY_ORDER = [
  'COURT ORDER',
  'Send an official letter to the Receita Federal requesting the tax returns of JOHN ALBERT SMITH, CPF 123.456.789-09, under tax secrecy.',
].join('\n');

/** Portuguese order citing a regulatory circular, dated in its heading. */
export const CIRCULAR_ORDER = [
  'PODER JUDICIÁRIO',
  'Processo nº 0001234-56.2024.8.26.0100',
  'São Paulo, 10 de março de 2024.',
  '',
  'OFICIE-SE ao Banco X.',
  '',
  'INVESTIGADOS:',
  'JOÃO DA SILVA, CPF 123.456.789-09',
  '',
  'Determino, nos termos da Carta Circular nº 3454/10, o envio dos extratos de conta corrente dos últimos 5 anos.',
].join('\n');

/**
 * Validator returning a fixed payload and recording every request.
 */
export class StaticValidator implements SemanticValidator {
  readonly name = 'static';
  readonly requests: SemanticValidationRequest[] = [];

  constructor(private readonly payload: unknown) {}

  async validate(request: SemanticValidationRequest): Promise<unknown> {
    this.requests.push(request);
    return this.payload;
  }
}

/**
 * Validator whose backend is down.
 */
export class UnavailableValidator implements SemanticValidator {
  readonly name = 'unavailable';
  calls = 0;

  async validate(): Promise<unknown> {
    this.calls++;
    throw new ValidatorUnavailableError('connection refused');
  }
}

/**
 * Accept every listed catalog id at the given confidence.
 */
export function acceptAll(catalogIds: string[], confidence: number): SemanticValidationResponse {
  return {
    validations: catalogIds.map((catalog_id) => ({
      catalog_id,
      accepted: true,
      confidence,
      evidence_text: '',
      justification: 'requested explicitly',
      suggested_example: '',
    })),
    new_items: [],
    overall_confidence: confidence,
    all_captured: true,
  };
}

export function makeMatch(overrides: Partial<SubsidyMatch> & Pick<SubsidyMatch, 'catalog_id'>): SubsidyMatch {
  return {
    subsidy_name: overrides.catalog_id,
    uncatalogued: false,
    source: 'lexical',
    text_span: '',
    score: 0.6,
    confidence: 0.42,
    semantic_validated: false,
    semantic_confidence: null,
    evidence_text: null,
    justification: null,
    suggested_example: null,
    period_reference: null,
    period: null,
    circular_reference: null,
    requires_counterpart: false,
    ...overrides,
  };
}
