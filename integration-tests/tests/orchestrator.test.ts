/**
 * Orchestrator tests: full runs over sample orders with in-process validators.
 */

import {
  InvalidInputError,
  WarrantOrchestrator,
  processBatch,
  processWarrant,
  validateProcessingResult,
  type CatalogSnapshot,
} from '@warrant-triage/core';
import * as partiesModule from '../../packages/core/src/extractors/parties';
import {
  CIRCULAR_ORDER,
  FIRST_REQUEST_ORDER,
  REITERATION_ORDER,
  TAX_AUTHORITY_ORDER,
  StaticValidator,
  UnavailableValidator,
  acceptAll,
  loadSampleCatalog,
} from './helpers';

const REFERENCE_DATE = new Date(2024, 2, 10);

describe('WarrantOrchestrator', () => {
  let catalog: CatalogSnapshot;

  beforeAll(() => {
    catalog = loadSampleCatalog();
  });

  describe('first request with an accepting validator', () => {
    it('should route a complete order automatically', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.92));
      const orchestrator = new WarrantOrchestrator({ catalog, validator });

      const result = await orchestrator.process(FIRST_REQUEST_ORDER, { referenceDate: REFERENCE_DATE });

      expect(result.state).toBe('ROUTED');
      expect(result.state_history).toEqual([
        'INIT',
        'CLASSIFIED',
        'FILTERED',
        'CONTENT_EXTRACTED',
        'ENTITIES_EXTRACTED',
        'MATCHED',
        'PERIODS_RESOLVED',
        'ROUTED',
      ]);
      expect(result.order_class).toBe('first_request');
      expect(result.should_process).toBe(true);
      expect(result.validator_status).toBe('accepted');
      expect(result.overall_confidence).toBeCloseTo(0.7621, 3);
      expect(result.routing_status).toBe('automatic');
      expect(result.alerts).toEqual(['Institutions mentioned: target_institution (Banco X)']);
      expect(result.error).toBeNull();
    });

    it('should extract both investigated parties', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.92));
      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, validator, referenceDate: REFERENCE_DATE });

      expect(result.parties.map((p) => [p.key, p.name, p.party_kind])).toEqual([
        ['12345678909', 'JOHN ALBERT SMITH', 'individual'],
        ['12345678000195', 'ACME TRADING LTDA', 'corporate'],
      ]);
    });

    it('should resolve the relative period against the reference date', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.92));
      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, validator, referenceDate: REFERENCE_DATE });

      const expectedPeriod = {
        start: { kind: 'absolute', date: '2022-03-10' },
        end: { kind: 'absolute', date: '2024-03-10' },
        source_text: 'last 2 years',
      };

      expect(result.reference_date).toBe('2024-03-10');
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].catalog_id).toBe('checking_account_statements');
      expect(result.matches[0].source).toBe('validated');
      expect(result.matches[0].confidence).toBe(0.92);
      expect(result.matches[0].period).toEqual(expectedPeriod);
      expect(result.matches[0].period_reference).toBe('last 2 years');
      expect(result.periods).toEqual([
        {
          party_key: '12345678909',
          party_name: 'JOHN ALBERT SMITH',
          catalog_id: 'checking_account_statements',
          period: expectedPeriod,
        },
        {
          party_key: '12345678000195',
          party_name: 'ACME TRADING LTDA',
          catalog_id: 'checking_account_statements',
          period: expectedPeriod,
        },
      ]);
    });

    it('should send the lexical candidate and the catalog to the validator once', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.92));
      const orchestrator = new WarrantOrchestrator({ catalog, validator });

      await orchestrator.process(FIRST_REQUEST_ORDER, { referenceDate: REFERENCE_DATE });

      expect(validator.requests).toHaveLength(1);
      const [request] = validator.requests;
      expect(request.lexical_matches).toHaveLength(1);
      expect(request.lexical_matches[0].catalog_id).toBe('checking_account_statements');
      expect(request.lexical_matches[0].text_span).toBe('checking-account statements for the last 2 years');
      expect(request.unmatched_fragments).toEqual([]);
      expect(request.catalog_subset).toHaveLength(14);
      expect(request.catalog_subset[0].id).toBe('checking_account_statements');
    });

    it('should produce a result that satisfies the processing-result contract', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.92));
      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, validator, referenceDate: REFERENCE_DATE });

      expect(validateProcessingResult(result)).toEqual({ valid: true });
    });
  });

  describe('validator failures', () => {
    it('should fall back to lexical matches when the validator is unavailable', async () => {
      const accepted = await processWarrant(FIRST_REQUEST_ORDER, {
        catalog,
        validator: new StaticValidator(acceptAll(['checking_account_statements'], 0.92)),
        referenceDate: REFERENCE_DATE,
      });

      const validator = new UnavailableValidator();
      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, validator, referenceDate: REFERENCE_DATE });

      expect(validator.calls).toBe(1);
      expect(result.validator_status).toBe('unavailable');
      expect(result.alerts).toContain(
        'Semantic validator unavailable (connection refused); lexical-only matches used'
      );
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].source).toBe('lexical');
      expect(result.matches[0].semantic_validated).toBe(false);
      expect(result.overall_confidence).toBeCloseTo(accepted.overall_confidence * 0.8, 10);
      expect(result.routing_status).toBe('human_review');
    });

    it('should discard a malformed validator response', async () => {
      const validator = new StaticValidator({ validations: 'nope' });
      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, validator, referenceDate: REFERENCE_DATE });

      expect(result.validator_status).toBe('malformed');
      expect(result.alerts).toContain(
        'Semantic validator returned a malformed response; lexical-only matches used'
      );
      expect(result.matches.map((m) => m.source)).toEqual(['lexical']);
      expect(result.routing_status).toBe('human_review');
    });

    it('should discount a failed validator below a skipped one', async () => {
      const skipped = await processWarrant(FIRST_REQUEST_ORDER, { catalog, referenceDate: REFERENCE_DATE });
      const failed = await processWarrant(FIRST_REQUEST_ORDER, {
        catalog,
        validator: new UnavailableValidator(),
        referenceDate: REFERENCE_DATE,
      });

      expect(skipped.validator_status).toBe('skipped');
      expect(failed.overall_confidence).toBeCloseTo(skipped.overall_confidence * 0.8, 10);
    });
  });

  describe('lexical-only runs', () => {
    it('should keep the lexical match with a weighted confidence', async () => {
      const orchestrator = new WarrantOrchestrator({ catalog });
      const result = await orchestrator.process(FIRST_REQUEST_ORDER, { referenceDate: REFERENCE_DATE });

      expect(result.validator_status).toBe('skipped');
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].catalog_id).toBe('checking_account_statements');
      expect(result.matches[0].confidence).toBeCloseTo(result.matches[0].score * 0.7, 10);
      expect(result.overall_confidence).toBeCloseTo((0.5 + 1 + 1 + result.matches[0].score) / 4, 10);
      expect(result.routing_status).toBe('automatic');
    });

    it('should honour per-orchestrator routing thresholds', async () => {
      const orchestrator = new WarrantOrchestrator({
        catalog,
        settings: { autoProcessThreshold: 0.8, humanReviewThreshold: 0.7 },
      });
      const result = await orchestrator.process(FIRST_REQUEST_ORDER, { referenceDate: REFERENCE_DATE });

      expect(result.routing_status).toBe('human_review');
    });

    it('should reject inconsistent thresholds at construction', () => {
      expect(
        () =>
          new WarrantOrchestrator({
            catalog,
            settings: { autoProcessThreshold: 0.4, humanReviewThreshold: 0.6 },
          })
      ).toThrow(InvalidInputError);
    });

    it('should give the same result whatever the period concurrency', async () => {
      const serial = new WarrantOrchestrator({ catalog, settings: { periodConcurrency: 1 } });
      const parallel = new WarrantOrchestrator({ catalog, settings: { periodConcurrency: 8 } });
      const options = { referenceDate: REFERENCE_DATE, sessionId: 'session-1' };

      const a = await serial.process(FIRST_REQUEST_ORDER, options);
      const b = await parallel.process(FIRST_REQUEST_ORDER, options);

      expect(b).toEqual(a);
    });
  });

  describe('early terminals', () => {
    it('should hold a reiteration without reprocessing it', async () => {
      const validator = new StaticValidator(acceptAll([], 1));
      const result = await processWarrant(REITERATION_ORDER, { catalog, validator });

      expect(result.state).toBe('REITERATION_HELD');
      expect(result.state_history).toEqual(['INIT', 'CLASSIFIED', 'REITERATION_HELD']);
      expect(result.routing_status).toBe('reiteration_held');
      expect(result.should_process).toBe(false);
      expect(result.overall_confidence).toBe(0.5);
      expect(result.relevance).toBeNull();
      expect(result.parties).toEqual([]);
      expect(result.matches).toEqual([]);
      expect(result.alerts).toEqual(['Reiteration of a previous order: held without reprocessing']);
      expect(validator.requests).toHaveLength(0);
    });

    it('should stop an order addressed only to the tax authority', async () => {
      const result = await processWarrant(TAX_AUTHORITY_ORDER, { catalog });

      expect(result.state).toBe('NOT_RELEVANT');
      expect(result.state_history).toEqual(['INIT', 'CLASSIFIED', 'FILTERED', 'NOT_RELEVANT']);
      expect(result.routing_status).toBe('not_relevant');
      expect(result.should_process).toBe(false);
      expect(result.overall_confidence).toBe(0.95);
      expect(result.relevance?.secrecy_type).toBe('fiscal');
      expect(result.parties).toEqual([]);
      expect(result.matches).toEqual([]);
      expect(result.alerts).toEqual([
        'Institutions mentioned: tax_authority (Receita Federal)',
        'Secrecy type: fiscal',
      ]);
    });

    it('should stop a fiscal order that names the tax authority without an address-to marker', async () => {
      const result = await processWarrant(
        [
          'PODER JUDICIÁRIO',
          'Ao Senhor Delegado da Receita Federal do Brasil.',
          'Requisito, sob sigilo fiscal, as declarações de imposto de renda de JOÃO DA SILVA, CPF 123.456.789-09, com a relação de contas e bens declarados.',
        ].join('\n'),
        { catalog }
      );

      expect(result.state).toBe('NOT_RELEVANT');
      expect(result.routing_status).toBe('not_relevant');
      expect(result.overall_confidence).toBe(0.95);
      expect(result.matches).toEqual([]);
      expect(result.alerts).toEqual(['Institutions mentioned: tax_authority', 'Secrecy type: fiscal']);
    });

    it('should not claim block isolation for a rejected order with several addressees', async () => {
      const result = await processWarrant(
        [
          'COURT ORDER',
          'Send an official letter to the Receita Federal requesting the tax returns of JOHN ALBERT SMITH, CPF 123.456.789-09, under tax secrecy.',
          'Send an official letter to the Federal Police requesting the same tax returns.',
        ].join('\n'),
        { catalog }
      );

      expect(result.relevance?.has_multiple_addressees).toBe(true);
      expect(result.relevance?.relevant_span).toBeNull();
      expect(result.routing_status).toBe('not_relevant');
      expect(result.alerts).toEqual([
        'Institutions mentioned: tax_authority (Receita Federal), police (Federal Police)',
        'Secrecy type: fiscal',
      ]);
    });

    it('should note block isolation when a financial block is kept', async () => {
      const result = await processWarrant(
        [
          'COURT ORDER',
          'Parties: JOHN ALBERT SMITH, CPF 123.456.789-09',
          'Send an official letter to the Receita Federal requesting the tax returns of the parties.',
          'Send an official letter to Banco X requesting checking account statements of the parties.',
        ].join('\n'),
        { catalog, referenceDate: REFERENCE_DATE }
      );

      expect(result.relevance?.relevant_span).not.toBeNull();
      expect(result.alerts).toContain('Multiple addressees detected; only the financial-institution blocks are processed');
    });

    it('should report insufficient information when nothing can be looked up', async () => {
      const result = await processWarrant('Please find attached the requested account information.', { catalog });

      expect(result.state).toBe('INSUFFICIENT_INFO');
      expect(result.state_history).toEqual(['INIT', 'CLASSIFIED', 'FILTERED', 'INSUFFICIENT_INFO']);
      expect(result.routing_status).toBe('insufficient_info');
      expect(result.needs_external_lookup).toBe(true);
      expect(result.overall_confidence).toBe(0.3);
      expect(result.lookup_data?.can_lookup).toBe(false);
      expect(result.alerts).toEqual([
        'Order content not found and no process number or identifier to look it up',
      ]);
    });

    it('should process the whole text when content cannot be isolated but can be looked up', async () => {
      const result = await processWarrant(
        'Account statements for CPF 123.456.789-09 are required for the last 6 months.',
        { catalog }
      );

      expect(result.state).toBe('ROUTED');
      expect(result.needs_external_lookup).toBe(false);
      expect(result.lookup_data?.personal_ids).toEqual(['12345678909']);
      expect(result.alerts).toContain('Order content could not be isolated; processing the whole text');
      expect(result.alerts).toContain('No investigated party identified');
      expect(result.alerts).toContain('No catalog subsidy matched');
      expect(result.routing_status).toBe('manual_analysis');
    });
  });

  describe('annotations', () => {
    it('should tie a cited circular to the request and read the date from the heading', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.9));
      const result = await processWarrant(CIRCULAR_ORDER, { catalog, validator });

      expect(result.reference_date).toBe('2024-03-10');
      expect(result.parties.map((p) => p.name)).toEqual(['JOÃO DA SILVA']);
      expect(result.circulars).toEqual([
        {
          number: '3454',
          year: '2010',
          source_text: 'Carta Circular nº 3454/10',
          catalog_ids: ['checking_account_statements'],
          applies_to_all: false,
          confidence: 0.9,
        },
      ]);
      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].circular_reference).toBe('CC 3454/2010');
      expect(result.matches[0].period).toEqual({
        start: { kind: 'absolute', date: '2019-03-10' },
        end: { kind: 'absolute', date: '2024-03-10' },
        source_text: 'últimos 5 anos',
      });
      expect(result.counterpart_requirement).toBeNull();
      expect(result.alerts).toContain('Regulatory circular CC 3454/2010 referenced');
      expect(result.overall_confidence).toBeCloseTo(0.7412, 3);
      expect(result.routing_status).toBe('human_review');
    });

    it('should read decomposed input the same as composed input', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.9));
      const result = await processWarrant(CIRCULAR_ORDER.normalize('NFD'), { catalog, validator });

      expect(result.parties.map((p) => [p.key, p.name])).toEqual([['12345678909', 'JOÃO DA SILVA']]);
      expect(result.matches.map((m) => m.catalog_id)).toEqual(['checking_account_statements']);
      expect(result.reference_date).toBe('2024-03-10');
    });

    it('should pass fragments without a candidate to the validator', async () => {
      const validator = new StaticValidator(acceptAll(['checking_account_statements'], 0.9));
      await processWarrant(CIRCULAR_ORDER, { catalog, validator });

      expect(validator.requests[0].unmatched_fragments).toEqual([
        'ao Banco X',
        'nos termos da Carta Circular nº 3454/10',
      ]);
    });
  });

  describe('failures', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should end in ERROR with the failing state recorded', async () => {
      jest.spyOn(partiesModule, 'extractParties').mockImplementation(() => {
        throw new Error('parser exploded');
      });

      const result = await processWarrant(FIRST_REQUEST_ORDER, { catalog, referenceDate: REFERENCE_DATE });

      expect(result.state).toBe('ERROR');
      expect(result.state_history.slice(-2)).toEqual(['CONTENT_EXTRACTED', 'ERROR']);
      expect(result.routing_status).toBe('error');
      expect(result.should_process).toBe(false);
      expect(result.overall_confidence).toBe(0);
      expect(result.error).toBe('parser exploded');
      expect(result.alerts[result.alerts.length - 1]).toBe(
        'Processing failed in state CONTENT_EXTRACTED: parser exploded'
      );
    });
  });
});

describe('processBatch', () => {
  let orchestrator: WarrantOrchestrator;

  beforeAll(() => {
    orchestrator = new WarrantOrchestrator({ catalog: loadSampleCatalog() });
  });

  it('should return results in input order', async () => {
    const results = await processBatch(
      orchestrator,
      [
        { text: FIRST_REQUEST_ORDER, referenceDate: REFERENCE_DATE },
        { text: REITERATION_ORDER },
        { text: TAX_AUTHORITY_ORDER },
      ],
      2
    );

    expect(results.map((r) => r.routing_status)).toEqual(['automatic', 'reiteration_held', 'not_relevant']);
    expect(new Set(results.map((r) => r.session_id)).size).toBe(3);
  });

  it('should keep caller-supplied session ids', async () => {
    const [result] = await processBatch(orchestrator, [{ text: TAX_AUTHORITY_ORDER, sessionId: 'batch-7' }], 1);

    expect(result.session_id).toBe('batch-7');
  });

  it('should reject a non-positive concurrency', async () => {
    await expect(processBatch(orchestrator, [{ text: TAX_AUTHORITY_ORDER }], 0)).rejects.toThrow(
      InvalidInputError
    );
  });
});
