/**
 * Catalog loading, lexical matching and request segmentation tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CatalogError,
  CatalogMatcher,
  PORTUGUESE_FIELD_MAPPING,
  buildCatalog,
  charWbNgrams,
  createCatalogSnapshot,
  loadCatalogFromFile,
  mapCatalogRecords,
  segmentRequests,
  type CatalogSnapshot,
} from '@warrant-triage/core';
import { loadSampleCatalog } from './helpers';

describe('Catalog snapshot', () => {
  it('should reject an empty catalog', () => {
    expect(() => createCatalogSnapshot([])).toThrow(CatalogError);
  });

  it('should reject duplicate ids', () => {
    expect(() =>
      createCatalogSnapshot([
        { id: 'a', name: 'First' },
        { id: 'a', name: 'Second' },
      ])
    ).toThrow('Duplicate catalog id: a');
  });

  it('should reject an empty id', () => {
    expect(() => createCatalogSnapshot([{ id: '  ', name: 'Blank' }])).toThrow(CatalogError);
  });

  it('should freeze entries and keep declaration order', () => {
    const catalog = createCatalogSnapshot([
      { id: 'b', name: 'Second', examples: [' one ', ''] },
      { id: 'a', name: 'First' },
    ]);

    expect(catalog.size).toBe(2);
    expect(catalog.order.get('a')).toBe(1);
    expect(catalog.get('b')?.examples).toEqual(['one']);
    expect(Object.isFrozen(catalog.entries[0])).toBe(true);
    expect(Object.isFrozen(catalog.entries)).toBe(true);
  });
});

describe('Catalog loader', () => {
  it('should map Portuguese field names and split example strings', () => {
    const mapped = mapCatalogRecords(
      [{ subsidio_id: 'extratos', nome: 'Extratos', descricao: 'Extratos de conta', exemplos: 'a; b\nc' }],
      PORTUGUESE_FIELD_MAPPING
    );

    expect(mapped).toEqual([{ id: 'extratos', name: 'Extratos', description: 'Extratos de conta', examples: ['a', 'b', 'c'] }]);
  });

  it('should reject a source that is not an array', () => {
    expect(() => mapCatalogRecords({ id: 'x' })).toThrow('Catalog source must be an array of records');
  });

  it('should reject records that fail the catalog schema', () => {
    expect(() => buildCatalog([{ id: 'x', name: '' }])).toThrow(CatalogError);
  });

  it('should load the bundled catalog', () => {
    const catalog = loadSampleCatalog();

    expect(catalog.size).toBe(14);
    expect(catalog.entries[0].id).toBe('checking_account_statements');
  });

  it('should report a missing file', () => {
    expect(() => loadCatalogFromFile(path.join(os.tmpdir(), 'no-such-catalog.json'))).toThrow(CatalogError);
  });

  it('should report a file that is not JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
    const file = path.join(dir, 'catalog.json');
    fs.writeFileSync(file, '{ not json');

    try {
      expect(() => loadCatalogFromFile(file)).toThrow(/not valid JSON/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('charWbNgrams', () => {
  it('should pad words and stop at a word no longer than n', () => {
    expect(charWbNgrams('ab')).toEqual([' ab', 'ab ', ' ab ']);
  });

  it('should fold case and diacritics', () => {
    expect(charWbNgrams('Ó')).toEqual([' o ']);
  });
});

describe('CatalogMatcher', () => {
  let catalog: CatalogSnapshot;
  let matcher: CatalogMatcher;

  beforeAll(() => {
    catalog = loadSampleCatalog();
    matcher = new CatalogMatcher(catalog);
  });

  it('should match every entry name to its own entry', () => {
    for (const entry of catalog.entries) {
      const [top] = matcher.match(entry.name, 0.2);
      expect(top?.catalog_id).toBe(entry.id);
      expect(top?.score).toBeGreaterThanOrEqual(0.5);
    }
  });

  it('should rank candidates by descending score', () => {
    const candidates = matcher.match('checking account statements for the last 2 years', 0.2);

    expect(candidates.map((c) => c.catalog_id)).toEqual([
      'checking_account_statements',
      'savings_account_statements',
      'account_opening_records',
    ]);
    expect(candidates[0].text_span).toBe('checking account statements for the last 2 years');
    for (const candidate of candidates) {
      expect(candidate.score).toBeGreaterThanOrEqual(0.2);
      expect(candidate.score).toBeLessThanOrEqual(1);
    }
  });

  it('should match Portuguese requests through the examples', () => {
    const [top] = matcher.match('extratos de conta corrente dos últimos 5 anos', 0.2);

    expect(top.catalog_id).toBe('checking_account_statements');
    expect(top.score).toBeGreaterThan(0.5);
  });

  it('should return nothing for out-of-vocabulary text', () => {
    expect(matcher.match('zzzz', 0)).toEqual([]);
  });

  it('should match each item independently', () => {
    const results = matcher.matchItems(['wire transfer records', 'credit card statements'], 0.5);

    expect(results.map((r) => r.candidates[0]?.catalog_id)).toEqual([
      'wire_transfer_records',
      'credit_card_statements',
    ]);
  });
});

describe('segmentRequests', () => {
  it('should split a directive into atomic items', () => {
    const items = segmentRequests(
      'I hereby request: checking account statements; savings account statements, and credit card invoices.\n\nOther text',
      10
    );

    expect(items).toEqual([
      'checking account statements',
      'savings account statements',
      'and credit card invoices',
    ]);
  });

  it('should read provide clauses up to the end of the sentence', () => {
    expect(segmentRequests('The bank shall provide the account balances; and the PIX keys.', 10)).toEqual([
      'the account balances',
    ]);
  });

  it('should fall back to domain nouns', () => {
    expect(segmentRequests('Extratos bancários do período.', 10)).toEqual(['Extratos bancários do período']);
  });

  it('should drop short and repeated items', () => {
    expect(segmentRequests('Determino: extratos; EXTRATOS DE CONTA; extratos de conta', 10)).toEqual([
      'EXTRATOS DE CONTA',
    ]);
  });
});
