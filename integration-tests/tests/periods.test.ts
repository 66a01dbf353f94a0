/**
 * Date extraction, period token grammar and per-party period resolution.
 */

import {
  createCatalogSnapshot,
  detectReferenceDate,
  expressionToTokens,
  extractPeriodExpression,
  parseEndToken,
  parseStartToken,
  resolvePeriod,
  resolvePeriods,
  toDateToken,
  toIsoDate,
  tokensToRequirement,
  type InvestigatedParty,
  type PeriodContext,
} from '@warrant-triage/core';
import { makeMatch } from './helpers';

function party(name: string): InvestigatedParty {
  return {
    key: name.toLowerCase(),
    name,
    tax_id: null,
    tax_id_type: null,
    party_kind: 'individual',
    identifier_missing: true,
    confidence: 0.6,
  };
}

describe('extractPeriodExpression', () => {
  it('should read a numeric range', () => {
    const expression = extractPeriodExpression('extratos de 01/01/2020 a 31/12/2022');

    expect(expression?.kind).toBe('range');
    expect(expression?.source_text).toBe('01/01/2020 a 31/12/2022');
    if (expression?.kind !== 'range') throw new Error('expected a range');
    expect(toIsoDate(expression.start)).toBe('2020-01-01');
    expect(toIsoDate(expression.end)).toBe('2022-12-31');
  });

  it('should read an English long-form range', () => {
    const expression = extractPeriodExpression('from March 1, 2023 to June 30, 2023');

    if (expression?.kind !== 'range') throw new Error('expected a range');
    expect(toIsoDate(expression.start)).toBe('2023-03-01');
    expect(toIsoDate(expression.end)).toBe('2023-06-30');
  });

  it('should read a relative period with the number spelled out', () => {
    expect(extractPeriodExpression('dos últimos 5 (cinco) anos')).toEqual({
      kind: 'relative',
      amount: 5,
      unit: 'years',
      source_text: 'últimos 5 (cinco) anos',
    });
    expect(extractPeriodExpression('for the last two months')).toEqual({
      kind: 'relative',
      amount: 2,
      unit: 'months',
      source_text: 'last two months',
    });
  });

  it('should read a period running since account opening', () => {
    expect(extractPeriodExpression('all statements since the account was opened')).toEqual({
      kind: 'since_inception',
      source_text: 'since the account was opened',
    });
  });

  it('should read a whole month', () => {
    const expression = extractPeriodExpression('faturas de dezembro de 2023');

    if (expression?.kind !== 'month_year') throw new Error('expected a month');
    expect(toIsoDate(expression.start)).toBe('2023-12-01');
    expect(toIsoDate(expression.end)).toBe('2023-12-31');
  });

  it('should order two unconnected dates', () => {
    const expression = extractPeriodExpression('on 05/01/2021 and later on 10/02/2020');

    if (expression?.kind !== 'date_pair') throw new Error('expected a date pair');
    expect(toIsoDate(expression.start)).toBe('2020-02-10');
    expect(toIsoDate(expression.end)).toBe('2021-01-05');
  });

  it('should treat a lone date after "until" as an end bound', () => {
    const expression = extractPeriodExpression('balances until 30/06/2023');

    expect(expression?.kind).toBe('single_date');
    if (expression?.kind !== 'single_date') throw new Error('expected a single date');
    expect(expression.role).toBe('end');
  });

  it('should return null without any period', () => {
    expect(extractPeriodExpression('Send everything.')).toBeNull();
  });
});

describe('period tokens', () => {
  it('should format date tokens as DDMMYYYY', () => {
    expect(toDateToken(new Date(2024, 2, 10))).toBe('10032024');
  });

  it('should parse start tokens', () => {
    expect(parseStartToken('01012020')).toEqual({ kind: 'absolute', date: '2020-01-01' });
    expect(parseStartToken('LAST_12_MONTHS')).toEqual({ kind: 'relative', amount: 12, unit: 'months' });
    expect(parseStartToken('SINCE_INCEPTION')).toEqual({ kind: 'since_inception' });
  });

  it('should turn tokens outside the grammar into UNRESOLVED', () => {
    expect(parseStartToken('LAST_0_YEARS')).toEqual({ kind: 'unresolved' });
    expect(parseStartToken('31022023')).toEqual({ kind: 'unresolved' });
    expect(parseStartToken('garbage')).toEqual({ kind: 'unresolved' });
    expect(parseEndToken('LAST_1_YEARS')).toEqual({ kind: 'unresolved' });
  });

  it('should parse end tokens', () => {
    expect(parseEndToken('REFERENCE_DATE')).toEqual({ kind: 'reference_date' });
    expect(parseEndToken('31122022')).toEqual({ kind: 'absolute', date: '2022-12-31' });
  });

  it('should emit UNRESOLVED tokens when nothing was found', () => {
    expect(expressionToTokens(null)).toEqual({ start: 'UNRESOLVED', end: 'UNRESOLVED', source_text: null });
  });

  it('should open a lone start date up to the reference date', () => {
    expect(expressionToTokens(extractPeriodExpression('movements from 15/03/2022'))).toEqual({
      start: '15032022',
      end: 'REFERENCE_DATE',
      source_text: '15/03/2022',
    });
  });

  it('should keep relative bounds symbolic without a reference date', () => {
    expect(
      tokensToRequirement({ start: 'LAST_6_MONTHS', end: 'REFERENCE_DATE', source_text: 'last 6 months' }, null)
    ).toEqual({
      start: { kind: 'relative', amount: 6, unit: 'months' },
      end: { kind: 'reference_date' },
      source_text: 'last 6 months',
    });
  });

  it('should resolve relative bounds against a reference date', () => {
    expect(
      tokensToRequirement(
        { start: 'LAST_6_MONTHS', end: 'REFERENCE_DATE', source_text: 'last 6 months' },
        new Date(2024, 7, 31)
      )
    ).toEqual({
      start: { kind: 'absolute', date: '2024-02-29' },
      end: { kind: 'absolute', date: '2024-08-31' },
      source_text: 'last 6 months',
    });
  });

  it('should drop inverted bounds', () => {
    expect(tokensToRequirement({ start: '31122023', end: '01012020', source_text: 'x' }, null)).toEqual({
      start: { kind: 'unresolved' },
      end: { kind: 'unresolved' },
      source_text: 'x',
    });
  });
});

describe('detectReferenceDate', () => {
  it('should read the date of a Portuguese heading', () => {
    const mention = detectReferenceDate(
      'São Paulo, 10 de março de 2024.\n\nDetermino o envio dos extratos dos últimos 2 anos.'
    );

    expect(mention?.source_text).toBe('10 de março de 2024');
    expect(mention?.index).toBe(11);
    expect(mention && toIsoDate(mention.date)).toBe('2024-03-10');
  });

  it('should read an English "dated" line', () => {
    const mention = detectReferenceDate('Dated March 10, 2024\nCOURT ORDER');

    expect(mention && toIsoDate(mention.date)).toBe('2024-03-10');
  });

  it('should ignore numeric dates and dates inside a sentence', () => {
    expect(detectReferenceDate('10/03/2024')).toBeNull();
    expect(detectReferenceDate('statements from 10 de março de 2024 onward')).toBeNull();
  });
});

describe('period resolution', () => {
  const catalog = createCatalogSnapshot([
    { id: 'credit_card_statements', name: 'Credit card statements' },
    { id: 'account_balances', name: 'Account balances' },
  ]);

  const text = [
    'Credit card statements of JOHN ALBERT SMITH from 01/01/2020 to 31/12/2020.',
    'Credit card statements of MARY JANE ROE since the account was opened.',
    'Account balances on 31/12/2021.',
  ].join('\n');

  const context: PeriodContext = {
    text,
    catalog,
    referenceDate: new Date(2024, 0, 31),
    referenceSpan: null,
  };

  const matches = [
    makeMatch({ catalog_id: 'credit_card_statements', text_span: 'Credit card statements' }),
    makeMatch({ catalog_id: 'account_balances', text_span: 'Account balances' }),
  ];

  const john = party('JOHN ALBERT SMITH');
  const mary = party('MARY JANE ROE');

  const year2020 = {
    start: { kind: 'absolute', date: '2020-01-01' },
    end: { kind: 'absolute', date: '2020-12-31' },
    source_text: '01/01/2020 to 31/12/2020',
  };
  const sinceOpening = {
    start: { kind: 'since_inception' },
    end: { kind: 'absolute', date: '2024-01-31' },
    source_text: 'since the account was opened',
  };

  it('should prefer the sentences naming the party', () => {
    expect(resolvePeriod(john, matches[0], context)).toEqual(year2020);
    expect(resolvePeriod(mary, matches[0], context)).toEqual(sinceOpening);
  });

  it('should fall back to the sentences naming the subsidy', () => {
    expect(resolvePeriod(null, matches[1], context)).toEqual({
      start: { kind: 'absolute', date: '2021-12-31' },
      end: { kind: 'absolute', date: '2024-01-31' },
      source_text: '31/12/2021',
    });
  });

  it('should fan out over every party and match in order', async () => {
    const resolution = await resolvePeriods([john, mary], matches, context, 3);

    expect(resolution.periods.map((p) => [p.party_key, p.catalog_id])).toEqual([
      ['john albert smith', 'credit_card_statements'],
      ['john albert smith', 'account_balances'],
      ['mary jane roe', 'credit_card_statements'],
      ['mary jane roe', 'account_balances'],
    ]);
    expect(resolution.periods[0].period).toEqual(year2020);
    expect(resolution.periods[2].period).toEqual(sinceOpening);
    expect(resolution.matchPeriods).toHaveLength(2);
    expect(resolution.matchPeriods[0]).toEqual(year2020);
  });

  it('should not depend on the concurrency limit', async () => {
    const serial = await resolvePeriods([john, mary], matches, context, 1);
    const parallel = await resolvePeriods([john, mary], matches, context, 6);

    expect(parallel).toEqual(serial);
  });

  it('should report periods under the any-party key when no party was found', async () => {
    const resolution = await resolvePeriods([], matches, context, 2);

    expect(resolution.periods.map((p) => [p.party_key, p.party_name, p.catalog_id])).toEqual([
      ['*', null, 'credit_card_statements'],
      ['*', null, 'account_balances'],
    ]);
  });

  it('should not read the reference date as a period', () => {
    const dated = 'São Paulo, 10 de março de 2024.\nSend the account balances.';
    const match = makeMatch({ catalog_id: 'account_balances', text_span: 'the account balances' });

    expect(
      resolvePeriod(null, match, { text: dated, catalog, referenceDate: null, referenceSpan: { index: 11, length: 19 } })
    ).toEqual({ start: { kind: 'unresolved' }, end: { kind: 'unresolved' }, source_text: null });

    expect(resolvePeriod(null, match, { text: dated, catalog, referenceDate: null, referenceSpan: null })).toEqual({
      start: { kind: 'absolute', date: '2024-03-10' },
      end: { kind: 'reference_date' },
      source_text: '10 de março de 2024',
    });
  });
});
