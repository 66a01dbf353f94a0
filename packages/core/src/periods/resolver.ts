/**
 * Period Resolver
 *
 * Resolves the period for one (party, match) pair. Pure: reads only its
 * arguments, so any number of resolutions can run side by side.
 */

import { extractPeriodExpression } from '../extractors/dates';
import type { PeriodExpression } from '../extractors/dates';
import { digitsOnly, foldText, splitSentences } from '../text';
import type { CatalogSnapshot } from '../catalog/catalog';
import type { InvestigatedParty, PeriodRequirement, SubsidyMatch } from '../types';
import { expressionToTokens, tokensToRequirement } from './tokens';

export interface PeriodContext {
  /** Canonical order text. */
  readonly text: string;
  readonly catalog: CatalogSnapshot;
  readonly referenceDate: Date | null;
  /** Where the reference date was read from the text, so it is not taken for a period. */
  readonly referenceSpan: { index: number; length: number } | null;
}

function sentencesMentioning(text: string, predicate: (sentence: string) => boolean): string {
  return splitSentences(text).filter(predicate).join('\n');
}

function mentionsParty(party: InvestigatedParty): (sentence: string) => boolean {
  const name = foldText(party.name);
  return (sentence) =>
    (name.length > 0 && foldText(sentence).includes(name)) ||
    (party.tax_id !== null && digitsOnly(sentence).includes(party.tax_id));
}

function withoutReference(context: PeriodContext): string {
  const span = context.referenceSpan;
  if (!span) return context.text;
  return (
    context.text.slice(0, span.index) +
    ' '.repeat(span.length) +
    context.text.slice(span.index + span.length)
  );
}

/**
 * Search scopes, narrowest first: the request span, the validator's evidence,
 * sentences naming the party, sentences naming the subsidy, then the whole
 * text. The first scope holding any period expression wins.
 */
function searchScopes(
  party: InvestigatedParty | null,
  match: SubsidyMatch,
  context: PeriodContext
): string[] {
  const scopes = [match.text_span];
  if (match.evidence_text) scopes.push(match.evidence_text);
  if (party) scopes.push(sentencesMentioning(context.text, mentionsParty(party)));

  const entry = context.catalog.get(match.catalog_id);
  if (entry) {
    const name = foldText(entry.name);
    scopes.push(sentencesMentioning(context.text, (s) => foldText(s).includes(name)));
  }

  scopes.push(withoutReference(context));
  return scopes.filter((scope) => scope.trim().length > 0);
}

export function findPeriodExpression(
  party: InvestigatedParty | null,
  match: SubsidyMatch,
  context: PeriodContext
): PeriodExpression | null {
  for (const scope of searchScopes(party, match, context)) {
    const expression = extractPeriodExpression(scope);
    if (expression) return expression;
  }
  return null;
}

export function resolvePeriod(
  party: InvestigatedParty | null,
  match: SubsidyMatch,
  context: PeriodContext
): PeriodRequirement {
  const expression = findPeriodExpression(party, match, context);
  return tokensToRequirement(expressionToTokens(expression), context.referenceDate);
}
