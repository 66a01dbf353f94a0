/**
 * Regulatory circular detection.
 *
 * Orders often say "nos termos da Carta Circular nº 3454/10" or "as set out in
 * Circular Letter 3454": the bank must answer in the layout that circular
 * defines. Each circular is tied to the matches its surrounding text mentions,
 * or to all matches when the text names none.
 */

import { foldText } from '../text';
import type { RegulatoryCircular, SubsidyMatch } from '../types';

export const CIRCULAR_CONFIDENCE = 0.9;
export const INFERRED_CIRCULAR_DISCOUNT = 0.8;
const CONTEXT_RADIUS = 100;

const CIRCULAR_PATTERN =
  /(?<![\p{L}])(?:carta[ \t]+circular|circular[ \t]+letter|c\.[ \t]?c\.|cc)[ \t]*(?:n[º°o]\.?[ \t]*|number[ \t]*)?(\d+)(?:[/-](\d{2,4}))?(?!\d)/giu;

const APPLIES_TO_ALL =
  /(?<![\p{L}])(?:tod[oa]s?|demais|listad[oa]s?|acima|abaixo|seguintes?|all|above|below|following|listed)(?![\p{L}])/u;

export function expandCircularYear(token: string | undefined): string | null {
  if (!token) return null;
  if (token.length === 2) {
    const year = parseInt(token, 10);
    return String(year < 50 ? 2000 + year : 1900 + year);
  }
  return token;
}

export function circularReference(circular: Pick<RegulatoryCircular, 'number' | 'year'>): string {
  return `CC ${circular.number}/${circular.year ?? 'N/A'}`;
}

function associatedIndices(context: string, matches: readonly SubsidyMatch[]): number[] {
  const indices: number[] = [];
  matches.forEach((match, index) => {
    const name = foldText(match.subsidy_name);
    const span = foldText(match.text_span);
    if ((name && context.includes(name)) || (span && context.includes(span))) {
      indices.push(index);
    }
  });
  return indices;
}

export interface CircularAnnotation {
  circulars: RegulatoryCircular[];
  matches: SubsidyMatch[];
}

export function annotateCirculars(text: string, matches: readonly SubsidyMatch[]): CircularAnnotation {
  const byKey = new Map<string, { circular: RegulatoryCircular; indices: number[] }>();

  for (const found of text.matchAll(CIRCULAR_PATTERN)) {
    const [sourceText, number] = found;
    if (number === undefined) continue;
    const year = expandCircularYear(found[2]);
    const index = found.index ?? 0;
    const context = foldText(
      text.slice(Math.max(0, index - CONTEXT_RADIUS), index + sourceText.length + CONTEXT_RADIUS)
    );

    let indices: number[];
    let appliesToAll: boolean;
    let confidence = CIRCULAR_CONFIDENCE;

    if (APPLIES_TO_ALL.test(context)) {
      indices = matches.map((_, i) => i);
      appliesToAll = true;
    } else {
      indices = associatedIndices(context, matches);
      appliesToAll = indices.length === 0;
      if (appliesToAll) {
        indices = matches.map((_, i) => i);
        confidence *= INFERRED_CIRCULAR_DISCOUNT;
      }
    }

    const circular: RegulatoryCircular = {
      number,
      year,
      source_text: sourceText.trim(),
      catalog_ids: Array.from(new Set(indices.map((i) => matches[i]?.catalog_id ?? ''))).filter(Boolean),
      applies_to_all: appliesToAll,
      confidence,
    };

    const key = `${number}/${year ?? ''}`;
    const existing = byKey.get(key);
    if (!existing || circular.confidence > existing.circular.confidence) {
      byKey.set(key, { circular, indices });
    }
  }

  const annotated = matches.map((match) => ({ ...match }));
  for (const { circular, indices } of byKey.values()) {
    for (const i of indices) {
      const match = annotated[i];
      if (match && match.circular_reference === null) {
        match.circular_reference = circularReference(circular);
      }
    }
  }

  return { circulars: Array.from(byKey.values()).map((v) => v.circular), matches: annotated };
}
