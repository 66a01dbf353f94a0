/**
 * Catalog Matcher
 *
 * Character n-gram TF-IDF over each catalog entry's name, description and
 * examples. N-grams are taken inside word boundaries: every whitespace-split
 * word is padded with one space on each side and cut into 3..5-grams; a word
 * no longer than n contributes itself once. Weights are raw term frequency times
 * smoothed idf `ln((1 + N) / (1 + df)) + 1`, L2-normalised, so cosine
 * similarity is a dot product in [0, 1].
 */

import { foldText, clamp01 } from '../text';
import type { CatalogEntry } from '../types';
import { entryDocument } from './catalog';
import type { CatalogSnapshot } from './catalog';

const MIN_N = 3;
const MAX_N = 5;

export interface LexicalCandidate {
  catalog_id: string;
  subsidy_name: string;
  score: number;
  /** Request fragment that produced the candidate. */
  text_span: string;
}

export interface ItemMatch {
  item: string;
  candidates: LexicalCandidate[];
}

type SparseVector = Map<string, number>;

export function charWbNgrams(text: string, minN = MIN_N, maxN = MAX_N): string[] {
  const grams: string[] = [];
  const words = foldText(text).split(/\s+/).filter((w) => w.length > 0);

  for (const word of words) {
    const padded = ` ${word} `;
    // Array.from keeps astral characters whole
    const chars = Array.from(padded);
    for (let n = minN; n <= maxN; n++) {
      if (chars.length <= n) {
        grams.push(padded);
        break;
      }
      for (let offset = 0; offset + n <= chars.length; offset++) {
        grams.push(chars.slice(offset, offset + n).join(''));
      }
    }
  }

  return grams;
}

function termCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const gram of charWbNgrams(text)) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

function l2Normalize(vector: SparseVector): SparseVector {
  let sum = 0;
  for (const value of vector.values()) sum += value * value;
  const norm = Math.sqrt(sum);
  if (norm === 0) return vector;
  const normalized: SparseVector = new Map();
  for (const [key, value] of vector) normalized.set(key, value / norm);
  return normalized;
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let total = 0;
  for (const [key, value] of small) {
    const other = large.get(key);
    if (other !== undefined) total += value * other;
  }
  return total;
}

/**
 * Lexical index over one catalog snapshot. Built once; read-only afterwards,
 * so a single instance can serve concurrent matches.
 */
export class CatalogMatcher {
  private readonly idf: ReadonlyMap<string, number>;
  private readonly vectors: ReadonlyArray<{ entry: CatalogEntry; vector: SparseVector }>;

  constructor(readonly catalog: CatalogSnapshot) {
    const docCounts = catalog.entries.map((entry) => termCounts(entryDocument(entry)));

    const df = new Map<string, number>();
    for (const counts of docCounts) {
      for (const gram of counts.keys()) df.set(gram, (df.get(gram) ?? 0) + 1);
    }

    const n = catalog.entries.length;
    const idf = new Map<string, number>();
    for (const [gram, count] of df) {
      idf.set(gram, Math.log((1 + n) / (1 + count)) + 1);
    }
    this.idf = idf;

    this.vectors = catalog.entries.map((entry, i) => ({
      entry,
      vector: this.weigh(docCounts[i] ?? new Map()),
    }));
  }

  private weigh(counts: Map<string, number>): SparseVector {
    const vector: SparseVector = new Map();
    for (const [gram, count] of counts) {
      const idf = this.idf.get(gram);
      // Out-of-vocabulary n-grams carry no weight
      if (idf !== undefined) vector.set(gram, count * idf);
    }
    return l2Normalize(vector);
  }

  /**
   * Rank catalog entries for one request fragment. Candidates scoring at or
   * above `threshold` are returned by descending score; ties keep catalog order.
   */
  match(fragment: string, threshold: number): LexicalCandidate[] {
    const query = this.weigh(termCounts(fragment));
    if (query.size === 0) return [];

    const scored = this.vectors.map(({ entry, vector }, index) => ({
      index,
      candidate: {
        catalog_id: entry.id,
        subsidy_name: entry.name,
        score: clamp01(dot(query, vector)),
        text_span: fragment,
      },
    }));

    return scored
      .filter(({ candidate }) => candidate.score >= threshold)
      .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
      .map(({ candidate }) => candidate);
  }

  /**
   * Match each atomic request item independently.
   */
  matchItems(items: readonly string[], threshold: number): ItemMatch[] {
    return items.map((item) => ({ item, candidates: this.match(item, threshold) }));
  }
}
