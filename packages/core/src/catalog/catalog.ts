/**
 * Immutable catalog snapshot.
 *
 * One snapshot is built per run and passed explicitly to every stage. Entries
 * and the snapshot itself are frozen; concurrent readers never observe a change.
 */

import { CatalogError } from '../errors';
import type { CatalogEntry } from '../types';

export interface CatalogSnapshot {
  readonly entries: readonly CatalogEntry[];
  /** Declaration order of each id, used for tie-breaking. */
  readonly order: ReadonlyMap<string, number>;
  get(id: string): CatalogEntry | undefined;
  has(id: string): boolean;
  readonly size: number;
}

export interface CatalogEntryInput {
  id: string;
  name: string;
  description?: string;
  examples?: readonly string[];
}

export function createCatalogSnapshot(input: readonly CatalogEntryInput[]): CatalogSnapshot {
  if (input.length === 0) {
    throw new CatalogError('Catalog is empty');
  }

  const byId = new Map<string, CatalogEntry>();
  const order = new Map<string, number>();
  const entries: CatalogEntry[] = [];

  input.forEach((raw, index) => {
    const id = raw.id.trim();
    if (!id) {
      throw new CatalogError(`Catalog entry at position ${index} has an empty id`, { index });
    }
    if (byId.has(id)) {
      throw new CatalogError(`Duplicate catalog id: ${id}`, { id, index });
    }
    const entry: CatalogEntry = Object.freeze({
      id,
      name: raw.name.trim(),
      description: (raw.description ?? '').trim(),
      examples: Object.freeze(
        (raw.examples ?? []).map((e) => e.trim()).filter((e) => e.length > 0)
      ),
    });
    byId.set(id, entry);
    order.set(id, index);
    entries.push(entry);
  });

  const frozenEntries = Object.freeze(entries);

  return Object.freeze({
    entries: frozenEntries,
    order,
    size: frozenEntries.length,
    get: (id: string) => byId.get(id),
    has: (id: string) => byId.has(id),
  });
}

/**
 * Text that represents an entry in the lexical vector space.
 */
export function entryDocument(entry: CatalogEntry): string {
  return [entry.name, entry.description, ...entry.examples].filter((s) => s.length > 0).join(' ');
}
