/**
 * Catalog loading.
 *
 * Catalog files in the wild disagree on field names (`description` vs
 * `descricao`, examples as a list or a `;`-separated string), so the mapping
 * from source keys to catalog fields is supplied by the caller.
 */

import fs from 'fs';
import path from 'path';
import { CatalogError } from '../errors';
import { logger } from '../logger';
import { validateCatalog } from '../schemas';
import { createCatalogSnapshot } from './catalog';
import type { CatalogEntryInput, CatalogSnapshot } from './catalog';

export interface CatalogFieldMapping {
  id: string;
  name: string;
  description: string;
  examples: string;
}

export const DEFAULT_FIELD_MAPPING: CatalogFieldMapping = {
  id: 'id',
  name: 'name',
  description: 'description',
  examples: 'examples',
};

/** Field names used by Portuguese-language catalog exports. */
export const PORTUGUESE_FIELD_MAPPING: CatalogFieldMapping = {
  id: 'subsidio_id',
  name: 'nome',
  description: 'descricao',
  examples: 'exemplos',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function readExamples(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(readScalar).filter((e) => e.trim().length > 0);
  }
  if (typeof value === 'string') {
    return value
      .split(/[;\n]/)
      .map((e) => e.trim())
      .filter((e) => e.length > 0);
  }
  return [];
}

/**
 * Map raw records to catalog entries using the given field mapping.
 */
export function mapCatalogRecords(
  records: unknown,
  mapping: CatalogFieldMapping = DEFAULT_FIELD_MAPPING
): CatalogEntryInput[] {
  if (!Array.isArray(records)) {
    throw new CatalogError('Catalog source must be an array of records');
  }

  return records.map((record, index) => {
    if (!isRecord(record)) {
      throw new CatalogError(`Catalog record at position ${index} is not an object`, { index });
    }
    return {
      id: readScalar(record[mapping.id]).trim(),
      name: readScalar(record[mapping.name]).trim(),
      description: readScalar(record[mapping.description]).trim(),
      examples: readExamples(record[mapping.examples]),
    };
  });
}

/**
 * Map, validate and freeze raw catalog records.
 */
export function buildCatalog(
  records: unknown,
  mapping: CatalogFieldMapping = DEFAULT_FIELD_MAPPING
): CatalogSnapshot {
  const mapped = mapCatalogRecords(records, mapping);
  const validation = validateCatalog(mapped);
  if (!validation.valid) {
    throw new CatalogError('Catalog does not match subsidy_catalog.schema.json', {
      errors: validation.errors,
    });
  }
  return createCatalogSnapshot(mapped);
}

/**
 * Load a JSON catalog file. Relative paths resolve against the working directory.
 */
export function loadCatalogFromFile(
  filePath: string,
  mapping: CatalogFieldMapping = DEFAULT_FIELD_MAPPING
): CatalogSnapshot {
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  if (!fs.existsSync(resolved)) {
    throw new CatalogError(`Catalog file not found: ${resolved}`);
  }

  let records: unknown;
  try {
    records = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new CatalogError(`Catalog file is not valid JSON: ${resolved}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const catalog = buildCatalog(records, mapping);
  logger.info('Catalog loaded', { path: resolved, entries: catalog.size });
  return catalog;
}
