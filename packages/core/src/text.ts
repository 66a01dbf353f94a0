/**
 * Text normalization helpers shared by the classifiers and extractors.
 */

/**
 * Lowercase and strip combining diacritics ("Movimentações" → "movimentacoes").
 */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

/**
 * Fold and collapse whitespace; used for identity keys and dedup.
 */
export function normalizeKey(text: string): string {
  return foldText(text).replace(/\s+/g, ' ').trim();
}

export function digitsOnly(text: string): string {
  return text.replace(/\D/g, '');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split text into sentences on terminal punctuation and line breaks.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?;])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function unique<T>(values: Iterable<T>): T[] {
  return Array.from(new Set(values));
}
