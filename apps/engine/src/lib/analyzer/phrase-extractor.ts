/**
 * Phrase Extractor
 *
 * Scans a text against the current catalog snapshot and groups every
 * whole-word variant match by category.
 *
 * @module analyzer/phrase-extractor
 */

import { DEFAULT_PIPELINE_CONFIG } from "../config-schemas";
import { findAllMatches } from "./lexicon-utils";
import type { CatalogProvider, PatternCatalog } from "./pattern-catalog";
import type { CategoryOccurrences, Occurrence, OccurrenceMap } from "./types";

export interface ExtractOptions {
  documentId?: string;
  /** Characters kept on each side of a match */
  contextWindow?: number;
}

// ============================================================================
// POSITION HELPERS
// ============================================================================

/** Offsets of every "\n", ascending */
export function newlineOffsets(text: string): number[] {
  const offsets: number[] = [];
  let index = text.indexOf("\n");
  while (index >= 0) {
    offsets.push(index);
    index = text.indexOf("\n", index + 1);
  }
  return offsets;
}

/**
 * 1-based line of a char offset: 1 + newlines strictly before it.
 */
export function lineAt(offsets: readonly number[], position: number): number {
  let lo = 0;
  let hi = offsets.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((offsets[mid] ?? Infinity) < position) lo = mid + 1;
    else hi = mid;
  }
  return lo + 1;
}

export function contextAround(text: string, start: number, end: number, window: number): string {
  return text.slice(Math.max(0, start - window), Math.min(text.length, end + window));
}

// ============================================================================
// EXTRACTION
// ============================================================================

/**
 * Categorized occurrences of every catalog variant in `text`.
 * Map order follows catalog order; categories without matches are omitted.
 */
export function extractOccurrences(
  text: string,
  catalog: PatternCatalog,
  options: ExtractOptions = {},
): OccurrenceMap {
  const documentId = options.documentId ?? "";
  const window = options.contextWindow ?? DEFAULT_PIPELINE_CONFIG.contextWindow;
  const result = new Map<string, CategoryOccurrences>();
  if (!text) return result;

  const offsets = newlineOffsets(text);

  for (const category of catalog.categories) {
    const occurrences: Occurrence[] = [];
    const phrases: Record<string, number> = {};

    for (const { source, regex } of category.patterns) {
      for (const match of findAllMatches(regex, text)) {
        const position = match.index;
        const matchedText = match[0];
        if (position === undefined || matchedText.length === 0) continue;
        occurrences.push({
          category: category.name,
          phrase: source,
          matchedText,
          position,
          line: lineAt(offsets, position),
          context: contextAround(text, position, position + matchedText.length, window),
          documentId,
        });
        phrases[source] = (phrases[source] ?? 0) + 1;
      }
    }

    if (occurrences.length === 0) continue;
    // Array#sort is stable: same position keeps variant order
    occurrences.sort((a, b) => a.position - b.position);
    result.set(category.name, { total: occurrences.length, occurrences, phrases });
  }

  return result;
}

/**
 * Bound to a catalog provider. Reads `provider.current()` on every call,
 * so a committed catalog edit applies to the next extraction.
 */
export class PhraseExtractor {
  constructor(
    private readonly provider: CatalogProvider,
    private readonly options: { contextWindow?: number } = {},
  ) {}

  extract(text: string, documentId = ""): OccurrenceMap {
    return extractOccurrences(text, this.provider.current(), {
      documentId,
      contextWindow: this.options.contextWindow,
    });
  }
}
