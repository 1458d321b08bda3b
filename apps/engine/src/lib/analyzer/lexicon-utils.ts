/**
 * Lexicon Utilities
 *
 * Compiles catalog and scoring vocabulary into RegExp objects.
 * Pattern syntax:
 * - "re:<pattern>" - raw regex (e.g., "re:rotura\\s+(?:de\\s+)?espesor\\s+completo")
 * - "<literal>"   - literal phrase; whitespace, "_" and "-" are interchangeable
 *                   separators and the phrase must stand as whole words
 *
 * All patterns compile with the unicode flag so accented letters count as
 * word characters for the boundary checks.
 *
 * @module analyzer/lexicon-utils
 */

export const REGEX_PREFIX = "re:";

const SEPARATOR_SPLIT = /[\s_-]+/u;
const FLEX_SEPARATOR = "[\\s_-]+";
const WORD_START = "(?<![\\p{L}\\p{N}_])";
const WORD_END = "(?![\\p{L}\\p{N}_])";

export interface CompiledPattern {
  /** Entry as written in the catalog/config */
  readonly source: string;
  readonly regex: RegExp;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Comparison key for names and phrase variants: case-insensitive and
 * separator-insensitive ("Lesiones-Permanentes" ≡ "lesiones permanentes").
 */
export function normalizeKey(value: string): string {
  return value.trim().toLowerCase().split(SEPARATOR_SPLIT).filter(Boolean).join(" ");
}

function literalSource(phrase: string, wholeWord: boolean): string {
  const tokens = phrase.trim().split(SEPARATOR_SPLIT).filter(Boolean).map(escapeRegExp);
  if (tokens.length === 0) {
    // Would otherwise compile to an empty match at every position
    throw new SyntaxError(`Empty phrase: "${phrase}"`);
  }
  return `${WORD_START}${tokens.join(FLEX_SEPARATOR)}${wholeWord ? WORD_END : ""}`;
}

/**
 * Parse a pattern string into a global RegExp (for matchAll scanning).
 */
export function parsePattern(pattern: string, options: { dotAll?: boolean } = {}): RegExp {
  const flags = options.dotAll ? "gisu" : "giu";
  if (pattern.startsWith(REGEX_PREFIX)) {
    return new RegExp(pattern.slice(REGEX_PREFIX.length), flags);
  }
  return new RegExp(literalSource(pattern, true), flags);
}

/**
 * Word-prefix matcher for presence checks: "lesion" matches "lesiones",
 * "actor" does not match "factores". Non-global, safe to share.
 */
export function parsePrefixTerm(term: string): RegExp {
  return new RegExp(literalSource(term, false), "iu");
}

export function compilePatterns(patterns: readonly string[], options: { dotAll?: boolean } = {}): CompiledPattern[] {
  return patterns.map((source) => ({ source, regex: parsePattern(source, options) }));
}

/**
 * All matches of a compiled pattern. matchAll works on a clone of the regex,
 * so shared compiled patterns never carry lastIndex state between calls.
 */
export function findAllMatches(regex: RegExp, text: string): RegExpMatchArray[] {
  return Array.from(text.matchAll(regex));
}

/**
 * Presence test that ignores lastIndex (String#search restores it).
 */
export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => text.search(pattern) >= 0);
}

/**
 * Replace {placeholders} with values; unknown placeholders are left in place.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => {
    const value = values[key];
    return value === undefined ? whole : String(value);
  });
}
