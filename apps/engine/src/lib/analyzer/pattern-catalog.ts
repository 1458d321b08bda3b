/**
 * Pattern Catalog
 *
 * Immutable, compiled snapshot of the phrase catalog (category → variants)
 * and the discrepancy pattern groups. Every regex is compiled here, once per
 * snapshot; extractors and detectors only read. Judgment rules are term
 * conditions compiled the same way as the scoring markers.
 *
 * @module analyzer/pattern-catalog
 */

import {
  PATTERN_GROUP_NAMES,
  safeParseConfig,
  type CatalogConfig,
  type DiscrepancyRule,
  type FindingTemplate,
  type JudgmentEvidenceRule,
  type JudgmentFindingRule,
  type JudgmentRules,
  type PatternGroupName,
} from "../config-schemas";
import { ConfigurationError } from "../errors";
import { compilePatterns, normalizeKey, parsePrefixTerm, type CompiledPattern } from "./lexicon-utils";
import type { FindingEvidenceType } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface CatalogCategory {
  readonly name: string;
  /** De-duplicated, catalog order */
  readonly variants: readonly string[];
  readonly patterns: readonly CompiledPattern[];
}

export interface CompiledGroup {
  readonly name: PatternGroupName;
  readonly patterns: readonly CompiledPattern[];
}

/** One compiled term per alternative, one list per condition */
export interface CompiledTermRule<R> {
  readonly rule: R;
  readonly conditions: readonly (readonly CompiledPattern[])[];
}

export interface CompiledJudgmentRules {
  readonly discrepancies: readonly CompiledTermRule<JudgmentFindingRule>[];
  readonly evidence: readonly CompiledTermRule<JudgmentEvidenceRule>[];
  readonly contradictions: readonly CompiledTermRule<JudgmentFindingRule>[];
  readonly scoring: JudgmentRules["scoring"];
}

/**
 * Anything that hands out the catalog to use for the next call.
 * A registry returns its latest snapshot; a bare catalog returns itself.
 */
export interface CatalogProvider {
  current(): PatternCatalog;
}

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

function isMapping(value: unknown): value is object {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Trim, drop case/separator-insensitive duplicates (first spelling wins)
 * and reject empty variants.
 */
export function dedupeVariants(category: string, variants: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of variants) {
    const variant = raw.trim();
    const key = normalizeKey(variant);
    if (!key) {
      throw new ConfigurationError(`Empty phrase in category "${category}"`, "catalog");
    }
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(variant);
  }
  return result;
}

function compileOrThrow(
  owner: string,
  patterns: readonly string[],
  options: { dotAll?: boolean } = {},
): CompiledPattern[] {
  try {
    return compilePatterns(patterns, options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid pattern in ${owner}: ${message}`, "catalog", [message]);
  }
}

function compileTermRule<R extends { type: string; all: string[][] }>(rule: R): CompiledTermRule<R> {
  try {
    return {
      rule,
      conditions: rule.all.map((alternatives) =>
        alternatives.map((term) => ({ source: term, regex: parsePrefixTerm(term) })),
      ),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid term in judgment rule "${rule.type}": ${message}`, "catalog", [message]);
  }
}

// ============================================================================
// PATTERN CATALOG
// ============================================================================

export class PatternCatalog implements CatalogProvider {
  private readonly categoryIndex: ReadonlyMap<string, CatalogCategory>;

  private constructor(
    private readonly definition: CatalogConfig,
    readonly categories: readonly CatalogCategory[],
    private readonly groups: ReadonlyMap<PatternGroupName, CompiledGroup>,
    private readonly judgmentIndicators: readonly RegExp[],
    private readonly medicalReportIndicators: readonly RegExp[],
    readonly judgmentRules: CompiledJudgmentRules,
  ) {
    this.categoryIndex = new Map(categories.map((c) => [normalizeKey(c.name), c]));
  }

  /**
   * Validate and compile a catalog definition.
   * Throws ConfigurationError for a non-mapping, an empty catalog,
   * case-insensitive duplicate category names, empty phrases or bad regexes.
   */
  static fromDefinition(raw: unknown): PatternCatalog {
    if (!isMapping(raw)) {
      throw new ConfigurationError("Catalog definition must be a mapping", "catalog");
    }

    const parsed = safeParseConfig("catalog", raw);
    if (!parsed.ok) {
      throw new ConfigurationError(`Invalid catalog: ${parsed.issues.join(", ")}`, "catalog", parsed.issues);
    }
    const config = parsed.config;

    const entries = Object.entries(config.categories);
    if (entries.length === 0) {
      throw new ConfigurationError("Catalog has no categories", "catalog");
    }

    const seenNames = new Map<string, string>();
    const categories: CatalogCategory[] = [];
    const normalizedCategories: Record<string, string[]> = {};

    for (const [rawName, rawVariants] of entries) {
      const name = rawName.trim();
      const key = normalizeKey(name);
      if (!key) {
        throw new ConfigurationError("Category names must be non-empty", "catalog");
      }
      const clash = seenNames.get(key);
      if (clash !== undefined) {
        throw new ConfigurationError(`Duplicate category name: "${rawName}" collides with "${clash}"`, "catalog");
      }
      seenNames.set(key, rawName);

      const variants = dedupeVariants(name, rawVariants);
      normalizedCategories[name] = variants;
      categories.push({
        name,
        variants,
        patterns: compileOrThrow(`category "${name}"`, variants),
      });
    }

    const groups = new Map<PatternGroupName, CompiledGroup>();
    for (const groupName of PATTERN_GROUP_NAMES) {
      const group = config.patternGroups[groupName];
      groups.set(groupName, {
        name: groupName,
        patterns: compileOrThrow(`pattern group "${groupName}"`, group.patterns, { dotAll: group.dotAll }),
      });
    }

    return new PatternCatalog(
      { ...config, categories: normalizedCategories },
      categories,
      groups,
      config.documentTypeIndicators.judgment.map(parsePrefixTerm),
      config.documentTypeIndicators.medicalReport.map(parsePrefixTerm),
      {
        discrepancies: config.judgmentRules.discrepancies.map((rule) => compileTermRule(rule)),
        evidence: config.judgmentRules.evidence.map((rule) => compileTermRule(rule)),
        contradictions: config.judgmentRules.contradictions.map((rule) => compileTermRule(rule)),
        scoring: config.judgmentRules.scoring,
      },
    );
  }

  current(): PatternCatalog {
    return this;
  }

  get categoryNames(): string[] {
    return this.categories.map((c) => c.name);
  }

  /** Case- and separator-insensitive lookup */
  getCategory(name: string): CatalogCategory | undefined {
    return this.categoryIndex.get(normalizeKey(name));
  }

  getGroup(name: PatternGroupName): CompiledGroup {
    const group = this.groups.get(name);
    if (!group) {
      throw new ConfigurationError(`Unknown pattern group: ${name}`, "catalog");
    }
    return group;
  }

  get rules(): readonly DiscrepancyRule[] {
    return this.definition.discrepancyRules;
  }

  get durationYearUnits(): readonly string[] {
    return this.definition.durationYearUnits;
  }

  get durationThresholdMonths(): number {
    return this.definition.durationThresholdMonths;
  }

  evidenceTemplate(type: FindingEvidenceType): FindingTemplate {
    return this.definition.evidenceTemplates[type];
  }

  get contradictionTemplate(): FindingTemplate {
    return this.definition.contradictionTemplate;
  }

  get documentIndicators(): { judgment: readonly RegExp[]; medicalReport: readonly RegExp[] } {
    return { judgment: this.judgmentIndicators, medicalReport: this.medicalReportIndicators };
  }

  /**
   * Editable deep copy of the (normalized) definition. Mutating it never
   * affects this snapshot.
   */
  toDefinition(): CatalogConfig {
    return structuredClone(this.definition);
  }
}
