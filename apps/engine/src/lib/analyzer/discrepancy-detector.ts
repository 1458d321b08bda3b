/**
 * Discrepancy Detector
 *
 * Runs the catalog's pattern groups over a text and cross-references them:
 * - rule table {when: [groupA, groupB]} → medical/legal discrepancies
 * - internalContradiction group → two-clause contradictions within the report
 * - structural / functional / duration matches → favorable evidence items
 *
 * analyze() first classifies the document. Court rulings are read with the
 * catalog's judgment term rules and scored with their own points instead.
 *
 * Never throws for lack of matches; an unmatched text yields empty lists.
 *
 * @module analyzer/discrepancy-detector
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  type JudgmentFindingRule,
  type JudgmentRules,
  type PatternGroupName,
  type Severity,
} from "../config-schemas";
import { fillTemplate, findAllMatches, matchesAny, normalizeKey } from "./lexicon-utils";
import type { CatalogProvider, CompiledTermRule, PatternCatalog } from "./pattern-catalog";
import { contextAround } from "./phrase-extractor";
import {
  INTERNAL_CONTRADICTION,
  type DetectionResult,
  type Discrepancy,
  type DocumentType,
  type EvidenceItem,
  type FindingEvidenceType,
  type PatternMatch,
} from "./types";

export interface DiscrepancyAnalysis extends DetectionResult {
  readonly documentType: DocumentType;
  readonly discrepancyScore: number;
  readonly disabilityProbability: number;
}

const DOCUMENT_TYPE_MIN_INDICATORS = 3;

const DISCREPANCY_POINTS: Record<Severity, number> = { high: 25, medium: 15, low: 10 };
const EVIDENCE_POINTS: Record<Severity, number> = { high: 15, medium: 10, low: 5 };
const CONTRADICTION_POINTS = 10;

// ============================================================================
// PATTERN GROUPS
// ============================================================================

/**
 * Every match of a group, ordered by position. Two patterns matching the
 * same span only count once.
 */
export function runGroup(
  catalog: PatternCatalog,
  group: PatternGroupName,
  text: string,
  contextWindow: number,
): PatternMatch[] {
  const matches: PatternMatch[] = [];
  const seen = new Set<string>();

  for (const { source, regex } of catalog.getGroup(group).patterns) {
    for (const m of findAllMatches(regex, text)) {
      const position = m.index;
      const matched = m[0];
      if (position === undefined || matched.length === 0) continue;
      const key = `${position}:${matched.length}`;
      if (seen.has(key)) continue;
      seen.add(key);
      matches.push({
        group,
        pattern: source,
        text: matched,
        position,
        context: contextAround(text, position, position + matched.length, contextWindow),
      });
    }
  }

  return matches.sort((a, b) => a.position - b.position);
}

function durationMonths(catalog: PatternCatalog, match: PatternMatch, groups: Record<string, string> | undefined): number | null {
  const amountText = groups?.amount ?? /\d+/.exec(match.text)?.[0];
  if (amountText === undefined) return null;
  const amount = Number.parseInt(amountText, 10);
  if (!Number.isFinite(amount)) return null;

  const yearKeys = catalog.durationYearUnits.map(normalizeKey);
  const isYears =
    groups?.unit !== undefined
      ? yearKeys.includes(normalizeKey(groups.unit))
      : yearKeys.some((unit) => normalizeKey(match.text).split(" ").includes(unit));
  return isYears ? amount * 12 : amount;
}

// ============================================================================
// DETECTION
// ============================================================================

/**
 * Discrepancies, contradictions and favorable evidence for one text.
 */
export function detectDiscrepancies(
  text: string,
  catalog: PatternCatalog,
  options: { contextWindow?: number } = {},
): DetectionResult {
  const window = options.contextWindow ?? DEFAULT_PIPELINE_CONFIG.discrepancyContextWindow;
  if (!text) return { discrepancies: [], evidenceFavorable: [], contradictions: [] };

  const cache = new Map<PatternGroupName, PatternMatch[]>();
  const group = (name: PatternGroupName): PatternMatch[] => {
    let matches = cache.get(name);
    if (!matches) {
      matches = runGroup(catalog, name, text, window);
      cache.set(name, matches);
    }
    return matches;
  };

  // Cross-reference rules
  const discrepancies: Discrepancy[] = [];
  for (const rule of catalog.rules) {
    const [first, second] = rule.when;
    const evidence = group(first);
    if (evidence.length === 0) continue;
    const counter = group(second)[0];
    if (!counter) continue;
    discrepancies.push({
      type: rule.type,
      description: rule.description,
      severity: rule.severity,
      evidence,
      contradiction: counter.text,
      argument: rule.argument,
    });
  }

  // Internal contradictions
  const contradictionTemplate = catalog.contradictionTemplate;
  const contradictions: Discrepancy[] = group("internalContradiction").map((match) => ({
    type: INTERNAL_CONTRADICTION,
    description: fillTemplate(contradictionTemplate.description, { text: match.text }),
    severity: "high",
    evidence: [match],
    contradiction: match.text,
    argument: contradictionTemplate.argument,
  }));

  // Favorable evidence
  const toEvidence = (type: FindingEvidenceType, relevance: Severity) => (match: PatternMatch): EvidenceItem => {
    const template = catalog.evidenceTemplate(type);
    return {
      type,
      description: fillTemplate(template.description, { text: match.text }),
      relevance,
      argument: template.argument,
      position: match.position,
      matchedText: match.text,
    };
  };

  const evidenceFavorable: EvidenceItem[] = [
    ...group("structuralInjury").map(toEvidence("structural-injury", "high")),
    ...group("functionalLimitation").map(toEvidence("functional-limitation", "high")),
  ];

  const duration = longestDuration(text, catalog, window);
  if (duration && duration.months >= catalog.durationThresholdMonths) {
    const template = catalog.evidenceTemplate("prolonged-duration");
    evidenceFavorable.push({
      type: "prolonged-duration",
      description: fillTemplate(template.description, { months: duration.months, text: duration.match.text }),
      relevance: "medium",
      argument: template.argument,
      position: duration.match.position,
      matchedText: duration.match.text,
      months: duration.months,
    });
  }

  return { discrepancies, evidenceFavorable, contradictions };
}

/**
 * Longest process duration mentioned in the text, in months.
 * Ties keep the earliest mention.
 */
export function longestDuration(
  text: string,
  catalog: PatternCatalog,
  contextWindow: number = DEFAULT_PIPELINE_CONFIG.discrepancyContextWindow,
): { months: number; match: PatternMatch } | null {
  let best: { months: number; match: PatternMatch } | null = null;

  for (const { source, regex } of catalog.getGroup("processDuration").patterns) {
    for (const m of findAllMatches(regex, text)) {
      const position = m.index;
      if (position === undefined || m[0].length === 0) continue;
      const match: PatternMatch = {
        group: "processDuration",
        pattern: source,
        text: m[0],
        position,
        context: contextAround(text, position, position + m[0].length, contextWindow),
      };
      const months = durationMonths(catalog, match, m.groups);
      if (months === null) continue;
      if (!best || months > best.months || (months === best.months && position < best.match.position)) {
        best = { months, match };
      }
    }
  }

  return best;
}

// ============================================================================
// JUDGMENTS
// ============================================================================

/**
 * Earliest hit of each condition, in condition order; null as soon as one
 * condition has no term in the text.
 */
function matchConditions<R>(
  text: string,
  compiled: CompiledTermRule<R>,
  contextWindow: number,
): PatternMatch[] | null {
  const matches: PatternMatch[] = [];
  for (const alternatives of compiled.conditions) {
    let best: PatternMatch | null = null;
    for (const { source, regex } of alternatives) {
      const m = regex.exec(text);
      if (!m || m[0].length === 0) continue;
      if (best && best.position <= m.index) continue;
      best = {
        group: "judgmentRules",
        pattern: source,
        text: m[0],
        position: m.index,
        context: contextAround(text, m.index, m.index + m[0].length, contextWindow),
      };
    }
    if (!best) return null;
    matches.push(best);
  }
  return matches;
}

/**
 * Findings for a court ruling: references and conclusions worth
 * contesting, the legal basis and injuries it cites, and contradictory
 * rulings. Descriptions take {text}, the matched terms joined by spaces.
 */
export function detectJudgmentFindings(
  text: string,
  catalog: PatternCatalog,
  options: { contextWindow?: number } = {},
): DetectionResult {
  const window = options.contextWindow ?? DEFAULT_PIPELINE_CONFIG.discrepancyContextWindow;
  const rules = catalog.judgmentRules;

  const findings = (compiled: readonly CompiledTermRule<JudgmentFindingRule>[]): Discrepancy[] =>
    compiled.flatMap((entry): Discrepancy[] => {
      const matches = matchConditions(text, entry, window);
      const last = matches?.[matches.length - 1];
      if (!matches || !last) return [];
      const { rule } = entry;
      return [
        {
          type: rule.type,
          description: fillTemplate(rule.description, { text: matches.map((m) => m.text).join(" ") }),
          severity: rule.severity,
          evidence: matches,
          contradiction: last.text,
          argument: rule.argument,
        },
      ];
    });

  const evidenceFavorable = rules.evidence.flatMap((entry): EvidenceItem[] => {
    const matches = matchConditions(text, entry, window);
    const first = matches?.[0];
    if (!matches || !first) return [];
    const { rule } = entry;
    return [
      {
        type: rule.type,
        description: fillTemplate(rule.description, { text: matches.map((m) => m.text).join(" ") }),
        relevance: rule.relevance,
        argument: rule.argument,
        position: first.position,
        matchedText: first.text,
      },
    ];
  });

  return {
    discrepancies: findings(rules.discrepancies),
    evidenceFavorable,
    contradictions: findings(rules.contradictions),
  };
}

/** 0-100, weighted by the judgment scoring table */
export function computeJudgmentScore(result: DetectionResult, scoring: JudgmentRules["scoring"]): number {
  const score =
    result.evidenceFavorable.length * scoring.evidencePoints +
    result.discrepancies.length * scoring.discrepancyPoints +
    result.contradictions.length * scoring.contradictionPoints;
  return Math.min(100, score);
}

export function computeJudgmentProbability(result: DetectionResult, scoring: JudgmentRules["scoring"]): number {
  const { when, value } = scoring.baseProbability;
  const base = result.discrepancies.some((d) => d.type === when) ? value : 0;
  return Math.min(1, base + result.evidenceFavorable.length * scoring.evidenceProbability);
}

// ============================================================================
// DOCUMENT SUMMARY
// ============================================================================

/**
 * judgment / medical-report when that side has at least three indicators
 * and strictly more than the other; generic otherwise.
 */
export function detectDocumentType(text: string, catalog: PatternCatalog): DocumentType {
  const { judgment, medicalReport } = catalog.documentIndicators;
  const count = (patterns: readonly RegExp[]) => patterns.filter((p) => matchesAny(text, [p])).length;
  const judgmentCount = count(judgment);
  const medicalCount = count(medicalReport);

  if (judgmentCount >= DOCUMENT_TYPE_MIN_INDICATORS && judgmentCount > medicalCount) return "judgment";
  if (medicalCount >= DOCUMENT_TYPE_MIN_INDICATORS && medicalCount > judgmentCount) return "medical-report";
  return "generic";
}

/** 0-100 */
export function computeDiscrepancyScore(result: DetectionResult): number {
  const score =
    result.discrepancies.reduce((sum, d) => sum + DISCREPANCY_POINTS[d.severity], 0) +
    result.evidenceFavorable.reduce((sum, e) => sum + EVIDENCE_POINTS[e.relevance], 0) +
    result.contradictions.length * CONTRADICTION_POINTS;
  return Math.min(100, score);
}

/**
 * Likelihood (0-1) that the documented findings support a partial
 * permanent disability claim.
 */
export function computeDisabilityProbability(result: DetectionResult): number {
  const { evidenceFavorable, discrepancies } = result;
  if (evidenceFavorable.length === 0 && discrepancies.length === 0) return 0;

  const has = (type: FindingEvidenceType) => evidenceFavorable.some((e) => e.type === type);
  let probability = evidenceFavorable.length > 0 ? 0.3 : 0;
  probability += Math.min(0.4, discrepancies.length * 0.1);
  if (has("structural-injury")) probability += 0.2;
  if (has("functional-limitation")) probability += 0.2;
  if (has("prolonged-duration")) probability += 0.1;
  return Math.min(1, probability);
}

// ============================================================================
// DETECTOR
// ============================================================================

export class DiscrepancyDetector {
  constructor(
    private readonly provider: CatalogProvider,
    private readonly options: { contextWindow?: number } = {},
  ) {}

  detect(text: string): DetectionResult {
    return detectDiscrepancies(text, this.provider.current(), this.options);
  }

  /**
   * Document type, the findings for that type and their summary scores,
   * on a single snapshot. Medical reports and generic texts share detect().
   */
  analyze(text: string): DiscrepancyAnalysis {
    const catalog = this.provider.current();
    const documentType = detectDocumentType(text, catalog);

    if (documentType === "judgment") {
      const result = detectJudgmentFindings(text, catalog, this.options);
      const { scoring } = catalog.judgmentRules;
      return {
        ...result,
        documentType,
        discrepancyScore: computeJudgmentScore(result, scoring),
        disabilityProbability: computeJudgmentProbability(result, scoring),
      };
    }

    const result = detectDiscrepancies(text, catalog, this.options);
    return {
      ...result,
      documentType,
      discrepancyScore: computeDiscrepancyScore(result),
      disabilityProbability: computeDisabilityProbability(result),
    };
  }
}
