/**
 * Keyword Scorer
 *
 * Six-factor weighted rule engine. Every weight, vocabulary list and
 * calibration constant comes from the scoring config; there is one code path
 * for all factor tables.
 *
 * Total = Σ(factor.score × factor.weight), clamped to [-1, 1].
 * Only the lexical factor is signed; the others are presence scores in [0, 1].
 *
 * @module analyzer/keyword-scorer
 * @version 1.0.0
 */

import {
  FACTOR_NAMES,
  type FactorName,
  type MarkerFactorName,
  type ScoringConfig,
} from "../config-schemas";
import { findAllMatches, matchesAny, normalizeKey, parsePattern, parsePrefixTerm } from "./lexicon-utils";
import type {
  FavorabilityLabel,
  PredictionResult,
  PredictionSource,
  ScoringFactor,
  SuccessClass,
  SuccessProbability,
} from "./types";

// ============================================================================
// COMPILED VOCABULARY
// ============================================================================

interface CompiledTerm {
  readonly term: string;
  readonly regex: RegExp;
}

interface CompiledMarker {
  readonly label: string;
  readonly score: number;
  /** AND over groups, OR within a group */
  readonly groups: readonly (readonly RegExp[])[];
}

interface Span {
  readonly start: number;
  readonly end: number;
}

function compileTerms(terms: readonly string[]): CompiledTerm[] {
  const seen = new Set<string>();
  const compiled: CompiledTerm[] = [];
  for (const term of terms) {
    const key = normalizeKey(term);
    if (seen.has(key)) continue;
    seen.add(key);
    compiled.push({ term, regex: parsePattern(term) });
  }
  return compiled;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function overlaps(span: Span, spans: readonly Span[]): boolean {
  return spans.some((s) => span.start < s.end && s.start < span.end);
}

// ============================================================================
// SCORER
// ============================================================================

export class KeywordScorer {
  private readonly favorable: readonly CompiledTerm[];
  private readonly unfavorable: readonly CompiledTerm[];
  private readonly markers: Readonly<Record<MarkerFactorName, readonly CompiledMarker[]>>;
  private readonly terminology: readonly CompiledTerm[];

  constructor(private readonly config: ScoringConfig) {
    this.favorable = compileTerms(config.lexicon.favorable);
    this.unfavorable = compileTerms(config.lexicon.unfavorable);
    this.terminology = config.terminology.map((term) => ({ term, regex: parsePrefixTerm(term) }));

    const compileMarkers = (name: MarkerFactorName): CompiledMarker[] =>
      config.markers[name].map((marker) => ({
        label: marker.label,
        score: marker.score,
        groups: marker.all.map((alternatives) => alternatives.map(parsePrefixTerm)),
      }));

    this.markers = {
      structure: compileMarkers("structure"),
      medicalEvidence: compileMarkers("medicalEvidence"),
      procedure: compileMarkers("procedure"),
      context: compileMarkers("context"),
    };
  }

  /**
   * Deterministic verdict for a text. No side effects.
   */
  score(text: string): PredictionResult {
    const factors = this.computeFactors(text);
    const total = factors.reduce((sum, f) => sum + f.score * f.weight, 0);
    return this.finalize(total, factors, "rules");
  }

  computeFactors(text: string): ScoringFactor[] {
    const lexical = this.lexicalFactor(text);
    return FACTOR_NAMES.map((name): ScoringFactor => {
      const weight = this.config.weights[name];
      switch (name) {
        case "lexical":
          return { name, weight, ...lexical };
        case "terminology":
          return { name, weight, ...this.terminologyFactor(text) };
        default:
          return { name, weight, ...this.markerFactor(name, text) };
      }
    });
  }

  /**
   * Turn a signed total into a full prediction (confidence, labels, success
   * probability). Shared with the hybrid service for classifier scores.
   */
  finalize(rawScore: number, factors: readonly ScoringFactor[], source: PredictionSource): PredictionResult {
    const { confidenceFloor, confidenceCap } = this.config.calibration;
    const score = clamp(rawScore, -1, 1);
    const confidence = clamp(Math.abs(score), confidenceFloor, confidenceCap);
    const favorable = score > 0;

    return {
      favorable,
      score,
      confidence,
      label: this.labelFor(favorable, confidence),
      factors,
      successProbability: this.successProbability(confidence, factors),
      source,
    };
  }

  /** Verdict for a document that could not be analyzed */
  neutralPrediction(): PredictionResult {
    const factors = FACTOR_NAMES.map(
      (name): ScoringFactor => ({ name, score: 0, weight: this.config.weights[name], detected: [] }),
    );
    return this.finalize(0, factors, "rules");
  }

  // ==========================================================================
  // FACTORS
  // ==========================================================================

  /**
   * (fav - unfav) / (fav + unfav) over word-bounded occurrence counts.
   * A favorable hit inside an unfavorable span ("no procedente") is not
   * counted as favorable.
   */
  private lexicalFactor(text: string): { score: number; detected: string[] } {
    const unfavorableSpans: Span[] = [];
    const detected: string[] = [];

    let unfavorableCount = 0;
    for (const { term, regex } of this.unfavorable) {
      const matches = findAllMatches(regex, text);
      for (const m of matches) {
        const start = m.index ?? 0;
        unfavorableSpans.push({ start, end: start + m[0].length });
      }
      if (matches.length > 0) {
        unfavorableCount += matches.length;
        detected.push(`-${term}`);
      }
    }

    let favorableCount = 0;
    for (const { term, regex } of this.favorable) {
      let hits = 0;
      for (const m of findAllMatches(regex, text)) {
        const start = m.index ?? 0;
        if (!overlaps({ start, end: start + m[0].length }, unfavorableSpans)) hits += 1;
      }
      if (hits > 0) {
        favorableCount += hits;
        detected.push(`+${term}`);
      }
    }

    const total = favorableCount + unfavorableCount;
    return { score: total === 0 ? 0 : (favorableCount - unfavorableCount) / total, detected };
  }

  private markerFactor(name: MarkerFactorName, text: string): { score: number; detected: string[] } {
    let score = 0;
    const detected: string[] = [];
    for (const marker of this.markers[name]) {
      if (marker.groups.every((alternatives) => matchesAny(text, alternatives))) {
        score += marker.score;
        detected.push(marker.label);
      }
    }
    return { score: Math.min(1, score), detected };
  }

  private terminologyFactor(text: string): { score: number; detected: string[] } {
    const detected = this.terminology.filter(({ regex }) => text.search(regex) >= 0).map(({ term }) => term);
    return { score: detected.length / this.terminology.length, detected };
  }

  // ==========================================================================
  // CALIBRATION
  // ==========================================================================

  private labelFor(favorable: boolean, confidence: number): FavorabilityLabel {
    const { strongBand, moderateBand } = this.config.calibration;
    if (confidence >= strongBand) return favorable ? "very-favorable" : "very-unfavorable";
    if (confidence >= moderateBand) return favorable ? "favorable" : "unfavorable";
    return favorable ? "partially-favorable" : "partially-unfavorable";
  }

  private successProbability(confidence: number, factors: readonly ScoringFactor[]): SuccessProbability {
    const { criticalBonuses, successCap, successBands } = this.config.calibration;
    // Without any verdict vocabulary the lexical factor carries no signal
    const counted = factors.filter((f) => f.name !== "lexical" || f.detected.length > 0);
    const meanFactorScore = counted.length === 0 ? 0 : counted.reduce((sum, f) => sum + f.score, 0) / counted.length;

    const scoreOf = (name: FactorName): number => factors.find((f) => f.name === name)?.score ?? 0;
    const bonus = criticalBonuses
      .filter((b) => scoreOf(b.factor) >= b.threshold)
      .reduce((sum, b) => sum + b.bonus, 0);

    const probability = clamp((confidence + meanFactorScore) / 2 + bonus, 0, successCap);

    let label: SuccessClass = "low";
    if (probability >= successBands.veryHigh) label = "very-high";
    else if (probability >= successBands.high) label = "high";
    else if (probability >= successBands.medium) label = "medium";

    return { probability, label, meanFactorScore, bonus };
  }
}
