/**
 * Evidence Aggregator
 *
 * Merges per-document analyses into a corpus report:
 * - ranking: category totals summed across documents, stable descending
 * - prediction: instance-weighted favorable share, calibrated by corpus size
 * - risk: tiered category load scaled by court authority
 * - trends / correlations / key factors derived from the ranking
 *
 * Documents carrying an error marker are listed in `failedDocuments` and
 * contribute nothing else; corpus size counts analyzed documents only.
 *
 * @module analyzer/evidence-aggregator
 * @version 1.0.0
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";

import type { AggregationConfig } from "../config-schemas";
import { normalizeKey } from "./lexicon-utils";
import type {
  AggregatePrediction,
  CategoryCorrelation,
  CorpusRanking,
  CorpusReport,
  CorrelationStrength,
  DocumentAnalysis,
  DocumentWeight,
  FailedDocument,
  FrequencyClass,
  InstanceLevel,
  KeyFactor,
  KeyFactors,
  Occurrence,
  RankingEntry,
  RiskAnalysis,
  RiskLevel,
  RiskTierSummary,
  TrendSummary,
} from "./types";

const RISK_LEVELS: readonly RiskLevel[] = ["high", "medium", "low"];
const DOMINANT_CATEGORY_COUNT = 3;
const PREDICTION_CONFIDENCE_BOUNDS = { min: 0.1, max: 0.95 } as const;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Stable descending sort (Array#sort is stable) */
function sortDescending<T>(items: T[], valueOf: (item: T) => number): T[] {
  return items.sort((a, b) => valueOf(b) - valueOf(a));
}

// ============================================================================
// ACCUMULATION
// ============================================================================

interface MutableRankingEntry {
  category: string;
  total: number;
  occurrences: Occurrence[];
  documentCount: number;
}

class CorpusAccumulator {
  readonly analyzed: DocumentAnalysis[] = [];
  readonly failed: FailedDocument[] = [];
  readonly ranking = new Map<string, MutableRankingEntry>();
  documentCount = 0;

  add(doc: DocumentAnalysis): void {
    this.documentCount += 1;
    if (doc.error) {
      this.failed.push({ documentId: doc.documentId, error: doc.error });
      return;
    }
    this.analyzed.push(doc);
    for (const [category, found] of doc.occurrences) {
      let entry = this.ranking.get(category);
      if (!entry) {
        entry = { category, total: 0, occurrences: [], documentCount: 0 };
        this.ranking.set(category, entry);
      }
      entry.total += found.total;
      entry.occurrences.push(...found.occurrences);
      entry.documentCount += 1;
    }
  }
}

// ============================================================================
// AGGREGATOR
// ============================================================================

export class EvidenceAggregator {
  private readonly supremeMarkers: readonly string[];
  private readonly appellateMarkers: readonly string[];

  constructor(private readonly config: AggregationConfig) {
    this.supremeMarkers = config.instanceMarkers.supreme.map((m) => m.toLowerCase());
    this.appellateMarkers = config.instanceMarkers.appellate.map((m) => m.toLowerCase());
  }

  /**
   * Court level from the document id (file name) markers.
   */
  classifyInstance(documentId: string): InstanceLevel {
    const id = documentId.toLowerCase();
    if (this.supremeMarkers.some((m) => id.includes(m))) return "supreme";
    if (this.appellateMarkers.some((m) => id.includes(m))) return "appellate";
    return "other";
  }

  instanceWeight(level: InstanceLevel): number {
    return this.config.instanceWeights[level];
  }

  aggregate(documents: readonly DocumentAnalysis[]): CorpusReport {
    const acc = new CorpusAccumulator();
    for (const doc of documents) acc.add(doc);
    return this.build(acc);
  }

  /**
   * Same result as `aggregate`, yielding to the event loop every
   * `yieldEvery` documents and stopping when the signal aborts.
   */
  async aggregateAsync(documents: readonly DocumentAnalysis[], signal?: AbortSignal): Promise<CorpusReport> {
    const acc = new CorpusAccumulator();
    let sinceYield = 0;
    for (const doc of documents) {
      signal?.throwIfAborted();
      acc.add(doc);
      sinceYield += 1;
      if (sinceYield >= this.config.yieldEvery) {
        sinceYield = 0;
        await yieldToEventLoop();
      }
    }
    signal?.throwIfAborted();
    return this.build(acc);
  }

  // ==========================================================================
  // REPORT
  // ==========================================================================

  private build(acc: CorpusAccumulator): CorpusReport {
    const ranking: CorpusRanking = sortDescending([...acc.ranking.values()], (e) => e.total).map(
      (e): RankingEntry => ({ ...e }),
    );
    const prediction = this.predict(acc.analyzed);

    return {
      ranking,
      prediction,
      risk: this.analyzeRisk(ranking, prediction.documentWeights),
      trends: this.computeTrends(ranking),
      correlations: this.computeCorrelations(ranking),
      keyFactors: this.computeKeyFactors(acc.analyzed),
      documentCount: acc.documentCount,
      analyzedCount: acc.analyzed.length,
      failedDocuments: acc.failed,
      generatedAt: new Date().toISOString(),
      stale: false,
    };
  }

  /**
   * Weighted favorable share, calibrated by corpus size n:
   * - n = 0: 0.5 at the data-confidence floor
   * - n < smallCorpusThreshold: pulled toward 0.5 by the dampening factor
   * - otherwise: clamped into the realism band
   */
  predict(analyzed: readonly DocumentAnalysis[]): AggregatePrediction {
    const { smallCorpusThreshold, dampeningFactor, realismBand, dataConfidence } = this.config;
    const n = analyzed.length;

    const documentWeights = analyzed.map((doc): DocumentWeight => {
      const instance = this.classifyInstance(doc.documentId);
      return {
        documentId: doc.documentId,
        instance,
        weight: this.instanceWeight(instance),
        favorable: doc.prediction.favorable,
      };
    });

    if (n === 0) {
      return {
        probabilityFavorable: 0.5,
        probabilityUnfavorable: 0.5,
        dataConfidence: dataConfidence.empty,
        rawProbability: 0.5,
        calibration: "empty",
        predictionConfidence: PREDICTION_CONFIDENCE_BOUNDS.min,
        documentWeights,
      };
    }

    const totalWeight = documentWeights.reduce((sum, d) => sum + d.weight, 0);
    const favorableWeight = documentWeights.filter((d) => d.favorable).reduce((sum, d) => sum + d.weight, 0);
    const rawProbability = favorableWeight / totalWeight;

    const meanConfidence = analyzed.reduce((sum, d) => sum + d.prediction.confidence, 0) / n;
    const predictionConfidence = clamp(
      meanConfidence * Math.min(1, n / dataConfidence.saturationDocs),
      PREDICTION_CONFIDENCE_BOUNDS.min,
      PREDICTION_CONFIDENCE_BOUNDS.max,
    );

    if (n < smallCorpusThreshold) {
      const probability = 0.5 + (rawProbability - 0.5) * dampeningFactor;
      return {
        probabilityFavorable: probability,
        probabilityUnfavorable: 1 - probability,
        dataConfidence: dataConfidence.small,
        rawProbability,
        calibration: "dampened",
        predictionConfidence,
        documentWeights,
      };
    }

    const probability = clamp(rawProbability, realismBand.min, realismBand.max);
    return {
      probabilityFavorable: probability,
      probabilityUnfavorable: 1 - probability,
      dataConfidence: Math.min(dataConfidence.max, n / dataConfidence.saturationDocs),
      rawProbability,
      calibration: "realism-band",
      predictionConfidence,
      documentWeights,
    };
  }

  /**
   * value = Σ(tier total × tier multiplier) × (1 + boost·supremeRatio + boost·appellateRatio)
   */
  analyzeRisk(ranking: CorpusRanking, documentWeights: readonly DocumentWeight[]): RiskAnalysis {
    const { riskTiers, riskTierMultipliers, authorityBoost, riskThresholds, smallCorpusThreshold } = this.config;
    const n = documentWeights.length;

    const tierOf = new Map<string, RiskLevel>();
    for (const level of RISK_LEVELS) {
      for (const category of riskTiers[level]) {
        const key = normalizeKey(category);
        if (!tierOf.has(key)) tierOf.set(key, level);
      }
    }

    const tiers: Record<RiskLevel, { total: number; categories: string[] }> = {
      high: { total: 0, categories: [] },
      medium: { total: 0, categories: [] },
      low: { total: 0, categories: [] },
    };
    for (const entry of ranking) {
      const level = tierOf.get(normalizeKey(entry.category));
      if (!level) continue;
      tiers[level].total += entry.total;
      tiers[level].categories.push(entry.category);
    }

    const ratio = (instance: InstanceLevel) =>
      n === 0 ? 0 : documentWeights.filter((d) => d.instance === instance).length / n;
    const supremeRatio = ratio("supreme");
    const appellateRatio = ratio("appellate");
    const authorityMultiplier = 1 + authorityBoost.supreme * supremeRatio + authorityBoost.appellate * appellateRatio;

    const base = RISK_LEVELS.reduce((sum, level) => sum + tiers[level].total * riskTierMultipliers[level], 0);
    const value = base * authorityMultiplier;

    let level: RiskLevel = "low";
    if (value > riskThresholds.high) level = "high";
    else if (value > riskThresholds.medium) level = "medium";

    const cappedBySmallCorpus = level === "high" && n < smallCorpusThreshold;
    if (cappedBySmallCorpus) level = "medium";

    const summaries: Record<RiskLevel, RiskTierSummary> = {
      high: tiers.high,
      medium: tiers.medium,
      low: tiers.low,
    };

    return { tiers: summaries, supremeRatio, appellateRatio, authorityMultiplier, value, level, cappedBySmallCorpus };
  }

  computeTrends(ranking: CorpusRanking): TrendSummary {
    const { trendThresholds } = this.config;
    const frequencyOf = (total: number): FrequencyClass =>
      total > trendThresholds.high ? "high" : total > trendThresholds.medium ? "medium" : "low";

    return {
      categories: ranking.map((e) => ({ category: e.category, total: e.total, frequency: frequencyOf(e.total) })),
      dominant: ranking.slice(0, DOMINANT_CATEGORY_COUNT).map((e) => e.category),
      averageTotal: ranking.length === 0 ? 0 : ranking.reduce((sum, e) => sum + e.total, 0) / ranking.length,
    };
  }

  /**
   * Pairwise min/max total ratio between the top categories.
   */
  computeCorrelations(ranking: CorpusRanking): CategoryCorrelation[] {
    const top = ranking.slice(0, this.config.correlationCategoryLimit);
    const strengthOf = (value: number): CorrelationStrength =>
      value > 0.7 ? "strong" : value > 0.4 ? "moderate" : "weak";

    const result: CategoryCorrelation[] = [];
    for (let i = 0; i < top.length; i++) {
      for (let j = i + 1; j < top.length; j++) {
        const a = top[i];
        const b = top[j];
        if (!a || !b) continue;
        const high = Math.max(a.total, b.total);
        const value = high === 0 ? 0 : Math.min(a.total, b.total) / high;
        result.push({ first: a.category, second: b.category, value, strength: strengthOf(value) });
      }
    }
    return result;
  }

  /**
   * Categories present in the most favorable / unfavorable documents.
   */
  computeKeyFactors(analyzed: readonly DocumentAnalysis[]): KeyFactors {
    const topFor = (docs: readonly DocumentAnalysis[]): KeyFactor[] => {
      const counts = new Map<string, number>();
      for (const doc of docs) {
        for (const category of doc.occurrences.keys()) {
          counts.set(category, (counts.get(category) ?? 0) + 1);
        }
      }
      const factors = [...counts].map(([category, documentCount]): KeyFactor => ({ category, documentCount }));
      return sortDescending(factors, (f) => f.documentCount).slice(0, this.config.keyFactorLimit);
    };

    return {
      favorable: topFor(analyzed.filter((d) => d.prediction.favorable)),
      unfavorable: topFor(analyzed.filter((d) => !d.prediction.favorable)),
    };
  }
}
