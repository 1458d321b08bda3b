/**
 * Evidence engine record types.
 *
 * Every record is a read-only snapshot: analyses are created once per text
 * and corpus reports are derived, never edited in place.
 *
 * @module analyzer/types
 */

import type { FactorName, JudgmentEvidenceType, PatternGroupName, Priority, Severity } from "../config-schemas";
import type { ErrorCategory } from "../error-classification";

export type { FactorName, JudgmentEvidenceType, PatternGroupName, Priority, Severity } from "../config-schemas";

// ============================================================================
// OCCURRENCES
// ============================================================================

export interface Occurrence {
  readonly category: string;
  /** Catalog variant that produced the match */
  readonly phrase: string;
  readonly matchedText: string;
  /** UTF-16 offset of the match start */
  readonly position: number;
  /** 1-based */
  readonly line: number;
  readonly context: string;
  readonly documentId: string;
}

export interface CategoryOccurrences {
  readonly total: number;
  readonly occurrences: readonly Occurrence[];
  /** Match count per variant */
  readonly phrases: Readonly<Record<string, number>>;
}

/** Insertion order follows catalog category order */
export type OccurrenceMap = ReadonlyMap<string, CategoryOccurrences>;

// ============================================================================
// FAVORABILITY
// ============================================================================

export type FavorabilityLabel =
  | "very-favorable"
  | "favorable"
  | "partially-favorable"
  | "partially-unfavorable"
  | "unfavorable"
  | "very-unfavorable";

export interface ScoringFactor {
  readonly name: FactorName;
  readonly score: number;
  readonly weight: number;
  readonly detected: readonly string[];
}

export type SuccessClass = "very-high" | "high" | "medium" | "low";

export interface SuccessProbability {
  readonly probability: number;
  readonly label: SuccessClass;
  readonly meanFactorScore: number;
  readonly bonus: number;
}

export type PredictionSource = "rules" | "classifier" | "blended";

export interface PredictionResult {
  readonly favorable: boolean;
  /** Signed total in [-1, 1] */
  readonly score: number;
  readonly confidence: number;
  readonly label: FavorabilityLabel;
  readonly factors: readonly ScoringFactor[];
  readonly successProbability: SuccessProbability;
  readonly source: PredictionSource;
}

// ============================================================================
// DISCREPANCIES & EVIDENCE
// ============================================================================

/** Matches from the judgment term rules carry "judgmentRules" */
export type MatchSource = PatternGroupName | "judgmentRules";

export interface PatternMatch {
  readonly group: MatchSource;
  /** Catalog pattern entry that matched */
  readonly pattern: string;
  readonly text: string;
  readonly position: number;
  readonly context: string;
}

export const INTERNAL_CONTRADICTION = "internal-contradiction";

export interface Discrepancy {
  /** Rule type tag, or "internal-contradiction" */
  readonly type: string;
  readonly description: string;
  readonly severity: Severity;
  readonly evidence: readonly PatternMatch[];
  readonly contradiction: string;
  readonly argument: string;
}

/** Evidence found by the medical/legal pattern groups */
export type FindingEvidenceType = "structural-injury" | "functional-limitation" | "prolonged-duration";

export type EvidenceType = FindingEvidenceType | JudgmentEvidenceType;

export interface EvidenceItem {
  readonly type: EvidenceType;
  readonly description: string;
  readonly relevance: Severity;
  readonly argument: string;
  readonly position: number;
  readonly matchedText: string;
  /** Only for prolonged-duration */
  readonly months?: number;
}

export interface DetectionResult {
  readonly discrepancies: readonly Discrepancy[];
  readonly evidenceFavorable: readonly EvidenceItem[];
  readonly contradictions: readonly Discrepancy[];
}

export type DocumentType = "judgment" | "medical-report" | "generic";

// ============================================================================
// ARGUMENTS
// ============================================================================

export type ArgumentKind = "principal" | "specific" | "defense";

export interface LegalArgument {
  readonly kind: ArgumentKind;
  readonly title: string;
  readonly content: string;
  readonly support: readonly string[];
  readonly strength: Severity;
  readonly discrepancyType?: string;
}

/**
 * principal: built from the discrepancies; evidence: one per evidence type;
 * document: tied to the document type; general: nothing was found.
 */
export type RecommendationKind = "principal" | "evidence" | "document" | "general";

export interface Recommendation {
  readonly kind: RecommendationKind;
  readonly evidenceType?: EvidenceType;
  readonly title: string;
  readonly content: string;
  readonly actions: readonly string[];
  readonly priority: Priority;
}

export interface SynthesisResult {
  readonly arguments: readonly LegalArgument[];
  readonly recommendations: readonly Recommendation[];
}

// ============================================================================
// PER-DOCUMENT RESULTS
// ============================================================================

export interface AnalysisErrorMarker {
  readonly category: ErrorCategory;
  readonly message: string;
}

export interface DocumentAnalysis {
  readonly documentId: string;
  readonly textLength: number;
  readonly occurrences: OccurrenceMap;
  readonly prediction: PredictionResult;
  readonly discrepancies: readonly Discrepancy[];
  readonly evidence: readonly EvidenceItem[];
  readonly contradictions: readonly Discrepancy[];
  readonly arguments: readonly LegalArgument[];
  readonly recommendations: readonly Recommendation[];
  readonly catalogVersion: number;
  readonly analyzedAt: string;
  /** Present when the document could not be processed */
  readonly error?: AnalysisErrorMarker;
}

export interface DiscrepancyReport {
  readonly documentId: string;
  readonly documentType: DocumentType;
  readonly discrepancies: readonly Discrepancy[];
  readonly evidenceFavorable: readonly EvidenceItem[];
  readonly contradictions: readonly Discrepancy[];
  readonly arguments: readonly LegalArgument[];
  readonly recommendations: readonly Recommendation[];
  /** 0-100 */
  readonly discrepancyScore: number;
  /** 0-1 likelihood that the case supports a partial permanent disability claim */
  readonly disabilityProbability: number;
  readonly catalogVersion: number;
  readonly analyzedAt: string;
  readonly error?: AnalysisErrorMarker;
}

// ============================================================================
// CORPUS AGGREGATION
// ============================================================================

export type InstanceLevel = "supreme" | "appellate" | "other";

export interface RankingEntry {
  readonly category: string;
  readonly total: number;
  readonly occurrences: readonly Occurrence[];
  readonly documentCount: number;
}

/** Descending by total, ties keep first-seen order */
export type CorpusRanking = readonly RankingEntry[];

export interface DocumentWeight {
  readonly documentId: string;
  readonly instance: InstanceLevel;
  readonly weight: number;
  readonly favorable: boolean;
}

export type CalibrationMode = "empty" | "dampened" | "realism-band";

export interface AggregatePrediction {
  readonly probabilityFavorable: number;
  readonly probabilityUnfavorable: number;
  /** How much the corpus size supports the probability */
  readonly dataConfidence: number;
  /** Weighted share before calibration */
  readonly rawProbability: number;
  readonly calibration: CalibrationMode;
  /** Mean document confidence scaled by corpus size */
  readonly predictionConfidence: number;
  readonly documentWeights: readonly DocumentWeight[];
}

export type RiskLevel = "low" | "medium" | "high";

export interface RiskTierSummary {
  readonly total: number;
  readonly categories: readonly string[];
}

export interface RiskAnalysis {
  readonly tiers: Readonly<Record<RiskLevel, RiskTierSummary>>;
  readonly supremeRatio: number;
  readonly appellateRatio: number;
  readonly authorityMultiplier: number;
  readonly value: number;
  readonly level: RiskLevel;
  readonly cappedBySmallCorpus: boolean;
}

export type FrequencyClass = "high" | "medium" | "low";

export interface CategoryTrend {
  readonly category: string;
  readonly total: number;
  readonly frequency: FrequencyClass;
}

export interface TrendSummary {
  readonly categories: readonly CategoryTrend[];
  readonly dominant: readonly string[];
  readonly averageTotal: number;
}

export type CorrelationStrength = "strong" | "moderate" | "weak";

export interface CategoryCorrelation {
  readonly first: string;
  readonly second: string;
  readonly value: number;
  readonly strength: CorrelationStrength;
}

export interface KeyFactor {
  readonly category: string;
  readonly documentCount: number;
}

export interface KeyFactors {
  readonly favorable: readonly KeyFactor[];
  readonly unfavorable: readonly KeyFactor[];
}

export interface FailedDocument {
  readonly documentId: string;
  readonly error: AnalysisErrorMarker;
}

export interface CorpusReport {
  readonly ranking: CorpusRanking;
  readonly prediction: AggregatePrediction;
  readonly risk: RiskAnalysis;
  readonly trends: TrendSummary;
  readonly correlations: readonly CategoryCorrelation[];
  readonly keyFactors: KeyFactors;
  readonly documentCount: number;
  readonly analyzedCount: number;
  readonly failedDocuments: readonly FailedDocument[];
  readonly generatedAt: string;
  /** Served from the last good cache entry after expiry or a timed-out recompute */
  readonly stale: boolean;
  readonly error?: AnalysisErrorMarker;
}
