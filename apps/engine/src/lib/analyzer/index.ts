/**
 * Evidence Engine - Module Index
 *
 * Main entry point of the engine package. Re-exports the public types, the
 * components and the EvidenceEngine service.
 *
 * @module analyzer
 * @version 1.0.0
 */

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type {
  // Occurrences
  Occurrence,
  CategoryOccurrences,
  OccurrenceMap,

  // Favorability
  FavorabilityLabel,
  ScoringFactor,
  SuccessClass,
  SuccessProbability,
  PredictionSource,
  PredictionResult,

  // Discrepancies & arguments
  MatchSource,
  PatternMatch,
  Discrepancy,
  FindingEvidenceType,
  JudgmentEvidenceType,
  EvidenceType,
  EvidenceItem,
  DetectionResult,
  DocumentType,
  ArgumentKind,
  LegalArgument,
  RecommendationKind,
  Recommendation,
  SynthesisResult,

  // Results
  AnalysisErrorMarker,
  DocumentAnalysis,
  DiscrepancyReport,

  // Corpus
  InstanceLevel,
  RankingEntry,
  CorpusRanking,
  DocumentWeight,
  CalibrationMode,
  AggregatePrediction,
  RiskLevel,
  RiskTierSummary,
  RiskAnalysis,
  CategoryTrend,
  TrendSummary,
  CategoryCorrelation,
  KeyFactor,
  KeyFactors,
  FailedDocument,
  CorpusReport,
} from "./types";

export { INTERNAL_CONTRADICTION } from "./types";

// ============================================================================
// CONFIG & ERRORS
// ============================================================================

export { loadEngineConfig, getConfigDefaultsDir } from "../config-loader";
export type { EngineConfig, OverrideRecord } from "../config-loader";
export { validateConfig, parseTypedConfig } from "../config-schemas";
export type { CatalogConfig, ScoringConfig, SynthesisConfig, PipelineConfig, AggregationConfig } from "../config-schemas";
export { ConfigurationError, ExtractionError, ClassifierError, AggregationTimeout } from "../errors";
export { classifyError } from "../error-classification";
export type { ClassifiedError, ErrorCategory } from "../error-classification";

// ============================================================================
// DEBUG EXPORTS
// ============================================================================

export { debugLog } from "./debug";

// ============================================================================
// COMPONENTS
// ============================================================================

export { PatternCatalog } from "./pattern-catalog";
export type { CatalogProvider, CatalogCategory } from "./pattern-catalog";
export { CatalogRegistry } from "./catalog-registry";
export type { CatalogUpdate, CatalogUpdateResult, CatalogPlan, CatalogUpdateFailure } from "./catalog-registry";
export { PhraseExtractor, extractOccurrences } from "./phrase-extractor";
export { KeywordScorer } from "./keyword-scorer";
export { HybridFavorabilityService } from "./favorability-hybrid";
export type { FavorabilityClassifier, ClassifierOutput } from "./favorability-hybrid";
export {
  DiscrepancyDetector,
  detectDiscrepancies,
  detectDocumentType,
  detectJudgmentFindings,
} from "./discrepancy-detector";
export type { DiscrepancyAnalysis } from "./discrepancy-detector";
export { ArgumentSynthesizer } from "./argument-synthesizer";
export { EvidenceAggregator } from "./evidence-aggregator";
export { CorpusCache } from "./corpus-cache";
export type { CacheRead, CorpusCacheOptions } from "./corpus-cache";
export { PlainTextExtractor } from "../text-extraction";
export type { TextExtractor } from "../text-extraction";
export { CatalogStore } from "../catalog-storage";
export type { CatalogHistoryEntry } from "../catalog-storage";

// ============================================================================
// ENGINE
// ============================================================================

export { EvidenceEngine, createEvidenceEngine, corpusFingerprint } from "./evidence-engine";
export type { EvidenceEngineOptions } from "./evidence-engine";
