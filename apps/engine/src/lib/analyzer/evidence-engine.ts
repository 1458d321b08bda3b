/**
 * Evidence Engine
 *
 * Service facade over the analysis components. Owns the collaborators
 * (text extractor, optional classifier, catalog store, corpus cache) and
 * turns every per-document failure into a structured result.
 *
 * Lifecycle: createEvidenceEngine() → init() → ... → close().
 *
 * @module analyzer/evidence-engine
 * @version 1.0.0
 */

import path from "path";

import { computeContentHash, type AggregationConfig, type CatalogConfig, type PipelineConfig } from "../config-schemas";
import { loadEngineConfig, type EngineConfig } from "../config-loader";
import { classifyError } from "../error-classification";
import type { CatalogStore } from "../catalog-storage";
import { PlainTextExtractor, type TextExtractor } from "../text-extraction";
import { ArgumentSynthesizer } from "./argument-synthesizer";
import { CatalogRegistry, updateFailure, type CatalogUpdate, type CatalogUpdateResult } from "./catalog-registry";
import { CorpusCache } from "./corpus-cache";
import { debugLog } from "./debug";
import { DiscrepancyDetector } from "./discrepancy-detector";
import { EvidenceAggregator } from "./evidence-aggregator";
import { HybridFavorabilityService, type FavorabilityClassifier } from "./favorability-hybrid";
import { KeywordScorer } from "./keyword-scorer";
import { PatternCatalog } from "./pattern-catalog";
import { PhraseExtractor } from "./phrase-extractor";
import type { AnalysisErrorMarker, CorpusReport, DiscrepancyReport, DocumentAnalysis } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface EvidenceEngineOptions {
  /** Fully resolved config; loaded from configs/ + env when omitted */
  config?: EngineConfig;
  pipeline?: Partial<PipelineConfig>;
  aggregation?: Partial<AggregationConfig>;
  /** Initial catalog; defaults to config.catalog */
  catalog?: PatternCatalog | CatalogConfig;
  extractor?: TextExtractor;
  classifier?: FavorabilityClassifier;
  store?: CatalogStore;
  cache?: CorpusCache<CorpusReport>;
}

/**
 * Shallow-immutable records are not enough for analyses shared across
 * callers and the corpus cache; freeze the whole tree. Map contents are
 * frozen, the Map itself is typed ReadonlyMap.
 */
function deepFreeze<T>(value: T): T {
  if (value instanceof Map) {
    for (const entry of value.values()) deepFreeze(entry);
    return value;
  }
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Cache key for a corpus: per document its id, when it was analyzed and a
 * digest of what it found, plus the catalog version. A document analyzed
 * again under the same id yields a different key.
 */
export function corpusFingerprint(documents: readonly DocumentAnalysis[], catalogVersion: number): string {
  const parts = documents.map((d) => ({
    id: d.documentId,
    analyzedAt: d.analyzedAt,
    catalogVersion: d.catalogVersion,
    favorable: d.prediction.favorable,
    score: d.prediction.score,
    totals: [...d.occurrences].map(([category, found]) => [category, found.total]),
    error: d.error?.category ?? null,
  }));
  return computeContentHash(JSON.stringify({ parts, catalogVersion }));
}

// ============================================================================
// ENGINE
// ============================================================================

export class EvidenceEngine {
  readonly registry: CatalogRegistry;
  private readonly phraseExtractor: PhraseExtractor;
  private readonly scorer: KeywordScorer;
  private readonly favorability: HybridFavorabilityService;
  private readonly detector: DiscrepancyDetector;
  private readonly synthesizer: ArgumentSynthesizer;
  private readonly aggregator: EvidenceAggregator;
  private readonly textExtractor: TextExtractor;
  private readonly store?: CatalogStore;
  private readonly cache: CorpusCache<CorpusReport>;
  private unsubscribe: (() => void) | null = null;
  private updateChain: Promise<void> = Promise.resolve();
  private initialized = false;

  constructor(
    readonly config: EngineConfig,
    deps: Omit<EvidenceEngineOptions, "config" | "pipeline" | "aggregation"> = {},
  ) {
    const { pipeline } = config;
    const initial =
      deps.catalog instanceof PatternCatalog
        ? deps.catalog
        : PatternCatalog.fromDefinition(deps.catalog ?? config.catalog);

    this.registry = new CatalogRegistry(initial);
    this.phraseExtractor = new PhraseExtractor(this.registry, { contextWindow: pipeline.contextWindow });
    this.detector = new DiscrepancyDetector(this.registry, { contextWindow: pipeline.discrepancyContextWindow });
    this.scorer = new KeywordScorer(config.scoring);
    this.favorability = new HybridFavorabilityService(this.scorer, {
      classifier: deps.classifier,
      mode: pipeline.classifierMode,
      weight: pipeline.classifierWeight,
    });
    this.synthesizer = new ArgumentSynthesizer(config.synthesis);
    this.aggregator = new EvidenceAggregator(config.aggregation);
    this.textExtractor = deps.extractor ?? new PlainTextExtractor();
    this.store = deps.store;
    this.cache =
      deps.cache ?? new CorpusCache<CorpusReport>({ ttlMs: pipeline.cacheTtlMs, timeoutMs: pipeline.recomputeTimeoutMs });
  }

  get catalogVersion(): number {
    return this.registry.currentVersion;
  }

  get catalog(): PatternCatalog {
    return this.registry.current();
  }

  /**
   * Seed the catalog from the store (or store the initial one), start the
   * cache and wire catalog commits to cache invalidation.
   * ConfigurationError from a stored catalog propagates.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.store) {
      const stored = await this.store.getActiveCatalog();
      if (stored) {
        this.registry.replace(PatternCatalog.fromDefinition(stored));
        console.log("[Engine] Loaded active catalog from store");
      } else {
        await this.store.saveCatalog(this.registry.current().toDefinition(), { summary: "initial catalog" });
        console.log("[Engine] Stored initial catalog");
      }
    }

    this.cache.init();
    this.unsubscribe = this.registry.subscribe(() => this.cache.invalidate());
    this.initialized = true;
    console.log(
      `[Engine] Initialized (catalog v${this.catalogVersion}, ${this.catalog.categories.length} categories, classifier ${
        this.favorability.usesClassifier ? this.config.pipeline.classifierMode : "off"
      })`,
    );
  }

  async close(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.cache.dispose();
    if (this.store) await this.store.close();
    this.initialized = false;
    console.log("[Engine] Closed");
  }

  // ==========================================================================
  // PER-DOCUMENT
  // ==========================================================================

  /**
   * Full analysis of one text. Never rejects: failures become an
   * unprocessed analysis with an error marker.
   */
  async analyzeDocument(text: string, documentId: string): Promise<DocumentAnalysis> {
    const catalogVersion = this.catalogVersion;
    try {
      // Synchronous part first: both passes see the same catalog snapshot
      const occurrences = this.phraseExtractor.extract(text, documentId);
      const detection = this.detector.detect(text);
      const synthesis = this.synthesizer.synthesize(detection.discrepancies, detection.evidenceFavorable);
      const prediction = await this.favorability.predict(text);

      debugLog(`[Engine] Analyzed ${documentId}`, {
        categories: [...occurrences.keys()],
        score: prediction.score,
        label: prediction.label,
        discrepancies: detection.discrepancies.length,
      });

      return deepFreeze<DocumentAnalysis>({
        documentId,
        textLength: text.length,
        occurrences,
        prediction,
        discrepancies: detection.discrepancies,
        evidence: detection.evidenceFavorable,
        contradictions: detection.contradictions,
        arguments: synthesis.arguments,
        recommendations: synthesis.recommendations,
        catalogVersion,
        analyzedAt: new Date().toISOString(),
      });
    } catch (err) {
      return this.unprocessed(documentId, text.length, err, catalogVersion);
    }
  }

  /**
   * Extract a file's text through the collaborator, then analyze it.
   * The document id defaults to the file name.
   */
  async analyzeFile(filePath: string, documentId: string = path.basename(filePath)): Promise<DocumentAnalysis> {
    let text: string;
    try {
      text = await this.textExtractor.extractText(filePath);
    } catch (err) {
      return this.unprocessed(documentId, 0, err, this.catalogVersion);
    }
    return this.analyzeDocument(text, documentId);
  }

  /**
   * Type-aware discrepancy report: court rulings get the judgment rules and
   * templates, everything else the medical/legal cross-reference.
   */
  analyzeDiscrepancies(text: string, documentId: string): DiscrepancyReport {
    const catalogVersion = this.catalogVersion;
    const analyzedAt = new Date().toISOString();
    try {
      const analysis = this.detector.analyze(text);
      const synthesis = this.synthesizer.synthesize(
        analysis.discrepancies,
        analysis.evidenceFavorable,
        analysis.documentType,
      );
      return deepFreeze<DiscrepancyReport>({
        documentId,
        documentType: analysis.documentType,
        discrepancies: analysis.discrepancies,
        evidenceFavorable: analysis.evidenceFavorable,
        contradictions: analysis.contradictions,
        arguments: synthesis.arguments,
        recommendations: synthesis.recommendations,
        discrepancyScore: analysis.discrepancyScore,
        disabilityProbability: analysis.disabilityProbability,
        catalogVersion,
        analyzedAt,
      });
    } catch (err) {
      const error = this.errorMarker(documentId, err);
      return deepFreeze<DiscrepancyReport>({
        documentId,
        documentType: "generic",
        discrepancies: [],
        evidenceFavorable: [],
        contradictions: [],
        arguments: [],
        recommendations: [],
        discrepancyScore: 0,
        disabilityProbability: 0,
        catalogVersion,
        analyzedAt,
        error,
      });
    }
  }

  // ==========================================================================
  // CORPUS
  // ==========================================================================

  /**
   * Corpus report through the cache. A timed-out recompute serves the last
   * good report marked stale; with nothing cached, the report carries the
   * error and empty results.
   */
  async aggregateCorpus(documents: readonly DocumentAnalysis[]): Promise<CorpusReport> {
    const key = corpusFingerprint(documents, this.catalogVersion);
    try {
      const read = await this.cache.get(key, (signal) => this.aggregator.aggregateAsync(documents, signal));
      return read.stale ? { ...read.value, stale: true } : read.value;
    } catch (err) {
      const classified = classifyError(err);
      console.warn(`[Engine] Corpus aggregation failed (${classified.category}): ${classified.message}`);
      return {
        ...this.aggregator.aggregate([]),
        documentCount: documents.length,
        error: { category: classified.category, message: classified.message },
      };
    }
  }

  // ==========================================================================
  // CATALOG
  // ==========================================================================

  /**
   * Plan the edit, persist it when a store is configured, then commit.
   * Updates run one at a time, so the stored active catalog always matches
   * the committed one. Readers see the new catalog on their next call.
   */
  updateCatalog(update: CatalogUpdate, options: { updatedBy?: string } = {}): Promise<CatalogUpdateResult> {
    const run = this.updateChain.then(() => this.applyUpdate(update, options));
    this.updateChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async applyUpdate(update: CatalogUpdate, options: { updatedBy?: string }): Promise<CatalogUpdateResult> {
    const plan = this.registry.plan(update);
    if (!plan.ok) {
      console.warn(`[Engine] Catalog update rejected (${plan.code}): ${plan.message}`);
      return plan;
    }

    if (this.store) {
      try {
        await this.store.saveCatalog(plan.catalog.toDefinition(), {
          createdBy: options.updatedBy,
          summary: plan.summary,
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Engine] Failed to persist catalog update: ${message}`);
        return updateFailure("storage", `Failed to persist catalog: ${message}`);
      }
    }

    const result = this.registry.commit(plan);
    if (!result.ok) {
      console.warn(`[Engine] Catalog update not committed (${result.code}): ${result.message}`);
      // The registry moved on outside this engine; point the store back at it
      if (this.store) {
        try {
          await this.store.saveCatalog(this.registry.current().toDefinition(), {
            createdBy: options.updatedBy,
            summary: `restored v${this.registry.currentVersion} after rejected edit`,
          });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`[Engine] Failed to restore stored catalog: ${message}`);
          return updateFailure("storage", `Catalog update rejected and store not restored: ${message}`);
        }
      }
    }
    return result;
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private errorMarker(documentId: string, err: unknown): AnalysisErrorMarker {
    const { category, message } = classifyError(err);
    console.warn(`[Engine] Document ${documentId} unprocessed (${category}): ${message}`);
    return { category, message };
  }

  private unprocessed(documentId: string, textLength: number, err: unknown, catalogVersion: number): DocumentAnalysis {
    return deepFreeze<DocumentAnalysis>({
      documentId,
      textLength,
      occurrences: new Map(),
      prediction: this.scorer.neutralPrediction(),
      discrepancies: [],
      evidence: [],
      contradictions: [],
      arguments: [],
      recommendations: [],
      catalogVersion,
      analyzedAt: new Date().toISOString(),
      error: this.errorMarker(documentId, err),
    });
  }
}

/**
 * Build an engine from options. Loads configuration from configs/ and the
 * environment unless `config` is given; throws ConfigurationError on
 * invalid configuration.
 */
export function createEvidenceEngine(options: EvidenceEngineOptions = {}): EvidenceEngine {
  const { config, pipeline, aggregation, ...deps } = options;
  const resolved = config ?? loadEngineConfig({ pipeline, aggregation });
  return new EvidenceEngine(resolved, deps);
}
