import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CorpusCache } from "@/lib/analyzer/corpus-cache";
import { EvidenceEngine, corpusFingerprint, createEvidenceEngine } from "@/lib/analyzer/evidence-engine";
import type { CorpusReport } from "@/lib/analyzer/types";
import { CatalogStore } from "@/lib/catalog-storage";
import { ExtractionError } from "@/lib/errors";
import type { TextExtractor } from "@/lib/text-extraction";
import { catalogDefinition, makeAnalysis } from "@test/helpers/test-helpers";

const FAVORABLE_RULING =
  "Fundamentos de derecho. Conclusiones: estimamos procedente la incapacidad permanente parcial.";
const MISCLASSIFIED =
  "Resonancia: rotura completa del manguito rotador. Se califica como lesiones permanentes no incapacitantes.";
const RULING =
  "SENTENCIA. Fundamentos de derecho. Conforme al artículo 194 LGSS, la Sala valora el informe médico aportado " +
  "sobre la lesión del supraespinoso. Desestimamos la pretensión de incapacidad permanente parcial. Fallamos.";

describe("EvidenceEngine", () => {
  let engine: EvidenceEngine;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    engine = createEvidenceEngine();
    await engine.init();
  });

  afterEach(async () => {
    await engine.close();
    vi.restoreAllMocks();
  });

  describe("analyzeDocument", () => {
    it("combines occurrences, verdict, discrepancies and arguments", async () => {
      const analysis = await engine.analyzeDocument(MISCLASSIFIED, "informe_1.txt");

      expect(analysis.documentId).toBe("informe_1.txt");
      expect(analysis.textLength).toBe(MISCLASSIFIED.length);
      expect(analysis.catalogVersion).toBe(1);
      expect(analysis.error).toBeUndefined();
      expect([...analysis.occurrences.keys()]).toEqual(["lesiones_permanentes", "lesiones_hombro"]);
      expect(analysis.discrepancies.map((d) => d.type)).toEqual(["classification-mismatch"]);
      expect(analysis.evidence.map((e) => e.type)).toEqual(["structural-injury"]);
      expect(analysis.arguments.map((a) => a.kind)).toEqual(["principal", "specific", "defense"]);
      expect(analysis.recommendations.map((r) => [r.kind, r.evidenceType])).toEqual([
        ["principal", undefined],
        ["evidence", "structural-injury"],
      ]);
    });

    it("rates a favorable ruling as favorable", async () => {
      const analysis = await engine.analyzeDocument(FAVORABLE_RULING, "sentencia.txt");
      expect(analysis.prediction.favorable).toBe(true);
      expect(analysis.prediction.confidence).toBeGreaterThan(0.3);
    });

    it("returns frozen results", async () => {
      const analysis = await engine.analyzeDocument(MISCLASSIFIED, "informe_1.txt");
      expect(Object.isFrozen(analysis)).toBe(true);
      expect(Object.isFrozen(analysis.discrepancies[0])).toBe(true);
      expect(Object.isFrozen(analysis.occurrences.get("lesiones_hombro"))).toBe(true);
    });
  });

  describe("analyzeFile", () => {
    it("names the document after the file and analyzes its text", async () => {
      const extractor: TextExtractor = { extractText: async () => FAVORABLE_RULING };
      const withExtractor = createEvidenceEngine({ extractor });

      const analysis = await withExtractor.analyzeFile("/casos/2024/sentencia_7.txt");
      expect(analysis.documentId).toBe("sentencia_7.txt");
      expect(analysis.prediction.favorable).toBe(true);
    });

    it("marks unreadable files as unprocessed", async () => {
      const extractor: TextExtractor = {
        extractText: async (filePath) => {
          throw new ExtractionError(`Cannot read ${filePath}`, filePath);
        },
      };
      const withExtractor = createEvidenceEngine({ extractor });

      const analysis = await withExtractor.analyzeFile("/casos/perdido.txt", "perdido");
      expect(analysis.error).toEqual({ category: "extraction", message: "Cannot read /casos/perdido.txt" });
      expect(analysis.textLength).toBe(0);
      expect(analysis.occurrences.size).toBe(0);
      expect(analysis.prediction).toMatchObject({ score: 0, favorable: false, confidence: 0.3 });
      expect(console.warn).toHaveBeenCalledWith(
        "[Engine] Document perdido unprocessed (extraction): Cannot read /casos/perdido.txt",
      );
    });
  });

  describe("analyzeDiscrepancies", () => {
    it("reports scores, document type and arguments", () => {
      const report = engine.analyzeDiscrepancies(MISCLASSIFIED, "informe_1.txt");
      expect(report.documentType).toBe("generic");
      expect(report.discrepancyScore).toBe(40);
      expect(report.disabilityProbability).toBeCloseTo(0.6);
      expect(report.arguments).toHaveLength(3);
      expect(report.error).toBeUndefined();
    });

    it("reads a court ruling with the judgment rules and templates", () => {
      const report = engine.analyzeDiscrepancies(RULING, "sentencia_3.txt");

      expect(report.documentType).toBe("judgment");
      expect(report.discrepancies.map((d) => d.type)).toEqual(["medical-report-reference", "ipp-conclusion"]);
      expect(report.evidenceFavorable.map((e) => e.type)).toEqual(["legal-basis", "specific-injury"]);
      expect(report.discrepancyScore).toBe(50);
      expect(report.disabilityProbability).toBeCloseTo(0.9);
      expect(report.arguments.map((a) => [a.kind, a.title])).toEqual([
        ["principal", "Análisis de sentencia judicial"],
        ["specific", "Referencia a informe médico"],
      ]);
      expect(report.recommendations.map((r) => [r.kind, r.evidenceType])).toEqual([
        ["document", undefined],
        ["evidence", "legal-basis"],
      ]);
    });
  });

  describe("aggregateCorpus", () => {
    const corpus = [
      makeAnalysis("juzgado_1.txt", { favorable: true, categories: { inss: 2 } }),
      makeAnalysis("sts_2020_1.txt", { favorable: false, categories: { lesiones_hombro: 1 } }),
    ];

    it("weights court levels and dampens a small corpus", async () => {
      const report = await engine.aggregateCorpus(corpus);
      expect(report.prediction.rawProbability).toBeCloseTo(0.4);
      expect(report.prediction.probabilityFavorable).toBeCloseTo(0.47);
      expect(report.stale).toBe(false);
    });

    it("serves a repeated corpus from the cache", async () => {
      const first = await engine.aggregateCorpus(corpus);
      expect(await engine.aggregateCorpus(corpus)).toBe(first);
    });

    it("returns an empty report carrying the error when aggregation fails", async () => {
      const cache = new CorpusCache<CorpusReport>({ ttlMs: 1_000, timeoutMs: 1_000 });
      const failing = createEvidenceEngine({ cache });
      await failing.init();
      await cache.dispose();

      const report = await failing.aggregateCorpus(corpus);
      expect(report.documentCount).toBe(2);
      expect(report.ranking).toEqual([]);
      expect(report.error).toEqual({ category: "unknown", message: "CorpusCache was disposed" });
    });

    it("recomputes when a document is analyzed again under the same id", async () => {
      const before = await engine.analyzeDocument(FAVORABLE_RULING, "caso.txt");
      const first = await engine.aggregateCorpus([before]);

      const after = await engine.analyzeDocument("La demanda es no procedente.", "caso.txt");
      expect(after.prediction.favorable).toBe(false);
      const second = await engine.aggregateCorpus([after]);

      expect(second).not.toBe(first);
      expect(second.prediction.documentWeights[0]?.favorable).toBe(false);
    });

    it("answers concurrent requests for different corpora without errors", async () => {
      const [first, second] = await Promise.all([
        engine.aggregateCorpus([makeAnalysis("a1.txt", { categories: { inss: 1 } })]),
        engine.aggregateCorpus([makeAnalysis("b1.txt", { categories: { lesiones_hombro: 2 } })]),
      ]);

      expect(first.error).toBeUndefined();
      expect(first.ranking.map((r) => r.category)).toEqual(["inss"]);
      expect(second.error).toBeUndefined();
      expect(second.ranking.map((r) => r.category)).toEqual(["lesiones_hombro"]);
    });

    it("keys the cache on the documents and catalog version", () => {
      expect(corpusFingerprint(corpus, 1)).toBe(corpusFingerprint([...corpus], 1));
      expect(corpusFingerprint(corpus, 1)).not.toBe(corpusFingerprint(corpus, 2));
      expect(corpusFingerprint(corpus, 1)).not.toBe(corpusFingerprint([...corpus].reverse(), 1));
    });
  });

  describe("updateCatalog", () => {
    it("applies a category rename to the next analysis", async () => {
      const text = "Rotura del manguito rotador.";
      expect((await engine.analyzeDocument(text, "a")).occurrences.has("lesiones_hombro")).toBe(true);

      const result = await engine.updateCatalog({ kind: "renameCategory", from: "lesiones_hombro", to: "patologia_hombro" });
      expect(result.ok && result.version).toBe(2);

      const after = await engine.analyzeDocument(text, "a");
      expect(after.occurrences.has("lesiones_hombro")).toBe(false);
      expect(after.occurrences.get("patologia_hombro")?.total).toBe(3);
      expect(after.catalogVersion).toBe(2);
    });

    it("reports rejected edits without changing the catalog", async () => {
      const result = await engine.updateCatalog({ kind: "deleteCategory", name: "rodilla" });
      expect(result).toEqual({ ok: false, code: "not_found", message: 'Category "rodilla" not found' });
      expect(engine.catalogVersion).toBe(1);
    });

    it("invalidates the corpus cache on commit", async () => {
      const corpus = [makeAnalysis("a.txt")];
      await engine.aggregateCorpus(corpus);
      await engine.updateCatalog({ kind: "addPhrase", category: "inss", phrase: "TGSS" });
      expect(console.log).toHaveBeenCalledWith("[Corpus-Cache] Invalidated");
    });
  });
});

describe("EvidenceEngine with a catalog store", () => {
  let store: CatalogStore;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    store = new CatalogStore(":memory:");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stores the initial catalog on first start", async () => {
    const engine = createEvidenceEngine({ store });
    await engine.init();

    const history = await store.getHistory();
    expect(history.map((h) => h.summary)).toEqual(["initial catalog"]);
    expect(Object.keys((await store.getActiveCatalog())?.categories ?? {})).toEqual(engine.catalog.categoryNames);
    await engine.close();
  });

  it("starts from the stored catalog when one exists", async () => {
    await store.saveCatalog(catalogDefinition({ alpha: ["uno"], beta: ["dos"] }));
    const engine = createEvidenceEngine({ store });
    await engine.init();

    expect(engine.catalog.categoryNames).toEqual(["alpha", "beta"]);
    expect(engine.catalogVersion).toBe(2);
    await engine.close();
  });

  it("persists committed edits", async () => {
    const engine = createEvidenceEngine({ store });
    await engine.init();

    await engine.updateCatalog({ kind: "createCategory", name: "rodilla", phrases: ["menisco"] }, { updatedBy: "tester" });

    const [latest] = await store.getHistory();
    expect(latest).toMatchObject({ summary: "created category rodilla", committedBy: "tester" });
    expect((await store.getActiveCatalog())?.categories.rodilla).toEqual(["menisco"]);
    await engine.close();
  });

  it("keeps the stored catalog in step with concurrent edits", async () => {
    const engine = createEvidenceEngine({ store });
    await engine.init();

    const [knee, elbow] = await Promise.all([
      engine.updateCatalog({ kind: "createCategory", name: "rodilla", phrases: ["menisco"] }),
      engine.updateCatalog({ kind: "createCategory", name: "codo", phrases: ["epicondilitis"] }),
    ]);

    expect(knee.ok && knee.version).toBe(2);
    expect(elbow.ok && elbow.version).toBe(3);
    const stored = await store.getActiveCatalog();
    expect(Object.keys(stored?.categories ?? {})).toEqual(engine.catalog.categoryNames);
    expect(engine.catalog.categoryNames.slice(-2)).toEqual(["rodilla", "codo"]);
    await engine.close();
  });

  it("points the store back at the live catalog when a persisted edit is rejected", async () => {
    const engine = createEvidenceEngine({ store });
    await engine.init();
    const save = store.saveCatalog.bind(store);
    vi.spyOn(store, "saveCatalog").mockImplementationOnce(async (definition, options) => {
      engine.registry.apply({ kind: "createCategory", name: "codo", phrases: ["epicondilitis"] });
      return save(definition, options);
    });

    const result = await engine.updateCatalog({ kind: "createCategory", name: "rodilla", phrases: ["menisco"] });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.code).toBe("conflict");
    const stored = await store.getActiveCatalog();
    expect(Object.keys(stored?.categories ?? {})).toEqual(engine.catalog.categoryNames);
    expect(stored?.categories.rodilla).toBeUndefined();
    const [latest] = await store.getHistory(1);
    expect(latest?.summary).toBe("restored v2 after rejected edit");
    await engine.close();
  });

  it("does not commit an edit the store failed to persist", async () => {
    const engine = createEvidenceEngine({ store });
    await engine.init();
    vi.spyOn(store, "saveCatalog").mockRejectedValueOnce(new Error("disk full"));

    const result = await engine.updateCatalog({ kind: "deleteCategory", name: "inss" });
    expect(result).toEqual({ ok: false, code: "storage", message: "Failed to persist catalog: disk full" });
    expect(engine.catalog.getCategory("inss")).toBeDefined();
    expect(engine.catalogVersion).toBe(1);
    await engine.close();
  });
});
