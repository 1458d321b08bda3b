import { describe, it, expect } from "vitest";

import { EvidenceAggregator } from "@/lib/analyzer/evidence-aggregator";
import { DEFAULT_AGGREGATION_CONFIG } from "@/lib/config-schemas";
import { makeAnalysis } from "@test/helpers/test-helpers";

describe("EvidenceAggregator", () => {
  const aggregator = new EvidenceAggregator(DEFAULT_AGGREGATION_CONFIG);

  describe("classifyInstance", () => {
    it("reads the court level from the document id", () => {
      expect(aggregator.classifyInstance("STS_2020_1.txt")).toBe("supreme");
      expect(aggregator.classifyInstance("sentencia tribunal supremo.txt")).toBe("supreme");
      expect(aggregator.classifyInstance("tsj-madrid-12.txt")).toBe("appellate");
      expect(aggregator.classifyInstance("juzgado_social_3.txt")).toBe("other");
      expect(aggregator.instanceWeight("supreme")).toBe(1.5);
      expect(aggregator.instanceWeight("appellate")).toBe(1.2);
    });
  });

  describe("ranking", () => {
    it("sums totals per category and sorts descending with stable ties", () => {
      const report = aggregator.aggregate([
        makeAnalysis("a.txt", { categories: { inss: 2, lesiones_hombro: 5 } }),
        makeAnalysis("b.txt", { categories: { personal_limpieza: 2, inss: 1 } }),
      ]);

      expect(report.ranking.map((e) => [e.category, e.total, e.documentCount])).toEqual([
        ["lesiones_hombro", 5, 1],
        ["inss", 3, 2],
        ["personal_limpieza", 2, 1],
      ]);
      expect(report.ranking[1]?.occurrences.map((o) => o.documentId)).toEqual(["a.txt", "a.txt", "b.txt"]);
    });

    it("lists failed documents and keeps them out of every statistic", () => {
      const report = aggregator.aggregate([
        makeAnalysis("ok.txt", { categories: { inss: 1 } }),
        makeAnalysis("broken.txt", {
          categories: { inss: 9 },
          error: { category: "extraction", message: "unreadable" },
        }),
      ]);

      expect(report.documentCount).toBe(2);
      expect(report.analyzedCount).toBe(1);
      expect(report.failedDocuments).toEqual([
        { documentId: "broken.txt", error: { category: "extraction", message: "unreadable" } },
      ]);
      expect(report.ranking.map((e) => e.total)).toEqual([1]);
      expect(report.prediction.documentWeights.map((d) => d.documentId)).toEqual(["ok.txt"]);
    });
  });

  describe("predict", () => {
    it("returns an even split for an empty corpus", () => {
      expect(aggregator.aggregate([]).prediction).toEqual({
        probabilityFavorable: 0.5,
        probabilityUnfavorable: 0.5,
        dataConfidence: 0.1,
        rawProbability: 0.5,
        calibration: "empty",
        predictionConfidence: 0.1,
        documentWeights: [],
      });
    });

    it("weights by court level and dampens small corpora toward 50%", () => {
      const prediction = aggregator.predict([
        makeAnalysis("juzgado_1.txt", { favorable: true }),
        makeAnalysis("sts_2020_1.txt", { favorable: false }),
      ]);

      expect(prediction.documentWeights.map((d) => [d.instance, d.weight])).toEqual([
        ["other", 1],
        ["supreme", 1.5],
      ]);
      expect(prediction.rawProbability).toBeCloseTo(0.4);
      expect(prediction.probabilityFavorable).toBeCloseTo(0.47);
      expect(prediction.probabilityUnfavorable).toBeCloseTo(0.53);
      expect(prediction.calibration).toBe("dampened");
      expect(prediction.dataConfidence).toBe(0.3);
      expect(prediction.predictionConfidence).toBeCloseTo(0.12);
    });

    it("clamps larger corpora into the realism band", () => {
      const prediction = aggregator.predict([
        makeAnalysis("a.txt", { favorable: true }),
        makeAnalysis("b.txt", { favorable: true }),
        makeAnalysis("c.txt", { favorable: true }),
      ]);

      expect(prediction.rawProbability).toBe(1);
      expect(prediction.probabilityFavorable).toBe(0.85);
      expect(prediction.calibration).toBe("realism-band");
      expect(prediction.dataConfidence).toBeCloseTo(0.3);
      expect(prediction.predictionConfidence).toBeCloseTo(0.18);
    });

    it("caps data confidence for large corpora", () => {
      const docs = Array.from({ length: 12 }, (_, i) => makeAnalysis(`doc_${i}.txt`, { favorable: i % 2 === 0, confidence: 0.9 }));
      const prediction = aggregator.predict(docs);
      expect(prediction.dataConfidence).toBe(0.8);
      expect(prediction.probabilityFavorable).toBeCloseTo(0.5);
      expect(prediction.predictionConfidence).toBeCloseTo(0.9);
    });
  });

  describe("analyzeRisk", () => {
    it("multiplies tier totals and rates the result", () => {
      const { risk } = aggregator.aggregate([
        makeAnalysis("a.txt", { categories: { reclamacion_administrativa: 30 } }),
        makeAnalysis("b.txt", { categories: { lesiones_permanentes: 20 } }),
        makeAnalysis("c.txt", { categories: { inss: 15, otra_categoria: 40 } }),
      ]);

      expect(risk.tiers).toEqual({
        high: { total: 30, categories: ["reclamacion_administrativa"] },
        medium: { total: 20, categories: ["lesiones_permanentes"] },
        low: { total: 15, categories: ["inss"] },
      });
      expect(risk.authorityMultiplier).toBe(1);
      expect(risk.value).toBe(145);
      expect(risk.level).toBe("high");
      expect(risk.cappedBySmallCorpus).toBe(false);
    });

    it("boosts risk by the share of supreme-court documents", () => {
      const { risk } = aggregator.aggregate([
        makeAnalysis("sts_1.txt", { categories: { reclamacion_administrativa: 30 } }),
        makeAnalysis("sts_2.txt", { categories: { lesiones_permanentes: 20 } }),
        makeAnalysis("c.txt", { categories: { inss: 15 } }),
      ]);

      expect(risk.supremeRatio).toBeCloseTo(2 / 3);
      expect(risk.authorityMultiplier).toBeCloseTo(4 / 3);
      expect(risk.value).toBeCloseTo(193.33, 1);
    });

    it("never rates a small corpus above medium", () => {
      const { risk } = aggregator.aggregate([
        makeAnalysis("a.txt", { categories: { procedimiento_legal: 50 } }),
        makeAnalysis("b.txt"),
      ]);

      expect(risk.value).toBe(150);
      expect(risk.level).toBe("medium");
      expect(risk.cappedBySmallCorpus).toBe(true);
    });

    it("rates low below the medium threshold", () => {
      const { risk } = aggregator.aggregate([makeAnalysis("a.txt", { categories: { inss: 10 } })]);
      expect(risk.level).toBe("low");
    });
  });

  describe("trends, correlations and key factors", () => {
    const docs = [
      makeAnalysis("a.txt", { favorable: true, categories: { lesiones_hombro: 60, inss: 30 } }),
      makeAnalysis("b.txt", { favorable: true, categories: { inss: 10, personal_limpieza: 5 } }),
      makeAnalysis("c.txt", { favorable: false, categories: { personal_limpieza: 3 } }),
    ];

    it("classifies category frequency and picks the dominant ones", () => {
      const { trends } = aggregator.aggregate(docs);
      expect(trends.categories).toEqual([
        { category: "lesiones_hombro", total: 60, frequency: "high" },
        { category: "inss", total: 40, frequency: "medium" },
        { category: "personal_limpieza", total: 8, frequency: "low" },
      ]);
      expect(trends.dominant).toEqual(["lesiones_hombro", "inss", "personal_limpieza"]);
      expect(trends.averageTotal).toBe(36);
    });

    it("relates the top categories pairwise by total ratio", () => {
      const { correlations } = aggregator.aggregate(docs);
      expect(correlations.map((c) => [c.first, c.second, c.strength])).toEqual([
        ["lesiones_hombro", "inss", "moderate"],
        ["lesiones_hombro", "personal_limpieza", "weak"],
        ["inss", "personal_limpieza", "weak"],
      ]);
      expect(correlations[0]?.value).toBeCloseTo(40 / 60);
      expect(correlations[2]?.value).toBe(0.2);
    });

    it("counts the documents each category appears in per outcome", () => {
      const { keyFactors } = aggregator.aggregate(docs);
      expect(keyFactors).toEqual({
        favorable: [
          { category: "inss", documentCount: 2 },
          { category: "lesiones_hombro", documentCount: 1 },
          { category: "personal_limpieza", documentCount: 1 },
        ],
        unfavorable: [{ category: "personal_limpieza", documentCount: 1 }],
      });
    });
  });

  describe("aggregateAsync", () => {
    it("produces the same report as the synchronous path", async () => {
      const yielding = new EvidenceAggregator({ ...DEFAULT_AGGREGATION_CONFIG, yieldEvery: 1 });
      const docs = [
        makeAnalysis("a.txt", { categories: { inss: 2 } }),
        makeAnalysis("tsj_1.txt", { favorable: false, categories: { lesiones_hombro: 1 } }),
      ];

      const { generatedAt: _a, ...asyncReport } = await yielding.aggregateAsync(docs);
      const { generatedAt: _b, ...syncReport } = yielding.aggregate(docs);
      expect(asyncReport).toEqual(syncReport);
    });

    it("stops when the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort(new Error("cancelled"));
      await expect(aggregator.aggregateAsync([makeAnalysis("a.txt")], controller.signal)).rejects.toThrow("cancelled");
    });
  });
});
