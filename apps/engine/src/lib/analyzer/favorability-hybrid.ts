/**
 * Hybrid Favorability Service
 *
 * Combines an optional statistical classifier with the KeywordScorer.
 * The rule-based verdict is always computed; the classifier can override
 * it or be blended in, depending on `pipeline.classifierMode`.
 * Any classifier failure falls back to the rules and is only logged.
 *
 * @module analyzer/favorability-hybrid
 * @version 1.0.0
 */

import { z } from "zod";

import type { PipelineConfig } from "../config-schemas";
import { ClassifierError } from "../errors";
import type { KeywordScorer } from "./keyword-scorer";
import type { PredictionResult } from "./types";

// ============================================================================
// CLASSIFIER INTERFACE
// ============================================================================

export interface ClassifierOutput {
  favorable: boolean;
  /** 0-1 */
  confidence: number;
}

/**
 * Optional collaborator (embedding model, statistical classifier, remote
 * service). Implementations may throw or return garbage; both are handled.
 */
export interface FavorabilityClassifier {
  predictFavorable(text: string): Promise<ClassifierOutput>;
}

const ClassifierOutputSchema = z.object({
  favorable: z.boolean(),
  confidence: z.number().min(0).max(1),
});

export type ClassifierMode = PipelineConfig["classifierMode"];

export interface HybridOptions {
  classifier?: FavorabilityClassifier;
  mode?: ClassifierMode;
  /** Classifier share in blend mode */
  weight?: number;
}

// ============================================================================
// HYBRID SERVICE
// ============================================================================

export class HybridFavorabilityService {
  private readonly classifier?: FavorabilityClassifier;
  private readonly mode: ClassifierMode;
  private readonly weight: number;

  constructor(
    private readonly scorer: KeywordScorer,
    options: HybridOptions = {},
  ) {
    this.classifier = options.classifier;
    this.mode = options.mode ?? "blend";
    this.weight = Math.min(1, Math.max(0, options.weight ?? 0.5));
  }

  get usesClassifier(): boolean {
    return this.classifier !== undefined && this.mode !== "off";
  }

  async predict(text: string): Promise<PredictionResult> {
    const rules = this.scorer.score(text);
    if (!this.classifier || this.mode === "off") {
      return rules;
    }

    let output: ClassifierOutput;
    try {
      output = await this.callClassifier(this.classifier, text);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.warn(`[Favorability-Hybrid] Classifier failed: ${errorMsg}, falling back to rules`);
      return rules;
    }

    const classifierScore = output.favorable ? output.confidence : -output.confidence;

    if (this.mode === "override") {
      return this.scorer.finalize(classifierScore, rules.factors, "classifier");
    }

    const blended = this.weight * classifierScore + (1 - this.weight) * rules.score;
    return this.scorer.finalize(blended, rules.factors, "blended");
  }

  /**
   * Call the classifier and validate its output. Every failure surfaces as
   * ClassifierError.
   */
  private async callClassifier(classifier: FavorabilityClassifier, text: string): Promise<ClassifierOutput> {
    let raw: unknown;
    try {
      raw = await classifier.predictFavorable(text);
    } catch (error) {
      if (error instanceof ClassifierError) throw error;
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new ClassifierError(`Classifier call failed: ${errorMsg}`, error);
    }

    const parsed = ClassifierOutputSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ClassifierError(`Invalid classifier output: ${issues.join(", ")}`);
    }
    return parsed.data;
  }
}
