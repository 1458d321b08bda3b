/**
 * Argument Synthesizer
 *
 * Turns detected discrepancies and favorable evidence into legal arguments
 * and action recommendations. All wording comes from the synthesis config
 * templates ({count}, {text}, {months} placeholders).
 *
 * Argument order is fixed: principal (needs evidence), one specific argument
 * per distinct discrepancy type in detection order, defense (needs
 * discrepancies). Recommendations open with the discrepancy-driven one when
 * there are discrepancies, then one per evidence type.
 *
 * Court rulings use the `judgment` templates: a ruling argument, one argument
 * per templated finding, and a ruling review recommendation that is always
 * present.
 *
 * @module analyzer/argument-synthesizer
 */

import type { RecommendationTemplate, Severity, SynthesisConfig } from "../config-schemas";
import { fillTemplate } from "./lexicon-utils";
import type {
  Discrepancy,
  DocumentType,
  EvidenceItem,
  LegalArgument,
  Recommendation,
  RecommendationKind,
  SynthesisResult,
} from "./types";

const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2 };

function lookup<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function firstSeen<T, K>(items: readonly T[], keyOf: (item: T) => K): K[] {
  const keys: K[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (!keys.includes(key)) keys.push(key);
  }
  return keys;
}

function fromTemplate(
  kind: RecommendationKind,
  template: RecommendationTemplate,
  values: Record<string, string | number> = {},
): Recommendation {
  return {
    kind,
    title: template.title,
    content: fillTemplate(template.content, values),
    actions: [...template.actions],
    priority: template.priority,
  };
}

export class ArgumentSynthesizer {
  constructor(private readonly config: SynthesisConfig) {}

  synthesize(
    discrepancies: readonly Discrepancy[],
    evidence: readonly EvidenceItem[],
    documentType: DocumentType = "generic",
  ): SynthesisResult {
    if (documentType === "judgment") {
      return {
        arguments: this.buildJudgmentArguments(discrepancies, evidence),
        recommendations: this.buildJudgmentRecommendations(evidence),
      };
    }
    return {
      arguments: this.buildArguments(discrepancies, evidence),
      recommendations: this.buildRecommendations(discrepancies, evidence),
    };
  }

  // ==========================================================================
  // ARGUMENTS
  // ==========================================================================

  private buildArguments(discrepancies: readonly Discrepancy[], evidence: readonly EvidenceItem[]): LegalArgument[] {
    const { principal, defense } = this.config;
    const result: LegalArgument[] = [];

    if (evidence.length > 0) {
      result.push({
        kind: "principal",
        title: principal.title,
        content: fillTemplate(principal.content, { count: evidence.length }),
        support: evidence.slice(0, principal.supportLimit).map((e) => e.description),
        strength: "high",
      });
    }

    for (const type of firstSeen(discrepancies, (d) => d.type)) {
      const ofType = discrepancies.filter((d) => d.type === type);
      const first = ofType[0];
      if (!first) continue;
      const count = ofType.reduce((sum, d) => sum + d.evidence.length, 0);
      const template = lookup(this.config.specific, type);
      result.push({
        kind: "specific",
        title: template?.title ?? first.description,
        content: template ? fillTemplate(template.content, { count, text: first.contradiction }) : first.argument,
        support: first.evidence.slice(0, principal.supportLimit).map((m) => m.text),
        strength: first.severity,
        discrepancyType: type,
      });
    }

    if (discrepancies.length > 0) {
      const strongest = discrepancies.reduce<Severity>(
        (max, d) => (SEVERITY_RANK[d.severity] > SEVERITY_RANK[max] ? d.severity : max),
        "low",
      );
      result.push({
        kind: "defense",
        title: defense.title,
        content: fillTemplate(defense.content, { count: discrepancies.length }),
        support: firstSeen(discrepancies, (d) => d.type),
        strength: strongest,
      });
    }

    return result;
  }

  // ==========================================================================
  // RECOMMENDATIONS
  // ==========================================================================

  private buildRecommendations(
    discrepancies: readonly Discrepancy[],
    evidence: readonly EvidenceItem[],
  ): Recommendation[] {
    const { fallback, discrepancyRecommendation } = this.config;

    if (discrepancies.length === 0 && evidence.length === 0) {
      return [fromTemplate("general", fallback)];
    }

    const result: Recommendation[] = [];
    if (discrepancies.length > 0) {
      result.push(fromTemplate("principal", discrepancyRecommendation, { count: discrepancies.length }));
    }

    for (const type of firstSeen(evidence, (e) => e.type)) {
      const items = evidence.filter((e) => e.type === type);
      const months = Math.max(0, ...items.map((e) => e.months ?? 0));
      const template = lookup(this.config.recommendations, type) ?? fallback;
      result.push({
        ...fromTemplate("evidence", template, { count: items.length, months, text: items[0]?.matchedText ?? "" }),
        evidenceType: type,
      });
    }

    return result;
  }

  // ==========================================================================
  // JUDGMENTS
  // ==========================================================================

  private buildJudgmentArguments(
    discrepancies: readonly Discrepancy[],
    evidence: readonly EvidenceItem[],
  ): LegalArgument[] {
    const { judgment, principal } = this.config;
    const result: LegalArgument[] = [];

    if (evidence.length > 0) {
      result.push({
        kind: "principal",
        title: judgment.argument.title,
        content: fillTemplate(judgment.argument.content, { count: evidence.length }),
        support: evidence.slice(0, principal.supportLimit).map((e) => e.description),
        strength: "high",
      });
    }

    // One per finding: a ruling may cite several reports
    for (const discrepancy of discrepancies) {
      const template = lookup(judgment.specific, discrepancy.type);
      if (!template) continue;
      result.push({
        kind: "specific",
        title: template.title,
        content: fillTemplate(template.content, {
          count: discrepancy.evidence.length,
          text: discrepancy.contradiction,
        }),
        support: discrepancy.evidence.slice(0, principal.supportLimit).map((m) => m.context),
        strength: discrepancy.severity,
        discrepancyType: discrepancy.type,
      });
    }

    return result;
  }

  private buildJudgmentRecommendations(evidence: readonly EvidenceItem[]): Recommendation[] {
    const { judgment } = this.config;
    const result: Recommendation[] = [fromTemplate("document", judgment.recommendation)];

    for (const type of firstSeen(evidence, (e) => e.type)) {
      const template = lookup(judgment.recommendations, type);
      if (!template) continue;
      const items = evidence.filter((e) => e.type === type);
      result.push({
        ...fromTemplate("evidence", template, { count: items.length, text: items[0]?.matchedText ?? "" }),
        evidenceType: type,
      });
    }

    return result;
  }
}
