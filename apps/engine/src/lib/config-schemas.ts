/**
 * Configuration Schemas
 *
 * Zod schemas for validating engine configuration.
 * catalog/scoring/synthesis are file-backed (configs/*.default.json);
 * pipeline/aggregation carry their defaults in code.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";
import crypto from "crypto";

import { ConfigurationError } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export type ConfigType = "catalog" | "scoring" | "synthesis" | "pipeline" | "aggregation";

export const VALID_CONFIG_TYPES = ["catalog", "scoring", "synthesis", "pipeline", "aggregation"] as const;

/** Types whose defaults live in configs/<type>.default.json */
export const FILE_BACKED_CONFIG_TYPES = ["catalog", "scoring", "synthesis"] as const;
export type FileBackedConfigType = (typeof FILE_BACKED_CONFIG_TYPES)[number];

export const SCHEMA_VERSIONS: Record<ConfigType, string> = {
  catalog: "1.0.0",
  scoring: "1.0.0",
  synthesis: "1.0.0",
  pipeline: "1.0.0",
  aggregation: "1.0.0",
};

export function isValidConfigType(type: string): type is ConfigType {
  return VALID_CONFIG_TYPES.some((t) => t === type);
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const SEVERITIES = ["low", "medium", "high"] as const;
export type Severity = (typeof SEVERITIES)[number];

// ============================================================================
// CATALOG CONFIG SCHEMA
// ============================================================================

export const PATTERN_GROUP_NAMES = [
  "structuralInjury",
  "functionalLimitation",
  "internalContradiction",
  "lpniTerminology",
  "ippTerminology",
  "objectiveEvidence",
  "dischargeWithoutLimitation",
  "subjectiveMinorSymptom",
  "processDuration",
] as const;

export type PatternGroupName = (typeof PATTERN_GROUP_NAMES)[number];

const unit = z.number().min(0).max(1);

const PatternGroupSchema = z.object({
  patterns: z.array(z.string().min(1)).min(1),
  // Lets ".*?" cross line breaks; used for two-clause span patterns
  dotAll: z.boolean().default(false),
});

const DiscrepancyRuleSchema = z.object({
  type: z.string().regex(/^[a-z][a-z0-9-]*$/, "type must be a kebab-case tag"),
  when: z.tuple([z.enum(PATTERN_GROUP_NAMES), z.enum(PATTERN_GROUP_NAMES)]),
  severity: z.enum(SEVERITIES),
  description: z.string().min(1),
  argument: z.string().min(1),
});

const FindingTemplateSchema = z.object({
  // {text} = matched text, {months} = detected duration
  description: z.string().min(1),
  argument: z.string().min(1),
});

export const JUDGMENT_EVIDENCE_TYPES = ["legal-basis", "specific-injury"] as const;
export type JudgmentEvidenceType = (typeof JUDGMENT_EVIDENCE_TYPES)[number];

/**
 * Term conditions read like scoring markers: every inner list needs one
 * of its terms present (word-prefix match).
 */
const TermConditionSchema = z.array(z.array(z.string().min(1)).min(1)).min(1);

const JudgmentFindingRuleSchema = z.object({
  type: z.string().regex(/^[a-z][a-z0-9-]*$/, "type must be a kebab-case tag"),
  all: TermConditionSchema,
  severity: z.enum(SEVERITIES),
  description: z.string().min(1),
  argument: z.string().min(1),
});

const JudgmentEvidenceRuleSchema = z.object({
  type: z.enum(JUDGMENT_EVIDENCE_TYPES),
  all: TermConditionSchema,
  relevance: z.enum(SEVERITIES),
  description: z.string().min(1),
  argument: z.string().min(1),
});

/** Rules that replace the medical/legal cross-reference for court rulings */
const JudgmentRulesSchema = z.object({
  discrepancies: z.array(JudgmentFindingRuleSchema),
  evidence: z.array(JudgmentEvidenceRuleSchema),
  contradictions: z.array(JudgmentFindingRuleSchema),
  scoring: z.object({
    evidencePoints: z.number().min(0),
    discrepancyPoints: z.number().min(0),
    contradictionPoints: z.number().min(0),
    /** Starting probability once a discrepancy of this type fires */
    baseProbability: z.object({ when: z.string().min(1), value: unit }),
    evidenceProbability: unit,
  }),
});

export const CatalogConfigSchema = z.object({
  schemaVersion: z.string().optional(),
  categories: z.record(z.string(), z.array(z.string())),
  patternGroups: z.object({
    structuralInjury: PatternGroupSchema,
    functionalLimitation: PatternGroupSchema,
    internalContradiction: PatternGroupSchema,
    lpniTerminology: PatternGroupSchema,
    ippTerminology: PatternGroupSchema,
    objectiveEvidence: PatternGroupSchema,
    dischargeWithoutLimitation: PatternGroupSchema,
    subjectiveMinorSymptom: PatternGroupSchema,
    processDuration: PatternGroupSchema,
  }),
  durationYearUnits: z.array(z.string().min(1)).default([]),
  durationThresholdMonths: z.number().int().min(1).default(12),
  evidenceTemplates: z.object({
    "structural-injury": FindingTemplateSchema,
    "functional-limitation": FindingTemplateSchema,
    "prolonged-duration": FindingTemplateSchema,
  }),
  contradictionTemplate: FindingTemplateSchema,
  documentTypeIndicators: z.object({
    judgment: z.array(z.string().min(1)),
    medicalReport: z.array(z.string().min(1)),
  }),
  discrepancyRules: z.array(DiscrepancyRuleSchema),
  judgmentRules: JudgmentRulesSchema,
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type CatalogConfigInput = z.input<typeof CatalogConfigSchema>;
export type DiscrepancyRule = z.infer<typeof DiscrepancyRuleSchema>;
export type PatternGroupConfig = z.infer<typeof PatternGroupSchema>;
export type FindingTemplate = z.infer<typeof FindingTemplateSchema>;
export type JudgmentRules = z.infer<typeof JudgmentRulesSchema>;
export type JudgmentFindingRule = z.infer<typeof JudgmentFindingRuleSchema>;
export type JudgmentEvidenceRule = z.infer<typeof JudgmentEvidenceRuleSchema>;

// ============================================================================
// SCORING CONFIG SCHEMA
// ============================================================================

export const FACTOR_NAMES = [
  "lexical",
  "structure",
  "medicalEvidence",
  "procedure",
  "context",
  "terminology",
] as const;

export type FactorName = (typeof FACTOR_NAMES)[number];

/** Factors computed from marker tables (the rest have dedicated logic) */
export const MARKER_FACTOR_NAMES = ["structure", "medicalEvidence", "procedure", "context"] as const;
export type MarkerFactorName = (typeof MARKER_FACTOR_NAMES)[number];

/**
 * A marker fires when every inner list has at least one term present.
 * `all: [["lesiones"], ["grave", "permanente"]]` reads as
 * "lesiones AND (grave OR permanente)".
 */
const MarkerSchema = z.object({
  label: z.string().min(1),
  score: unit,
  all: z.array(z.array(z.string().min(1)).min(1)).min(1),
});

export const ScoringConfigSchema = z.object({
  schemaVersion: z.string().optional(),
  weights: z.object({
    lexical: unit,
    structure: unit,
    medicalEvidence: unit,
    procedure: unit,
    context: unit,
    terminology: unit,
  }),
  lexicon: z.object({
    favorable: z.array(z.string().min(1)).min(1),
    unfavorable: z.array(z.string().min(1)).min(1),
  }),
  markers: z.object({
    structure: z.array(MarkerSchema),
    medicalEvidence: z.array(MarkerSchema),
    procedure: z.array(MarkerSchema),
    context: z.array(MarkerSchema),
  }),
  terminology: z.array(z.string().min(1)).min(1),
  calibration: z
    .object({
      confidenceFloor: unit,
      confidenceCap: unit,
      strongBand: unit,
      moderateBand: unit,
      successCap: unit,
      criticalBonuses: z.array(
        z.object({
          factor: z.enum(FACTOR_NAMES),
          threshold: unit,
          bonus: unit,
        }),
      ),
      successBands: z.object({
        veryHigh: unit,
        high: unit,
        medium: unit,
      }),
    })
    .refine((c) => c.confidenceFloor <= c.confidenceCap, {
      message: "confidenceFloor must not exceed confidenceCap",
      path: ["confidenceFloor"],
    })
    .refine((c) => c.moderateBand <= c.strongBand, {
      message: "moderateBand must not exceed strongBand",
      path: ["moderateBand"],
    }),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;
export type ScoringMarker = z.infer<typeof MarkerSchema>;

// ============================================================================
// SYNTHESIS CONFIG SCHEMA
// ============================================================================

export const PRIORITIES = ["low", "medium", "high"] as const;
export type Priority = (typeof PRIORITIES)[number];

const ArgumentTemplateSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
});

const RecommendationTemplateSchema = ArgumentTemplateSchema.extend({
  actions: z.array(z.string().min(1)),
  priority: z.enum(PRIORITIES),
});

export const SynthesisConfigSchema = z.object({
  schemaVersion: z.string().optional(),
  principal: ArgumentTemplateSchema.extend({
    supportLimit: z.number().int().min(0).max(10),
  }),
  specific: z.record(z.string(), ArgumentTemplateSchema),
  defense: ArgumentTemplateSchema,
  // {count} = number of discrepancies
  discrepancyRecommendation: RecommendationTemplateSchema,
  recommendations: z.record(z.string(), RecommendationTemplateSchema),
  fallback: RecommendationTemplateSchema,
  judgment: z.object({
    argument: ArgumentTemplateSchema,
    specific: z.record(z.string(), ArgumentTemplateSchema),
    recommendation: RecommendationTemplateSchema,
    recommendations: z.record(z.string(), RecommendationTemplateSchema),
  }),
});

export type SynthesisConfig = z.infer<typeof SynthesisConfigSchema>;
export type ArgumentTemplate = z.infer<typeof ArgumentTemplateSchema>;
export type RecommendationTemplate = z.infer<typeof RecommendationTemplateSchema>;

// ============================================================================
// PIPELINE CONFIG SCHEMA
// ============================================================================

export const PipelineConfigSchema = z.object({
  contextWindow: z.number().int().min(0).max(5000),
  discrepancyContextWindow: z.number().int().min(0).max(5000),
  cacheTtlMs: z.number().int().min(0),
  recomputeTimeoutMs: z.number().int().min(1).max(600_000),
  classifierMode: z.enum(["off", "override", "blend"]),
  classifierWeight: unit,
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  contextWindow: 150,
  discrepancyContextWindow: 200,
  cacheTtlMs: 300_000,
  recomputeTimeoutMs: 10_000,
  classifierMode: "blend",
  classifierWeight: 0.5,
};

// ============================================================================
// AGGREGATION CONFIG SCHEMA
// ============================================================================

const tierList = z.array(z.string().min(1));

export const AggregationConfigSchema = z
  .object({
    instanceWeights: z.object({
      supreme: z.number().positive(),
      appellate: z.number().positive(),
      other: z.number().positive(),
    }),
    // Lower-cased substrings looked up in the document id
    instanceMarkers: z.object({
      supreme: z.array(z.string().min(1)),
      appellate: z.array(z.string().min(1)),
    }),
    smallCorpusThreshold: z.number().int().min(1),
    dampeningFactor: unit,
    realismBand: z.object({ min: unit, max: unit }),
    dataConfidence: z.object({
      empty: unit,
      small: unit,
      max: unit,
      saturationDocs: z.number().int().min(1),
    }),
    riskTiers: z.object({ high: tierList, medium: tierList, low: tierList }),
    riskTierMultipliers: z.object({
      high: z.number().min(0),
      medium: z.number().min(0),
      low: z.number().min(0),
    }),
    authorityBoost: z.object({ supreme: z.number().min(0), appellate: z.number().min(0) }),
    riskThresholds: z.object({ high: z.number().min(0), medium: z.number().min(0) }),
    trendThresholds: z.object({ high: z.number().min(0), medium: z.number().min(0) }),
    correlationCategoryLimit: z.number().int().min(2).max(20),
    keyFactorLimit: z.number().int().min(1).max(50),
    // Documents processed between cooperative yields during async recompute
    yieldEvery: z.number().int().min(1),
  })
  .refine((c) => c.realismBand.min < c.realismBand.max, {
    message: "realismBand.min must be below realismBand.max",
    path: ["realismBand"],
  })
  .refine((c) => c.riskThresholds.medium <= c.riskThresholds.high, {
    message: "riskThresholds.medium must not exceed riskThresholds.high",
    path: ["riskThresholds"],
  });

export type AggregationConfig = z.infer<typeof AggregationConfigSchema>;

export const DEFAULT_AGGREGATION_CONFIG: AggregationConfig = {
  instanceWeights: { supreme: 1.5, appellate: 1.2, other: 1.0 },
  instanceMarkers: {
    supreme: ["sts_", "sts-", "sts ", "tribunal_supremo", "tribunal-supremo", "tribunal supremo"],
    appellate: ["tsj_", "tsj-", "tsj ", "tribunal_superior", "tribunal-superior", "tribunal superior"],
  },
  smallCorpusThreshold: 3,
  dampeningFactor: 0.3,
  realismBand: { min: 0.15, max: 0.85 },
  dataConfidence: { empty: 0.1, small: 0.3, max: 0.8, saturationDocs: 10 },
  riskTiers: {
    high: ["reclamacion_administrativa", "procedimiento_legal", "fundamentos_juridicos"],
    medium: ["lesiones_permanentes", "accidente_laboral", "prestaciones"],
    low: ["inss", "personal_limpieza", "lesiones_hombro"],
  },
  riskTierMultipliers: { high: 3, medium: 2, low: 1 },
  authorityBoost: { supreme: 0.5, appellate: 0.2 },
  riskThresholds: { high: 100, medium: 50 },
  trendThresholds: { high: 50, medium: 20 },
  correlationCategoryLimit: 5,
  keyFactorLimit: 5,
  yieldEvery: 25,
};

// ============================================================================
// CANONICALIZATION & HASHING
// ============================================================================

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Canonical JSON with sorted object keys. Array order is kept,
 * so category and phrase ordering still affects the hash.
 */
export function canonicalizeJson(obj: object): string {
  return JSON.stringify(sortKeysDeep(obj), null, 2);
}

/**
 * Compute content hash (SHA-256)
 */
export function computeContentHash(canonicalizedContent: string): string {
  return crypto.createHash("sha256").update(canonicalizedContent).digest("hex");
}

// ============================================================================
// SCHEMA VALIDATION BY TYPE
// ============================================================================

export type ConfigSchemaTypes = {
  catalog: CatalogConfig;
  scoring: ScoringConfig;
  synthesis: SynthesisConfig;
  pipeline: PipelineConfig;
  aggregation: AggregationConfig;
};

const CONFIG_SCHEMAS: {
  [K in ConfigType]: z.ZodType<ConfigSchemaTypes[K], z.ZodTypeDef, unknown>;
} = {
  catalog: CatalogConfigSchema,
  scoring: ScoringConfigSchema,
  synthesis: SynthesisConfigSchema,
  pipeline: PipelineConfigSchema,
  aggregation: AggregationConfigSchema,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/**
 * Soft checks that do not block loading.
 */
function collectWarnings(configType: ConfigType, value: unknown): string[] {
  const warnings: string[] = [];
  if (configType === "scoring") {
    const parsed = ScoringConfigSchema.safeParse(value);
    if (parsed.success) {
      const total = Object.values(parsed.data.weights).reduce((sum, w) => sum + w, 0);
      if (Math.abs(total - 1) > 1e-6) {
        warnings.push(`weights sum to ${total.toFixed(3)} (expected 1.0)`);
      }
    }
  }
  if (configType === "catalog") {
    const parsed = CatalogConfigSchema.safeParse(value);
    if (parsed.success) {
      for (const [name, phrases] of Object.entries(parsed.data.categories)) {
        if (phrases.length === 0) warnings.push(`categories.${name}: no phrases`);
      }
      const { discrepancies, scoring } = parsed.data.judgmentRules;
      if (!discrepancies.some((rule) => rule.type === scoring.baseProbability.when)) {
        warnings.push(`judgmentRules.scoring.baseProbability.when: no judgment discrepancy "${scoring.baseProbability.when}"`);
      }
    }
  }
  return warnings;
}

/**
 * Validate config content for a type. Accepts raw JSON text or a parsed value.
 */
export function validateConfig(configType: ConfigType, content: string | object): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let parsed: unknown;
  try {
    parsed = typeof content === "string" ? JSON.parse(content) : content;
  } catch (err) {
    errors.push(`Failed to parse content: ${err instanceof Error ? err.message : String(err)}`);
    return { valid: false, errors, warnings };
  }

  const result = CONFIG_SCHEMAS[configType].safeParse(parsed);
  if (!result.success) {
    errors.push(...formatIssues(result.error));
  } else {
    warnings.push(...collectWarnings(configType, parsed));
  }

  return { valid: errors.length === 0, errors, warnings };
}

export type SafeParseConfigResult<T> = { ok: true; config: T } | { ok: false; issues: string[] };

/**
 * Non-throwing typed parse. Used by the loader when trying env overrides.
 */
export function safeParseConfig<T extends ConfigType>(
  configType: T,
  value: unknown,
): SafeParseConfigResult<ConfigSchemaTypes[T]> {
  const schema = CONFIG_SCHEMAS[configType];
  const result = schema.safeParse(value);
  if (!result.success) {
    return { ok: false, issues: formatIssues(result.error) };
  }
  return { ok: true, config: result.data };
}

/**
 * Parse and validate config with type safety.
 * Throws ConfigurationError on validation failure.
 */
export function parseTypedConfig<T extends ConfigType>(configType: T, value: unknown): ConfigSchemaTypes[T] {
  const result = safeParseConfig(configType, value);
  if (!result.ok) {
    throw new ConfigurationError(
      `Config validation failed (${configType}): ${result.issues.join(", ")}`,
      configType,
      result.issues,
    );
  }
  return result.config;
}
