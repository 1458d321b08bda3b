/**
 * Configuration Loader
 *
 * Loads file-backed defaults (catalog, scoring, synthesis) from configs/*.default.json
 * and resolves environment variable overrides for the code-default configs
 * (pipeline, aggregation).
 *
 * @module config-loader
 * @version 1.0.0
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

import {
  DEFAULT_AGGREGATION_CONFIG,
  DEFAULT_PIPELINE_CONFIG,
  SCHEMA_VERSIONS,
  parseTypedConfig,
  safeParseConfig,
  type AggregationConfig,
  type CatalogConfig,
  type ConfigSchemaTypes,
  type FileBackedConfigType,
  type PipelineConfig,
  type ScoringConfig,
  type SynthesisConfig,
} from "./config-schemas";
import { ConfigurationError } from "./errors";

export type { AggregationConfig, CatalogConfig, PipelineConfig, ScoringConfig, SynthesisConfig } from "./config-schemas";
export { DEFAULT_AGGREGATION_CONFIG, DEFAULT_PIPELINE_CONFIG } from "./config-schemas";

// ============================================================================
// CONFIGURATION
// ============================================================================

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

// Override policy
type OverridePolicy = "on" | "off" | string; // string for "allowlist:VAR1,VAR2"

function getOverridePolicy(): OverridePolicy {
  return process.env.CE_CONFIG_ENV_OVERRIDES || "on";
}

/**
 * Directory holding <type>.default.json files.
 * CE_CONFIG_DEFAULTS_DIR wins; otherwise apps/engine/configs.
 */
export function getConfigDefaultsDir(): string {
  return process.env.CE_CONFIG_DEFAULTS_DIR || path.resolve(MODULE_DIR, "..", "..", "configs");
}

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  wasSet: true;
  appliedValue?: string | number | boolean;
}

export interface EngineConfig {
  catalog: CatalogConfig;
  scoring: ScoringConfig;
  synthesis: SynthesisConfig;
  pipeline: PipelineConfig;
  aggregation: AggregationConfig;
  overrides: OverrideRecord[];
}

type OverridableConfigType = "pipeline" | "aggregation";

interface EnvMapping {
  fieldPath: string;
  parser: (v: string) => unknown;
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

const PIPELINE_ENV_MAP: Record<string, EnvMapping> = {
  CE_CONTEXT_WINDOW: { fieldPath: "contextWindow", parser: (v) => parseInt(v, 10) },
  CE_DISCREPANCY_CONTEXT_WINDOW: { fieldPath: "discrepancyContextWindow", parser: (v) => parseInt(v, 10) },
  CE_CACHE_TTL_MS: { fieldPath: "cacheTtlMs", parser: (v) => parseInt(v, 10) },
  CE_RECOMPUTE_TIMEOUT_MS: { fieldPath: "recomputeTimeoutMs", parser: (v) => parseInt(v, 10) },
  CE_CLASSIFIER_MODE: { fieldPath: "classifierMode", parser: (v) => v },
  CE_CLASSIFIER_WEIGHT: { fieldPath: "classifierWeight", parser: (v) => parseFloat(v) },
};

const AGGREGATION_ENV_MAP: Record<string, EnvMapping> = {
  CE_AGG_SMALL_CORPUS_THRESHOLD: { fieldPath: "smallCorpusThreshold", parser: (v) => parseInt(v, 10) },
  CE_AGG_DAMPENING_FACTOR: { fieldPath: "dampeningFactor", parser: (v) => parseFloat(v) },
  CE_AGG_REALISM_MIN: { fieldPath: "realismBand.min", parser: (v) => parseFloat(v) },
  CE_AGG_REALISM_MAX: { fieldPath: "realismBand.max", parser: (v) => parseFloat(v) },
  CE_AGG_SUPREME_WEIGHT: { fieldPath: "instanceWeights.supreme", parser: (v) => parseFloat(v) },
  CE_AGG_APPELLATE_WEIGHT: { fieldPath: "instanceWeights.appellate", parser: (v) => parseFloat(v) },
};

const ENV_MAPS: Record<OverridableConfigType, Record<string, EnvMapping>> = {
  pipeline: PIPELINE_ENV_MAP,
  aggregation: AGGREGATION_ENV_MAP,
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function setNestedValue(obj: object, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current: unknown = obj;
  for (const part of parts.slice(0, -1)) {
    if (current === null || typeof current !== "object") return;
    current = Reflect.get(current, part);
  }
  const last = parts[parts.length - 1];
  if (current !== null && typeof current === "object" && last) {
    Reflect.set(current, last, value);
  }
}

export function applyOverrides<T extends OverridableConfigType>(
  configType: T,
  base: ConfigSchemaTypes[T],
): { result: ConfigSchemaTypes[T]; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const policy = getOverridePolicy();
  const skippedOverrides: string[] = [];

  if (policy === "off") {
    return { result: base, overrides: [], skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(policy.slice("allowlist:".length).split(",").map((s) => s.trim()));
  }

  const overrides: OverrideRecord[] = [];
  let result = structuredClone(base);

  // Apply each env var if set, validating after each override
  for (const [envVar, mapping] of Object.entries(ENV_MAPS[configType])) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = process.env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const tentative = structuredClone(result);
    setNestedValue(tentative, mapping.fieldPath, parsed);

    const validation = safeParseConfig(configType, tentative);
    if (!validation.ok) {
      console.warn(`[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ${validation.issues.join(", ")}`);
      skippedOverrides.push(`${envVar} (invalid: ${validation.issues[0] ?? "unknown"})`);
      continue;
    }

    result = validation.config;
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      wasSet: true,
      appliedValue:
        typeof parsed === "string" || typeof parsed === "number" || typeof parsed === "boolean"
          ? parsed
          : undefined,
    });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// FILE-BACKED DEFAULTS
// ============================================================================

/**
 * Raw text of configs/<type>.default.json, or null when the file is absent.
 */
export function loadDefaultConfigFromFile(configType: FileBackedConfigType): string | null {
  const filePath = path.join(getConfigDefaultsDir(), `${configType}.default.json`);
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Load and validate a file-backed config. There is no code fallback for these:
 * a missing or invalid file is a ConfigurationError.
 */
export function loadFileConfig<T extends FileBackedConfigType>(configType: T): ConfigSchemaTypes[T] {
  const content = loadDefaultConfigFromFile(configType);
  if (content === null) {
    throw new ConfigurationError(
      `Default config file not found for ${configType} in ${getConfigDefaultsDir()}`,
      configType,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid JSON in ${configType}.default.json: ${message}`, configType, [message]);
  }

  if (parsed !== null && typeof parsed === "object" && "schemaVersion" in parsed) {
    const version = parsed.schemaVersion;
    if (version !== SCHEMA_VERSIONS[configType]) {
      console.warn(
        `[Config-Loader] ${configType}.default.json has schemaVersion ${String(version)}, expected ${SCHEMA_VERSIONS[configType]}`,
      );
    }
  }

  return parseTypedConfig(configType, parsed);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Resolve the full engine configuration: file-backed vocabularies plus
 * code defaults with env overrides applied. Explicit `pipeline`/`aggregation`
 * partials (e.g. from a caller) are merged before overrides.
 */
export function loadEngineConfig(
  partial: { pipeline?: Partial<PipelineConfig>; aggregation?: Partial<AggregationConfig> } = {},
): EngineConfig {
  const pipelineBase = parseTypedConfig("pipeline", { ...DEFAULT_PIPELINE_CONFIG, ...partial.pipeline });
  const aggregationBase = parseTypedConfig("aggregation", { ...DEFAULT_AGGREGATION_CONFIG, ...partial.aggregation });

  const pipeline = applyOverrides("pipeline", pipelineBase);
  const aggregation = applyOverrides("aggregation", aggregationBase);

  const overrides = [...pipeline.overrides, ...aggregation.overrides];
  if (overrides.length > 0) {
    console.log(`[Config-Loader] Applied ${overrides.length} env override(s): ${overrides.map((o) => o.envVar).join(", ")}`);
  }

  return {
    catalog: loadFileConfig("catalog"),
    scoring: loadFileConfig("scoring"),
    synthesis: loadFileConfig("synthesis"),
    pipeline: pipeline.result,
    aggregation: aggregation.result,
    overrides,
  };
}
