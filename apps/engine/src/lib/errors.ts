/**
 * Engine error taxonomy.
 *
 * Only ConfigurationError is allowed to escape the engine (at load time).
 * The others are caught at the component boundary and turned into
 * structured results: unprocessed analyses, rule-based fallback, stale cache.
 *
 * @module errors
 */

/**
 * Malformed or empty catalog/config. Fatal at load time.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly configType: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Text extraction collaborator could not read or decode the input.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

/**
 * Optional statistical classifier failed. Always recovered via rule-based fallback.
 */
export class ClassifierError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ClassifierError";
  }
}

/**
 * Corpus recompute exceeded its time budget.
 */
export class AggregationTimeout extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "AggregationTimeout";
  }
}
