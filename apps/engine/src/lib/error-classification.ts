/**
 * Error Classification
 *
 * Maps thrown values onto the engine's error taxonomy so that failures can be
 * recorded as structured markers instead of propagating.
 *
 * @module error-classification
 */

import { AggregationTimeout, ClassifierError, ConfigurationError, ExtractionError } from "./errors";

export type ErrorCategory = "configuration" | "extraction" | "classifier" | "timeout" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  /** Whether retrying the same input can plausibly succeed */
  retriable: boolean;
};

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i];

/** Node fs error codes that mean the input itself could not be read */
const UNREADABLE_INPUT_CODES = new Set(["ENOENT", "EACCES", "EISDIR", "EPERM", "ENOTDIR"]);

const NAMED_CATEGORIES: Record<string, ErrorCategory> = {
  ConfigurationError: "configuration",
  ExtractionError: "extraction",
  ClassifierError: "classifier",
  AggregationTimeout: "timeout",
};

/**
 * Classify an error into the engine taxonomy.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ConfigurationError) {
    return { category: "configuration", message: error.message, retriable: false };
  }
  if (error instanceof ExtractionError) {
    return { category: "extraction", message: error.message, retriable: false };
  }
  if (error instanceof ClassifierError) {
    return { category: "classifier", message: error.message, retriable: true };
  }
  if (error instanceof AggregationTimeout) {
    return { category: "timeout", message: error.message, retriable: true };
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  // Same error classes loaded from a second copy of the module
  const byName = NAMED_CATEGORIES[name];
  if (byName) {
    return { category: byName, message: msg, retriable: byName === "classifier" || byName === "timeout" };
  }

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", message: msg, retriable: true };
  }

  const code = getErrorCode(error);
  if (code && UNREADABLE_INPUT_CODES.has(code)) {
    return { category: "extraction", message: msg, retriable: false };
  }

  return { category: "unknown", message: msg, retriable: false };
}

function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) return null;
  return typeof error.code === "string" ? error.code : null;
}
