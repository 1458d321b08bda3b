/**
 * Catalog Registry
 *
 * Owns the current PatternCatalog snapshot and applies edits to it.
 * An edit is planned against a version (validate + compile a full new
 * snapshot), then committed with a single reference swap. Readers call
 * `current()` on every use, so the swap is visible to the very next call.
 *
 * @module analyzer/catalog-registry
 */

import type { CatalogConfig } from "../config-schemas";
import { ConfigurationError } from "../errors";
import { normalizeKey } from "./lexicon-utils";
import { PatternCatalog, type CatalogProvider } from "./pattern-catalog";

// ============================================================================
// TYPES
// ============================================================================

export type CatalogUpdate =
  | { kind: "createCategory"; name: string; phrases?: readonly string[] }
  | { kind: "renameCategory"; from: string; to: string }
  | { kind: "deleteCategory"; name: string }
  | { kind: "addPhrase"; category: string; phrase: string }
  | { kind: "removePhrase"; category: string; phrase: string }
  | { kind: "renamePhrase"; category: string; from: string; to: string }
  | { kind: "replaceCategories"; categories: Readonly<Record<string, readonly string[]>> };

/** "storage" is reported by callers that persist a plan before committing it */
export type CatalogUpdateErrorCode = "invalid" | "not_found" | "conflict" | "storage";

export interface CatalogUpdateFailure {
  ok: false;
  code: CatalogUpdateErrorCode;
  message: string;
}

export interface CatalogPlan {
  ok: true;
  baseVersion: number;
  catalog: PatternCatalog;
  summary: string;
}

export type CatalogUpdateResult =
  | { ok: true; version: number; catalog: PatternCatalog; summary: string }
  | CatalogUpdateFailure;

export type CatalogListener = (catalog: PatternCatalog, version: number) => void;

export function updateFailure(code: CatalogUpdateErrorCode, message: string): CatalogUpdateFailure {
  return { ok: false, code, message };
}

type Categories = Record<string, string[]>;

function findCategoryKey(categories: Categories, name: string): string | undefined {
  const key = normalizeKey(name);
  return Object.keys(categories).find((existing) => normalizeKey(existing) === key);
}

/** Rebuild with one key replaced in place, keeping category order */
function renameKey(categories: Categories, from: string, to: string): Categories {
  const result: Categories = {};
  for (const [name, phrases] of Object.entries(categories)) {
    result[name === from ? to : name] = phrases;
  }
  return result;
}

function hasPhrase(phrases: readonly string[], phrase: string): boolean {
  const key = normalizeKey(phrase);
  return phrases.some((p) => normalizeKey(p) === key);
}

// ============================================================================
// EDIT OPERATIONS (pure, on a definition copy)
// ============================================================================

/**
 * Apply an edit to a copy of the categories. Returns the new categories and
 * a short summary, or a structured failure.
 */
function editCategories(
  categories: Categories,
  update: CatalogUpdate,
): { ok: true; categories: Categories; summary: string } | CatalogUpdateFailure {
  switch (update.kind) {
    case "createCategory": {
      const name = update.name.trim();
      if (!name) return updateFailure("invalid", "Category name must be non-empty");
      const existing = findCategoryKey(categories, name);
      if (existing !== undefined) return updateFailure("conflict", `Category "${existing}" already exists`);
      return {
        ok: true,
        categories: { ...categories, [name]: [...(update.phrases ?? [])] },
        summary: `created category ${name}`,
      };
    }

    case "renameCategory": {
      const to = update.to.trim();
      if (!to) return updateFailure("invalid", "New category name must be non-empty");
      const from = findCategoryKey(categories, update.from);
      if (from === undefined) return updateFailure("not_found", `Category "${update.from}" not found`);
      const clash = findCategoryKey(categories, to);
      if (clash !== undefined && clash !== from) return updateFailure("conflict", `Category "${clash}" already exists`);
      return { ok: true, categories: renameKey(categories, from, to), summary: `renamed category ${from} -> ${to}` };
    }

    case "deleteCategory": {
      const name = findCategoryKey(categories, update.name);
      if (name === undefined) return updateFailure("not_found", `Category "${update.name}" not found`);
      if (Object.keys(categories).length === 1) {
        return updateFailure("invalid", "Cannot delete the last category");
      }
      const next = { ...categories };
      delete next[name];
      return { ok: true, categories: next, summary: `deleted category ${name}` };
    }

    case "addPhrase": {
      const phrase = update.phrase.trim();
      if (!normalizeKey(phrase)) return updateFailure("invalid", "Phrase must be non-empty");
      const categoryName = update.category.trim();
      if (!categoryName) return updateFailure("invalid", "Category name must be non-empty");
      const name = findCategoryKey(categories, categoryName);
      // Unknown category: create it with this phrase
      if (name === undefined) {
        return {
          ok: true,
          categories: { ...categories, [categoryName]: [phrase] },
          summary: `created category ${categoryName} with phrase "${phrase}"`,
        };
      }
      const phrases = categories[name] ?? [];
      if (hasPhrase(phrases, phrase)) return updateFailure("conflict", `Phrase "${phrase}" already in ${name}`);
      return {
        ok: true,
        categories: { ...categories, [name]: [...phrases, phrase] },
        summary: `added phrase "${phrase}" to ${name}`,
      };
    }

    case "removePhrase": {
      const name = findCategoryKey(categories, update.category);
      if (name === undefined) return updateFailure("not_found", `Category "${update.category}" not found`);
      const phrases = categories[name] ?? [];
      const key = normalizeKey(update.phrase);
      const remaining = phrases.filter((p) => normalizeKey(p) !== key);
      if (remaining.length === phrases.length) {
        return updateFailure("not_found", `Phrase "${update.phrase}" not found in ${name}`);
      }
      return {
        ok: true,
        categories: { ...categories, [name]: remaining },
        summary: `removed phrase "${update.phrase}" from ${name}`,
      };
    }

    case "renamePhrase": {
      const to = update.to.trim();
      if (!normalizeKey(to)) return updateFailure("invalid", "New phrase must be non-empty");
      const name = findCategoryKey(categories, update.category);
      if (name === undefined) return updateFailure("not_found", `Category "${update.category}" not found`);
      const phrases = categories[name] ?? [];
      const fromKey = normalizeKey(update.from);
      const index = phrases.findIndex((p) => normalizeKey(p) === fromKey);
      if (index < 0) return updateFailure("not_found", `Phrase "${update.from}" not found in ${name}`);

      const toKey = normalizeKey(to);
      let next: string[];
      if (toKey !== fromKey && hasPhrase(phrases, to)) {
        // Target already present: the rename collapses into a removal
        next = phrases.filter((_, i) => i !== index);
      } else {
        next = phrases.map((p, i) => (i === index ? to : p));
      }
      return {
        ok: true,
        categories: { ...categories, [name]: next },
        summary: `renamed phrase "${update.from}" -> "${to}" in ${name}`,
      };
    }

    case "replaceCategories": {
      const next: Categories = {};
      for (const [name, phrases] of Object.entries(update.categories)) {
        next[name] = [...phrases];
      }
      return { ok: true, categories: next, summary: `replaced catalog (${Object.keys(next).length} categories)` };
    }
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

export class CatalogRegistry implements CatalogProvider {
  private snapshot: PatternCatalog;
  private version = 1;
  private readonly listeners = new Set<CatalogListener>();

  constructor(initial: PatternCatalog) {
    this.snapshot = initial;
  }

  current(): PatternCatalog {
    return this.snapshot;
  }

  get currentVersion(): number {
    return this.version;
  }

  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Validate an edit against the current snapshot and compile the result.
   * Nothing is visible to readers until `commit`.
   */
  plan(update: CatalogUpdate): CatalogPlan | CatalogUpdateFailure {
    const baseVersion = this.version;
    const definition: CatalogConfig = this.snapshot.toDefinition();

    const edited = editCategories(definition.categories, update);
    if (!edited.ok) return edited;

    try {
      const catalog = PatternCatalog.fromDefinition({ ...definition, categories: edited.categories });
      return { ok: true, baseVersion, catalog, summary: edited.summary };
    } catch (err) {
      if (err instanceof ConfigurationError) {
        return updateFailure("invalid", err.message);
      }
      throw err;
    }
  }

  /**
   * Swap in a planned snapshot. Fails with "conflict" when another edit was
   * committed after the plan was made.
   */
  commit(plan: CatalogPlan): CatalogUpdateResult {
    if (plan.baseVersion !== this.version) {
      return updateFailure(
        "conflict",
        `Catalog changed since the edit was planned (v${plan.baseVersion} -> v${this.version}); retry`,
      );
    }
    this.install(plan.catalog);
    console.log(`[Catalog-Registry] v${this.version}: ${plan.summary}`);
    return { ok: true, version: this.version, catalog: plan.catalog, summary: plan.summary };
  }

  apply(update: CatalogUpdate): CatalogUpdateResult {
    const planned = this.plan(update);
    if (!planned.ok) return planned;
    return this.commit(planned);
  }

  /**
   * Replace the snapshot wholesale (e.g. with a persisted catalog at startup).
   */
  replace(catalog: PatternCatalog): number {
    this.install(catalog);
    console.log(`[Catalog-Registry] v${this.version}: replaced snapshot`);
    return this.version;
  }

  private install(catalog: PatternCatalog): void {
    this.snapshot = catalog;
    this.version += 1;
    for (const listener of this.listeners) {
      try {
        listener(catalog, this.version);
      } catch (err) {
        console.error("[Catalog-Registry] Listener failed:", err instanceof Error ? err.message : String(err));
      }
    }
  }
}
