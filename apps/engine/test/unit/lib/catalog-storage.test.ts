import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CatalogStore, getCatalogDbPath } from "@/lib/catalog-storage";
import { ConfigurationError } from "@/lib/errors";
import { catalogDefinition } from "@test/helpers/test-helpers";

describe("CatalogStore", () => {
  let store: CatalogStore;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    store = new CatalogStore(":memory:");
  });

  afterEach(async () => {
    await store.close();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("takes the database path from the environment", () => {
    vi.stubEnv("CE_CATALOG_DB_PATH", "/tmp/engine-test/catalog.db");
    expect(getCatalogDbPath()).toBe("/tmp/engine-test/catalog.db");
  });

  it("starts empty", async () => {
    expect(await store.getActiveCatalog()).toBeNull();
    expect(await store.getActiveHash()).toBeNull();
    expect(await store.getHistory()).toEqual([]);
  });

  it("stores a catalog and makes it active", async () => {
    const definition = catalogDefinition({ hombro: ["manguito rotador"] });
    const saved = await store.saveCatalog(definition, { createdBy: "tester", summary: "initial" });

    expect(saved.isNew).toBe(true);
    expect(saved.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(await store.getActiveHash()).toBe(saved.contentHash);
    expect(await store.getActiveCatalog()).toEqual(definition);
  });

  it("reuses the blob for identical content and logs every commit", async () => {
    const first = catalogDefinition({ hombro: ["manguito rotador"] });
    const second = catalogDefinition({ hombro: ["manguito rotador", "supraespinoso"] });

    const a = await store.saveCatalog(first, { summary: "v1" });
    const b = await store.saveCatalog(second, { summary: "v2" });
    const c = await store.saveCatalog({ ...first }, { summary: "back to v1", createdBy: "tester" });

    expect(c).toEqual({ contentHash: a.contentHash, isNew: false });
    expect(b.contentHash).not.toBe(a.contentHash);
    expect(await store.getActiveHash()).toBe(a.contentHash);

    const history = await store.getHistory();
    expect(history.map((h) => [h.summary, h.committedBy])).toEqual([
      ["back to v1", "tester"],
      ["v2", null],
      ["v1", null],
    ]);
    expect(history[0]?.contentHash).toBe(a.contentHash);
    expect(await store.getHistory(1)).toHaveLength(1);
  });

  it("writes concurrent saves one after another", async () => {
    const first = catalogDefinition({ hombro: ["manguito rotador"] });
    const second = catalogDefinition({ rodilla: ["menisco"] });

    const [a, b] = await Promise.all([
      store.saveCatalog(first, { summary: "first" }),
      store.saveCatalog(second, { summary: "second" }),
    ]);

    expect(await store.getActiveHash()).toBe(b.contentHash);
    const history = await store.getHistory();
    expect(history.map((h) => [h.summary, h.contentHash])).toEqual([
      ["second", b.contentHash],
      ["first", a.contentHash],
    ]);
  });

  it("refuses to store an invalid catalog", async () => {
    const definition = catalogDefinition();
    const broken = { ...definition, durationThresholdMonths: 0 };

    await expect(store.saveCatalog(broken)).rejects.toBeInstanceOf(ConfigurationError);
    expect(await store.getActiveHash()).toBeNull();
  });
});
