import { describe, it, expect } from "vitest";

import { classifyError } from "@/lib/error-classification";
import { AggregationTimeout, ClassifierError, ConfigurationError, ExtractionError } from "@/lib/errors";

describe("classifyError", () => {
  it("maps engine errors to their categories", () => {
    expect(classifyError(new ConfigurationError("bad catalog", "catalog"))).toEqual({
      category: "configuration",
      message: "bad catalog",
      retriable: false,
    });
    expect(classifyError(new ExtractionError("unreadable", "a.txt")).category).toBe("extraction");
    expect(classifyError(new ClassifierError("model down"))).toMatchObject({ category: "classifier", retriable: true });
    expect(classifyError(new AggregationTimeout("too slow", 100))).toMatchObject({ category: "timeout", retriable: true });
  });

  it("recognizes engine errors by name", () => {
    const foreign = new Error("from another copy");
    foreign.name = "ExtractionError";
    expect(classifyError(foreign)).toEqual({ category: "extraction", message: "from another copy", retriable: false });
  });

  it("treats timeouts and aborts as retriable", () => {
    expect(classifyError(new Error("request timed out")).category).toBe("timeout");
    const abort = new Error("operation cancelled");
    abort.name = "AbortError";
    expect(classifyError(abort)).toMatchObject({ category: "timeout", retriable: true });
  });

  it("treats unreadable-input fs codes as extraction errors", () => {
    const enoent = Object.assign(new Error("no such file or directory"), { code: "ENOENT" });
    expect(classifyError(enoent).category).toBe("extraction");
  });

  it("falls back to unknown", () => {
    expect(classifyError("boom")).toEqual({ category: "unknown", message: "boom", retriable: false });
    expect(classifyError(new RangeError("index out of range")).category).toBe("unknown");
  });
});
