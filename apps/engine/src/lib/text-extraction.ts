/**
 * Text Extraction
 *
 * Collaborator interface for turning a document file into plain text, plus
 * the plain-text implementation the engine uses by default. PDF/DOCX
 * extractors plug in behind the same interface.
 *
 * @module text-extraction
 */

import { promises as fs } from "fs";
import path from "path";

import { ExtractionError } from "./errors";

export interface TextExtractor {
  /** Resolves to the document text; rejects with ExtractionError */
  extractText(filePath: string): Promise<string>;
}

const DEFAULT_MAX_BYTES = 20 * 1024 * 1024;

/**
 * Decode bytes as UTF-8, falling back to latin1 for legacy encodings.
 * A BOM is dropped.
 */
export function decodeText(buffer: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(buffer);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return Buffer.from(buffer).toString("latin1");
  }
}

export class PlainTextExtractor implements TextExtractor {
  private readonly maxBytes: number;

  constructor(options: { maxBytes?: number } = {}) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  }

  async extractText(filePath: string): Promise<string> {
    const resolved = path.resolve(filePath);

    let buffer: Buffer;
    try {
      const stat = await fs.stat(resolved);
      if (!stat.isFile()) {
        throw new ExtractionError(`Not a regular file: ${filePath}`, filePath);
      }
      if (stat.size > this.maxBytes) {
        throw new ExtractionError(`File too large (${stat.size} bytes, max ${this.maxBytes}): ${filePath}`, filePath);
      }
      buffer = await fs.readFile(resolved);
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ExtractionError(`Cannot read ${filePath}: ${message}`, filePath, err);
    }

    // NUL bytes mean a binary format this extractor cannot read
    if (buffer.includes(0)) {
      throw new ExtractionError(`Binary content in ${filePath}; not a plain-text document`, filePath);
    }

    return decodeText(buffer);
  }
}
