/**
 * PDF text extraction.
 *
 * Produces the normalized text blob the segmenter expects: all pages joined with
 * newlines, then every whitespace run collapsed to a single space.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { normalizeWhitespace } from "./segmenter";

/** Thrown when a PDF cannot be read or parsed. */
export class PdfExtractionError extends Error {
  constructor(pdfPath: string, cause: unknown) {
    super(`Failed to extract text from ${path.basename(pdfPath)}`, { cause });
    this.name = "PdfExtractionError";
  }
}

/** Anything that can turn a file on disk into normalized text. */
export interface TextExtractor {
  extractText(filePath: string): Promise<string>;
}

export class PdfExtractor implements TextExtractor {
  private readonly verbose: boolean;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  /**
   * Extract and normalize the text of every page.
   * @throws {PdfExtractionError} If the file is unreadable or not a valid PDF.
   */
  public async extractText(pdfPath: string): Promise<string> {
    if (this.verbose) {
      console.error(`[PDF] Extracting text from ${path.basename(pdfPath)}...`);
    }
    let parser: PDFParse | undefined;
    try {
      const dataBuffer = await fs.readFile(pdfPath);
      parser = new PDFParse({ data: dataBuffer });
      const textResult = await parser.getText();
      const text = normalizeWhitespace(textResult.pages.map((p) => p.text).join("\n"));
      if (this.verbose) {
        console.error(
          `[PDF] ${path.basename(pdfPath)}: ${textResult.pages.length} pages, ${text.length} chars`,
        );
      }
      return text;
    } catch (e) {
      throw new PdfExtractionError(pdfPath, e);
    } finally {
      await parser?.destroy();
    }
  }

  /**
   * Check if a file is a PDF based on its extension.
   * @returns True if file has .pdf extension (case-insensitive)
   */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
