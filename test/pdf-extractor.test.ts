import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PdfExtractionError, PdfExtractor } from "../src/pdf-extractor";

/** Minimal PDF with one Helvetica text line per page and a correct xref table. */
function buildPdf(pageTexts: string[]): Buffer {
  const pageIds = pageTexts.map((_, i) => 4 + i * 2);
  const objects: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageTexts.length} >>`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];
  for (const [i, text] of pageTexts.entries()) {
    const stream = `BT /F1 18 Tf 20 100 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 200] /Resources << /Font << /F1 3 0 R >> >> /Contents ${pageIds[i] + 1} 0 R >>`,
      `<< /Length ${Buffer.byteLength(stream, "latin1")} >>\nstream\n${stream}\nendstream`,
    );
  }

  let out = "%PDF-1.4\n";
  const offsets: number[] = [];
  for (const [i, body] of objects.entries()) {
    offsets.push(Buffer.byteLength(out, "latin1"));
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  }
  const xrefAt = Buffer.byteLength(out, "latin1");
  out += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) out += `${String(offset).padStart(10, "0")} 00000 n \n`;
  out += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return Buffer.from(out, "latin1");
}

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "kb-pdf-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("PdfExtractor", () => {
  it("recognises PDFs by extension, case-insensitively", () => {
    expect(PdfExtractor.isPdf("manual.pdf")).toBe(true);
    expect(PdfExtractor.isPdf("docs/Manual.PDF")).toBe(true);
    expect(PdfExtractor.isPdf("notes.txt")).toBe(false);
    expect(PdfExtractor.isPdf("pdf")).toBe(false);
  });

  it("joins every page and collapses whitespace", async () => {
    const file = path.join(dir, "two-pages.pdf");
    await fs.writeFile(file, buildPdf(["Hello    PDF", "Second page"]));
    expect(await new PdfExtractor().extractText(file)).toBe("Hello PDF Second page");
  });

  it("wraps unreadable files in PdfExtractionError", async () => {
    const missing = path.join(dir, "missing.pdf");
    const err = await new PdfExtractor().extractText(missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PdfExtractionError);
    expect(err).toHaveProperty("message", "Failed to extract text from missing.pdf");
  });

  it("wraps files that are not PDFs in PdfExtractionError", async () => {
    const file = path.join(dir, "fake.pdf");
    await fs.writeFile(file, "just some text", "utf8");
    await expect(new PdfExtractor().extractText(file)).rejects.toBeInstanceOf(PdfExtractionError);
  });
});
