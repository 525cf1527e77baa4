import path from "node:path";
import fg from "fast-glob";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, DEFAULT_TOP_K } from "./config";
import type { TextExtractor } from "./pdf-extractor";
import { PassageStore } from "./passage-store";
import { RetrievalIndex } from "./retrieval-index";
import { segment } from "./segmenter";
import { StatusManager } from "./status";
import type { IndexResult, ScoredPassage } from "./types";

/** Options required to construct a {@link Knowledgebase}. */
export interface KnowledgebaseOptions {
  dataDir: string; // passage store directory
  extractor: TextExtractor; // PDF (or other file) to normalized text
  chunkSize?: number; // default segmentation window (1000)
  chunkOverlap?: number; // default window overlap (100)
  defaultTopK?: number; // used when a query omits topK (3)
  status?: StatusManager;
  verbose?: boolean;
}

export interface SegmentOptions {
  maxChars?: number;
  overlap?: number;
}

export interface IngestDirectoryOptions {
  /** Re-index documents that already have stored passages. */
  force?: boolean;
}

export interface IngestDirectoryResult {
  indexed: string[];
  skipped: string[];
  failed: string[];
}

/**
 * Host-facing composition of extraction, segmentation, passage storage and
 * retrieval. One instance owns one passage store directory and its index cache.
 */
export class Knowledgebase {
  private readonly store: PassageStore;
  private readonly index: RetrievalIndex;
  private readonly extractor: TextExtractor;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly defaultTopK: number;
  private readonly status: StatusManager;
  private readonly verbose: boolean;

  public constructor(opts: KnowledgebaseOptions) {
    this.verbose = !!opts.verbose;
    this.store = new PassageStore(opts.dataDir, this.verbose);
    this.index = new RetrievalIndex({ store: this.store, verbose: this.verbose });
    this.extractor = opts.extractor;
    this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = opts.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.defaultTopK = opts.defaultTopK ?? DEFAULT_TOP_K;
    this.status = opts.status ?? new StatusManager({ dataDir: this.store.getDirectory() });
  }

  public getStore(): PassageStore {
    return this.store;
  }

  /** Replace a document's passages and rebuild its index entry. */
  public async indexPassages(documentId: string, passages: readonly string[]): Promise<IndexResult> {
    const result = await this.index.indexDocument(documentId, passages);
    this.status.recordIndexed(result.passageCount);
    return result;
  }

  /**
   * Segment already-normalized text and index the resulting passages.
   * @throws {InvalidSegmentationError} Before anything is written, for bad window settings.
   */
  public async indexText(
    documentId: string,
    text: string,
    opts: SegmentOptions = {},
  ): Promise<IndexResult> {
    const passages = segment(text, opts.maxChars ?? this.chunkSize, opts.overlap ?? this.chunkOverlap);
    return this.indexPassages(documentId, passages);
  }

  /** Extract, segment and index a PDF under `documentId`. */
  public async ingestPdf(documentId: string, pdfPath: string): Promise<IndexResult> {
    const text = await this.extractor.extractText(pdfPath);
    const result = await this.indexText(documentId, text);
    console.error(`[KB] Indexed ${path.basename(pdfPath)} as ${documentId} (${result.passageCount} passages)`);
    return result;
  }

  /**
   * Ingest every PDF below `dir`. Document ids are the relative paths without the
   * `.pdf` extension, with forward slashes. A failing file is logged and counted but
   * does not stop the run.
   */
  public async ingestDirectory(
    dir: string,
    opts: IngestDirectoryOptions = {},
  ): Promise<IngestDirectoryResult> {
    const files = await fg("**/*.pdf", { cwd: dir, onlyFiles: true, caseSensitiveMatch: false });
    files.sort();
    console.error(`[KB] Ingesting ${files.length} PDFs from ${dir}`);

    const result: IngestDirectoryResult = { indexed: [], skipped: [], failed: [] };
    for (const rel of files) {
      const documentId = rel.slice(0, -path.extname(rel).length);
      if (!opts.force && (await this.store.has(documentId))) {
        if (this.verbose) console.error(`[KB][verbose] Skipping ${rel}: already indexed`);
        result.skipped.push(documentId);
        continue;
      }
      try {
        await this.ingestPdf(documentId, path.join(dir, rel));
        result.indexed.push(documentId);
      } catch (e) {
        console.error(`[KB] Failed to ingest ${rel}:`, e);
        this.status.recordIngestFailure();
        result.failed.push(documentId);
      }
    }
    console.error(
      `[KB] Ingestion complete. Indexed: ${result.indexed.length}, skipped: ${result.skipped.length}, failed: ${result.failed.length}`,
    );
    return result;
  }

  /** Ranked passages for `question`; `[]` when the document has nothing stored. */
  public async query(documentId: string, question: string, topK?: number): Promise<ScoredPassage[]> {
    const matches = await this.index.query(documentId, question, topK ?? this.defaultTopK);
    this.status.recordQuery();
    return matches;
  }

  public async listDocuments(): Promise<string[]> {
    return this.store.list();
  }

  public async removeDocument(documentId: string): Promise<boolean> {
    const removed = await this.index.removeDocument(documentId);
    if (removed) this.status.recordRemoved();
    return removed;
  }
}
