import { DEFAULT_TOP_K } from "./config";
import { KeyedLock } from "./keyed-lock";
import type { PassageStore } from "./passage-store";
import type { IndexEntry, IndexResult, ScoredPassage } from "./types";
import { TfidfVectorizer, cosineSimilarity } from "./vectorizer";

/** Options required to construct a {@link RetrievalIndex}. */
export interface RetrievalIndexOptions {
  store: PassageStore; // source of truth for passages
  verbose?: boolean; // extra logging
}

/**
 * In-memory, per-document TF-IDF indexes over passages held in a {@link PassageStore}.
 *
 * Entries are a cache: each one is rebuilt whole from stored passages on demand
 * and replaced with a single `Map.set`, so a reader sees either the previous entry
 * or the new one. Writers and cold builds for the same id are serialised through a
 * {@link KeyedLock}; other ids are unaffected.
 */
export class RetrievalIndex {
  private readonly store: PassageStore;
  private readonly verbose: boolean;
  private readonly entries = new Map<string, IndexEntry>();
  private readonly lock = new KeyedLock<string>();

  public constructor(opts: RetrievalIndexOptions) {
    this.store = opts.store;
    this.verbose = !!opts.verbose;
  }

  /**
   * Build an index entry for `passages`. An empty document is fitted over a single
   * placeholder passage so the model exists, but the entry records no passages.
   */
  public static buildEntry(documentId: string, passages: readonly string[]): IndexEntry {
    const copy = Object.freeze([...passages]);
    const { model, vectors } = TfidfVectorizer.fit(copy.length ? copy : [""]);
    return Object.freeze({
      documentId,
      passages: copy,
      model,
      vectors: Object.freeze(copy.length ? vectors : []),
      builtAt: new Date().toISOString(),
    });
  }

  /**
   * Persist `passages` for `documentId`, then replace its cached entry. The cache is
   * left untouched when the save fails.
   *
   * @throws {PassageStoreWriteError} If persistence fails.
   */
  public async indexDocument(documentId: string, passages: readonly string[]): Promise<IndexResult> {
    return this.lock.run(documentId, async () => {
      await this.store.save(documentId, passages);
      const entry = RetrievalIndex.buildEntry(documentId, passages);
      this.entries.set(documentId, entry);
      if (this.verbose) {
        console.error(
          `[KB][verbose] Indexed ${documentId}: ${entry.passages.length} passages, ${entry.model.vocabularySize} terms`,
        );
      }
      return { documentId, passageCount: entry.passages.length };
    });
  }

  /**
   * Rank the document's passages against `question` by cosine similarity, highest
   * first, ties in passage order. `topK` is clamped to `[1, passageCount]` (infinities
   * included) and NaN means the default; a document with no passages (or none stored)
   * yields `[]`.
   */
  public async query(
    documentId: string,
    question: string,
    topK: number = DEFAULT_TOP_K,
  ): Promise<ScoredPassage[]> {
    const entry = await this.ensureEntry(documentId);
    const count = entry.passages.length;
    if (count === 0) return [];

    const requested = Number.isNaN(topK) ? DEFAULT_TOP_K : Math.floor(topK);
    const k = Math.min(count, Math.max(1, requested));
    const q = entry.model.transform(question);
    const scored = entry.vectors.map((v, position) => ({
      position,
      score: cosineSimilarity(q, v),
    }));
    // Array.prototype.sort is stable, so equal scores keep passage order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k).map(({ position, score }) => ({
      text: entry.passages[position],
      score,
      position,
    }));
  }

  /**
   * Delete the document's stored passages and drop its cached entry.
   * @returns False when nothing was stored.
   */
  public async removeDocument(documentId: string): Promise<boolean> {
    return this.lock.run(documentId, async () => {
      const removed = await this.store.remove(documentId);
      this.entries.delete(documentId);
      return removed;
    });
  }

  /** Drop the cached entry for one document; the next query rebuilds it from the store. */
  public evict(documentId: string): boolean {
    return this.entries.delete(documentId);
  }

  /** Drop every cached entry, as after a process restart. */
  public clear(): void {
    this.entries.clear();
  }

  public isCached(documentId: string): boolean {
    return this.entries.has(documentId);
  }

  public cachedDocumentIds(): string[] {
    return [...this.entries.keys()];
  }

  /** Current cached entry, if any. Treat as read-only. */
  public getEntry(documentId: string): IndexEntry | undefined {
    return this.entries.get(documentId);
  }

  private async ensureEntry(documentId: string): Promise<IndexEntry> {
    const cached = this.entries.get(documentId);
    if (cached) return cached;
    return this.lock.run(documentId, async () => {
      // Another caller may have built it while we waited.
      const built = this.entries.get(documentId);
      if (built) return built;
      const passages = await this.store.load(documentId);
      const entry = RetrievalIndex.buildEntry(documentId, passages);
      // Nothing stored: leave uncached.
      if (passages.length === 0) return entry;
      this.entries.set(documentId, entry);
      if (this.verbose) {
        console.error(`[KB][verbose] Rebuilt ${documentId} from store (${passages.length} passages)`);
      }
      return entry;
    });
  }
}
