import type { SparseVector, TfidfVectorizer } from "./vectorizer";

/**
 * Cached retrieval structure for one document. Built in one go and swapped into the
 * index atomically; never mutated afterwards.
 */
export interface IndexEntry {
  readonly documentId: string;
  /** Passages exactly as persisted, in stored order. */
  readonly passages: readonly string[];
  /** Vector space fitted over this document's passages only. */
  readonly model: TfidfVectorizer;
  /** One vector per passage, row-aligned with `passages`. */
  readonly vectors: readonly SparseVector[];
  /** ISO timestamp of the build. */
  readonly builtAt: string;
}

/** A passage returned from a query, with its similarity to the question. */
export interface ScoredPassage {
  readonly text: string;
  /** Cosine similarity, in [0, 1] for TF-IDF weights. */
  readonly score: number;
  /** 0-based position of the passage within its document. */
  readonly position: number;
}

/** Outcome of any indexing call. */
export interface IndexResult {
  readonly documentId: string;
  readonly passageCount: number;
}
