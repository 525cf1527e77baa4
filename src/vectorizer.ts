import stopWordList from "./data/english-stop-words.json" with { type: "json" };

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// Runs of 2+ letters, digits or underscores.
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Sparse vector keyed by vocabulary column. Only non-zero weights are stored, so a
 * vector with no entries is the zero vector.
 */
export type SparseVector = ReadonlyMap<number, number>;

/** Lowercase, split into word tokens and drop English stop words. */
export function tokenize(text: string): string[] {
  const out: string[] = [];
  for (const match of text.toLowerCase().matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (!STOP_WORDS.has(token)) out.push(token);
  }
  return out;
}

/**
 * Cosine similarity between two sparse vectors. The zero vector scores 0 against
 * everything.
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  // Iterate the shorter vector.
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [col, w] of small) {
    const other = large.get(col);
    if (other !== undefined) dot += w * other;
  }
  if (dot === 0) return 0;
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  return dot / (na * nb);
}

function norm(v: SparseVector): number {
  let sum = 0;
  for (const w of v.values()) sum += w * w;
  return Math.sqrt(sum);
}

/**
 * TF-IDF model fitted over one document's passages. Term weight is raw count times
 * smoothed idf, `ln((1 + n) / (1 + df)) + 1`, and every vector is L2-normalised.
 */
export class TfidfVectorizer {
  private readonly vocabulary: ReadonlyMap<string, number>;
  private readonly idf: readonly number[];

  private constructor(vocabulary: Map<string, number>, idf: number[]) {
    this.vocabulary = vocabulary;
    this.idf = idf;
  }

  /**
   * Fit a vocabulary and idf table over `passages` and return the model together with
   * the passage vectors, row-aligned with the input. An empty vocabulary is allowed:
   * every vector is then the zero vector.
   */
  public static fit(passages: readonly string[]): {
    model: TfidfVectorizer;
    vectors: SparseVector[];
  } {
    const tokenized = passages.map(tokenize);
    const vocabulary = new Map<string, number>();
    const df: number[] = [];
    for (const tokens of tokenized) {
      for (const term of new Set(tokens)) {
        let col = vocabulary.get(term);
        if (col === undefined) {
          col = vocabulary.size;
          vocabulary.set(term, col);
          df.push(0);
        }
        df[col] += 1;
      }
    }
    const n = passages.length;
    const idf = df.map((d) => Math.log((1 + n) / (1 + d)) + 1);
    const model = new TfidfVectorizer(vocabulary, idf);
    return { model, vectors: tokenized.map((tokens) => model.weigh(tokens)) };
  }

  /** Number of distinct terms in the fitted vocabulary. */
  public get vocabularySize(): number {
    return this.vocabulary.size;
  }

  /** Inverse document frequency of `term`, or undefined when the term is unknown. */
  public idfOf(term: string): number | undefined {
    const col = this.vocabulary.get(term);
    return col === undefined ? undefined : this.idf[col];
  }

  /** Project text into this model's space; out-of-vocabulary terms are dropped. */
  public transform(text: string): SparseVector {
    return this.weigh(tokenize(text));
  }

  private weigh(tokens: readonly string[]): SparseVector {
    const counts = new Map<number, number>();
    for (const token of tokens) {
      const col = this.vocabulary.get(token);
      if (col === undefined) continue;
      counts.set(col, (counts.get(col) ?? 0) + 1);
    }
    const weights = new Map<number, number>();
    let sumSq = 0;
    for (const [col, tf] of counts) {
      const w = tf * this.idf[col];
      weights.set(col, w);
      sumSq += w * w;
    }
    if (sumSq === 0) return weights;
    const length = Math.sqrt(sumSq);
    for (const [col, w] of weights) weights.set(col, w / length);
    return weights;
  }
}
