import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "./config";

/** Thrown when a segmentation window cannot make forward progress. */
export class InvalidSegmentationError extends Error {
  constructor(maxChars: number, overlap: number, detail: string) {
    super(`Invalid segmentation parameters (maxChars=${maxChars}, overlap=${overlap}): ${detail}`);
    this.name = "InvalidSegmentationError";
  }
}

/** Collapse every whitespace run (including newlines and form feeds) to one space and trim. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Split text into overlapping windows of at most `maxChars` characters. Characters are
 * code points, so a surrogate pair is never cut. Each window after the first starts
 * `overlap` characters before the previous one ended; the last window ends exactly at
 * the end of the text.
 *
 * @throws {InvalidSegmentationError} If `maxChars` is not a positive integer, `overlap`
 *   is not a non-negative integer, or `overlap >= maxChars`.
 */
export function segment(
  text: string,
  maxChars = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new InvalidSegmentationError(maxChars, overlap, "maxChars must be a positive integer");
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidSegmentationError(maxChars, overlap, "overlap must be a non-negative integer");
  }
  if (overlap >= maxChars) {
    throw new InvalidSegmentationError(maxChars, overlap, "overlap must be smaller than maxChars");
  }

  const out: string[] = [];
  const chars = Array.from(text);
  const n = chars.length;
  let start = 0;
  while (start < n) {
    const end = Math.min(start + maxChars, n);
    out.push(chars.slice(start, end).join(""));
    if (end === n) break;
    start = end - overlap;
  }
  return out;
}
