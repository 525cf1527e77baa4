import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";

/** Thrown for a document id that cannot name a stored artifact. */
export class InvalidDocumentIdError extends Error {
  constructor(documentId: string) {
    super(`Invalid document id: ${JSON.stringify(documentId)}`);
    this.name = "InvalidDocumentIdError";
  }
}

/** Thrown when persisting a document's passages fails; the prior content is left intact. */
export class PassageStoreWriteError extends Error {
  constructor(documentId: string, cause: unknown) {
    super(`Failed to persist passages for document ${JSON.stringify(documentId)}`, { cause });
    this.name = "PassageStoreWriteError";
  }
}

const EXTENSION = ".json";

/**
 * Durable per-document passage storage: one JSON array of strings per document id,
 * replaced whole on every save.
 *
 * Writes are strict (failures throw), reads are lenient: a missing, unreadable or
 * malformed artifact loads as an empty document.
 */
export class PassageStore {
  /** Directory holding `<encoded id>.json` artifacts. */
  private readonly dir: string;
  private readonly verbose: boolean;

  /**
   * @param dir     Storage directory; created on first save.
   * @param verbose Emit per-call logging.
   */
  public constructor(dir: string, verbose = false) {
    this.dir = path.resolve(dir);
    this.verbose = verbose;
  }

  public getDirectory(): string {
    return this.dir;
  }

  /**
   * Map a document id to its artifact path. Ids are percent-encoded (dots included) so
   * no id can point outside the storage directory.
   */
  public pathFor(documentId: string): string {
    if (!documentId) throw new InvalidDocumentIdError(documentId);
    const name = encodeURIComponent(documentId).replace(/\./g, "%2E");
    return path.join(this.dir, `${name}${EXTENSION}`);
  }

  /**
   * Persist `passages` for `documentId`, atomically replacing prior content. The array
   * goes to a unique temp file first and is then renamed over the target, so concurrent
   * readers see either the old or the new artifact.
   *
   * @throws {PassageStoreWriteError} On any filesystem failure.
   */
  public async save(documentId: string, passages: readonly string[]): Promise<void> {
    const target = this.pathFor(documentId);
    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(passages, null, 2), "utf8");
      await fs.rename(tmp, target);
    } catch (e) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        console.error(`[KB] Failed to clean up temp file ${tmp}:`, rmErr);
      });
      throw new PassageStoreWriteError(documentId, e);
    }
    if (this.verbose) {
      console.error(`[KB][verbose] Persisted ${passages.length} passages to ${target}`);
    }
  }

  /**
   * Load the persisted passages for `documentId`. Never throws for storage problems:
   * absence or a bad artifact both yield `[]`.
   */
  public async load(documentId: string): Promise<string[]> {
    const target = this.pathFor(documentId);
    let raw: string;
    try {
      raw = await fs.readFile(target, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        if (this.verbose) console.error(`[KB][verbose] No stored passages for ${documentId}`);
      } else {
        console.error(`[KB] Failed to read passages at ${target}, treating as empty:`, e);
      }
      return [];
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed) || !parsed.every((p): p is string => typeof p === "string")) {
        console.error(`[KB] Stored passages at ${target} are not a string array, treating as empty.`);
        return [];
      }
      return parsed;
    } catch (e) {
      console.error(`[KB] Stored passages at ${target} are not valid JSON, treating as empty:`, e);
      return [];
    }
  }

  /** Whether an artifact exists for `documentId`. */
  public async has(documentId: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(documentId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Delete the artifact for `documentId`.
   * @returns False when nothing was stored.
   */
  public async remove(documentId: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(documentId));
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }

  /** Ids of every stored document, sorted. */
  public async list(): Promise<string[]> {
    const files = await fg(`*${EXTENSION}`, { cwd: this.dir, onlyFiles: true, dot: true });
    const ids: string[] = [];
    for (const file of files) {
      const encoded = file.slice(0, -EXTENSION.length);
      try {
        ids.push(decodeURIComponent(encoded));
      } catch {
        console.error(`[KB] Ignoring unrecognised file in passage store: ${file}`);
      }
    }
    return ids.sort();
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
