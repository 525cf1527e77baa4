import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env next to package.json, otherwise fall back to dotenv's own lookup.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[KB] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;
export const DEFAULT_TOP_K = 3;

export interface Config {
  DATA_DIR: string;
  PDF_DIR: string | undefined;
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  DEFAULT_TOP_K: number;
  MCP_TRANSPORT: string;
}

function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function parseInteger(
  raw: string | undefined,
  fallback: number,
  { min, max }: { min: number; max: number },
): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const n = Number(trimmed);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

/**
 * Build a {@link Config} from an environment map. Pure apart from logging, so it can be
 * exercised with hand-made env objects.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const DATA_DIR = path.resolve(env.DATA_DIR?.trim() || "./data/passages");

  // Ingested once at startup when set; documents already in DATA_DIR are skipped.
  const pdfDir = env.PDF_DIR?.trim();
  const PDF_DIR = pdfDir ? path.resolve(pdfDir) : undefined;

  const VERBOSE = parseFlag(env.VERBOSE);

  const CHUNK_SIZE = parseInteger(env.CHUNK_SIZE, DEFAULT_CHUNK_SIZE, { min: 1, max: 8000 });
  let CHUNK_OVERLAP = parseInteger(env.CHUNK_OVERLAP, DEFAULT_CHUNK_OVERLAP, {
    min: 0,
    max: 4000,
  });
  // The segmenter rejects overlap >= size outright; config degrades instead of refusing to start.
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[KB] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  const topK = parseInteger(env.DEFAULT_TOP_K, DEFAULT_TOP_K, { min: 1, max: 50 });

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    DATA_DIR,
    PDF_DIR,
    VERBOSE,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    DEFAULT_TOP_K: topK,
    MCP_TRANSPORT,
  };
}

export function getConfig(): Config {
  return parseConfig(process.env);
}
