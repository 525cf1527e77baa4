/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env next to package.json, else dotenv default).
 * 2. Open the passage store under DATA_DIR and wire up the knowledgebase.
 * 3. If PDF_DIR is set, ingest every PDF below it that is not indexed yet.
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default), for local editor / agent integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http), which also serves /health.
 *
 * Indexes are built lazily: a document stored by an earlier run is rebuilt from its
 * passages on its first query, so startup does not scan DATA_DIR.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DATA_DIR         Passage store directory (default ./data/passages).
 *  - PDF_DIR          Directory of PDFs to ingest at startup.
 *  - CHUNK_SIZE       Max characters per passage (default 1000, hard cap 8000).
 *  - CHUNK_OVERLAP    Overlap characters between adjacent passages (default 100).
 *  - DEFAULT_TOP_K    Passages returned when a query omits top_k (default 3).
 *  - VERBOSE          '1'/'true'/'yes'/'on' enables extra logging.
 *  - MCP_TRANSPORT    'stdio' (default) or 'http'/'streamable-http'.
 *  - MCP_PORT, HOST, ALLOWED_HOSTS, ENABLE_DNS_REBINDING_PROTECTION (HTTP only).
 */
import { getConfig } from "./config";
import { Knowledgebase } from "./knowledgebase";
import { PdfExtractor } from "./pdf-extractor";
import { createServer } from "./server";
import { StatusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const { DATA_DIR, PDF_DIR, VERBOSE, CHUNK_SIZE, CHUNK_OVERLAP, DEFAULT_TOP_K, MCP_TRANSPORT } =
  getConfig();

const status = new StatusManager({ dataDir: DATA_DIR });
const kb = new Knowledgebase({
  dataDir: DATA_DIR,
  extractor: new PdfExtractor(VERBOSE),
  chunkSize: CHUNK_SIZE,
  chunkOverlap: CHUNK_OVERLAP,
  defaultTopK: DEFAULT_TOP_K,
  status,
  verbose: VERBOSE,
});
console.error(`[KB] Passage store at ${DATA_DIR}`);

if (PDF_DIR) {
  await kb.ingestDirectory(PDF_DIR);
}
status.markReady();

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  status.markTransport("http");
  await startHttpTransport(() => createServer(kb), status);
} else {
  status.markTransport("stdio");
  await startStdioTransport(() => createServer(kb));
}
