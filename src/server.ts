import { z } from "zod";
import { APP_VERSION } from "./config";
import type { Knowledgebase } from "./knowledgebase";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
} from "./mcp-sdk";
import { InvalidDocumentIdError, PassageStoreWriteError } from "./passage-store";
import { PdfExtractionError } from "./pdf-extractor";
import { InvalidSegmentationError } from "./segmenter";

const documentId = z.string().min(1, "documentId must not be empty");

const IndexPdfArgs = z.object({ documentId, path: z.string().min(1) });
const IndexTextArgs = z.object({
  documentId,
  text: z.string(),
  maxChars: z.number().int().positive().optional(),
  overlap: z.number().int().nonnegative().optional(),
});
const IndexPassagesArgs = z.object({ documentId, passages: z.array(z.string()) });
const QueryArgs = z.object({
  documentId,
  question: z.string(),
  top_k: z.number().int().optional(),
});
const RemoveArgs = z.object({ documentId });

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, detail);
  }
  return parsed.data;
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value) }] };
}

/** Map domain failures onto MCP error codes; anything unrecognised is internal. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof InvalidSegmentationError || e instanceof InvalidDocumentIdError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  if (e instanceof PdfExtractionError) {
    return new McpError(ErrorCode.InvalidRequest, e.message);
  }
  if (e instanceof PassageStoreWriteError) {
    return new McpError(ErrorCode.InternalError, e.message);
  }
  const message = e instanceof Error ? e.message : String(e);
  return new McpError(ErrorCode.InternalError, message);
}

/**
 * Factory for an MCP Server exposing the knowledgebase as tools. A fresh server is
 * created per transport session; the knowledgebase (and its index cache) is shared.
 *
 * Tool contracts:
 *  kb_index_pdf       { documentId, path }                        -> { documentId, passageCount }
 *  kb_index_text      { documentId, text, maxChars?, overlap? }    -> { documentId, passageCount }
 *  kb_index_passages  { documentId, passages }                    -> { documentId, passageCount }
 *  kb_query           { documentId, question, top_k? }            -> { matches: [{ text, score, position }] }
 *  kb_list_documents  {}                                          -> { documents }
 *  kb_remove_document { documentId }                              -> { removed }
 */
export function createServer(kb: Knowledgebase): Server {
  const server = new Server(
    { name: "pdf-kb-retrieval-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const documentIdProp = {
      type: "string",
      description: "Caller-assigned identifier of the knowledgebase document.",
    };
    return {
      tools: [
        {
          name: "kb_index_pdf",
          description:
            "Extract the text of a PDF on the server's filesystem, split it into overlapping passages and (re)index it under documentId, replacing any previous content.",
          inputSchema: {
            type: "object",
            properties: {
              documentId: documentIdProp,
              path: { type: "string", description: "Path to the PDF file." },
            },
            required: ["documentId", "path"],
          },
        },
        {
          name: "kb_index_text",
          description:
            "Split already-normalized text into overlapping passages and (re)index it under documentId.",
          inputSchema: {
            type: "object",
            properties: {
              documentId: documentIdProp,
              text: { type: "string", description: "Whitespace-normalized document text." },
              maxChars: {
                type: "number",
                description: "Maximum characters per passage (server default if omitted).",
                minimum: 1,
              },
              overlap: {
                type: "number",
                description: "Characters shared between consecutive passages; must be < maxChars.",
                minimum: 0,
              },
            },
            required: ["documentId", "text"],
          },
        },
        {
          name: "kb_index_passages",
          description: "(Re)index documentId with an explicit list of passages.",
          inputSchema: {
            type: "object",
            properties: {
              documentId: documentIdProp,
              passages: { type: "array", items: { type: "string" } },
            },
            required: ["documentId", "passages"],
          },
        },
        {
          name: "kb_query",
          description:
            "Return the passages of a document most relevant to a question, ranked by TF-IDF cosine similarity. Unknown documents return no matches.",
          inputSchema: {
            type: "object",
            properties: {
              documentId: documentIdProp,
              question: { type: "string", description: "Free-text question." },
              top_k: {
                type: "number",
                description:
                  "Number of passages to return; clamped to at least 1 and at most the passage count.",
              },
            },
            required: ["documentId", "question"],
          },
        },
        {
          name: "kb_list_documents",
          description: "List the ids of all documents with stored passages.",
          inputSchema: { type: "object", properties: {} },
        },
        {
          name: "kb_remove_document",
          description: "Delete a document's stored passages and drop its cached index.",
          inputSchema: {
            type: "object",
            properties: { documentId: documentIdProp },
            required: ["documentId"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const args = req.params.arguments;
    try {
      switch (req.params.name) {
        case "kb_index_pdf": {
          const a = parseArgs(IndexPdfArgs, args);
          return jsonResult(await kb.ingestPdf(a.documentId, a.path));
        }
        case "kb_index_text": {
          const a = parseArgs(IndexTextArgs, args);
          return jsonResult(
            await kb.indexText(a.documentId, a.text, { maxChars: a.maxChars, overlap: a.overlap }),
          );
        }
        case "kb_index_passages": {
          const a = parseArgs(IndexPassagesArgs, args);
          return jsonResult(await kb.indexPassages(a.documentId, a.passages));
        }
        case "kb_query": {
          const a = parseArgs(QueryArgs, args);
          const matches = await kb.query(a.documentId, a.question, a.top_k);
          return jsonResult({ matches });
        }
        case "kb_list_documents":
          return jsonResult({ documents: await kb.listDocuments() });
        case "kb_remove_document": {
          const a = parseArgs(RemoveArgs, args);
          return jsonResult({ removed: await kb.removeDocument(a.documentId) });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      const err = toMcpError(e);
      if (err.code === ErrorCode.InternalError) console.error(`[KB] Tool ${req.params.name} failed:`, e);
      throw err;
    }
  });

  return server;
}
