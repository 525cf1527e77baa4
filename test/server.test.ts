import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Knowledgebase } from "../src/knowledgebase";
import { PdfExtractor } from "../src/pdf-extractor";
import { InvalidDocumentIdError, PassageStoreWriteError } from "../src/passage-store";
import { createServer, toMcpError } from "../src/server";

let root: string;
let client: Client;

async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const res = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = res.content[0];
  if (first?.type !== "text") throw new Error(`Unexpected content from ${name}`);
  return JSON.parse(first.text);
}

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "kb-server-"));
  const kb = new Knowledgebase({
    dataDir: path.join(root, "passages"),
    extractor: new PdfExtractor(),
    defaultTopK: 3,
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createServer(kb).connect(serverTransport);
  client = new Client({ name: "kb-test-client", version: "0.0.0" });
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await fs.rm(root, { recursive: true, force: true });
});

describe("MCP tools", () => {
  it("lists every knowledgebase tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual([
      "kb_index_pdf",
      "kb_index_text",
      "kb_index_passages",
      "kb_query",
      "kb_list_documents",
      "kb_remove_document",
    ]);
  });

  it("indexes passages and ranks them for a question", async () => {
    expect(
      await callJson("kb_index_passages", {
        documentId: "pets",
        passages: ["the cat sat", "the cat sat on the mat", "dog"],
      }),
    ).toEqual({ documentId: "pets", passageCount: 3 });

    expect(await callJson("kb_query", { documentId: "pets", question: "cat mat", top_k: 2 })).toEqual({
      matches: [
        { text: "the cat sat on the mat", score: expect.any(Number), position: 1 },
        { text: "the cat sat", score: expect.any(Number), position: 0 },
      ],
    });
  });

  it("indexes raw text with a custom window", async () => {
    expect(
      await callJson("kb_index_text", { documentId: "letters", text: "abcdef", maxChars: 4, overlap: 1 }),
    ).toEqual({ documentId: "letters", passageCount: 2 });
  });

  it("returns no matches for an unknown document", async () => {
    expect(await callJson("kb_query", { documentId: "nobody", question: "anything" })).toEqual({
      matches: [],
    });
  });

  it("lists and removes documents", async () => {
    await callJson("kb_index_passages", { documentId: "b", passages: ["beta"] });
    await callJson("kb_index_passages", { documentId: "a", passages: ["alpha"] });
    expect(await callJson("kb_list_documents")).toEqual({ documents: ["a", "b"] });
    expect(await callJson("kb_remove_document", { documentId: "a" })).toEqual({ removed: true });
    expect(await callJson("kb_remove_document", { documentId: "a" })).toEqual({ removed: false });
    expect(await callJson("kb_list_documents")).toEqual({ documents: ["b"] });
  });

  it("rejects invalid arguments", async () => {
    await expect(
      client.callTool({ name: "kb_query", arguments: { documentId: "", question: "x" } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(
      client.callTool({ name: "kb_index_passages", arguments: { documentId: "d", passages: "nope" } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("maps segmentation errors to invalid params", async () => {
    await expect(
      client.callTool({
        name: "kb_index_text",
        arguments: { documentId: "d", text: "abc", maxChars: 5, overlap: 5 },
      }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("maps PDF failures to invalid request", async () => {
    await expect(
      client.callTool({
        name: "kb_index_pdf",
        arguments: { documentId: "d", path: path.join(root, "missing.pdf") },
      }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });
  });

  it("rejects unknown tools", async () => {
    await expect(client.callTool({ name: "kb_nope", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });
});

describe("toMcpError", () => {
  it("maps caller mistakes to invalid params and storage failures to internal errors", () => {
    expect(toMcpError(new InvalidDocumentIdError("")).code).toBe(ErrorCode.InvalidParams);
    expect(toMcpError(new PassageStoreWriteError("d", new Error("disk full"))).code).toBe(
      ErrorCode.InternalError,
    );
    expect(toMcpError("boom").code).toBe(ErrorCode.InternalError);
  });
});
