import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { HandlerCallback } from "@elizaos/core";
import {
  ExtractConfluencePageAction,
  extractPageIdFromText,
} from "../src/actions/extractConfluencePageAction";
import {
  ExtractConfluenceSpaceAction,
  extractSpaceKeyFromText,
  requestedFormats,
} from "../src/actions/extractConfluenceSpaceAction";
import { AnalyzeConfluenceContentAction } from "../src/actions/analyzeConfluenceContentAction";
import { extractTokenFromText } from "../src/actions/actionSupport";
import { ConfluenceRagPipeline } from "../src/services/ConfluenceRagPipeline";
import { ConfluenceRagNetworkError } from "../src/errors";
import type { ProcessedDocument } from "../src/services/PageProcessor.types";
import { createMessage, createMockRuntime, createSilentLogger } from "./setup";

function makeDoc(overrides: Partial<ProcessedDocument> = {}): ProcessedDocument {
  return {
    content: "Hello world",
    metadata: { id: "123", title: "Runbook" },
    tables: [{ headers: ["A"], data: [["1"]], shape: [1, 1] }],
    codeBlocks: [],
    attachments: [],
    comments: [],
    ...overrides,
  };
}

function setup() {
  const pipeline = new ConfluenceRagPipeline({ logger: createSilentLogger() });
  const runtime = createMockRuntime({ services: { "confluence-rag": { pipeline } } });
  const callback = vi.fn<HandlerCallback>(async () => []);
  return { pipeline, runtime, callback };
}

describe("message parsing", () => {
  it("should find page ids in URLs and text", () => {
    expect(extractPageIdFromText("https://wiki.example.com/wiki/spaces/ENG/pages/123/Runbook")).toBe("123");
    expect(extractPageIdFromText("extract page id: 42")).toBe("42");
    expect(extractPageIdFromText("look at page #7")).toBe("7");
    expect(extractPageIdFromText("no ids here")).toBeNull();
  });

  it("should find space keys in URLs and text", () => {
    expect(extractSpaceKeyFromText("https://wiki.example.com/wiki/spaces/ENG/overview")).toBe("ENG");
    expect(extractSpaceKeyFromText("crawl space key: DOCS")).toBe("DOCS");
    expect(extractSpaceKeyFromText("my space docs")).toBeNull();
  });

  it("should read export formats from content or text", () => {
    expect(requestedFormats(createMessage("", { formats: ["jsonl", "docx"] }))).toEqual(["jsonl"]);
    expect(requestedFormats(createMessage("export space ENG as pdf"))).toEqual(["pdf"]);
    expect(requestedFormats(createMessage("export space ENG as csv and html"))).toEqual(["html", "csv"]);
    expect(requestedFormats(createMessage("export space ENG"))).toEqual(["json"]);
    expect(requestedFormats(createMessage("crawl space ENG"))).toEqual([]);
  });

  it("should extract auth tokens", () => {
    expect(extractTokenFromText("extract page 1 with token: test-secret")).toBe("test-secret");
    expect(extractTokenFromText("extract page 1")).toBeNull();
    expect(extractTokenFromText("crawl space key: DOCS")).toBeNull();
  });
});

describe("EXTRACT_CONFLUENCE_PAGE", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.CONFLUENCE_RAG_AUTH_ENABLED;
    delete process.env.CONFLUENCE_RAG_AUTH_TOKEN;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should validate on a page reference or a pageId argument", async () => {
    const runtime = createMockRuntime();
    expect(await ExtractConfluencePageAction.validate(runtime, createMessage("extract confluence page 123"))).toBe(true);
    expect(await ExtractConfluencePageAction.validate(runtime, createMessage("", { pageId: "9" }))).toBe(true);
    expect(await ExtractConfluencePageAction.validate(runtime, createMessage("hello there"))).toBe(false);
  });

  it("should extract the page and report counts", async () => {
    const { pipeline, runtime, callback } = setup();
    const extractPage = vi.spyOn(pipeline, "extractPage").mockResolvedValue(makeDoc());

    const result = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract confluence page 123"),
      undefined,
      undefined,
      callback
    );

    const text =
      'Extracted "Runbook" (page 123): 2 words, 1 table(s), 0 code block(s), 0 comment(s), 0 attachment(s).';
    expect(extractPage).toHaveBeenCalledWith("123");
    expect(result).toMatchObject({ success: true, text, data: { pageId: "123", words: 2, tables: 1 } });
    expect(callback).toHaveBeenCalledWith({ text, action: "EXTRACT_CONFLUENCE_PAGE" });
  });

  it("should ask for a token when auth is enabled", async () => {
    process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
    process.env.CONFLUENCE_RAG_AUTH_TOKEN = "test-secret";
    const { pipeline, runtime, callback } = setup();
    const extractPage = vi.spyOn(pipeline, "extractPage").mockResolvedValue(makeDoc());

    const result = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract confluence page 123"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({ success: false, data: { error: "auth_required", needsToken: true } });
    expect(extractPage).not.toHaveBeenCalled();
  });

  it("should reject a wrong token and accept the right one", async () => {
    process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
    process.env.CONFLUENCE_RAG_AUTH_TOKEN = "test-secret";
    const { pipeline, runtime, callback } = setup();
    vi.spyOn(pipeline, "extractPage").mockResolvedValue(makeDoc());

    const denied = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract confluence page 123 token: wrong"),
      undefined,
      undefined,
      callback
    );
    expect(denied).toMatchObject({
      success: false,
      text: "Invalid auth token. Access denied.",
      data: { error: "auth_failed" },
    });

    const allowed = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract confluence page 123", { authToken: "test-secret" }),
      undefined,
      undefined,
      callback
    );
    expect(allowed).toMatchObject({ success: true });
  });

  it("should report a missing page id", async () => {
    const { runtime, callback } = setup();

    const result = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract something"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({ success: false, data: { error: "missing_page_id" } });
  });

  it("should report a missing service", async () => {
    const result = await ExtractConfluencePageAction.handler(
      createMockRuntime(),
      createMessage("extract confluence page 123"),
      undefined,
      undefined,
      undefined
    );

    expect(result).toMatchObject({
      success: false,
      text: "Confluence service is not available.",
      data: { error: "service_unavailable" },
    });
  });

  it("should turn Confluence errors into a failed result", async () => {
    const { pipeline, runtime, callback } = setup();
    vi.spyOn(pipeline, "extractPage").mockRejectedValue(
      ConfluenceRagNetworkError.apiError("content/123", 404, "Not Found")
    );

    const result = await ExtractConfluencePageAction.handler(
      runtime,
      createMessage("extract confluence page 123"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({
      success: false,
      text: "Confluence resource not found: content/123",
      data: { pageId: "123", error: "ConfluenceRagNetworkError", code: 2011 },
    });
  });
});

describe("EXTRACT_CONFLUENCE_SPACE", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.CONFLUENCE_RAG_AUTH_ENABLED;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should validate on a space reference", async () => {
    const runtime = createMockRuntime();
    expect(await ExtractConfluenceSpaceAction.validate(runtime, createMessage("crawl the confluence space ENG"))).toBe(true);
    expect(await ExtractConfluenceSpaceAction.validate(runtime, createMessage("", { spaceKey: "ENG" }))).toBe(true);
    expect(await ExtractConfluenceSpaceAction.validate(runtime, createMessage("crawl the space"))).toBe(false);
  });

  it("should ask for a token rather than read a space key as one", async () => {
    process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
    process.env.CONFLUENCE_RAG_AUTH_TOKEN = "test-secret";
    const { pipeline, runtime, callback } = setup();
    const extractSpace = vi.spyOn(pipeline, "extractSpace");

    const result = await ExtractConfluenceSpaceAction.handler(
      runtime,
      createMessage("extract confluence space key: DOCS"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({ success: false, data: { error: "auth_required", needsToken: true } });
    expect(extractSpace).not.toHaveBeenCalled();
  });

  it("should extract the space and list failures", async () => {
    const { pipeline, runtime, callback } = setup();
    vi.spyOn(pipeline, "extractSpace").mockResolvedValue({
      spaceKey: "ENG",
      pageCount: 3,
      documents: [makeDoc(), makeDoc({ metadata: { id: "2" } })],
      failures: [{ pageId: "3", error: "boom" }],
    });
    const exportCorpus = vi.spyOn(pipeline, "exportCorpus");

    const result = await ExtractConfluenceSpaceAction.handler(
      runtime,
      createMessage("crawl confluence space ENG"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({
      success: true,
      text: "Extracted 2 of 3 page(s) from space ENG.\nFailed: 3",
      data: { spaceKey: "ENG", pageCount: 3, processed: 2, exportedFiles: [] },
    });
    expect(exportCorpus).not.toHaveBeenCalled();
  });

  it("should export in the requested formats", async () => {
    const { pipeline, runtime, callback } = setup();
    vi.spyOn(pipeline, "extractSpace").mockResolvedValue({
      spaceKey: "ENG",
      pageCount: 1,
      documents: [makeDoc()],
      failures: [],
    });
    const exportCorpus = vi.spyOn(pipeline, "exportCorpus").mockResolvedValue({
      outputDir: "output",
      files: ["output/raw_pages.csv", "output/summary.json"],
      batch: {
        totalFiles: 2,
        successfulFiles: 2,
        failedFiles: 0,
        fileTypes: { ".csv": 1, ".json": 1 },
        totalSize: 1024,
        totalSizeReadable: "1.00 KB",
        processingErrors: [],
        generatedAt: "2024-06-01T00:00:00.000Z",
      },
    });

    const result = await ExtractConfluenceSpaceAction.handler(
      runtime,
      createMessage("export confluence space ENG as csv"),
      undefined,
      undefined,
      callback
    );

    expect(exportCorpus).toHaveBeenCalledWith(undefined, ["csv"]);
    expect(result).toMatchObject({
      success: true,
      text: "Extracted 1 of 1 page(s) from space ENG.\nExported 2 file(s) to output (1.00 KB).",
    });
  });
});

describe("ANALYZE_CONFLUENCE_CONTENT", () => {
  it("should validate on analysis requests about the corpus", async () => {
    const runtime = createMockRuntime();
    expect(await AnalyzeConfluenceContentAction.validate(runtime, createMessage("analyze the confluence corpus"))).toBe(true);
    expect(await AnalyzeConfluenceContentAction.validate(runtime, createMessage("show wiki stats"))).toBe(true);
    expect(await AnalyzeConfluenceContentAction.validate(runtime, createMessage("analyze this"))).toBe(false);
  });

  it("should explain an empty corpus", async () => {
    const { runtime, callback } = setup();

    const result = await AnalyzeConfluenceContentAction.handler(
      runtime,
      createMessage("analyze confluence"),
      undefined,
      undefined,
      callback
    );

    expect(result).toMatchObject({
      success: true,
      text: "No Confluence pages extracted yet. Use EXTRACT_CONFLUENCE_PAGE or EXTRACT_CONFLUENCE_SPACE first.",
      data: { totalPages: 0 },
    });
  });

  it("should report summary and quality", async () => {
    const { pipeline, runtime, callback } = setup();
    await pipeline.processRawPages([
      { id: "1", title: "One", content: "<p>Hello world.</p>", lastModified: "2024-01-01" },
    ]);

    const result = await AnalyzeConfluenceContentAction.handler(
      runtime,
      createMessage("analyze confluence"),
      undefined,
      undefined,
      callback
    );

    const text = [
      "Confluence corpus: 1 page(s), 2 words",
      "- tables: 0 (0/page)",
      "- code blocks: 0 (0/page)",
      "- comments: 0 (0/page)",
      "- words per page: 2",
      "- last modified: 2024-01-01 → 2024-01-01",
      "Quality score: 50.0 (readability 100.0, content 40.0, metadata 60.0, formatting 0.0)",
    ].join("\n");
    expect(result).toMatchObject({ success: true, text, data: { qualityScore: 50 } });
  });
});
