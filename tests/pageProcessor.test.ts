import { describe, it, expect, vi } from "vitest";
import { PageProcessor } from "../src/services/PageProcessor";
import { ConfluenceRagProcessingError, ErrorCode } from "../src/errors";
import type { CodeBlock } from "../src/services/PageProcessor.types";
import { createSilentLogger, makePage } from "./setup";

const PAGE_HTML = "<p>Hello</p><table><tr><th>A</th></tr><tr><td>1</td></tr></table>";

describe("PageProcessor", () => {
  it("should assemble a document from every stage", async () => {
    const processor = new PageProcessor({ logger: createSilentLogger() });
    const doc = await processor.processPage(makePage({ content: PAGE_HTML }));

    expect(doc.content).toBe("Hello");
    expect(doc.tables).toEqual([{ headers: ["A"], data: [["1"]], shape: [1, 1] }]);
    expect(doc.codeBlocks).toEqual([]);
    expect(doc.metadata.id).toBe("1");
    expect(doc.metadata.source).toBe("confluence");
    expect(doc.attachments).toEqual([]);
    expect(doc.comments).toEqual([]);
  });

  it("should give an empty page empty fields", async () => {
    const processor = new PageProcessor({ logger: createSilentLogger() });
    const doc = await processor.processPage(makePage());

    expect(doc.content).toBe("");
    expect(doc.tables).toEqual([]);
    expect(doc.codeBlocks).toEqual([]);
  });

  it("should replace a failing extractor with its empty value", async () => {
    const logger = createSilentLogger();
    const metrics = { recordDuration: vi.fn(), recordError: vi.fn() };
    const processor = new PageProcessor({
      logger,
      metrics,
      extractors: {
        tables: () => {
          throw new Error("boom");
        },
      },
    });

    const doc = await processor.processPage(makePage({ content: PAGE_HTML }));

    expect(doc.tables).toEqual([]);
    expect(doc.content).toBe("Hello");
    expect(logger.warn).toHaveBeenCalledWith(
      'Extractor "tables" failed, using empty value',
      { pageId: "1", stage: "tables", error: "boom", code: ErrorCode.EXTRACTOR_FAILED },
      expect.any(ConfluenceRagProcessingError)
    );
    expect(metrics.recordError).toHaveBeenCalledWith("extract_tables");
  });

  it("should log a failing extractor as an extractor error wrapping the cause", async () => {
    const logger = createSilentLogger();
    const cause = new Error("bad markup");
    const processor = new PageProcessor({
      logger,
      extractors: {
        codeBlocks: () => {
          throw cause;
        },
      },
    });

    await processor.processPage(makePage({ id: "5" }));

    const [, , logged] = vi.mocked(logger.warn).mock.calls[0] ?? [];
    expect(logged).toBeInstanceOf(ConfluenceRagProcessingError);
    expect(logged).toMatchObject({
      code: ErrorCode.EXTRACTOR_FAILED,
      pageId: "5",
      cause,
      message: 'Extractor "codeBlocks" failed: bad markup',
    });
  });

  it("should fall back to an empty object for failed metadata", async () => {
    const processor = new PageProcessor({
      logger: createSilentLogger(),
      extractors: {
        metadata: async () => {
          throw new Error("no metadata");
        },
      },
    });

    const doc = await processor.processPage(makePage({ content: PAGE_HTML }));
    expect(doc.metadata).toEqual({});
    expect(doc.content).toBe("Hello");
  });

  it("should time out a stage that never settles", async () => {
    const logger = createSilentLogger();
    const processor = new PageProcessor({
      logger,
      extractorTimeoutMs: 20,
      extractors: {
        codeBlocks: () => new Promise<CodeBlock[]>(() => {}),
      },
    });

    const doc = await processor.processPage(makePage({ content: "<pre>x</pre>" }));

    expect(doc.codeBlocks).toEqual([]);
    expect(doc.content).toBe("x");
    expect(logger.warn).toHaveBeenCalledWith(
      'Extractor "codeBlocks" failed, using empty value',
      {
        pageId: "1",
        stage: "codeBlocks",
        error: 'Extractor "codeBlocks" did not finish within 20ms',
        code: ErrorCode.EXTRACTOR_TIMEOUT,
      },
      expect.any(ConfluenceRagProcessingError)
    );
  });

  it("should accept async replacement extractors", async () => {
    const processor = new PageProcessor({
      logger: createSilentLogger(),
      extractors: {
        text: async (page) => `custom:${page.id}`,
      },
    });

    const doc = await processor.processPage(makePage({ id: "9" }));
    expect(doc.content).toBe("custom:9");
  });

  it("should record the processing duration", async () => {
    const metrics = { recordDuration: vi.fn() };
    const processor = new PageProcessor({ logger: createSilentLogger(), metrics });

    await processor.processPage(makePage());

    expect(metrics.recordDuration).toHaveBeenCalledTimes(1);
    expect(metrics.recordDuration).toHaveBeenCalledWith("process_page", expect.any(Number));
  });

  it("should surface assembly failures as processing errors", async () => {
    const logger = createSilentLogger();
    const processor = new PageProcessor({
      logger,
      metrics: {
        recordDuration: () => {
          throw new Error("metrics down");
        },
      },
    });

    const result = processor.processPage(makePage({ id: "77" }));

    await expect(result).rejects.toBeInstanceOf(ConfluenceRagProcessingError);
    await expect(result).rejects.toMatchObject({
      code: ErrorCode.PROCESSING_FAILED,
      pageId: "77",
      message: "Failed to process page: metrics down",
    });
    expect(logger.error).toHaveBeenCalledWith("Page processing failed", { pageId: "77" }, expect.any(Error));
  });

  it("should not mutate the input page", async () => {
    const page = makePage({ content: PAGE_HTML, comments: [{ id: "c", content: "<b>hi</b>" }] });
    const before = JSON.stringify(page);

    await new PageProcessor({ logger: createSilentLogger() }).processPage(page);

    expect(JSON.stringify(page)).toBe(before);
  });
});
