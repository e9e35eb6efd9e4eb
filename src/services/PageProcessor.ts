/**
 * PageProcessor: turns one RawPage into a ProcessedDocument.
 *
 * The six stages run concurrently over the same immutable page. A stage that
 * throws or overruns its deadline is logged and replaced by its empty value,
 * so one bad table never costs the page its text. Only a failure while
 * assembling the result surfaces to the caller.
 */

import { PROCESSING_DEFAULTS } from "../config/constants";
import { errorMessage, isConfluenceRagError } from "../errors/ConfluenceRagError";
import { ConfluenceRagProcessingError } from "../errors/ProcessingError";
import { createLogger, type StructuredLogger } from "../utils/logger";
import { raceTimeout } from "../utils/timeout";
import { extractCodeBlocks } from "./CodeBlockExtractor";
import { normalizeHtml } from "./ContentNormalizer";
import type { MetricsRecorder } from "./MetricsCollector";
import { extractMetadata, normalizeAttachments, normalizeComments } from "./PageProjections";
import type {
  CodeBlock,
  ExtractedTable,
  ExtractionStage,
  PageAttachment,
  PageComment,
  PageMetadata,
  ProcessedDocument,
  RawPage,
} from "./PageProcessor.types";
import { extractTables } from "./TableExtractor";

export interface StageOutputs {
  text: string;
  tables: ExtractedTable[];
  codeBlocks: CodeBlock[];
  metadata: Partial<PageMetadata>;
  attachments: PageAttachment[];
  comments: PageComment[];
}

export type StageExtractor<S extends ExtractionStage> = (
  page: RawPage
) => StageOutputs[S] | Promise<StageOutputs[S]>;

export type PageExtractors = { [S in ExtractionStage]: StageExtractor<S> };

export interface PageProcessorOptions {
  logger?: StructuredLogger;
  metrics?: MetricsRecorder;
  /** Deadline for each stage; the stage's field falls back to empty when exceeded */
  extractorTimeoutMs?: number;
  /** Replace individual stages (composition, tests) */
  extractors?: Partial<PageExtractors>;
}

const STAGE_DEFAULTS: { [S in ExtractionStage]: () => StageOutputs[S] } = {
  text: () => "",
  tables: () => [],
  codeBlocks: () => [],
  metadata: () => ({}),
  attachments: () => [],
  comments: () => [],
};

/** Page text without tables; their content is carried in `tables`. */
function pageText(page: RawPage): string {
  return normalizeHtml(page.content, { removeTags: ["table"] });
}

export class PageProcessor {
  private readonly log: StructuredLogger;
  private readonly metrics?: MetricsRecorder;
  private readonly extractorTimeoutMs: number;
  private readonly extractors: PageExtractors;

  constructor(options: PageProcessorOptions = {}) {
    this.log = options.logger ?? createLogger({ component: "PageProcessor" });
    this.metrics = options.metrics;
    this.extractorTimeoutMs = options.extractorTimeoutMs ?? PROCESSING_DEFAULTS.EXTRACTOR_TIMEOUT_MS;

    const log = this.log;
    this.extractors = {
      text: pageText,
      tables: (page: RawPage) => extractTables(page.content, { pageId: page.id, logger: log }),
      codeBlocks: (page: RawPage) => extractCodeBlocks(page.content),
      metadata: (page: RawPage) => extractMetadata(page),
      attachments: normalizeAttachments,
      comments: normalizeComments,
      ...options.extractors,
    };
  }

  private async runStage<S extends ExtractionStage>(stage: S, page: RawPage): Promise<StageOutputs[S]> {
    const extractor: StageExtractor<S> = this.extractors[stage];
    try {
      return await raceTimeout(
        Promise.resolve().then(() => extractor(page)),
        this.extractorTimeoutMs,
        () => ConfluenceRagProcessingError.extractorTimeout(stage, this.extractorTimeoutMs, { pageId: page.id })
      );
    } catch (error) {
      const failure = isConfluenceRagError(error)
        ? error
        : ConfluenceRagProcessingError.extractorFailed(stage, error instanceof Error ? error : undefined, {
            pageId: page.id,
          });
      this.log.warn(
        `Extractor "${stage}" failed, using empty value`,
        { pageId: page.id, stage, error: errorMessage(error), code: failure.code },
        failure
      );
      this.metrics?.recordError?.(`extract_${stage}`);
      return STAGE_DEFAULTS[stage]();
    }
  }

  async processPage(page: RawPage): Promise<ProcessedDocument> {
    const startedAt = Date.now();

    try {
      const [content, tables, codeBlocks, metadata, attachments, comments] = await Promise.all([
        this.runStage("text", page),
        this.runStage("tables", page),
        this.runStage("codeBlocks", page),
        this.runStage("metadata", page),
        this.runStage("attachments", page),
        this.runStage("comments", page),
      ]);

      const document: ProcessedDocument = {
        content,
        metadata,
        tables,
        codeBlocks,
        attachments,
        comments,
      };

      this.metrics?.recordDuration(
        PROCESSING_DEFAULTS.METRIC_PROCESS_PAGE,
        (Date.now() - startedAt) / 1000
      );
      return document;
    } catch (error) {
      this.log.error("Page processing failed", { pageId: page.id }, error);
      throw ConfluenceRagProcessingError.pageFailed(
        page.id,
        error instanceof Error ? error : undefined
      );
    }
  }
}
