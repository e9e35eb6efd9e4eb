/**
 * ConfluenceRagPipeline: framework-free composition of the page source,
 * processor, analyzer and exporters around an in-session corpus.
 *
 * The corpus holds the latest processed version of each page id seen in
 * this session. Nothing is persisted except what `exportCorpus` writes.
 */

import path from "path";
import { PROCESSING_DEFAULTS } from "../config/constants";
import {
  DEFAULT_CONFLUENCE_CONFIG,
  requireCredentials,
  type ConfluenceConfig,
} from "../config/ConfluenceConfig";
import { errorMessage } from "../errors/ConfluenceRagError";
import {
  assignFileStems,
  generateBatchSummary,
  writeDocumentHtml,
  writeDocumentPdf,
  writeJson,
  writeJsonl,
  writeRawPagesCsv,
  type BatchSummary,
} from "../integration/exportDocuments";
import { createLogger, type StructuredLogger } from "../utils/logger";
import { SlidingWindowRateLimiter } from "../utils/rateLimiter";
import { ConfluenceClient } from "./ConfluenceClient";
import { scoreQuality, summarizeCorpus } from "./CorpusAnalyzer";
import type { CorpusSummary, QualityReport } from "./CorpusAnalyzer.types";
import { PrometheusMetrics, type MetricsRecorder } from "./MetricsCollector";
import { PageProcessor } from "./PageProcessor";
import type { ProcessedDocument, RawPage } from "./PageProcessor.types";
import { parseRawPage } from "./parseRawPage";

export type ExportFormat = "html" | "json" | "jsonl" | "csv" | "pdf";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["html", "json", "jsonl", "csv", "pdf"];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface PageFailure {
  pageId: string;
  error: string;
}

export interface ExtractionResult {
  documents: ProcessedDocument[];
  failures: PageFailure[];
}

export interface SpaceExtractionResult extends ExtractionResult {
  spaceKey: string;
  pageCount: number;
}

export interface ExportResult {
  outputDir: string;
  files: string[];
  batch: BatchSummary;
}

export interface PipelineOptions {
  config?: Partial<ConfluenceConfig>;
  client?: ConfluenceClient;
  processor?: PageProcessor;
  metrics?: MetricsRecorder;
  logger?: StructuredLogger;
  batchSize?: number;
}

interface CorpusEntry {
  raw: RawPage;
  document: ProcessedDocument;
}

export class ConfluenceRagPipeline {
  readonly config: ConfluenceConfig;
  readonly metrics: MetricsRecorder;
  private readonly log: StructuredLogger;
  private readonly processor: PageProcessor;
  private readonly batchSize: number;
  private client?: ConfluenceClient;
  private corpus = new Map<string, CorpusEntry>();

  constructor(options: PipelineOptions = {}) {
    this.config = { ...DEFAULT_CONFLUENCE_CONFIG, ...options.config };
    this.metrics = options.metrics ?? new PrometheusMetrics();
    this.log = options.logger ?? createLogger({ component: "ConfluenceRagPipeline" });
    this.processor =
      options.processor ??
      new PageProcessor({
        logger: this.log,
        metrics: this.metrics,
        extractorTimeoutMs: this.config.extractorTimeoutMs,
      });
    this.client = options.client;
    this.batchSize = Math.max(1, options.batchSize ?? PROCESSING_DEFAULTS.PAGE_BATCH_SIZE);
  }

  /** Client built on first use, so analysis works without credentials. */
  private getClient(): ConfluenceClient {
    if (!this.client) {
      this.client = new ConfluenceClient(requireCredentials(this.config), {
        timeoutMs: this.config.requestTimeoutMs,
        rateLimiter: new SlidingWindowRateLimiter(this.config.rateLimit, this.config.rateWindowMs),
        metrics: this.metrics,
        logger: this.log,
      });
    }
    return this.client;
  }

  private remember(raw: RawPage, document: ProcessedDocument): ProcessedDocument {
    this.corpus.set(raw.id, { raw, document });
    return document;
  }

  /** Process pages in bounded concurrent batches; failing pages are recorded and skipped. */
  private async processBatch(pages: readonly RawPage[]): Promise<ExtractionResult> {
    const documents: ProcessedDocument[] = [];
    const failures: PageFailure[] = [];

    for (let i = 0; i < pages.length; i += this.batchSize) {
      const batch = pages.slice(i, i + this.batchSize);
      const settled = await Promise.allSettled(batch.map((page) => this.processor.processPage(page)));
      settled.forEach((outcome, j) => {
        const page = batch[j];
        if (outcome.status === "fulfilled") {
          documents.push(this.remember(page, outcome.value));
        } else {
          this.log.warn("Skipping page that failed to process", { pageId: page.id }, outcome.reason);
          failures.push({ pageId: page.id, error: errorMessage(outcome.reason) });
        }
      });
    }

    return { documents, failures };
  }

  async extractPage(pageId: string): Promise<ProcessedDocument> {
    const raw = await this.getClient().getPage(pageId, {
      includeAttachments: true,
      includeComments: true,
    });
    const document = await this.processor.processPage(raw);
    this.log.info("Extracted page", { pageId, tables: document.tables.length });
    return this.remember(raw, document);
  }

  async extractSpace(spaceKey: string): Promise<SpaceExtractionResult> {
    const pages = await this.getClient().getSpacePages(spaceKey);
    const result = await this.processBatch(pages);
    this.log.info("Extracted space", {
      spaceKey,
      pages: pages.length,
      processed: result.documents.length,
      failed: result.failures.length,
    });
    return { spaceKey, pageCount: pages.length, ...result };
  }

  /**
   * Process untyped page records (e.g. a JSON dump). Records that fail
   * validation are reported alongside pages that fail processing.
   */
  async processRawPages(records: readonly unknown[]): Promise<ExtractionResult> {
    const pages: RawPage[] = [];
    const invalid: PageFailure[] = [];

    records.forEach((record, index) => {
      try {
        pages.push(parseRawPage(record));
      } catch (error) {
        invalid.push({ pageId: `#${index}`, error: errorMessage(error) });
      }
    });

    const result = await this.processBatch(pages);
    return { documents: result.documents, failures: [...invalid, ...result.failures] };
  }

  documents(): ProcessedDocument[] {
    return Array.from(this.corpus.values(), (entry) => entry.document);
  }

  rawPages(): RawPage[] {
    return Array.from(this.corpus.values(), (entry) => entry.raw);
  }

  get size(): number {
    return this.corpus.size;
  }

  summarize(): CorpusSummary {
    return summarizeCorpus(this.documents(), { logger: this.log });
  }

  analyzeQuality(): QualityReport {
    return scoreQuality(this.documents(), { logger: this.log });
  }

  async exportCorpus(
    outputDir: string = this.config.outputDir,
    formats: readonly ExportFormat[] = ["json"]
  ): Promise<ExportResult> {
    const documents = this.documents();
    const files: string[] = [];

    for (const format of new Set(formats)) {
      switch (format) {
        case "json":
          files.push(await writeJson(path.join(outputDir, "documents.json"), documents));
          break;
        case "jsonl":
          files.push(await writeJsonl(path.join(outputDir, "documents.jsonl"), documents));
          break;
        case "csv":
          files.push(await writeRawPagesCsv(path.join(outputDir, "raw_pages.csv"), this.rawPages()));
          break;
        case "html":
          for (const { document, stem } of assignFileStems(documents)) {
            files.push(await writeDocumentHtml(document, path.join(outputDir, "html"), stem));
          }
          break;
        case "pdf":
          for (const { document, stem } of assignFileStems(documents)) {
            files.push(await writeDocumentPdf(document, path.join(outputDir, "pdf"), stem));
          }
          break;
      }
    }

    files.push(
      await writeJson(path.join(outputDir, "summary.json"), {
        summary: this.summarize(),
        quality: this.analyzeQuality(),
      })
    );

    const batch = await generateBatchSummary(outputDir);
    this.log.info("Exported corpus", { outputDir, files: files.length, formats: [...formats] });
    return { outputDir, files, batch };
  }

  clear(): void {
    this.corpus.clear();
    this.client?.clearCache();
  }
}
