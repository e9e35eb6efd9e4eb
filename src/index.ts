import type { Plugin, IAgentRuntime } from "@elizaos/core";

import { ConfluenceService } from "./services/ConfluenceService";

import { ExtractConfluencePageAction } from "./actions/extractConfluencePageAction";
import { ExtractConfluenceSpaceAction } from "./actions/extractConfluenceSpaceAction";
import { AnalyzeConfluenceContentAction } from "./actions/analyzeConfluenceContentAction";

import { confluenceCorpusProvider } from "./providers/confluenceCorpusProvider";

import { getConfluenceConfig } from "./config/ConfluenceConfig";
import { createLogger } from "./utils/logger";

const log = createLogger({ component: "plugin" });

/**
 * Plugin initialization. Credentials are optional at load time; without
 * them only analysis of already-processed pages is available.
 */
async function initPlugin(_config: Record<string, string>, runtime: IAgentRuntime): Promise<void> {
  const config = getConfluenceConfig(runtime);
  if (!config.baseUrl || !config.username || !config.apiToken) {
    log.warn("Confluence credentials not configured; extraction actions will fail until they are set", {
      baseUrl: config.baseUrl ?? null,
    });
    return;
  }
  log.info("Plugin loaded", { baseUrl: config.baseUrl, outputDir: config.outputDir });
}

export const confluenceRagPlugin: Plugin = {
  name: "confluence-rag",
  description:
    "Confluence → RAG extraction. Fetches pages or whole spaces, normalizes them into flat documents " +
    "(text, tables, code blocks, metadata, comments) and reports corpus and content-quality statistics.",
  init: initPlugin,
  services: [ConfluenceService],
  actions: [
    ExtractConfluencePageAction,
    ExtractConfluenceSpaceAction,
    AnalyzeConfluenceContentAction,
  ],
  providers: [confluenceCorpusProvider],
};

export default confluenceRagPlugin;

// ============================================================================
// RE-EXPORTS (for external consumers)
// ============================================================================

// Processing core
export { normalizeHtml, type NormalizeOptions } from "./services/ContentNormalizer";
export { extractTables, type TableExtractionOptions } from "./services/TableExtractor";
export { extractCodeBlocks } from "./services/CodeBlockExtractor";
export { extractMetadata, normalizeAttachments, normalizeComments } from "./services/PageProjections";
export {
  PageProcessor,
  type PageProcessorOptions,
  type PageExtractors,
  type StageExtractor,
  type StageOutputs,
} from "./services/PageProcessor";
export { parseRawPage } from "./services/parseRawPage";
export {
  summarizeCorpus,
  scoreQuality,
  readabilityScore,
  countWords,
  parseTimestamp,
  type AnalyzerOptions,
} from "./services/CorpusAnalyzer";
export {
  PrometheusMetrics,
  DURATION_METRIC,
  ERROR_METRIC,
  type MetricsRecorder,
  type MetricsSnapshot,
  type PrometheusMetricsOptions,
} from "./services/MetricsCollector";

// Source, pipeline, exports
export { ConfluenceClient, type ConfluenceClientOptions, type GetPageOptions } from "./services/ConfluenceClient";
export {
  ConfluenceRagPipeline,
  EXPORT_FORMATS,
  type ExportFormat,
  type ExportResult,
  type ExtractionResult,
  type SpaceExtractionResult,
  type PageFailure,
  type PipelineOptions,
} from "./services/ConfluenceRagPipeline";
export { ConfluenceService, getPipeline } from "./services/ConfluenceService";
export {
  renderDocumentHtml,
  renderDocumentPdf,
  assignFileStems,
  writeDocumentHtml,
  writeDocumentPdf,
  writeJson,
  writeJsonl,
  writeRawPagesCsv,
  generateBatchSummary,
  formatSize,
  type BatchSummary,
} from "./integration/exportDocuments";

// Types
export type {
  RawPage,
  RawAttachment,
  RawComment,
  ProcessedDocument,
  PageMetadata,
  ExtractedTable,
  CodeBlock,
  PageAttachment,
  PageComment,
  ExtractionStage,
} from "./services/PageProcessor.types";
export type {
  CorpusSummary,
  CorpusAverages,
  CorpusDateRange,
  QualityReport,
  QualityMetric,
  QualityRange,
} from "./services/CorpusAnalyzer.types";

// Config
export {
  getConfluenceConfig,
  requireCredentials,
  DEFAULT_CONFLUENCE_CONFIG,
  type ConfluenceConfig,
  type ConfluenceCredentials,
  type SettingsSource,
} from "./config/ConfluenceConfig";

// Error types
export {
  ConfluenceRagError,
  ConfluenceRagNetworkError,
  ConfluenceRagValidationError,
  ConfluenceRagProcessingError,
  ConfluenceRagAnalysisError,
  ConfluenceRagConfigurationError,
  ConfluenceRagAuthError,
  ErrorCode,
  wrapError,
  isConfluenceRagError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { validateToken, requireValidToken, isAuthEnabled } from "./auth/validateToken";
export { logger, createLogger, type LogLevel, type LogEntry, type StructuredLogger } from "./utils/logger";
export { TtlCache, cacheKey } from "./utils/ttlCache";
export { SlidingWindowRateLimiter } from "./utils/rateLimiter";
