import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback } from "@elizaos/core";
import { getPipeline } from "../services/ConfluenceService";
import type { CorpusSummary, QualityReport } from "../services/CorpusAnalyzer.types";
import { failure, messageText, respond, serviceUnavailable } from "./actionSupport";

const ACTION_NAME = "ANALYZE_CONFLUENCE_CONTENT";

function formatReport(summary: CorpusSummary, quality: QualityReport): string {
  const oneDecimal = (n: number) => n.toFixed(1);
  const range = summary.dateRange.oldestPage
    ? `${summary.dateRange.oldestPage} → ${summary.dateRange.newestPage}`
    : "unknown";

  return [
    `Confluence corpus: ${summary.totalPages} page(s), ${summary.totalWords} words`,
    `- tables: ${summary.totalTables} (${summary.averages.tablesPerPage}/page)`,
    `- code blocks: ${summary.totalCodeBlocks} (${summary.averages.codeBlocksPerPage}/page)`,
    `- comments: ${summary.totalComments} (${summary.averages.commentsPerPage}/page)`,
    `- words per page: ${summary.averages.wordsPerPage}`,
    `- last modified: ${range}`,
    `Quality score: ${oneDecimal(quality.qualityScore)} ` +
      `(readability ${oneDecimal(quality.averages.readability)}, ` +
      `content ${oneDecimal(quality.averages.contentCompleteness)}, ` +
      `metadata ${oneDecimal(quality.averages.metadataCompleteness)}, ` +
      `formatting ${oneDecimal(quality.averages.formattingQuality)})`,
  ].join("\n");
}

export const AnalyzeConfluenceContentAction: Action = {
  name: ACTION_NAME,
  description:
    "Summarize the Confluence pages extracted in this session and score their content quality. No auth required (read-only).",
  similes: ["CONFLUENCE_STATS", "SUMMARIZE_CONFLUENCE", "CONFLUENCE_QUALITY", "CORPUS_SUMMARY"],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    return /\b(analy[sz]e|summar|quality|stats|statistics)/i.test(text) && /confluence|corpus|wiki/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    _message: Memory,
    _state: State | undefined,
    _options: unknown,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const pipeline = getPipeline(runtime);
    if (!pipeline) return serviceUnavailable(ACTION_NAME, callback);

    if (pipeline.size === 0) {
      return respond(
        callback,
        ACTION_NAME,
        true,
        "No Confluence pages extracted yet. Use EXTRACT_CONFLUENCE_PAGE or EXTRACT_CONFLUENCE_SPACE first.",
        { totalPages: 0 }
      );
    }

    try {
      const summary = pipeline.summarize();
      const quality = pipeline.analyzeQuality();
      return respond(callback, ACTION_NAME, true, formatReport(summary, quality), {
        summary,
        averages: quality.averages,
        ranges: quality.ranges,
        qualityScore: quality.qualityScore,
      });
    } catch (error) {
      return failure(error, ACTION_NAME, callback, { corpusSize: pipeline.size });
    }
  },
};
