import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback } from "@elizaos/core";
import { getPipeline } from "../services/ConfluenceService";
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from "../services/ConfluenceRagPipeline";
import {
  checkAuth,
  failure,
  messageText,
  respond,
  serviceUnavailable,
  stringArg,
} from "./actionSupport";

const ACTION_NAME = "EXTRACT_CONFLUENCE_SPACE";

// Space key from a Confluence URL (".../spaces/DOCS/...") or "space DOCS" / "space key: DOCS"
export function extractSpaceKeyFromText(text: string): string | null {
  const urlMatch = text.match(/\/spaces\/([A-Za-z0-9~_-]+)/);
  if (urlMatch?.[1]) return urlMatch[1];

  const keyMatch = text.match(/\bspace(?:\s+key)?[\s:=]+["']?(~?[A-Z][A-Z0-9_]*)\b/);
  if (keyMatch?.[1]) return keyMatch[1];

  return null;
}

/**
 * Export formats requested for this run. Structured `formats` wins; otherwise
 * format names mentioned next to "export" in the text, defaulting to JSON.
 */
export function requestedFormats(message: Memory): ExportFormat[] {
  const formats = message.content?.formats;
  if (Array.isArray(formats)) {
    return formats.filter((f: unknown): f is ExportFormat => typeof f === "string" && isExportFormat(f));
  }

  const text = messageText(message).toLowerCase();
  if (!/\bexport\b/.test(text)) return [];
  const mentioned = EXPORT_FORMATS.filter((format) => new RegExp(`\\b${format}\\b`).test(text));
  return mentioned.length > 0 ? mentioned : ["json"];
}

export const ExtractConfluenceSpaceAction: Action = {
  name: ACTION_NAME,
  description:
    "Fetch every page of a Confluence space and process them into RAG documents, optionally exporting " +
    "the corpus (json, jsonl, csv, html, pdf). " +
    "If authentication is enabled and no token is provided, ask the user for the auth token.",
  similes: ["EXTRACT_SPACE", "IMPORT_CONFLUENCE_SPACE", "CRAWL_CONFLUENCE_SPACE", "EXPORT_CONFLUENCE_SPACE"],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    if (stringArg(message, "spaceKey")) return true;
    const text = messageText(message);
    return /confluence|wiki/i.test(text) && extractSpaceKeyFromText(text) !== null;
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: unknown,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const denied = await checkAuth(runtime, message, ACTION_NAME, callback);
    if (denied) return denied;

    const spaceKey = stringArg(message, "spaceKey") || extractSpaceKeyFromText(messageText(message));
    if (!spaceKey) {
      return respond(callback, ACTION_NAME, false, "No Confluence space key found. Please name the space.", {
        error: "missing_space_key",
      });
    }

    const pipeline = getPipeline(runtime);
    if (!pipeline) return serviceUnavailable(ACTION_NAME, callback);

    try {
      const result = await pipeline.extractSpace(spaceKey);
      const formats = requestedFormats(message);
      const exported = formats.length > 0 ? await pipeline.exportCorpus(undefined, formats) : null;

      const lines = [
        `Extracted ${result.documents.length} of ${result.pageCount} page(s) from space ${spaceKey}.`,
      ];
      if (result.failures.length > 0) {
        lines.push(`Failed: ${result.failures.map((f) => f.pageId).join(", ")}`);
      }
      if (exported) {
        lines.push(`Exported ${exported.files.length} file(s) to ${exported.outputDir} (${exported.batch.totalSizeReadable}).`);
      }

      return respond(callback, ACTION_NAME, true, lines.join("\n"), {
        spaceKey,
        pageCount: result.pageCount,
        processed: result.documents.length,
        failures: result.failures,
        exportedFiles: exported?.files ?? [],
        corpusSize: pipeline.size,
      });
    } catch (error) {
      return failure(error, ACTION_NAME, callback, { spaceKey });
    }
  },
};
