import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback } from "@elizaos/core";
import { getPipeline } from "../services/ConfluenceService";
import { countWords } from "../services/CorpusAnalyzer";
import {
  checkAuth,
  failure,
  messageText,
  respond,
  serviceUnavailable,
  stringArg,
} from "./actionSupport";

const ACTION_NAME = "EXTRACT_CONFLUENCE_PAGE";

// Page id from a Confluence URL (".../pages/12345/...") or "page 12345" / "page id: 12345"
export function extractPageIdFromText(text: string): string | null {
  const urlMatch = text.match(/\/pages\/(\d+)/);
  if (urlMatch?.[1]) return urlMatch[1];

  const idMatch = text.match(/\bpage(?:\s+id)?[\s:#=]+(\d+)\b/i);
  if (idMatch?.[1]) return idMatch[1];

  return null;
}

export const ExtractConfluencePageAction: Action = {
  name: ACTION_NAME,
  description:
    "Fetch a single Confluence page (with attachments and comments) and turn it into a RAG document: " +
    "plain text, tables, code blocks, metadata. " +
    "If authentication is enabled and no token is provided, ask the user for the auth token.",
  similes: ["EXTRACT_PAGE", "FETCH_CONFLUENCE_PAGE", "IMPORT_CONFLUENCE_PAGE", "PROCESS_CONFLUENCE_PAGE"],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    if (stringArg(message, "pageId")) return true;
    const text = messageText(message);
    return /confluence|wiki/i.test(text) && extractPageIdFromText(text) !== null;
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

    const pageId = stringArg(message, "pageId") || extractPageIdFromText(messageText(message));
    if (!pageId) {
      return respond(callback, ACTION_NAME, false, "No Confluence page id found. Please give a page id or URL.", {
        error: "missing_page_id",
      });
    }

    const pipeline = getPipeline(runtime);
    if (!pipeline) return serviceUnavailable(ACTION_NAME, callback);

    try {
      const document = await pipeline.extractPage(pageId);
      const title = document.metadata.title || pageId;
      const words = countWords(document.content);
      const text =
        `Extracted "${title}" (page ${pageId}): ${words} words, ` +
        `${document.tables.length} table(s), ${document.codeBlocks.length} code block(s), ` +
        `${document.comments.length} comment(s), ${document.attachments.length} attachment(s).`;

      return respond(callback, ACTION_NAME, true, text, {
        pageId,
        title,
        words,
        tables: document.tables.length,
        codeBlocks: document.codeBlocks.length,
        comments: document.comments.length,
        attachments: document.attachments.length,
        corpusSize: pipeline.size,
      });
    } catch (error) {
      return failure(error, ACTION_NAME, callback, { pageId });
    }
  },
};
