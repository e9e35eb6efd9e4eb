import type { IAgentRuntime, Memory, Provider, ProviderResult, State } from "@elizaos/core";
import { getPipeline } from "../services/ConfluenceService";

/**
 * ConfluenceCorpusProvider
 *
 * Tells the agent which Confluence pages it has extracted this session.
 */
export const confluenceCorpusProvider: Provider = {
  name: "CONFLUENCE_CORPUS",
  description: "Provides counts and titles of the Confluence pages extracted in this session.",
  position: -5,

  async get(
    runtime: IAgentRuntime,
    _message: Memory,
    _state: State
  ): Promise<ProviderResult> {
    const pipeline = getPipeline(runtime);
    if (!pipeline || pipeline.size === 0) {
      return {
        text: "",
        data: { pageCount: 0 },
      };
    }

    const summary = pipeline.summarize();
    const titles = pipeline
      .documents()
      .slice(0, 20)
      .map((doc) => `- ${doc.metadata.id ?? "?"}: ${doc.metadata.title || "(untitled)"}`);
    const more = pipeline.size > 20 ? `\n(+${pipeline.size - 20} more)` : "";

    const text = `# CONFLUENCE PAGES
You have extracted ${summary.totalPages} Confluence page(s) (${summary.totalWords} words, ${summary.totalTables} table(s), ${summary.totalCodeBlocks} code block(s)).

## Pages
${titles.join("\n")}${more}`;

    return {
      text,
      data: {
        pageCount: summary.totalPages,
        totalWords: summary.totalWords,
        totalTables: summary.totalTables,
        totalCodeBlocks: summary.totalCodeBlocks,
      },
    };
  },
};
