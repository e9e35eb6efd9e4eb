/**
 * Page shapes: raw records as they come from Confluence, and the flat
 * document the processor produces from each of them.
 */

/** Attachment record; Confluence adds fields freely, so extra keys are kept. */
export interface RawAttachment {
  id?: string;
  title?: string;
  filename?: string;
  mediaType?: string;
  size?: number;
  url?: string;
  [key: string]: unknown;
}

export interface RawComment {
  id?: string;
  author?: string;
  created?: string;
  content?: string;
}

export interface RawPage {
  readonly id: string;
  readonly title: string;
  readonly content: string;     // storage-format HTML
  readonly url: string;
  readonly version: number;
  readonly lastModified: string; // ISO-8601, possibly without zone
  readonly attachments: readonly RawAttachment[];
  readonly comments: readonly RawComment[];
}

export interface PageMetadata {
  id: string;
  title: string;
  url: string;
  version: number;
  lastModified: string;
  source: "confluence";
  processedAt: string;
}

export interface ExtractedTable {
  headers: string[];
  data: string[][];
  shape: [number, number]; // [data rows, widest row]
}

export interface CodeBlock {
  language: string;
  content: string;
}

export interface PageAttachment {
  id: string;
  filename: string;
  size: number;
  mediaType: string;
}

export interface PageComment {
  id: string;
  author: string;
  created: string;
  content: string;
}

export interface ProcessedDocument {
  content: string;
  metadata: Partial<PageMetadata>;
  tables: ExtractedTable[];
  codeBlocks: CodeBlock[];
  attachments: PageAttachment[];
  comments: PageComment[];
}

/** Processing stages, one per `ProcessedDocument` field ("text" fills `content`). */
export type ExtractionStage =
  | "text"
  | "tables"
  | "codeBlocks"
  | "metadata"
  | "attachments"
  | "comments";
