/**
 * Corpus-level statistics: computed on demand over processed documents,
 * never persisted.
 */

export interface CorpusAverages {
  wordsPerPage: number;
  tablesPerPage: number;
  codeBlocksPerPage: number;
  commentsPerPage: number;
}

export interface CorpusDateRange {
  oldestPage: string | null;  // original lastModified string
  newestPage: string | null;
}

export interface CorpusSummary {
  totalPages: number;
  totalWords: number;
  totalTables: number;
  totalCodeBlocks: number;
  totalComments: number;
  averages: CorpusAverages;
  dateRange: CorpusDateRange;
  generatedAt: string;        // ISO timestamp
}

export type QualityMetric =
  | "readability"
  | "contentCompleteness"
  | "metadataCompleteness"
  | "formattingQuality";

export type QualityRange = [min: number, max: number];

export interface QualityReport {
  /** Per-document scores, in input order */
  scores: Record<QualityMetric, number[]>;
  averages: Record<QualityMetric, number>;
  ranges: Record<QualityMetric, QualityRange>;
  /** Mean of the four metric averages */
  qualityScore: number;
}
