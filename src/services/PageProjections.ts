/**
 * Field projections from a RawPage: metadata, attachments, comments.
 * Pure apart from the processing timestamp.
 */

import { PROCESSING_DEFAULTS } from "../config/constants";
import { normalizeHtml } from "./ContentNormalizer";
import type {
  PageAttachment,
  PageComment,
  PageMetadata,
  RawPage,
} from "./PageProcessor.types";

export function extractMetadata(page: RawPage, now: () => Date = () => new Date()): PageMetadata {
  return {
    id: page.id,
    title: page.title,
    url: page.url,
    version: page.version,
    lastModified: page.lastModified,
    source: PROCESSING_DEFAULTS.SOURCE,
    processedAt: now().toISOString(),
  };
}

export function normalizeAttachments(page: RawPage): PageAttachment[] {
  return page.attachments.map((attachment) => ({
    id: attachment.id ?? "",
    filename: attachment.filename ?? "",
    size: attachment.size ?? 0,
    mediaType: attachment.mediaType ?? "",
  }));
}

/** Comment bodies are storage HTML too; they go through the same normalizer. */
export function normalizeComments(page: RawPage): PageComment[] {
  return page.comments.map((comment) => ({
    id: comment.id ?? "",
    author: comment.author ?? "",
    created: comment.created ?? "",
    content: normalizeHtml(comment.content ?? ""),
  }));
}
