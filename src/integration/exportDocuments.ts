/**
 * Writers for processed corpora: per-page HTML and PDF, JSON, JSONL and a CSV
 * of the raw pages, plus a summary of whatever an output directory holds.
 */

import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import path from "path";
import PDFDocument from "pdfkit";
import { ConfluenceRagProcessingError } from "../errors/ProcessingError";
import { createLogger } from "../utils/logger";
import type { ProcessedDocument, RawPage } from "../services/PageProcessor.types";

const log = createLogger({ component: "exportDocuments" });

const SIZE_UNITS = ["B", "KB", "MB", "GB"] as const;

export interface BatchError {
  file: string;
  error: string;
}

export interface BatchSummary {
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  /** Count per lower-cased extension ("" for none) */
  fileTypes: Record<string, number>;
  totalSize: number;
  totalSizeReadable: string;
  processingErrors: BatchError[];
  generatedAt: string;
}

/** `1536` → "1.50 KB". Sizes past GB are reported in TB. */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return "0 B";
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) return `${size.toFixed(2)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(2)} TB`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderTables(doc: ProcessedDocument): string {
  return doc.tables
    .map((table) => {
      const head = table.headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
      const body = table.data
        .map((row) => `<tr>${row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join("")}</tr>`)
        .join("\n");
      return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
    })
    .join("\n");
}

/** Standalone HTML page for one document; every value is escaped. */
export function renderDocumentHtml(doc: ProcessedDocument): string {
  const meta = doc.metadata;
  const title = escapeHtml(meta.title || meta.id || "Untitled");
  const metaRows = Object.entries(meta)
    .map(([key, value]) => `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(String(value))}</td></tr>`)
    .join("\n");
  const code = doc.codeBlocks
    .map((block) => `<pre><code class="${escapeHtml(block.language)}">${escapeHtml(block.content)}</code></pre>`)
    .join("\n");
  const comments = doc.comments
    .map(
      (c) =>
        `<li><strong>${escapeHtml(c.author)}</strong> <time>${escapeHtml(c.created)}</time><p>${escapeHtml(c.content)}</p></li>`
    )
    .join("\n");

  return [
    "<!DOCTYPE html>",
    `<html><head><meta charset="utf-8"><title>${title}</title></head><body>`,
    `<h1>${title}</h1>`,
    `<table class="metadata">\n${metaRows}\n</table>`,
    `<section class="content"><p>${escapeHtml(doc.content)}</p></section>`,
    doc.tables.length > 0 ? `<section class="tables">\n${renderTables(doc)}\n</section>` : "",
    doc.codeBlocks.length > 0 ? `<section class="code">\n${code}\n</section>` : "",
    doc.comments.length > 0 ? `<section class="comments"><ul>\n${comments}\n</ul></section>` : "",
    "</body></html>",
  ]
    .filter(Boolean)
    .join("\n");
}

/**
 * PDF rendering of one document: title, last-modified date and URL, the
 * content, then every table row joined with " | " on a page of its own.
 */
export function renderDocumentPdf(doc: ProcessedDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const pdf = new PDFDocument({ margin: 50 });
    const chunks: Buffer[] = [];

    pdf.on("data", (chunk: Buffer) => chunks.push(chunk));
    pdf.on("end", () => resolve(Buffer.concat(chunks)));
    pdf.on("error", reject);

    const meta = doc.metadata;
    pdf.font("Helvetica-Bold").fontSize(16).text(meta.title || "Untitled");
    pdf.font("Helvetica-Oblique").fontSize(10);
    pdf.text(`Last modified: ${meta.lastModified || "Unknown"}`);
    pdf.text(`URL: ${meta.url || "Unknown"}`);
    pdf.moveDown();
    pdf.font("Helvetica").fontSize(12).text(doc.content || "No content available");

    if (doc.tables.length > 0) {
      pdf.addPage();
      pdf.font("Helvetica-Bold").fontSize(14).text("Tables");
      pdf.font("Helvetica").fontSize(10);
      for (const table of doc.tables) {
        if (table.headers.length > 0) pdf.text(table.headers.join(" | "));
        for (const row of table.data) pdf.text(row.join(" | "));
        pdf.moveDown(0.5);
      }
    }

    pdf.end();
  });
}

/** File-system safe stem for a page id. */
export function documentFileStem(doc: ProcessedDocument, index: number): string {
  const id = doc.metadata.id || `page-${index}`;
  return id.replace(/[^A-Za-z0-9._-]+/g, "_");
}

export interface StemmedDocument {
  document: ProcessedDocument;
  stem: string;
}

/**
 * Stems for a batch written into one directory. Ids that clean to a stem
 * already taken (`a/b` and `a:b`) get their index appended.
 */
export function assignFileStems(docs: readonly ProcessedDocument[]): StemmedDocument[] {
  const used = new Set<string>();
  return docs.map((document, index) => {
    let stem = documentFileStem(document, index);
    while (used.has(stem)) stem = `${stem}-${index}`;
    used.add(stem);
    return { document, stem };
  });
}

async function writeOutput(filePath: string, data: string | Buffer): Promise<string> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, data);
    return filePath;
  } catch (error) {
    throw ConfluenceRagProcessingError.exportFailed(
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

export function writeDocumentHtml(
  doc: ProcessedDocument,
  outputDir: string,
  stem: string = documentFileStem(doc, 0)
): Promise<string> {
  return writeOutput(path.join(outputDir, `${stem}.html`), renderDocumentHtml(doc));
}

export async function writeDocumentPdf(
  doc: ProcessedDocument,
  outputDir: string,
  stem: string = documentFileStem(doc, 0)
): Promise<string> {
  const filePath = path.join(outputDir, `${stem}.pdf`);
  let pdf: Buffer;
  try {
    pdf = await renderDocumentPdf(doc);
  } catch (error) {
    throw ConfluenceRagProcessingError.exportFailed(filePath, error instanceof Error ? error : undefined);
  }
  return writeOutput(filePath, pdf);
}

export function writeJson(filePath: string, value: unknown): Promise<string> {
  return writeOutput(filePath, JSON.stringify(value, null, 2) + "\n");
}

/** One JSON document per line. */
export function writeJsonl(filePath: string, values: readonly unknown[]): Promise<string> {
  return writeOutput(filePath, values.map((v) => JSON.stringify(v) + "\n").join(""));
}

export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

const CSV_COLUMNS = ["id", "title", "url", "version", "lastModified", "content"] as const;

/** Raw pages as CSV with a header row, CRLF line ends. */
export function renderRawPagesCsv(pages: readonly RawPage[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const page of pages) {
    lines.push(CSV_COLUMNS.map((column) => csvField(page[column])).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function writeRawPagesCsv(filePath: string, pages: readonly RawPage[]): Promise<string> {
  return writeOutput(filePath, renderRawPagesCsv(pages));
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listFiles(full)));
    else if (entry.isFile()) files.push(full);
  }
  return files;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Scan an output directory recursively. Files whose name contains "_error"
 * count as failures and their text is captured. A missing directory yields
 * an empty summary.
 */
export async function generateBatchSummary(
  outputDir: string,
  now: () => Date = () => new Date()
): Promise<BatchSummary> {
  const summary: BatchSummary = {
    totalFiles: 0,
    successfulFiles: 0,
    failedFiles: 0,
    fileTypes: {},
    totalSize: 0,
    totalSizeReadable: formatSize(0),
    processingErrors: [],
    generatedAt: now().toISOString(),
  };

  if (!(await pathExists(outputDir))) return summary;

  let files: string[];
  try {
    files = await listFiles(outputDir);
  } catch (error) {
    throw ConfluenceRagProcessingError.exportFailed(
      `batch summary of ${outputDir}`,
      error instanceof Error ? error : undefined
    );
  }

  for (const file of files) {
    summary.totalFiles++;
    const ext = path.extname(file).toLowerCase();
    summary.fileTypes[ext] = (summary.fileTypes[ext] ?? 0) + 1;
    summary.totalSize += (await stat(file)).size;

    if (path.basename(file).includes("_error")) {
      summary.failedFiles++;
      try {
        summary.processingErrors.push({ file, error: await readFile(file, "utf-8") });
      } catch (error) {
        log.warn("Failed to read error file", { file }, error);
      }
    } else {
      summary.successfulFiles++;
    }
  }

  summary.totalSizeReadable = formatSize(summary.totalSize);
  return summary;
}
