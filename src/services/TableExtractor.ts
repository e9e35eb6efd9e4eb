/**
 * TableExtractor: every `<table>` in a page as headers + cell matrix.
 *
 * Each table (nested ones included) is read from its own rows only. Spanned
 * cells are copied into every grid position they cover, so `data` is what a
 * reader sees, not what the markup says.
 */

import { TABLE_DEFAULTS } from "../config/constants";
import { ConfluenceRagProcessingError } from "../errors/ProcessingError";
import { ErrorCode, isConfluenceRagError } from "../errors/ConfluenceRagError";
import { closestAncestor, childElements, parseFragment, selectAll, tagOf, type DomElement } from "../utils/dom";
import { createLogger, type StructuredLogger } from "../utils/logger";
import type { ExtractedTable } from "./PageProcessor.types";

export interface TableExtractionOptions {
  pageId?: string;
  logger?: StructuredLogger;
}

const defaultLogger = createLogger({ component: "TableExtractor" });

function cellText(cell: DomElement): string {
  return (cell.textContent || "").replace(/\s+/g, " ").trim();
}

function readSpan(cell: DomElement, attribute: "colspan" | "rowspan", tableIndex: number): number {
  const raw = cell.getAttribute(attribute);
  if (raw === null || raw.trim() === "") return 1;
  const span = Number.parseInt(raw, 10);
  if (!Number.isFinite(span) || span < 1) return 1;
  if (span > TABLE_DEFAULTS.MAX_SPAN) {
    throw ConfluenceRagProcessingError.malformedTable(
      `${attribute}=${span} exceeds ${TABLE_DEFAULTS.MAX_SPAN}`,
      { tableIndex }
    );
  }
  return span;
}

/** Rows that belong to `table` itself, not to a table nested in one of its cells. */
function ownRows(table: DomElement): DomElement[] {
  return selectAll(table, "tr").filter((row) => closestAncestor(row, "table") === table);
}

function cellsOf(row: DomElement): DomElement[] {
  return childElements(row).filter((el) => {
    const tag = tagOf(el);
    return tag === "td" || tag === "th";
  });
}

/** Lay rows out on a grid, copying spanned values. Holes become "". */
function buildGrid(rows: DomElement[], tableIndex: number): string[][] {
  const grid: (string | undefined)[][] = rows.map(() => []);

  rows.forEach((row, r) => {
    let col = 0;
    for (const cell of cellsOf(row)) {
      while (grid[r][col] !== undefined) col++;
      const text = cellText(cell);
      const colspan = readSpan(cell, "colspan", tableIndex);
      const rowspan = readSpan(cell, "rowspan", tableIndex);
      for (let dr = 0; dr < rowspan && r + dr < rows.length; dr++) {
        for (let dc = 0; dc < colspan; dc++) {
          grid[r + dr][col + dc] = text;
        }
      }
      col += colspan;
    }
  });

  return grid.map((row) => Array.from(row, (value) => value ?? ""));
}

function countHeaderRows(table: DomElement, rows: DomElement[]): number {
  let count = 0;
  for (const row of rows) {
    const section = closestAncestor(row, "thead");
    if (section === null || closestAncestor(section, "table") !== table) break;
    count++;
  }
  if (count > 0) return count;

  const first = rows.length > 0 ? cellsOf(rows[0]) : [];
  if (first.length > 0 && first.every((cell) => tagOf(cell) === "th")) return 1;
  return 0;
}

/** Several header rows collapse into one label per column. */
function mergeHeaderRows(headerRows: string[][]): string[] {
  const width = Math.max(0, ...headerRows.map((row) => row.length));
  const headers: string[] = [];
  for (let c = 0; c < width; c++) {
    const labels: string[] = [];
    for (const row of headerRows) {
      const label = row[c] ?? "";
      if (label && labels[labels.length - 1] !== label) labels.push(label);
    }
    headers.push(labels.join(" "));
  }
  return headers;
}

function parseTable(table: DomElement, tableIndex: number): ExtractedTable {
  const rows = ownRows(table);
  const cellCount = rows.reduce((sum, row) => sum + cellsOf(row).length, 0);
  if (cellCount === 0) {
    throw ConfluenceRagProcessingError.malformedTable("table has no cells", { tableIndex });
  }

  const grid = buildGrid(rows, tableIndex);
  const headerRowCount = countHeaderRows(table, rows);
  const data = grid.slice(headerRowCount);
  const widest = Math.max(0, ...data.map((row) => row.length));

  const headers =
    headerRowCount > 0
      ? mergeHeaderRows(grid.slice(0, headerRowCount))
      : Array.from({ length: widest }, (_, i) => String(i));

  return {
    headers,
    data,
    shape: [data.length, Math.max(widest, headers.length)],
  };
}

/**
 * Extract every table from a page body.
 *
 * Malformed tables are logged and skipped; the rest are still returned.
 */
export function extractTables(html: string, options: TableExtractionOptions = {}): ExtractedTable[] {
  if (!html) return [];
  const log = options.logger ?? defaultLogger;

  const root = parseFragment(html);
  const tables: ExtractedTable[] = [];

  selectAll(root, "table").forEach((table, tableIndex) => {
    try {
      tables.push(parseTable(table, tableIndex));
    } catch (error) {
      if (isConfluenceRagError(error) && error.code === ErrorCode.TABLE_MALFORMED) {
        log.warn("Skipping malformed table", { pageId: options.pageId, tableIndex, reason: error.message });
        return;
      }
      throw error;
    }
  });

  return tables;
}
