import { appendFile, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { ReportFormat } from '../schemas/config.schema.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface Table {
  header: string[];
  rows: string[][];
}

export interface ReportFiles {
  /** Unenriched rows, written page by page */
  intermediate: string;
  /** Enriched report */
  final: string;
}

const TableRows = z.array(z.array(z.string()));

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function delimiterOf(format: ReportFormat): string {
  return format === 'tsv' ? '\t' : ',';
}

/**
 * Render rows with every field quoted, one record per line.
 */
export function formatRows(rows: readonly (readonly string[])[], format: ReportFormat): string {
  if (rows.length === 0) return '';
  return stringify(
    rows.map((row) => [...row]),
    {
      delimiter: delimiterOf(format),
      quoted: true,
      quoted_empty: true,
      record_delimiter: 'unix',
    },
  );
}

/**
 * Parse delimited text back into header and rows.
 */
export function parseTable(content: string, format: ReportFormat): Table {
  const records = TableRows.parse(
    parse(content, {
      delimiter: delimiterOf(format),
      skip_empty_lines: true,
    }),
  );
  const [header = [], ...rows] = records;
  return { header, rows };
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

/**
 * File names for a watch's report. Path separators in the watch name are
 * replaced so the files always land in `outputDir`.
 */
export function reportFilesFor(
  outputDir: string,
  watchName: string,
  format: ReportFormat,
): ReportFiles {
  const safeName = watchName.replace(/[\\/]/g, '_');
  return {
    intermediate: path.join(outputDir, `violations_${safeName}.${format}`),
    final: path.join(outputDir, `violations_enriched_${safeName}.${format}`),
  };
}

/** Create or truncate `filePath` with `header` plus `rows`. */
export async function writeTable(
  filePath: string,
  table: Table,
  format: ReportFormat,
): Promise<void> {
  await writeFile(filePath, formatRows([table.header, ...table.rows], format), 'utf-8');
}

export async function appendRows(
  filePath: string,
  rows: readonly (readonly string[])[],
  format: ReportFormat,
): Promise<void> {
  if (rows.length === 0) return;
  await appendFile(filePath, formatRows(rows, format), 'utf-8');
}

export async function readTable(filePath: string, format: ReportFormat): Promise<Table> {
  const content = await readFile(filePath, 'utf-8');
  return parseTable(content, format);
}
