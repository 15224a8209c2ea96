/**
 * Watch violations report pipeline:
 * validate config → validate watch → page violations into the intermediate
 * file → resolve repository owners → merge → write final report → clean up.
 */

import { mkdir, rm } from 'node:fs/promises';
import { ZodError } from 'zod';
import type { AccessClient } from '../access/access-client.js';
import { buildRepoUserMap } from '../access/repo-owner-resolver.js';
import { ReportConfig } from '../schemas/config.schema.js';
import { Logger } from '../utils/logger.js';
import {
  collectViolations,
  type PagerResult,
  type StopReason,
} from '../xray/violation-pager.js';
import { validateWatch, type WatchValidation } from '../xray/watch-validator.js';
import type { XrayClient } from '../xray/xray-client.js';
import {
  appendRows,
  readTable,
  reportFilesFor,
  writeTable,
} from './delimited-file.js';
import { mergeUsers, uniqueRepoNames } from './report-merger.js';
import { USERS_COLUMN, columnsFor, normalizeViolation } from './violation-row.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface GenerateReportOptions {
  /** Raw configuration, validated against `ReportConfig` */
  input: unknown;
  xrayClient: XrayClient;
  accessClient: AccessClient;
  /** Defaults to a console logger; its level is replaced by `logLevel` */
  logger?: Logger;
}

export interface ReportSummary {
  watchName: string;
  totalViolations: number;
  totalPages: number;
  pagesProcessed: number;
  rowsWritten: number;
  /** False when paging stopped before the last page */
  complete: boolean;
  stopReason: StopReason;
  /** Distinct repositories looked up for owners */
  repositories: number;
  /** Enriched report, `null` when the watch has no violations */
  outputFile: string | null;
}

export type GenerateReportResult =
  | { success: true; summary: ReportSummary }
  | {
      success: false;
      error: string;
      issues?: unknown;
      /** Unenriched rows left on disk after a failed enrichment */
      intermediateFile?: string;
    };

// ---------------------------------------------------------------------------
// generateViolationsReport
// ---------------------------------------------------------------------------

export async function generateViolationsReport(
  options: GenerateReportOptions,
): Promise<GenerateReportResult> {
  const { xrayClient, accessClient } = options;

  // -------------------------------------------------------------------------
  // Step 1: Validate configuration
  // -------------------------------------------------------------------------
  let config: ReportConfig;
  try {
    config = ReportConfig.parse(options.input);
  } catch (err) {
    if (err instanceof ZodError) {
      return {
        success: false,
        error: `Configuration validation failed: ${err.errors.map((e) => e.message).join(', ')}`,
        issues: err.errors,
      };
    }
    return { success: false, error: `Configuration validation failed: ${String(err)}` };
  }

  const logger = (options.logger ?? new Logger()).withLevel(config.logLevel);
  const { watchName, format, layout } = config;

  // -------------------------------------------------------------------------
  // Step 2: Validate watch
  // -------------------------------------------------------------------------
  const validation = await validateWatch(xrayClient, watchName, logger);
  if (!validation.valid) {
    return { success: false, error: watchValidationError(watchName, validation) };
  }

  // -------------------------------------------------------------------------
  // Step 3: Page violations into the intermediate file
  // -------------------------------------------------------------------------
  logger.info(`Fetching Xray violations for watch '${watchName}'...`);

  const files = reportFilesFor(config.outputDir, watchName, format);
  try {
    await mkdir(config.outputDir, { recursive: true });
    await writeTable(files.intermediate, { header: [...columnsFor(layout)], rows: [] }, format);
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`File Error: ${message}`);
    return { success: false, error: `Could not create ${files.intermediate}: ${message}` };
  }

  let paging: PagerResult;
  try {
    paging = await collectViolations(
      xrayClient,
      {
        watchName,
        pageSize: config.pageSize,
        includeDetails: layout === 'extended',
      },
      async (page) => {
        const rows = page.violations.map((violation) => normalizeViolation(violation, layout));
        await appendRows(files.intermediate, rows, format);
        return rows.length;
      },
      logger,
    );
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`File Error: ${message}`);
    await discardFile(files.intermediate, logger);
    return {
      success: false,
      error: `Could not write violations to ${files.intermediate}: ${message}`,
    };
  }

  if (!paging.success) {
    await discardFile(files.intermediate, logger);
    return { success: false, error: paging.error };
  }

  const baseSummary = {
    watchName,
    totalViolations: paging.totalViolations,
    totalPages: paging.totalPages,
    pagesProcessed: paging.pagesProcessed,
    rowsWritten: paging.violationsProcessed,
    complete: paging.stopReason === 'done' || paging.stopReason === 'empty',
    stopReason: paging.stopReason,
  };

  if (paging.totalViolations === 0) {
    await discardFile(files.intermediate, logger);
    return {
      success: true,
      summary: { ...baseSummary, repositories: 0, outputFile: null },
    };
  }

  logger.info(
    `Fetched ${paging.violationsProcessed} violation records into ${files.intermediate}.`,
  );

  // -------------------------------------------------------------------------
  // Step 4–6: Resolve owners, merge, write the final report
  // -------------------------------------------------------------------------
  let repositories: number;
  try {
    const table = await readTable(files.intermediate, format);
    const repoNames = uniqueRepoNames(table);
    const userMap = await buildRepoUserMap(accessClient, repoNames, logger);
    repositories = userMap.size;

    await writeTable(files.final, mergeUsers(table, userMap, USERS_COLUMN[layout]), format);
  } catch (err) {
    const message = errorMessage(err);
    logger.error(`Enrichment Error: ${message}`);
    return {
      success: false,
      error: `Enrichment failed: ${message}`,
      intermediateFile: files.intermediate,
    };
  }

  // -------------------------------------------------------------------------
  // Step 7: Remove the intermediate file
  // -------------------------------------------------------------------------
  if (!config.keepIntermediate) {
    await discardFile(files.intermediate, logger);
  }

  logger.info(`Success. Report created: ${files.final}`);

  return {
    success: true,
    summary: { ...baseSummary, repositories, outputFile: files.final },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Remove a report file. A leftover file does not fail the run, so a failed
 * removal is only reported.
 */
async function discardFile(filePath: string, logger: Logger): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    logger.warn(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

function watchValidationError(
  watchName: string,
  validation: Exclude<WatchValidation, { valid: true }>,
): string {
  switch (validation.reason) {
    case 'not-found':
      return `Watch ${watchName} does not exist`;
    case 'http-error':
      return `Error validating watch ${watchName} (HTTP ${validation.status})`;
    case 'connection-error':
      return `Could not reach the server to validate watch ${watchName}: ${validation.message}`;
  }
}
