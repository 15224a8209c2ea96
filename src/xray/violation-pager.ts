/**
 * Violation pager: walks every page of a watch's violations.
 *
 * The first response carries `total_violations`, which fixes the page count
 * for the rest of the run.
 */

import { describeHttpError } from '../http/platform-http.js';
import type { ViolationsPage } from '../schemas/xray.schema.js';
import type { Logger } from '../utils/logger.js';
import type { XrayClient } from './xray-client.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface PagerOptions {
  watchName: string;
  pageSize: number;
  includeDetails: boolean;
}

/**
 * Called once per page, in order, as soon as the page arrives.
 * Returns the number of violations it handled.
 */
export type PageHandler = (page: ViolationsPage, pageIndex: number) => Promise<number>;

export type StopReason = 'done' | 'empty' | 'page-error' | 'empty-page';

export type PagerResult =
  | { success: false; error: string }
  | {
      success: true;
      totalViolations: number;
      totalPages: number;
      pagesProcessed: number;
      violationsProcessed: number;
      /** Why paging ended; anything but `done`/`empty` means rows are missing */
      stopReason: StopReason;
    };

// ---------------------------------------------------------------------------
// Page arithmetic
// ---------------------------------------------------------------------------

/**
 * Number of pages needed for `total` items at `limit` per page.
 */
export function totalPages(total: number, limit: number): number {
  if (total <= 0) return 0;
  return Math.floor((total + limit - 1) / limit);
}

/**
 * Offset sent for the zero-based page index.
 *
 * The violations API takes a page number as its offset. The first request
 * goes out with offset 0 (answered as page 1); later pages are requested by
 * their one-based number.
 */
export function pageOffset(pageIndex: number): number {
  return pageIndex === 0 ? 0 : pageIndex + 1;
}

// ---------------------------------------------------------------------------
// collectViolations
// ---------------------------------------------------------------------------

export async function collectViolations(
  client: XrayClient,
  options: PagerOptions,
  onPage: PageHandler,
  logger: Logger,
): Promise<PagerResult> {
  const fetchPage = async (pageIndex: number): Promise<ViolationsPage | null> => {
    const offset = pageOffset(pageIndex);
    logger.info(`  -> Fetching page with offset: ${offset}`);
    try {
      return await client.fetchViolationsPage({
        watchName: options.watchName,
        limit: options.pageSize,
        offset,
        includeDetails: options.includeDetails,
      });
    } catch (err) {
      logger.error(`Error fetching data (${describeHttpError(err)})`);
      return null;
    }
  };

  const firstPage = await fetchPage(0);
  if (!firstPage) {
    return { success: false, error: 'Failed to fetch the first page of violations' };
  }

  const total = firstPage.total_violations;
  if (total === 0) {
    logger.info('  -> No violations found.');
    return {
      success: true,
      totalViolations: 0,
      totalPages: 0,
      pagesProcessed: 0,
      violationsProcessed: 0,
      stopReason: 'empty',
    };
  }

  const pages = totalPages(total, options.pageSize);
  logger.info(`Total violations: ${total}. Total pages: ${pages}`);

  let violationsProcessed = 0;
  let pagesProcessed = 0;
  let stopReason: StopReason = 'done';

  for (let i = 0; i < pages; i++) {
    const page = i === 0 ? firstPage : await fetchPage(i);
    if (!page) {
      stopReason = 'page-error';
      break;
    }

    logger.debug(`  -> Processing page ${i + 1}`);
    const handled = await onPage(page, i);
    violationsProcessed += handled;
    pagesProcessed++;

    if (handled === 0 && i < pages - 1) {
      logger.warn('Warning: API returned 0 violations unexpectedly. Stopping early.');
      stopReason = 'empty-page';
      break;
    }
  }

  return {
    success: true,
    totalViolations: total,
    totalPages: pages,
    pagesProcessed,
    violationsProcessed,
    stopReason,
  };
}
