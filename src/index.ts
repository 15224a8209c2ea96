/**
 * Watch Violations Report
 *
 * Exports the security violations of an Xray watch to a delimited report
 * and tags every row with the users who manage the affected repository.
 *
 * Pipeline (see `generateViolationsReport`):
 * validate config → validate watch → page violations → flatten rows →
 * resolve repository owners → merge → write report
 */

import type { AxiosRequestConfig } from 'axios';
import { createAccessClient, type AccessClient } from './access/access-client.js';
import { createPlatformHttp } from './http/platform-http.js';
import type { ConnectionConfig } from './schemas/config.schema.js';
import { createXrayClient, type XrayClient } from './xray/xray-client.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Client wiring
// ---------------------------------------------------------------------------

export interface PlatformClients {
  xrayClient: XrayClient;
  accessClient: AccessClient;
}

/**
 * Build the REST clients for one platform connection.
 *
 * @param pageTimeoutMs - timeout for violation page requests
 * @param adapter - optional axios transport (tests answer requests in-process)
 */
export function createPlatformClients(
  connection: ConnectionConfig,
  pageTimeoutMs: number,
  adapter?: AxiosRequestConfig['adapter'],
): PlatformClients {
  const http = createPlatformHttp({
    serverUrl: connection.serverUrl,
    accessToken: connection.accessToken,
    adapter,
  });
  return {
    xrayClient: createXrayClient(http, {
      lookupTimeoutMs: connection.lookupTimeoutMs,
      pageTimeoutMs,
    }),
    accessClient: createAccessClient(http, { timeoutMs: connection.lookupTimeoutMs }),
  };
}

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export {
  generateViolationsReport,
  type GenerateReportOptions,
  type GenerateReportResult,
  type ReportSummary,
} from './report/report-generator.js';
export {
  parseReportConfig,
  ReportConfig,
  ConnectionConfig,
  type ReportConfigInput,
} from './schemas/config.schema.js';
export type { XrayClient, ViolationsPageRequest } from './xray/xray-client.js';
export type { AccessClient } from './access/access-client.js';
export { validateWatch, type WatchValidation } from './xray/watch-validator.js';
export { collectViolations, totalPages, pageOffset } from './xray/violation-pager.js';
export {
  normalizeViolation,
  columnsFor,
  EXTENDED_COLUMNS,
  LEGACY_COLUMNS,
  USERS_COLUMN,
  NA,
} from './report/violation-row.js';
export { buildRepoUserMap, resolveRepoOwners } from './access/repo-owner-resolver.js';
export { mergeUsers, uniqueRepoNames } from './report/report-merger.js';
export { readTable, writeTable, reportFilesFor, type Table } from './report/delimited-file.js';
export { addRepositoriesToWatch, parseRepoList } from './admin/watch-resources.js';
export { describeGroupMembers } from './admin/group-members.js';
export {
  describeRepositoryProperties,
  setRepositoryProperty,
} from './admin/repo-properties.js';
export { Logger, createMemoryLogger, type LogSink } from './utils/logger.js';
export { PlatformApiError } from './http/platform-http.js';
