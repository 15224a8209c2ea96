/**
 * Xray client interface and its REST implementation.
 *
 * The interface is what the report pipeline depends on; tests inject fakes
 * and the CLI injects the axios-backed client.
 */

import type { AxiosInstance } from 'axios';
import { ensureSuccess, pathSegment } from '../http/platform-http.js';
import { ViolationsPage, XrayWatch } from '../schemas/xray.schema.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export interface ViolationsPageRequest {
  watchName: string;
  limit: number;
  /** Page offset as the violations API interprets it */
  offset: number;
  /** Ask for `extended_information` (research fields) on each violation */
  includeDetails: boolean;
}

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

export interface XrayClient {
  /**
   * Fetch a watch definition.
   * Throws `PlatformApiError` for non-2xx answers (404 when it does not exist).
   */
  getWatch(watchName: string): Promise<XrayWatch>;

  /** Replace a watch definition. */
  updateWatch(watchName: string, watch: XrayWatch): Promise<void>;

  /** Fetch one page of violations for a watch. */
  fetchViolationsPage(request: ViolationsPageRequest): Promise<ViolationsPage>;
}

// ---------------------------------------------------------------------------
// REST implementation
// ---------------------------------------------------------------------------

export interface RestXrayClientOptions {
  /** Timeout for watch requests */
  lookupTimeoutMs: number;
  /** Timeout for violation page requests */
  pageTimeoutMs: number;
}

export function createXrayClient(
  http: AxiosInstance,
  options: RestXrayClientOptions,
): XrayClient {
  return {
    async getWatch(watchName) {
      const response = await http.get<unknown>(
        `/xray/api/v2/watches/${pathSegment(watchName)}`,
        { timeout: options.lookupTimeoutMs, validateStatus: () => true },
      );
      ensureSuccess(response, `GET watch ${watchName}`);
      return XrayWatch.parse(response.data);
    },

    async updateWatch(watchName, watch) {
      const response = await http.put<unknown>(
        `/xray/api/v2/watches/${pathSegment(watchName)}`,
        watch,
        {
          timeout: options.lookupTimeoutMs,
          headers: { 'Content-Type': 'application/json' },
          validateStatus: () => true,
        },
      );
      ensureSuccess(response, `PUT watch ${watchName}`);
    },

    async fetchViolationsPage(request) {
      const payload = {
        filters: {
          watch_name: request.watchName,
          include_details: request.includeDetails,
        },
        pagination: {
          limit: request.limit,
          offset: request.offset,
        },
      };

      const response = await http.post<unknown>('/xray/api/v1/violations', payload, {
        timeout: options.pageTimeoutMs,
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true,
      });
      ensureSuccess(response, `POST violations (offset ${request.offset})`);
      return ViolationsPage.parse(response.data);
    },
  };
}
