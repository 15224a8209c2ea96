/**
 * Shared HTTP plumbing for the platform APIs (Xray, Artifactory, Access).
 *
 * All three live under one base URL and accept the same bearer token, so a
 * single axios instance serves every client.
 */

import axios, {
  isAxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * A platform API call that reached the server and got a non-2xx answer.
 */
export class PlatformApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
    this.name = 'PlatformApiError';
  }
}

// ---------------------------------------------------------------------------
// Client factory
// ---------------------------------------------------------------------------

export interface PlatformHttpOptions {
  serverUrl: string;
  accessToken: string;
  /** Injected transport, used by tests to answer requests in-process */
  adapter?: AxiosRequestConfig['adapter'];
}

/**
 * Create the axios instance used by every platform client.
 */
export function createPlatformHttp(options: PlatformHttpOptions): AxiosInstance {
  return axios.create({
    baseURL: options.serverUrl,
    headers: {
      Authorization: `Bearer ${options.accessToken}`,
    },
    adapter: options.adapter,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Throw `PlatformApiError` unless the response is 2xx.
 */
export function ensureSuccess(response: AxiosResponse<unknown>, action: string): void {
  if (response.status >= 200 && response.status < 300) return;

  const body =
    typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
  throw new PlatformApiError(
    `${action} failed with HTTP ${response.status}`,
    response.status,
    body,
  );
}

/**
 * Status code of a failed request, or `null` when no response arrived.
 */
export function httpStatusOf(err: unknown): number | null {
  if (err instanceof PlatformApiError) return err.status;
  if (isAxiosError(err) && err.response) return err.response.status;
  return null;
}

/**
 * One-line description of a failed request for log output.
 */
export function describeHttpError(err: unknown): string {
  const status = httpStatusOf(err);
  if (status !== null) {
    return `HTTP ${status}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Response body of a failed request as text (empty when there is none).
 */
export function responseBodyOf(err: unknown): string {
  if (err instanceof PlatformApiError) return err.body;
  if (isAxiosError(err) && err.response) {
    const data: unknown = err.response.data;
    return typeof data === 'string' ? data : JSON.stringify(data ?? '');
  }
  return '';
}

/**
 * Encode one path segment (repository key, group or watch name).
 */
export function pathSegment(value: string): string {
  return encodeURIComponent(value);
}
