/**
 * Repository permission and group membership lookups.
 *
 * Two platform services back this client: Artifactory (storage API for
 * permissions/properties, repositories API) and Access (groups API).
 */

import type { AxiosInstance } from 'axios';
import { ensureSuccess, pathSegment } from '../http/platform-http.js';
import {
  AccessGroup,
  RepositoryDetails,
  RepositoryList,
  RepositoryPermissions,
  RepositoryProperties,
  type RepositorySummary,
} from '../schemas/xray.schema.js';

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

/**
 * Client interface for repository ownership queries.
 * Every method throws on non-2xx answers (`PlatformApiError`) and on
 * connection failures.
 */
export interface AccessClient {
  /** Effective permissions on a repository, keyed by user and group. */
  getRepositoryPermissions(repoKey: string): Promise<RepositoryPermissions>;

  /** Group details including its member user names. */
  getGroup(groupName: string): Promise<AccessGroup>;

  /** Properties set on a repository (key -> values). */
  getRepositoryProperties(repoKey: string): Promise<RepositoryProperties>;

  /** Set one property on a repository. */
  setRepositoryProperty(repoKey: string, key: string, value: string): Promise<void>;

  /** All repositories visible to the token. */
  listRepositories(): Promise<RepositorySummary[]>;

  /** Configuration of a single repository (includes `rclass`). */
  getRepository(repoKey: string): Promise<RepositoryDetails>;
}

// ---------------------------------------------------------------------------
// REST implementation
// ---------------------------------------------------------------------------

export function createAccessClient(
  http: AxiosInstance,
  options: { timeoutMs: number },
): AccessClient {
  const get = async (url: string, action: string): Promise<unknown> => {
    const response = await http.get<unknown>(url, {
      timeout: options.timeoutMs,
      validateStatus: () => true,
    });
    ensureSuccess(response, action);
    return response.data;
  };

  return {
    async getRepositoryPermissions(repoKey) {
      const data = await get(
        `/artifactory/api/storage/${pathSegment(repoKey)}?permissions`,
        `GET permissions of ${repoKey}`,
      );
      return RepositoryPermissions.parse(data);
    },

    async getGroup(groupName) {
      const data = await get(
        `/access/api/v2/groups/${pathSegment(groupName)}`,
        `GET group ${groupName}`,
      );
      return AccessGroup.parse(data);
    },

    async getRepositoryProperties(repoKey) {
      const data = await get(
        `/artifactory/api/storage/${pathSegment(repoKey)}?properties`,
        `GET properties of ${repoKey}`,
      );
      return RepositoryProperties.parse(data);
    },

    async setRepositoryProperty(repoKey, key, value) {
      // `key=value` must reach the server unencoded apart from the parts
      const query = `properties=${encodeURIComponent(key)}=${encodeURIComponent(value)}`;
      const response = await http.put<unknown>(
        `/artifactory/api/storage/${pathSegment(repoKey)}?${query}`,
        undefined,
        { timeout: options.timeoutMs, validateStatus: () => true },
      );
      ensureSuccess(response, `PUT property ${key} on ${repoKey}`);
    },

    async listRepositories() {
      const data = await get('/artifactory/api/repositories', 'GET repositories');
      return RepositoryList.parse(data);
    },

    async getRepository(repoKey) {
      const data = await get(
        `/artifactory/api/repositories/${pathSegment(repoKey)}`,
        `GET repository ${repoKey}`,
      );
      return RepositoryDetails.parse(data);
    },
  };
}
