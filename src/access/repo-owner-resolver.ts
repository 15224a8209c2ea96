/**
 * Repository owner resolution.
 *
 * Owners of a repository are the members of its `*-manage` group:
 *   1. permissions API  -> group names with access to the repository
 *   2. groups API       -> members of the first `-manage` group
 *
 * Each repository is resolved on its own; a failed lookup yields `NA` for
 * that repository and the rest continue.
 */

import { describeHttpError, httpStatusOf } from '../http/platform-http.js';
import { LIST_SEPARATOR, NA } from '../report/violation-row.js';
import type { Logger } from '../utils/logger.js';
import type { AccessClient } from './access-client.js';

const CACHE_SUFFIX = '-cache';
const MANAGE_SUFFIX = '-manage';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Trim whitespace and surrounding double quotes from a repository cell.
 */
export function cleanRepoName(raw: string): string {
  return raw.trim().replace(/^"+|"+$/g, '');
}

/**
 * Repository key to query. Remote repositories surface in violations under
 * their `-cache` companion, which carries no permissions of its own.
 */
export function lookupKeyFor(repoName: string): string {
  return repoName.toLowerCase().endsWith(CACHE_SUFFIX)
    ? repoName.slice(0, -CACHE_SUFFIX.length)
    : repoName;
}

/**
 * First group whose name ends with `-manage` (case-insensitive).
 */
export function findManageGroup(groupNames: Iterable<string>): string | null {
  for (const name of groupNames) {
    if (name.toLowerCase().endsWith(MANAGE_SUFFIX)) {
      return name;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Single repository
// ---------------------------------------------------------------------------

/**
 * Resolve the `|`-joined owner list for one repository, or `NA`.
 */
export async function resolveRepoOwners(
  client: AccessClient,
  repoName: string,
  logger: Logger,
): Promise<string> {
  const lookupKey = lookupKeyFor(repoName);

  try {
    const permissions = await client.getRepositoryPermissions(lookupKey);
    const manageGroup = findManageGroup(Object.keys(permissions.principals.groups));
    if (!manageGroup) {
      logger.debug(`  -> No manage group found for ${lookupKey}.`);
      return NA;
    }

    logger.debug(`  -> Found group: ${manageGroup}`);

    const group = await client.getGroup(manageGroup);
    return group.members.join(LIST_SEPARATOR) || NA;
  } catch (err) {
    const status = httpStatusOf(err);
    if (status !== null) {
      logger.warn(`  -> Error querying API for ${lookupKey} (Status: ${status}). Assigning NA.`);
    } else {
      logger.warn(
        `  -> An unexpected error occurred for ${lookupKey}: ${describeHttpError(err)}. Assigning NA.`,
      );
    }
    return NA;
  }
}

// ---------------------------------------------------------------------------
// buildRepoUserMap
// ---------------------------------------------------------------------------

/**
 * Map every repository name to its owners. Lookups run one at a time.
 *
 * Keys are the cleaned repository names; the `NA` sentinel and blank names
 * map to `NA` without any request.
 */
export async function buildRepoUserMap(
  client: AccessClient,
  repoNames: Iterable<string>,
  logger: Logger,
): Promise<Map<string, string>> {
  const userMap = new Map<string, string>();

  logger.info('--- Building Repo-to-User Lookup ---');

  for (const raw of repoNames) {
    const repoName = cleanRepoName(raw);
    if (userMap.has(repoName)) continue;

    if (repoName === '' || repoName === NA) {
      userMap.set(repoName, NA);
      continue;
    }

    userMap.set(repoName, await resolveRepoOwners(client, repoName, logger));
  }

  logger.info('--- Lookup Complete ---');
  return userMap;
}
