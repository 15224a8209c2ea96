/**
 * Adds repositories to a watch's resources.
 *
 * Flow: read repo keys → keep those that exist and map their `rclass` to a
 * watch repo type → fetch the watch (with an optional backup copy) → append
 * and dedupe resources → PUT the watch back.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AccessClient } from '../access/access-client.js';
import { describeHttpError } from '../http/platform-http.js';
import type { WatchResource, XrayWatch } from '../schemas/xray.schema.js';
import type { Logger } from '../utils/logger.js';
import type { XrayClient } from '../xray/xray-client.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type WatchRepoType = 'local' | 'remote';

export interface AddRepositoriesOptions {
  xrayClient: XrayClient;
  accessClient: AccessClient;
  watchName: string;
  repoKeys: string[];
  logger: Logger;
  /** Directory for a copy of the watch as it was before the update */
  backupDir?: string;
}

export type AddRepositoriesResult =
  | { success: true; added: string[]; skipped: string[]; totalResources: number }
  | { success: false; error: string; skipped: string[] };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Repository keys from a list file: one per line, trimmed, blanks dropped.
 */
export function parseRepoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Watch repo type for an Artifactory repository class. Federated
 * repositories are watched as local ones; virtual repositories hold no
 * artifacts and cannot be watched.
 */
export function watchRepoTypeOf(rclass: string | null): WatchRepoType | null {
  switch (rclass) {
    case 'local':
    case 'federated':
      return 'local';
    case 'remote':
      return 'remote';
    default:
      return null;
  }
}

function resourceKey(resource: WatchResource): string {
  return `${resource.name ?? ''}${resource.type ?? ''}${resource.bin_mgr_id ?? ''}`;
}

/**
 * Append resources to a watch, keeping the first of any duplicates
 * (same name, type and binary manager). Other watch fields are untouched.
 */
export function mergeWatchResources(watch: XrayWatch, additions: WatchResource[]): XrayWatch {
  const seen = new Set<string>();
  const resources: WatchResource[] = [];
  for (const resource of [...(watch.project_resources?.resources ?? []), ...additions]) {
    const key = resourceKey(resource);
    if (seen.has(key)) continue;
    seen.add(key);
    resources.push(resource);
  }

  return {
    ...watch,
    project_resources: { ...(watch.project_resources ?? {}), resources },
  };
}

// ---------------------------------------------------------------------------
// resolveRepositoryResources
// ---------------------------------------------------------------------------

export async function resolveRepositoryResources(
  client: AccessClient,
  repoKeys: string[],
  logger: Logger,
): Promise<{ resources: WatchResource[]; skipped: string[] }> {
  const existing = new Map(
    (await client.listRepositories()).map((repo) => [repo.key.toLowerCase(), repo.key]),
  );

  const resources: WatchResource[] = [];
  const skipped: string[] = [];

  for (const repoKey of repoKeys) {
    logger.info(`   Processing: ${repoKey}`);

    const actualKey = existing.get(repoKey.toLowerCase());
    if (!actualKey) {
      logger.warn(`   Repo ${repoKey} does not exist, skipping.`);
      skipped.push(repoKey);
      continue;
    }

    let rclass: string | null;
    try {
      rclass = (await client.getRepository(actualKey)).rclass;
    } catch (err) {
      logger.warn(`   Could not read ${actualKey} (${describeHttpError(err)}), skipping.`);
      skipped.push(repoKey);
      continue;
    }

    const repoType = watchRepoTypeOf(rclass);
    if (!repoType) {
      logger.warn(
        `WARNING: Could not determine type for ${actualKey}. RCLASS: ${rclass ?? 'unknown'}. Skipping.`,
      );
      skipped.push(repoKey);
      continue;
    }

    resources.push({
      type: 'repository',
      bin_mgr_id: 'default',
      name: actualKey,
      repo_type: repoType,
    });
  }

  return { resources, skipped };
}

// ---------------------------------------------------------------------------
// addRepositoriesToWatch
// ---------------------------------------------------------------------------

export async function addRepositoriesToWatch(
  options: AddRepositoriesOptions,
): Promise<AddRepositoriesResult> {
  const { xrayClient, accessClient, watchName, logger } = options;

  let resolved: { resources: WatchResource[]; skipped: string[] };
  try {
    resolved = await resolveRepositoryResources(accessClient, options.repoKeys, logger);
  } catch (err) {
    return {
      success: false,
      error: `Could not list repositories (${describeHttpError(err)})`,
      skipped: [],
    };
  }

  const { resources, skipped } = resolved;
  if (resources.length === 0) {
    return { success: false, error: 'No valid repositories found to add', skipped };
  }

  let watch: XrayWatch;
  try {
    watch = await xrayClient.getWatch(watchName);
  } catch (err) {
    return {
      success: false,
      error: `Could not fetch watch ${watchName} (${describeHttpError(err)})`,
      skipped,
    };
  }

  if (options.backupDir) {
    const backupFile = path.join(options.backupDir, `current_watch_${watchName}.json`);
    try {
      await mkdir(options.backupDir, { recursive: true });
      await writeFile(backupFile, JSON.stringify(watch, null, 2), 'utf-8');
    } catch (err) {
      return {
        success: false,
        error: `Could not save watch backup to ${backupFile} (${describeHttpError(err)})`,
        skipped,
      };
    }
    logger.info(`Saved watch backup to ${backupFile}`);
  }

  const updated = mergeWatchResources(watch, resources);

  try {
    await xrayClient.updateWatch(watchName, updated);
  } catch (err) {
    return {
      success: false,
      error: `Could not update watch ${watchName} (${describeHttpError(err)})`,
      skipped,
    };
  }

  const totalResources = updated.project_resources?.resources?.length ?? 0;
  logger.info(`Watch ${watchName} now covers ${totalResources} resources.`);

  return {
    success: true,
    added: resources.flatMap((r) => (r.name ? [r.name] : [])),
    skipped,
    totalResources,
  };
}
