import type { AccessClient } from '../access/access-client.js';
import { formatRows } from '../report/delimited-file.js';
import type { Logger } from '../utils/logger.js';

/**
 * A repository's properties as quoted `"key","value"` lines, one per key.
 * Multi-valued properties show their first value.
 */
export async function describeRepositoryProperties(
  client: AccessClient,
  repoKey: string,
): Promise<string> {
  const { properties } = await client.getRepositoryProperties(repoKey);
  const rows = Object.entries(properties).map(([key, values]) => [key, values[0] ?? '']);
  return formatRows(rows, 'csv');
}

export async function setRepositoryProperty(
  client: AccessClient,
  repoKey: string,
  key: string,
  value: string,
  logger: Logger,
): Promise<void> {
  logger.info(`Setting property '${key}=${value}' on repository '${repoKey}'...`);
  await client.setRepositoryProperty(repoKey, key, value);
  logger.info(`Property successfully set on repository '${repoKey}'.`);
}
