import type { AccessClient } from '../access/access-client.js';
import { formatRows } from '../report/delimited-file.js';

/**
 * Members of an Access group as a single quoted, comma-separated line
 * (empty when the group has no members).
 */
export async function describeGroupMembers(
  client: AccessClient,
  groupName: string,
): Promise<string> {
  const group = await client.getGroup(groupName);
  return formatRows([group.members], 'csv').trimEnd();
}
