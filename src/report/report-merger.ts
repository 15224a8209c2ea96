import { cleanRepoName } from '../access/repo-owner-resolver.js';
import type { Table } from './delimited-file.js';
import { NA, REPO_COLUMN } from './violation-row.js';

function repoColumnIndex(table: Table): number {
  const index = table.header.indexOf(REPO_COLUMN);
  if (index === -1) {
    throw new Error(`Report has no ${REPO_COLUMN} column`);
  }
  return index;
}

/**
 * Distinct repository names of a report, in order of first appearance.
 */
export function uniqueRepoNames(table: Table): string[] {
  const index = repoColumnIndex(table);
  const seen = new Set<string>();
  for (const row of table.rows) {
    seen.add(row[index] ?? NA);
  }
  return [...seen];
}

/**
 * Left-join owners onto a report: every row gains `usersColumn`, `NA` when
 * its repository is not in `userMap`. Row and column order are kept.
 */
export function mergeUsers(
  table: Table,
  userMap: ReadonlyMap<string, string>,
  usersColumn: string,
): Table {
  const index = repoColumnIndex(table);
  return {
    header: [...table.header, usersColumn],
    rows: table.rows.map((row) => {
      const repo = cleanRepoName(row[index] ?? NA);
      return [...row, userMap.get(repo) ?? NA];
    }),
  };
}
