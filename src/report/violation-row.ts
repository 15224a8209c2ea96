/**
 * Flattens a violation record into one report row.
 *
 * Every cell is a string; anything missing becomes the `NA` sentinel so the
 * spreadsheet never shows a blank that could be mistaken for "no issue".
 */

import type { ReportLayout } from '../schemas/config.schema.js';
import type { XrayViolation } from '../schemas/xray.schema.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NA = 'NA';

/** Sentinel of the legacy `Vulnerability_Id` column. */
export const LEGACY_MISSING_ID = 'N/A';

/** Separator for list-valued cells (components, versions, users). */
export const LIST_SEPARATOR = '|';

export const REPO_COLUMN = 'RepoNameOfImpactedArtifact';

export const EXTENDED_COLUMNS = [
  'Type',
  'WatchName',
  'Severity',
  REPO_COLUMN,
  'ImpactedArtifacts',
  'CVEID',
  'CVSSV3',
  'InfectedComponents',
  'InfectedVersions',
  'FixedVersions',
  'Description',
  'JFrogResearchSummary',
  'JFrogResearchDetails',
  'JFrogResearchRemediation',
] as const;

export const LEGACY_COLUMNS = [
  'Type',
  'WatchName',
  'Severity',
  REPO_COLUMN,
  'ImpactedArtifacts',
  'Vulnerability_Id',
  'Issue_ID',
  'Infected_Components',
  'Infected_Versions',
  'Fixed_Versions',
  'Description',
] as const;

/** Name of the appended users column, per layout. */
export const USERS_COLUMN: Record<ReportLayout, string> = {
  extended: 'Users',
  legacy: 'User_Assignment',
};

export function columnsFor(layout: ReportLayout): readonly string[] {
  return layout === 'extended' ? EXTENDED_COLUMNS : LEGACY_COLUMNS;
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function orNA(value: string | null | undefined): string {
  return value ? value : NA;
}

function joinOrNA(values: string[]): string {
  return values.join(LIST_SEPARATOR) || NA;
}

/**
 * Repository key of an impacted artifact path.
 *
 * Artifact paths look like `<bin_mgr_id>/<repo>/<path...>`; the repository
 * is the second segment.
 */
export function repoNameOf(artifact: string): string {
  if (!artifact.includes('/')) return NA;
  return orNA(artifact.split('/')[1]);
}

/**
 * CVSS v3 score without its vector (`"9.8/CVSS:3.1/AV:N/..."` -> `"9.8"`).
 */
export function cvssScoreOf(raw: string): string {
  const slash = raw.indexOf('/');
  return slash === -1 ? raw : orNA(raw.slice(0, slash));
}

// ---------------------------------------------------------------------------
// normalizeViolation
// ---------------------------------------------------------------------------

/**
 * Convert one violation to a row matching `columnsFor(layout)`.
 */
export function normalizeViolation(violation: XrayViolation, layout: ReportLayout): string[] {
  const impactedArtifact = orNA(violation.impacted_artifacts[0]);
  const repoName = impactedArtifact === NA ? NA : repoNameOf(impactedArtifact);

  const infectedComponents = joinOrNA(violation.infected_components);
  const infectedVersions = joinOrNA(violation.infected_versions);
  const fixedVersions = joinOrNA(violation.fix_versions);

  const head = [
    orNA(violation.type),
    orNA(violation.watch_name),
    orNA(violation.severity),
    repoName,
    impactedArtifact,
  ];

  if (layout === 'legacy') {
    const vulnerabilityId =
      violation.applicability_details[0]?.vulnerability_id || LEGACY_MISSING_ID;
    return [
      ...head,
      vulnerabilityId,
      orNA(violation.issue_id),
      infectedComponents,
      infectedVersions,
      fixedVersions,
      orNA(violation.description),
    ];
  }

  const properties = violation.properties[0];
  const cveId = orNA(properties?.cve);
  const rawCvss = orNA(properties?.cvss_v3);

  const research = violation.extended_information;

  return [
    ...head,
    cveId,
    cvssScoreOf(rawCvss),
    infectedComponents,
    infectedVersions,
    fixedVersions,
    orNA(violation.description),
    orNA(research?.short_description),
    orNA(research?.full_description),
    orNA(research?.remediation),
  ];
}
