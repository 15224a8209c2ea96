/**
 * End-to-end tests for the report pipeline against in-process fake clients.
 */

import { mkdir, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { generateViolationsReport } from '../src/report/report-generator.js';
import { PlatformApiError } from '../src/http/platform-http.js';
import type { ViolationsPage } from '../src/schemas/xray.schema.js';
import type { ViolationsPageRequest } from '../src/xray/xray-client.js';
import { createMemoryLogger } from '../src/utils/logger.js';
import {
  makeAccessClient,
  makePage,
  makeXrayClient,
  rawViolation,
} from './helpers/platform-fakes.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'violations-report-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function input(overrides: Record<string, unknown> = {}) {
  return {
    serverUrl: 'https://platform.example.test/',
    accessToken: 'test-secret',
    watchName: 'prod-watch',
    pageSize: 2,
    outputDir: dir,
    ...overrides,
  };
}

const DOCKER_ARTIFACT = 'default/docker-local/app/1.0/manifest.json';

function twoPages(): Map<number, ViolationsPage | Error> {
  return new Map([
    [0, makePage(3, [rawViolation(), rawViolation({ impacted_artifacts: [DOCKER_ARTIFACT] })])],
    [2, makePage(3, [rawViolation({ severity: 'Low', impacted_artifacts: [] })])],
  ]);
}

function owners() {
  return makeAccessClient({
    permissions: {
      'npm-remote': ['readers', 'web-manage'],
      'docker-local': ['readers'],
    },
    groups: { 'web-manage': ['alice', 'bob'] },
  });
}

const LODASH_TAIL =
  '"CVE-2020-0001","7.4","npm://lodash:4.17.20","4.17.20","4.17.21",' +
  '"Prototype pollution in merge helper","Short summary","Full details","Upgrade"';

// ---------------------------------------------------------------------------
// Successful runs
// ---------------------------------------------------------------------------

describe('generateViolationsReport', () => {
  it('writes the enriched report and removes the intermediate file', async () => {
    const xrayClient = makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() });
    const accessClient = owners();
    const { logger, lines } = createMemoryLogger();

    const result = await generateViolationsReport({
      input: input(),
      xrayClient,
      accessClient,
      logger,
    });

    const finalFile = path.join(dir, 'violations_enriched_prod-watch.csv');
    expect(result).toEqual({
      success: true,
      summary: {
        watchName: 'prod-watch',
        totalViolations: 3,
        totalPages: 2,
        pagesProcessed: 2,
        rowsWritten: 3,
        complete: true,
        stopReason: 'done',
        repositories: 3,
        outputFile: finalFile,
      },
    });

    const content = await readFile(finalFile, 'utf-8');
    expect(content.split('\n')).toEqual([
      '"Type","WatchName","Severity","RepoNameOfImpactedArtifact","ImpactedArtifacts",' +
        '"CVEID","CVSSV3","InfectedComponents","InfectedVersions","FixedVersions",' +
        '"Description","JFrogResearchSummary","JFrogResearchDetails",' +
        '"JFrogResearchRemediation","Users"',
      '"Security","prod-watch","High","npm-remote-cache",' +
        `"default/npm-remote-cache/lodash/-/lodash-4.17.20.tgz",${LODASH_TAIL},"alice|bob"`,
      `"Security","prod-watch","High","docker-local","${DOCKER_ARTIFACT}",${LODASH_TAIL},"NA"`,
      `"Security","prod-watch","Low","NA","NA",${LODASH_TAIL},"NA"`,
      '',
    ]);

    expect(await readdir(dir)).toEqual(['violations_enriched_prod-watch.csv']);
    expect(accessClient.calls).toEqual([
      'permissions:npm-remote',
      'group:web-manage',
      'permissions:docker-local',
    ]);
    expect(xrayClient.requests.map((r) => r.includeDetails)).toEqual([true, true]);
    expect(lines.map((l) => l.line)).toContain(`Success. Report created: ${finalFile}`);
  });

  it('writes the legacy layout as tsv with the User_Assignment column', async () => {
    const xrayClient = makeXrayClient({
      watches: { 'prod-watch': {} },
      pages: new Map([
        [0, makePage(1, [rawViolation({ applicability_details: [] })])],
      ]),
    });
    const { logger } = createMemoryLogger();

    const result = await generateViolationsReport({
      input: input({ format: 'tsv', layout: 'legacy' }),
      xrayClient,
      accessClient: owners(),
      logger,
    });

    expect(result.success).toBe(true);
    const content = await readFile(path.join(dir, 'violations_enriched_prod-watch.tsv'), 'utf-8');
    expect(content.split('\n')[0]).toBe(
      [
        'Type',
        'WatchName',
        'Severity',
        'RepoNameOfImpactedArtifact',
        'ImpactedArtifacts',
        'Vulnerability_Id',
        'Issue_ID',
        'Infected_Components',
        'Infected_Versions',
        'Fixed_Versions',
        'Description',
        'User_Assignment',
      ]
        .map((c) => `"${c}"`)
        .join('\t'),
    );
    expect(content.split('\n')[1]).toBe(
      [
        'Security',
        'prod-watch',
        'High',
        'npm-remote-cache',
        'default/npm-remote-cache/lodash/-/lodash-4.17.20.tgz',
        'N/A',
        'XRAY-1001',
        'npm://lodash:4.17.20',
        '4.17.20',
        '4.17.21',
        'Prototype pollution in merge helper',
        'alice|bob',
      ]
        .map((c) => `"${c}"`)
        .join('\t'),
    );
    expect(xrayClient.requests[0]?.includeDetails).toBe(false);
  });

  it('keeps the intermediate file when asked to', async () => {
    const { logger } = createMemoryLogger();

    await generateViolationsReport({
      input: input({ keepIntermediate: true }),
      xrayClient: makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() }),
      accessClient: owners(),
      logger,
    });

    expect((await readdir(dir)).sort()).toEqual([
      'violations_enriched_prod-watch.csv',
      'violations_prod-watch.csv',
    ]);
  });

  it('writes no report for a watch without violations', async () => {
    const { logger } = createMemoryLogger();

    const result = await generateViolationsReport({
      input: input(),
      xrayClient: makeXrayClient({
        watches: { 'prod-watch': {} },
        pages: new Map([[0, makePage(0, [])]]),
      }),
      accessClient: owners(),
      logger,
    });

    expect(result).toMatchObject({
      success: true,
      summary: { totalViolations: 0, rowsWritten: 0, repositories: 0, outputFile: null },
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('reports a partial run when a later page fails', async () => {
    const { logger } = createMemoryLogger();
    const pages = twoPages();
    pages.set(2, new Error('socket hang up'));

    const result = await generateViolationsReport({
      input: input(),
      xrayClient: makeXrayClient({ watches: { 'prod-watch': {} }, pages }),
      accessClient: owners(),
      logger,
    });

    expect(result).toMatchObject({
      success: true,
      summary: { rowsWritten: 2, complete: false, stopReason: 'page-error' },
    });
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('generateViolationsReport failures', () => {
  it('rejects an invalid configuration before any request', async () => {
    const xrayClient = makeXrayClient({});

    const result = await generateViolationsReport({
      input: input({ watchName: '   ' }),
      xrayClient,
      accessClient: owners(),
    });

    expect(result).toMatchObject({
      success: false,
      error: 'Configuration validation failed: watch name must not be empty',
    });
    expect(xrayClient.requests).toEqual([]);
  });

  it('stops when the watch does not exist', async () => {
    const xrayClient = makeXrayClient({ pages: twoPages() });
    const { logger } = createMemoryLogger();

    const result = await generateViolationsReport({
      input: input(),
      xrayClient,
      accessClient: owners(),
      logger,
    });

    expect(result).toEqual({ success: false, error: 'Watch prod-watch does not exist' });
    expect(xrayClient.requests).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });

  it('removes the intermediate file when the first page fails', async () => {
    const { logger } = createMemoryLogger();

    const result = await generateViolationsReport({
      input: input(),
      xrayClient: makeXrayClient({
        watches: { 'prod-watch': {} },
        pages: new Map([[0, new PlatformApiError('boom', 500, '')]]),
      }),
      accessClient: owners(),
      logger,
    });

    expect(result).toEqual({
      success: false,
      error: 'Failed to fetch the first page of violations',
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('returns a failure when the intermediate file cannot be created', async () => {
    const { logger } = createMemoryLogger();
    const intermediate = path.join(dir, 'violations_prod-watch.csv');
    await mkdir(intermediate);
    const xrayClient = makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() });

    const result = await generateViolationsReport({
      input: input(),
      xrayClient,
      accessClient: owners(),
      logger,
    });

    expect(result.success).toBe(false);
    expect(
      result.success === false &&
        result.error.startsWith(`Could not create ${intermediate}: EISDIR`),
    ).toBe(true);
    expect(xrayClient.requests).toEqual([]);
  });

  it('returns a failure when a page cannot be appended', async () => {
    const { logger } = createMemoryLogger();
    const intermediate = path.join(dir, 'violations_prod-watch.csv');
    const base = makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() });
    const xrayClient = {
      ...base,
      fetchViolationsPage: async (request: ViolationsPageRequest) => {
        // Swap the file for a directory so the append fails.
        await rm(intermediate);
        await mkdir(intermediate);
        return base.fetchViolationsPage(request);
      },
    };

    const result = await generateViolationsReport({
      input: input(),
      xrayClient,
      accessClient: owners(),
      logger,
    });

    expect(result.success).toBe(false);
    expect(
      result.success === false &&
        result.error.startsWith(`Could not write violations to ${intermediate}: EISDIR`),
    ).toBe(true);
  });

  it('keeps the intermediate file when the final report cannot be written', async () => {
    const { logger, lines } = createMemoryLogger();
    await mkdir(path.join(dir, 'violations_enriched_prod-watch.csv'));

    const result = await generateViolationsReport({
      input: input(),
      xrayClient: makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() }),
      accessClient: owners(),
      logger,
    });

    const intermediate = path.join(dir, 'violations_prod-watch.csv');
    expect(result).toMatchObject({ success: false, intermediateFile: intermediate });
    expect(result.success === false && result.error.startsWith('Enrichment failed: EISDIR')).toBe(
      true,
    );
    expect(lines.some((l) => l.line.startsWith('Enrichment Error: EISDIR'))).toBe(true);
    expect((await readFile(intermediate, 'utf-8')).split('\n')).toHaveLength(5);
  });

  it('assigns NA when owner lookups are refused', async () => {
    const { logger, lines } = createMemoryLogger();
    const accessClient = makeAccessClient({
      permissions: {
        'npm-remote': new PlatformApiError('forbidden', 403, ''),
        'docker-local': new PlatformApiError('forbidden', 403, ''),
      },
    });

    const result = await generateViolationsReport({
      input: input(),
      xrayClient: makeXrayClient({ watches: { 'prod-watch': {} }, pages: twoPages() }),
      accessClient,
      logger,
    });

    expect(result.success).toBe(true);
    expect(lines.filter((l) => l.stream === 'stderr').map((l) => l.line)).toEqual([
      '  -> Error querying API for npm-remote (Status: 403). Assigning NA.',
      '  -> Error querying API for docker-local (Status: 403). Assigning NA.',
    ]);
  });
});
