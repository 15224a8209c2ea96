import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  appendRows,
  formatRows,
  parseTable,
  readTable,
  reportFilesFor,
  writeTable,
} from '../src/report/delimited-file.js';

describe('formatRows', () => {
  it('quotes every field and doubles embedded quotes', () => {
    expect(formatRows([['Type', 'Description'], ['Security', 'uses "eval"']], 'csv')).toBe(
      '"Type","Description"\n"Security","uses ""eval"""\n',
    );
  });

  it('separates tsv fields with a tab', () => {
    expect(formatRows([['a', 'b,c']], 'tsv')).toBe('"a"\t"b,c"\n');
  });

  it('quotes empty fields', () => {
    expect(formatRows([['', 'x']], 'csv')).toBe('"","x"\n');
  });

  it('returns an empty string for no rows', () => {
    expect(formatRows([], 'csv')).toBe('');
  });
});

describe('parseTable', () => {
  it('splits header from rows and keeps multi-line fields intact', () => {
    const content = '"Type","Description"\n"Security","line one\nline two"\n';
    expect(parseTable(content, 'csv')).toEqual({
      header: ['Type', 'Description'],
      rows: [['Security', 'line one\nline two']],
    });
  });

  it('reads tab-separated content', () => {
    expect(parseTable('"a"\t"b"\n"1"\t"2,3"\n', 'tsv')).toEqual({
      header: ['a', 'b'],
      rows: [['1', '2,3']],
    });
  });

  it('returns an empty table for empty content', () => {
    expect(parseTable('', 'csv')).toEqual({ header: [], rows: [] });
  });
});

describe('reportFilesFor', () => {
  it('names the intermediate and final files after the watch', () => {
    expect(reportFilesFor('out', 'prod-watch', 'csv')).toEqual({
      intermediate: path.join('out', 'violations_prod-watch.csv'),
      final: path.join('out', 'violations_enriched_prod-watch.csv'),
    });
  });

  it('keeps path separators out of the file name', () => {
    expect(reportFilesFor('.', 'team/watch', 'tsv').final).toBe(
      path.join('.', 'violations_enriched_team_watch.tsv'),
    );
  });
});

describe('file round trip', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'delimited-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a header, appends pages and reads everything back', async () => {
    const file = path.join(dir, 'report.csv');
    await writeTable(file, { header: ['Repo', 'Users'], rows: [] }, 'csv');
    await appendRows(file, [['docker-local', 'alice|bob']], 'csv');
    await appendRows(file, [], 'csv');
    await appendRows(file, [['npm-remote', 'NA']], 'csv');

    expect(await readFile(file, 'utf-8')).toBe(
      '"Repo","Users"\n"docker-local","alice|bob"\n"npm-remote","NA"\n',
    );
    expect(await readTable(file, 'csv')).toEqual({
      header: ['Repo', 'Users'],
      rows: [
        ['docker-local', 'alice|bob'],
        ['npm-remote', 'NA'],
      ],
    });
  });
});
