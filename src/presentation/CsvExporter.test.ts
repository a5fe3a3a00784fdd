import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { CsvExporter } from './CsvExporter';
import { WorklogRowDTO } from '../application/dto/WorklogDTO';

const rows: WorklogRowDTO[] = [
  {
    id: '1',
    date: '2024-05-07',
    startedAt: '2024-05-07T09:00:00.000Z',
    issueKey: 'OPS-7',
    summary: 'Upgrade database, phase 2',
    author: { accountId: 'acc-me', displayName: 'Dev Me' },
    durationSeconds: 3600,
    timeSpent: '1h',
    comment: 'Said "done"'
  },
  {
    id: '2',
    date: '2024-05-08',
    startedAt: '2024-05-08T10:00:00.000Z',
    issueKey: 'OPS-10',
    summary: 'Tune alerts',
    author: { accountId: 'acc-me', displayName: 'Dev Me' },
    durationSeconds: 2700,
    timeSpent: '45m',
    comment: ''
  }
];

describe('CsvExporter', () => {
  const exporter = new CsvExporter();
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('quotes values that contain delimiters or quotes', () => {
    expect(exporter.toCsv(rows).split('\n')).toEqual([
      'date,issueKey,summary,author,timeSpentSeconds,timeSpent,comment',
      '2024-05-07,OPS-7,"Upgrade database, phase 2",Dev Me,3600,1h,"Said ""done"""',
      '2024-05-08,OPS-10,Tune alerts,Dev Me,2700,45m,'
    ]);
  });

  it('writes only the header when there are no rows', () => {
    expect(exporter.toCsv([])).toBe('date,issueKey,summary,author,timeSpentSeconds,timeSpent,comment');
  });

  it('writes a header-only file for an empty report', async () => {
    dir = await mkdtemp(join(tmpdir(), 'worklogs-'));
    const path = join(dir, 'empty.csv');

    await exporter.export([], path);

    expect(await readFile(path, 'utf-8')).toBe('date,issueKey,summary,author,timeSpentSeconds,timeSpent,comment\n');
  });

  it('writes the file with a trailing newline', async () => {
    dir = await mkdtemp(join(tmpdir(), 'worklogs-'));
    const path = join(dir, 'report.csv');

    await exporter.export(rows.slice(1), path);

    expect(await readFile(path, 'utf-8')).toBe(
      'date,issueKey,summary,author,timeSpentSeconds,timeSpent,comment\n' +
      '2024-05-08,OPS-10,Tune alerts,Dev Me,2700,45m,\n'
    );
  });
});
