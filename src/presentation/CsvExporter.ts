import { writeFile } from 'fs/promises';
import Papa from 'papaparse';
import { WorklogRowDTO } from '../application/dto/WorklogDTO';
import { logger } from '../utils/logger';

export const CSV_FIELDS = [
  'date',
  'issueKey',
  'summary',
  'author',
  'timeSpentSeconds',
  'timeSpent',
  'comment'
] as const;

/**
 * Writes report rows as CSV
 */
export class CsvExporter {

  /**
   * CSV text without a trailing newline
   */
  toCsv(rows: WorklogRowDTO[]): string {
    const csv = Papa.unparse(
      {
        fields: [...CSV_FIELDS],
        data: rows.map(row => [
          row.date,
          row.issueKey,
          row.summary,
          row.author.displayName,
          String(row.durationSeconds),
          row.timeSpent,
          row.comment
        ])
      },
      { newline: '\n' }
    );
    // a header-only table comes back newline-terminated
    return csv.endsWith('\n') ? csv.slice(0, -1) : csv;
  }

  async export(rows: WorklogRowDTO[], path: string): Promise<void> {
    await writeFile(path, `${this.toCsv(rows)}\n`, 'utf-8');
    logger.info(`Exported ${rows.length} worklogs to ${path}`);
  }
}
