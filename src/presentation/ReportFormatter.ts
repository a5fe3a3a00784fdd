import { WorklogReportDTO, WorklogRowDTO } from '../application/dto/WorklogDTO';
import { AggregationGroup, GroupBy } from '../domain/kpi/services/WorklogAggregator';
import { TimeSpent } from '../domain/worklog/value-objects/TimeSpent';

export type ReportLayout = 'tsv' | 'table';

export const REPORT_LAYOUTS: readonly ReportLayout[] = ['tsv', 'table'];

const RULE = '='.repeat(40);

const GROUP_TITLES: Record<GroupBy, string> = {
  'author': 'Time by author',
  'author-issue': 'Time by author and issue',
  'issue': 'Time by issue',
  'day': 'Time by day'
};

/**
 * Renders a worklog report as console text
 */
export class ReportFormatter {

  format(report: WorklogReportDTO, layout: ReportLayout): string {
    const lines: string[] = [
      '',
      `🧾 Worklogs from ${report.label}:`,
      RULE
    ];

    if (report.entries.length === 0) {
      lines.push('No worklogs found.');
    } else if (layout === 'table') {
      lines.push(...this.tableLines(report.entries));
    } else {
      lines.push(...report.entries.map(row => this.tsvLine(row)));
    }

    lines.push('', RULE);

    if (report.aggregation.groups.length > 0) {
      lines.push(`${GROUP_TITLES[report.aggregation.groupBy]}:`, ...this.groupLines(report.aggregation.groups), '');
    }

    lines.push(
      `Total time logged: ${report.totalFormatted} (${report.totalMinutes} minutes)`,
      `Number of work log entries: ${report.aggregation.entryCount}`
    );

    return lines.join('\n');
  }

  private tsvLine(row: WorklogRowDTO): string {
    return [row.date, row.issueKey, row.summary, row.timeSpent, row.comment].join('\t');
  }

  private tableLines(rows: WorklogRowDTO[]): string[] {
    const header = `${'Date'.padEnd(12)}${'Issue'.padEnd(15)}${'Summary'.padEnd(40)}${'Time'.padEnd(10)}Comment`;
    const rule = `${'-'.repeat(12)}${'-'.repeat(15)}${'-'.repeat(40)}${'-'.repeat(10)}${'-'.repeat(30)}`;

    return [
      header,
      rule,
      ...rows.map(row =>
        `${row.date.padEnd(12)}${row.issueKey.padEnd(15)}${truncate(row.summary, 38).padEnd(40)}${row.timeSpent.padEnd(10)}${row.comment}`
      )
    ];
  }

  private groupLines(groups: AggregationGroup[]): string[] {
    const labels = groups.map(groupLabel);
    const width = Math.max(...labels.map(l => l.length));

    return groups.map((group, i) =>
      `  ${labels[i].padEnd(width)}  ${TimeSpent.fromSeconds(group.durationSeconds).format()}`
    );
  }
}

/**
 * Cut by code point so a surrogate pair is never split
 */
function truncate(text: string, length: number): string {
  return Array.from(text).slice(0, length).join('');
}

function groupLabel(group: AggregationGroup): string {
  if (group.author && group.issueKey) {
    return `${group.author.displayName} ${group.issueKey}`;
  }
  return group.author?.displayName ?? group.issueKey ?? group.key;
}

export function isReportLayout(value: string): value is ReportLayout {
  return REPORT_LAYOUTS.some(layout => layout === value);
}
