import { parseArgs } from 'util';
import { ConfigurationError } from './config';
import { Container, container } from './infrastructure/Container';
import { BuildWorklogReportRequest } from './application/use-cases/BuildWorklogReport';
import { GROUP_BY_MODES, isGroupBy } from './domain/kpi/services/WorklogAggregator';
import { WorklogDomainError } from './domain/worklog/errors';
import { REPORT_LAYOUTS, ReportLayout, isReportLayout } from './presentation/ReportFormatter';
import { logger } from './utils/logger';

const USAGE = `Usage: sprint-worklogs <current|previous|since> [options]

Commands:
  current               Worklogs from the active sprint
  previous              Worklogs from the most recently closed sprint(s)
  since                 Worklogs since --start (defaults to the past 14 days)

Options:
  -s, --start <date>    Start date as YYYY-MM-DD, YYYY/MM/DD or YYYY.MM.DD (since only);
                        any other form falls back to the past 14 days
  -g, --group-by <mode> ${GROUP_BY_MODES.join(' | ')} (default: author-issue)
  -f, --format <layout> ${REPORT_LAYOUTS.join(' | ')} (default: tsv for sprints, table for since)
  -e, --export <file>   Also write the worklogs to a CSV file
  -a, --all-authors     Include worklogs from every author, not just yours
  -h, --help            Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  request: BuildWorklogReportRequest;
  layout: ReportLayout;
  exportPath?: string;
}

/**
 * Parse argv (without the node and script entries); null means help was requested
 */
export function parseCli(argv: string[]): CliOptions | null {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      start: { type: 'string', short: 's' },
      'group-by': { type: 'string', short: 'g' },
      format: { type: 'string', short: 'f' },
      export: { type: 'string', short: 'e' },
      'all-authors': { type: 'boolean', short: 'a' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  if (values.help) {
    return null;
  }

  const [command, ...extra] = positionals;
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }
  if (command !== 'current' && command !== 'previous' && command !== 'since') {
    throw new UsageError(command ? `Unknown command "${command}"` : 'A command is required');
  }
  if (values.start !== undefined && command !== 'since') {
    throw new UsageError('--start only applies to the since command');
  }

  const groupBy = values['group-by'] ?? 'author-issue';
  if (!isGroupBy(groupBy)) {
    throw new UsageError(`--group-by must be one of ${GROUP_BY_MODES.join(', ')}`);
  }

  const layout = values.format ?? (command === 'since' ? 'table' : 'tsv');
  if (!isReportLayout(layout)) {
    throw new UsageError(`--format must be one of ${REPORT_LAYOUTS.join(', ')}`);
  }

  return {
    request: {
      period: command === 'since' ? { kind: 'since', start: values.start } : { kind: command },
      groupBy,
      allAuthors: values['all-authors'] ?? false,
      order: command === 'since' ? 'chronological' : 'issue'
    },
    layout,
    exportPath: values.export
  };
}

export async function run(argv: string[], deps: Container = container()): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCli(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  if (!options) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  try {
    const report = await deps.buildWorklogReportUseCase.execute(options.request);
    process.stdout.write(`${deps.reportFormatter.format(report, options.layout)}\n`);

    if (options.exportPath) {
      await deps.csvExporter.export(report.entries, options.exportPath);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof WorklogDomainError) {
      logger.error(error.message);
    } else {
      logger.error(error instanceof Error ? error : String(error));
    }
    return 1;
  }
}
