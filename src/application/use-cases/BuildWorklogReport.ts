import { IssueReference, IWorklogRepository } from '../../domain/worklog/repositories/IWorklogRepository';
import { WorklogEntry } from '../../domain/worklog/entities/WorklogEntry';
import { WorklogDomainError } from '../../domain/worklog/errors';
import { GroupBy, WorklogAggregator } from '../../domain/kpi/services/WorklogAggregator';
import { FALLBACK_DAYS, IssueQuery, PeriodRequest, ReportingPeriod, ReportingPeriodResolver } from '../services/ReportingPeriodResolver';
import { WorklogDTOMapper, WorklogReportDTO } from '../dto/WorklogDTO';
import { logger } from '../../utils/logger';

export type EntryOrder = 'issue' | 'chronological';

export interface BuildWorklogReportRequest {
  period: PeriodRequest;
  groupBy?: GroupBy;
  allAuthors?: boolean;
  order?: EntryOrder;
}

/**
 * Use Case: Build Worklog Report
 * Finds the issues worked on in a period, fetches their worklogs and
 * aggregates the ones that fall inside the period's window
 */
export class BuildWorklogReportUseCase {
  constructor(
    private readonly worklogRepository: IWorklogRepository,
    private readonly periodResolver: ReportingPeriodResolver,
    private readonly aggregator: WorklogAggregator
  ) {}

  async execute(request: BuildWorklogReportRequest): Promise<WorklogReportDTO> {
    let period = await this.periodResolver.resolve(request.period);
    let issues = await this.collectIssues(period.issueQueries);

    if (issues.length === 0 && period.sprint) {
      logger.info(`No issues found in ${period.label}, falling back to last ${FALLBACK_DAYS} days`);
      period = this.periodResolver.fallback(period.kind);
      issues = await this.collectIssues(period.issueQueries);
    }

    logger.info(`Found a total of ${issues.length} unique issues with worklogs`);

    let entries = await this.fetchWorklogs(issues);
    if (!request.allAuthors) {
      const me = await this.worklogRepository.findCurrentAuthor();
      entries = entries.filter(e => e.isFromAuthor(me.accountId));
    }

    const groupBy = request.groupBy ?? 'author-issue';
    const aggregation = this.aggregator.aggregate(entries, period.window, groupBy);
    const included = this.aggregator.filter(entries, period.window)
      .sort(request.order === 'chronological' ? compareChronologically : compareByIssue);

    return {
      label: period.label,
      window: {
        start: period.window.start.toISOString(),
        end: period.window.end.toISOString()
      },
      sprint: sprintSummary(period),
      usedFallback: period.usedFallback,
      issueCount: issues.length,
      entries: WorklogDTOMapper.toDTOList(included),
      aggregation,
      ...WorklogDTOMapper.totalsToDTO(aggregation)
    };
  }

  /**
   * Run every query and merge the results, one reference per issue key
   */
  private async collectIssues(queries: IssueQuery[]): Promise<IssueReference[]> {
    const byKey = new Map<string, IssueReference>();

    for (const query of queries) {
      let found: IssueReference[];
      try {
        found = await this.worklogRepository.searchIssues(query.jql);
      } catch (error) {
        if (!query.optional) throw error;
        logger.warn(`Skipping optional issue query "${query.jql}": ${errorMessage(error)}`);
        continue;
      }

      logger.debug(`Found ${found.length} issues for: ${query.jql}`);
      for (const issue of found) {
        byKey.set(issue.key, issue);
      }
    }

    return Array.from(byKey.values());
  }

  private async fetchWorklogs(issues: IssueReference[]): Promise<WorklogEntry[]> {
    const entries: WorklogEntry[] = [];

    for (const issue of issues) {
      try {
        entries.push(...await this.worklogRepository.findByIssue(issue));
      } catch (error) {
        if (error instanceof WorklogDomainError) throw error;
        logger.warn(`Could not fetch worklogs for ${issue.key}: ${errorMessage(error)}`);
      }
    }

    return entries;
  }
}

function sprintSummary(period: ReportingPeriod): WorklogReportDTO['sprint'] {
  return period.sprint ? { id: period.sprint.id, name: period.sprint.name } : null;
}

function compareByIssue(a: WorklogEntry, b: WorklogEntry): number {
  return a.issueKey.localeCompare(b.issueKey, 'en', { numeric: true }) ||
    a.startedAt.getTime() - b.startedAt.getTime();
}

function compareChronologically(a: WorklogEntry, b: WorklogEntry): number {
  return a.startedAt.getTime() - b.startedAt.getTime() ||
    a.issueKey.localeCompare(b.issueKey, 'en', { numeric: true });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
