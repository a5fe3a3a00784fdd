import { ISprintRepository } from '../../domain/sprint/repositories/ISprintRepository';
import { Sprint } from '../../domain/sprint/entities/Sprint';
import { SprintSelector } from '../../domain/sprint/services/SprintSelector';
import { TimeWindow } from '../../domain/worklog/value-objects/TimeWindow';
import { logger } from '../../utils/logger';

export const FALLBACK_DAYS = 14;

export type PeriodRequest =
  | { kind: 'current' }
  | { kind: 'previous' }
  | { kind: 'since'; start?: string };

export interface IssueQuery {
  jql: string;
  /**
   * Failures are logged and skipped (the query relies on a JQL add-on)
   */
  optional: boolean;
}

export interface ReportingPeriod {
  kind: PeriodRequest['kind'];
  label: string;
  window: TimeWindow;
  issueQueries: IssueQuery[];
  sprint: Sprint | null;
  usedFallback: boolean;
}

/**
 * Turns a period request into the time window a report covers and the JQL
 * that finds the issues the current user logged work on in it
 */
export class ReportingPeriodResolver {
  constructor(
    private readonly sprintRepository: ISprintRepository,
    private readonly sprintSelector: SprintSelector,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async resolve(request: PeriodRequest): Promise<ReportingPeriod> {
    switch (request.kind) {
      case 'current':
      case 'previous':
        return this.resolveSprint(request.kind);
      case 'since':
        return this.resolveSince(request.start);
    }
  }

  /**
   * The last 14 days, for when no sprint can be used
   */
  fallback(kind: PeriodRequest['kind']): ReportingPeriod {
    return {
      kind,
      label: `the past ${FALLBACK_DAYS} days (fallback)`,
      window: TimeWindow.lastNDays(FALLBACK_DAYS, this.clock()),
      issueQueries: [{ jql: `worklogAuthor = currentUser() AND worklogDate >= -${FALLBACK_DAYS}d`, optional: false }],
      sprint: null,
      usedFallback: true
    };
  }

  private async resolveSprint(kind: 'current' | 'previous'): Promise<ReportingPeriod> {
    const boards = await this.sprintRepository.findBoards();
    if (boards.length === 0) {
      logger.warn(`No boards found, falling back to last ${FALLBACK_DAYS} days`);
      return this.fallback(kind);
    }

    const selected: Sprint[] = [];

    for (const board of boards) {
      logger.info(`Checking board: ${board.name} (ID: ${board.id})`);

      if (kind === 'current') {
        const active = this.sprintSelector.selectActive(await this.sprintRepository.findByBoard(board.id, 'active'));
        logger.info(active.length > 0
          ? `  Found ${active.length} active sprint(s) for this board`
          : '  No active sprints found for this board');
        selected.push(...active);
      } else {
        const recent = this.sprintSelector.selectRecentlyClosed(await this.sprintRepository.findByBoard(board.id, 'closed'));
        logger.info(recent.length > 0
          ? `  Found ${recent.length} recently closed sprint(s) on this board`
          : '  No closed sprints found for this board');
        selected.push(...recent);
      }
    }

    const reportingSprint = this.sprintSelector.selectReportingSprint(selected, kind);
    const sprintWindow = reportingSprint?.window;
    if (!reportingSprint || !sprintWindow) {
      logger.warn(`No usable ${kind === 'current' ? 'active' : 'closed'} sprint found, falling back to last ${FALLBACK_DAYS} days`);
      return this.fallback(kind);
    }

    // Active sprints run until closed, so the window reaches at least now
    const window = kind === 'current' ? sprintWindow.extendTo(this.clock()) : sprintWindow;

    return {
      kind,
      label: kind === 'current'
        ? `the current active sprint (${reportingSprint.name})`
        : `the most recent sprint (${reportingSprint.name})`,
      window,
      issueQueries: selected.flatMap(sprint => sprintQueries(sprint)),
      sprint: reportingSprint,
      usedFallback: false
    };
  }

  private resolveSince(start?: string): ReportingPeriod {
    const now = this.clock();
    let window: TimeWindow | null = null;

    if (start) {
      const parsed = parseCalendarDate(start);
      if (parsed) {
        window = TimeWindow.since(parsed, now);
        logger.info(`Using user-provided start date: ${start}`);
      } else {
        logger.warn(`Could not parse start date "${start}", using the past ${FALLBACK_DAYS} days instead`);
      }
    }

    if (!window) {
      window = TimeWindow.lastNDays(FALLBACK_DAYS, now);
      logger.info(`Using default date range: past ${FALLBACK_DAYS} days (since ${window.startDateISO})`);
    }

    return {
      kind: 'since',
      label: `since ${window.startDateISO}`,
      window,
      issueQueries: [{ jql: `worklogAuthor = currentUser() AND worklogDate >= "${window.startDateISO}"`, optional: false }],
      sprint: null,
      usedFallback: false
    };
  }
}

function sprintQueries(sprint: Sprint): IssueQuery[] {
  return [
    { jql: `worklogAuthor = currentUser() AND sprint = ${sprint.id}`, optional: false },
    { jql: `worklogAuthor = currentUser() AND issueFunction in epicsOf('sprint = ${sprint.id}')`, optional: true }
  ];
}

/**
 * Year-month-day (YYYY-MM-DD, YYYY/M/D or YYYY.MM.DD) as UTC midnight,
 * or null when the text is not a real calendar date in one of those forms
 */
export function parseCalendarDate(text: string): Date | null {
  const match = /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})$/.exec(text.trim());
  if (!match) return null;

  const [, year, , month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return null;
  }
  return date;
}
