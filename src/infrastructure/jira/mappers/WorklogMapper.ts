import { WorklogEntry } from '../../../domain/worklog/entities/WorklogEntry';
import { IssueReference } from '../../../domain/worklog/repositories/IWorklogRepository';
import { Author } from '../../../domain/worklog/value-objects/Author';
import { TimeSpent } from '../../../domain/worklog/value-objects/TimeSpent';
import { InvalidEntryError, WorklogDomainError } from '../../../domain/worklog/errors';
import { TimeTrackingConfig } from '../../../config';
import { AdfNode, JiraIssue, JiraUser, JiraWorklog } from '../JiraClient';

const DEFAULT_TIME_TRACKING: TimeTrackingConfig = { hoursPerDay: 8, daysPerWeek: 5 };

/**
 * Mapper to convert Jira API responses to Domain entities
 */
export class WorklogMapper {

  /**
   * Map Jira worklog API response to a domain WorklogEntry.
   * timeSpentSeconds wins; the "2h 30m" string is read only when it is absent.
   * Any worklog that cannot be mapped raises InvalidEntryError.
   */
  static toDomain(
    jiraWorklog: JiraWorklog,
    issue: IssueReference,
    timeTracking: TimeTrackingConfig = DEFAULT_TIME_TRACKING
  ): WorklogEntry {
    try {
      return this.mapWorklog(jiraWorklog, issue, timeTracking);
    } catch (error) {
      if (error instanceof WorklogDomainError) throw error;
      throw new InvalidEntryError(error instanceof Error ? error.message : String(error), jiraWorklog.id);
    }
  }

  static toDomainList(
    jiraWorklogs: JiraWorklog[],
    issue: IssueReference,
    timeTracking?: TimeTrackingConfig
  ): WorklogEntry[] {
    return jiraWorklogs.map(w => this.toDomain(w, issue, timeTracking));
  }

  static authorToDomain(user: JiraUser): Author {
    return Author.create(user.accountId, user.displayName, user.emailAddress);
  }

  static issueToReference(issue: JiraIssue): IssueReference {
    return { key: issue.key, summary: issue.fields.summary || '' };
  }

  private static mapWorklog(
    jiraWorklog: JiraWorklog,
    issue: IssueReference,
    timeTracking: TimeTrackingConfig
  ): WorklogEntry {
    const { author, started } = jiraWorklog;
    if (!author?.accountId) {
      throw new InvalidEntryError('Worklog has no author account', jiraWorklog.id);
    }
    if (!started) {
      throw new InvalidEntryError('Worklog has no start time', jiraWorklog.id);
    }

    return WorklogEntry.create({
      id: jiraWorklog.id,
      issueKey: issue.key,
      issueSummary: issue.summary,
      author: this.authorToDomain(author),
      startedAt: parseJiraTimestamp(started),
      durationSeconds: this.durationOf(jiraWorklog, timeTracking),
      comment: this.extractComment(jiraWorklog.comment)
    });
  }

  private static durationOf(jiraWorklog: JiraWorklog, timeTracking: TimeTrackingConfig): number {
    if (typeof jiraWorklog.timeSpentSeconds === 'number') {
      return jiraWorklog.timeSpentSeconds;
    }
    if (jiraWorklog.timeSpent) {
      return TimeSpent.parse(jiraWorklog.timeSpent, timeTracking.hoursPerDay, timeTracking.daysPerWeek).toSeconds;
    }
    throw new InvalidEntryError('Worklog has no recorded duration', jiraWorklog.id);
  }

  /**
   * Flatten the text nodes of an ADF comment, separated by single spaces
   */
  private static extractComment(comment?: AdfNode): string {
    if (!comment) return '';

    const texts: string[] = [];
    const visit = (node: AdfNode): void => {
      if (node.type === 'text' && node.text) {
        texts.push(node.text);
      }
      node.content?.forEach(visit);
    };
    visit(comment);

    return texts.join(' ');
  }
}

/**
 * Jira writes offsets without a colon ("+0000"), which ISO 8601 parsing expects
 */
export function parseJiraTimestamp(value: string): Date {
  return new Date(value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
}
