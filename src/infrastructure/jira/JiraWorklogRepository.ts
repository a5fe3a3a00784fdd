import { IssueReference, IWorklogRepository } from '../../domain/worklog/repositories/IWorklogRepository';
import { WorklogEntry } from '../../domain/worklog/entities/WorklogEntry';
import { Author } from '../../domain/worklog/value-objects/Author';
import { TimeTrackingConfig } from '../../config';
import { JiraClient } from './JiraClient';
import { WorklogMapper } from './mappers/WorklogMapper';

/**
 * Jira implementation of Worklog Repository
 */
export class JiraWorklogRepository implements IWorklogRepository {
  private currentAuthor: Author | null = null;

  constructor(
    private readonly jiraClient: JiraClient,
    private readonly timeTracking: TimeTrackingConfig
  ) {}

  async searchIssues(jql: string): Promise<IssueReference[]> {
    const issues = await this.jiraClient.searchIssues(jql, 'summary');
    return issues.map(issue => WorklogMapper.issueToReference(issue));
  }

  async findByIssue(issue: IssueReference): Promise<WorklogEntry[]> {
    const jiraWorklogs = await this.jiraClient.getIssueWorklogs(issue.key);
    return WorklogMapper.toDomainList(jiraWorklogs, issue, this.timeTracking);
  }

  async findCurrentAuthor(): Promise<Author> {
    if (!this.currentAuthor) {
      const user = await this.jiraClient.getCurrentUser();
      this.currentAuthor = WorklogMapper.authorToDomain(user);
    }
    return this.currentAuthor;
  }
}
