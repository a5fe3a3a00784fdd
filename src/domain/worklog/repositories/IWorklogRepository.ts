import { WorklogEntry } from '../entities/WorklogEntry';
import { Author } from '../value-objects/Author';

/**
 * Repository Interface for Worklogs
 * Implementations can use the Jira API or in-memory data
 */
export interface IWorklogRepository {
  /**
   * Find issues matching a JQL query
   */
  searchIssues(jql: string): Promise<IssueReference[]>;

  /**
   * Find every worklog recorded on an issue
   */
  findByIssue(issue: IssueReference): Promise<WorklogEntry[]>;

  /**
   * The author the API credentials belong to
   */
  findCurrentAuthor(): Promise<Author>;
}

export interface IssueReference {
  key: string;
  summary: string;
}
