import axios, { AxiosAdapter, AxiosInstance, AxiosError } from 'axios';
import { JiraConfig } from '../../config';
import { logger } from '../../utils/logger';

export interface JiraClientOptions {
  /**
   * Replaces the HTTP transport (tests use an in-process adapter)
   */
  adapter?: AxiosAdapter;
}

/**
 * Jira API Client
 * Handles authentication, pagination and HTTP communication with Jira Cloud
 */
export class JiraClient {
  private readonly client: AxiosInstance;
  private readonly boardIds: number[];

  constructor(config: JiraConfig, options: JiraClientOptions = {}) {
    this.boardIds = config.boardIds;

    this.client = axios.create({
      baseURL: config.baseURL,
      headers: {
        'Authorization': `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString('base64')}`,
        'Accept': 'application/json',
        'Content-Type': 'application/json'
      },
      timeout: config.timeoutMs,
      adapter: options.adapter
    });

    // Request interceptor for logging
    this.client.interceptors.request.use(
      (request) => {
        logger.debug(`Jira API: ${request.method?.toUpperCase()} ${request.url}`);
        return request;
      },
      (error) => Promise.reject(error)
    );

    // Response interceptor for error handling
    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        if (error.response) {
          logger.error(`Jira API Error ${error.response.status}: ${JSON.stringify(error.response.data)}`);
        } else if (error.request) {
          logger.error('Jira API: No response received');
        } else {
          logger.error(`Jira API Error: ${error.message}`);
        }
        return Promise.reject(error);
      }
    );
  }

  get configuredBoardIds(): number[] {
    return this.boardIds;
  }

  /**
   * The user the API token belongs to
   */
  async getCurrentUser(): Promise<JiraUser> {
    const response = await this.client.get<JiraUser>('/rest/api/3/myself');
    return response.data;
  }

  /**
   * Get all boards visible to the user
   */
  async getBoards(): Promise<JiraBoard[]> {
    return this.getAgilePages<JiraBoard>('/rest/agile/1.0/board');
  }

  /**
   * Get sprints for a board, all pages
   */
  async getBoardSprints(boardId: number, state?: 'active' | 'closed' | 'future'): Promise<JiraSprint[]> {
    return this.getAgilePages<JiraSprint>(`/rest/agile/1.0/board/${boardId}/sprint`, state ? { state } : {});
  }

  /**
   * Search issues using JQL, following nextPageToken until the last page
   */
  async searchIssues(jql: string, fields: string = 'summary', pageSize: number = 100): Promise<JiraIssue[]> {
    const issues: JiraIssue[] = [];
    let nextPageToken: string | undefined;

    do {
      const response = await this.client.get<JiraSearchResponse>('/rest/api/3/search/jql', {
        params: { jql, fields, maxResults: pageSize, nextPageToken }
      });
      issues.push(...(response.data.issues || []));
      nextPageToken = response.data.isLast ? undefined : response.data.nextPageToken;
    } while (nextPageToken);

    logger.debug(`Fetched ${issues.length} issues with JQL: ${jql}`);
    return issues;
  }

  /**
   * Get every worklog recorded on an issue
   */
  async getIssueWorklogs(issueKey: string): Promise<JiraWorklog[]> {
    const worklogs: JiraWorklog[] = [];
    let startAt = 0;

    while (true) {
      const response = await this.client.get<JiraWorklogPage>(
        `/rest/api/3/issue/${encodeURIComponent(issueKey)}/worklog`,
        { params: { startAt, maxResults: 5000 } }
      );
      const page = response.data.worklogs || [];
      worklogs.push(...page);
      startAt += page.length;

      if (page.length === 0 || startAt >= (response.data.total ?? startAt)) break;
    }

    return worklogs;
  }

  /**
   * Agile endpoints page with startAt/isLast and wrap results in `values`
   */
  private async getAgilePages<T>(path: string, params: Record<string, string | number> = {}): Promise<T[]> {
    const values: T[] = [];
    let startAt = 0;
    let isLast = false;

    while (!isLast) {
      const response = await this.client.get<JiraPage<T>>(path, { params: { ...params, startAt } });
      const page = response.data.values || [];
      values.push(...page);
      startAt += page.length;
      isLast = response.data.isLast ?? true;

      if (page.length === 0) break;
    }

    return values;
  }
}

// Jira API Types
export interface JiraPage<T> {
  startAt?: number;
  maxResults?: number;
  isLast?: boolean;
  values: T[];
}

export interface JiraSearchResponse {
  issues: JiraIssue[];
  nextPageToken?: string;
  isLast?: boolean;
}

export interface JiraIssue {
  id: string;
  key: string;
  fields: {
    summary?: string;
  };
}

export interface JiraUser {
  accountId: string;
  displayName: string;
  emailAddress?: string;
}

/**
 * Node of an Atlassian Document Format body
 */
export interface AdfNode {
  type: string;
  text?: string;
  content?: AdfNode[];
}

export interface JiraWorklog {
  id: string;
  author?: JiraUser;
  started?: string;
  timeSpent?: string;
  timeSpentSeconds?: number;
  comment?: AdfNode;
}

export interface JiraWorklogPage {
  startAt: number;
  maxResults: number;
  total: number;
  worklogs: JiraWorklog[];
}

export interface JiraBoard {
  id: number;
  name: string;
  type: string;
  location?: {
    projectKey: string;
  };
}

export interface JiraSprint {
  id: number;
  name: string;
  state: string;
  startDate?: string;
  endDate?: string;
  completeDate?: string;
  originBoardId?: number;
}
