import { BoardReference, ISprintRepository } from '../domain/sprint/repositories/ISprintRepository';
import { Sprint, SprintState } from '../domain/sprint/entities/Sprint';
import { IssueReference, IWorklogRepository } from '../domain/worklog/repositories/IWorklogRepository';
import { WorklogEntry } from '../domain/worklog/entities/WorklogEntry';
import { Author } from '../domain/worklog/value-objects/Author';

export class InMemorySprintRepository implements ISprintRepository {
  constructor(
    private readonly boards: BoardReference[],
    private readonly sprints: Sprint[]
  ) {}

  async findBoards(): Promise<BoardReference[]> {
    return this.boards;
  }

  async findByBoard(boardId: number, state?: SprintState): Promise<Sprint[]> {
    return this.sprints.filter(s => s.boardId === boardId && (!state || s.state === state));
  }
}

/**
 * Issues are returned per exact JQL string; an Error value makes that query fail
 */
export class InMemoryWorklogRepository implements IWorklogRepository {
  readonly queries: string[] = [];

  constructor(
    private readonly me: Author,
    private readonly issuesByJql: Record<string, IssueReference[] | Error>,
    private readonly worklogsByIssue: Record<string, WorklogEntry[] | Error>
  ) {}

  async searchIssues(jql: string): Promise<IssueReference[]> {
    this.queries.push(jql);
    const result = this.issuesByJql[jql] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }

  async findByIssue(issue: IssueReference): Promise<WorklogEntry[]> {
    const result = this.worklogsByIssue[issue.key] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }

  async findCurrentAuthor(): Promise<Author> {
    return this.me;
  }
}
