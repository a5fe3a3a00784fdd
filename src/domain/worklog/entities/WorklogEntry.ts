import { Author } from '../value-objects/Author';
import { TimeSpent } from '../value-objects/TimeSpent';
import { InvalidEntryError } from '../errors';

/**
 * The fields aggregation reads. WorklogEntry satisfies it, and so does any
 * plain record shaped the same way.
 */
export interface WorklogRecord {
  readonly id?: string;
  readonly author: { readonly accountId: string; readonly displayName: string };
  readonly issueKey: string;
  readonly startedAt: Date;
  readonly durationSeconds: number;
}

/**
 * Throws InvalidEntryError when a record cannot be aggregated
 */
export function assertValidRecord(record: WorklogRecord): void {
  const { durationSeconds, startedAt } = record;

  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new InvalidEntryError(`Worklog duration must be non-negative, got ${durationSeconds}`, record.id);
  }
  if (!Number.isSafeInteger(durationSeconds)) {
    throw new InvalidEntryError(`Worklog duration must be a whole number of seconds, got ${durationSeconds}`, record.id);
  }
  if (!(startedAt instanceof Date) || isNaN(startedAt.getTime())) {
    throw new InvalidEntryError('Worklog start is not a valid timestamp', record.id);
  }
}

/**
 * WorklogEntry Entity
 * One block of time logged against a Jira issue
 */
export class WorklogEntry implements WorklogRecord {
  private constructor(
    private readonly _id: string,
    private readonly _issueKey: string,
    private readonly _author: Author,
    private readonly _timeSpent: TimeSpent,
    private readonly _startedAt: Date,
    private readonly _issueSummary: string,
    private readonly _comment: string
  ) {}

  static create(props: {
    id: string;
    issueKey: string;
    author: Author;
    startedAt: Date;
    durationSeconds: number;
    issueSummary?: string;
    comment?: string;
  }): WorklogEntry {
    assertValidRecord(props);

    return new WorklogEntry(
      props.id,
      props.issueKey,
      props.author,
      TimeSpent.fromSeconds(props.durationSeconds),
      new Date(props.startedAt),
      props.issueSummary || '',
      props.comment || ''
    );
  }

  get id(): string { return this._id; }
  get issueKey(): string { return this._issueKey; }
  get author(): Author { return this._author; }
  get timeSpent(): TimeSpent { return this._timeSpent; }
  get durationSeconds(): number { return this._timeSpent.toSeconds; }
  get startedAt(): Date { return new Date(this._startedAt); }
  get startedDate(): string { return this._startedAt.toISOString().split('T')[0]; }
  get issueSummary(): string { return this._issueSummary; }
  get comment(): string { return this._comment; }

  isFromAuthor(accountId: string): boolean {
    return this._author.accountId === accountId;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this._id,
      issueKey: this._issueKey,
      author: this._author.toJSON(),
      durationSeconds: this.durationSeconds,
      startedAt: this._startedAt.toISOString(),
      issueSummary: this._issueSummary,
      comment: this._comment
    };
  }
}
