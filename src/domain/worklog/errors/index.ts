export type WorklogErrorCode = 'INVALID_WINDOW' | 'INVALID_ENTRY';

/**
 * Base class for validation failures raised by the worklog domain
 */
export abstract class WorklogDomainError extends Error {
  abstract readonly code: WorklogErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A time window whose start lies after its end, or whose bounds are not valid dates
 */
export class InvalidWindowError extends WorklogDomainError {
  readonly code = 'INVALID_WINDOW' as const;
}

/**
 * A worklog record that cannot be aggregated (negative or fractional duration, invalid start)
 */
export class InvalidEntryError extends WorklogDomainError {
  readonly code = 'INVALID_ENTRY' as const;

  constructor(message: string, readonly entryId?: string) {
    super(entryId ? `${message} (worklog ${entryId})` : message);
  }
}
