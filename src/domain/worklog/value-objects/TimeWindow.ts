import { InvalidWindowError } from '../errors';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Plain start/end pair, as accepted at the aggregation boundary
 */
export interface WindowBounds {
  start: Date;
  end: Date;
}

/**
 * Value Object representing a half-open time interval [start, end)
 * Adjacent windows sharing a boundary never both contain the same instant.
 */
export class TimeWindow implements WindowBounds {
  private constructor(
    private readonly _start: Date,
    private readonly _end: Date
  ) {
    if (isNaN(_start.getTime()) || isNaN(_end.getTime())) {
      throw new InvalidWindowError('Time window bounds must be valid dates');
    }
    if (_start > _end) {
      throw new InvalidWindowError(
        `Time window start ${_start.toISOString()} is after its end ${_end.toISOString()}`
      );
    }
  }

  static between(start: string | Date, end: string | Date): TimeWindow {
    return new TimeWindow(toDate(start), toDate(end));
  }

  static from(bounds: WindowBounds): TimeWindow {
    if (bounds instanceof TimeWindow) {
      return bounds;
    }
    return new TimeWindow(new Date(bounds.start), new Date(bounds.end));
  }

  /**
   * Everything from `start` up to (but excluding) `now`
   */
  static since(start: string | Date, now: Date = new Date()): TimeWindow {
    return new TimeWindow(toDate(start), new Date(now));
  }

  /**
   * The last `days` × 24 hours up to `now`
   */
  static lastNDays(days: number, now: Date = new Date()): TimeWindow {
    return new TimeWindow(new Date(now.getTime() - days * DAY_MS), new Date(now));
  }

  get start(): Date {
    return new Date(this._start);
  }

  get end(): Date {
    return new Date(this._end);
  }

  /**
   * UTC calendar date of the start, as used in JQL worklogDate clauses
   */
  get startDateISO(): string {
    return this._start.toISOString().split('T')[0];
  }

  get endDateISO(): string {
    return this._end.toISOString().split('T')[0];
  }

  contains(date: Date | string): boolean {
    const time = toDate(date).getTime();
    return time >= this._start.getTime() && time < this._end.getTime();
  }

  /**
   * Move the end forward to `end` when it lies after the current end
   */
  extendTo(end: Date): TimeWindow {
    return end > this._end ? new TimeWindow(this._start, end) : this;
  }

  toString(): string {
    return `[${this._start.toISOString()}, ${this._end.toISOString()})`;
  }
}

function toDate(value: string | Date): Date {
  return new Date(value);
}
