import { TimeWindow } from '../../worklog/value-objects/TimeWindow';

export type SprintState = 'future' | 'active' | 'closed';

const SPRINT_STATES: readonly SprintState[] = ['future', 'active', 'closed'];

export function isSprintState(value: string): value is SprintState {
  return SPRINT_STATES.some(state => state === value);
}

/**
 * Sprint Entity
 * Represents a Jira sprint
 */
export class Sprint {
  private constructor(
    private readonly _id: number,
    private readonly _name: string,
    private readonly _state: SprintState,
    private readonly _startDate: Date | null,
    private readonly _endDate: Date | null,
    private readonly _boardId: number
  ) {}

  static create(props: {
    id: number;
    name: string;
    state: string;
    startDate?: string | null;
    endDate?: string | null;
    boardId: number;
  }): Sprint {
    const state = props.state.toLowerCase();
    if (!isSprintState(state)) {
      throw new Error(`Unknown sprint state "${props.state}" for sprint ${props.id}`);
    }

    return new Sprint(
      props.id,
      props.name,
      state,
      parseDate(props.startDate),
      parseDate(props.endDate),
      props.boardId
    );
  }

  // Getters
  get id(): number { return this._id; }
  get name(): string { return this._name; }
  get state(): SprintState { return this._state; }
  get startDate(): Date | null { return this._startDate ? new Date(this._startDate) : null; }
  get endDate(): Date | null { return this._endDate ? new Date(this._endDate) : null; }
  get boardId(): number { return this._boardId; }

  get isActive(): boolean {
    return this._state === 'active';
  }

  get isClosed(): boolean {
    return this._state === 'closed';
  }

  /**
   * The sprint's planned span [start, end), when both dates are known
   */
  get window(): TimeWindow | null {
    if (!this._startDate || !this._endDate || this._startDate > this._endDate) {
      return null;
    }
    return TimeWindow.between(this._startDate, this._endDate);
  }
}

function parseDate(value?: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}
