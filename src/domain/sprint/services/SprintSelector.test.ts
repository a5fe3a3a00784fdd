import { describe, expect, it } from 'vitest';
import { SprintSelector } from './SprintSelector';
import { Sprint } from '../entities/Sprint';

function sprint(id: number, state: string, startDate: string | null, endDate: string | null): Sprint {
  return Sprint.create({ id, name: `Sprint ${id}`, state, startDate, endDate, boardId: 1 });
}

describe('SprintSelector', () => {
  const selector = new SprintSelector();

  it('orders active sprints by earliest start and drops unstarted ones', () => {
    const sprints = [
      sprint(3, 'ACTIVE', '2024-05-08T09:00:00Z', '2024-05-22T09:00:00Z'),
      sprint(2, 'active', '2024-05-06T09:00:00Z', '2024-05-20T09:00:00Z'),
      sprint(4, 'active', null, null),
      sprint(1, 'closed', '2024-04-22T09:00:00Z', '2024-05-06T09:00:00Z')
    ];

    expect(selector.selectActive(sprints).map(s => s.id)).toEqual([2, 3]);
  });

  it('keeps closed sprints that ended within seven whole days of the latest one', () => {
    const sprints = [
      sprint(10, 'closed', '2024-04-01T00:00:00Z', '2024-04-15T00:00:00Z'),
      sprint(11, 'closed', '2024-04-15T00:00:00Z', '2024-04-29T00:00:00Z'),
      sprint(12, 'closed', '2024-04-22T00:00:00Z', '2024-05-06T00:00:00Z'),
      sprint(13, 'closed', '2024-04-15T00:00:00Z', '2024-04-28T12:00:00Z'),
      sprint(14, 'future', '2024-05-06T00:00:00Z', '2024-05-20T00:00:00Z')
    ];

    expect(selector.selectRecentlyClosed(sprints).map(s => s.id)).toEqual([12, 11, 13]);
  });

  it('counts only whole days when comparing end dates', () => {
    const sprints = [
      sprint(1, 'closed', '2024-04-22T00:00:00Z', '2024-05-06T00:00:00Z'),
      sprint(2, 'closed', '2024-04-14T00:00:00Z', '2024-04-28T00:00:01Z')
    ];

    expect(selector.selectRecentlyClosed(sprints).map(s => s.id)).toEqual([1, 2]);
  });

  it('returns nothing without closed sprints', () => {
    expect(selector.selectRecentlyClosed([sprint(1, 'active', '2024-05-06T00:00:00Z', null)])).toEqual([]);
  });

  it('picks the reporting sprint for each mode', () => {
    const sprints = [
      sprint(1, 'closed', '2024-04-22T00:00:00Z', '2024-05-06T00:00:00Z'),
      sprint(2, 'active', '2024-05-06T00:00:00Z', '2024-05-20T00:00:00Z')
    ];

    expect(selector.selectReportingSprint(sprints, 'current')?.id).toBe(2);
    expect(selector.selectReportingSprint(sprints, 'previous')?.id).toBe(1);
    expect(selector.selectReportingSprint([], 'current')).toBeNull();
  });

  it('exposes the sprint window as half-open', () => {
    const window = sprint(2, 'active', '2024-05-06T00:00:00Z', '2024-05-20T00:00:00Z').window;

    expect(window?.contains('2024-05-06T00:00:00Z')).toBe(true);
    expect(window?.contains('2024-05-20T00:00:00Z')).toBe(false);
  });

  it('rejects an unknown sprint state', () => {
    expect(() => sprint(9, 'archived', null, null)).toThrow('Unknown sprint state "archived" for sprint 9');
  });
});
