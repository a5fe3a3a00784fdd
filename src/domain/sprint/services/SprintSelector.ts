import { Sprint } from '../entities/Sprint';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Domain Service choosing which sprints a report covers
 */
export class SprintSelector {

  /**
   * Active sprints that have started, earliest start first
   */
  selectActive(sprints: Sprint[]): Sprint[] {
    return sprints
      .filter(s => s.isActive && s.startDate !== null)
      .sort((a, b) => timeOf(a.startDate) - timeOf(b.startDate) || a.id - b.id);
  }

  /**
   * Closed sprints that ended within `toleranceDays` whole days of the most
   * recently ended one, newest first
   */
  selectRecentlyClosed(sprints: Sprint[], toleranceDays: number = 7): Sprint[] {
    const closed = sprints
      .filter(s => s.isClosed && s.endDate !== null)
      .sort((a, b) => timeOf(b.endDate) - timeOf(a.endDate) || b.id - a.id);

    if (closed.length === 0) {
      return [];
    }

    const latestEnd = timeOf(closed[0].endDate);
    return closed.filter(s => Math.floor((latestEnd - timeOf(s.endDate)) / DAY_MS) <= toleranceDays);
  }

  /**
   * The sprint whose window a report uses: earliest-started active sprint,
   * or the closed sprint that ended last
   */
  selectReportingSprint(sprints: Sprint[], mode: 'current' | 'previous'): Sprint | null {
    const candidates = mode === 'current'
      ? this.selectActive(sprints)
      : this.selectRecentlyClosed(sprints);

    return candidates.find(s => s.window !== null) ?? null;
  }
}

function timeOf(date: Date | null): number {
  return date ? date.getTime() : 0;
}
