import { WorklogRecord, assertValidRecord } from '../../worklog/entities/WorklogEntry';
import { TimeWindow, WindowBounds } from '../../worklog/value-objects/TimeWindow';

export type GroupBy = 'author' | 'author-issue' | 'issue' | 'day';

export const GROUP_BY_MODES: readonly GroupBy[] = ['author', 'author-issue', 'issue', 'day'];

export function isGroupBy(value: string): value is GroupBy {
  return GROUP_BY_MODES.some(mode => mode === value);
}

/**
 * Domain Service summing logged time inside a window
 * Pure: no I/O, no logging, independent of input order
 */
export class WorklogAggregator {

  /**
   * Total logged seconds per group for entries with start <= startedAt < end
   */
  aggregate<T extends WorklogRecord>(
    entries: readonly T[],
    window: WindowBounds,
    groupBy: GroupBy
  ): AggregationResult {
    const included = this.filter(entries, window);
    const groups = new Map<string, AggregationGroup>();
    let totalSeconds = 0;

    for (const entry of included) {
      const key = groupKey(entry, groupBy);
      let group = groups.get(key);
      if (!group) {
        group = { key, ...groupLabels(entry, groupBy), durationSeconds: 0, entryCount: 0 };
        groups.set(key, group);
      }
      if (group.author && entry.author.displayName < group.author.displayName) {
        group.author = pickAuthor(entry);
      }
      group.durationSeconds += entry.durationSeconds;
      group.entryCount += 1;
      totalSeconds += entry.durationSeconds;
    }

    return {
      groupBy,
      groups: Array.from(groups.values()).sort(compareGroups),
      totalSeconds,
      entryCount: included.length
    };
  }

  /**
   * Entries whose start lies inside the window, in input order.
   * Every entry is validated, inside the window or not.
   */
  filter<T extends WorklogRecord>(entries: readonly T[], window: WindowBounds): T[] {
    const range = TimeWindow.from(window);
    entries.forEach(assertValidRecord);
    return entries.filter(entry => range.contains(entry.startedAt));
  }
}

/**
 * Group totals as a plain key → seconds map
 */
export function durationsByKey(result: AggregationResult): Record<string, number> {
  return Object.fromEntries(result.groups.map(g => [g.key, g.durationSeconds]));
}

// Jira issue keys and account ids never contain '#'
const KEY_SEPARATOR = '#';

function groupKey(entry: WorklogRecord, groupBy: GroupBy): string {
  switch (groupBy) {
    case 'author':
      return entry.author.accountId;
    case 'author-issue':
      return `${entry.author.accountId}${KEY_SEPARATOR}${entry.issueKey}`;
    case 'issue':
      return entry.issueKey;
    case 'day':
      return entry.startedAt.toISOString().split('T')[0];
  }
}

function groupLabels(entry: WorklogRecord, groupBy: GroupBy): Pick<AggregationGroup, 'author' | 'issueKey'> {
  switch (groupBy) {
    case 'author':
      return { author: pickAuthor(entry) };
    case 'author-issue':
      return { author: pickAuthor(entry), issueKey: entry.issueKey };
    case 'issue':
      return { issueKey: entry.issueKey };
    case 'day':
      return {};
  }
}

function pickAuthor(entry: WorklogRecord): { accountId: string; displayName: string } {
  return { accountId: entry.author.accountId, displayName: entry.author.displayName };
}

function compareGroups(a: AggregationGroup, b: AggregationGroup): number {
  if (a.durationSeconds !== b.durationSeconds) {
    return b.durationSeconds - a.durationSeconds;
  }
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

export interface AggregationResult {
  groupBy: GroupBy;
  groups: AggregationGroup[];
  totalSeconds: number;
  entryCount: number;
}

export interface AggregationGroup {
  key: string;
  author?: { accountId: string; displayName: string };
  issueKey?: string;
  durationSeconds: number;
  entryCount: number;
}
