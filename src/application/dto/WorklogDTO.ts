import { WorklogEntry } from '../../domain/worklog/entities/WorklogEntry';
import { TimeSpent } from '../../domain/worklog/value-objects/TimeSpent';
import { AggregationResult } from '../../domain/kpi/services/WorklogAggregator';

/**
 * Data Transfer Objects handed to the presentation layer
 */

export interface WorklogRowDTO {
  id: string;
  date: string;
  startedAt: string;
  issueKey: string;
  summary: string;
  author: {
    accountId: string;
    displayName: string;
  };
  durationSeconds: number;
  timeSpent: string;
  comment: string;
}

export interface WorklogReportDTO {
  label: string;
  window: {
    start: string;
    end: string;
  };
  sprint: { id: number; name: string } | null;
  usedFallback: boolean;
  issueCount: number;
  entries: WorklogRowDTO[];
  aggregation: AggregationResult;
  totalSeconds: number;
  totalMinutes: number;
  totalFormatted: string;
}

/**
 * Mapper functions to convert domain objects to DTOs
 */
export class WorklogDTOMapper {
  static toDTO(entry: WorklogEntry): WorklogRowDTO {
    return {
      id: entry.id,
      date: entry.startedDate,
      startedAt: entry.startedAt.toISOString(),
      issueKey: entry.issueKey,
      summary: entry.issueSummary,
      author: {
        accountId: entry.author.accountId,
        displayName: entry.author.displayName
      },
      durationSeconds: entry.durationSeconds,
      timeSpent: entry.timeSpent.format(),
      comment: entry.comment
    };
  }

  static toDTOList(entries: WorklogEntry[]): WorklogRowDTO[] {
    return entries.map(e => this.toDTO(e));
  }

  static totalsToDTO(aggregation: AggregationResult): Pick<WorklogReportDTO, 'totalSeconds' | 'totalMinutes' | 'totalFormatted'> {
    const total = TimeSpent.fromSeconds(aggregation.totalSeconds);
    return {
      totalSeconds: total.toSeconds,
      totalMinutes: total.toMinutes,
      totalFormatted: total.format()
    };
  }
}
