/**
 * Statistics Service
 * Audit figures over everything the result store has recorded
 */

import { CriticalityLevel, isCriticalityLevel } from '../types/index.js';
import { StatisticsRepository } from '../database/repositories/StatisticsRepository.js';
import { HistoryEntry } from './criticality-analysis/models/session.model.js';
import { IResultStore } from './criticality-analysis/models/service-interfaces.js';

export interface BoardStatistics {
  boardId: string;
  boardName: string | null;
  totalAnalyses: number;
  initialAnalyses: number;
  reanalyses: number;
}

export interface GlobalStatistics {
  totalTickets: number;
  totalAnalyses: number;
  initialAnalyses: number;
  reanalyses: number;
  /** Percentage of analyses that were re-analyses, 2 decimals */
  reanalysisRate: number;
  failedAnalyses: number;
  criticalityDistribution: Record<CriticalityLevel, number> & { nonCritical: number };
  byBoard: BoardStatistics[];
}

export function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 10000) / 100 : 0;
}

export class StatisticsService {
  constructor(
    private statistics: StatisticsRepository,
    private store: Pick<IResultStore, 'findHistoryByCard'>
  ) {}

  globalStats(): GlobalStatistics {
    const totals = this.statistics.historyTotals();
    const distribution = { HIGH: 0, MEDIUM: 0, LOW: 0, nonCritical: this.statistics.countNonCritical() };
    for (const row of this.statistics.criticalLevelCounts()) {
      if (isCriticalityLevel(row.criticality_level)) {
        distribution[row.criticality_level] = row.count;
      }
    }

    return {
      totalTickets: this.statistics.countTickets(),
      totalAnalyses: totals.total,
      initialAnalyses: totals.total - totals.reanalyses,
      reanalyses: totals.reanalyses,
      reanalysisRate: percentage(totals.reanalyses, totals.total),
      failedAnalyses: totals.failed,
      criticalityDistribution: distribution,
      byBoard: this.statistics.boardTotals().map((row) => ({
        boardId: row.board_id,
        boardName: row.board_name,
        totalAnalyses: row.total,
        initialAnalyses: row.total - row.reanalyses,
        reanalyses: row.reanalyses,
      })),
    };
  }

  /**
   * Every recorded analysis of a card, newest first
   */
  cardHistory(cardId: string): HistoryEntry[] {
    return this.store.findHistoryByCard(cardId);
  }
}
