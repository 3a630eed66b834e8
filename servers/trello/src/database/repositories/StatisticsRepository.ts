/**
 * Statistics Repository
 *
 * Read-only aggregates over tickets and analysis history
 */

import { DatabaseType } from '../index.js';

export interface HistoryTotalsRow {
  total: number;
  reanalyses: number;
  failed: number;
}

export interface LevelCountRow {
  criticality_level: string;
  count: number;
}

export interface BoardTotalsRow {
  board_id: string;
  board_name: string | null;
  total: number;
  reanalyses: number;
}

export class StatisticsRepository {
  constructor(private db: DatabaseType) {}

  countTickets(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM tickets`).get();
    return row?.count ?? 0;
  }

  historyTotals(): HistoryTotalsRow {
    const row = this.db
      .prepare<[], HistoryTotalsRow>(`
        SELECT
          COUNT(*) AS total,
          COALESCE(SUM(s.reanalyse), 0) AS reanalyses,
          COALESCE(SUM(CASE WHEN h.success = 0 THEN 1 ELSE 0 END), 0) AS failed
        FROM ticket_analysis_history h
        JOIN analysis_sessions s ON s.id = h.session_id
      `)
      .get();
    return row ?? { total: 0, reanalyses: 0, failed: 0 };
  }

  /**
   * Critical successful entries per level
   */
  criticalLevelCounts(): LevelCountRow[] {
    return this.db
      .prepare<[], LevelCountRow>(`
        SELECT criticality_level, COUNT(*) AS count
        FROM ticket_analysis_history
        WHERE success = 1 AND is_critical = 1
        GROUP BY criticality_level
      `)
      .all();
  }

  countNonCritical(): number {
    const row = this.db
      .prepare<[], { count: number }>(
        `SELECT COUNT(*) AS count FROM ticket_analysis_history WHERE success = 1 AND is_critical = 0`
      )
      .get();
    return row?.count ?? 0;
  }

  boardTotals(): BoardTotalsRow[] {
    return this.db
      .prepare<[], BoardTotalsRow>(`
        SELECT
          h.board_id AS board_id,
          COALESCE(
            (SELECT bc.board_name FROM board_configs bc WHERE bc.board_id = h.board_id),
            (SELECT MAX(t.board_name) FROM tickets t WHERE t.board_id = h.board_id)
          ) AS board_name,
          COUNT(*) AS total,
          COALESCE(SUM(s.reanalyse), 0) AS reanalyses
        FROM ticket_analysis_history h
        JOIN analysis_sessions s ON s.id = h.session_id
        GROUP BY h.board_id
        ORDER BY total DESC, h.board_id ASC
      `)
      .all();
  }
}
