/**
 * Ticket Analysis History Repository
 *
 * Append-only: entries are inserted, never updated or deleted
 */

import { DatabaseType } from '../index.js';
import { boolToInt, generateId, intToBool, now } from '../utils.js';
import { isCriticalityLevel, CriticalityLevel } from '../../types/index.js';
import { AnalysisResult } from '../../services/criticality-analysis/models/analysis-result.model.js';
import { AnalysisSession, HistoryEntry } from '../../services/criticality-analysis/models/session.model.js';

interface HistoryRow {
  id: string;
  card_id: string;
  session_id: string;
  board_id: string;
  card_title: string;
  is_critical: number;
  criticality_level: string;
  justification: string;
  success: number;
  failure_reason: string | null;
  analyzed_at: string;
  created_at: string;
  reference: string;
  reanalyse: number;
}

function toCriticalityLevel(value: string): CriticalityLevel {
  if (!isCriticalityLevel(value)) {
    throw new Error(`Unexpected criticality level in store: ${value}`);
  }
  return value;
}

function rowToEntry(row: HistoryRow): HistoryEntry {
  const result: AnalysisResult = {
    cardId: row.card_id,
    cardTitle: row.card_title,
    isCritical: intToBool(row.is_critical),
    criticalityLevel: toCriticalityLevel(row.criticality_level),
    justification: row.justification,
    success: intToBool(row.success),
    analyzedAt: row.analyzed_at,
  };
  if (row.failure_reason !== null) {
    result.failureReason = row.failure_reason;
  }
  return {
    id: row.id,
    cardId: row.card_id,
    sessionId: row.session_id,
    sessionReference: row.reference,
    reanalyse: intToBool(row.reanalyse),
    boardId: row.board_id,
    result,
    createdAt: row.created_at,
  };
}

const SELECT_WITH_SESSION = `
  SELECT h.*, s.reference AS reference, s.reanalyse AS reanalyse
  FROM ticket_analysis_history h
  JOIN analysis_sessions s ON s.id = h.session_id
`;

export class HistoryRepository {
  constructor(private db: DatabaseType) {}

  append(session: AnalysisSession, result: AnalysisResult): HistoryEntry {
    const entry: HistoryEntry = {
      id: generateId(),
      cardId: result.cardId,
      sessionId: session.id,
      sessionReference: session.reference,
      reanalyse: session.reanalyse,
      boardId: session.boardId,
      result: { ...result },
      createdAt: now(),
    };

    this.db
      .prepare(`
        INSERT INTO ticket_analysis_history (
          id, card_id, session_id, board_id, card_title, is_critical, criticality_level,
          justification, success, failure_reason, analyzed_at, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        entry.id,
        result.cardId,
        session.id,
        session.boardId,
        result.cardTitle,
        boolToInt(result.isCritical),
        result.criticalityLevel,
        result.justification,
        boolToInt(result.success),
        result.failureReason ?? null,
        result.analyzedAt,
        entry.createdAt
      );

    return entry;
  }

  /**
   * All entries for a card, newest first
   */
  findByCard(cardId: string): HistoryEntry[] {
    return this.db
      .prepare<[string], HistoryRow>(`${SELECT_WITH_SESSION} WHERE h.card_id = ? ORDER BY h.created_at DESC, h.rowid DESC`)
      .all(cardId)
      .map(rowToEntry);
  }
}
