/**
 * Analysis Session Repository
 *
 * Sessions are created once and never updated
 */

import { DatabaseType } from '../index.js';
import { boolToInt, generateId, now, sessionReference } from '../utils.js';
import { AnalysisSession } from '../../services/criticality-analysis/models/session.model.js';

export class SessionRepository {
  constructor(private db: DatabaseType) {}

  create(boardId: string, listId: string | null, reanalyse: boolean): AnalysisSession {
    const session: AnalysisSession = {
      id: generateId(),
      reference: sessionReference(reanalyse),
      boardId,
      listId,
      reanalyse,
      createdAt: now(),
    };

    this.db
      .prepare(`
        INSERT INTO analysis_sessions (id, reference, board_id, list_id, reanalyse, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(session.id, session.reference, boardId, listId, boolToInt(reanalyse), session.createdAt);

    return session;
  }
}
