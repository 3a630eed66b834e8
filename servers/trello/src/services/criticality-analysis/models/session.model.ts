/**
 * Persisted records: sessions, history entries, ticket snapshots, board configs
 */

import { Card } from '../../../types/index.js';
import { AnalysisResult } from './analysis-result.model.js';

/**
 * One pipeline invocation against one board. Never updated after creation;
 * a re-analysis always gets a new session.
 */
export interface AnalysisSession {
  id: string;
  reference: string;
  boardId: string;
  listId: string | null;
  reanalyse: boolean;
  createdAt: string;
}

/**
 * Append-only audit record linking a card to the session that produced its result
 */
export interface HistoryEntry {
  id: string;
  cardId: string;
  sessionId: string;
  sessionReference: string;
  reanalyse: boolean;
  boardId: string;
  result: AnalysisResult;
  createdAt: string;
}

export interface TicketSnapshot {
  cardId: string;
  boardId: string;
  listId: string | null;
  card: Card;
  updatedAt: string;
}

export interface BoardConfig {
  boardId: string;
  boardName: string | null;
  sourceListId: string | null;
  sourceListName: string | null;
  targetListId: string | null;
  targetListName: string | null;
  moveHighCards: boolean;
  addLabels: boolean;
  addComments: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields accepted when creating or updating a board config; omitted fields keep their value
 */
export type BoardConfigInput = { boardId: string } & Partial<
  Omit<BoardConfig, 'boardId' | 'createdAt' | 'updatedAt'>
>;
