/**
 * Result store backed by SQLite
 * Every failure surfaces as ResultStoreError
 */

import { ResultStoreError, getErrorMessage, toError } from '@card-triage/shared';
import { DatabaseType } from './index.js';
import {
  BoardConfigRepository,
  HistoryRepository,
  SessionRepository,
  StatisticsRepository,
  TicketRepository,
} from './repositories/index.js';
import { Card } from '../types/index.js';
import { AnalysisResult } from '../services/criticality-analysis/models/analysis-result.model.js';
import {
  AnalysisSession,
  BoardConfig,
  BoardConfigInput,
  HistoryEntry,
  TicketSnapshot,
} from '../services/criticality-analysis/models/session.model.js';
import { IResultStore } from '../services/criticality-analysis/models/service-interfaces.js';

export class SqliteResultStore implements IResultStore {
  readonly sessions: SessionRepository;
  readonly history: HistoryRepository;
  readonly tickets: TicketRepository;
  readonly boardConfigs: BoardConfigRepository;
  readonly statistics: StatisticsRepository;

  constructor(private db: DatabaseType) {
    this.sessions = new SessionRepository(db);
    this.history = new HistoryRepository(db);
    this.tickets = new TicketRepository(db);
    this.boardConfigs = new BoardConfigRepository(db);
    this.statistics = new StatisticsRepository(db);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new ResultStoreError(`Failed to ${operation}: ${getErrorMessage(error)}`, toError(error));
    }
  }

  createSession(boardId: string, listId: string | null, reanalyse: boolean): AnalysisSession {
    return this.run('create session', () => this.sessions.create(boardId, listId, reanalyse));
  }

  appendHistory(session: AnalysisSession, result: AnalysisResult): HistoryEntry {
    return this.run(`append history for card ${result.cardId}`, () => this.history.append(session, result));
  }

  saveTicket(card: Card, listId: string | null): TicketSnapshot {
    return this.run(`save ticket ${card.id}`, () => this.tickets.upsert(card, listId));
  }

  updateTicketList(cardId: string, listId: string): void {
    this.run(`update list of ticket ${cardId}`, () => this.tickets.updateList(cardId, listId));
  }

  findTicket(cardId: string): TicketSnapshot | null {
    return this.run(`read ticket ${cardId}`, () => this.tickets.findById(cardId));
  }

  findHistoryByCard(cardId: string): HistoryEntry[] {
    return this.run(`read history for card ${cardId}`, () => this.history.findByCard(cardId));
  }

  findBoardConfig(boardId: string): BoardConfig | null {
    return this.run(`read config for board ${boardId}`, () => this.boardConfigs.findByBoardId(boardId));
  }

  listBoardConfigs(): BoardConfig[] {
    return this.run('list board configs', () => this.boardConfigs.findAll());
  }

  saveBoardConfig(input: BoardConfigInput): BoardConfig {
    return this.run(`save config for board ${input.boardId}`, () => this.boardConfigs.save(input));
  }

  close(): void {
    this.db.close();
  }
}
