/**
 * Service interfaces for the criticality analysis pipeline
 * Defines contracts for all services and external collaborators
 */

import { Card, CriticalityLevel, TrelloBoard, TrelloList } from '../../../types/index.js';
import { AnalysisResult, CardActionReport } from './analysis-result.model.js';
import { ContextBundle, PromptEntry } from './context.model.js';
import {
  AnalysisSession,
  BoardConfig,
  BoardConfigInput,
  HistoryEntry,
  TicketSnapshot,
} from './session.model.js';

export interface IContextRetriever {
  /**
   * Fetch documentation excerpts and similar prior analyses for a card.
   * Never rejects: a failing store yields an `unavailable` section.
   */
  retrieve(card: Card): Promise<ContextBundle>;

  /**
   * Record a successful analysis in the history collection so later
   * cards can be compared against it. Never rejects.
   */
  remember(card: Card, result: AnalysisResult): Promise<void>;
}

export interface IPromptBuilder {
  build(entries: PromptEntry[]): string;
}

export interface ICriticalityClassifier {
  /**
   * Run one LLM call for the batch and return exactly one result per expected card,
   * in the same order
   *
   * @throws LlmInvocationError when the model cannot be reached
   */
  classify(prompt: string, expectedCards: Card[]): Promise<AnalysisResult[]>;

  /**
   * Fallback results for cards whose batch could not be classified
   */
  fallbackFor(cards: Card[], reason: string): AnalysisResult[];
}

export interface IBoardActionPolicy {
  resolve(boardId: string): BoardConfig | null;
}

export interface IBoardActionExecutor {
  execute(result: AnalysisResult, card: Card, config: BoardConfig): Promise<CardActionReport>;
}

export interface ListCardsContext {
  boardId: string;
  boardName: string;
  listName: string;
}

export interface ITrackerClient {
  getBoard(boardId: string): Promise<TrelloBoard>;
  getList(listId: string): Promise<TrelloList>;
  getListCards(listId: string, context: ListCardsContext): Promise<Card[]>;
  getCard(cardId: string): Promise<Card>;
  addLabel(cardId: string, boardId: string, level: CriticalityLevel): Promise<void>;
  addComment(cardId: string, text: string): Promise<void>;
  moveCard(cardId: string, listId: string): Promise<void>;
}

export interface VectorMatch {
  id: string;
  text: string;
  /** 1 - distance; higher is closer */
  score: number;
  metadata: Record<string, string | number | boolean>;
}

export interface VectorDocument {
  id: string;
  text: string;
  metadata: Record<string, string | number | boolean>;
}

export interface IVectorStore {
  /**
   * Nearest-neighbour text search; a missing collection yields []
   */
  search(collection: string, queryText: string, topK: number): Promise<VectorMatch[]>;
  add(collection: string, documents: VectorDocument[]): Promise<void>;
}

export interface LLMGenerateOptions {
  temperature?: number;
  num_predict?: number;
  timeout?: number;
}

export interface ILLMClient {
  generate(prompt: string, options?: LLMGenerateOptions): Promise<string>;
}

export interface IEmbedder {
  embed(texts: string[], timeoutMs?: number): Promise<number[][]>;
}

/**
 * Persistence for sessions, history, ticket snapshots and board configs.
 * Every method throws ResultStoreError on failure.
 */
export interface IResultStore {
  createSession(boardId: string, listId: string | null, reanalyse: boolean): AnalysisSession;
  appendHistory(session: AnalysisSession, result: AnalysisResult): HistoryEntry;
  saveTicket(card: Card, listId: string | null): TicketSnapshot;
  updateTicketList(cardId: string, listId: string): void;
  findTicket(cardId: string): TicketSnapshot | null;
  /** Newest first */
  findHistoryByCard(cardId: string): HistoryEntry[];
  findBoardConfig(boardId: string): BoardConfig | null;
  listBoardConfigs(): BoardConfig[];
  saveBoardConfig(input: BoardConfigInput): BoardConfig;
}
