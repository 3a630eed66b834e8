/**
 * Result models for the criticality analysis pipeline
 */

import { CriticalityLevel } from '../../../types/index.js';
import { AnalysisSession, HistoryEntry } from './session.model.js';

export interface AnalysisResult {
  cardId: string;
  cardTitle: string;
  isCritical: boolean;
  /** Only meaningful when isCritical; non-critical cards carry the nominal level */
  criticalityLevel: CriticalityLevel;
  justification: string;
  /** True only when the card's line was parsed from a valid LLM response */
  success: boolean;
  analyzedAt: string;
  failureReason?: string;
}

/**
 * Outcome of interpreting one line of model output
 */
export type LineClassification =
  | {
      kind: 'parsed';
      cardId: string;
      isCritical: boolean;
      criticalityLevel: CriticalityLevel | null;
      justification: string;
    }
  | { kind: 'malformed'; cardId: string; reason: string; raw: string }
  | { kind: 'unknown-id'; cardId: string; raw: string };

export interface BatchOutcome {
  index: number;
  status: 'completed' | 'failed';
  cardIds: string[];
  results: AnalysisResult[];
  error?: string;
}

export interface CriticalityDistribution {
  HIGH: number;
  MEDIUM: number;
  LOW: number;
  critical: number;
  nonCritical: number;
}

export type ActionStatus =
  | { status: 'applied'; detail?: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface CardActionReport {
  cardId: string;
  label: ActionStatus;
  comment: ActionStatus;
  move: ActionStatus;
}

export interface AnalysisSessionSummary {
  session: AnalysisSession;
  results: AnalysisResult[];
  batches: BatchOutcome[];
  successCount: number;
  failureCount: number;
  distribution: CriticalityDistribution;
  boardConfigured: boolean;
  actions: CardActionReport[];
}

export interface ReanalysisOutcome {
  session: AnalysisSession;
  result: AnalysisResult;
  actions: CardActionReport[];
  previous: HistoryEntry | null;
}

export interface ConfiguredBoardRun {
  boardId: string;
  listId: string;
  summary?: AnalysisSessionSummary;
  error?: string;
}
