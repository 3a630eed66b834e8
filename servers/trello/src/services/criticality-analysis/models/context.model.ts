/**
 * Data models for retrieved per-card context
 */

import { Card, CriticalityLevel } from '../../../types/index.js';

export interface DocumentExcerpt {
  text: string;
  score: number;
  source?: string;
}

export interface SimilarAnalysis {
  cardId?: string;
  title: string;
  summary: string;
  criticalityLevel: CriticalityLevel;
  isCritical: boolean;
  justification: string;
  score: number;
}

/**
 * One half of a context bundle. `empty` means the search ran and matched
 * nothing; `unavailable` means the store could not be queried.
 */
export type ContextSection<T> =
  | { status: 'available'; items: T[] }
  | { status: 'empty' }
  | { status: 'unavailable'; reason: string };

export interface ContextBundle {
  documents: ContextSection<DocumentExcerpt>;
  similarAnalyses: ContextSection<SimilarAnalysis>;
}

/**
 * Prior assessment shown to the model when a card is re-analysed
 */
export interface PreviousAssessment {
  criticalityLevel: CriticalityLevel;
  isCritical: boolean;
  justification: string;
  analyzedAt: string;
}

export interface PromptEntry {
  card: Card;
  context: ContextBundle;
  previous?: PreviousAssessment;
}
