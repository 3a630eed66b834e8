/**
 * Context Retriever Service
 * Looks up documentation excerpts and similar past analyses for a card
 */

import { createLogger, getErrorMessage } from '@card-triage/shared';
import { Card, isCriticalityLevel } from '../../../types/index.js';
import { AnalysisResult } from '../models/analysis-result.model.js';
import {
  ContextBundle,
  ContextSection,
  DocumentExcerpt,
  SimilarAnalysis,
} from '../models/context.model.js';
import { IContextRetriever, IVectorStore, VectorMatch } from '../models/service-interfaces.js';

const logger = createLogger('ContextRetriever');

export interface ContextCollections {
  documents: string;
  history: string;
}

export interface RetrievalLimits {
  documentResults: number;
  historyResults: number;
}

/**
 * Text used both to query and to index card history
 */
export function cardFingerprint(card: Card): string {
  return `${card.title}\n${card.description}`.trim();
}

function metaString(match: VectorMatch, key: string): string | undefined {
  const value = match.metadata[key];
  return value === undefined ? undefined : String(value);
}

function toSimilarAnalysis(match: VectorMatch): SimilarAnalysis | null {
  const level = metaString(match, 'criticality_level') ?? '';
  if (!isCriticalityLevel(level)) {
    return null;
  }
  const critical = match.metadata.is_critical;
  return {
    cardId: metaString(match, 'card_id'),
    title: metaString(match, 'title') ?? '',
    summary: match.text,
    criticalityLevel: level,
    isCritical: critical === true || critical === 'true' || critical === 1,
    justification: metaString(match, 'justification') ?? '',
    score: match.score,
  };
}

function section<T>(items: T[]): ContextSection<T> {
  return items.length > 0 ? { status: 'available', items } : { status: 'empty' };
}

export class ContextRetrieverService implements IContextRetriever {
  constructor(
    private vectorStore: IVectorStore,
    private collections: ContextCollections,
    private limits: RetrievalLimits
  ) {}

  async retrieve(card: Card): Promise<ContextBundle> {
    const [documents, similarAnalyses] = await Promise.all([
      this.searchDocuments(card),
      this.searchHistory(card),
    ]);
    return { documents, similarAnalyses };
  }

  private async searchDocuments(card: Card): Promise<ContextSection<DocumentExcerpt>> {
    try {
      const matches = await this.vectorStore.search(
        this.collections.documents,
        cardFingerprint(card),
        this.limits.documentResults
      );
      return section(
        matches.map((m) => ({ text: m.text, score: m.score, source: metaString(m, 'source') }))
      );
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.warn(`Documentation search failed for card ${card.id}: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  private async searchHistory(card: Card): Promise<ContextSection<SimilarAnalysis>> {
    const limit = this.limits.historyResults;
    try {
      // One extra match so the card's own past analysis can be dropped
      const matches = await this.vectorStore.search(this.collections.history, cardFingerprint(card), limit + 1);
      const similar: SimilarAnalysis[] = [];
      for (const match of matches) {
        if (metaString(match, 'card_id') === card.id) continue;
        const analysis = toSimilarAnalysis(match);
        if (analysis) similar.push(analysis);
      }
      return section(similar.slice(0, limit));
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.warn(`History search failed for card ${card.id}: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  async remember(card: Card, result: AnalysisResult): Promise<void> {
    const status = result.isCritical ? `critical, ${result.criticalityLevel}` : 'not critical';
    try {
      await this.vectorStore.add(this.collections.history, [
        {
          id: `${card.id}:${result.analyzedAt}`,
          text: `${cardFingerprint(card)}\nAssessment: ${status}\nJustification: ${result.justification}`,
          metadata: {
            card_id: card.id,
            board_id: card.boardId,
            title: card.title,
            criticality_level: result.criticalityLevel,
            is_critical: result.isCritical,
            justification: result.justification,
            analyzed_at: result.analyzedAt,
          },
        },
      ]);
    } catch (error) {
      logger.warn(`Could not record analysis of card ${card.id} in history: ${getErrorMessage(error)}`);
    }
  }
}
