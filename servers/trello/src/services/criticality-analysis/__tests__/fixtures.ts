/**
 * Shared builders for criticality analysis tests
 */

import { Card } from '../../../types/index';
import { AnalysisResult } from '../models/analysis-result.model';
import { ContextBundle } from '../models/context.model';
import { BoardConfig } from '../models/session.model';

export function makeCard(id: string, overrides: Partial<Card> = {}): Card {
  return {
    id,
    title: `Card ${id}`,
    description: `Description of ${id}`,
    due: null,
    listName: 'Inbox',
    labels: [],
    members: [],
    boardId: 'B1',
    boardName: 'Support board',
    url: `https://trello.example/c/${id}`,
    ...overrides,
  };
}

export function makeResult(cardId: string, overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    cardId,
    cardTitle: `Card ${cardId}`,
    isCritical: true,
    criticalityLevel: 'HIGH',
    justification: 'Customers are blocked',
    success: true,
    analyzedAt: '2024-03-15T10:00:00.000Z',
    ...overrides,
  };
}

export function makeConfig(boardId: string, overrides: Partial<BoardConfig> = {}): BoardConfig {
  return {
    boardId,
    boardName: `Board ${boardId}`,
    sourceListId: null,
    sourceListName: null,
    targetListId: null,
    targetListName: null,
    moveHighCards: false,
    addLabels: true,
    addComments: true,
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export const EMPTY_CONTEXT: ContextBundle = {
  documents: { status: 'empty' },
  similarAnalyses: { status: 'empty' },
};
