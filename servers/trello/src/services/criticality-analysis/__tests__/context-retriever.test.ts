/**
 * ContextRetrieverService Unit Tests
 * Degradation to empty/unavailable sections and self-exclusion from history
 */

import { ContextRetrieverService, cardFingerprint } from '../services/context-retriever.service';
import { VectorMatch } from '../models/service-interfaces';
import { makeCard, makeResult } from './fixtures';

const mockVectorStore = {
  search: jest.fn(),
  add: jest.fn(),
};

function historyMatch(cardId: string, score: number, overrides: Record<string, string> = {}): VectorMatch {
  return {
    id: `${cardId}:2024`,
    text: `history of ${cardId}`,
    score,
    metadata: {
      card_id: cardId,
      title: `Card ${cardId}`,
      criticality_level: 'HIGH',
      is_critical: true,
      justification: `why ${cardId}`,
      ...overrides,
    },
  };
}

describe('ContextRetrieverService', () => {
  let retriever: ContextRetrieverService;
  const card = makeCard('c1', { title: 'Checkout fails', description: 'Payment page returns 500' });

  beforeEach(() => {
    jest.clearAllMocks();
    retriever = new ContextRetrieverService(
      mockVectorStore,
      { documents: 'docs', history: 'history' },
      { documentResults: 4, historyResults: 2 }
    );
  });

  it('should query both collections with the card fingerprint', async () => {
    mockVectorStore.search.mockResolvedValue([]);

    await retriever.retrieve(card);

    expect(cardFingerprint(card)).toBe('Checkout fails\nPayment page returns 500');
    expect(mockVectorStore.search).toHaveBeenCalledWith('docs', 'Checkout fails\nPayment page returns 500', 4);
    expect(mockVectorStore.search).toHaveBeenCalledWith('history', 'Checkout fails\nPayment page returns 500', 3);
  });

  it('should report empty sections when nothing matches', async () => {
    mockVectorStore.search.mockResolvedValue([]);

    const bundle = await retriever.retrieve(card);

    expect(bundle).toEqual({ documents: { status: 'empty' }, similarAnalyses: { status: 'empty' } });
  });

  it('should map documentation matches', async () => {
    mockVectorStore.search.mockImplementation(async (collection: string) =>
      collection === 'docs' ? [{ id: 'd1', text: 'SLA text', score: 0.8, metadata: { source: 'sla.md' } }] : []
    );

    const bundle = await retriever.retrieve(card);

    expect(bundle.documents).toEqual({ status: 'available', items: [{ text: 'SLA text', score: 0.8, source: 'sla.md' }] });
  });

  it('should drop the card itself from similar analyses and keep K', async () => {
    mockVectorStore.search.mockImplementation(async (collection: string) =>
      collection === 'history' ? [historyMatch('c1', 0.99), historyMatch('c7', 0.9), historyMatch('c8', 0.8)] : []
    );

    const bundle = await retriever.retrieve(card);

    expect(bundle.similarAnalyses).toEqual({
      status: 'available',
      items: [
        {
          cardId: 'c7',
          title: 'Card c7',
          summary: 'history of c7',
          criticalityLevel: 'HIGH',
          isCritical: true,
          justification: 'why c7',
          score: 0.9,
        },
        {
          cardId: 'c8',
          title: 'Card c8',
          summary: 'history of c8',
          criticalityLevel: 'HIGH',
          isCritical: true,
          justification: 'why c8',
          score: 0.8,
        },
      ],
    });
  });

  it('should skip history matches without a valid level', async () => {
    mockVectorStore.search.mockImplementation(async (collection: string) =>
      collection === 'history' ? [historyMatch('c7', 0.9, { criticality_level: 'URGENT' })] : []
    );

    const bundle = await retriever.retrieve(card);

    expect(bundle.similarAnalyses).toEqual({ status: 'empty' });
  });

  it('should mark a failing search unavailable without rejecting', async () => {
    mockVectorStore.search.mockImplementation(async (collection: string) => {
      if (collection === 'docs') throw new Error('ECONNREFUSED');
      return [historyMatch('c7', 0.9)];
    });

    const bundle = await retriever.retrieve(card);

    expect(bundle.documents).toEqual({ status: 'unavailable', reason: 'ECONNREFUSED' });
    expect(bundle.similarAnalyses.status).toBe('available');
  });

  describe('remember', () => {
    it('should add the analysis to the history collection', async () => {
      mockVectorStore.add.mockResolvedValue(undefined);
      const result = makeResult('c1', { criticalityLevel: 'MEDIUM', justification: 'Slow' });

      await retriever.remember(card, result);

      expect(mockVectorStore.add).toHaveBeenCalledWith('history', [
        {
          id: 'c1:2024-03-15T10:00:00.000Z',
          text: 'Checkout fails\nPayment page returns 500\nAssessment: critical, MEDIUM\nJustification: Slow',
          metadata: {
            card_id: 'c1',
            board_id: 'B1',
            title: 'Checkout fails',
            criticality_level: 'MEDIUM',
            is_critical: true,
            justification: 'Slow',
            analyzed_at: '2024-03-15T10:00:00.000Z',
          },
        },
      ]);
    });

    it('should not reject when the store fails', async () => {
      mockVectorStore.add.mockRejectedValue(new Error('disk full'));

      await expect(retriever.remember(card, makeResult('c1'))).resolves.toBeUndefined();
    });
  });
});
