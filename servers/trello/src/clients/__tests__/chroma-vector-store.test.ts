/**
 * ChromaVectorStore Unit Tests
 */

import { ChromaVectorStore } from '../chroma-vector-store';
import { ChromaClient } from '../chroma-client';

const mockChroma = {
  getCollection: jest.fn(),
  getOrCreateCollection: jest.fn(),
  query: jest.fn(),
  upsert: jest.fn(),
};

const mockEmbedder = {
  embed: jest.fn(),
};

describe('ChromaVectorStore', () => {
  let store: ChromaVectorStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new ChromaVectorStore(mockChroma as unknown as ChromaClient, mockEmbedder, 5000);
  });

  it('should return no matches for a missing collection', async () => {
    mockChroma.getCollection.mockResolvedValue(null);

    await expect(store.search('docs', 'checkout', 4)).resolves.toEqual([]);
    expect(mockEmbedder.embed).not.toHaveBeenCalled();
  });

  it('should embed the query and convert distances to scores', async () => {
    mockChroma.getCollection.mockResolvedValue({ id: 'col-1', name: 'docs' });
    mockEmbedder.embed.mockResolvedValue([[0.1, 0.2]]);
    mockChroma.query.mockResolvedValue({
      ids: [['d1', 'd2']],
      documents: [['SLA text', null]],
      metadatas: [[{ source: 'sla.md' }, null]],
      distances: [[0.25, 0.75]],
    });

    const matches = await store.search('docs', 'checkout', 2);

    expect(mockEmbedder.embed).toHaveBeenCalledWith(['checkout'], 5000);
    expect(mockChroma.query).toHaveBeenCalledWith('col-1', [[0.1, 0.2]], 2);
    expect(matches).toEqual([
      { id: 'd1', text: 'SLA text', score: 0.75, metadata: { source: 'sla.md' } },
      { id: 'd2', text: '', score: 0.25, metadata: {} },
    ]);
  });

  it('should skip the search for an empty query', async () => {
    await expect(store.search('docs', '   ', 4)).resolves.toEqual([]);
    expect(mockChroma.getCollection).not.toHaveBeenCalled();
  });

  it('should upsert documents with their embeddings', async () => {
    mockChroma.getOrCreateCollection.mockResolvedValue({ id: 'col-2', name: 'history' });
    mockEmbedder.embed.mockResolvedValue([[1, 0]]);
    mockChroma.upsert.mockResolvedValue(undefined);

    await store.add('history', [{ id: 'c1:t', text: 'card text', metadata: { card_id: 'c1' } }]);

    expect(mockChroma.upsert).toHaveBeenCalledWith('col-2', {
      ids: ['c1:t'],
      embeddings: [[1, 0]],
      documents: ['card text'],
      metadatas: [{ card_id: 'c1' }],
    });
  });

  it('should propagate embedding failures', async () => {
    mockChroma.getCollection.mockResolvedValue({ id: 'col-1', name: 'docs' });
    mockEmbedder.embed.mockRejectedValue(new Error('embed model missing'));

    await expect(store.search('docs', 'checkout', 4)).rejects.toThrow('embed model missing');
  });
});
