/**
 * TrelloClient Unit Tests
 * axios is replaced by an in-process stub
 */

import { ApiError } from '@card-triage/shared';
import { TrelloClient, toCard } from '../trello-client';

const mockHttp = {
  get: jest.fn(),
  post: jest.fn(),
  put: jest.fn(),
  delete: jest.fn(),
};

jest.mock('axios', () => ({
  __esModule: true,
  default: {
    create: jest.fn(() => mockHttp),
    isAxiosError: jest.fn(() => false),
  },
}));

const auth = { key: 'test-key', token: 'test-token' };
const context = { boardId: 'B1', boardName: 'Support', listName: 'Inbox' };

describe('TrelloClient', () => {
  let client: TrelloClient;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new TrelloClient({ baseUrl: 'https://trello.example/1', apiKey: 'test-key', token: 'test-token' });
  });

  describe('toCard', () => {
    it('should map a REST card onto the domain card', () => {
      const card = toCard(
        {
          id: 'c1',
          name: 'Checkout fails',
          desc: 'Payment 500',
          due: '2024-03-20T12:00:00.000Z',
          url: 'https://trello.example/c/c1',
          labels: [{ id: 'l1', name: 'Bug', color: 'red' }],
          members: [{ id: 'm1', fullName: 'Ana Silva' }, { id: 'm2', username: 'lee' }, { id: 'm3' }],
          board: { id: 'B1', name: 'Support' },
          list: { id: 'L2', name: 'Doing' },
        },
        context
      );

      expect(card).toEqual({
        id: 'c1',
        title: 'Checkout fails',
        description: 'Payment 500',
        due: '2024-03-20T12:00:00.000Z',
        listName: 'Doing',
        labels: [{ name: 'Bug', color: 'red' }],
        members: ['Ana Silva', 'lee', 'm3'],
        boardId: 'B1',
        boardName: 'Support',
        url: 'https://trello.example/c/c1',
      });
    });

    it('should fill missing fields from the list context', () => {
      const card = toCard({ id: 'c2', name: 'Bare', url: 'u' }, context);

      expect(card).toMatchObject({ description: '', due: null, listName: 'Inbox', boardId: 'B1', boardName: 'Support', labels: [], members: [] });
    });
  });

  it('should fetch list cards with credentials', async () => {
    mockHttp.get.mockResolvedValue({ data: [{ id: 'c1', name: 'One', url: 'u1' }] });

    const cards = await client.getListCards('L1', context);

    expect(mockHttp.get).toHaveBeenCalledWith('/lists/L1/cards', {
      params: {
        fields: 'name,desc,due,url,idList,idBoard,labels',
        members: 'true',
        member_fields: 'fullName,username',
        ...auth,
      },
    });
    expect(cards.map((c) => c.id)).toEqual(['c1']);
    expect(cards[0].listName).toBe('Inbox');
  });

  describe('addLabel', () => {
    it('should replace other priority labels with an existing board label', async () => {
      mockHttp.get.mockImplementation(async (url: string) => {
        if (url === '/cards/c1/labels') {
          return { data: [{ id: 'low', name: 'Priority - Low', color: 'green' }, { id: 'bug', name: 'Bug', color: 'red' }] };
        }
        return { data: [{ id: 'high', name: 'Priority - High', color: 'red' }] };
      });
      mockHttp.delete.mockResolvedValue({ data: {} });
      mockHttp.post.mockResolvedValue({ data: {} });

      await client.addLabel('c1', 'B1', 'HIGH');

      expect(mockHttp.delete).toHaveBeenCalledTimes(1);
      expect(mockHttp.delete).toHaveBeenCalledWith('/cards/c1/idLabels/low', { params: auth });
      expect(mockHttp.post).toHaveBeenCalledTimes(1);
      expect(mockHttp.post).toHaveBeenCalledWith('/cards/c1/idLabels', null, { params: { value: 'high', ...auth } });
    });

    it('should create the label on the board when missing', async () => {
      mockHttp.get.mockResolvedValue({ data: [] });
      mockHttp.post.mockImplementation(async (url: string) => (url === '/labels' ? { data: { id: 'new' } } : { data: {} }));

      await client.addLabel('c1', 'B1', 'MEDIUM');

      expect(mockHttp.post).toHaveBeenNthCalledWith(1, '/labels', null, {
        params: { name: 'Priority - Medium', color: 'orange', idBoard: 'B1', ...auth },
      });
      expect(mockHttp.post).toHaveBeenNthCalledWith(2, '/cards/c1/idLabels', null, { params: { value: 'new', ...auth } });
    });

    it('should do nothing when the card already has the label', async () => {
      mockHttp.get.mockResolvedValue({ data: [{ id: 'high', name: 'Priority - High', color: 'red' }] });

      await client.addLabel('c1', 'B1', 'HIGH');

      expect(mockHttp.delete).not.toHaveBeenCalled();
      expect(mockHttp.post).not.toHaveBeenCalled();
    });
  });

  it('should post a comment', async () => {
    mockHttp.post.mockResolvedValue({ data: {} });

    await client.addComment('c1', 'Criticality analysis: HIGH\n\nOutage');

    expect(mockHttp.post).toHaveBeenCalledWith('/cards/c1/actions/comments', null, {
      params: { text: 'Criticality analysis: HIGH\n\nOutage', ...auth },
    });
  });

  it('should move a card', async () => {
    mockHttp.put.mockResolvedValue({ data: {} });

    await client.moveCard('c1', 'Ldone');

    expect(mockHttp.put).toHaveBeenCalledWith('/cards/c1', null, { params: { idList: 'Ldone', ...auth } });
  });

  it('should turn HTTP failures into ApiError', async () => {
    mockHttp.get.mockRejectedValue({ response: { status: 401, data: 'invalid key' } });

    const promise = client.getBoard('B1');

    await expect(promise).rejects.toBeInstanceOf(ApiError);
    await expect(promise).rejects.toMatchObject({ message: 'Failed to get board B1: invalid key', statusCode: 401 });
  });
});
