import axios, { AxiosInstance } from 'axios';
import { TrelloConfig, createApiError, createLogger } from '@card-triage/shared';
import {
  Card,
  CriticalityLevel,
  TrelloBoard,
  TrelloCard,
  TrelloLabel,
  TrelloList,
} from '../types/index.js';
import { ITrackerClient, ListCardsContext } from '../services/criticality-analysis/models/service-interfaces.js';

const logger = createLogger('Trello');

const PRIORITY_PREFIX = 'Priority - ';

export const PRIORITY_LABELS: Record<CriticalityLevel, { name: string; color: string }> = {
  HIGH: { name: `${PRIORITY_PREFIX}High`, color: 'red' },
  MEDIUM: { name: `${PRIORITY_PREFIX}Medium`, color: 'orange' },
  LOW: { name: `${PRIORITY_PREFIX}Low`, color: 'green' },
};

const CARD_FIELDS = 'name,desc,due,url,idList,idBoard,labels';

/**
 * Map a Trello REST card onto the domain card
 */
export function toCard(raw: TrelloCard, context: ListCardsContext): Card {
  return {
    id: raw.id,
    title: raw.name,
    description: raw.desc ?? '',
    due: raw.due ?? null,
    listName: raw.list?.name ?? context.listName,
    labels: (raw.labels ?? []).map((l) => ({ name: l.name, color: l.color })),
    members: (raw.members ?? []).map((m) => m.fullName ?? m.username ?? m.id),
    boardId: raw.board?.id ?? raw.idBoard ?? context.boardId,
    boardName: raw.board?.name ?? context.boardName,
    url: raw.url,
  };
}

export class TrelloClient implements ITrackerClient {
  private client: AxiosInstance;
  private config: TrelloConfig;

  constructor(config: TrelloConfig) {
    this.config = config;

    this.client = axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Accept': 'application/json',
      },
      timeout: 30000,
    });
  }

  /**
   * Query params for a request, with the key/token pair Trello expects on every call
   */
  private auth(params: Record<string, string> = {}): Record<string, string> {
    return { ...params, key: this.config.apiKey, token: this.config.token };
  }

  async getBoard(boardId: string): Promise<TrelloBoard> {
    try {
      const response = await this.client.get<TrelloBoard>(`/boards/${boardId}`, {
        params: this.auth({ fields: 'name,url' }),
      });
      return response.data;
    } catch (error) {
      throw createApiError(error, `Failed to get board ${boardId}`);
    }
  }

  async getList(listId: string): Promise<TrelloList> {
    try {
      const response = await this.client.get<TrelloList>(`/lists/${listId}`, {
        params: this.auth({ fields: 'name,idBoard' }),
      });
      return response.data;
    } catch (error) {
      throw createApiError(error, `Failed to get list ${listId}`);
    }
  }

  async getListCards(listId: string, context: ListCardsContext): Promise<Card[]> {
    try {
      const response = await this.client.get<TrelloCard[]>(`/lists/${listId}/cards`, {
        params: this.auth({ fields: CARD_FIELDS, members: 'true', member_fields: 'fullName,username' }),
      });
      logger.info(`Fetched ${response.data.length} cards from list ${listId}`);
      return response.data.map((raw) => toCard(raw, context));
    } catch (error) {
      throw createApiError(error, `Failed to get cards for list ${listId}`);
    }
  }

  async getCard(cardId: string): Promise<Card> {
    let raw: TrelloCard;
    try {
      const response = await this.client.get<TrelloCard>(`/cards/${cardId}`, {
        params: this.auth({
          fields: CARD_FIELDS,
          board: 'true',
          board_fields: 'name',
          list: 'true',
          list_fields: 'name',
          members: 'true',
          member_fields: 'fullName,username',
        }),
      });
      raw = response.data;
    } catch (error) {
      throw createApiError(error, `Failed to get card ${cardId}`);
    }
    return toCard(raw, { boardId: raw.idBoard ?? '', boardName: '', listName: '' });
  }

  /**
   * Put the priority label for `level` on the card, replacing any other priority label.
   * The label is created on the board when it does not exist yet.
   */
  async addLabel(cardId: string, boardId: string, level: CriticalityLevel): Promise<void> {
    const wanted = PRIORITY_LABELS[level];
    try {
      const cardLabels = await this.client.get<TrelloLabel[]>(`/cards/${cardId}/labels`, {
        params: this.auth(),
      });
      for (const label of cardLabels.data) {
        if (label.name.startsWith(PRIORITY_PREFIX) && label.name !== wanted.name) {
          await this.client.delete(`/cards/${cardId}/idLabels/${label.id}`, { params: this.auth() });
        }
      }
      if (cardLabels.data.some((l) => l.name === wanted.name)) {
        return;
      }

      const labelId = await this.getOrCreateBoardLabel(boardId, wanted.name, wanted.color);
      await this.client.post(`/cards/${cardId}/idLabels`, null, {
        params: this.auth({ value: labelId }),
      });
    } catch (error) {
      throw createApiError(error, `Failed to label card ${cardId}`);
    }
  }

  private async getOrCreateBoardLabel(boardId: string, name: string, color: string): Promise<string> {
    const existing = await this.client.get<TrelloLabel[]>(`/boards/${boardId}/labels`, {
      params: this.auth({ fields: 'name,color' }),
    });
    const match = existing.data.find((l) => l.name === name);
    if (match) {
      return match.id;
    }
    const created = await this.client.post<TrelloLabel>('/labels', null, {
      params: this.auth({ name, color, idBoard: boardId }),
    });
    logger.info(`Created label "${name}" on board ${boardId}`);
    return created.data.id;
  }

  async addComment(cardId: string, text: string): Promise<void> {
    try {
      await this.client.post(`/cards/${cardId}/actions/comments`, null, {
        params: this.auth({ text }),
      });
    } catch (error) {
      throw createApiError(error, `Failed to comment on card ${cardId}`);
    }
  }

  async moveCard(cardId: string, listId: string): Promise<void> {
    try {
      await this.client.put(`/cards/${cardId}`, null, {
        params: this.auth({ idList: listId }),
      });
    } catch (error) {
      throw createApiError(error, `Failed to move card ${cardId}`);
    }
  }
}
