/**
 * Ticket Repository
 *
 * Latest known card payload per card id
 */

import { DatabaseType } from '../index.js';
import { now } from '../utils.js';
import { Card } from '../../types/index.js';
import { TicketSnapshot } from '../../services/criticality-analysis/models/session.model.js';

interface TicketRow {
  card_id: string;
  board_id: string;
  board_name: string | null;
  list_id: string | null;
  card_data: string;
  created_at: string;
  updated_at: string;
}

function isCard(value: unknown): value is Card {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'title' in value &&
    typeof value.title === 'string' &&
    'labels' in value &&
    Array.isArray(value.labels) &&
    'members' in value &&
    Array.isArray(value.members)
  );
}

function rowToSnapshot(row: TicketRow): TicketSnapshot {
  const card: unknown = JSON.parse(row.card_data);
  if (!isCard(card)) {
    throw new Error(`Stored card data for ${row.card_id} is not a card`);
  }
  return {
    cardId: row.card_id,
    boardId: row.board_id,
    listId: row.list_id,
    card,
    updatedAt: row.updated_at,
  };
}

export class TicketRepository {
  constructor(private db: DatabaseType) {}

  upsert(card: Card, listId: string | null): TicketSnapshot {
    const timestamp = now();
    this.db
      .prepare(`
        INSERT INTO tickets (card_id, board_id, board_name, list_id, card_data, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(card_id) DO UPDATE SET
          board_id = excluded.board_id,
          board_name = excluded.board_name,
          list_id = excluded.list_id,
          card_data = excluded.card_data,
          updated_at = excluded.updated_at
      `)
      .run(card.id, card.boardId, card.boardName, listId, JSON.stringify(card), timestamp, timestamp);

    return { cardId: card.id, boardId: card.boardId, listId, card, updatedAt: timestamp };
  }

  updateList(cardId: string, listId: string): void {
    this.db
      .prepare(`UPDATE tickets SET list_id = ?, updated_at = ? WHERE card_id = ?`)
      .run(listId, now(), cardId);
  }

  findById(cardId: string): TicketSnapshot | null {
    const row = this.db.prepare<[string], TicketRow>(`SELECT * FROM tickets WHERE card_id = ?`).get(cardId);
    return row ? rowToSnapshot(row) : null;
  }
}
