/**
 * Board Config Repository
 *
 * One row per board, keyed strictly by board id
 */

import { DatabaseType } from '../index.js';
import { boolToInt, intToBool, now } from '../utils.js';
import { BoardConfig, BoardConfigInput } from '../../services/criticality-analysis/models/session.model.js';

interface BoardConfigRow {
  board_id: string;
  board_name: string | null;
  source_list_id: string | null;
  source_list_name: string | null;
  target_list_id: string | null;
  target_list_name: string | null;
  move_high_cards: number;
  add_labels: number;
  add_comments: number;
  created_at: string;
  updated_at: string;
}

function rowToConfig(row: BoardConfigRow): BoardConfig {
  return {
    boardId: row.board_id,
    boardName: row.board_name,
    sourceListId: row.source_list_id,
    sourceListName: row.source_list_name,
    targetListId: row.target_list_id,
    targetListName: row.target_list_name,
    moveHighCards: intToBool(row.move_high_cards),
    addLabels: intToBool(row.add_labels),
    addComments: intToBool(row.add_comments),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * `undefined` keeps the stored value; `null` clears it
 */
function merge<T>(value: T | undefined, stored: T | undefined, fallback: T): T {
  if (value !== undefined) return value;
  return stored !== undefined ? stored : fallback;
}

export class BoardConfigRepository {
  constructor(private db: DatabaseType) {}

  findByBoardId(boardId: string): BoardConfig | null {
    const row = this.db
      .prepare<[string], BoardConfigRow>(`SELECT * FROM board_configs WHERE board_id = ?`)
      .get(boardId);
    return row ? rowToConfig(row) : null;
  }

  findAll(): BoardConfig[] {
    return this.db
      .prepare<[], BoardConfigRow>(`SELECT * FROM board_configs ORDER BY created_at ASC, rowid ASC`)
      .all()
      .map(rowToConfig);
  }

  /**
   * Create or update; fields left out of `input` keep their stored value, null clears one
   */
  save(input: BoardConfigInput): BoardConfig {
    const existing = this.findByBoardId(input.boardId);
    const timestamp = now();
    const merged: BoardConfig = {
      boardId: input.boardId,
      boardName: merge(input.boardName, existing?.boardName, null),
      sourceListId: merge(input.sourceListId, existing?.sourceListId, null),
      sourceListName: merge(input.sourceListName, existing?.sourceListName, null),
      targetListId: merge(input.targetListId, existing?.targetListId, null),
      targetListName: merge(input.targetListName, existing?.targetListName, null),
      moveHighCards: merge(input.moveHighCards, existing?.moveHighCards, false),
      addLabels: merge(input.addLabels, existing?.addLabels, true),
      addComments: merge(input.addComments, existing?.addComments, true),
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };

    this.db
      .prepare(`
        INSERT INTO board_configs (
          board_id, board_name, source_list_id, source_list_name, target_list_id, target_list_name,
          move_high_cards, add_labels, add_comments, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(board_id) DO UPDATE SET
          board_name = excluded.board_name,
          source_list_id = excluded.source_list_id,
          source_list_name = excluded.source_list_name,
          target_list_id = excluded.target_list_id,
          target_list_name = excluded.target_list_name,
          move_high_cards = excluded.move_high_cards,
          add_labels = excluded.add_labels,
          add_comments = excluded.add_comments,
          updated_at = excluded.updated_at
      `)
      .run(
        merged.boardId,
        merged.boardName,
        merged.sourceListId,
        merged.sourceListName,
        merged.targetListId,
        merged.targetListName,
        boolToInt(merged.moveHighCards),
        boolToInt(merged.addLabels),
        boolToInt(merged.addComments),
        merged.createdAt,
        merged.updatedAt
      );

    return merged;
  }
}
