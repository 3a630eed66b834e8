/**
 * ConfigurationHandler Unit Tests
 * Uses an in-memory store
 */

import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ConfigurationHandler } from '../configuration';
import { openDatabase } from '../../database/index';
import { SqliteResultStore } from '../../database/sqlite-result-store';

describe('ConfigurationHandler', () => {
  let store: SqliteResultStore;
  let handler: ConfigurationHandler;

  beforeEach(() => {
    store = new SqliteResultStore(openDatabase(':memory:'));
    handler = new ConfigurationHandler(store);
  });

  afterEach(() => store.close());

  it('should save a board config from tool arguments', async () => {
    const result = await handler.configureBoard({
      board_id: 'B1',
      board_name: 'Support',
      target_list_id: 'Ldone',
      target_list_name: 'Done',
      move_high_cards: true,
      add_comments: false,
    });

    expect(result.content[0].text.startsWith('Configuration saved:\n\nBoard Support (B1)\n')).toBe(true);
    expect(store.findBoardConfig('B1')).toMatchObject({
      boardName: 'Support',
      targetListId: 'Ldone',
      moveHighCards: true,
      addLabels: true,
      addComments: false,
    });
  });

  it('should clear a list when given an empty string and keep omitted fields', async () => {
    await handler.configureBoard({ board_id: 'B1', target_list_id: 'Ldone', target_list_name: 'Done', source_list_id: 'L1' });

    const result = await handler.configureBoard({ board_id: 'B1', target_list_id: '', target_list_name: '  ' });

    expect(result.content[0].text.split('\n')[4]).toBe('Target list: not set');
    expect(store.findBoardConfig('B1')).toMatchObject({ targetListId: null, targetListName: null, sourceListId: 'L1' });
  });

  it('should reject arguments of the wrong type', async () => {
    await expect(handler.configureBoard({ board_id: 'B1', move_high_cards: 'true' })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    expect(store.findBoardConfig('B1')).toBeNull();
  });

  it('should show an existing config', async () => {
    store.saveBoardConfig({ boardId: 'B1', sourceListId: 'L1' });

    const result = await handler.getBoardConfig({ board_id: 'B1' });

    expect(result.content[0].text.split('\n')[1]).toBe('Source list: L1 (L1)');
  });

  it('should explain a missing config', async () => {
    const result = await handler.getBoardConfig({ board_id: 'B2' });

    expect(result.content[0].text).toBe('No configuration for board B2: analyses on it apply no actions.');
  });

  it('should require board_id', async () => {
    await expect(handler.getBoardConfig({})).rejects.toThrow('board_id is required');
  });
});
