/**
 * Board Configuration Handler
 * Handles configure_board, get_board_config
 */

import { MCPResponse, createSuccessResponse } from '@card-triage/shared';
import { BaseHandler, ToolArguments } from './base-handler.js';
import { formatBoardConfig } from '../services/report-formatter.js';
import { IResultStore } from '../services/criticality-analysis/models/service-interfaces.js';

export class ConfigurationHandler extends BaseHandler {
  constructor(private store: Pick<IResultStore, 'saveBoardConfig' | 'findBoardConfig'>) {
    super();
  }

  async configureBoard(args: ToolArguments): Promise<MCPResponse> {
    const boardId = this.requireString(args, 'board_id');
    const input = {
      boardId,
      boardName: this.clearableString(args, 'board_name'),
      sourceListId: this.clearableString(args, 'source_list_id'),
      sourceListName: this.clearableString(args, 'source_list_name'),
      targetListId: this.clearableString(args, 'target_list_id'),
      targetListName: this.clearableString(args, 'target_list_name'),
      moveHighCards: this.optionalBoolean(args, 'move_high_cards'),
      addLabels: this.optionalBoolean(args, 'add_labels'),
      addComments: this.optionalBoolean(args, 'add_comments'),
    };

    try {
      const config = this.store.saveBoardConfig(input);
      return createSuccessResponse('Configuration saved', formatBoardConfig(config));
    } catch (error) {
      this.handleError(error, 'configure board');
    }
  }

  async getBoardConfig(args: ToolArguments): Promise<MCPResponse> {
    const boardId = this.requireString(args, 'board_id');

    try {
      const config = this.store.findBoardConfig(boardId);
      if (!config) {
        return this.formatResponse(`No configuration for board ${boardId}: analyses on it apply no actions.`);
      }
      return this.formatResponse(formatBoardConfig(config));
    } catch (error) {
      this.handleError(error, 'get board config');
    }
  }
}
