import { MCPTool } from '@card-triage/shared';

export const TOOLS: MCPTool[] = [
  {
    name: 'analyze_list',
    description: 'Analyse every card of a Trello list for criticality and apply the board\'s configured actions',
    inputSchema: {
      type: 'object',
      properties: {
        board_id: { type: 'string', description: 'Trello board id' },
        list_id: { type: 'string', description: 'Trello list id on that board' },
        reanalyse: { type: 'boolean', description: 'Mark the session as a re-analysis', default: false },
      },
      required: ['board_id', 'list_id'],
    },
  },
  {
    name: 'reanalyze_card',
    description: 'Analyse one card again in a new session, showing the model its previous assessment',
    inputSchema: {
      type: 'object',
      properties: {
        card_id: { type: 'string', description: 'Trello card id' },
      },
      required: ['card_id'],
    },
  },
  {
    name: 'analyze_configured_boards',
    description: 'Analyse the source list of every configured board',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'get_card_history',
    description: 'List every recorded analysis of a card, newest first',
    inputSchema: {
      type: 'object',
      properties: {
        card_id: { type: 'string', description: 'Trello card id' },
      },
      required: ['card_id'],
    },
  },
  {
    name: 'get_analysis_statistics',
    description: 'Totals, re-analysis rate, criticality distribution and per-board counts',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'configure_board',
    description: 'Create or update the action settings of a board. Omitted fields keep their current value.',
    inputSchema: {
      type: 'object',
      properties: {
        board_id: { type: 'string', description: 'Trello board id' },
        board_name: { type: 'string', description: 'Display name of the board; an empty string clears it' },
        source_list_id: { type: 'string', description: 'List analysed by analyze_configured_boards; an empty string clears it' },
        source_list_name: { type: 'string', description: 'Display name of the source list; an empty string clears it' },
        target_list_id: { type: 'string', description: 'List HIGH cards are moved to; an empty string clears it' },
        target_list_name: { type: 'string', description: 'Display name of the target list; an empty string clears it' },
        move_high_cards: { type: 'boolean', description: 'Move critical HIGH cards to the target list', default: false },
        add_labels: { type: 'boolean', description: 'Add a priority label to critical cards', default: true },
        add_comments: { type: 'boolean', description: 'Comment the justification on critical cards', default: true },
      },
      required: ['board_id'],
    },
  },
  {
    name: 'get_board_config',
    description: 'Show the action settings of a board',
    inputSchema: {
      type: 'object',
      properties: {
        board_id: { type: 'string', description: 'Trello board id' },
      },
      required: ['board_id'],
    },
  },
];
