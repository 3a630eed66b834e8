import { BoardConfig } from '../models/session.model.js';
import { IBoardActionPolicy, IResultStore } from '../models/service-interfaces.js';

/**
 * Board action policy: which side effects apply on a board.
 * Lookup is strictly by board id; a board without its own config gets no actions.
 */
export class BoardActionPolicyService implements IBoardActionPolicy {
  constructor(private store: Pick<IResultStore, 'findBoardConfig'>) {}

  resolve(boardId: string): BoardConfig | null {
    const config = this.store.findBoardConfig(boardId);
    return config && config.boardId === boardId ? config : null;
  }
}
