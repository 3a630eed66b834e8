/**
 * Board Action Executor Service
 * Applies label, comment and move for one analysed card. Each action is
 * attempted on its own and reports applied, skipped or failed.
 */

import { createLogger, getErrorMessage } from '@card-triage/shared';
import { Card } from '../../../types/index.js';
import { ActionStatus, AnalysisResult, CardActionReport } from '../models/analysis-result.model.js';
import { BoardConfig } from '../models/session.model.js';
import { IBoardActionExecutor, IResultStore, ITrackerClient } from '../models/service-interfaces.js';

const logger = createLogger('BoardActions');

export function formatComment(result: AnalysisResult): string {
  return `Criticality analysis: ${result.criticalityLevel}\n\n${result.justification}`;
}

export class BoardActionExecutorService implements IBoardActionExecutor {
  constructor(
    private tracker: Pick<ITrackerClient, 'addLabel' | 'addComment' | 'moveCard'>,
    private store: Pick<IResultStore, 'updateTicketList'>
  ) {}

  async execute(result: AnalysisResult, card: Card, config: BoardConfig): Promise<CardActionReport> {
    if (!result.success || !result.isCritical) {
      const reason = result.success ? 'card is not critical' : 'analysis did not succeed';
      const skipped: ActionStatus = { status: 'skipped', reason };
      return { cardId: card.id, label: skipped, comment: skipped, move: skipped };
    }

    const label = config.addLabels
      ? await this.attempt(card.id, 'label', () => this.tracker.addLabel(card.id, config.boardId, result.criticalityLevel))
      : skip('labels disabled for board');

    const comment = config.addComments
      ? await this.attempt(card.id, 'comment', () => this.tracker.addComment(card.id, formatComment(result)))
      : skip('comments disabled for board');

    return { cardId: card.id, label, comment, move: await this.move(result, card, config) };
  }

  private async move(result: AnalysisResult, card: Card, config: BoardConfig): Promise<ActionStatus> {
    if (!config.moveHighCards) return skip('moves disabled for board');
    if (result.criticalityLevel !== 'HIGH') return skip(`level ${result.criticalityLevel} is not HIGH`);
    const target = config.targetListId;
    if (!target) return skip('no target list configured');

    const status = await this.attempt(card.id, 'move', () => this.tracker.moveCard(card.id, target));
    if (status.status === 'applied') {
      // the move stands even if the snapshot write fails
      try {
        this.store.updateTicketList(card.id, target);
      } catch (error) {
        logger.error(`Card ${card.id} moved but its snapshot was not updated: ${getErrorMessage(error)}`);
      }
      return { status: 'applied', detail: `moved to ${config.targetListName ?? target}` };
    }
    return status;
  }

  private async attempt(cardId: string, action: string, fn: () => Promise<void>): Promise<ActionStatus> {
    try {
      await fn();
      logger.info(`${action} applied to card ${cardId}`);
      return { status: 'applied' };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`${action} failed for card ${cardId}: ${message}`);
      return { status: 'failed', error: message };
    }
  }
}

function skip(reason: string): ActionStatus {
  return { status: 'skipped', reason };
}
