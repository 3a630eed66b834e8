/**
 * Analysis Operations Handler
 * Handles analyze_list, reanalyze_card, analyze_configured_boards,
 * get_card_history, get_analysis_statistics
 */

import { MCPResponse } from '@card-triage/shared';
import { BaseHandler, ToolArguments } from './base-handler.js';
import { CriticalityAnalysisPipeline } from '../services/criticality-analysis/pipeline/criticality-analysis.pipeline.js';
import { StatisticsService } from '../services/statistics.service.js';
import {
  formatCardHistory,
  formatConfiguredRuns,
  formatReanalysis,
  formatSessionSummary,
  formatStatistics,
} from '../services/report-formatter.js';

type PipelineOperations = Pick<CriticalityAnalysisPipeline, 'analyzeList' | 'reanalyze' | 'analyzeConfiguredBoards'>;
type StatisticsOperations = Pick<StatisticsService, 'globalStats' | 'cardHistory'>;

export class AnalysisHandler extends BaseHandler {
  constructor(
    private pipeline: PipelineOperations,
    private statistics: StatisticsOperations
  ) {
    super();
  }

  async analyzeList(args: ToolArguments): Promise<MCPResponse> {
    const boardId = this.requireString(args, 'board_id');
    const listId = this.requireString(args, 'list_id');
    const reanalyse = this.optionalBoolean(args, 'reanalyse') ?? false;

    try {
      const summary = await this.pipeline.analyzeList(boardId, listId, { reanalyse });
      return this.formatResponse(formatSessionSummary(summary));
    } catch (error) {
      this.handleError(error, 'analyze list');
    }
  }

  async reanalyzeCard(args: ToolArguments): Promise<MCPResponse> {
    const cardId = this.requireString(args, 'card_id');

    try {
      const outcome = await this.pipeline.reanalyze(cardId);
      return this.formatResponse(formatReanalysis(outcome));
    } catch (error) {
      this.handleError(error, 'reanalyze card');
    }
  }

  async analyzeConfiguredBoards(): Promise<MCPResponse> {
    try {
      const runs = await this.pipeline.analyzeConfiguredBoards();
      return this.formatResponse(formatConfiguredRuns(runs));
    } catch (error) {
      this.handleError(error, 'analyze configured boards');
    }
  }

  async getCardHistory(args: ToolArguments): Promise<MCPResponse> {
    const cardId = this.requireString(args, 'card_id');

    try {
      return this.formatResponse(formatCardHistory(cardId, this.statistics.cardHistory(cardId)));
    } catch (error) {
      this.handleError(error, 'get card history');
    }
  }

  async getAnalysisStatistics(): Promise<MCPResponse> {
    try {
      return this.formatResponse(formatStatistics(this.statistics.globalStats()));
    } catch (error) {
      this.handleError(error, 'get analysis statistics');
    }
  }
}
