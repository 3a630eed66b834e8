/**
 * Criticality Analysis Pipeline
 * Main orchestrator coordinating all services in the pipeline pattern
 * Cards → Batches → Context → Prompt → Classify → Persist → Board actions → Summary
 */

import { createLogger, getErrorMessage, NotFoundError, ValidationError } from '@card-triage/shared';
import { Card } from '../../../types/index.js';
import {
  AnalysisResult,
  AnalysisSessionSummary,
  BatchOutcome,
  CardActionReport,
  ConfiguredBoardRun,
  CriticalityDistribution,
  ReanalysisOutcome,
} from '../models/analysis-result.model.js';
import { PreviousAssessment, PromptEntry } from '../models/context.model.js';
import { AnalysisSession, BoardConfig, HistoryEntry } from '../models/session.model.js';
import {
  IBoardActionExecutor,
  IBoardActionPolicy,
  IContextRetriever,
  ICriticalityClassifier,
  IPromptBuilder,
  IResultStore,
  ITrackerClient,
} from '../models/service-interfaces.js';

const logger = createLogger('Pipeline');

export interface AnalyzeOptions {
  reanalyse?: boolean;
  /** Prior assessments keyed by card id, rendered into the prompt */
  previous?: Map<string, PreviousAssessment>;
}

export interface PipelineOptions {
  batchSize: number;
}

/**
 * Split into consecutive batches of at most `size` cards
 */
export function partition<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export function distributionOf(results: AnalysisResult[]): CriticalityDistribution {
  const distribution: CriticalityDistribution = { HIGH: 0, MEDIUM: 0, LOW: 0, critical: 0, nonCritical: 0 };
  for (const result of results) {
    if (!result.success) continue;
    if (result.isCritical) {
      distribution[result.criticalityLevel]++;
      distribution.critical++;
    } else {
      distribution.nonCritical++;
    }
  }
  return distribution;
}

function toPreviousAssessment(entry: HistoryEntry): PreviousAssessment {
  return {
    criticalityLevel: entry.result.criticalityLevel,
    isCritical: entry.result.isCritical,
    justification: entry.result.justification,
    analyzedAt: entry.result.analyzedAt,
  };
}

export class CriticalityAnalysisPipeline {
  constructor(
    private retriever: IContextRetriever,
    private promptBuilder: IPromptBuilder,
    private classifier: ICriticalityClassifier,
    private store: IResultStore,
    private policy: IBoardActionPolicy,
    private executor: IBoardActionExecutor,
    private tracker: ITrackerClient,
    private options: PipelineOptions
  ) {}

  /**
   * Analyse a set of cards from one board. Only a result store failure rejects;
   * LLM, retrieval and tracker failures are folded into the summary.
   */
  async analyze(
    cards: Card[],
    boardId: string,
    listId: string | null,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisSessionSummary> {
    const startTime = Date.now();
    const reanalyse = options.reanalyse ?? false;
    const batches = partition(cards, this.options.batchSize);

    const session = this.store.createSession(boardId, listId, reanalyse);
    logger.info(`Session ${session.reference}: ${cards.length} cards in ${batches.length} batches`);

    const outcomes: BatchOutcome[] = [];
    const results: AnalysisResult[] = [];

    for (const [index, batch] of batches.entries()) {
      const outcome = await this.runBatch(index, batch, options.previous);
      outcomes.push(outcome);
      results.push(...outcome.results);

      this.persistBatch(session, batch, outcome.results, listId);
      await this.rememberSuccesses(batch, outcome.results);
    }

    const config = this.resolveConfig(boardId);
    const actions = config ? await this.applyActions(cards, results, config) : [];

    const successCount = results.filter((r) => r.success).length;
    logger.info(
      `Session ${session.reference} done in ${Date.now() - startTime}ms: ` +
        `${successCount}/${results.length} analysed, ${actions.length} cards with actions`
    );

    return {
      session,
      results,
      batches: outcomes,
      successCount,
      failureCount: results.length - successCount,
      distribution: distributionOf(results),
      boardConfigured: config !== null,
      actions,
    };
  }

  /**
   * Analyse a single card again in a fresh session. The card is fetched from the
   * tracker; the local snapshot is used only when that fetch fails. Earlier history
   * is left untouched.
   */
  async reanalyze(cardId: string): Promise<ReanalysisOutcome> {
    const snapshot = this.store.findTicket(cardId);
    let card: Card;

    try {
      card = await this.tracker.getCard(cardId);
    } catch (error) {
      const message = getErrorMessage(error);
      if (!snapshot) {
        throw new NotFoundError(`Card ${cardId} is not known locally and could not be fetched: ${message}`);
      }
      logger.warn(`Card ${cardId} could not be fetched, using the snapshot from ${snapshot.updatedAt}: ${message}`);
      card = snapshot.card;
    }
    const listId = snapshot?.listId ?? null;

    const history = this.store.findHistoryByCard(cardId);
    const previous = history[0] ?? null;
    // a fallback is not a verdict; the prompt gets the latest real one
    const lastVerdict = history.find((entry) => entry.result.success);
    const previousByCard = new Map<string, PreviousAssessment>();
    if (lastVerdict) {
      previousByCard.set(cardId, toPreviousAssessment(lastVerdict));
    }

    const summary = await this.analyze([card], card.boardId, listId, { reanalyse: true, previous: previousByCard });
    const [result] = summary.results;
    return {
      session: summary.session,
      result,
      actions: summary.actions,
      previous,
    };
  }

  /**
   * Run `analyze` for the source list of every configured board. A failing board
   * is recorded and the others still run.
   */
  async analyzeConfiguredBoards(): Promise<ConfiguredBoardRun[]> {
    const configs = this.store.listBoardConfigs().filter((c) => c.sourceListId);
    const runs: ConfiguredBoardRun[] = [];

    for (const config of configs) {
      const listId = config.sourceListId ?? '';
      try {
        const summary = await this.analyzeList(config.boardId, listId);
        runs.push({ boardId: config.boardId, listId, summary });
      } catch (error) {
        const message = getErrorMessage(error);
        logger.error(`Board ${config.boardId} failed: ${message}`);
        runs.push({ boardId: config.boardId, listId, error: message });
      }
    }
    return runs;
  }

  /**
   * Fetch a list's cards from the tracker and analyse them
   */
  async analyzeList(boardId: string, listId: string, options: AnalyzeOptions = {}): Promise<AnalysisSessionSummary> {
    const [board, list] = await Promise.all([this.tracker.getBoard(boardId), this.tracker.getList(listId)]);
    if (list.idBoard !== boardId) {
      throw new ValidationError(`List ${listId} does not belong to board ${boardId}`);
    }
    const cards = await this.tracker.getListCards(listId, {
      boardId,
      boardName: board.name,
      listName: list.name,
    });
    return this.analyze(cards, boardId, listId, options);
  }

  private async runBatch(
    index: number,
    batch: Card[],
    previous: Map<string, PreviousAssessment> | undefined
  ): Promise<BatchOutcome> {
    const cardIds = batch.map((c) => c.id);
    try {
      const contexts = await Promise.all(batch.map((card) => this.retriever.retrieve(card)));
      const entries: PromptEntry[] = batch.map((card, i) => ({
        card,
        context: contexts[i],
        previous: previous?.get(card.id),
      }));
      const prompt = this.promptBuilder.build(entries);
      const results = await this.classifier.classify(prompt, batch);
      return { index, status: 'completed', cardIds, results };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Batch ${index + 1} failed, falling back for ${batch.length} cards: ${message}`);
      return {
        index,
        status: 'failed',
        cardIds,
        results: this.classifier.fallbackFor(batch, `batch analysis failed: ${message}`),
        error: message,
      };
    }
  }

  private persistBatch(session: AnalysisSession, batch: Card[], results: AnalysisResult[], listId: string | null): void {
    const cardsById = new Map(batch.map((c) => [c.id, c]));
    for (const result of results) {
      this.store.appendHistory(session, result);
      const card = cardsById.get(result.cardId);
      if (card) {
        this.store.saveTicket(card, listId);
      }
    }
  }

  private async rememberSuccesses(batch: Card[], results: AnalysisResult[]): Promise<void> {
    const cardsById = new Map(batch.map((c) => [c.id, c]));
    for (const result of results) {
      const card = cardsById.get(result.cardId);
      if (result.success && card) {
        await this.retriever.remember(card, result);
      }
    }
  }

  private resolveConfig(boardId: string): BoardConfig | null {
    try {
      return this.policy.resolve(boardId);
    } catch (error) {
      logger.error(`Could not read config for board ${boardId}, no actions will run: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private async applyActions(cards: Card[], results: AnalysisResult[], config: BoardConfig): Promise<CardActionReport[]> {
    const cardsById = new Map(cards.map((c) => [c.id, c]));
    const reports: CardActionReport[] = [];
    for (const result of results) {
      const card = cardsById.get(result.cardId);
      if (!card || !result.success || !result.isCritical) continue;
      reports.push(await this.executor.execute(result, card, config));
    }
    return reports;
  }
}
