/**
 * Text reports returned by the MCP tools
 */

import {
  ActionStatus,
  AnalysisResult,
  AnalysisSessionSummary,
  CardActionReport,
  ConfiguredBoardRun,
  ReanalysisOutcome,
} from './criticality-analysis/models/analysis-result.model.js';
import { BoardConfig, HistoryEntry } from './criticality-analysis/models/session.model.js';
import { GlobalStatistics } from './statistics.service.js';

function verdict(result: AnalysisResult): string {
  if (!result.success) return `FAILED (fallback ${result.criticalityLevel})`;
  return result.isCritical ? `CRITICAL ${result.criticalityLevel}` : 'not critical';
}

function actionText(status: ActionStatus): string {
  switch (status.status) {
    case 'applied':
      return status.detail ? `applied (${status.detail})` : 'applied';
    case 'skipped':
      return `skipped (${status.reason})`;
    case 'failed':
      return `failed (${status.error})`;
  }
}

function formatActions(actions: CardActionReport[]): string[] {
  return actions.map(
    (a) => `- ${a.cardId}: label ${actionText(a.label)}, comment ${actionText(a.comment)}, move ${actionText(a.move)}`
  );
}

export function formatResultLine(result: AnalysisResult): string {
  return `- ${result.cardTitle} [${result.cardId}]: ${verdict(result)} - ${result.justification}`;
}

export function formatSessionSummary(summary: AnalysisSessionSummary): string {
  const { session, distribution } = summary;
  const failedBatches = summary.batches.filter((b) => b.status === 'failed').length;
  const lines = [
    `Analysis session ${session.reference}${session.reanalyse ? ' (re-analysis)' : ''}`,
    `Board: ${session.boardId}${session.listId ? `, list: ${session.listId}` : ''}`,
    `Cards: ${summary.results.length} (${summary.successCount} analysed, ${summary.failureCount} failed)`,
    `Batches: ${summary.batches.length} (${failedBatches} failed)`,
    `Critical: ${distribution.critical} (HIGH ${distribution.HIGH}, MEDIUM ${distribution.MEDIUM}, LOW ${distribution.LOW}), not critical: ${distribution.nonCritical}`,
  ];

  if (summary.results.length > 0) {
    lines.push('', 'Results:', ...summary.results.map(formatResultLine));
  }

  if (!summary.boardConfigured) {
    lines.push('', 'No board configuration: no actions were applied.');
  } else if (summary.actions.length > 0) {
    lines.push('', 'Actions:', ...formatActions(summary.actions));
  }

  return lines.join('\n');
}

export function formatReanalysis(outcome: ReanalysisOutcome): string {
  const lines = [`Re-analysis session ${outcome.session.reference}`, formatResultLine(outcome.result)];
  if (outcome.previous) {
    lines.push(`Previous (${outcome.previous.sessionReference}): ${verdict(outcome.previous.result)}`);
  } else {
    lines.push('No previous analysis recorded.');
  }
  if (outcome.actions.length > 0) {
    lines.push('Actions:', ...formatActions(outcome.actions));
  }
  return lines.join('\n');
}

export function formatConfiguredRuns(runs: ConfiguredBoardRun[]): string {
  if (runs.length === 0) {
    return 'No configured board has a source list to analyse.';
  }
  return runs
    .map((run) =>
      run.summary
        ? formatSessionSummary(run.summary)
        : `Board ${run.boardId}, list ${run.listId}: failed - ${run.error ?? 'unknown error'}`
    )
    .join('\n\n---\n\n');
}

export function formatCardHistory(cardId: string, entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return `No analysis history for card ${cardId}.`;
  }
  const lines = entries.map((e) => {
    const kind = e.reanalyse ? 'reanalysis' : 'initial';
    return `- ${e.result.analyzedAt} [${e.sessionReference}, ${kind}]: ${verdict(e.result)} - ${e.result.justification}`;
  });
  return [`Analysis history for card ${cardId} (${entries.length} entries, newest first):`, ...lines].join('\n');
}

export function formatStatistics(stats: GlobalStatistics): string {
  const d = stats.criticalityDistribution;
  const lines = [
    'Analysis statistics',
    `Tickets analysed: ${stats.totalTickets}`,
    `Analyses: ${stats.totalAnalyses} (initial ${stats.initialAnalyses}, re-analyses ${stats.reanalyses}, rate ${stats.reanalysisRate.toFixed(2)}%)`,
    `Failed analyses: ${stats.failedAnalyses}`,
    `Distribution: HIGH ${d.HIGH}, MEDIUM ${d.MEDIUM}, LOW ${d.LOW}, not critical ${d.nonCritical}`,
  ];
  if (stats.byBoard.length > 0) {
    lines.push('', 'By board:');
    for (const b of stats.byBoard) {
      lines.push(`- ${b.boardName ?? b.boardId}: ${b.totalAnalyses} analyses (initial ${b.initialAnalyses}, re-analyses ${b.reanalyses})`);
    }
  }
  return lines.join('\n');
}

export function formatBoardConfig(config: BoardConfig): string {
  const list = (id: string | null, name: string | null) => (id ? `${name ?? id} (${id})` : 'not set');
  return [
    `Board ${config.boardName ?? config.boardId} (${config.boardId})`,
    `Source list: ${list(config.sourceListId, config.sourceListName)}`,
    `Target list: ${list(config.targetListId, config.targetListName)}`,
    `Move HIGH cards: ${config.moveHighCards ? 'yes' : 'no'}`,
    `Add labels: ${config.addLabels ? 'yes' : 'no'}`,
    `Add comments: ${config.addComments ? 'yes' : 'no'}`,
    `Updated: ${config.updatedAt}`,
  ].join('\n');
}
