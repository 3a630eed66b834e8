/**
 * Prompt Builder Service
 * Renders one batch of cards, with their context, into a single classification prompt
 */

import { Card } from '../../../types/index.js';
import {
  ContextSection,
  DocumentExcerpt,
  PreviousAssessment,
  PromptEntry,
  SimilarAnalysis,
} from '../models/context.model.js';
import { IPromptBuilder } from '../models/service-interfaces.js';

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}

export class PromptBuilderService implements IPromptBuilder {
  constructor(private maxFieldChars: number = 1200) {}

  build(entries: PromptEntry[]): string {
    const total = entries.length;
    const cards = entries.map((entry, i) => this.renderEntry(entry, i + 1, total));
    const ids = entries.map((e) => e.card.id).join(', ');

    return `You are triaging Trello cards for a software team.
For each card, decide whether it is CRITICAL (needs attention before other work) and, if so, how urgent it is: HIGH, MEDIUM or LOW.
Use the project documentation and the similar past analyses as reference points.

${cards.join('\n\n')}

=== RESPONSE FORMAT ===
Answer with exactly one line per card and nothing else:
<CARD_ID> OUI <HIGH|MEDIUM|LOW> <justification>
<CARD_ID> NON <justification>
Use OUI when the card is critical and NON when it is not.
Expected card ids: ${ids}`;
  }

  private renderEntry(entry: PromptEntry, position: number, total: number): string {
    const lines = [
      `=== CARD ${position}/${total} ===`,
      ...this.renderCard(entry.card),
      'Project documentation:',
      ...this.renderDocuments(entry.context.documents),
      'Similar past analyses:',
      ...this.renderSimilar(entry.context.similarAnalyses),
    ];
    if (entry.previous) {
      lines.push(this.renderPrevious(entry.previous));
    }
    return lines.join('\n');
  }

  private renderCard(card: Card): string[] {
    const description = card.description.trim()
      ? truncate(card.description.trim(), this.maxFieldChars)
      : '(no description)';
    return [
      `ID: ${card.id}`,
      `Title: ${card.title}`,
      `Description: ${description}`,
      `Due: ${card.due ?? 'none'}`,
      `List: ${card.listName}`,
      `Labels: ${listOrNone(card.labels.map((l) => l.name || l.color || '').filter(Boolean))}`,
      `Members: ${listOrNone(card.members)}`,
      `Board: ${card.boardName}`,
      `URL: ${card.url}`,
    ];
  }

  private renderDocuments(docs: ContextSection<DocumentExcerpt>): string[] {
    switch (docs.status) {
      case 'empty':
        return ['No relevant documentation found.'];
      case 'unavailable':
        return ['Documentation search is unavailable for this card.'];
      case 'available':
        return docs.items.map((d) => {
          const source = d.source ? ` (source: ${d.source})` : '';
          return `- [${d.score.toFixed(2)}] ${truncate(oneLine(d.text), this.maxFieldChars)}${source}`;
        });
    }
  }

  private renderSimilar(similar: ContextSection<SimilarAnalysis>): string[] {
    switch (similar.status) {
      case 'empty':
        return ['No similar past analyses.'];
      case 'unavailable':
        return ['Past analyses are unavailable for this card.'];
      case 'available':
        return similar.items.map((s) => {
          const verdict = s.isCritical ? `critical ${s.criticalityLevel}` : 'not critical';
          return `- [${s.score.toFixed(2)}] "${s.title}": ${verdict} - ${truncate(oneLine(s.justification), this.maxFieldChars)}`;
        });
    }
  }

  private renderPrevious(previous: PreviousAssessment): string {
    const verdict = previous.isCritical ? `critical ${previous.criticalityLevel}` : 'not critical';
    return `Previous assessment (${previous.analyzedAt}): ${verdict} - ${truncate(oneLine(previous.justification), this.maxFieldChars)}`;
  }
}
