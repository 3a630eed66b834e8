/**
 * Criticality Classifier Service
 * One LLM call per batch; the free-text answer is parsed line by line and
 * reconciled against the expected card ids
 */

import { createLogger, getErrorMessage, LlmInvocationError, toError } from '@card-triage/shared';
import { Card, CriticalityLevel } from '../../../types/index.js';
import { OllamaClient } from '../../../clients/ollama-client.js';
import { AnalysisResult, LineClassification } from '../models/analysis-result.model.js';
import { AnalysisConfig } from '../models/analysis-config.model.js';
import { ICriticalityClassifier, ILLMClient } from '../models/service-interfaces.js';

const logger = createLogger('Classifier');

const LIST_MARKER = /^\s*(?:[-•]\s+|\d+[.)]\s+)/;
const ID_AND_REST = /^\[?([^\s\]:]+)\]?:?\s+(.*)$/;
const FLAG = /^(OUI|NON)\b(.*)$/i;
const TIER = /^(HIGH|MEDIUM|LOW)\b(.*)$/i;
const SEPARATORS = /^[\s:,-]+/;

const NO_JUSTIFICATION = 'No justification provided';

export type ClassifierPolicy = Pick<
  AnalysisConfig,
  'fallbackLevel' | 'fallbackIsCritical' | 'nonCriticalLevel' | 'llmTimeoutMs'
>;

/**
 * Resolves a token from the model to one of the expected ids: exact match first,
 * then a case-insensitive match when it is unambiguous
 */
class IdResolver {
  private exact: Set<string>;
  private folded = new Map<string, string | null>();

  constructor(ids: string[]) {
    this.exact = new Set(ids);
    for (const id of ids) {
      const key = id.toLowerCase();
      this.folded.set(key, this.folded.has(key) ? null : id);
    }
  }

  resolve(token: string): string | null {
    if (this.exact.has(token)) return token;
    return this.folded.get(token.toLowerCase()) ?? null;
  }
}

function normalizeTier(token: string): CriticalityLevel {
  const upper = token.toUpperCase();
  return upper === 'HIGH' ? 'HIGH' : upper === 'MEDIUM' ? 'MEDIUM' : 'LOW';
}

/**
 * Interpret one line of model output. Returns null for lines that are not
 * result lines at all (preamble, blank lines, commentary).
 */
export function classifyLine(line: string, resolver: { resolve(token: string): string | null }): LineClassification | null {
  const cleaned = line.replace(/[*`]/g, '').replace(LIST_MARKER, '').replace(/\|/g, ' ').trim();
  const idMatch = ID_AND_REST.exec(cleaned);
  if (!idMatch) {
    return null;
  }

  const token = idMatch[1];
  const rest = idMatch[2].replace(SEPARATORS, '');
  const cardId = resolver.resolve(token);

  if (cardId === null) {
    return FLAG.test(rest) ? { kind: 'unknown-id', cardId: token, raw: line } : null;
  }

  const flagMatch = FLAG.exec(rest);
  if (!flagMatch) {
    return { kind: 'malformed', cardId, reason: 'unrecognised verdict (expected OUI or NON)', raw: line };
  }

  const isCritical = flagMatch[1].toUpperCase() === 'OUI';
  let remainder = flagMatch[2].replace(SEPARATORS, '');
  let level: CriticalityLevel | null = null;

  const tierMatch = TIER.exec(remainder);
  if (tierMatch) {
    level = normalizeTier(tierMatch[1]);
    remainder = tierMatch[2].replace(SEPARATORS, '');
  } else if (isCritical) {
    return { kind: 'malformed', cardId, reason: 'critical verdict without HIGH, MEDIUM or LOW', raw: line };
  }

  return {
    kind: 'parsed',
    cardId,
    isCritical,
    // A tier after NON is accepted but carries no meaning
    criticalityLevel: isCritical ? level : null,
    justification: remainder.trim() || NO_JUSTIFICATION,
  };
}

export class CriticalityClassifierService implements ICriticalityClassifier {
  constructor(
    private llm: ILLMClient,
    private policy: ClassifierPolicy
  ) {}

  async classify(prompt: string, expectedCards: Card[]): Promise<AnalysisResult[]> {
    if (expectedCards.length === 0) {
      return [];
    }

    let response: string;
    try {
      response = await this.llm.generate(prompt, {
        temperature: 0.1,
        num_predict: Math.max(512, expectedCards.length * 200),
        timeout: this.policy.llmTimeoutMs,
      });
    } catch (error) {
      if (error instanceof LlmInvocationError) {
        throw error;
      }
      throw new LlmInvocationError(`LLM call failed: ${getErrorMessage(error)}`, toError(error));
    }

    return this.parseResponse(response, expectedCards);
  }

  /**
   * Turn raw model output into exactly one result per expected card, in input order
   */
  parseResponse(response: string, expectedCards: Card[]): AnalysisResult[] {
    const cleaned = OllamaClient.cleanResponse(response);
    const resolver = new IdResolver(expectedCards.map((c) => c.id));
    const parsed = new Map<string, Extract<LineClassification, { kind: 'parsed' }>>();
    const malformed = new Map<string, Extract<LineClassification, { kind: 'malformed' }>>();

    for (const line of cleaned.split(/\r?\n/)) {
      const outcome = classifyLine(line, resolver);
      if (!outcome) continue;

      switch (outcome.kind) {
        case 'unknown-id':
          logger.warn(`Ignoring line for unknown card id "${outcome.cardId}": ${outcome.raw.trim()}`);
          break;
        case 'malformed':
          if (!malformed.has(outcome.cardId)) {
            malformed.set(outcome.cardId, outcome);
          }
          break;
        case 'parsed':
          if (parsed.has(outcome.cardId)) {
            logger.warn(`Duplicate line for card ${outcome.cardId} ignored: ${line.trim()}`);
          } else {
            parsed.set(outcome.cardId, outcome);
          }
          break;
      }
    }

    const analyzedAt = new Date().toISOString();
    return expectedCards.map((card) => {
      const line = parsed.get(card.id);
      if (line) {
        return {
          cardId: card.id,
          cardTitle: card.title,
          isCritical: line.isCritical,
          criticalityLevel: line.criticalityLevel ?? this.policy.nonCriticalLevel,
          justification: line.justification,
          success: true,
          analyzedAt,
        };
      }

      const bad = malformed.get(card.id);
      const reason = bad ? `malformed line: ${bad.reason}` : 'no line for this card in the model response';
      logger.warn(`Card ${card.id}: ${reason}. Raw excerpt: ${(bad?.raw ?? cleaned).substring(0, 200)}`);
      return this.fallbackResult(card, reason, analyzedAt);
    });
  }

  fallbackFor(cards: Card[], reason: string): AnalysisResult[] {
    const analyzedAt = new Date().toISOString();
    return cards.map((card) => this.fallbackResult(card, reason, analyzedAt));
  }

  private fallbackResult(card: Card, reason: string, analyzedAt: string): AnalysisResult {
    return {
      cardId: card.id,
      cardTitle: card.title,
      isCritical: this.policy.fallbackIsCritical,
      criticalityLevel: this.policy.fallbackLevel,
      justification: `Automatic analysis failed (${reason}); manual review recommended.`,
      success: false,
      analyzedAt,
      failureReason: reason,
    };
  }
}
