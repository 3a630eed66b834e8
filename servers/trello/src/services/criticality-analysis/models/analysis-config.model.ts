/**
 * Tuning and fallback policy for the criticality analysis pipeline
 */

import { CriticalityLevel } from '../../../types/index.js';

export interface AnalysisConfig {
  /** Cards per LLM call */
  batchSize: number;
  /** Documentation excerpts retrieved per card */
  documentResults: number;
  /** Similar prior analyses retrieved per card */
  historyResults: number;
  /** Long card fields and excerpts are cut to this many characters in the prompt */
  maxFieldChars: number;
  llmTimeoutMs: number;
  /** Tier assigned when a card's line is missing or unparseable */
  fallbackLevel: CriticalityLevel;
  fallbackIsCritical: boolean;
  /** Nominal tier carried by non-critical cards */
  nonCriticalLevel: CriticalityLevel;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  batchSize: 8,
  documentResults: 4,
  historyResults: 3,
  maxFieldChars: 1200,
  llmTimeoutMs: 60000,
  fallbackLevel: 'MEDIUM',
  fallbackIsCritical: false,
  nonCriticalLevel: 'LOW',
};
