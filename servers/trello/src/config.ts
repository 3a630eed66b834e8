/**
 * Runtime configuration read from the environment
 */

import {
  ChromaConfig,
  ConfigurationError,
  OllamaConfig,
  TrelloConfig,
  getEnv,
  getEnvBool,
  getEnvInt,
  getEnvOrThrow,
} from '@card-triage/shared';
import { CriticalityLevel, isCriticalityLevel } from './types/index.js';
import { AnalysisConfig } from './services/criticality-analysis/models/analysis-config.model.js';

export interface TriageConfig {
  trello: TrelloConfig;
  ollama: OllamaConfig;
  chroma: ChromaConfig;
  sqlitePath: string;
  retrievalTimeoutMs: number;
  analysis: AnalysisConfig;
}

function getEnvLevel(name: string, defaultValue: CriticalityLevel): CriticalityLevel {
  const raw = getEnv(name, defaultValue).toUpperCase();
  if (!isCriticalityLevel(raw)) {
    throw new ConfigurationError(`Environment variable ${name} must be HIGH, MEDIUM or LOW, got "${raw}"`);
  }
  return raw;
}

/**
 * @throws ConfigurationError when a required variable is missing or a value is invalid
 */
export function loadTriageConfig(): TriageConfig {
  return {
    trello: {
      baseUrl: getEnv('TRELLO_BASE_URL', 'https://api.trello.com/1'),
      apiKey: getEnvOrThrow('TRELLO_API_KEY'),
      token: getEnvOrThrow('TRELLO_TOKEN'),
    },
    ollama: {
      baseUrl: getEnv('OLLAMA_URL', 'http://localhost:11434'),
      model: getEnv('OLLAMA_MODEL', 'qwen3:30b-a3b-instruct-2507-q4_K_M'),
      embedModel: getEnv('OLLAMA_EMBED_MODEL', 'nomic-embed-text'),
    },
    chroma: {
      baseUrl: getEnv('CHROMA_URL', 'http://localhost:8000'),
      documentsCollection: getEnv('CHROMA_DOCS_COLLECTION', 'documents'),
      historyCollection: getEnv('CHROMA_HISTORY_COLLECTION', 'card_analysis_history'),
    },
    sqlitePath: getEnv('SQLITE_PATH', './data/triage.db'),
    retrievalTimeoutMs: getEnvInt('RETRIEVAL_TIMEOUT_MS', 10000),
    analysis: {
      batchSize: getEnvInt('ANALYSIS_BATCH_SIZE', 8),
      documentResults: getEnvInt('CONTEXT_DOC_RESULTS', 4),
      historyResults: getEnvInt('CONTEXT_HISTORY_RESULTS', 3),
      maxFieldChars: getEnvInt('PROMPT_MAX_FIELD_CHARS', 1200),
      llmTimeoutMs: getEnvInt('LLM_TIMEOUT_MS', 60000),
      fallbackLevel: getEnvLevel('FALLBACK_CRITICALITY_LEVEL', 'MEDIUM'),
      fallbackIsCritical: getEnvBool('FALLBACK_IS_CRITICAL', false),
      nonCriticalLevel: getEnvLevel('NON_CRITICAL_LEVEL', 'LOW'),
    },
  };
}
