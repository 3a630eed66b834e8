/**
 * Ollama LLM Client
 * Text generation for the classifier, embeddings for the vector store
 */

import { createLogger, LlmInvocationError, getErrorMessage, toError } from '@card-triage/shared';
import { IEmbedder, ILLMClient, LLMGenerateOptions } from '../services/criticality-analysis/models/service-interfaces.js';

const logger = createLogger('Ollama');

export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  thinking?: string;
  done: boolean;
}

function isGenerateResponse(data: unknown): data is OllamaGenerateResponse {
  return typeof data === 'object' && data !== null && 'response' in data && typeof data.response === 'string';
}

function isEmbeddingMatrix(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((v) => typeof v === 'number'))
  );
}

export class OllamaClient implements ILLMClient, IEmbedder {
  private baseUrl: string;
  private model: string;
  private embedModel: string;

  constructor(
    baseUrl: string = 'http://localhost:11434',
    model: string = 'qwen3:30b-a3b-instruct-2507-q4_K_M',
    embedModel: string = 'nomic-embed-text'
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.model = model;
    this.embedModel = embedModel;
  }

  /**
   * Generate a completion (no streaming)
   *
   * @throws LlmInvocationError on HTTP errors, timeouts and unexpected payloads
   */
  async generate(prompt: string, options: LLMGenerateOptions = {}): Promise<string> {
    const { temperature = 0.1, num_predict = 1024, timeout = 60000 } = options;

    const data = await this.post('/api/generate', {
      model: this.model,
      prompt,
      stream: false,
      options: { temperature, num_predict },
    }, timeout, 'generate', prompt.length);

    if (!isGenerateResponse(data)) {
      throw new LlmInvocationError('Ollama generate returned an unexpected payload');
    }
    // Qwen3 puts its reasoning in `thinking`; only `response` is the answer
    if (!data.response.trim() && data.thinking) {
      logger.warn('generate returned a thinking trace but no answer');
    }
    return data.response;
  }

  /**
   * Embed a batch of texts with the embedding model
   */
  async embed(texts: string[], timeoutMs: number = 10000): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const data = await this.post('/api/embed', { model: this.embedModel, input: texts }, timeoutMs, 'embed', texts.join('').length);

    const embeddings = typeof data === 'object' && data !== null && 'embeddings' in data ? data.embeddings : undefined;
    if (!isEmbeddingMatrix(embeddings) || embeddings.length !== texts.length) {
      throw new LlmInvocationError('Ollama embed returned an unexpected payload');
    }
    return embeddings;
  }

  private async post(path: string, body: Record<string, unknown>, timeout: number, operation: string, size: number): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new LlmInvocationError(`Ollama API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      logger.info(`${operation} completed in ${Date.now() - startTime}ms (input: ${size} chars)`);
      return data;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`${operation} failed after ${duration}ms: ${getErrorMessage(error)}`);
      if (error instanceof LlmInvocationError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new LlmInvocationError(`Ollama ${operation} timed out after ${timeout}ms`, toError(error));
      }
      throw new LlmInvocationError(`Ollama ${operation} failed: ${getErrorMessage(error)}`, toError(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Clean response text - removes thinking tokens and code fences
   */
  static cleanResponse(response: string): string {
    let clean = response;

    // Remove <think>...</think> blocks
    clean = clean.replace(/<think>[\s\S]*?<\/think>/gi, '');

    // Unclosed <think>: the rest is reasoning cut off before an answer
    const thinkStart = clean.toLowerCase().indexOf('<think>');
    if (thinkStart !== -1) {
      clean = clean.substring(0, thinkStart);
    }

    clean = clean.trim();
    clean = clean.replace(/^```[a-z]*\s*/i, '').replace(/\s*```$/, '');

    return clean;
  }
}
