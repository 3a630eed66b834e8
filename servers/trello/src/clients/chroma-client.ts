import axios, { AxiosInstance } from 'axios';
import { createApiError, createLogger } from '@card-triage/shared';

const logger = createLogger('Chroma');

export type ChromaMetadata = Record<string, string | number | boolean>;

export interface ChromaCollection {
  id: string;
  name: string;
}

export interface ChromaQueryResult {
  ids: string[][];
  documents: Array<Array<string | null>>;
  metadatas: Array<Array<ChromaMetadata | null>>;
  distances: number[][];
}

export interface ChromaRecords {
  ids: string[];
  embeddings: number[][];
  documents: string[];
  metadatas: ChromaMetadata[];
}

function isNotFound(status: number | undefined, data: unknown): boolean {
  if (status === 404) {
    return true;
  }
  const text = typeof data === 'string' ? data : JSON.stringify(data ?? '');
  return /does not exist/i.test(text);
}

/**
 * Thin REST client for a Chroma server (v1 HTTP API)
 */
export class ChromaClient {
  private client: AxiosInstance;
  private collectionIds = new Map<string, string>();

  constructor(baseUrl: string, timeoutMs: number = 10000) {
    this.client = axios.create({
      baseURL: `${baseUrl.replace(/\/+$/, '')}/api/v1`,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
      },
      timeout: timeoutMs,
    });
  }

  /**
   * Look up a collection by name; null when it has not been created
   */
  async getCollection(name: string): Promise<ChromaCollection | null> {
    const cached = this.collectionIds.get(name);
    if (cached) {
      return { id: cached, name };
    }
    try {
      const response = await this.client.get<ChromaCollection>(`/collections/${encodeURIComponent(name)}`);
      this.collectionIds.set(name, response.data.id);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && isNotFound(error.response?.status, error.response?.data)) {
        logger.debug(`collection ${name} does not exist`);
        return null;
      }
      throw createApiError(error, `Failed to get collection ${name}`);
    }
  }

  async getOrCreateCollection(name: string): Promise<ChromaCollection> {
    const cached = this.collectionIds.get(name);
    if (cached) {
      return { id: cached, name };
    }
    try {
      const response = await this.client.post<ChromaCollection>('/collections', { name, get_or_create: true });
      this.collectionIds.set(name, response.data.id);
      return response.data;
    } catch (error) {
      throw createApiError(error, `Failed to create collection ${name}`);
    }
  }

  async query(collectionId: string, queryEmbeddings: number[][], nResults: number): Promise<ChromaQueryResult> {
    try {
      const response = await this.client.post<ChromaQueryResult>(`/collections/${collectionId}/query`, {
        query_embeddings: queryEmbeddings,
        n_results: nResults,
        include: ['documents', 'metadatas', 'distances'],
      });
      return response.data;
    } catch (error) {
      throw createApiError(error, 'Vector query failed');
    }
  }

  async upsert(collectionId: string, records: ChromaRecords): Promise<void> {
    try {
      await this.client.post(`/collections/${collectionId}/upsert`, records);
    } catch (error) {
      throw createApiError(error, 'Vector upsert failed');
    }
  }
}
