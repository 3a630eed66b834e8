/**
 * Vector search over Chroma collections with Ollama embeddings
 */

import { ChromaConfig } from '@card-triage/shared';
import { ChromaClient } from './chroma-client.js';
import {
  IEmbedder,
  IVectorStore,
  VectorDocument,
  VectorMatch,
} from '../services/criticality-analysis/models/service-interfaces.js';

export class ChromaVectorStore implements IVectorStore {
  constructor(
    private chroma: ChromaClient,
    private embedder: IEmbedder,
    private timeoutMs: number = 10000
  ) {}

  /**
   * One timeout bounds both the Chroma HTTP calls and the embedding requests
   */
  static fromConfig(config: ChromaConfig, embedder: IEmbedder, timeoutMs: number): ChromaVectorStore {
    return new ChromaVectorStore(new ChromaClient(config.baseUrl, timeoutMs), embedder, timeoutMs);
  }

  async search(collection: string, queryText: string, topK: number): Promise<VectorMatch[]> {
    if (topK < 1 || !queryText.trim()) {
      return [];
    }
    const found = await this.chroma.getCollection(collection);
    if (!found) {
      return [];
    }

    const [embedding] = await this.embedder.embed([queryText], this.timeoutMs);
    const result = await this.chroma.query(found.id, [embedding], topK);

    const ids = result.ids[0] ?? [];
    const documents = result.documents[0] ?? [];
    const metadatas = result.metadatas[0] ?? [];
    const distances = result.distances[0] ?? [];

    return ids.map((id, i) => ({
      id,
      text: documents[i] ?? '',
      score: 1 - (distances[i] ?? 1),
      metadata: metadatas[i] ?? {},
    }));
  }

  async add(collection: string, documents: VectorDocument[]): Promise<void> {
    if (documents.length === 0) {
      return;
    }
    const target = await this.chroma.getOrCreateCollection(collection);
    const embeddings = await this.embedder.embed(documents.map((d) => d.text), this.timeoutMs);

    await this.chroma.upsert(target.id, {
      ids: documents.map((d) => d.id),
      embeddings,
      documents: documents.map((d) => d.text),
      metadatas: documents.map((d) => d.metadata),
    });
  }
}
