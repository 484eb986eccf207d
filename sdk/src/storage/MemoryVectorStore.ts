import { RetrievalError } from '../types';
import type { EmbeddingProvider, VectorMatch, VectorRecord, VectorStore } from '../types';

interface StoredRecord extends VectorRecord {
  embedding: number[];
  createdAt: Date;
}

/**
 * In-memory vector store
 *
 * Keeps one record list per collection and ranks by cosine similarity.
 * Contents live for the lifetime of the process; use the MongoDB store
 * from @shopchain/vector-mongodb for a persisted index.
 */
export class MemoryVectorStore implements VectorStore {
  private embeddings: EmbeddingProvider;
  private collections: Map<string, StoredRecord[]> = new Map();

  constructor(embeddings: EmbeddingProvider) {
    this.embeddings = embeddings;
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string): Promise<void> {
    if (this.collections.has(name)) {
      throw new Error(`Collection already exists: ${name}`);
    }
    this.collections.set(name, []);
  }

  async add(collection: string, records: VectorRecord[]): Promise<void> {
    const stored = this.getCollection(collection);
    const vectors = await this.embeddings.embedMany(records.map((r) => r.document));

    records.forEach((record, idx) => {
      const storedRecord: StoredRecord = {
        ...record,
        embedding: vectors[idx],
        createdAt: new Date(),
      };

      // Upsert by id
      const existingIdx = stored.findIndex((r) => r.id === record.id);
      if (existingIdx >= 0) {
        stored[existingIdx] = storedRecord;
      } else {
        stored.push(storedRecord);
      }
    });
  }

  async query(collection: string, text: string, k: number): Promise<VectorMatch[]> {
    const stored = this.getCollection(collection);

    if (stored.length === 0 || k <= 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embed(text);

    return stored
      .map((record) => ({
        id: record.id,
        document: record.document,
        metadata: record.metadata,
        score: this.cosineSimilarity(queryEmbedding, record.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [name, records] of this.collections.entries()) {
      stats[name] = records.length;
    }
    return stats;
  }

  async dropCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  private getCollection(name: string): StoredRecord[] {
    const stored = this.collections.get(name);
    if (!stored) {
      throw new RetrievalError(`Collection not found: ${name}`);
    }
    return stored;
  }

  private cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
      throw new RetrievalError('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    normA = Math.sqrt(normA);
    normB = Math.sqrt(normB);

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (normA * normB);
  }
}
