import type {
  EmbeddingProvider,
  VectorMatch,
  VectorRecord,
  VectorStore,
} from '@shopchain/core';
import { MongoClient } from 'mongodb';
import type { Collection, Db } from 'mongodb';

// ============================================================================
// Types
// ============================================================================

export interface MongoDBVectorStoreConfig {
  // Connection
  uri: string;
  dbName?: string;

  // Embeddings used for both documents and queries
  embeddings: EmbeddingProvider;

  // Atlas Vector Search
  vectorIndexName?: string;
  dimensions?: number;
  numCandidates?: number;
  similarity?: 'cosine' | 'euclidean' | 'dotProduct';
}

interface VectorDoc {
  _id: string;
  document: string;
  metadata: Record<string, string>;
  embedding: number[];
  createdAt: Date;
}

interface VectorSearchResult {
  _id: string;
  document: string;
  metadata?: Record<string, string>;
  score: number;
}

// ============================================================================
// MongoDB Vector Store
// ============================================================================

/**
 * Persisted vector store backed by MongoDB Atlas Vector Search.
 *
 * Each collection gets a `vectorSearch` index on `embedding` when created.
 * Atlas builds that index asynchronously, so queries issued right after
 * creation may return nothing until the index is ready.
 */
export class MongoDBVectorStore implements VectorStore {
  private config: Required<Omit<MongoDBVectorStoreConfig, 'embeddings'>>;
  private embeddings: EmbeddingProvider;
  private client: MongoClient;
  private db: Db | null = null;

  constructor(config: MongoDBVectorStoreConfig) {
    this.config = {
      uri: config.uri,
      dbName: config.dbName || 'shopchain',
      vectorIndexName: config.vectorIndexName || 'vector_index',
      dimensions: config.dimensions || 1536,
      numCandidates: config.numCandidates || 100,
      similarity: config.similarity || 'cosine',
    };
    this.embeddings = config.embeddings;
    this.client = new MongoClient(this.config.uri);
  }

  private async ensureConnection(): Promise<Db> {
    if (!this.db) {
      await this.client.connect();
      this.db = this.client.db(this.config.dbName);
    }
    return this.db;
  }

  private async getCollection(name: string): Promise<Collection<VectorDoc>> {
    const db = await this.ensureConnection();
    return db.collection<VectorDoc>(name);
  }

  async hasCollection(name: string): Promise<boolean> {
    const db = await this.ensureConnection();
    const existing = await db.listCollections({ name }, { nameOnly: true }).toArray();
    return existing.length > 0;
  }

  async createCollection(name: string): Promise<void> {
    const db = await this.ensureConnection();
    const collection = await db.createCollection<VectorDoc>(name);

    await collection.createSearchIndex({
      name: this.config.vectorIndexName,
      type: 'vectorSearch',
      definition: {
        fields: [
          {
            type: 'vector',
            path: 'embedding',
            numDimensions: this.config.dimensions,
            similarity: this.config.similarity,
          },
        ],
      },
    });
  }

  async add(collectionName: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;

    const collection = await this.getCollection(collectionName);
    const vectors = await this.embeddings.embedMany(records.map((r) => r.document));
    const now = new Date();

    await collection.bulkWrite(
      records.map((record, idx) => ({
        replaceOne: {
          filter: { _id: record.id },
          replacement: {
            document: record.document,
            metadata: record.metadata,
            embedding: vectors[idx],
            createdAt: now,
          },
          upsert: true,
        },
      }))
    );
  }

  async query(collectionName: string, text: string, k: number): Promise<VectorMatch[]> {
    if (k <= 0) return [];

    const collection = await this.getCollection(collectionName);
    const queryVector = await this.embeddings.embed(text);

    const pipeline = [
      {
        $vectorSearch: {
          index: this.config.vectorIndexName,
          path: 'embedding',
          queryVector,
          numCandidates: Math.max(this.config.numCandidates, k),
          limit: k,
        },
      },
      {
        $project: {
          document: 1,
          metadata: 1,
          score: { $meta: 'vectorSearchScore' },
        },
      },
    ];

    const results = await collection.aggregate<VectorSearchResult>(pipeline).toArray();

    return results.map((doc) => ({
      id: doc._id,
      document: doc.document,
      metadata: doc.metadata || {},
      score: doc.score,
    }));
  }

  async dropCollection(name: string): Promise<boolean> {
    const db = await this.ensureConnection();
    return await db.dropCollection(name);
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
  }
}
