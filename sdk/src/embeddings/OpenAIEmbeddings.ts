import OpenAI from 'openai';
import { Models } from '../providers';
import type { EmbeddingProvider } from '../types';

export interface OpenAIEmbeddingsConfig {
  apiKey: string;

  /**
   * @default 'text-embedding-3-small'
   */
  model?: string;

  cache?: {
    /**
     * @default true
     */
    enabled?: boolean;
    /**
     * TTL in milliseconds
     * @default 3600000
     */
    ttl?: number;
    /**
     * @default 1000
     */
    maxSize?: number;
  };
}

interface CacheEntry<T> {
  value: T;
  timestamp: number;
}

/**
 * OpenAI embeddings with an in-memory TTL cache
 */
export class OpenAIEmbeddings implements EmbeddingProvider {
  private client: OpenAI;
  private model: string;
  private cacheEnabled: boolean;
  private ttl: number;
  private maxSize: number;
  private cache: Map<string, CacheEntry<number[]>> = new Map();
  private cacheStats = { hits: 0, misses: 0 };

  constructor(config: OpenAIEmbeddingsConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model || Models.Embeddings.TEXT_EMBEDDING_3_SMALL;
    this.cacheEnabled = config.cache?.enabled ?? true;
    this.ttl = config.cache?.ttl ?? 3600000;
    this.maxSize = config.cache?.maxSize ?? 1000;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  /**
   * Embed several texts; only cache misses go to the API, in one request
   */
  async embedMany(texts: string[]): Promise<number[][]> {
    const results: Array<number[] | undefined> = texts.map((text) => this.getCached(text));
    const missing = texts.filter((_, idx) => results[idx] === undefined);

    if (missing.length > 0) {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: missing,
      });

      const fetched = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      let cursor = 0;
      for (let i = 0; i < texts.length; i++) {
        if (results[i] === undefined) {
          const embedding = fetched[cursor++];
          if (!embedding) {
            throw new Error(`Embedding missing for input ${i}`);
          }
          results[i] = embedding;
          this.setCached(texts[i], embedding);
        }
      }
    }

    return results.map((embedding, idx) => {
      if (!embedding) {
        throw new Error(`Embedding missing for input ${idx}`);
      }
      return embedding;
    });
  }

  getCacheStats(): { hits: number; misses: number; size: number } {
    return { ...this.cacheStats, size: this.cache.size };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private getCached(text: string): number[] | undefined {
    if (!this.cacheEnabled) return undefined;

    const cacheKey = `${this.model}:${text}`;
    const cached = this.cache.get(cacheKey);

    if (cached) {
      if (Date.now() - cached.timestamp < this.ttl) {
        this.cacheStats.hits++;
        return cached.value;
      }
      // Expired
      this.cache.delete(cacheKey);
    }

    this.cacheStats.misses++;
    return undefined;
  }

  private setCached(text: string, embedding: number[]): void {
    if (!this.cacheEnabled) return;

    if (this.cache.size >= this.maxSize) {
      // Remove oldest entry
      const firstKey = this.cache.keys().next().value;
      if (firstKey) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(`${this.model}:${text}`, {
      value: embedding,
      timestamp: Date.now(),
    });
  }
}
