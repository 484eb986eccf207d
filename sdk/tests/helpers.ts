import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { PRODUCT_TABLE_DDL } from '../src/sql/productSchema';
import type { EmbeddingProvider, LanguageModelClient, Logger, Message, ProductRow } from '../src/types';

export const VOCABULARY = ['shipping', 'payment', 'cash', 'return', 'defective', 'online'];

/**
 * Deterministic embeddings: one dimension per vocabulary word
 */
export function keywordEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return VOCABULARY.map((word) => (lower.includes(word) ? 1 : 0));
}

export function createFakeEmbeddings(): EmbeddingProvider & {
  embed: Mock<(text: string) => Promise<number[]>>;
  embedMany: Mock<(texts: string[]) => Promise<number[][]>>;
} {
  return {
    embed: vi.fn(async (text: string) => keywordEmbedding(text)),
    embedMany: vi.fn(async (texts: string[]) => texts.map(keywordEmbedding)),
  };
}

/**
 * Language model stub answering each call with the next queued reply
 */
export function createFakeModel(...replies: string[]): LanguageModelClient & {
  complete: Mock<(messages: Message[]) => Promise<string>>;
} {
  const complete = vi.fn<(messages: Message[]) => Promise<string>>();
  for (const reply of replies) {
    complete.mockResolvedValueOnce(reply);
  }
  return { complete };
}

export function createFakeLogger(): Logger & {
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
} {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

export const SAMPLE_PRODUCTS: ProductRow[] = [
  {
    product_link: 'https://shop.test/p/puma-runner',
    title: 'Puma Runner Shoes',
    brand: 'Puma',
    price: 2499,
    discount: 0.35,
    avg_rating: 4.2,
    total_ratings: 120,
  },
  {
    product_link: 'https://shop.test/p/nike-air',
    title: 'Nike Air Trainers',
    brand: 'Nike',
    price: 5999,
    discount: 0.1,
    avg_rating: 4.6,
    total_ratings: 842,
  },
  {
    product_link: 'https://shop.test/p/puma-softride',
    title: 'Puma Softride Sneakers',
    brand: 'PUMA',
    price: 3199,
    discount: 0.5,
    avg_rating: 3.9,
    total_ratings: 57,
  },
];

/**
 * Create a product database file in a fresh temp directory
 */
export function createProductDb(rows: ProductRow[] = SAMPLE_PRODUCTS): {
  path: string;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), 'shopchain-'));
  const path = join(dir, 'db.sqlite');
  const db = new Database(path);

  try {
    db.exec(PRODUCT_TABLE_DDL);
    const insert = db.prepare(
      `INSERT INTO product (product_link, title, brand, price, discount, avg_rating, total_ratings)
       VALUES (@product_link, @title, @brand, @price, @discount, @avg_rating, @total_ratings)`
    );
    for (const row of rows) {
      insert.run(row);
    }
  } finally {
    db.close();
  }

  return {
    path,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
