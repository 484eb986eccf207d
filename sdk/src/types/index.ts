// ============================================================================
// Provider Types
// ============================================================================

export type ProviderType = 'openai' | 'anthropic' | 'google';

export interface ProviderConfig {
  openai?: {
    apiKey: string;
  };
  anthropic?: {
    apiKey: string;
  };
  google?: {
    apiKey: string;
  };
}

// ============================================================================
// Message Types
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Anything that can turn a conversation into generated text
 */
export interface LanguageModelClient {
  complete(messages: Message[]): Promise<string>;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface VectorRecord {
  id: string;
  document: string;
  metadata: Record<string, string>;
}

export interface VectorMatch extends VectorRecord {
  score: number;
}

/**
 * Collection-based store answering nearest-neighbour queries
 */
export interface VectorStore {
  hasCollection(name: string): Promise<boolean>;
  createCollection(name: string): Promise<void>;
  add(collection: string, records: VectorRecord[]): Promise<void>;
  query(collection: string, text: string, k: number): Promise<VectorMatch[]>;
  dropCollection?(name: string): Promise<boolean>;
  close?(): Promise<void>;
}

export interface FaqRecord {
  question: string;
  answer: string;
}

export interface FaqMatch extends FaqRecord {
  id: string;
  score: number;
}

export interface FaqIngestResult {
  collection: string;
  indexed: number;
  skipped: boolean;
}

// ============================================================================
// Product Types
// ============================================================================

export interface ProductRow {
  product_link: string;
  title: string;
  brand: string;
  price: number;
  discount: number;
  avg_rating: number;
  total_ratings: number;
}

export type QueryRow = Record<string, unknown>;

export interface RelationalStore {
  query(sql: string): Promise<QueryRow[]>;
}

export type SqlSafetyPolicy = 'substring' | 'statement';

// ============================================================================
// Logging Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ============================================================================
// Chain Types
// ============================================================================

export type ChainKind = 'chitchat' | 'faq' | 'sql';

export type ChainErrorKind =
  | 'generation'
  | 'unsafe_sql'
  | 'execution'
  | 'retrieval'
  | 'service';

export type ChainResult =
  | { ok: true; text: string }
  | { ok: false; kind: ChainErrorKind; text: string };

// ============================================================================
// Client Config
// ============================================================================

export interface ClientConfig {
  providers: ProviderConfig;
  /**
   * @default 'openai'
   */
  provider?: ProviderType;
  /**
   * @default 'gpt-5-mini'
   */
  model?: string;
  vectorStore: VectorStore;
  productStore: RelationalStore;
  logger?: Logger;
  /**
   * Log generated SQL and per-chain timings
   * @default false
   */
  debug?: boolean;
  /**
   * @default 'substring'
   */
  sqlSafety?: SqlSafetyPolicy;
  faq?: {
    /**
     * @default 'faqs'
     */
    collection?: string;
    /**
     * @default 3
     */
    topK?: number;
  };
  chitchat?: {
    now?: () => Date;
    timeZone?: string;
  };
}

// ============================================================================
// Error Types
// ============================================================================

export class ShopChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShopChainError';
  }
}

export class InvalidConfigError extends ShopChainError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

export class IngestionError extends ShopChainError {
  constructor(message: string) {
    super(`Ingestion failed: ${message}`);
    this.name = 'IngestionError';
  }
}

export class ProviderNotFoundError extends ShopChainError {
  constructor(provider: string) {
    super(`Provider not configured: ${provider}`);
    this.name = 'ProviderNotFoundError';
  }
}

/**
 * Failure inside a chain; always converted to a fixed message at the chain boundary
 */
export class ChainError extends ShopChainError {
  readonly kind: ChainErrorKind;

  constructor(kind: ChainErrorKind, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'ChainError';
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class GenerationError extends ChainError {
  constructor(message = 'model failed to produce SQL') {
    super('generation', message);
    this.name = 'GenerationError';
  }
}

export class UnsafeSQLError extends ChainError {
  readonly keywords: string[];

  constructor(keywords: string[]) {
    super('unsafe_sql', `Unsafe SQL detected: ${keywords.join(', ')}`);
    this.name = 'UnsafeSQLError';
    this.keywords = keywords;
  }
}

export class ExecutionError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super('execution', `SQL execution failed: ${message}`, { cause });
    this.name = 'ExecutionError';
  }
}

export class RetrievalError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super('retrieval', `Retrieval failed: ${message}`, { cause });
    this.name = 'RetrievalError';
  }
}

export class ServiceError extends ChainError {
  constructor(message: string, cause?: unknown) {
    super('service', `Model service error: ${message}`, { cause });
    this.name = 'ServiceError';
  }
}

/**
 * Normalise anything thrown inside a chain into a ChainError
 */
export function toChainError(error: unknown, fallbackKind: ChainErrorKind): ChainError {
  if (error instanceof ChainError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new ChainError(fallbackKind, message, { cause: error });
}
