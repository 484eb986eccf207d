import { ChainClient } from './core/Client';
import type { ClientConfig } from './types';

// Main Client
export { ChainClient } from './core/Client';
export { AISDKLanguageModel } from './core/LanguageModel';

// Chains
export {
  BaseChain,
  ChitchatChain,
  FaqChain,
  SqlChain,
  getDateTimeInfo,
  CHITCHAT_ERROR_MESSAGE,
  FAQ_RETRIEVAL_ERROR_MESSAGE,
  FAQ_ANSWER_ERROR_MESSAGE,
  SQL_CHAIN_ERROR_MESSAGE,
} from './chains';
export type {
  BaseChainConfig,
  ChitchatChainConfig,
  DateTimeInfo,
  FaqChainConfig,
  SqlChainConfig,
} from './chains';

// Prompts
export {
  CHITCHAT_SYSTEM_PROMPT,
  FAQ_SYSTEM_PROMPT,
  FAQ_NO_INFORMATION_MESSAGE,
  SQL_GENERATION_PROMPT,
  RESULT_NARRATION_PROMPT,
  NO_PRODUCTS_MESSAGE,
} from './prompts';

// SQL
export { extractSQL } from './sql/extractSQL';
export { findUnsafeKeywords, isSafeSQL, assertSafeSQL, UNSAFE_SQL_KEYWORDS } from './sql/sqlSafety';
export {
  PRODUCT_COLUMNS,
  PRODUCT_TABLE,
  PRODUCT_TABLE_DDL,
  describeProductSchema,
} from './sql/productSchema';
export type { ProductColumn } from './sql/productSchema';

// Retrieval
export { FaqKnowledgeBase, parseFaqCsv } from './faq/FaqKnowledgeBase';
export type { FaqKnowledgeBaseConfig } from './faq/FaqKnowledgeBase';
export { OpenAIEmbeddings } from './embeddings/OpenAIEmbeddings';
export type { OpenAIEmbeddingsConfig } from './embeddings/OpenAIEmbeddings';

// Providers
export { ProviderFactory, Models } from './providers';

// Storage
export { MemoryVectorStore, SQLiteProductStore } from './storage';
export type { SQLiteProductStoreConfig } from './storage';

// Config & logging
export { loadSettings, clientConfigFromSettings } from './config';
export type { Settings, LoadSettingsOptions } from './config';
export { ConsoleLogger, silentLogger } from './utils/ConsoleLogger';
export type { ConsoleLoggerConfig } from './utils/ConsoleLogger';

// Types
export type {
  ProviderType,
  ProviderConfig,
  MessageRole,
  Message,
  LanguageModelClient,
  EmbeddingProvider,
  VectorRecord,
  VectorMatch,
  VectorStore,
  FaqRecord,
  FaqMatch,
  FaqIngestResult,
  ProductRow,
  QueryRow,
  RelationalStore,
  SqlSafetyPolicy,
  LogLevel,
  Logger,
  ChainKind,
  ChainErrorKind,
  ChainResult,
  ClientConfig,
} from './types';

// Errors
export {
  ShopChainError,
  InvalidConfigError,
  IngestionError,
  ProviderNotFoundError,
  ChainError,
  GenerationError,
  UnsafeSQLError,
  ExecutionError,
  RetrievalError,
  ServiceError,
  toChainError,
} from './types';

// Convenience function to create a client
export function createClient(config: ClientConfig): ChainClient {
  return new ChainClient(config);
}
