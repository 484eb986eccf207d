import { Models, ProviderFactory } from '../providers';
import { AISDKLanguageModel } from './LanguageModel';
import { ChitchatChain } from '../chains/ChitchatChain';
import { FaqChain } from '../chains/FaqChain';
import { SqlChain } from '../chains/SqlChain';
import { FaqKnowledgeBase } from '../faq/FaqKnowledgeBase';
import { ConsoleLogger } from '../utils/ConsoleLogger';
import { InvalidConfigError } from '../types';
import type {
  ChainKind,
  ChainResult,
  ClientConfig,
  FaqIngestResult,
  LanguageModelClient,
  Logger,
  ProviderType,
} from '../types';

/**
 * Entry point wiring the chat model, stores and the three chains together.
 * Collaborators are passed in; `close()` releases the vector store.
 */
export class ChainClient {
  private providerFactory: ProviderFactory;
  private vectorStore: ClientConfig['vectorStore'];
  private logger: Logger;
  private model: LanguageModelClient;
  private knowledgeBase: FaqKnowledgeBase;

  readonly chitchatChain: ChitchatChain;
  readonly faqChain: FaqChain;
  readonly sqlChain: SqlChain;

  constructor(config: ClientConfig, model?: LanguageModelClient) {
    this.validateConfig(config);

    const provider: ProviderType = config.provider || 'openai';
    const debug = config.debug ?? false;

    this.providerFactory = new ProviderFactory(config.providers);
    if (!this.providerFactory.isProviderConfigured(provider)) {
      throw new InvalidConfigError(`Provider "${provider}" has no API key`);
    }

    this.vectorStore = config.vectorStore;
    this.logger = config.logger || new ConsoleLogger({ level: debug ? 'debug' : 'info' });
    this.model =
      model ||
      new AISDKLanguageModel(
        this.providerFactory,
        provider,
        config.model || Models.OpenAI.GPT5_MINI
      );

    this.knowledgeBase = new FaqKnowledgeBase({
      store: config.vectorStore,
      collection: config.faq?.collection,
      logger: this.logger,
    });

    this.chitchatChain = new ChitchatChain({
      model: this.model,
      logger: this.logger,
      debug,
      now: config.chitchat?.now,
      timeZone: config.chitchat?.timeZone,
    });
    this.faqChain = new FaqChain({
      model: this.model,
      knowledgeBase: this.knowledgeBase,
      topK: config.faq?.topK,
      logger: this.logger,
      debug,
    });
    this.sqlChain = new SqlChain({
      model: this.model,
      store: config.productStore,
      safety: config.sqlSafety,
      logger: this.logger,
      debug,
    });
  }

  private validateConfig(config: ClientConfig): void {
    if (!config.providers || Object.keys(config.providers).length === 0) {
      throw new InvalidConfigError('At least one provider must be configured');
    }

    if (!config.vectorStore) {
      throw new InvalidConfigError('Vector store is required');
    }

    if (!config.productStore) {
      throw new InvalidConfigError('Product store is required');
    }

    if (config.faq?.topK !== undefined && (!Number.isInteger(config.faq.topK) || config.faq.topK < 1)) {
      throw new InvalidConfigError('faq.topK must be a positive integer');
    }
  }

  // ============================================================================
  // Chains
  // ============================================================================

  async chitchat(message: string): Promise<string> {
    return await this.chitchatChain.invoke(message);
  }

  async faq(question: string): Promise<string> {
    return await this.faqChain.invoke(question);
  }

  async searchProducts(question: string): Promise<string> {
    return await this.sqlChain.invoke(question);
  }

  /**
   * Run a chain by kind and get the tagged result
   */
  async run(kind: ChainKind, input: string): Promise<ChainResult> {
    switch (kind) {
      case 'chitchat':
        return await this.chitchatChain.run(input);
      case 'faq':
        return await this.faqChain.run(input);
      case 'sql':
        return await this.sqlChain.run(input);
    }
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Load FAQ data from a question,answer CSV (skipped when already ingested)
   */
  async ingestFaqs(path: string): Promise<FaqIngestResult> {
    return await this.knowledgeBase.ingest(path);
  }

  async close(): Promise<void> {
    if (this.vectorStore.close) {
      await this.vectorStore.close();
    }
    this.providerFactory.clearCache();
  }
}
