import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { ProviderNotFoundError } from '../types';
import type { ProviderType, ProviderConfig } from '../types';

/**
 * Provider factory for creating language model instances
 * Supports OpenAI, Anthropic, and Google providers via Vercel AI SDK
 */
export class ProviderFactory {
  private config: ProviderConfig;
  private modelCache: Map<string, LanguageModel> = new Map();

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /**
   * Get a language model for the specified provider and model
   */
  async getModel(provider: ProviderType, modelName: string): Promise<LanguageModel> {
    const cacheKey = `${provider}:${modelName}`;

    const cached = this.modelCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    let model: LanguageModel;

    switch (provider) {
      case 'openai': {
        if (!this.config.openai?.apiKey) {
          throw new ProviderNotFoundError('OpenAI API key not configured');
        }
        const openai = createOpenAI({
          apiKey: this.config.openai.apiKey,
        });
        model = openai(modelName);
        break;
      }

      case 'anthropic': {
        if (!this.config.anthropic?.apiKey) {
          throw new ProviderNotFoundError('Anthropic API key not configured');
        }
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        const anthropic = createAnthropic({
          apiKey: this.config.anthropic.apiKey,
        });
        model = anthropic(modelName);
        break;
      }

      case 'google': {
        if (!this.config.google?.apiKey) {
          throw new ProviderNotFoundError('Google API key not configured');
        }
        const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
        const google = createGoogleGenerativeAI({
          apiKey: this.config.google.apiKey,
        });
        model = google(modelName);
        break;
      }

      default:
        throw new ProviderNotFoundError(`Unknown provider: ${String(provider)}`);
    }

    this.modelCache.set(cacheKey, model);
    return model;
  }

  /**
   * Check if a provider is configured
   */
  isProviderConfigured(provider: ProviderType): boolean {
    switch (provider) {
      case 'openai':
        return !!this.config.openai?.apiKey;
      case 'anthropic':
        return !!this.config.anthropic?.apiKey;
      case 'google':
        return !!this.config.google?.apiKey;
      default:
        return false;
    }
  }

  /**
   * Get list of configured providers
   */
  getConfiguredProviders(): ProviderType[] {
    const providers: ProviderType[] = [];

    if (this.config.openai?.apiKey) providers.push('openai');
    if (this.config.anthropic?.apiKey) providers.push('anthropic');
    if (this.config.google?.apiKey) providers.push('google');

    return providers;
  }

  clearCache(): void {
    this.modelCache.clear();
  }
}

/**
 * Common model names for quick reference
 */
export const Models = {
  OpenAI: {
    GPT5_MINI: 'gpt-5-mini',
  },
  Embeddings: {
    TEXT_EMBEDDING_3_SMALL: 'text-embedding-3-small',
  },
} as const;
