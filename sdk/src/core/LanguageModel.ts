import { generateText } from 'ai';
import type { ModelMessage } from 'ai';
import { ProviderFactory } from '../providers';
import { ServiceError } from '../types';
import type { LanguageModelClient, Message, ProviderType } from '../types';

/**
 * Language model client backed by the Vercel AI SDK
 */
export class AISDKLanguageModel implements LanguageModelClient {
  private providerFactory: ProviderFactory;
  private provider: ProviderType;
  private modelName: string;

  constructor(providerFactory: ProviderFactory, provider: ProviderType, modelName: string) {
    this.providerFactory = providerFactory;
    this.provider = provider;
    this.modelName = modelName;
  }

  get model(): string {
    return this.modelName;
  }

  /**
   * Send the conversation and return the generated text.
   * Any provider or transport failure surfaces as a ServiceError.
   */
  async complete(messages: Message[]): Promise<string> {
    try {
      const model = await this.providerFactory.getModel(this.provider, this.modelName);
      const { text } = await generateText({
        model,
        messages: messages.map(toModelMessage),
      });
      return text;
    } catch (error) {
      throw new ServiceError(
        error instanceof Error ? error.message : 'Unknown error',
        error
      );
    }
  }
}

function toModelMessage(message: Message): ModelMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}
