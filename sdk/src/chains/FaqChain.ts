import { FaqKnowledgeBase } from '../faq/FaqKnowledgeBase';
import { FAQ_NO_INFORMATION_MESSAGE, FAQ_SYSTEM_PROMPT, buildFaqPrompt } from '../prompts';
import type { ChainErrorKind, FaqMatch, LanguageModelClient, Message } from '../types';
import { BaseChain } from './BaseChain';
import type { BaseChainConfig } from './BaseChain';

export const FAQ_RETRIEVAL_ERROR_MESSAGE =
  "I'm having trouble accessing our FAQ information right now. Please try again later.";

export const FAQ_ANSWER_ERROR_MESSAGE =
  'I apologize, but I encountered an error while answering your question. Please try again.';

export interface FaqChainConfig extends BaseChainConfig {
  model: LanguageModelClient;
  knowledgeBase: FaqKnowledgeBase;
  /**
   * Number of FAQ records folded into the context
   * @default 3
   */
  topK?: number;
}

/**
 * Answers store-policy questions from retrieved FAQ answers only
 */
export class FaqChain extends BaseChain {
  readonly name = 'faq' as const;
  protected readonly defaultErrorKind: ChainErrorKind = 'retrieval';

  private model: LanguageModelClient;
  private knowledgeBase: FaqKnowledgeBase;
  private topK: number;

  constructor(config: FaqChainConfig) {
    super(config);
    this.model = config.model;
    this.knowledgeBase = config.knowledgeBase;
    this.topK = config.topK ?? 3;
  }

  async retrieve(query: string): Promise<FaqMatch[]> {
    return await this.knowledgeBase.query(query, this.topK);
  }

  async generateAnswer(query: string, context: string): Promise<string> {
    const messages: Message[] = [
      { role: 'system', content: FAQ_SYSTEM_PROMPT },
      { role: 'user', content: buildFaqPrompt(query, context) },
    ];
    return await this.model.complete(messages);
  }

  protected async execute(query: string): Promise<string> {
    const matches = await this.retrieve(query);
    const context = buildContext(matches);

    if (!context) {
      return FAQ_NO_INFORMATION_MESSAGE;
    }

    return await this.generateAnswer(query, context);
  }

  protected failureMessage(kind: ChainErrorKind): string {
    return kind === 'service' ? FAQ_ANSWER_ERROR_MESSAGE : FAQ_RETRIEVAL_ERROR_MESSAGE;
  }
}

function buildContext(matches: FaqMatch[]): string {
  return matches
    .map((match) => match.answer)
    .join(' ')
    .trim();
}
