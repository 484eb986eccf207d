import {
  NO_PRODUCTS_MESSAGE,
  RESULT_NARRATION_PROMPT,
  SQL_GENERATION_PROMPT,
  buildNarrationInput,
} from '../prompts';
import { extractSQL } from '../sql/extractSQL';
import { assertSafeSQL } from '../sql/sqlSafety';
import { GenerationError } from '../types';
import type {
  ChainErrorKind,
  LanguageModelClient,
  Message,
  QueryRow,
  RelationalStore,
  SqlSafetyPolicy,
} from '../types';
import { BaseChain } from './BaseChain';
import type { BaseChainConfig } from './BaseChain';

export const SQL_CHAIN_ERROR_MESSAGE = "Sorry, I couldn't process your request at the moment.";

export interface SqlChainConfig extends BaseChainConfig {
  model: LanguageModelClient;
  store: RelationalStore;
  /**
   * @default 'substring'
   */
  safety?: SqlSafetyPolicy;
}

/**
 * Natural-language product search:
 * generate SQL, check it, run it, narrate the rows.
 */
export class SqlChain extends BaseChain {
  readonly name = 'sql' as const;
  protected readonly defaultErrorKind: ChainErrorKind = 'execution';

  private model: LanguageModelClient;
  private store: RelationalStore;
  private safety: SqlSafetyPolicy;

  constructor(config: SqlChainConfig) {
    super(config);
    this.model = config.model;
    this.store = config.store;
    this.safety = config.safety || 'substring';
  }

  /**
   * Ask the model for one tagged statement and return it once it passes the safety policy
   */
  async generateSQL(question: string): Promise<string> {
    const messages: Message[] = [
      { role: 'system', content: SQL_GENERATION_PROMPT },
      { role: 'user', content: question },
    ];

    const response = await this.model.complete(messages);
    const sql = extractSQL(response);

    if (!sql) {
      throw new GenerationError();
    }

    assertSafeSQL(sql, this.safety);

    if (this.debug) {
      this.logger.debug('Generated SQL', { sql });
    }

    return sql;
  }

  async runSQL(sql: string): Promise<QueryRow[]> {
    return await this.store.query(sql);
  }

  async narrateResults(question: string, rows: QueryRow[]): Promise<string> {
    if (rows.length === 0) {
      return NO_PRODUCTS_MESSAGE;
    }

    const messages: Message[] = [
      { role: 'system', content: RESULT_NARRATION_PROMPT },
      { role: 'user', content: buildNarrationInput(question, JSON.stringify(rows)) },
    ];

    return await this.model.complete(messages);
  }

  protected async execute(question: string): Promise<string> {
    const sql = await this.generateSQL(question);
    const rows = await this.runSQL(sql);
    return await this.narrateResults(question, rows);
  }

  protected failureMessage(): string {
    return SQL_CHAIN_ERROR_MESSAGE;
  }
}
