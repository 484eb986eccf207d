import { toChainError } from '../types';
import type { ChainErrorKind, ChainKind, ChainResult, Logger } from '../types';
import { ConsoleLogger } from '../utils/ConsoleLogger';

export interface BaseChainConfig {
  logger?: Logger;
  /**
   * Log per-run timings
   * @default false
   */
  debug?: boolean;
}

/**
 * Shared outer boundary for every chain.
 *
 * Subclasses implement `execute`; anything it throws is logged with its
 * kind and replaced by one of the chain's fixed user-facing messages.
 */
export abstract class BaseChain {
  abstract readonly name: ChainKind;

  protected logger: Logger;
  protected debug: boolean;

  /** Kind assigned to errors that are not already ChainErrors */
  protected abstract readonly defaultErrorKind: ChainErrorKind;

  constructor(config: BaseChainConfig = {}) {
    this.logger = config.logger || new ConsoleLogger();
    this.debug = config.debug ?? false;
  }

  protected abstract execute(input: string): Promise<string>;

  /** User-safe text returned for a failure of the given kind */
  protected abstract failureMessage(kind: ChainErrorKind): string;

  async run(input: string): Promise<ChainResult> {
    const startTime = Date.now();

    try {
      const text = await this.execute(input);
      if (this.debug) {
        this.logger.debug(`${this.name} chain completed`, { latency: Date.now() - startTime });
      }
      return { ok: true, text };
    } catch (error) {
      const chainError = toChainError(error, this.defaultErrorKind);
      this.logger.error(`${this.name} chain failed: ${chainError.message}`, {
        kind: chainError.kind,
        error: chainError.name,
        latency: Date.now() - startTime,
      });
      return {
        ok: false,
        kind: chainError.kind,
        text: this.failureMessage(chainError.kind),
      };
    }
  }

  /**
   * Run the chain and return only the text
   */
  async invoke(input: string): Promise<string> {
    const result = await this.run(input);
    return result.text;
  }
}
