import { CHITCHAT_SYSTEM_PROMPT } from '../prompts';
import type { ChainErrorKind, LanguageModelClient, Message } from '../types';
import { BaseChain } from './BaseChain';
import type { BaseChainConfig } from './BaseChain';

export const CHITCHAT_ERROR_MESSAGE = "I'm sorry, I ran into an error. Please try again.";

export interface ChitchatChainConfig extends BaseChainConfig {
  model: LanguageModelClient;
  /** Clock used for the date/time note */
  now?: () => Date;
  /** IANA time zone for the date/time note; the host zone when unset */
  timeZone?: string;
}

export interface DateTimeInfo {
  date: string;
  time: string;
  day: string;
}

/**
 * Stateless single-turn small talk with the shopping assistant persona
 */
export class ChitchatChain extends BaseChain {
  readonly name = 'chitchat' as const;
  protected readonly defaultErrorKind: ChainErrorKind = 'service';

  private model: LanguageModelClient;
  private now: () => Date;
  private timeZone?: string;

  constructor(config: ChitchatChainConfig) {
    super(config);
    this.model = config.model;
    this.now = config.now || (() => new Date());
    this.timeZone = config.timeZone;
  }

  buildMessages(query: string): Message[] {
    const { date, time } = getDateTimeInfo(this.now(), this.timeZone);
    return [
      {
        role: 'system',
        content: `${CHITCHAT_SYSTEM_PROMPT}\n\nCurrent date and time: ${date}, ${time}`,
      },
      { role: 'user', content: query },
    ];
  }

  protected async execute(query: string): Promise<string> {
    return await this.model.complete(this.buildMessages(query));
  }

  protected failureMessage(): string {
    return CHITCHAT_ERROR_MESSAGE;
  }
}

/**
 * "Monday, October 05, 2026" / "03:04 PM" / "Monday"
 */
export function getDateTimeInfo(now: Date, timeZone?: string): DateTimeInfo {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    hourCycle: 'h12',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  const day = part('weekday');
  const hour = part('hour').padStart(2, '0');
  const minute = part('minute').padStart(2, '0');

  return {
    date: `${day}, ${part('month')} ${part('day').padStart(2, '0')}, ${part('year')}`,
    time: `${hour}:${minute} ${part('dayPeriod').toUpperCase()}`,
    day,
  };
}
