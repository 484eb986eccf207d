import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConsoleLogger } from '../../src/utils/ConsoleLogger';

describe('ConsoleLogger', () => {
  let log: MockInstance<Console['log']>;
  let warn: MockInstance<Console['warn']>;
  let error: MockInstance<Console['error']>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write plain lines when colors and timestamps are off', () => {
    const logger = new ConsoleLogger({ colors: false, timestamps: false });

    logger.info('FAQ data ingested into collection: faqs');

    expect(log).toHaveBeenCalledWith('[ShopChain] INFO FAQ data ingested into collection: faqs');
  });

  it('should append metadata as JSON', () => {
    const logger = new ConsoleLogger({ colors: false, timestamps: false, prefix: '[test]' });

    logger.error('sql chain failed: boom', { kind: 'execution', latency: 12 });

    expect(error).toHaveBeenCalledWith(
      '[test] ERROR sql chain failed: boom {"kind":"execution","latency":12}'
    );
  });

  it('should skip messages below the configured level', () => {
    const logger = new ConsoleLogger({ level: 'warn', colors: false, timestamps: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[ShopChain] WARN shown');
  });

  it('should drop debug output at the default level', () => {
    new ConsoleLogger().debug('Generated SQL');

    expect(log).not.toHaveBeenCalled();
  });

  it('should color the level and stamp the time', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T15:04:05.123Z'));
    const logger = new ConsoleLogger({ level: 'debug' });

    logger.info('ready');
    vi.useRealTimers();

    expect(log).toHaveBeenCalledWith(
      '\x1b[2m[15:04:05.123]\x1b[0m [ShopChain] \x1b[36mINFO\x1b[0m ready'
    );
  });
});
