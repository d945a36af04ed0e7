/**
 * Logger Unit Tests
 *
 * @module tests/unit/utils/logger.spec
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Decimal from 'decimal.js';
import { createLogger, logger } from '../../../src/main/utils/logger';
import { LocalDate } from '../../../src/shared/flex/temporal';

describe('logger', () => {
  const writes: string[] = [];
  const previousLevel = logger.getLevel();

  beforeEach(() => {
    writes.length = 0;
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
    logger.setLevel('debug');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(previousLevel);
  });

  function lastEntry(): Record<string, unknown> {
    const line = writes[writes.length - 1];
    if (line === undefined) throw new Error('nothing was logged');
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null) throw new Error('log line is not an object');
    return Object.fromEntries(Object.entries(parsed));
  }

  it('writes JSON lines to stderr', () => {
    createLogger('flex-client').info('Statement downloaded', { bytes: 120 });

    expect(writes).toHaveLength(1);
    expect(writes[0]?.endsWith('\n')).toBe(true);
    const entry = lastEntry();
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('Statement downloaded');
    expect(entry.service).toBe('flex-client');
    expect(entry.context).toEqual({ bytes: 120 });
  });

  it('filters by level', () => {
    logger.setLevel('warn');
    const log = createLogger('flex-parser');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(writes).toHaveLength(1);
    expect(lastEntry().level).toBe('warn');
  });

  it('redacts the token in request URLs', () => {
    logger.info('GET https://flex.test/SendRequest?v=3&t=test-token&q=42');

    expect(lastEntry().message).toBe('GET https://flex.test/SendRequest?v=3&t=[REDACTED]&q=42');
  });

  it('redacts assigned tokens but not the word', () => {
    logger.error('FLEX_TOKEN=test-token rejected: Token has expired.');

    expect(lastEntry().message).toBe('FLEX_TOKEN=[REDACTED] rejected: Token has expired.');
  });

  it('redacts sensitive context keys', () => {
    logger.warn('Request failed', { token: 'test-token', queryId: '42' });

    expect(lastEntry().context).toEqual({ token: '[REDACTED]', queryId: '42' });
  });

  it('renders decimals and dates as text', () => {
    logger.debug('values', { amount: new Decimal('368.80'), day: new LocalDate(2017, 6, 6) });

    expect(lastEntry().context).toEqual({ amount: '368.8', day: '2017-06-06' });
  });

  it('keeps the child service over the default', () => {
    createLogger('statement-service').error('failed', { error: 'boom' });

    expect(lastEntry()).toMatchObject({ service: 'statement-service', context: { error: 'boom' } });
  });
});
