import { describe, it, expect } from 'vitest';
import { createMockLogCollector } from './mockCollectors.js';

describe('createMockLogCollector', () => {
  it('captures entries from the logger and its children', () => {
    const collector = createMockLogCollector();

    collector.logger.info('first');
    collector.logger.child({ operation: 'seed' }).warn('second');

    expect(collector.messages()).toEqual(['first', 'second']);
    expect(collector.entries[1]?.operation).toBe('seed');
  });

  it('filters messages by level', () => {
    const collector = createMockLogCollector();

    collector.logger.debug('noise');
    collector.logger.error('broken');

    expect(collector.messages('error')).toEqual(['broken']);
  });

  it('respects the minimum level', () => {
    const collector = createMockLogCollector('warn');

    collector.logger.info('dropped');
    collector.logger.warn('kept');

    expect(collector.messages()).toEqual(['kept']);
  });

  it('clears captured entries', () => {
    const collector = createMockLogCollector();
    collector.logger.info('first');

    collector.clear();

    expect(collector.entries).toHaveLength(0);
  });
});
