import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, createMemorySink, silentLogger } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops records below the configured level', () => {
    const memory = createMemorySink();
    const logger = createLogger('EventDispatcher', { level: 'warn', sink: memory.sink });

    logger.debug('subscribed');
    logger.info('published');
    logger.warn('queue full', { eventType: 'ItemAcquired' });
    logger.error('callback failed');

    expect(memory.records).toEqual([
      { level: 'warn', scope: 'EventDispatcher', message: 'queue full', context: { eventType: 'ItemAcquired' } },
      { level: 'error', scope: 'EventDispatcher', message: 'callback failed' },
    ]);
    expect(memory.messages('error')).toEqual(['callback failed']);
  });

  it('nests child scopes and keeps the parent sink and level', () => {
    const memory = createMemorySink();
    const logger = createLogger('GameRuntime', { level: 'debug', sink: memory.sink });

    logger.child('StateController').debug('entering Exploring');

    expect(memory.records[0]).toEqual({
      level: 'debug',
      scope: 'GameRuntime/StateController',
      message: 'entering Exploring',
    });
  });

  it('shares a level change between a logger and its children', () => {
    const memory = createMemorySink();
    const root = createLogger('GameRuntime', { level: 'info', sink: memory.sink });
    const child = root.child('EventDispatcher');

    child.debug('hidden');
    root.setLevel('debug');
    child.debug('shown');
    child.setLevel('error');
    root.warn('hidden too');

    expect(root.level).toBe('error');
    expect(memory.messages()).toEqual(['shown']);
  });

  it('writes scope-prefixed lines to the console by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    const logger = createLogger('StateController');
    logger.warn('popState() with an empty stack');
    logger.info('state stack cleared', { depth: 0 });

    expect(warn).toHaveBeenCalledWith('StateController: popState() with an empty stack');
    expect(info).toHaveBeenCalledWith('StateController: state stack cleared', { depth: 0 });
  });

  it('silent logger never reaches the console', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    silentLogger.error('ignored');

    expect(error).not.toHaveBeenCalled();
  });
});
