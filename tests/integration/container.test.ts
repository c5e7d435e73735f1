import 'reflect-metadata';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { container } from 'tsyringe';
import { DI } from '../../src/di/tokens.js';
import { initializeContainer, isInitialized, resetContainer, resolveSessionFactory } from '../../src/di/container.js';
import type { RecoveryStrategyFactory } from '../../src/recovery/default-strategies.js';
import { makeRecord } from '../helpers/records.js';
import { setupTest, teardownTest } from '../helpers/test-container.js';

describe('DI container', () => {
  afterEach(() => {
    teardownTest();
  });

  it('registers the config, strategies and session factory', () => {
    setupTest({ displayLimit: 3 });

    expect(isInitialized()).toBe(true);
    expect(container.resolve(DI.Config.Errors)).toMatchObject({ displayLimit: 3 });
    const build = container.resolve<RecoveryStrategyFactory>(DI.Recovery.StrategyFactory);
    expect(build().map((s) => s.name)).toEqual([
      'memory',
      'encoding',
      'permission',
      'file_not_found',
      'syntax',
    ]);
  });

  it('builds fresh strategy instances on every call', () => {
    setupTest();
    const build = container.resolve<RecoveryStrategyFactory>(DI.Recovery.StrategyFactory);
    expect(build()[0]).not.toBe(build()[0]);
  });

  it('runs memory reclaimers only in the session that was given them', () => {
    setupTest({ defaultLevel: 'lenient' });
    const factory = resolveSessionFactory();
    const reclaim = vi.fn(() => 4);
    const withCache = factory.create({ reclaimers: [reclaim] });
    const other = factory.create();
    const memoryRecord = () => makeRecord({ errorType: 'memory_error', category: 'system', message: 'out of memory' });

    other.handle(memoryRecord());
    expect(reclaim).not.toHaveBeenCalled();

    withCache.handle(memoryRecord());
    expect(reclaim).toHaveBeenCalledTimes(1);
  });

  it('shares no session state', () => {
    setupTest({ defaultLevel: 'lenient' });
    const factory = resolveSessionFactory();
    expect(resolveSessionFactory()).toBe(factory);

    const first = factory.create();
    const second = factory.create();
    first.handle(makeRecord());

    expect(first.statistics().totalErrors).toBe(1);
    expect(second.statistics().totalErrors).toBe(0);
  });

  it('logs through the injected factory', () => {
    const { loggerFactory } = setupTest();
    resolveSessionFactory().create().handle(makeRecord({ severity: 'warning' }));
    expect(loggerFactory.getLogger('ErrorHandlingSession')?.hasEntry('debug', 'Handled markup error')).toBe(true);
  });

  it('applies extra rules to new sessions only', () => {
    setupTest({ defaultLevel: 'lenient' });
    const factory = resolveSessionFactory();
    const custom = factory.create({ extraRules: [{ pattern: /widget/, patternId: 'widget_error', suggestions: [] }] });
    const plain = factory.create();

    const a = makeRecord({ message: 'widget broke' });
    const b = makeRecord({ message: 'widget broke' });
    custom.handle(a);
    plain.handle(b);

    expect(a.patternId).toBe('widget_error');
    expect(b.patternId).toBe('general_syntax');
  });

  it('refuses to start with an invalid environment', () => {
    resetContainer();
    expect(() => initializeContainer({ env: { GRACEFUL_MARKUP_LEVEL: 'loud' } })).toThrow(
      /Configuration invalid \(environment\)/
    );
    expect(isInitialized()).toBe(false);
  });
});
