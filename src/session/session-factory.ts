import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { ValidatedErrorConfig } from '../config/error-config.js';
import { CorrectionEngine } from '../analysis/correction-engine.js';
import { PatternClassifier } from '../analysis/pattern-classifier.js';
import type { CorrectionRule } from '../analysis/correction-rules.js';
import { RecoveryManager } from '../recovery/recovery-manager.js';
import type { RecoveryStrategy } from '../recovery/types.js';
import type { RecoveryStrategyFactory } from '../recovery/default-strategies.js';
import type { MemoryReclaimer } from '../recovery/strategies/memory-recovery.js';
import { ErrorHandlingSession } from './error-handling-session.js';

export interface CreateSessionOptions {
  /** Appended after the built-in classification rules. */
  readonly extraRules?: readonly CorrectionRule[];
  /** Replaces the registered strategies for this session. */
  readonly strategies?: readonly RecoveryStrategy[];
  /** Caches this session's memory strategy may release. */
  readonly reclaimers?: readonly MemoryReclaimer[];
  readonly clock?: () => Date;
}

/**
 * Builds independent sessions. Every session gets its own classifier,
 * correction engine, recovery manager and strategy instances.
 */
@singleton()
export class ErrorSessionFactory {
  private created = 0;

  constructor(
    @inject(DI.Config.Errors) private readonly config: ValidatedErrorConfig,
    @inject(DI.Logging.Factory) private readonly loggers: ILoggerFactory,
    @inject(DI.Recovery.StrategyFactory) private readonly buildStrategies: RecoveryStrategyFactory,
  ) {}

  create(options: CreateSessionOptions = {}): ErrorHandlingSession {
    const sessionId = ++this.created;
    const logger = this.loggers.create('ErrorHandlingSession').child({ sessionId });

    const classifier = new PatternClassifier();
    for (const rule of options.extraRules ?? []) {
      classifier.addRule(rule.pattern, rule.patternId, rule.suggestions);
    }

    return new ErrorHandlingSession({
      config: this.config,
      engine: new CorrectionEngine({
        classifier,
        similarityThreshold: this.config.recovery.similarityThreshold,
      }),
      recovery: new RecoveryManager({
        logger: this.loggers.create('RecoveryManager').child({ sessionId }),
        strategies: options.strategies ?? this.buildStrategies({ reclaimers: options.reclaimers }),
        clock: options.clock,
      }),
      logger,
    });
  }
}
