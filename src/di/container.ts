import 'reflect-metadata';
import { container, DependencyContainer, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedErrorConfig } from '../config/error-config.js';
import { loadErrorConfig } from '../config/error-config.js';
import { formatAppError } from '../core/errors/formatter.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { getBootstrapLogger } from '../core/logging/bootstrap.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { RecoveryFileSystemPort } from '../recovery/ports/recovery-fs.port.js';
import { NodeRecoveryFileSystem } from '../recovery/adapters/node-recovery-fs.js';
import { createDefaultStrategies, type RecoveryStrategyFactory } from '../recovery/default-strategies.js';
import { ErrorSessionFactory } from '../session/session-factory.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly env?: Record<string, string | undefined>;
  /** JSON config file to load before env overrides. */
  readonly configFile?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests may inject a config before initialization; keep theirs.
  if (container.isRegistered(DI.Config.Errors)) return;

  const configResult = loadErrorConfig({ env: options.env ?? process.env, file: options.configFile });
  if (configResult.isErr()) {
    getBootstrapLogger().error({ error: configResult.error }, 'Invalid configuration');
    throw new Error(formatAppError(configResult.error));
  }
  container.register<ValidatedErrorConfig>(DI.Config.Errors, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Recovery.FileSystem)) {
    container.register<RecoveryFileSystemPort>(DI.Recovery.FileSystem, {
      useFactory: instanceCachingFactory(() => new NodeRecoveryFileSystem()),
    });
  }

  container.register<RecoveryStrategyFactory>(DI.Recovery.StrategyFactory, {
    useFactory: instanceCachingFactory((c: DependencyContainer): RecoveryStrategyFactory => {
      const config = c.resolve<ValidatedErrorConfig>(DI.Config.Errors);
      const fs = c.resolve<RecoveryFileSystemPort>(DI.Recovery.FileSystem);
      const logger = c.resolve<ILoggerFactory>(DI.Logging.Factory).create('RecoveryStrategy');
      return (overrides = {}) => createDefaultStrategies({
        fs,
        logger,
        similarityThreshold: config.recovery.similarityThreshold,
        largeFileThresholdBytes: config.recovery.largeFileThresholdBytes,
        reclaimers: overrides.reclaimers,
      });
    }),
  });

  container.register(DI.Sessions.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(ErrorSessionFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 *
 * Throws when the configuration is invalid; the message is the formatted
 * ConfigInvalid error.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;
  registerConfig(options);
  registerServices();
  initialized = true;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export function resolveSessionFactory(): ErrorSessionFactory {
  return container.resolve<ErrorSessionFactory>(DI.Sessions.Factory);
}

export { container };
