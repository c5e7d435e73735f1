#!/usr/bin/env node
/**
 * graceful-markup CLI - Composition Root
 *
 * Wires dependencies for each command and turns CliResults into exit codes.
 * All command logic lives in src/cli/commands/*.ts.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { Result } from 'neverthrow';

import { initializeContainer, container, resolveSessionFactory } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { getBootstrapLogger } from './core/logging/bootstrap.js';
import { Err } from './core/errors/factories.js';
import type { ValidatedErrorConfig } from './config/error-config.js';
import { CorrectionEngine } from './analysis/correction-engine.js';
import { RecoveryManager } from './recovery/recovery-manager.js';
import type { RecoveryStrategyFactory } from './recovery/default-strategies.js';
import { exportReport } from './reporting/export.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeClassifyCommand,
  executeRecoverCommand,
  executeReportCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('graceful-markup')
  .description('Classify, explain and recover from markup conversion errors')
  .version('0.1.0')
  .option('-c, --config <path>', 'JSON error-handling config file');

function boot(): boolean {
  const configFile: unknown = program.opts()['config'];
  const init = Result.fromThrowable(
    () => initializeContainer({ configFile: typeof configFile === 'string' ? configFile : undefined }),
    (e) => (e instanceof Error ? e.message : String(e))
  )();
  if (init.isErr()) {
    interpretCliResult(failure(init.error, { exitCode: { kind: 'misuse' } }));
    return false;
  }
  return true;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('classify <message...>')
  .description('Show the pattern id and suggestions for an error message')
  .option('--context <text>', 'Source text around the error')
  .action((message: string[], options: { context?: string }) => {
    if (!boot()) return;
    const config = container.resolve<ValidatedErrorConfig>(DI.Config.Errors);

    const result = executeClassifyCommand(message, options, {
      engine: new CorrectionEngine({ similarityThreshold: config.recovery.similarityThreshold }),
    });

    interpretCliResult(result);
  });

program
  .command('recover <file>')
  .description('Run the recovery strategies against a file')
  .requiredOption('--type <type>', 'Error type tag, e.g. encoding_error')
  .option('--category <category>', 'Error category (inferred from type and message when omitted)')
  .option('--line <n>', 'Line number for syntax recovery')
  .option('--message <text>', 'Error message')
  .action((file: string, options: { type: string; category?: string; line?: string; message?: string }) => {
    if (!boot()) return;
    const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);

    const result = executeRecoverCommand(file, options, {
      recovery: new RecoveryManager({
        logger: loggers.create('RecoveryManager'),
        strategies: container.resolve<RecoveryStrategyFactory>(DI.Recovery.StrategyFactory)(),
      }),
      resolvePath: path.resolve,
    });

    interpretCliResult(result);
  });

program
  .command('report <records>')
  .description('Build a statistics report from a JSON array of recorded errors')
  .option('-f, --format <format>', 'json | html | text', 'text')
  .option('-o, --out <path>', 'Write the report to a file instead of stdout')
  .option('--recover', 'Attempt recovery on files the records point at')
  .action(async (records: string, options: { format?: string; out?: string; recover?: boolean }) => {
    if (!boot()) return;
    const sessions = resolveSessionFactory();

    const result = await executeReportCommand(records, options, {
      readFile: (p) => Result.fromThrowable(
        () => fs.readFileSync(p, 'utf8'),
        (e) => Err.fileAccessFailed(p, 'read', e)
      )(),
      createSession: () => sessions.create(options.recover === true ? {} : { strategies: [] }),
      exportReport: (stats, p, format) => exportReport(stats, p, format),
      writeStdout: (text) => process.stdout.write(text),
    });

    interpretCliResult(result);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync(process.argv).catch((error: unknown) => {
  getBootstrapLogger().fatal({ err: error }, 'Unhandled CLI error');
  interpretCliResult(failure(error instanceof Error ? error.message : String(error)));
});
