/**
 * CLI Result Interpreter
 *
 * The only place a CliResult becomes a process exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result and set `process.exitCode`. The process is left to end
 * on its own so the logger can flush.
 */
export function interpretCliResult(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exitCode = toNumericExitCode(result.exitCode);
  }
}
