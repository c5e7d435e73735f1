/**
 * Typed exit codes for CLI commands (Unix conventions, plus 3 for a run
 * whose diagnostics forced an abort).
 */
export type ExitCode =
  | { kind: 'success' }         // 0
  | { kind: 'general_error' }   // 1
  | { kind: 'misuse' }          // 2 - bad arguments
  | { kind: 'aborted' };        // 3 - the error policy stopped processing

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'aborted':
      return 3;
  }
}
