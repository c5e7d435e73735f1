/**
 * CLI Commands - Public API
 */

export { executeClassifyCommand, type ClassifyCommandDeps, type ClassifyCommandOptions } from './classify.js';
export { executeRecoverCommand, type RecoverCommandDeps, type RecoverCommandOptions } from './recover.js';
export { executeReportCommand, type ReportCommandDeps, type ReportCommandOptions } from './report.js';
