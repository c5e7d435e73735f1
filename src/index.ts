/**
 * graceful-markup public API.
 */

import 'reflect-metadata';

export * from './domain/taxonomy.js';
export * from './domain/error-record.js';
export * from './domain/recovery-outcome.js';
export * from './domain/bounded-history.js';
export * from './domain/html.js';
export * from './domain/record-input.js';

export * from './analysis/similarity.js';
export * from './analysis/string-similarity.js';
export * from './analysis/keywords.js';
export * from './analysis/correction-rules.js';
export * from './analysis/pattern-classifier.js';
export * from './analysis/correction-engine.js';
export * from './analysis/highlight.js';

export * from './recovery/index.js';
export * from './reporting/index.js';

export * from './session/continue-policy.js';
export * from './session/error-handling-session.js';
export * from './session/session-factory.js';

export * from './config/error-config.js';
export * from './core/errors/index.js';
export * from './core/logging/index.js';

export { DI } from './di/tokens.js';
export { initializeContainer, resetContainer, resolveSessionFactory } from './di/container.js';
