export * from './types.js';
export * from './recovery-manager.js';
export * from './default-strategies.js';
export * from './ports/recovery-fs.port.js';
export * from './adapters/node-recovery-fs.js';
export * from './strategies/memory-recovery.js';
export * from './strategies/encoding-recovery.js';
export * from './strategies/permission-recovery.js';
export * from './strategies/file-not-found-recovery.js';
export * from './strategies/syntax-recovery.js';
