export * from './statistics.js';
export * from './renderers.js';
export * from './report-schema.js';
export * from './export.js';
export * from './inline-marker.js';
