// Public API - used by the CLI
export * from './config/index.js';
export * from './syncer.js';
export * from './package-loader.js';
export * from './errors.js';
export * from './diff-utils.js';
export * from './backup.js';
export * from './actionable.js';

// Building blocks of the sync passes
export * from './fields.js';
export * from './language.js';
export * from './documents.js';
export * from './merge.js';
export * from './escaping.js';
export * from './manifest-extractor.js';
export * from './catalog-extractor.js';
export * from './manifest-writer.js';
export * from './catalog-writer.js';
