// index.ts
// Main exports for papergrid

export * from './types/index.js';
export * from './core/tokens.js';
export * from './core/grid-generator.js';
export * from './core/html-engine.js';
export * from './core/renderer.js';
export * from './core/datasource.js';
export * from './core/manifest.js';
export * from './core/template.js';
export * from './core/formatter.js';
export * from './core/zip-handler.js';
export * from './core/process-runner.js';
export * from './core/tool-config.js';
export * from './core/converter.js';
export * from './core/compliance-validator.js';
export * from './core/pipeline.js';
export * from './core/template-validator.js';
