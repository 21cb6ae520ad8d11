// Service interfaces
export * from './pipeline.js';
export * from './dispatcher.js';
export * from './orchestrator.js';
export * from './inbox.js';

// Service implementations
export * from './impl/index.js';
