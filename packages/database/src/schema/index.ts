export * from './emails.js';
export * from './responses.js';
export * from './knowledge-documents.js';
