// Domain types
export * from './types/email-state.js';
export * from './types/knowledge.js';

// Collaborator ports
export type { Embedder, TextGenerator, MailSource, MailSink } from './ports.js';

// Knowledge store
export { Chunker, splitText, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './knowledge/chunker.js';
export {
  VectorStore,
  VectorStoreErrorCode,
  encodeIndex,
  decodeIndex,
  INDEX_FORMAT_VERSION,
  type VectorStoreError,
  type SearchHit,
} from './knowledge/vector-store.js';
export {
  KnowledgeBase,
  KnowledgeBaseErrorCode,
  INDEX_FILE,
  METADATA_FILE,
  type KnowledgeBaseError,
  type KnowledgeBaseOptions,
} from './knowledge/knowledge-base.js';

export { scoreResponse, clampConfidence, type ConfidenceInput } from './confidence.js';
export { callWithTimeout, type CallFailure } from './bounded-call.js';

// Services
export * from './services/index.js';
