export {
  EmailRepository,
  isEmailStatus,
  isEmailPriority,
  type EmailFilters,
  type EmailStatePatch,
} from './email-repository.js';
export { ResponseRepository, type ResponseStats } from './response-repository.js';
export {
  KnowledgeDocumentRepository,
  type KnowledgeDocumentFilters,
  type KnowledgeDocumentPatch,
} from './knowledge-document-repository.js';
export { UnitOfWork, createRepositories } from './unit-of-work.js';
export type {
  IEmailRepository,
  IResponseRepository,
  IKnowledgeDocumentRepository,
  IUnitOfWork,
  Repositories,
} from './interfaces.js';
