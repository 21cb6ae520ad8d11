import type { Result } from '@mailpilot/utils';
import type { Email, NewEmail, EmailStatus, EmailPriority } from '../schema/emails.js';
import type { EmailResponse, NewEmailResponse } from '../schema/responses.js';
import type { KnowledgeDocument, NewKnowledgeDocument } from '../schema/knowledge-documents.js';
import type { RepositoryError } from '../errors.js';
import type { EmailFilters, EmailStatePatch } from './email-repository.js';
import type { ResponseStats } from './response-repository.js';
import type {
  KnowledgeDocumentFilters,
  KnowledgeDocumentPatch,
} from './knowledge-document-repository.js';

export interface IEmailRepository {
  create(email: NewEmail): Promise<Result<Email, RepositoryError>>;
  findById(id: string): Promise<Result<Email | null, RepositoryError>>;
  findByExternalId(externalId: string): Promise<Result<Email | null, RepositoryError>>;
  exists(externalId: string): Promise<Result<boolean, RepositoryError>>;
  findMany(filters?: EmailFilters): Promise<Result<Email[], RepositoryError>>;
  transition(
    id: string,
    from: EmailStatus | readonly EmailStatus[],
    to: EmailStatus,
    patch?: EmailStatePatch
  ): Promise<Result<Email, RepositoryError>>;
  markFailed(id: string, reason: string): Promise<Result<Email, RepositoryError>>;
  updatePriority(id: string, priority: EmailPriority): Promise<Result<Email, RepositoryError>>;
  findRespondedSince(since: Date): Promise<Result<Email[], RepositoryError>>;
  deleteProcessedBefore(
    cutoff: Date,
    exemptPriorities: readonly EmailPriority[]
  ): Promise<Result<string[], RepositoryError>>;
  countByStatus(): Promise<Result<Record<EmailStatus, number>, RepositoryError>>;
  countByPriority(): Promise<Result<Record<EmailPriority, number>, RepositoryError>>;
  countReceivedSince(since: Date): Promise<Result<number, RepositoryError>>;
}

export interface IResponseRepository {
  create(response: NewEmailResponse): Promise<Result<EmailResponse, RepositoryError>>;
  findById(id: string): Promise<Result<EmailResponse | null, RepositoryError>>;
  findByEmailId(emailId: string): Promise<Result<EmailResponse[], RepositoryError>>;
  findSentByEmailId(emailId: string): Promise<Result<EmailResponse | null, RepositoryError>>;
  markSent(
    id: string,
    sentAt: Date,
    sentMessageId?: string
  ): Promise<Result<EmailResponse, RepositoryError>>;
  setDraftId(id: string, draftId: string): Promise<Result<EmailResponse, RepositoryError>>;
  stats(): Promise<Result<ResponseStats, RepositoryError>>;
}

export interface IKnowledgeDocumentRepository {
  create(document: NewKnowledgeDocument): Promise<Result<KnowledgeDocument, RepositoryError>>;
  findById(id: string): Promise<Result<KnowledgeDocument | null, RepositoryError>>;
  findMany(filters?: KnowledgeDocumentFilters): Promise<Result<KnowledgeDocument[], RepositoryError>>;
  update(
    id: string,
    patch: KnowledgeDocumentPatch
  ): Promise<Result<KnowledgeDocument, RepositoryError>>;
  deactivate(id: string): Promise<Result<KnowledgeDocument, RepositoryError>>;
  countByCategory(): Promise<Result<Record<string, number>, RepositoryError>>;
}

export interface Repositories {
  emails: IEmailRepository;
  responses: IResponseRepository;
  documents: IKnowledgeDocumentRepository;
}

export interface IUnitOfWork {
  /**
   * Run `work` against transaction-scoped repositories. An `err` result or a
   * thrown error rolls back every write made inside `work`.
   */
  run<T, E>(
    work: (repos: Repositories) => Promise<Result<T, E>>
  ): Promise<Result<T, E | RepositoryError>>;
}
