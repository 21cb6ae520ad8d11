import type { Result } from '@mailpilot/utils';
import type {
  Email,
  EmailFilters,
  EmailPriority,
  EmailResponse,
  EmailStatus,
  KnowledgeDocument,
  KnowledgeDocumentFilters,
  RepositoryError,
} from '@mailpilot/database';
import type { KnowledgeBaseStats, RelevantChunk } from '../types/knowledge.js';
import type { DispatchDecision, DispatchError } from './dispatcher.js';
import type { IngestionSweepSummary } from './orchestrator.js';
import type { PipelineError, PipelineOutcome } from './pipeline.js';

export const InboxErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_INPUT: 'INVALID_INPUT',
  SWEEP_IN_PROGRESS: 'SWEEP_IN_PROGRESS',
  KNOWLEDGE_FAILED: 'KNOWLEDGE_FAILED',
} as const;
export type InboxErrorCode = (typeof InboxErrorCode)[keyof typeof InboxErrorCode];

export interface InboxError {
  code: InboxErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type InboxFailure = InboxError | RepositoryError | PipelineError | DispatchError;

export interface EmailWithResponses {
  email: Email;
  responses: EmailResponse[];
}

export interface NewDocumentInput {
  title: string;
  content: string;
  category?: string;
  tags?: string[];
}

export type DocumentUpdate = Partial<NewDocumentInput>;

export interface InboxStatistics {
  emailsByStatus: Record<EmailStatus, number>;
  emailsByPriority: Record<EmailPriority, number>;
  receivedLast7Days: number;
  responses: { total: number; sent: number; averageConfidence: number };
  documentsByCategory: Record<string, number>;
  knowledgeBase: KnowledgeBaseStats;
}

/**
 * Query and manual-action surface over the pipeline, for an outer API layer.
 */
export interface IInboxService {
  listEmails(filters?: EmailFilters): Promise<Result<Email[], InboxFailure>>;
  getEmail(id: string): Promise<Result<EmailWithResponses, InboxFailure>>;
  updatePriority(id: string, priority: EmailPriority): Promise<Result<Email, InboxFailure>>;
  triggerSweep(): Promise<Result<IngestionSweepSummary, InboxFailure>>;
  regenerateResponse(emailId: string): Promise<Result<PipelineOutcome, InboxFailure>>;
  sendResponse(emailId: string, responseId: string): Promise<Result<DispatchDecision, InboxFailure>>;
  saveDraft(emailId: string, responseId: string): Promise<Result<string, InboxFailure>>;

  createDocument(input: NewDocumentInput): Promise<Result<KnowledgeDocument, InboxFailure>>;
  listDocuments(filters?: KnowledgeDocumentFilters): Promise<Result<KnowledgeDocument[], InboxFailure>>;
  getDocument(id: string): Promise<Result<KnowledgeDocument, InboxFailure>>;
  updateDocument(id: string, update: DocumentUpdate): Promise<Result<KnowledgeDocument, InboxFailure>>;
  deleteDocument(id: string): Promise<Result<KnowledgeDocument, InboxFailure>>;
  searchKnowledge(query: string, topK?: number): Promise<Result<RelevantChunk[], InboxFailure>>;

  getStatistics(): Promise<Result<InboxStatistics, InboxFailure>>;
}
