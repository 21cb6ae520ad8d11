import { randomUUID } from 'node:crypto';
import { ok, err, type Result, createLogger } from '@mailpilot/utils';
import type {
  Email,
  EmailFilters,
  EmailPriority,
  KnowledgeDocument,
  KnowledgeDocumentFilters,
  Repositories,
} from '@mailpilot/database';
import type { KnowledgeBase } from '../../knowledge/knowledge-base.js';
import type { RelevantChunk } from '../../types/knowledge.js';
import type { IDispatcherService, DispatchDecision } from '../dispatcher.js';
import type { IOrchestratorService, IngestionSweepSummary } from '../orchestrator.js';
import type { IPipelineService, PipelineOutcome } from '../pipeline.js';
import {
  InboxErrorCode,
  type DocumentUpdate,
  type EmailWithResponses,
  type IInboxService,
  type InboxFailure,
  type InboxStatistics,
  type NewDocumentInput,
} from '../inbox.js';

const logger = createLogger({ service: 'inbox' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface InboxDependencies {
  repos: Repositories;
  pipeline: IPipelineService;
  dispatcher: IDispatcherService;
  orchestrator: IOrchestratorService;
  knowledgeBase: KnowledgeBase;
  now?: () => Date;
}

const notFound = (entity: string, id: string): InboxFailure => ({
  code: InboxErrorCode.NOT_FOUND,
  message: `${entity} not found: ${id}`,
  details: { id },
});

export class InboxService implements IInboxService {
  private readonly now: () => Date;

  constructor(private readonly deps: InboxDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async listEmails(filters: EmailFilters = {}): Promise<Result<Email[], InboxFailure>> {
    return this.deps.repos.emails.findMany(filters);
  }

  async getEmail(id: string): Promise<Result<EmailWithResponses, InboxFailure>> {
    const email = await this.deps.repos.emails.findById(id);
    if (!email.ok) {
      return email;
    }
    if (!email.value) {
      return err(notFound('Email', id));
    }

    const responses = await this.deps.repos.responses.findByEmailId(id);
    if (!responses.ok) {
      return responses;
    }
    return ok({ email: email.value, responses: responses.value });
  }

  async updatePriority(id: string, priority: EmailPriority): Promise<Result<Email, InboxFailure>> {
    return this.deps.repos.emails.updatePriority(id, priority);
  }

  async triggerSweep(): Promise<Result<IngestionSweepSummary, InboxFailure>> {
    const summary = await this.deps.orchestrator.runIngestionSweep();
    if (summary.overlapped) {
      return err({
        code: InboxErrorCode.SWEEP_IN_PROGRESS,
        message: 'An ingestion sweep is already running',
      });
    }
    return ok(summary);
  }

  async regenerateResponse(emailId: string): Promise<Result<PipelineOutcome, InboxFailure>> {
    return this.deps.pipeline.regenerate(emailId);
  }

  async sendResponse(
    emailId: string,
    responseId: string
  ): Promise<Result<DispatchDecision, InboxFailure>> {
    const owned = await this.checkOwnership(emailId, responseId);
    if (!owned.ok) {
      return owned;
    }
    return this.deps.dispatcher.dispatchManually(responseId);
  }

  async saveDraft(emailId: string, responseId: string): Promise<Result<string, InboxFailure>> {
    const owned = await this.checkOwnership(emailId, responseId);
    if (!owned.ok) {
      return owned;
    }
    return this.deps.dispatcher.saveDraft(responseId);
  }

  /**
   * Index the document first, then record it. If the record cannot be
   * written the freshly indexed chunks are hidden again.
   */
  async createDocument(input: NewDocumentInput): Promise<Result<KnowledgeDocument, InboxFailure>> {
    const documentId = randomUUID();
    const category = input.category ?? 'general';
    const tags = input.tags ?? [];

    const indexed = await this.deps.knowledgeBase.addDocument({
      documentId,
      title: input.title,
      content: input.content,
      category,
      tags,
    });
    if (!indexed.ok) {
      return err({
        code: InboxErrorCode.KNOWLEDGE_FAILED,
        message: indexed.error.message,
        details: { knowledgeCode: indexed.error.code },
      });
    }

    const created = await this.deps.repos.documents.create({
      id: documentId,
      title: input.title,
      content: input.content,
      category,
      tags,
      chunkCount: indexed.value.chunkCount,
    });
    if (!created.ok) {
      const hidden = await this.deps.knowledgeBase.deactivateDocumentById(documentId);
      if (!hidden.ok) {
        logger.error({ documentId, error: hidden.error.message }, 'Orphaned chunks left active');
      }
      return created;
    }

    logger.info({ documentId, chunkCount: indexed.value.chunkCount }, 'Knowledge document created');
    return ok(created.value);
  }

  async listDocuments(
    filters: KnowledgeDocumentFilters = {}
  ): Promise<Result<KnowledgeDocument[], InboxFailure>> {
    return this.deps.repos.documents.findMany(filters);
  }

  async getDocument(id: string): Promise<Result<KnowledgeDocument, InboxFailure>> {
    const document = await this.deps.repos.documents.findById(id);
    if (!document.ok) {
      return document;
    }
    return document.value ? ok(document.value) : err(notFound('Document', id));
  }

  /**
   * Apply the change to the record and re-index the document's chunks.
   */
  async updateDocument(
    id: string,
    update: DocumentUpdate
  ): Promise<Result<KnowledgeDocument, InboxFailure>> {
    const current = await this.getDocument(id);
    if (!current.ok) {
      return current;
    }
    if (!current.value.isActive) {
      return err({
        code: InboxErrorCode.INVALID_INPUT,
        message: `Document ${id} is deleted`,
        details: { id },
      });
    }

    const next = {
      title: update.title ?? current.value.title,
      content: update.content ?? current.value.content,
      category: update.category ?? current.value.category,
      tags: update.tags ?? current.value.tags,
    };

    const reindexed = await this.deps.knowledgeBase.replaceDocument(id, next);
    if (!reindexed.ok) {
      return err({
        code: InboxErrorCode.KNOWLEDGE_FAILED,
        message: reindexed.error.message,
        details: { knowledgeCode: reindexed.error.code },
      });
    }

    return this.deps.repos.documents.update(id, { ...next, chunkCount: reindexed.value.chunkCount });
  }

  // Soft delete: the record is flagged inactive and its chunks leave search results
  async deleteDocument(id: string): Promise<Result<KnowledgeDocument, InboxFailure>> {
    const deactivated = await this.deps.repos.documents.deactivate(id);
    if (!deactivated.ok) {
      return deactivated;
    }

    const hidden = await this.deps.knowledgeBase.deactivateDocumentById(id);
    if (!hidden.ok) {
      return err({
        code: InboxErrorCode.KNOWLEDGE_FAILED,
        message: hidden.error.message,
        details: { knowledgeCode: hidden.error.code },
      });
    }
    return ok(deactivated.value);
  }

  async searchKnowledge(query: string, topK = 5): Promise<Result<RelevantChunk[], InboxFailure>> {
    if (!Number.isInteger(topK) || topK <= 0) {
      return err({
        code: InboxErrorCode.INVALID_INPUT,
        message: `topK must be a positive integer, got ${topK}`,
      });
    }
    return ok(await this.deps.knowledgeBase.searchRelevant(query, topK));
  }

  async getStatistics(): Promise<Result<InboxStatistics, InboxFailure>> {
    const weekAgo = new Date(this.now().getTime() - 7 * DAY_MS);
    const { emails, responses, documents } = this.deps.repos;

    const [byStatus, byPriority, recent, responseStats, byCategory] = await Promise.all([
      emails.countByStatus(),
      emails.countByPriority(),
      emails.countReceivedSince(weekAgo),
      responses.stats(),
      documents.countByCategory(),
    ]);

    if (!byStatus.ok) return byStatus;
    if (!byPriority.ok) return byPriority;
    if (!recent.ok) return recent;
    if (!responseStats.ok) return responseStats;
    if (!byCategory.ok) return byCategory;

    return ok({
      emailsByStatus: byStatus.value,
      emailsByPriority: byPriority.value,
      receivedLast7Days: recent.value,
      responses: responseStats.value,
      documentsByCategory: byCategory.value,
      knowledgeBase: this.deps.knowledgeBase.getStats(),
    });
  }

  private async checkOwnership(emailId: string, responseId: string): Promise<Result<void, InboxFailure>> {
    const response = await this.deps.repos.responses.findById(responseId);
    if (!response.ok) {
      return response;
    }
    if (!response.value || response.value.emailId !== emailId) {
      return err(notFound('Response', responseId));
    }
    return ok(undefined);
  }
}

export function createInboxService(deps: InboxDependencies): InboxService {
  return new InboxService(deps);
}
