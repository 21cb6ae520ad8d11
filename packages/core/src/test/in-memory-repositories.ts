import { randomUUID } from 'node:crypto';
import { ok, err, type Result } from '@mailpilot/utils';
import {
  RepositoryErrorCode,
  type Email,
  type EmailFilters,
  type EmailPriority,
  type EmailResponse,
  type EmailStatePatch,
  type EmailStatus,
  type IEmailRepository,
  type IKnowledgeDocumentRepository,
  type IResponseRepository,
  type IUnitOfWork,
  type KnowledgeDocument,
  type KnowledgeDocumentFilters,
  type KnowledgeDocumentPatch,
  type NewEmail,
  type NewEmailResponse,
  type NewKnowledgeDocument,
  type Repositories,
  type RepositoryError,
  type ResponseStats,
} from '@mailpilot/database';

// Rows shared by the in-memory repositories
export class InMemoryTables {
  emails = new Map<string, Email>();
  responses = new Map<string, EmailResponse>();
  documents = new Map<string, KnowledgeDocument>();

  snapshot(): InMemoryTables {
    const copy = new InMemoryTables();
    copy.emails = new Map([...this.emails].map(([id, row]) => [id, { ...row }]));
    copy.responses = new Map([...this.responses].map(([id, row]) => [id, { ...row }]));
    copy.documents = new Map([...this.documents].map(([id, row]) => [id, { ...row }]));
    return copy;
  }

  restore(from: InMemoryTables): void {
    this.emails = from.emails;
    this.responses = from.responses;
    this.documents = from.documents;
  }
}

const notFound = (entity: string, id: string): RepositoryError => ({
  code: RepositoryErrorCode.NOT_FOUND,
  message: `${entity} not found: ${id}`,
  details: { id },
});

export class InMemoryEmailRepository implements IEmailRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async create(email: NewEmail): Promise<Result<Email, RepositoryError>> {
    if ([...this.tables.emails.values()].some((row) => row.externalId === email.externalId)) {
      return err({
        code: RepositoryErrorCode.DUPLICATE,
        message: `duplicate key value violates unique constraint "emails_external_id_unique"`,
      });
    }
    const now = new Date();
    const row: Email = {
      id: email.id ?? randomUUID(),
      externalId: email.externalId,
      threadId: email.threadId ?? null,
      subject: email.subject,
      sender: email.sender,
      recipient: email.recipient,
      body: email.body ?? '',
      receivedAt: email.receivedAt,
      labels: email.labels ?? [],
      status: email.status ?? 'unread',
      priority: email.priority ?? 'medium',
      category: email.category ?? null,
      requiresResponse: email.requiresResponse ?? false,
      classificationConfidence: email.classificationConfidence ?? null,
      failureReason: email.failureReason ?? null,
      createdAt: email.createdAt ?? now,
      updatedAt: email.updatedAt ?? now,
      processedAt: email.processedAt ?? null,
    };
    this.tables.emails.set(row.id, row);
    return ok({ ...row });
  }

  async findById(id: string): Promise<Result<Email | null, RepositoryError>> {
    const row = this.tables.emails.get(id);
    return ok(row ? { ...row } : null);
  }

  async findByExternalId(externalId: string): Promise<Result<Email | null, RepositoryError>> {
    const row = [...this.tables.emails.values()].find((email) => email.externalId === externalId);
    return ok(row ? { ...row } : null);
  }

  async exists(externalId: string): Promise<Result<boolean, RepositoryError>> {
    return ok([...this.tables.emails.values()].some((email) => email.externalId === externalId));
  }

  async findMany(filters: EmailFilters = {}): Promise<Result<Email[], RepositoryError>> {
    const statuses = filters.status === undefined ? undefined : [filters.status].flat();
    const priorities = filters.priority === undefined ? undefined : [filters.priority].flat();
    const sender = filters.sender?.toLowerCase();

    const rows = [...this.tables.emails.values()]
      .filter((email) => !statuses || statuses.includes(email.status))
      .filter((email) => !priorities || priorities.includes(email.priority))
      .filter((email) => !sender || email.sender.toLowerCase().includes(sender))
      .filter((email) => !filters.receivedAfter || email.receivedAt >= filters.receivedAfter)
      .sort(
        (a, b) => b.receivedAt.getTime() - a.receivedAt.getTime() || a.id.localeCompare(b.id)
      );

    const offset = filters.offset ?? 0;
    const limited = filters.limit ? rows.slice(offset, offset + filters.limit) : rows.slice(offset);
    return ok(limited.map((row) => ({ ...row })));
  }

  async transition(
    id: string,
    from: EmailStatus | readonly EmailStatus[],
    to: EmailStatus,
    patch: EmailStatePatch = {}
  ): Promise<Result<Email, RepositoryError>> {
    const expected: EmailStatus[] = typeof from === 'string' ? [from] : [...from];
    const row = this.tables.emails.get(id);
    if (!row) {
      return err(notFound('Email', id));
    }
    if (!expected.includes(row.status)) {
      return err({
        code: RepositoryErrorCode.CONFLICT,
        message: `Email ${id} is ${row.status}, expected ${expected.join(' or ')}`,
        details: { id, expected, actual: row.status, to },
      });
    }
    const updated: Email = { ...row, ...patch, status: to, updatedAt: new Date() };
    this.tables.emails.set(id, updated);
    return ok({ ...updated });
  }

  async markFailed(id: string, reason: string): Promise<Result<Email, RepositoryError>> {
    return this.transition(id, 'processing', 'failed', {
      failureReason: reason,
      processedAt: new Date(),
    });
  }

  async updatePriority(id: string, priority: EmailPriority): Promise<Result<Email, RepositoryError>> {
    const row = this.tables.emails.get(id);
    if (!row) {
      return err(notFound('Email', id));
    }
    const updated: Email = { ...row, priority, updatedAt: new Date() };
    this.tables.emails.set(id, updated);
    return ok({ ...updated });
  }

  async findRespondedSince(since: Date): Promise<Result<Email[], RepositoryError>> {
    return ok(
      [...this.tables.emails.values()]
        .filter((email) => email.status === 'responded' && email.processedAt && email.processedAt >= since)
        .sort((a, b) => (a.processedAt?.getTime() ?? 0) - (b.processedAt?.getTime() ?? 0))
        .map((row) => ({ ...row }))
    );
  }

  async deleteProcessedBefore(
    cutoff: Date,
    exemptPriorities: readonly EmailPriority[]
  ): Promise<Result<string[], RepositoryError>> {
    const deleted: string[] = [];
    for (const email of [...this.tables.emails.values()]) {
      if (email.processedAt && email.processedAt < cutoff && !exemptPriorities.includes(email.priority)) {
        this.tables.emails.delete(email.id);
        deleted.push(email.id);
      }
    }
    // ON DELETE CASCADE
    for (const response of [...this.tables.responses.values()]) {
      if (deleted.includes(response.emailId)) {
        this.tables.responses.delete(response.id);
      }
    }
    return ok(deleted);
  }

  async countByStatus(): Promise<Result<Record<EmailStatus, number>, RepositoryError>> {
    const counts: Record<EmailStatus, number> = {
      unread: 0,
      processing: 0,
      read: 0,
      responded: 0,
      failed: 0,
    };
    for (const email of this.tables.emails.values()) {
      counts[email.status]++;
    }
    return ok(counts);
  }

  async countByPriority(): Promise<Result<Record<EmailPriority, number>, RepositoryError>> {
    const counts: Record<EmailPriority, number> = { low: 0, medium: 0, high: 0, urgent: 0 };
    for (const email of this.tables.emails.values()) {
      counts[email.priority]++;
    }
    return ok(counts);
  }

  async countReceivedSince(since: Date): Promise<Result<number, RepositoryError>> {
    return ok([...this.tables.emails.values()].filter((email) => email.receivedAt >= since).length);
  }
}

export class InMemoryResponseRepository implements IResponseRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async create(response: NewEmailResponse): Promise<Result<EmailResponse, RepositoryError>> {
    if (!this.tables.emails.has(response.emailId)) {
      return err({
        code: RepositoryErrorCode.QUERY_FAILED,
        message: 'insert violates foreign key constraint "email_responses_email_id_emails_id_fk"',
      });
    }
    if (response.confidenceScore < 0 || response.confidenceScore > 1) {
      return err({
        code: RepositoryErrorCode.QUERY_FAILED,
        message: 'new row violates check constraint "valid_confidence"',
      });
    }
    const row: EmailResponse = {
      id: response.id ?? randomUUID(),
      emailId: response.emailId,
      responseText: response.responseText,
      confidenceScore: response.confidenceScore,
      modelUsed: response.modelUsed,
      responseType: response.responseType ?? null,
      suggestedActions: response.suggestedActions ?? [],
      generatedAt: response.generatedAt ?? new Date(),
      isSent: response.isSent ?? false,
      sentAt: response.sentAt ?? null,
      sentMessageId: response.sentMessageId ?? null,
      draftId: response.draftId ?? null,
    };
    this.tables.responses.set(row.id, row);
    return ok({ ...row });
  }

  async findById(id: string): Promise<Result<EmailResponse | null, RepositoryError>> {
    const row = this.tables.responses.get(id);
    return ok(row ? { ...row } : null);
  }

  async findByEmailId(emailId: string): Promise<Result<EmailResponse[], RepositoryError>> {
    return ok(
      [...this.tables.responses.values()]
        .filter((response) => response.emailId === emailId)
        .sort((a, b) => b.generatedAt.getTime() - a.generatedAt.getTime())
        .map((row) => ({ ...row }))
    );
  }

  async findSentByEmailId(emailId: string): Promise<Result<EmailResponse | null, RepositoryError>> {
    const row = [...this.tables.responses.values()].find(
      (response) => response.emailId === emailId && response.isSent
    );
    return ok(row ? { ...row } : null);
  }

  async markSent(
    id: string,
    sentAt: Date,
    sentMessageId?: string
  ): Promise<Result<EmailResponse, RepositoryError>> {
    const row = this.tables.responses.get(id);
    if (!row) {
      return err(notFound('Response', id));
    }
    if (row.isSent) {
      return err({
        code: RepositoryErrorCode.CONFLICT,
        message: `Response ${id} was already sent`,
        details: { id, sentAt: row.sentAt },
      });
    }
    const updated: EmailResponse = { ...row, isSent: true, sentAt, sentMessageId: sentMessageId ?? null };
    this.tables.responses.set(id, updated);
    return ok({ ...updated });
  }

  async setDraftId(id: string, draftId: string): Promise<Result<EmailResponse, RepositoryError>> {
    const row = this.tables.responses.get(id);
    if (!row) {
      return err(notFound('Response', id));
    }
    const updated: EmailResponse = { ...row, draftId };
    this.tables.responses.set(id, updated);
    return ok({ ...updated });
  }

  async stats(): Promise<Result<ResponseStats, RepositoryError>> {
    const rows = [...this.tables.responses.values()];
    const total = rows.length;
    const sent = rows.filter((row) => row.isSent).length;
    const averageConfidence =
      total === 0 ? 0 : rows.reduce((sum, row) => sum + row.confidenceScore, 0) / total;
    return ok({ total, sent, averageConfidence });
  }
}

export class InMemoryKnowledgeDocumentRepository implements IKnowledgeDocumentRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async create(document: NewKnowledgeDocument): Promise<Result<KnowledgeDocument, RepositoryError>> {
    const now = new Date();
    const row: KnowledgeDocument = {
      id: document.id ?? randomUUID(),
      title: document.title,
      content: document.content,
      category: document.category ?? 'general',
      tags: document.tags ?? [],
      isActive: document.isActive ?? true,
      chunkCount: document.chunkCount ?? 0,
      createdAt: document.createdAt ?? now,
      updatedAt: document.updatedAt ?? now,
    };
    if (this.tables.documents.has(row.id)) {
      return err({ code: RepositoryErrorCode.DUPLICATE, message: `Document ${row.id} exists` });
    }
    this.tables.documents.set(row.id, row);
    return ok({ ...row });
  }

  async findById(id: string): Promise<Result<KnowledgeDocument | null, RepositoryError>> {
    const row = this.tables.documents.get(id);
    return ok(row ? { ...row } : null);
  }

  async findMany(
    filters: KnowledgeDocumentFilters = {}
  ): Promise<Result<KnowledgeDocument[], RepositoryError>> {
    const activeOnly = filters.activeOnly ?? true;
    const rows = [...this.tables.documents.values()]
      .filter((doc) => !activeOnly || doc.isActive)
      .filter((doc) => !filters.category || doc.category === filters.category)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    const offset = filters.offset ?? 0;
    const limited = filters.limit ? rows.slice(offset, offset + filters.limit) : rows.slice(offset);
    return ok(limited.map((row) => ({ ...row })));
  }

  async update(
    id: string,
    patch: KnowledgeDocumentPatch
  ): Promise<Result<KnowledgeDocument, RepositoryError>> {
    const row = this.tables.documents.get(id);
    if (!row) {
      return err(notFound('Document', id));
    }
    const updated: KnowledgeDocument = { ...row, ...patch, updatedAt: new Date() };
    this.tables.documents.set(id, updated);
    return ok({ ...updated });
  }

  async deactivate(id: string): Promise<Result<KnowledgeDocument, RepositoryError>> {
    const row = this.tables.documents.get(id);
    if (!row) {
      return err(notFound('Document', id));
    }
    const updated: KnowledgeDocument = { ...row, isActive: false, updatedAt: new Date() };
    this.tables.documents.set(id, updated);
    return ok({ ...updated });
  }

  async countByCategory(): Promise<Result<Record<string, number>, RepositoryError>> {
    const counts: Record<string, number> = {};
    for (const doc of this.tables.documents.values()) {
      if (doc.isActive) {
        counts[doc.category] = (counts[doc.category] ?? 0) + 1;
      }
    }
    return ok(counts);
  }
}

/**
 * Rolls back by restoring a snapshot of every table. Only suitable for tests
 * that do not run units of work concurrently.
 */
export class InMemoryUnitOfWork implements IUnitOfWork {
  constructor(
    private readonly tables: InMemoryTables,
    private readonly repos: Repositories
  ) {}

  async run<T, E>(
    work: (repos: Repositories) => Promise<Result<T, E>>
  ): Promise<Result<T, E | RepositoryError>> {
    const before = this.tables.snapshot();
    try {
      const result = await work(this.repos);
      if (!result.ok) {
        this.tables.restore(before);
      }
      return result;
    } catch (error) {
      this.tables.restore(before);
      return err({
        code: RepositoryErrorCode.QUERY_FAILED,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export interface InMemoryDatabase {
  tables: InMemoryTables;
  repos: {
    emails: InMemoryEmailRepository;
    responses: InMemoryResponseRepository;
    documents: InMemoryKnowledgeDocumentRepository;
  };
  unitOfWork: InMemoryUnitOfWork;
}

export function createInMemoryDatabase(): InMemoryDatabase {
  const tables = new InMemoryTables();
  const repos = {
    emails: new InMemoryEmailRepository(tables),
    responses: new InMemoryResponseRepository(tables),
    documents: new InMemoryKnowledgeDocumentRepository(tables),
  };
  return { tables, repos, unitOfWork: new InMemoryUnitOfWork(tables, repos) };
}
