import { eq, and, desc, sql } from 'drizzle-orm';
import { ok, err, type Result } from '@mailpilot/utils';
import { getDb, type DatabaseExecutor } from '../db.js';
import { emailResponses, type EmailResponse, type NewEmailResponse } from '../schema/responses.js';
import {
  RepositoryErrorCode,
  notFound,
  toRepositoryError,
  type RepositoryError,
} from '../errors.js';
import type { IResponseRepository } from './interfaces.js';

export interface ResponseStats {
  total: number;
  sent: number;
  averageConfidence: number;
}

export class ResponseRepository implements IResponseRepository {
  constructor(private readonly db: DatabaseExecutor = getDb()) {}

  async create(response: NewEmailResponse): Promise<Result<EmailResponse, RepositoryError>> {
    try {
      const [created] = await this.db.insert(emailResponses).values(response).returning();
      if (!created) {
        return err({ code: RepositoryErrorCode.QUERY_FAILED, message: 'Failed to create response' });
      }
      return ok(created);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findById(id: string): Promise<Result<EmailResponse | null, RepositoryError>> {
    try {
      const [response] = await this.db
        .select()
        .from(emailResponses)
        .where(eq(emailResponses.id, id))
        .limit(1);
      return ok(response ?? null);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  // Newest first
  async findByEmailId(emailId: string): Promise<Result<EmailResponse[], RepositoryError>> {
    try {
      const rows = await this.db
        .select()
        .from(emailResponses)
        .where(eq(emailResponses.emailId, emailId))
        .orderBy(desc(emailResponses.generatedAt), desc(emailResponses.id));
      return ok(rows);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findSentByEmailId(emailId: string): Promise<Result<EmailResponse | null, RepositoryError>> {
    try {
      const [response] = await this.db
        .select()
        .from(emailResponses)
        .where(and(eq(emailResponses.emailId, emailId), eq(emailResponses.isSent, true)))
        .orderBy(desc(emailResponses.sentAt))
        .limit(1);
      return ok(response ?? null);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  /**
   * Flip is_sent once. A response that is already sent is reported as
   * CONFLICT and left untouched.
   */
  async markSent(
    id: string,
    sentAt: Date,
    sentMessageId?: string
  ): Promise<Result<EmailResponse, RepositoryError>> {
    try {
      const [updated] = await this.db
        .update(emailResponses)
        .set({ isSent: true, sentAt, sentMessageId: sentMessageId ?? null })
        .where(and(eq(emailResponses.id, id), eq(emailResponses.isSent, false)))
        .returning();

      if (updated) {
        return ok(updated);
      }

      const existing = await this.findById(id);
      if (!existing.ok) {
        return existing;
      }
      if (!existing.value) {
        return err(notFound('Response', id));
      }
      return err({
        code: RepositoryErrorCode.CONFLICT,
        message: `Response ${id} was already sent`,
        details: { id, sentAt: existing.value.sentAt },
      });
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async setDraftId(id: string, draftId: string): Promise<Result<EmailResponse, RepositoryError>> {
    try {
      const [updated] = await this.db
        .update(emailResponses)
        .set({ draftId })
        .where(eq(emailResponses.id, id))
        .returning();

      if (!updated) {
        return err(notFound('Response', id));
      }
      return ok(updated);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async stats(): Promise<Result<ResponseStats, RepositoryError>> {
    try {
      const [row] = await this.db
        .select({
          total: sql<number>`count(*)::int`.mapWith(Number),
          sent: sql<number>`count(*) filter (where ${emailResponses.isSent})::int`.mapWith(Number),
          averageConfidence: sql<number>`coalesce(avg(${emailResponses.confidenceScore}), 0)::float8`.mapWith(
            Number
          ),
        })
        .from(emailResponses);

      return ok({
        total: row?.total ?? 0,
        sent: row?.sent ?? 0,
        averageConfidence: row?.averageConfidence ?? 0,
      });
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }
}
