import { eq, and, desc, sql, inArray, notInArray, lt, gte, ilike } from 'drizzle-orm';
import { ok, err, type Result } from '@mailpilot/utils';
import { getDb, type DatabaseExecutor } from '../db.js';
import {
  emails,
  emailStatusValues,
  emailPriorityValues,
  type Email,
  type NewEmail,
  type EmailStatus,
  type EmailPriority,
} from '../schema/emails.js';
import {
  RepositoryErrorCode,
  notFound,
  toRepositoryError,
  type RepositoryError,
} from '../errors.js';
import type { IEmailRepository } from './interfaces.js';

export interface EmailFilters {
  status?: EmailStatus | EmailStatus[];
  priority?: EmailPriority | EmailPriority[];
  // Case-insensitive substring of the sender address
  sender?: string;
  receivedAfter?: Date;
  limit?: number;
  offset?: number;
}

// Fields a status transition may set alongside the new status
export type EmailStatePatch = Partial<
  Pick<
    NewEmail,
    | 'priority'
    | 'category'
    | 'requiresResponse'
    | 'classificationConfidence'
    | 'failureReason'
    | 'processedAt'
  >
>;

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (c) => `\\${c}`);

export class EmailRepository implements IEmailRepository {
  constructor(private readonly db: DatabaseExecutor = getDb()) {}

  async create(email: NewEmail): Promise<Result<Email, RepositoryError>> {
    try {
      const [created] = await this.db.insert(emails).values(email).returning();
      if (!created) {
        return err({ code: RepositoryErrorCode.QUERY_FAILED, message: 'Failed to create email' });
      }
      return ok(created);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findById(id: string): Promise<Result<Email | null, RepositoryError>> {
    try {
      const [email] = await this.db.select().from(emails).where(eq(emails.id, id)).limit(1);
      return ok(email ?? null);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findByExternalId(externalId: string): Promise<Result<Email | null, RepositoryError>> {
    try {
      const [email] = await this.db
        .select()
        .from(emails)
        .where(eq(emails.externalId, externalId))
        .limit(1);
      return ok(email ?? null);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async exists(externalId: string): Promise<Result<boolean, RepositoryError>> {
    try {
      const [row] = await this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(emails)
        .where(eq(emails.externalId, externalId));
      return ok(row ? row.count > 0 : false);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findMany(filters: EmailFilters = {}): Promise<Result<Email[], RepositoryError>> {
    try {
      const conditions = [];

      if (filters.status) {
        if (Array.isArray(filters.status)) {
          conditions.push(inArray(emails.status, filters.status));
        } else {
          conditions.push(eq(emails.status, filters.status));
        }
      }

      if (filters.priority) {
        if (Array.isArray(filters.priority)) {
          conditions.push(inArray(emails.priority, filters.priority));
        } else {
          conditions.push(eq(emails.priority, filters.priority));
        }
      }

      if (filters.sender) {
        conditions.push(ilike(emails.sender, `%${escapeLike(filters.sender)}%`));
      }

      if (filters.receivedAfter) {
        conditions.push(gte(emails.receivedAt, filters.receivedAfter));
      }

      let query = this.db
        .select()
        .from(emails)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(emails.receivedAt), emails.id)
        .$dynamic();

      if (filters.limit) {
        query = query.limit(filters.limit);
      }

      if (filters.offset) {
        query = query.offset(filters.offset);
      }

      return ok(await query);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  /**
   * Conditional status update: only applies while the record is still in one
   * of the `from` states, so a concurrent transition surfaces as CONFLICT.
   */
  async transition(
    id: string,
    from: EmailStatus | readonly EmailStatus[],
    to: EmailStatus,
    patch: EmailStatePatch = {}
  ): Promise<Result<Email, RepositoryError>> {
    const expected: EmailStatus[] = typeof from === 'string' ? [from] : [...from];

    try {
      const [updated] = await this.db
        .update(emails)
        .set({ ...patch, status: to, updatedAt: new Date() })
        .where(and(eq(emails.id, id), inArray(emails.status, expected)))
        .returning();

      if (updated) {
        return ok(updated);
      }

      const [current] = await this.db
        .select({ status: emails.status })
        .from(emails)
        .where(eq(emails.id, id))
        .limit(1);

      if (!current) {
        return err(notFound('Email', id));
      }
      return err({
        code: RepositoryErrorCode.CONFLICT,
        message: `Email ${id} is ${current.status}, expected ${expected.join(' or ')}`,
        details: { id, expected, actual: current.status, to },
      });
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async markFailed(id: string, reason: string): Promise<Result<Email, RepositoryError>> {
    return this.transition(id, 'processing', 'failed', {
      failureReason: reason,
      processedAt: new Date(),
    });
  }

  async updatePriority(id: string, priority: EmailPriority): Promise<Result<Email, RepositoryError>> {
    try {
      const [updated] = await this.db
        .update(emails)
        .set({ priority, updatedAt: new Date() })
        .where(eq(emails.id, id))
        .returning();

      if (!updated) {
        return err(notFound('Email', id));
      }
      return ok(updated);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findRespondedSince(since: Date): Promise<Result<Email[], RepositoryError>> {
    try {
      const rows = await this.db
        .select()
        .from(emails)
        .where(and(eq(emails.status, 'responded'), gte(emails.processedAt, since)))
        .orderBy(emails.processedAt, emails.id);
      return ok(rows);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  /**
   * Delete records processed before `cutoff`, except those whose priority is
   * exempt. Records never processed are kept. Returns the deleted ids.
   */
  async deleteProcessedBefore(
    cutoff: Date,
    exemptPriorities: readonly EmailPriority[]
  ): Promise<Result<string[], RepositoryError>> {
    const conditions = [lt(emails.processedAt, cutoff)];
    if (exemptPriorities.length > 0) {
      conditions.push(notInArray(emails.priority, [...exemptPriorities]));
    }

    try {
      const deleted = await this.db
        .delete(emails)
        .where(and(...conditions))
        .returning({ id: emails.id });
      return ok(deleted.map((row) => row.id));
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async countByStatus(): Promise<Result<Record<EmailStatus, number>, RepositoryError>> {
    try {
      const rows = await this.db
        .select({
          status: emails.status,
          count: sql<number>`count(*)::int`.mapWith(Number),
        })
        .from(emails)
        .groupBy(emails.status);

      const counts: Record<EmailStatus, number> = {
        unread: 0,
        processing: 0,
        read: 0,
        responded: 0,
        failed: 0,
      };
      for (const row of rows) {
        counts[row.status] = row.count;
      }
      return ok(counts);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async countByPriority(): Promise<Result<Record<EmailPriority, number>, RepositoryError>> {
    try {
      const rows = await this.db
        .select({
          priority: emails.priority,
          count: sql<number>`count(*)::int`.mapWith(Number),
        })
        .from(emails)
        .groupBy(emails.priority);

      const counts: Record<EmailPriority, number> = { low: 0, medium: 0, high: 0, urgent: 0 };
      for (const row of rows) {
        counts[row.priority] = row.count;
      }
      return ok(counts);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async countReceivedSince(since: Date): Promise<Result<number, RepositoryError>> {
    try {
      const [row] = await this.db
        .select({ count: sql<number>`count(*)::int`.mapWith(Number) })
        .from(emails)
        .where(gte(emails.receivedAt, since));
      return ok(row?.count ?? 0);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }
}

export const isEmailStatus = (value: string): value is EmailStatus =>
  emailStatusValues.some((status) => status === value);

export const isEmailPriority = (value: string): value is EmailPriority =>
  emailPriorityValues.some((priority) => priority === value);
