import { eq, and, desc, sql } from 'drizzle-orm';
import { ok, err, type Result } from '@mailpilot/utils';
import { getDb, type DatabaseExecutor } from '../db.js';
import {
  knowledgeDocuments,
  type KnowledgeDocument,
  type NewKnowledgeDocument,
} from '../schema/knowledge-documents.js';
import {
  RepositoryErrorCode,
  notFound,
  toRepositoryError,
  type RepositoryError,
} from '../errors.js';
import type { IKnowledgeDocumentRepository } from './interfaces.js';

export interface KnowledgeDocumentFilters {
  category?: string;
  activeOnly?: boolean;
  limit?: number;
  offset?: number;
}

export type KnowledgeDocumentPatch = Partial<
  Pick<NewKnowledgeDocument, 'title' | 'content' | 'category' | 'tags' | 'chunkCount'>
>;

export class KnowledgeDocumentRepository implements IKnowledgeDocumentRepository {
  constructor(private readonly db: DatabaseExecutor = getDb()) {}

  async create(
    document: NewKnowledgeDocument
  ): Promise<Result<KnowledgeDocument, RepositoryError>> {
    try {
      const [created] = await this.db.insert(knowledgeDocuments).values(document).returning();
      if (!created) {
        return err({ code: RepositoryErrorCode.QUERY_FAILED, message: 'Failed to create document' });
      }
      return ok(created);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findById(id: string): Promise<Result<KnowledgeDocument | null, RepositoryError>> {
    try {
      const [document] = await this.db
        .select()
        .from(knowledgeDocuments)
        .where(eq(knowledgeDocuments.id, id))
        .limit(1);
      return ok(document ?? null);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  async findMany(
    filters: KnowledgeDocumentFilters = {}
  ): Promise<Result<KnowledgeDocument[], RepositoryError>> {
    try {
      const conditions = [];
      if (filters.category) {
        conditions.push(eq(knowledgeDocuments.category, filters.category));
      }
      if (filters.activeOnly ?? true) {
        conditions.push(eq(knowledgeDocuments.isActive, true));
      }

      let query = this.db
        .select()
        .from(knowledgeDocuments)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(knowledgeDocuments.createdAt), knowledgeDocuments.id)
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

  async update(
    id: string,
    patch: KnowledgeDocumentPatch
  ): Promise<Result<KnowledgeDocument, RepositoryError>> {
    try {
      const [updated] = await this.db
        .update(knowledgeDocuments)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(knowledgeDocuments.id, id))
        .returning();

      if (!updated) {
        return err(notFound('Knowledge document', id));
      }
      return ok(updated);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  // Soft delete
  async deactivate(id: string): Promise<Result<KnowledgeDocument, RepositoryError>> {
    try {
      const [updated] = await this.db
        .update(knowledgeDocuments)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(knowledgeDocuments.id, id))
        .returning();

      if (!updated) {
        return err(notFound('Knowledge document', id));
      }
      return ok(updated);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }

  // Active documents only
  async countByCategory(): Promise<Result<Record<string, number>, RepositoryError>> {
    try {
      const rows = await this.db
        .select({
          category: knowledgeDocuments.category,
          count: sql<number>`count(*)::int`.mapWith(Number),
        })
        .from(knowledgeDocuments)
        .where(eq(knowledgeDocuments.isActive, true))
        .groupBy(knowledgeDocuments.category);

      const counts: Record<string, number> = {};
      for (const row of rows) {
        counts[row.category] = row.count;
      }
      return ok(counts);
    } catch (error) {
      return err(toRepositoryError(error));
    }
  }
}
