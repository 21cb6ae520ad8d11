import { ok, err, type Result } from '@mailpilot/utils';
import { getDb, type DatabaseExecutor } from '../db.js';
import { toRepositoryError, type RepositoryError } from '../errors.js';
import { EmailRepository } from './email-repository.js';
import { ResponseRepository } from './response-repository.js';
import { KnowledgeDocumentRepository } from './knowledge-document-repository.js';
import type { IUnitOfWork, Repositories } from './interfaces.js';

export function createRepositories(db: DatabaseExecutor = getDb()): Repositories {
  return {
    emails: new EmailRepository(db),
    responses: new ResponseRepository(db),
    documents: new KnowledgeDocumentRepository(db),
  };
}

// Thrown inside the transaction callback to make drizzle roll back
class RollbackSignal extends Error {
  constructor() {
    super('Unit of work rolled back');
    this.name = 'RollbackSignal';
  }
}

export class UnitOfWork implements IUnitOfWork {
  constructor(private readonly db: DatabaseExecutor = getDb()) {}

  async run<T, E>(
    work: (repos: Repositories) => Promise<Result<T, E>>
  ): Promise<Result<T, E | RepositoryError>> {
    const outcome: { failure: { error: E } | undefined } = { failure: undefined };

    try {
      const value = await this.db.transaction(async (tx) => {
        const result = await work(createRepositories(tx));
        if (!result.ok) {
          outcome.failure = { error: result.error };
          throw new RollbackSignal();
        }
        return result.value;
      });
      return ok(value);
    } catch (error) {
      if (error instanceof RollbackSignal && outcome.failure) {
        return err(outcome.failure.error);
      }
      return err(toRepositoryError(error));
    }
  }
}
