// Database connection
export { getDb, closeDb, sql, type Database, type DatabaseExecutor } from './db.js';

// Errors
export {
  RepositoryErrorCode,
  isUniqueViolation,
  toRepositoryError,
  type RepositoryError,
} from './errors.js';

// Schema exports
export * from './schema/index.js';

// Repository exports
export * from './repositories/index.js';
