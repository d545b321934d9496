import Database from 'better-sqlite3';
import { AppError, PersistenceFailureError } from '../types/errors.js';

/**
 * Run `work` inside `BEGIN IMMEDIATE ... COMMIT`. Any throw rolls the whole
 * transaction back. Domain errors propagate unchanged; SQLite failures are
 * reported as a generic persistence failure.
 */
export function runInTransaction<T>(db: Database.Database, work: () => T): T {
  try {
    return db.transaction(work).immediate();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    if (error instanceof Database.SqliteError) {
      throw new PersistenceFailureError(error);
    }
    throw error;
  }
}
