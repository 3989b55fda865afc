import type { DbExecutor } from '../core/execution/db-executor.js';

/**
 * Executes a function within a database transaction
 * @param executor - Executor holding the connection the transaction runs on
 * @param action - Work to run between begin and commit
 * @param onRollbackError - Receives a rollback failure; the original error is still the one thrown
 * @returns The value produced by `action`
 * @throws Re-throws any error from `action` or commit, after rolling back
 */
export const runInTransaction = async <T>(
  executor: DbExecutor,
  action: () => Promise<T>,
  onRollbackError: (error: unknown) => void
): Promise<T> => {
  await executor.beginTransaction();
  try {
    const result = await action();
    await executor.commitTransaction();
    return result;
  } catch (error) {
    try {
      await executor.rollbackTransaction();
    } catch (rollbackError) {
      onRollbackError(rollbackError);
    }
    throw error;
  }
};
