import { PersistenceError } from './errors.js';

/**
 * Run a store call, surfacing any backend failure as PersistenceError
 */
export async function withPersistence<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Failed to ${action}`, { cause: error });
  }
}
