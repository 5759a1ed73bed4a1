import { Logger } from '../../../shared/utils/logger.js';
import { InvalidScoreError, PersistenceError } from '../errors.js';
import type {
  Category,
  PutResult,
  RemoveResult,
  ScoreDocument,
  ScoreSnapshot,
  UserId,
} from '../types.js';

const logger = new Logger('Benchmark:Store');

type ScoreTable = Map<Category, Map<UserId, number>>;

/**
 * Durable home of the score document.
 * StoredValue<ScoreDocument> from the module's storage satisfies this.
 */
export interface ScorePersistence {
  get(): Promise<ScoreDocument>;
  set(document: ScoreDocument): Promise<void>;
}

function fromDocument(document: ScoreDocument): ScoreTable {
  const table: ScoreTable = new Map();
  for (const [category, users] of Object.entries(document)) {
    table.set(category, new Map(Object.entries(users)));
  }
  return table;
}

function toDocument(table: ScoreSnapshot): ScoreDocument {
  // fromEntries defines own keys, so "__proto__" is stored like any other name
  return Object.fromEntries(
    Array.from(table, ([category, users]) => [category, Object.fromEntries(users)] as const)
  );
}

/**
 * Best score per (category, user), mirrored to durable storage.
 *
 * Mutations run one at a time. Each builds the next table without touching
 * the committed one, writes it, and only then swaps it in, so a failed write
 * changes nothing and readers only ever see acknowledged state.
 */
export class ScoreStore {
  private committed: ScoreTable;
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly persistence: ScorePersistence,
    initial: ScoreTable
  ) {
    this.committed = initial;
  }

  /**
   * Load the persisted document and build a store over it
   */
  static async load(persistence: ScorePersistence): Promise<ScoreStore> {
    const document = await persistence.get();
    const store = new ScoreStore(persistence, fromDocument(document));
    logger.debug(`Loaded ${store.committed.size} categor${store.committed.size === 1 ? 'y' : 'ies'}`);
    return store;
  }

  // ==================== Reads ====================

  get(category: Category, userId: UserId): number | null {
    return this.committed.get(category)?.get(userId) ?? null;
  }

  has(category: Category): boolean {
    return this.committed.has(category);
  }

  /**
   * Category names in insertion order
   */
  categories(): Category[] {
    return Array.from(this.committed.keys());
  }

  /**
   * The committed table. It is replaced, never edited, by later mutations.
   */
  snapshot(): ScoreSnapshot {
    return this.committed;
  }

  // ==================== Mutations ====================

  /**
   * Record a score if it beats the user's previous best in the category
   */
  async put(category: Category, userId: UserId, score: number): Promise<PutResult> {
    if (!Number.isFinite(score)) {
      throw new InvalidScoreError(score);
    }

    return this.exclusive<PutResult>(async () => {
      const previous = this.get(category, userId);
      if (previous !== null && score <= previous) {
        return { status: 'rejected', previous, score };
      }

      const next = new Map(this.committed);
      const users = new Map<UserId, number>(next.get(category));
      users.set(userId, score);
      next.set(category, users);

      await this.commit(`score ${category}/${userId}`, next);
      logger.debug(`Set ${category}/${userId} = ${score} (previous: ${previous ?? 'none'})`);

      return { status: 'accepted', previous, score };
    });
  }

  /**
   * Remove one user's score. The category stays, even when left empty.
   */
  async delete(category: Category, userId: UserId): Promise<RemoveResult> {
    return this.exclusive<RemoveResult>(async () => {
      const current = this.committed.get(category);
      if (!current?.has(userId)) {
        return 'not_found';
      }

      const users = new Map(current);
      users.delete(userId);
      const next = new Map(this.committed);
      next.set(category, users);

      await this.commit(`delete ${category}/${userId}`, next);
      logger.debug(`Deleted ${category}/${userId}`);
      return 'removed';
    });
  }

  async deleteCategory(category: Category): Promise<RemoveResult> {
    return this.exclusive<RemoveResult>(async () => {
      if (!this.committed.has(category)) {
        return 'not_found';
      }

      const next = new Map(this.committed);
      next.delete(category);

      await this.commit(`delete ${category}`, next);
      logger.debug(`Deleted category ${category}`);
      return 'removed';
    });
  }

  private async commit(operation: string, next: ScoreTable): Promise<void> {
    try {
      await this.persistence.set(toDocument(next));
    } catch (error) {
      logger.error(`Write failed for ${operation}; keeping previous state`, error);
      throw new PersistenceError(operation, error);
    }
    this.committed = next;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes the failure through `run`; the queue moves on.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
