import type { z } from 'zod';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('ModuleStorage');

/**
 * Raw key-value backend. Values are serialized JSON text.
 */
export interface StorageBackend {
  /** Read a raw value, or null when the key has never been written */
  read(scope: string, key: string): Promise<string | null>;

  /** Replace the raw value for a key */
  write(scope: string, key: string, raw: string): Promise<void>;
}

/**
 * Error thrown when a stored value cannot be parsed or fails its schema
 */
export class StorageValueError extends Error {
  constructor(
    public readonly scope: string,
    public readonly key: string,
    detail: string
  ) {
    super(`Stored value ${scope}.${key} is invalid: ${detail}`);
    this.name = 'StorageValueError';
  }
}

/**
 * A single typed value inside a module's storage scope.
 * Every get() reads the backend; every set() writes the whole value.
 */
export class StoredValue<T> {
  constructor(
    private readonly backend: StorageBackend,
    private readonly scope: string,
    private readonly key: string,
    private readonly schema: z.ZodType<T>,
    private readonly defaultValue: T
  ) {}

  async get(): Promise<T> {
    const raw = await this.backend.read(this.scope, this.key);
    if (raw === null) {
      return this.defaultValue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageValueError(
        this.scope,
        this.key,
        error instanceof Error ? error.message : String(error)
      );
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.errors
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StorageValueError(this.scope, this.key, issues);
    }

    return result.data;
  }

  async set(value: T): Promise<void> {
    await this.backend.write(this.scope, this.key, JSON.stringify(value));
    logger.debug(`Wrote ${this.scope}.${this.key}`);
  }
}

/**
 * Storage scope handed to a module through its context.
 *
 * Usage:
 * ```typescript
 * const scores = context.storage.value('leaderboards', documentSchema, {});
 * const current = await scores.get();
 * await scores.set({ ...current, cpu: {} });
 * ```
 */
export class ModuleStorage {
  constructor(
    private readonly backend: StorageBackend,
    readonly scope: string
  ) {}

  value<T>(key: string, schema: z.ZodType<T>, defaultValue: T): StoredValue<T> {
    return new StoredValue(this.backend, this.scope, key, schema, defaultValue);
  }
}
