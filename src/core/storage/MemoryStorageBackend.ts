import type { StorageBackend } from './ModuleStorage.js';

/**
 * In-process storage backend. Nothing survives a restart.
 */
export class MemoryStorageBackend implements StorageBackend {
  private values = new Map<string, string>();

  private entryKey(scope: string, key: string): string {
    return `${scope}:${key}`;
  }

  async read(scope: string, key: string): Promise<string | null> {
    return this.values.get(this.entryKey(scope, key)) ?? null;
  }

  async write(scope: string, key: string, raw: string): Promise<void> {
    this.values.set(this.entryKey(scope, key), raw);
  }
}
