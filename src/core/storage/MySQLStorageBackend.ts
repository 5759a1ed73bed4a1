import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService } from '../database/mysql.js';
import type { StorageBackend } from './ModuleStorage.js';

interface StorageRow extends RowDataPacket {
  value: string;
}

/**
 * Storage backend over the module_storage table
 */
export class MySQLStorageBackend implements StorageBackend {
  constructor(private readonly db: DatabaseService) {}

  async read(scope: string, key: string): Promise<string | null> {
    const rows = await this.db.query<StorageRow[]>(
      'SELECT value FROM module_storage WHERE module_id = ? AND storage_key = ?',
      [scope, key]
    );
    return rows[0]?.value ?? null;
  }

  async write(scope: string, key: string, raw: string): Promise<void> {
    await this.db.execute(
      `INSERT INTO module_storage (module_id, storage_key, value)
       VALUES (?, ?, ?)
       ON DUPLICATE KEY UPDATE value = VALUES(value)`,
      [scope, key, raw]
    );
  }
}
