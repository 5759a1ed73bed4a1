import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { createHash } from 'crypto';
import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService } from './mysql.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('MigrationRunner');

/**
 * Migration file information
 */
interface MigrationFile {
  filename: string;
  content: string;
  checksum: string;
}

interface ExecutedMigrationRow extends RowDataPacket {
  filename: string;
  checksum: string;
}

/**
 * Error thrown when a migration file fails to apply
 */
export class MigrationError extends Error {
  constructor(
    public readonly filename: string,
    public readonly cause: Error
  ) {
    super(`Migration "${filename}" failed: ${cause.message}`);
    this.name = 'MigrationError';
  }
}

const TRACKING_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    scope VARCHAR(64) NOT NULL,
    filename VARCHAR(255) NOT NULL,
    checksum CHAR(32) NOT NULL,
    success BOOLEAN NOT NULL,
    error_message TEXT NULL,
    executed_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (scope, filename)
  )`;

/**
 * Split SQL content into individual statements.
 * Semicolons inside quoted strings and comments do not terminate a statement.
 */
export function splitStatements(content: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inString = false;
  let stringChar = '';
  let inComment = false;
  let inBlockComment = false;

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    const nextChar = content.charAt(i + 1);

    if (inBlockComment) {
      current += char;
      if (char === '*' && nextChar === '/') {
        current += nextChar;
        i++;
        inBlockComment = false;
      }
      continue;
    }

    if (inComment) {
      current += char;
      if (char === '\n') {
        inComment = false;
      }
      continue;
    }

    if (inString) {
      current += char;
      if (char === stringChar) {
        // Doubled quote is an escaped quote
        if (nextChar === stringChar) {
          current += nextChar;
          i++;
        } else {
          inString = false;
        }
      }
      continue;
    }

    if (char === '/' && nextChar === '*') {
      inBlockComment = true;
      current += char;
      continue;
    }

    if (char === '-' && nextChar === '-') {
      inComment = true;
      current += char;
      continue;
    }

    if (char === "'" || char === '"') {
      inString = true;
      stringChar = char;
      current += char;
      continue;
    }

    if (char === ';') {
      if (current.trim()) {
        statements.push(current.trim());
      }
      current = '';
      continue;
    }

    current += char;
  }

  if (current.trim()) {
    statements.push(current.trim());
  }

  return statements;
}

/**
 * Runs numbered SQL migration files from a directory.
 * Applied files are tracked per scope in the schema_migrations table.
 */
export class MigrationRunner {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Run all pending migrations in a directory
   * @returns Number of migrations run
   */
  async runMigrations(scope: string, migrationsPath: string): Promise<number> {
    logger.debug(`Checking migrations for scope: ${scope}`);

    const migrationFiles = await this.getMigrationFiles(migrationsPath);
    if (migrationFiles.length === 0) {
      logger.debug(`No migrations found in ${migrationsPath}`);
      return 0;
    }

    await this.db.execute(TRACKING_TABLE_SQL);

    const executed = await this.db.query<ExecutedMigrationRow[]>(
      'SELECT filename, checksum FROM schema_migrations WHERE scope = ? AND success = TRUE',
      [scope]
    );
    const executedMap = new Map(executed.map(row => [row.filename, row.checksum]));

    const pending = migrationFiles.filter((migration) => {
      const existingChecksum = executedMap.get(migration.filename);
      if (existingChecksum && existingChecksum !== migration.checksum) {
        logger.warn(
          `Migration ${migration.filename} (${scope}) has been modified since execution. ` +
          `Expected checksum: ${existingChecksum}, got: ${migration.checksum}`
        );
      }
      return !existingChecksum;
    });

    if (pending.length === 0) {
      logger.debug(`All migrations up to date for scope: ${scope}`);
      return 0;
    }

    logger.info(`Running ${pending.length} migration(s) for scope: ${scope}`);

    for (const migration of pending) {
      await this.executeMigration(scope, migration);
    }

    return pending.length;
  }

  /**
   * Get all .sql files from a directory, sorted by filename (001_, 002_, ...)
   */
  private async getMigrationFiles(migrationsPath: string): Promise<MigrationFile[]> {
    let files: string[];
    try {
      files = await readdir(migrationsPath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const sqlFiles = files
      .filter(f => f.endsWith('.sql'))
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

    const migrationFiles: MigrationFile[] = [];
    for (const filename of sqlFiles) {
      const content = await readFile(join(migrationsPath, filename), 'utf-8');
      migrationFiles.push({
        filename,
        content,
        checksum: createHash('md5').update(content).digest('hex'),
      });
    }

    return migrationFiles;
  }

  /**
   * Execute a single migration file inside a transaction.
   * The outcome is recorded either way; a failure is rethrown.
   */
  private async executeMigration(scope: string, migration: MigrationFile): Promise<void> {
    logger.info(`Executing migration: ${migration.filename}`);

    try {
      await this.db.transaction(async (connection) => {
        for (const statement of splitStatements(migration.content)) {
          await connection.execute(statement);
        }
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error(`Migration ${migration.filename} failed: ${cause.message}`);
      await this.record(scope, migration, cause.message);
      throw new MigrationError(migration.filename, cause);
    }

    await this.record(scope, migration, null);
    logger.info(`Migration ${migration.filename} completed successfully`);
  }

  private async record(
    scope: string,
    migration: MigrationFile,
    errorMessage: string | null
  ): Promise<void> {
    await this.db.execute(
      `INSERT INTO schema_migrations (scope, filename, checksum, success, error_message)
       VALUES (?, ?, ?, ?, ?)
       ON DUPLICATE KEY UPDATE checksum = VALUES(checksum), success = VALUES(success),
         error_message = VALUES(error_message), executed_at = CURRENT_TIMESTAMP`,
      [scope, migration.filename, migration.checksum, errorMessage === null, errorMessage]
    );
  }
}
