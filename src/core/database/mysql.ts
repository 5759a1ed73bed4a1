import mysql from 'mysql2/promise';
import type { Pool, PoolConnection, RowDataPacket, ResultSetHeader } from 'mysql2/promise';
import { parseDatabaseUrl } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('MySQL');

/**
 * Database service over a mysql2 connection pool.
 * The pool is created on first use, so constructing the service never connects.
 */
export class DatabaseService {
  private pool: Pool | null = null;

  constructor(private readonly databaseUrl: string) {}

  /**
   * Get or create the connection pool
   */
  private getPool(): Pool {
    if (!this.pool) {
      const dbConfig = parseDatabaseUrl(this.databaseUrl);

      this.pool = mysql.createPool({
        host: dbConfig.host,
        port: dbConfig.port,
        user: dbConfig.user,
        password: dbConfig.password,
        database: dbConfig.database,
        waitForConnections: true,
        connectionLimit: 10,
        queueLimit: 0,
        enableKeepAlive: true,
        keepAliveInitialDelay: 0,
      });
    }
    return this.pool;
  }

  /**
   * Test the database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const connection = await this.getPool().getConnection();
      await connection.ping();
      connection.release();
      return true;
    } catch (error) {
      logger.error('MySQL connection test failed:', error);
      return false;
    }
  }

  /**
   * Execute a query and return rows
   */
  async query<T extends RowDataPacket[]>(
    sql: string,
    params?: unknown[]
  ): Promise<T> {
    const [rows] = await this.getPool().execute<T>(sql, params);
    return rows;
  }

  /**
   * Execute an insert/update/delete and return the result
   */
  async execute(
    sql: string,
    params?: unknown[]
  ): Promise<ResultSetHeader> {
    const [result] = await this.getPool().execute<ResultSetHeader>(sql, params);
    return result;
  }

  /**
   * Execute multiple statements in a transaction
   */
  async transaction<T>(
    callback: (connection: PoolConnection) => Promise<T>
  ): Promise<T> {
    const connection = await this.getPool().getConnection();

    try {
      await connection.beginTransaction();
      const result = await callback(connection);
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }

  /**
   * Close the connection pool
   */
  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
