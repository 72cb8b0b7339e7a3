/**
 * PostgreSQL connection capability
 *
 * Opaque to the auth and gateway paths: it is handed to handlers as a
 * connect/execute capability and only checked by the health route.
 */

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { logger } from '../observability/logger.js';

export type QueryParam = boolean | number | string | Buffer;

export type DatabaseState = 'connected' | 'unavailable' | 'not_configured';

export class UnsupportedQueryParameterError extends Error {
  constructor(public index: number, public kind: string) {
    super(`Unsupported or NULL parameter at position ${index + 1} (${kind})`);
    this.name = 'UnsupportedQueryParameterError';
  }
}

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Convert bound values to driver parameters. NULL is not accepted; 64-bit
 * integers travel as decimal strings.
 */
export function toQueryParams(values: readonly unknown[]): QueryParam[] {
  return values.map((value, index) => {
    switch (typeof value) {
      case 'boolean':
      case 'number':
      case 'string':
        return value;
      case 'bigint':
        return value.toString();
      default:
        if (Buffer.isBuffer(value)) {
          return value;
        }
        throw new UnsupportedQueryParameterError(index, describeKind(value));
    }
  });
}

export interface DatabaseOptions {
  connectionString: string;
  /** Pool size */
  max?: number;
}

export class Database {
  private readonly pool: Pool;

  constructor(options: DatabaseOptions) {
    this.pool = new Pool({ connectionString: options.connectionString, max: options.max ?? 5 });
    this.pool.on('error', (error) => {
      logger.error('Idle database client error', error);
    });
  }

  /**
   * Check out a dedicated client. The caller must `release()` it.
   */
  async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      logger.error('Failed to connect to database', error);
      throw error;
    }
  }

  async execute<R extends QueryResultRow = QueryResultRow>(
    sql: string,
    values: readonly unknown[] = []
  ): Promise<QueryResult<R>> {
    return this.pool.query<R>(sql, toQueryParams(values));
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { message: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Report the database state for health checks
 */
export async function checkDatabase(database: Database | undefined): Promise<DatabaseState> {
  if (!database) {
    return 'not_configured';
  }
  return (await database.ping()) ? 'connected' : 'unavailable';
}
