/**
 * Database access for the catalog store.
 *
 * Everything above this module talks to a `Database`, never to `pg` directly,
 * so tests can run the same SQL against an in-process PostgreSQL.
 */

import fs from 'fs';
import path from 'path';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import config from '../config';
import { StoreError } from '../utils/errors';

export type SqlValue = string | number | boolean | null;

/**
 * Minimal client contract: run parameterized SQL, get row objects back.
 */
export interface QueryClient {
  query<R extends object>(text: string, values?: readonly SqlValue[]): Promise<R[]>;
}

export interface Database {
  /**
   * Run `fn` on one connection. The connection is released on every exit path.
   */
  withClient<T>(fn: (client: QueryClient) => Promise<T>): Promise<T>;
  /**
   * Run `fn` inside BEGIN/COMMIT, rolling back if it throws.
   */
  transaction<T>(fn: (client: QueryClient) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

export function readSchemaSql(): string {
  return fs.readFileSync(SCHEMA_PATH, 'utf-8');
}

/**
 * Runs `fn` in a transaction on an already acquired client.
 *
 * The error from `fn` (or COMMIT) is what gets rethrown. A failing ROLLBACK is
 * handed to `onRollbackError` so the owner of the connection can discard it.
 */
export async function runInTransaction<T>(
  client: QueryClient,
  fn: (client: QueryClient) => Promise<T>,
  onRollbackError: (error: unknown) => void
): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      onRollbackError(rollbackError);
    }
    throw error;
  }
}

/** The parts of a `pg` pool client the catalog uses. */
export type PoolClientLike = Pick<PoolClient, 'query' | 'release'>;

/** The parts of a `pg` Pool the catalog uses. */
export interface PoolLike {
  connect(): Promise<PoolClientLike>;
  end(): Promise<void>;
}

function wrapPoolClient(client: PoolClientLike): QueryClient {
  return {
    async query<R extends object>(text: string, values?: readonly SqlValue[]): Promise<R[]> {
      try {
        const result = await client.query<R & QueryResultRow>(text, values ? [...values] : undefined);
        return result.rows;
      } catch (error) {
        throw new StoreError('Catalog query failed', error);
      }
    },
  };
}

export function createPoolDatabase(pool: PoolLike): Database {
  const acquire = async (): Promise<PoolClientLike> => {
    try {
      return await pool.connect();
    } catch (error) {
      throw new StoreError('Could not connect to the catalog store', error);
    }
  };

  return {
    async withClient(fn) {
      const client = await acquire();
      try {
        return await fn(wrapPoolClient(client));
      } finally {
        client.release();
      }
    },
    async transaction(fn) {
      const client = await acquire();
      // A connection whose ROLLBACK failed may still hold an open transaction
      let broken: Error | undefined;
      try {
        return await runInTransaction(wrapPoolClient(client), fn, (rollbackError) => {
          broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        });
      } finally {
        client.release(broken);
      }
    },
    async close() {
      await pool.end();
    },
  };
}

export function createPool(): Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    idleTimeoutMillis: config.dbIdleTimeoutMs,
    connectionTimeoutMillis: config.dbConnectionTimeoutMs,
  });
}
