// src/core/execution/executors/postgres-executor.ts
import pg from 'pg';

import {
  DbExecutor,
  createExecutorFromQueryRunner
} from '../db-executor.js';

export interface PostgresClientLike {
  query(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
  end?(): Promise<void>;
}

export interface PostgresConnectionSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

/**
 * Opens a connection and returns a client the executor can drive.
 */
export type PostgresConnector = (settings: PostgresConnectionSettings) => Promise<PostgresClientLike>;

export function createPostgresExecutor(
  client: PostgresClientLike
): DbExecutor {
  return createExecutorFromQueryRunner({
    async query(sql, params) {
      const { rows } = await client.query(sql, params);
      return rows;
    },
    async close() {
      await client.end?.();
    },
  });
}

/**
 * Default connector backed by node-postgres.
 */
export const connectPostgres: PostgresConnector = async settings => {
  const client = new pg.Client({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
  });

  // pg emits 'error' when the server drops the connection; the next query reports it.
  let lost: Error | null = null;
  client.on('error', error => {
    lost = error;
  });
  await client.connect();

  return {
    async query(text, params) {
      if (lost) {
        throw lost;
      }
      const result = await client.query<Record<string, unknown>>(text, params);
      return { rows: result.rows };
    },
    async end() {
      // The socket is already gone once pg has reported an error.
      if (lost) return;
      await client.end();
    },
  };
};
