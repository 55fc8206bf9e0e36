import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PGlite } from '@electric-sql/pglite';

import { ALIVE_SSNS_SQL, fetchAliveSsns, queryAliveSsns } from '../../src/query/alive-ssns.js';
import { createPostgresExecutor } from '../../src/core/execution/executors/postgres-executor.js';
import type { PostgresConnectionSettings } from '../../src/core/execution/executors/postgres-executor.js';
import { PipelineError } from '../../src/core/errors.js';
import { createPgliteClient, createPgliteConnector, seedCriminalRecords } from '../helpers/pglite-helpers.js';
import { createMemoryLogger } from '../helpers/fakes.js';

const SETTINGS: PostgresConnectionSettings = {
  host: 'localhost',
  port: 5432,
  user: 'postgres',
  password: 'postgres',
  database: 'postgres',
};

describe('alive SSN query (pglite)', () => {
  let db: PGlite;

  beforeEach(() => {
    db = new PGlite();
  });

  afterEach(async () => {
    await db.close();
  });

  it('returns only alive rows', async () => {
    await seedCriminalRecords(db, [
      { id: 1, name: 'Ada', ssn: '999-99-9999', status: 'alive' },
      { id: 2, name: 'Bo', ssn: '888-88-8888', status: 'deceased' },
    ]);

    const payload = await queryAliveSsns(createPostgresExecutor(createPgliteClient(db)));
    expect(payload).toEqual({ alive_ssns: ['999-99-9999'] });
  });

  it('returns an empty list when nobody is alive', async () => {
    await seedCriminalRecords(db, [{ id: 1, name: 'Bo', ssn: '888-88-8888', status: 'deceased' }]);

    const payload = await queryAliveSsns(createPostgresExecutor(createPgliteClient(db)));
    expect(payload).toEqual({ alive_ssns: [] });
  });

  it('skips alive rows without an ssn', async () => {
    await seedCriminalRecords(db, [
      { id: 1, name: 'Ada', ssn: null, status: 'alive' },
      { id: 2, name: 'Cy', ssn: '777-77-7777', status: 'alive' },
    ]);

    const payload = await queryAliveSsns(createPostgresExecutor(createPgliteClient(db)));
    expect(payload).toEqual({ alive_ssns: ['777-77-7777'] });
  });

  it('is case sensitive on status', async () => {
    await seedCriminalRecords(db, [
      { id: 1, name: 'Ada', ssn: '111-11-1111', status: 'Alive' },
      { id: 2, name: 'Cy', ssn: '222-22-2222', status: 'alive' },
    ]);

    const payload = await queryAliveSsns(createPostgresExecutor(createPgliteClient(db)));
    expect(payload.alive_ssns).toEqual(['222-22-2222']);
  });

  it('fails with QUERY_FAILED when the table is missing', async () => {
    await expect(queryAliveSsns(createPostgresExecutor(createPgliteClient(db)))).rejects.toMatchObject({
      name: 'PipelineError',
      code: 'QUERY_FAILED',
    });
  });

  it('fetchAliveSsns closes the connection after querying', async () => {
    await seedCriminalRecords(db, [{ id: 1, name: 'Ada', ssn: '999-99-9999', status: 'alive' }]);
    const { connect, calls } = createPgliteConnector(db);
    const { logger, entries } = createMemoryLogger();

    const payload = await fetchAliveSsns({ connect, settings: SETTINGS, logger });

    expect(payload).toEqual({ alive_ssns: ['999-99-9999'] });
    expect(calls).toEqual({ connect: 1, end: 1 });
    expect(entries.map(e => e.message)).toEqual([
      `SQL: ${ALIVE_SSNS_SQL}`,
      `SQL returned 1 row(s): ${ALIVE_SSNS_SQL}`,
      'PostgreSQL connection is closed',
    ]);
  });

  it('fetchAliveSsns closes the connection when the query fails', async () => {
    const { connect, calls } = createPgliteConnector(db);
    const { logger } = createMemoryLogger();

    await expect(fetchAliveSsns({ connect, settings: SETTINGS, logger })).rejects.toBeInstanceOf(PipelineError);
    expect(calls).toEqual({ connect: 1, end: 1 });
  });

  it('fetchAliveSsns reports connection failures as QUERY_FAILED', async () => {
    const { logger } = createMemoryLogger();
    const connect = async () => {
      throw new Error('connection refused');
    };

    await expect(fetchAliveSsns({ connect, settings: SETTINGS, logger })).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      message: 'Could not connect to PostgreSQL at localhost:5432: connection refused',
    });
  });
});
