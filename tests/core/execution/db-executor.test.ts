import { describe, expect, it, vi } from 'vitest';

import { createExecutorFromQueryRunner, readColumn, rowsToQueryResult } from '../../../src/core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogEntry } from '../../../src/core/execution/query-logger.js';

describe('rowsToQueryResult', () => {
  it('uses the first row keys as columns', () => {
    expect(rowsToQueryResult([{ ssn: 'a', status: 'alive' }, { ssn: 'b', status: 'alive' }])).toEqual({
      columns: ['ssn', 'status'],
      values: [['a', 'alive'], ['b', 'alive']],
    });
  });

  it('returns an empty result for no rows', () => {
    expect(rowsToQueryResult([])).toEqual({ columns: [], values: [] });
  });
});

describe('readColumn', () => {
  it('reads values in row order', () => {
    expect(readColumn([{ columns: ['id', 'ssn'], values: [[2, 'b'], [1, 'a']] }], 'ssn')).toEqual(['b', 'a']);
  });

  it('throws for an unknown column', () => {
    expect(() => readColumn([{ columns: ['id'], values: [[1]] }], 'ssn')).toThrowError(
      'Column "ssn" is not part of the result (got: id)'
    );
  });

  it('returns nothing for an empty result list', () => {
    expect(readColumn([], 'ssn')).toEqual([]);
  });
});

describe('createExecutorFromQueryRunner', () => {
  it('closes the runner once and refuses queries afterwards', async () => {
    const close = vi.fn(async () => { });
    const executor = createExecutorFromQueryRunner({
      query: async () => [{ one: 1 }],
      close,
    });

    await expect(executor.executeSql('select 1 as one')).resolves.toEqual([{ columns: ['one'], values: [[1]] }]);
    await executor.dispose();
    await executor.dispose();

    expect(close).toHaveBeenCalledTimes(1);
    await expect(executor.executeSql('select 1')).rejects.toThrowError('Executor has been disposed');
  });
});

describe('createQueryLoggingExecutor', () => {
  it('closes the underlying runner when disposed', async () => {
    const close = vi.fn(async () => { });
    const executor = createQueryLoggingExecutor(
      createExecutorFromQueryRunner({ query: async () => [], close }),
      () => { }
    );

    await executor.dispose();
    await executor.dispose();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('reports the statement before and after execution', async () => {
    const entries: QueryLogEntry[] = [];
    const executor = createQueryLoggingExecutor(
      createExecutorFromQueryRunner({ query: async () => [{ ssn: 'a' }, { ssn: 'b' }] }),
      entry => entries.push(entry)
    );

    await executor.executeSql('select ssn from t where status = $1', ['alive']);

    expect(entries).toEqual([
      { sql: 'select ssn from t where status = $1', params: ['alive'] },
      { sql: 'select ssn from t where status = $1', params: ['alive'], rowCount: 2 },
    ]);
  });
});
