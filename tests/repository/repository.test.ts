import { describe, expect, it, vi } from 'vitest';

import type { DbExecutor, QueryResult, StatementResult } from '../../src/core/execution/db-executor.js';
import {
  QueryExecutionError,
  RowDecodeError,
  TooManyRowsError,
  UnresolvedParameterError,
} from '../../src/core/errors.js';
import { sqlitePlaceholder } from '../../src/core/params/named-parameters.js';
import type { RowMap } from '../../src/core/decoding/row-map.js';
import type { DbExecutorFactory } from '../../src/repository/executor-factory.js';
import type { QueryLogEntry } from '../../src/repository/query-logger.js';
import { Repository } from '../../src/repository/repository.js';

type FakeOptions = {
  result?: QueryResult;
  statement?: StatementResult;
  failOn?: string[];
};

const createFakeFactory = (opts: FakeOptions = {}) => {
  const events: string[] = [];
  const calls: Array<{ sql: string; params?: readonly unknown[] }> = [];

  const step = async (name: string) => {
    events.push(name);
    if (opts.failOn?.includes(name)) throw new Error(`${name} broke`);
  };

  const executor: DbExecutor = {
    async executeSql(sql, params) {
      calls.push({ sql, params });
      await step('query');
      return opts.result ?? { columns: [], values: [] };
    },
    async runSql(sql, params) {
      calls.push({ sql, params });
      await step('run');
      return opts.statement ?? { rowsAffected: 1, lastInsertId: 10 };
    },
    beginTransaction: () => step('begin'),
    commitTransaction: () => step('commit'),
    rollbackTransaction: () => step('rollback'),
    dispose: () => step('dispose'),
  };

  const factory = {
    createExecutor: vi.fn(() => executor),
    createTransactionalExecutor: vi.fn(() => executor),
    dispose: async () => { },
  } satisfies DbExecutorFactory;

  return { factory, events, calls };
};

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const artists: QueryResult = {
  columns: ['id', 'name'],
  values: [
    [1, 'Miles'],
    [2, 'Nina'],
  ],
};

const toArtist = (row: RowMap) => row.result({ id: row.int64('id'), name: row.string('name') });

describe('Repository.mapRows', () => {
  it('maps every row and disposes the executor', async () => {
    const { factory, events, calls } = createFakeFactory({ result: artists });
    const repo = new Repository(factory);

    const rows = await repo.mapRows('select id, name from artist', [], toArtist);

    expect(rows).toEqual([
      { id: 1n, name: 'Miles' },
      { id: 2n, name: 'Nina' },
    ]);
    expect(calls).toEqual([{ sql: 'select id, name from artist', params: [] }]);
    expect(events).toEqual(['query', 'dispose']);
  });

  it('accepts async mappers', async () => {
    const { factory } = createFakeFactory({ result: artists });
    const repo = new Repository(factory);

    const names = await repo.mapRows('select id, name from artist', [], async row => row.string('name'));

    expect(names).toEqual(['Miles', 'Nina']);
  });

  it('propagates mapper errors unchanged', async () => {
    const { factory, events } = createFakeFactory({ result: artists });
    const repo = new Repository(factory);

    const failing = repo.mapRows('select id, name from artist', [], row => row.result(row.int64('name')));

    await expect(failing).rejects.toBeInstanceOf(RowDecodeError);
    await expect(failing).rejects.toThrow("cannot convert key 'name' value 'Miles' to 'int64'");
    expect(events).toEqual(['query', 'dispose']);
  });

  it('wraps engine failures with the statement', async () => {
    const { factory, events } = createFakeFactory({ failOn: ['query'] });
    const logger = createLogger();
    const repo = new Repository(factory, { logger });

    const failing = repo.mapRows('select 1', [], row => row.raw('x'));

    await expect(failing).rejects.toBeInstanceOf(QueryExecutionError);
    await expect(failing).rejects.toThrow("mapRows failed for 'select 1': query broke");
    expect(events).toEqual(['query', 'dispose']);
    expect(logger.error).toHaveBeenCalledWith("unable to execute query 'select 1': query broke");
  });

  it('hands every statement to the query logger', async () => {
    const { factory } = createFakeFactory({ result: artists });
    const entries: QueryLogEntry[] = [];
    const repo = new Repository(factory, { queryLogger: entry => entries.push(entry) });

    await repo.mapRows('select id, name from artist where id > $1', [0], toArtist);

    expect(entries).toEqual([
      {
        kind: 'query',
        sql: 'select id, name from artist where id > $1',
        params: [0],
        durationMs: expect.any(Number),
        rowCount: 2,
      },
    ]);
  });

  it('reports failed statements to the query logger', async () => {
    const { factory } = createFakeFactory({ failOn: ['run'] });
    const entries: QueryLogEntry[] = [];
    const repo = new Repository(factory, { queryLogger: entry => entries.push(entry) });

    await expect(repo.execute('delete from artist', [])).rejects.toThrow(QueryExecutionError);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ kind: 'run', sql: 'delete from artist', params: [] });
    expect(entries[0]?.error).toEqual(new Error('run broke'));
    expect(entries[0]?.rowCount).toBeUndefined();
  });

  it('reports rows affected for runs', async () => {
    const { factory } = createFakeFactory({ statement: { rowsAffected: 3 } });
    const entries: QueryLogEntry[] = [];
    const repo = new Repository(factory, { queryLogger: entry => entries.push(entry) });

    await repo.execute('update artist set name = $1', ['x']);

    expect(entries.map(({ kind, rowCount }) => ({ kind, rowCount }))).toEqual([{ kind: 'run', rowCount: 3 }]);
  });
});

describe('Repository.mapRowsNamed', () => {
  it('rewrites named parameters before running', async () => {
    const { factory, calls } = createFakeFactory({ result: artists });
    const repo = new Repository(factory);

    await repo.mapRowsNamed('select id, name from artist where id in ( :ids ) and name <> :name', { ids: [1, 2], name: 'x' }, toArtist);

    expect(calls).toEqual([
      { sql: 'select id, name from artist where id in ( $1, $2 ) and name <> $3', params: [1, 2, 'x'] },
    ]);
  });

  it('uses the configured marker style', async () => {
    const { factory, calls } = createFakeFactory({ result: artists });
    const repo = new Repository(factory, { placeholder: sqlitePlaceholder });

    await repo.mapRowsNamed('select id, name from artist where id = :id', { id: 1 }, toArtist);

    expect(calls[0]?.sql).toBe('select id, name from artist where id = ?1');
  });

  it('fails before touching the database when a name is unresolved', async () => {
    const { factory, events } = createFakeFactory({ result: artists });
    const logger = createLogger();
    const repo = new Repository(factory, { logger });

    await expect(repo.mapRowsNamed('select * from artist where id = :id', {}, toArtist))
      .rejects.toBeInstanceOf(UnresolvedParameterError);

    expect(factory.createExecutor).not.toHaveBeenCalled();
    expect(events).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      "substitution of named parameters failed for 'select * from artist where id = :id': parameter 'id' not found in arguments"
    );
  });
});

describe('Repository.mapRow', () => {
  it('returns undefined when nothing matched', async () => {
    const { factory } = createFakeFactory({ result: { columns: ['id', 'name'], values: [] } });
    const repo = new Repository(factory);

    await expect(repo.mapRow('select id, name from artist where id = $1', [99], toArtist)).resolves.toBeUndefined();
  });

  it('returns the single mapped row', async () => {
    const { factory } = createFakeFactory({ result: { columns: ['id', 'name'], values: [[3, 'Ella']] } });
    const repo = new Repository(factory);

    const artist = await repo.mapRowNamed('select id, name from artist where id = :id', { id: 3 }, toArtist);

    expect(artist).toEqual({ id: 3n, name: 'Ella' });
  });

  it('refuses more than one row', async () => {
    const { factory } = createFakeFactory({ result: artists });
    const repo = new Repository(factory);

    const failing = repo.mapRow('select id, name from artist', [], toArtist);

    await expect(failing).rejects.toBeInstanceOf(TooManyRowsError);
    await expect(failing).rejects.toThrow('query resulted in 2 rows when expecting 0 or 1');
  });
});

describe('Repository.execute', () => {
  it('commits after the statement and reports the engine figures', async () => {
    const { factory, events } = createFakeFactory({ statement: { rowsAffected: 2, lastInsertId: 41 } });
    const repo = new Repository(factory);

    const outcome = await repo.execute('update artist set name = $1', ['x']);

    expect(outcome).toEqual({ rowsAffected: 2, lastInsertId: 41 });
    expect(events).toEqual(['begin', 'run', 'commit', 'dispose']);
    expect(factory.createTransactionalExecutor).toHaveBeenCalledTimes(1);
  });

  it('uses -1 for figures the engine did not report', async () => {
    const { factory } = createFakeFactory({ statement: { rowsAffected: 1 } });
    const logger = createLogger();
    const repo = new Repository(factory, { logger });

    const outcome = await repo.execute('update artist set name = $1', ['x']);

    expect(outcome).toEqual({ rowsAffected: 1, lastInsertId: -1 });
    expect(logger.warn).toHaveBeenCalledWith('engine did not report last insert id');
  });

  it('rolls back instead of committing when the statement fails', async () => {
    const { factory, events } = createFakeFactory({ failOn: ['run'] });
    const repo = new Repository(factory);

    const failing = repo.execute('delete from artist', []);

    await expect(failing).rejects.toBeInstanceOf(QueryExecutionError);
    await expect(failing).rejects.toThrow("execute failed for 'delete from artist': run broke");
    expect(events).toEqual(['begin', 'run', 'rollback', 'dispose']);
  });

  it('rolls back when commit fails', async () => {
    const { factory, events } = createFakeFactory({ failOn: ['commit'] });
    const repo = new Repository(factory);

    await expect(repo.execute('delete from artist', [])).rejects.toThrow("execute failed for 'delete from artist': commit broke");
    expect(events).toEqual(['begin', 'run', 'commit', 'rollback', 'dispose']);
  });

  it('keeps the original error when rollback also fails', async () => {
    const { factory } = createFakeFactory({ failOn: ['run', 'rollback'] });
    const logger = createLogger();
    const repo = new Repository(factory, { logger });

    const error = await repo.execute('delete from artist', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toHaveProperty('cause', new Error('run broke'));
    expect(logger.error).toHaveBeenCalledWith('rollback failed in execute(): rollback broke');
  });

  it('rewrites named parameters for executeNamed', async () => {
    const { factory, calls } = createFakeFactory();
    const repo = new Repository(factory);

    await repo.executeNamed('delete from artist where id in ( :ids )', { ids: [4, 5, 6] });

    expect(calls).toEqual([{ sql: 'delete from artist where id in ( $1, $2, $3 )', params: [4, 5, 6] }]);
  });
});
