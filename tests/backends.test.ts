import { afterEach, describe, it, expect } from 'vitest';
import { backendFor, mysqlBackend, postgresBackend, sqliteBackend } from '../src/services/backends.js';
import type { ConnectionManager } from '../src/services/connection.js';
import { seedEmployees, sqliteConnections } from './helpers/fixtures.js';

describe('backend capability table', () => {
  it('selects by kind', () => {
    expect(backendFor('mysql')).toBe(mysqlBackend);
    expect(backendFor('postgres')).toBe(postgresBackend);
    expect(backendFor('sqlite')).toBe(sqliteBackend);
  });

  it('carries default ports', () => {
    expect(mysqlBackend.defaultPort).toBe(3306);
    expect(postgresBackend.defaultPort).toBe(5432);
    expect(sqliteBackend.defaultPort).toBeUndefined();
  });

  it('builds knex settings from the profile', () => {
    const config = postgresBackend.knexConfig(
      { backendKind: 'postgres', host: 'db', port: 6543, database: 'shop', user: 'app', password: 'test-secret' },
      2000,
    );
    expect(config.client).toBe('pg');
    expect(config.acquireConnectionTimeout).toBe(2000);
    expect(config.connection).toMatchObject({ host: 'db', port: 6543, database: 'shop', connectionTimeoutMillis: 2000 });
  });
});

describe('classify', () => {
  it('maps MySQL codes', () => {
    expect(mysqlBackend.classify('ER_ROW_IS_REFERENCED_2', '')).toEqual({ kind: 'constraint_violation', referential: true });
    expect(mysqlBackend.classify('ER_DUP_ENTRY', '')).toEqual({ kind: 'constraint_violation' });
    expect(mysqlBackend.classify('ER_PARSE_ERROR', '')).toEqual({ kind: 'syntax_defect' });
    expect(mysqlBackend.classify('ER_LOCK_DEADLOCK', '')).toEqual({ kind: 'operational' });
    expect(mysqlBackend.classify('ER_NO_SUCH_TABLE', '')).toBeUndefined();
  });

  it('maps PostgreSQL SQLSTATEs', () => {
    expect(postgresBackend.classify('23503', '')).toEqual({ kind: 'constraint_violation', referential: true });
    expect(postgresBackend.classify('23505', '')).toEqual({ kind: 'constraint_violation' });
    expect(postgresBackend.classify('42601', '')).toEqual({ kind: 'syntax_defect' });
    expect(postgresBackend.classify('08006', '')).toEqual({ kind: 'operational' });
    expect(postgresBackend.classify('40P01', '')).toEqual({ kind: 'operational' });
    expect(postgresBackend.classify('42P01', '')).toBeUndefined();
  });

  it('maps SQLite codes', () => {
    expect(sqliteBackend.classify('SQLITE_CONSTRAINT_FOREIGNKEY', '')).toEqual({
      kind: 'constraint_violation',
      referential: true,
    });
    expect(sqliteBackend.classify('SQLITE_CONSTRAINT_UNIQUE', '')).toEqual({ kind: 'constraint_violation' });
    expect(sqliteBackend.classify('SQLITE_ERROR', 'near "FROM": syntax error')).toEqual({ kind: 'syntax_defect' });
    expect(sqliteBackend.classify('SQLITE_ERROR', 'no such table: nope')).toBeUndefined();
    expect(sqliteBackend.classify('SQLITE_BUSY', 'database is locked')).toEqual({ kind: 'operational' });
  });
});

describe('driver result shapes', () => {
  it('reads mysql2 results', () => {
    expect(mysqlBackend.readRows([[{ id: 1 }], []])).toEqual([{ id: 1 }]);
    expect(mysqlBackend.readRows([{ affectedRows: 3 }, undefined])).toEqual([]);
    expect(mysqlBackend.readAffected([{ affectedRows: 3 }, undefined])).toBe(3);
  });

  it('reads pg results', () => {
    expect(postgresBackend.readRows({ rows: [{ id: 1 }], rowCount: 1 })).toEqual([{ id: 1 }]);
    expect(postgresBackend.readAffected({ rows: [], rowCount: 4 })).toBe(4);
  });

  it('reads better-sqlite3 results', () => {
    expect(sqliteBackend.readRows([{ id: 1 }])).toEqual([{ id: 1 }]);
    expect(sqliteBackend.readRows({ changes: 2, lastInsertRowid: 5 })).toEqual([]);
    expect(sqliteBackend.readAffected({ changes: 2, lastInsertRowid: 5 })).toBe(2);
  });
});

describe('sqlite referencingKeys', () => {
  let connections: ConnectionManager;

  afterEach(async () => {
    await connections.close();
  });

  it('lists foreign keys pointing at a table with their nullability', async () => {
    connections = sqliteConnections();
    await seedEmployees(connections);

    const refs = await connections.withSession(({ db }) => sqliteBackend.referencingKeys(db, 'employees'));

    expect(refs).toHaveLength(2);
    expect(refs).toEqual(
      expect.arrayContaining([
        { table: 'employees', column: 'manager_id', referencedColumn: 'id', nullable: true },
        { table: 'projects', column: 'owner_id', referencedColumn: 'id', nullable: false },
      ]),
    );
  });

  it('returns nothing for an unreferenced table', async () => {
    connections = sqliteConnections();
    await seedEmployees(connections);

    const refs = await connections.withSession(({ db }) => sqliteBackend.referencingKeys(db, 'projects'));
    expect(refs).toEqual([]);
  });
});
