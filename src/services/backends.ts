/**
 * Per-backend capabilities, selected by `BackendKind`.
 *
 * Everything that differs between MySQL, PostgreSQL and SQLite lives here:
 * the Knex client and connection settings, the default port, the dialect hint
 * handed to the catalog generator, foreign-key lookups, driver result shapes
 * and driver error codes.
 */

import type { Knex } from 'knex';
import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import type { BackendKind, ConnectionProfile, FailureKind } from '../types/models.js';
import { isRecord, isRowArray, type Row } from '../types/utils.js';

/**
 * A nullable or non-nullable column in `table` pointing at the target table.
 */
export interface ForeignKeyRef {
  table: string;
  column: string;
  referencedColumn: string;
  nullable: boolean;
}

export interface ErrorClass {
  kind: Exclude<FailureKind, 'connection'>;
  /** Referential-integrity failure, reported with a business message. */
  referential?: boolean;
}

export interface Backend {
  readonly kind: BackendKind;
  readonly client: 'mysql2' | 'pg' | 'better-sqlite3';
  readonly defaultPort?: number;
  /** Dialect instruction for the catalog generator prompt. */
  readonly dialectHints: string;
  /** The knex dialect turns an escaped `\?` back into a literal `?`. */
  readonly unescapesQuestionMarks: boolean;
  knexConfig(profile: ConnectionProfile, connectTimeoutMs: number): Knex.Config;
  referencingKeys(db: Knex | Knex.Transaction, table: string): Promise<ForeignKeyRef[]>;
  readRows(result: unknown): Row[];
  readAffected(result: unknown): number;
  classify(code: string, message: string): ErrorClass | undefined;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

const ForeignKeyRowSchema = z.object({
  table: z.string(),
  column: z.string(),
  referenced_column: z.string(),
  nullable: z.union([z.boolean(), z.number()]).transform((value) => Boolean(value)),
});

function toForeignKeyRefs(rows: Row[]): ForeignKeyRef[] {
  return rows.map((row) => {
    const parsed = ForeignKeyRowSchema.parse(row);
    return {
      table: parsed.table,
      column: parsed.column,
      referencedColumn: parsed.referenced_column,
      nullable: parsed.nullable,
    };
  });
}

function numberField(value: unknown, field: string): number | undefined {
  const candidate = isRecord(value) ? value[field] : undefined;
  return typeof candidate === 'number' ? candidate : undefined;
}

// ─────────────────────────────────────────────────────────
// MySQL (mysql2): raw() resolves to [rows | ResultSetHeader, fields]
// ─────────────────────────────────────────────────────────

const MYSQL_CODES: Record<string, ErrorClass> = {
  ER_ROW_IS_REFERENCED: { kind: 'constraint_violation', referential: true },
  ER_ROW_IS_REFERENCED_2: { kind: 'constraint_violation', referential: true },
  ER_NO_REFERENCED_ROW: { kind: 'constraint_violation', referential: true },
  ER_NO_REFERENCED_ROW_2: { kind: 'constraint_violation', referential: true },
  ER_DUP_ENTRY: { kind: 'constraint_violation' },
  ER_BAD_NULL_ERROR: { kind: 'constraint_violation' },
  ER_CHECK_CONSTRAINT_VIOLATED: { kind: 'constraint_violation' },
  ER_PARSE_ERROR: { kind: 'syntax_defect' },
  ER_SYNTAX_ERROR: { kind: 'syntax_defect' },
  PROTOCOL_CONNECTION_LOST: { kind: 'operational' },
  ER_CON_COUNT_ERROR: { kind: 'operational' },
  ER_ACCESS_DENIED_ERROR: { kind: 'operational' },
  ER_LOCK_WAIT_TIMEOUT: { kind: 'operational' },
  ER_LOCK_DEADLOCK: { kind: 'operational' },
  ER_QUERY_INTERRUPTED: { kind: 'operational' },
  ER_SERVER_SHUTDOWN: { kind: 'operational' },
};

export const mysqlBackend: Backend = {
  kind: 'mysql',
  client: 'mysql2',
  defaultPort: 3306,
  dialectHints: 'Use MySQL syntax only.',
  unescapesQuestionMarks: false,

  knexConfig(profile, connectTimeoutMs) {
    return {
      client: 'mysql2',
      connection: {
        host: profile.host,
        port: profile.port ?? 3306,
        user: profile.user,
        password: profile.password,
        database: profile.database,
        connectTimeout: connectTimeoutMs,
      },
      pool: { min: 0, max: 10 },
      acquireConnectionTimeout: connectTimeoutMs,
    };
  },

  async referencingKeys(db, table) {
    const result: unknown = await db.raw(
      `SELECT k.TABLE_NAME AS \`table\`, k.COLUMN_NAME AS \`column\`,
              k.REFERENCED_COLUMN_NAME AS referenced_column,
              (c.IS_NULLABLE = 'YES') AS nullable
         FROM information_schema.KEY_COLUMN_USAGE k
         JOIN information_schema.COLUMNS c
           ON c.TABLE_SCHEMA = k.TABLE_SCHEMA AND c.TABLE_NAME = k.TABLE_NAME AND c.COLUMN_NAME = k.COLUMN_NAME
        WHERE k.REFERENCED_TABLE_SCHEMA = DATABASE() AND k.REFERENCED_TABLE_NAME = ?`,
      [table],
    );
    return toForeignKeyRefs(this.readRows(result));
  },

  readRows(result) {
    if (Array.isArray(result) && isRowArray(result[0])) {
      return result[0];
    }
    return [];
  },

  readAffected(result) {
    return Array.isArray(result) ? numberField(result[0], 'affectedRows') ?? 0 : 0;
  },

  classify(code) {
    return MYSQL_CODES[code];
  },
};

// ─────────────────────────────────────────────────────────
// PostgreSQL (pg): raw() resolves to { rows, rowCount }
// ─────────────────────────────────────────────────────────

export const postgresBackend: Backend = {
  kind: 'postgres',
  client: 'pg',
  defaultPort: 5432,
  dialectHints:
    "Use PostgreSQL syntax only. Use double quotes for column names, single quotes for values. Use 'SERIAL' for auto-increment. Use RETURNING * for returning data after INSERT/UPDATE.",
  unescapesQuestionMarks: true,

  knexConfig(profile, connectTimeoutMs) {
    return {
      client: 'pg',
      connection: {
        host: profile.host,
        port: profile.port ?? 5432,
        user: profile.user,
        password: profile.password,
        database: profile.database,
        connectionTimeoutMillis: connectTimeoutMs,
      },
      pool: { min: 0, max: 10 },
      acquireConnectionTimeout: connectTimeoutMs,
    };
  },

  async referencingKeys(db, table) {
    const result: unknown = await db.raw(
      `SELECT kcu.table_name AS "table", kcu.column_name AS "column",
              ccu.column_name AS referenced_column,
              (c.is_nullable = 'YES') AS nullable
         FROM information_schema.table_constraints tc
         JOIN information_schema.key_column_usage kcu
           ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
         JOIN information_schema.constraint_column_usage ccu
           ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
         JOIN information_schema.columns c
           ON c.table_schema = kcu.table_schema AND c.table_name = kcu.table_name AND c.column_name = kcu.column_name
        WHERE tc.constraint_type = 'FOREIGN KEY'
          AND tc.table_schema = current_schema()
          AND ccu.table_name = ?`,
      [table],
    );
    return toForeignKeyRefs(this.readRows(result));
  },

  readRows(result) {
    if (isRecord(result) && isRowArray(result.rows)) {
      return result.rows;
    }
    return [];
  },

  readAffected(result) {
    return numberField(result, 'rowCount') ?? 0;
  },

  // SQLSTATE classes: 23 integrity, 08 connection, 53 resources, 57 operator intervention
  classify(code) {
    if (code === '23503') return { kind: 'constraint_violation', referential: true };
    if (code.startsWith('23')) return { kind: 'constraint_violation' };
    if (code === '42601') return { kind: 'syntax_defect' };
    if (/^(08|53|57)/.test(code) || code === '40P01' || code === '40001') {
      return { kind: 'operational' };
    }
    return undefined;
  },
};

// ─────────────────────────────────────────────────────────
// SQLite (better-sqlite3): raw() resolves to rows, or { changes } for writes
// ─────────────────────────────────────────────────────────

export const sqliteBackend: Backend = {
  kind: 'sqlite',
  client: 'better-sqlite3',
  dialectHints: 'Use SQLite syntax only.',
  unescapesQuestionMarks: false,

  knexConfig(profile, connectTimeoutMs) {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: profile.database || ':memory:',
      },
      useNullAsDefault: true,
      acquireConnectionTimeout: connectTimeoutMs,
      pool: {
        afterCreate: (
          conn: BetterSqlite3.Database,
          done: (err: Error | null, conn: BetterSqlite3.Database) => void,
        ) => {
          conn.pragma('foreign_keys = ON');
          done(null, conn);
        },
      },
    };
  },

  async referencingKeys(db, table) {
    const result: unknown = await db.raw(
      `SELECT m.name AS "table", fk."from" AS "column",
              COALESCE(fk."to", (SELECT p.name FROM pragma_table_info(fk."table") p WHERE p.pk = 1)) AS referenced_column,
              (ti."notnull" = 0) AS nullable
         FROM sqlite_master m
         JOIN pragma_foreign_key_list(m.name) fk
         JOIN pragma_table_info(m.name) ti ON ti.name = fk."from"
        WHERE m.type = 'table' AND fk."table" = ?`,
      [table],
    );
    return toForeignKeyRefs(this.readRows(result));
  },

  readRows(result) {
    return isRowArray(result) ? result : [];
  },

  readAffected(result) {
    return numberField(result, 'changes') ?? 0;
  },

  classify(code, message) {
    if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') return { kind: 'constraint_violation', referential: true };
    if (code.startsWith('SQLITE_CONSTRAINT')) return { kind: 'constraint_violation' };
    if (code === 'SQLITE_ERROR' && /syntax error|incomplete input|unrecognized token/i.test(message)) {
      return { kind: 'syntax_defect' };
    }
    if (/^SQLITE_(BUSY|LOCKED|CANTOPEN|IOERR|FULL|READONLY)/.test(code)) {
      return { kind: 'operational' };
    }
    return undefined;
  },
};

export const BACKENDS = {
  mysql: mysqlBackend,
  postgres: postgresBackend,
  sqlite: sqliteBackend,
} satisfies Record<BackendKind, Backend>;

export function backendFor(kind: BackendKind): Backend {
  return BACKENDS[kind];
}
