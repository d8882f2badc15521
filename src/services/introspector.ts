/**
 * Schema description for catalog generation.
 *
 * MySQL and PostgreSQL are read through knex-schema-inspector. It does not
 * recognise the better-sqlite3 client, so SQLite is read from its pragmas.
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { z } from 'zod';
import { SchemaIntrospectionError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { Backend } from './backends.js';
import type { ConnectionManager } from './connection.js';

export interface ColumnSummary {
  name: string;
  dataType: string;
  nullable: boolean;
}

export interface ForeignKeySummary {
  name: string | null;
  column: string;
  referencedTable: string;
  referencedColumn: string | null;
}

/**
 * The slice of a schema inspector the description needs.
 */
export interface TableInspector {
  tables(): Promise<string[]>;
  columns(table: string): Promise<ColumnSummary[]>;
  foreignKeys(table: string): Promise<ForeignKeySummary[]>;
}

function knexInspector(db: Knex): TableInspector {
  const inspector = SchemaInspector(db);
  return {
    tables: () => inspector.tables(),
    async columns(table) {
      const columns = await inspector.columnInfo(table);
      return columns.map((column) => ({
        name: column.name,
        dataType: column.data_type,
        nullable: column.is_nullable,
      }));
    },
    async foreignKeys(table) {
      const keys = await inspector.foreignKeys(table);
      return keys.map((key) => ({
        name: key.constraint_name,
        column: key.column,
        referencedTable: key.foreign_key_table,
        referencedColumn: key.foreign_key_column,
      }));
    },
  };
}

const SqliteColumnSchema = z.object({
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
});

const SqliteForeignKeySchema = z.object({
  id: z.number(),
  table: z.string(),
  from: z.string(),
  to: z.string().nullable(),
});

function sqliteInspector(db: Knex, backend: Backend): TableInspector {
  const rows = async (sql: string, bindings: string[] = []) =>
    backend.readRows(await db.raw(sql, bindings));

  return {
    async tables() {
      const result = await rows(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      );
      return result.map((row) => z.object({ name: z.string() }).parse(row).name);
    },
    async columns(table) {
      const result = await rows('SELECT name, type, "notnull" FROM pragma_table_info(?)', [table]);
      return result.map((row) => {
        const column = SqliteColumnSchema.parse(row);
        return { name: column.name, dataType: column.type || 'ANY', nullable: column.notnull === 0 };
      });
    },
    async foreignKeys(table) {
      const result = await rows('SELECT id, "table", "from", "to" FROM pragma_foreign_key_list(?)', [table]);
      return result.map((row) => {
        const key = SqliteForeignKeySchema.parse(row);
        return { name: null, column: key.from, referencedTable: key.table, referencedColumn: key.to };
      });
    },
  };
}

/**
 * Pick the inspector for a backend.
 */
export function inspectorFor(db: Knex, backend: Backend): TableInspector {
  return backend.kind === 'sqlite' ? sqliteInspector(db, backend) : knexInspector(db);
}

function describeForeignKey(table: string, key: ForeignKeySummary): string {
  const name = key.name ?? `${table}_${key.column}_fkey`;
  const target = key.referencedColumn ? `${key.referencedTable}.${key.referencedColumn}` : key.referencedTable;
  return `FK: ${name} - ${key.column} → ${target}`;
}

/**
 * Render tables, columns, nullability and foreign keys as text:
 *
 * ```
 * Table: employees
 * id (integer) NOT NULL
 * manager_id (integer) NULL
 *
 * Foreign Keys:
 * FK: employees_manager_id_fkey - manager_id → employees.id
 * ```
 */
export async function describeSchema(inspector: TableInspector): Promise<string> {
  const tables = await inspector.tables();
  logger.info(`Found ${tables.length} tables`);

  const sections: string[] = [];
  for (const table of tables) {
    const columns = await inspector.columns(table);
    let section = `Table: ${table}\n${columns
      .map((column) => `${column.name} (${column.dataType}) ${column.nullable ? 'NULL' : 'NOT NULL'}`)
      .join('\n')}`;

    let keyLines: string[];
    try {
      keyLines = (await inspector.foreignKeys(table)).map((key) => describeForeignKey(table, key));
    } catch (error) {
      logger.warn(`Error extracting foreign keys for table ${table}: ${error}`);
      keyLines = [`Error extracting foreign keys: ${error instanceof Error ? error.message : String(error)}`];
    }
    if (keyLines.length > 0) {
      section += `\n\nForeign Keys:\n${keyLines.join('\n')}`;
    }

    sections.push(section);
  }

  return sections.join('\n\n');
}

/**
 * Reads the schema of the active connection.
 */
export class SchemaIntrospector {
  constructor(private connections: ConnectionManager) {}

  /**
   * @throws SchemaIntrospectionError when the database cannot be read
   */
  async getSchema(): Promise<string> {
    return this.connections.withSession(async ({ db, backend }) => {
      try {
        const schema = await describeSchema(inspectorFor(db, backend));
        logger.info(`Schema extraction completed. Length: ${schema.length}`);
        return schema;
      } catch (error) {
        logger.error({ err: error }, 'Schema extraction failed');
        throw new SchemaIntrospectionError(
          `Error extracting schema: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });
  }
}
